/**
 * 設定値の不整合。スタックの組み立て前に検出し、どの項目が原因かを`field`に持つ
 */
export class ConfigurationError extends Error {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "ConfigurationError";
    this.field = field;
  }
}
