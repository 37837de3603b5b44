import { Stack, Stage } from "aws-cdk-lib";

/**
 * 合成済みCloudFormationテンプレートから読み取ったリソースの依存グラフ
 * edge は `from` が `to` に依存していることを表す
 */
export interface ResourceNode {
  logicalId: string;
  type: string;
}

export interface DependencyEdge {
  from: string;
  to: string;
}

export interface ResourceGraph {
  nodes: ResourceNode[];
  edges: DependencyEdge[];
}

interface CfnResource {
  Type: string;
  Properties?: unknown;
  DependsOn?: string | string[];
}

export interface CfnTemplate {
  Resources: Record<string, CfnResource>;
  Outputs?: Record<string, unknown>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const toCfnResource = (logicalId: string, value: unknown): CfnResource => {
  if (!isRecord(value) || typeof value.Type !== "string") {
    throw new TypeError(`resource ${logicalId} has no Type`);
  }
  const dependsOn = value.DependsOn;
  if (dependsOn !== undefined && typeof dependsOn !== "string" && !isStringArray(dependsOn)) {
    throw new TypeError(`resource ${logicalId} has an invalid DependsOn`);
  }
  return { Type: value.Type, Properties: value.Properties, DependsOn: dependsOn };
};

export const parseTemplate = (template: unknown): CfnTemplate => {
  if (!isRecord(template) || !isRecord(template.Resources)) {
    throw new TypeError("template has no Resources section");
  }
  const resources: Record<string, CfnResource> = {};
  for (const [logicalId, resource] of Object.entries(template.Resources)) {
    resources[logicalId] = toCfnResource(logicalId, resource);
  }
  return {
    Resources: resources,
    Outputs: isRecord(template.Outputs) ? template.Outputs : undefined,
  };
};

/** `cdk synth` と同じテンプレートを得る */
export const synthesizeTemplate = (stack: Stack): CfnTemplate => {
  const stage = Stage.of(stack);
  if (stage === undefined) {
    throw new Error(`stack ${stack.stackName} is not part of an app`);
  }
  const template: unknown = stage.synth().getStackArtifact(stack.artifactId).template;
  return parseTemplate(template);
};

const SUB_REFERENCE = /\$\{([A-Za-z0-9]+)(?:\.[A-Za-z0-9.]+)?\}/g;

const collectReferences = (value: unknown, into: Set<string>): void => {
  if (Array.isArray(value)) {
    value.forEach((item) => collectReferences(item, into));
    return;
  }
  if (!isRecord(value)) {
    return;
  }
  for (const [key, inner] of Object.entries(value)) {
    if (key === "Ref" && typeof inner === "string") {
      into.add(inner);
    } else if (key === "Fn::GetAtt") {
      if (Array.isArray(inner) && typeof inner[0] === "string") {
        into.add(inner[0]);
      } else if (typeof inner === "string") {
        into.add(inner.split(".")[0]);
      }
    } else if (key === "Fn::Sub") {
      const text = Array.isArray(inner) ? inner[0] : inner;
      if (typeof text === "string") {
        for (const match of text.matchAll(SUB_REFERENCE)) {
          into.add(match[1]);
        }
      }
      collectReferences(Array.isArray(inner) ? inner.slice(1) : [], into);
    } else {
      collectReferences(inner, into);
    }
  }
};

const byEdge = (a: DependencyEdge, b: DependencyEdge): number =>
  a.from === b.from ? a.to.localeCompare(b.to) : a.from.localeCompare(b.from);

/**
 * 明示的な`DependsOn`と、`Ref`/`Fn::GetAtt`/`Fn::Sub`による参照を依存として扱う
 * パラメータや疑似パラメータ(`AWS::Region`など)への参照は含めない
 */
export const buildResourceGraph = (template: CfnTemplate): ResourceGraph => {
  const ids = Object.keys(template.Resources).sort();
  const known = new Set(ids);
  const nodes = ids.map((logicalId) => ({ logicalId, type: template.Resources[logicalId].Type }));

  const edges: DependencyEdge[] = [];
  for (const from of ids) {
    const resource = template.Resources[from];
    const targets = new Set<string>();
    const dependsOn = resource.DependsOn;
    (typeof dependsOn === "string" ? [dependsOn] : dependsOn ?? []).forEach((id) => targets.add(id));
    collectReferences(resource.Properties, targets);
    for (const to of targets) {
      if (known.has(to) && to !== from) {
        edges.push({ from, to });
      }
    }
  }
  return { nodes, edges: edges.sort(byEdge) };
};

export const dependenciesOf = (graph: ResourceGraph, logicalId: string): string[] =>
  graph.edges.filter((edge) => edge.from === logicalId).map((edge) => edge.to);

export const nodesOfType = (graph: ResourceGraph, type: string): ResourceNode[] =>
  graph.nodes.filter((node) => node.type === type);

/**
 * 依存先が先に来る作成順。同順位は論理IDの辞書順
 * 循環がある場合は例外
 */
export const topologicalOrder = (graph: ResourceGraph): string[] => {
  const remaining = new Map<string, number>(graph.nodes.map((node) => [node.logicalId, 0]));
  const dependents = new Map<string, string[]>();
  for (const { from, to } of graph.edges) {
    remaining.set(from, (remaining.get(from) ?? 0) + 1);
    dependents.set(to, [...(dependents.get(to) ?? []), from]);
  }

  const ready = [...remaining.entries()].filter(([, count]) => count === 0).map(([id]) => id);
  const order: string[] = [];
  while (ready.length > 0) {
    ready.sort();
    const next = ready.shift();
    if (next === undefined) break;
    order.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const count = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, count);
      if (count === 0) {
        ready.push(dependent);
      }
    }
  }

  if (order.length !== graph.nodes.length) {
    const cyclic = [...remaining.entries()].filter(([, count]) => count > 0).map(([id]) => id);
    throw new Error(`dependency cycle between ${cyclic.join(", ")}`);
  }
  return order;
};

export const serializeGraph = (graph: ResourceGraph): string => JSON.stringify(graph, null, 2);

export const parseGraph = (text: string): ResourceGraph => {
  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed) || !Array.isArray(parsed.nodes) || !Array.isArray(parsed.edges)) {
    throw new TypeError("not a resource graph");
  }
  const nodes = parsed.nodes.map((node: unknown): ResourceNode => {
    if (!isRecord(node) || typeof node.logicalId !== "string" || typeof node.type !== "string") {
      throw new TypeError(`invalid node ${JSON.stringify(node)}`);
    }
    return { logicalId: node.logicalId, type: node.type };
  });
  const edges = parsed.edges.map((edge: unknown): DependencyEdge => {
    if (!isRecord(edge) || typeof edge.from !== "string" || typeof edge.to !== "string") {
      throw new TypeError(`invalid edge ${JSON.stringify(edge)}`);
    }
    return { from: edge.from, to: edge.to };
  });
  return { nodes, edges };
};
