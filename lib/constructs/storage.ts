import { aws_s3, RemovalPolicy } from "aws-cdk-lib";
import { Construct } from "constructs";

/**
 * チャットUIから参照するファイル置き場
 * スタック削除時にオブジェクトごと削除する
 */
export class KnowledgeBucket extends Construct {
  public readonly bucket: aws_s3.IBucket;

  constructor(scope: Construct, id: string) {
    super(scope, id);

    this.bucket = new aws_s3.Bucket(this, "KnowledgeBucket", {
      blockPublicAccess: aws_s3.BlockPublicAccess.BLOCK_ALL,
      encryption: aws_s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      removalPolicy: RemovalPolicy.DESTROY,
      autoDeleteObjects: true,
    });
  }
}
