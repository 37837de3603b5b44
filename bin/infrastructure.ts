#!/usr/bin/env node
import * as cdk from "aws-cdk-lib";
import { AwsSolutionsChecks } from "cdk-nag";
import * as lib from "../lib";

const app = new cdk.App();
const params = lib.resolveTopologyConfig(app, lib.paramsChatUiEcsEc2);

new lib.ChatUiEcsEc2Stack(app, `chat-ui-${params.environment}`, params, {
  env: lib.resolveEnvironment(lib.envUsEast1),
  description: "Containerized chat UI on ECS (EC2 capacity provider) behind an HTTPS ALB with WAF",
});

// `cdk synth -c nag=true` (もしくはcdk.jsonの `"nag": true`) でcdk-nagのチェックを行う
if (lib.contextBoolean(app, "nag", false)) {
  cdk.Aspects.of(app).add(new AwsSolutionsChecks({ verbose: true }));
}

app.synth();
