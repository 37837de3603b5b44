export { ChatUiEcsEc2Stack } from "./ChatUiEcsEc2Stack";
export { paramsChatUiEcsEc2, envUsEast1 } from "./constructs";
export type { IChatUiEcsEc2 } from "./constructs";
export { contextBoolean, resolveTopologyConfig, resolveEnvironment, validateTopologyConfig } from "./config";
export { ConfigurationError } from "./errors";
export {
  buildResourceGraph,
  dependenciesOf,
  nodesOfType,
  parseGraph,
  parseTemplate,
  serializeGraph,
  synthesizeTemplate,
  topologicalOrder,
} from "./graph";
export type { ResourceGraph, ResourceNode, DependencyEdge, CfnTemplate } from "./graph";
