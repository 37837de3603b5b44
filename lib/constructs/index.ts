export { Vpc, SecurityGroups, EPHEMERAL_PORT_RANGE } from "./vpc";
export { ComputeCapacity } from "./capacity";
export type { IComputeCapacity } from "./capacity";
export { KnowledgeBucket } from "./storage";
export { Domain, AliasRecord, recordFqdn } from "./dns";
export { EcsService, EcsRoles, isMutableImageReference } from "./ecsService";
export type { IEcsService } from "./ecsService";
export { ServiceAutoScaling } from "./scaling";
export { Waf } from "./waf/waf";
export { ObservabilityPack } from "./observability";
export { paramsChatUiEcsEc2, envUsEast1, prefix, environments } from "./params";
export type { IChatUiEcsEc2, ISecretRef, IComputePool, IFirewall, IObservability, environment } from "./params";
