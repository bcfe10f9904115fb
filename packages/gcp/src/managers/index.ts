/**
 * GCE Managers
 *
 * Re-exports all manager implementations and interfaces.
 */

export { GceOperationManager, getOperationName } from "./gce-operation-manager";
export type { OperationScope, WaitOptions } from "./gce-operation-manager";
export { GceServiceManager } from "./gce-service-manager";
export { GceIamManager } from "./gce-iam-manager";
export { GceNetworkManager } from "./gce-network-manager";
export { GceComputeManager, toVmStatus } from "./gce-compute-manager";
export { GceSecretManager } from "./gce-secret-manager";
export { GceLoggingManager } from "./gce-logging-manager";

export type {
  IGceOperationManager,
  IGceServiceManager,
  IGceIamManager,
  IGceNetworkManager,
  IGceComputeManager,
  IGceSecretManager,
  IGceLoggingManager,
  GceLogQueryOptions,
} from "./interfaces";
