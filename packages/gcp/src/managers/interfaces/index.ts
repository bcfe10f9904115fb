/**
 * GCE Manager Interfaces
 *
 * Re-exports all manager interfaces for dependency injection and testing.
 */

export type { IGceOperationManager } from "./gce-operation-manager.interface";
export type { IGceServiceManager } from "./gce-service-manager.interface";
export type { IGceIamManager } from "./gce-iam-manager.interface";
export type { IGceNetworkManager } from "./gce-network-manager.interface";
export type { IGceComputeManager } from "./gce-compute-manager.interface";
export type { IGceSecretManager } from "./gce-secret-manager.interface";
export type { IGceLoggingManager, GceLogQueryOptions } from "./gce-logging-manager.interface";
