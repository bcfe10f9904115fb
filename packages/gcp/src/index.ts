/**
 * @tunnelgate/gcp
 *
 * Google Cloud control-plane adapters and the IAP VM deployer.
 */

export * from "./types";
export * from "./managers";
export { GceManagerFactory } from "./gce-manager-factory";
export type { GceManagerFactoryConfig, GceManagers } from "./gce-manager-factory";
export { IapVmDeployer, iamMember } from "./deployer/iap-vm-deployer";
export type { HealthCheckOptions, IapVmDeployerOptions } from "./deployer/iap-vm-deployer";
export { SecretMaterializer } from "./secrets/secret-materializer";
export type {
  FileOwner,
  MaterializeOptions,
  MaterializeResult,
  SkippedSecret,
} from "./secrets/secret-materializer";
