/**
 * GCE Manager Factory
 *
 * Creates and wires up all GCE managers with their dependencies.
 */

import {
  InstancesClient,
  FirewallsClient,
  RoutersClient,
  GlobalOperationsClient,
  ZoneOperationsClient,
  RegionOperationsClient,
} from "@google-cloud/compute";
import { Logging } from "@google-cloud/logging";
import { ProjectsClient } from "@google-cloud/resource-manager";
import { SecretManagerServiceClient } from "@google-cloud/secret-manager";
import { ServiceUsageClient } from "@google-cloud/service-usage";

import {
  GceOperationManager,
  GceServiceManager,
  GceIamManager,
  GceNetworkManager,
  GceComputeManager,
  GceSecretManager,
  GceLoggingManager,
} from "./managers";

import type {
  IGceOperationManager,
  IGceServiceManager,
  IGceIamManager,
  IGceNetworkManager,
  IGceComputeManager,
  IGceSecretManager,
  IGceLoggingManager,
} from "./managers";

import type { GceLogCallback } from "./types";

/**
 * Configuration for the GCE manager factory.
 */
export interface GceManagerFactoryConfig {
  /** GCP project ID */
  projectId: string;
  /** GCE zone (e.g., "us-central1-a") */
  zone: string;
  /** GCE region (e.g., "us-central1") */
  region: string;
  /** Path to service account key file (optional, uses ADC if not provided) */
  keyFilePath?: string;
  /** Log callback function */
  log: GceLogCallback;
}

/**
 * Collection of all GCE managers.
 */
export interface GceManagers {
  /** Operation manager for waiting on async GCE operations */
  operationManager: IGceOperationManager;
  /** Service Usage: API enablement */
  serviceManager: IGceServiceManager;
  /** Project IAM policy */
  iamManager: IGceIamManager;
  /** Firewall rules and Cloud NAT */
  networkManager: IGceNetworkManager;
  /** The VM instance */
  computeManager: IGceComputeManager;
  /** Secrets loaded into the gateway's environment */
  secretManager: IGceSecretManager;
  /** Startup-script logs */
  loggingManager: IGceLoggingManager;
}

/**
 * Factory class for creating GCE managers with proper wiring.
 */
export class GceManagerFactory {
  /**
   * Create all GCE managers with proper dependencies wired.
   */
  static createManagers(config: GceManagerFactoryConfig): GceManagers {
    const { projectId, zone, region, keyFilePath, log } = config;

    const clientOptions = keyFilePath ? { keyFilename: keyFilePath } : {};

    // SDK clients
    const instancesClient = new InstancesClient(clientOptions);
    const firewallsClient = new FirewallsClient(clientOptions);
    const routersClient = new RoutersClient(clientOptions);
    const globalOperationsClient = new GlobalOperationsClient(clientOptions);
    const zoneOperationsClient = new ZoneOperationsClient(clientOptions);
    const regionOperationsClient = new RegionOperationsClient(clientOptions);

    // Operation manager (dependency for other managers)
    const operationManager = new GceOperationManager(
      globalOperationsClient,
      zoneOperationsClient,
      regionOperationsClient,
      projectId,
      zone,
      region,
      log
    );

    const networkManager = new GceNetworkManager(
      firewallsClient,
      routersClient,
      operationManager,
      projectId,
      region,
      log
    );

    const computeManager = new GceComputeManager(
      instancesClient,
      operationManager,
      projectId,
      zone,
      log
    );

    const serviceManager = new GceServiceManager(
      new ServiceUsageClient(clientOptions),
      projectId,
      log
    );

    const iamManager = new GceIamManager(new ProjectsClient(clientOptions), projectId, log);

    const secretManager = GceManagerFactory.createSecretManager({ projectId, keyFilePath, log });

    const loggingManager = new GceLoggingManager(
      new Logging({ projectId, ...clientOptions }),
      projectId,
      zone
    );

    return {
      operationManager,
      serviceManager,
      iamManager,
      networkManager,
      computeManager,
      secretManager,
      loggingManager,
    };
  }

  /**
   * Secret manager on its own, for the on-VM fetch which has no zone to work in.
   */
  static createSecretManager(
    config: Pick<GceManagerFactoryConfig, "projectId" | "keyFilePath" | "log">
  ): IGceSecretManager {
    const clientOptions = config.keyFilePath ? { keyFilename: config.keyFilePath } : {};
    return new GceSecretManager(
      new SecretManagerServiceClient(clientOptions),
      config.projectId,
      config.log
    );
  }
}
