/**
 * GCE Compute Manager
 *
 * Lifecycle of a single Compute Engine instance reachable only through IAP:
 * no external address, OS Login, Shielded VM.
 */

import { InstancesClient } from "@google-cloud/compute";
import type { protos } from "@google-cloud/compute";
import { CLOUD_PLATFORM_SCOPE, isNotFoundError } from "@tunnelgate/core";
import type { GceLogCallback, InstanceInfo, InstanceSpec, VmStatus } from "../types";
import type { IGceComputeManager, IGceOperationManager } from "./interfaces";

type Instance = protos.google.cloud.compute.v1.IInstance;

const VM_STATUSES: readonly VmStatus[] = [
  "RUNNING",
  "STOPPED",
  "STOPPING",
  "TERMINATED",
  "STAGING",
  "PROVISIONING",
  "SUSPENDING",
  "SUSPENDED",
  "REPAIRING",
];

export function toVmStatus(value: string | null | undefined): VmStatus {
  return VM_STATUSES.find((status) => status === value) ?? "UNKNOWN";
}

function toInstanceInfo(name: string, instance: Instance): InstanceInfo {
  const interfaces = instance.networkInterfaces ?? [];
  return {
    name: instance.name ?? name,
    status: toVmStatus(instance.status),
    networkTags: instance.tags?.items ?? [],
    hasExternalIp: interfaces.some((nic) => (nic.accessConfigs ?? []).length > 0),
    serviceAccountEmail: instance.serviceAccounts?.[0]?.email ?? undefined,
    labels: instance.labels ?? {},
  };
}

/**
 * Manages the GCE VM instance.
 */
export class GceComputeManager implements IGceComputeManager {
  constructor(
    private readonly instancesClient: InstancesClient,
    private readonly operationManager: IGceOperationManager,
    private readonly project: string,
    private readonly zone: string,
    private readonly log: GceLogCallback
  ) {}

  async getInstance(name: string): Promise<InstanceInfo | undefined> {
    try {
      const [instance] = await this.instancesClient.get({
        project: this.project,
        zone: this.zone,
        instance: name,
      });
      return toInstanceInfo(name, instance);
    } catch (error: unknown) {
      if (isNotFoundError(error)) return undefined;
      throw error;
    }
  }

  async createInstance(spec: InstanceSpec): Promise<void> {
    this.log(`  Creating instance ${spec.name} (${spec.machineType})`, "stdout");

    const [operation] = await this.instancesClient.insert({
      project: this.project,
      zone: this.zone,
      instanceResource: {
        name: spec.name,
        machineType: `zones/${this.zone}/machineTypes/${spec.machineType}`,
        disks: [
          {
            boot: true,
            autoDelete: true,
            initializeParams: {
              sourceImage: `projects/${spec.imageProject}/global/images/family/${spec.imageFamily}`,
            },
          },
        ],
        // No accessConfigs: the instance gets no external IP
        networkInterfaces: [
          {
            network: `projects/${this.project}/global/networks/${spec.network}`,
          },
        ],
        tags: { items: spec.networkTags },
        metadata: {
          items: [
            { key: "enable-oslogin", value: "TRUE" },
            { key: "startup-script", value: spec.startupScript },
          ],
        },
        shieldedInstanceConfig: {
          enableSecureBoot: true,
          enableVtpm: true,
          enableIntegrityMonitoring: true,
        },
        serviceAccounts: [
          {
            email: "default",
            scopes: spec.scopes ?? [CLOUD_PLATFORM_SCOPE],
          },
        ],
        labels: spec.labels,
      },
    });

    await this.operationManager.waitForOperation(operation, "zone", {
      description: `create instance ${spec.name}`,
    });
  }

  async getInstanceStatus(name: string): Promise<VmStatus> {
    const instance = await this.getInstance(name);
    return instance?.status ?? "UNKNOWN";
  }

  async getSerialOutput(name: string, port = 1): Promise<string> {
    const [output] = await this.instancesClient.getSerialPortOutput({
      project: this.project,
      zone: this.zone,
      instance: name,
      port,
    });
    return output.contents ?? "";
  }

  async startInstance(name: string): Promise<void> {
    const [operation] = await this.instancesClient.start({
      project: this.project,
      zone: this.zone,
      instance: name,
    });
    await this.operationManager.waitForOperation(operation, "zone", {
      description: "start VM",
    });
  }

  async stopInstance(name: string): Promise<void> {
    const [operation] = await this.instancesClient.stop({
      project: this.project,
      zone: this.zone,
      instance: name,
    });
    await this.operationManager.waitForOperation(operation, "zone", {
      description: "stop VM",
    });
  }

  async deleteInstance(name: string): Promise<void> {
    try {
      const [operation] = await this.instancesClient.delete({
        project: this.project,
        zone: this.zone,
        instance: name,
      });
      await this.operationManager.waitForOperation(operation, "zone", {
        description: "delete VM",
      });
    } catch (error: unknown) {
      if (!isNotFoundError(error)) throw error;
    }
  }

  async getServiceAccountEmail(name: string): Promise<string | undefined> {
    const instance = await this.getInstance(name);
    return instance?.serviceAccountEmail;
  }
}
