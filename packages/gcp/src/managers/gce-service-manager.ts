/**
 * GCE Service Manager
 *
 * Enables project APIs through @google-cloud/service-usage.
 */

import { ServiceUsageClient } from "@google-cloud/service-usage";
import type { GceLogCallback } from "../types";
import type { IGceServiceManager } from "./interfaces";

/** batchEnableServices accepts at most 20 services per call */
const MAX_BATCH_SIZE = 20;

export class GceServiceManager implements IGceServiceManager {
  constructor(
    private readonly client: ServiceUsageClient,
    private readonly project: string,
    private readonly log: GceLogCallback
  ) {}

  async enableServices(services: readonly string[]): Promise<string[]> {
    const enabled = new Set(await this.listEnabled());
    const pending = services.filter((service) => !enabled.has(service));

    if (pending.length === 0) {
      this.log(`  APIs already enabled: ${services.join(", ")}`, "stdout");
      return [];
    }

    for (let i = 0; i < pending.length; i += MAX_BATCH_SIZE) {
      const batch = pending.slice(i, i + MAX_BATCH_SIZE);
      this.log(`  Enabling ${batch.join(", ")}`, "stdout");

      const [operation] = await this.client.batchEnableServices({
        parent: `projects/${this.project}`,
        serviceIds: batch,
      });
      await operation.promise();
    }
    return pending;
  }

  async listEnabled(): Promise<string[]> {
    const names: string[] = [];
    const services = this.client.listServicesAsync({
      parent: `projects/${this.project}`,
      filter: "state:ENABLED",
    });

    for await (const service of services) {
      // "projects/123/services/compute.googleapis.com"
      const name = service.config?.name ?? service.name?.split("/").pop();
      if (name) names.push(name);
    }
    return names;
  }
}
