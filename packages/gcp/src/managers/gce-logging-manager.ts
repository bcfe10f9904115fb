/**
 * GCE Logging Manager
 *
 * Reads startup-script output from Cloud Logging through @google-cloud/logging.
 */

import { Logging } from "@google-cloud/logging";
import type { GceLogQueryOptions, IGceLoggingManager } from "./interfaces";

/** Log the guest agent writes startup-script output to */
const STARTUP_SCRIPT_LOG = "google_metadata_script_runner";

function entryText(data: unknown): string {
  if (typeof data === "string") return data;
  if (typeof data === "object" && data !== null) {
    if ("message" in data && typeof data.message === "string") return data.message;
    if ("textPayload" in data && typeof data.textPayload === "string") return data.textPayload;
  }
  return JSON.stringify(data);
}

export class GceLoggingManager implements IGceLoggingManager {
  constructor(
    private readonly logging: Logging,
    private readonly projectId: string,
    private readonly zone: string
  ) {}

  async getStartupLogs(instanceName: string, options?: GceLogQueryOptions): Promise<string[]> {
    const filter = [
      `resource.type="gce_instance"`,
      `log_id("${STARTUP_SCRIPT_LOG}")`,
      `labels."compute.googleapis.com/resource_name"="${instanceName}"`,
      `resource.labels.zone="${this.zone}"`,
    ];

    if (options?.since) {
      filter.push(`timestamp>="${options.since.toISOString()}"`);
    }

    const [entries] = await this.logging.getEntries({
      filter: filter.join(" AND "),
      orderBy: "timestamp desc",
      pageSize: options?.lines ?? 100,
      autoPaginate: false,
    });

    const data: unknown[] = entries.map((entry) => entry.data);
    return data.map(entryText).reverse();
  }

  getConsoleLink(instanceName: string): string {
    const query = encodeURIComponent(
      `resource.type="gce_instance"\nlabels."compute.googleapis.com/resource_name"="${instanceName}"`
    );
    return `https://console.cloud.google.com/logs/query;query=${query}?project=${this.projectId}`;
  }
}
