/**
 * GCE Operation Manager
 *
 * Consolidates operation waiting logic for global, zone, and region operations.
 */

import {
  GlobalOperationsClient,
  ZoneOperationsClient,
  RegionOperationsClient,
} from "@google-cloud/compute";
import {
  OPERATION_POLL_INTERVAL_MS,
  OPERATION_TIMEOUT_MS,
  ProvisionError,
  ProvisionErrorType,
  sleep,
} from "@tunnelgate/core";
import type { GceLogCallback } from "../types";
import type { IGceOperationManager } from "./interfaces";

export type OperationScope = "global" | "zone" | "region";

export interface WaitOptions {
  /** Timeout in milliseconds */
  timeoutMs?: number;
  /** Polling interval in milliseconds */
  pollIntervalMs?: number;
  /** Human-readable description for logging */
  description?: string;
}

interface OperationResult {
  status?: unknown;
  progress?: number | null;
  error?: { errors?: Array<{ message?: string | null }> | null } | null;
}

/**
 * Pull the operation name out of whatever an insert/patch/delete call
 * resolved with. Compute clients hand back an ExtendedOperation whose name
 * sits either on the object itself or on its latestResponse.
 */
export function getOperationName(operation: unknown): string | undefined {
  if (typeof operation !== "object" || operation === null) return undefined;

  if ("name" in operation && typeof operation.name === "string" && operation.name) {
    return operation.name.split("/").pop() ?? operation.name;
  }
  if ("latestResponse" in operation) {
    return getOperationName(operation.latestResponse);
  }
  return undefined;
}

/**
 * Manages GCE operation polling for global, zone, and region scopes.
 */
export class GceOperationManager implements IGceOperationManager {
  constructor(
    private readonly globalOpsClient: GlobalOperationsClient,
    private readonly zoneOpsClient: ZoneOperationsClient,
    private readonly regionOpsClient: RegionOperationsClient,
    private readonly project: string,
    private readonly zone: string,
    private readonly region: string,
    private readonly log: GceLogCallback
  ) {}

  async waitForOperation(
    operation: unknown,
    scope: OperationScope,
    options: WaitOptions = {}
  ): Promise<void> {
    const operationName = getOperationName(operation);
    if (!operationName) return;

    const {
      timeoutMs = OPERATION_TIMEOUT_MS,
      pollIntervalMs = OPERATION_POLL_INTERVAL_MS,
      description = operationName,
    } = options;

    let lastStatus = "";
    const start = Date.now();

    while (Date.now() - start < timeoutMs) {
      const result = await this.getOperationStatus(operationName, scope);

      const status = String(result.status ?? "UNKNOWN");
      const progress = result.progress ?? 0;

      // Log status changes
      if (status !== lastStatus) {
        const elapsed = Math.round((Date.now() - start) / 1000);
        this.log(
          `  [${description}] ${status}${progress > 0 ? ` (${progress}%)` : ""} - ${elapsed}s elapsed`,
          "stdout"
        );
        lastStatus = status;
      }

      if (status === "DONE") {
        if (result.error?.errors?.length) {
          const errorMsg = result.error.errors[0]?.message ?? "Operation failed";
          this.log(`  [${description}] FAILED: ${errorMsg}`, "stderr");
          throw new Error(errorMsg);
        }
        return;
      }

      await sleep(pollIntervalMs);
    }

    this.log(`  [${description}] TIMEOUT after ${timeoutMs / 1000}s`, "stderr");
    throw new ProvisionError(`Operation timed out: ${operationName}`, ProvisionErrorType.TIMEOUT);
  }

  private async getOperationStatus(
    operationName: string,
    scope: OperationScope
  ): Promise<OperationResult> {
    switch (scope) {
      case "global": {
        const [result] = await this.globalOpsClient.get({
          project: this.project,
          operation: operationName,
        });
        return result;
      }
      case "zone": {
        const [result] = await this.zoneOpsClient.get({
          project: this.project,
          zone: this.zone,
          operation: operationName,
        });
        return result;
      }
      case "region": {
        const [result] = await this.regionOpsClient.get({
          project: this.project,
          region: this.region,
          operation: operationName,
        });
        return result;
      }
    }
  }
}
