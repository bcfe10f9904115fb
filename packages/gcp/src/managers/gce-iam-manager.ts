/**
 * GCE IAM Manager
 *
 * Reads and writes the project IAM policy through
 * @google-cloud/resource-manager.
 */

import { ProjectsClient } from "@google-cloud/resource-manager";
import { isConcurrencyError, withRetry } from "@tunnelgate/core";
import type { GceLogCallback } from "../types";
import type { IGceIamManager } from "./interfaces";

const IAM_POLICY_VERSION = 3;

export class GceIamManager implements IGceIamManager {
  constructor(
    private readonly client: ProjectsClient,
    private readonly project: string,
    private readonly log: GceLogCallback
  ) {}

  private get resource(): string {
    return `projects/${this.project}`;
  }

  async testPermissions(permissions: readonly string[]): Promise<string[]> {
    const [response] = await this.client.testIamPermissions({
      resource: this.resource,
      permissions: [...permissions],
    });
    const granted = new Set(response.permissions ?? []);
    return permissions.filter((permission) => !granted.has(permission));
  }

  async addProjectBinding(member: string, role: string): Promise<boolean> {
    // Read-modify-write; a concurrent writer changes the etag and the write
    // is rejected, so re-read and try once more.
    return withRetry(
      async () => {
        // Version 3 is required to read and write back conditional bindings
        const [policy] = await this.client.getIamPolicy({
          resource: this.resource,
          options: { requestedPolicyVersion: IAM_POLICY_VERSION },
        });
        const bindings = policy.bindings ?? [];

        const existing = bindings.find((binding) => binding.role === role && !binding.condition);
        if (existing?.members?.includes(member)) {
          return false;
        }

        if (existing) {
          existing.members = [...(existing.members ?? []), member];
        } else {
          bindings.push({ role, members: [member] });
        }

        await this.client.setIamPolicy({
          resource: this.resource,
          policy: { ...policy, version: IAM_POLICY_VERSION, bindings },
        });
        this.log(`  Granted ${role} to ${member}`, "stdout");
        return true;
      },
      {
        maxAttempts: 2,
        delayMs: 1000,
        shouldRetry: isConcurrencyError,
        onRetry: () => this.log("  IAM policy changed concurrently, retrying", "stderr"),
      }
    );
  }
}
