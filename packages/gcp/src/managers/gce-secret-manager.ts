/**
 * GCE Secret Manager
 *
 * Secret storage through @google-cloud/secret-manager. Secret IDs double as
 * environment variable names on the VM.
 */

import { SecretManagerServiceClient } from "@google-cloud/secret-manager";
import {
  PLACEHOLDER_SECRET_VALUE,
  isAlreadyExistsError,
  isNotFoundError,
  secretIdFromResourceName,
} from "@tunnelgate/core";
import type { GceLogCallback } from "../types";
import type { IGceSecretManager } from "./interfaces";

export class GceSecretManager implements IGceSecretManager {
  constructor(
    private readonly client: SecretManagerServiceClient,
    private readonly projectId: string,
    private readonly log: GceLogCallback
  ) {}

  private get parent(): string {
    return `projects/${this.projectId}`;
  }

  private secretPath(name: string): string {
    return `${this.parent}/secrets/${name}`;
  }

  async listSecretIds(): Promise<string[]> {
    const ids: string[] = [];
    for await (const secret of this.client.listSecretsAsync({ parent: this.parent })) {
      if (secret.name) ids.push(secretIdFromResourceName(secret.name));
    }
    return ids;
  }

  async ensureSecret(name: string, value: string): Promise<void> {
    if (!(await this.secretExists(name))) {
      await this.createSecret(name);
    }
    await this.addVersion(name, value);
  }

  async ensurePlaceholder(name: string): Promise<boolean> {
    if (await this.secretExists(name)) {
      return false;
    }

    try {
      await this.createSecret(name);
    } catch (error: unknown) {
      // Created by someone else between the check and the create
      if (isAlreadyExistsError(error)) return false;
      throw error;
    }
    await this.addVersion(name, PLACEHOLDER_SECRET_VALUE);
    this.log(`  Created secret ${name} with a placeholder value`, "stdout");
    return true;
  }

  async accessLatest(name: string): Promise<string | undefined> {
    try {
      const [version] = await this.client.accessSecretVersion({
        name: `${this.secretPath(name)}/versions/latest`,
      });
      const data = version.payload?.data;
      if (data === null || data === undefined) return undefined;
      return typeof data === "string" ? data : Buffer.from(data).toString("utf8");
    } catch (error: unknown) {
      if (isNotFoundError(error)) return undefined;
      throw error;
    }
  }

  async secretExists(name: string): Promise<boolean> {
    try {
      await this.client.getSecret({ name: this.secretPath(name) });
      return true;
    } catch (error: unknown) {
      if (isNotFoundError(error)) return false;
      throw error;
    }
  }

  async deleteSecret(name: string): Promise<void> {
    try {
      await this.client.deleteSecret({ name: this.secretPath(name) });
    } catch (error: unknown) {
      if (!isNotFoundError(error)) throw error;
    }
  }

  private async createSecret(name: string): Promise<void> {
    await this.client.createSecret({
      parent: this.parent,
      secretId: name,
      secret: {
        replication: {
          automatic: {},
        },
      },
    });
  }

  private async addVersion(name: string, value: string): Promise<void> {
    await this.client.addSecretVersion({
      parent: this.secretPath(name),
      payload: {
        data: Buffer.from(value, "utf8"),
      },
    });
  }
}
