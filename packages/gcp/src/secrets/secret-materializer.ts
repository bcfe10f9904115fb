/**
 * Secret Materializer
 *
 * Writes every secret in the project to a systemd EnvironmentFile. Meant to
 * run on the VM (as ExecStartPre) with the VM's own service account, writing
 * to a tmpfs path so secret values never reach the persistent disk.
 */

import path from "path";
import fs from "fs-extra";
import {
  ProvisionError,
  buildEnvFile,
  isPlaceholderValue,
  isValidEnvName,
  toProvisionError,
} from "@tunnelgate/core";
import type { EnvEntry } from "@tunnelgate/core";
import type { IGceSecretManager } from "../managers";
import type { GceLogCallback } from "../types";

export interface FileOwner {
  uid: number;
  gid: number;
}

export interface MaterializeOptions {
  /** Env file to (re)write, e.g. /run/openclaw/env */
  outputPath: string;
  /** chown the file before it is moved into place */
  owner?: FileOwner;
  /** File mode (default 0600) */
  mode?: number;
}

export interface SkippedSecret {
  name: string;
  reason: string;
}

export interface MaterializeResult {
  loaded: number;
  skipped: SkippedSecret[];
  path: string;
}

export class SecretMaterializer {
  constructor(
    private readonly secretManager: IGceSecretManager,
    private readonly log: GceLogCallback = () => {}
  ) {}

  async materialize(options: MaterializeOptions): Promise<MaterializeResult> {
    const { outputPath, owner, mode = 0o600 } = options;

    let ids: string[];
    try {
      ids = await this.secretManager.listSecretIds();
    } catch (error: unknown) {
      const cause = toProvisionError(error);
      throw new ProvisionError(
        `Could not list secrets; ${outputPath} left unchanged: ${cause.message}`,
        cause.type,
        cause,
        cause.suggestions
      );
    }

    const entries: EnvEntry[] = [];
    const skipped: SkippedSecret[] = [];
    const skip = (name: string, reason: string) => {
      skipped.push({ name, reason });
      this.log(`  Skipping '${name}' (${reason})`, "stderr");
    };

    for (const name of ids) {
      if (!isValidEnvName(name)) {
        skip(name, "not a valid variable name");
        continue;
      }

      let value: string | undefined;
      try {
        value = await this.secretManager.accessLatest(name);
      } catch (error: unknown) {
        skip(name, `access failed: ${error instanceof Error ? error.message : String(error)}`);
        continue;
      }

      if (value === undefined) {
        skip(name, "no accessible version");
        continue;
      }
      if (isPlaceholderValue(value)) {
        skip(name, value.trim() === "" ? "empty" : "placeholder");
        continue;
      }

      // Trailing newlines are dropped, as the on-VM fetch helper does
      entries.push({ name, value: value.replace(/\n+$/, "") });
    }

    await this.writeAtomically(outputPath, buildEnvFile(entries), mode, owner);
    this.log(`Loaded ${entries.length} secret(s) into ${outputPath}`, "stdout");

    return { loaded: entries.length, skipped, path: outputPath };
  }

  private async writeAtomically(
    outputPath: string,
    content: string,
    mode: number,
    owner?: FileOwner
  ): Promise<void> {
    await fs.ensureDir(path.dirname(outputPath), 0o700);

    const tmpPath = `${outputPath}.tmp`;
    try {
      await fs.writeFile(tmpPath, content, { mode });
      // writeFile keeps the mode of a leftover tmp file
      await fs.chmod(tmpPath, mode);
      if (owner) {
        await fs.chown(tmpPath, owner.uid, owner.gid);
      }
      await fs.rename(tmpPath, outputPath);
    } catch (error: unknown) {
      await fs.remove(tmpPath);
      throw error;
    }
  }
}
