import { execFileSync } from "child_process";
import chalk from "chalk";
import { gatewayPaths } from "@tunnelgate/core";
import { GceManagerFactory, SecretMaterializer } from "@tunnelgate/gcp";
import type { FileOwner } from "@tunnelgate/gcp";
import { loadConfig } from "./context";
import type { ConfigOptions } from "./context";
import { createLogCallback, printError } from "../utils/output";

export interface FetchSecretsOptions extends ConfigOptions {
  output?: string;
  owner?: string;
}

type IdLookup = (flag: "-u" | "-g", user: string) => number;

function lookupId(flag: "-u" | "-g", user: string): number {
  return Number.parseInt(execFileSync("id", [flag, user], { encoding: "utf-8", stdio: "pipe" }).trim(), 10);
}

/**
 * "1001:1001" or a user name ("openclaw", resolved with `id`).
 */
export function parseOwner(spec: string, lookup: IdLookup = lookupId): FileOwner {
  const numeric = /^(\d+):(\d+)$/.exec(spec);
  if (numeric) {
    return { uid: Number(numeric[1]), gid: Number(numeric[2]) };
  }

  const [user, group = user] = spec.split(":");
  const uid = lookup("-u", user);
  const gid = lookup("-g", group);
  if (!Number.isInteger(uid) || !Number.isInteger(gid)) {
    throw new Error(`Unknown owner '${spec}'`);
  }
  return { uid, gid };
}

/**
 * Materialize every secret into the gateway's EnvironmentFile. Runs on the VM
 * with the VM's service account.
 */
export async function fetchSecrets(options: FetchSecretsOptions): Promise<void> {
  const log = createLogCallback();
  try {
    const config = loadConfig(options);
    const outputPath = options.output ?? gatewayPaths(config.gateway).envFile;
    const owner = options.owner ? parseOwner(options.owner) : undefined;

    const secretManager = GceManagerFactory.createSecretManager({
      projectId: config.projectId,
      keyFilePath: config.keyFilePath,
      log,
    });
    const result = await new SecretMaterializer(secretManager, log).materialize({ outputPath, owner });

    if (result.skipped.length > 0) {
      console.log(chalk.gray(`Skipped ${result.skipped.length} secret(s)`));
    }
  } catch (error: unknown) {
    printError(error, "Could not fetch secrets");
    process.exit(1);
  }
}
