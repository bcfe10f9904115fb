import chalk from "chalk";
import ora from "ora";
import fs from "fs-extra";
import {
  GatewayConfigSchema,
  SecretIdSchema,
  gatewayPaths,
  isValidEnvName,
  parseEnvFile,
  PLACEHOLDER_SECRET_VALUE,
} from "@tunnelgate/core";
import { GceManagerFactory } from "@tunnelgate/gcp";
import type { IGceSecretManager } from "@tunnelgate/gcp";
import { loadConfig } from "./context";
import type { ConfigOptions } from "./context";
import { createLogCallback, printError } from "../utils/output";

export type SecretState = "filled" | "placeholder" | "empty" | "no version" | "inaccessible";

export function secretState(value: string | undefined): SecretState {
  if (value === undefined) return "no version";
  const trimmed = value.trim();
  if (trimmed === PLACEHOLDER_SECRET_VALUE) return "placeholder";
  return trimmed.length === 0 ? "empty" : "filled";
}

function createSecretManager(options: ConfigOptions): IGceSecretManager {
  const config = loadConfig(options);
  return GceManagerFactory.createSecretManager({
    projectId: config.projectId,
    keyFilePath: config.keyFilePath,
    log: createLogCallback(),
  });
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

export async function listSecrets(options: ConfigOptions): Promise<void> {
  const spinner = ora("Listing secrets...").start();
  try {
    const secretManager = createSecretManager(options);
    const ids = await secretManager.listSecretIds();
    spinner.stop();

    if (ids.length === 0) {
      console.log(chalk.gray("No secrets in this project. Seed some with 'tunnelgate secrets seed NAME...'"));
      return;
    }

    for (const id of ids) {
      let state: SecretState;
      try {
        state = secretState(await secretManager.accessLatest(id));
      } catch {
        state = "inaccessible";
      }

      const color = state === "filled" ? chalk.green : state === "placeholder" ? chalk.yellow : chalk.gray;
      const note = isValidEnvName(id) ? "" : chalk.red(" (not a valid variable name; skipped on the VM)");
      console.log(`  ${chalk.cyan(id)} ${color(state)}${note}`);
    }
  } catch (error: unknown) {
    spinner.fail("Could not list secrets");
    printError(error);
    process.exit(1);
  }
}

export interface SetSecretOptions extends ConfigOptions {
  value?: string;
  fromFile?: string;
}

export async function setSecret(name: string, options: SetSecretOptions): Promise<void> {
  const parsed = SecretIdSchema.safeParse(name);
  if (!parsed.success) {
    console.error(chalk.red(`Invalid secret name '${name}': ${parsed.error.issues[0].message}`));
    process.exit(1);
  }

  let value: string;
  if (options.value !== undefined) {
    value = options.value;
  } else if (options.fromFile) {
    value = (await fs.readFile(options.fromFile, "utf-8")).replace(/\n$/, "");
  } else {
    if (process.stdin.isTTY) {
      console.log(chalk.gray("Reading the value from stdin (Ctrl-D to finish)..."));
    }
    value = (await readStdin()).replace(/\n$/, "");
  }

  if (value.trim().length === 0) {
    console.error(chalk.red("Refusing to store an empty value."));
    process.exit(1);
  }

  const spinner = ora(`Storing ${name}...`).start();
  try {
    await createSecretManager(options).ensureSecret(name, value);
    spinner.succeed(`Stored a new version of ${name}`);
    console.log(chalk.gray("The gateway picks it up on its next start."));
  } catch (error: unknown) {
    spinner.fail(`Could not store ${name}`);
    printError(error);
    process.exit(1);
  }
}

export async function seedSecrets(names: string[], options: ConfigOptions): Promise<void> {
  const invalid = names.filter((name) => !SecretIdSchema.safeParse(name).success);
  if (invalid.length > 0) {
    console.error(chalk.red(`Invalid secret name(s): ${invalid.join(", ")}`));
    process.exit(1);
  }

  try {
    const secretManager = createSecretManager(options);
    for (const name of names) {
      const created = await secretManager.ensurePlaceholder(name);
      console.log(
        created
          ? `  ${chalk.green("+")} ${chalk.cyan(name)} ${chalk.gray("(placeholder)")}`
          : `  ${chalk.gray("=")} ${chalk.cyan(name)} ${chalk.gray("(exists, unchanged)")}`
      );
    }
  } catch (error: unknown) {
    printError(error, "Could not seed secrets");
    process.exit(1);
  }
}

export interface VerifyOptions {
  file?: string;
}

/**
 * Show which variables an env file written by `fetch-secrets` holds. Values
 * are never printed.
 */
export async function verifySecrets(options: VerifyOptions): Promise<void> {
  const file = options.file ?? gatewayPaths(GatewayConfigSchema.parse({})).envFile;

  if (!(await fs.pathExists(file))) {
    console.error(chalk.red(`${file} does not exist. Has the gateway started?`));
    process.exit(1);
  }

  const entries = parseEnvFile(await fs.readFile(file, "utf-8"));
  console.log(chalk.white(`${file}: ${entries.length} variable(s)`));
  for (const entry of entries) {
    console.log(`  ${chalk.cyan(entry.name)} ${chalk.gray(`(${entry.value.length} chars)`)}`);
  }
}
