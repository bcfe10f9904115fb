import { spawnSync } from "child_process";
import chalk from "chalk";
import { createDeployer } from "./context";
import type { ConfigOptions } from "./context";
import { printError } from "../utils/output";

export interface SshOptions extends ConfigOptions {
  print?: boolean;
}

/**
 * Split the SSH command into argv for spawning without a shell.
 */
export function sshArgs(command: string): string[] {
  return command.split(" ").slice(1);
}

export async function ssh(options: SshOptions): Promise<void> {
  let command: string;
  try {
    command = createDeployer(options).deployer.sshCommand();
  } catch (error: unknown) {
    printError(error);
    process.exit(1);
  }

  if (options.print) {
    console.log(command);
    return;
  }

  console.log(chalk.gray(`$ ${command}`));
  const result = spawnSync("gcloud", sshArgs(command), { stdio: "inherit" });
  if (result.error) {
    printError(result.error, "Could not run gcloud");
    process.exit(1);
  }
  process.exit(result.status ?? 1);
}
