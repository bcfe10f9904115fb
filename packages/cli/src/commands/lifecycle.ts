import chalk from "chalk";
import ora from "ora";
import { createDeployer } from "./context";
import type { ConfigOptions } from "./context";
import { printError } from "../utils/output";

export async function start(options: ConfigOptions): Promise<void> {
  const spinner = ora("Starting VM...").start();
  try {
    const { config, deployer } = createDeployer(options, { log: () => {} });
    await deployer.start();
    spinner.succeed(`Started ${config.instanceName}`);
    console.log(chalk.gray("The startup script reloads secrets and starts the gateway on boot."));
  } catch (error: unknown) {
    spinner.fail("Could not start the VM");
    printError(error);
    process.exit(1);
  }
}

export async function stop(options: ConfigOptions): Promise<void> {
  const spinner = ora("Stopping VM...").start();
  try {
    const { config, deployer } = createDeployer(options, { log: () => {} });
    await deployer.stop();
    spinner.succeed(`Stopped ${config.instanceName}`);
  } catch (error: unknown) {
    spinner.fail("Could not stop the VM");
    printError(error);
    process.exit(1);
  }
}

export interface LogsOptions extends ConfigOptions {
  lines?: string;
}

export async function logs(options: LogsOptions): Promise<void> {
  const lines = options.lines ? Number.parseInt(options.lines, 10) : undefined;
  if (lines !== undefined && (!Number.isInteger(lines) || lines <= 0)) {
    console.error(chalk.red(`--lines must be a positive integer, got '${options.lines}'`));
    process.exit(1);
  }

  try {
    const { deployer } = createDeployer(options);
    const entries = await deployer.startupLogs(lines);

    if (entries.length === 0) {
      console.log(chalk.gray("No startup-script output logged yet."));
    }
    for (const entry of entries) {
      console.log(entry);
    }
    console.log();
    console.log(chalk.gray(`Console: ${deployer.logsLink()}`));
  } catch (error: unknown) {
    printError(error, "Could not read logs");
    process.exit(1);
  }
}
