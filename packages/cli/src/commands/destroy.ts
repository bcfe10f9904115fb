import inquirer from "inquirer";
import chalk from "chalk";
import ora from "ora";
import { createDeployer } from "./context";
import type { ConfigOptions } from "./context";
import { createLogCallback, printError } from "../utils/output";

export interface DestroyCommandOptions extends ConfigOptions {
  yes?: boolean;
  keepFirewall?: boolean;
  deleteSecrets?: boolean;
}

export async function destroy(options: DestroyCommandOptions): Promise<void> {
  const spinner = ora();
  let context: ReturnType<typeof createDeployer>;
  try {
    context = createDeployer(options, { log: createLogCallback(spinner) });
  } catch (error: unknown) {
    printError(error);
    process.exit(1);
  }
  const { config, deployer } = context;

  console.log(chalk.red.bold("🗑  tunnelgate destroy\n"));
  console.log(chalk.white("This deletes:"));
  console.log(chalk.gray(`  VM ${config.instanceName} in ${config.projectId}/${config.zone}`));
  console.log(chalk.gray("  its Cloud Router and NAT"));
  if (!options.keepFirewall) {
    console.log(chalk.gray(`  firewall rules for ${config.firewallRuleName}`));
  }
  if (options.deleteSecrets && config.secretNames.length > 0) {
    console.log(chalk.gray(`  secrets ${config.secretNames.join(", ")}`));
  }
  console.log();

  if (!options.yes) {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([{
      type: "confirm",
      name: "confirm",
      message: chalk.red(`Delete ${config.instanceName}?`),
      default: false,
    }]);

    if (!confirm) {
      console.log(chalk.yellow("\nDestroy cancelled."));
      return;
    }
  }

  spinner.start("Deleting resources...");
  try {
    const result = await deployer.destroy({
      keepFirewall: options.keepFirewall,
      keepSecrets: !options.deleteSecrets,
    });
    spinner.succeed("Resources deleted");

    for (const resource of result.deleted) {
      console.log(chalk.gray(`  - ${resource}`));
    }
    if (result.kept.length > 0) {
      console.log(chalk.white("Kept:"));
      for (const resource of result.kept) {
        console.log(chalk.gray(`  ${resource}`));
      }
    }
  } catch (error: unknown) {
    spinner.fail("Destroy failed");
    printError(error);
    process.exit(1);
  }
}
