import inquirer from "inquirer";
import chalk from "chalk";
import ora from "ora";
import type { DeployResult } from "@tunnelgate/gcp";
import { createDeployer } from "./context";
import type { ConfigOptions } from "./context";
import { createLogCallback, createProgressRenderer, printError } from "../utils/output";

export interface DeployOptions extends ConfigOptions {
  yes?: boolean;
}

export async function deploy(options: DeployOptions): Promise<void> {
  console.log(chalk.blue.bold("🚀 tunnelgate deploy"));
  console.log(chalk.gray("IAP-only VM with a Secret Manager backed gateway\n"));

  const spinner = ora();
  let context: ReturnType<typeof createDeployer>;
  try {
    context = createDeployer(options, {
      log: createLogCallback(spinner),
      onProgress: createProgressRenderer(spinner),
    });
  } catch (error: unknown) {
    printError(error, "Invalid configuration");
    process.exit(1);
  }

  const { config, region, deployer } = context;

  console.log(chalk.white("Configuration:"));
  console.log(chalk.gray(`  Project:  ${config.projectId}`));
  console.log(chalk.gray(`  Zone:     ${config.zone} (region ${region})`));
  console.log(chalk.gray(`  Instance: ${config.instanceName} (${config.machineType})`));
  console.log(chalk.gray(`  Image:    ${config.imageProject}/${config.imageFamily}`));
  console.log(chalk.gray(`  Network:  ${config.network}${config.enableNat ? " + Cloud NAT" : ""}`));
  console.log(chalk.gray(`  Gateway:  ${config.gateway.packageName} on port ${config.gateway.port}`));
  if (config.secretNames.length > 0) {
    console.log(chalk.gray(`  Secrets:  ${config.secretNames.join(", ")}`));
  }
  console.log();

  if (!options.yes) {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([{
      type: "confirm",
      name: "confirm",
      message: chalk.yellow("This will create billable resources. Continue?"),
      default: false,
    }]);

    if (!confirm) {
      console.log(chalk.yellow("\nDeploy cancelled."));
      return;
    }
    console.log();
  }

  const result = await deployer.deploy();
  if (spinner.isSpinning) spinner.stop();

  printWarnings(result);

  if (!result.success) {
    printError(result.error, "Deployment failed");
    process.exit(1);
  }

  printSummary(result);
}

function printWarnings(result: DeployResult): void {
  if (result.warnings.length === 0) return;

  console.log();
  console.log(chalk.yellow("⚠ Warnings:"));
  for (const warning of result.warnings) {
    console.log(chalk.yellow(`  • ${warning}`));
  }
}

function printSummary(result: DeployResult): void {
  console.log();
  console.log(chalk.green.bold("✓ Deployment complete!"));
  console.log();

  if (result.health === "healthy") {
    console.log(chalk.green("The gateway is provisioned and running."));
  } else if (result.health === "provisioning") {
    console.log(chalk.yellow("The VM is running; the startup script is still installing the gateway."));
    console.log(chalk.gray("  Follow it with: ") + chalk.cyan("tunnelgate logs"));
  } else {
    console.log(chalk.yellow("The VM did not report RUNNING in time; check it with: ") + chalk.cyan("tunnelgate status"));
  }

  console.log();
  console.log(chalk.white("Connect through IAP:"));
  console.log(chalk.cyan(`  ${result.sshCommand}`));
  console.log();
  console.log(chalk.white("Next steps:"));
  console.log(chalk.gray("  1. Fill in secrets: ") + chalk.cyan("tunnelgate secrets set NAME"));
  console.log(chalk.gray("  2. Restart the VM to reload them: ") + chalk.cyan("tunnelgate stop && tunnelgate start"));
  console.log();
}
