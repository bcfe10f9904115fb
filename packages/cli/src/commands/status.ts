import chalk from "chalk";
import ora from "ora";
import type { DeploymentStatus } from "@tunnelgate/gcp";
import { createDeployer } from "./context";
import type { ConfigOptions } from "./context";
import { printError, statusIcon } from "../utils/output";

export async function status(options: ConfigOptions): Promise<void> {
  console.log(chalk.blue.bold("📊 tunnelgate status\n"));

  const spinner = ora("Reading deployment state...").start();
  let state: DeploymentStatus;
  try {
    const { deployer } = createDeployer(options);
    state = await deployer.status();
    spinner.stop();
  } catch (error: unknown) {
    spinner.fail("Could not read deployment state");
    printError(error);
    process.exit(1);
  }

  printStatus(state);
}

export function printStatus(state: DeploymentStatus): void {
  console.log(chalk.white(`Project: ${chalk.cyan(state.projectId)}`));
  console.log(chalk.white(`Zone:    ${chalk.cyan(state.zone)}`));
  console.log();

  console.log(chalk.white("Instance:"));
  const { instance } = state;
  if (!instance) {
    console.log(chalk.gray(`  ${state.instanceName} not found. Run 'tunnelgate deploy' first.`));
  } else {
    const statusColor = instance.status === "RUNNING" ? chalk.green :
                        instance.status === "TERMINATED" || instance.status === "STOPPED" ? chalk.gray :
                        chalk.yellow;
    console.log(`  ${chalk.cyan(instance.name)} ${statusColor(instance.status)}`);
    console.log(chalk.gray(`  Tags: ${instance.networkTags.join(", ") || "(none)"}`));
    console.log(
      `  ${statusIcon(!instance.hasExternalIp)} ` +
        (instance.hasExternalIp
          ? chalk.red("Has an external IP address")
          : chalk.gray("No external IP address"))
    );
    if (instance.serviceAccountEmail) {
      console.log(chalk.gray(`  Service account: ${instance.serviceAccountEmail}`));
    }
  }
  console.log();

  console.log(chalk.white("Network:"));
  console.log(`  ${statusIcon(state.firewall.allowRule)} ${chalk.gray("IAP SSH allow rule")}`);
  console.log(`  ${statusIcon(state.firewall.denyRule)} ${chalk.gray("Public SSH deny rule")}`);
  console.log(`  ${statusIcon(state.nat)} ${chalk.gray("Cloud NAT")}`);
  console.log();

  console.log(chalk.white("APIs:"));
  for (const [api, enabled] of Object.entries(state.apis)) {
    console.log(`  ${statusIcon(enabled)} ${chalk.gray(api)}`);
  }
  console.log();
}
