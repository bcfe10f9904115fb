/**
 * Shared command wiring: the configuration flags every deployment command
 * accepts, and the deployer built from them.
 */

import { Command } from "commander";
import { deriveRegion, resolveDeployConfig } from "@tunnelgate/core";
import type { DeployConfig, DeployFlags, ProgressCallback } from "@tunnelgate/core";
import { IapVmDeployer } from "@tunnelgate/gcp";
import type { GceLogCallback } from "@tunnelgate/gcp";
import { detectAccount, detectProject } from "../utils/gcloud";
import { createLogCallback } from "../utils/output";

export type ConfigOptions = DeployFlags;

export function addConfigOptions(command: Command): Command {
  return command
    .option("-p, --project <id>", "Google Cloud project ID (default: gcloud config)")
    .option("-z, --zone <zone>", "Compute Engine zone")
    .option("-n, --name <name>", "VM instance name")
    .option("--machine-type <type>", "Machine type")
    .option("--network <network>", "VPC network")
    .option("--image-family <family>", "Boot image family")
    .option("--image-project <project>", "Boot image project")
    .option("--firewall-rule <name>", "Name of the IAP SSH allow rule")
    .option("--no-nat", "Do not create Cloud NAT (the VM gets no outbound access)")
    .option("--secret <names...>", "Secret Manager secret names to seed")
    .option("--gateway-port <port>", "Gateway listen port")
    .option("--key-file <path>", "Service account key file (default: ADC)");
}

export function loadConfig(options: ConfigOptions): DeployConfig {
  return resolveDeployConfig(options, process.env, detectProject);
}

export interface DeployerContext {
  config: DeployConfig;
  region: string;
  deployer: IapVmDeployer;
}

export function createDeployer(
  options: ConfigOptions,
  hooks: { log?: GceLogCallback; onProgress?: ProgressCallback } = {}
): DeployerContext {
  const config = loadConfig(options);
  const deployer = new IapVmDeployer({
    config,
    account: detectAccount(),
    log: hooks.log ?? createLogCallback(),
    onProgress: hooks.onProgress,
  });
  return { config, region: deriveRegion(config.zone), deployer };
}
