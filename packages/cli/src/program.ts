import { Command } from "commander";
import { TUNNELGATE_VERSION } from "@tunnelgate/core";
import { addConfigOptions } from "./commands/context";
import { deploy } from "./commands/deploy";
import { status } from "./commands/status";
import { ssh } from "./commands/ssh";
import { destroy } from "./commands/destroy";
import { start, stop, logs } from "./commands/lifecycle";
import { listSecrets, seedSecrets, setSecret, verifySecrets } from "./commands/secrets";
import { startupScript } from "./commands/startup-script";
import { fetchSecrets } from "./commands/fetch-secrets";
import { doctor } from "./commands/doctor";

export function createProgram(): Command {
  // Set before any subcommand is added; subcommands copy it when created
  const program = new Command().exitOverride();

  program
    .name("tunnelgate")
    .description("Provision an IAP-only Compute Engine VM running a Secret Manager backed gateway")
    .version(TUNNELGATE_VERSION);

  // Provisioning
  addConfigOptions(
    program
      .command("deploy")
      .description("Create or converge the VM, firewall, NAT, secrets and IAM bindings")
      .option("-y, --yes", "Skip confirmation prompts")
  ).action(deploy);

  addConfigOptions(
    program
      .command("status")
      .description("Show the deployment state")
  ).action(status);

  addConfigOptions(
    program
      .command("ssh")
      .description("SSH into the VM through IAP")
      .option("--print", "Print the gcloud command instead of running it")
  ).action(ssh);

  addConfigOptions(
    program
      .command("destroy")
      .description("Delete the VM, NAT and firewall rules")
      .option("-y, --yes", "Skip confirmation prompts")
      .option("--keep-firewall", "Leave the firewall rules in place")
      .option("--delete-secrets", "Also delete the configured secrets")
  ).action(destroy);

  // VM lifecycle
  addConfigOptions(program.command("start").description("Start the VM")).action(start);
  addConfigOptions(program.command("stop").description("Stop the VM")).action(stop);
  addConfigOptions(
    program
      .command("logs")
      .description("Show the startup-script log")
      .option("--lines <n>", "Number of entries to show")
  ).action(logs);

  // Secrets
  const secrets = program
    .command("secrets")
    .description("Secret Manager commands");

  addConfigOptions(
    secrets
      .command("list")
      .description("List secrets and whether they hold a value")
  ).action(listSecrets);

  addConfigOptions(
    secrets
      .command("set <name>")
      .description("Store a new version of a secret (value from --value, --from-file or stdin)")
      .option("--value <value>", "Secret value (visible in shell history)")
      .option("--from-file <path>", "Read the value from a file")
  ).action(setSecret);

  addConfigOptions(
    secrets
      .command("seed <names...>")
      .description("Create placeholder secrets; existing secrets are left alone")
  ).action(seedSecrets);

  secrets
    .command("verify")
    .description("List the variables in the gateway's env file (on the VM)")
    .option("--file <path>", "Env file to read")
    .action(verifySecrets);

  // On-VM and inspection
  program
    .command("startup-script")
    .description("Print the boot script deploy installs")
    .option("--gateway-port <port>", "Gateway listen port")
    .action(startupScript);

  addConfigOptions(
    program
      .command("fetch-secrets")
      .description("Write all secrets to the gateway's env file (run on the VM)")
      .option("-o, --output <path>", "Env file to write")
      .option("--owner <user>", "Owner of the env file (name or uid:gid)")
  ).action(fetchSecrets);

  program
    .command("doctor")
    .description("Check local prerequisites")
    .action(doctor);

  return program;
}
