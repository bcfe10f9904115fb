import chalk from "chalk";
import ora from "ora";
import {
  findApplicationDefaultCredentials,
  gcloudVersion,
  detectAccount,
  detectProject,
} from "../utils/gcloud";

export interface CheckResult {
  name: string;
  status: "pass" | "fail" | "warn";
  message: string;
  fix?: string;
}

/** What the checks look at; swapped out in tests */
export interface DoctorProbe {
  nodeVersion: string;
  gcloudVersion(): string | undefined;
  account(): string | undefined;
  project(): string | undefined;
  adcFile(): string | undefined;
  env: NodeJS.ProcessEnv;
}

const defaultProbe: DoctorProbe = {
  nodeVersion: process.version,
  gcloudVersion,
  account: detectAccount,
  project: detectProject,
  adcFile: () => findApplicationDefaultCredentials(),
  env: process.env,
};

export function runChecks(probe: DoctorProbe = defaultProbe): CheckResult[] {
  const checks: CheckResult[] = [];

  // Node.js version
  const major = Number.parseInt(probe.nodeVersion.slice(1).split(".")[0], 10);
  checks.push(
    major >= 20
      ? { name: "Node.js version", status: "pass", message: probe.nodeVersion }
      : {
          name: "Node.js version",
          status: "fail",
          message: `${probe.nodeVersion} (requires 20+)`,
          fix: "Upgrade Node.js to version 20 or higher",
        }
  );

  // gcloud CLI
  const version = probe.gcloudVersion();
  if (!version) {
    checks.push({
      name: "gcloud CLI",
      status: "fail",
      message: "Not installed or not in PATH",
      fix: "Install the Google Cloud CLI from https://cloud.google.com/sdk/docs/install",
    });
  } else {
    checks.push({ name: "gcloud CLI", status: "pass", message: version });

    const account = probe.account();
    checks.push(
      account
        ? { name: "Active account", status: "pass", message: account }
        : { name: "Active account", status: "fail", message: "No account logged in", fix: "gcloud auth login" }
    );
  }

  // Project
  const project = probe.env.PROJECT_ID || probe.env.GOOGLE_CLOUD_PROJECT || probe.project();
  checks.push(
    project
      ? { name: "Default project", status: "pass", message: project }
      : {
          name: "Default project",
          status: "warn",
          message: "Not set; pass --project to every command",
          fix: "gcloud config set project PROJECT_ID",
        }
  );

  // Client library credentials
  const adc = probe.adcFile();
  checks.push(
    adc
      ? { name: "Application Default Credentials", status: "pass", message: adc }
      : {
          name: "Application Default Credentials",
          status: "fail",
          message: "Not found; the client libraries cannot authenticate",
          fix: "gcloud auth application-default login",
        }
  );

  return checks;
}

export async function doctor(): Promise<void> {
  console.log(chalk.blue.bold("🔧 tunnelgate doctor\n"));

  const spinner = ora("Running diagnostics...").start();
  const checks = runChecks();
  spinner.stop();

  for (const check of checks) {
    const icon = check.status === "pass" ? chalk.green("✓") :
                 check.status === "fail" ? chalk.red("✗") :
                 chalk.yellow("⚠");
    const color = check.status === "pass" ? chalk.green :
                  check.status === "fail" ? chalk.red :
                  chalk.yellow;

    console.log(`${icon} ${check.name}: ${color(check.message)}`);
    if (check.fix && check.status !== "pass") {
      console.log(chalk.gray(`   Fix: ${check.fix}`));
    }
  }

  console.log();
  const failCount = checks.filter((c) => c.status === "fail").length;
  const warnCount = checks.filter((c) => c.status === "warn").length;

  if (failCount === 0 && warnCount === 0) {
    console.log(chalk.green.bold("✓ All checks passed!"));
  } else if (failCount > 0) {
    console.log(chalk.red("Please fix the failed checks before deploying."));
    process.exit(1);
  } else {
    console.log(chalk.yellow(`${warnCount} warning(s)`));
  }
}
