/**
 * IAP VM Deployer
 *
 * Provisions a single Compute Engine VM that is reachable only through an
 * Identity-Aware Proxy TCP tunnel, and runs a gateway process whose
 * environment is loaded from Secret Manager at every start.
 *
 *   Operator → IAP (35.235.240.0/20) → Firewall (tcp:22, tag) → VM (no public IP)
 *   VM → Cloud NAT → apt / npm
 *
 * Every step checks for existing resources first, so re-running deploy()
 * converges an interrupted or partially deleted deployment.
 */

import {
  ALREADY_PROVISIONED_MARKER,
  DENY_RULE_PRIORITY,
  HEALTH_CHECK_POLL_INTERVAL_MS,
  HEALTH_CHECK_TIMEOUT_MS,
  IAP_TCP_FORWARDING_CIDR,
  IAP_TUNNEL_ROLE,
  OPERATOR_ROLES,
  PIPELINE_STEPS,
  PROVISIONING_COMPLETE_MARKER,
  PUBLIC_CIDR,
  ProgressTracker,
  ProvisionError,
  ProvisionErrorType,
  REQUIRED_APIS,
  REQUIRED_PERMISSIONS,
  SECRET_ACCESSOR_ROLE,
  buildStartupScript,
  deriveRegion,
  deriveResourceNames,
  managedLabels,
  toProvisionError,
  waitForState,
} from "@tunnelgate/core";
import type { DeployConfig, PipelineStep, ProgressCallback, ResourceNames } from "@tunnelgate/core";
import { GceManagerFactory } from "../gce-manager-factory";
import type { GceManagers } from "../gce-manager-factory";
import type {
  DeployResult,
  DeploymentStatus,
  DestroyOptions,
  DestroyResult,
  GceLogCallback,
  HealthState,
} from "../types";

export interface HealthCheckOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export interface IapVmDeployerOptions {
  config: DeployConfig;
  /** Injected managers; built from the config when omitted */
  managers?: GceManagers;
  /** Operator account (e.g. from `gcloud config get-value account`) granted IAP access */
  account?: string;
  log?: GceLogCallback;
  onProgress?: ProgressCallback;
  healthCheck?: HealthCheckOptions;
}

interface StepOutcome {
  status: "complete" | "skipped";
  message: string;
  /** True when the step created or changed a resource */
  created: boolean;
}

/**
 * IAM member string for an account: service accounts need the
 * "serviceAccount:" prefix, everyone else is a "user:".
 */
export function iamMember(account: string): string {
  return account.endsWith(".gserviceaccount.com")
    ? `serviceAccount:${account}`
    : `user:${account}`;
}

export class IapVmDeployer {
  private readonly config: DeployConfig;
  private readonly managers: GceManagers;
  private readonly names: ResourceNames;
  private readonly region: string;
  private readonly account?: string;
  private readonly log: GceLogCallback;
  private readonly onProgress?: ProgressCallback;
  private readonly healthCheck: Required<HealthCheckOptions>;

  constructor(options: IapVmDeployerOptions) {
    this.config = options.config;
    this.region = deriveRegion(options.config.zone);
    this.names = deriveResourceNames(options.config);
    this.account = options.account;
    this.log = options.log ?? (() => {});
    this.onProgress = options.onProgress;
    this.healthCheck = {
      timeoutMs: options.healthCheck?.timeoutMs ?? HEALTH_CHECK_TIMEOUT_MS,
      pollIntervalMs: options.healthCheck?.pollIntervalMs ?? HEALTH_CHECK_POLL_INTERVAL_MS,
    };

    this.managers =
      options.managers ??
      GceManagerFactory.createManagers({
        projectId: this.config.projectId,
        zone: this.config.zone,
        region: this.region,
        keyFilePath: this.config.keyFilePath,
        log: this.log,
      });
  }

  // ── Deploy ────────────────────────────────────────────────────────────

  async deploy(): Promise<DeployResult> {
    const { projectId, zone, instanceName } = this.config;
    const tracker = new ProgressTracker(PIPELINE_STEPS, this.onProgress);
    const result: DeployResult = {
      success: false,
      instanceName,
      zone,
      projectId,
      created: {},
      warnings: [],
      sshCommand: this.sshCommand(),
    };

    const steps: Array<[PipelineStep, string, () => Promise<StepOutcome>]> = [
      ["check_permissions", "Checking IAM permissions", () => this.checkPermissions()],
      ["enable_apis", "Enabling required APIs", () => this.enableApis()],
      ["setup_secrets", "Setting up Secret Manager secrets", () => this.setupSecrets()],
      ["firewall_allow", `Allowing SSH from IAP (${this.names.allowRule})`, () => this.allowIapSsh()],
      ["firewall_deny", `Denying public SSH (${this.names.denyRule})`, () => this.denyPublicSsh()],
      ["nat", `Ensuring Cloud NAT in ${this.region}`, () => this.ensureNat()],
      ["create_vm", `Creating VM instance ${instanceName}`, () => this.createVm(result.warnings)],
      ["grant_iap", "Granting IAP tunnel access", () => this.grantIap(result.warnings)],
      ["health_check", "Waiting for the VM", () => this.checkHealth(result)],
    ];

    this.log(`Deploying ${instanceName} to ${projectId} (${zone})`, "stdout");

    let current: PipelineStep = "check_permissions";
    try {
      for (const [index, [step, description, run]] of steps.entries()) {
        current = step;
        this.log(`[${index + 1}/${steps.length}] ${description}`, "stdout");
        tracker.start(step, description);

        const outcome = await run();
        result.created[step] = outcome.created;
        if (outcome.status === "skipped") {
          tracker.skip(step, outcome.message);
        } else {
          tracker.complete(step, outcome.message);
        }
      }

      result.success = true;
      this.log("Deployment complete", "stdout");
    } catch (error: unknown) {
      const provisionError = toProvisionError(error, projectId);
      tracker.error(current, provisionError.message);
      this.log(`Deployment failed at ${current}: ${provisionError.message}`, "stderr");
      result.error = provisionError;
    }

    return result;
  }

  private async checkPermissions(): Promise<StepOutcome> {
    const missing = await this.managers.iamManager.testPermissions(REQUIRED_PERMISSIONS);
    if (missing.length === 0) {
      return { status: "complete", message: "All required permissions granted", created: false };
    }

    for (const permission of missing) {
      this.log(`  missing: ${permission}`, "stderr");
    }

    const member = this.account ? iamMember(this.account) : "user:YOU@example.com";
    throw new ProvisionError(
      `Missing ${missing.length} required permission(s): ${missing.join(", ")}`,
      ProvisionErrorType.PERMISSION_DENIED,
      undefined,
      OPERATOR_ROLES.map(
        (role) =>
          `gcloud projects add-iam-policy-binding ${this.config.projectId} --member="${member}" --role="${role}"`
      )
    );
  }

  private async enableApis(): Promise<StepOutcome> {
    const enabled = await this.managers.serviceManager.enableServices(REQUIRED_APIS);
    return {
      status: "complete",
      message: enabled.length > 0 ? `Enabled ${enabled.join(", ")}` : "APIs already enabled",
      created: enabled.length > 0,
    };
  }

  private async setupSecrets(): Promise<StepOutcome> {
    const names = this.config.secretNames;
    if (names.length === 0) {
      return { status: "skipped", message: "No secret names configured", created: false };
    }

    const created: string[] = [];
    for (const name of names) {
      if (await this.managers.secretManager.ensurePlaceholder(name)) {
        created.push(name);
      } else {
        this.log(`  Secret ${name} already exists`, "stdout");
      }
    }

    return {
      status: "complete",
      message: `${created.length} created, ${names.length - created.length} existing`,
      created: created.length > 0,
    };
  }

  private async allowIapSsh(): Promise<StepOutcome> {
    const outcome = await this.managers.networkManager.ensureFirewall({
      name: this.names.allowRule,
      network: this.config.network,
      action: "allow",
      protocol: "tcp",
      ports: ["22"],
      sourceRanges: [IAP_TCP_FORWARDING_CIDR],
      targetTags: [this.config.networkTag],
      description: "Allow SSH from IAP TCP forwarding",
      updateExisting: true,
    });
    return { status: "complete", message: `Firewall rule ${outcome}`, created: outcome !== "unchanged" };
  }

  private async denyPublicSsh(): Promise<StepOutcome> {
    const outcome = await this.managers.networkManager.ensureFirewall({
      name: this.names.denyRule,
      network: this.config.network,
      action: "deny",
      protocol: "tcp",
      ports: ["22"],
      sourceRanges: [PUBLIC_CIDR],
      targetTags: [this.config.networkTag],
      priority: DENY_RULE_PRIORITY,
      description: "Deny SSH from anywhere else",
    });
    if (outcome === "unchanged") {
      return { status: "skipped", message: "Deny rule already exists", created: false };
    }
    return { status: "complete", message: "Deny rule created", created: true };
  }

  private async ensureNat(): Promise<StepOutcome> {
    if (!this.config.enableNat) {
      return {
        status: "skipped",
        message: "Cloud NAT disabled; the VM has no outbound access for apt or npm",
        created: false,
      };
    }

    const created = await this.managers.networkManager.ensureNat(
      this.names.router,
      this.names.nat,
      this.config.network
    );
    return created
      ? { status: "complete", message: `Cloud NAT ${this.names.nat} created`, created: true }
      : { status: "skipped", message: "Cloud NAT already exists", created: false };
  }

  private async createVm(warnings: string[]): Promise<StepOutcome> {
    const { computeManager, iamManager } = this.managers;
    const name = this.config.instanceName;

    const existing = await computeManager.getInstance(name);
    if (existing?.hasExternalIp) {
      warnings.push(`Instance ${name} has an external IP address; remove its access config to keep it IAP-only`);
    }

    if (!existing) {
      await computeManager.createInstance({
        name,
        machineType: this.config.machineType,
        imageFamily: this.config.imageFamily,
        imageProject: this.config.imageProject,
        network: this.config.network,
        networkTags: [this.config.networkTag],
        startupScript: buildStartupScript({ gateway: this.config.gateway }),
        labels: managedLabels(name),
      });
    }

    // The VM reads secrets with its own identity at boot
    const email = await computeManager.getServiceAccountEmail(name);
    if (email) {
      await iamManager.addProjectBinding(`serviceAccount:${email}`, SECRET_ACCESSOR_ROLE);
    } else {
      warnings.push(`Could not determine the service account of ${name}; grant it ${SECRET_ACCESSOR_ROLE} manually`);
    }

    return existing
      ? { status: "skipped", message: "Instance already exists", created: false }
      : { status: "complete", message: "Instance created", created: true };
  }

  private async grantIap(warnings: string[]): Promise<StepOutcome> {
    if (!this.account) {
      warnings.push(`Could not detect the current account; grant IAP access manually:\n  ${this.iapGrantCommand()}`);
      return { status: "skipped", message: "No account detected", created: false };
    }

    const member = iamMember(this.account);
    try {
      const granted = await this.managers.iamManager.addProjectBinding(member, IAP_TUNNEL_ROLE);
      return {
        status: "complete",
        message: granted ? `IAP access granted to ${this.account}` : `${this.account} already has IAP access`,
        created: granted,
      };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      warnings.push(`Could not grant IAP access (${message}); run:\n  ${this.iapGrantCommand(member)}`);
      return { status: "skipped", message: "IAP grant failed", created: false };
    }
  }

  private async checkHealth(result: DeployResult): Promise<StepOutcome> {
    const { computeManager } = this.managers;
    const name = this.config.instanceName;

    try {
      await waitForState(
        () => computeManager.getInstanceStatus(name),
        (status) => status === "RUNNING",
        {
          timeoutMs: this.healthCheck.timeoutMs,
          pollIntervalMs: this.healthCheck.pollIntervalMs,
          timeoutMessage: `Instance ${name} not RUNNING after ${Math.round(this.healthCheck.timeoutMs / 1000)}s`,
        }
      );
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      result.health = "unreachable";
      result.warnings.push(message);
      return { status: "complete", message, created: false };
    }

    result.health = await this.readProvisioningState(name);
    return {
      status: "complete",
      message:
        result.health === "healthy"
          ? "Instance RUNNING and provisioned"
          : "Instance RUNNING; startup script still provisioning",
      created: false,
    };
  }

  private async readProvisioningState(name: string): Promise<HealthState> {
    try {
      const output = await this.managers.computeManager.getSerialOutput(name);
      if (output.includes(PROVISIONING_COMPLETE_MARKER) || output.includes(ALREADY_PROVISIONED_MARKER)) {
        return "healthy";
      }
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.log(`  Could not read serial output: ${message}`, "stderr");
    }
    return "provisioning";
  }

  private iapGrantCommand(member = "user:YOU@example.com"): string {
    return (
      `gcloud projects add-iam-policy-binding ${this.config.projectId} ` +
      `--member='${member}' --role='${IAP_TUNNEL_ROLE}'`
    );
  }

  // ── Other operations ──────────────────────────────────────────────────

  async status(): Promise<DeploymentStatus> {
    const { computeManager, networkManager, serviceManager } = this.managers;

    const [instance, allowRule, denyRule, nat, enabled] = await Promise.all([
      computeManager.getInstance(this.config.instanceName),
      networkManager.firewallExists(this.names.allowRule),
      networkManager.firewallExists(this.names.denyRule),
      networkManager.natExists(this.names.router, this.names.nat),
      serviceManager.listEnabled(),
    ]);

    return {
      projectId: this.config.projectId,
      zone: this.config.zone,
      instanceName: this.config.instanceName,
      instance,
      firewall: { allowRule, denyRule },
      nat,
      apis: Object.fromEntries(REQUIRED_APIS.map((api) => [api, enabled.includes(api)])),
    };
  }

  async start(): Promise<void> {
    this.log(`Starting VM: ${this.config.instanceName}`, "stdout");
    await this.managers.computeManager.startInstance(this.config.instanceName);
  }

  async stop(): Promise<void> {
    this.log(`Stopping VM: ${this.config.instanceName}`, "stdout");
    await this.managers.computeManager.stopInstance(this.config.instanceName);
  }

  async destroy(options: DestroyOptions = {}): Promise<DestroyResult> {
    const { keepFirewall = false, keepSecrets = true } = options;
    const { computeManager, networkManager, secretManager } = this.managers;
    const result: DestroyResult = { deleted: [], kept: [] };

    this.log(`Destroying resources for: ${this.config.instanceName}`, "stdout");

    await computeManager.deleteInstance(this.config.instanceName);
    result.deleted.push(`instance/${this.config.instanceName}`);

    await networkManager.deleteRouter(this.names.router);
    result.deleted.push(`router/${this.names.router}`);

    for (const rule of [this.names.allowRule, this.names.denyRule]) {
      if (keepFirewall) {
        result.kept.push(`firewall/${rule}`);
      } else {
        await networkManager.deleteFirewall(rule);
        result.deleted.push(`firewall/${rule}`);
      }
    }

    for (const name of this.config.secretNames) {
      if (keepSecrets) {
        result.kept.push(`secret/${name}`);
      } else {
        await secretManager.deleteSecret(name);
        result.deleted.push(`secret/${name}`);
      }
    }

    this.log("Resources destroyed", "stdout");
    return result;
  }

  sshCommand(): string {
    const { instanceName, projectId, zone } = this.config;
    return `gcloud compute ssh ${instanceName} --project=${projectId} --zone=${zone} --tunnel-through-iap`;
  }

  /** Cloud Logging console link for the instance */
  logsLink(): string {
    return this.managers.loggingManager.getConsoleLink(this.config.instanceName);
  }

  async startupLogs(lines?: number): Promise<string[]> {
    return this.managers.loggingManager.getStartupLogs(this.config.instanceName, { lines });
  }
}
