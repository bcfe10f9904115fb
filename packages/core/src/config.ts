import { z } from "zod";
import {
  DEFAULT_FIREWALL_RULE_NAME,
  DEFAULT_GATEWAY_ARGS,
  DEFAULT_GATEWAY_PACKAGE,
  DEFAULT_GATEWAY_PORT,
  DEFAULT_IMAGE_FAMILY,
  DEFAULT_IMAGE_PROJECT,
  DEFAULT_INSTANCE_NAME,
  DEFAULT_MACHINE_TYPE,
  DEFAULT_NETWORK,
  DEFAULT_NETWORK_TAG,
  DEFAULT_NODE_MAJOR,
  DEFAULT_ZONE,
} from "./constants";
import { ProvisionError, ProvisionErrorType } from "./errors";

const MAX_RESOURCE_NAME_LENGTH = 63;

/** RFC1035 name, as Compute Engine requires for instances, firewalls and networks */
const resourceNameSchema = z
  .string()
  .max(MAX_RESOURCE_NAME_LENGTH, "must be at most 63 characters")
  .regex(
    /^[a-z]([-a-z0-9]*[a-z0-9])?$/,
    "must start with a lowercase letter and contain only lowercase letters, digits and hyphens"
  );

export const SecretIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,255}$/, "must contain only letters, digits, underscores and hyphens");

export const GatewayConfigSchema = z.object({
  packageName: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, "must be an unscoped npm package name").default(DEFAULT_GATEWAY_PACKAGE),
  binaryName: z.string().regex(/^[A-Za-z0-9._-]+$/).default(DEFAULT_GATEWAY_PACKAGE),
  serviceUser: z.string().regex(/^[a-z_][a-z0-9_-]{0,31}$/, "must be a valid Linux user name").default(DEFAULT_GATEWAY_PACKAGE),
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_GATEWAY_PORT),
  nodeMajor: z.coerce.number().int().min(18).default(DEFAULT_NODE_MAJOR),
  extraArgs: z.array(z.string()).default(DEFAULT_GATEWAY_ARGS),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export const DeployConfigSchema = z.object({
  projectId: z
    .string()
    .regex(/^[a-z][a-z0-9-]{4,28}[a-z0-9]$/, "must be a valid Google Cloud project ID"),
  zone: z.string().regex(/^[a-z]+-[a-z]+[0-9]+-[a-z]$/, "must look like us-central1-a").default(DEFAULT_ZONE),
  instanceName: resourceNameSchema.default(DEFAULT_INSTANCE_NAME),
  machineType: z.string().regex(/^[a-z0-9-]+$/).default(DEFAULT_MACHINE_TYPE),
  imageFamily: z.string().min(1).default(DEFAULT_IMAGE_FAMILY),
  imageProject: z.string().min(1).default(DEFAULT_IMAGE_PROJECT),
  network: resourceNameSchema.default(DEFAULT_NETWORK),
  firewallRuleName: resourceNameSchema.default(DEFAULT_FIREWALL_RULE_NAME),
  networkTag: resourceNameSchema.default(DEFAULT_NETWORK_TAG),
  enableNat: z.boolean().default(true),
  secretNames: z.array(SecretIdSchema).default([]),
  keyFilePath: z.string().min(1).optional(),
  gateway: GatewayConfigSchema.default({}),
});

export type DeployConfig = z.infer<typeof DeployConfigSchema>;

/**
 * Flags as the CLI hands them over. Every field is optional; missing values
 * fall back to the environment and then to defaults.
 */
export interface DeployFlags {
  project?: string;
  zone?: string;
  name?: string;
  machineType?: string;
  network?: string;
  imageFamily?: string;
  imageProject?: string;
  firewallRule?: string;
  /** commander sets this to false for --no-nat */
  nat?: boolean;
  secret?: string[];
  gatewayPort?: string | number;
  keyFile?: string;
}

export type EnvSource = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  const normalized = nonEmpty(value)?.toLowerCase();
  if (normalized === undefined) return undefined;
  return !["false", "0", "no", "off"].includes(normalized);
}

function parseList(value: string | undefined): string[] | undefined {
  const items = value
    ?.split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return items && items.length > 0 ? items : undefined;
}

/**
 * Resolve the deployment configuration. Precedence: flag, then environment
 * variable, then default. The project falls back to `detectProject` (the
 * gcloud default project) only when neither a flag nor the environment set it.
 */
export function resolveDeployConfig(
  flags: DeployFlags,
  env: EnvSource = process.env,
  detectProject: () => string | undefined = () => undefined
): DeployConfig {
  const projectId =
    nonEmpty(flags.project) ??
    nonEmpty(env.PROJECT_ID) ??
    nonEmpty(env.GOOGLE_CLOUD_PROJECT) ??
    nonEmpty(detectProject());

  if (!projectId) {
    throw new ProvisionError(
      "No project set",
      ProvisionErrorType.CONFIGURATION,
      undefined,
      ["gcloud config set project PROJECT_ID", "or pass --project PROJECT_ID"]
    );
  }

  const secretNames = flags.secret && flags.secret.length > 0
    ? flags.secret
    : parseList(env.SECRET_NAMES);

  const raw = {
    projectId,
    zone: nonEmpty(flags.zone) ?? nonEmpty(env.ZONE),
    instanceName: nonEmpty(flags.name) ?? nonEmpty(env.INSTANCE_NAME),
    machineType: nonEmpty(flags.machineType) ?? nonEmpty(env.MACHINE_TYPE),
    imageFamily: nonEmpty(flags.imageFamily) ?? nonEmpty(env.IMAGE_FAMILY),
    imageProject: nonEmpty(flags.imageProject) ?? nonEmpty(env.IMAGE_PROJECT),
    network: nonEmpty(flags.network) ?? nonEmpty(env.NETWORK),
    firewallRuleName: nonEmpty(flags.firewallRule) ?? nonEmpty(env.FIREWALL_RULE_NAME),
    enableNat: flags.nat === false ? false : parseBoolean(env.ENABLE_NAT),
    secretNames: secretNames ? [...new Set(secretNames)] : undefined,
    keyFilePath: nonEmpty(flags.keyFile) ?? nonEmpty(env.GOOGLE_APPLICATION_CREDENTIALS),
    gateway: flags.gatewayPort !== undefined ? { port: flags.gatewayPort } : undefined,
  };

  return parseDeployConfig(raw);
}

/**
 * Validate a raw configuration object, reporting every invalid field at once.
 */
export function parseDeployConfig(raw: unknown): DeployConfig {
  const result = DeployConfigSchema.safeParse(raw);
  if (result.success) return result.data;

  const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
  throw new ProvisionError(
    `Invalid configuration:\n  ${problems.join("\n  ")}`,
    ProvisionErrorType.CONFIGURATION
  );
}

/**
 * Strip the zone suffix: "us-central1-a" → "us-central1".
 */
export function deriveRegion(zone: string): string {
  const index = zone.lastIndexOf("-");
  return index > 0 ? zone.slice(0, index) : zone;
}

export interface ResourceNames {
  allowRule: string;
  denyRule: string;
  router: string;
  nat: string;
}

function withSuffix(base: string, suffix: string): string {
  const room = MAX_RESOURCE_NAME_LENGTH - suffix.length;
  return `${base.slice(0, room).replace(/-+$/, "")}${suffix}`;
}

export function deriveResourceNames(config: Pick<DeployConfig, "firewallRuleName" | "instanceName">): ResourceNames {
  return {
    allowRule: config.firewallRuleName,
    denyRule: withSuffix(config.firewallRuleName, "-deny-public"),
    router: withSuffix(config.instanceName, "-router"),
    nat: withSuffix(config.instanceName, "-nat"),
  };
}
