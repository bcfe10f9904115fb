/**
 * GCE Type Definitions
 *
 * Shared types for the IAP VM deployer and its managers.
 */

import type { PipelineStep, ProvisionError } from "@tunnelgate/core";

/**
 * Type alias for log callback function.
 */
export type GceLogCallback = (message: string, stream: "stdout" | "stderr") => void;

/**
 * Ingress firewall rule definition. Exactly one of allow/deny semantics
 * applies to the whole rule.
 */
export interface FirewallSpec {
  /** Firewall rule name */
  name: string;
  /** VPC network name */
  network: string;
  action: "allow" | "deny";
  /** IP protocol (tcp, udp, icmp, ...) */
  protocol: string;
  /** Ports the rule covers */
  ports: string[];
  /** Source IP ranges in CIDR notation */
  sourceRanges: string[];
  /** Target network tags */
  targetTags: string[];
  /** Lower numbers win; GCE default is 1000 */
  priority?: number;
  description?: string;
  /** Patch ports and source ranges when the rule already exists */
  updateExisting?: boolean;
}

export type FirewallOutcome = "created" | "updated" | "unchanged";

/**
 * VM instance configuration.
 */
export interface InstanceSpec {
  name: string;
  /** Machine type (e.g., "e2-micro") */
  machineType: string;
  imageFamily: string;
  imageProject: string;
  network: string;
  /** Network tags for firewall rules */
  networkTags: string[];
  /** Bash run from the startup-script metadata key on every boot */
  startupScript: string;
  labels: Record<string, string>;
  /** Service account scopes */
  scopes?: string[];
}

/**
 * VM status values.
 */
export type VmStatus =
  | "RUNNING"
  | "STOPPED"
  | "STOPPING"
  | "TERMINATED"
  | "STAGING"
  | "PROVISIONING"
  | "SUSPENDING"
  | "SUSPENDED"
  | "REPAIRING"
  | "UNKNOWN";

/**
 * The parts of an instance the deployer looks at.
 */
export interface InstanceInfo {
  name: string;
  status: VmStatus;
  networkTags: string[];
  /** True when any network interface carries an access config (public IP) */
  hasExternalIp: boolean;
  serviceAccountEmail?: string;
  labels: Record<string, string>;
}

export type HealthState = "healthy" | "provisioning" | "unreachable";

/**
 * Outcome of a full deploy() run.
 */
export interface DeployResult {
  success: boolean;
  instanceName: string;
  zone: string;
  projectId: string;
  /** Whether each step created (or changed) a resource */
  created: Partial<Record<PipelineStep, boolean>>;
  warnings: string[];
  health?: HealthState;
  sshCommand: string;
  error?: ProvisionError;
}

export interface DeploymentStatus {
  projectId: string;
  zone: string;
  instanceName: string;
  /** Undefined when the instance does not exist */
  instance?: InstanceInfo;
  firewall: {
    allowRule: boolean;
    denyRule: boolean;
  };
  nat: boolean;
  apis: Record<string, boolean>;
}

export interface DestroyOptions {
  /** Leave both firewall rules in place */
  keepFirewall?: boolean;
  /** Leave secrets in place (default: true) */
  keepSecrets?: boolean;
}

export interface DestroyResult {
  deleted: string[];
  kept: string[];
}
