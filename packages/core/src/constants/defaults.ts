/**
 * Default values for deployments.
 */

// VM defaults
export const DEFAULT_INSTANCE_NAME = "iap-vps";
export const DEFAULT_ZONE = "us-central1-a";
export const DEFAULT_MACHINE_TYPE = "e2-micro";
export const DEFAULT_IMAGE_FAMILY = "debian-12";
export const DEFAULT_IMAGE_PROJECT = "debian-cloud";

// Network defaults
export const DEFAULT_NETWORK = "default";
export const DEFAULT_FIREWALL_RULE_NAME = "allow-iap-ssh";
export const DEFAULT_NETWORK_TAG = "iap-ssh";
export const DENY_RULE_PRIORITY = 2000;

// Gateway defaults
export const DEFAULT_GATEWAY_PACKAGE = "openclaw";
export const DEFAULT_GATEWAY_PORT = 18789;
export const DEFAULT_NODE_MAJOR = 22;
export const DEFAULT_GATEWAY_ARGS = ["--verbose"];

/**
 * Value written into a freshly seeded secret. The boot-time fetch skips any
 * secret whose latest version still holds it.
 */
export const PLACEHOLDER_SECRET_VALUE = "__PLACEHOLDER__";
