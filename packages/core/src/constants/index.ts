/**
 * Constants Module
 *
 * Re-exports timeouts, default values, Google Cloud identifiers and
 * resource labels.
 */

export * from "./timeouts";
export * from "./defaults";
export * from "./gcp";
export * from "./labels";
