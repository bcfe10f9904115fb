export * from "./constants";
export * from "./errors";
export * from "./retry";
export * from "./config";
export * from "./env-file";
export * from "./gateway-paths";
export * from "./systemd-unit";
export * from "./startup-script-builder";
export * from "./progress";

export const TUNNELGATE_VERSION = "0.1.0";
