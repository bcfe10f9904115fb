import type { GatewayConfig } from "./config";

/**
 * Paths and names on the VM derived from the gateway package name.
 * Secrets only ever land under runtimeDir, which lives on the /run tmpfs.
 */
export interface GatewayPaths {
  homeDir: string;
  stateDir: string;
  runtimeDir: string;
  envFile: string;
  credentialsTmpfs: string;
  sentinelFile: string;
  fetchHelper: string;
  unitName: string;
  logTag: string;
  stateDirEnvVar: string;
}

export function gatewayPaths(gateway: Pick<GatewayConfig, "packageName" | "serviceUser">): GatewayPaths {
  const pkg = gateway.packageName;
  const homeDir = `/home/${gateway.serviceUser}`;
  const runtimeDir = `/run/${pkg}`;

  return {
    homeDir,
    stateDir: `${homeDir}/.${pkg}`,
    runtimeDir,
    envFile: `${runtimeDir}/env`,
    credentialsTmpfs: `${runtimeDir}/credentials`,
    sentinelFile: `/var/lib/${pkg}/.provisioned`,
    fetchHelper: `/usr/local/bin/fetch-${pkg}-secrets`,
    unitName: `${pkg}-gateway.service`,
    logTag: `${pkg}-startup`,
    stateDirEnvVar: `${pkg.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_STATE_DIR`,
  };
}
