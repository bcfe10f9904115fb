import type { GatewayConfig } from "./config";
import { gatewayPaths } from "./gateway-paths";

export interface GatewayUnitOptions {
  gateway: GatewayConfig;
  /**
   * Absolute path of the gateway binary. The startup script passes
   * "$GATEWAY_BIN" and expands it when writing the unit.
   */
  binaryPath: string;
  description?: string;
}

/**
 * Render the systemd unit that supervises the gateway.
 *
 * ExecStartPre runs the secret fetch helper with full privileges ("+") before
 * every start, so restarts always see current secret values. The leading "-"
 * on EnvironmentFile lets the unit start when no secrets could be fetched.
 */
export function renderGatewayUnit(options: GatewayUnitOptions): string {
  const { gateway, binaryPath } = options;
  const paths = gatewayPaths(gateway);
  const args = ["gateway", "--port", String(gateway.port), ...gateway.extraArgs].join(" ");

  return `[Unit]
Description=${options.description ?? `${gateway.packageName} gateway`}
After=network-online.target
Wants=network-online.target

[Service]
Type=simple
User=${gateway.serviceUser}
Group=${gateway.serviceUser}
WorkingDirectory=${paths.homeDir}

# Fetch fresh secrets from Secret Manager before each start
ExecStartPre=+${paths.fetchHelper}

# Secrets live on tmpfs only
EnvironmentFile=-${paths.envFile}

ExecStart=${binaryPath} ${args}
Restart=on-failure
RestartSec=5
Environment=NODE_ENV=production
Environment=${paths.stateDirEnvVar}=${paths.stateDir}

[Install]
WantedBy=multi-user.target
`;
}
