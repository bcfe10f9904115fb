/**
 * Startup Script Builder
 *
 * Renders the bash that runs from the VM's `startup-script` metadata on every
 * boot. First boot installs Node.js, the gateway package, the secret fetch
 * helper and the systemd unit; later boots only refresh secrets, re-apply the
 * credential protections and make sure the service is running.
 */

import type { GatewayConfig } from "./config";
import { METADATA_URL, PLACEHOLDER_SECRET_VALUE, SECRET_MANAGER_URL } from "./constants";
import { gatewayPaths } from "./gateway-paths";
import { renderGatewayUnit } from "./systemd-unit";

/** Logged once first-boot provisioning finishes */
export const PROVISIONING_COMPLETE_MARKER = "provisioning complete";

/** Logged on every later boot */
export const ALREADY_PROVISIONED_MARKER = "Already provisioned";

export interface StartupScriptOptions {
  gateway: GatewayConfig;
  /** Value a seeded-but-unfilled secret holds (default: __PLACEHOLDER__) */
  placeholder?: string;
}

function logFunction(tag: string): string {
  return `log() { logger -t "${tag}" "$*" 2>/dev/null || true; echo "[${tag}] $*"; }`;
}

/**
 * The secret fetch helper. Enumerates every secret in the project and writes
 * NAME=VALUE lines to the tmpfs env file, replacing it atomically. It always
 * exits 0 so a fetch failure never blocks the gateway from starting.
 */
export function buildSecretFetchScript(options: StartupScriptOptions): string {
  const paths = gatewayPaths(options.gateway);
  const user = options.gateway.serviceUser;
  const placeholder = options.placeholder ?? PLACEHOLDER_SECRET_VALUE;

  return `#!/bin/bash
# Writes every Secret Manager secret in this project to ${paths.envFile}
# as NAME=VALUE lines. Runs as ExecStartPre before each gateway start.
# The project should be dedicated to this deployment: all secrets are loaded.
set -uo pipefail

SECRETS_ENV="${paths.envFile}"
METADATA_URL="${METADATA_URL}"
PLACEHOLDER="${placeholder}"
ENV_NAME_RE='^[A-Za-z_][A-Za-z0-9_]*$'
SAFE_VALUE_RE='^[A-Za-z0-9_./:@%+,=-]*$'

${logFunction(paths.logTag)}

mkdir -p "${paths.runtimeDir}"
chmod 700 "${paths.runtimeDir}"

PROJECT_ID="$(curl -sf -H "Metadata-Flavor: Google" "$METADATA_URL/project/project-id")" || {
  log "Could not reach metadata server, skipping secret fetch."
  exit 0
}

TOKEN="$(curl -sf -H "Metadata-Flavor: Google" \\
  "$METADATA_URL/instance/service-accounts/default/token" | jq -r '.access_token // empty')" || TOKEN=""
if [[ -z "$TOKEN" ]]; then
  log "No VM service account token, skipping secret fetch."
  exit 0
fi

SM_BASE="${SECRET_MANAGER_URL}/projects/$PROJECT_ID"

# List all secrets, following pagination
NAMES=""
PAGE_TOKEN=""
while :; do
  URL="$SM_BASE/secrets?pageSize=250"
  if [[ -n "$PAGE_TOKEN" ]]; then URL="$URL&pageToken=$PAGE_TOKEN"; fi
  PAGE="$(curl -sf -H "Authorization: Bearer $TOKEN" "$URL")" || {
    log "Could not list secrets (API disabled or missing permission)."
    exit 0
  }
  NAMES+="$(echo "$PAGE" | jq -r '.secrets[]?.name | sub("^projects/[^/]+/secrets/"; "")')"$'\\n'
  PAGE_TOKEN="$(echo "$PAGE" | jq -r '.nextPageToken // empty')"
  if [[ -z "$PAGE_TOKEN" ]]; then break; fi
done

TMP="$SECRETS_ENV.tmp"
(umask 077 && : > "$TMP")
COUNT=0

while IFS= read -r NAME; do
  [[ -z "$NAME" ]] && continue
  if [[ ! "$NAME" =~ $ENV_NAME_RE ]]; then
    log "  Skipping '$NAME' (not a valid variable name)."
    continue
  fi

  RESP="$(curl -sf -H "Authorization: Bearer $TOKEN" \\
    "$SM_BASE/secrets/$NAME/versions/latest:access")" || {
    log "  Skipping '$NAME' (no accessible version)."
    continue
  }

  VALUE="$(echo "$RESP" | jq -r '.payload.data // empty' | base64 -d)"
  TRIMMED="\${VALUE#"\${VALUE%%[![:space:]]*}"}"
  TRIMMED="\${TRIMMED%"\${TRIMMED##*[![:space:]]}"}"
  if [[ -z "$TRIMMED" || "$TRIMMED" == "$PLACEHOLDER" ]]; then
    log "  Skipping '$NAME' (placeholder or empty)."
    continue
  fi

  if [[ "$VALUE" =~ $SAFE_VALUE_RE ]]; then
    printf '%s=%s\\n' "$NAME" "$VALUE" >> "$TMP"
  else
    printf '%s="%s"\\n' "$NAME" "$(printf '%s' "$VALUE" | sed -e 's/[\\\\"\`$]/\\\\&/g')" >> "$TMP"
  fi
  COUNT=$((COUNT + 1))
done <<< "$NAMES"

# Atomic replace
mv "$TMP" "$SECRETS_ENV"
chown "${user}:${user}" "$SECRETS_ENV"
chmod 600 "$SECRETS_ENV"

log "Loaded $COUNT secret(s) from Secret Manager."
exit 0
`;
}

/**
 * Packages the fetch helper needs. Installed on every boot when missing;
 * without NAT the install fails and the fetch is skipped.
 */
export function buildBasePackagesSection(): string {
  return `# ─── Base packages ───────────────────────────────────────────────────────────
if ! command -v jq &>/dev/null || ! command -v curl &>/dev/null; then
  log "Installing base packages…"
  apt-get update -qq && apt-get install -y -qq ca-certificates curl gnupg jq git \\
    || log "Base package install failed (no outbound access?)."
fi`;
}

export function buildServiceUserSection(gateway: GatewayConfig): string {
  const user = gateway.serviceUser;
  return `# ─── Service user ────────────────────────────────────────────────────────────
if ! id "${user}" &>/dev/null; then
  useradd --system --create-home --shell /bin/bash "${user}"
fi`;
}

export function buildFetchHelperSection(options: StartupScriptOptions): string {
  const paths = gatewayPaths(options.gateway);
  return `# ─── Secret fetch helper (refreshed every boot, used by ExecStartPre) ────────
cat > ${paths.fetchHelper} <<'FETCHSCRIPT'
${buildSecretFetchScript(options).trimEnd()}
FETCHSCRIPT
chmod 755 ${paths.fetchHelper}
${paths.fetchHelper} || true`;
}

/**
 * Keep credential material off the persistent disk: the gateway's credentials
 * directory is a bind mount of a /run (tmpfs) directory, and its .env file is
 * a symlink to /dev/null.
 */
export function buildCredentialProtectionSection(gateway: GatewayConfig): string {
  const paths = gatewayPaths(gateway);
  const owner = `${gateway.serviceUser}:${gateway.serviceUser}`;

  return `# ─── Protect credential paths (tmpfs overlay) ───────────────────────────────
mkdir -p "${paths.credentialsTmpfs}"
chown ${owner} "${paths.credentialsTmpfs}"
chmod 700 "${paths.credentialsTmpfs}"

mkdir -p "${paths.stateDir}/credentials"
if ! mountpoint -q "${paths.stateDir}/credentials" 2>/dev/null; then
  mount --bind "${paths.credentialsTmpfs}" "${paths.stateDir}/credentials"
  log "Mounted tmpfs over ${paths.stateDir}/credentials"
fi

if [[ ! -L "${paths.stateDir}/.env" ]]; then
  rm -f "${paths.stateDir}/.env"
  ln -sf /dev/null "${paths.stateDir}/.env"
  log "Symlinked ${paths.stateDir}/.env → /dev/null"
fi

chown -R ${owner} "${paths.stateDir}"`;
}

export function buildNodeInstallSection(nodeMajor: number): string {
  return `# ─── Node.js ${nodeMajor} from NodeSource ───────────────────────────────────────────
if ! command -v node &>/dev/null || [ "$(node --version | cut -d. -f1 | tr -d v)" -lt ${nodeMajor} ]; then
  log "Installing Node.js ${nodeMajor}…"
  mkdir -p /etc/apt/keyrings
  curl -fsSL "https://deb.nodesource.com/gpgkey/nodesource-repo.gpg.key" \\
    | gpg --dearmor --yes -o /etc/apt/keyrings/nodesource.gpg
  echo "deb [signed-by=/etc/apt/keyrings/nodesource.gpg] https://deb.nodesource.com/node_${nodeMajor}.x nodistro main" \\
    > /etc/apt/sources.list.d/nodesource.list
  apt-get update -qq
  apt-get install -y -qq nodejs
fi
log "Node.js version: $(node --version)"`;
}

export function buildGatewayInstallSection(gateway: GatewayConfig): string {
  return `# ─── ${gateway.packageName} ──────────────────────────────────────────────────────────
if ! command -v ${gateway.binaryName} &>/dev/null; then
  log "Installing ${gateway.packageName}…"
  npm install -g ${gateway.packageName}@latest
fi
GATEWAY_BIN="$(command -v ${gateway.binaryName})"
log "${gateway.binaryName} binary: $GATEWAY_BIN"`;
}

export function buildServiceSection(gateway: GatewayConfig): string {
  const paths = gatewayPaths(gateway);
  const unit = renderGatewayUnit({ gateway, binaryPath: "$GATEWAY_BIN" });

  return `# ─── systemd service ─────────────────────────────────────────────────────────
log "Creating systemd service…"
cat > /etc/systemd/system/${paths.unitName} <<UNIT
${unit.trimEnd()}
UNIT

systemctl daemon-reload
systemctl enable ${paths.unitName}
systemctl start ${paths.unitName}`;
}

/**
 * Compose the full boot script.
 */
export function buildStartupScript(options: StartupScriptOptions): string {
  const { gateway } = options;
  const paths = gatewayPaths(gateway);
  const sentinelDir = paths.sentinelFile.slice(0, paths.sentinelFile.lastIndexOf("/"));

  const sections = [
    buildServiceUserSection(gateway),
    buildBasePackagesSection(),
    buildFetchHelperSection(options),
    buildCredentialProtectionSection(gateway),
    `# ─── Already provisioned? Just ensure the service is running ─────────────────
if [ -f "${paths.sentinelFile}" ]; then
  log "${ALREADY_PROVISIONED_MARKER}. Ensuring service is running."
  systemctl start ${paths.unitName} 2>/dev/null || true
  exit 0
fi

log "Starting ${gateway.packageName} provisioning…"`,
    buildNodeInstallSection(gateway.nodeMajor),
    buildGatewayInstallSection(gateway),
    buildServiceSection(gateway),
    `# ─── Mark as provisioned ─────────────────────────────────────────────────────
mkdir -p ${sentinelDir}
touch "${paths.sentinelFile}"

log "${gateway.packageName} ${PROVISIONING_COMPLETE_MARKER}."`,
  ];

  return `#!/bin/bash
# ${gateway.packageName} provisioning script (runs on every boot, idempotent)
set -euo pipefail

${logFunction(paths.logTag)}

${sections.join("\n\n")}
`;
}
