import { execFileSync } from "child_process";
import fs from "fs";
import os from "os";
import path from "path";
import { GatewayConfigSchema } from "../config";
import { parseEnvFile } from "../env-file";
import { gatewayPaths } from "../gateway-paths";
import {
  ALREADY_PROVISIONED_MARKER,
  PROVISIONING_COMPLETE_MARKER,
  buildCredentialProtectionSection,
  buildGatewayInstallSection,
  buildNodeInstallSection,
  buildSecretFetchScript,
  buildStartupScript,
} from "../startup-script-builder";

const gateway = GatewayConfigSchema.parse({});

// ── Test helpers ───────────────────────────────────────────────────────

const SM_BASE = "https://secretmanager.googleapis.com/v1/projects/test-project";

function accessUrl(name: string): string {
  return `${SM_BASE}/secrets/${name}/versions/latest:access`;
}

function payload(value: string): string {
  return JSON.stringify({ payload: { data: Buffer.from(value).toString("base64") } });
}

/** Fake `curl`: answers fixture URLs, fails like `curl -f` on anything else. */
const CURL_STUB = `
const fixtures = JSON.parse(require("fs").readFileSync(process.env.FIXTURES, "utf8"));
const args = process.argv.slice(2);
const url = args[args.length - 1];
const authorized = args.includes("Authorization: Bearer test-token");
if (!(url in fixtures) || (url.startsWith("https://") && !authorized)) process.exit(22);
process.stdout.write(fixtures[url]);
`;

/** Fake `jq -r` for the filters the fetch helper uses. */
const JQ_STUB = `
let input = "";
process.stdin.on("data", (chunk) => (input += chunk));
process.stdin.on("end", () => {
  const doc = JSON.parse(input);
  const filters = {
    ".access_token // empty": () => [doc.access_token],
    ".nextPageToken // empty": () => [doc.nextPageToken],
    ".payload.data // empty": () => [doc.payload && doc.payload.data],
    '.secrets[]?.name | sub("^projects/[^/]+/secrets/"; "")': () =>
      (doc.secrets || []).map((s) => s.name.replace(/^projects\\/[^/]+\\/secrets\\//, "")),
  };
  const filter = filters[process.argv[3]];
  if (!filter) process.exit(3);
  for (const value of filter()) if (value != null) process.stdout.write(value + "\\n");
});
`;

function writeExecutable(file: string, content: string): void {
  fs.writeFileSync(file, content, { mode: 0o755 });
}

describe("buildSecretFetchScript", () => {
  const script = buildSecretFetchScript({ gateway });

  it("should be a bash script that never fails the unit", () => {
    expect(script.startsWith("#!/bin/bash\n")).toBe(true);
    expect(script).toContain("set -uo pipefail\n");
    expect(script).not.toContain("set -e");
    expect(script.trimEnd().endsWith("exit 0")).toBe(true);
  });

  it("should read the project and token from the metadata server", () => {
    expect(script).toContain('METADATA_URL="http://metadata.google.internal/computeMetadata/v1"');
    expect(script).toContain('"$METADATA_URL/project/project-id"');
    expect(script).toContain('"$METADATA_URL/instance/service-accounts/default/token"');
    expect(script).toContain("jq -r '.access_token // empty'");
  });

  it("should follow list pagination", () => {
    expect(script).toContain('URL="$SM_BASE/secrets?pageSize=250"');
    expect(script).toContain('URL="$URL&pageToken=$PAGE_TOKEN"');
    expect(script).toContain("jq -r '.nextPageToken // empty'");
  });

  it("should skip invalid names, placeholders and empty values", () => {
    expect(script).toContain("ENV_NAME_RE='^[A-Za-z_][A-Za-z0-9_]*$'");
    expect(script).toContain('PLACEHOLDER="__PLACEHOLDER__"');
    expect(script).toContain('if [[ -z "$TRIMMED" || "$TRIMMED" == "$PLACEHOLDER" ]]; then');
  });

  it("should escape unsafe values the way the env file parser expects", () => {
    expect(script).toContain("sed -e 's/[\\\\\"`$]/\\\\&/g'");
  });

  it("should replace the env file atomically with restricted permissions", () => {
    expect(script).toContain('SECRETS_ENV="/run/openclaw/env"');
    expect(script).toContain('(umask 077 && : > "$TMP")');
    expect(script).toContain('mv "$TMP" "$SECRETS_ENV"');
    expect(script).toContain('chown "openclaw:openclaw" "$SECRETS_ENV"');
    expect(script).toContain('chmod 600 "$SECRETS_ENV"');
  });

  it("should honor a custom placeholder", () => {
    expect(buildSecretFetchScript({ gateway, placeholder: "CHANGE_ME" })).toContain('PLACEHOLDER="CHANGE_ME"');
  });
});

describe("buildCredentialProtectionSection", () => {
  it("should bind-mount tmpfs over credentials and null the .env file", () => {
    const section = buildCredentialProtectionSection(gateway);

    expect(section).toContain('mount --bind "/run/openclaw/credentials" "/home/openclaw/.openclaw/credentials"');
    expect(section).toContain('if ! mountpoint -q "/home/openclaw/.openclaw/credentials" 2>/dev/null; then');
    expect(section).toContain('ln -sf /dev/null "/home/openclaw/.openclaw/.env"');
    expect(section).toContain('chmod 700 "/run/openclaw/credentials"');
  });
});

describe("buildNodeInstallSection", () => {
  it("should install the requested NodeSource major when missing or older", () => {
    const section = buildNodeInstallSection(20);

    expect(section).toContain('[ "$(node --version | cut -d. -f1 | tr -d v)" -lt 20 ]');
    expect(section).toContain("https://deb.nodesource.com/node_20.x nodistro main");
  });
});

describe("buildGatewayInstallSection", () => {
  it("should install the package globally only when the binary is missing", () => {
    const section = buildGatewayInstallSection(gateway);

    expect(section).toContain("if ! command -v openclaw &>/dev/null; then");
    expect(section).toContain("npm install -g openclaw@latest");
    expect(section).toContain('GATEWAY_BIN="$(command -v openclaw)"');
  });
});

describe("buildStartupScript", () => {
  const script = buildStartupScript({ gateway });

  it("should run under strict bash", () => {
    expect(script.startsWith("#!/bin/bash\n")).toBe(true);
    expect(script).toContain("set -euo pipefail\n");
  });

  it("should log through logger and stdout", () => {
    expect(script).toContain(
      'log() { logger -t "openclaw-startup" "$*" 2>/dev/null || true; echo "[openclaw-startup] $*"; }'
    );
  });

  it("should embed the fetch helper without expansion and run it tolerantly", () => {
    expect(script).toContain("cat > /usr/local/bin/fetch-openclaw-secrets <<'FETCHSCRIPT'\n#!/bin/bash\n");
    expect(script).toContain("/usr/local/bin/fetch-openclaw-secrets || true");
  });

  it("should exit early once provisioned", () => {
    expect(script).toContain('if [ -f "/var/lib/openclaw/.provisioned" ]; then');
    expect(script).toContain(`log "${ALREADY_PROVISIONED_MARKER}. Ensuring service is running."`);
  });

  it("should order boot steps so secrets and protections apply before the early exit", () => {
    const order = [
      'useradd --system --create-home --shell /bin/bash "openclaw"',
      "apt-get install -y -qq ca-certificates curl gnupg jq git",
      "/usr/local/bin/fetch-openclaw-secrets || true",
      "mount --bind",
      'if [ -f "/var/lib/openclaw/.provisioned" ]; then',
      "https://deb.nodesource.com/node_22.x",
      "npm install -g openclaw@latest",
      "cat > /etc/systemd/system/openclaw-gateway.service <<UNIT",
      "systemctl enable openclaw-gateway.service",
      'touch "/var/lib/openclaw/.provisioned"',
    ].map((needle) => script.indexOf(needle));

    expect(order.every((index) => index >= 0)).toBe(true);
    expect([...order].sort((a, b) => a - b)).toEqual(order);
  });

  it("should write the unit with the resolved binary path", () => {
    expect(script).toContain("ExecStart=$GATEWAY_BIN gateway --port 18789 --verbose\n");
  });

  it("should finish with the provisioning-complete marker", () => {
    expect(script.trimEnd().endsWith(`log "openclaw ${PROVISIONING_COMPLETE_MARKER}."`)).toBe(true);
  });
});

describe("secret fetch helper execution", () => {
  const runtimeDir = gatewayPaths(gateway).runtimeDir;
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tunnelgate-fetch-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should write an env file that parses back to the secret values", () => {
    const quoted = 'say "hi" $HOME `id` C:\\path';
    const fixtures: Record<string, string> = {
      "http://metadata.google.internal/computeMetadata/v1/project/project-id": "test-project",
      "http://metadata.google.internal/computeMetadata/v1/instance/service-accounts/default/token":
        JSON.stringify({ access_token: "test-token" }),
      [`${SM_BASE}/secrets?pageSize=250`]: JSON.stringify({
        secrets: [
          { name: "projects/test-project/secrets/API_KEY" },
          { name: "projects/test-project/secrets/QUOTED" },
          { name: "projects/test-project/secrets/bad-name" },
        ],
        nextPageToken: "page-2",
      }),
      [`${SM_BASE}/secrets?pageSize=250&pageToken=page-2`]: JSON.stringify({
        secrets: [
          { name: "projects/test-project/secrets/MULTI" },
          { name: "projects/test-project/secrets/PLACEHOLDER_ONE" },
          { name: "projects/test-project/secrets/NO_VERSION" },
        ],
      }),
      [accessUrl("API_KEY")]: payload("sk-test"),
      [accessUrl("QUOTED")]: payload(quoted),
      [accessUrl("MULTI")]: payload("line one\nline two"),
      [accessUrl("PLACEHOLDER_ONE")]: payload("__PLACEHOLDER__"),
      [accessUrl("bad-name")]: payload("never-read"),
    };

    const binDir = path.join(tmpDir, "bin");
    fs.mkdirSync(binDir);
    writeExecutable(path.join(binDir, "curl"), `#!${process.execPath}\n${CURL_STUB}`);
    writeExecutable(path.join(binDir, "jq"), `#!${process.execPath}\n${JQ_STUB}`);
    writeExecutable(path.join(binDir, "chown"), "#!/bin/sh\nexit 0\n");
    writeExecutable(path.join(binDir, "logger"), "#!/bin/sh\nexit 0\n");

    const fixturesFile = path.join(tmpDir, "fixtures.json");
    fs.writeFileSync(fixturesFile, JSON.stringify(fixtures));

    const localRuntime = path.join(tmpDir, "run");
    const scriptFile = path.join(tmpDir, "fetch-secrets");
    writeExecutable(scriptFile, buildSecretFetchScript({ gateway }).split(runtimeDir).join(localRuntime));

    const stdout = execFileSync("bash", [scriptFile], {
      encoding: "utf8",
      env: {
        ...process.env,
        FIXTURES: fixturesFile,
        PATH: `${binDir}${path.delimiter}${process.env.PATH ?? ""}`,
      },
    });

    expect(stdout.trimEnd().split("\n")).toEqual([
      "[openclaw-startup]   Skipping 'bad-name' (not a valid variable name).",
      "[openclaw-startup]   Skipping 'PLACEHOLDER_ONE' (placeholder or empty).",
      "[openclaw-startup]   Skipping 'NO_VERSION' (no accessible version).",
      "[openclaw-startup] Loaded 3 secret(s) from Secret Manager.",
    ]);

    const envFile = path.join(localRuntime, "env");
    const text = fs.readFileSync(envFile, "utf8");
    expect(text).toBe(
      'API_KEY=sk-test\nQUOTED="say \\"hi\\" \\$HOME \\`id\\` C:\\\\path"\nMULTI="line one\nline two"\n'
    );
    expect(parseEnvFile(text)).toEqual([
      { name: "API_KEY", value: "sk-test" },
      { name: "QUOTED", value: quoted },
      { name: "MULTI", value: "line one\nline two" },
    ]);
    expect(fs.statSync(envFile).mode & 0o777).toBe(0o600);
    expect(fs.existsSync(`${envFile}.tmp`)).toBe(false);
  }, 20000);
});
