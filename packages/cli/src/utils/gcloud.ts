/**
 * gcloud helpers
 *
 * The CLI talks to Google Cloud through the client libraries; gcloud is only
 * consulted for the operator's defaults (project, account) and for `ssh`.
 */

import { execFileSync } from "child_process";
import os from "os";
import path from "path";
import fs from "fs-extra";

function gcloud(args: string[]): string | undefined {
  try {
    const output = execFileSync("gcloud", args, { encoding: "utf-8", stdio: "pipe" }).trim();
    // gcloud prints "(unset)" for empty properties on some versions
    return output && output !== "(unset)" ? output : undefined;
  } catch {
    return undefined;
  }
}

export function gcloudVersion(): string | undefined {
  return gcloud(["--version"])?.split("\n")[0];
}

/** `gcloud config get-value project` */
export function detectProject(): string | undefined {
  return gcloud(["config", "get-value", "project"]);
}

/** `gcloud config get-value account` */
export function detectAccount(): string | undefined {
  return gcloud(["config", "get-value", "account"]);
}

/**
 * Application Default Credentials, as the client libraries look them up:
 * GOOGLE_APPLICATION_CREDENTIALS first, then the gcloud well-known file.
 */
export function findApplicationDefaultCredentials(
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const candidates = [
    env.GOOGLE_APPLICATION_CREDENTIALS,
    env.CLOUDSDK_CONFIG
      ? path.join(env.CLOUDSDK_CONFIG, "application_default_credentials.json")
      : path.join(os.homedir(), ".config", "gcloud", "application_default_credentials.json"),
  ];
  return candidates.find((file): file is string => !!file && fs.pathExistsSync(file));
}
