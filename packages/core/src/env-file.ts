/**
 * Environment file assembly.
 *
 * Every secret in the project becomes one line of a systemd EnvironmentFile:
 *   secret "ANTHROPIC_API_KEY" with value "sk-test" → ANTHROPIC_API_KEY=sk-test
 */

import { PLACEHOLDER_SECRET_VALUE } from "./constants";

export interface EnvEntry {
  name: string;
  value: string;
}

const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Characters systemd reads back verbatim from an unquoted value */
const SAFE_VALUE_PATTERN = /^[A-Za-z0-9_./:@%+,=-]*$/;

/** Characters that must be backslash-escaped inside double quotes */
const ESCAPED_CHARS = /[\\"`$]/g;

/**
 * "projects/my-project/secrets/API_KEY" → "API_KEY"
 */
export function secretIdFromResourceName(resourceName: string): string {
  const marker = "/secrets/";
  const index = resourceName.lastIndexOf(marker);
  if (index === -1) return resourceName;
  return resourceName.slice(index + marker.length).split("/")[0];
}

export function isPlaceholderValue(value: string | undefined): boolean {
  if (value === undefined) return true;
  const trimmed = value.trim();
  return trimmed.length === 0 || trimmed === PLACEHOLDER_SECRET_VALUE;
}

export function isValidEnvName(name: string): boolean {
  return ENV_NAME_PATTERN.test(name);
}

export function formatEnvValue(value: string): string {
  if (SAFE_VALUE_PATTERN.test(value)) return value;
  return `"${value.replace(ESCAPED_CHARS, (ch) => `\\${ch}`)}"`;
}

export function formatEnvLine(entry: EnvEntry): string {
  if (!isValidEnvName(entry.name)) {
    throw new Error(`Invalid environment variable name: "${entry.name}"`);
  }
  return `${entry.name}=${formatEnvValue(entry.value)}`;
}

export function buildEnvFile(entries: EnvEntry[]): string {
  if (entries.length === 0) return "";
  return `${entries.map(formatEnvLine).join("\n")}\n`;
}

/**
 * Parse an EnvironmentFile produced by buildEnvFile. Comments and blank
 * lines are ignored; double-quoted values may span lines.
 */
export function parseEnvFile(text: string): EnvEntry[] {
  const entries: EnvEntry[] = [];
  let pos = 0;

  while (pos < text.length) {
    const lineEnd = text.indexOf("\n", pos);
    const end = lineEnd === -1 ? text.length : lineEnd;
    const line = text.slice(pos, end);
    const trimmed = line.trim();

    if (trimmed.length === 0 || trimmed.startsWith("#")) {
      pos = end + 1;
      continue;
    }

    const eq = line.indexOf("=");
    if (eq === -1) {
      pos = end + 1;
      continue;
    }

    const name = line.slice(0, eq).trim();
    const valueStart = pos + eq + 1;

    if (text[valueStart] !== "\"") {
      entries.push({ name, value: text.slice(valueStart, end) });
      pos = end + 1;
      continue;
    }

    let value = "";
    let i = valueStart + 1;
    for (; i < text.length; i++) {
      const ch = text[i];
      if (ch === "\\" && i + 1 < text.length) {
        value += text[i + 1];
        i++;
      } else if (ch === "\"") {
        break;
      } else {
        value += ch;
      }
    }

    entries.push({ name, value });
    const next = text.indexOf("\n", i);
    pos = next === -1 ? text.length : next + 1;
  }

  return entries;
}
