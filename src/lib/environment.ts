import fs from "node:fs";
import type { DistroFamily, EnvironmentInfo } from "../types/index.js";
import { UnsupportedEnvironmentError } from "./errors.js";

export const OS_RELEASE_PATH = "/etc/os-release";

const SUPPORTED: DistroFamily[] = ["arch", "fedora"];

/**
 * Parses os-release(5) content: KEY=value lines, values optionally quoted.
 */
export function parseOsRelease(raw: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of raw.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;

    const key = trimmed.slice(0, eq);
    let value = trimmed.slice(eq + 1);
    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.endsWith(quote) && value.length >= 2) {
      value = value.slice(1, -1);
      if (quote === '"') value = value.replace(/\\(["\\$`])/g, "$1");
    }
    fields[key] = value;
  }
  return fields;
}

export function familyOf(fields: Record<string, string>): DistroFamily | null {
  const candidates = [fields["ID"] ?? "", ...(fields["ID_LIKE"] ?? "").split(/\s+/)];
  for (const candidate of candidates) {
    const match = SUPPORTED.find((family) => family === candidate.toLowerCase());
    if (match) return match;
  }
  return null;
}

export function detectEnvironment(osReleasePath: string = OS_RELEASE_PATH): EnvironmentInfo {
  if (!fs.existsSync(osReleasePath)) {
    throw new UnsupportedEnvironmentError("unknown (no os-release metadata)");
  }

  const fields = parseOsRelease(fs.readFileSync(osReleasePath, "utf-8"));
  const prettyName = fields["PRETTY_NAME"] ?? fields["NAME"] ?? fields["ID"] ?? "unknown";
  const family = familyOf(fields);
  if (!family) {
    throw new UnsupportedEnvironmentError(prettyName);
  }

  return { family, id: fields["ID"] ?? family, prettyName };
}
