import fs from "node:fs";
import path from "node:path";
import type { EnvironmentInfo } from "../types/index.js";
import { expandHome, type ProvisionConfig } from "./config.js";
import { detectEnvironment } from "./environment.js";
import { errorMessage } from "./errors.js";
import type { CommandRunner } from "./exec.js";
import type { GitClient } from "./git.js";
import { probePreconditions, type PreconditionResult } from "./preconditions.js";

export interface DiagnosticIssue {
  severity: "error" | "warning";
  message: string;
  fix?: string;
}

export interface DoctorResult {
  issues: DiagnosticIssue[];
  environment: EnvironmentInfo | null;
  checks: PreconditionResult[];
  healthy: boolean;
}

export interface DoctorDeps {
  runner: CommandRunner;
  git: GitClient;
  config: ProvisionConfig;
  home: string;
  uid: number | undefined;
  osReleasePath?: string;
  freeBytes?: (target: string) => Promise<number>;
}

const FIXES: Record<PreconditionResult["check"], string> = {
  "not-root": "Run the installer as your own user; it calls sudo where it needs to",
  network: "Connect to the internet, then run the installer again",
  git: "Install git with your distribution's package manager",
  "disk-space": "Free up space on the target filesystem",
};

/**
 * Reports whether this machine could be provisioned, without changing
 * anything on it.
 */
export async function runDoctor(deps: DoctorDeps): Promise<DoctorResult> {
  const issues: DiagnosticIssue[] = [];

  let environment: EnvironmentInfo | null = null;
  try {
    environment = detectEnvironment(deps.osReleasePath);
  } catch (err) {
    issues.push({ severity: "error", message: errorMessage(err) });
  }

  const checks = await probePreconditions({
    runner: deps.runner,
    git: deps.git,
    uid: deps.uid,
    probeHost: deps.config.network.probeHost,
    disk: deps.config.disk,
    freeBytes: deps.freeBytes,
  });
  for (const check of checks) {
    if (!check.ok) {
      issues.push({ severity: "error", message: check.message, fix: FIXES[check.check] });
    }
  }

  const cloneDir = expandHome(deps.config.dotfiles.cloneDir, deps.home);
  if (fs.existsSync(cloneDir)) {
    issues.push({
      severity: "warning",
      message: `${cloneDir} already exists and will be replaced by a fresh clone`,
    });
  }

  // A directory where a file is expected would stop the artifact writer
  const configDir = path.join(deps.home, ".config");
  for (const rel of ["gtk-3.0/settings.ini", "hypr/scripts/startup.sh"]) {
    const target = path.join(configDir, rel);
    if (fs.existsSync(target) && fs.statSync(target).isDirectory()) {
      issues.push({
        severity: "error",
        message: `${target} is a directory`,
        fix: "Move it out of the way before installing",
      });
    }
  }

  return {
    issues,
    environment,
    checks,
    healthy: issues.every((i) => i.severity !== "error"),
  };
}
