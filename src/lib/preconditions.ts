import fs from "node:fs";
import type { CommandRunner } from "./exec.js";
import type { GitClient } from "./git.js";
import { PreconditionError, type PreconditionCheck } from "./errors.js";

export interface PreconditionContext {
  runner: CommandRunner;
  git: GitClient;
  uid: number | undefined;
  probeHost: string;
  disk: { path: string; minimumBytes: number };
  freeBytes?: (target: string) => Promise<number>;
}

export interface PreconditionResult {
  check: PreconditionCheck;
  ok: boolean;
  message: string;
}

async function statfsFreeBytes(target: string): Promise<number> {
  const stats = await fs.promises.statfs(target);
  return stats.bavail * stats.bsize;
}

export function formatBytes(bytes: number): string {
  const gib = bytes / 1024 ** 3;
  if (gib >= 1) return `${gib.toFixed(1)} GiB`;
  return `${Math.round(bytes / 1024 ** 2)} MiB`;
}

type Probe = (ctx: PreconditionContext) => Promise<PreconditionResult>;

const PROBES: Probe[] = [
  async (ctx) =>
    ctx.uid === 0
      ? { check: "not-root", ok: false, message: "Do not run the installer as root (don't use sudo)" }
      : { check: "not-root", ok: true, message: "Running as a regular user" },

  async (ctx) => {
    const result = await ctx.runner.run("ping", ["-c", "1", ctx.probeHost]);
    return result.exitCode === 0
      ? { check: "network", ok: true, message: `Reached ${ctx.probeHost}` }
      : {
          check: "network",
          ok: false,
          message: `No internet connection (could not reach ${ctx.probeHost}). Check your network and try again.`,
        };
  },

  async (ctx) =>
    (await ctx.git.isInstalled())
      ? { check: "git", ok: true, message: "git is installed" }
      : { check: "git", ok: false, message: "git is not installed. Install git and try again." },

  async (ctx) => {
    const free = await (ctx.freeBytes ?? statfsFreeBytes)(ctx.disk.path);
    return free >= ctx.disk.minimumBytes
      ? { check: "disk-space", ok: true, message: `${formatBytes(free)} free on ${ctx.disk.path}` }
      : {
          check: "disk-space",
          ok: false,
          message:
            `Insufficient disk space on ${ctx.disk.path}: ${formatBytes(free)} free, ` +
            `at least ${formatBytes(ctx.disk.minimumBytes)} required.`,
        };
  },
];

/** Runs every check and reports each outcome. Used by `doctor`. */
export async function probePreconditions(ctx: PreconditionContext): Promise<PreconditionResult[]> {
  const results: PreconditionResult[] = [];
  for (const probe of PROBES) {
    results.push(await probe(ctx));
  }
  return results;
}

/** Stops at the first failed check. Nothing has been changed on the host at that point. */
export async function checkPreconditions(ctx: PreconditionContext): Promise<void> {
  for (const probe of PROBES) {
    const result = await probe(ctx);
    if (!result.ok) {
      throw new PreconditionError(result.check, result.message);
    }
  }
}
