import fs from "node:fs";
import path from "node:path";
import type { FileCopyPlan, FileCopyResult, WarningKind } from "../types/index.js";
import { BackupError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { ProvisionReport } from "./report.js";

/** One entry per top-level item of `sourceDir`, in name order. */
export function buildFileCopyPlan(
  sourceDir: string,
  destinationDir: string,
  backup = true,
): FileCopyPlan {
  return fs
    .readdirSync(sourceDir)
    .sort()
    .map((name) => ({
      name,
      source: path.join(sourceDir, name),
      destination: path.join(destinationDir, name),
      backup,
    }));
}

function listFiles(target: string): string[] {
  const stat = fs.lstatSync(target);
  if (stat.isFile()) return [target];
  if (!stat.isDirectory()) return [];
  return fs
    .readdirSync(target)
    .sort()
    .flatMap((name) => listFiles(path.join(target, name)));
}

function isText(content: Buffer): boolean {
  return !content.includes(0);
}

/**
 * Replaces every literal `templateHome` in a text file with the user's
 * home. Binary files (any NUL byte) are left alone. Returns whether the
 * file changed.
 */
export function rewriteHomePath(file: string, templateHome: string, home: string): boolean {
  if (templateHome === "") return false;
  const content = fs.readFileSync(file);
  if (!isText(content)) return false;

  // byte-level, so text in other encodings passes through untouched
  const needle = Buffer.from(templateHome, "utf-8");
  let at = content.indexOf(needle);
  if (at === -1) return false;

  const replacement = Buffer.from(
    templateHome.endsWith("/") ? `${home.replace(/\/+$/, "")}/` : home,
    "utf-8",
  );
  const parts: Buffer[] = [];
  let from = 0;
  while (at !== -1) {
    parts.push(content.subarray(from, at), replacement);
    from = at + needle.length;
    at = content.indexOf(needle, from);
  }
  parts.push(content.subarray(from));
  fs.writeFileSync(file, Buffer.concat(parts));
  return true;
}

export interface ApplyCopyOptions {
  /** Where destinations are saved before being overwritten. Created on first use. */
  overwriteBackupDir: string;
  templateHome: string;
  home: string;
  ignoreBackupErrors?: boolean;
  report?: ProvisionReport;
}

function sameKind(a: string, b: string): boolean {
  return fs.lstatSync(a).isDirectory() === fs.lstatSync(b).isDirectory();
}

/**
 * Applies the plan one entry at a time: back up the destination, force
 * copy the source over it, then fix the template home path in what was
 * copied. A failed backup stops the run unless `ignoreBackupErrors` is set.
 */
export function applyFileCopyPlan(plan: FileCopyPlan, options: ApplyCopyOptions): FileCopyResult {
  const result: FileCopyResult = { copied: [], backedUp: [], rewritten: [] };
  const warn = (kind: WarningKind, message: string): void => {
    if (options.report) options.report.warn(kind, message);
    else logger.warn(message);
  };

  for (const entry of plan) {
    const exists = fs.existsSync(entry.destination);

    if (exists && entry.backup) {
      logger.info(`Backing up ${entry.name} before overwriting...`);
      try {
        fs.mkdirSync(options.overwriteBackupDir, { recursive: true });
        fs.cpSync(entry.destination, path.join(options.overwriteBackupDir, entry.name), {
          recursive: true,
          force: true,
          verbatimSymlinks: true,
        });
        result.backedUp.push(entry.name);
      } catch (err) {
        if (!options.ignoreBackupErrors) {
          throw new BackupError(entry.destination, errorMessage(err));
        }
        warn("backup", `Backup of ${entry.name} failed, overwriting anyway: ${errorMessage(err)}`);
      }
    }

    logger.dim(`Copying ${entry.name}`);
    try {
      if (exists && !sameKind(entry.source, entry.destination)) {
        fs.rmSync(entry.destination, { recursive: true, force: true });
      }
      fs.mkdirSync(path.dirname(entry.destination), { recursive: true });
      fs.cpSync(entry.source, entry.destination, {
        recursive: true,
        force: true,
        verbatimSymlinks: true,
      });
    } catch (err) {
      warn("file-copy", `Failed to copy ${entry.name}: ${errorMessage(err)}`);
      continue;
    }
    result.copied.push(entry.name);

    for (const file of listFiles(entry.source)) {
      const copiedFile = path.join(entry.destination, path.relative(entry.source, file));
      try {
        if (rewriteHomePath(copiedFile, options.templateHome, options.home)) {
          result.rewritten.push(copiedFile);
        }
      } catch (err) {
        warn("file-copy", `Failed to fix home paths in ${copiedFile}: ${errorMessage(err)}`);
      }
    }
  }

  return result;
}
