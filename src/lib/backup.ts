import fs from "node:fs";
import { BackupError, errorMessage } from "./errors.js";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function backupDirName(configDir: string, date: Date): string {
  return `${configDir}.backup.${formatTimestamp(date)}`;
}

export const BACKUP_DIR_PATTERN = /\.backup\.\d{8}_\d{6}$/;

/** Full recursive copy of `configDir` next to it. Returns the backup path. */
export function backupConfigDir(configDir: string, date: Date = new Date()): string {
  const target = backupDirName(configDir, date);
  try {
    fs.cpSync(configDir, target, { recursive: true, verbatimSymlinks: true, errorOnExist: true, force: false });
  } catch (err) {
    throw new BackupError(configDir, errorMessage(err));
  }
  return target;
}
