import { describe, it, expect, afterEach, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import {
  applyFileCopyPlan,
  buildFileCopyPlan,
  rewriteHomePath,
} from "../../src/lib/copy-plan.js";
import { backupConfigDir, backupDirName, BACKUP_DIR_PATTERN, formatTimestamp } from "../../src/lib/backup.js";
import { BackupError } from "../../src/lib/errors.js";
import { logger } from "../../src/lib/logger.js";
import { ProvisionReport } from "../../src/lib/report.js";
import { createTmpDir, readFile, writeFile } from "../helpers.js";

let tmpDirs: string[] = [];

function useTmpDir(): string {
  const dir = createTmpDir();
  tmpDirs.push(dir);
  return dir;
}

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tmpDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs = [];
  if (logger.isCapturing()) logger.flush();
});

const HOME = "/home/tester";
const STAMP = new Date(2024, 0, 2, 3, 4, 5);

function setup() {
  const root = useTmpDir();
  const source = path.join(root, "src");
  const dest = path.join(root, "dest");
  writeFile(source, "kitty/kitty.conf", "include /home/template/themes/dark.conf\n");
  writeFile(source, "hypr/hyprland.conf", "source = /home/template/.config/hypr/keys.conf\n");
  writeFile(source, "starship.toml", "format = '$all'\n");
  fs.mkdirSync(dest);
  return { root, source, dest, backupDir: path.join(root, "backup") };
}

// ── backups ──

describe("backupConfigDir", () => {
  it("names the copy with a local timestamp", () => {
    expect(formatTimestamp(STAMP)).toBe("20240102_030405");
    expect(backupDirName("/home/u/.config", STAMP)).toBe("/home/u/.config.backup.20240102_030405");
    expect(BACKUP_DIR_PATTERN.test(backupDirName("/x", STAMP))).toBe(true);
  });

  it("copies the whole tree and leaves the original untouched", () => {
    const root = useTmpDir();
    const configDir = path.join(root, ".config");
    writeFile(configDir, "a/b/c.conf", "deep");
    writeFile(configDir, "top.ini", "top");

    const target = backupConfigDir(configDir, STAMP);

    expect(target).toBe(`${configDir}.backup.20240102_030405`);
    expect(readFile(target, "a/b/c.conf")).toBe("deep");
    expect(readFile(target, "top.ini")).toBe("top");
    expect(readFile(configDir, "top.ini")).toBe("top");
  });

  it("refuses to overwrite an existing backup", () => {
    const root = useTmpDir();
    const configDir = path.join(root, ".config");
    writeFile(configDir, "top.ini", "new");
    writeFile(root, ".config.backup.20240102_030405/top.ini", "old");

    expect(() => backupConfigDir(configDir, STAMP)).toThrow(BackupError);
    expect(readFile(root, ".config.backup.20240102_030405/top.ini")).toBe("old");
  });
});

// ── buildFileCopyPlan ──

describe("buildFileCopyPlan", () => {
  it("has one entry per top-level item, in name order", () => {
    const { source, dest } = setup();
    const plan = buildFileCopyPlan(source, dest);
    expect(plan.map((e) => e.name)).toEqual(["hypr", "kitty", "starship.toml"]);
    expect(plan[0]).toEqual({
      name: "hypr",
      source: path.join(source, "hypr"),
      destination: path.join(dest, "hypr"),
      backup: true,
    });
  });
});

// ── rewriteHomePath ──

describe("rewriteHomePath", () => {
  it("replaces every occurrence and keeps the trailing slash", () => {
    const dir = useTmpDir();
    writeFile(dir, "f.conf", "a=/home/template/x\nb=/home/template/y\n");
    expect(rewriteHomePath(path.join(dir, "f.conf"), "/home/template/", "/home/tester/")).toBe(true);
    expect(readFile(dir, "f.conf")).toBe("a=/home/tester/x\nb=/home/tester/y\n");
  });

  it("leaves binary files alone", () => {
    const dir = useTmpDir();
    const file = path.join(dir, "image.bin");
    const content = Buffer.concat([Buffer.from("/home/template/"), Buffer.from([0, 1, 2])]);
    fs.writeFileSync(file, content);
    expect(rewriteHomePath(file, "/home/template/", HOME)).toBe(false);
    expect(fs.readFileSync(file).equals(content)).toBe(true);
  });

  it("keeps bytes that are not UTF-8 around the replaced path", () => {
    const dir = useTmpDir();
    const file = path.join(dir, "latin1.conf");
    fs.writeFileSync(file, Buffer.concat([Buffer.from("path=/home/template/a # caf"), Buffer.from([0xe9, 0x0a])]));

    expect(rewriteHomePath(file, "/home/template/", HOME)).toBe(true);
    expect(fs.readFileSync(file)).toEqual(
      Buffer.concat([Buffer.from("path=/home/tester/a # caf"), Buffer.from([0xe9, 0x0a])]),
    );
  });

  it("reports no change when the template home is absent", () => {
    const dir = useTmpDir();
    writeFile(dir, "f.conf", "nothing here\n");
    expect(rewriteHomePath(path.join(dir, "f.conf"), "/home/template/", HOME)).toBe(false);
  });
});

// ── applyFileCopyPlan ──

describe("applyFileCopyPlan", () => {
  it("overwrites existing entries after backing them up", () => {
    const { source, dest, backupDir } = setup();
    writeFile(dest, "kitty/kitty.conf", "user edits\n");
    writeFile(dest, "kitty/extra.conf", "kept\n");
    logger.capture();

    const result = applyFileCopyPlan(buildFileCopyPlan(source, dest), {
      overwriteBackupDir: backupDir,
      templateHome: "/home/template/",
      home: HOME,
    });
    logger.flush();

    expect(result.copied).toEqual(["hypr", "kitty", "starship.toml"]);
    expect(result.backedUp).toEqual(["kitty"]);
    expect(result.rewritten).toEqual([
      path.join(dest, "hypr", "hyprland.conf"),
      path.join(dest, "kitty", "kitty.conf"),
    ]);
    expect(readFile(dest, "kitty/kitty.conf")).toBe("include /home/tester/themes/dark.conf\n");
    expect(readFile(dest, "hypr/hyprland.conf")).toBe("source = /home/tester/.config/hypr/keys.conf\n");
    expect(readFile(dest, "kitty/extra.conf")).toBe("kept\n");
    expect(readFile(backupDir, "kitty/kitty.conf")).toBe("user edits\n");
  });

  it("does not create the backup directory when nothing is overwritten", () => {
    const { source, dest, backupDir } = setup();
    logger.capture();
    const result = applyFileCopyPlan(buildFileCopyPlan(source, dest), {
      overwriteBackupDir: backupDir,
      templateHome: "/home/template/",
      home: HOME,
    });
    logger.flush();
    expect(result.backedUp).toEqual([]);
    expect(fs.existsSync(backupDir)).toBe(false);
  });

  it("replaces a file where the source has a directory", () => {
    const { source, dest, backupDir } = setup();
    writeFile(dest, "hypr", "not a directory\n");
    logger.capture();
    applyFileCopyPlan(buildFileCopyPlan(source, dest), {
      overwriteBackupDir: backupDir,
      templateHome: "/home/template/",
      home: HOME,
    });
    logger.flush();
    expect(fs.statSync(path.join(dest, "hypr")).isDirectory()).toBe(true);
    expect(readFile(backupDir, "hypr")).toBe("not a directory\n");
  });

  it("stops on a failed backup and leaves the destination untouched", () => {
    const { root, source, dest } = setup();
    writeFile(dest, "hypr/hyprland.conf", "mine\n");
    writeFile(root, "blocker", "");
    logger.capture();

    expect(() =>
      applyFileCopyPlan(buildFileCopyPlan(source, dest), {
        overwriteBackupDir: path.join(root, "blocker", "backup"),
        templateHome: "/home/template/",
        home: HOME,
      }),
    ).toThrow(BackupError);
    logger.flush();
    expect(readFile(dest, "hypr/hyprland.conf")).toBe("mine\n");
  });

  it("overwrites anyway when backup errors are ignored", () => {
    const { root, source, dest } = setup();
    writeFile(dest, "hypr/hyprland.conf", "mine\n");
    writeFile(root, "blocker", "");
    const report = new ProvisionReport();
    logger.capture();

    const result = applyFileCopyPlan(buildFileCopyPlan(source, dest), {
      overwriteBackupDir: path.join(root, "blocker", "backup"),
      templateHome: "/home/template/",
      home: HOME,
      ignoreBackupErrors: true,
      report,
    });
    logger.flush();

    expect(result.copied).toEqual(["hypr", "kitty", "starship.toml"]);
    expect(result.backedUp).toEqual([]);
    expect(report.warnings.map((w) => w.kind)).toEqual(["backup"]);
    expect(readFile(dest, "hypr/hyprland.conf")).toBe("source = /home/tester/.config/hypr/keys.conf\n");
  });

  it("warns and carries on when a copied file cannot be rewritten", () => {
    const { source, dest, backupDir } = setup();
    const report = new ProvisionReport();
    vi.spyOn(fs, "readFileSync").mockImplementationOnce(() => {
      throw Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
    });
    logger.capture();

    const result = applyFileCopyPlan(buildFileCopyPlan(source, dest), {
      overwriteBackupDir: backupDir,
      templateHome: "/home/template/",
      home: HOME,
      report,
    });
    logger.flush();

    expect(result.copied).toEqual(["hypr", "kitty", "starship.toml"]);
    expect(result.rewritten).toEqual([path.join(dest, "kitty", "kitty.conf")]);
    expect(report.warnings).toEqual([
      {
        kind: "file-copy",
        message: `Failed to fix home paths in ${path.join(dest, "hypr", "hyprland.conf")}: EACCES: permission denied`,
      },
    ]);
  });
});
