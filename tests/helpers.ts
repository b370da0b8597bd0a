import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parseConfig, type ProvisionConfig } from "../src/lib/config.js";
import type { CommandRunner, ExecResult, RunOptions } from "../src/lib/exec.js";
import type { CloneOptions, GitClient } from "../src/lib/git.js";

export function createTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "hyprdeck-test-"));
}

export function writeFile(dir: string, relativePath: string, content: string): void {
  const fullPath = path.join(dir, relativePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content, "utf-8");
}

export function readFile(dir: string, relativePath: string): string {
  return fs.readFileSync(path.join(dir, relativePath), "utf-8");
}

export function writeOsRelease(dir: string, content: string): string {
  writeFile(dir, "os-release", content);
  return path.join(dir, "os-release");
}

export interface RecordedCall {
  line: string;
  cwd?: string;
}

/**
 * Records every command instead of running it. Commands succeed unless a
 * registered prefix of their command line says otherwise.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly rules: Array<{ prefix: string; exitCode: number }> = [];

  /** Commands whose line starts with `prefix` exit with `exitCode`. Later rules win. */
  respond(prefix: string, exitCode: number): this {
    this.rules.unshift({ prefix, exitCode });
    return this;
  }

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ExecResult> {
    const line = [command, ...args].join(" ");
    this.calls.push(options.cwd ? { line, cwd: options.cwd } : { line });
    const rule = this.rules.find((r) => line.startsWith(r.prefix));
    return { exitCode: rule?.exitCode ?? 0, stdout: "", stderr: "" };
  }

  get lines(): string[] {
    return this.calls.map((c) => c.line);
  }

  matching(prefix: string): string[] {
    return this.lines.filter((line) => line.startsWith(prefix));
  }
}

/** Clones write the registered fixture files; unknown repositories fail. */
export class FakeGit implements GitClient {
  installed = true;
  readonly clones: Array<{ repository: string; targetDir: string; options: CloneOptions }> = [];
  private readonly repos = new Map<string, Record<string, string>>();

  addRepository(repository: string, files: Record<string, string>): this {
    this.repos.set(repository, files);
    return this;
  }

  async isInstalled(): Promise<boolean> {
    return this.installed;
  }

  async clone(repository: string, targetDir: string, options: CloneOptions = {}): Promise<void> {
    this.clones.push({ repository, targetDir, options });
    const files = this.repos.get(repository);
    if (!files) {
      throw new Error(`fatal: repository '${repository}' not found`);
    }
    fs.mkdirSync(targetDir, { recursive: true });
    for (const [rel, content] of Object.entries(files)) {
      writeFile(targetDir, rel, content);
    }
  }
}

export const DOTFILES_REPO = "https://example.test/dotfiles.git";
export const HELPER_REPO = "https://example.test/yay-bin.git";
export const ICONS_REPO = "https://example.test/icons.git";

export function testConfig(overrides: Record<string, unknown> = {}): ProvisionConfig {
  return parseConfig({
    dotfiles: {
      repository: DOTFILES_REPO,
      cloneDir: "~/Dotfiles",
      templateHome: "/home/template/",
      configDir: ".config",
      recipesDir: "recipes",
    },
    network: { probeHost: "192.0.2.1" },
    disk: { path: "/", minimumBytes: 1024 },
    copy: { ignoreBackupErrors: false },
    profiles: {
      arch: {
        scanRecipes: true,
        helper: { name: "yay", repository: HELPER_REPO },
        packages: {
          official: ["hyprland", "kitty"],
          community: ["quickshell"],
          critical: ["qt6-base"],
        },
        metaPackages: [{ name: "meta-core" }],
      },
      fedora: {
        copr: ["example/hyprland"],
        packages: { official: ["hyprland"], community: [] },
        replacements: [{ remove: "old-audio", install: "new-audio" }],
      },
    },
    services: [{ name: "NetworkManager" }],
    iconTheme: {
      enabled: false,
      repository: ICONS_REPO,
      installArgs: [["-a"]],
    },
    postInstall: [],
    artifacts: {
      gtkTheme: "Adwaita-dark",
      gtkThemeVariant: "Adwaita:dark",
      iconTheme: "Adwaita",
      cursorTheme: "Bibata-Modern-Classic",
      gtkCursorTheme: "Adwaita",
      cursorSize: 24,
      fontName: "Sans 10",
      wallpaper: "wall.png",
    },
    ...overrides,
  });
}
