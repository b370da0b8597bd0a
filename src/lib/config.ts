import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import { z } from "zod/v4";
import { ConfigError, errorMessage } from "./errors.js";

const DEFAULT_CONFIG_PATH = fileURLToPath(new URL("../../config/default.yaml", import.meta.url));

const packageListsSchema = z.object({
  official: z.array(z.string()).default([]),
  community: z.array(z.string()).default([]),
  critical: z.array(z.string()).default([]),
});

const profileSchema = z.object({
  scanRecipes: z.boolean().default(false),
  helper: z
    .object({
      name: z.string(),
      repository: z.string(),
    })
    .optional(),
  copr: z.array(z.string()).default([]),
  packages: packageListsSchema,
  replacements: z
    .array(z.object({ remove: z.string(), install: z.string() }))
    .default([]),
  metaPackages: z
    .array(
      z.object({
        name: z.string(),
        when: z.object({ missingPath: z.string() }).optional(),
      }),
    )
    .default([]),
});

const serviceSchema = z.object({
  name: z.string(),
  label: z.string().optional(),
  start: z.boolean().optional(),
  optional: z.boolean().optional(),
});

const taskSchema = z.object({
  label: z.string(),
  command: z.string(),
  args: z.array(z.string()).default([]),
  when: z.object({ pathExists: z.string() }).optional(),
});

export const configSchema = z.object({
  dotfiles: z.object({
    repository: z.string(),
    cloneDir: z.string(),
    templateHome: z.string(),
    configDir: z.string().default(".config"),
    recipesDir: z.string(),
  }),
  network: z.object({ probeHost: z.string() }),
  disk: z.object({
    path: z.string().default("/"),
    minimumBytes: z.number().int().positive(),
  }),
  copy: z.object({ ignoreBackupErrors: z.boolean().default(false) }),
  profiles: z.object({
    arch: profileSchema,
    fedora: profileSchema,
  }),
  services: z.array(serviceSchema).default([]),
  iconTheme: z.object({
    enabled: z.boolean().default(true),
    repository: z.string(),
    fallbackRepository: z.string().optional(),
    installArgs: z.array(z.array(z.string())).min(1),
  }),
  postInstall: z.array(taskSchema).default([]),
  artifacts: z.object({
    gtkTheme: z.string(),
    gtkThemeVariant: z.string(),
    iconTheme: z.string(),
    cursorTheme: z.string(),
    gtkCursorTheme: z.string(),
    cursorSize: z.number().int().positive(),
    fontName: z.string(),
    wallpaper: z.string(),
  }),
});

export type ProvisionConfig = z.infer<typeof configSchema>;
export type ProfileConfig = z.infer<typeof profileSchema>;
export type PostInstallTask = z.infer<typeof taskSchema>;

type Plain = Record<string, unknown>;

function isPlainObject(value: unknown): value is Plain {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; arrays and scalars from `override` replace. */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const merged: Plain = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
}

function readYaml(file: string): unknown {
  try {
    return parse(fs.readFileSync(file, "utf-8")) ?? {};
  } catch (err) {
    throw new ConfigError(file, errorMessage(err));
  }
}

export function parseConfig(data: unknown, source = "configuration"): ProvisionConfig {
  const result = configSchema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(source, detail);
  }
  return result.data;
}

export function getUserConfigPath(
  home: string = os.homedir(),
  env: NodeJS.ProcessEnv = process.env,
): string {
  const override = env["HYPRDECK_CONFIG"];
  if (override) return override;
  return path.join(home, ".config", "hyprdeck", "config.yaml");
}

export interface LoadConfigOptions {
  home?: string;
  env?: NodeJS.ProcessEnv;
  defaultsPath?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): ProvisionConfig {
  const defaults = readYaml(options.defaultsPath ?? DEFAULT_CONFIG_PATH);
  const userPath = getUserConfigPath(options.home, options.env);

  if (!fs.existsSync(userPath)) {
    return parseConfig(defaults, "built-in defaults");
  }
  return parseConfig(deepMerge(defaults, readYaml(userPath)), userPath);
}

export function expandHome(p: string, home: string): string {
  if (p === "~") return home;
  if (p.startsWith("~/")) return path.join(home, p.slice(2));
  return p;
}
