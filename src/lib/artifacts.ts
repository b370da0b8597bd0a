import fs from "node:fs";
import path from "node:path";
import type { ArtifactValues } from "../types/index.js";
import { logger } from "./logger.js";
import { loadTemplate, renderTemplate, TEMPLATES_DIR } from "./template.js";

interface ArtifactSpec {
  /** Relative to the user's config directory. */
  target: string;
  template: string;
  executable?: boolean;
}

export const STATIC_ARTIFACTS: readonly ArtifactSpec[] = [
  { target: "environment.d/99-hyprland.conf", template: "environment.conf" },
  { target: "gtk-3.0/settings.ini", template: "gtk-settings.ini" },
  { target: "gtk-4.0/settings.ini", template: "gtk-settings.ini" },
  { target: "hypr/performance.conf", template: "performance.conf" },
  { target: "hypr/scripts/startup.sh", template: "startup.sh", executable: true },
  { target: "hypr/scripts/shutdown.sh", template: "shutdown.sh", executable: true },
  { target: "hypr/scripts/theme-manager.sh", template: "theme-manager.sh", executable: true },
  { target: "fish/auto-Hypr.fish", template: "auto-hypr.fish" },
];

export const ASSET_DIRS: readonly string[] = ["hypr/assets/themes", "hypr/assets/wallpapers"];

/**
 * Writes every static file, always replacing what is there. Returns the
 * paths written.
 */
export function writeStaticArtifacts(
  configDir: string,
  values: ArtifactValues,
  templatesDir: string = TEMPLATES_DIR,
): string[] {
  const written: string[] = [];
  const variables = { ...values };

  for (const artifact of STATIC_ARTIFACTS) {
    const target = path.join(configDir, artifact.target);
    const content = renderTemplate(loadTemplate(artifact.template, templatesDir), variables);

    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, "utf-8");
    if (artifact.executable) fs.chmodSync(target, 0o755);

    logger.dim(`Wrote ${artifact.target}`);
    written.push(target);
  }

  for (const dir of ASSET_DIRS) {
    fs.mkdirSync(path.join(configDir, dir), { recursive: true });
  }

  return written;
}
