// ── Environment ──

export type DistroFamily = "arch" | "fedora";

export interface EnvironmentInfo {
  family: DistroFamily;
  id: string;
  prettyName: string;
}

// ── Packages & recipes ──

/** Ordered, duplicate-free package names. First-seen order is kept. */
export type PackageSet = readonly string[];

export interface BuildRecipe {
  name: string;
  dir: string;
  depends: readonly string[];
  makedepends: readonly string[];
  version?: string;
  prebuiltArtifact?: string;
}

export interface RecipeDeclaration {
  pkgver?: string;
  depends: string[];
  makedepends: string[];
}

export interface PackagePartition {
  primary: string[];
  secondary: string[];
}

// ── File copy ──

export interface FileCopyEntry {
  name: string;
  source: string;
  destination: string;
  backup: boolean;
}

export type FileCopyPlan = readonly FileCopyEntry[];

export interface FileCopyResult {
  copied: string[];
  backedUp: string[];
  rewritten: string[];
}

// ── Services ──

export type ServiceStatus = "enabled" | "failed" | "skipped-unavailable";

export interface ServiceSpec {
  name: string;
  label?: string;
  start?: boolean;
  optional?: boolean;
}

export interface ServiceEnableResult {
  name: string;
  status: ServiceStatus;
}

// ── Warnings ──

export type WarningKind =
  | "package-install"
  | "service-enable"
  | "recipe-build"
  | "recipe-parse"
  | "post-install"
  | "icon-theme"
  | "backup"
  | "file-copy";

export interface ProvisionWarning {
  kind: WarningKind;
  message: string;
}

// ── Static artifacts ──

export interface ArtifactValues {
  gtkTheme: string;
  /** Value of GTK_THEME in the session environment, e.g. `Adwaita:dark`. */
  gtkThemeVariant: string;
  iconTheme: string;
  /** Cursor for Hyprland itself. */
  cursorTheme: string;
  /** Cursor named in the GTK settings files. */
  gtkCursorTheme: string;
  cursorSize: number;
  fontName: string;
  wallpaper: string;
}

export type RecipeOutcome = "prebuilt" | "built" | "missing" | "failed";

export interface RecipeResult {
  name: string;
  outcome: RecipeOutcome;
  artifact?: string;
}
