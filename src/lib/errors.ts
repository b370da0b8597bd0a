export type ProvisionErrorCode =
  | "UNSUPPORTED_ENVIRONMENT"
  | "PRECONDITION_FAILED"
  | "BOOTSTRAP_FAILED"
  | "CLONE_FAILED"
  | "BACKUP_FAILED"
  | "USER_CANCELLED"
  | "CONFIG_INVALID"
  | "RECIPE_PARSE";

/**
 * Base class for every failure the installer knows how to report.
 * Anything thrown that is not a ProvisionError is a bug.
 */
export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;

  constructor(code: ProvisionErrorCode, message: string) {
    super(message);
    this.name = "ProvisionError";
    this.code = code;
  }
}

export class UnsupportedEnvironmentError extends ProvisionError {
  readonly detected: string;

  constructor(detected: string) {
    super(
      "UNSUPPORTED_ENVIRONMENT",
      `Unsupported distribution: ${detected}. Only Arch-based and Fedora-based systems are supported.`,
    );
    this.name = "UnsupportedEnvironmentError";
    this.detected = detected;
  }
}

export type PreconditionCheck = "not-root" | "network" | "git" | "disk-space";

export class PreconditionError extends ProvisionError {
  readonly check: PreconditionCheck;

  constructor(check: PreconditionCheck, message: string) {
    super("PRECONDITION_FAILED", message);
    this.name = "PreconditionError";
    this.check = check;
  }
}

export class BootstrapFailureError extends ProvisionError {
  readonly helper: string;

  constructor(helper: string, detail: string) {
    super("BOOTSTRAP_FAILED", `Could not set up ${helper}: ${detail}`);
    this.name = "BootstrapFailureError";
    this.helper = helper;
  }
}

export class CloneFailureError extends ProvisionError {
  readonly repository: string;

  constructor(repository: string, detail: string) {
    super("CLONE_FAILED", `Failed to clone ${repository}: ${detail}`);
    this.name = "CloneFailureError";
    this.repository = repository;
  }
}

export class BackupError extends ProvisionError {
  readonly path: string;

  constructor(path: string, detail: string) {
    super("BACKUP_FAILED", `Could not back up ${path} before overwriting it: ${detail}`);
    this.name = "BackupError";
    this.path = path;
  }
}

export class UserCancelledError extends ProvisionError {
  constructor(message = "Installation cancelled by user") {
    super("USER_CANCELLED", message);
    this.name = "UserCancelledError";
  }
}

export class ConfigError extends ProvisionError {
  constructor(source: string, detail: string) {
    super("CONFIG_INVALID", `Invalid configuration in ${source}: ${detail}`);
    this.name = "ConfigError";
  }
}

export class RecipeParseError extends ProvisionError {
  readonly file: string;
  readonly line: number;

  constructor(file: string, line: number, detail: string) {
    super("RECIPE_PARSE", `${file}:${line}: ${detail}`);
    this.name = "RecipeParseError";
    this.file = file;
    this.line = line;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
