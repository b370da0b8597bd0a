import type { ProvisionWarning, WarningKind } from "../types/index.js";
import { logger } from "./logger.js";

export class ProvisionReport {
  private readonly entries: ProvisionWarning[] = [];

  warn(kind: WarningKind, message: string): void {
    this.entries.push({ kind, message });
    logger.warn(message);
  }

  get warnings(): readonly ProvisionWarning[] {
    return this.entries;
  }
}

/** Warning counts grouped by kind, in first-seen order. */
export function summarizeWarnings(
  warnings: readonly ProvisionWarning[],
): Array<[WarningKind, number]> {
  const counts = new Map<WarningKind, number>();
  for (const { kind } of warnings) {
    counts.set(kind, (counts.get(kind) ?? 0) + 1);
  }
  return [...counts.entries()];
}
