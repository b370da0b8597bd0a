import fs from "node:fs";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";

/**
 * Temporary paths registered here are removed when the scope is disposed,
 * whichever way the run ends. Nothing else is rolled back.
 */
export class CleanupScope {
  private readonly paths = new Set<string>();
  private disposed = false;

  register(target: string): string {
    this.paths.add(target);
    return target;
  }

  /** Removes one path now and stops tracking it. */
  release(target: string): void {
    fs.rmSync(target, { recursive: true, force: true });
    this.paths.delete(target);
  }

  pending(): string[] {
    return [...this.paths];
  }

  dispose(): string[] {
    if (this.disposed) return [];
    this.disposed = true;

    const removed: string[] = [];
    for (const target of this.paths) {
      try {
        fs.rmSync(target, { recursive: true, force: true });
        removed.push(target);
      } catch (err) {
        logger.warn(`Could not remove ${target}: ${errorMessage(err)}`);
      }
    }
    this.paths.clear();
    return removed;
  }
}
