import { formatError } from "./errors.js";
import type { Logger } from "./log.js";

interface CleanupEntry {
  label: string;
  release: () => void;
}

/**
 * Release actions recorded in acquisition order and run newest-first.
 *
 * `releaseAll` runs every action even when one throws; the failures are
 * logged and returned. Running it again after it emptied the stack does
 * nothing.
 */
export class CleanupStack {
  private entries: CleanupEntry[] = [];

  constructor(private readonly log: Logger) {}

  get size(): number {
    return this.entries.length;
  }

  labels(): string[] {
    return this.entries.map((entry) => entry.label);
  }

  push(label: string, release: () => void): void {
    this.entries.push({ label, release });
    this.log.debug(`acquired ${label}`);
  }

  /** Acquire a resource and register its release in one step. */
  acquire<T>(label: string, create: () => T, release: (resource: T) => void): T {
    const resource = create();
    this.push(label, () => release(resource));
    return resource;
  }

  releaseAll(): Error[] {
    const failures: Error[] = [];
    let entry = this.entries.pop();
    while (entry) {
      try {
        entry.release();
        this.log.debug(`released ${entry.label}`);
      } catch (err) {
        this.log.error(`releasing ${entry.label} failed: ${formatError(err)}`);
        failures.push(err instanceof Error ? err : new Error(String(err)));
      }
      entry = this.entries.pop();
    }
    return failures;
  }
}
