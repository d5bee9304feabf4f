const TERMINATION_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/**
 * Handle on the process event loop: `exec()` resolves once somebody calls
 * `quit(code)`. Only the first `quit` counts.
 */
export class Reactor {
  private readonly exited: Promise<number>;
  private resolveExit: (code: number) => void = () => {};
  private exitCode: number | undefined;

  constructor() {
    this.exited = new Promise<number>((resolve) => {
      this.resolveExit = resolve;
    });
  }

  get quitting(): boolean {
    return this.exitCode !== undefined;
  }

  exec(): Promise<number> {
    return this.exited;
  }

  quit(code: number): void {
    if (this.exitCode !== undefined) return;
    this.exitCode = code;
    this.resolveExit(code);
  }
}

/** Route SIGINT/SIGTERM to `handler`. Returns the function that unhooks it. */
export function installSignalHook(handler: (signal: NodeJS.Signals) => void): () => void {
  for (const signal of TERMINATION_SIGNALS) {
    process.on(signal, handler);
  }
  return () => {
    for (const signal of TERMINATION_SIGNALS) {
      process.off(signal, handler);
    }
  };
}

/**
 * Cancellable set of callbacks queued for the next event-loop turn.
 */
export class PendingJobs {
  private handles = new Set<NodeJS.Immediate>();

  schedule(job: () => void): void {
    const handle = setImmediate(() => {
      this.handles.delete(handle);
      job();
    });
    this.handles.add(handle);
  }

  cancelAll(): void {
    for (const handle of this.handles) {
      clearImmediate(handle);
    }
    this.handles.clear();
  }
}
