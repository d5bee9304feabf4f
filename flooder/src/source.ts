import { ContractViolation } from "./errors.js";
import type { Logger } from "./log.js";
import { SC_MAX_ENC, SC_MAX_MSGLEN, writeOutMessage } from "./protocol.js";
import type { FloodStats, PeerId, ProduceResult } from "./types.js";

/**
 * Cycles through a fixed list of peers. `next()` returns undefined, and
 * leaves the cursor alone, when the list is empty.
 */
export class RoundRobinSelector {
  private readonly targets: readonly PeerId[];
  private index = 0;

  constructor(targets: readonly PeerId[]) {
    this.targets = [...targets];
  }

  get cursor(): number {
    return this.index;
  }

  get size(): number {
    return this.targets.length;
  }

  next(): PeerId | undefined {
    if (this.targets.length === 0) return undefined;
    const peer = this.targets[this.index];
    this.index = (this.index + 1) % this.targets.length;
    return peer;
  }
}

/**
 * Pull-driven producer of flood records. Each `produce` call addresses one
 * full-size, zero-payload message to the next target.
 */
export class FloodSource {
  readonly mtu = SC_MAX_ENC;
  private readonly selector: RoundRobinSelector;
  private isBlocked = false;
  private freed = false;

  constructor(
    targets: readonly PeerId[],
    private readonly log: Logger,
    private readonly stats: FloodStats
  ) {
    this.selector = new RoundRobinSelector(targets);
  }

  /** True once a request was answered with "deferred"; never cleared. */
  get blocked(): boolean {
    return this.isBlocked;
  }

  get cursor(): number {
    return this.selector.cursor;
  }

  produce(out: Buffer): ProduceResult {
    if (this.freed) {
      throw new ContractViolation("FloodSource used after free");
    }

    const peer = this.selector.next();
    if (peer === undefined) {
      // The target list is fixed, so this holds for the rest of the run.
      this.isBlocked = true;
      return { kind: "deferred" };
    }

    this.log.info(`message to ${peer}`);
    const length = writeOutMessage(out, peer, SC_MAX_MSGLEN);
    this.stats.produced += 1;
    return { kind: "produced", length };
  }

  free(): void {
    this.freed = true;
  }
}
