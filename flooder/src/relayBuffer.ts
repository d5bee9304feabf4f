import { ContractViolation } from "./errors.js";
import type { FrameEncoder } from "./framing.js";
import type { Logger } from "./log.js";
import type { FloodStats, SendChannel } from "./types.js";

type BufferState = "idle" | "sending" | "freed";

/**
 * Single-slot bridge between the pull-driven encoder and the push-driven
 * send channel. Holds at most one frame; the next one is pulled only after
 * the channel reports the previous one done.
 *
 * When the encoder defers, the buffer stays idle. Nothing wakes it up again.
 */
export class RelayBuffer {
  private readonly slot: Buffer;
  private state: BufferState = "idle";

  constructor(
    private readonly upstream: FrameEncoder,
    private readonly downstream: SendChannel,
    private readonly log: Logger,
    private readonly stats: FloodStats
  ) {
    this.slot = Buffer.alloc(upstream.mtu);
    this.pull();
  }

  get pending(): boolean {
    return this.state === "sending";
  }

  free(): void {
    this.state = "freed";
  }

  private pull(): void {
    const result = this.upstream.pull(this.slot);
    if (result.kind === "deferred") {
      this.log.debug("upstream has nothing to send, going idle");
      this.state = "idle";
      return;
    }

    this.state = "sending";
    this.stats.sent += 1;
    this.downstream.send(this.slot.subarray(0, result.length), () => this.handleDone());
  }

  private handleDone(): void {
    switch (this.state) {
      case "freed":
        return;
      case "idle":
        throw new ContractViolation("send completion without an outstanding frame");
      case "sending":
        this.pull();
        return;
    }
  }
}
