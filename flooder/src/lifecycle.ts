import { CleanupStack } from "./cleanup.js";
import { SERVER_BUFFER_MIN_PACKETS } from "./config.js";
import type { AppContext } from "./context.js";
import { ContractViolation, formatError } from "./errors.js";
import { FrameEncoder } from "./framing.js";
import type { Logger } from "./log.js";
import { SC_KEEPALIVE_INTERVAL } from "./protocol.js";
import type { RelayConnector, RelayLink } from "./relay.js";
import { RelayBuffer } from "./relayBuffer.js";
import { FloodSource } from "./source.js";
import type { ConnectionState, PeerId, ReadyEvent, RelayEvent } from "./types.js";

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  disconnected: ["connecting", "terminating"],
  connecting: ["ready", "terminating"],
  ready: ["terminating"],
  terminating: ["terminated"],
  terminated: [],
};

export function canTransition(from: ConnectionState, to: ConnectionState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Owns the relay connection and the flood pipeline (source → encoder →
 * buffer). The pipeline exists only while the state is "ready"; teardown
 * releases it, then the connection, then the startup resources, all before
 * `terminate` returns.
 */
export class LifecycleController {
  private current: ConnectionState = "disconnected";
  private link: RelayLink | undefined;
  private pipeline: CleanupStack | undefined;
  private myId: PeerId | undefined;
  private readonly log: Logger;

  constructor(
    private readonly ctx: AppContext,
    private readonly connect: RelayConnector
  ) {
    this.log = ctx.logging.channel("Lifecycle");
  }

  get state(): ConnectionState {
    return this.current;
  }

  get selfId(): PeerId | undefined {
    return this.myId;
  }

  /** Start connecting. Throws if the connection object cannot be built. */
  start(): void {
    this.transition("connecting");
    const link = this.connect(
      {
        target: this.ctx.target,
        keepaliveInterval: SC_KEEPALIVE_INTERVAL,
        minBufferedPackets: SERVER_BUFFER_MIN_PACKETS,
        security: this.ctx.security,
        log: this.ctx.logging.channel("RelayConnection"),
      },
      (event) => this.handleEvent(event)
    );
    // Torn down by an event delivered during connect.
    if (this.current !== "connecting") {
      link.free();
      this.log.debug("released relay connection");
      return;
    }
    this.link = link;
  }

  handleEvent(event: RelayEvent): void {
    switch (event.type) {
      case "error":
        this.log.error(`server connection failed, exiting: ${event.error.message}`);
        this.terminate("connection error");
        return;
      case "ready":
        this.handleReady(event);
        return;
      case "peer-joined":
        this.requireReady(event.type);
        this.ctx.stats.peersJoined += 1;
        this.log.info(`newclient ${event.peerId}`);
        return;
      case "peer-left":
        this.requireReady(event.type);
        this.ctx.stats.peersLeft += 1;
        this.log.info(`endclient ${event.peerId}`);
        return;
      case "message":
        this.requireReady(event.type);
        this.ctx.stats.messagesReceived += 1;
        this.log.info(`message from ${event.peerId}`);
        return;
    }
  }

  /**
   * Tear everything down and stop the reactor with `exitCode`. Calling it
   * again once teardown has begun does nothing.
   */
  terminate(reason: string, exitCode = 1): void {
    if (this.current === "terminating" || this.current === "terminated") return;

    this.log.notice(`tearing down (${reason})`);
    this.transition("terminating");

    if (this.pipeline) {
      this.pipeline.releaseAll();
      this.pipeline = undefined;
    }

    if (this.link) {
      try {
        this.link.free();
        this.log.debug("released relay connection");
      } catch (err) {
        this.log.error(`releasing relay connection failed: ${formatError(err)}`);
      }
      this.link = undefined;
    }

    this.ctx.resources.releaseAll();
    this.transition("terminated");
    this.ctx.reactor.quit(exitCode);
  }

  // ── Internal handlers ──────────────────────────────────────────────────

  private handleReady(event: ReadyEvent): void {
    if (this.current !== "connecting" || !this.link) {
      throw new ContractViolation(`ready event while ${this.current}`);
    }

    const pipeline = this.buildPipeline(this.link);
    if (!pipeline) {
      this.terminate("flood pipeline setup failed");
      return;
    }

    this.myId = event.selfId;
    this.pipeline = pipeline;
    this.transition("ready");
    this.log.info(`server: ready, my ID is ${event.selfId} (external address ${event.externalIp})`);
  }

  /** Build source, encoder and buffer; undoes the partial build on failure. */
  private buildPipeline(link: RelayLink): CleanupStack | undefined {
    const { logging, options, stats } = this.ctx;
    const parts = new CleanupStack(this.log);
    try {
      const source = parts.acquire(
        "flood source",
        () => new FloodSource(options.floods, logging.channel("FloodSource"), stats),
        (s) => s.free()
      );
      const encoder = parts.acquire(
        "frame encoder",
        () => new FrameEncoder(source),
        (e) => e.free()
      );
      parts.acquire(
        "relay buffer",
        () => new RelayBuffer(encoder, link.sendChannel(), logging.channel("RelayBuffer"), stats),
        (b) => b.free()
      );
    } catch (err) {
      this.log.error(`flood pipeline setup failed: ${formatError(err)}`);
      parts.releaseAll();
      return undefined;
    }
    return parts;
  }

  private requireReady(eventType: RelayEvent["type"]): void {
    if (this.current !== "ready") {
      throw new ContractViolation(`${eventType} event while ${this.current}`);
    }
  }

  private transition(to: ConnectionState): void {
    if (!canTransition(this.current, to)) {
      throw new ContractViolation(`illegal transition ${this.current} -> ${to}`);
    }
    this.log.debug(`state ${this.current} -> ${to}`);
    this.current = to;
  }
}
