import * as net from "node:net";
import * as tls from "node:tls";
import type { ServerTarget } from "./config.js";
import { ContractViolation, ProtocolError } from "./errors.js";
import { encodeFrame, FrameDecoder } from "./framing.js";
import type { Logger } from "./log.js";
import {
  formatIPv4,
  parseServerPacket,
  SC_MAX_ENC,
  serializeClientHello,
  serializeKeepalive,
} from "./protocol.js";
import { PendingJobs } from "./reactor.js";
import type { SecurityContext } from "./security.js";
import type { RelayEventHandler, SendChannel, ServerPacket } from "./types.js";

export interface RelayConnectOptions {
  target: ServerTarget;
  keepaliveInterval: number;
  /** Frames that may sit unflushed in the socket before `done` is held back. */
  minBufferedPackets: number;
  security?: SecurityContext;
  log: Logger;
}

/** What the lifecycle controller holds on to while connected. */
export interface RelayLink {
  /** Only available once the server hello arrived. */
  sendChannel(): SendChannel;
  free(): void;
}

export type RelayConnector = (options: RelayConnectOptions, onEvent: RelayEventHandler) => RelayLink;

type LinkPhase = "connecting" | "handshake" | "ready" | "failed" | "freed";

/**
 * Client side of the relay stream: dial, hello, keepalives, inbound event
 * decoding and the bounded send channel.
 *
 * Every failure (socket error, remote close, protocol violation) is reported
 * once as an `error` event; after that, and after `free()`, the connection
 * delivers nothing.
 */
export class RelayConnection implements RelayLink {
  private readonly socket: net.Socket;
  private readonly decoder = new FrameDecoder(SC_MAX_ENC);
  private readonly jobs = new PendingJobs();
  private readonly log: Logger;
  private phase: LinkPhase = "connecting";
  private keepaliveTimer: ReturnType<typeof setInterval> | null = null;
  private unflushed = 0;
  private waiting: (() => void) | null = null;
  private channel: SendChannel | null = null;

  constructor(
    private readonly options: RelayConnectOptions,
    private readonly onEvent: RelayEventHandler
  ) {
    this.log = options.log;
    const { address, serverName } = options.target;
    this.log.info(`connecting to ${address.host}:${address.port}${options.security ? " (TLS)" : ""}`);

    if (options.security) {
      const { store, sessions, identity } = options.security;
      const socket = tls.connect(
        {
          host: address.host,
          port: address.port,
          // SNI may not carry an IP address.
          servername: net.isIP(serverName) === 0 ? serverName : undefined,
          cert: identity.cert,
          key: identity.key,
          ca: store.ca,
          session: sessions.get(serverName),
        },
        () => this.handleConnected()
      );
      socket.on("session", (session: Buffer) => sessions.set(serverName, session));
      this.socket = socket;
    } else {
      this.socket = net.createConnection({ host: address.host, port: address.port }, () =>
        this.handleConnected()
      );
    }

    this.socket.setNoDelay(true);
    this.socket.on("data", (chunk: Buffer) => this.handleData(chunk));
    this.socket.on("error", (err: Error) => this.fail(err));
    this.socket.on("close", () => this.fail(new Error("server closed the connection")));
  }

  sendChannel(): SendChannel {
    if (this.phase !== "ready") {
      throw new Error(`send channel unavailable (connection ${this.phase})`);
    }
    if (!this.channel) {
      this.channel = { send: (frame, done) => this.send(frame, done) };
    }
    return this.channel;
  }

  free(): void {
    if (this.phase === "freed") return;
    this.phase = "freed";
    this.stopKeepalive();
    this.jobs.cancelAll();
    this.waiting = null;
    this.socket.destroy();
  }

  // ── Internal handlers ──────────────────────────────────────────────────

  private handleConnected(): void {
    if (this.phase !== "connecting") return;
    this.phase = "handshake";
    this.log.debug("connected, sending client hello");
    this.socket.write(encodeFrame(serializeClientHello()));
    this.keepaliveTimer = setInterval(() => {
      this.socket.write(encodeFrame(serializeKeepalive()));
    }, this.options.keepaliveInterval);
  }

  private handleData(chunk: Buffer): void {
    if (this.phase !== "handshake" && this.phase !== "ready") return;

    let packets: Buffer[];
    try {
      packets = this.decoder.push(chunk);
    } catch (err) {
      this.fail(err instanceof Error ? err : new ProtocolError(String(err)));
      return;
    }

    for (const raw of packets) {
      // A handler below may have torn us down.
      if (this.phase !== "handshake" && this.phase !== "ready") return;
      let packet: ServerPacket;
      try {
        packet = parseServerPacket(raw);
      } catch (err) {
        this.fail(err instanceof Error ? err : new ProtocolError(String(err)));
        return;
      }
      this.handlePacket(packet);
    }
  }

  private handlePacket(packet: ServerPacket): void {
    if (packet.type === "keepalive") return;

    if (packet.type === "server_hello") {
      if (this.phase !== "handshake") {
        this.fail(new ProtocolError("unexpected server hello"));
        return;
      }
      this.phase = "ready";
      this.onEvent({ type: "ready", selfId: packet.id, externalIp: formatIPv4(packet.clientAddr) });
      return;
    }

    if (this.phase !== "ready") {
      this.fail(new ProtocolError(`${packet.type} before server hello`));
      return;
    }

    switch (packet.type) {
      case "new_client":
        this.onEvent({ type: "peer-joined", peerId: packet.id, flags: packet.flags, cert: packet.cert });
        break;
      case "end_client":
        this.onEvent({ type: "peer-left", peerId: packet.id });
        break;
      case "in_message":
        this.onEvent({ type: "message", peerId: packet.clientId, payload: packet.payload });
        break;
    }
  }

  private send(frame: Buffer, done: () => void): void {
    if (this.phase !== "ready") {
      throw new ContractViolation(`send on a ${this.phase} connection`);
    }
    if (this.waiting) {
      throw new ContractViolation("send before the previous frame was done");
    }

    this.unflushed += 1;
    // Write failures are reported through the socket's "error" event.
    this.socket.write(Buffer.from(frame), () => this.handleFlushed());

    if (this.unflushed < this.options.minBufferedPackets) {
      this.jobs.schedule(done);
    } else {
      this.waiting = done;
    }
  }

  private handleFlushed(): void {
    this.unflushed -= 1;
    if (this.phase !== "ready" || !this.waiting) return;
    if (this.unflushed < this.options.minBufferedPackets) {
      const done = this.waiting;
      this.waiting = null;
      this.jobs.schedule(done);
    }
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer != null) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
  }

  private fail(err: Error): void {
    if (this.phase === "failed" || this.phase === "freed") return;
    this.phase = "failed";
    this.stopKeepalive();
    this.jobs.cancelAll();
    this.waiting = null;
    this.onEvent({ type: "error", error: err });
  }
}

export const connectRelay: RelayConnector = (options, onEvent) => new RelayConnection(options, onEvent);
