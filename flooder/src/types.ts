/** Relay-assigned client identifier (unsigned 16-bit on the wire). */
export type PeerId = number;

export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "ready"
  | "terminating"
  | "terminated";

// ── Server → client packets ─────────────────────────────────────────────────

export interface KeepalivePacket {
  type: "keepalive";
}

export interface ServerHelloPacket {
  type: "server_hello";
  flags: number;
  id: PeerId;
  /** IPv4 address the server sees us at, network byte order. */
  clientAddr: number;
}

export interface NewClientPacket {
  type: "new_client";
  id: PeerId;
  flags: number;
  cert: Buffer;
}

export interface EndClientPacket {
  type: "end_client";
  id: PeerId;
}

export interface InMessagePacket {
  type: "in_message";
  clientId: PeerId;
  payload: Buffer;
}

export type ServerPacket =
  | KeepalivePacket
  | ServerHelloPacket
  | NewClientPacket
  | EndClientPacket
  | InMessagePacket;

// ── Connection → controller events ──────────────────────────────────────────

export interface ErrorEvent {
  type: "error";
  error: Error;
}

export interface ReadyEvent {
  type: "ready";
  selfId: PeerId;
  /** Dotted-quad hint of our external address; only logged. */
  externalIp: string;
}

export interface PeerJoinedEvent {
  type: "peer-joined";
  peerId: PeerId;
  flags: number;
  cert: Buffer;
}

export interface PeerLeftEvent {
  type: "peer-left";
  peerId: PeerId;
}

export interface MessageEvent {
  type: "message";
  peerId: PeerId;
  payload: Buffer;
}

export type RelayEvent =
  | ErrorEvent
  | ReadyEvent
  | PeerJoinedEvent
  | PeerLeftEvent
  | MessageEvent;

export type RelayEventHandler = (event: RelayEvent) => void;

// ── Flood pipeline ──────────────────────────────────────────────────────────

export type ProduceResult =
  | { kind: "produced"; length: number }
  | { kind: "deferred" };

export type PullResult =
  | { kind: "frame"; length: number }
  | { kind: "deferred" };

/**
 * Push side of the relay connection. The frame is copied before `send`
 * returns; `done` fires once the channel can take another one.
 */
export interface SendChannel {
  send(frame: Buffer, done: () => void): void;
}

export interface FloodStats {
  produced: number;
  sent: number;
  peersJoined: number;
  peersLeft: number;
  messagesReceived: number;
}
