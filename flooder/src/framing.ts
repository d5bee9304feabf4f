import { ContractViolation, ProtocolError } from "./errors.js";
import type { PullResult } from "./types.js";
import type { FloodSource } from "./source.js";

/** Length prefix in front of every packet on the relay stream (u16, little-endian). */
export const FRAME_HEADER_SIZE = 2;
export const FRAME_MAX_PAYLOAD = 0xffff;

/** Frame a complete packet into a new buffer. */
export function encodeFrame(packet: Buffer): Buffer {
  if (packet.length > FRAME_MAX_PAYLOAD) {
    throw new RangeError(`Frame too large: ${packet.length} > ${FRAME_MAX_PAYLOAD}`);
  }
  const buf = Buffer.alloc(FRAME_HEADER_SIZE + packet.length);
  buf.writeUInt16LE(packet.length, 0);
  packet.copy(buf, FRAME_HEADER_SIZE);
  return buf;
}

/**
 * Pull-side framing: asks the source for one record, written right after
 * the header slot in the caller's buffer, then fills in the header.
 */
export class FrameEncoder {
  readonly mtu: number;
  private source: FloodSource | undefined;

  constructor(source: FloodSource) {
    if (source.mtu > FRAME_MAX_PAYLOAD) {
      throw new RangeError(`Source MTU ${source.mtu} exceeds frame limit ${FRAME_MAX_PAYLOAD}`);
    }
    this.source = source;
    this.mtu = FRAME_HEADER_SIZE + source.mtu;
  }

  pull(out: Buffer): PullResult {
    if (!this.source) {
      throw new ContractViolation("FrameEncoder used after free");
    }
    const result = this.source.produce(out.subarray(FRAME_HEADER_SIZE));
    if (result.kind === "deferred") {
      return result;
    }
    out.writeUInt16LE(result.length, 0);
    return { kind: "frame", length: FRAME_HEADER_SIZE + result.length };
  }

  free(): void {
    this.source = undefined;
  }
}

/**
 * Incremental decoder for the inbound byte stream.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxPayload: number = FRAME_MAX_PAYLOAD) {}

  /** Append bytes and return every packet that is now complete. */
  push(data: Buffer): Buffer[] {
    this.buffer = this.buffer.length === 0 ? data : Buffer.concat([this.buffer, data]);
    const packets: Buffer[] = [];

    while (this.buffer.length >= FRAME_HEADER_SIZE) {
      const length = this.buffer.readUInt16LE(0);
      if (length > this.maxPayload) {
        throw new ProtocolError(`frame too large (${length} > ${this.maxPayload})`);
      }
      const total = FRAME_HEADER_SIZE + length;
      if (this.buffer.length < total) {
        break;
      }
      packets.push(Buffer.from(this.buffer.subarray(FRAME_HEADER_SIZE, total)));
      this.buffer = this.buffer.subarray(total);
    }

    return packets;
  }
}
