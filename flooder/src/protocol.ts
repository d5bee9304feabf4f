import { ProtocolError } from "./errors.js";
import type { PeerId, ServerPacket } from "./types.js";

export const SC_VERSION = 29;
export const SC_KEEPALIVE_INTERVAL = 10_000;

export const SCID_KEEPALIVE = 0x00;
export const SCID_CLIENTHELLO = 0x01;
export const SCID_SERVERHELLO = 0x02;
export const SCID_NEWCLIENT = 0x03;
export const SCID_ENDCLIENT = 0x04;
export const SCID_OUTMSG = 0x05;
export const SCID_INMSG = 0x06;

export const SC_HEADER_SIZE = 1;
export const SC_PEER_ID_SIZE = 2;
export const SC_SERVER_HELLO_SIZE = 2 + SC_PEER_ID_SIZE + 4;
export const SC_NEWCLIENT_SIZE = SC_PEER_ID_SIZE + 2;
export const SC_MAX_MSGLEN = 2000;

/** Largest packet either side sends: header, peer id, full payload. */
export const SC_MAX_ENC = SC_HEADER_SIZE + SC_PEER_ID_SIZE + SC_MAX_MSGLEN;

export const PEER_ID_MAX = 0xffff;

function ensureRemaining(buf: Buffer, offset: number, need: number): void {
  if (offset + need > buf.length) {
    throw new ProtocolError(`truncated (need ${need} at offset ${offset}, length ${buf.length})`);
  }
}

/**
 * Write an outgoing-message record addressed to `peer` into `out`, with a
 * zero-filled payload of `payloadLength` bytes. Returns the record length.
 */
export function writeOutMessage(out: Buffer, peer: PeerId, payloadLength: number): number {
  const length = SC_HEADER_SIZE + SC_PEER_ID_SIZE + payloadLength;
  if (out.length < length) {
    throw new RangeError(`record needs ${length} bytes, buffer has ${out.length}`);
  }
  out[0] = SCID_OUTMSG;
  out.writeUInt16LE(peer, SC_HEADER_SIZE);
  out.fill(0, SC_HEADER_SIZE + SC_PEER_ID_SIZE, length);
  return length;
}

export function serializeClientHello(version: number = SC_VERSION): Buffer {
  const buf = Buffer.alloc(SC_HEADER_SIZE + 2);
  buf[0] = SCID_CLIENTHELLO;
  buf.writeUInt16LE(version, SC_HEADER_SIZE);
  return buf;
}

export function serializeKeepalive(): Buffer {
  return Buffer.from([SCID_KEEPALIVE]);
}

/** Parse one de-framed packet from the relay server. */
export function parseServerPacket(packet: Buffer): ServerPacket {
  ensureRemaining(packet, 0, SC_HEADER_SIZE);
  const type = packet[0];
  const body = packet.subarray(SC_HEADER_SIZE);

  switch (type) {
    case SCID_KEEPALIVE:
      return { type: "keepalive" };
    case SCID_SERVERHELLO: {
      ensureRemaining(body, 0, SC_SERVER_HELLO_SIZE);
      return {
        type: "server_hello",
        flags: body.readUInt16LE(0),
        id: body.readUInt16LE(2),
        clientAddr: body.readUInt32BE(4),
      };
    }
    case SCID_NEWCLIENT: {
      ensureRemaining(body, 0, SC_NEWCLIENT_SIZE);
      return {
        type: "new_client",
        id: body.readUInt16LE(0),
        flags: body.readUInt16LE(2),
        cert: body.subarray(SC_NEWCLIENT_SIZE),
      };
    }
    case SCID_ENDCLIENT: {
      ensureRemaining(body, 0, SC_PEER_ID_SIZE);
      return { type: "end_client", id: body.readUInt16LE(0) };
    }
    case SCID_INMSG: {
      ensureRemaining(body, 0, SC_PEER_ID_SIZE);
      const payload = body.subarray(SC_PEER_ID_SIZE);
      if (payload.length > SC_MAX_MSGLEN) {
        throw new ProtocolError(`message too long (${payload.length} > ${SC_MAX_MSGLEN})`);
      }
      return { type: "in_message", clientId: body.readUInt16LE(0), payload };
    }
    default:
      throw new ProtocolError(`unknown server packet type ${type}`);
  }
}

/** Dotted-quad form of an address read in network byte order. */
export function formatIPv4(addr: number): string {
  return [addr >>> 24, (addr >>> 16) & 0xff, (addr >>> 8) & 0xff, addr & 0xff].join(".");
}
