import { describe, expect, it } from "vitest";
import { createStats } from "../context.js";
import { ContractViolation, ProtocolError } from "../errors.js";
import { encodeFrame, FrameDecoder, FrameEncoder } from "../framing.js";
import { FloodSource } from "../source.js";
import type { PeerId } from "../types.js";
import { quietLogging } from "./helpers.js";

function makeEncoder(targets: PeerId[]) {
  const source = new FloodSource(targets, quietLogging().channel("FloodSource"), createStats());
  return { source, encoder: new FrameEncoder(source) };
}

describe("encodeFrame", () => {
  it("prefixes the packet with its length, little-endian", () => {
    expect(encodeFrame(Buffer.from([1, 2, 3]))).toEqual(Buffer.from([3, 0, 1, 2, 3]));
  });

  it("rejects packets longer than the header can express", () => {
    expect(() => encodeFrame(Buffer.alloc(0x10000))).toThrow(RangeError);
  });
});

describe("FrameEncoder", () => {
  it("has room for the header plus one record", () => {
    expect(makeEncoder([1]).encoder.mtu).toBe(2005);
  });

  it("frames the record produced by the source", () => {
    const { encoder } = makeEncoder([42]);
    const out = Buffer.alloc(encoder.mtu);

    expect(encoder.pull(out)).toEqual({ kind: "frame", length: 2005 });
    expect(out.readUInt16LE(0)).toBe(2003);
    expect(out[2]).toBe(5);
    expect(out.readUInt16LE(3)).toBe(42);
  });

  it("passes a deferral through untouched", () => {
    const { source, encoder } = makeEncoder([]);
    const out = Buffer.alloc(encoder.mtu, 0xee);

    expect(encoder.pull(out)).toEqual({ kind: "deferred" });
    expect(source.blocked).toBe(true);
    expect(out.readUInt16LE(0)).toBe(0xeeee);
  });

  it("pulls from the source once per frame", () => {
    const { source, encoder } = makeEncoder([1, 2, 3]);
    const out = Buffer.alloc(encoder.mtu);
    encoder.pull(out);
    encoder.pull(out);
    expect(source.cursor).toBe(2);
  });

  it("cannot be used after free", () => {
    const { encoder } = makeEncoder([1]);
    encoder.free();
    expect(() => encoder.pull(Buffer.alloc(encoder.mtu))).toThrow(ContractViolation);
  });
});

describe("FrameDecoder", () => {
  it("reassembles frames split across chunks", () => {
    const decoder = new FrameDecoder();
    const stream = Buffer.concat([encodeFrame(Buffer.from([0xaa])), encodeFrame(Buffer.from([0xbb, 0xcc]))]);

    expect(decoder.push(stream.subarray(0, 2))).toEqual([]);
    expect(decoder.push(stream.subarray(2, 4))).toEqual([Buffer.from([0xaa])]);
    expect(decoder.push(stream.subarray(4))).toEqual([Buffer.from([0xbb, 0xcc])]);
  });

  it("returns several packets from one chunk", () => {
    const decoder = new FrameDecoder();
    const stream = Buffer.concat([encodeFrame(Buffer.from([1])), encodeFrame(Buffer.from([2]))]);
    expect(decoder.push(stream)).toEqual([Buffer.from([1]), Buffer.from([2])]);
  });

  it("accepts an empty packet", () => {
    expect(new FrameDecoder().push(Buffer.from([0, 0]))).toEqual([Buffer.alloc(0)]);
  });

  it("rejects frames above its limit", () => {
    const decoder = new FrameDecoder(4);
    expect(() => decoder.push(Buffer.from([5, 0]))).toThrow(ProtocolError);
  });
});
