import * as pako from "pako";

import { InvalidInputError, MalformedFrameError } from "@/types/errors";
import { Frame, FrameKind } from "@/types/global";
import { decodeFrame, encodeFrame } from "../frame-protocol-service";

const TRANSFER_ID = "00112233445566778899aabbccddeeff";
const RECIPIENT = "0102030405060708";

const dataFrame = (overrides: Partial<Frame> = {}): Frame => ({
  kind: FrameKind.DATA,
  ttl: 3,
  recipient: RECIPIENT,
  originalType: "image/png",
  transferId: TRANSFER_ID,
  sequenceIndex: 0,
  totalChunks: 1,
  payloadSlice: new Uint8Array([0xaa, 0xbb]),
  isFinal: true,
  ...overrides,
});

const u32 = (value: number): number[] => [
  (value >>> 24) & 0xff,
  (value >>> 16) & 0xff,
  (value >>> 8) & 0xff,
  value & 0xff,
];

// Final broadcast DATA frame with an empty type tag and a hand-made zlib payload
const compressedFrame = (payload: Uint8Array, originalSize: number): Uint8Array =>
  new Uint8Array([
    1, 0, 3, 0x06,
    ...Array.from({ length: 16 }, (_, i) => i),
    0,
    ...u32(0),
    ...u32(1),
    ...u32(payload.length),
    ...u32(originalSize),
    ...payload,
  ]);

const repeating = (length: number): Uint8Array => {
  const text = "abcd".repeat(Math.ceil(length / 4)).slice(0, length);
  return new TextEncoder().encode(text);
};

describe("encodeFrame", () => {
  it("lays out a DATA frame byte for byte", () => {
    const bytes = encodeFrame(dataFrame());

    expect(Array.from(bytes)).toEqual([
      1, 0, 3, 0x03,
      0x00, 0x11, 0x22, 0x33, 0x44, 0x55, 0x66, 0x77,
      0x88, 0x99, 0xaa, 0xbb, 0xcc, 0xdd, 0xee, 0xff,
      1, 2, 3, 4, 5, 6, 7, 8,
      9, ...Array.from(new TextEncoder().encode("image/png")),
      0, 0, 0, 0,
      0, 0, 0, 1,
      0, 0, 0, 2,
      0xaa, 0xbb,
    ]);
  });

  it("omits the recipient of a broadcast", () => {
    const bytes = encodeFrame(dataFrame({ recipient: null, isFinal: false, totalChunks: 2 }));

    expect(bytes[3]).toBe(0);
    expect(bytes.length).toBe(52 - 8);
    expect(decodeFrame(bytes).recipient).toBeNull();
  });

  it("rejects frames that cannot be represented", () => {
    expect(() => encodeFrame(dataFrame({ ttl: 256 }))).toThrow(InvalidInputError);
    expect(() => encodeFrame(dataFrame({ payloadSlice: new Uint8Array() }))).toThrow(
      InvalidInputError,
    );
    expect(() => encodeFrame(dataFrame({ originalType: "x".repeat(256) }))).toThrow(
      InvalidInputError,
    );
    expect(() => encodeFrame(dataFrame({ recipient: "XYZ" }))).toThrow(InvalidInputError);
    expect(() => encodeFrame(dataFrame({ sequenceIndex: 1 }))).toThrow(InvalidInputError);
  });
});

describe("decodeFrame", () => {
  it("reads back what was encoded", () => {
    const frame = dataFrame({ sequenceIndex: 4, totalChunks: 20, isFinal: false });

    expect(decodeFrame(encodeFrame(frame))).toEqual(frame);
  });

  it("round trips a cumulative ACK", () => {
    const ack = dataFrame({
      kind: FrameKind.ACK,
      ttl: 2,
      recipient: null,
      totalChunks: 20,
      sequenceIndex: 0,
      payloadSlice: new Uint8Array(),
      isFinal: true,
    });

    const bytes = encodeFrame(ack);

    expect(bytes[1]).toBe(1);
    expect(decodeFrame(bytes)).toEqual(ack);
  });

  it("compresses repetitive payloads and restores them", () => {
    const payload = repeating(400);
    const frame = dataFrame({ payloadSlice: payload });

    const bytes = encodeFrame(frame);

    expect(bytes[3] & 0x04).toBe(0x04);
    expect(bytes.length).toBeLessThan(400);
    expect(decodeFrame(bytes).payloadSlice).toEqual(payload);
  });

  it("leaves high-entropy payloads alone", () => {
    const payload = new Uint8Array(256);
    for (let i = 0; i < payload.length; i++) payload[i] = (i * 7 + 3) % 256;

    const bytes = encodeFrame(dataFrame({ payloadSlice: payload }));

    expect(bytes[3] & 0x04).toBe(0);
    expect(bytes.length).toBe(50 + 256);
  });

  describe("malformed input", () => {
    let warn: jest.SpyInstance;
    const valid = () => encodeFrame(dataFrame());

    beforeEach(() => {
      warn = jest.spyOn(console, "warn").mockImplementation(() => {});
    });

    afterEach(() => {
      warn.mockRestore();
    });

    it("rejects an unknown version", () => {
      const bytes = valid();
      bytes[0] = 2;
      expect(() => decodeFrame(bytes)).toThrow(MalformedFrameError);
    });

    it("rejects an unknown kind", () => {
      const bytes = valid();
      bytes[1] = 7;
      expect(() => decodeFrame(bytes)).toThrow(MalformedFrameError);
    });

    it("rejects truncated and padded input", () => {
      const bytes = valid();
      expect(() => decodeFrame(bytes.slice(0, bytes.length - 1))).toThrow(
        MalformedFrameError,
      );
      expect(() => decodeFrame(new Uint8Array([...bytes, 0]))).toThrow(
        MalformedFrameError,
      );
      expect(() => decodeFrame(new Uint8Array())).toThrow(MalformedFrameError);
    });

    it("rejects a zero chunk count and an out-of-range index", () => {
      const zeroTotal = valid();
      zeroTotal[45] = 0;
      expect(() => decodeFrame(zeroTotal)).toThrow(MalformedFrameError);

      const outOfRange = valid();
      outOfRange[41] = 1;
      expect(() => decodeFrame(outOfRange)).toThrow(MalformedFrameError);
    });

    it("rejects DATA without payload and ACK with payload", () => {
      const empty = valid().slice(0, 50);
      empty[49] = 0;
      expect(() => decodeFrame(empty)).toThrow(MalformedFrameError);

      const ackWithPayload = valid();
      ackWithPayload[1] = FrameKind.ACK;
      expect(() => decodeFrame(ackWithPayload)).toThrow(MalformedFrameError);
    });

    it("rejects a payload that inflates to the wrong size", () => {
      const bytes = encodeFrame(
        dataFrame({ recipient: null, originalType: "text/plain", payloadSlice: repeating(400) }),
      );
      // original size field sits after the 4-byte header, id, type and three u32s
      expect(bytes[46]).toBe(0x90);
      bytes[46] = 0x91;

      expect(() => decodeFrame(bytes)).toThrow(MalformedFrameError);
    });

    it("gives up on a payload that inflates past its declared size", () => {
      const bomb = pako.deflate(new Uint8Array(4 * 1024 * 1024));

      expect(() => decodeFrame(compressedFrame(bomb, 1024 * 1024))).toThrow(
        MalformedFrameError,
      );
      expect(warn).toHaveBeenCalledWith(
        "[Compression] Inflated output exceeds the declared 1048576 bytes, aborting",
      );
    });

    it("rejects a compressed payload longer than its declared size", () => {
      const bomb = pako.deflate(new Uint8Array(4 * 1024 * 1024));

      expect(() => decodeFrame(compressedFrame(bomb, 200))).toThrow(MalformedFrameError);
      expect(warn).toHaveBeenCalledWith(
        `[Compression] ${bomb.length} compressed bytes cannot expand to 200`,
      );
    });

    it("accepts a hand-made compressed frame of the right size", () => {
      const original = repeating(300);

      const frame = decodeFrame(compressedFrame(pako.deflate(original), 300));

      expect(frame.payloadSlice).toEqual(original);
      expect(frame.recipient).toBeNull();
      expect(frame.originalType).toBe("");
    });
  });
});
