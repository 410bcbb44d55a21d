import * as pako from "pako";

import {
  compress,
  decompress,
  MAX_DECOMPRESSED_SIZE,
  shouldCompress,
} from "../compression-service";

const text = (length: number): Uint8Array =>
  new TextEncoder().encode("mesh ".repeat(Math.ceil(length / 5)).slice(0, length));

describe("compression", () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  it("skips short and high-diversity payloads", () => {
    const diverse = new Uint8Array(256);
    for (let i = 0; i < diverse.length; i++) diverse[i] = i;

    expect(shouldCompress(text(99))).toBe(false);
    expect(shouldCompress(diverse)).toBe(false);
    expect(shouldCompress(text(100))).toBe(true);
    expect(compress(diverse)).toBeNull();
  });

  it("inflates what it deflated", () => {
    const original = text(1000);
    const compressed = compress(original);

    expect(compressed).not.toBeNull();
    if (!compressed) return;
    expect(decompress(compressed, 1000)).toEqual(original);
  });

  it("refuses sizes outside 1..1 MiB", () => {
    const compressed = pako.deflate(text(200));

    expect(decompress(compressed, 0)).toBeNull();
    expect(decompress(compressed, MAX_DECOMPRESSED_SIZE + 1)).toBeNull();
  });

  it("stops inflating once the output passes the declared size", () => {
    const bomb = pako.deflate(new Uint8Array(8 * 1024 * 1024));

    expect(decompress(bomb, 100_000)).toBeNull();
    expect(warn).toHaveBeenCalledWith(
      "[Compression] Inflated output exceeds the declared 100000 bytes, aborting",
    );
  });

  it("rejects a stream that ends short of the declared size", () => {
    const compressed = pako.deflate(text(500));

    expect(decompress(compressed, 600)).toBeNull();
    expect(warn).toHaveBeenCalledWith("[Compression] Size mismatch: expected 600, got 500");
  });

  it("rejects garbage", () => {
    expect(decompress(new Uint8Array([1, 2, 3, 4, 5]), 400)).toBeNull();
  });
});
