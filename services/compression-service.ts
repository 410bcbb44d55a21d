import * as pako from "pako";

// Payloads shorter than this are never worth a zlib header
const COMPRESSION_THRESHOLD = 100;

// Upper bound on an inflated frame payload
const MAX_DECOMPRESSED_SIZE = 1024 * 1024;

/**
 * Deflate a frame payload.
 * @returns The zlib stream, or null when compression would not shrink it
 */
const compress = (data: Uint8Array): Uint8Array | null => {
  if (!shouldCompress(data)) {
    return null;
  }

  try {
    const compressed = pako.deflate(data, { level: 6 });

    if (compressed.length >= data.length) {
      return null;
    }

    return compressed;
  } catch (error) {
    console.warn("[Compression] Deflate failed:", error);
    return null;
  }
};

class InflateLimitExceeded extends Error {}

/**
 * Inflate a zlib stream and check it against the size the sender declared.
 * Output is counted while it is produced, so a stream that grows past
 * `originalSize` is abandoned after at most one output chunk.
 * @returns The original bytes, or null when the stream is bad
 */
const decompress = (
  compressed: Uint8Array,
  originalSize: number,
): Uint8Array | null => {
  if (originalSize <= 0 || originalSize > MAX_DECOMPRESSED_SIZE) {
    return null;
  }

  // deflate never emits a stream at least as long as its input here
  if (compressed.length >= originalSize) {
    console.warn(
      `[Compression] ${compressed.length} compressed bytes cannot expand to ${originalSize}`,
    );
    return null;
  }

  const output = new Uint8Array(originalSize);
  let written = 0;

  const inflator = new pako.Inflate();
  inflator.onData = (chunk) => {
    const bytes = chunk instanceof Uint8Array ? chunk : new Uint8Array(chunk);
    if (written + bytes.length > originalSize) {
      throw new InflateLimitExceeded();
    }
    output.set(bytes, written);
    written += bytes.length;
  };

  try {
    inflator.push(compressed, true);
  } catch (error) {
    if (error instanceof InflateLimitExceeded) {
      console.warn(
        `[Compression] Inflated output exceeds the declared ${originalSize} bytes, aborting`,
      );
      return null;
    }
    console.warn("[Compression] Inflate failed:", error);
    return null;
  }

  if (inflator.err) {
    console.warn(`[Compression] Inflate failed: ${inflator.msg}`);
    return null;
  }

  if (written !== originalSize) {
    console.warn(
      `[Compression] Size mismatch: expected ${originalSize}, got ${written}`,
    );
    return null;
  }

  return output;
};

/**
 * High byte diversity in the first 256 bytes usually means the payload is
 * already compressed (images, archives), so skip it.
 */
const shouldCompress = (data: Uint8Array): boolean => {
  if (data.length < COMPRESSION_THRESHOLD) {
    return false;
  }

  const sampleSize = Math.min(data.length, 256);
  const uniqueBytes = new Set(data.subarray(0, sampleSize));

  return uniqueBytes.size / sampleSize < 0.9;
};

export { compress, COMPRESSION_THRESHOLD, decompress, MAX_DECOMPRESSED_SIZE, shouldCompress };
