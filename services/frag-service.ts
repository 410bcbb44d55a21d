import { InvalidInputError } from "@/types/errors";
import { Chunk, isTransferId, TransferId } from "@/types/global";

type AssembleResult =
  | { status: "complete"; data: Uint8Array }
  | { status: "incomplete"; missing: number[] };

/**
 * Split a payload into MTU-sized chunks. Every chunk but the last is exactly
 * `mtu` bytes; the last carries the remainder and is marked final.
 */
const fragment = (
  payload: Uint8Array,
  transferId: TransferId,
  mtu: number,
): Chunk[] => {
  if (!Number.isInteger(mtu) || mtu <= 0) {
    throw new InvalidInputError(`MTU must be a positive integer, got ${mtu}`);
  }

  if (payload.length === 0) {
    throw new InvalidInputError("Cannot fragment an empty payload");
  }

  if (!isTransferId(transferId)) {
    throw new InvalidInputError(`Malformed transfer id ${transferId}`);
  }

  const totalChunks = Math.ceil(payload.length / mtu);
  const chunks: Chunk[] = [];

  for (let i = 0; i < totalChunks; i++) {
    const start = i * mtu;
    const end = Math.min(start + mtu, payload.length);

    chunks.push({
      transferId,
      sequenceIndex: i,
      totalChunks,
      payloadSlice: payload.slice(start, end),
      isFinal: i === totalChunks - 1,
    });
  }

  return chunks;
};

/**
 * Reassemble whatever chunks are at hand. Order and duplicates don't matter;
 * chunks of another transfer, chunks that disagree on totalChunks and
 * out-of-range indices are skipped.
 */
const tryAssemble = (chunks: Chunk[]): AssembleResult => {
  const slices = new Map<number, Uint8Array>();
  let transferId: TransferId | null = null;
  let totalChunks = 0;

  for (const chunk of chunks) {
    if (transferId === null) {
      if (!Number.isInteger(chunk.totalChunks) || chunk.totalChunks <= 0) {
        console.warn(
          `[Frag] Ignoring chunk with invalid totalChunks ${chunk.totalChunks}`,
        );
        continue;
      }
      transferId = chunk.transferId;
      totalChunks = chunk.totalChunks;
    }

    if (chunk.transferId !== transferId) {
      console.warn(
        `[Frag] Ignoring chunk of transfer ${chunk.transferId} while assembling ${transferId}`,
      );
      continue;
    }

    if (chunk.totalChunks !== totalChunks) {
      console.warn(
        `[Frag] Ignoring chunk claiming ${chunk.totalChunks} chunks, expected ${totalChunks}`,
      );
      continue;
    }

    if (
      !Number.isInteger(chunk.sequenceIndex) ||
      chunk.sequenceIndex < 0 ||
      chunk.sequenceIndex >= totalChunks
    ) {
      console.warn(
        `[Frag] Ignoring out-of-range chunk ${chunk.sequenceIndex} of ${totalChunks}`,
      );
      continue;
    }

    // first copy wins
    if (!slices.has(chunk.sequenceIndex)) {
      slices.set(chunk.sequenceIndex, chunk.payloadSlice);
    }
  }

  if (transferId === null) {
    return { status: "incomplete", missing: [] };
  }

  const missing: number[] = [];
  let size = 0;

  for (let i = 0; i < totalChunks; i++) {
    const slice = slices.get(i);
    if (slice === undefined) {
      missing.push(i);
    } else {
      size += slice.length;
    }
  }

  if (missing.length > 0) {
    return { status: "incomplete", missing };
  }

  const data = new Uint8Array(size);
  let offset = 0;

  for (let i = 0; i < totalChunks; i++) {
    const slice = slices.get(i);
    if (slice !== undefined) {
      data.set(slice, offset);
      offset += slice.length;
    }
  }

  return { status: "complete", data };
};

export { AssembleResult, fragment, tryAssemble };
