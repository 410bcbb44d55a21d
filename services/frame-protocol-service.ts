import { InvalidInputError, MalformedFrameError } from "@/types/errors";
import {
  Frame,
  FrameKind,
  isPeerId,
  isTransferId,
  MAX_TTL,
  PEER_ID_BYTES,
  TRANSFER_ID_BYTES,
} from "@/types/global";
import { hexStringToUint8Array, uint8ArrayToHexString } from "@/utils/string";
import * as CompressionUtil from "./compression-service";

const FRAME_VERSION = 1;
const U32_MAX = 0xffffffff;
const MAX_ORIGINAL_TYPE_BYTES = 255;

const flags = {
  hasRecipient: 0x01,
  isFinal: 0x02,
  isCompressed: 0x04,
};

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

const pushU32 = (data: number[], value: number) => {
  for (let shift = 24; shift >= 0; shift -= 8) {
    data.push((value >>> shift) & 0xff);
  }
};

const validateFrame = (frame: Frame): Uint8Array => {
  if (frame.kind !== FrameKind.DATA && frame.kind !== FrameKind.ACK) {
    throw new InvalidInputError(`Unknown frame kind ${frame.kind}`);
  }

  if (!Number.isInteger(frame.ttl) || frame.ttl < 0 || frame.ttl > MAX_TTL) {
    throw new InvalidInputError(`TTL must be within 0..${MAX_TTL}, got ${frame.ttl}`);
  }

  if (!isTransferId(frame.transferId)) {
    throw new InvalidInputError(`Malformed transfer id ${frame.transferId}`);
  }

  if (frame.recipient !== null && !isPeerId(frame.recipient)) {
    throw new InvalidInputError(`Malformed recipient ${frame.recipient}`);
  }

  if (
    !Number.isInteger(frame.totalChunks) ||
    frame.totalChunks <= 0 ||
    frame.totalChunks > U32_MAX
  ) {
    throw new InvalidInputError(`Invalid totalChunks ${frame.totalChunks}`);
  }

  if (
    !Number.isInteger(frame.sequenceIndex) ||
    frame.sequenceIndex < 0 ||
    frame.sequenceIndex >= frame.totalChunks
  ) {
    throw new InvalidInputError(
      `sequenceIndex ${frame.sequenceIndex} out of range for ${frame.totalChunks} chunks`,
    );
  }

  if (frame.kind === FrameKind.DATA && frame.payloadSlice.length === 0) {
    throw new InvalidInputError("DATA frame without payload");
  }

  if (frame.kind === FrameKind.ACK && frame.payloadSlice.length !== 0) {
    throw new InvalidInputError("ACK frame must not carry a payload");
  }

  const originalType = textEncoder.encode(frame.originalType);
  if (originalType.length > MAX_ORIGINAL_TYPE_BYTES) {
    throw new InvalidInputError(
      `originalType is ${originalType.length} bytes, max ${MAX_ORIGINAL_TYPE_BYTES}`,
    );
  }

  return originalType;
};

/**
 * Encode a frame to its wire form. Throws InvalidInputError for frames that
 * cannot be represented.
 */
const encodeFrame = (frame: Frame): Uint8Array => {
  const originalType = validateFrame(frame);

  let payload = frame.payloadSlice;
  let originalPayloadSize: number | null = null;

  if (frame.kind === FrameKind.DATA) {
    const compressed = CompressionUtil.compress(payload);
    if (compressed) {
      originalPayloadSize = payload.length;
      payload = compressed;
    }
  }

  const data: number[] = [];

  data.push(FRAME_VERSION);
  data.push(frame.kind);
  data.push(frame.ttl);

  let flagsByte = 0;
  if (frame.recipient !== null) flagsByte |= flags.hasRecipient;
  if (frame.isFinal) flagsByte |= flags.isFinal;
  if (originalPayloadSize !== null) flagsByte |= flags.isCompressed;
  data.push(flagsByte);

  const transferIdBytes = hexStringToUint8Array(frame.transferId, TRANSFER_ID_BYTES);
  if (!transferIdBytes) {
    throw new InvalidInputError(`Malformed transfer id ${frame.transferId}`);
  }
  data.push(...transferIdBytes);

  if (frame.recipient !== null) {
    const recipientBytes = hexStringToUint8Array(frame.recipient, PEER_ID_BYTES);
    if (!recipientBytes) {
      throw new InvalidInputError(`Malformed recipient ${frame.recipient}`);
    }
    data.push(...recipientBytes);
  }

  data.push(originalType.length);
  data.push(...originalType);

  pushU32(data, frame.sequenceIndex);
  pushU32(data, frame.totalChunks);
  pushU32(data, payload.length);

  if (originalPayloadSize !== null) {
    pushU32(data, originalPayloadSize);
  }

  const result = new Uint8Array(data.length + payload.length);
  result.set(data, 0);
  result.set(payload, data.length);

  return result;
};

/**
 * Decode a wire frame. Throws MalformedFrameError on anything that is not
 * exactly one well-formed frame.
 */
const decodeFrame = (raw: Uint8Array): Frame => {
  let offset = 0;

  const require = (n: number, field: string) => {
    if (offset + n > raw.length) {
      throw new MalformedFrameError(
        `Truncated frame: need ${n} bytes for ${field} at offset ${offset}, have ${raw.length - offset}`,
      );
    }
  };

  const read8 = (field: string): number => {
    require(1, field);
    return raw[offset++];
  };

  const read32 = (field: string): number => {
    require(4, field);
    const value =
      ((raw[offset] << 24) |
        (raw[offset + 1] << 16) |
        (raw[offset + 2] << 8) |
        raw[offset + 3]) >>>
      0;
    offset += 4;
    return value;
  };

  const readData = (n: number, field: string): Uint8Array => {
    require(n, field);
    const data = raw.slice(offset, offset + n);
    offset += n;
    return data;
  };

  const version = read8("version");
  if (version !== FRAME_VERSION) {
    throw new MalformedFrameError(`Unknown frame version ${version}`);
  }

  const kindByte = read8("kind");
  let kind: FrameKind;
  if (kindByte === FrameKind.DATA) {
    kind = FrameKind.DATA;
  } else if (kindByte === FrameKind.ACK) {
    kind = FrameKind.ACK;
  } else {
    throw new MalformedFrameError(`Unknown frame kind ${kindByte}`);
  }

  const ttl = read8("ttl");
  const flagsByte = read8("flags");

  const hasRecipient = (flagsByte & flags.hasRecipient) !== 0;
  const isFinal = (flagsByte & flags.isFinal) !== 0;
  const isCompressed = (flagsByte & flags.isCompressed) !== 0;

  const transferId = uint8ArrayToHexString(readData(TRANSFER_ID_BYTES, "transferId"));

  const recipient = hasRecipient
    ? uint8ArrayToHexString(readData(PEER_ID_BYTES, "recipient"))
    : null;

  const originalTypeLength = read8("originalType length");
  let originalType: string;
  try {
    originalType = textDecoder.decode(readData(originalTypeLength, "originalType"));
  } catch (error) {
    if (error instanceof MalformedFrameError) throw error;
    throw new MalformedFrameError("originalType is not valid UTF-8");
  }

  const sequenceIndex = read32("sequenceIndex");
  const totalChunks = read32("totalChunks");
  const payloadLength = read32("payload length");
  const originalSize = isCompressed ? read32("original size") : null;

  let payloadSlice = readData(payloadLength, "payload");

  if (offset !== raw.length) {
    throw new MalformedFrameError(
      `${raw.length - offset} trailing bytes after frame`,
    );
  }

  if (totalChunks === 0) {
    throw new MalformedFrameError("totalChunks must not be zero");
  }

  if (sequenceIndex >= totalChunks) {
    throw new MalformedFrameError(
      `sequenceIndex ${sequenceIndex} out of range for ${totalChunks} chunks`,
    );
  }

  if (kind === FrameKind.ACK && (payloadLength !== 0 || isCompressed)) {
    throw new MalformedFrameError("ACK frame carries a payload");
  }

  if (kind === FrameKind.DATA && payloadLength === 0) {
    throw new MalformedFrameError("DATA frame without payload");
  }

  if (originalSize !== null) {
    const inflated = CompressionUtil.decompress(payloadSlice, originalSize);
    if (!inflated) {
      throw new MalformedFrameError(
        `Payload failed to decompress to ${originalSize} bytes`,
      );
    }
    payloadSlice = inflated;
  }

  return {
    kind,
    ttl,
    recipient,
    originalType,
    transferId,
    sequenceIndex,
    totalChunks,
    payloadSlice,
    isFinal,
  };
};

export { decodeFrame, encodeFrame, flags as frameFlags, FRAME_VERSION };
