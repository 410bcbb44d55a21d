// 32 lowercase hex characters (16 random bytes) chosen by the originator
type TransferId = string;

// 16 lowercase hex characters (8 bytes)
type PeerId = string;

enum FrameKind {
  DATA, // slice of a transfer's payload
  ACK, // acknowledgement travelling back toward the originator
}

// One MTU-bounded slice of a transfer.
// - Note chunks are indexed 0..totalChunks-1 and only the last one is final
type Chunk = {
  transferId: TransferId;
  sequenceIndex: number;
  totalChunks: number;
  payloadSlice: Uint8Array;
  isFinal: boolean;
};

// The unit placed on the wire: a chunk plus the routing envelope.
// ACK frames reuse the envelope with an empty payload; an ACK with isFinal
// set covers every chunk of the transfer.
type Frame = Chunk & {
  kind: FrameKind;
  ttl: number;
  recipient: PeerId | null;
  originalType: string;
};

type TransferStatus = "pending" | "failed";

type PendingOutboundTransfer = {
  transferId: TransferId;
  unacknowledged: number[];
  totalChunks: number;
  attemptCount: number;
  nextRetryDeadline: number;
  status: TransferStatus;
  recipient: PeerId | null;
  createdAt: number;
  // still pending at this time means the transfer has expired
  expiresAt: number;
};

// A completed inbound transfer, as shown to the user
type ReceivedBinaryEvent = {
  transferId: TransferId;
  originalType: string;
  size: number;
  location: string;
  ttl: number;
  recipient: PeerId | null;
  fromPeer: PeerId;
  receivedAt: number;
};

type PendingSnapshot = {
  count: number;
  transferIds: TransferId[];
  failedTransferIds: TransferId[];
};

type SendOptions = {
  originalType: string;
  recipient?: PeerId | null;
  ttl?: number;
};

const TRANSFER_ID_BYTES = 16;
const PEER_ID_BYTES = 8;
const MAX_TTL = 255;

const isTransferId = (value: string): boolean =>
  new RegExp(`^[0-9a-f]{${TRANSFER_ID_BYTES * 2}}$`).test(value);

const isPeerId = (value: string): boolean =>
  new RegExp(`^[0-9a-f]{${PEER_ID_BYTES * 2}}$`).test(value);

export {
  Chunk,
  Frame,
  FrameKind,
  isPeerId,
  isTransferId,
  MAX_TTL,
  PEER_ID_BYTES,
  PeerId,
  PendingOutboundTransfer,
  PendingSnapshot,
  ReceivedBinaryEvent,
  SendOptions,
  TRANSFER_ID_BYTES,
  TransferId,
  TransferStatus,
};
