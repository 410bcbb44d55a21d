import { TransferId } from "./global";

/**
 * Base class for every error raised by the transfer engine.
 */
class MeshError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Malformed fragmentation or send request. Fatal to that call, never retried.
class InvalidInputError extends MeshError {}

// Frame with an out-of-range index, inconsistent totalChunks, or bytes that do
// not decode. Logged and dropped.
class MalformedFrameError extends MeshError {}

// Transport write failure. Handled by the retry path.
class LinkError extends MeshError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

class TransferAbandonedError extends MeshError {
  readonly transferId: TransferId;
  readonly attempts: number;

  constructor(transferId: TransferId, attempts: number) {
    super(`Transfer ${transferId} abandoned after ${attempts} attempts`);
    this.transferId = transferId;
    this.attempts = attempts;
  }
}

// Pending for longer than transferExpiryMs. Terminal until manually retried.
class TransferExpiredError extends MeshError {
  readonly transferId: TransferId;
  readonly expiredAt: number;

  constructor(transferId: TransferId, expiredAt: number) {
    super(`Transfer ${transferId} expired without an acknowledgement`);
    this.transferId = transferId;
    this.expiredAt = expiredAt;
  }
}

// Too many outbound transfers are unsettled to accept another one
class TransferLimitError extends MeshError {
  readonly limit: number;

  constructor(limit: number) {
    super(`Already ${limit} outbound transfers in flight or failed; settle or dismiss some first`);
    this.limit = limit;
  }
}

class StorageError extends MeshError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

class InboxFullError extends MeshError {
  readonly capacity: number;

  constructor(capacity: number) {
    super(`Inbox is full (capacity ${capacity})`);
    this.capacity = capacity;
  }
}

export {
  InboxFullError,
  InvalidInputError,
  LinkError,
  MalformedFrameError,
  MeshError,
  StorageError,
  TransferAbandonedError,
  TransferExpiredError,
  TransferLimitError,
};
