import { InvalidInputError, TransferAbandonedError } from "@/types/errors";
import {
  Frame,
  PeerId,
  PendingOutboundTransfer,
  PendingSnapshot,
  TransferId,
} from "@/types/global";
import { shortId } from "@/utils/string";

type AckOutcome = "completed" | "partial" | "duplicate" | "unknown";

type LedgerPolicy = {
  maxAttempts: number;
  initialRetryDelayMs: number;
  maxRetryDelayMs: number;
  retryJitterRatio: number;
  /** How long a transfer may stay pending before it is given up */
  transferExpiryMs: number;
};

// What the transfer was cut from, kept so a manual retry can cut it again
type OutboundSource = {
  payload: Uint8Array;
  mtu: number;
  originalType: string;
  ttl: number;
};

type LedgerEntry = {
  record: PendingOutboundTransfer;
  frames: Map<number, Frame>;
  source: OutboundSource | null;
};

/**
 * Outbound transfers that still wait for acknowledgement. Owned by the
 * engine task; nothing else writes to it.
 */
class TransferLedger {
  private entries = new Map<TransferId, LedgerEntry>();
  private readonly policy: LedgerPolicy;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(
    policy: LedgerPolicy,
    now: () => number = Date.now,
    random: () => number = Math.random,
  ) {
    this.policy = policy;
    this.now = now;
    this.random = random;
  }

  registerOutbound(
    transferId: TransferId,
    frames: Frame[],
    options: { recipient: PeerId | null; source?: OutboundSource },
  ): PendingOutboundTransfer {
    if (this.entries.has(transferId)) {
      throw new InvalidInputError(`Transfer ${transferId} is already registered`);
    }

    if (frames.length === 0) {
      throw new InvalidInputError(`Transfer ${transferId} has no frames`);
    }

    const byIndex = new Map<number, Frame>();
    for (const frame of frames) {
      byIndex.set(frame.sequenceIndex, frame);
    }

    const now = this.now();
    const record: PendingOutboundTransfer = {
      transferId,
      unacknowledged: Array.from(byIndex.keys()).sort((a, b) => a - b),
      totalChunks: frames[0].totalChunks,
      attemptCount: 0,
      nextRetryDeadline: now,
      status: "pending",
      recipient: options.recipient,
      createdAt: now,
      expiresAt: now + this.policy.transferExpiryMs,
    };

    this.entries.set(transferId, {
      record,
      frames: byIndex,
      source: options.source ?? null,
    });
    return { ...record, unacknowledged: [...record.unacknowledged] };
  }

  acknowledge(transferId: TransferId, chunkIndex: number): AckOutcome {
    const entry = this.entries.get(transferId);
    if (!entry) {
      return "unknown";
    }

    const { record } = entry;
    const position = record.unacknowledged.indexOf(chunkIndex);
    if (position === -1) {
      return "duplicate";
    }

    record.unacknowledged.splice(position, 1);

    if (record.unacknowledged.length === 0) {
      this.entries.delete(transferId);
      console.log(`[Ledger] Transfer ${shortId(transferId)} fully acknowledged`);
      return "completed";
    }

    return "partial";
  }

  acknowledgeAll(transferId: TransferId): AckOutcome {
    const entry = this.entries.get(transferId);
    if (!entry) {
      return "unknown";
    }

    this.entries.delete(transferId);
    console.log(`[Ledger] Transfer ${shortId(transferId)} fully acknowledged`);
    return "completed";
  }

  /**
   * Count one more transmission and push the deadline out by the backoff.
   * Throws TransferAbandonedError when the ceiling would be exceeded; the
   * record is then kept as failed.
   */
  markAttempt(transferId: TransferId): PendingOutboundTransfer {
    const record = this.requireRecord(transferId);

    if (record.status === "failed" || record.attemptCount >= this.policy.maxAttempts) {
      record.status = "failed";
      throw new TransferAbandonedError(transferId, record.attemptCount);
    }

    record.attemptCount += 1;
    record.nextRetryDeadline = this.now() + this.backoffDelay(record.attemptCount);

    return { ...record, unacknowledged: [...record.unacknowledged] };
  }

  // Push the deadline out without consuming an attempt
  reschedule(transferId: TransferId): void {
    const record = this.requireRecord(transferId);
    record.nextRetryDeadline =
      this.now() + this.backoffDelay(Math.max(record.attemptCount, 1));
  }

  // Manual retry: pending again, due now, with a fresh expiry
  resetAttempts(transferId: TransferId): void {
    const record = this.requireRecord(transferId);
    const now = this.now();
    record.status = "pending";
    record.attemptCount = 0;
    record.nextRetryDeadline = now;
    record.expiresAt = now + this.policy.transferExpiryMs;
  }

  /**
   * Mark every pending transfer past its expiry as failed.
   * @returns The transfers that expired just now
   */
  expire(now: number = this.now()): TransferId[] {
    const expired: TransferId[] = [];

    for (const [transferId, { record }] of this.entries) {
      if (record.status === "pending" && record.expiresAt <= now) {
        record.status = "failed";
        expired.push(transferId);
      }
    }

    return expired;
  }

  dueForRetry(now: number = this.now()): TransferId[] {
    const due: TransferId[] = [];

    for (const [transferId, { record }] of this.entries) {
      if (
        record.status === "pending" &&
        record.nextRetryDeadline <= now &&
        record.expiresAt > now
      ) {
        due.push(transferId);
      }
    }

    return due;
  }

  pendingTransferIds(now: number = this.now()): TransferId[] {
    return Array.from(this.entries.values())
      .filter(({ record }) => record.status === "pending" && record.expiresAt > now)
      .map(({ record }) => record.transferId);
  }

  source(transferId: TransferId): OutboundSource | null {
    return this.entries.get(transferId)?.source ?? null;
  }

  unacknowledgedFrames(transferId: TransferId): Frame[] {
    const entry = this.entries.get(transferId);
    if (!entry) {
      return [];
    }

    const frames: Frame[] = [];
    for (const index of entry.record.unacknowledged) {
      const frame = entry.frames.get(index);
      if (frame) {
        frames.push(frame);
      }
    }
    return frames;
  }

  get(transferId: TransferId): PendingOutboundTransfer | null {
    const entry = this.entries.get(transferId);
    if (!entry) {
      return null;
    }
    return { ...entry.record, unacknowledged: [...entry.record.unacknowledged] };
  }

  has(transferId: TransferId): boolean {
    return this.entries.has(transferId);
  }

  remove(transferId: TransferId): boolean {
    return this.entries.delete(transferId);
  }

  // Pending and failed records alike
  size(): number {
    return this.entries.size;
  }

  snapshot(): PendingSnapshot {
    const transferIds: TransferId[] = [];
    const failedTransferIds: TransferId[] = [];

    for (const { record } of this.entries.values()) {
      if (record.status === "failed") {
        failedTransferIds.push(record.transferId);
      } else {
        transferIds.push(record.transferId);
      }
    }

    return { count: transferIds.length, transferIds, failedTransferIds };
  }

  private backoffDelay(attempt: number): number {
    const { initialRetryDelayMs, maxRetryDelayMs, retryJitterRatio } = this.policy;

    const base = Math.min(
      initialRetryDelayMs * Math.pow(2, attempt - 1),
      maxRetryDelayMs,
    );

    if (retryJitterRatio === 0) {
      return base;
    }

    // uniform in [base * (1 - r), base * (1 + r)]
    const spread = base * retryJitterRatio;
    return Math.max(0, Math.round(base - spread + this.random() * 2 * spread));
  }

  private requireRecord(transferId: TransferId): PendingOutboundTransfer {
    const entry = this.entries.get(transferId);
    if (!entry) {
      throw new InvalidInputError(`Unknown transfer ${transferId}`);
    }
    return entry.record;
  }
}

export { AckOutcome, LedgerPolicy, OutboundSource, TransferLedger };
