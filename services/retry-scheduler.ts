import { LinkError, TransferAbandonedError, TransferExpiredError } from "@/types/errors";
import { Frame, TransferId } from "@/types/global";
import { shortId } from "@/utils/string";
import { TransferLedger } from "./transfer-ledger";

type AttemptResult = "sent" | "link-error" | "abandoned" | "settled";

type TickOutcome = {
  sent: TransferId[];
  abandoned: TransferAbandonedError[];
  expired: TransferExpiredError[];
};

type FrameEmitter = (frame: Frame) => Promise<void>;

/**
 * Re-emits unacknowledged frames of overdue transfers. Holds no state of
 * its own beyond the timer; every decision reads and writes the ledger.
 */
class RetryScheduler {
  private readonly ledger: TransferLedger;
  private readonly emitFrame: FrameEmitter;
  private readonly tickIntervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(ledger: TransferLedger, emitFrame: FrameEmitter, tickIntervalMs: number) {
    this.ledger = ledger;
    this.emitFrame = emitFrame;
    this.tickIntervalMs = tickIntervalMs;
  }

  /**
   * Calls `onTick` every interval until stopped. The callback is expected to
   * queue the real work; the timer does not keep the process alive.
   */
  start(onTick: () => void): void {
    this.stop();
    this.timer = setInterval(onTick, this.tickIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Count an attempt and put the transfer's unacknowledged frames on the link.
   */
  async attempt(transferId: TransferId): Promise<AttemptResult> {
    if (!this.ledger.has(transferId)) {
      return "settled";
    }

    try {
      this.ledger.markAttempt(transferId);
    } catch (error) {
      if (error instanceof TransferAbandonedError) {
        console.warn(`[Retry] ${error.message}`);
        return "abandoned";
      }
      throw error;
    }

    return this.emit(transferId);
  }

  /**
   * Give up on transfers past their expiry, then re-emit whatever is due.
   */
  async runDue(now?: number): Promise<TickOutcome> {
    const outcome: TickOutcome = { sent: [], abandoned: [], expired: [] };

    for (const transferId of this.ledger.expire(now)) {
      const expiresAt = this.ledger.get(transferId)?.expiresAt ?? 0;
      console.warn(`[Retry] Transfer ${shortId(transferId)} expired, giving up`);
      outcome.expired.push(new TransferExpiredError(transferId, expiresAt));
    }

    for (const transferId of this.ledger.dueForRetry(now)) {
      const result = await this.attempt(transferId);

      if (result === "abandoned") {
        const record = this.ledger.get(transferId);
        outcome.abandoned.push(
          new TransferAbandonedError(transferId, record?.attemptCount ?? 0),
        );
      } else if (result === "sent") {
        outcome.sent.push(transferId);
      }
    }

    return outcome;
  }

  /**
   * Re-emit every pending transfer regardless of its deadline, typically
   * once a link comes back. Attempts are not consumed.
   */
  async retryAll(): Promise<TransferId[]> {
    const sent: TransferId[] = [];

    for (const transferId of this.ledger.pendingTransferIds()) {
      const result = await this.emit(transferId);
      if (!this.ledger.has(transferId)) continue;

      this.ledger.reschedule(transferId);
      if (result === "sent") sent.push(transferId);
    }

    return sent;
  }

  private async emit(transferId: TransferId): Promise<AttemptResult> {
    const frames = this.ledger.unacknowledgedFrames(transferId);

    console.log(
      `[Retry] Emitting ${frames.length} frame(s) of ${shortId(transferId)}`,
    );

    for (const frame of frames) {
      try {
        await this.emitFrame(frame);
      } catch (error) {
        if (error instanceof LinkError) {
          console.warn(
            `[Retry] Link failed for ${shortId(transferId)}, keeping it pending:`,
            error.message,
          );
          return "link-error";
        }
        throw error;
      }
    }

    return "sent";
  }
}

export { AttemptResult, FrameEmitter, RetryScheduler, TickOutcome };
