import { LinkError, TransferAbandonedError, TransferExpiredError } from "@/types/errors";
import { Frame, FrameKind } from "@/types/global";
import { RetryScheduler } from "../retry-scheduler";
import { TransferLedger } from "../transfer-ledger";

const TRANSFER_ID = "0123456789abcdef0123456789abcdef";

const frames: Frame[] = [0, 1].map((i) => ({
  kind: FrameKind.DATA,
  ttl: 3,
  recipient: null,
  originalType: "text/plain",
  transferId: TRANSFER_ID,
  sequenceIndex: i,
  totalChunks: 2,
  payloadSlice: new Uint8Array([i]),
  isFinal: i === 1,
}));

describe("RetryScheduler", () => {
  let now: number;
  let ledger: TransferLedger;
  let emitFrame: jest.Mock<Promise<void>, [Frame]>;
  let scheduler: RetryScheduler;

  beforeEach(() => {
    now = 0;
    ledger = new TransferLedger(
      {
        maxAttempts: 3,
        initialRetryDelayMs: 1000,
        maxRetryDelayMs: 8000,
        retryJitterRatio: 0,
        transferExpiryMs: 60_000,
      },
      () => now,
    );
    emitFrame = jest.fn<Promise<void>, [Frame]>().mockResolvedValue(undefined);
    scheduler = new RetryScheduler(ledger, emitFrame, 100);
    ledger.registerOutbound(TRANSFER_ID, frames, { recipient: null });

    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    scheduler.stop();
    jest.restoreAllMocks();
    jest.useRealTimers();
  });

  it("counts the initial emission as the first attempt", async () => {
    await expect(scheduler.attempt(TRANSFER_ID)).resolves.toBe("sent");

    expect(emitFrame).toHaveBeenCalledTimes(2);
    expect(ledger.get(TRANSFER_ID)).toMatchObject({
      attemptCount: 1,
      nextRetryDeadline: 1000,
    });
  });

  it("only re-emits transfers whose deadline passed", async () => {
    await scheduler.attempt(TRANSFER_ID);
    emitFrame.mockClear();

    now = 999;
    expect(await scheduler.runDue()).toEqual({ sent: [], abandoned: [], expired: [] });
    expect(emitFrame).not.toHaveBeenCalled();

    now = 1000;
    expect(await scheduler.runDue()).toEqual({ sent: [TRANSFER_ID], abandoned: [], expired: [] });
    expect(emitFrame).toHaveBeenCalledTimes(2);
  });

  it("re-emits only unacknowledged frames", async () => {
    await scheduler.attempt(TRANSFER_ID);
    emitFrame.mockClear();
    ledger.acknowledge(TRANSFER_ID, 0);

    now = 1000;
    await scheduler.runDue();

    expect(emitFrame).toHaveBeenCalledTimes(1);
    expect(emitFrame.mock.calls[0][0].sequenceIndex).toBe(1);
  });

  it("abandons after the ceiling and never ticks the transfer again", async () => {
    await scheduler.attempt(TRANSFER_ID);

    now = 1000;
    await scheduler.runDue();
    now = 3000;
    await scheduler.runDue();
    expect(ledger.get(TRANSFER_ID)?.attemptCount).toBe(3);

    now = 7000;
    const outcome = await scheduler.runDue();

    expect(outcome.sent).toEqual([]);
    expect(outcome.abandoned).toHaveLength(1);
    expect(outcome.abandoned[0]).toBeInstanceOf(TransferAbandonedError);
    expect(outcome.abandoned[0]).toMatchObject({ transferId: TRANSFER_ID, attempts: 3 });
    expect(emitFrame).toHaveBeenCalledTimes(6);

    now = 1_000_000;
    expect(await scheduler.runDue()).toEqual({ sent: [], abandoned: [], expired: [] });
    expect(emitFrame).toHaveBeenCalledTimes(6);
    expect(ledger.snapshot().failedTransferIds).toEqual([TRANSFER_ID]);
  });

  it("reports expired transfers instead of re-emitting them", async () => {
    await scheduler.attempt(TRANSFER_ID);
    emitFrame.mockClear();

    now = 60_000;
    const outcome = await scheduler.runDue();

    expect(outcome.sent).toEqual([]);
    expect(outcome.abandoned).toEqual([]);
    expect(outcome.expired).toHaveLength(1);
    expect(outcome.expired[0]).toBeInstanceOf(TransferExpiredError);
    expect(outcome.expired[0]).toMatchObject({ transferId: TRANSFER_ID, expiredAt: 60_000 });
    expect(emitFrame).not.toHaveBeenCalled();

    await expect(scheduler.retryAll()).resolves.toEqual([]);
  });

  it("keeps the transfer pending when the link fails", async () => {
    emitFrame.mockRejectedValueOnce(new LinkError("radio off"));

    await expect(scheduler.attempt(TRANSFER_ID)).resolves.toBe("link-error");

    expect(emitFrame).toHaveBeenCalledTimes(1);
    expect(ledger.get(TRANSFER_ID)).toMatchObject({ status: "pending", attemptCount: 1 });
  });

  it("propagates errors that are not link failures", async () => {
    emitFrame.mockRejectedValueOnce(new Error("encoder exploded"));

    await expect(scheduler.attempt(TRANSFER_ID)).rejects.toThrow("encoder exploded");
  });

  it("retries everything pending without consuming attempts", async () => {
    await scheduler.attempt(TRANSFER_ID);
    emitFrame.mockClear();

    now = 200;
    await expect(scheduler.retryAll()).resolves.toEqual([TRANSFER_ID]);

    expect(emitFrame).toHaveBeenCalledTimes(2);
    expect(ledger.get(TRANSFER_ID)).toMatchObject({
      attemptCount: 1,
      nextRetryDeadline: 1200,
    });
  });

  it("reports settled transfers without emitting", async () => {
    ledger.acknowledgeAll(TRANSFER_ID);

    await expect(scheduler.attempt(TRANSFER_ID)).resolves.toBe("settled");
    expect(emitFrame).not.toHaveBeenCalled();
  });

  it("fires the tick callback on its interval", () => {
    jest.useFakeTimers();
    const onTick = jest.fn();

    scheduler.start(onTick);
    jest.advanceTimersByTime(350);

    expect(onTick).toHaveBeenCalledTimes(3);
    expect(scheduler.isRunning()).toBe(true);

    scheduler.stop();
    jest.advanceTimersByTime(500);
    expect(onTick).toHaveBeenCalledTimes(3);
  });
});
