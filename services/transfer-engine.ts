import { EventEmitter } from "events";

import {
  BROADCAST,
  FrameReceivedEvent,
  TransportAdapter,
} from "@/modules/transport/src/Transport.types";
import MediaRepository from "@/repos/specs/media-repository";
import {
  InboxFullError,
  InvalidInputError,
  LinkError,
  MalformedFrameError,
  StorageError,
  TransferAbandonedError,
  TransferLimitError,
} from "@/types/errors";
import {
  Frame,
  FrameKind,
  isPeerId,
  MAX_TTL,
  PeerId,
  PendingSnapshot,
  ReceivedBinaryEvent,
  SendOptions,
  TransferId,
} from "@/types/global";
import { loadMeshConfig, MeshConfig } from "@/utils/config";
import { generateTransferId } from "@/utils/random";
import { shortId } from "@/utils/string";
import { Delivery, DeliveryRouter, RouterAction } from "./delivery-router";
import { fragment } from "./frag-service";
import FrameProcessorQueue from "./frame-processor-queue";
import { decodeFrame, encodeFrame } from "./frame-protocol-service";
import InboxService from "./inbox-service";
import { selectRelayTargets } from "./relay-fanout";
import { RetryScheduler } from "./retry-scheduler";
import { OutboundSource, TransferLedger } from "./transfer-ledger";

type TransferEngineOptions = {
  localPeerId: PeerId;
  transport: TransportAdapter;
  media: MediaRepository;
  config?: Partial<MeshConfig>;
  now?: () => number;
  random?: () => number;
};

type DeliveryFailedEvent = {
  transferId: TransferId;
  error: Error;
};

const MAX_ORIGINAL_TYPE_BYTES = 255;

const textEncoder = new TextEncoder();

/**
 * One mesh node's transfer subsystem. Every inbound frame, tick and user
 * request becomes a task on a single queue, so ledger, router and inbox
 * only ever see one writer.
 *
 * Events:
 * - "binary-received" (ReceivedBinaryEvent): a new inbound transfer landed
 * - "transfer-completed" (transferId): an outbound transfer was acknowledged
 * - "transfer-abandoned" (TransferAbandonedError): the retry ceiling was hit
 * - "transfer-expired" (TransferExpiredError): pending past transferExpiryMs
 * - "delivery-failed" (DeliveryFailedEvent): storage or inbox refused bytes
 */
class TransferEngine extends EventEmitter {
  readonly localPeerId: PeerId;
  readonly config: MeshConfig;

  private readonly transport: TransportAdapter;
  private readonly media: MediaRepository;
  private readonly now: () => number;
  private readonly queue = new FrameProcessorQueue();
  private readonly ledger: TransferLedger;
  private readonly router: DeliveryRouter;
  private readonly inbox: InboxService;
  private readonly scheduler: RetryScheduler;
  private mtuBytes: number;
  private unsubscribe: (() => void) | null = null;

  constructor(options: TransferEngineOptions) {
    super();

    if (!isPeerId(options.localPeerId)) {
      throw new InvalidInputError(`Malformed local peer id ${options.localPeerId}`);
    }

    this.localPeerId = options.localPeerId;
    this.transport = options.transport;
    this.media = options.media;
    this.now = options.now ?? Date.now;
    this.config = loadMeshConfig(options.config);
    this.mtuBytes = this.config.mtuBytes;

    this.ledger = new TransferLedger(this.config, this.now, options.random);
    this.router = new DeliveryRouter(
      {
        localPeerId: this.localPeerId,
        dedupWindowMs: this.config.dedupWindowMs,
        dedupCapacity: this.config.dedupCapacity,
        reassemblyTimeoutMs: this.config.reassemblyTimeoutMs,
        terminalRetentionMs: this.config.terminalRetentionMs,
        maxTrackedTransfers: this.config.maxTrackedTransfers,
      },
      this.now,
    );
    this.inbox = new InboxService(this.config.inboxCapacity);
    this.inbox.on("received", (event: ReceivedBinaryEvent) => {
      this.emit("binary-received", event);
    });
    this.scheduler = new RetryScheduler(
      this.ledger,
      (frame) => this.transport.send(BROADCAST, encodeFrame(frame)),
      this.config.retryTickIntervalMs,
    );
  }

  start(): void {
    if (this.unsubscribe) return;

    this.unsubscribe = this.transport.onFrameReceived((event) => {
      this.queue
        .enqueue("inbound-frame", () => this.handleInbound(event))
        .catch((error: unknown) => {
          console.error(`[Engine] Failed to process frame from ${event.fromPeer}:`, error);
        });
    });

    this.scheduler.start(() => {
      this.tick().catch((error: unknown) => {
        console.error("[Engine] Retry tick failed:", error);
      });
    });

    console.log(`[Engine] Node ${this.localPeerId} started`);
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.scheduler.stop();
    console.log(`[Engine] Node ${this.localPeerId} stopped`);
  }

  /** Payload bytes per chunk for transfers cut from now on */
  get mtu(): number {
    return this.mtuBytes;
  }

  // The link renegotiated its MTU; a manual retry re-cuts at the new size
  setMtu(bytes: number): void {
    if (!Number.isInteger(bytes) || bytes <= 0) {
      throw new InvalidInputError(`MTU must be a positive integer, got ${bytes}`);
    }
    this.mtuBytes = bytes;
  }

  /**
   * Fragment `data`, register it as pending and put the first copy of every
   * frame on the link.
   * @throws InvalidInputError for empty payloads or bad options
   * @throws TransferLimitError when maxPendingTransfers are already held
   */
  sendBinary(data: Uint8Array, options: SendOptions): Promise<TransferId> {
    return this.queue.enqueue("send", async () => {
      const recipient = options.recipient ?? null;
      const ttl = options.ttl ?? this.config.defaultTtl;

      if (recipient !== null && !isPeerId(recipient)) {
        throw new InvalidInputError(`Malformed recipient ${recipient}`);
      }
      if (!Number.isInteger(ttl) || ttl < 1 || ttl > MAX_TTL) {
        throw new InvalidInputError(`TTL must be within 1..${MAX_TTL}, got ${ttl}`);
      }
      if (textEncoder.encode(options.originalType).length > MAX_ORIGINAL_TYPE_BYTES) {
        throw new InvalidInputError(
          `originalType must be at most ${MAX_ORIGINAL_TYPE_BYTES} bytes`,
        );
      }

      if (this.ledger.size() >= this.config.maxPendingTransfers) {
        throw new TransferLimitError(this.config.maxPendingTransfers);
      }

      const transferId = this.register(
        {
          payload: data.slice(),
          mtu: this.mtuBytes,
          originalType: options.originalType,
          ttl,
        },
        recipient,
      );

      const result = await this.scheduler.attempt(transferId);
      if (result === "abandoned") {
        this.reportAbandoned(transferId);
      }

      return transferId;
    });
  }

  /**
   * Remove a received transfer from the inbox, or forget a failed outbound
   * transfer.
   */
  dismiss(transferId: TransferId): Promise<boolean> {
    return this.queue.enqueue("dismiss", () => {
      if (this.inbox.dismiss(transferId)) {
        return true;
      }

      if (this.ledger.get(transferId)?.status === "failed") {
        this.ledger.remove(transferId);
        this.router.releaseOrigin(transferId);
        return true;
      }

      return false;
    });
  }

  /** Re-emit everything pending, e.g. once connectivity returns */
  retryNow(): Promise<TransferId[]> {
    return this.queue.enqueue("retry-now", () => this.scheduler.retryAll());
  }

  /**
   * Manual retry: start the attempt count over and send right away. When the
   * MTU changed since the transfer was cut, the payload is cut again and goes
   * out under a new id, since receivers drop chunks whose count disagrees
   * with what they already hold.
   * @returns The id the transfer now travels under, or null if unknown
   */
  retryTransfer(transferId: TransferId): Promise<TransferId | null> {
    return this.queue.enqueue("retry-transfer", async () => {
      const record = this.ledger.get(transferId);
      const source = this.ledger.source(transferId);
      if (!record || !source) {
        return null;
      }

      let activeId = transferId;

      if (source.mtu === this.mtuBytes) {
        this.ledger.resetAttempts(transferId);
      } else {
        this.ledger.remove(transferId);
        this.router.releaseOrigin(transferId);
        activeId = this.register({ ...source, mtu: this.mtuBytes }, record.recipient);
        console.log(
          `[Engine] Re-cut ${shortId(transferId)} at MTU ${this.mtuBytes} as ${shortId(activeId)}`,
        );
      }

      const result = await this.scheduler.attempt(activeId);
      if (result === "abandoned") {
        this.reportAbandoned(activeId);
      }
      return activeId;
    });
  }

  tick(): Promise<void> {
    return this.queue.enqueue("tick", async () => {
      const outcome = await this.scheduler.runDue(this.now());

      for (const error of outcome.abandoned) {
        this.emit("transfer-abandoned", error);
      }

      for (const error of outcome.expired) {
        this.emit("transfer-expired", error);
      }

      this.router.prune();
    });
  }

  inboxSnapshot(): ReceivedBinaryEvent[] {
    return this.inbox.list();
  }

  pendingSnapshot(): PendingSnapshot {
    return this.ledger.snapshot();
  }

  whenIdle(): Promise<void> {
    return this.queue.idle();
  }

  private register(source: OutboundSource, recipient: PeerId | null): TransferId {
    const transferId = generateTransferId();
    const frames: Frame[] = fragment(source.payload, transferId, source.mtu).map(
      (chunk) => ({
        ...chunk,
        kind: FrameKind.DATA,
        ttl: source.ttl,
        recipient,
        originalType: source.originalType,
      }),
    );

    this.ledger.registerOutbound(transferId, frames, { recipient, source });
    this.router.registerOrigin(transferId);

    console.log(
      `[Engine] Sending ${shortId(transferId)}: ${source.payload.length} bytes in ${frames.length} frame(s), ttl ${source.ttl}`,
    );

    return transferId;
  }

  private async handleInbound(event: FrameReceivedEvent): Promise<void> {
    let frame: Frame;
    try {
      frame = decodeFrame(event.rawBytes);
    } catch (error) {
      if (error instanceof MalformedFrameError) {
        console.warn(`[Engine] Dropping frame from ${event.fromPeer}: ${error.message}`);
        return;
      }
      throw error;
    }

    const actions = this.router.handleFrame(frame, event.fromPeer);

    for (const action of actions) {
      await this.execute(action);
    }
  }

  private async execute(action: RouterAction): Promise<void> {
    switch (action.type) {
      case "relay": {
        const { frame } = action;
        const targets = selectRelayTargets(
          this.transport.connectedPeers(),
          action.exclude,
          this.config.relayFanout,
          `${frame.transferId}:${frame.kind}:${frame.sequenceIndex}`,
        );

        for (const target of targets) {
          await this.sendTo(target, frame);
        }
        return;
      }

      case "send":
        await this.sendTo(action.to, action.frame);
        return;

      case "deliver":
        if (await this.deliver(action.delivery)) {
          await this.sendTo(action.to, action.ack);
        }
        return;

      case "acknowledge": {
        const outcome =
          action.chunkIndex === null
            ? this.ledger.acknowledgeAll(action.transferId)
            : this.ledger.acknowledge(action.transferId, action.chunkIndex);

        if (outcome === "completed") {
          this.router.releaseOrigin(action.transferId);
          this.emit("transfer-completed", action.transferId);
        }
        return;
      }
    }
  }

  // Storage first, then the inbox. Any failure rolls the transfer back.
  // A new inbox entry reaches listeners through the inbox's "received".
  private async deliver(delivery: Delivery): Promise<boolean> {
    try {
      const location = await this.media.save(
        delivery.transferId,
        delivery.data,
        delivery.originalType,
      );

      this.inbox.insert({
        transferId: delivery.transferId,
        originalType: delivery.originalType,
        size: delivery.data.length,
        location,
        ttl: delivery.ttl,
        recipient: delivery.recipient,
        fromPeer: delivery.fromPeer,
        receivedAt: this.now(),
      });
    } catch (error) {
      this.router.rollbackDelivery(delivery.transferId);

      if (error instanceof StorageError || error instanceof InboxFullError) {
        console.error(
          `[Engine] Delivery of ${shortId(delivery.transferId)} failed:`,
          error.message,
        );
        const failed: DeliveryFailedEvent = { transferId: delivery.transferId, error };
        this.emit("delivery-failed", failed);
        return false;
      }

      throw error;
    }

    this.router.confirmDelivery(delivery.transferId);
    return true;
  }

  private async sendTo(target: PeerId, frame: Frame): Promise<void> {
    try {
      await this.transport.send(target, encodeFrame(frame));
    } catch (error) {
      if (error instanceof LinkError) {
        console.warn(
          `[Engine] Could not send ${frame.kind === FrameKind.ACK ? "ACK" : "frame"} of ${shortId(frame.transferId)} to ${target}: ${error.message}`,
        );
        return;
      }
      throw error;
    }
  }

  private reportAbandoned(transferId: TransferId): void {
    const attempts = this.ledger.get(transferId)?.attemptCount ?? 0;
    this.emit("transfer-abandoned", new TransferAbandonedError(transferId, attempts));
  }
}

export { DeliveryFailedEvent, TransferEngine, TransferEngineOptions };
