import TTLBloomFilter from "@/bloom/ttl-bloom-filter";
import { MalformedFrameError } from "@/types/errors";
import { Chunk, Frame, FrameKind, PeerId, TransferId } from "@/types/global";
import { shortId } from "@/utils/string";
import { tryAssemble } from "./frag-service";

type TransferPhase =
  | "origin"
  | "relaying"
  | "reassembling"
  | "delivered"
  | "expired";

type Delivery = {
  transferId: TransferId;
  data: Uint8Array;
  originalType: string;
  ttl: number;
  recipient: PeerId | null;
  fromPeer: PeerId;
};

type RouterAction =
  // hand a TTL-decremented copy to the neighbours, never back to `exclude`
  | { type: "relay"; frame: Frame; exclude: PeerId }
  // send one frame to a single neighbour
  | { type: "send"; frame: Frame; to: PeerId }
  // persist and surface the bytes, then send `ack` to `to`
  | { type: "deliver"; delivery: Delivery; ack: Frame; to: PeerId }
  // settle the local ledger; a null index acknowledges every chunk
  | { type: "acknowledge"; transferId: TransferId; chunkIndex: number | null };

type RouterOptions = {
  localPeerId: PeerId;
  dedupWindowMs: number;
  dedupCapacity: number;
  reassemblyTimeoutMs: number;
  terminalRetentionMs: number;
  maxTrackedTransfers: number;
};

type TransferState = {
  phase: Exclude<TransferPhase, "origin">;
  // whether this node passes the transfer's frames on
  relays: boolean;
  // neighbour the first frame came from; ACKs travel back to it
  upstream: PeerId | null;
  totalChunks: number;
  originalType: string;
  recipient: PeerId | null;
  chunks: Map<number, Chunk>;
  lastActivity: number;
};

const DEDUP_ERROR_RATE = 0.001;

const isTerminal = (state: TransferState): boolean =>
  state.phase === "delivered" || state.phase === "expired";

/**
 * Per-transfer state machine. Takes decoded frames and answers with the
 * actions the engine should carry out; it never touches the link itself.
 *
 * Transfers this node created are kept apart from `states`: the ones the
 * ledger still waits on sit in `outstanding` (bounded by the engine's
 * pending limit), finished ones in `originated` for `terminalRetentionMs`
 * so late echoes of our own frames are still recognised.
 */
class DeliveryRouter {
  private states = new Map<TransferId, TransferState>();
  private outstanding = new Set<TransferId>();
  private originated: TTLBloomFilter;
  private recentlySeen: TTLBloomFilter;
  private readonly options: RouterOptions;
  private readonly now: () => number;

  constructor(options: RouterOptions, now: () => number = Date.now) {
    this.options = options;
    this.now = now;
    this.recentlySeen = new TTLBloomFilter(
      options.dedupCapacity,
      DEDUP_ERROR_RATE,
      options.dedupWindowMs,
      now,
    );
    this.originated = new TTLBloomFilter(
      options.dedupCapacity,
      DEDUP_ERROR_RATE,
      options.terminalRetentionMs,
      now,
    );
  }

  registerOrigin(transferId: TransferId): void {
    this.outstanding.add(transferId);
    this.originated.add(transferId);
  }

  // The ledger no longer waits on this transfer
  releaseOrigin(transferId: TransferId): void {
    if (this.outstanding.delete(transferId)) {
      this.originated.add(transferId);
    }
  }

  isOwnTransfer(transferId: TransferId): boolean {
    return this.outstanding.has(transferId) || this.originated.has(transferId);
  }

  handleFrame(frame: Frame, fromPeer: PeerId): RouterAction[] {
    if (frame.kind === FrameKind.ACK) {
      return this.handleAck(frame, fromPeer);
    }
    return this.handleData(frame, fromPeer);
  }

  confirmDelivery(transferId: TransferId): void {
    const state = this.states.get(transferId);
    if (state?.phase === "delivered") {
      state.chunks.clear();
    }
  }

  /**
   * Storage or inbox refused the bytes. Back to reassembling with the chunks
   * kept, so the next copy of any frame completes the transfer again.
   */
  rollbackDelivery(transferId: TransferId): void {
    const state = this.states.get(transferId);
    if (state?.phase === "delivered") {
      state.phase = "reassembling";
      console.warn(
        `[Router] Delivery of ${shortId(transferId)} rolled back, waiting for a retransmission`,
      );
    }
  }

  phaseOf(transferId: TransferId): TransferPhase | "unknown" {
    if (this.isOwnTransfer(transferId)) {
      return "origin";
    }
    return this.states.get(transferId)?.phase ?? "unknown";
  }

  // Inbound transfers only; never more than maxTrackedTransfers
  trackedCount(): number {
    return this.states.size;
  }

  outstandingCount(): number {
    return this.outstanding.size;
  }

  /**
   * Drop idle reassembly and relay state and terminal state past its
   * retention, and expire dedup and own-transfer keys.
   * @returns Number of transfers forgotten
   */
  prune(now: number = this.now()): number {
    const stale: TransferId[] = [];

    for (const [transferId, state] of this.states) {
      const idle = now - state.lastActivity;

      if (isTerminal(state)) {
        if (idle >= this.options.terminalRetentionMs) stale.push(transferId);
      } else if (state.phase === "reassembling" || state.phase === "relaying") {
        if (idle >= this.options.reassemblyTimeoutMs) {
          if (state.phase === "reassembling") {
            console.warn(
              `[Router] Dropping stale reassembly of ${shortId(transferId)}: ${state.chunks.size}/${state.totalChunks} chunks`,
            );
          }
          stale.push(transferId);
        }
      }
    }

    for (const transferId of stale) {
      this.states.delete(transferId);
    }

    this.recentlySeen.pruneExpired();
    this.originated.pruneExpired();

    return stale.length;
  }

  private handleData(frame: Frame, fromPeer: PeerId): RouterAction[] {
    if (this.isOwnTransfer(frame.transferId)) {
      return [];
    }

    let state = this.states.get(frame.transferId);

    if (frame.ttl <= 0) {
      if (!state) {
        this.track(frame.transferId, this.newState(frame, fromPeer, "expired"));
      }
      console.warn(
        `[Router] Dropping frame ${frame.sequenceIndex} of ${shortId(frame.transferId)} with ttl ${frame.ttl}`,
      );
      return [];
    }

    if (!state) {
      const addressedHere =
        frame.recipient === null || frame.recipient === this.options.localPeerId;
      state = this.newState(frame, fromPeer, addressedHere ? "reassembling" : "relaying");
      this.track(frame.transferId, state);
    }

    if (state.phase === "expired") {
      return [];
    }

    if (frame.totalChunks !== state.totalChunks) {
      const error = new MalformedFrameError(
        `Frame claims ${frame.totalChunks} chunks, transfer ${shortId(frame.transferId)} has ${state.totalChunks}`,
      );
      console.warn("[Router] Dropping frame:", error);
      return [];
    }

    state.lastActivity = this.now();

    const actions: RouterAction[] = [];
    const relay = this.relayIfFresh(state, frame, fromPeer);
    if (relay) actions.push(relay);

    if (state.phase === "delivered") {
      // already handed over; answer again so a lost ACK gets replaced
      actions.push({ type: "send", frame: this.ackFor(frame, state), to: fromPeer });
      return actions;
    }

    if (state.phase === "relaying") {
      return actions;
    }

    if (!state.chunks.has(frame.sequenceIndex)) {
      state.chunks.set(frame.sequenceIndex, {
        transferId: frame.transferId,
        sequenceIndex: frame.sequenceIndex,
        totalChunks: frame.totalChunks,
        payloadSlice: frame.payloadSlice,
        isFinal: frame.isFinal,
      });
    }

    if (state.chunks.size < state.totalChunks) {
      return actions;
    }

    const result = tryAssemble(Array.from(state.chunks.values()));
    if (result.status !== "complete") {
      return actions;
    }

    state.phase = "delivered";
    console.log(
      `[Router] Transfer ${shortId(frame.transferId)} complete, ${result.data.length} bytes`,
    );

    actions.push({
      type: "deliver",
      delivery: {
        transferId: frame.transferId,
        data: result.data,
        originalType: state.originalType,
        ttl: frame.ttl,
        recipient: state.recipient,
        fromPeer,
      },
      ack: this.ackFor(frame, state),
      to: fromPeer,
    });

    return actions;
  }

  private handleAck(frame: Frame, fromPeer: PeerId): RouterAction[] {
    if (frame.ttl <= 0) {
      console.warn(`[Router] Dropping ACK for ${shortId(frame.transferId)} with ttl ${frame.ttl}`);
      return [];
    }

    if (this.outstanding.has(frame.transferId)) {
      return [
        {
          type: "acknowledge",
          transferId: frame.transferId,
          chunkIndex: frame.isFinal ? null : frame.sequenceIndex,
        },
      ];
    }

    // late ACK for a transfer of ours that is already settled
    if (this.originated.has(frame.transferId)) {
      return [];
    }

    const state = this.states.get(frame.transferId);
    if (!state) {
      return [];
    }

    state.lastActivity = this.now();

    if (
      !state.relays ||
      state.upstream === null ||
      state.upstream === fromPeer ||
      frame.ttl <= 1
    ) {
      return [];
    }

    if (this.recentlySeen.checkAndAdd(this.dedupKey(frame))) {
      return [];
    }

    return [{ type: "send", frame: { ...frame, ttl: frame.ttl - 1 }, to: state.upstream }];
  }

  private relayIfFresh(
    state: TransferState,
    frame: Frame,
    fromPeer: PeerId,
  ): RouterAction | null {
    if (!state.relays || frame.ttl <= 1) {
      return null;
    }

    if (this.recentlySeen.checkAndAdd(this.dedupKey(frame))) {
      return null;
    }

    return { type: "relay", frame: { ...frame, ttl: frame.ttl - 1 }, exclude: fromPeer };
  }

  private ackFor(frame: Frame, state: TransferState): Frame {
    return {
      kind: FrameKind.ACK,
      ttl: frame.ttl,
      recipient: null,
      originalType: state.originalType,
      transferId: frame.transferId,
      sequenceIndex: 0,
      totalChunks: state.totalChunks,
      payloadSlice: new Uint8Array(),
      isFinal: true,
    };
  }

  private dedupKey(frame: Frame): string {
    return `${frame.transferId}:${frame.kind}:${frame.sequenceIndex}`;
  }

  private newState(
    frame: Frame,
    fromPeer: PeerId,
    phase: TransferState["phase"],
  ): TransferState {
    return {
      phase,
      relays: frame.recipient !== this.options.localPeerId,
      upstream: fromPeer,
      totalChunks: frame.totalChunks,
      originalType: frame.originalType,
      recipient: frame.recipient,
      chunks: new Map(),
      lastActivity: this.now(),
    };
  }

  private track(transferId: TransferId, state: TransferState): void {
    this.makeRoom();
    this.states.set(transferId, state);
  }

  // Evict terminal state first, then whatever has been quiet longest
  private makeRoom(): void {
    while (this.states.size >= this.options.maxTrackedTransfers) {
      let victim: TransferId | null = null;
      let victimTerminal = false;
      let victimActivity = Infinity;

      for (const [transferId, state] of this.states) {
        const terminal = isTerminal(state);
        if (
          victim === null ||
          (terminal && !victimTerminal) ||
          (terminal === victimTerminal && state.lastActivity < victimActivity)
        ) {
          victim = transferId;
          victimTerminal = terminal;
          victimActivity = state.lastActivity;
        }
      }

      if (victim === null) return;

      console.warn(`[Router] Evicting state of ${shortId(victim)} to stay within bounds`);
      this.states.delete(victim);
    }
  }
}

export { Delivery, DeliveryRouter, RouterAction, RouterOptions, TransferPhase };
