import { LinkError } from "@/types/errors";
import { PeerId } from "@/types/global";
import {
  BROADCAST,
  Broadcast,
  FrameListener,
  TransportAdapter,
} from "./Transport.types";

type TrafficListener = (from: PeerId, to: PeerId, bytes: Uint8Array) => void;
type DropPredicate = (from: PeerId, to: PeerId, bytes: Uint8Array) => boolean;

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

class LoopbackTransport implements TransportAdapter {
  private listeners = new Set<FrameListener>();

  constructor(
    readonly peerId: PeerId,
    private readonly mesh: LoopbackMesh,
  ) {}

  send(target: PeerId | Broadcast, bytes: Uint8Array): Promise<void> {
    return this.mesh.transmit(this.peerId, target, bytes);
  }

  connectedPeers(): PeerId[] {
    return this.mesh.neighboursOf(this.peerId);
  }

  onFrameReceived(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  listenerCount(): number {
    return this.listeners.size;
  }

  deliver(fromPeer: PeerId, bytes: Uint8Array): void {
    for (const listener of this.listeners) {
      listener({ rawBytes: bytes, fromPeer });
    }
  }
}

/**
 * In-process mesh of transports joined by explicit links. Frames arrive on
 * a later turn of the event loop, one copy per receiving neighbour.
 */
class LoopbackMesh {
  private transports = new Map<PeerId, LoopbackTransport>();
  private links = new Map<PeerId, Set<PeerId>>();
  private downPeers = new Set<PeerId>();
  private trafficListeners = new Set<TrafficListener>();
  private dropPredicates = new Set<DropPredicate>();
  private inFlight = 0;
  private sentCount = 0;

  addPeer(peerId: PeerId): LoopbackTransport {
    const existing = this.transports.get(peerId);
    if (existing) return existing;

    const transport = new LoopbackTransport(peerId, this);
    this.transports.set(peerId, transport);
    this.links.set(peerId, new Set());
    return transport;
  }

  link(a: PeerId, b: PeerId): void {
    this.addPeer(a);
    this.addPeer(b);
    this.links.get(a)?.add(b);
    this.links.get(b)?.add(a);
  }

  unlink(a: PeerId, b: PeerId): void {
    this.links.get(a)?.delete(b);
    this.links.get(b)?.delete(a);
  }

  // While down, every send from the peer rejects with LinkError
  setLinkDown(peerId: PeerId, down: boolean): void {
    if (down) {
      this.downPeers.add(peerId);
    } else {
      this.downPeers.delete(peerId);
    }
  }

  // Observe every frame put on a link (dropped ones included)
  tap(listener: TrafficListener): () => void {
    this.trafficListeners.add(listener);
    return () => {
      this.trafficListeners.delete(listener);
    };
  }

  // Silently lose frames matching the predicate
  dropWhere(predicate: DropPredicate): () => void {
    this.dropPredicates.add(predicate);
    return () => {
      this.dropPredicates.delete(predicate);
    };
  }

  neighboursOf(peerId: PeerId): PeerId[] {
    return Array.from(this.links.get(peerId) ?? []);
  }

  pendingDeliveries(): number {
    return this.inFlight;
  }

  async transmit(from: PeerId, target: PeerId | Broadcast, bytes: Uint8Array): Promise<void> {
    if (this.downPeers.has(from)) {
      throw new LinkError(`Link of ${from} is down`);
    }

    const neighbours = this.links.get(from) ?? new Set<PeerId>();
    let targets: PeerId[];

    if (target === BROADCAST) {
      targets = Array.from(neighbours);
    } else if (neighbours.has(target)) {
      targets = [target];
    } else {
      throw new LinkError(`${from} is not connected to ${target}`);
    }

    for (const to of targets) {
      const copy = new Uint8Array(bytes);

      for (const listener of this.trafficListeners) {
        listener(from, to, copy);
      }

      if (Array.from(this.dropPredicates).some((drop) => drop(from, to, copy))) {
        continue;
      }

      this.inFlight++;
      this.sentCount++;
      setImmediate(() => {
        this.inFlight--;
        this.transports.get(to)?.deliver(from, copy);
      });
    }
  }

  /**
   * Wait until no frame is in flight and every `idle` hook has resolved with
   * nothing new put on the wire.
   */
  async settle(...idle: (() => Promise<void>)[]): Promise<void> {
    for (;;) {
      while (this.inFlight > 0) {
        await nextTurn();
      }

      const sentBefore = this.sentCount;
      await Promise.all(idle.map((wait) => wait()));
      await nextTurn();

      if (this.inFlight === 0 && this.sentCount === sentBefore) return;
    }
  }
}

export { LoopbackMesh, LoopbackTransport };
