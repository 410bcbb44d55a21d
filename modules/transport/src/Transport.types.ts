import { PeerId } from "@/types/global";

// Send target meaning "every connected neighbour"
export const BROADCAST = "*";
export type Broadcast = typeof BROADCAST;

export type FrameReceivedEvent = {
  rawBytes: Uint8Array;
  fromPeer: PeerId;
};

export type FrameListener = (event: FrameReceivedEvent) => void;

/**
 * The link the engine runs over. Implementations own connection handling;
 * the engine only writes frames and listens for them.
 */
export interface TransportAdapter {
  /** Rejects with LinkError when the bytes could not be written */
  send(target: PeerId | Broadcast, bytes: Uint8Array): Promise<void>;
  connectedPeers(): PeerId[];
  /** @returns unsubscribe */
  onFrameReceived(listener: FrameListener): () => void;
}
