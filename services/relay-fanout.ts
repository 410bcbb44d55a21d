import { PeerId } from "@/types/global";
import { RelayFanout } from "@/utils/config";

const textEncoder = new TextEncoder();

// Rendezvous weight of a peer for one frame (32-bit FNV-1a over seed and peer)
const weightOf = (seed: string, peer: PeerId): number => {
  let hash = 0x811c9dc5;
  for (const byte of textEncoder.encode(`${seed}::${peer}`)) {
    hash = Math.imul(hash ^ byte, 0x01000193);
  }
  return hash >>> 0;
};

/**
 * Neighbours that should receive a relayed frame: every connected peer but
 * the one it came from. Under the logarithmic policy only the
 * ceil(log2 N) + 1 heaviest peers for this frame's seed are kept, so every
 * node seeing the same neighbours picks the same ones.
 */
function selectRelayTargets(
  connected: PeerId[],
  exclude: PeerId,
  policy: RelayFanout,
  seed: string,
): PeerId[] {
  const eligible = connected.filter((peer) => peer !== exclude);

  if (policy === "all" || eligible.length <= 2) {
    return eligible;
  }

  const keep = Math.ceil(Math.log2(eligible.length)) + 1;

  return eligible
    .map((peer) => ({ peer, weight: weightOf(seed, peer) }))
    .sort((a, b) => b.weight - a.weight || a.peer.localeCompare(b.peer))
    .slice(0, keep)
    .map(({ peer }) => peer);
}

export { selectRelayTargets };
