import { LinkError } from "@/types/errors";
import { LoopbackMesh } from "../src/LoopbackMesh";
import { BROADCAST, FrameReceivedEvent } from "../src/Transport.types";

const A = "aaaaaaaaaaaaaaaa";
const B = "bbbbbbbbbbbbbbbb";
const C = "cccccccccccccccc";

describe("LoopbackMesh", () => {
  let mesh: LoopbackMesh;

  beforeEach(() => {
    mesh = new LoopbackMesh();
    mesh.link(A, B);
    mesh.link(A, C);
  });

  it("broadcasts to every linked neighbour on a later turn", async () => {
    const atB: FrameReceivedEvent[] = [];
    const atC: FrameReceivedEvent[] = [];
    mesh.addPeer(B).onFrameReceived((e) => atB.push(e));
    mesh.addPeer(C).onFrameReceived((e) => atC.push(e));

    await mesh.addPeer(A).send(BROADCAST, new Uint8Array([1, 2]));
    expect(atB).toEqual([]);

    await mesh.settle();

    expect(atB).toEqual([{ rawBytes: new Uint8Array([1, 2]), fromPeer: A }]);
    expect(atC).toEqual([{ rawBytes: new Uint8Array([1, 2]), fromPeer: A }]);
  });

  it("sends to a single neighbour and rejects strangers", async () => {
    const atC = jest.fn();
    mesh.addPeer(C).onFrameReceived(atC);

    await mesh.addPeer(B).send(A, new Uint8Array([7]));
    await expect(mesh.addPeer(B).send(C, new Uint8Array([7]))).rejects.toThrow(LinkError);

    await mesh.settle();
    expect(atC).not.toHaveBeenCalled();
  });

  it("rejects every send while a link is down", async () => {
    mesh.setLinkDown(A, true);
    await expect(mesh.addPeer(A).send(BROADCAST, new Uint8Array([1]))).rejects.toThrow(
      LinkError,
    );

    mesh.setLinkDown(A, false);
    await expect(mesh.addPeer(A).send(BROADCAST, new Uint8Array([1]))).resolves.toBeUndefined();
  });

  it("reports traffic and drops what it is told to", async () => {
    const seen: string[] = [];
    const atB = jest.fn();
    mesh.addPeer(B).onFrameReceived(atB);
    mesh.tap((from, to) => seen.push(`${from[0]}>${to[0]}`));
    const restore = mesh.dropWhere((_, to) => to === B);

    await mesh.addPeer(A).send(BROADCAST, new Uint8Array([1]));
    await mesh.settle();

    expect(seen).toEqual(["a>b", "a>c"]);
    expect(atB).not.toHaveBeenCalled();

    restore();
    await mesh.addPeer(A).send(B, new Uint8Array([1]));
    await mesh.settle();
    expect(atB).toHaveBeenCalledTimes(1);
  });

  it("stops delivering after unsubscribe and unlink", async () => {
    const atB = jest.fn();
    const unsubscribe = mesh.addPeer(B).onFrameReceived(atB);

    unsubscribe();
    await mesh.addPeer(A).send(B, new Uint8Array([1]));
    await mesh.settle();
    expect(atB).not.toHaveBeenCalled();

    mesh.unlink(A, B);
    expect(mesh.addPeer(A).connectedPeers()).toEqual([C]);
  });
});
