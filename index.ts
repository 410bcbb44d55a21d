export { LoopbackMesh, LoopbackTransport } from "@/modules/transport/src/LoopbackMesh";
export { BROADCAST } from "@/modules/transport/src/Transport.types";
export type {
  Broadcast,
  FrameListener,
  FrameReceivedEvent,
  TransportAdapter,
} from "@/modules/transport/src/Transport.types";
export { extensionFor, FsMediaRepository } from "@/repos/impls/fs-media-repository";
export { default as MemoryMediaRepository } from "@/repos/impls/memory-media-repository";
export type { default as MediaRepository } from "@/repos/specs/media-repository";
export { fragment, tryAssemble } from "@/services/frag-service";
export type { AssembleResult } from "@/services/frag-service";
export { decodeFrame, encodeFrame } from "@/services/frame-protocol-service";
export { TransferEngine } from "@/services/transfer-engine";
export type {
  DeliveryFailedEvent,
  TransferEngineOptions,
} from "@/services/transfer-engine";
export * from "@/types/errors";
export * from "@/types/global";
export { DEFAULT_MESH_CONFIG, loadMeshConfig } from "@/utils/config";
export type { MeshConfig, RelayFanout } from "@/utils/config";
