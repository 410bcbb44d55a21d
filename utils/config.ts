import appConfig from "@/app.json";
import { InvalidInputError } from "@/types/errors";
import { MAX_TTL } from "@/types/global";

type RelayFanout = "all" | "logarithmic";

type MeshConfig = {
  /** Payload bytes per chunk */
  mtuBytes: number;
  defaultTtl: number;
  /** Total transmissions allowed, the initial send included */
  maxAttempts: number;
  initialRetryDelayMs: number;
  maxRetryDelayMs: number;
  /** 0..1, spread applied around each backoff delay */
  retryJitterRatio: number;
  retryTickIntervalMs: number;
  /** A transfer still unacknowledged this long after it was queued is given up */
  transferExpiryMs: number;
  /** Outbound transfers held at once, failed ones included */
  maxPendingTransfers: number;
  /** How long a relayed frame key suppresses copies of the same frame */
  dedupWindowMs: number;
  dedupCapacity: number;
  reassemblyTimeoutMs: number;
  terminalRetentionMs: number;
  maxTrackedTransfers: number;
  inboxCapacity: number;
  relayFanout: RelayFanout;
};

const DEFAULT_MESH_CONFIG: MeshConfig = {
  mtuBytes: 180,
  defaultTtl: 3,
  maxAttempts: 5,
  initialRetryDelayMs: 5000,
  maxRetryDelayMs: 5 * 60 * 1000,
  retryJitterRatio: 0,
  retryTickIntervalMs: 1000,
  transferExpiryMs: 6 * 60 * 60 * 1000,
  maxPendingTransfers: 64,
  dedupWindowMs: 2000,
  dedupCapacity: 1000,
  reassemblyTimeoutMs: 2 * 60 * 1000,
  terminalRetentionMs: 10 * 60 * 1000,
  maxTrackedTransfers: 256,
  inboxCapacity: 100,
  relayFanout: "all",
};

const isRelayFanout = (value: unknown): value is RelayFanout =>
  value === "all" || value === "logarithmic";

const requirePositiveInteger = (name: keyof MeshConfig, value: number) => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidInputError(`${name} must be a positive integer, got ${value}`);
  }
};

const validate = (config: MeshConfig): MeshConfig => {
  requirePositiveInteger("mtuBytes", config.mtuBytes);
  requirePositiveInteger("maxAttempts", config.maxAttempts);
  requirePositiveInteger("initialRetryDelayMs", config.initialRetryDelayMs);
  requirePositiveInteger("maxRetryDelayMs", config.maxRetryDelayMs);
  requirePositiveInteger("retryTickIntervalMs", config.retryTickIntervalMs);
  requirePositiveInteger("transferExpiryMs", config.transferExpiryMs);
  requirePositiveInteger("maxPendingTransfers", config.maxPendingTransfers);
  requirePositiveInteger("dedupWindowMs", config.dedupWindowMs);
  requirePositiveInteger("dedupCapacity", config.dedupCapacity);
  requirePositiveInteger("reassemblyTimeoutMs", config.reassemblyTimeoutMs);
  requirePositiveInteger("terminalRetentionMs", config.terminalRetentionMs);
  requirePositiveInteger("maxTrackedTransfers", config.maxTrackedTransfers);
  requirePositiveInteger("inboxCapacity", config.inboxCapacity);

  if (
    !Number.isInteger(config.defaultTtl) ||
    config.defaultTtl < 1 ||
    config.defaultTtl > MAX_TTL
  ) {
    throw new InvalidInputError(
      `defaultTtl must be between 1 and ${MAX_TTL}, got ${config.defaultTtl}`,
    );
  }

  if (config.retryJitterRatio < 0 || config.retryJitterRatio > 1) {
    throw new InvalidInputError(
      `retryJitterRatio must be within 0..1, got ${config.retryJitterRatio}`,
    );
  }

  if (config.maxRetryDelayMs < config.initialRetryDelayMs) {
    throw new InvalidInputError(
      "maxRetryDelayMs must not be smaller than initialRetryDelayMs",
    );
  }

  if (config.dedupWindowMs >= config.initialRetryDelayMs) {
    // relays would swallow the first retransmission
    throw new InvalidInputError(
      "dedupWindowMs must be shorter than initialRetryDelayMs",
    );
  }

  return config;
};

/**
 * Resolve the engine configuration: explicit overrides first, then the
 * `extra.mesh` block of app.json, then the built-in defaults.
 */
const loadMeshConfig = (overrides: Partial<MeshConfig> = {}): MeshConfig => {
  const fromFile = appConfig.extra?.mesh;
  const fileFanout: unknown = fromFile?.relayFanout;

  const merged: MeshConfig = {
    mtuBytes: overrides.mtuBytes ?? fromFile?.mtuBytes ?? DEFAULT_MESH_CONFIG.mtuBytes,
    defaultTtl:
      overrides.defaultTtl ?? fromFile?.defaultTtl ?? DEFAULT_MESH_CONFIG.defaultTtl,
    maxAttempts:
      overrides.maxAttempts ?? fromFile?.maxAttempts ?? DEFAULT_MESH_CONFIG.maxAttempts,
    initialRetryDelayMs:
      overrides.initialRetryDelayMs ??
      fromFile?.initialRetryDelayMs ??
      DEFAULT_MESH_CONFIG.initialRetryDelayMs,
    maxRetryDelayMs:
      overrides.maxRetryDelayMs ??
      fromFile?.maxRetryDelayMs ??
      DEFAULT_MESH_CONFIG.maxRetryDelayMs,
    retryJitterRatio:
      overrides.retryJitterRatio ??
      fromFile?.retryJitterRatio ??
      DEFAULT_MESH_CONFIG.retryJitterRatio,
    retryTickIntervalMs:
      overrides.retryTickIntervalMs ??
      fromFile?.retryTickIntervalMs ??
      DEFAULT_MESH_CONFIG.retryTickIntervalMs,
    transferExpiryMs:
      overrides.transferExpiryMs ??
      fromFile?.transferExpiryMs ??
      DEFAULT_MESH_CONFIG.transferExpiryMs,
    maxPendingTransfers:
      overrides.maxPendingTransfers ??
      fromFile?.maxPendingTransfers ??
      DEFAULT_MESH_CONFIG.maxPendingTransfers,
    dedupWindowMs:
      overrides.dedupWindowMs ?? fromFile?.dedupWindowMs ?? DEFAULT_MESH_CONFIG.dedupWindowMs,
    dedupCapacity:
      overrides.dedupCapacity ?? fromFile?.dedupCapacity ?? DEFAULT_MESH_CONFIG.dedupCapacity,
    reassemblyTimeoutMs:
      overrides.reassemblyTimeoutMs ??
      fromFile?.reassemblyTimeoutMs ??
      DEFAULT_MESH_CONFIG.reassemblyTimeoutMs,
    terminalRetentionMs:
      overrides.terminalRetentionMs ??
      fromFile?.terminalRetentionMs ??
      DEFAULT_MESH_CONFIG.terminalRetentionMs,
    maxTrackedTransfers:
      overrides.maxTrackedTransfers ??
      fromFile?.maxTrackedTransfers ??
      DEFAULT_MESH_CONFIG.maxTrackedTransfers,
    inboxCapacity:
      overrides.inboxCapacity ?? fromFile?.inboxCapacity ?? DEFAULT_MESH_CONFIG.inboxCapacity,
    relayFanout:
      overrides.relayFanout ??
      (isRelayFanout(fileFanout) ? fileFanout : DEFAULT_MESH_CONFIG.relayFanout),
  };

  if (fileFanout !== undefined && !isRelayFanout(fileFanout)) {
    console.warn(
      `[Config] Unknown relayFanout ${String(fileFanout)}, using ${merged.relayFanout}`,
    );
  }

  return validate(merged);
};

export { DEFAULT_MESH_CONFIG, loadMeshConfig, MeshConfig, RelayFanout };
