export { deduplicateTags } from "./tagDeduplicator";
export { QUALITY_TAGS, UC_PRESETS, ucPresetText } from "./promptPresets";
export { normalizeMetadata, maxSamplesFor, defaultRandomSeed, MAX_SEED } from "./metadataNormalizer";
export type { NormalizeOptions } from "./metadataNormalizer";
export { estimateCost } from "./costEstimator";
export type { CostInput, CostOptions } from "./costEstimator";
export { buildRequestPayload } from "./payload";
