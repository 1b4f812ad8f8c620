export { DEFAULT_RETRIEVAL_OPTIONS, RetrievalAugmenter } from "./augmenter";
export type { Augmentation, RetrievalOptions } from "./augmenter";
export { formatReferences, normalizeReferenceUrl } from "./references";
