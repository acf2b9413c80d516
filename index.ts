/**
 * Clinical timeline engine: public surface.
 */

export * from "./schemas";

export * from "./services/errors";
export { AppLayer, AppLogger, runPromise } from "./services/runtime";

export * from "./services/clinicalTime";
export * from "./services/clinicalFact";
export { generateContentHash, sha256Hex, stableId } from "./services/contentHasher";
export * from "./services/knowledgeBase.effect";
export { classifyDocument } from "./services/documentClassifier";

export type { ExtractionStrategy } from "./services/extraction/types";
export { ExtractionStrategyRegistry, defaultStrategies, makeDefaultRegistry } from "./services/extraction/registry";
export { deduplicateFacts } from "./services/extraction/deduplicate";
export * from "./services/extraction/fallback";
export * from "./services/factExtractor.effect";

export * from "./services/temporalResolver.effect";
export * from "./services/timelineBuilder.effect";
export * from "./services/validation";
export * from "./services/validator.effect";

export * from "./services/learning/patternMatcher";
export * from "./services/learning/feedbackManager.effect";

export * from "./services/cache.effect";
export * from "./services/clinicalPipeline.effect";
