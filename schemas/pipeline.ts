/**
 * PIPELINE SCHEMA
 *
 * Configuration and output contract of the end-to-end run:
 * documents → extraction → correction → temporal resolution → timeline → validation
 */

import { Schema as S, pipe } from "effect";
import { ClinicalFactSchema } from "./clinicalFact";
import { TimelineSchema } from "./timeline";
import { UncertaintySchema } from "./validation";

// ============================================================================
// CONFIGURATION
// ============================================================================

export const CacheTtlSchema = S.Struct({
  classificationSeconds: pipe(S.Int, S.positive()),
  factsSeconds: pipe(S.Int, S.positive()),
  resultSeconds: pipe(S.Int, S.positive()),
});

export const PipelineConfigSchema = S.Struct({
  extractionConcurrency: S.Union(pipe(S.Int, S.positive()), S.Literal("unbounded")),
  applyLearning: S.Boolean,
  useCache: S.Boolean,
  cacheTtl: CacheTtlSchema,
  fallbackEnabled: S.Boolean,
  fallbackConfidence: pipe(S.Number, S.between(0, 1)),
  dedupeAcrossDocuments: S.Boolean,
  documentationGapDays: pipe(S.Number, S.positive()),
  conflictWindowMinutes: pipe(S.Number, S.positive()),
  dischargeWindowHours: pipe(S.Number, S.positive()),
});
export type PipelineConfig = S.Schema.Type<typeof PipelineConfigSchema>;

export const defaultPipelineConfig: PipelineConfig = {
  extractionConcurrency: "unbounded",
  applyLearning: true,
  useCache: true,
  cacheTtl: {
    classificationSeconds: 3600,
    factsSeconds: 3600,
    resultSeconds: 1800,
  },
  fallbackEnabled: true,
  fallbackConfidence: 0.85,
  dedupeAcrossDocuments: true,
  documentationGapDays: 3,
  conflictWindowMinutes: 60,
  dischargeWindowHours: 48,
};

export const mergePipelineConfig = (overrides: Partial<PipelineConfig> = {}): PipelineConfig => ({
  ...defaultPipelineConfig,
  ...overrides,
  cacheTtl: { ...defaultPipelineConfig.cacheTtl, ...overrides.cacheTtl },
});

/** Decode caller-supplied JSON (partial) over the defaults. */
export const decodePipelineConfig = (input: unknown): PipelineConfig =>
  S.decodeUnknownSync(PipelineConfigSchema)({
    ...defaultPipelineConfig,
    ...(typeof input === "object" && input !== null ? input : {}),
  });

// ============================================================================
// OUTPUT
// ============================================================================

export const DocumentFailureSchema = S.Struct({
  documentId: S.String,
  reason: S.String,
});
export type DocumentFailure = S.Schema.Type<typeof DocumentFailureSchema>;

export const StageTimingsSchema = S.Struct({
  extraction: S.Number,
  learning: S.Number,
  temporal: S.Number,
  timeline: S.Number,
  validation: S.Number,
  total: S.Number,
});
export type StageTimings = S.Schema.Type<typeof StageTimingsSchema>;

export const PipelineMetricsSchema = S.Struct({
  documentCount: S.Number,
  failedDocuments: S.Number,
  stageTimingsMs: StageTimingsSchema,
  factCounts: S.Struct({
    total: S.Number,
    byType: S.Record({ key: S.String, value: S.Number }),
    requiringValidation: S.Number,
    fallback: S.Number,
  }),
  duplicatesRemoved: S.Number,
  learningPatternsApplied: S.Number,
  temporalResolutionRate: S.Number,
  uncertainties: S.Struct({ HIGH: S.Number, MEDIUM: S.Number, LOW: S.Number }),
  cacheHits: S.Number,
  resultFromCache: S.Boolean,
});
export type PipelineMetrics = S.Schema.Type<typeof PipelineMetricsSchema>;

export const PipelineResultSchema = S.Struct({
  facts: S.Array(ClinicalFactSchema),
  timeline: TimelineSchema,
  uncertainties: S.Array(UncertaintySchema),
  failures: S.Array(DocumentFailureSchema),
  metrics: PipelineMetricsSchema,
});
export type PipelineResult = S.Schema.Type<typeof PipelineResultSchema>;
