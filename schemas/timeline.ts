/**
 * TIMELINE SCHEMA
 *
 * Derived view over resolved facts: facts grouped by calendar day, key
 * events, per-measurement progression, stay metadata, and the temporal
 * conflicts the resolver surfaced.
 */

import { Schema as S } from "effect";
import { ClinicalFactSchema, DocumentTypeSchema } from "./clinicalFact";
import { MeasurementFamilySchema } from "./knowledgeBase";

// ============================================================================
// TEMPORAL RESOLUTION OUTPUT
// ============================================================================

export const AnchorKindSchema = S.Literal("admission", "surgery");
export type AnchorKind = S.Schema.Type<typeof AnchorKindSchema>;

export const AnchorEventSchema = S.Struct({
  kind: AnchorKindSchema,
  timestamp: S.String,
  factId: S.String,
  description: S.String,
});
export type AnchorEvent = S.Schema.Type<typeof AnchorEventSchema>;

export const TemporalConflictTypeSchema = S.Literal(
  "POD_WITHOUT_SURGERY",
  "HD_WITHOUT_ADMISSION",
  "BEFORE_ADMISSION"
);
export type TemporalConflictType = S.Schema.Type<typeof TemporalConflictTypeSchema>;

export const TemporalConflictSchema = S.Struct({
  type: TemporalConflictTypeSchema,
  factId: S.String,
  description: S.String,
});
export type TemporalConflict = S.Schema.Type<typeof TemporalConflictSchema>;

export const ResolutionStatsSchema = S.Struct({
  temporalReferences: S.Number,
  resolved: S.Number,
  unresolved: S.Number,
  resolutionRate: S.Number,
  byMethod: S.Record({ key: S.String, value: S.Number }),
});
export type ResolutionStats = S.Schema.Type<typeof ResolutionStatsSchema>;

// ============================================================================
// TIMELINE
// ============================================================================

export const TimelineDaySchema = S.Struct({
  date: S.String, // yyyy-MM-dd
  facts: S.Array(ClinicalFactSchema),
});
export type TimelineDay = S.Schema.Type<typeof TimelineDaySchema>;

export const KeyEventKindSchema = S.Literal("admission", "surgery", "complication", "critical_lab");
export type KeyEventKind = S.Schema.Type<typeof KeyEventKindSchema>;

export const KeyEventSchema = S.Struct({
  kind: KeyEventKindSchema,
  timestamp: S.String,
  date: S.String,
  factId: S.String,
  description: S.String,
});
export type KeyEvent = S.Schema.Type<typeof KeyEventSchema>;

export const TrendDirectionSchema = S.Literal("improving", "worsening", "stable");
export type TrendDirection = S.Schema.Type<typeof TrendDirectionSchema>;

export const ProgressionPointSchema = S.Struct({
  timestamp: S.String,
  value: S.Number,
  factId: S.String,
});
export type ProgressionPoint = S.Schema.Type<typeof ProgressionPointSchema>;

export const ProgressionSummarySchema = S.Struct({
  measurement: S.String,
  family: MeasurementFamilySchema,
  direction: TrendDirectionSchema,
  firstValue: S.Number,
  lastValue: S.Number,
  points: S.Array(ProgressionPointSchema),
});
export type ProgressionSummary = S.Schema.Type<typeof ProgressionSummarySchema>;

export const StayMetadataSchema = S.Struct({
  admission: S.optional(S.String), // timestamp
  discharge: S.optional(S.String), // timestamp
  admissionDate: S.optional(S.String),
  dischargeDate: S.optional(S.String),
  lengthOfStayDays: S.Number,
});
export type StayMetadata = S.Schema.Type<typeof StayMetadataSchema>;

export const DocumentSummarySchema = S.Struct({
  id: S.String,
  type: S.optional(DocumentTypeSchema),
  timestamp: S.String,
  factCount: S.Number,
});
export type DocumentSummary = S.Schema.Type<typeof DocumentSummarySchema>;

export const TimelineSchema = S.Struct({
  days: S.Array(TimelineDaySchema),
  keyEvents: S.Array(KeyEventSchema),
  progression: S.Array(ProgressionSummarySchema),
  anchors: S.Array(AnchorEventSchema),
  conflicts: S.Array(TemporalConflictSchema),
  documents: S.Array(DocumentSummarySchema),
  metadata: StayMetadataSchema,
  summary: S.Struct({
    totalFacts: S.Number,
    dayCount: S.Number,
    keyEventCount: S.Number,
    factsByType: S.Record({ key: S.String, value: S.Number }),
  }),
});
export type Timeline = S.Schema.Type<typeof TimelineSchema>;
