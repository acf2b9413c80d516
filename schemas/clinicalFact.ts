/**
 * CLINICAL FACT SCHEMA
 *
 * The atomic unit of the pipeline: a typed, source-attributed statement
 * extracted from one line of one clinical document.
 *
 * Lifecycle:
 * - created by the fact extractor (pattern match or fallback capability)
 * - correction fields set once by the learning correction pass
 * - resolution fields set once by the temporal resolver
 * - read (never mutated) by the timeline builder and validator
 *
 * Timestamps are naive local ISO strings (yyyy-MM-ddTHH:mm:ss); the pipeline
 * never consults the wall clock, so identical input yields identical output.
 */

import { Schema as S } from "effect";

// ============================================================================
// DOCUMENTS
// ============================================================================

export const DocumentTypeSchema = S.Literal(
  "admission",
  "progress",
  "consult",
  "operative",
  "lab",
  "nursing",
  "imaging",
  "discharge_summary",
  "discharge_planning",
  "clinic"
);
export type DocumentType = S.Schema.Type<typeof DocumentTypeSchema>;

export const ClinicalDocumentSchema = S.Struct({
  id: S.NonEmptyString,
  name: S.optional(S.String),
  type: S.optional(DocumentTypeSchema), // classified from content when absent
  timestamp: S.String,
  content: S.String,
  author: S.optional(S.String),
  specialty: S.optional(S.String),
});
export type ClinicalDocument = S.Schema.Type<typeof ClinicalDocumentSchema>;

// ============================================================================
// FACT TAXONOMY
// ============================================================================

export const FactTypeSchema = S.Literal(
  "medication",
  "lab_value",
  "clinical_score",
  "vital_sign",
  "procedure",
  "consultation",
  "complication",
  "temporal_reference",
  "diagnosis",
  "admission",
  "finding",
  "recommendation",
  "follow_up"
);
export type FactType = S.Schema.Type<typeof FactTypeSchema>;

export const ProvenanceSchema = S.Literal("pattern", "llm_fallback");
export type Provenance = S.Schema.Type<typeof ProvenanceSchema>;

export const ClinicalSignificanceSchema = S.Literal("CRITICAL", "HIGH", "MEDIUM", "LOW", "ROUTINE");
export type ClinicalSignificance = S.Schema.Type<typeof ClinicalSignificanceSchema>;

// ============================================================================
// NORMALIZED VALUES
// ============================================================================

export const LabSeveritySchema = S.Literal("NORMAL", "LOW", "HIGH", "CRITICAL", "UNKNOWN");
export type LabSeverity = S.Schema.Type<typeof LabSeveritySchema>;

export const LabDirectionSchema = S.Literal("below", "within", "above", "unknown");
export type LabDirection = S.Schema.Type<typeof LabDirectionSchema>;

export const LabConceptSchema = S.TaggedStruct("LabConcept", {
  name: S.String, // knowledge-base key, lowercase
  displayName: S.String,
  value: S.Number,
  unit: S.String,
  normalLow: S.optional(S.Number),
  normalHigh: S.optional(S.Number),
  severity: LabSeveritySchema,
  direction: LabDirectionSchema,
  implication: S.optional(S.String),
});
export type LabConcept = S.Schema.Type<typeof LabConceptSchema>;

export const ScoreValueSchema = S.TaggedStruct("ScoreValue", {
  scoreName: S.String,
  value: S.Number,
  valid: S.Boolean,
  critical: S.Boolean,
});
export type ScoreValue = S.Schema.Type<typeof ScoreValueSchema>;

export const DoseSchema = S.Struct({
  value: S.Number,
  unit: S.String,
});
export type Dose = S.Schema.Type<typeof DoseSchema>;

export const MedicationInfoSchema = S.TaggedStruct("MedicationInfo", {
  name: S.String,
  drugClass: S.String,
  subclass: S.optional(S.String),
  indications: S.Array(S.String),
  monitoring: S.Array(S.String),
  highRisk: S.Boolean,
  inKnowledgeBase: S.Boolean,
  dose: S.optional(DoseSchema),
  route: S.optional(S.String),
  frequency: S.optional(S.String),
});
export type MedicationInfo = S.Schema.Type<typeof MedicationInfoSchema>;

export const VitalValueSchema = S.TaggedStruct("VitalValue", {
  name: S.String,
  value: S.Number,
  secondary: S.optional(S.Number), // diastolic for blood pressure
});
export type VitalValue = S.Schema.Type<typeof VitalValueSchema>;

export const TemporalKindSchema = S.Literal(
  "post_operative_day",
  "hospital_day",
  "hours_after",
  "days_after",
  "two_days_after",
  "next_day",
  "next_morning",
  "today_morning",
  "previous_night",
  "previous_day",
  "same_evening",
  "same_day"
);
export type TemporalKind = S.Schema.Type<typeof TemporalKindSchema>;

export const TemporalInfoSchema = S.TaggedStruct("TemporalInfo", {
  kind: TemporalKindSchema,
  matchedText: S.String,
  amount: S.optional(S.Number),
});
export type TemporalInfo = S.Schema.Type<typeof TemporalInfoSchema>;

export const ProcedureInfoSchema = S.TaggedStruct("ProcedureInfo", {
  name: S.String,
  surgical: S.Boolean,
  revision: S.Boolean,
  successful: S.Boolean,
});
export type ProcedureInfo = S.Schema.Type<typeof ProcedureInfoSchema>;

export const AssertionSchema = S.Literal(
  "NO_COMPLICATIONS",
  "SUCCESSFUL_PROCEDURE",
  "STABLE_FOR_DISCHARGE",
  "IMPROVING",
  "NON_OPERATIVE_MANAGEMENT",
  "OPERATIVE_FINDING"
);
export type Assertion = S.Schema.Type<typeof AssertionSchema>;

export const StatementInfoSchema = S.TaggedStruct("StatementInfo", {
  assertion: AssertionSchema,
  family: S.optional(S.String), // measurement family an IMPROVING statement speaks about
});
export type StatementInfo = S.Schema.Type<typeof StatementInfoSchema>;

export const FollowUpInfoSchema = S.TaggedStruct("FollowUpInfo", {
  kind: S.Literal("follow_up", "instructions"),
});
export type FollowUpInfo = S.Schema.Type<typeof FollowUpInfoSchema>;

export const NormalizedValueSchema = S.Union(
  LabConceptSchema,
  ScoreValueSchema,
  MedicationInfoSchema,
  VitalValueSchema,
  TemporalInfoSchema,
  ProcedureInfoSchema,
  StatementInfoSchema,
  FollowUpInfoSchema
);
export type NormalizedValue = S.Schema.Type<typeof NormalizedValueSchema>;

// ============================================================================
// FACT
// ============================================================================

export const TemporalResolutionSchema = S.Struct({
  method: TemporalKindSchema,
  anchorFactId: S.optional(S.String),
});
export type TemporalResolution = S.Schema.Type<typeof TemporalResolutionSchema>;

export const CorrectionSchema = S.Struct({
  patternId: S.String,
  originalText: S.String,
  matchScore: S.Number,
});
export type Correction = S.Schema.Type<typeof CorrectionSchema>;

/**
 * Structural schema. Confidence and text invariants are enforced by
 * makeFact, so a validator can still receive (and flag) malformed facts
 * that arrive as plain data.
 */
export const ClinicalFactSchema = S.Struct({
  id: S.String,
  text: S.String,
  type: FactTypeSchema,
  sourceDocument: S.String,
  sourceLine: S.Number,
  documentTimestamp: S.String,
  documentType: S.optional(DocumentTypeSchema),
  section: S.optional(S.String),
  surroundingContext: S.optional(S.String),
  specialty: S.optional(S.String),
  confidence: S.Number,
  requiresValidation: S.Boolean,
  provenance: ProvenanceSchema,
  clinicalSignificance: S.optional(ClinicalSignificanceSchema),
  normalized: S.optional(NormalizedValueSchema),
  dedupCount: S.optional(S.Number),

  // Set once by the temporal resolver
  resolvedTimestamp: S.optional(S.String),
  resolution: S.optional(TemporalResolutionSchema),

  // Set once by the learning correction pass
  correction: S.optional(CorrectionSchema),
});
export type ClinicalFact = S.Schema.Type<typeof ClinicalFactSchema>;
export type ClinicalFactEncoded = S.Schema.Encoded<typeof ClinicalFactSchema>;

export type FactDraft = Omit<ClinicalFact, "id"> & { readonly id?: string };

// ============================================================================
// HELPERS
// ============================================================================

/** Timestamp the timeline orders by: resolved when available, else the document's. */
export const effectiveTimestamp = (fact: ClinicalFact): string =>
  fact.resolvedTimestamp ?? fact.documentTimestamp;

export const isLabConcept = (value: NormalizedValue | undefined): value is LabConcept =>
  value?._tag === "LabConcept";

export const isScoreValue = (value: NormalizedValue | undefined): value is ScoreValue =>
  value?._tag === "ScoreValue";

export const isMedicationInfo = (value: NormalizedValue | undefined): value is MedicationInfo =>
  value?._tag === "MedicationInfo";

export const isProcedureInfo = (value: NormalizedValue | undefined): value is ProcedureInfo =>
  value?._tag === "ProcedureInfo";

export const isStatementInfo = (value: NormalizedValue | undefined): value is StatementInfo =>
  value?._tag === "StatementInfo";

export const isTemporalInfo = (value: NormalizedValue | undefined): value is TemporalInfo =>
  value?._tag === "TemporalInfo";

export const isVitalValue = (value: NormalizedValue | undefined): value is VitalValue =>
  value?._tag === "VitalValue";

export const isFollowUpInfo = (value: NormalizedValue | undefined): value is FollowUpInfo =>
  value?._tag === "FollowUpInfo";
