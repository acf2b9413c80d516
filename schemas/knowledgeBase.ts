/**
 * CLINICAL KNOWLEDGE BASE SCHEMA
 *
 * Shape of the static reference tables in data/clinical-knowledge.json.
 * The tables are decoded once through this schema, so a malformed edit to
 * the JSON fails loudly at load time instead of producing silent misses.
 */

import { Schema as S, pipe } from "effect";
import { TemporalKindSchema } from "./clinicalFact";

export const UncertaintySeveritySchema = S.Literal("HIGH", "MEDIUM", "LOW");
export type UncertaintySeverity = S.Schema.Type<typeof UncertaintySeveritySchema>;

// ============================================================================
// LABS
// ============================================================================

export const LabImplicationsSchema = S.Struct({
  criticalLow: S.String,
  low: S.String,
  high: S.String,
  criticalHigh: S.String,
});

export const LabReferenceSchema = pipe(
  S.Struct({
    displayName: S.String,
    aliases: S.NonEmptyArray(S.String), // regex sources
    unit: S.String,
    normalLow: S.Number,
    normalHigh: S.Number,
    criticalLow: S.Number,
    criticalHigh: S.Number,
    implications: LabImplicationsSchema,
  }),
  S.filter(
    (lab) =>
      lab.criticalLow < lab.normalLow &&
      lab.normalLow < lab.normalHigh &&
      lab.normalHigh < lab.criticalHigh,
    { message: () => "lab thresholds must satisfy criticalLow < normalLow < normalHigh < criticalHigh" }
  )
);
export type LabReference = S.Schema.Type<typeof LabReferenceSchema>;

export const UnrangedLabSchema = S.Struct({
  displayName: S.String,
  aliases: S.NonEmptyArray(S.String),
  unit: S.String,
});
export type UnrangedLab = S.Schema.Type<typeof UnrangedLabSchema>;

// ============================================================================
// MEDICATIONS
// ============================================================================

export const MedicationReferenceSchema = S.Struct({
  drugClass: S.String,
  subclass: S.String,
  indications: S.Array(S.String),
  contraindications: S.Array(S.String),
  monitoring: S.Array(S.String),
  highRisk: S.Boolean,
});
export type MedicationReference = S.Schema.Type<typeof MedicationReferenceSchema>;

export const MaxDoseSchema = S.Struct({
  value: pipe(S.Number, S.positive()),
  unit: S.String,
});
export type MaxDose = S.Schema.Type<typeof MaxDoseSchema>;

export const InteractionPairSchema = S.Struct({
  drugs: S.Tuple(S.String, S.String),
  severity: UncertaintySeveritySchema,
  description: S.String,
});
export type InteractionPair = S.Schema.Type<typeof InteractionPairSchema>;

export const ClassRuleSchema = S.Struct({
  drugClass: S.String,
  minCount: pipe(S.Int, S.greaterThanOrEqualTo(1)),
  severity: UncertaintySeveritySchema,
  description: S.String,
});
export type ClassRule = S.Schema.Type<typeof ClassRuleSchema>;

// ============================================================================
// SCORES AND TRENDS
// ============================================================================

export const ScoreReferenceSchema = S.Struct({
  aliases: S.NonEmptyArray(S.String),
  min: S.Number,
  max: S.Number,
  critical: S.optional(
    S.Struct({
      direction: S.Literal("atOrAbove", "atOrBelow"),
      value: S.Number,
    })
  ),
});
export type ScoreReference = S.Schema.Type<typeof ScoreReferenceSchema>;

export const PolaritySchema = S.Literal("lower_is_better", "higher_is_better", "toward_normal");
export type Polarity = S.Schema.Type<typeof PolaritySchema>;

export const MeasurementFamilySchema = S.Literal(
  "neurological_deficit",
  "consciousness",
  "functional_outcome",
  "laboratory"
);
export type MeasurementFamily = S.Schema.Type<typeof MeasurementFamilySchema>;

export const PolarityEntrySchema = S.Struct({
  family: MeasurementFamilySchema,
  polarity: PolaritySchema,
});
export type PolarityEntry = S.Schema.Type<typeof PolarityEntrySchema>;

// ============================================================================
// TEMPORAL CATALOG
// ============================================================================

export const TemporalPatternSchema = S.Struct({
  kind: TemporalKindSchema,
  pattern: S.String,
});
export type TemporalPattern = S.Schema.Type<typeof TemporalPatternSchema>;

// ============================================================================
// ALL TABLES
// ============================================================================

export const KnowledgeTablesSchema = S.Struct({
  labs: S.Record({ key: S.String, value: LabReferenceSchema }),
  unrangedLabs: S.Array(UnrangedLabSchema),
  medications: S.Record({ key: S.String, value: MedicationReferenceSchema }),
  highRiskPatterns: S.Array(S.String),
  maxSingleDoses: S.Record({ key: S.String, value: MaxDoseSchema }),
  interactionPairs: S.Array(InteractionPairSchema),
  classRules: S.Array(ClassRuleSchema),
  scores: S.Record({ key: S.String, value: ScoreReferenceSchema }),
  polarity: S.Record({ key: S.String, value: PolarityEntrySchema }),
  temporalPatterns: S.Array(TemporalPatternSchema),
  complicationTerms: S.Array(S.String),
});
export type KnowledgeTables = S.Schema.Type<typeof KnowledgeTablesSchema>;
