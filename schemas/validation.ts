/**
 * VALIDATION SCHEMA
 *
 * Uncertainties are the validator's only corrective output: facts pass
 * through untouched (apart from confidence clamping) and every issue is
 * recorded here for a human reviewer.
 */

import { Schema as S } from "effect";
import { ClinicalFactSchema } from "./clinicalFact";
import { UncertaintySeveritySchema } from "./knowledgeBase";

export const ValidationCategorySchema = S.Literal(
  "FORMAT",
  "CLINICAL_RULE",
  "TEMPORAL",
  "CROSS_FACT",
  "CONTRADICTION",
  "COMPLETENESS"
);
export type ValidationCategory = S.Schema.Type<typeof ValidationCategorySchema>;

export const UncertaintySchema = S.Struct({
  id: S.String,
  severity: UncertaintySeveritySchema,
  category: ValidationCategorySchema,
  issueType: S.String, // e.g. CRITICAL_LAB_VALUE, CONTRADICTORY_STATEMENTS
  description: S.String,
  factIds: S.Array(S.String),
  suggestedResolution: S.optional(S.String),
  resolved: S.Boolean,
  resolution: S.optional(S.String),
});
export type Uncertainty = S.Schema.Type<typeof UncertaintySchema>;

export const ValidationResultSchema = S.Struct({
  facts: S.Array(ClinicalFactSchema),
  uncertainties: S.Array(UncertaintySchema),
});
export type ValidationResult = S.Schema.Type<typeof ValidationResultSchema>;

export const ValidationSummarySchema = S.Struct({
  total: S.Number,
  unresolved: S.Number,
  bySeverity: S.Struct({ HIGH: S.Number, MEDIUM: S.Number, LOW: S.Number }),
  byCategory: S.Record({ key: S.String, value: S.Number }),
});
export type ValidationSummary = S.Schema.Type<typeof ValidationSummarySchema>;
