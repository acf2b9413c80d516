/**
 * LEARNING PATTERN SCHEMA
 *
 * A human-submitted correction. Only APPROVED patterns whose running
 * success rate is at or above the threshold take part in correction; a
 * pattern that degrades stays APPROVED in storage for audit purposes.
 */

import { Schema as S, pipe } from "effect";
import { FactTypeSchema } from "./clinicalFact";

// ============================================================================
// CONFIGURATION
// ============================================================================

export const LearningConfigSchema = S.Struct({
  matchThreshold: pipe(S.Number, S.between(0, 1)),
  successRateThreshold: pipe(S.Number, S.between(0, 1)),
  successRateAlpha: pipe(S.Number, S.between(0, 1)), // weight of the newest outcome
  contextBonus: pipe(S.Number, S.between(0, 1)),
});
export type LearningConfig = S.Schema.Type<typeof LearningConfigSchema>;

export const defaultLearningConfig: LearningConfig = {
  matchThreshold: 0.7,
  successRateThreshold: 0.7,
  successRateAlpha: 0.2,
  contextBonus: 0.1,
};

// ============================================================================
// PATTERN
// ============================================================================

export const ApprovalStatusSchema = S.Literal("PENDING", "APPROVED", "REJECTED");
export type ApprovalStatus = S.Schema.Type<typeof ApprovalStatusSchema>;

export const LearningPatternSchema = S.Struct({
  id: S.String, // sha256 of fact type + original + corrected
  factType: FactTypeSchema,
  originalText: S.String,
  correctedText: S.String,
  context: S.Record({ key: S.String, value: S.String }),
  status: ApprovalStatusSchema,
  createdBy: S.String,
  createdAt: S.Number, // epoch millis
  approvedBy: S.optional(S.String),
  reviewedAt: S.optional(S.Number),
  rejectionReason: S.optional(S.String),
  uncertaintyId: S.optional(S.String),
  successRate: pipe(S.Number, S.between(0, 1)),
  applicationCount: pipe(S.Int, S.greaterThanOrEqualTo(0)),
  lastAppliedAt: S.optional(S.Number),
});
export type LearningPattern = S.Schema.Type<typeof LearningPatternSchema>;

export const PatternSubmissionSchema = S.Struct({
  factType: FactTypeSchema,
  originalText: S.String,
  correctedText: S.String,
  context: S.optional(S.Record({ key: S.String, value: S.String })),
  submitter: S.String,
  uncertaintyId: S.optional(S.String),
});
export type PatternSubmission = S.Schema.Type<typeof PatternSubmissionSchema>;

// ============================================================================
// QUERIES
// ============================================================================

export const ApprovedPatternViewSchema = S.Struct({
  pattern: LearningPatternSchema,
  active: S.Boolean,
});
export type ApprovedPatternView = S.Schema.Type<typeof ApprovedPatternViewSchema>;

export const LearningStatisticsSchema = S.Struct({
  totalPatterns: S.Number,
  byStatus: S.Struct({ PENDING: S.Number, APPROVED: S.Number, REJECTED: S.Number }),
  activePatterns: S.Number,
  deactivatedPatterns: S.Number,
  approvalRate: S.Number, // approved / reviewed
  averageSuccessRate: S.Number,
  totalApplications: S.Number,
  mostApplied: S.Array(
    S.Struct({
      id: S.String,
      factType: FactTypeSchema,
      originalText: S.String,
      correctedText: S.String,
      applicationCount: S.Number,
      successRate: S.Number,
    })
  ),
});
export type LearningStatistics = S.Schema.Type<typeof LearningStatisticsSchema>;

export const CorrectionApplicationSchema = S.Struct({
  factId: S.String,
  patternId: S.String,
  score: S.Number,
});
export type CorrectionApplication = S.Schema.Type<typeof CorrectionApplicationSchema>;
