/**
 * FEEDBACK MANAGER - EFFECT-TS SERVICE
 *
 * Lifecycle of human-submitted corrections:
 *
 *   submit ──▶ PENDING ──approve──▶ APPROVED ──(success rate < threshold)──▶ inactive
 *                 │                                      (status kept for audit)
 *                 └──reject───▶ REJECTED
 *
 * Patterns are never deleted. Permission checks belong to the caller; the
 * approver identity is recorded as given.
 */

import { Clock, Context, Effect, Layer, Ref, Schema as S, pipe } from "effect";
import type { ClinicalFact } from "../../schemas/clinicalFact";
import {
  LearningPatternSchema,
  defaultLearningConfig,
  type ApprovedPatternView,
  type CorrectionApplication,
  type LearningConfig,
  type LearningPattern,
  type LearningStatistics,
  type PatternSubmission,
} from "../../schemas/learning";
import { sha256Hex } from "../contentHasher";
import { PatternNotFoundError, PatternValidationError } from "../errors";
import { applyCorrections, isActive, updateSuccessRate, type CorrectionResult } from "./patternMatcher";

const MAX_TEXT_LENGTH = 2000;
const MOST_APPLIED_LIMIT = 5;

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface FeedbackManagerService {
  readonly config: LearningConfig;

  /** New patterns start PENDING; resubmitting returns the existing id. */
  readonly submit: (submission: PatternSubmission) => Effect.Effect<string, PatternValidationError, never>;
  readonly approve: (patternId: string, approver: string) => Effect.Effect<LearningPattern, PatternNotFoundError, never>;
  readonly reject: (
    patternId: string,
    approver: string,
    reason: string
  ) => Effect.Effect<LearningPattern, PatternNotFoundError, never>;

  /** Feeds one application outcome into the success-rate moving average. */
  readonly recordOutcome: (
    patternId: string,
    recorrected: boolean
  ) => Effect.Effect<LearningPattern, PatternNotFoundError, never>;

  /** Active patterns, read once per pipeline run. */
  readonly snapshotActive: () => Effect.Effect<ReadonlyArray<LearningPattern>, never, never>;
  readonly markApplied: (applications: ReadonlyArray<CorrectionApplication>) => Effect.Effect<void, never, never>;
  readonly applyCorrections: (facts: ReadonlyArray<ClinicalFact>) => Effect.Effect<CorrectionResult, never, never>;

  readonly get: (patternId: string) => Effect.Effect<LearningPattern, PatternNotFoundError, never>;
  readonly listPending: () => Effect.Effect<ReadonlyArray<LearningPattern>, never, never>;
  readonly listApproved: () => Effect.Effect<ReadonlyArray<ApprovedPatternView>, never, never>;
  readonly statistics: () => Effect.Effect<LearningStatistics, never, never>;

  /** Replace the store with persisted patterns. */
  readonly loadPatterns: (patterns: ReadonlyArray<unknown>) => Effect.Effect<number, PatternValidationError, never>;
  readonly exportPatterns: () => Effect.Effect<ReadonlyArray<LearningPattern>, never, never>;
}

export const FeedbackManagerService = Context.GenericTag<FeedbackManagerService>("FeedbackManagerService");

// ============================================================================
// PURE HELPERS
// ============================================================================

export const patternId = (submission: Pick<PatternSubmission, "factType" | "originalText" | "correctedText">): string =>
  sha256Hex(`${submission.factType}_${submission.originalText}_${submission.correctedText}`);

export const validateSubmission = (submission: PatternSubmission): ReadonlyArray<string> => {
  const reasons: string[] = [];
  const original = submission.originalText.trim();
  const corrected = submission.correctedText.trim();
  if (original.length === 0) reasons.push("original text is empty");
  if (corrected.length === 0) reasons.push("corrected text is empty");
  if (original.length > 0 && original === corrected) reasons.push("corrected text is identical to the original");
  if (submission.originalText.length > MAX_TEXT_LENGTH || submission.correctedText.length > MAX_TEXT_LENGTH) {
    reasons.push(`texts must not exceed ${MAX_TEXT_LENGTH} characters`);
  }
  if (submission.submitter.trim().length === 0) reasons.push("submitter is required");
  return reasons;
};

const byCreation = (a: LearningPattern, b: LearningPattern): number =>
  a.createdAt - b.createdAt || a.id.localeCompare(b.id);

export const computeStatistics = (
  patterns: ReadonlyArray<LearningPattern>,
  config: LearningConfig = defaultLearningConfig
): LearningStatistics => {
  const byStatus = { PENDING: 0, APPROVED: 0, REJECTED: 0 };
  for (const pattern of patterns) byStatus[pattern.status] += 1;

  const approved = patterns.filter((pattern) => pattern.status === "APPROVED");
  const active = approved.filter((pattern) => isActive(pattern, config)).length;
  const reviewed = byStatus.APPROVED + byStatus.REJECTED;

  return {
    totalPatterns: patterns.length,
    byStatus,
    activePatterns: active,
    deactivatedPatterns: approved.length - active,
    approvalRate: reviewed === 0 ? 0 : byStatus.APPROVED / reviewed,
    averageSuccessRate:
      approved.length === 0 ? 0 : approved.reduce((sum, pattern) => sum + pattern.successRate, 0) / approved.length,
    totalApplications: patterns.reduce((sum, pattern) => sum + pattern.applicationCount, 0),
    mostApplied: patterns
      .filter((pattern) => pattern.applicationCount > 0)
      .sort((a, b) => b.applicationCount - a.applicationCount || a.id.localeCompare(b.id))
      .slice(0, MOST_APPLIED_LIMIT)
      .map((pattern) => ({
        id: pattern.id,
        factType: pattern.factType,
        originalText: pattern.originalText,
        correctedText: pattern.correctedText,
        applicationCount: pattern.applicationCount,
        successRate: pattern.successRate,
      })),
  };
};

type PatternStore = ReadonlyMap<string, LearningPattern>;

// ============================================================================
// SERVICE IMPLEMENTATION
// ============================================================================

class FeedbackManagerServiceImpl implements FeedbackManagerService {
  constructor(
    private readonly store: Ref.Ref<PatternStore>,
    readonly config: LearningConfig
  ) {}

  private readonly update = (
    id: string,
    change: (pattern: LearningPattern, now: number) => LearningPattern
  ) => {
    return Effect.gen(this, function* (_) {
      const now = yield* _(Clock.currentTimeMillis);
      const updated = yield* _(
        Ref.modify(this.store, (patterns): readonly [LearningPattern | undefined, PatternStore] => {
          const existing = patterns.get(id);
          if (existing === undefined) return [undefined, patterns];
          const next = change(existing, now);
          return [next, new Map(patterns).set(id, next)];
        })
      );
      if (updated === undefined) {
        return yield* _(Effect.fail(new PatternNotFoundError({ message: `Unknown learning pattern ${id}`, patternId: id })));
      }
      return updated;
    });
  };

  readonly submit = (submission: PatternSubmission) => {
    return Effect.gen(this, function* (_) {
      const reasons = validateSubmission(submission);
      if (reasons.length > 0) {
        return yield* _(
          Effect.fail(new PatternValidationError({ message: `Invalid correction: ${reasons.join("; ")}`, reasons }))
        );
      }

      const id = patternId(submission);
      const now = yield* _(Clock.currentTimeMillis);
      const context = submission.context ?? {};

      const created = yield* _(
        Ref.modify(this.store, (patterns): readonly [boolean, PatternStore] => {
          const existing = patterns.get(id);
          if (existing !== undefined) {
            const merged = { ...existing, context: { ...existing.context, ...context } };
            return [false, new Map(patterns).set(id, merged)];
          }
          const pattern: LearningPattern = {
            id,
            factType: submission.factType,
            originalText: submission.originalText,
            correctedText: submission.correctedText,
            context,
            status: "PENDING",
            createdBy: submission.submitter,
            createdAt: now,
            uncertaintyId: submission.uncertaintyId,
            successRate: 1,
            applicationCount: 0,
          };
          return [true, new Map(patterns).set(id, pattern)];
        })
      );

      yield* _(
        pipe(
          Effect.logInfo(created ? "Learning pattern submitted" : "Duplicate learning pattern merged"),
          Effect.annotateLogs({ patternId: id, factType: submission.factType, submitter: submission.submitter })
        )
      );
      return id;
    });
  };

  readonly approve = (id: string, approver: string) =>
    pipe(
      this.update(id, (pattern, now) => ({
        ...pattern,
        status: "APPROVED" as const,
        approvedBy: approver,
        reviewedAt: now,
        rejectionReason: undefined,
      })),
      Effect.tap(() =>
        pipe(Effect.logInfo("Learning pattern approved"), Effect.annotateLogs({ patternId: id, approver }))
      )
    );

  readonly reject = (id: string, approver: string, reason: string) =>
    pipe(
      this.update(id, (pattern, now) => ({
        ...pattern,
        status: "REJECTED" as const,
        approvedBy: approver,
        reviewedAt: now,
        rejectionReason: reason,
      })),
      Effect.tap(() =>
        pipe(Effect.logInfo("Learning pattern rejected"), Effect.annotateLogs({ patternId: id, approver }))
      )
    );

  readonly recordOutcome = (id: string, recorrected: boolean) =>
    pipe(
      this.update(id, (pattern) => ({
        ...pattern,
        successRate: updateSuccessRate(pattern.successRate, recorrected, this.config),
      })),
      Effect.tap((pattern) =>
        isActive(pattern, this.config) || pattern.status !== "APPROVED"
          ? Effect.void
          : pipe(
              Effect.logWarning("Learning pattern deactivated by success rate"),
              Effect.annotateLogs({ patternId: id, successRate: pattern.successRate })
            )
      )
    );

  readonly snapshotActive = () =>
    Effect.map(Ref.get(this.store), (patterns) =>
      [...patterns.values()].filter((pattern) => isActive(pattern, this.config)).sort(byCreation)
    );

  readonly markApplied = (applications: ReadonlyArray<CorrectionApplication>) => {
    return Effect.gen(this, function* (_) {
      if (applications.length === 0) return;
      const now = yield* _(Clock.currentTimeMillis);
      yield* _(
        Ref.update(this.store, (patterns) => {
          const next = new Map(patterns);
          for (const application of applications) {
            const pattern = next.get(application.patternId);
            if (pattern === undefined) continue;
            next.set(pattern.id, { ...pattern, applicationCount: pattern.applicationCount + 1, lastAppliedAt: now });
          }
          return next;
        })
      );
    });
  };

  readonly applyCorrections = (facts: ReadonlyArray<ClinicalFact>) => {
    return Effect.gen(this, function* (_) {
      const snapshot = yield* _(this.snapshotActive());
      const result = applyCorrections(facts, snapshot, this.config);
      yield* _(this.markApplied(result.applications));
      return result;
    });
  };

  readonly get = (id: string) =>
    Effect.flatMap(Ref.get(this.store), (patterns) => {
      const pattern = patterns.get(id);
      return pattern === undefined
        ? Effect.fail(new PatternNotFoundError({ message: `Unknown learning pattern ${id}`, patternId: id }))
        : Effect.succeed(pattern);
    });

  readonly listPending = () =>
    Effect.map(Ref.get(this.store), (patterns) =>
      [...patterns.values()].filter((pattern) => pattern.status === "PENDING").sort(byCreation)
    );

  readonly listApproved = () =>
    Effect.map(Ref.get(this.store), (patterns) =>
      [...patterns.values()]
        .filter((pattern) => pattern.status === "APPROVED")
        .sort(byCreation)
        .map((pattern): ApprovedPatternView => ({ pattern, active: isActive(pattern, this.config) }))
    );

  readonly statistics = () =>
    Effect.map(Ref.get(this.store), (patterns) => computeStatistics([...patterns.values()], this.config));

  readonly loadPatterns = (input: ReadonlyArray<unknown>) => {
    return Effect.gen(this, function* (_) {
      const patterns = yield* _(
        pipe(
          S.decodeUnknown(S.Array(LearningPatternSchema))(input),
          Effect.mapError(
            (error) =>
              new PatternValidationError({ message: "Persisted learning patterns are invalid", reasons: [error.message] })
          )
        )
      );
      yield* _(Ref.set(this.store, new Map(patterns.map((pattern) => [pattern.id, pattern]))));
      yield* _(pipe(Effect.logInfo("Learning patterns loaded"), Effect.annotateLogs({ count: patterns.length })));
      return patterns.length;
    });
  };

  readonly exportPatterns = () =>
    Effect.map(Ref.get(this.store), (patterns) => [...patterns.values()].sort(byCreation));
}

// ============================================================================
// SERVICE LAYER
// ============================================================================

export const makeFeedbackManager = (
  config: Partial<LearningConfig> = {},
  initial: ReadonlyArray<LearningPattern> = []
): Effect.Effect<FeedbackManagerService> =>
  Effect.map(
    Ref.make<PatternStore>(new Map(initial.map((pattern) => [pattern.id, pattern]))),
    (store) => new FeedbackManagerServiceImpl(store, { ...defaultLearningConfig, ...config })
  );

export const feedbackManagerLayer = (
  config: Partial<LearningConfig> = {},
  initial: ReadonlyArray<LearningPattern> = []
): Layer.Layer<FeedbackManagerService> => Layer.effect(FeedbackManagerService, makeFeedbackManager(config, initial));

export const FeedbackManagerServiceLive = feedbackManagerLayer();
