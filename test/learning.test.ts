/**
 * LEARNING SUBSYSTEM - TEST SUITE
 *
 * Pattern scoring and application, the approval lifecycle, success-rate
 * decay and persistence of the pattern store.
 */

import { describe, it, expect } from "vitest";
import { Effect, Layer, TestContext, pipe } from "effect";
import type { LearningPattern, PatternSubmission } from "../schemas/learning";
import {
  applyCorrections,
  contextMatches,
  isActive,
  jaccardSimilarity,
  matchScore,
  sequenceRatio,
  textSimilarity,
  updateSuccessRate,
} from "../services/learning/patternMatcher";
import {
  FeedbackManagerService,
  computeStatistics,
  feedbackManagerLayer,
  patternId,
} from "../services/learning/feedbackManager.effect";
import { sha256Hex } from "../services/contentHasher";
import { PatternNotFoundError, PatternValidationError } from "../services/errors";
import { TestLoggerLayer, makeCapturingLogger } from "../services/testLogger";
import { testFact, testPattern } from "../services/testConstants";

// ============================================================================
// HELPERS
// ============================================================================

const typo = testFact({ text: "Diagnosis: subarachnoid hemorhage", type: "diagnosis" });

const typoPattern = (fields: Partial<LearningPattern> = {}) =>
  testPattern({ factType: "diagnosis", originalText: "hemorhage", correctedText: "hemorrhage", ...fields });

const submission = (fields: Partial<PatternSubmission> = {}): PatternSubmission => ({
  factType: "diagnosis",
  originalText: "hemorhage",
  correctedText: "hemorrhage",
  submitter: "test-reviewer",
  ...fields,
});

const run = <A, E>(
  program: Effect.Effect<A, E, FeedbackManagerService>,
  layer: Layer.Layer<FeedbackManagerService> = feedbackManagerLayer()
) =>
  Effect.runPromise(
    pipe(program, Effect.provide(layer), Effect.provide(TestContext.TestContext), Effect.provide(TestLoggerLayer))
  );

/** Deterministic PRNG for the property checks. */
const mulberry32 = (seed: number) => {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

// ============================================================================
// PATTERN MATCHER
// ============================================================================

describe("Pattern Matcher", () => {
  describe("similarity", () => {
    it("scores a contained original text as an exact match", () => {
      expect(textSimilarity("Diagnosis: subarachnoid HEMORHAGE", "hemorhage")).toBe(1);
    });

    it("compares token sets", () => {
      expect(jaccardSimilarity("nimodipine 60 mg", "nimodipine 60mg")).toBe(0.25);
      expect(jaccardSimilarity("", "")).toBe(1);
    });

    it("compares character sequences", () => {
      expect(sequenceRatio("abcd", "abcd")).toBe(1);
      expect(sequenceRatio("abc", "xyz")).toBe(0);
      expect(sequenceRatio("abcd", "abxd")).toBe(0.75);
    });

    it("scores zero across fact types", () => {
      expect(matchScore(typo, typoPattern({ factType: "procedure" }))).toBe(0);
    });

    it("adds the context bonus when every given field agrees", () => {
      const fact = testFact({ text: "Medication: nimodipine", type: "medication", section: "discharge medications" });
      const unrelated = testPattern({
        factType: "medication",
        originalText: "zzz",
        correctedText: "yyy",
        context: { section: "Discharge Medications" },
      });
      expect(contextMatches(fact, unrelated.context)).toBe(true);
      expect(contextMatches(fact, {})).toBe(false);
      expect(contextMatches(fact, { section: "discharge medications", specialty: "Neurology" })).toBe(false);
      expect(matchScore(fact, unrelated)).toBe(0.1);
    });

    it("caps the score at 1", () => {
      const fact = testFact({ text: "Diagnosis: hemorhage", type: "diagnosis", section: "assessment" });
      expect(matchScore(fact, typoPattern({ context: { section: "assessment" } }))).toBe(1);
    });
  });

  describe("activation", () => {
    it("requires approval and a success rate at the threshold", () => {
      expect(isActive(typoPattern({ successRate: 0.7 }))).toBe(true);
      expect(isActive(typoPattern({ successRate: 0.69 }))).toBe(false);
      expect(isActive(typoPattern({ status: "PENDING" }))).toBe(false);
      expect(isActive(typoPattern({ status: "REJECTED" }))).toBe(false);
    });

    it("moves the success rate by the newest outcome", () => {
      expect(updateSuccessRate(1, false)).toBe(1);
      expect(updateSuccessRate(1, true)).toBe(0.8);
    });
  });

  describe("applyCorrections", () => {
    it("replaces the matched span and records the correction", () => {
      const pattern = typoPattern();
      const result = applyCorrections([typo], [pattern]);
      expect(result.facts[0]).toMatchObject({
        id: typo.id,
        text: "Diagnosis: subarachnoid hemorrhage",
        confidence: 0.9,
        correction: { patternId: pattern.id, originalText: "Diagnosis: subarachnoid hemorhage", matchScore: 1 },
      });
      expect(result.applications).toEqual([{ factId: typo.id, patternId: pattern.id, score: 1 }]);
    });

    it("scales confidence by the pattern's success rate", () => {
      const result = applyCorrections([typo], [typoPattern({ successRate: 0.75 })]);
      expect(result.facts[0].confidence).toBeCloseTo(0.675);
    });

    it("prefers the earliest pattern among equal scores", () => {
      const later = typoPattern({ createdAt: 2 });
      const earlier = testPattern({
        factType: "diagnosis",
        originalText: "subarachnoid hemorhage",
        correctedText: "subarachnoid hemorrhage (SAH)",
        createdAt: 1,
      });
      const result = applyCorrections([typo], [later, earlier]);
      expect(result.facts[0].text).toBe("Diagnosis: subarachnoid hemorrhage (SAH)");
      expect(result.applications.map((application) => application.patternId)).toEqual([earlier.id]);
    });

    it("skips matches below the threshold", () => {
      const result = applyCorrections([typo], [testPattern({ factType: "diagnosis", originalText: "zzz", correctedText: "yyy" })]);
      expect(result.facts[0]).toBe(typo);
      expect(result.applications).toEqual([]);
    });

    it("never corrects a fact twice", () => {
      const once = applyCorrections([typo], [typoPattern()]).facts;
      const again = applyCorrections(once, [
        testPattern({ factType: "diagnosis", originalText: "subarachnoid", correctedText: "SA" }),
      ]);
      expect(again.facts[0]).toBe(once[0]);
    });

    it("only ever applies active patterns", () => {
      const random = mulberry32(20240601);
      const statuses = ["PENDING", "APPROVED", "REJECTED"] as const;
      for (let i = 0; i < 200; i++) {
        const pattern = typoPattern({
          status: statuses[Math.floor(random() * statuses.length)],
          successRate: Math.round(random() * 100) / 100,
        });
        const { applications } = applyCorrections([typo], [pattern]);
        expect(applications.length === 1).toBe(isActive(pattern));
      }
    });
  });
});

// ============================================================================
// FEEDBACK MANAGER
// ============================================================================

describe("Feedback Manager", () => {
  describe("submission", () => {
    it("stores new corrections as pending with a content-derived id", async () => {
      const { id, pending, active } = await run(
        Effect.gen(function* (_) {
          const feedback = yield* _(FeedbackManagerService);
          const id = yield* _(feedback.submit(submission({ uncertaintyId: "u-1" })));
          return { id, pending: yield* _(feedback.listPending()), active: yield* _(feedback.snapshotActive()) };
        })
      );
      expect(id).toBe(sha256Hex("diagnosis_hemorhage_hemorrhage"));
      expect(id).toBe(patternId(submission()));
      expect(pending).toEqual([
        {
          id,
          factType: "diagnosis",
          originalText: "hemorhage",
          correctedText: "hemorrhage",
          context: {},
          status: "PENDING",
          createdBy: "test-reviewer",
          createdAt: 0,
          uncertaintyId: "u-1",
          successRate: 1,
          applicationCount: 0,
        },
      ]);
      expect(active).toEqual([]);
    });

    it("rejects invalid submissions with every reason", async () => {
      const error = await run(
        Effect.flip(
          Effect.flatMap(FeedbackManagerService, (feedback) =>
            feedback.submit(submission({ originalText: "  ", submitter: "" }))
          )
        )
      );
      expect(error).toBeInstanceOf(PatternValidationError);
      expect(error.reasons).toEqual(["original text is empty", "submitter is required"]);
      expect(error.message).toBe("Invalid correction: original text is empty; submitter is required");
    });

    it("rejects corrections identical to the original", async () => {
      const error = await run(
        Effect.flip(
          Effect.flatMap(FeedbackManagerService, (feedback) =>
            feedback.submit(submission({ correctedText: "hemorhage" }))
          )
        )
      );
      expect(error.reasons).toEqual(["corrected text is identical to the original"]);
    });

    it("merges duplicate submissions into one pattern", async () => {
      const { first, second, patterns } = await run(
        Effect.gen(function* (_) {
          const feedback = yield* _(FeedbackManagerService);
          const first = yield* _(feedback.submit(submission({ context: { section: "assessment" } })));
          const second = yield* _(feedback.submit(submission({ context: { specialty: "Neurology" } })));
          return { first, second, patterns: yield* _(feedback.exportPatterns()) };
        })
      );
      expect(second).toBe(first);
      expect(patterns).toHaveLength(1);
      expect(patterns[0].context).toEqual({ section: "assessment", specialty: "Neurology" });
    });
  });

  describe("review", () => {
    it("approves a pattern into the active set", async () => {
      const { approved, active } = await run(
        Effect.gen(function* (_) {
          const feedback = yield* _(FeedbackManagerService);
          const id = yield* _(feedback.submit(submission()));
          const approved = yield* _(feedback.approve(id, "attending-1"));
          return { approved, active: yield* _(feedback.snapshotActive()) };
        })
      );
      expect(approved).toMatchObject({ status: "APPROVED", approvedBy: "attending-1", reviewedAt: 0 });
      expect(active).toEqual([approved]);
    });

    it("rejects a pattern with a reason and keeps it out of the active set", async () => {
      const { rejected, active } = await run(
        Effect.gen(function* (_) {
          const feedback = yield* _(FeedbackManagerService);
          const id = yield* _(feedback.submit(submission()));
          const rejected = yield* _(feedback.reject(id, "attending-1", "spelling is regional"));
          return { rejected, active: yield* _(feedback.snapshotActive()) };
        })
      );
      expect(rejected).toMatchObject({ status: "REJECTED", rejectionReason: "spelling is regional" });
      expect(active).toEqual([]);
    });

    it("fails for unknown pattern ids", async () => {
      const [approveError, rejectError, outcomeError] = await run(
        Effect.gen(function* (_) {
          const feedback = yield* _(FeedbackManagerService);
          return [
            yield* _(Effect.flip(feedback.approve("missing", "attending-1"))),
            yield* _(Effect.flip(feedback.reject("missing", "attending-1", "n/a"))),
            yield* _(Effect.flip(feedback.recordOutcome("missing", true))),
          ];
        })
      );
      for (const error of [approveError, rejectError, outcomeError]) {
        expect(error).toBeInstanceOf(PatternNotFoundError);
        expect(error.patternId).toBe("missing");
      }
      expect(approveError.message).toBe("Unknown learning pattern missing");
    });
  });

  describe("success-rate decay", () => {
    it("deactivates a pattern that keeps being re-corrected and keeps it approved", async () => {
      const { rates, views, applied } = await run(
        Effect.gen(function* (_) {
          const feedback = yield* _(FeedbackManagerService);
          const id = yield* _(feedback.submit(submission()));
          yield* _(feedback.approve(id, "attending-1"));
          const rates: number[] = [];
          for (const recorrected of [true, true, true, false, false]) {
            const pattern = yield* _(feedback.recordOutcome(id, recorrected));
            rates.push(pattern.successRate);
          }
          const views = yield* _(feedback.listApproved());
          const applied = yield* _(feedback.applyCorrections([typo]));
          return { rates, views, applied };
        })
      );
      const expected = [0.8, 0.64, 0.512, 0.6096, 0.68768];
      rates.forEach((rate, index) => expect(rate).toBeCloseTo(expected[index], 10));
      expect(views.map((view) => [view.pattern.status, view.active])).toEqual([["APPROVED", false]]);
      expect(applied.applications).toEqual([]);
      expect(applied.facts[0]).toBe(typo);
    });

    it("reactivates once the rate recovers", async () => {
      const layer = feedbackManagerLayer({}, [typoPattern({ successRate: 0.68768 })]);
      const pattern = await run(
        Effect.flatMap(FeedbackManagerService, (feedback) => feedback.recordOutcome(typoPattern().id, false)),
        layer
      );
      expect(pattern.successRate).toBeCloseTo(0.750144, 10);
      expect(isActive(pattern)).toBe(true);
    });

    it("keeps every concurrent update to the same pattern", async () => {
      const pattern = await run(
        Effect.gen(function* (_) {
          const feedback = yield* _(FeedbackManagerService);
          const id = yield* _(feedback.submit(submission()));
          yield* _(
            Effect.all(
              [
                feedback.approve(id, "attending-1"),
                ...Array.from({ length: 20 }, () => feedback.recordOutcome(id, true)),
              ],
              { concurrency: "unbounded" }
            )
          );
          return yield* _(feedback.get(id));
        })
      );
      expect(pattern.status).toBe("APPROVED");
      expect(pattern.successRate).toBeCloseTo(0.8 ** 20, 12);
    });

    it("logs a warning when an approved pattern drops below the threshold", async () => {
      const capture = makeCapturingLogger();
      const id = typoPattern().id;
      await Effect.runPromise(
        pipe(
          Effect.flatMap(FeedbackManagerService, (feedback) =>
            Effect.zipRight(feedback.recordOutcome(id, true), feedback.recordOutcome(id, true))
          ),
          Effect.provide(feedbackManagerLayer({}, [typoPattern()])),
          Effect.provide(TestContext.TestContext),
          Effect.provide(capture.layer)
        )
      );
      const warnings = capture.lines.filter((line) => line.level === "WARN");
      expect(warnings.map((line) => line.message)).toEqual(["Learning pattern deactivated by success rate"]);
      expect(warnings[0].annotations.patternId).toBe(id);
    });
  });

  describe("application tracking", () => {
    it("counts each application against the pattern", async () => {
      const { first, pattern } = await run(
        Effect.gen(function* (_) {
          const feedback = yield* _(FeedbackManagerService);
          const id = yield* _(feedback.submit(submission()));
          yield* _(feedback.approve(id, "attending-1"));
          const first = yield* _(feedback.applyCorrections([typo]));
          yield* _(feedback.applyCorrections([typo]));
          return { first, pattern: yield* _(feedback.get(id)) };
        })
      );
      expect(first.facts[0].text).toBe("Diagnosis: subarachnoid hemorrhage");
      expect(pattern.applicationCount).toBe(2);
      expect(pattern.lastAppliedAt).toBe(0);
    });

    it("summarizes the store", async () => {
      const stats = await run(
        Effect.gen(function* (_) {
          const feedback = yield* _(FeedbackManagerService);
          const approved = yield* _(feedback.submit(submission()));
          yield* _(feedback.submit(submission({ correctedText: "haemorrhage" })));
          const rejected = yield* _(
            feedback.submit(submission({ originalText: "SAH", correctedText: "subarachnoid hemorrhage" }))
          );
          yield* _(feedback.approve(approved, "attending-1"));
          yield* _(feedback.reject(rejected, "attending-1", "abbreviation is standard"));
          yield* _(feedback.applyCorrections([typo]));
          return yield* _(feedback.statistics());
        })
      );
      expect(stats).toEqual({
        totalPatterns: 3,
        byStatus: { PENDING: 1, APPROVED: 1, REJECTED: 1 },
        activePatterns: 1,
        deactivatedPatterns: 0,
        approvalRate: 0.5,
        averageSuccessRate: 1,
        totalApplications: 1,
        mostApplied: [
          {
            id: patternId(submission()),
            factType: "diagnosis",
            originalText: "hemorhage",
            correctedText: "hemorrhage",
            applicationCount: 1,
            successRate: 1,
          },
        ],
      });
    });

    it("reports zero rates for an empty store", () => {
      expect(computeStatistics([])).toMatchObject({ totalPatterns: 0, approvalRate: 0, averageSuccessRate: 0 });
    });
  });

  describe("persistence", () => {
    it("loads persisted patterns and exports them again", async () => {
      const stored = [typoPattern({ applicationCount: 4, successRate: 0.9 })];
      const { count, exported } = await run(
        Effect.gen(function* (_) {
          const feedback = yield* _(FeedbackManagerService);
          const count = yield* _(feedback.loadPatterns(stored));
          return { count, exported: yield* _(feedback.exportPatterns()) };
        })
      );
      expect(count).toBe(1);
      expect(exported).toEqual(stored);
    });

    it("refuses malformed patterns and keeps the current store", async () => {
      const { error, patterns } = await run(
        Effect.gen(function* (_) {
          const feedback = yield* _(FeedbackManagerService);
          yield* _(feedback.submit(submission()));
          const error = yield* _(Effect.flip(feedback.loadPatterns([{ ...typoPattern(), successRate: 1.5 }])));
          return { error, patterns: yield* _(feedback.exportPatterns()) };
        })
      );
      expect(error.message).toBe("Persisted learning patterns are invalid");
      expect(error.reasons).toHaveLength(1);
      expect(patterns).toHaveLength(1);
    });
  });
});
