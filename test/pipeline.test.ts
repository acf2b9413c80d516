/**
 * CLINICAL PIPELINE - INTEGRATION TESTS
 *
 * End-to-end runs over the synthetic stay: failure isolation, caching,
 * the fallback capability and learned corrections.
 */

import { describe, it, expect } from "vitest";
import { Effect, pipe } from "effect";
import type { ClinicalDocument } from "../schemas/clinicalFact";
import type { PipelineConfig } from "../schemas/pipeline";
import {
  ClinicalPipelineService,
  makePipelineLayer,
  processDocuments,
  type PipelineLayerOptions,
} from "../services/clinicalPipeline.effect";
import { MemoryCacheLive, unavailableCacheLayer } from "../services/cache.effect";
import { staticFallbackLayer } from "../services/extraction/fallback";
import { FeedbackManagerService } from "../services/learning/feedbackManager.effect";
import { TestLoggerLayer, makeCapturingLogger } from "../services/testLogger";
import {
  ADMISSION_NOTE,
  NARRATIVE_NOTE,
  OPERATIVE_NOTE,
  STAY_DOCUMENTS,
  testPattern,
} from "../services/testConstants";

// ============================================================================
// HELPERS
// ============================================================================

const processOnce = (documents: ReadonlyArray<ClinicalDocument>, config?: Partial<PipelineConfig>) =>
  Effect.flatMap(ClinicalPipelineService, (pipeline) => pipeline.process(documents, config));

const runPipeline = (
  documents: ReadonlyArray<ClinicalDocument>,
  config?: Partial<PipelineConfig>,
  options: PipelineLayerOptions = {}
) =>
  Effect.runPromise(
    pipe(processOnce(documents, config), Effect.provide(makePipelineLayer(options)), Effect.provide(TestLoggerLayer))
  );

const EMPTY_NOTE: ClinicalDocument = {
  id: "empty-1",
  type: "progress",
  timestamp: "2024-06-03T09:00:00",
  content: "",
};

const aneurysmPattern = testPattern({
  factType: "diagnosis",
  originalText: "ruptured aneurysm",
  correctedText: "ruptured anterior communicating artery aneurysm",
});

// ============================================================================
// TESTS
// ============================================================================

describe("Clinical Pipeline", () => {
  it("isolates a failing document from its siblings", async () => {
    const result = await runPipeline([ADMISSION_NOTE, EMPTY_NOTE, OPERATIVE_NOTE], { useCache: false });
    expect(result.failures).toEqual([{ documentId: "empty-1", reason: "Document content is empty" }]);
    expect(result.metrics.failedDocuments).toBe(1);
    expect(result.metrics.documentCount).toBe(3);
    expect(new Set(result.facts.map((fact) => fact.sourceDocument))).toEqual(new Set(["adm-1", "op-1"]));
  });

  it("produces identical facts and uncertainties across runs", async () => {
    const first = await runPipeline(STAY_DOCUMENTS, { useCache: false });
    const second = await runPipeline(STAY_DOCUMENTS, { useCache: false });
    expect(second.facts).toEqual(first.facts);
    expect(second.uncertainties).toEqual(first.uncertainties);
    expect(second.timeline).toEqual(first.timeline);
  });

  it("flags the complication that contradicts the operative note", async () => {
    const result = await runPipeline(STAY_DOCUMENTS, { useCache: false });
    const statement = result.facts.find((fact) => fact.text.includes("without complications"));
    const complication = result.facts.find((fact) => fact.type === "complication");
    const contradictions = result.uncertainties.filter((u) => u.issueType === "CONTRADICTORY_STATEMENTS");

    expect(contradictions).toHaveLength(1);
    expect(contradictions[0].severity).toBe("HIGH");
    expect(contradictions[0].factIds).toEqual([statement?.id, complication?.id]);
    expect(complication?.resolvedTimestamp).toBe("2024-06-04T10:00:00");
  });

  it("counts post-operative days from the operative note, not from later mentions", async () => {
    const followUpNote: ClinicalDocument = {
      id: "prog-3",
      name: "progress_note_day5.txt",
      type: "progress",
      timestamp: "2024-06-05T09:00:00",
      content: "POD#3 s/p craniotomy, doing well.",
    };
    const result = await runPipeline([OPERATIVE_NOTE, followUpNote], { useCache: false });
    const operation = result.facts.find((fact) => fact.type === "procedure" && fact.sourceDocument === "op-1");
    const pod = result.facts.find((fact) => fact.type === "temporal_reference" && fact.text === "POD#3");

    expect(pod?.resolvedTimestamp).toBe("2024-06-05T10:00:00");
    expect(result.timeline.anchors.map((anchor) => anchor.factId)).toEqual([operation?.id]);
    expect(
      result.timeline.keyEvents.filter((event) => event.kind === "surgery").map((event) => event.factId)
    ).toEqual([operation?.id]);
  });

  describe("caching", () => {
    it("serves the second identical run from the result cache", async () => {
      const [first, second] = await Effect.runPromise(
        pipe(
          Effect.zip(processOnce(STAY_DOCUMENTS), processOnce(STAY_DOCUMENTS)),
          Effect.provide(makePipelineLayer()),
          Effect.provide(MemoryCacheLive),
          Effect.provide(TestLoggerLayer)
        )
      );
      expect(first.metrics.resultFromCache).toBe(false);
      expect(first.metrics.cacheHits).toBe(0);
      expect(second.metrics.resultFromCache).toBe(true);
      expect(second.metrics.cacheHits).toBe(1);
      expect(second.facts).toEqual(first.facts);
      expect(second.uncertainties).toEqual(first.uncertainties);
    });

    it("reuses per-document facts when only run settings change", async () => {
      const second = await Effect.runPromise(
        pipe(
          Effect.zipRight(processOnce(STAY_DOCUMENTS), processOnce(STAY_DOCUMENTS, { documentationGapDays: 5 })),
          Effect.provide(makePipelineLayer()),
          Effect.provide(MemoryCacheLive),
          Effect.provide(TestLoggerLayer)
        )
      );
      expect(second.metrics.resultFromCache).toBe(false);
      expect(second.metrics.cacheHits).toBe(3);
    });

    it("does not share results across different matching settings", async () => {
      const [first, second] = await Effect.runPromise(
        pipe(
          Effect.zip(
            pipe(processOnce(STAY_DOCUMENTS), Effect.provide(makePipelineLayer())),
            pipe(processOnce(STAY_DOCUMENTS), Effect.provide(makePipelineLayer({ learning: { matchThreshold: 0.9 } })))
          ),
          Effect.provide(MemoryCacheLive),
          Effect.provide(TestLoggerLayer)
        )
      );
      expect(first.metrics.resultFromCache).toBe(false);
      expect(second.metrics.resultFromCache).toBe(false);
      expect(second.metrics.cacheHits).toBe(3);
    });

    it("computes normally when the cache backend is down", async () => {
      const capture = makeCapturingLogger();
      const degraded = await Effect.runPromise(
        pipe(
          processOnce(STAY_DOCUMENTS),
          Effect.provide(makePipelineLayer()),
          Effect.provide(unavailableCacheLayer()),
          Effect.provide(capture.layer)
        )
      );
      const uncached = await runPipeline(STAY_DOCUMENTS, { useCache: false });

      expect(degraded.failures).toEqual([]);
      expect(degraded.facts).toEqual(uncached.facts);
      expect(degraded.uncertainties).toEqual(uncached.uncertainties);
      const warnings = new Set(capture.lines.filter((line) => line.level === "WARN").map((line) => line.message));
      expect(warnings.has("Cache unavailable; computing without it")).toBe(true);
      expect(warnings.has("Cache write skipped")).toBe(true);
    });
  });

  describe("fallback capability", () => {
    it("counts fallback facts in the metrics", async () => {
      const result = await Effect.runPromise(
        pipe(
          processOnce([NARRATIVE_NOTE], { useCache: false }),
          Effect.provide(makePipelineLayer()),
          Effect.provide(staticFallbackLayer({ procedure: "Lumbar drain placement" })),
          Effect.provide(TestLoggerLayer)
        )
      );
      expect(result.metrics.factCounts.fallback).toBe(1);
      expect(result.facts.filter((fact) => fact.provenance === "llm_fallback").map((fact) => fact.text)).toEqual([
        "Procedure: Lumbar drain placement",
      ]);
    });

    it("skips the capability when disabled", async () => {
      const result = await Effect.runPromise(
        pipe(
          processOnce([NARRATIVE_NOTE], { useCache: false, fallbackEnabled: false }),
          Effect.provide(makePipelineLayer()),
          Effect.provide(staticFallbackLayer({ procedure: "Lumbar drain placement" })),
          Effect.provide(TestLoggerLayer)
        )
      );
      expect(result.metrics.factCounts.fallback).toBe(0);
    });
  });

  describe("learning", () => {
    it("applies preloaded approved patterns and records the application", async () => {
      const { result, pattern } = await Effect.runPromise(
        pipe(
          Effect.gen(function* (_) {
            const result = yield* _(processOnce([ADMISSION_NOTE], { useCache: false }));
            const feedback = yield* _(FeedbackManagerService);
            return { result, pattern: yield* _(feedback.get(aneurysmPattern.id)) };
          }),
          Effect.provide(makePipelineLayer({ patterns: [aneurysmPattern] })),
          Effect.provide(TestLoggerLayer)
        )
      );
      const diagnoses = result.facts.filter((fact) => fact.type === "diagnosis");
      expect(diagnoses.map((fact) => fact.text)).toEqual([
        "Diagnosis: Subarachnoid hemorrhage from ruptured anterior communicating artery aneurysm",
      ]);
      expect(diagnoses[0].correction?.patternId).toBe(aneurysmPattern.id);
      expect(result.metrics.learningPatternsApplied).toBe(1);
      expect(pattern.applicationCount).toBe(1);
    });

    it("leaves facts alone when learning is switched off", async () => {
      const result = await runPipeline([ADMISSION_NOTE], { useCache: false, applyLearning: false }, {
        patterns: [aneurysmPattern],
      });
      expect(result.metrics.learningPatternsApplied).toBe(0);
      expect(result.facts.every((fact) => fact.correction === undefined)).toBe(true);
    });

    it("ignores pending submissions", async () => {
      const result = await runPipeline([ADMISSION_NOTE], { useCache: false }, {
        patterns: [{ ...aneurysmPattern, status: "PENDING" }],
      });
      expect(result.metrics.learningPatternsApplied).toBe(0);
    });
  });

  it("runs end to end through the convenience entry point", async () => {
    const result = await processDocuments(STAY_DOCUMENTS, { useCache: false }, { cache: MemoryCacheLive });
    expect(result.metrics.documentCount).toBe(3);
    expect(result.failures).toEqual([]);
  });
});
