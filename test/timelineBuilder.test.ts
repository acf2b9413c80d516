/**
 * TIMELINE BUILDER - TEST SUITE
 */

import { describe, it, expect } from "vitest";
import { Effect, Option, pipe } from "effect";
import type { ClinicalDocument, ClinicalFact } from "../schemas/clinicalFact";
import {
  TimelineBuilderService,
  TimelineBuilderServiceLive,
  buildTimeline,
  computeProgression,
  computeStayMetadata,
  groupByDay,
} from "../services/timelineBuilder.effect";
import { ClinicalKnowledgeBaseLive, defaultKnowledgeBase as kb } from "../services/knowledgeBase.effect";
import { withResolution } from "../services/clinicalFact";
import { TestLoggerLayer } from "../services/testLogger";
import { surgeryInfo, testFact } from "../services/testConstants";

// ============================================================================
// FIXTURES
// ============================================================================

const sodium = Option.getOrThrow(kb.findLab("sodium"));

const lab = (value: number, timestamp: string, sourceDocument: string) =>
  testFact({
    text: `Lab: Sodium = ${value} mmol/L`,
    type: "lab_value",
    sourceDocument,
    documentTimestamp: timestamp,
    normalized: kb.normalizeLab(sodium, value),
  });

const score = (scoreName: string, value: number, timestamp: string, sourceDocument: string, valid = true) =>
  testFact({
    text: `${scoreName}: ${value}`,
    type: "clinical_score",
    sourceDocument,
    documentTimestamp: timestamp,
    normalized: { _tag: "ScoreValue", scoreName, value, valid, critical: false },
  });

const admitted = testFact({
  text: "Admitted for subarachnoid hemorrhage",
  type: "admission",
  sourceDocument: "adm-1",
  documentTimestamp: "2024-06-01T08:00:00",
});
const nihssOnAdmission = score("NIHSS", 8, "2024-06-01T09:00:00", "adm-1");
const craniotomy = testFact({
  text: "Procedure: craniotomy",
  type: "procedure",
  sourceDocument: "op-1",
  documentType: "operative",
  documentTimestamp: "2024-06-02T10:00:00",
  normalized: surgeryInfo("craniotomy"),
});
const criticalSodium = lab(124, "2024-06-03T06:00:00", "lab-1");
const leak = withResolution(
  testFact({
    text: "Complication: CSF leak",
    type: "complication",
    sourceDocument: "prog-1",
    documentTimestamp: "2024-06-04T09:00:00",
  }),
  "2024-06-03T22:00:00",
  { method: "previous_night" },
  0.95
);
const normalSodium = lab(138, "2024-06-05T06:00:00", "lab-2");
const nihssLater = score("NIHSS", 3, "2024-06-05T09:00:00", "prog-2");
const invalidGcs = score("GCS", 2, "2024-06-05T10:00:00", "prog-2", false);

const STAY: ReadonlyArray<ClinicalFact> = [
  nihssLater,
  leak,
  admitted,
  invalidGcs,
  criticalSodium,
  craniotomy,
  normalSodium,
  nihssOnAdmission,
];

const DOCUMENTS: ReadonlyArray<ClinicalDocument> = [
  { id: "prog-1", type: "progress", timestamp: "2024-06-04T09:00:00", content: "CSF leak" },
  { id: "adm-1", type: "admission", timestamp: "2024-06-01T08:00:00", content: "Admitted" },
  { id: "op-1", type: "operative", timestamp: "2024-06-02T10:00:00", content: "Craniotomy" },
];

// ============================================================================
// TESTS
// ============================================================================

describe("Timeline Builder", () => {
  describe("days", () => {
    it("groups facts by effective date in chronological order", () => {
      const days = groupByDay(STAY);
      expect(days.map((day) => [day.date, day.facts.map((fact) => fact.id)])).toEqual([
        ["2024-06-01", [admitted.id, nihssOnAdmission.id]],
        ["2024-06-02", [craniotomy.id]],
        ["2024-06-03", [criticalSodium.id, leak.id]],
        ["2024-06-05", [normalSodium.id, nihssLater.id, invalidGcs.id]],
      ]);
    });

    it("orders same-time facts by confidence, highest first", () => {
      const low = testFact({ text: "Diagnosis: SAH", type: "diagnosis", confidence: 0.7 });
      const high = testFact({ text: "Diagnosis: aneurysm", type: "diagnosis", confidence: 0.95 });
      const [day] = groupByDay([low, high]);
      expect(day.facts.map((fact) => fact.confidence)).toEqual([0.95, 0.7]);
    });
  });

  describe("timeline", () => {
    const timeline = buildTimeline(STAY, DOCUMENTS, kb);

    it("lists key events in time order", () => {
      expect(timeline.keyEvents).toEqual([
        {
          kind: "admission",
          timestamp: "2024-06-01T08:00:00",
          date: "2024-06-01",
          factId: admitted.id,
          description: "Admitted for subarachnoid hemorrhage",
        },
        {
          kind: "surgery",
          timestamp: "2024-06-02T10:00:00",
          date: "2024-06-02",
          factId: craniotomy.id,
          description: "Procedure: craniotomy",
        },
        {
          kind: "critical_lab",
          timestamp: "2024-06-03T06:00:00",
          date: "2024-06-03",
          factId: criticalSodium.id,
          description: "Lab: Sodium = 124 mmol/L",
        },
        {
          kind: "complication",
          timestamp: "2024-06-03T22:00:00",
          date: "2024-06-03",
          factId: leak.id,
          description: "Complication: CSF leak",
        },
      ]);
    });

    it("does not count later mentions of a surgery as surgeries", () => {
      const recap = testFact({
        text: "Procedure: craniotomy",
        type: "procedure",
        sourceDocument: "dc-1",
        documentType: "discharge_summary",
        documentTimestamp: "2024-06-05T10:00:00",
        normalized: surgeryInfo("craniotomy"),
      });
      const events = buildTimeline([...STAY, recap], DOCUMENTS, kb).keyEvents;
      expect(events.filter((event) => event.kind === "surgery").map((event) => event.factId)).toEqual([craniotomy.id]);
    });

    it("computes stay metadata with an inclusive length of stay", () => {
      expect(timeline.metadata).toEqual({
        admission: "2024-06-01T08:00:00",
        discharge: "2024-06-05T10:00:00",
        admissionDate: "2024-06-01",
        dischargeDate: "2024-06-05",
        lengthOfStayDays: 5,
      });
    });

    it("summarizes documents and fact counts", () => {
      expect(timeline.documents).toEqual([
        { id: "adm-1", type: "admission", timestamp: "2024-06-01T08:00:00", factCount: 2 },
        { id: "op-1", type: "operative", timestamp: "2024-06-02T10:00:00", factCount: 1 },
        { id: "prog-1", type: "progress", timestamp: "2024-06-04T09:00:00", factCount: 1 },
      ]);
      expect(timeline.summary).toEqual({
        totalFacts: 8,
        dayCount: 4,
        keyEventCount: 4,
        factsByType: { clinical_score: 3, complication: 1, admission: 1, lab_value: 2, procedure: 1 },
      });
    });

    it("derives anchors from the facts when none are given", () => {
      expect(timeline.anchors.map((anchor) => anchor.factId)).toEqual([admitted.id, craniotomy.id]);
      expect(timeline.conflicts).toEqual([]);
    });

    it("carries the resolver's anchors and conflicts through", () => {
      const conflict = { type: "POD_WITHOUT_SURGERY" as const, factId: "f1", description: '"POD#1" has no surgery to anchor to' };
      const withContext = buildTimeline(STAY, DOCUMENTS, kb, { anchors: [], conflicts: [conflict] });
      expect(withContext.anchors).toEqual([]);
      expect(withContext.conflicts).toEqual([conflict]);
    });
  });

  describe("progression", () => {
    it("judges each tracked measurement by its polarity", () => {
      const progression = computeProgression(STAY, kb);
      expect(progression.map((entry) => [entry.measurement, entry.family, entry.direction, entry.firstValue, entry.lastValue])).toEqual([
        ["NIHSS", "neurological_deficit", "improving", 8, 3],
        ["sodium", "laboratory", "improving", 124, 138],
      ]);
    });

    it("reads a falling GCS as worsening", () => {
      const progression = computeProgression(
        [score("GCS", 14, "2024-06-01T09:00:00", "a"), score("GCS", 9, "2024-06-02T09:00:00", "b")],
        kb
      );
      expect(progression.map((entry) => entry.direction)).toEqual(["worsening"]);
    });

    it("needs two valid points", () => {
      const progression = computeProgression(
        [score("GCS", 14, "2024-06-01T09:00:00", "a"), score("GCS", 2, "2024-06-02T09:00:00", "b", false)],
        kb
      );
      expect(progression).toEqual([]);
    });
  });

  describe("stay metadata", () => {
    it("falls back to the earliest fact without an admission", () => {
      const metadata = computeStayMetadata([
        testFact({ text: "Diagnosis: SAH", type: "diagnosis", documentTimestamp: "2024-06-03T10:00:00" }),
        testFact({ text: "Diagnosis: vasospasm", type: "diagnosis", documentTimestamp: "2024-06-02T10:00:00" }),
      ]);
      expect(metadata.admission).toBe("2024-06-02T10:00:00");
      expect(metadata.lengthOfStayDays).toBe(2);
    });

    it("counts a same-day stay as one day", () => {
      expect(computeStayMetadata([admitted]).lengthOfStayDays).toBe(1);
    });

    it("reports zero days for an empty record", () => {
      expect(computeStayMetadata([])).toEqual({ lengthOfStayDays: 0 });
    });
  });

  it("builds through the service layer", async () => {
    const timeline = await Effect.runPromise(
      pipe(
        Effect.gen(function* (_) {
          const builder = yield* _(TimelineBuilderService);
          return yield* _(builder.build(STAY, DOCUMENTS));
        }),
        Effect.provide(TimelineBuilderServiceLive),
        Effect.provide(ClinicalKnowledgeBaseLive),
        Effect.provide(TestLoggerLayer)
      )
    );
    expect(timeline).toEqual(buildTimeline(STAY, DOCUMENTS, kb));
  });
});
