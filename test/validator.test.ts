/**
 * VALIDATOR - TEST SUITE
 *
 * One block per stage, then the stage ordering guarantees and the
 * uncertainty workflow helpers.
 */

import { describe, it, expect } from "vitest";
import { Effect, Option, pipe } from "effect";
import type { Assertion, ClinicalFact } from "../schemas/clinicalFact";
import type { TemporalConflict } from "../schemas/timeline";
import type { Uncertainty } from "../schemas/validation";
import {
  ValidatorService,
  ValidatorServiceLive,
  makeValidator,
  resolveUncertainty,
  summarizeUncertainties,
} from "../services/validator.effect";
import type { ValidatorSettings } from "../services/validation";
import { isMaterialDifference } from "../services/validation";
import { ClinicalKnowledgeBaseLive, defaultKnowledgeBase as kb } from "../services/knowledgeBase.effect";
import { buildTimeline } from "../services/timelineBuilder.effect";
import { TestLoggerLayer, makeCapturingLogger } from "../services/testLogger";
import { surgeryInfo, testFact } from "../services/testConstants";

// ============================================================================
// HELPERS
// ============================================================================

const validator = makeValidator(kb);

const validate = (
  facts: ReadonlyArray<ClinicalFact>,
  settings?: Partial<ValidatorSettings>,
  conflicts: ReadonlyArray<TemporalConflict> = []
) => {
  const timeline = buildTimeline(facts, [], kb);
  return Effect.runPromise(
    pipe(validator.validate(facts, { ...timeline, conflicts }, settings), Effect.provide(TestLoggerLayer))
  );
};

const issues = async (
  facts: ReadonlyArray<ClinicalFact>,
  category: Uncertainty["category"],
  settings?: Partial<ValidatorSettings>
) => (await validate(facts, settings)).uncertainties.filter((uncertainty) => uncertainty.category === category);

const sodium = Option.getOrThrow(kb.findLab("sodium"));

const labFact = (value: number, documentTimestamp: string) =>
  testFact({
    text: `Lab: Sodium = ${value} mmol/L`,
    type: "lab_value",
    sourceDocument: `lab-${documentTimestamp}`,
    documentTimestamp,
    normalized: kb.normalizeLab(sodium, value),
  });

const scoreFact = (scoreName: string, value: number, documentTimestamp: string) => {
  const check = Option.getOrThrow(kb.checkScore(scoreName, value));
  return testFact({
    text: `${scoreName}: ${value}`,
    type: "clinical_score",
    sourceDocument: `note-${documentTimestamp}`,
    documentTimestamp,
    normalized: { _tag: "ScoreValue", scoreName, value, valid: check.valid, critical: check.critical },
  });
};

const medicationFact = (name: string, dose?: { value: number; unit: string }) =>
  testFact({
    text: `Medication: ${name}`,
    type: "medication",
    normalized: kb.medicationInfo(name, { dose }),
  });

const statement = (text: string, assertion: Assertion, documentTimestamp: string, family?: string) =>
  testFact({
    text,
    type: "finding",
    documentTimestamp,
    normalized: { _tag: "StatementInfo", assertion, family },
  });

const complete = [
  testFact({ text: "Diagnosis: Subarachnoid hemorrhage", type: "diagnosis" }),
  testFact({ text: "Procedure: craniotomy", type: "procedure", normalized: surgeryInfo("craniotomy") }),
  testFact({
    text: "Medication: nimodipine",
    type: "medication",
    section: "discharge medications",
    normalized: kb.medicationInfo("nimodipine"),
  }),
  testFact({
    text: "Follow-up: clinic in 2 weeks",
    type: "follow_up",
    normalized: { _tag: "FollowUpInfo", kind: "follow_up" },
  }),
  testFact({
    text: "Instruction: No driving",
    type: "follow_up",
    normalized: { _tag: "FollowUpInfo", kind: "instructions" },
  }),
];

// ============================================================================
// STAGE 1: FORMAT
// ============================================================================

describe("Validator", () => {
  describe("format stage", () => {
    it("clamps out-of-range confidence and records it", async () => {
      const overconfident: ClinicalFact = { ...testFact({ text: "Diagnosis: SAH", type: "diagnosis" }), confidence: 1.4 };
      const result = await validate([overconfident]);
      expect(result.facts[0].confidence).toBe(1);
      expect(overconfident.confidence).toBe(1.4);
      const format = result.uncertainties.filter((u) => u.category === "FORMAT");
      expect(format.map((u) => [u.severity, u.issueType, u.description, u.factIds])).toEqual([
        ["MEDIUM", "CONFIDENCE_OUT_OF_RANGE", "Confidence 1.4 is outside [0, 1]; clamped to 1", [overconfident.id]],
      ]);
    });

    it("flags empty text and missing fields", async () => {
      const broken: ClinicalFact = { ...testFact({ text: "Diagnosis: SAH", type: "diagnosis" }), text: " ", sourceDocument: "" };
      const format = await issues([broken], "FORMAT");
      expect(format.map((u) => u.issueType)).toEqual(["EMPTY_FACT_TEXT", "MISSING_REQUIRED_FIELD"]);
      expect(format[1].description).toBe("Fact is missing required field(s): sourceDocument");
    });

    it("flags unparseable timestamps", async () => {
      const undated: ClinicalFact = {
        ...testFact({ text: "Diagnosis: SAH", type: "diagnosis" }),
        documentTimestamp: "sometime in June",
      };
      const format = await issues([undated], "FORMAT");
      expect(format.map((u) => u.description)).toEqual(['Document timestamp "sometime in June" cannot be parsed']);
    });
  });

  // ============================================================================
  // STAGE 2: CLINICAL RULES
  // ============================================================================

  describe("clinical rule stage", () => {
    it("flags lab values at or beyond critical thresholds", async () => {
      const rules = await issues([labFact(124, "2024-06-03T06:00:00"), labFact(126, "2024-06-03T07:00:00")], "CLINICAL_RULE");
      expect(rules.map((u) => [u.severity, u.issueType, u.description])).toEqual([
        ["HIGH", "CRITICAL_LAB_VALUE", "Sodium 124 mmol/L is at or beyond the critical low threshold (125)"],
      ]);
    });

    it("flags out-of-range and critical scores", async () => {
      const rules = await issues(
        [scoreFact("GCS", 2, "2024-06-03T06:00:00"), scoreFact("GCS", 7, "2024-06-04T06:00:00")],
        "CLINICAL_RULE"
      );
      expect(rules.map((u) => [u.severity, u.description])).toEqual([
        ["HIGH", "GCS 2 is outside the valid range 3-15"],
        ["MEDIUM", "GCS 7 is in the critical range"],
      ]);
    });

    it("flags doses above the maximum single dose", async () => {
      const rules = await issues(
        [medicationFact("nimodipine", { value: 120, unit: "mg" }), medicationFact("levetiracetam", { value: 500, unit: "mg" })],
        "CLINICAL_RULE"
      );
      expect(rules.map((u) => [u.severity, u.description])).toEqual([
        ["HIGH", "nimodipine 120 mg exceeds the maximum single dose of 90 mg"],
      ]);
    });

    it("compares doses across convertible units", async () => {
      const rules = await issues([medicationFact("mannitol", { value: 200000, unit: "mg" })], "CLINICAL_RULE");
      expect(rules.map((u) => u.description)).toEqual(["mannitol 200000 mg exceeds the maximum single dose of 150 g"]);
    });

    it("notes doses in units it cannot convert", async () => {
      const rules = await issues([medicationFact("heparin", { value: 5, unit: "mL" })], "CLINICAL_RULE");
      expect(rules.map((u) => [u.severity, u.issueType, u.description])).toEqual([
        ["LOW", "DOSE_UNIT_MISMATCH", "heparin dose 5 mL cannot be compared with the maximum in units"],
      ]);
    });
  });

  // ============================================================================
  // STAGE 3: TEMPORAL
  // ============================================================================

  describe("temporal stage", () => {
    const first = testFact({ text: "Diagnosis: SAH", type: "diagnosis", documentTimestamp: "2024-06-01T09:00:00" });
    const later = testFact({ text: "Diagnosis: vasospasm", type: "diagnosis", documentTimestamp: "2024-06-06T09:00:00" });

    it("flags documentation gaps longer than the threshold", async () => {
      const temporal = await issues([first, later], "TEMPORAL");
      expect(temporal).toHaveLength(1);
      expect(temporal[0]).toMatchObject({
        severity: "MEDIUM",
        issueType: "DOCUMENTATION_GAP",
        description: "No documentation for 5 days between 2024-06-01 and 2024-06-06",
        factIds: [first.id, later.id],
      });
    });

    it("takes the gap threshold from settings", async () => {
      expect(await issues([first, later], "TEMPORAL", { documentationGapDays: 5 })).toEqual([]);
    });

    it("flags discharge documentation dated before admission", async () => {
      const admitted = testFact({ text: "Admitted", type: "admission", documentTimestamp: "2024-06-05T08:00:00" });
      const discharged = testFact({
        text: "Medication: nimodipine",
        type: "medication",
        documentType: "discharge_summary",
        documentTimestamp: "2024-06-02T10:00:00",
      });
      const temporal = await issues([admitted, discharged], "TEMPORAL");
      expect(temporal.map((u) => [u.issueType, u.description, u.factIds])).toEqual([
        [
          "DISCHARGE_BEFORE_ADMISSION",
          "Discharge documentation (2024-06-02T10:00:00) precedes admission (2024-06-05T08:00:00)",
          [admitted.id, discharged.id],
        ],
      ]);
    });

    it("surfaces resolver conflicts as high severity", async () => {
      const result = await validate([first], undefined, [
        { type: "POD_WITHOUT_SURGERY", factId: first.id, description: '"POD#1" has no surgery to anchor to' },
      ]);
      const temporal = result.uncertainties.filter((u) => u.category === "TEMPORAL");
      expect(temporal.map((u) => [u.severity, u.issueType, u.suggestedResolution])).toEqual([
        ["HIGH", "POD_WITHOUT_SURGERY", "Add the operative note or correct the post-operative day"],
      ]);
    });
  });

  // ============================================================================
  // STAGE 4: CROSS-FACT
  // ============================================================================

  describe("cross-fact stage", () => {
    it("flags materially different values recorded close together", async () => {
      const a = scoreFact("GCS", 14, "2024-06-03T10:00:00");
      const b = scoreFact("GCS", 9, "2024-06-03T10:30:00");
      const cross = await issues([a, b], "CROSS_FACT");
      expect(cross.map((u) => [u.severity, u.description, u.factIds])).toEqual([
        ["HIGH", "GCS recorded as 14 and 9 within 30 minutes", [a.id, b.id]],
      ]);
    });

    it("ignores small differences and readings outside the window", async () => {
      const cross = await issues(
        [
          scoreFact("GCS", 14, "2024-06-03T10:00:00"),
          scoreFact("GCS", 13, "2024-06-03T10:10:00"),
          labFact(138, "2024-06-03T06:00:00"),
          labFact(126, "2024-06-03T09:00:00"),
        ],
        "CROSS_FACT"
      );
      expect(cross).toEqual([]);
    });

    it("judges material difference by score delta or relative change", () => {
      expect(isMaterialDifference({ key: "score:GCS", label: "GCS", value: 14, kind: "score" }, { key: "score:GCS", label: "GCS", value: 12, kind: "score" })).toBe(true);
      expect(isMaterialDifference({ key: "lab:sodium", label: "Sodium", value: 140, kind: "quantity" }, { key: "lab:sodium", label: "Sodium", value: 130, kind: "quantity" })).toBe(false);
    });

    it("reports medication interactions with the facts involved", async () => {
      const warfarin = medicationFact("warfarin");
      const phenytoin = medicationFact("phenytoin");
      const cross = await issues([warfarin, phenytoin], "CROSS_FACT");
      expect(cross.map((u) => [u.severity, u.description, u.factIds])).toEqual([
        ["HIGH", "Phenytoin alters warfarin metabolism; monitor INR closely (warfarin, phenytoin)", [warfarin.id, phenytoin.id]],
        [
          "HIGH",
          "Anticoagulant use in neurosurgical patient; verify bleeding risk and timing (warfarin)",
          [warfarin.id],
        ],
      ]);
    });
  });

  // ============================================================================
  // STAGE 5: CONTRADICTION
  // ============================================================================

  describe("contradiction stage", () => {
    it("flags a no-complications statement against a later complication", async () => {
      const claim = statement("Procedure was completed without complications", "NO_COMPLICATIONS", "2024-06-02T10:00:00");
      const leak = testFact({ text: "Complication: CSF leak", type: "complication", documentTimestamp: "2024-06-04T09:00:00" });
      const contradictions = await issues([claim, leak], "CONTRADICTION");
      expect(contradictions).toHaveLength(1);
      expect(contradictions[0]).toMatchObject({
        severity: "HIGH",
        issueType: "CONTRADICTORY_STATEMENTS",
        description:
          '"Procedure was completed without complications" contradicts documented complication(s): "Complication: CSF leak"',
        factIds: [claim.id, leak.id],
      });
    });

    it("ignores complications dated before the statement", async () => {
      const earlier = testFact({ text: "Complication: vasospasm", type: "complication", documentTimestamp: "2024-06-01T09:00:00" });
      const claim = statement("No complications since surgery", "NO_COMPLICATIONS", "2024-06-02T10:00:00");
      expect(await issues([earlier, claim], "CONTRADICTION")).toEqual([]);
    });

    it("flags a successful procedure that needed a revision", async () => {
      const success = testFact({
        text: "Procedure: craniotomy",
        type: "procedure",
        normalized: { _tag: "ProcedureInfo", name: "craniotomy", surgical: true, revision: false, successful: true },
      });
      const revision = testFact({
        text: "Procedure: wound washout",
        type: "procedure",
        normalized: { _tag: "ProcedureInfo", name: "wound washout", surgical: true, revision: true, successful: false },
      });
      const contradictions = await issues([success, revision], "CONTRADICTION");
      expect(contradictions.map((u) => [u.severity, u.issueType, u.factIds])).toEqual([
        ["MEDIUM", "CONTRADICTORY_OUTCOMES", [success.id, revision.id]],
      ]);
    });

    it("flags stable-for-discharge against a recent critical value", async () => {
      const claim = statement("Stable for discharge", "STABLE_FOR_DISCHARGE", "2024-06-08T10:00:00");
      const recent = labFact(124, "2024-06-07T12:00:00");
      const old = labFact(123, "2024-06-05T06:00:00");
      const contradictions = await issues([old, recent, claim], "CONTRADICTION");
      expect(contradictions.map((u) => [u.issueType, u.factIds])).toEqual([
        ["DISCHARGE_STATUS_CONTRADICTION", [claim.id, recent.id]],
      ]);
    });

    it("flags improvement claims against a worsening trend in the same family", async () => {
      const gcsBefore = scoreFact("GCS", 14, "2024-06-02T09:00:00");
      const gcsAfter = scoreFact("GCS", 9, "2024-06-04T09:00:00");
      const claim = statement("Mental status improving", "IMPROVING", "2024-06-04T12:00:00", "consciousness");
      const contradictions = await issues([gcsBefore, gcsAfter, claim], "CONTRADICTION");
      expect(contradictions.map((u) => [u.issueType, u.description, u.factIds])).toEqual([
        ["CONTRADICTORY_TREND", '"Mental status improving" but GCS worsened from 14 to 9', [claim.id, gcsAfter.id]],
      ]);
    });

    it("leaves improvement claims about another family alone", async () => {
      const claim = statement("Strength improving", "IMPROVING", "2024-06-04T12:00:00", "neurological_deficit");
      const facts = [scoreFact("GCS", 14, "2024-06-02T09:00:00"), scoreFact("GCS", 9, "2024-06-04T09:00:00"), claim];
      expect(await issues(facts, "CONTRADICTION")).toEqual([]);
    });
  });

  // ============================================================================
  // STAGE 6: COMPLETENESS
  // ============================================================================

  describe("completeness stage", () => {
    it("reports every missing element for an empty record", async () => {
      const result = await validate([]);
      expect(result.uncertainties.map((u) => [u.severity, u.issueType])).toEqual([
        ["HIGH", "MISSING_DIAGNOSIS"],
        ["HIGH", "MISSING_PROCEDURE"],
        ["HIGH", "MISSING_DISCHARGE_MEDICATIONS"],
        ["MEDIUM", "MISSING_FOLLOW_UP"],
        ["MEDIUM", "MISSING_DISCHARGE_INSTRUCTIONS"],
      ]);
    });

    it("passes a complete record", async () => {
      expect(await issues(complete, "COMPLETENESS")).toEqual([]);
    });

    it("accepts documented non-operative management in place of a procedure", async () => {
      const conservative = [
        ...complete.filter((fact) => fact.type !== "procedure"),
        statement("Plan for conservative management", "NON_OPERATIVE_MANAGEMENT", "2024-06-01T08:00:00"),
      ];
      expect(await issues(conservative, "COMPLETENESS")).toEqual([]);
    });
  });

  // ============================================================================
  // ORDERING AND WORKFLOW
  // ============================================================================

  describe("stage ordering", () => {
    it("runs every stage even when earlier stages find issues", async () => {
      const overconfident: ClinicalFact = { ...scoreFact("GCS", 2, "2024-06-03T06:00:00"), confidence: 1.4 };
      const result = await validate([overconfident]);
      expect([...new Set(result.uncertainties.map((u) => u.category))]).toEqual(["FORMAT", "CLINICAL_RULE", "COMPLETENESS"]);
    });

    it("produces the same ids on every run", async () => {
      const facts = [labFact(124, "2024-06-03T06:00:00"), ...complete];
      const first = await validate(facts);
      const second = await validate(facts);
      expect(second.uncertainties.map((u) => u.id)).toEqual(first.uncertainties.map((u) => u.id));
    });

    it("logs a warning when high-severity issues are found", async () => {
      const capture = makeCapturingLogger();
      await Effect.runPromise(
        pipe(
          Effect.gen(function* (_) {
            const service = yield* _(ValidatorService);
            return yield* _(service.validate([], buildTimeline([], [], kb)));
          }),
          Effect.provide(ValidatorServiceLive),
          Effect.provide(ClinicalKnowledgeBaseLive),
          Effect.provide(capture.layer)
        )
      );
      expect(capture.lines.filter((line) => line.level === "WARN")).toEqual([
        { level: "WARN", message: "High-severity uncertainties flagged", annotations: { high: 3, total: 5 } },
      ]);
    });
  });

  describe("uncertainty workflow", () => {
    it("resolves one uncertainty by id and summarizes the rest", async () => {
      const { uncertainties } = await validate([]);
      const target = uncertainties[0];
      const updated = resolveUncertainty(uncertainties, target.id, "Diagnosis added by reviewer");
      expect(updated[0]).toEqual({ ...target, resolved: true, resolution: "Diagnosis added by reviewer" });
      expect(updated.slice(1)).toEqual(uncertainties.slice(1));

      expect(summarizeUncertainties(updated)).toEqual({
        total: 5,
        unresolved: 4,
        bySeverity: { HIGH: 3, MEDIUM: 2, LOW: 0 },
        byCategory: { COMPLETENESS: 5 },
      });
    });

    it("leaves the list unchanged for an unknown id", async () => {
      const { uncertainties } = await validate([]);
      expect(resolveUncertainty(uncertainties, "missing", "n/a")).toEqual(uncertainties);
    });
  });
});
