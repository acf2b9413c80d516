/**
 * SYNTHETIC CLINICAL TEST DATA
 *
 * Invented notes for an invented stay (June 2024). No real patients,
 * clinicians or identifiers.
 */

import type { ClinicalDocument, ClinicalFact, FactDraft, NormalizedValue } from "../schemas/clinicalFact";
import type { LearningPattern } from "../schemas/learning";
import { makeFact } from "./clinicalFact";
import { patternId } from "./learning/feedbackManager.effect";

export const TEST_TIMES = {
  ADMISSION: "2024-06-01T08:00:00",
  SURGERY: "2024-06-02T10:00:00",
  PROGRESS: "2024-06-04T09:00:00",
  DISCHARGE: "2024-06-08T11:00:00",
} as const;

// ============================================================================
// DOCUMENTS
// ============================================================================

export const ADMISSION_NOTE: ClinicalDocument = {
  id: "adm-1",
  name: "admission_hp.txt",
  type: "admission",
  timestamp: TEST_TIMES.ADMISSION,
  content: [
    "Admission H&P",
    "Patient admitted for subarachnoid hemorrhage.",
    "Admitting diagnosis: Subarachnoid hemorrhage from ruptured aneurysm",
    "Hunt-Hess 3, GCS 13",
    "Sodium 138",
  ].join("\n"),
};

export const OPERATIVE_NOTE: ClinicalDocument = {
  id: "op-1",
  name: "operative_note.txt",
  type: "operative",
  timestamp: TEST_TIMES.SURGERY,
  content: [
    "Procedure: Right pterional craniotomy for aneurysm clipping",
    "Findings: Ruptured right MCA aneurysm secured",
    "The procedure was completed without complications.",
  ].join("\n"),
};

export const PROGRESS_NOTE: ClinicalDocument = {
  id: "prog-1",
  name: "progress_note.txt",
  type: "progress",
  timestamp: TEST_TIMES.PROGRESS,
  content: [
    "POD#2: patient developed a CSF leak from the incision.",
    "Sodium 126 this morning.",
    "Nimodipine 60 mg PO q4h",
    "NIHSS 2",
  ].join("\n"),
};

export const DISCHARGE_NOTE: ClinicalDocument = {
  id: "dc-1",
  name: "discharge_summary.txt",
  type: "discharge_summary",
  timestamp: TEST_TIMES.DISCHARGE,
  content: [
    "Discharge medications:",
    "- Nimodipine 60 mg PO q4h",
    "Follow-up: Neurosurgery clinic in 2 weeks",
    "Discharge instructions:",
    "- No heavy lifting",
  ].join("\n"),
};

/** Prose only; the patterns find a relative time and nothing else. */
export const NARRATIVE_NOTE: ClinicalDocument = {
  id: "narr-1",
  name: "nursing_narrative.txt",
  type: "progress",
  timestamp: "2024-06-03T20:00:00",
  content:
    "The patient was taken for surgery yesterday and tolerated it well. She remains comfortable on the ward with family at the bedside.",
};

export const STAY_DOCUMENTS: ReadonlyArray<ClinicalDocument> = [ADMISSION_NOTE, OPERATIVE_NOTE, PROGRESS_NOTE];

// ============================================================================
// FACTS AND PATTERNS
// ============================================================================

type TestFactFields = Pick<FactDraft, "text" | "type"> & Partial<Omit<FactDraft, "text" | "type">>;

export const testFact = (fields: TestFactFields): ClinicalFact =>
  makeFact({
    sourceDocument: "test-doc",
    sourceLine: 1,
    documentTimestamp: TEST_TIMES.ADMISSION,
    confidence: 0.9,
    requiresValidation: false,
    provenance: "pattern",
    ...fields,
  });

export const surgeryInfo = (name: string): NormalizedValue => ({
  _tag: "ProcedureInfo",
  name,
  surgical: true,
  revision: false,
  successful: false,
});

type TestPatternFields = Pick<LearningPattern, "factType" | "originalText" | "correctedText"> &
  Partial<Omit<LearningPattern, "id" | "factType" | "originalText" | "correctedText">>;

export const testPattern = (fields: TestPatternFields): LearningPattern => ({
  id: patternId(fields),
  context: {},
  status: "APPROVED",
  createdBy: "test-reviewer",
  createdAt: 0,
  successRate: 1,
  applicationCount: 0,
  ...fields,
});
