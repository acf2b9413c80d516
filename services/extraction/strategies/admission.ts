/**
 * Admission anchor: one fact per admission document.
 */

import type { ClinicalFact } from "../../../schemas/clinicalFact";
import { lineFact, stripTrailingPunctuation, type ExtractionStrategy, type PreparedDocument } from "../types";

const ADMISSION_WORDS = /\badmi(?:t|tted|ssion)\b/i;

const extractAdmission = (document: PreparedDocument): ReadonlyArray<ClinicalFact> => {
  if (document.documentType !== "admission" || document.lines.length === 0) return [];
  const line = document.lines.find((candidate) => ADMISSION_WORDS.test(candidate.text)) ?? document.lines[0];
  const text = stripTrailingPunctuation(line.text.trim());
  return [
    lineFact(document, line, {
      type: "admission",
      text: ADMISSION_WORDS.test(text) ? text : `Admission: ${text}`,
      confidence: 0.95,
      clinicalSignificance: "HIGH",
    }),
  ];
};

export const admissionStrategy: ExtractionStrategy = {
  name: "admission",
  factTypes: ["admission"],
  extract: extractAdmission,
};
