/**
 * Diagnoses from labelled lines and the list items under diagnosis headers.
 */

import type { ClinicalFact } from "../../../schemas/clinicalFact";
import { lineFact, stripTrailingPunctuation, type ExtractionStrategy, type PreparedDocument } from "../types";

const DIAGNOSIS_LABELS = new Set([
  "diagnosis",
  "diagnoses",
  "assessment",
  "impression",
  "discharge diagnosis",
  "discharge diagnoses",
  "admitting diagnosis",
  "admission diagnosis",
  "primary diagnosis",
  "principal diagnosis",
  "secondary diagnoses",
  "final diagnosis",
  "preoperative diagnosis",
  "postoperative diagnosis",
  "pre-operative diagnosis",
  "post-operative diagnosis",
]);

const LIST_ITEM = /^\s*(?:\d+[.)]|[-*•])\s*(.+)$/;
const ICD_CODE = /\b[A-TV-Z]\d{2}(?:\.\d{1,4})?\b/;

const extractDiagnoses = (document: PreparedDocument): ReadonlyArray<ClinicalFact> => {
  const facts: ClinicalFact[] = [];

  const push = (line: PreparedDocument["lines"][number], raw: string) => {
    const text = stripTrailingPunctuation(raw.trim());
    if (text.length === 0) return;
    facts.push(
      lineFact(document, line, {
        type: "diagnosis",
        text: `Diagnosis: ${text}`,
        confidence: ICD_CODE.test(text) ? 0.95 : 0.9,
        clinicalSignificance: "HIGH",
      })
    );
  };

  for (const line of document.lines) {
    if (line.label !== undefined && DIAGNOSIS_LABELS.has(line.label)) {
      push(line, line.body);
      continue;
    }
    if (line.section !== undefined && DIAGNOSIS_LABELS.has(line.section) && line.label === undefined) {
      const item = LIST_ITEM.exec(line.text);
      if (item !== null) push(line, item[1]);
    }
  }

  return facts;
};

export const diagnosisStrategy: ExtractionStrategy = {
  name: "diagnosis",
  factTypes: ["diagnosis"],
  extract: extractDiagnoses,
  fallback: {
    factType: "diagnosis",
    label: "Diagnosis",
    instruction: "State the primary diagnosis documented in this clinical note. Reply NONE_FOUND if none is documented.",
    hint: /\b(?:diagnos\w*|hemorrhage|aneurysm|tumou?r|fracture|stenosis|injury|stroke|infarct\w*|mass|hydrocephalus)\b/i,
  },
};
