/**
 * Consultations and consultant recommendations.
 */

import type { ClinicalFact } from "../../../schemas/clinicalFact";
import {
  lineFact,
  stripTrailingPunctuation,
  type DocumentLine,
  type ExtractionStrategy,
  type PreparedDocument,
} from "../types";

const SPECIALTIES: ReadonlyArray<readonly [RegExp, string]> = [
  [/\binfectious diseases?\b|\bID\b/i, "Infectious Disease"],
  [/\bneurosurgery\b/i, "Neurosurgery"],
  [/\bneurology\b/i, "Neurology"],
  [/\bthrombosis\b|\bhematology\b/i, "Thrombosis"],
  [/\bcardiology\b/i, "Cardiology"],
  [/\bnephrology\b/i, "Nephrology"],
  [/\bendocrinology\b/i, "Endocrinology"],
  [/\bcritical care\b/i, "Critical Care"],
  [/\bphysical therapy\b/i, "Physical Therapy"],
  [/\bpalliative\b/i, "Palliative Care"],
];

const REQUESTED = /\b([A-Za-z][A-Za-z ]{1,30}?)\s+consult(?:ation)?\s+(?:requested|called|obtained|placed|recommended)\b/i;
const REASON_LABELS = new Set(["reason for consult", "reason for consultation"]);
const RECOMMENDATION_SECTIONS = new Set(["recommendations", "recommendation", "plan", "assessment and plan"]);
const ID_LABELS = new Set(["antibiotic recommendations", "antibiotics", "antibiotic"]);
const THROMBOSIS_LABELS = new Set(["dvt prophylaxis", "vte prophylaxis", "anticoagulation"]);
const LIST_ITEM = /^\s*(?:\d+[.)]|[-*•])\s*(.+)$/;

const detectSpecialty = (text: string): string | undefined =>
  SPECIALTIES.find(([pattern]) => pattern.test(text))?.[1];

const recommendationText = (line: DocumentLine): string | undefined => {
  if (line.label !== undefined && ID_LABELS.has(line.label) && line.body.length > 0) {
    return `ID recommendation: ${line.body}`;
  }
  if (line.label !== undefined && THROMBOSIS_LABELS.has(line.label) && line.body.length > 0) {
    return `Thrombosis recommendation: ${line.body}`;
  }
  if (line.section === undefined || !RECOMMENDATION_SECTIONS.has(line.section)) return undefined;
  if (line.label !== undefined && RECOMMENDATION_SECTIONS.has(line.label)) {
    return line.body.length > 0 ? `Recommendation: ${line.body}` : undefined;
  }
  const item = LIST_ITEM.exec(line.text);
  return item === null ? undefined : `Recommendation: ${item[1].trim()}`;
};

const extractConsultations = (document: PreparedDocument): ReadonlyArray<ClinicalFact> => {
  const facts: ClinicalFact[] = [];
  const isConsult = document.documentType === "consult";
  const heading = document.lines.slice(0, 5).map((line) => line.text).join(" ");
  const specialty = document.document.specialty ?? detectSpecialty(heading);

  if (isConsult && document.lines.length > 0) {
    const reasonLine = document.lines.find((line) => line.label !== undefined && REASON_LABELS.has(line.label));
    const line = reasonLine ?? document.lines[0];
    const reason = reasonLine === undefined ? "" : ` - ${stripTrailingPunctuation(reasonLine.body)}`;
    facts.push(
      lineFact(document, line, {
        type: "consultation",
        text: `Consultation: ${specialty ?? "Unspecified specialty"}${reason}`,
        confidence: 0.92,
        specialty,
        clinicalSignificance: "MEDIUM",
      })
    );
  }

  for (const line of document.lines) {
    const requested = REQUESTED.exec(line.text);
    if (requested !== null) {
      facts.push(
        lineFact(document, line, {
          type: "consultation",
          text: `Consultation: ${stripTrailingPunctuation(requested[0])}`,
          confidence: 0.88,
          specialty: detectSpecialty(requested[1]),
        })
      );
    }

    if (!isConsult) continue;
    const recommendation = recommendationText(line);
    if (recommendation !== undefined) {
      facts.push(
        lineFact(document, line, {
          type: "recommendation",
          text: stripTrailingPunctuation(recommendation),
          confidence: 0.88,
          specialty,
        })
      );
    }
  }

  return facts;
};

export const consultationStrategy: ExtractionStrategy = {
  name: "consultation",
  factTypes: ["consultation", "recommendation"],
  extract: extractConsultations,
};
