/**
 * Vital signs.
 */

import type { ClinicalFact } from "../../../schemas/clinicalFact";
import { SpanClaims, lineFact, type ExtractionStrategy, type PreparedDocument } from "../types";

interface VitalPattern {
  readonly name: string;
  readonly pattern: RegExp;
}

const VITAL_PATTERNS: ReadonlyArray<VitalPattern> = [
  { name: "BP", pattern: /\b(?:BP|[Bb]lood pressure)\s*[:=]?\s*(\d{2,3})\s*\/\s*(\d{2,3})/g },
  { name: "HR", pattern: /\b(?:HR|[Hh]eart rate|[Pp]ulse)\s*[:=]?\s*(\d{2,3})\b/g },
  { name: "RR", pattern: /\b(?:RR|[Rr]esp(?:iratory)? rate)\s*[:=]?\s*(\d{1,2})\b/g },
  { name: "SpO2", pattern: /\b(?:SpO2|SaO2|O2 sat(?:uration)?)\s*[:=]?\s*(\d{2,3})\s*%?/g },
  { name: "Temp", pattern: /\b(?:Temp|[Tt]emperature|Tmax)\s*[:=]?\s*(\d{2,3}(?:\.\d)?)/g },
];

const extractVitals = (document: PreparedDocument): ReadonlyArray<ClinicalFact> => {
  const facts: ClinicalFact[] = [];

  for (const line of document.lines) {
    const claims = new SpanClaims();
    for (const { name, pattern } of VITAL_PATTERNS) {
      for (const match of line.text.matchAll(pattern)) {
        const start = match.index ?? 0;
        if (!claims.claim(start, start + match[0].length)) continue;

        const value = Number.parseFloat(match[1]);
        const secondary = match[2] === undefined ? undefined : Number.parseFloat(match[2]);
        const reading = secondary === undefined ? match[1] : `${match[1]}/${match[2]}`;

        facts.push(
          lineFact(document, line, {
            type: "vital_sign",
            text: `${name}: ${reading}`,
            confidence: 0.9,
            clinicalSignificance: "ROUTINE",
            normalized: { _tag: "VitalValue", name, value, secondary },
          })
        );
      }
    }
  }

  return facts;
};

export const vitalSignStrategy: ExtractionStrategy = {
  name: "vital_sign",
  factTypes: ["vital_sign"],
  extract: extractVitals,
};
