/**
 * Medication orders, then bare mentions of known drugs.
 */

import type { ClinicalFact } from "../../../schemas/clinicalFact";
import type { ClinicalKnowledgeBase } from "../../knowledgeBase.effect";
import { SpanClaims, lineFact, type ExtractionStrategy, type PreparedDocument } from "../types";

const ORDER_PATTERN =
  /\b([A-Za-z][A-Za-z-]{2,})\s+(\d+(?:\.\d+)?)\s*(mg|mcg|g|units?|mEq|mL)(?![A-Za-z/])(?:\s+(PO|IV|IM|SC|SQ|SubQ|subcutaneous(?:ly)?|PR|SL))?(?:\s+(q\s?\d+\s?h|BID|TID|QID|daily|QHS|PRN|once))?/gi;

const NOT_A_DRUG = new Set([
  "of", "to", "and", "with", "dose", "total", "loss", "blood", "approximately", "given", "received",
  "started", "start", "continue", "continued", "the", "at", "by", "for", "from", "over", "each", "bolus",
]);

const COMPACT_UNITS = new Set(["mg", "mcg", "g", "ml", "meq"]);

const formatDose = (value: string, unit: string): string =>
  COMPACT_UNITS.has(unit.toLowerCase()) ? `${value}${unit}` : `${value} ${unit}`;

const canonicalDoseUnit = (unit: string): string => {
  const lower = unit.toLowerCase();
  if (lower === "unit") return "units";
  if (lower === "meq") return "mEq";
  if (lower === "ml") return "mL";
  return lower;
};

const nonDrugWords = (kb: ClinicalKnowledgeBase): ReadonlySet<string> =>
  new Set([
    ...NOT_A_DRUG,
    ...kb.labMatchers.flatMap((matcher) => [matcher.key, matcher.displayName.toLowerCase()]),
    ...kb.scoreMatchers.map((matcher) => matcher.name.toLowerCase()),
  ]);

const extractMedications = (document: PreparedDocument, kb: ClinicalKnowledgeBase): ReadonlyArray<ClinicalFact> => {
  const facts: ClinicalFact[] = [];
  const excluded = nonDrugWords(kb);
  const namePatterns = kb.medicationNames.map((name) => ({ name, pattern: new RegExp(`\\b${name}\\b`, "gi") }));

  for (const line of document.lines) {
    const claims = new SpanClaims();

    for (const match of line.text.matchAll(ORDER_PATTERN)) {
      const name = match[1].toLowerCase();
      if (excluded.has(name)) continue;
      const start = match.index ?? 0;
      if (!claims.claim(start, start + match[0].length)) continue;

      const unit = canonicalDoseUnit(match[3]);
      const route = match[4];
      const frequency = match[5];
      const info = kb.medicationInfo(name, {
        dose: { value: Number.parseFloat(match[2]), unit },
        route,
        frequency,
      });
      const parts = [name, formatDose(match[2], unit), route, frequency].filter(
        (part): part is string => part !== undefined
      );

      facts.push(
        lineFact(document, line, {
          type: "medication",
          text: `Medication: ${parts.join(" ")}`,
          confidence: info.inKnowledgeBase ? 0.95 : 0.85,
          requiresValidation: info.highRisk,
          clinicalSignificance: info.highRisk ? "HIGH" : "ROUTINE",
          normalized: info,
        })
      );
    }

    for (const { name, pattern } of namePatterns) {
      for (const match of line.text.matchAll(pattern)) {
        const start = match.index ?? 0;
        if (!claims.claim(start, start + match[0].length)) continue;
        const info = kb.medicationInfo(name);
        facts.push(
          lineFact(document, line, {
            type: "medication",
            text: `Medication: ${name}`,
            confidence: 0.9,
            requiresValidation: info.highRisk,
            clinicalSignificance: info.highRisk ? "HIGH" : "ROUTINE",
            normalized: info,
          })
        );
      }
    }
  }

  return facts;
};

export const medicationStrategy: ExtractionStrategy = {
  name: "medication",
  factTypes: ["medication"],
  extract: extractMedications,
  fallback: {
    factType: "medication",
    label: "Medication",
    instruction:
      "List the medication named in this clinical note with dose, route and frequency when stated. Reply NONE_FOUND if no medication is mentioned.",
    hint: /\b(?:mg|mcg|units?|dose|doses|started|medications?|prescribed|administered)\b/i,
  },
};
