/**
 * Lab values, graded against knowledge-base reference ranges.
 */

import type { ClinicalFact, ClinicalSignificance, LabSeverity } from "../../../schemas/clinicalFact";
import type { ClinicalKnowledgeBase } from "../../knowledgeBase.effect";
import { Option } from "effect";
import { SpanClaims, lineFact, type ExtractionStrategy, type PreparedDocument } from "../types";

const SIGNIFICANCE: Record<LabSeverity, ClinicalSignificance> = {
  CRITICAL: "CRITICAL",
  HIGH: "HIGH",
  LOW: "MEDIUM",
  NORMAL: "ROUTINE",
  UNKNOWN: "ROUTINE",
};

const extractLabValues = (document: PreparedDocument, kb: ClinicalKnowledgeBase): ReadonlyArray<ClinicalFact> => {
  const facts: ClinicalFact[] = [];
  const rangedConfidence = document.documentType === "lab" ? 0.97 : 0.95;

  for (const line of document.lines) {
    const claims = new SpanClaims();
    for (const matcher of kb.labMatchers) {
      for (const pattern of matcher.patterns) {
        for (const match of line.text.matchAll(pattern)) {
          const start = match.index ?? 0;
          if (!claims.claim(start, start + match[0].length)) continue;

          const value = Number.parseFloat(match[1]);
          if (!Number.isFinite(value)) continue;
          const concept = kb.normalizeLab(matcher, value);
          const unit = concept.unit.length > 0 ? ` ${concept.unit}` : "";

          facts.push(
            lineFact(document, line, {
              type: "lab_value",
              text: `Lab: ${concept.displayName} = ${value}${unit}`,
              confidence: Option.isSome(matcher.reference) ? rangedConfidence : 0.85,
              requiresValidation: concept.severity === "CRITICAL",
              clinicalSignificance: SIGNIFICANCE[concept.severity],
              normalized: concept,
            })
          );
        }
      }
    }
  }

  return facts;
};

export const labValueStrategy: ExtractionStrategy = {
  name: "lab_value",
  factTypes: ["lab_value"],
  extract: extractLabValues,
};
