/**
 * Clinical scores (NIHSS, GCS, mRS, aneurysm and AVM grades).
 */

import { Option } from "effect";
import type { ClinicalFact } from "../../../schemas/clinicalFact";
import type { ClinicalKnowledgeBase } from "../../knowledgeBase.effect";
import { SpanClaims, lineFact, type ExtractionStrategy, type PreparedDocument } from "../types";

const extractScores = (document: PreparedDocument, kb: ClinicalKnowledgeBase): ReadonlyArray<ClinicalFact> => {
  const facts: ClinicalFact[] = [];

  for (const line of document.lines) {
    const claims = new SpanClaims();
    for (const matcher of kb.scoreMatchers) {
      for (const pattern of matcher.patterns) {
        for (const match of line.text.matchAll(pattern)) {
          const start = match.index ?? 0;
          if (!claims.claim(start, start + match[0].length)) continue;

          const value = Number.parseInt(match[1], 10);
          const check = Option.getOrElse(kb.checkScore(matcher.name, value), () => ({
            valid: false,
            critical: false,
            min: matcher.reference.min,
            max: matcher.reference.max,
          }));

          facts.push(
            lineFact(document, line, {
              type: "clinical_score",
              text: `${matcher.name}: ${value}`,
              // out-of-range scores are kept for the validator, at lower confidence
              confidence: check.valid ? 0.95 : 0.7,
              requiresValidation: !check.valid || check.critical,
              clinicalSignificance: check.critical ? "CRITICAL" : check.valid ? "ROUTINE" : "HIGH",
              normalized: {
                _tag: "ScoreValue",
                scoreName: matcher.name,
                value,
                valid: check.valid,
                critical: check.critical,
              },
            })
          );
        }
      }
    }
  }

  return facts;
};

export const clinicalScoreStrategy: ExtractionStrategy = {
  name: "clinical_score",
  factTypes: ["clinical_score"],
  extract: extractScores,
};
