/**
 * Relative time expressions (POD#N, HD#N, "overnight", "6 hours after").
 */

import type { ClinicalFact } from "../../../schemas/clinicalFact";
import type { ClinicalKnowledgeBase } from "../../knowledgeBase.effect";
import { SpanClaims, lineFact, type ExtractionStrategy, type PreparedDocument } from "../types";

const extractTemporalReferences = (
  document: PreparedDocument,
  kb: ClinicalKnowledgeBase
): ReadonlyArray<ClinicalFact> => {
  const facts: ClinicalFact[] = [];

  for (const line of document.lines) {
    const claims = new SpanClaims();
    for (const match of kb.matchTemporal(line.text)) {
      if (!claims.claim(match.index, match.index + match.matchedText.length)) continue;
      facts.push(
        lineFact(document, line, {
          type: "temporal_reference",
          text: match.matchedText,
          confidence: 0.8,
          normalized: {
            _tag: "TemporalInfo",
            kind: match.kind,
            matchedText: match.matchedText,
            amount: match.amount,
          },
        })
      );
    }
  }

  return facts;
};

export const temporalReferenceStrategy: ExtractionStrategy = {
  name: "temporal_reference",
  factTypes: ["temporal_reference"],
  extract: extractTemporalReferences,
};
