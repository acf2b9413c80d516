/**
 * Complications, skipping negated and prophylactic mentions.
 */

import type { ClinicalFact } from "../../../schemas/clinicalFact";
import type { ClinicalKnowledgeBase } from "../../knowledgeBase.effect";
import {
  lineFact,
  sentencesOf,
  stripTrailingPunctuation,
  type ExtractionStrategy,
  type PreparedDocument,
} from "../types";

const NEGATED_BEFORE =
  /\b(?:no|not|without|denies|denied|negative for|free of|resolved|history of|h\/o|rule out|r\/o|monitor(?:ing)? for|watch for|risk of|concern for|prevent(?:ion)?)\b/i;

const PROPHYLACTIC_AFTER = /^s?\s*(?:prophylaxis|precautions|risk|protocol|screening)\b/i;

const NEGATIVE_BODY = /^(?:none|no|nil|n\/a|without)\b/i;

const COMPLICATION_LABELS = new Set(["complication", "complications"]);

/**
 * A contrasting conjunction ends the reach of an earlier negation. Plain
 * commas do not: "no hydrocephalus, vasospasm or CSF leak" stays negated.
 */
const CLAUSE_BREAK = /\b(?:but|however|although|though|yet|whereas)\b|,\s*(?:and|then|now|subsequently|later)\b/gi;

const negationScope = (before: string): string => before.split(CLAUSE_BREAK).at(-1) ?? before;

const isAffirmed = (sentence: string, index: number, length: number): boolean =>
  !NEGATED_BEFORE.test(negationScope(sentence.slice(0, index))) &&
  !PROPHYLACTIC_AFTER.test(sentence.slice(index + length));

const extractComplications = (document: PreparedDocument, kb: ClinicalKnowledgeBase): ReadonlyArray<ClinicalFact> => {
  const facts: ClinicalFact[] = [];

  for (const line of document.lines) {
    if (line.label !== undefined && COMPLICATION_LABELS.has(line.label)) {
      const body = stripTrailingPunctuation(line.body);
      if (body.length > 0 && !NEGATIVE_BODY.test(body)) {
        facts.push(
          lineFact(document, line, {
            type: "complication",
            text: `Complication: ${body}`,
            confidence: 0.9,
            requiresValidation: true,
            clinicalSignificance: "CRITICAL",
          })
        );
      }
      continue;
    }

    for (const sentence of sentencesOf(line.text)) {
      const affirmed = kb.complicationPatterns.some((pattern) =>
        Array.from(sentence.text.matchAll(pattern)).some((match) =>
          isAffirmed(sentence.text, match.index ?? 0, match[0].length)
        )
      );
      if (!affirmed) continue;
      facts.push(
        lineFact(document, line, {
          type: "complication",
          text: `Complication: ${stripTrailingPunctuation(sentence.text)}`,
          confidence: 0.9,
          requiresValidation: true,
          clinicalSignificance: "CRITICAL",
        })
      );
    }
  }

  return facts;
};

export const complicationStrategy: ExtractionStrategy = {
  name: "complication",
  factTypes: ["complication"],
  extract: extractComplications,
  fallback: {
    factType: "complication",
    label: "Complication",
    instruction:
      "State the complication this clinical note reports (for example a leak, infection, hemorrhage or thrombosis). Reply NONE_FOUND if no complication is reported.",
    hint: /\b(?:developed|complicated by|leak|infection|hematoma|thrombosis|embolism|deteriorat\w*)\b/i,
  },
};
