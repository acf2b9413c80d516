/**
 * Narrative assertions the contradiction checks compare against
 * structured facts: "no complications", "successful", "stable for
 * discharge", "improving", non-operative management.
 */

import { Option } from "effect";
import type { Assertion, ClinicalFact } from "../../../schemas/clinicalFact";
import type { ClinicalKnowledgeBase } from "../../knowledgeBase.effect";
import { lineFact, sentencesOf, stripTrailingPunctuation, type ExtractionStrategy, type PreparedDocument } from "../types";

const ASSERTIONS: ReadonlyArray<readonly [Assertion, RegExp]> = [
  [
    "NO_COMPLICATIONS",
    /\b(?:no|without|denies|free of)\s+(?:\w+\s+){0,2}complications?\b|\bcomplications?\s*:\s*(?:none|no|nil|n\/a)\b|\buncomplicated\b/i,
  ],
  ["SUCCESSFUL_PROCEDURE", /\b(?:successful(?:ly)?|uneventful(?:ly)?|without difficulty|tolerated (?:the )?procedure well)\b/i],
  [
    "STABLE_FOR_DISCHARGE",
    /\b(?:stable for discharge|ready for discharge|cleared for discharge|discharged? (?:home )?in stable condition)\b/i,
  ],
  ["IMPROVING", /\b(?:improving|improved|improvement)\b/i],
  [
    "NON_OPERATIVE_MANAGEMENT",
    /\b(?:non-?operative|conservative|medical) management\b|\bnot a surgical candidate\b|\bno surgical intervention\b/i,
  ],
];

const NOT_IMPROVING = /\b(?:not|no|without)\s+(?:\w+\s+)?(?:improving|improved|improvement)\b/i;

const FAMILY_HINTS: ReadonlyArray<readonly [string, RegExp]> = [
  ["neurological_deficit", /\b(?:neuro\w*|NIHSS|deficits?|strength|weakness|motor|speech|aphasia)\b/i],
  ["consciousness", /\b(?:GCS|mental status|alert\w*|conscious\w*|responsive\w*|sedat\w*)\b/i],
  ["functional_outcome", /\b(?:mRS|function\w*|ambulat\w*|mobility)\b/i],
];

const familyOf = (sentence: string, kb: ClinicalKnowledgeBase): string | undefined => {
  const hinted = FAMILY_HINTS.find(([, pattern]) => pattern.test(sentence));
  if (hinted !== undefined) return hinted[0];
  const lower = sentence.toLowerCase();
  const mentionsLab = kb.labMatchers.some(
    (matcher) => Option.isSome(matcher.reference) && lower.includes(matcher.displayName.toLowerCase())
  );
  return mentionsLab || /\blabs?\b/.test(lower) ? "laboratory" : undefined;
};

const extractStatements = (document: PreparedDocument, kb: ClinicalKnowledgeBase): ReadonlyArray<ClinicalFact> => {
  const facts: ClinicalFact[] = [];

  for (const line of document.lines) {
    for (const sentence of sentencesOf(line.text)) {
      for (const [assertion, pattern] of ASSERTIONS) {
        if (!pattern.test(sentence.text)) continue;
        if (assertion === "IMPROVING" && NOT_IMPROVING.test(sentence.text)) continue;
        facts.push(
          lineFact(document, line, {
            type: "finding",
            text: stripTrailingPunctuation(sentence.text),
            confidence: 0.9,
            normalized: {
              _tag: "StatementInfo",
              assertion,
              family: assertion === "IMPROVING" ? familyOf(sentence.text, kb) : undefined,
            },
          })
        );
      }
    }
  }

  return facts;
};

export const narrativeStrategy: ExtractionStrategy = {
  name: "narrative",
  factTypes: ["finding"],
  extract: extractStatements,
};
