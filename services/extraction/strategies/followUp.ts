/**
 * Follow-up plans and discharge instructions.
 */

import type { ClinicalFact } from "../../../schemas/clinicalFact";
import { lineFact, stripTrailingPunctuation, type ExtractionStrategy, type PreparedDocument } from "../types";

const FOLLOW_UP = /\bfollow[- ]?up\b|\breturn to clinic\b|\bsee (?:dr\.?|doctor)\s|\bappointment\b/i;

const INSTRUCTION_SECTIONS = new Set([
  "discharge instructions",
  "instructions",
  "patient instructions",
  "activity",
  "diet",
  "wound care",
]);

const LIST_ITEM = /^\s*(?:\d+[.)]|[-*•])\s*(.+)$/;

const extractFollowUp = (document: PreparedDocument): ReadonlyArray<ClinicalFact> => {
  const facts: ClinicalFact[] = [];

  for (const line of document.lines) {
    const inInstructions =
      (line.label !== undefined && INSTRUCTION_SECTIONS.has(line.label)) ||
      (line.section !== undefined && INSTRUCTION_SECTIONS.has(line.section));

    if (FOLLOW_UP.test(line.text) && line.body.length > 0) {
      facts.push(
        lineFact(document, line, {
          type: "follow_up",
          text: stripTrailingPunctuation(line.text.trim()),
          confidence: 0.9,
          normalized: { _tag: "FollowUpInfo", kind: "follow_up" },
        })
      );
      continue;
    }

    if (!inInstructions) continue;
    const item = line.label === undefined ? LIST_ITEM.exec(line.text)?.[1] : line.body;
    if (item === undefined || item.trim().length === 0) continue;
    facts.push(
      lineFact(document, line, {
        type: "follow_up",
        text: `Instruction: ${stripTrailingPunctuation(item.trim())}`,
        confidence: 0.9,
        normalized: { _tag: "FollowUpInfo", kind: "instructions" },
      })
    );
  }

  return facts;
};

export const followUpStrategy: ExtractionStrategy = {
  name: "follow_up",
  factTypes: ["follow_up"],
  extract: extractFollowUp,
};
