/**
 * DOCUMENT CLASSIFIER
 *
 * Keyword heuristics over the name and the opening of the content.
 * Ordered: the first rule that matches wins.
 */

import type { DocumentType } from "../schemas/clinicalFact";

const RULES: ReadonlyArray<readonly [DocumentType, RegExp]> = [
  ["discharge_planning", /discharge plan|case management|disposition planning|social work/i],
  ["discharge_summary", /discharge summary|discharge diagnos|discharged (?:home|to)|date of discharge/i],
  ["operative", /operative (?:note|report)|op note|procedure note|pre-?operative diagnosis|estimated blood loss|anesthesia:/i],
  ["consult", /consult(?:ation)? (?:note|report)|reason for consult|consulting service|\bconsult\b/i],
  ["lab", /\blab(?:oratory)? (?:report|results?)\b|\bcbc\b|\bbmp\b|\bcmp\b|specimen collected/i],
  ["imaging", /\b(?:ct|cta|mri|mra|x-?ray|ultrasound|angiogra\w*)\b.*\b(?:impression|findings)\b|radiology/i],
  ["nursing", /nursing (?:note|assessment)|\brn\b note|shift assessment/i],
  ["admission", /admission (?:note|h&p)|history and physical|\bh&p\b|admitted (?:to|for|with)|chief complaint/i],
  ["clinic", /clinic (?:note|visit)|outpatient|office visit/i],
  ["progress", /progress note|\bsoap\b|subjective:|hospital day|\bpod\s*#?\s*\d/i],
];

const HEAD_LENGTH = 500;

export const classifyDocument = (name: string, content: string): DocumentType => {
  const head = `${name} ${content.slice(0, HEAD_LENGTH)}`;
  const rule = RULES.find(([, pattern]) => pattern.test(head));
  return rule === undefined ? "progress" : rule[0];
};
