/**
 * Collapse duplicate extractions of the same underlying fact.
 */

import type { ClinicalFact } from "../../schemas/clinicalFact";
import { dateKey } from "../clinicalTime";

const discriminator = (fact: ClinicalFact): string => {
  switch (fact.normalized?._tag) {
    case "StatementInfo":
      return fact.normalized.assertion;
    case "TemporalInfo":
      return fact.normalized.kind;
    default:
      return "";
  }
};

/** Same type, same normalized text, same calendar day, same assertion or temporal kind. */
export const dedupeKey = (fact: ClinicalFact): string =>
  [fact.type, fact.text.toLowerCase().replace(/\s+/g, " ").trim(), dateKey(fact.documentTimestamp), discriminator(fact)].join("|");

export interface DedupeResult {
  readonly facts: ReadonlyArray<ClinicalFact>;
  readonly removed: number;
}

/**
 * Keeps the highest-confidence instance of each group (first wins ties), in
 * first-seen order, and records how many instances it stands for.
 */
export const deduplicateFacts = (facts: ReadonlyArray<ClinicalFact>): DedupeResult => {
  const groups = new Map<string, ClinicalFact[]>();
  for (const fact of facts) {
    const key = dedupeKey(fact);
    const group = groups.get(key);
    if (group === undefined) groups.set(key, [fact]);
    else group.push(fact);
  }

  const kept: ClinicalFact[] = [];
  for (const group of groups.values()) {
    const best = group.reduce((winner, candidate) => (candidate.confidence > winner.confidence ? candidate : winner));
    if (group.length === 1) {
      kept.push(best);
      continue;
    }
    const represented = group.reduce((count, fact) => count + (fact.dedupCount ?? 1), 0);
    kept.push({ ...best, dedupCount: represented });
  }

  return { facts: kept, removed: facts.length - kept.length };
};
