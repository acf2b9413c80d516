/**
 * Stage 1: structural checks on each fact as received.
 */

import type { ClinicalFact } from "../../schemas/clinicalFact";
import type { Uncertainty } from "../../schemas/validation";
import { clampConfidence } from "../clinicalFact";
import { isParseableTimestamp } from "../clinicalTime";
import { makeUncertainty, type UncertaintyDraft, type ValidationStage } from "./types";

const checkFact = (fact: ClinicalFact): ReadonlyArray<UncertaintyDraft> => {
  const issues: UncertaintyDraft[] = [];
  const ids = fact.id.length > 0 ? [fact.id] : [];

  if (fact.text.trim().length === 0) {
    issues.push({
      severity: "HIGH",
      issueType: "EMPTY_FACT_TEXT",
      description: `Fact from ${fact.sourceDocument} line ${fact.sourceLine} has no text`,
      factIds: ids,
      suggestedResolution: "Re-extract the source line or discard the fact",
    });
  }

  if (!Number.isFinite(fact.confidence) || fact.confidence < 0 || fact.confidence > 1) {
    issues.push({
      severity: "MEDIUM",
      issueType: "CONFIDENCE_OUT_OF_RANGE",
      description: `Confidence ${fact.confidence} is outside [0, 1]; clamped to ${clampConfidence(fact.confidence)}`,
      factIds: ids,
    });
  }

  if (!isParseableTimestamp(fact.documentTimestamp)) {
    issues.push({
      severity: "HIGH",
      issueType: "UNPARSEABLE_TIMESTAMP",
      description: `Document timestamp "${fact.documentTimestamp}" cannot be parsed`,
      factIds: ids,
      suggestedResolution: "Correct the document date",
    });
  }

  if (fact.resolvedTimestamp !== undefined && !isParseableTimestamp(fact.resolvedTimestamp)) {
    issues.push({
      severity: "HIGH",
      issueType: "UNPARSEABLE_TIMESTAMP",
      description: `Resolved timestamp "${fact.resolvedTimestamp}" cannot be parsed`,
      factIds: ids,
    });
  }

  const missing = [
    fact.id.length === 0 ? "id" : undefined,
    fact.sourceDocument.length === 0 ? "sourceDocument" : undefined,
    Number.isInteger(fact.sourceLine) && fact.sourceLine >= 0 ? undefined : "sourceLine",
  ].filter((field): field is string => field !== undefined);

  if (missing.length > 0) {
    issues.push({
      severity: "MEDIUM",
      issueType: "MISSING_REQUIRED_FIELD",
      description: `Fact is missing required field(s): ${missing.join(", ")}`,
      factIds: ids,
    });
  }

  return issues;
};

export const formatStage: ValidationStage = {
  name: "format",
  category: "FORMAT",
  run: ({ input }): ReadonlyArray<Uncertainty> =>
    input.flatMap((fact) => checkFact(fact).map((draft) => makeUncertainty("FORMAT", draft))),
};
