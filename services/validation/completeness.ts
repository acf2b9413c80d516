/**
 * Stage 6: required documentation present.
 */

import {
  isFollowUpInfo,
  isStatementInfo,
  type ClinicalFact,
} from "../../schemas/clinicalFact";
import { makeUncertainty, type UncertaintyDraft, type ValidationStage } from "./types";

const DISCHARGE_DOCUMENTS = new Set(["discharge_summary", "discharge_planning"]);

export const isDischargeMedication = (fact: ClinicalFact): boolean =>
  fact.type === "medication" &&
  ((fact.section?.includes("discharge") ?? false) ||
    (fact.documentType !== undefined && DISCHARGE_DOCUMENTS.has(fact.documentType)) ||
    fact.sourceDocument.toLowerCase().includes("discharge"));

const hasFollowUp = (facts: ReadonlyArray<ClinicalFact>, kind: "follow_up" | "instructions"): boolean =>
  facts.some((fact) => fact.type === "follow_up" && isFollowUpInfo(fact.normalized) && fact.normalized.kind === kind);

const missing = (facts: ReadonlyArray<ClinicalFact>): ReadonlyArray<UncertaintyDraft> => {
  const drafts: UncertaintyDraft[] = [];

  if (!facts.some((fact) => fact.type === "diagnosis")) {
    drafts.push({
      severity: "HIGH",
      issueType: "MISSING_DIAGNOSIS",
      description: "No diagnosis documented",
      factIds: [],
      suggestedResolution: "Document the primary diagnosis",
    });
  }

  const justified = facts.some(
    (fact) => isStatementInfo(fact.normalized) && fact.normalized.assertion === "NON_OPERATIVE_MANAGEMENT"
  );
  if (!justified && !facts.some((fact) => fact.type === "procedure")) {
    drafts.push({
      severity: "HIGH",
      issueType: "MISSING_PROCEDURE",
      description: "No procedure documented and no justification for non-operative management",
      factIds: [],
      suggestedResolution: "Document the procedure or the reason for conservative management",
    });
  }

  if (!facts.some(isDischargeMedication)) {
    drafts.push({
      severity: "HIGH",
      issueType: "MISSING_DISCHARGE_MEDICATIONS",
      description: "No discharge medications documented",
      factIds: [],
      suggestedResolution: "Add the discharge medication list",
    });
  }

  if (!hasFollowUp(facts, "follow_up")) {
    drafts.push({
      severity: "MEDIUM",
      issueType: "MISSING_FOLLOW_UP",
      description: "No follow-up plan documented",
      factIds: [],
    });
  }

  if (!hasFollowUp(facts, "instructions")) {
    drafts.push({
      severity: "MEDIUM",
      issueType: "MISSING_DISCHARGE_INSTRUCTIONS",
      description: "No discharge instructions documented",
      factIds: [],
    });
  }

  return drafts;
};

export const completenessStage: ValidationStage = {
  name: "completeness",
  category: "COMPLETENESS",
  run: ({ facts }) => missing(facts).map((draft) => makeUncertainty("COMPLETENESS", draft)),
};
