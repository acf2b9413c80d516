/**
 * Stage 2: knowledge-base rules.
 *
 * Lab thresholds are inclusive: a value equal to a critical threshold is
 * critical.
 */

import { Option } from "effect";
import { isLabConcept, isMedicationInfo, isScoreValue, type ClinicalFact } from "../../schemas/clinicalFact";
import type { ClinicalKnowledgeBase } from "../knowledgeBase.effect";
import { makeUncertainty, type UncertaintyDraft, type ValidationStage } from "./types";

const checkLab = (fact: ClinicalFact, kb: ClinicalKnowledgeBase): ReadonlyArray<UncertaintyDraft> => {
  if (!isLabConcept(fact.normalized)) return [];
  const lab = fact.normalized;
  const reference = Option.flatMap(kb.findLab(lab.name), (matcher) => matcher.reference);
  if (Option.isNone(reference)) return [];
  const { criticalLow, criticalHigh } = reference.value;
  const unit = lab.unit.length > 0 ? ` ${lab.unit}` : "";

  if (lab.value <= criticalLow || lab.value >= criticalHigh) {
    const low = lab.value <= criticalLow;
    return [
      {
        severity: "HIGH",
        issueType: "CRITICAL_LAB_VALUE",
        description: `${lab.displayName} ${lab.value}${unit} is at or beyond the critical ${low ? "low" : "high"} threshold (${low ? criticalLow : criticalHigh})`,
        factIds: [fact.id],
        suggestedResolution: lab.implication ?? "Confirm the value and document the clinical response",
      },
    ];
  }
  return [];
};

const checkScore = (fact: ClinicalFact, kb: ClinicalKnowledgeBase): ReadonlyArray<UncertaintyDraft> => {
  if (!isScoreValue(fact.normalized)) return [];
  const score = fact.normalized;
  return Option.match(kb.checkScore(score.scoreName, score.value), {
    onNone: (): ReadonlyArray<UncertaintyDraft> => [],
    onSome: (check): ReadonlyArray<UncertaintyDraft> => {
      if (!check.valid) {
        return [
          {
            severity: "HIGH",
            issueType: "INVALID_SCORE_RANGE",
            description: `${score.scoreName} ${score.value} is outside the valid range ${check.min}-${check.max}`,
            factIds: [fact.id],
            suggestedResolution: "Verify the score against the source document",
          },
        ];
      }
      if (check.critical) {
        return [
          {
            severity: "MEDIUM",
            issueType: "CRITICAL_SCORE",
            description: `${score.scoreName} ${score.value} is in the critical range`,
            factIds: [fact.id],
          },
        ];
      }
      return [];
    },
  });
};

const checkDose = (fact: ClinicalFact, kb: ClinicalKnowledgeBase): ReadonlyArray<UncertaintyDraft> => {
  if (!isMedicationInfo(fact.normalized)) return [];
  const { name, dose } = fact.normalized;
  const max = kb.maxSingleDose(name);
  if (dose === undefined || Option.isNone(max)) return [];

  return Option.match(kb.convertDose(dose, max.value.unit), {
    onNone: (): ReadonlyArray<UncertaintyDraft> => [
      {
        severity: "LOW",
        issueType: "DOSE_UNIT_MISMATCH",
        description: `${name} dose ${dose.value} ${dose.unit} cannot be compared with the maximum in ${max.value.unit}`,
        factIds: [fact.id],
      },
    ],
    onSome: (converted): ReadonlyArray<UncertaintyDraft> =>
      converted > max.value.value
        ? [
            {
              severity: "HIGH",
              issueType: "EXCESSIVE_MEDICATION_DOSE",
              description: `${name} ${dose.value} ${dose.unit} exceeds the maximum single dose of ${max.value.value} ${max.value.unit}`,
              factIds: [fact.id],
              suggestedResolution: "Verify the order with pharmacy",
            },
          ]
        : [],
  });
};

export const clinicalRuleStage: ValidationStage = {
  name: "clinical_rule",
  category: "CLINICAL_RULE",
  run: ({ facts, kb }) =>
    facts
      .flatMap((fact) => {
        switch (fact.type) {
          case "lab_value":
            return checkLab(fact, kb);
          case "clinical_score":
            return checkScore(fact, kb);
          case "medication":
            return checkDose(fact, kb);
          default:
            return [];
        }
      })
      .map((draft) => makeUncertainty("CLINICAL_RULE", draft)),
};
