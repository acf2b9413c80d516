/**
 * Stage 5: contradiction detection.
 *
 * Narrative assertions checked against structured facts and computed
 * trends. Co-occurrence matching only:
 *
 *   "no complications"      vs complication on the same or a later date   HIGH
 *   "successful procedure"  vs revision / reoperation                     MEDIUM
 *   "stable for discharge"  vs critical lab or score near discharge       HIGH
 *   "improving"             vs worsening trend in the same family         MEDIUM
 */

import { Option } from "effect";
import {
  effectiveTimestamp,
  isLabConcept,
  isProcedureInfo,
  isScoreValue,
  isStatementInfo,
  type Assertion,
  type ClinicalFact,
} from "../../schemas/clinicalFact";
import type { Uncertainty } from "../../schemas/validation";
import { compareTimestamps, dateKey, minutesApart } from "../clinicalTime";
import { makeUncertainty, type ValidationContext, type ValidationStage } from "./types";

const statements = (facts: ReadonlyArray<ClinicalFact>, assertion: Assertion): ReadonlyArray<ClinicalFact> =>
  facts.filter((fact) => isStatementInfo(fact.normalized) && fact.normalized.assertion === assertion);

const quote = (facts: ReadonlyArray<ClinicalFact>): string => facts.map((fact) => `"${fact.text}"`).join("; ");

const noComplications = ({ facts }: ValidationContext): ReadonlyArray<Uncertainty> => {
  const complications = facts.filter((fact) => fact.type === "complication");
  return statements(facts, "NO_COMPLICATIONS").flatMap((statement) => {
    const day = dateKey(effectiveTimestamp(statement));
    const contradicting = complications.filter((fact) => dateKey(effectiveTimestamp(fact)) >= day);
    if (contradicting.length === 0) return [];
    return [
      makeUncertainty("CONTRADICTION", {
        severity: "HIGH",
        issueType: "CONTRADICTORY_STATEMENTS",
        description: `"${statement.text}" contradicts documented complication(s): ${quote(contradicting)}`,
        factIds: [statement.id, ...contradicting.map((fact) => fact.id)],
        suggestedResolution: "Confirm whether a complication occurred and amend the note",
      }),
    ];
  });
};

const successfulProcedure = ({ facts }: ValidationContext): ReadonlyArray<Uncertainty> => {
  const revisions = facts.filter((fact) => isProcedureInfo(fact.normalized) && fact.normalized.revision);
  if (revisions.length === 0) return [];
  const claims = [
    ...statements(facts, "SUCCESSFUL_PROCEDURE"),
    ...facts.filter(
      (fact) => isProcedureInfo(fact.normalized) && fact.normalized.successful && !fact.normalized.revision
    ),
  ];
  return claims.map((claim) =>
    makeUncertainty("CONTRADICTION", {
      severity: "MEDIUM",
      issueType: "CONTRADICTORY_OUTCOMES",
      description: `"${claim.text}" reports success but a revision was performed: ${quote(revisions)}`,
      factIds: [claim.id, ...revisions.map((fact) => fact.id)],
      suggestedResolution: "Clarify the outcome of the original procedure",
    })
  );
};

const isCriticalFinding = (fact: ClinicalFact): boolean =>
  (isLabConcept(fact.normalized) && fact.normalized.severity === "CRITICAL") ||
  (isScoreValue(fact.normalized) && fact.normalized.critical);

const stableForDischarge = ({ facts, timeline, settings }: ValidationContext): ReadonlyArray<Uncertainty> => {
  const critical = facts.filter(isCriticalFinding);
  const windowMinutes = settings.dischargeWindowHours * 60;

  return statements(facts, "STABLE_FOR_DISCHARGE").flatMap((statement) => {
    const discharge = timeline.metadata.discharge ?? effectiveTimestamp(statement);
    const nearDischarge = critical.filter((fact) => {
      const timestamp = effectiveTimestamp(fact);
      if (compareTimestamps(timestamp, discharge) > 0) return false;
      return Option.match(minutesApart(timestamp, discharge), {
        onNone: () => false,
        onSome: (minutes) => minutes <= windowMinutes,
      });
    });
    if (nearDischarge.length === 0) return [];
    return [
      makeUncertainty("CONTRADICTION", {
        severity: "HIGH",
        issueType: "DISCHARGE_STATUS_CONTRADICTION",
        description: `"${statement.text}" conflicts with critical finding(s) within ${settings.dischargeWindowHours} hours of discharge: ${quote(nearDischarge)}`,
        factIds: [statement.id, ...nearDischarge.map((fact) => fact.id)],
        suggestedResolution: "Review discharge readiness",
      }),
    ];
  });
};

const improvingTrend = ({ facts, timeline }: ValidationContext): ReadonlyArray<Uncertainty> => {
  const worsening = timeline.progression.filter((summary) => summary.direction === "worsening");
  if (worsening.length === 0) return [];

  return statements(facts, "IMPROVING").flatMap((statement) => {
    const family = isStatementInfo(statement.normalized) ? statement.normalized.family : undefined;
    const matching = worsening.filter((summary) => family === undefined || summary.family === family);
    if (matching.length === 0) return [];
    const lastPoints = matching.flatMap((summary) => {
      const last = summary.points[summary.points.length - 1];
      return last === undefined ? [] : [last.factId];
    });
    return [
      makeUncertainty("CONTRADICTION", {
        severity: "MEDIUM",
        issueType: "CONTRADICTORY_TREND",
        description: `"${statement.text}" but ${matching
          .map((summary) => `${summary.measurement} worsened from ${summary.firstValue} to ${summary.lastValue}`)
          .join("; ")}`,
        factIds: [statement.id, ...lastPoints],
        suggestedResolution: "Reconcile the narrative with the measured trend",
      }),
    ];
  });
};

export const contradictionStage: ValidationStage = {
  name: "contradiction",
  category: "CONTRADICTION",
  run: (context) => [
    ...noComplications(context),
    ...successfulProcedure(context),
    ...stableForDischarge(context),
    ...improvingTrend(context),
  ],
};
