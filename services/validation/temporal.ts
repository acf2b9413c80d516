/**
 * Stage 3: stay boundaries, documentation gaps, resolver conflicts.
 */

import { Option } from "effect";
import { effectiveTimestamp, type ClinicalFact } from "../../schemas/clinicalFact";
import type { TemporalConflict } from "../../schemas/timeline";
import type { Uncertainty } from "../../schemas/validation";
import { calendarDaysBetween, compareTimestamps, isParseableTimestamp } from "../clinicalTime";
import { makeUncertainty, type ValidationContext, type ValidationStage } from "./types";

const DISCHARGE_DOCUMENTS = new Set(["discharge_summary", "discharge_planning"]);

const byTime = (facts: ReadonlyArray<ClinicalFact>): ReadonlyArray<ClinicalFact> =>
  facts
    .filter((fact) => isParseableTimestamp(effectiveTimestamp(fact)))
    .sort((a, b) => compareTimestamps(effectiveTimestamp(a), effectiveTimestamp(b)));

/**
 * Explicit admission (earliest admission fact) against explicit discharge
 * (latest fact from a discharge document).
 */
const checkStayOrder = ({ facts }: ValidationContext): ReadonlyArray<Uncertainty> => {
  const admission = byTime(facts.filter((fact) => fact.type === "admission"))[0];
  const discharges = byTime(
    facts.filter((fact) => fact.documentType !== undefined && DISCHARGE_DOCUMENTS.has(fact.documentType))
  );
  const discharge = discharges[discharges.length - 1];
  if (admission === undefined || discharge === undefined) return [];
  if (compareTimestamps(effectiveTimestamp(discharge), effectiveTimestamp(admission)) >= 0) return [];

  return [
    makeUncertainty("TEMPORAL", {
      severity: "HIGH",
      issueType: "DISCHARGE_BEFORE_ADMISSION",
      description: `Discharge documentation (${effectiveTimestamp(discharge)}) precedes admission (${effectiveTimestamp(admission)})`,
      factIds: [admission.id, discharge.id],
      suggestedResolution: "Check the document dates",
    }),
  ];
};

const checkGaps = ({ timeline, settings }: ValidationContext): ReadonlyArray<Uncertainty> => {
  const days = timeline.days.filter((day) => isParseableTimestamp(day.date));
  return days.slice(1).flatMap((day, index) => {
    const previous = days[index];
    const gap = Option.getOrElse(calendarDaysBetween(previous.date, day.date), () => 0);
    if (gap <= settings.documentationGapDays) return [];
    const lastBefore = previous.facts[previous.facts.length - 1];
    const firstAfter = day.facts[0];
    return [
      makeUncertainty("TEMPORAL", {
        severity: "MEDIUM",
        issueType: "DOCUMENTATION_GAP",
        description: `No documentation for ${gap} days between ${previous.date} and ${day.date}`,
        factIds: [lastBefore, firstAfter].flatMap((fact) => (fact === undefined ? [] : [fact.id])),
        suggestedResolution: "Look for missing notes covering the gap",
      }),
    ];
  });
};

const RESOLUTION_HINT: Record<TemporalConflict["type"], string> = {
  POD_WITHOUT_SURGERY: "Add the operative note or correct the post-operative day",
  HD_WITHOUT_ADMISSION: "Add the admission note or correct the hospital day",
  BEFORE_ADMISSION: "Check the anchor event and the relative expression",
};

const fromConflicts = ({ timeline }: ValidationContext): ReadonlyArray<Uncertainty> =>
  timeline.conflicts.map((conflict) =>
    makeUncertainty("TEMPORAL", {
      severity: "HIGH",
      issueType: conflict.type,
      description: conflict.description,
      factIds: [conflict.factId],
      suggestedResolution: RESOLUTION_HINT[conflict.type],
    })
  );

export const temporalStage: ValidationStage = {
  name: "temporal",
  category: "TEMPORAL",
  run: (context) => [...checkStayOrder(context), ...checkGaps(context), ...fromConflicts(context)],
};
