/**
 * Stage 4: facts checked against each other.
 */

import { Option } from "effect";
import {
  effectiveTimestamp,
  isLabConcept,
  isMedicationInfo,
  isScoreValue,
  isVitalValue,
  type ClinicalFact,
} from "../../schemas/clinicalFact";
import type { Uncertainty } from "../../schemas/validation";
import { compareTimestamps, minutesApart } from "../clinicalTime";
import { makeUncertainty, type ValidationContext, type ValidationStage } from "./types";

export interface Measurement {
  readonly key: string;
  readonly label: string;
  readonly value: number;
  readonly kind: "score" | "quantity";
}

const MATERIAL_SCORE_DELTA = 2;
const MATERIAL_RELATIVE_DELTA = 0.1;

const measurementOf = (fact: ClinicalFact): Measurement | undefined => {
  const value = fact.normalized;
  if (isScoreValue(value)) return { key: `score:${value.scoreName}`, label: value.scoreName, value: value.value, kind: "score" };
  if (isLabConcept(value)) return { key: `lab:${value.name}`, label: value.displayName, value: value.value, kind: "quantity" };
  if (isVitalValue(value)) return { key: `vital:${value.name}`, label: value.name, value: value.value, kind: "quantity" };
  return undefined;
};

export const isMaterialDifference = (a: Measurement, b: Measurement): boolean => {
  if (a.kind === "score") return Math.abs(a.value - b.value) >= MATERIAL_SCORE_DELTA;
  const scale = Math.max(Math.abs(a.value), Math.abs(b.value));
  return scale > 0 && Math.abs(a.value - b.value) / scale > MATERIAL_RELATIVE_DELTA;
};

const conflictingValues = ({ facts, settings }: ValidationContext): ReadonlyArray<Uncertainty> => {
  const series = new Map<string, Array<{ fact: ClinicalFact; measurement: Measurement }>>();
  for (const fact of facts) {
    const measurement = measurementOf(fact);
    if (measurement === undefined) continue;
    const entries = series.get(measurement.key) ?? [];
    entries.push({ fact, measurement });
    series.set(measurement.key, entries);
  }

  const issues: Uncertainty[] = [];
  for (const entries of series.values()) {
    const ordered = [...entries].sort((a, b) =>
      compareTimestamps(effectiveTimestamp(a.fact), effectiveTimestamp(b.fact))
    );
    ordered.forEach((left, i) => {
      for (const right of ordered.slice(i + 1)) {
        const apart = minutesApart(effectiveTimestamp(left.fact), effectiveTimestamp(right.fact));
        if (Option.isNone(apart) || apart.value > settings.conflictWindowMinutes) continue;
        if (!isMaterialDifference(left.measurement, right.measurement)) continue;
        issues.push(
          makeUncertainty("CROSS_FACT", {
            severity: "HIGH",
            issueType: "CONFLICTING_INFORMATION",
            description: `${left.measurement.label} recorded as ${left.measurement.value} and ${right.measurement.value} within ${apart.value} minutes`,
            factIds: [left.fact.id, right.fact.id],
            suggestedResolution: "Confirm which value is correct",
          })
        );
      }
    });
  }
  return issues;
};

const interactions = ({ facts, kb }: ValidationContext): ReadonlyArray<Uncertainty> => {
  const medications = facts.flatMap((fact) =>
    isMedicationInfo(fact.normalized) ? [{ id: fact.id, name: fact.normalized.name }] : []
  );
  return kb.medicationInteractions(medications.map((med) => med.name)).map((interaction) =>
    makeUncertainty("CROSS_FACT", {
      severity: interaction.severity,
      issueType: "MEDICATION_INTERACTION",
      description: `${interaction.description} (${interaction.drugs.join(", ")})`,
      factIds: medications.filter((med) => interaction.drugs.includes(med.name)).map((med) => med.id),
      suggestedResolution: "Review the combination with pharmacy",
    })
  );
};

export const crossFactStage: ValidationStage = {
  name: "cross_fact",
  category: "CROSS_FACT",
  run: (context) => [...conflictingValues(context), ...interactions(context)],
};
