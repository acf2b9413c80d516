/**
 * VALIDATOR - EFFECT-TS SERVICE
 *
 * Six ordered, independent stages:
 *   1. format         2. clinical rule   3. temporal
 *   4. cross-fact     5. contradiction   6. completeness
 *
 * Every stage runs regardless of what earlier stages found. Facts come back
 * unchanged apart from confidence clamping; everything else is an
 * Uncertainty for a human reviewer.
 */

import { Context, Effect, Layer, pipe } from "effect";
import type { ClinicalFact } from "../schemas/clinicalFact";
import type { Timeline } from "../schemas/timeline";
import type { Uncertainty, ValidationResult, ValidationSummary } from "../schemas/validation";
import { clampConfidence } from "./clinicalFact";
import { ClinicalKnowledgeBase } from "./knowledgeBase.effect";
import {
  clinicalRuleStage,
  completenessStage,
  contradictionStage,
  crossFactStage,
  defaultValidatorSettings,
  formatStage,
  temporalStage,
  type ValidationStage,
  type ValidatorSettings,
} from "./validation";

export const defaultValidationStages: ReadonlyArray<ValidationStage> = [
  formatStage,
  clinicalRuleStage,
  temporalStage,
  crossFactStage,
  contradictionStage,
  completenessStage,
];

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface ValidatorService {
  readonly validate: (
    facts: ReadonlyArray<ClinicalFact>,
    timeline: Timeline,
    settings?: Partial<ValidatorSettings>
  ) => Effect.Effect<ValidationResult, never, never>;
}

export const ValidatorService = Context.GenericTag<ValidatorService>("ValidatorService");

// ============================================================================
// UNCERTAINTY WORKFLOW
// ============================================================================

/** Marks one uncertainty resolved; unknown ids leave the list as it was. */
export const resolveUncertainty = (
  uncertainties: ReadonlyArray<Uncertainty>,
  id: string,
  resolution: string
): ReadonlyArray<Uncertainty> =>
  uncertainties.map((uncertainty) =>
    uncertainty.id === id ? { ...uncertainty, resolved: true, resolution } : uncertainty
  );

export const summarizeUncertainties = (uncertainties: ReadonlyArray<Uncertainty>): ValidationSummary => {
  const bySeverity = { HIGH: 0, MEDIUM: 0, LOW: 0 };
  const byCategory: Record<string, number> = {};
  for (const uncertainty of uncertainties) {
    bySeverity[uncertainty.severity] += 1;
    byCategory[uncertainty.category] = (byCategory[uncertainty.category] ?? 0) + 1;
  }
  return {
    total: uncertainties.length,
    unresolved: uncertainties.filter((uncertainty) => !uncertainty.resolved).length,
    bySeverity,
    byCategory,
  };
};

// ============================================================================
// SERVICE IMPLEMENTATION
// ============================================================================

class ValidatorServiceImpl implements ValidatorService {
  constructor(
    private readonly kb: ClinicalKnowledgeBase,
    private readonly stages: ReadonlyArray<ValidationStage>
  ) {}

  readonly validate = (
    facts: ReadonlyArray<ClinicalFact>,
    timeline: Timeline,
    overrides?: Partial<ValidatorSettings>
  ) => {
    return Effect.gen(this, function* (_) {
      const clamped = facts.map((fact) => {
        const confidence = clampConfidence(fact.confidence);
        return confidence === fact.confidence ? fact : { ...fact, confidence };
      });
      const context = {
        input: facts,
        facts: clamped,
        timeline,
        kb: this.kb,
        settings: { ...defaultValidatorSettings, ...overrides },
      };

      const uncertainties: Uncertainty[] = [];
      for (const stage of this.stages) {
        const found = stage.run(context);
        uncertainties.push(...found);
        yield* _(
          pipe(
            Effect.logDebug("Validation stage complete"),
            Effect.annotateLogs({ stage: stage.name, uncertainties: found.length })
          )
        );
      }

      const summary = summarizeUncertainties(uncertainties);
      if (summary.bySeverity.HIGH > 0) {
        yield* _(
          pipe(
            Effect.logWarning("High-severity uncertainties flagged"),
            Effect.annotateLogs({ high: summary.bySeverity.HIGH, total: summary.total })
          )
        );
      }

      return { facts: clamped, uncertainties };
    });
  };
}

// ============================================================================
// SERVICE LAYER
// ============================================================================

export const makeValidator = (
  kb: ClinicalKnowledgeBase,
  stages: ReadonlyArray<ValidationStage> = defaultValidationStages
): ValidatorService => new ValidatorServiceImpl(kb, stages);

export const ValidatorServiceLive = Layer.effect(
  ValidatorService,
  Effect.gen(function* (_) {
    const kb = yield* _(ClinicalKnowledgeBase);
    return makeValidator(kb);
  })
);
