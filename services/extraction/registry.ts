/**
 * Strategy registry: fact type → extraction strategy.
 */

import type { FactType } from "../../schemas/clinicalFact";
import type { ExtractionStrategy } from "./types";
import { admissionStrategy } from "./strategies/admission";
import { clinicalScoreStrategy } from "./strategies/clinicalScore";
import { complicationStrategy } from "./strategies/complication";
import { consultationStrategy } from "./strategies/consultation";
import { diagnosisStrategy } from "./strategies/diagnosis";
import { followUpStrategy } from "./strategies/followUp";
import { labValueStrategy } from "./strategies/labValue";
import { medicationStrategy } from "./strategies/medication";
import { narrativeStrategy } from "./strategies/narrative";
import { procedureStrategy } from "./strategies/procedure";
import { temporalReferenceStrategy } from "./strategies/temporalReference";
import { vitalSignStrategy } from "./strategies/vitalSign";

export class ExtractionStrategyRegistry {
  private readonly byType = new Map<FactType, ExtractionStrategy>();
  private readonly ordered: ExtractionStrategy[] = [];

  constructor(strategies: ReadonlyArray<ExtractionStrategy> = []) {
    strategies.forEach((strategy) => this.register(strategy));
  }

  /** Later registrations for a type replace earlier ones. */
  register(strategy: ExtractionStrategy): this {
    for (const type of strategy.factTypes) {
      const previous = this.byType.get(type);
      if (previous !== undefined) {
        const index = this.ordered.indexOf(previous);
        if (index >= 0) this.ordered.splice(index, 1);
      }
      this.byType.set(type, strategy);
    }
    this.ordered.push(strategy);
    return this;
  }

  forType(type: FactType): ExtractionStrategy | undefined {
    return this.byType.get(type);
  }

  all(): ReadonlyArray<ExtractionStrategy> {
    return [...this.ordered];
  }
}

export const defaultStrategies: ReadonlyArray<ExtractionStrategy> = [
  admissionStrategy,
  medicationStrategy,
  labValueStrategy,
  clinicalScoreStrategy,
  vitalSignStrategy,
  temporalReferenceStrategy,
  procedureStrategy,
  complicationStrategy,
  diagnosisStrategy,
  consultationStrategy,
  narrativeStrategy,
  followUpStrategy,
];

export const makeDefaultRegistry = (): ExtractionStrategyRegistry => new ExtractionStrategyRegistry(defaultStrategies);
