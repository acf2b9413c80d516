/**
 * Validation stage contract.
 *
 * Stages are independent: each reads the whole fact set (and timeline) and
 * returns its own uncertainties. None of them can stop a later one.
 */

import type { ClinicalFact } from "../../schemas/clinicalFact";
import type { UncertaintySeverity } from "../../schemas/knowledgeBase";
import type { Timeline } from "../../schemas/timeline";
import type { Uncertainty, ValidationCategory } from "../../schemas/validation";
import { stableId } from "../contentHasher";
import type { ClinicalKnowledgeBase } from "../knowledgeBase.effect";

export interface ValidatorSettings {
  readonly documentationGapDays: number;
  readonly conflictWindowMinutes: number;
  readonly dischargeWindowHours: number;
}

export const defaultValidatorSettings: ValidatorSettings = {
  documentationGapDays: 3,
  conflictWindowMinutes: 60,
  dischargeWindowHours: 48,
};

export interface ValidationContext {
  /** Facts as received, before clamping. */
  readonly input: ReadonlyArray<ClinicalFact>;
  /** Facts with confidence clamped into [0, 1]. */
  readonly facts: ReadonlyArray<ClinicalFact>;
  readonly timeline: Timeline;
  readonly kb: ClinicalKnowledgeBase;
  readonly settings: ValidatorSettings;
}

export interface ValidationStage {
  readonly name: string;
  readonly category: ValidationCategory;
  readonly run: (context: ValidationContext) => ReadonlyArray<Uncertainty>;
}

export interface UncertaintyDraft {
  readonly severity: UncertaintySeverity;
  readonly issueType: string;
  readonly description: string;
  readonly factIds: ReadonlyArray<string>;
  readonly suggestedResolution?: string;
}

/** Same issue over the same facts always gets the same id. */
export const makeUncertainty = (category: ValidationCategory, draft: UncertaintyDraft): Uncertainty => ({
  id: stableId(category, draft.issueType, draft.factIds.join(","), draft.description),
  severity: draft.severity,
  category,
  issueType: draft.issueType,
  description: draft.description,
  factIds: [...draft.factIds],
  suggestedResolution: draft.suggestedResolution,
  resolved: false,
});
