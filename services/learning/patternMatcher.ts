/**
 * PATTERN MATCHER
 *
 * Scores facts against approved corrections and applies the best match.
 *
 * Score:
 *   exact (case-insensitive) substring of the fact text   1.0
 *   otherwise  max(token Jaccard, sequence ratio)
 *   + context bonus when the pattern's context agrees with the fact
 *   capped at 1; a fact type mismatch scores 0
 *
 * Only active patterns (APPROVED and success rate at or above threshold)
 * ever enter the candidate set.
 */

import type { ClinicalFact } from "../../schemas/clinicalFact";
import {
  defaultLearningConfig,
  type CorrectionApplication,
  type LearningConfig,
  type LearningPattern,
} from "../../schemas/learning";
import { withCorrection } from "../clinicalFact";

// ============================================================================
// SIMILARITY
// ============================================================================

export const tokenSet = (text: string): ReadonlySet<string> => new Set(text.toLowerCase().match(/\w+/g) ?? []);

export const jaccardSimilarity = (a: string, b: string): number => {
  const left = tokenSet(a);
  const right = tokenSet(b);
  if (left.size === 0 && right.size === 0) return 1;
  const shared = [...left].filter((token) => right.has(token)).length;
  return shared / (left.size + right.size - shared);
};

/** Characters matched by recursively taking the longest common block. */
const matchingCharacters = (a: string, b: string): number => {
  if (a.length === 0 || b.length === 0) return 0;

  let bestLength = 0;
  let bestA = 0;
  let bestB = 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] !== b[j - 1]) continue;
      current[j] = previous[j - 1] + 1;
      if (current[j] > bestLength) {
        bestLength = current[j];
        bestA = i - bestLength;
        bestB = j - bestLength;
      }
    }
    previous = current;
  }

  if (bestLength === 0) return 0;
  return (
    bestLength +
    matchingCharacters(a.slice(0, bestA), b.slice(0, bestB)) +
    matchingCharacters(a.slice(bestA + bestLength), b.slice(bestB + bestLength))
  );
};

/** Ratcliff/Obershelp ratio: 2M / T. */
export const sequenceRatio = (a: string, b: string): number => {
  const total = a.length + b.length;
  return total === 0 ? 1 : (2 * matchingCharacters(a, b)) / total;
};

export const textSimilarity = (factText: string, patternText: string): number => {
  const fact = factText.toLowerCase();
  const original = patternText.toLowerCase();
  if (original.length > 0 && fact.includes(original)) return 1;
  return Math.max(jaccardSimilarity(fact, original), sequenceRatio(fact, original));
};

// ============================================================================
// CONTEXT
// ============================================================================

const CONTEXT_FIELDS = ["section", "documentType", "specialty"] as const;

/** At least one known context field given, and every given one agrees. */
export const contextMatches = (fact: ClinicalFact, context: Readonly<Record<string, string>>): boolean => {
  const given = CONTEXT_FIELDS.filter((field) => context[field] !== undefined);
  if (given.length === 0) return false;
  return given.every((field) => fact[field]?.toLowerCase() === context[field]?.toLowerCase());
};

export const matchScore = (
  fact: ClinicalFact,
  pattern: LearningPattern,
  config: LearningConfig = defaultLearningConfig
): number => {
  if (fact.type !== pattern.factType) return 0;
  const base = textSimilarity(fact.text, pattern.originalText);
  const bonus = contextMatches(fact, pattern.context) ? config.contextBonus : 0;
  return Math.min(1, base + bonus);
};

// ============================================================================
// ACTIVATION
// ============================================================================

/** Derived at application time; never stored. */
export const isActive = (pattern: LearningPattern, config: LearningConfig = defaultLearningConfig): boolean =>
  pattern.status === "APPROVED" && pattern.successRate >= config.successRateThreshold;

/** Exponential moving average of "not re-corrected" outcomes. */
export const updateSuccessRate = (
  rate: number,
  recorrected: boolean,
  config: LearningConfig = defaultLearningConfig
): number => (1 - config.successRateAlpha) * rate + config.successRateAlpha * (recorrected ? 0 : 1);

// ============================================================================
// APPLICATION
// ============================================================================

export interface CorrectionResult {
  readonly facts: ReadonlyArray<ClinicalFact>;
  readonly applications: ReadonlyArray<CorrectionApplication>;
}

const escapeRegex = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const correctedText = (fact: ClinicalFact, pattern: LearningPattern): string => {
  const original = pattern.originalText;
  if (original.length > 0 && fact.text.toLowerCase().includes(original.toLowerCase())) {
    return fact.text.replace(new RegExp(escapeRegex(original), "i"), () => pattern.correctedText);
  }
  return pattern.correctedText;
};

const bestMatch = (
  fact: ClinicalFact,
  candidates: ReadonlyArray<LearningPattern>,
  config: LearningConfig
): { readonly pattern: LearningPattern; readonly score: number } | undefined => {
  let best: { pattern: LearningPattern; score: number } | undefined;
  for (const pattern of candidates) {
    const score = matchScore(fact, pattern, config);
    if (best === undefined || score > best.score) best = { pattern, score };
  }
  return best;
};

/**
 * Applies the best-scoring active pattern to each fact whose score reaches
 * the threshold. Facts already corrected are left alone.
 */
export const applyCorrections = (
  facts: ReadonlyArray<ClinicalFact>,
  patterns: ReadonlyArray<LearningPattern>,
  config: LearningConfig = defaultLearningConfig
): CorrectionResult => {
  const candidates = patterns
    .filter((pattern) => isActive(pattern, config))
    .sort((a, b) => a.createdAt - b.createdAt || a.id.localeCompare(b.id));
  const applications: CorrectionApplication[] = [];

  const corrected = facts.map((fact) => {
    if (fact.correction !== undefined || candidates.length === 0) return fact;
    const match = bestMatch(fact, candidates, config);
    if (match === undefined || match.score < config.matchThreshold) return fact;

    applications.push({ factId: fact.id, patternId: match.pattern.id, score: match.score });
    return withCorrection(
      fact,
      correctedText(fact, match.pattern),
      { patternId: match.pattern.id, originalText: fact.text, matchScore: match.score },
      fact.confidence * match.pattern.successRate
    );
  });

  return { facts: corrected, applications };
};
