/**
 * Fact construction and the set-once enrichment helpers.
 */

import { Either, ParseResult, Schema as S } from "effect";
import {
  ClinicalFactSchema,
  type ClinicalFact,
  type ClinicalFactEncoded,
  type Correction,
  type FactDraft,
  type TemporalResolution,
} from "../schemas/clinicalFact";
import { stableId } from "./contentHasher";
import { FactConstructionError } from "./errors";

export const factId = (draft: Pick<FactDraft, "sourceDocument" | "sourceLine" | "type" | "text">): string =>
  stableId(draft.sourceDocument, draft.sourceLine, draft.type, draft.text);

/**
 * Build a fact, enforcing the construction invariants.
 *
 * @throws FactConstructionError when text is empty or confidence is outside [0, 1]
 */
export const makeFact = (draft: FactDraft): ClinicalFact => {
  if (draft.text.trim().length === 0) {
    throw new FactConstructionError({
      message: "Fact text must not be empty",
      field: "text",
      context: { sourceDocument: draft.sourceDocument, sourceLine: draft.sourceLine },
    });
  }
  if (!Number.isFinite(draft.confidence) || draft.confidence < 0 || draft.confidence > 1) {
    throw new FactConstructionError({
      message: `Fact confidence must be within [0, 1], got ${draft.confidence}`,
      field: "confidence",
      context: { sourceDocument: draft.sourceDocument, sourceLine: draft.sourceLine },
    });
  }
  return { ...draft, id: draft.id ?? factId(draft) };
};

export const clampConfidence = (confidence: number): number =>
  Number.isNaN(confidence) ? 0 : Math.min(1, Math.max(0, confidence));

// ============================================================================
// SET-ONCE ENRICHMENT
// ============================================================================

/** Returns the fact unchanged when a resolution is already recorded. */
export const withResolution = (
  fact: ClinicalFact,
  resolvedTimestamp: string,
  resolution: TemporalResolution,
  confidence: number
): ClinicalFact =>
  fact.resolvedTimestamp !== undefined
    ? fact
    : { ...fact, resolvedTimestamp, resolution, confidence };

/** Returns the fact unchanged when a correction is already recorded. */
export const withCorrection = (
  fact: ClinicalFact,
  correctedText: string,
  correction: Correction,
  confidence: number
): ClinicalFact =>
  fact.correction !== undefined
    ? fact
    : { ...fact, text: correctedText, correction, confidence: clampConfidence(confidence) };

// ============================================================================
// SERIALIZATION
// ============================================================================

export const encodeFact = (fact: ClinicalFact): ClinicalFactEncoded => S.encodeSync(ClinicalFactSchema)(fact);

/**
 * Decode plain data into a fact and re-check construction invariants.
 */
export const decodeFact = (input: unknown): Either.Either<ClinicalFact, ParseResult.ParseError | FactConstructionError> =>
  Either.flatMap(S.decodeUnknownEither(ClinicalFactSchema)(input), (fact) =>
    Either.try({
      try: () => makeFact(fact),
      catch: (error) =>
        error instanceof FactConstructionError
          ? error
          : new FactConstructionError({ message: String(error), field: "text" }),
    })
  );
