/**
 * FALLBACK EXTRACTION CAPABILITY
 *
 * External, optional. Not providing this service in the environment is a
 * configuration state: the extractor then runs pattern-only.
 */

import { Context, Effect, Layer } from "effect";
import type { FactType } from "../../schemas/clinicalFact";
import { FallbackExtractionError } from "../errors";

export const FALLBACK_NONE_FOUND = "NONE_FOUND";

export interface FallbackRequest {
  readonly factType: FactType;
  readonly instruction: string;
  readonly text: string;
  readonly documentId: string;
}

export interface FallbackExtractor {
  /** Extracted text, or FALLBACK_NONE_FOUND. */
  readonly extract: (request: FallbackRequest) => Effect.Effect<string, FallbackExtractionError>;
}

export const FallbackExtractor = Context.GenericTag<FallbackExtractor>("FallbackExtractor");

export const isNoneFound = (response: string): boolean =>
  response.trim().length === 0 || response.trim().toUpperCase() === FALLBACK_NONE_FOUND;

/**
 * Fixed responses per fact type; anything unlisted answers NONE_FOUND.
 * Used for offline runs and tests.
 */
export const staticFallbackLayer = (
  responses: Partial<Record<FactType, string>>
): Layer.Layer<FallbackExtractor> =>
  Layer.succeed(FallbackExtractor, {
    extract: (request) => Effect.succeed(responses[request.factType] ?? FALLBACK_NONE_FOUND),
  });

/** A capability that is configured but failing. */
export const failingFallbackLayer = (message: string): Layer.Layer<FallbackExtractor> =>
  Layer.succeed(FallbackExtractor, {
    extract: (request) =>
      Effect.fail(new FallbackExtractionError({ message, factType: request.factType, documentId: request.documentId })),
  });
