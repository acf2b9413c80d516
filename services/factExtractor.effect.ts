/**
 * FACT EXTRACTOR - EFFECT-TS SERVICE
 *
 * Document → source-attributed clinical facts.
 *
 * Architecture:
 * - Pattern strategies first (one per entity family, via the registry)
 * - Optional fallback capability for entity types the patterns missed in
 *   narrative documents (absent service = pattern-only, not an error)
 * - Deduplication collapses repeated extractions of the same fact
 * - Effect<Fact[], DocumentExtractionError, never>: a bad document fails
 *   alone, the pipeline isolates it
 */

import { Context, Effect, Layer, Option, pipe } from "effect";
import type { ClinicalDocument, ClinicalFact, FactType } from "../schemas/clinicalFact";
import { clampConfidence, makeFact } from "./clinicalFact";
import { formatClinicalTimestamp, parseClinicalTimestamp } from "./clinicalTime";
import { classifyDocument } from "./documentClassifier";
import { DocumentExtractionError } from "./errors";
import { deduplicateFacts } from "./extraction/deduplicate";
import { isNarrativeDocument, prepareDocument } from "./extraction/document";
import { FallbackExtractor, isNoneFound } from "./extraction/fallback";
import { ExtractionStrategyRegistry, makeDefaultRegistry } from "./extraction/registry";
import type { FallbackTarget, PreparedDocument } from "./extraction/types";
import { ClinicalKnowledgeBase } from "./knowledgeBase.effect";

// ============================================================================
// OPTIONS
// ============================================================================

export interface ExtractionOptions {
  readonly fallbackEnabled: boolean;
  readonly fallbackConfidence: number;
  /** Restrict extraction to these fact types. */
  readonly factTypes?: ReadonlyArray<FactType>;
}

export const defaultExtractionOptions: ExtractionOptions = {
  fallbackEnabled: true,
  fallbackConfidence: 0.85,
};

export interface ExtractionStatistics {
  readonly total: number;
  readonly byType: Record<string, number>;
  readonly averageConfidence: number;
  readonly requiresValidation: number;
  readonly fromFallback: number;
}

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface FactExtractorService {
  /**
   * Extract every fact from one document.
   * Fails only for malformed input (empty content, unparseable timestamp)
   * or a strategy that throws.
   */
  readonly extract: (
    document: ClinicalDocument,
    options?: Partial<ExtractionOptions>
  ) => Effect.Effect<ReadonlyArray<ClinicalFact>, DocumentExtractionError, never>;
}

export const FactExtractorService = Context.GenericTag<FactExtractorService>("FactExtractorService");

// ============================================================================
// HELPERS
// ============================================================================

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const extractionStatistics = (facts: ReadonlyArray<ClinicalFact>): ExtractionStatistics => {
  const byType: Record<string, number> = {};
  for (const fact of facts) byType[fact.type] = (byType[fact.type] ?? 0) + 1;
  const totalConfidence = facts.reduce((sum, fact) => sum + fact.confidence, 0);
  return {
    total: facts.length,
    byType,
    averageConfidence: facts.length === 0 ? 0 : totalConfidence / facts.length,
    requiresValidation: facts.filter((fact) => fact.requiresValidation).length,
    fromFallback: facts.filter((fact) => fact.provenance === "llm_fallback").length,
  };
};

const fallbackFact = (
  prepared: PreparedDocument,
  target: FallbackTarget,
  response: string,
  confidence: number
): ClinicalFact =>
  makeFact({
    text: `${target.label}: ${response.trim()}`,
    type: target.factType,
    sourceDocument: prepared.document.id,
    sourceLine: 0, // not line-anchored
    documentTimestamp: prepared.timestamp,
    documentType: prepared.documentType,
    specialty: prepared.document.specialty,
    confidence: clampConfidence(confidence),
    requiresValidation: true,
    provenance: "llm_fallback",
    clinicalSignificance: "MEDIUM",
  });

// ============================================================================
// SERVICE IMPLEMENTATION
// ============================================================================

class FactExtractorServiceImpl implements FactExtractorService {
  constructor(
    private readonly kb: ClinicalKnowledgeBase,
    private readonly registry: ExtractionStrategyRegistry
  ) {}

  readonly extract = (document: ClinicalDocument, overrides?: Partial<ExtractionOptions>) => {
    return Effect.gen(this, function* (_) {
      const options = { ...defaultExtractionOptions, ...overrides };

      if (document.content.trim().length === 0) {
        return yield* _(
          Effect.fail(new DocumentExtractionError({ message: "Document content is empty", documentId: document.id }))
        );
      }

      const parsed = parseClinicalTimestamp(document.timestamp);
      if (Option.isNone(parsed)) {
        return yield* _(
          Effect.fail(
            new DocumentExtractionError({
              message: "Document timestamp is not parseable",
              documentId: document.id,
              context: { timestamp: document.timestamp },
            })
          )
        );
      }

      const documentType = document.type ?? classifyDocument(document.name ?? document.id, document.content);
      const prepared = prepareDocument(document, documentType, formatClinicalTimestamp(parsed.value));
      const strategies = this.registry
        .all()
        .filter((strategy) => options.factTypes === undefined || strategy.factTypes.some((t) => options.factTypes?.includes(t)));

      const patternFacts = yield* _(
        Effect.try({
          try: () => strategies.flatMap((strategy) => strategy.extract(prepared, this.kb)),
          catch: (error) =>
            new DocumentExtractionError({
              message: `Pattern extraction failed: ${describe(error)}`,
              documentId: document.id,
            }),
        })
      );

      const wanted = patternFacts.filter(
        (fact) => options.factTypes === undefined || options.factTypes.includes(fact.type)
      );

      const fallbackFacts = options.fallbackEnabled
        ? yield* _(this.runFallback(prepared, wanted, options))
        : [];

      const { facts, removed } = deduplicateFacts([...wanted, ...fallbackFacts]);

      yield* _(
        pipe(
          Effect.logDebug("Extracted facts from document"),
          Effect.annotateLogs({
            documentId: document.id,
            documentType,
            facts: facts.length,
            fallbackFacts: fallbackFacts.length,
            duplicatesRemoved: removed,
          })
        )
      );

      return facts;
    });
  };

  /**
   * One fallback request per entity type the patterns found nothing for,
   * only in narrative documents that plausibly mention that type.
   */
  private readonly runFallback = (
    prepared: PreparedDocument,
    found: ReadonlyArray<ClinicalFact>,
    options: ExtractionOptions
  ) => {
    return Effect.gen(this, function* (_) {
      const capability = yield* _(Effect.serviceOption(FallbackExtractor));
      if (Option.isNone(capability) || !isNarrativeDocument(prepared)) return [];

      const foundTypes = new Set(found.map((fact) => fact.type));
      const targets = this.registry
        .all()
        .flatMap((strategy) => (strategy.fallback === undefined ? [] : [strategy.fallback]))
        .filter(
          (target) =>
            !foundTypes.has(target.factType) &&
            (options.factTypes === undefined || options.factTypes.includes(target.factType)) &&
            target.hint.test(prepared.document.content)
        );

      const results = yield* _(
        Effect.forEach(targets, (target) =>
          pipe(
            capability.value.extract({
              factType: target.factType,
              instruction: target.instruction,
              text: prepared.document.content,
              documentId: prepared.document.id,
            }),
            Effect.map((response): ReadonlyArray<ClinicalFact> =>
              isNoneFound(response) ? [] : [fallbackFact(prepared, target, response, options.fallbackConfidence)]
            ),
            Effect.catchAll((error) =>
              pipe(
                Effect.logWarning("Fallback extraction failed; continuing pattern-only"),
                Effect.annotateLogs({ documentId: error.documentId ?? prepared.document.id, factType: error.factType }),
                Effect.as<ReadonlyArray<ClinicalFact>>([])
              )
            )
          )
        )
      );

      return results.flat();
    });
  };
}

// ============================================================================
// SERVICE LAYER
// ============================================================================

export const makeFactExtractor = (
  kb: ClinicalKnowledgeBase,
  registry: ExtractionStrategyRegistry = makeDefaultRegistry()
): FactExtractorService => new FactExtractorServiceImpl(kb, registry);

export const FactExtractorServiceLive = Layer.effect(
  FactExtractorService,
  Effect.gen(function* (_) {
    const kb = yield* _(ClinicalKnowledgeBase);
    return makeFactExtractor(kb);
  })
);
