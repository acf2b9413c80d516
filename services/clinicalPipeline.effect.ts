/**
 * CLINICAL PIPELINE - EFFECT-TS ORCHESTRATOR
 *
 * documents
 *   → classify (missing types)          cached  doc_class:{hash}
 *   → extract, concurrently per doc     cached  facts:{hash}
 *   → cross-document dedupe
 *   → learning correction pass          (one active-pattern snapshot per run)
 *   → temporal resolution
 *   → timeline
 *   → validation
 *   → result + metrics                  cached  result:{hash}
 *
 * A failing document contributes zero facts and one failure record; its
 * siblings are unaffected. The cache is optional and any cache error is a
 * miss.
 */

import { Clock, Context, Effect, Layer, Option, Ref, Schema as S, pipe } from "effect";
import {
  ClinicalFactSchema,
  DocumentTypeSchema,
  type ClinicalDocument,
  type ClinicalFact,
} from "../schemas/clinicalFact";
import type { LearningConfig, LearningPattern } from "../schemas/learning";
import {
  PipelineResultSchema,
  mergePipelineConfig,
  type DocumentFailure,
  type PipelineConfig,
  type PipelineMetrics,
  type PipelineResult,
} from "../schemas/pipeline";
import type { Uncertainty } from "../schemas/validation";
import { ClinicalCache, classificationKey, factsKey, resultKey } from "./cache.effect";
import { classifyDocument } from "./documentClassifier";
import { DocumentExtractionError, ErrorCollector } from "./errors";
import { deduplicateFacts } from "./extraction/deduplicate";
import type { FallbackExtractor } from "./extraction/fallback";
import { FactExtractorService, FactExtractorServiceLive, extractionStatistics } from "./factExtractor.effect";
import { ClinicalKnowledgeBaseLive, knowledgeBaseLayer } from "./knowledgeBase.effect";
import type { KnowledgeTables } from "../schemas/knowledgeBase";
import { FeedbackManagerService, feedbackManagerLayer } from "./learning/feedbackManager.effect";
import { applyCorrections } from "./learning/patternMatcher";
import { runPromise } from "./runtime";
import { TemporalResolverService, TemporalResolverServiceLive } from "./temporalResolver.effect";
import { TimelineBuilderService, TimelineBuilderServiceLive } from "./timelineBuilder.effect";
import { ValidatorService, ValidatorServiceLive } from "./validator.effect";

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface ClinicalPipelineService {
  readonly process: (
    documents: ReadonlyArray<ClinicalDocument>,
    config?: Partial<PipelineConfig>
  ) => Effect.Effect<PipelineResult, never, never>;
}

export const ClinicalPipelineService = Context.GenericTag<ClinicalPipelineService>("ClinicalPipelineService");

type ExtractionOutcome =
  | { readonly _tag: "Extracted"; readonly documentId: string; readonly facts: ReadonlyArray<ClinicalFact> }
  | { readonly _tag: "Failed"; readonly documentId: string; readonly error: DocumentExtractionError };

// ============================================================================
// CACHE ACCESS (errors degrade to a miss)
// ============================================================================

const cacheGet = <A, I>(
  cache: Option.Option<ClinicalCache>,
  key: string,
  schema: S.Schema<A, I, never>
): Effect.Effect<Option.Option<A>> =>
  Option.match(cache, {
    onNone: () => Effect.succeed(Option.none<A>()),
    onSome: (store) =>
      pipe(
        store.get(key),
        Effect.flatMap(
          Option.match({
            onNone: () => Effect.succeed(Option.none<A>()),
            onSome: (raw) =>
              pipe(
                S.decodeUnknown(schema)(raw),
                Effect.map(Option.some),
                Effect.catchAll(() =>
                  pipe(
                    Effect.logWarning("Discarding undecodable cache entry"),
                    Effect.annotateLogs({ key }),
                    Effect.as(Option.none<A>())
                  )
                )
              ),
          })
        ),
        Effect.catchAll((error) =>
          pipe(
            Effect.logWarning("Cache unavailable; computing without it"),
            Effect.annotateLogs({ key: error.key, reason: error.message }),
            Effect.as(Option.none<A>())
          )
        )
      ),
  });

const cacheSet = <A, I>(
  cache: Option.Option<ClinicalCache>,
  key: string,
  schema: S.Schema<A, I, never>,
  value: A,
  ttlSeconds: number
): Effect.Effect<void> =>
  Option.match(cache, {
    onNone: () => Effect.void,
    onSome: (store) =>
      pipe(
        S.encode(schema)(value),
        Effect.flatMap((encoded) => store.set(key, encoded, ttlSeconds)),
        Effect.catchAll((error) =>
          pipe(
            Effect.logWarning("Cache write skipped"),
            Effect.annotateLogs({ key, reason: error.message }),
            Effect.asVoid
          )
        )
      ),
  });

const FactListSchema = S.Array(ClinicalFactSchema);

// ============================================================================
// METRICS
// ============================================================================

const countSeverities = (uncertainties: ReadonlyArray<Uncertainty>): PipelineMetrics["uncertainties"] => {
  const counts = { HIGH: 0, MEDIUM: 0, LOW: 0 };
  for (const uncertainty of uncertainties) counts[uncertainty.severity] += 1;
  return counts;
};

// ============================================================================
// SERVICE IMPLEMENTATION
// ============================================================================

interface PipelineDependencies {
  readonly extractor: FactExtractorService;
  readonly resolver: TemporalResolverService;
  readonly builder: TimelineBuilderService;
  readonly validator: ValidatorService;
  readonly feedback: FeedbackManagerService;
}

class ClinicalPipelineServiceImpl implements ClinicalPipelineService {
  constructor(private readonly deps: PipelineDependencies) {}

  private readonly classify = (
    documents: ReadonlyArray<ClinicalDocument>,
    cache: Option.Option<ClinicalCache>,
    config: PipelineConfig,
    hits: Ref.Ref<number>
  ) =>
    Effect.forEach(documents, (document) => {
      if (document.type !== undefined) return Effect.succeed(document);
      const key = classificationKey(document);
      return pipe(
        cacheGet(cache, key, DocumentTypeSchema),
        Effect.flatMap(
          Option.match({
            onSome: (type) => Effect.as(Ref.update(hits, (n) => n + 1), { ...document, type }),
            onNone: () => {
              const type = classifyDocument(document.name ?? document.id, document.content);
              return Effect.as(
                cacheSet(cache, key, DocumentTypeSchema, type, config.cacheTtl.classificationSeconds),
                { ...document, type }
              );
            },
          })
        )
      );
    });

  private readonly extractOne = (
    document: ClinicalDocument,
    cache: Option.Option<ClinicalCache>,
    config: PipelineConfig,
    hits: Ref.Ref<number>
  ): Effect.Effect<ExtractionOutcome> => {
    const settings = { fallbackEnabled: config.fallbackEnabled, fallbackConfidence: config.fallbackConfidence };
    const key = factsKey(document, settings);
    return pipe(
      cacheGet(cache, key, FactListSchema),
      Effect.flatMap(
        Option.match({
          onSome: (facts) => Effect.as(Ref.update(hits, (n) => n + 1), facts),
          onNone: () =>
            pipe(
              this.deps.extractor.extract(document, settings),
              Effect.tap((facts) => cacheSet(cache, key, FactListSchema, facts, config.cacheTtl.factsSeconds))
            ),
        })
      ),
      Effect.catchAllDefect((defect) =>
        Effect.fail(
          new DocumentExtractionError({
            message: `Unexpected extraction failure: ${defect instanceof Error ? defect.message : String(defect)}`,
            documentId: document.id,
          })
        )
      ),
      Effect.match({
        onFailure: (error): ExtractionOutcome => ({ _tag: "Failed", documentId: document.id, error }),
        onSuccess: (facts): ExtractionOutcome => ({ _tag: "Extracted", documentId: document.id, facts }),
      })
    );
  };

  readonly process = (documents: ReadonlyArray<ClinicalDocument>, overrides?: Partial<PipelineConfig>) => {
    return Effect.gen(this, function* (_) {
      const config = mergePipelineConfig(overrides);
      const { resolver, builder, validator, feedback } = this.deps;
      const started = yield* _(Clock.currentTimeMillis);
      const cache = config.useCache ? yield* _(Effect.serviceOption(ClinicalCache)) : Option.none<ClinicalCache>();
      const hits = yield* _(Ref.make(0));

      const snapshot: ReadonlyArray<LearningPattern> = config.applyLearning ? yield* _(feedback.snapshotActive()) : [];
      const key = resultKey(documents, snapshot, { pipeline: config, learning: feedback.config });
      const cached = yield* _(cacheGet(cache, key, PipelineResultSchema));
      if (Option.isSome(cached)) {
        yield* _(pipe(Effect.logInfo("Pipeline result served from cache"), Effect.annotateLogs({ documents: documents.length })));
        return {
          ...cached.value,
          metrics: { ...cached.value.metrics, cacheHits: 1, resultFromCache: true },
        };
      }

      // ---- extraction (the only concurrent stage) ----
      const typed = yield* _(this.classify(documents, cache, config, hits));
      const outcomes = yield* _(
        Effect.forEach(typed, (document) => this.extractOne(document, cache, config, hits), {
          concurrency: config.extractionConcurrency,
        })
      );

      const errors = new ErrorCollector();
      const failures: DocumentFailure[] = [];
      for (const outcome of outcomes) {
        if (outcome._tag === "Extracted") continue;
        errors.add(outcome.error);
        failures.push({ documentId: outcome.documentId, reason: outcome.error.message });
        yield* _(
          pipe(
            Effect.logError("Document extraction failed; continuing without it"),
            Effect.annotateLogs({ documentId: outcome.documentId, reason: outcome.error.message })
          )
        );
      }

      const extracted = outcomes.flatMap((outcome) => (outcome._tag === "Extracted" ? outcome.facts : []));
      const deduped = config.dedupeAcrossDocuments ? deduplicateFacts(extracted) : { facts: extracted, removed: 0 };
      const extractedAt = yield* _(Clock.currentTimeMillis);

      // ---- learning correction pass ----
      const learningConfig: LearningConfig = feedback.config;
      const corrected = config.applyLearning
        ? applyCorrections(deduped.facts, snapshot, learningConfig)
        : { facts: deduped.facts, applications: [] };
      yield* _(feedback.markApplied(corrected.applications));
      const learnedAt = yield* _(Clock.currentTimeMillis);

      // ---- sequential stages ----
      const resolution = yield* _(resolver.resolve(corrected.facts));
      const resolvedAt = yield* _(Clock.currentTimeMillis);

      const timeline = yield* _(
        builder.build(resolution.facts, typed, { anchors: resolution.anchors, conflicts: resolution.conflicts })
      );
      const builtAt = yield* _(Clock.currentTimeMillis);

      const validation = yield* _(
        validator.validate(resolution.facts, timeline, {
          documentationGapDays: config.documentationGapDays,
          conflictWindowMinutes: config.conflictWindowMinutes,
          dischargeWindowHours: config.dischargeWindowHours,
        })
      );
      const finished = yield* _(Clock.currentTimeMillis);

      const stats = extractionStatistics(validation.facts);
      const metrics: PipelineMetrics = {
        documentCount: documents.length,
        failedDocuments: errors.count(),
        stageTimingsMs: {
          extraction: extractedAt - started,
          learning: learnedAt - extractedAt,
          temporal: resolvedAt - learnedAt,
          timeline: builtAt - resolvedAt,
          validation: finished - builtAt,
          total: finished - started,
        },
        factCounts: {
          total: stats.total,
          byType: stats.byType,
          requiringValidation: stats.requiresValidation,
          fallback: stats.fromFallback,
        },
        duplicatesRemoved: deduped.removed,
        learningPatternsApplied: corrected.applications.length,
        temporalResolutionRate: resolution.stats.resolutionRate,
        uncertainties: countSeverities(validation.uncertainties),
        cacheHits: yield* _(Ref.get(hits)),
        resultFromCache: false,
      };

      const result: PipelineResult = {
        facts: validation.facts,
        timeline,
        uncertainties: validation.uncertainties,
        failures,
        metrics,
      };

      yield* _(cacheSet(cache, key, PipelineResultSchema, result, config.cacheTtl.resultSeconds));
      yield* _(
        pipe(
          Effect.logInfo("Pipeline complete"),
          Effect.annotateLogs({
            documents: metrics.documentCount,
            failed: metrics.failedDocuments,
            facts: metrics.factCounts.total,
            uncertainties: validation.uncertainties.length,
            correctionsApplied: metrics.learningPatternsApplied,
            totalMs: metrics.stageTimingsMs.total,
          })
        )
      );

      return result;
    });
  };
}

// ============================================================================
// SERVICE LAYERS
// ============================================================================

export const ClinicalPipelineServiceLive = Layer.effect(
  ClinicalPipelineService,
  Effect.gen(function* (_) {
    const extractor = yield* _(FactExtractorService);
    const resolver = yield* _(TemporalResolverService);
    const builder = yield* _(TimelineBuilderService);
    const validator = yield* _(ValidatorService);
    const feedback = yield* _(FeedbackManagerService);
    return new ClinicalPipelineServiceImpl({ extractor, resolver, builder, validator, feedback });
  })
);

export interface PipelineLayerOptions {
  readonly tables?: KnowledgeTables;
  readonly learning?: Partial<LearningConfig>;
  readonly patterns?: ReadonlyArray<LearningPattern>;
}

/**
 * Pipeline plus the feedback manager it reads patterns from, so callers
 * can submit and approve corrections against the same store.
 */
export const makePipelineLayer = (options: PipelineLayerOptions = {}) => {
  const kb = options.tables === undefined ? ClinicalKnowledgeBaseLive : knowledgeBaseLayer(options.tables);
  const stages = pipe(
    Layer.mergeAll(FactExtractorServiceLive, TemporalResolverServiceLive, TimelineBuilderServiceLive, ValidatorServiceLive),
    Layer.provide(kb)
  );
  return pipe(
    ClinicalPipelineServiceLive,
    Layer.provideMerge(Layer.merge(stages, feedbackManagerLayer(options.learning, options.patterns)))
  );
};

export const ClinicalPipelineLive = makePipelineLayer();

// ============================================================================
// CONVENIENCE FUNCTIONS
// ============================================================================

export interface ProcessOptions extends PipelineLayerOptions {
  readonly cache?: Layer.Layer<ClinicalCache>;
  readonly fallback?: Layer.Layer<FallbackExtractor>;
}

/**
 * Run the whole pipeline once with the application logger.
 */
export const processDocuments = async (
  documents: ReadonlyArray<ClinicalDocument>,
  config?: Partial<PipelineConfig>,
  options: ProcessOptions = {}
): Promise<PipelineResult> => {
  const run = Effect.gen(function* (_) {
    const pipeline = yield* _(ClinicalPipelineService);
    return yield* _(pipeline.process(documents, config));
  }).pipe(Effect.provide(makePipelineLayer(options)));

  const withCache = options.cache === undefined ? run : Effect.provide(run, options.cache);
  const program = options.fallback === undefined ? withCache : Effect.provide(withCache, options.fallback);

  const result = await runPromise(program);
  if (result.success) return result.data;
  throw result.error;
};
