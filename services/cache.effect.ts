/**
 * CLINICAL CACHE - EFFECT-TS SERVICE
 *
 * Read-through / write-through memoization in front of classification,
 * extraction and the full pipeline result. Values are plain encoded data,
 * as an external key-value store would hold them.
 *
 * A miss always falls through to computation; the pipeline turns every
 * CacheUnavailableError into a miss.
 */

import { Clock, Context, Effect, Layer, Option, Ref } from "effect";
import type { ClinicalDocument } from "../schemas/clinicalFact";
import type { LearningPattern } from "../schemas/learning";
import { generateContentHash, sha256Hex } from "./contentHasher";
import { CacheUnavailableError } from "./errors";

export interface ClinicalCache {
  readonly get: (key: string) => Effect.Effect<Option.Option<unknown>, CacheUnavailableError, never>;
  readonly set: (key: string, value: unknown, ttlSeconds: number) => Effect.Effect<void, CacheUnavailableError, never>;
}

export const ClinicalCache = Context.GenericTag<ClinicalCache>("ClinicalCache");

// ============================================================================
// KEYS
// ============================================================================

const documentFingerprint = (document: ClinicalDocument): string =>
  [document.id, document.type ?? "", document.timestamp, generateContentHash(document.content)].join("|");

export const classificationKey = (document: Pick<ClinicalDocument, "name" | "content">): string =>
  `doc_class:${generateContentHash(`${document.name ?? ""}\n${document.content}`)}`;

export const factsKey = (document: ClinicalDocument, settings: unknown): string =>
  `facts:${sha256Hex(`${documentFingerprint(document)}|${JSON.stringify(settings)}`)}`;

/**
 * Covers every input of a run: documents in order, the active-pattern
 * snapshot (identity and weight) and the pipeline and matching settings.
 */
export const resultKey = (
  documents: ReadonlyArray<ClinicalDocument>,
  patterns: ReadonlyArray<LearningPattern>,
  settings: unknown
): string => {
  const docs = documents.map(documentFingerprint).join("\n");
  const snapshot = patterns.map((pattern) => `${pattern.id}:${pattern.successRate}`).join(",");
  return `result:${sha256Hex(`${docs}\n#${snapshot}\n#${JSON.stringify(settings)}`)}`;
};

// ============================================================================
// IN-MEMORY IMPLEMENTATION
// ============================================================================

interface CacheEntry {
  readonly value: unknown;
  readonly expiresAt: number;
  readonly touchedAt: number;
}

/**
 * TTL from the Effect Clock; least recently used entry evicted at capacity.
 */
export const makeMemoryCache = (maxEntries = 1000): Effect.Effect<ClinicalCache> =>
  Effect.map(Ref.make<ReadonlyMap<string, CacheEntry>>(new Map()), (store) => ({
    get: (key) =>
      Effect.gen(function* (_) {
        const now = yield* _(Clock.currentTimeMillis);
        const entries = yield* _(Ref.get(store));
        const entry = entries.get(key);
        if (entry === undefined) return Option.none();
        if (entry.expiresAt <= now) {
          yield* _(Ref.update(store, (current) => withoutKey(current, key)));
          return Option.none();
        }
        yield* _(Ref.update(store, (current) => new Map(current).set(key, { ...entry, touchedAt: now })));
        return Option.some(entry.value);
      }),

    set: (key, value, ttlSeconds) =>
      Effect.gen(function* (_) {
        const now = yield* _(Clock.currentTimeMillis);
        yield* _(
          Ref.update(store, (current) => {
            const next = new Map(current);
            if (!next.has(key) && next.size >= maxEntries) {
              const oldest = [...next.entries()].sort(([, a], [, b]) => a.touchedAt - b.touchedAt)[0];
              if (oldest !== undefined) next.delete(oldest[0]);
            }
            return next.set(key, { value, expiresAt: now + ttlSeconds * 1000, touchedAt: now });
          })
        );
      }),
  }));

const withoutKey = (entries: ReadonlyMap<string, CacheEntry>, key: string): ReadonlyMap<string, CacheEntry> => {
  const next = new Map(entries);
  next.delete(key);
  return next;
};

export const MemoryCacheLive = Layer.effect(ClinicalCache, makeMemoryCache());

/** Every lookup misses, nothing is stored. */
export const DisabledCacheLive = Layer.succeed(ClinicalCache, {
  get: () => Effect.succeed(Option.none()),
  set: () => Effect.void,
});

/** A cache whose backend is down. */
export const unavailableCacheLayer = (message = "cache backend unreachable"): Layer.Layer<ClinicalCache> =>
  Layer.succeed(ClinicalCache, {
    get: (key) => Effect.fail(new CacheUnavailableError({ message, key })),
    set: (key) => Effect.fail(new CacheUnavailableError({ message, key })),
  });
