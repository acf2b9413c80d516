/**
 * TEMPORAL RESOLVER - EFFECT-TS SERVICE
 *
 * Relative time expressions → absolute timestamps.
 *
 * Pass 1 collects anchor events (admissions, surgeries) sorted by time.
 * Pass 2 resolves every fact whose text carries a relative expression:
 *
 *   POD#N      most recent surgery at or before the fact + N days
 *   HD#N       most recent admission at or before the fact + (N - 1) days
 *   deltas     arithmetic on the fact's own document timestamp
 *   overnight  08:00 the following calendar day
 *
 * Missing anchors and pre-admission results become conflicts; the fact is
 * kept either way.
 */

import { Context, Effect, Layer, Option, pipe } from "effect";
import {
  isProcedureInfo,
  isTemporalInfo,
  type ClinicalFact,
  type TemporalInfo,
  type TemporalKind,
} from "../schemas/clinicalFact";
import type { AnchorEvent, AnchorKind, ResolutionStats, TemporalConflict } from "../schemas/timeline";
import { withResolution } from "./clinicalFact";
import {
  atHour,
  atStartOfDay,
  compareTimestamps,
  formatClinicalTimestamp,
  parseClinicalTimestamp,
  shiftDays,
  shiftHours,
} from "./clinicalTime";
import { ClinicalKnowledgeBase } from "./knowledgeBase.effect";

// ============================================================================
// TYPES
// ============================================================================

export interface TemporalResolutionResult {
  readonly facts: ReadonlyArray<ClinicalFact>;
  readonly anchors: ReadonlyArray<AnchorEvent>;
  readonly conflicts: ReadonlyArray<TemporalConflict>;
  readonly stats: ResolutionStats;
}

export interface TemporalResolverService {
  readonly resolve: (facts: ReadonlyArray<ClinicalFact>) => Effect.Effect<TemporalResolutionResult, never, never>;
}

export const TemporalResolverService = Context.GenericTag<TemporalResolverService>("TemporalResolverService");

/** Kinds resolved inside facts that are not themselves temporal references. */
const EMBEDDED_KINDS: ReadonlySet<TemporalKind> = new Set([
  "post_operative_day",
  "hospital_day",
  "hours_after",
  "days_after",
]);

const CONFIDENCE_BOOST = 0.15;
const BOOST_CEILING = 0.95;

export const boostConfidence = (confidence: number): number =>
  Math.max(confidence, Math.min(BOOST_CEILING, confidence + CONFIDENCE_BOOST));

// ============================================================================
// ANCHORS
// ============================================================================

/**
 * A surgical procedure documented in an operative note. Later mentions
 * ("POD#3 s/p craniotomy", a discharge summary's procedure list) refer back
 * to it and are not surgeries of their own.
 */
export const isSurgeryEvent = (fact: ClinicalFact): boolean =>
  fact.type === "procedure" &&
  fact.documentType === "operative" &&
  isProcedureInfo(fact.normalized) &&
  fact.normalized.surgical;

const anchorKindOf = (fact: ClinicalFact): AnchorKind | undefined => {
  if (fact.type === "admission") return "admission";
  if (isSurgeryEvent(fact)) return "surgery";
  return undefined;
};

/** Chronological; one anchor per (kind, timestamp). */
export const collectAnchors = (facts: ReadonlyArray<ClinicalFact>): ReadonlyArray<AnchorEvent> => {
  const seen = new Set<string>();
  const anchors: AnchorEvent[] = [];
  for (const fact of facts) {
    const kind = anchorKindOf(fact);
    if (kind === undefined || Option.isNone(parseClinicalTimestamp(fact.documentTimestamp))) continue;
    const key = `${kind}|${fact.documentTimestamp}`;
    if (seen.has(key)) continue;
    seen.add(key);
    anchors.push({ kind, timestamp: fact.documentTimestamp, factId: fact.id, description: fact.text });
  }
  return anchors.sort((a, b) => compareTimestamps(a.timestamp, b.timestamp));
};

/** Latest anchor of the kind at or before the timestamp. */
export const mostRecentAnchor = (
  anchors: ReadonlyArray<AnchorEvent>,
  kind: AnchorKind,
  timestamp: string
): Option.Option<AnchorEvent> =>
  Option.fromNullable(
    anchors.filter((anchor) => anchor.kind === kind && compareTimestamps(anchor.timestamp, timestamp) <= 0).at(-1)
  );

// ============================================================================
// RESOLUTION
// ============================================================================

const referenceOf = (fact: ClinicalFact, kb: ClinicalKnowledgeBase): Option.Option<TemporalInfo> => {
  if (fact.type === "temporal_reference") {
    if (isTemporalInfo(fact.normalized)) return Option.some(fact.normalized);
    return Option.fromNullable([...kb.matchTemporal(fact.text)].sort((a, b) => a.index - b.index)[0]);
  }
  const embedded = kb
    .matchTemporal(fact.text)
    .filter((match) => EMBEDDED_KINDS.has(match.kind))
    .sort((a, b) => a.index - b.index);
  return Option.fromNullable(embedded[0]);
};

type Outcome =
  | { readonly _tag: "Resolved"; readonly date: Date; readonly anchor?: AnchorEvent }
  | { readonly _tag: "Conflict"; readonly conflict: TemporalConflict }
  | { readonly _tag: "Unresolved" };

const relativeTo = (base: Date, reference: TemporalInfo): Date => {
  const amount = reference.amount ?? 0;
  switch (reference.kind) {
    case "hours_after":
      return shiftHours(base, amount);
    case "days_after":
      return shiftDays(base, amount);
    case "two_days_after":
      return shiftDays(base, 2);
    case "next_day":
      return shiftDays(base, 1);
    case "next_morning":
      return atHour(shiftDays(base, 1), 8);
    case "today_morning":
      return atHour(base, 8);
    case "previous_night":
      return atHour(shiftDays(base, -1), 22);
    case "previous_day":
      return shiftDays(base, -1);
    case "same_evening":
      return atHour(base, 18);
    case "same_day":
      return atStartOfDay(base);
    case "post_operative_day":
    case "hospital_day":
      return base;
  }
};

const anchored = (
  fact: ClinicalFact,
  reference: TemporalInfo,
  anchors: ReadonlyArray<AnchorEvent>
): Outcome => {
  const kind: AnchorKind = reference.kind === "post_operative_day" ? "surgery" : "admission";
  const anchor = mostRecentAnchor(anchors, kind, fact.documentTimestamp);
  if (Option.isNone(anchor)) {
    const anyOfKind = anchors.some((a) => a.kind === kind);
    return {
      _tag: "Conflict",
      conflict: {
        type: kind === "surgery" ? "POD_WITHOUT_SURGERY" : "HD_WITHOUT_ADMISSION",
        factId: fact.id,
        description: anyOfKind
          ? `"${reference.matchedText}" precedes every ${kind} in the record`
          : `"${reference.matchedText}" has no ${kind} to anchor to`,
      },
    };
  }
  return Option.match(parseClinicalTimestamp(anchor.value.timestamp), {
    onNone: (): Outcome => ({ _tag: "Unresolved" }),
    onSome: (start): Outcome => {
      const amount = reference.amount ?? 0;
      const offset = kind === "surgery" ? amount : amount - 1;
      return { _tag: "Resolved", date: shiftDays(start, offset), anchor: anchor.value };
    },
  });
};

const resolveOne = (fact: ClinicalFact, reference: TemporalInfo, anchors: ReadonlyArray<AnchorEvent>): Outcome => {
  if (reference.kind === "post_operative_day" || reference.kind === "hospital_day") {
    return anchored(fact, reference, anchors);
  }
  return Option.match(parseClinicalTimestamp(fact.documentTimestamp), {
    onNone: (): Outcome => ({ _tag: "Unresolved" }),
    onSome: (base): Outcome => ({ _tag: "Resolved", date: relativeTo(base, reference) }),
  });
};

/**
 * Pure resolution over a complete fact set.
 */
export const resolveTemporalReferences = (
  facts: ReadonlyArray<ClinicalFact>,
  kb: ClinicalKnowledgeBase
): TemporalResolutionResult => {
  const anchors = collectAnchors(facts);
  const earliestAdmission = anchors.find((anchor) => anchor.kind === "admission");
  const conflicts: TemporalConflict[] = [];
  const byMethod: Record<string, number> = {};
  let references = 0;
  let resolved = 0;

  const output = facts.map((fact) => {
    if (fact.resolvedTimestamp !== undefined) return fact;
    const reference = referenceOf(fact, kb);
    if (Option.isNone(reference)) return fact;
    references += 1;

    const outcome = resolveOne(fact, reference.value, anchors);
    switch (outcome._tag) {
      case "Conflict":
        conflicts.push(outcome.conflict);
        return fact;
      case "Unresolved":
        return fact;
      case "Resolved": {
        const timestamp = formatClinicalTimestamp(outcome.date);
        resolved += 1;
        byMethod[reference.value.kind] = (byMethod[reference.value.kind] ?? 0) + 1;
        if (earliestAdmission !== undefined && compareTimestamps(timestamp, earliestAdmission.timestamp) < 0) {
          conflicts.push({
            type: "BEFORE_ADMISSION",
            factId: fact.id,
            description: `"${reference.value.matchedText}" resolves to ${timestamp}, before admission at ${earliestAdmission.timestamp}`,
          });
        }
        return withResolution(
          fact,
          timestamp,
          { method: reference.value.kind, anchorFactId: outcome.anchor?.factId },
          boostConfidence(fact.confidence)
        );
      }
    }
  });

  return {
    facts: output,
    anchors,
    conflicts,
    stats: {
      temporalReferences: references,
      resolved,
      unresolved: references - resolved,
      resolutionRate: references === 0 ? 1 : resolved / references,
      byMethod,
    },
  };
};

// ============================================================================
// SERVICE IMPLEMENTATION
// ============================================================================

class TemporalResolverServiceImpl implements TemporalResolverService {
  constructor(private readonly kb: ClinicalKnowledgeBase) {}

  readonly resolve = (facts: ReadonlyArray<ClinicalFact>) => {
    return Effect.gen(this, function* (_) {
      const result = resolveTemporalReferences(facts, this.kb);

      yield* _(
        pipe(
          Effect.logDebug("Resolved temporal references"),
          Effect.annotateLogs({
            anchors: result.anchors.length,
            references: result.stats.temporalReferences,
            resolved: result.stats.resolved,
            conflicts: result.conflicts.length,
          })
        )
      );

      if (result.conflicts.length > 0) {
        yield* _(
          pipe(
            Effect.logWarning("Temporal conflicts detected"),
            Effect.annotateLogs({ conflictTypes: result.conflicts.map((c) => c.type).join(",") })
          )
        );
      }

      return result;
    });
  };
}

// ============================================================================
// SERVICE LAYER
// ============================================================================

export const makeTemporalResolver = (kb: ClinicalKnowledgeBase): TemporalResolverService =>
  new TemporalResolverServiceImpl(kb);

export const TemporalResolverServiceLive = Layer.effect(
  TemporalResolverService,
  Effect.gen(function* (_) {
    const kb = yield* _(ClinicalKnowledgeBase);
    return makeTemporalResolver(kb);
  })
);
