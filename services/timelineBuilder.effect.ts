/**
 * TIMELINE BUILDER - EFFECT-TS SERVICE
 *
 * Resolved facts → chronological timeline.
 *
 * - Days: facts grouped by effective calendar date, ordered by time of day
 *   then confidence (higher first)
 * - Key events: admissions, surgeries, complications, critical labs
 * - Progression: first-to-last trend per tracked measurement, judged by the
 *   knowledge base's polarity table
 * - Metadata: admission, discharge, inclusive length of stay
 */

import { Context, Effect, Layer, Option, pipe } from "effect";
import {
  effectiveTimestamp,
  isLabConcept,
  isScoreValue,
  type ClinicalDocument,
  type ClinicalFact,
} from "../schemas/clinicalFact";
import type {
  AnchorEvent,
  KeyEvent,
  KeyEventKind,
  ProgressionPoint,
  ProgressionSummary,
  StayMetadata,
  TemporalConflict,
  Timeline,
  TimelineDay,
} from "../schemas/timeline";
import { calendarDaysBetween, compareTimestamps, dateKey, isParseableTimestamp } from "./clinicalTime";
import { ClinicalKnowledgeBase } from "./knowledgeBase.effect";
import { collectAnchors, isSurgeryEvent } from "./temporalResolver.effect";

export interface TimelineContext {
  readonly anchors: ReadonlyArray<AnchorEvent>;
  readonly conflicts: ReadonlyArray<TemporalConflict>;
}

export interface TimelineBuilderService {
  readonly build: (
    facts: ReadonlyArray<ClinicalFact>,
    documents: ReadonlyArray<ClinicalDocument>,
    context?: TimelineContext
  ) => Effect.Effect<Timeline, never, never>;
}

export const TimelineBuilderService = Context.GenericTag<TimelineBuilderService>("TimelineBuilderService");

// ============================================================================
// ORDERING
// ============================================================================

export const compareFacts = (a: ClinicalFact, b: ClinicalFact): number =>
  compareTimestamps(effectiveTimestamp(a), effectiveTimestamp(b)) ||
  b.confidence - a.confidence ||
  a.id.localeCompare(b.id);

export const groupByDay = (facts: ReadonlyArray<ClinicalFact>): ReadonlyArray<TimelineDay> => {
  const days = new Map<string, ClinicalFact[]>();
  for (const fact of facts) {
    const date = dateKey(effectiveTimestamp(fact));
    const bucket = days.get(date);
    if (bucket === undefined) days.set(date, [fact]);
    else bucket.push(fact);
  }
  return [...days.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, dayFacts]) => ({ date, facts: [...dayFacts].sort(compareFacts) }));
};

// ============================================================================
// KEY EVENTS
// ============================================================================

const keyEventKind = (fact: ClinicalFact): KeyEventKind | undefined => {
  switch (fact.type) {
    case "admission":
      return "admission";
    case "procedure":
      return isSurgeryEvent(fact) ? "surgery" : undefined;
    case "complication":
      return "complication";
    case "lab_value":
      return isLabConcept(fact.normalized) && fact.normalized.severity === "CRITICAL" ? "critical_lab" : undefined;
    default:
      return undefined;
  }
};

export const extractKeyEvents = (facts: ReadonlyArray<ClinicalFact>): ReadonlyArray<KeyEvent> =>
  [...facts]
    .sort(compareFacts)
    .flatMap((fact) => {
      const kind = keyEventKind(fact);
      if (kind === undefined) return [];
      const timestamp = effectiveTimestamp(fact);
      return [{ kind, timestamp, date: dateKey(timestamp), factId: fact.id, description: fact.text }];
    });

// ============================================================================
// PROGRESSION
// ============================================================================

const measurementOf = (fact: ClinicalFact): Option.Option<{ name: string; value: number }> => {
  if (fact.type === "clinical_score" && isScoreValue(fact.normalized) && fact.normalized.valid) {
    return Option.some({ name: fact.normalized.scoreName, value: fact.normalized.value });
  }
  if (fact.type === "lab_value" && isLabConcept(fact.normalized)) {
    return Option.some({ name: fact.normalized.name, value: fact.normalized.value });
  }
  return Option.none();
};

export const computeProgression = (
  facts: ReadonlyArray<ClinicalFact>,
  kb: ClinicalKnowledgeBase
): ReadonlyArray<ProgressionSummary> => {
  const series = new Map<string, ProgressionPoint[]>();
  for (const fact of [...facts].sort(compareFacts)) {
    const timestamp = effectiveTimestamp(fact);
    if (!isParseableTimestamp(timestamp)) continue;
    const measurement = measurementOf(fact);
    if (Option.isNone(measurement) || Option.isNone(kb.polarity(measurement.value.name))) continue;
    const { name, value } = measurement.value;
    const points = series.get(name) ?? [];
    points.push({ timestamp, value, factId: fact.id });
    series.set(name, points);
  }

  return [...series.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .flatMap(([measurement, points]) => {
      const first = points[0];
      const last = points[points.length - 1];
      if (points.length < 2 || first === undefined || last === undefined) return [];
      return Option.match(kb.polarity(measurement), {
        onNone: () => [],
        onSome: (entry): ReadonlyArray<ProgressionSummary> => [
          {
            measurement,
            family: entry.family,
            direction: kb.trendDirection(measurement, first.value, last.value),
            firstValue: first.value,
            lastValue: last.value,
            points,
          },
        ],
      });
    });
};

// ============================================================================
// METADATA
// ============================================================================

export const computeStayMetadata = (facts: ReadonlyArray<ClinicalFact>): StayMetadata => {
  const timestamps = facts
    .map(effectiveTimestamp)
    .filter(isParseableTimestamp)
    .sort(compareTimestamps);
  const admissions = facts
    .filter((fact) => fact.type === "admission")
    .map(effectiveTimestamp)
    .filter(isParseableTimestamp)
    .sort(compareTimestamps);

  const admission = admissions[0] ?? timestamps[0];
  const discharge = timestamps[timestamps.length - 1];
  if (admission === undefined || discharge === undefined) return { lengthOfStayDays: 0 };

  const days = Option.getOrElse(calendarDaysBetween(admission, discharge), () => 0);
  return {
    admission,
    discharge,
    admissionDate: dateKey(admission),
    dischargeDate: dateKey(discharge),
    lengthOfStayDays: Math.max(0, days) + 1,
  };
};

/**
 * Pure construction over a resolved fact set.
 */
export const buildTimeline = (
  facts: ReadonlyArray<ClinicalFact>,
  documents: ReadonlyArray<ClinicalDocument>,
  kb: ClinicalKnowledgeBase,
  context?: TimelineContext
): Timeline => {
  const days = groupByDay(facts);
  const keyEvents = extractKeyEvents(facts);
  const factsByType: Record<string, number> = {};
  for (const fact of facts) factsByType[fact.type] = (factsByType[fact.type] ?? 0) + 1;

  return {
    days,
    keyEvents,
    progression: computeProgression(facts, kb),
    anchors: context?.anchors ?? collectAnchors(facts),
    conflicts: context?.conflicts ?? [],
    documents: [...documents]
      .sort((a, b) => compareTimestamps(a.timestamp, b.timestamp) || a.id.localeCompare(b.id))
      .map((document) => ({
        id: document.id,
        type: document.type,
        timestamp: document.timestamp,
        factCount: facts.filter((fact) => fact.sourceDocument === document.id).length,
      })),
    metadata: computeStayMetadata(facts),
    summary: {
      totalFacts: facts.length,
      dayCount: days.length,
      keyEventCount: keyEvents.length,
      factsByType,
    },
  };
};

// ============================================================================
// SERVICE
// ============================================================================

class TimelineBuilderServiceImpl implements TimelineBuilderService {
  constructor(private readonly kb: ClinicalKnowledgeBase) {}

  readonly build = (
    facts: ReadonlyArray<ClinicalFact>,
    documents: ReadonlyArray<ClinicalDocument>,
    context?: TimelineContext
  ) => {
    return Effect.gen(this, function* (_) {
      const timeline = buildTimeline(facts, documents, this.kb, context);
      yield* _(
        pipe(
          Effect.logDebug("Built timeline"),
          Effect.annotateLogs({
            days: timeline.summary.dayCount,
            keyEvents: timeline.summary.keyEventCount,
            progression: timeline.progression.length,
            lengthOfStayDays: timeline.metadata.lengthOfStayDays,
          })
        )
      );
      return timeline;
    });
  };
}

export const makeTimelineBuilder = (kb: ClinicalKnowledgeBase): TimelineBuilderService =>
  new TimelineBuilderServiceImpl(kb);

export const TimelineBuilderServiceLive = Layer.effect(
  TimelineBuilderService,
  Effect.gen(function* (_) {
    const kb = yield* _(ClinicalKnowledgeBase);
    return makeTimelineBuilder(kb);
  })
);
