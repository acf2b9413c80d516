/**
 * CLINICAL KNOWLEDGE BASE - EFFECT-TS SERVICE
 *
 * Immutable reference tables plus the small lookup and interpretation
 * functions built on them. The tables live in data/clinical-knowledge.json
 * and are decoded through KnowledgeTablesSchema; tests build their own
 * knowledge base from modified tables with makeClinicalKnowledgeBase.
 *
 * Design:
 * - Regexes are compiled once per knowledge base, not per document
 * - Short aliases (three letters or fewer) match case-sensitively so that
 *   "Mg" (magnesium) never matches the dose unit "mg"
 * - Critical thresholds are inclusive
 */

import { Context, Layer, Option, Schema as S } from "effect";
import knowledgeTablesJson from "../data/clinical-knowledge.json";
import type {
  Dose,
  LabConcept,
  LabDirection,
  LabSeverity,
  MedicationInfo,
  TemporalInfo,
  TemporalKind,
} from "../schemas/clinicalFact";
import {
  KnowledgeTablesSchema,
  type ClassRule,
  type KnowledgeTables,
  type LabReference,
  type MaxDose,
  type MedicationReference,
  type PolarityEntry,
  type ScoreReference,
  type UncertaintySeverity,
} from "../schemas/knowledgeBase";
import type { TrendDirection } from "../schemas/timeline";
import { KnowledgeBaseError } from "./errors";

// ============================================================================
// TYPES
// ============================================================================

export interface LabMatcher {
  readonly key: string; // lowercase table key, or display name for unranged labs
  readonly displayName: string;
  readonly unit: string;
  readonly reference: Option.Option<LabReference>;
  readonly patterns: ReadonlyArray<RegExp>; // capture group 1 = value
}

export interface ScoreMatcher {
  readonly name: string;
  readonly reference: ScoreReference;
  readonly patterns: ReadonlyArray<RegExp>; // capture group 1 = value
}

export interface TemporalMatcher {
  readonly kind: TemporalKind;
  readonly pattern: RegExp;
}

export interface TemporalMatch extends TemporalInfo {
  readonly index: number;
}

export interface ScoreCheck {
  readonly valid: boolean;
  readonly critical: boolean;
  readonly min: number;
  readonly max: number;
}

export interface MedicationInteraction {
  readonly drugs: ReadonlyArray<string>;
  readonly severity: UncertaintySeverity;
  readonly description: string;
}

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface ClinicalKnowledgeBase {
  readonly tables: KnowledgeTables;
  readonly labMatchers: ReadonlyArray<LabMatcher>;
  readonly scoreMatchers: ReadonlyArray<ScoreMatcher>;
  readonly temporalMatchers: ReadonlyArray<TemporalMatcher>;
  readonly complicationPatterns: ReadonlyArray<RegExp>;
  readonly medicationNames: ReadonlyArray<string>;

  /** Severity grade and implication for a lab value. Unknown labs get UNKNOWN. */
  readonly normalizeLab: (matcher: LabMatcher, value: number) => LabConcept;
  readonly findLab: (name: string) => Option.Option<LabMatcher>;

  readonly medication: (name: string) => Option.Option<MedicationReference>;
  readonly isHighRiskMedication: (name: string) => boolean;
  readonly medicationInfo: (
    name: string,
    order?: { readonly dose?: Dose; readonly route?: string; readonly frequency?: string }
  ) => MedicationInfo;
  readonly maxSingleDose: (name: string) => Option.Option<MaxDose>;
  /** Dose expressed in the target unit, when the units are convertible. */
  readonly convertDose: (dose: Dose, toUnit: string) => Option.Option<number>;
  readonly medicationInteractions: (names: ReadonlyArray<string>) => ReadonlyArray<MedicationInteraction>;

  readonly checkScore: (name: string, value: number) => Option.Option<ScoreCheck>;
  readonly polarity: (measurement: string) => Option.Option<PolarityEntry>;
  readonly trendDirection: (measurement: string, first: number, last: number) => TrendDirection;

  /** Every catalog match in the text, in catalog order. */
  readonly matchTemporal: (text: string) => ReadonlyArray<TemporalMatch>;
}

export const ClinicalKnowledgeBase = Context.GenericTag<ClinicalKnowledgeBase>("ClinicalKnowledgeBase");

// ============================================================================
// HELPERS
// ============================================================================

const escapeRegex = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const letterCount = (source: string): number => source.replace(/[^A-Za-z]/g, "").length;

const aliasFlags = (source: string): string => (letterCount(source) <= 3 ? "g" : "gi");

const LAB_VALUE_TAIL = String.raw`\s*(?:level\s*)?(?:of\s*)?[:=]?\s*(\d+(?:\.\d+)?)`;
const SCORE_VALUE_TAIL = String.raw`(?:\s+(?:score|grade|scale))?\s*(?:of\s*)?[:=]?\s*(\d{1,3})(?![\d.])`;

const aliasPattern = (alias: string, tail: string): RegExp =>
  new RegExp(String.raw`(?<![A-Za-z])(?:${alias})(?![A-Za-z])${tail}`, aliasFlags(alias));

const MASS_UNITS: Record<string, number> = { mcg: 0.001, mg: 1, g: 1000 };

const canonicalUnit = (unit: string): string => {
  const lower = unit.toLowerCase();
  if (lower === "unit" || lower === "units") return "units";
  if (lower === "meq") return "mEq";
  if (lower === "ml") return "mL";
  return lower;
};

/**
 * Severity is a grade, direction is kept separately:
 * - CRITICAL at or beyond a critical threshold
 * - HIGH when at least halfway from the normal bound to the critical one
 * - LOW when outside the normal range by less than that
 */
export const gradeLabValue = (
  reference: LabReference,
  value: number
): { readonly severity: LabSeverity; readonly direction: LabDirection } => {
  if (value <= reference.criticalLow) return { severity: "CRITICAL", direction: "below" };
  if (value >= reference.criticalHigh) return { severity: "CRITICAL", direction: "above" };
  if (value < reference.normalLow) {
    const halfway = (reference.normalLow - reference.criticalLow) / 2;
    return { severity: reference.normalLow - value >= halfway ? "HIGH" : "LOW", direction: "below" };
  }
  if (value > reference.normalHigh) {
    const halfway = (reference.criticalHigh - reference.normalHigh) / 2;
    return { severity: value - reference.normalHigh >= halfway ? "HIGH" : "LOW", direction: "above" };
  }
  return { severity: "NORMAL", direction: "within" };
};

const implicationFor = (
  reference: LabReference,
  severity: LabSeverity,
  direction: LabDirection
): string | undefined => {
  if (direction === "below") {
    return severity === "CRITICAL" ? reference.implications.criticalLow : reference.implications.low;
  }
  if (direction === "above") {
    return severity === "CRITICAL" ? reference.implications.criticalHigh : reference.implications.high;
  }
  return undefined;
};

/** Distance from the normal range; zero inside it. */
const deviationFromNormal = (reference: LabReference, value: number): number => {
  if (value < reference.normalLow) return reference.normalLow - value;
  if (value > reference.normalHigh) return value - reference.normalHigh;
  return 0;
};

const STABLE_LAB_CHANGE = 0.1;
const STABLE_SCORE_CHANGE = 1;

// ============================================================================
// CONSTRUCTION
// ============================================================================

export const makeClinicalKnowledgeBase = (tables: KnowledgeTables): ClinicalKnowledgeBase => {
  const labMatchers: ReadonlyArray<LabMatcher> = [
    ...Object.entries(tables.labs).map(([key, reference]) => ({
      key,
      displayName: reference.displayName,
      unit: reference.unit,
      reference: Option.some(reference),
      patterns: reference.aliases.map((alias) => aliasPattern(alias, LAB_VALUE_TAIL)),
    })),
    ...tables.unrangedLabs.map((lab) => ({
      key: lab.displayName.toLowerCase(),
      displayName: lab.displayName,
      unit: lab.unit,
      reference: Option.none<LabReference>(),
      patterns: lab.aliases.map((alias) => aliasPattern(alias, LAB_VALUE_TAIL)),
    })),
  ];

  const scoreMatchers: ReadonlyArray<ScoreMatcher> = Object.entries(tables.scores).map(([name, reference]) => ({
    name,
    reference,
    patterns: reference.aliases.map((alias) => aliasPattern(alias, SCORE_VALUE_TAIL)),
  }));

  const temporalMatchers: ReadonlyArray<TemporalMatcher> = tables.temporalPatterns.map((entry) => ({
    kind: entry.kind,
    pattern: new RegExp(entry.pattern, "gi"),
  }));

  const complicationPatterns = tables.complicationTerms.map(
    (term) => new RegExp(String.raw`(?<![A-Za-z])${escapeRegex(term)}s?(?![A-Za-z])`, aliasFlags(term))
  );

  const medication = (name: string): Option.Option<MedicationReference> =>
    Option.fromNullable(tables.medications[name.toLowerCase()]);

  const isHighRiskMedication = (name: string): boolean => {
    const lower = name.toLowerCase();
    return (
      Option.match(medication(lower), { onNone: () => false, onSome: (ref) => ref.highRisk }) ||
      tables.highRiskPatterns.some((pattern) => lower.includes(pattern))
    );
  };

  const findScoreReference = (name: string): Option.Option<ScoreReference> =>
    Option.fromNullable(tables.scores[name]);

  const matchesClassRule = (rule: ClassRule, names: ReadonlyArray<string>): ReadonlyArray<string> =>
    names.filter((name) =>
      Option.match(medication(name), { onNone: () => false, onSome: (ref) => ref.drugClass === rule.drugClass })
    );

  return {
    tables,
    labMatchers,
    scoreMatchers,
    temporalMatchers,
    complicationPatterns,
    medicationNames: Object.keys(tables.medications),

    normalizeLab: (matcher, value) =>
      Option.match(matcher.reference, {
        onNone: (): LabConcept => ({
          _tag: "LabConcept",
          name: matcher.key,
          displayName: matcher.displayName,
          value,
          unit: matcher.unit,
          severity: "UNKNOWN",
          direction: "unknown",
        }),
        onSome: (reference): LabConcept => {
          const { severity, direction } = gradeLabValue(reference, value);
          return {
            _tag: "LabConcept",
            name: matcher.key,
            displayName: matcher.displayName,
            value,
            unit: matcher.unit,
            normalLow: reference.normalLow,
            normalHigh: reference.normalHigh,
            severity,
            direction,
            implication: implicationFor(reference, severity, direction),
          };
        },
      }),

    findLab: (name) => {
      const lower = name.toLowerCase();
      return Option.fromNullable(
        labMatchers.find((matcher) => matcher.key === lower || matcher.displayName.toLowerCase() === lower)
      );
    },

    medication,
    isHighRiskMedication,

    medicationInfo: (name, order = {}) => {
      const lower = name.toLowerCase();
      const reference = medication(lower);
      return {
        _tag: "MedicationInfo",
        name: lower,
        drugClass: Option.match(reference, { onNone: () => "Unclassified", onSome: (ref) => ref.drugClass }),
        subclass: Option.getOrUndefined(Option.map(reference, (ref) => ref.subclass)),
        indications: Option.match(reference, { onNone: () => [], onSome: (ref) => ref.indications }),
        monitoring: Option.match(reference, { onNone: () => [], onSome: (ref) => ref.monitoring }),
        highRisk: isHighRiskMedication(lower),
        inKnowledgeBase: Option.isSome(reference),
        dose: order.dose,
        route: order.route,
        frequency: order.frequency,
      };
    },

    maxSingleDose: (name) => Option.fromNullable(tables.maxSingleDoses[name.toLowerCase()]),

    convertDose: (dose, toUnit) => {
      const from = canonicalUnit(dose.unit);
      const to = canonicalUnit(toUnit);
      if (from === to) return Option.some(dose.value);
      const fromFactor = MASS_UNITS[from];
      const toFactor = MASS_UNITS[to];
      if (fromFactor === undefined || toFactor === undefined) return Option.none();
      return Option.some((dose.value * fromFactor) / toFactor);
    },

    medicationInteractions: (names) => {
      const present = [...new Set(names.map((name) => name.toLowerCase()))].sort();
      const pairs = tables.interactionPairs
        .filter((pair) => present.includes(pair.drugs[0]) && present.includes(pair.drugs[1]))
        .map((pair) => ({ drugs: [...pair.drugs], severity: pair.severity, description: pair.description }));
      const classes = tables.classRules.flatMap((rule) => {
        const members = matchesClassRule(rule, present);
        return members.length >= rule.minCount
          ? [{ drugs: members, severity: rule.severity, description: rule.description }]
          : [];
      });
      return [...pairs, ...classes];
    },

    checkScore: (name, value) =>
      Option.map(findScoreReference(name), (reference) => {
        const valid = Number.isInteger(value) && value >= reference.min && value <= reference.max;
        const critical =
          valid &&
          reference.critical !== undefined &&
          (reference.critical.direction === "atOrAbove"
            ? value >= reference.critical.value
            : value <= reference.critical.value);
        return { valid, critical, min: reference.min, max: reference.max };
      }),

    polarity: (measurement) => Option.fromNullable(tables.polarity[measurement]),

    trendDirection: (measurement, first, last) => {
      const entry = tables.polarity[measurement];
      if (entry === undefined) return "stable";
      if (entry.polarity === "toward_normal") {
        const reference = tables.labs[measurement];
        const base = Math.abs(first);
        const change = base === 0 ? Math.abs(last - first) : Math.abs(last - first) / base;
        if (reference === undefined || change < STABLE_LAB_CHANGE) return "stable";
        const before = deviationFromNormal(reference, first);
        const after = deviationFromNormal(reference, last);
        if (after < before) return "improving";
        if (after > before) return "worsening";
        return "stable";
      }
      const delta = last - first;
      if (Math.abs(delta) <= STABLE_SCORE_CHANGE) return "stable";
      const better = entry.polarity === "lower_is_better" ? delta < 0 : delta > 0;
      return better ? "improving" : "worsening";
    },

    matchTemporal: (text) =>
      temporalMatchers.flatMap((matcher) =>
        Array.from(text.matchAll(matcher.pattern), (match): TemporalMatch => {
          const amount = match[1] === undefined ? undefined : Number.parseInt(match[1], 10);
          return { _tag: "TemporalInfo", kind: matcher.kind, matchedText: match[0], amount, index: match.index ?? 0 };
        })
      ),
  };
};

// ============================================================================
// DEFAULT TABLES
// ============================================================================

export const decodeKnowledgeTables = (input: unknown): KnowledgeTables => {
  try {
    return S.decodeUnknownSync(KnowledgeTablesSchema)(input);
  } catch (error) {
    throw new KnowledgeBaseError({ message: `Invalid knowledge tables: ${String(error)}` });
  }
};

export const defaultKnowledgeTables: KnowledgeTables = decodeKnowledgeTables(knowledgeTablesJson);

export const defaultKnowledgeBase: ClinicalKnowledgeBase = makeClinicalKnowledgeBase(defaultKnowledgeTables);

export const ClinicalKnowledgeBaseLive = Layer.succeed(ClinicalKnowledgeBase, defaultKnowledgeBase);

export const knowledgeBaseLayer = (tables: KnowledgeTables): Layer.Layer<ClinicalKnowledgeBase> =>
  Layer.succeed(ClinicalKnowledgeBase, makeClinicalKnowledgeBase(tables));
