/**
 * Extraction strategy contract.
 *
 * One strategy per entity family; the registry maps each fact type to the
 * strategy that produces it, so adding an entity type never touches the
 * extractor's dispatch.
 */

import type {
  ClinicalDocument,
  ClinicalFact,
  DocumentType,
  FactDraft,
  FactType,
} from "../../schemas/clinicalFact";
import type { ClinicalKnowledgeBase } from "../knowledgeBase.effect";
import { makeFact } from "../clinicalFact";

export interface DocumentLine {
  readonly number: number; // 1-based
  readonly text: string;
  /** Lowercased label when the line reads "Label: body". */
  readonly label?: string;
  /** Text after the label (empty for a bare header), or the whole trimmed line. */
  readonly body: string;
  /** Lowercased header of the section the line sits in. */
  readonly section?: string;
}

export interface PreparedDocument {
  readonly document: ClinicalDocument;
  readonly documentType: DocumentType;
  readonly timestamp: string; // canonical form
  readonly lines: ReadonlyArray<DocumentLine>;
}

export interface FallbackTarget {
  readonly factType: FactType;
  readonly label: string;
  readonly instruction: string;
  /** The document plausibly mentions this entity type. */
  readonly hint: RegExp;
}

export interface ExtractionStrategy {
  readonly name: string;
  readonly factTypes: ReadonlyArray<FactType>;
  readonly extract: (document: PreparedDocument, kb: ClinicalKnowledgeBase) => ReadonlyArray<ClinicalFact>;
  readonly fallback?: FallbackTarget;
}

type LineFactFields = Pick<FactDraft, "text" | "type" | "confidence"> &
  Partial<Pick<FactDraft, "requiresValidation" | "clinicalSignificance" | "normalized" | "specialty">>;

/**
 * Fact attributed to a document line.
 */
export const lineFact = (document: PreparedDocument, line: DocumentLine, fields: LineFactFields): ClinicalFact =>
  makeFact({
    sourceDocument: document.document.id,
    sourceLine: line.number,
    documentTimestamp: document.timestamp,
    documentType: document.documentType,
    section: line.section,
    surroundingContext: line.text.trim(),
    specialty: fields.specialty ?? document.document.specialty,
    provenance: "pattern",
    requiresValidation: fields.requiresValidation ?? false,
    text: fields.text,
    type: fields.type,
    confidence: fields.confidence,
    clinicalSignificance: fields.clinicalSignificance,
    normalized: fields.normalized,
  });

/**
 * Tracks matched character ranges on one line: the first pattern to match
 * a span owns it and later overlapping matches are dropped.
 */
export class SpanClaims {
  private readonly spans: Array<readonly [number, number]> = [];

  claim(start: number, end: number): boolean {
    if (this.spans.some(([s, e]) => start < e && end > s)) return false;
    this.spans.push([start, end]);
    return true;
  }
}

/** Sentences of a line, with their offsets. */
export const sentencesOf = (text: string): ReadonlyArray<{ readonly text: string; readonly offset: number }> => {
  const out: Array<{ text: string; offset: number }> = [];
  for (const match of text.matchAll(/[^.;!?]+[.;!?]?/g)) {
    const trimmed = match[0].trim();
    if (trimmed.length > 0) out.push({ text: trimmed, offset: match.index ?? 0 });
  }
  return out;
};

export const stripTrailingPunctuation = (text: string): string => text.replace(/[\s.;,:]+$/, "");
