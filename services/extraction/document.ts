/**
 * Line splitting and section tracking.
 */

import type { ClinicalDocument, DocumentType } from "../../schemas/clinicalFact";
import type { DocumentLine, PreparedDocument } from "./types";

const LABEL_LINE = /^\s*(?:[-*•]\s*)?([A-Za-z][A-Za-z0-9 /&()'-]{0,48}?)\s*:\s*(.*)$/;

const SECTION_NAMES = new Set([
  "assessment",
  "assessment and plan",
  "plan",
  "impression",
  "diagnosis",
  "diagnoses",
  "medications",
  "recommendations",
  "findings",
  "complications",
  "history",
  "hpi",
  "physical exam",
  "exam",
  "labs",
  "vitals",
  "hospital course",
  "disposition",
  "instructions",
  "discharge instructions",
  "follow-up",
  "follow up",
]);

const isHeader = (label: string, rest: string): boolean =>
  rest.length === 0 ||
  SECTION_NAMES.has(label.toLowerCase()) ||
  (label === label.toUpperCase() && label.includes(" "));

export const splitLines = (content: string): ReadonlyArray<DocumentLine> => {
  const lines: DocumentLine[] = [];
  let section: string | undefined;

  content.split(/\r?\n/).forEach((text, index) => {
    const match = LABEL_LINE.exec(text);
    if (match !== null) {
      const label = match[1].trim();
      const rest = match[2].trim();
      if (isHeader(label, rest)) section = label.toLowerCase();
      lines.push({ number: index + 1, text, label: label.toLowerCase(), body: rest, section });
      return;
    }
    if (text.trim().length === 0) return;
    lines.push({ number: index + 1, text, body: text.trim(), section });
  });

  return lines;
};

export const prepareDocument = (
  document: ClinicalDocument,
  documentType: DocumentType,
  timestamp: string
): PreparedDocument => ({
  document,
  documentType,
  timestamp,
  lines: splitLines(document.content),
});

/**
 * Prose rather than "Label: value" lines; the fallback capability is only
 * consulted for narrative documents.
 */
export const isNarrativeDocument = (document: PreparedDocument): boolean => {
  const words = document.lines.reduce((count, line) => count + line.body.split(/\s+/).length, 0);
  if (words < 15 || document.lines.length === 0) return false;
  const labeled = document.lines.filter((line) => line.label !== undefined).length;
  return labeled / document.lines.length < 0.5;
};
