/**
 * Procedures (with surgical and revision detection) and operative findings.
 */

import type { ClinicalFact } from "../../../schemas/clinicalFact";
import {
  lineFact,
  stripTrailingPunctuation,
  type DocumentLine,
  type ExtractionStrategy,
  type PreparedDocument,
} from "../types";

const PROCEDURE_LABELS = new Set([
  "procedure",
  "procedures",
  "procedure performed",
  "procedures performed",
  "operation",
  "operation performed",
  "surgery",
  "surgery performed",
]);

const FINDING_LABELS = new Set(["findings", "operative findings", "intraoperative findings"]);

export const SURGICAL_TERMS =
  /(?:otomy|ectomy|plasty|clipping|coiling|resection|evacuation|shunt|fusion|biopsy|embolization|ventriculostomy|EVD|burr hole|decompression|repair|washout)/i;

export const REVISION_TERMS =
  /\b(?:revision|re-?operation|return(?:ed)? to (?:the )?OR|re-?exploration|redo|wound washout)\b/i;

const SUCCESS_TERMS = /\b(?:successful(?:ly)?|uneventful(?:ly)?|without difficulty)\b/i;

const UNDERWENT = /\b(?:underwent|s\/p|status post|taken to the OR for)\s+([^.;]+)/i;

const procedureFact = (
  document: PreparedDocument,
  line: DocumentLine,
  name: string,
  confidence: number
): ClinicalFact => {
  const revision = REVISION_TERMS.test(name) || REVISION_TERMS.test(line.text);
  return lineFact(document, line, {
    type: "procedure",
    text: `Procedure: ${name}`,
    confidence,
    requiresValidation: revision,
    clinicalSignificance: "HIGH",
    normalized: {
      _tag: "ProcedureInfo",
      name,
      surgical: document.documentType === "operative" || SURGICAL_TERMS.test(name),
      revision,
      successful: SUCCESS_TERMS.test(line.text),
    },
  });
};

const extractProcedures = (document: PreparedDocument): ReadonlyArray<ClinicalFact> => {
  const facts: ClinicalFact[] = [];
  const operative = document.documentType === "operative";

  for (const line of document.lines) {
    if (line.label !== undefined && PROCEDURE_LABELS.has(line.label)) {
      const name = stripTrailingPunctuation(line.body);
      if (name.length > 0 && !/^none\b/i.test(name)) {
        facts.push(procedureFact(document, line, name, operative ? 0.95 : 0.9));
      }
      continue;
    }

    if (line.label !== undefined && FINDING_LABELS.has(line.label) && line.body.length > 0) {
      facts.push(
        lineFact(document, line, {
          type: "finding",
          text: `Findings: ${stripTrailingPunctuation(line.body)}`,
          confidence: 0.92,
          normalized: { _tag: "StatementInfo", assertion: "OPERATIVE_FINDING" },
        })
      );
      continue;
    }

    const underwent = UNDERWENT.exec(line.text);
    if (underwent !== null && SURGICAL_TERMS.test(underwent[1])) {
      facts.push(procedureFact(document, line, stripTrailingPunctuation(underwent[1].trim()), 0.88));
      continue;
    }

    const revision = REVISION_TERMS.exec(line.text);
    if (revision !== null) {
      const sentence = line.text.slice(revision.index).split(/[.;]/)[0];
      facts.push(procedureFact(document, line, stripTrailingPunctuation(sentence.trim()), 0.88));
    }
  }

  return facts;
};

export const procedureStrategy: ExtractionStrategy = {
  name: "procedure",
  factTypes: ["procedure"],
  extract: extractProcedures,
  fallback: {
    factType: "procedure",
    label: "Procedure",
    instruction:
      "Name the surgical or bedside procedure performed according to this clinical note. Reply NONE_FOUND if no procedure was performed.",
    hint: /\b(?:surgery|operation|operative|procedure|underwent|otomy|ectomy|placement)\b/i,
  },
};
