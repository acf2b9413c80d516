/**
 * Content hashing for identities and cache keys.
 *
 * Fact ids, uncertainty ids, pattern ids and cache keys are all derived
 * from content, never from counters or randomness, so reruns over the
 * same input produce the same identifiers.
 */

import { createHash } from "node:crypto";
import { Effect } from "effect";

/**
 * Normalize text for consistent hashing (whitespace variations, case)
 */
export const normalizeForHashing = (text: string): string => {
  return text
    .toLowerCase()
    .replace(/\s+/g, " ") // Collapse whitespace
    .trim();
};

/**
 * SHA-256 of the raw string, hex encoded
 */
export const sha256Hex = (text: string): string =>
  createHash("sha256").update(text, "utf8").digest("hex");

/**
 * SHA-256 of normalized content
 */
export const generateContentHash = (text: string): string => sha256Hex(normalizeForHashing(text));

/**
 * Short stable id over several parts (16 hex chars)
 */
export const stableId = (...parts: ReadonlyArray<string | number>): string =>
  sha256Hex(parts.map(String).join("\u001f")).slice(0, 16);

/**
 * Effect wrapper, for use inside service pipelines
 */
export const contentHash = (text: string): Effect.Effect<string> =>
  Effect.sync(() => generateContentHash(text));
