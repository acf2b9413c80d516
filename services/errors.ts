/**
 * SERVICE-LEVEL ERROR SYSTEM (Effect-TS)
 *
 * Errors are values, not exceptions. Composable, type-safe, structured.
 *
 * Philosophy:
 * - Errors are part of the type signature (Effect<A, E, R>)
 * - Clinical irregularities are never errors: they become Uncertainties
 * - Only contract violations (an invalid fact) are thrown
 * - Recovery strategy is carried on the error itself
 */

import { Data } from "effect";

/**
 * FACT CONSTRUCTION ERROR - Empty text or confidence outside [0, 1]
 *
 * Thrown by makeFact. A programming-contract violation, never recovered.
 */
export class FactConstructionError extends Data.TaggedError("FactConstructionError")<{
  readonly message: string;
  readonly field: "text" | "confidence";
  readonly context?: Record<string, unknown>;
}> {
  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      field: this.field,
      context: this.context,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * DOCUMENT EXTRACTION ERROR - Empty or unparseable document
 *
 * Isolated per document by the pipeline: the document contributes zero facts.
 */
export class DocumentExtractionError extends Data.TaggedError("DocumentExtractionError")<{
  readonly message: string;
  readonly documentId: string;
  readonly context?: Record<string, unknown>;
}> {
  get recoverable(): boolean {
    return true; // sibling documents still extract
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      documentId: this.documentId,
      context: this.context,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * FALLBACK EXTRACTION ERROR - External fallback capability failed
 */
export class FallbackExtractionError extends Data.TaggedError("FallbackExtractionError")<{
  readonly message: string;
  readonly factType: string;
  readonly documentId?: string;
}> {
  get recoverable(): boolean {
    return true; // pattern-only results stand
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      factType: this.factType,
      documentId: this.documentId,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * PATTERN VALIDATION ERROR - Rejected feedback submission
 */
export class PatternValidationError extends Data.TaggedError("PatternValidationError")<{
  readonly message: string;
  readonly reasons: ReadonlyArray<string>;
}> {
  get recoverable(): boolean {
    return true;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      reasons: this.reasons,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * PATTERN NOT FOUND ERROR - Approve/reject/outcome for an unknown pattern id
 */
export class PatternNotFoundError extends Data.TaggedError("PatternNotFoundError")<{
  readonly message: string;
  readonly patternId: string;
}> {
  get recoverable(): boolean {
    return true;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      patternId: this.patternId,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * CACHE UNAVAILABLE ERROR - Cache collaborator failed
 *
 * Always downgraded to a cache miss by the pipeline.
 */
export class CacheUnavailableError extends Data.TaggedError("CacheUnavailableError")<{
  readonly message: string;
  readonly key: string;
}> {
  get recoverable(): boolean {
    return true;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      key: this.key,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * KNOWLEDGE BASE ERROR - Reference tables failed to decode
 */
export class KnowledgeBaseError extends Data.TaggedError("KnowledgeBaseError")<{
  readonly message: string;
}> {
  get recoverable(): boolean {
    return false; // nothing can be extracted without the tables
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Union type of all service errors
 */
export type ServiceError =
  | FactConstructionError
  | DocumentExtractionError
  | FallbackExtractionError
  | PatternValidationError
  | PatternNotFoundError
  | CacheUnavailableError
  | KnowledgeBaseError;

/**
 * Error collector for batch processing
 *
 * Accumulates errors without stopping the batch (graceful degradation)
 */
export class ErrorCollector {
  private errors: ServiceError[] = [];

  add(error: ServiceError): void {
    this.errors.push(error);
  }

  getAll(): ServiceError[] {
    return [...this.errors];
  }

  count(): number {
    return this.errors.length;
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  hasUnrecoverableErrors(): boolean {
    return this.errors.some((e) => !e.recoverable);
  }

  clear(): void {
    this.errors = [];
  }

  toJSON() {
    return this.errors.map((e) => e.toJSON());
  }
}
