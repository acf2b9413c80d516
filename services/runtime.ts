/**
 * EFFECT RUNTIME - CENTRALIZED RUNTIME CONFIGURATION
 *
 * Provides a unified runtime for Effect-TS programs with:
 * - Structured JSON logging with clinical-text redaction
 * - Log level filtering (WARN+ in production)
 * - A result-typed runner for callers outside Effect
 *
 * Architecture:
 * - Services log with Effect.log* and annotateLogs, never console directly
 * - AppLayer swaps the default logger for AppLogger
 * - runPromise converts failures into { success: false }
 */

import { Effect, Layer, Logger, LogLevel } from "effect";
import { emit, isProductionMode, type LogLevel as SinkLevel } from "./appLogger";

// ============================================================================
// RUNTIME CONFIGURATION
// ============================================================================

const toSinkLevel = (level: LogLevel.LogLevel): SinkLevel => {
  switch (level._tag) {
    case "Fatal":
    case "Error":
      return "error";
    case "Warning":
      return "warn";
    case "Info":
      return "info";
    default:
      return "debug";
  }
};

const renderMessage = (message: unknown): string => {
  if (Array.isArray(message)) return message.map(renderMessage).join(" ");
  if (typeof message === "string") return message;
  return JSON.stringify(message) ?? String(message);
};

/**
 * Structured logger
 *
 * Annotations (documentId, stage, counts) become top-level JSON keys;
 * anything resembling note text is redacted by the sink.
 */
const AppLogger = Logger.make(({ logLevel, message, annotations }) => {
  emit(toSinkLevel(logLevel), renderMessage(message), Object.fromEntries(annotations));
});

/**
 * Base runtime layer with logging
 */
const AppLayer = Layer.merge(
  Logger.replace(Logger.defaultLogger, AppLogger),
  Logger.minimumLogLevel(isProductionMode() ? LogLevel.Warning : LogLevel.Debug)
);

// ============================================================================
// RUNTIME HELPERS
// ============================================================================

/**
 * Run Effect as Promise with error handling
 *
 * @example
 * const result = await runPromise(pipeline.process(documents));
 * if (result.success) {
 *   render(result.data.timeline);
 * }
 */
export const runPromise = <A, E>(
  effect: Effect.Effect<A, E, never>
): Promise<{ success: true; data: A } | { success: false; error: E }> => {
  return Effect.runPromise(
    effect.pipe(
      Effect.provide(AppLayer),
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) => Effect.succeed({ success: false as const, error }))
    )
  );
};

export { AppLayer, AppLogger };
