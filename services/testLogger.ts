/**
 * STRUCTURED TEST LOGGER
 *
 * Test programs run with logging silenced unless VITEST_VERBOSE=true, in
 * which case they get the production logger (same JSON shape, same redaction).
 */

import { Layer, Logger, LogLevel } from "effect";
import { AppLayer } from "./runtime";

const isVerbose = process.env.VITEST_VERBOSE === "true" || process.env.DEBUG === "true";

export const TestLoggerLayer: Layer.Layer<never> = isVerbose
  ? AppLayer
  : Logger.minimumLogLevel(LogLevel.None);

/**
 * Captures log lines emitted by a program, for assertions on logging itself.
 */
export const makeCapturingLogger = () => {
  const lines: Array<{ level: string; message: string; annotations: Record<string, unknown> }> = [];
  const logger = Logger.make(({ logLevel, message, annotations }) => {
    lines.push({
      level: logLevel.label,
      message: Array.isArray(message) ? message.map(String).join(" ") : String(message),
      annotations: Object.fromEntries(annotations),
    });
  });
  return {
    lines,
    layer: Logger.replace(Logger.defaultLogger, logger),
  };
};
