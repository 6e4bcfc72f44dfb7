import pino from "pino";

export type LoggerOptions = {
  readonly level?: string;
  readonly component?: string;
  /** Defaults to stdout. */
  readonly destination?: pino.DestinationStream;
};

/**
 * Creates the process-wide pino logger: JSON lines, string level labels,
 * ISO 8601 timestamps.
 *
 * Level resolution order is `options.level`, then `LOG_LEVEL`, then `info`.
 * The optional `component` is bound onto every line so CLI and server output
 * can be told apart when both write to the same sink.
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const loggerOptions: pino.LoggerOptions = {
    level: options.level ?? process.env["LOG_LEVEL"] ?? "info",
    base: options.component ? { component: options.component } : undefined,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
