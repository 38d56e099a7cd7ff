export type LogLevel = "debug" | "error";

export type LoggerOptions = {
  name?: string;
  /** Lowest level written. Defaults to `error`. */
  level?: LogLevel;
  fields?: Record<string, unknown>;
};

export interface TokenLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): TokenLogger;
}

/**
 * Writes one JSON object per line: debug entries to `console.log`, errors to
 * `console.error`.
 */
export function createLogger(options: LoggerOptions = {}): TokenLogger {
  const verbose = options.level === "debug";
  const service = options.name ?? "api-token-generator";

  const make = (fields: Record<string, unknown>): TokenLogger => {
    const line = (
      level: LogLevel,
      message: string,
      context?: Record<string, unknown>,
    ) =>
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...fields,
        ...context,
      });

    return {
      debug(message, context) {
        if (verbose) console.log(line("debug", message, context));
      },
      error(message, context) {
        console.error(line("error", message, context));
      },
      child: (extra) => make({ ...fields, ...extra }),
    };
  };

  return make({ service, ...options.fields });
}
