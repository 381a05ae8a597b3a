/**
 * Leveled logger for gitscribe
 *
 * Each line starts with an emoji for the level. Debug lines only appear
 * with `--verbose`; warnings and errors go to the error stream.
 *
 * @example
 * ```typescript
 * const log = createLogger({ verbose: options.verbose })
 *
 * log.warn('Could not save default config', error)
 * log.child('session').debug('add -> type')  // 🔍 [session] add -> type
 * ```
 */

export type LogLevel = "debug" | "warn" | "error";

export interface LoggerOptions {
  /** Show debug lines and error stacks */
  verbose?: boolean;
  /** Sink for debug lines (default: console.log) */
  output?: (message: string) => void;
  /** Sink for warnings and errors (default: console.error) */
  errorOutput?: (message: string) => void;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  /** Logger whose lines carry `[parent:prefix]` */
  child(prefix: string): Logger;
}

const MARKERS: Record<LogLevel, string> = {
  debug: "🔍",
  warn: "⚠️",
  error: "❌",
};

function describeData(data: unknown, withStack: boolean): string {
  if (data instanceof Error) {
    const frames = withStack ? data.stack?.split("\n").slice(1) ?? [] : [];
    return frames.length > 0
      ? `- ${data.message}\n  ${frames.join("\n  ")}`
      : `- ${data.message}`;
  }
  if (typeof data === "object" && data !== null) {
    return `- ${JSON.stringify(data)}`;
  }
  return `- ${String(data)}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const output = options.output ?? console.log;
  const errorOutput = options.errorOutput ?? console.error;

  const scoped = (scope?: string): Logger => {
    const emit = (level: LogLevel, message: string, data?: unknown): void => {
      if (level === "debug" && !verbose) return;
      const line = [MARKERS[level]];
      if (scope) line.push(`[${scope}]`);
      line.push(message);
      if (data !== undefined) line.push(describeData(data, verbose));
      (level === "debug" ? output : errorOutput)(line.join(" "));
    };

    return {
      debug: (message, data) => emit("debug", message, data),
      warn: (message, data) => emit("warn", message, data),
      error: (message, data) => emit("error", message, data),
      child: (prefix) => scoped(scope ? `${scope}:${prefix}` : prefix),
    };
  };

  return scoped();
}

/**
 * Logger that records lines instead of printing them
 */
export function createTestLogger(
  options: Pick<LoggerOptions, "verbose"> = {},
): {
  logger: Logger;
  messages: string[];
  errors: string[];
} {
  const messages: string[] = [];
  const errors: string[] = [];

  const logger = createLogger({
    ...options,
    output: (line) => messages.push(line),
    errorOutput: (line) => errors.push(line),
  });

  return { logger, messages, errors };
}
