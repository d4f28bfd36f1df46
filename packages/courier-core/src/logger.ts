// Namespaced logger.
//
// Debug output is enabled per namespace with npm `debug`-style patterns
// ("courier:*", "-courier:listener"). Info, warn and error always go to the
// sink. Loggers are passed explicitly; there is no process-wide instance.

/** Where log lines end up. `console` satisfies this. */
export interface LogSink {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export type LogFields = Record<string, unknown>;

export interface Logger {
  readonly namespace: string;
  /** Whether debug output is enabled for this namespace. */
  readonly debugEnabled: boolean;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Logger for `${namespace}:${suffix}` sharing sink and pattern. */
  child(suffix: string): Logger;
}

export interface LoggerOptions {
  /**
   * Namespace for debug matching. Defaults to "courier".
   */
  namespace?: string;

  /**
   * Debug pattern, e.g. "courier:*". Defaults to process.env.DEBUG.
   * Supports wildcards (*) and exclusions (-prefix).
   */
  debug?: string;

  /**
   * Output sink. Defaults to console.
   */
  sink?: LogSink;
}

/**
 * Check if a namespace is enabled by a debug pattern list.
 * Later patterns override earlier ones.
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      // Exclusion pattern
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

class NamespacedLogger implements Logger {
  readonly debugEnabled: boolean;

  constructor(
    readonly namespace: string,
    private readonly pattern: string | undefined,
    private readonly sink: LogSink,
  ) {
    this.debugEnabled = isEnabled(namespace, pattern);
  }

  debug(message: string, fields?: LogFields): void {
    if (!this.debugEnabled) return;
    this.emit("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.emit("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.emit("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.emit("error", message, fields);
  }

  child(suffix: string): Logger {
    return new NamespacedLogger(`${this.namespace}:${suffix}`, this.pattern, this.sink);
  }

  private emit(level: keyof LogSink, message: string, fields?: LogFields): void {
    const line = `[${this.namespace}] ${message}`;
    if (fields === undefined) {
      this.sink[level](line);
    } else {
      this.sink[level](line, fields);
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new NamespacedLogger(
    options.namespace ?? "courier",
    options.debug ?? process.env.DEBUG,
    options.sink ?? console,
  );
}

const discard = (): void => {};

/** A sink that drops everything. */
export const nullSink: LogSink = {
  debug: discard,
  info: discard,
  warn: discard,
  error: discard,
};
