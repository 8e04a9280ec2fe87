/**
 * Console logger shared by the injector and launcher processes.
 *
 * Output format: [LEVEL] [name] message
 *
 * Debug output is off unless DEBUG matches the logger name (comma separated
 * list, "*" or a "prefix:*" wildcard) or NODE_ENV is "development".
 */

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const loggerCache = new Map<string, Logger>();

function isDebugEnabled(name: string): boolean {
  if (process.env.NODE_ENV === "development") {
    return true;
  }

  const patterns = (process.env.DEBUG ?? "")
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p !== "");

  return patterns.some((pattern) => {
    if (pattern === "*") return true;
    if (pattern.endsWith("*")) return name.startsWith(pattern.slice(0, -1));
    return pattern === name;
  });
}

function formatMessage(args: unknown[]): { message: string; rest: unknown[] } {
  if (args.length === 0) {
    return { message: "", rest: [] };
  }
  const [first, ...rest] = args;
  return {
    message: typeof first === "string" ? first : String(first),
    rest,
  };
}

function createLogger(name: string): Logger {
  const debugEnabled = isDebugEnabled(name);

  const write =
    (level: string, sink: (...data: unknown[]) => void) =>
    (...args: unknown[]): void => {
      const { message, rest } = formatMessage(args);
      sink(`[${level}] [${name}] ${message}`, ...rest);
    };

  return {
    debug: debugEnabled
      ? write("DEBUG", (...data) => console.log(...data))
      : () => {},
    info: write("INFO", (...data) => console.info(...data)),
    warn: write("WARN", (...data) => console.warn(...data)),
    error: write("ERROR", (...data) => console.error(...data)),
  };
}

/**
 * Get a named logger. Loggers are cached per name; the DEBUG filter is read
 * when a logger is first created.
 */
export function logger(name: string): Logger {
  const cached = loggerCache.get(name);
  if (cached) {
    return cached;
  }
  const created = createLogger(name);
  loggerCache.set(name, created);
  return created;
}

/**
 * Drop cached loggers so the next logger() call re-reads DEBUG/NODE_ENV.
 */
export function clearLoggerCache(): void {
  loggerCache.clear();
}
