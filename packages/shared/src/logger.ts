export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

function normalizeFields(fields?: Record<string, unknown>): Record<string, unknown> {
  if (!fields) return {};
  const output: Record<string, unknown> = { ...fields };
  const err = output.err ?? output.error;
  if (err instanceof Error) {
    output.error_name = err.name;
    output.error_message = err.message;
    output.error_stack = err.stack;
    delete output.err;
    delete output.error;
  }
  return output;
}

export type LogSink = (line: string) => void;

export type LoggerOptions = {
  level?: LogLevel;
  sink?: LogSink;
};

export type Logger = {
  debug: (message: string, fields?: Record<string, unknown>) => void;
  info: (message: string, fields?: Record<string, unknown>) => void;
  warn: (message: string, fields?: Record<string, unknown>) => void;
  error: (message: string, fields?: Record<string, unknown>) => void;
  child: (fields: Record<string, unknown>) => Logger;
  flush: () => Promise<void>;
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

function flushStderr(): Promise<void> {
  return new Promise((resolve) => {
    process.stderr.write("", () => resolve());
  });
}

export function createLogger(
  baseFields: Record<string, unknown> = {},
  options: LoggerOptions = {}
): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? stderrSink;
  const threshold = LEVEL_ORDER[level];
  const base = { pid: process.pid, ...baseFields };

  const log = (lvl: LogLevel, message: string, fields?: Record<string, unknown>) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    const entry = {
      level: lvl,
      time: new Date().toISOString(),
      message,
      ...base,
      ...normalizeFields(fields),
    };
    sink(`${JSON.stringify(entry)}\n`);
  };

  return {
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields),
    child: (fields) => createLogger({ ...base, ...fields }, { level, sink }),
    flush: () => (options.sink ? Promise.resolve() : flushStderr()),
  };
}

/** Logger that drops everything; handy as a default for library callers. */
export const silentLogger: Logger = createLogger({}, { level: "error", sink: () => undefined });
