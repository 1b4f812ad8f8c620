export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LogRecord {
  level: Exclude<LogLevel, "silent">;
  scope: string;
  message: string;
  fields?: Record<string, unknown>;
  ts: number;
}

export type LogSink = (record: LogRecord) => void;

/** Default sink: one line per record on the console, fields as trailing JSON. */
export const consoleSink: LogSink = (record) => {
  const prefix = `[${new Date(record.ts).toISOString()}] ${record.level.toUpperCase()} ${record.scope}:`;
  const line = record.fields ? `${prefix} ${record.message} ${JSON.stringify(record.fields)}` : `${prefix} ${record.message}`;
  if (record.level === "error") console.error(line);
  else if (record.level === "warn") console.warn(line);
  else console.log(line);
};

export function createLogger(options: { level?: LogLevel; scope?: string; sink?: LogSink } = {}): Logger {
  const level = options.level ?? "info";
  const scope = options.scope ?? "chatbridge";
  const sink = options.sink ?? consoleSink;
  const threshold = LEVEL_ORDER[level];

  const write = (recordLevel: LogRecord["level"], message: string, fields?: Record<string, unknown>) => {
    if (LEVEL_ORDER[recordLevel] < threshold) return;
    sink({ level: recordLevel, scope, message, fields, ts: Date.now() });
  };

  return {
    level,
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    child: (childScope) => createLogger({ level, scope: `${scope}:${childScope}`, sink }),
  };
}

/** Logger used when nothing is injected (tests, library use without configuration). */
export const silentLogger: Logger = createLogger({ level: "silent" });
