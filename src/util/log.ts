import { appendJsonl } from "./jsonl.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, unknown>;

export type Logger = {
  level: LogLevel;
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
};

export type LogRecord = { ts: string; level: Exclude<LogLevel, "silent">; event: string } & LogFields;

export type LogSink = (record: LogRecord) => void;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export const consoleSink: LogSink = (record) => {
  const line = JSON.stringify(record, replaceErrors);
  if (record.level === "warn" || record.level === "error") console.error(line);
  else console.log(line);
};

export function jsonlFileSink(filePath: string): LogSink {
  return (record) => appendJsonl(filePath, JSON.parse(JSON.stringify(record, replaceErrors)));
}

export function createLogger(opts: { level?: LogLevel; sinks?: LogSink[]; bindings?: LogFields } = {}): Logger {
  const level = opts.level ?? "info";
  const sinks = opts.sinks ?? [consoleSink];
  const bindings = opts.bindings ?? {};

  const emit = (lvl: Exclude<LogLevel, "silent">, event: string, fields?: LogFields) => {
    if (LEVEL_ORDER[lvl] < LEVEL_ORDER[level]) return;
    const record: LogRecord = { ts: new Date().toISOString(), level: lvl, event, ...bindings, ...fields };
    for (const sink of sinks) {
      try {
        sink(record);
      } catch (err) {
        // A broken sink must not take the request down with it.
        console.error(`log sink failed: ${String(err)}`);
      }
    }
  };

  return {
    level,
    debug: (event, fields) => emit("debug", event, fields),
    info: (event, fields) => emit("info", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    error: (event, fields) => emit("error", event, fields),
    child: (more) => createLogger({ level, sinks, bindings: { ...bindings, ...more } })
  };
}

export const silentLogger: Logger = createLogger({ level: "silent", sinks: [] });

/** Collapses newlines and caps length so user text can't forge extra log lines. */
export function sanitizeForLog(text: string, max: number): string {
  const flat = text.replace(/[\r\n]+/g, " ");
  return flat.length <= max ? flat : `${flat.slice(0, max)}…`;
}

function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (value instanceof Float32Array) return `<vector dims=${value.length}>`;
  return value;
}
