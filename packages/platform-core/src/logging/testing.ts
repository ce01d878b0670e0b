/**
 * In-memory logger for asserting on log output in tests.
 */
import type { Logger, LogLevel } from "./types.js";
import type { UnknownRecord } from "../types.js";

export interface LogCall {
  level: LogLevel;
  message: string;
  data: UnknownRecord | undefined;
}

export interface RecordingLogger extends Logger {
  readonly calls: ReadonlyArray<LogCall>;
  clear(): void;
  callsAt(level: LogLevel): LogCall[];
  lastCallAt(level: LogLevel): LogCall | undefined;
}

export function createRecordingLogger(): RecordingLogger {
  const calls: LogCall[] = [];

  const record =
    (level: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      calls.push({ level, message, data });
    };

  return {
    get calls(): ReadonlyArray<LogCall> {
      return calls;
    },
    clear() {
      calls.length = 0;
    },
    callsAt(level) {
      return calls.filter((call) => call.level === level);
    },
    lastCallAt(level) {
      return calls.filter((call) => call.level === level).at(-1);
    },
    debug: record("DEBUG"),
    trace: record("TRACE"),
    info: record("INFO"),
    report: record("REPORT"),
    warn: record("WARN"),
    error: record("ERROR"),
  };
}
