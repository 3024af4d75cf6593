// Leveled logger. Everything goes to stderr so stdout stays free for
// results and the MCP stdio transport.

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABEL: Record<Exclude<LogLevel, "silent">, string> = {
  debug: "debug",
  info: "info",
  warn: "warning",
  error: "error",
};

const PREFIX = "[dmn-engine]";

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + "\n");
};

let currentLevel: LogLevel = "warn";
let sink: LogSink = stderrSink;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Replace the output sink; pass nothing to restore stderr. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? stderrSink;
}

function write(level: Exclude<LogLevel, "silent">, message: string): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel]) return;
  sink(`${PREFIX} ${LEVEL_LABEL[level]}: ${message}`);
}

export const log = {
  debug: (message: string): void => write("debug", message),
  info: (message: string): void => write("info", message),
  warn: (message: string): void => write("warn", message),
  error: (message: string): void => write("error", message),
};
