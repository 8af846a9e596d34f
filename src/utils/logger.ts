export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const COLORS: Record<LogLevel, string> = {
  debug: "\x1b[95m",
  info: "\x1b[34m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};

const consoleEnabled = process.env.NODE_ENV !== "test";
let minLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
  minLevel = level;
}

function pad(num: number, size = 2) {
  return num.toString().padStart(size, "0");
}

function localTs() {
  const d = new Date();
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`
  );
}

function fmt(level: LogLevel, args: unknown[]) {
  return [`[${localTs()}] ${COLORS[level]}[${level.toUpperCase()}]\x1b[0m`, ...args];
}

function enabled(level: LogLevel) {
  return consoleEnabled && LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (enabled("debug")) console.log(...fmt("debug", args));
  },
  info: (...args: unknown[]) => {
    if (enabled("info")) console.log(...fmt("info", args));
  },
  warn: (...args: unknown[]) => {
    if (enabled("warn")) console.warn(...fmt("warn", args));
  },
  error: (...args: unknown[]) => {
    if (enabled("error")) console.error(...fmt("error", args));
  },
};
