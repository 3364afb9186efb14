import { type EnvConfig, getEnv } from "@/lib/env";

type LogLevel = EnvConfig["LOG_LEVEL"];

type LogContext = Record<string, unknown>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function threshold(): number {
  return LEVEL_WEIGHT[getEnv().LOG_LEVEL];
}

function serialise(context: LogContext): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

function write(level: LogLevel, message: string, context: LogContext = {}) {
  if (LEVEL_WEIGHT[level] < threshold()) {
    return;
  }

  const line = JSON.stringify({
    level,
    message,
    timestamp: new Date().toISOString(),
    ...serialise(context),
  });

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug: (message: string, context?: LogContext) => write("debug", message, context),
  info: (message: string, context?: LogContext) => write("info", message, context),
  warn: (message: string, context?: LogContext) => write("warn", message, context),
  error: (message: string, context?: LogContext) => write("error", message, context),
};
