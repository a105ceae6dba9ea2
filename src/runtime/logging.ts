import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): void;
}

type ConsoleLevel = "log" | "info" | "warn" | "error" | "debug";

function stringifyArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/** Mirrors console output into `logFile` (append mode) until shutdown. */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  const original: Record<ConsoleLevel, (...args: unknown[]) => void> = {
    log: console.log.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
    debug: console.debug.bind(console),
  };

  stream.on("error", (err) => {
    original.error(`Log file ${resolvedLog} failed:`, err.message);
  });
  const startedAt = new Date().toISOString();
  stream.write(`[${startedAt}] --- sengled-lights session started ---\n`);

  const mirror =
    (level: ConsoleLevel) =>
    (...args: unknown[]): void => {
      original[level](...args);
      const timestamp = new Date().toISOString();
      const message = args.map(stringifyArg).join(" ");
      stream.write(`[${timestamp}] ${level.toUpperCase()} ${message}\n`);
    };

  console.log = mirror("log");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");
  console.debug = mirror("debug");

  let ended = false;
  const shutdown = () => {
    if (ended) return;
    ended = true;
    console.log = original.log;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    console.debug = original.debug;
    const endedAt = new Date().toISOString();
    stream.end(`[${endedAt}] --- sengled-lights session ended ---\n`);
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
