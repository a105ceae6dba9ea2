import type { LoggerPort } from "../../ports/sys/LoggerPort";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ConsoleLoggerOptions {
  /** Printed as `[scope]` before each message. */
  scope?: string;
  /** Debug lines are dropped unless enabled. */
  debug?: boolean;
}

export function formatLogLine(
  message: string,
  meta?: Record<string, unknown>,
  scope?: string
): string {
  const prefixed = scope ? `[${scope}] ${message}` : message;
  return meta && Object.keys(meta).length ? `${prefixed} ${JSON.stringify(meta)}` : prefixed;
}

export class ConsoleLogger implements LoggerPort {
  private readonly scope?: string;
  private readonly debugEnabled: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.scope = options.scope;
    this.debugEnabled = options.debug ?? process.env.DEBUG_MODE === "true";
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.debugEnabled) return;
    console.debug(formatLogLine(message, meta, this.scope));
  }
  info(message: string, meta?: Record<string, unknown>): void {
    console.info(formatLogLine(message, meta, this.scope));
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    console.warn(formatLogLine(message, meta, this.scope));
  }
  error(message: string, meta?: Record<string, unknown>): void {
    console.error(formatLogLine(message, meta, this.scope));
  }
}
