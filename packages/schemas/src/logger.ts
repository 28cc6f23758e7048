import type { Logger } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export class ConsoleLogger implements Logger {
  private component: string;
  private prefix: string;
  private level: LogLevel;
  private threshold: number;

  constructor(component: string, level: LogLevel = "info") {
    // Strip control chars so a component name cannot inject log lines
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safe = component.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 128);
    this.component = safe;
    this.prefix = `[${safe}]`;
    this.level = level;
    this.threshold = LEVEL_ORDER[level];
  }

  child(component: string): ConsoleLogger {
    return new ConsoleLogger(`${this.component}:${component}`, this.level);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.info) return;
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.warn) return;
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.error) return;
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.debug) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

/** Logger that discards everything. Used where a caller supplies none. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
