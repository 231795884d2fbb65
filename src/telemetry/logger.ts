export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return fallback;
}

export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(
    private readonly scope: string,
    level: LogLevel = parseLogLevel(process.env.LOG_LEVEL),
  ) {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    if (this.enabled("debug")) {
      console.debug(this.format(message), ...this.extra(metadata));
    }
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (this.enabled("info")) {
      console.info(this.format(message), ...this.extra(metadata));
    }
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this.enabled("warn")) {
      console.warn(this.format(message), ...this.extra(metadata));
    }
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    if (this.enabled("error")) {
      console.error(this.format(message), ...this.extra(metadata));
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }

  private format(message: string): string {
    return `[${this.scope}] ${message}`;
  }

  private extra(metadata: Record<string, unknown> | undefined): unknown[] {
    return metadata === undefined ? [] : [metadata];
  }
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  return new ConsoleLogger(scope, level);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
