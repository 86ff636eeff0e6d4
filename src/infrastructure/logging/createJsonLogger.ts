import type { ILogger, LogLevel } from "../../core/providers/ILogger";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface JsonLoggerOptions {
  /** Minimum level to emit. Default: "info" */
  level?: LogLevel;
  /** Value of the `service` field on every line. */
  service?: string;
  clock?: () => Date;
}

/**
 * One JSON object per line on stdout/stderr, which is what CloudWatch Logs
 * indexes for a Lambda function.
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): ILogger {
  const { level = "info", service = "transfer-core", clock = () => new Date() } = options;
  const minPriority = LEVEL_PRIORITY[level];

  function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
    if (LEVEL_PRIORITY[lvl] < minPriority) return;

    const line = JSON.stringify({
      timestamp: clock().toISOString(),
      level: lvl,
      service,
      message,
      ...data,
    });

    if (lvl === "error") console.error(line);
    else if (lvl === "warn") console.warn(line);
    else console.log(line);
  }

  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
  };
}
