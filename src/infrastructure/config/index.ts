import type { LogLevel } from "../../core/providers/ILogger";

export interface TransferServiceConfig {
  tableName: string;
  logLevel: LogLevel;
  /** Time kept back from the Lambda deadline before the transfer stops between steps. */
  cancellationMarginMs: number;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TransferServiceConfig {
  const tableName = env.TABLE_NAME?.trim() || "LedgerTransfers";

  const rawLevel = env.LOG_LEVEL?.trim().toLowerCase() || "info";
  const logLevel = LOG_LEVELS.find((candidate) => candidate === rawLevel);
  if (logLevel === undefined) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${rawLevel}"`);
  }

  const rawMargin = env.CANCELLATION_MARGIN_MS?.trim() || "1000";
  const cancellationMarginMs = Number(rawMargin);
  if (!Number.isInteger(cancellationMarginMs) || cancellationMarginMs < 0) {
    throw new Error(`CANCELLATION_MARGIN_MS must be a non-negative integer, got "${rawMargin}"`);
  }

  return { tableName, logLevel, cancellationMarginMs };
}
