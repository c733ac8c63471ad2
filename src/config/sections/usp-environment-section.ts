import { LogLevel, resolveLogLevel } from "../../core/logger";
import { RecognitionMode } from "../../types/usp";

export type EnvironmentRecord = Readonly<Record<string, string | undefined>>;

/**
 * Normalized session settings taken from the process environment.
 */
export interface UspEnvironmentConfig {
  region: string;
  endpointUrl?: string;
  subscriptionKey?: string;
  language: string;
  mode: RecognitionMode;
  logLevel: LogLevel;
}

const DEFAULT_REGION = "westus";
const DEFAULT_LANGUAGE = "en-US";
const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function trimmed(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

function sanitizeMode(raw: string | undefined): RecognitionMode {
  const value = trimmed(raw)?.toLowerCase();
  return Object.values(RecognitionMode).find((mode) => mode === value) ?? RecognitionMode.Interactive;
}

/**
 * Reads `USP_*` variables: `USP_REGION`, `USP_ENDPOINT`, `USP_SUBSCRIPTION_KEY`,
 * `USP_LANGUAGE`, `USP_MODE` and `USP_LOG_LEVEL`.
 */
export class UspEnvironmentSection {
  constructor(private readonly env: EnvironmentRecord = process.env) {}

  read(): UspEnvironmentConfig {
    return {
      region: trimmed(this.env.USP_REGION)?.toLowerCase() ?? DEFAULT_REGION,
      endpointUrl: trimmed(this.env.USP_ENDPOINT),
      subscriptionKey: trimmed(this.env.USP_SUBSCRIPTION_KEY),
      language: trimmed(this.env.USP_LANGUAGE) ?? DEFAULT_LANGUAGE,
      mode: sanitizeMode(this.env.USP_MODE),
      logLevel: resolveLogLevel(this.env.USP_LOG_LEVEL, DEFAULT_LOG_LEVEL),
    };
  }
}
