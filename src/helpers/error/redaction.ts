import type { UspError } from "../../types/error/usp-error";

/**
 * Set of case-insensitive keys that must be replaced to avoid leaking credentials or tokens.
 */
const REDACTION_KEYS = new Set([
  "token",
  "authorization",
  "apikey",
  "api-key",
  "ocp-apim-subscription-key",
  "subscriptionkey",
  "secret",
  "credential",
  "password",
]);

export const REDACTION_PLACEHOLDER = "***REDACTED***";

type JsonMap = Record<string, unknown>;

function shouldRedactKey(key: string): boolean {
  return key.length > 0 && REDACTION_KEYS.has(key.toLowerCase());
}

function redactPrimitive(value: unknown): unknown {
  if (typeof value === "string" && value.length > 256) {
    return `${value.slice(0, 128)}…`;
  }
  return value;
}

function isJsonMap(value: unknown): value is JsonMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function redactUnknown(value: unknown): unknown {
  if (value === undefined || value === null) {
    return value;
  }
  if (typeof value === "function") {
    return undefined;
  }
  if (value instanceof Uint8Array) {
    return `<${value.byteLength} bytes>`;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactUnknown(item));
  }
  if (isJsonMap(value)) {
    const result: JsonMap = {};
    for (const [key, entry] of Object.entries(value)) {
      if (shouldRedactKey(key)) {
        result[key] = REDACTION_PLACEHOLDER;
        continue;
      }
      const redacted = redactUnknown(entry);
      if (redacted !== undefined) {
        result[key] = redacted;
      }
    }
    return result;
  }
  return redactPrimitive(value);
}

/**
 * Redacts credential-bearing keys from a metadata or header record.
 */
export function redactRecord(record: Record<string, unknown>): JsonMap {
  const redacted = redactUnknown(record);
  return isJsonMap(redacted) ? redacted : {};
}

/**
 * Converts a {@link UspError} into a loggable object with ISO timestamps and redacted metadata.
 */
export function sanitizeForLog(error: UspError): Record<string, unknown> {
  return {
    name: error.name,
    kind: error.kind,
    code: error.code,
    message: error.message,
    isTransportError: error.isTransportError,
    severity: error.severity,
    connectionId: error.connectionId,
    timestamp: error.timestamp.toISOString(),
    metadata: error.metadata ? redactRecord(error.metadata) : undefined,
    cause: error.cause ? error.cause.message : undefined,
  };
}

/**
 * Normalizes arbitrary values into serializable structures for log metadata.
 */
export function sanitizeUnknown(input: unknown): unknown {
  if (input instanceof Error) {
    return {
      name: input.name,
      message: input.message,
    };
  }
  return redactUnknown(input);
}
