import {
  DEFAULT_SEVERITY_FOR_KIND,
  ErrorCode,
  TRANSPORT_FLAG_FOR_KIND,
  UspFaultKind,
  UspSeverity,
} from "../../types/error/error-taxonomy";
import { UspError } from "../../types/error/usp-error";

/**
 * Describes the information required to construct a normalized {@link UspError}.
 * @remarks
 * Severity and the transport flag default from the fault kind; pass them only
 * when a specific failure deviates from its kind.
 */
export interface CreateUspErrorOptions {
  kind: UspFaultKind;
  code: ErrorCode;
  message: string;
  remediation?: string;
  severity?: UspSeverity;
  isTransportError?: boolean;
  metadata?: Record<string, unknown>;
  cause?: Error;
  connectionId?: string;
  timestamp?: Date;
}

const DEFAULT_REMEDIATION: Record<UspFaultKind, string> = {
  configuration: "Fix the session configuration and build a new connection.",
  connection: "Check the endpoint, region and credential, then connect again.",
  transport: "The session is lost; close it and connect again.",
  protocol: "The service sent an unexpected message; close the session and connect again.",
  shutdown: "The thread service or connection is shutting down; build a new one.",
};

/**
 * Creates a {@link UspError} with normalized severity and transport flag.
 */
export function createUspError(options: CreateUspErrorOptions): UspError {
  return new UspError({
    kind: options.kind,
    code: options.code,
    message: options.message,
    isTransportError: options.isTransportError ?? TRANSPORT_FLAG_FOR_KIND[options.kind],
    severity: options.severity ?? DEFAULT_SEVERITY_FOR_KIND[options.kind],
    remediation: options.remediation ?? DEFAULT_REMEDIATION[options.kind],
    cause: options.cause,
    metadata: options.metadata,
    connectionId: options.connectionId,
    timestamp: options.timestamp,
  });
}

/**
 * Extends {@link CreateUspErrorOptions} with the raw thrown value; `message`
 * defaults to the thrown value's message.
 */
export interface WrapUnknownErrorOptions extends Omit<CreateUspErrorOptions, "message"> {
  error: unknown;
  message?: string;
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === "string") {
    return new Error(value);
  }
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error(String(value));
  }
}

/**
 * Normalizes an unknown error into a {@link UspError}, keeping the original as the cause.
 * A value that already is a {@link UspError} is returned unchanged.
 */
export function wrapError(options: WrapUnknownErrorOptions): UspError {
  if (options.error instanceof UspError) {
    return options.error;
  }
  const { error, ...rest } = options;
  const cause = toError(error);
  return createUspError({
    ...rest,
    message: options.message ?? cause.message,
    cause,
  });
}

export function configurationError(
  message: string,
  metadata?: Record<string, unknown>,
): UspError {
  return createUspError({
    kind: "configuration",
    code: ErrorCode.InvalidConfiguration,
    message,
    metadata,
  });
}

export function shutdownError(message: string, connectionId?: string): UspError {
  return createUspError({
    kind: "shutdown",
    code: ErrorCode.ServiceShutdown,
    message,
    connectionId,
  });
}
