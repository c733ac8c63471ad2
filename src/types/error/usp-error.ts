import {
  ErrorCode,
  FATAL_KINDS,
  UspFaultKind,
  UspSeverity,
} from "./error-taxonomy";

/**
 * The triple delivered to {@link UspCallbacks.onError}.
 */
export interface UspErrorEvent {
  readonly isTransportError: boolean;
  readonly code: ErrorCode;
  readonly message: string;
}

export interface UspErrorInit {
  kind: UspFaultKind;
  code: ErrorCode;
  message: string;
  isTransportError: boolean;
  severity: UspSeverity;
  remediation: string;
  cause?: Error;
  metadata?: Record<string, unknown>;
  connectionId?: string;
  timestamp?: Date;
}

/**
 * Structured failure raised or reported by the connection core.
 */
export class UspError extends Error {
  readonly kind: UspFaultKind;
  readonly code: ErrorCode;
  readonly isTransportError: boolean;
  readonly severity: UspSeverity;
  readonly remediation: string;
  readonly metadata?: Record<string, unknown>;
  readonly connectionId?: string;
  readonly timestamp: Date;
  override readonly cause?: Error;

  constructor(init: UspErrorInit) {
    super(init.message);
    this.name = "UspError";
    this.kind = init.kind;
    this.code = init.code;
    this.isTransportError = init.isTransportError;
    this.severity = init.severity;
    this.remediation = init.remediation;
    this.metadata = init.metadata;
    this.connectionId = init.connectionId;
    this.timestamp = init.timestamp ?? new Date();
    this.cause = init.cause;
  }

  get isFatal(): boolean {
    return FATAL_KINDS.has(this.kind);
  }

  toErrorEvent(): UspErrorEvent {
    return {
      isTransportError: this.isTransportError,
      code: this.code,
      message: this.message,
    };
  }
}

export function isUspError(value: unknown): value is UspError {
  return value instanceof UspError;
}

/**
 * Discriminated outcome for synchronous validation paths and `connect()`.
 */
export type Result<T, E = UspError> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };
