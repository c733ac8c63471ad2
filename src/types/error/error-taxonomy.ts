/**
 * All fault kinds recognized by the connection core.
 */
export const USP_FAULT_KINDS = [
  "configuration",
  "connection",
  "transport",
  "protocol",
  "shutdown",
] as const;

/**
 * Enumerated fault kind derived from {@link USP_FAULT_KINDS}.
 */
export type UspFaultKind = (typeof USP_FAULT_KINDS)[number];

/**
 * Severity levels attached to logged failures.
 */
export const USP_SEVERITIES = ["info", "warning", "error", "critical"] as const;

export type UspSeverity = (typeof USP_SEVERITIES)[number];

/**
 * Numeric error codes surfaced through `onError`. Values are stable across releases.
 */
export enum ErrorCode {
  NoError = 0,
  InvalidConfiguration = 1,
  AuthenticationError = 2,
  ConnectionFailure = 3,
  HandshakeTimeout = 4,
  UpgradeRejected = 5,
  TransportFailure = 6,
  RemoteClosed = 7,
  ProtocolViolation = 8,
  ConnectionClosed = 9,
  ServiceShutdown = 10,
  TaskTimeout = 11,
  RuntimeError = 12,
}

/**
 * Descriptor providing human-readable taxonomy labels.
 */
export interface TaxonomyDescriptor {
  readonly id: string;
  readonly label: string;
  readonly description: string;
}

/**
 * Mapping of fault kinds to descriptor metadata.
 */
export const FAULT_KIND_DESCRIPTORS: Record<UspFaultKind, TaxonomyDescriptor> = {
  configuration: {
    id: "configuration",
    label: "Configuration",
    description: "Invalid or missing builder input, detected before any network activity.",
  },
  connection: {
    id: "connection",
    label: "Connection",
    description: "Handshake failure, including non-success upgrade responses and timeouts.",
  },
  transport: {
    id: "transport",
    label: "Transport",
    description: "Socket or TLS failure after the session was established.",
  },
  protocol: {
    id: "protocol",
    label: "Protocol",
    description: "Malformed or unexpected message received from the service.",
  },
  shutdown: {
    id: "shutdown",
    label: "Shutdown",
    description: "Operation attempted during or after termination.",
  },
};

export const DEFAULT_SEVERITY_FOR_KIND: Record<UspFaultKind, UspSeverity> = {
  configuration: "error",
  connection: "error",
  transport: "critical",
  protocol: "critical",
  shutdown: "warning",
};

/**
 * Whether failures of a kind are reported with the transport flag set in `onError`.
 */
export const TRANSPORT_FLAG_FOR_KIND: Record<UspFaultKind, boolean> = {
  configuration: false,
  connection: true,
  transport: true,
  protocol: false,
  shutdown: false,
};

/**
 * Kinds that permanently disable a connection when they occur after the handshake.
 */
export const FATAL_KINDS: ReadonlySet<UspFaultKind> = new Set<UspFaultKind>([
  "connection",
  "transport",
  "protocol",
]);

export function isFaultKind(value: string): value is UspFaultKind {
  return USP_FAULT_KINDS.some((kind) => kind === value);
}

export function isSeverity(value: string): value is UspSeverity {
  return USP_SEVERITIES.some((severity) => severity === value);
}

export const SEVERITY_ORDER: Record<UspSeverity, number> = {
  info: 0,
  warning: 1,
  error: 2,
  critical: 3,
};

export function compareSeverity(left: UspSeverity, right: UspSeverity): number {
  return SEVERITY_ORDER[left] - SEVERITY_ORDER[right];
}
