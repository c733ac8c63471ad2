/**
 * @packageDocumentation
 * Streaming speech-protocol connection core: session builder, connection state
 * machine, thread service and callback contract.
 */

export { Logger, resolveLogLevel } from "./core/logger";
export type { LogEvent, LogLevel, LogSink, LogSinkFactory } from "./core/logger";
export { OrphanDetector, hasZeroOrphans } from "./core/disposal/orphan-detector";
export type { ConnectionResourceTracker, ResourceTracker } from "./core/disposal/resource-tracker";
export { createGuidWithoutDashes, isGuidWithoutDashes } from "./core/guid";

export { createClientFromEnvironment } from "./config/client-factory";
export type { EnvironmentClientOptions } from "./config/client-factory";
export { UspEnvironmentSection } from "./config/sections/usp-environment-section";
export type { EnvironmentRecord, UspEnvironmentConfig } from "./config/sections/usp-environment-section";
export { SessionValidationCodes, validateSessionDraft } from "./config/validators/session-validation-rules";
export type { SessionDraft, SessionValidationIssue } from "./config/validators/session-validation-rules";

export { createUspError, wrapError } from "./helpers/error/envelope";
export { redactRecord } from "./helpers/error/redaction";

export { ThreadService } from "./threading/thread-service";
export type { ThreadServiceOptions } from "./threading/thread-service";
export { WebSocketTransport, createWebSocketTransport, upgradeFailureMessage } from "./transport/websocket-transport";

export { UspClient } from "./usp/usp-client";
export type { ConnectResult, UspClientOptions } from "./usp/usp-client";
export { UspConnection } from "./usp/usp-connection";
export type { UspConnectionOptions, UspConnectionStats } from "./usp/usp-connection";
export { resolveEndpointUrl } from "./usp/endpoint-resolver";
export type { ServiceEvent } from "./usp/service-events";

export * from "./types/disposal";
export * from "./types/error/error-taxonomy";
export * from "./types/error/usp-error";
export * from "./types/thread-service";
export * from "./types/transport";
export * from "./types/usp";
