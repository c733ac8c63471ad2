import type { TokenCredential } from "@azure/identity";
import type { ConnectionResourceTracker } from "../core/disposal/resource-tracker";
import { createGuidWithoutDashes } from "../core/guid";
import { Logger } from "../core/logger";
import {
  SessionDraft,
  validateSessionDraft,
} from "../config/validators/session-validation-rules";
import { configurationError, shutdownError } from "../helpers/error/envelope";
import { ThreadService } from "../threading/thread-service";
import type { Result, UspError } from "../types/error/usp-error";
import type { TransportFactory } from "../types/transport";
import {
  AuthenticationType,
  EndpointType,
  OutputFormat,
  RecognitionMode,
  SessionAuthentication,
  SessionConfig,
  UspCallbacks,
} from "../types/usp";
import { createWebSocketTransport } from "../transport/websocket-transport";
import { MessageSchemaRegistry } from "./message-codec";
import { createServiceSchemaRegistry } from "./service-events";
import { UspConnection } from "./usp-connection";

export const DEFAULT_LANGUAGE = "en-US";
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
export const DEFAULT_CLOSE_TIMEOUT_MS = 5_000;
export const DEFAULT_MAX_PENDING_FRAMES = 64;
export const DEFAULT_TOKEN_SCOPE = "https://cognitiveservices.azure.com/.default";

export type ConnectResult =
  | { readonly success: true; readonly connection: UspConnection }
  | { readonly success: false; readonly error: UspError; readonly connection?: UspConnection };

export interface UspClientOptions {
  transportFactory?: TransportFactory;
  tracker?: ConnectionResourceTracker;
  logger?: Logger;
}

/**
 * Fluent session builder. Setters copy their input and return the builder;
 * {@link connect} is the only operation that performs I/O.
 *
 * @example
 * ```ts
 * const result = await new UspClient(callbacks, threadService)
 *   .setRecognitionMode(RecognitionMode.Interactive)
 *   .setRegion("westus")
 *   .setAuthentication(AuthenticationType.SubscriptionKey, key)
 *   .connect();
 * ```
 */
export class UspClient {
  private readonly draft: SessionDraft;
  private readonly transportFactory: TransportFactory;
  private readonly registry: MessageSchemaRegistry;
  private readonly logger: Logger;

  constructor(
    private readonly callbacks: UspCallbacks,
    private readonly threadService: ThreadService,
    private readonly options: UspClientOptions = {},
  ) {
    this.transportFactory = options.transportFactory ?? createWebSocketTransport;
    this.registry = createServiceSchemaRegistry();
    this.logger = options.logger ?? new Logger("UspClient");
    this.draft = {
      mode: RecognitionMode.Interactive,
      endpointType: EndpointType.Speech,
      language: DEFAULT_LANGUAGE,
      outputFormat: "simple",
      queryParameters: {},
      headers: {},
      handshakeTimeoutMs: DEFAULT_HANDSHAKE_TIMEOUT_MS,
      closeTimeoutMs: DEFAULT_CLOSE_TIMEOUT_MS,
      maxPendingFrames: DEFAULT_MAX_PENDING_FRAMES,
      allowInsecureEndpoint: false,
    };
  }

  setRecognitionMode(mode: RecognitionMode): this {
    this.draft.mode = mode;
    return this;
  }

  setEndpointType(endpointType: EndpointType): this {
    this.draft.endpointType = endpointType;
    return this;
  }

  setRegion(region: string): this {
    this.draft.region = region;
    return this;
  }

  /** Explicit endpoint; takes precedence over the region-derived URL. */
  setEndpointUrl(url: string): this {
    this.draft.endpointUrl = url;
    return this;
  }

  setLanguage(language: string): this {
    this.draft.language = language;
    return this;
  }

  setOutputFormat(format: OutputFormat): this {
    this.draft.outputFormat = format;
    return this;
  }

  setAuthentication(
    type: AuthenticationType.SubscriptionKey | AuthenticationType.AuthorizationToken,
    value: string,
  ): this;
  setAuthentication(type: AuthenticationType.AzureAD, credential: TokenCredential, scope?: string): this;
  /** For callers that pick the type at run time; a mismatched credential is reported by {@link buildConfig}. */
  setAuthentication(type: AuthenticationType, value: string | TokenCredential, scope?: string): this;
  setAuthentication(
    type: AuthenticationType,
    value: string | TokenCredential,
    scope: string = DEFAULT_TOKEN_SCOPE,
  ): this {
    const input = toAuthentication(type, value, scope);
    if ("mismatch" in input) {
      this.draft.authentication = undefined;
      this.draft.authenticationMismatch = input.mismatch;
    } else {
      this.draft.authentication = input.authentication;
      this.draft.authenticationMismatch = undefined;
    }
    return this;
  }

  setQueryParameter(name: string, value: string): this {
    this.draft.queryParameters = { ...this.draft.queryParameters, [name]: value };
    return this;
  }

  setHeader(name: string, value: string): this {
    this.draft.headers = { ...this.draft.headers, [name]: value };
    return this;
  }

  setHandshakeTimeout(timeoutMs: number): this {
    this.draft.handshakeTimeoutMs = timeoutMs;
    return this;
  }

  setCloseTimeout(timeoutMs: number): this {
    this.draft.closeTimeoutMs = timeoutMs;
    return this;
  }

  setMaxPendingFrames(limit: number): this {
    this.draft.maxPendingFrames = limit;
    return this;
  }

  /** Permits `ws:` endpoint URLs, e.g. for a loopback test server. */
  allowInsecureEndpoint(allow = true): this {
    this.draft.allowInsecureEndpoint = allow;
    return this;
  }

  /**
   * Validates the accumulated options and snapshots them into a frozen
   * configuration with a fresh connection id.
   */
  buildConfig(): Result<SessionConfig> {
    const issues = validateSessionDraft(this.draft);
    if (issues.length > 0 || !this.draft.authentication) {
      const first = issues[0];
      return {
        success: false,
        error: configurationError(first ? first.message : "Authentication is required", {
          issues: issues.map((issue) => ({ path: issue.path, code: issue.code, remediation: issue.remediation })),
        }),
      };
    }

    const config: SessionConfig = {
      mode: this.draft.mode,
      endpointType: this.draft.endpointType,
      region: this.draft.region,
      endpointUrl: this.draft.endpointUrl,
      language: this.draft.language,
      outputFormat: this.draft.outputFormat,
      authentication: this.draft.authentication,
      connectionId: createGuidWithoutDashes(),
      queryParameters: Object.freeze({ ...this.draft.queryParameters }),
      headers: Object.freeze({ ...this.draft.headers }),
      handshakeTimeoutMs: this.draft.handshakeTimeoutMs,
      closeTimeoutMs: this.draft.closeTimeoutMs,
      maxPendingFrames: this.draft.maxPendingFrames,
    };
    return { success: true, value: Object.freeze(config) };
  }

  /**
   * Builds a new connection and performs the handshake on the thread service.
   * Configuration errors return without creating a connection; connection
   * errors return the connection in `faulted`.
   */
  async connect(): Promise<ConnectResult> {
    const built = this.buildConfig();
    if (!built.success) {
      this.logger.warn("Rejected session configuration", { error: built.error.message });
      return { success: false, error: built.error };
    }
    if (!this.threadService.isInitialized()) {
      return {
        success: false,
        error: shutdownError("Thread service is not running; call initialize() before connecting"),
      };
    }

    const connection = new UspConnection({
      config: built.value,
      callbacks: this.callbacks,
      threadService: this.threadService,
      transportFactory: this.transportFactory,
      registry: this.registry,
      tracker: this.options.tracker,
      logger: this.logger,
    });
    const result = await connection.connect();
    if (!result.success) {
      return { success: false, error: result.error, connection };
    }
    return { success: true, connection };
  }
}

type AuthenticationInput =
  | { readonly authentication: SessionAuthentication }
  | { readonly mismatch: string };

function toAuthentication(
  type: AuthenticationType,
  value: string | TokenCredential,
  scope: string,
): AuthenticationInput {
  if (type === AuthenticationType.AzureAD) {
    return typeof value === "string"
      ? { mismatch: "Azure AD authentication takes a TokenCredential" }
      : { authentication: { type, credential: value, scope } };
  }
  return typeof value === "string"
    ? { authentication: { type, value } }
    : { mismatch: `${type} authentication takes a string credential` };
}
