import type { ConnectionResourceTracker } from "../core/disposal/resource-tracker";
import { createCloseableScope } from "../core/disposal/scoped-disposable";
import { createGuidWithoutDashes } from "../core/guid";
import { Logger } from "../core/logger";
import { configurationError, createUspError, toError, wrapError } from "../helpers/error/envelope";
import { sanitizeForLog } from "../helpers/error/redaction";
import { ThreadService } from "../threading/thread-service";
import { ErrorCode } from "../types/error/error-taxonomy";
import { isUspError, Result, UspError } from "../types/error/usp-error";
import type { TaskContext } from "../types/thread-service";
import {
  Transport,
  TransportEventMap,
  TransportFactory,
  TransportMessage,
  TransportOpenError,
} from "../types/transport";
import { ConnectionState, SessionConfig, UspCallbacks, WriteAudioResult } from "../types/usp";
import { resolveAuthenticationHeaders } from "./authentication";
import { HEADER_CONNECTION_ID, resolveEndpointUrl } from "./endpoint-resolver";
import {
  decodeBinaryMessage,
  decodeTextMessage,
  encodeBinaryMessage,
  encodeTextMessage,
  MessageSchemaRegistry,
} from "./message-codec";
import { createServiceSchemaRegistry, ServiceEvent, toServiceEvent } from "./service-events";
import { createSpeechConfigPayload, SPEECH_CONFIG_PATH } from "./speech-config";

export const AUDIO_PATH = "audio";

const CONNECTION_SCOPE_PRIORITY = 10;
const HANDSHAKE_GRACE_MS = 1000;
const NORMAL_CLOSURE = 1000;
const INTERNAL_ERROR_CLOSURE = 1011;
const MAX_CLOSE_REASON_LENGTH = 120;

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  [ConnectionState.Idle]: [ConnectionState.Connecting, ConnectionState.Closed],
  [ConnectionState.Connecting]: [ConnectionState.Connected, ConnectionState.Faulted],
  [ConnectionState.Connected]: [ConnectionState.Closing, ConnectionState.Faulted],
  [ConnectionState.Closing]: [ConnectionState.Closed],
  [ConnectionState.Faulted]: [ConnectionState.Closed],
  [ConnectionState.Closed]: [],
};

interface OutboundFrame {
  readonly data: string | Buffer;
  readonly audioBytes: number;
}

interface SpaceWaiter {
  readonly frame: OutboundFrame;
  resolve(admitted: boolean): void;
}

export interface UspConnectionOptions {
  config: SessionConfig;
  callbacks: UspCallbacks;
  threadService: ThreadService;
  transportFactory: TransportFactory;
  registry?: MessageSchemaRegistry;
  /** Defaults to the thread service's orphan detector. */
  tracker?: ConnectionResourceTracker;
  logger?: Logger;
}

export interface UspConnectionStats {
  readonly state: ConnectionState;
  readonly framesSent: number;
  readonly audioBytesSent: number;
  readonly pendingFrames: number;
  readonly waitingWriters: number;
}

/**
 * One streaming session: a transport, its outbound frame queue and the inbound
 * event dispatch.
 *
 * @remarks
 * Transmission runs on the connection's outbound queue of the owning
 * {@link ThreadService}; callbacks run on its dispatch queue in detection
 * order. The first fatal error moves the connection to `faulted`, drops queued
 * frames and stops all further traffic. A connection is never reused: build a
 * new one after `closed`.
 */
export class UspConnection {
  private currentState = ConnectionState.Idle;
  private transport: Transport | undefined;
  private fault: UspError | undefined;
  private requestId = createGuidWithoutDashes();
  private turnHasAudio = false;
  private streamEnded = false;
  private framesSent = 0;
  private audioBytesSent = 0;

  private readonly outbound: OutboundFrame[] = [];
  private spaceWaiters: SpaceWaiter[] = [];
  private drainWaiters: Array<() => void> = [];
  private pumping = false;

  private connecting: Promise<Result<void>> | undefined;
  private closing: Promise<void> | undefined;
  private releasing: Promise<void> | undefined;
  private detachTransport: (() => void) | undefined;
  private releaseTransportTracking: (() => void) | undefined;
  private releaseConnectionTracking: (() => void) | undefined;

  private readonly config: SessionConfig;
  private readonly callbacks: UspCallbacks;
  private readonly threadService: ThreadService;
  private readonly transportFactory: TransportFactory;
  private readonly registry: MessageSchemaRegistry;
  private readonly tracker: ConnectionResourceTracker;
  private readonly logger: Logger;
  private readonly outboundQueue: string;
  private readonly dispatchQueue: string;

  constructor(options: UspConnectionOptions) {
    this.config = options.config;
    this.callbacks = options.callbacks;
    this.threadService = options.threadService;
    this.transportFactory = options.transportFactory;
    this.registry = options.registry ?? createServiceSchemaRegistry();
    this.tracker = options.tracker ?? options.threadService.orphans;
    this.logger = options.logger ?? new Logger("UspConnection");
    this.outboundQueue = `usp:${this.config.connectionId}:outbound`;
    this.dispatchQueue = `usp:${this.config.connectionId}:dispatch`;
  }

  get id(): string {
    return this.config.connectionId;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** The fatal error that faulted this connection, if any. */
  get lastError(): UspError | undefined {
    return this.fault;
  }

  get currentRequestId(): string {
    return this.requestId;
  }

  stats(): UspConnectionStats {
    return {
      state: this.currentState,
      framesSent: this.framesSent,
      audioBytesSent: this.audioBytesSent,
      pendingFrames: this.outbound.length,
      waitingWriters: this.spaceWaiters.length,
    };
  }

  /**
   * Opens the transport and sends `speech.config`. Resolves with either a
   * `connected` connection or the single connection error that faulted it;
   * the error is also delivered to `onError`. Only the first call connects.
   */
  connect(): Promise<Result<void>> {
    if (this.connecting || this.currentState !== ConnectionState.Idle) {
      return Promise.resolve({
        success: false,
        error: configurationError("connect() may only be called once per connection", {
          connectionId: this.id,
          state: this.currentState,
        }),
      });
    }
    this.connecting = this.performConnect();
    return this.connecting;
  }

  /**
   * Encodes `bytes[0, length)` into one audio frame and queues it. Zero-length
   * writes are no-ops. When `maxPendingFrames` frames are queued the returned
   * promise waits for space. Writes outside `connected` are rejected and
   * reported through `onError`; this method never throws.
   */
  async writeAudio(bytes: Uint8Array, length: number = bytes.byteLength): Promise<WriteAudioResult> {
    if (!Number.isInteger(length) || length < 0 || length > bytes.byteLength) {
      return {
        accepted: false,
        error: configurationError(
          `Audio length ${length} is outside the ${bytes.byteLength}-byte buffer`,
          { connectionId: this.id },
        ),
      };
    }
    if (length === 0) {
      return { accepted: true };
    }
    if (this.currentState !== ConnectionState.Connected) {
      return this.rejectWrite();
    }

    const frame: OutboundFrame = {
      data: encodeBinaryMessage(AUDIO_PATH, this.requestId, bytes.subarray(0, length)),
      audioBytes: length,
    };
    this.turnHasAudio = true;

    if (this.outbound.length < this.config.maxPendingFrames && this.spaceWaiters.length === 0) {
      this.enqueueFrame(frame);
      return { accepted: true };
    }

    const admitted = await new Promise<boolean>((resolve) => {
      this.spaceWaiters.push({ frame, resolve });
    });
    return admitted ? { accepted: true } : this.rejectWrite();
  }

  /**
   * Flushes queued frames, ends the audio stream and closes the transport.
   * Repeated calls share one close; closing never faults.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.performClose();
    }
    return this.closing;
  }

  isClosed(): boolean {
    return this.currentState === ConnectionState.Closed;
  }

  private get scopeId(): string {
    return `usp-connection:${this.id}`;
  }

  private async performConnect(): Promise<Result<void>> {
    this.transition(ConnectionState.Connecting);
    this.threadService.register(createCloseableScope(this.scopeId, CONNECTION_SCOPE_PRIORITY, this));
    this.releaseConnectionTracking = this.tracker.trackConnection(this.id);

    const authentication = await resolveAuthenticationHeaders(this.config.authentication, this.id);
    if (!authentication.success) {
      return this.failConnect(authentication.error);
    }

    let url: string;
    let transport: Transport;
    try {
      url = resolveEndpointUrl(this.config);
      transport = this.transportFactory({
        url,
        headers: {
          ...this.config.headers,
          ...authentication.value,
          [HEADER_CONNECTION_ID]: this.id,
        },
        handshakeTimeoutMs: this.config.handshakeTimeoutMs,
      });
    } catch (error: unknown) {
      return this.failConnect(
        wrapError({ kind: "connection", code: ErrorCode.ConnectionFailure, error, connectionId: this.id }),
      );
    }
    this.transport = transport;
    this.releaseTransportTracking = this.tracker.trackTransport(transport.id);

    this.logger.debug("Connecting", { connectionId: this.id, url });
    try {
      await this.threadService.execute(() => transport.open(), {
        queue: this.outboundQueue,
        timeoutMs: this.config.handshakeTimeoutMs + HANDSHAKE_GRACE_MS,
      });
    } catch (error: unknown) {
      return this.failConnect(this.toHandshakeError(error));
    }

    this.attach(transport);
    this.transition(ConnectionState.Connected);
    this.enqueueFrame({
      data: encodeTextMessage(SPEECH_CONFIG_PATH, this.requestId, createSpeechConfigPayload()),
      audioBytes: 0,
    });
    this.logger.info("Connected", { connectionId: this.id, url });
    return { success: true, value: undefined };
  }

  private toHandshakeError(error: unknown): UspError {
    if (error instanceof TransportOpenError) {
      if (error.statusCode !== undefined) {
        return createUspError({
          kind: "connection",
          code: ErrorCode.UpgradeRejected,
          message: error.message,
          metadata: { statusCode: error.statusCode },
          cause: error,
          connectionId: this.id,
        });
      }
      return createUspError({
        kind: "connection",
        code: error.timedOut ? ErrorCode.HandshakeTimeout : ErrorCode.ConnectionFailure,
        message: error.message,
        cause: error,
        connectionId: this.id,
      });
    }
    if (isUspError(error) && error.code === ErrorCode.TaskTimeout) {
      return createUspError({
        kind: "connection",
        code: ErrorCode.HandshakeTimeout,
        message: `WebSocket handshake did not complete within ${this.config.handshakeTimeoutMs}ms`,
        cause: error,
        connectionId: this.id,
      });
    }
    return wrapError({ kind: "connection", code: ErrorCode.ConnectionFailure, error, connectionId: this.id });
  }

  private failConnect(error: UspError): Result<void> {
    this.fail(error);
    return { success: false, error };
  }

  private async performClose(): Promise<void> {
    if (this.connecting) {
      await this.connecting;
    }

    switch (this.currentState) {
      case ConnectionState.Idle:
        this.transition(ConnectionState.Closed);
        break;
      case ConnectionState.Connected:
        await this.closeGracefully();
        break;
      case ConnectionState.Faulted:
        await this.releasing;
        this.transition(ConnectionState.Closed);
        break;
      default:
        break;
    }

    this.threadService.unregister(this.scopeId);
    this.releaseConnectionTracking?.();
    this.releaseConnectionTracking = undefined;
  }

  private async closeGracefully(): Promise<void> {
    this.transition(ConnectionState.Closing);
    const deadline = Date.now() + this.config.closeTimeoutMs;

    // Writers still waiting for space are admitted while the queue drains.
    let drained = await this.waitForDrain(this.config.closeTimeoutMs);
    this.streamEnded = true;
    this.resolveSpaceWaiters(false);
    if (drained && this.turnHasAudio) {
      // An empty audio frame ends the stream for the current turn.
      this.enqueueFrame({
        data: encodeBinaryMessage(AUDIO_PATH, this.requestId, new Uint8Array(0)),
        audioBytes: 0,
      });
      drained = await this.waitForDrain(Math.max(0, deadline - Date.now()));
    }
    if (!drained) {
      this.logger.warn("Close timed out before queued frames were sent", {
        connectionId: this.id,
        pendingFrames: this.outbound.length,
      });
    }
    this.outbound.length = 0;
    this.resolveSpaceWaiters(false);
    await this.releaseTransport(NORMAL_CLOSURE, "");
    this.transition(ConnectionState.Closed);
    this.logger.info("Closed", {
      connectionId: this.id,
      framesSent: this.framesSent,
      audioBytesSent: this.audioBytesSent,
    });
  }

  /**
   * Moves the connection to `faulted` and reports `error` once. Errors after the
   * connection ended, or while it closes, are only logged.
   */
  private fail(error: UspError): void {
    const state = this.currentState;
    if (state === ConnectionState.Closed || state === ConnectionState.Faulted) {
      this.logger.debug("Ignoring error after connection ended", { state, ...sanitizeForLog(error) });
      return;
    }
    if (state === ConnectionState.Closing) {
      this.logger.warn("Error while closing", sanitizeForLog(error));
      return;
    }

    this.fault = error;
    this.logger.error("Connection faulted", sanitizeForLog(error));
    this.transition(ConnectionState.Faulted);
    this.outbound.length = 0;
    this.resolveSpaceWaiters(false);
    this.deliverError(error);
    this.releasing = this.releaseTransport(INTERNAL_ERROR_CLOSURE, error.message);
  }

  private rejectWrite(): WriteAudioResult {
    const fault = this.fault;
    const error = fault
      ? createUspError({
          kind: "shutdown",
          code: ErrorCode.ConnectionClosed,
          message: `Audio rejected: connection faulted (${fault.message})`,
          isTransportError: fault.isTransportError,
          connectionId: this.id,
        })
      : createUspError({
          kind: "shutdown",
          code: ErrorCode.ConnectionClosed,
          message: `Audio rejected: connection is ${this.currentState}`,
          connectionId: this.id,
        });
    this.deliverError(error);
    return { accepted: false, error };
  }

  private canTransmit(): boolean {
    return this.currentState === ConnectionState.Connected || this.currentState === ConnectionState.Closing;
  }

  private enqueueFrame(frame: OutboundFrame): void {
    this.outbound.push(frame);
    this.schedulePump();
  }

  private schedulePump(): void {
    if (this.pumping) {
      return;
    }
    this.pumping = true;
    const handle = this.threadService.executeAsync((context) => this.drainOutbound(context), {
      queue: this.outboundQueue,
    });
    void handle.completion.then((outcome) => {
      if (outcome.status === "completed") {
        return;
      }
      this.pumping = false;
      this.resolveDrainWaiters();
      this.fail(
        wrapError({
          kind: "shutdown",
          code: ErrorCode.ServiceShutdown,
          error: outcome.error,
          connectionId: this.id,
        }),
      );
    });
  }

  /**
   * Sends queued frames one at a time until the queue is empty or the
   * connection can no longer transmit.
   */
  private async drainOutbound(context: TaskContext): Promise<void> {
    try {
      while (this.outbound.length > 0 && this.canTransmit() && !context.signal.aborted) {
        const transport = this.transport;
        if (!transport) {
          return;
        }
        const frame = this.outbound[0];
        try {
          await transport.send(frame.data);
        } catch (error: unknown) {
          this.fail(
            wrapError({
              kind: "transport",
              code: ErrorCode.TransportFailure,
              error,
              connectionId: this.id,
            }),
          );
          return;
        }
        this.framesSent += 1;
        this.audioBytesSent += frame.audioBytes;
        if (this.outbound[0] === frame) {
          this.outbound.shift();
        }
        this.admitWaiters();
      }
    } finally {
      this.pumping = false;
      this.resolveDrainWaiters();
    }
  }

  private admitWaiters(): void {
    while (
      this.canTransmit() &&
      !this.streamEnded &&
      this.spaceWaiters.length > 0 &&
      this.outbound.length < this.config.maxPendingFrames
    ) {
      const waiter = this.spaceWaiters.shift();
      if (!waiter) {
        return;
      }
      this.outbound.push(waiter.frame);
      waiter.resolve(true);
    }
  }

  private resolveSpaceWaiters(admitted: boolean): void {
    const waiters = this.spaceWaiters;
    this.spaceWaiters = [];
    for (const waiter of waiters) {
      waiter.resolve(admitted);
    }
  }

  private waitForDrain(timeoutMs: number): Promise<boolean> {
    if (!this.pumping) {
      return Promise.resolve(this.outbound.length === 0);
    }
    return new Promise<boolean>((resolve) => {
      const timerId = createGuidWithoutDashes();
      const releaseTimer = this.tracker.trackTimer(timerId);
      const onDrained = () => {
        clearTimeout(timer);
        releaseTimer();
        resolve(this.outbound.length === 0);
      };
      const timer = setTimeout(() => {
        this.drainWaiters = this.drainWaiters.filter((waiter) => waiter !== onDrained);
        releaseTimer();
        resolve(false);
      }, timeoutMs);
      this.drainWaiters.push(onDrained);
    });
  }

  private resolveDrainWaiters(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  private attach(transport: Transport): void {
    const onMessage = (message: TransportMessage) => this.handleInbound(message);
    const onError = (error: Error) =>
      this.fail(
        createUspError({
          kind: "transport",
          code: ErrorCode.TransportFailure,
          message: error.message,
          cause: error,
          connectionId: this.id,
        }),
      );
    const onClose = ({ code, reason }: TransportEventMap["close"]) => {
      if (this.currentState !== ConnectionState.Connected) {
        return;
      }
      this.fail(
        createUspError({
          kind: "transport",
          code: ErrorCode.RemoteClosed,
          message: `Service closed the connection with code ${code}${reason ? `: ${reason}` : ""}`,
          metadata: { closeCode: code, reason },
          connectionId: this.id,
        }),
      );
    };

    transport.addEventListener("message", onMessage);
    transport.addEventListener("error", onError);
    transport.addEventListener("close", onClose);
    this.detachTransport = () => {
      transport.removeEventListener("message", onMessage);
      transport.removeEventListener("error", onError);
      transport.removeEventListener("close", onClose);
    };
  }

  /** Closes the transport and stops listening to it. Never rejects. */
  private async releaseTransport(code: number, reason: string): Promise<void> {
    this.detachTransport?.();
    this.detachTransport = undefined;
    const transport = this.transport;
    if (transport) {
      try {
        await transport.close(code, reason.slice(0, MAX_CLOSE_REASON_LENGTH));
      } catch (error: unknown) {
        this.logger.warn("Transport close failed", {
          connectionId: this.id,
          error: toError(error).message,
        });
      }
    }
    this.releaseTransportTracking?.();
    this.releaseTransportTracking = undefined;
  }

  private handleInbound(message: TransportMessage): void {
    if (!this.canTransmit()) {
      return;
    }
    const decoded =
      message.kind === "text"
        ? decodeTextMessage(message.data, this.registry)
        : decodeBinaryMessage(message.data, this.registry);
    if (!decoded.success) {
      this.fail(decoded.error);
      return;
    }
    const event = toServiceEvent(decoded.value, this.registry);
    if (!event.success) {
      this.fail(event.error);
      return;
    }
    this.dispatchServiceEvent(event.value);
  }

  private dispatchServiceEvent(event: ServiceEvent): void {
    switch (event.type) {
      case "turnStart":
        this.deliver("onTurnStart", (callbacks) => callbacks.onTurnStart?.(event.message));
        break;
      case "speechStartDetected":
        this.deliver("onSpeechStartDetected", (callbacks) => callbacks.onSpeechStartDetected?.(event.message));
        break;
      case "speechEndDetected":
        this.deliver("onSpeechEndDetected", (callbacks) => callbacks.onSpeechEndDetected?.(event.message));
        break;
      case "speechHypothesis":
        this.deliver("onSpeechHypothesis", (callbacks) => callbacks.onSpeechHypothesis?.(event.message));
        break;
      case "speechFragment":
        this.deliver("onSpeechFragment", (callbacks) => callbacks.onSpeechFragment?.(event.message));
        break;
      case "speechPhrase":
        this.deliver("onSpeechPhrase", (callbacks) => callbacks.onSpeechPhrase?.(event.message));
        break;
      case "translationHypothesis":
        this.deliver("onTranslationHypothesis", (callbacks) => callbacks.onTranslationHypothesis?.(event.message));
        break;
      case "translationPhrase":
        this.deliver("onTranslationPhrase", (callbacks) => callbacks.onTranslationPhrase?.(event.message));
        break;
      case "turnEnd":
        // The next audio frame starts a new turn.
        this.requestId = createGuidWithoutDashes();
        this.turnHasAudio = false;
        this.deliver("onTurnEnd", (callbacks) => callbacks.onTurnEnd?.(event.message));
        break;
      case "unknown":
        this.logger.debug("Ignoring message with unknown path", { connectionId: this.id, path: event.path });
        break;
    }
  }

  private transition(next: ConnectionState): void {
    const previous = this.currentState;
    if (!TRANSITIONS[previous].includes(next)) {
      this.logger.warn("Ignoring invalid state transition", { connectionId: this.id, previous, next });
      return;
    }
    this.currentState = next;
    this.logger.debug("Connection state changed", { connectionId: this.id, previous, next });
    this.deliver("onStateChange", (callbacks) => callbacks.onStateChange?.(previous, next));
  }

  private deliverError(error: UspError): void {
    const event = error.toErrorEvent();
    this.deliver("onError", (callbacks) =>
      callbacks.onError(event.isTransportError, event.code, event.message),
    );
  }

  /**
   * Runs a callback on the dispatch queue. Once the thread service no longer
   * accepts work the callback runs on the next event loop turn instead.
   */
  private deliver(hook: keyof UspCallbacks, invoke: (callbacks: UspCallbacks) => void): void {
    let ran = false;
    const run = () => {
      ran = true;
      try {
        invoke(this.callbacks);
      } catch (error: unknown) {
        this.logger.warn("Callback threw", { connectionId: this.id, hook, error: toError(error).message });
      }
    };
    const handle = this.threadService.executeAsync(run, { queue: this.dispatchQueue });
    void handle.completion.then(() => {
      if (!ran) {
        setImmediate(run);
      }
    });
  }
}
