import type { ClientRequest, IncomingMessage } from "http";
import WebSocket from "ws";
import { createGuidWithoutDashes } from "../core/guid";
import { Logger } from "../core/logger";
import { redactRecord } from "../helpers/error/redaction";
import {
  Transport,
  TransportEventHandler,
  TransportEventMap,
  TransportEventType,
  TransportFactory,
  TransportMessage,
  TransportOpenError,
  TransportOptions,
} from "../types/transport";

const CLOSE_HANDSHAKE_TIMEOUT_MS = 2000;

export function upgradeFailureMessage(statusCode: number): string {
  return `WebSocket Upgrade failed with HTTP status code: ${statusCode}`;
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

type HandlerRegistry = { [K in TransportEventType]: Set<TransportEventHandler<K>> };

/**
 * {@link Transport} over a `ws` WebSocket. `wss:` endpoints negotiate TLS 1.2 or newer.
 */
export class WebSocketTransport implements Transport {
  readonly id = createGuidWithoutDashes();
  private socket: WebSocket | null = null;
  private opened = false;
  private closing: Promise<void> | undefined;
  private readonly handlers: HandlerRegistry = {
    message: new Set(),
    error: new Set(),
    close: new Set(),
  };
  private readonly logger: Logger;

  constructor(
    private readonly options: TransportOptions,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger("WebSocketTransport");
  }

  get url(): string {
    return this.options.url;
  }

  get isOpen(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  open(): Promise<void> {
    if (this.socket) {
      return Promise.reject(new TransportOpenError("Transport was already opened"));
    }

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const fail = (error: TransportOpenError) => {
        if (!settled) {
          settled = true;
          reject(error);
        }
      };

      const secure = this.options.url.startsWith("wss:");
      this.logger.debug("Opening WebSocket", {
        transportId: this.id,
        url: this.options.url,
        headers: redactRecord(this.options.headers),
      });

      let socket: WebSocket;
      try {
        socket = new WebSocket(this.options.url, {
          headers: this.options.headers,
          handshakeTimeout: this.options.handshakeTimeoutMs,
          minVersion: secure ? "TLSv1.2" : undefined,
        });
      } catch (error: unknown) {
        fail(new TransportOpenError(error instanceof Error ? error.message : String(error)));
        return;
      }
      this.socket = socket;

      socket.on("unexpected-response", (req: ClientRequest, res: IncomingMessage) => {
        const statusCode = res.statusCode ?? 0;
        res.resume();
        req.destroy();
        fail(new TransportOpenError(upgradeFailureMessage(statusCode), statusCode));
      });

      socket.once("open", () => {
        if (settled) {
          return;
        }
        settled = true;
        this.opened = true;
        resolve();
      });

      socket.on("error", (error: Error) => {
        if (!this.opened) {
          fail(new TransportOpenError(error.message, undefined, /timed out/i.test(error.message)));
          return;
        }
        this.emit("error", error);
      });

      socket.on("close", (code: number, reason: Buffer) => {
        if (!this.opened) {
          fail(new TransportOpenError("Connection closed before the WebSocket handshake completed"));
          return;
        }
        this.emit("close", { code, reason: reason.toString("utf8") });
      });

      socket.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
        const buffer = toBuffer(data);
        const message: TransportMessage = isBinary
          ? { kind: "binary", data: buffer }
          : { kind: "text", data: buffer.toString("utf8") };
        this.emit("message", message);
      });
    });
  }

  send(data: string | Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error("WebSocket is not open"));
    }
    return new Promise<void>((resolve, reject) => {
      socket.send(data, { binary: typeof data !== "string" }, (error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  close(code = 1000, reason = ""): Promise<void> {
    if (!this.closing) {
      this.closing = this.performClose(code, reason);
    }
    return this.closing;
  }

  addEventListener<K extends TransportEventType>(type: K, handler: TransportEventHandler<K>): void {
    this.handlers[type].add(handler);
  }

  removeEventListener<K extends TransportEventType>(type: K, handler: TransportEventHandler<K>): void {
    this.handlers[type].delete(handler);
  }

  private async performClose(code: number, reason: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      return;
    }
    if (socket.readyState === WebSocket.CONNECTING) {
      socket.terminate();
      return;
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.logger.debug("Close handshake timed out; terminating socket", { transportId: this.id });
        socket.terminate();
        resolve();
      }, CLOSE_HANDSHAKE_TIMEOUT_MS);
      socket.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      if (socket.readyState === WebSocket.OPEN) {
        socket.close(code, reason);
      }
    });
  }

  private emit<K extends TransportEventType>(type: K, event: TransportEventMap[K]): void {
    for (const handler of Array.from(this.handlers[type])) {
      try {
        handler(event);
      } catch (error: unknown) {
        this.logger.warn("Transport listener threw; continuing", {
          type,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

export const createWebSocketTransport: TransportFactory = (options) => new WebSocketTransport(options);
