/**
 * Data received from the service. Text frames arrive as strings, binary frames as buffers.
 */
export type TransportMessage =
  | { readonly kind: "text"; readonly data: string }
  | { readonly kind: "binary"; readonly data: Buffer };

export interface TransportEventMap {
  message: TransportMessage;
  error: Error;
  close: { code: number; reason: string };
}

export type TransportEventType = keyof TransportEventMap;

export type TransportEventHandler<K extends TransportEventType> = (
  event: TransportEventMap[K],
) => void;

/**
 * Framed duplex channel to the service.
 *
 * @remarks
 * Implementations must reject `open()` with a {@link TransportOpenError}
 * when the upgrade does not succeed, and must resolve `send()` only after the
 * frame was handed to the socket.
 */
export interface Transport {
  readonly id: string;
  readonly url: string;
  readonly isOpen: boolean;
  open(): Promise<void>;
  send(data: string | Uint8Array): Promise<void>;
  close(code?: number, reason?: string): Promise<void>;
  addEventListener<K extends TransportEventType>(
    type: K,
    handler: TransportEventHandler<K>,
  ): void;
  removeEventListener<K extends TransportEventType>(
    type: K,
    handler: TransportEventHandler<K>,
  ): void;
}

export interface TransportOptions {
  url: string;
  headers: Record<string, string>;
  handshakeTimeoutMs: number;
}

export type TransportFactory = (options: TransportOptions) => Transport;

/**
 * Failure to establish the channel. `statusCode` is set when the server answered
 * the upgrade request with a non-101 HTTP response.
 */
export class TransportOpenError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number,
    readonly timedOut = false,
  ) {
    super(message);
    this.name = "TransportOpenError";
  }
}
