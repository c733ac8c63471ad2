import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import headersSchema from "../../schemas/usp/message.headers.schema.json";
import { createUspError } from "../helpers/error/envelope";
import { ErrorCode } from "../types/error/error-taxonomy";
import type { Result, UspError } from "../types/error/usp-error";

export const HEADER_PATH = "Path";
export const HEADER_REQUEST_ID = "X-RequestId";
export const HEADER_TIMESTAMP = "X-Timestamp";
export const HEADER_CONTENT_TYPE = "Content-Type";

export const CONTENT_TYPE_JSON = "application/json";
export const CONTENT_TYPE_AUDIO = "audio/x-wav";

const CRLF = "\r\n";
const HEADER_TERMINATOR = "\r\n\r\n";
const MAX_BINARY_HEADER_BYTES = 0xffff;

/**
 * A decoded service message. Header names are lowercased.
 */
export interface UspMessage {
  readonly path: string;
  readonly requestId?: string;
  readonly contentType?: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string | Buffer;
}

export interface EncodeOptions {
  contentType?: string;
  timestamp?: Date;
  extraHeaders?: Record<string, string>;
}

function protocolError(message: string, metadata?: Record<string, unknown>): UspError {
  return createUspError({
    kind: "protocol",
    code: ErrorCode.ProtocolViolation,
    message,
    metadata,
  });
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return [];
  }
  return errors.map((error) => {
    const instancePath = error.instancePath || "/";
    return `${instancePath} (${error.keyword}) ${error.message ?? ""}`.trim();
  });
}

/**
 * Compiles and caches Ajv validators for headers and per-path message bodies.
 */
export class MessageSchemaRegistry {
  private readonly ajv: Ajv;
  private readonly headerValidator: ValidateFunction;
  private readonly bodyValidators = new Map<string, ValidateFunction>();

  constructor() {
    this.ajv = new Ajv({ allErrors: true, strict: false });
    addFormats(this.ajv);
    this.headerValidator = this.ajv.compile(headersSchema);
  }

  register(path: string, schema: object): void {
    this.bodyValidators.set(path, this.ajv.compile(schema));
  }

  hasSchema(path: string): boolean {
    return this.bodyValidators.has(path);
  }

  validateHeaders(headers: Record<string, string>): string[] {
    return this.headerValidator(headers) ? [] : formatErrors(this.headerValidator.errors);
  }

  validateBody(path: string, body: unknown): string[] {
    const validator = this.bodyValidators.get(path);
    if (!validator) {
      return [];
    }
    return validator(body) ? [] : formatErrors(validator.errors);
  }
}

function formatHeaders(
  path: string,
  requestId: string,
  options: EncodeOptions,
  defaultContentType: string,
): string {
  const headers: Array<[string, string]> = [
    [HEADER_PATH, path],
    [HEADER_REQUEST_ID, requestId],
    [HEADER_TIMESTAMP, (options.timestamp ?? new Date()).toISOString()],
    [HEADER_CONTENT_TYPE, options.contentType ?? defaultContentType],
  ];
  for (const [name, value] of Object.entries(options.extraHeaders ?? {})) {
    headers.push([name, value]);
  }
  return headers.map(([name, value]) => `${name}: ${value}${CRLF}`).join("");
}

/**
 * Encodes a text message: header lines, a blank line, then the body.
 */
export function encodeTextMessage(
  path: string,
  requestId: string,
  body: string | object,
  options: EncodeOptions = {},
): string {
  const payload = typeof body === "string" ? body : JSON.stringify(body);
  return `${formatHeaders(path, requestId, options, CONTENT_TYPE_JSON)}${CRLF}${payload}`;
}

/**
 * Encodes a binary message: 2-byte big-endian header length, ASCII headers, payload.
 * The payload bytes are copied; the caller may reuse its buffer afterwards.
 */
export function encodeBinaryMessage(
  path: string,
  requestId: string,
  payload: Uint8Array,
  options: EncodeOptions = {},
): Buffer {
  const headerBytes = Buffer.from(formatHeaders(path, requestId, options, CONTENT_TYPE_AUDIO), "ascii");
  if (headerBytes.byteLength > MAX_BINARY_HEADER_BYTES) {
    throw new RangeError(`Binary message headers exceed ${MAX_BINARY_HEADER_BYTES} bytes`);
  }
  const frame = Buffer.allocUnsafe(2 + headerBytes.byteLength + payload.byteLength);
  frame.writeUInt16BE(headerBytes.byteLength, 0);
  headerBytes.copy(frame, 2);
  frame.set(payload, 2 + headerBytes.byteLength);
  return frame;
}

function parseHeaderBlock(block: string): Result<Record<string, string>> {
  const headers: Record<string, string> = {};
  for (const line of block.split(CRLF)) {
    if (line.length === 0) {
      continue;
    }
    const separator = line.indexOf(":");
    if (separator <= 0) {
      return { success: false, error: protocolError(`Malformed header line: ${line}`) };
    }
    const name = line.slice(0, separator).trim().toLowerCase();
    headers[name] = line.slice(separator + 1).trim();
  }
  return { success: true, value: headers };
}

function toMessage(
  headerResult: Result<Record<string, string>>,
  body: string | Buffer,
  registry: MessageSchemaRegistry,
): Result<UspMessage> {
  if (!headerResult.success) {
    return headerResult;
  }
  const headers = headerResult.value;
  const problems = registry.validateHeaders(headers);
  if (problems.length > 0) {
    return {
      success: false,
      error: protocolError("Message headers failed validation", { problems }),
    };
  }
  return {
    success: true,
    value: {
      path: headers.path,
      requestId: headers["x-requestid"],
      contentType: headers["content-type"],
      headers,
      body,
    },
  };
}

export function decodeTextMessage(text: string, registry: MessageSchemaRegistry): Result<UspMessage> {
  const boundary = text.indexOf(HEADER_TERMINATOR);
  const headerBlock = boundary < 0 ? text : text.slice(0, boundary);
  const body = boundary < 0 ? "" : text.slice(boundary + HEADER_TERMINATOR.length);
  return toMessage(parseHeaderBlock(headerBlock), body, registry);
}

export function decodeBinaryMessage(frame: Buffer, registry: MessageSchemaRegistry): Result<UspMessage> {
  if (frame.byteLength < 2) {
    return { success: false, error: protocolError("Binary message is shorter than its length prefix") };
  }
  const headerLength = frame.readUInt16BE(0);
  if (2 + headerLength > frame.byteLength) {
    return {
      success: false,
      error: protocolError("Binary message header length exceeds frame size", {
        headerLength,
        frameLength: frame.byteLength,
      }),
    };
  }
  const headerBlock = frame.subarray(2, 2 + headerLength).toString("ascii");
  const body = Buffer.from(frame.subarray(2 + headerLength));
  return toMessage(parseHeaderBlock(headerBlock), body, registry);
}

/**
 * Parses a message body as JSON and validates it against the schema registered for its path.
 */
export function parseJsonBody(message: UspMessage, registry: MessageSchemaRegistry): Result<unknown> {
  const raw = typeof message.body === "string" ? message.body : message.body.toString("utf8");
  let parsed: unknown = {};
  if (raw.trim().length > 0) {
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      return {
        success: false,
        error: protocolError(`Message ${message.path} carries an invalid JSON body`, {
          reason: error instanceof Error ? error.message : String(error),
        }),
      };
    }
  }
  const problems = registry.validateBody(message.path, parsed);
  if (problems.length > 0) {
    return {
      success: false,
      error: protocolError(`Message ${message.path} failed schema validation`, { problems }),
    };
  }
  return { success: true, value: parsed };
}
