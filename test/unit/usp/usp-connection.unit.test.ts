import type { TokenCredential } from "@azure/identity";
import { hasZeroOrphans } from "../../../src/core/disposal/orphan-detector";
import { ThreadService } from "../../../src/threading/thread-service";
import { upgradeFailureMessage } from "../../../src/transport/websocket-transport";
import { ErrorCode } from "../../../src/types/error/error-taxonomy";
import { TransportOpenError } from "../../../src/types/transport";
import { AuthenticationType, ConnectionState, SessionConfig } from "../../../src/types/usp";
import { encodeBinaryMessage, encodeTextMessage } from "../../../src/usp/message-codec";
import { UspConnection } from "../../../src/usp/usp-connection";
import { delay, waitUntil } from "../../helpers/async";
import { expect } from "../../helpers/chai-setup";
import { createFakeTransportFactory, FakeTransport, FakeTransportBehaviour } from "../../helpers/fake-transport";
import { captureLogs, LogCapture } from "../../helpers/log-capture";
import { RecordingCallbacks } from "../../helpers/recording-callbacks";
import { sessionConfig } from "../../helpers/session-config";
import { setup, suite, teardown, test } from "../../mocha-globals";

const RIFF = Buffer.from("RIFF1234567890", "ascii");

suite("Unit: UspConnection", () => {
  let logs: LogCapture;
  let service: ThreadService;
  let callbacks: RecordingCallbacks;
  let transports: FakeTransport[];

  const createConnection = (
    overrides: Partial<SessionConfig> = {},
    behaviour: FakeTransportBehaviour = {},
    sink: RecordingCallbacks = callbacks,
  ): UspConnection => {
    const fakes = createFakeTransportFactory(behaviour);
    transports = fakes.transports;
    return new UspConnection({
      config: sessionConfig(overrides),
      callbacks: sink,
      threadService: service,
      transportFactory: fakes.factory,
    });
  };

  const onlyTransport = (): FakeTransport => {
    expect(transports).to.have.length(1);
    return transports[0];
  };

  const connected = async (
    overrides: Partial<SessionConfig> = {},
    behaviour: FakeTransportBehaviour = {},
  ): Promise<{ connection: UspConnection; transport: FakeTransport }> => {
    const connection = createConnection(overrides, behaviour);
    const result = await connection.connect();
    expect(result.success).to.equal(true);
    return { connection, transport: onlyTransport() };
  };

  setup(async () => {
    logs = captureLogs();
    service = new ThreadService();
    await service.initialize();
    callbacks = new RecordingCallbacks();
    transports = [];
  });

  teardown(async () => {
    await service.term(200);
    logs.dispose();
  });

  suite("connect", () => {
    test("opens the transport with credential and connection id headers", async () => {
      const connection = createConnection();

      const result = await connection.connect();

      expect(result).to.deep.equal({ success: true, value: undefined });
      expect(connection.state).to.equal(ConnectionState.Connected);
      const transport = onlyTransport();
      expect(transport.options.headers).to.deep.equal({
        "Ocp-Apim-Subscription-Key": "test-secret",
        "X-ConnectionId": connection.id,
      });
      expect(new URL(transport.url).searchParams.get("X-ConnectionId")).to.equal(connection.id);
      expect(transport.options.handshakeTimeoutMs).to.equal(10_000);
    });

    test("sends speech.config before anything else", async () => {
      const { transport } = await connected();

      await waitUntil(() => transport.sent.length === 1);

      const [config] = transport.textMessages();
      expect(config.path).to.equal("speech.config");
      const body = JSON.parse(config.body.toString());
      expect(body.context.system).to.include({ name: "usp-stream-core", lang: "TypeScript" });
    });

    test("reports idle, connecting and connected in order", async () => {
      await connected();

      await waitUntil(() => callbacks.transitions.length === 2);

      expect(callbacks.statePath()).to.deep.equal([
        ConnectionState.Idle,
        ConnectionState.Connecting,
        ConnectionState.Connected,
      ]);
      expect(callbacks.errors).to.deep.equal([]);
    });

    test("only the first call connects", async () => {
      const connection = createConnection();

      const first = connection.connect();
      const second = await connection.connect();

      expect(second.success).to.equal(false);
      if (!second.success) {
        expect(second.error.code).to.equal(ErrorCode.InvalidConfiguration);
        expect(second.error.message).to.equal("connect() may only be called once per connection");
      }
      expect((await first).success).to.equal(true);
      expect(transports).to.have.length(1);
    });

    test("an upgrade rejection faults the connection and is reported once", async () => {
      const message = upgradeFailureMessage(301);
      const connection = createConnection({}, { openError: new TransportOpenError(message, 301) });

      const result = await connection.connect();

      expect(result.success).to.equal(false);
      if (!result.success) {
        expect(result.error.code).to.equal(ErrorCode.UpgradeRejected);
        expect(result.error.message).to.equal("WebSocket Upgrade failed with HTTP status code: 301");
        expect(result.error.metadata).to.deep.equal({ statusCode: 301 });
      }
      expect(connection.state).to.equal(ConnectionState.Faulted);
      await waitUntil(() => callbacks.errors.length === 1 && callbacks.transitions.length === 2);
      expect(callbacks.errors).to.deep.equal([
        { isTransportError: true, code: ErrorCode.UpgradeRejected, message },
      ]);
      expect(callbacks.statePath()).to.deep.equal([
        ConnectionState.Idle,
        ConnectionState.Connecting,
        ConnectionState.Faulted,
      ]);
      expect(onlyTransport().closeCalls).to.deep.equal([{ code: 1011, reason: message }]);
    });

    test("a transport handshake timeout maps to HandshakeTimeout", async () => {
      const connection = createConnection(
        {},
        { openError: new TransportOpenError("Opening handshake has timed out", undefined, true) },
      );

      const result = await connection.connect();

      expect(result.success).to.equal(false);
      if (!result.success) {
        expect(result.error.code).to.equal(ErrorCode.HandshakeTimeout);
        expect(result.error.isTransportError).to.equal(true);
      }
    });

    test("a handshake that never settles times out on the thread service", async () => {
      const connection = createConnection({ handshakeTimeoutMs: 20 }, { openDelayMs: 1_200 });

      const result = await connection.connect();

      expect(result.success).to.equal(false);
      if (!result.success) {
        expect(result.error.code).to.equal(ErrorCode.HandshakeTimeout);
        expect(result.error.message).to.equal("WebSocket handshake did not complete within 20ms");
      }
      expect(connection.state).to.equal(ConnectionState.Faulted);
    });

    test("a missing Azure AD token fails before any transport is created", async () => {
      const credential: TokenCredential = { getToken: async () => null };
      const connection = createConnection({
        authentication: { type: AuthenticationType.AzureAD, credential, scope: "test-scope/.default" },
      });

      const result = await connection.connect();

      expect(result.success).to.equal(false);
      if (!result.success) {
        expect(result.error.code).to.equal(ErrorCode.AuthenticationError);
        expect(result.error.message).to.equal("No access token was issued for scope test-scope/.default");
      }
      expect(transports).to.have.length(0);
    });

    test("an Azure AD token becomes a bearer header", async () => {
      const credential: TokenCredential = {
        getToken: async () => ({ token: "test-token", expiresOnTimestamp: Date.now() + 60_000 }),
      };

      const { transport } = await connected({
        authentication: { type: AuthenticationType.AzureAD, credential, scope: "test-scope/.default" },
      });

      expect(transport.options.headers.Authorization).to.equal("Bearer test-token");
      expect(transport.options.headers).to.not.have.property("Ocp-Apim-Subscription-Key");
    });
  });

  suite("writeAudio", () => {
    test("streams audio and ends the turn with an empty frame on close", async () => {
      const { connection, transport } = await connected();

      const written = await connection.writeAudio(RIFF);
      await connection.close();

      expect(written).to.deep.equal({ accepted: true });
      expect(transport.sentPaths()).to.deep.equal(["speech.config", "audio", "audio"]);
      expect(transport.audioBytes().toString("ascii")).to.equal("RIFF1234567890");
      const audioFrames = transport.binaryMessages();
      expect(audioFrames[1].body).to.have.length(0);
      expect(audioFrames[0].requestId).to.equal(connection.currentRequestId);
      expect(transport.closeCalls).to.deep.equal([{ code: 1000, reason: "" }]);
      expect(connection.stats()).to.include({ framesSent: 3, audioBytesSent: 14, pendingFrames: 0 });
    });

    test("sends only the first length bytes", async () => {
      const { connection, transport } = await connected();

      await connection.writeAudio(RIFF, 4);
      await connection.close();

      expect(transport.audioBytes().toString("ascii")).to.equal("RIFF");
    });

    test("copies the caller's buffer before returning", async () => {
      const { connection, transport } = await connected();
      const chunk = Buffer.from("abcd");

      const pending = connection.writeAudio(chunk);
      chunk.fill(0);
      await pending;
      await connection.close();

      expect(transport.audioBytes().toString("ascii")).to.equal("abcd");
    });

    test("a zero-length write is a no-op", async () => {
      const { connection, transport } = await connected();

      const written = await connection.writeAudio(new Uint8Array(0));
      await connection.close();

      expect(written).to.deep.equal({ accepted: true });
      expect(transport.sentPaths()).to.deep.equal(["speech.config"]);
    });

    test("a length beyond the buffer is a configuration error that is not reported", async () => {
      const { connection } = await connected();

      const written = await connection.writeAudio(new Uint8Array(4), 5);
      await delay(20);

      expect(written.accepted).to.equal(false);
      expect(written.error?.code).to.equal(ErrorCode.InvalidConfiguration);
      expect(written.error?.message).to.equal("Audio length 5 is outside the 4-byte buffer");
      expect(callbacks.errors).to.deep.equal([]);
    });

    test("writes before connect are rejected and reported outside the call", async () => {
      const connection = createConnection();

      const pending = connection.writeAudio(RIFF);
      expect(callbacks.errors).to.deep.equal([]);
      const written = await pending;

      expect(written.accepted).to.equal(false);
      expect(written.error?.code).to.equal(ErrorCode.ConnectionClosed);
      await waitUntil(() => callbacks.errors.length === 1);
      expect(callbacks.errors[0]).to.deep.equal({
        isTransportError: false,
        code: ErrorCode.ConnectionClosed,
        message: "Audio rejected: connection is idle",
      });
    });

    test("waits for queue space when the pending limit is reached", async () => {
      const { connection, transport } = await connected({ maxPendingFrames: 2 }, { sendDelayMs: 10 });
      const chunks = ["one", "two", "three", "four", "five"].map((word) => Buffer.from(word));

      const writes = chunks.map((chunk) => connection.writeAudio(chunk));

      expect(connection.stats()).to.include({ pendingFrames: 2, waitingWriters: 4 });
      const results = await Promise.all(writes);
      expect(results.every((result) => result.accepted)).to.equal(true);
      await connection.close();
      expect(transport.audioBytes().toString("ascii")).to.equal("onetwothreefourfive");
    });

    test("a turn.end starts a new request id and skips the end-of-stream frame", async () => {
      const { connection, transport } = await connected();
      await connection.writeAudio(RIFF);
      const firstRequestId = connection.currentRequestId;

      transport.emit("message", { kind: "text", data: encodeTextMessage("turn.end", firstRequestId, "") });
      await connection.close();

      expect(connection.currentRequestId).to.not.equal(firstRequestId);
      expect(transport.sentPaths()).to.deep.equal(["speech.config", "audio"]);
    });
  });

  suite("faults", () => {
    test("a transport error faults once and stops further audio", async () => {
      const { connection, transport } = await connected();
      await connection.writeAudio(RIFF);
      await waitUntil(() => transport.sent.length === 2);

      transport.emit("error", new Error("socket reset"));
      transport.emit("error", new Error("socket reset again"));
      const written = await connection.writeAudio(RIFF);

      expect(connection.state).to.equal(ConnectionState.Faulted);
      expect(connection.lastError?.code).to.equal(ErrorCode.TransportFailure);
      expect(written.accepted).to.equal(false);
      await waitUntil(() => callbacks.errors.length === 2);
      expect(callbacks.errors).to.deep.equal([
        { isTransportError: true, code: ErrorCode.TransportFailure, message: "socket reset" },
        {
          isTransportError: true,
          code: ErrorCode.ConnectionClosed,
          message: "Audio rejected: connection faulted (socket reset)",
        },
      ]);
      expect(transport.sent).to.have.length(2);
      expect(transport.listenerCount("message")).to.equal(0);
    });

    test("a remote close while connected is a transport fault", async () => {
      const { connection, transport } = await connected();

      transport.emit("close", { code: 1006, reason: "gone" });

      await waitUntil(() => callbacks.errors.length === 1);
      expect(callbacks.errors[0]).to.deep.equal({
        isTransportError: true,
        code: ErrorCode.RemoteClosed,
        message: "Service closed the connection with code 1006: gone",
      });
      expect(connection.state).to.equal(ConnectionState.Faulted);
    });

    test("a failed send faults the connection", async () => {
      const { connection, transport } = await connected({}, { failSendAfter: 1 });

      await connection.writeAudio(RIFF);

      await waitUntil(() => connection.state === ConnectionState.Faulted);
      expect(connection.lastError?.message).to.equal("Simulated send failure");
      expect(transport.sentPaths()).to.deep.equal(["speech.config"]);
    });

    test("a malformed inbound message is a protocol fault", async () => {
      const { connection, transport } = await connected();

      transport.emit("message", { kind: "text", data: "garbage" });

      await waitUntil(() => callbacks.errors.length === 1);
      expect(callbacks.errors[0]).to.deep.equal({
        isTransportError: false,
        code: ErrorCode.ProtocolViolation,
        message: "Malformed header line: garbage",
      });
      expect(connection.state).to.equal(ConnectionState.Faulted);
      expect(transport.closeCalls).to.deep.equal([{ code: 1011, reason: "Malformed header line: garbage" }]);
    });

    test("close after a fault ends in closed without a second report", async () => {
      const { connection, transport } = await connected();
      transport.emit("error", new Error("socket reset"));

      await connection.close();

      expect(connection.state).to.equal(ConnectionState.Closed);
      await waitUntil(() => callbacks.transitions.length === 4);
      expect(callbacks.statePath().slice(-2)).to.deep.equal([ConnectionState.Faulted, ConnectionState.Closed]);
      expect(callbacks.errors).to.have.length(1);
      expect(transport.closeCalls).to.have.length(1);
    });
  });

  suite("inbound events", () => {
    test("dispatches service events in arrival order", async () => {
      const { connection, transport } = await connected();
      const requestId = connection.currentRequestId;
      const text = (path: string, body: object) =>
        transport.emit("message", { kind: "text", data: encodeTextMessage(path, requestId, body) });

      text("turn.start", { context: { serviceTag: "tag-1" } });
      text("speech.startDetected", { Offset: 0 });
      transport.emit("message", {
        kind: "binary",
        data: encodeBinaryMessage(
          "speech.hypothesis",
          requestId,
          Buffer.from(JSON.stringify({ Text: "hel", Offset: 0, Duration: 10 })),
          { contentType: "application/json" },
        ),
      });
      text("speech.phrase", { RecognitionStatus: "Success", DisplayText: "Hello.", Offset: 0, Duration: 20 });
      text("speech.endDetected", { Offset: 20 });
      text("turn.end", {});

      await waitUntil(() => callbacks.events.length === 6);
      expect(callbacks.hooks()).to.deep.equal([
        "onTurnStart",
        "onSpeechStartDetected",
        "onSpeechHypothesis",
        "onSpeechPhrase",
        "onSpeechEndDetected",
        "onTurnEnd",
      ]);
      expect(callbacks.events[2].message).to.deep.equal({ text: "hel", offset: 0, duration: 10 });
      expect(callbacks.events[3].message).to.deep.equal({
        recognitionStatus: "Success",
        displayText: "Hello.",
        offset: 0,
        duration: 20,
      });
      expect(connection.currentRequestId).to.not.equal(requestId);
    });

    test("messages with an unknown path are ignored", async () => {
      const { connection, transport } = await connected();

      transport.emit("message", {
        kind: "text",
        data: encodeTextMessage("response", connection.currentRequestId, { anything: true }),
      });
      await delay(20);

      expect(callbacks.events).to.deep.equal([]);
      expect(connection.state).to.equal(ConnectionState.Connected);
      expect(logs.messages("debug")).to.include("Ignoring message with unknown path");
    });

    test("a throwing callback is logged and does not stop dispatch", async () => {
      class ThrowingCallbacks extends RecordingCallbacks {
        override onTurnStart(): void {
          throw new Error("consumer bug");
        }
      }
      const sink = new ThrowingCallbacks();
      const connection = createConnection({}, {}, sink);
      await connection.connect();
      const transport = onlyTransport();

      transport.emit("message", {
        kind: "text",
        data: encodeTextMessage("turn.start", connection.currentRequestId, {}),
      });
      transport.emit("message", {
        kind: "text",
        data: encodeTextMessage("turn.end", connection.currentRequestId, {}),
      });

      await waitUntil(() => sink.events.length === 1);
      expect(sink.hooks()).to.deep.equal(["onTurnEnd"]);
      expect(logs.messages("warn")).to.include("Callback threw");
      expect(connection.state).to.equal(ConnectionState.Connected);
    });
  });

  suite("close", () => {
    test("closing an idle connection never creates a transport", async () => {
      const connection = createConnection();

      await connection.close();

      expect(connection.isClosed()).to.equal(true);
      expect(transports).to.have.length(0);
      await waitUntil(() => callbacks.transitions.length === 1);
      expect(callbacks.statePath()).to.deep.equal([ConnectionState.Idle, ConnectionState.Closed]);
    });

    test("repeated close calls share one close", async () => {
      const { connection, transport } = await connected();

      const first = connection.close();
      const second = connection.close();
      await Promise.all([first, second]);

      expect(second).to.equal(first);
      expect(transport.closeCalls).to.have.length(1);
    });

    test("a closed connection cannot connect again", async () => {
      const connection = createConnection();
      await connection.close();

      const result = await connection.connect();

      expect(result.success).to.equal(false);
    });

    test("close gives up waiting for the queue after the close timeout", async () => {
      const { connection, transport } = await connected({ closeTimeoutMs: 30 }, { sendDelayMs: 500 });
      await connection.writeAudio(RIFF);

      await connection.close();

      expect(connection.state).to.equal(ConnectionState.Closed);
      expect(logs.messages("warn")).to.include("Close timed out before queued frames were sent");
      expect(transport.closeCalls).to.deep.equal([{ code: 1000, reason: "" }]);
    });

    test("writers waiting for queue space are sent before the end-of-stream frame", async () => {
      const { connection, transport } = await connected({ maxPendingFrames: 1 }, { sendDelayMs: 10 });

      const first = connection.writeAudio(Buffer.from("AAAA"));
      const second = connection.writeAudio(Buffer.from("BBBB"));
      expect(connection.stats().waitingWriters).to.equal(2);
      await connection.close();
      const results = await Promise.all([first, second]);

      expect(results).to.deep.equal([{ accepted: true }, { accepted: true }]);
      const payloads = transport
        .binaryMessages()
        .map((message) => (Buffer.isBuffer(message.body) ? message.body.toString("ascii") : message.body));
      expect(payloads).to.deep.equal(["AAAA", "BBBB", ""]);
      expect(callbacks.errors).to.deep.equal([]);
    });

    test("writers still waiting when the close timeout expires are rejected and reported", async () => {
      const { connection, transport } = await connected(
        { maxPendingFrames: 1, closeTimeoutMs: 30 },
        { sendDelayMs: 200 },
      );

      const writes = [connection.writeAudio(Buffer.from("AAAA")), connection.writeAudio(Buffer.from("BBBB"))];
      await connection.close();
      const results = await Promise.all(writes);

      expect(results.map((result) => result.accepted)).to.deep.equal([false, false]);
      await waitUntil(() => callbacks.errors.length === 2);
      for (const error of callbacks.errors) {
        expect(error.code).to.equal(ErrorCode.ConnectionClosed);
        expect(error.message).to.match(/^Audio rejected: connection is (closing|closed)$/);
      }
      expect(transport.binaryMessages()).to.deep.equal([]);
    });

    test("thread service term closes open connections and leaves no orphans", async () => {
      const { connection, transport } = await connected();
      await connection.writeAudio(RIFF);

      const report = await service.term();

      expect(connection.state).to.equal(ConnectionState.Closed);
      expect(report.disposal.steps.map((step) => step.name)).to.deep.equal([`usp-connection:${connection.id}`]);
      expect(transport.closeCalls).to.deep.equal([{ code: 1000, reason: "" }]);
      expect(hasZeroOrphans(service.orphans.captureSnapshot())).to.equal(true);
    });
  });
});
