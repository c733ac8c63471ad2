import type { TokenCredential } from "@azure/identity";
import { isGuidWithoutDashes } from "../../../src/core/guid";
import { ThreadService } from "../../../src/threading/thread-service";
import { upgradeFailureMessage } from "../../../src/transport/websocket-transport";
import { ErrorCode } from "../../../src/types/error/error-taxonomy";
import { TransportOpenError } from "../../../src/types/transport";
import { AuthenticationType, ConnectionState, EndpointType, RecognitionMode } from "../../../src/types/usp";
import { UspClient } from "../../../src/usp/usp-client";
import { expect } from "../../helpers/chai-setup";
import { createFakeTransportFactory, FakeTransportFactory } from "../../helpers/fake-transport";
import { captureLogs, LogCapture } from "../../helpers/log-capture";
import { RecordingCallbacks } from "../../helpers/recording-callbacks";
import { setup, suite, teardown, test } from "../../mocha-globals";

suite("Unit: UspClient", () => {
  let logs: LogCapture;
  let service: ThreadService;
  let callbacks: RecordingCallbacks;
  let fakes: FakeTransportFactory;

  const client = (): UspClient =>
    new UspClient(callbacks, service, { transportFactory: fakes.factory });

  const keyed = (): UspClient =>
    client().setRegion("westus").setAuthentication(AuthenticationType.SubscriptionKey, "test-secret");

  const configError = (builder: UspClient): string => {
    const built = builder.buildConfig();
    expect(built.success).to.equal(false);
    if (built.success) {
      return "";
    }
    expect(built.error.code).to.equal(ErrorCode.InvalidConfiguration);
    return built.error.message;
  };

  setup(async () => {
    logs = captureLogs();
    service = new ThreadService();
    await service.initialize();
    callbacks = new RecordingCallbacks();
    fakes = createFakeTransportFactory();
  });

  teardown(async () => {
    await service.term(200);
    logs.dispose();
  });

  suite("buildConfig", () => {
    test("applies defaults and freezes the result", () => {
      const built = keyed().buildConfig();

      expect(built.success).to.equal(true);
      if (built.success) {
        const config = built.value;
        expect(config).to.include({
          mode: RecognitionMode.Interactive,
          endpointType: EndpointType.Speech,
          region: "westus",
          language: "en-US",
          outputFormat: "simple",
          handshakeTimeoutMs: 10_000,
          closeTimeoutMs: 5_000,
          maxPendingFrames: 64,
        });
        expect(config.authentication).to.deep.equal({
          type: AuthenticationType.SubscriptionKey,
          value: "test-secret",
        });
        expect(isGuidWithoutDashes(config.connectionId)).to.equal(true);
        expect(Object.isFrozen(config)).to.equal(true);
        expect(Object.isFrozen(config.headers)).to.equal(true);
      }
    });

    test("setters are fluent", () => {
      const builder = client();

      expect(builder.setLanguage("de-DE")).to.equal(builder);
      expect(builder.setOutputFormat("detailed")).to.equal(builder);
      expect(builder.allowInsecureEndpoint()).to.equal(builder);
    });

    test("every build gets a fresh connection id", () => {
      const builder = keyed();

      const first = builder.buildConfig();
      const second = builder.buildConfig();

      expect(first.success && second.success).to.equal(true);
      if (first.success && second.success) {
        expect(first.value.connectionId).to.not.equal(second.value.connectionId);
      }
    });

    test("later setter calls do not change an earlier config", () => {
      const builder = keyed().setHeader("X-Trace", "1").setQueryParameter("profanity", "masked");
      const built = builder.buildConfig();

      builder.setHeader("X-Trace", "2").setQueryParameter("profanity", "raw");

      expect(built.success).to.equal(true);
      if (built.success) {
        expect(built.value.headers).to.deep.equal({ "X-Trace": "1" });
        expect(built.value.queryParameters).to.deep.equal({ profanity: "masked" });
      }
    });

    test("requires authentication", () => {
      const built = client().setRegion("westus").buildConfig();

      expect(built.success).to.equal(false);
      if (!built.success) {
        expect(built.error.message).to.equal("Authentication is required");
        expect(built.error.metadata).to.deep.equal({
          issues: [
            {
              path: "authentication",
              code: "MISSING_AUTHENTICATION",
              remediation: "Call setAuthentication() with a subscription key, token or credential",
            },
          ],
        });
      }
    });

    test("a credential that does not fit its type is reported by buildConfig", () => {
      const credential: TokenCredential = { getToken: async () => null };
      const runtimeType: AuthenticationType = AuthenticationType.AzureAD;

      const stringForAzureAd = client().setRegion("westus").setAuthentication(runtimeType, "test-secret");
      const credentialForKey = client()
        .setRegion("westus")
        .setAuthentication(AuthenticationType.SubscriptionKey, credential, undefined);

      expect(configError(stringForAzureAd)).to.equal("Azure AD authentication takes a TokenCredential");
      expect(configError(credentialForKey)).to.equal("subscription-key authentication takes a string credential");
      const built = credentialForKey.buildConfig();
      if (!built.success) {
        expect(built.error.metadata).to.have.nested.property("issues[0].code", "CREDENTIAL_TYPE_MISMATCH");
      }
    });

    test("a matching credential replaces an earlier mismatch", () => {
      const builder = client()
        .setRegion("westus")
        .setAuthentication(AuthenticationType.AzureAD, "test-secret", undefined)
        .setAuthentication(AuthenticationType.SubscriptionKey, "test-secret");

      expect(builder.buildConfig().success).to.equal(true);
    });

    test("rejects an empty credential", () => {
      const builder = client().setRegion("westus").setAuthentication(AuthenticationType.AuthorizationToken, "  ");

      expect(configError(builder)).to.equal("Credential cannot be empty");
    });

    test("requires a region or an endpoint URL", () => {
      const builder = client().setAuthentication(AuthenticationType.SubscriptionKey, "test-secret");

      expect(configError(builder)).to.equal("Either a region or an endpoint URL is required");
    });

    test("rejects region names with invalid characters", () => {
      expect(configError(keyed().setRegion("West US"))).to.equal('Region "West US" is not a valid region name');
    });

    test("allows ws endpoints only when insecure endpoints are enabled", () => {
      const builder = keyed().setEndpointUrl("ws://127.0.0.1:9/speech");

      expect(configError(builder)).to.equal("Endpoint URL scheme ws: is not allowed");
      expect(builder.allowInsecureEndpoint().buildConfig().success).to.equal(true);
      expect(configError(builder.setEndpointUrl("https://speech.test.local/"))).to.equal(
        "Endpoint URL scheme https: is not allowed",
      );
    });

    test("rejects an endpoint that is not a URL", () => {
      expect(configError(keyed().setEndpointUrl("not a url"))).to.equal("Endpoint URL is not a valid URL");
    });

    test("rejects malformed locales", () => {
      expect(configError(keyed().setLanguage("english!"))).to.equal('Language "english!" is not a valid locale');
    });

    test("rejects headers the session manages itself", () => {
      expect(configError(keyed().setHeader("Authorization", "Bearer x"))).to.equal(
        "Header Authorization is managed by the session",
      );
    });

    test("rejects out-of-range limits", () => {
      expect(configError(keyed().setMaxPendingFrames(0))).to.equal("Pending frame limit must be a positive integer");
      expect(configError(keyed().setHandshakeTimeout(0))).to.equal(
        "Handshake timeout must be a positive number of milliseconds",
      );
      expect(configError(keyed().setCloseTimeout(-1))).to.equal("Close timeout must be >= 0 ms");
    });
  });

  suite("connect", () => {
    test("returns a connected connection", async () => {
      const result = await keyed().connect();

      expect(result.success).to.equal(true);
      if (result.success) {
        expect(result.connection.state).to.equal(ConnectionState.Connected);
        await result.connection.close();
        expect(result.connection.isClosed()).to.equal(true);
      }
      expect(fakes.transports).to.have.length(1);
    });

    test("configuration errors return before any transport exists", async () => {
      const result = await client().connect();

      expect(result.success).to.equal(false);
      if (!result.success) {
        expect(result.error.code).to.equal(ErrorCode.InvalidConfiguration);
        expect(result.connection).to.equal(undefined);
      }
      expect(fakes.transports).to.have.length(0);
      expect(logs.messages("warn")).to.include("Rejected session configuration");
    });

    test("refuses to connect on a thread service that is not running", async () => {
      const idle = new ThreadService();

      const result = await new UspClient(callbacks, idle, { transportFactory: fakes.factory })
        .setRegion("westus")
        .setAuthentication(AuthenticationType.SubscriptionKey, "test-secret")
        .connect();

      expect(result.success).to.equal(false);
      if (!result.success) {
        expect(result.error.code).to.equal(ErrorCode.ServiceShutdown);
      }
    });

    test("a failed handshake returns the faulted connection", async () => {
      fakes = createFakeTransportFactory({
        openError: new TransportOpenError(upgradeFailureMessage(403), 403),
      });

      const result = await keyed().connect();

      expect(result.success).to.equal(false);
      if (!result.success) {
        expect(result.error.code).to.equal(ErrorCode.UpgradeRejected);
        expect(result.connection?.state).to.equal(ConnectionState.Faulted);
        await result.connection?.close();
        expect(result.connection?.state).to.equal(ConnectionState.Closed);
      }
    });
  });
});
