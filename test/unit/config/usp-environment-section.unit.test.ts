import { createClientFromEnvironment } from "../../../src/config/client-factory";
import { UspEnvironmentSection } from "../../../src/config/sections/usp-environment-section";
import { Logger, LogSink, resolveLogLevel } from "../../../src/core/logger";
import { ThreadService } from "../../../src/threading/thread-service";
import { AuthenticationType, EndpointType, RecognitionMode } from "../../../src/types/usp";
import { expect } from "../../helpers/chai-setup";
import { captureLogs, LogCapture } from "../../helpers/log-capture";
import { RecordingCallbacks } from "../../helpers/recording-callbacks";
import { setup, suite, teardown, test } from "../../mocha-globals";

suite("Unit: UspEnvironmentSection", () => {
  test("applies defaults for an empty environment", () => {
    expect(new UspEnvironmentSection({}).read()).to.deep.equal({
      region: "westus",
      endpointUrl: undefined,
      subscriptionKey: undefined,
      language: "en-US",
      mode: RecognitionMode.Interactive,
      logLevel: "warn",
    });
  });

  test("reads and normalizes USP_ variables", () => {
    const settings = new UspEnvironmentSection({
      USP_REGION: " EastUS2 ",
      USP_ENDPOINT: "wss://speech.test.local/v1",
      USP_SUBSCRIPTION_KEY: "test-secret",
      USP_LANGUAGE: "de-DE",
      USP_MODE: "Dictation",
      USP_LOG_LEVEL: "DEBUG",
    }).read();

    expect(settings).to.deep.equal({
      region: "eastus2",
      endpointUrl: "wss://speech.test.local/v1",
      subscriptionKey: "test-secret",
      language: "de-DE",
      mode: RecognitionMode.Dictation,
      logLevel: "debug",
    });
  });

  test("treats blank values as unset and unknown values as defaults", () => {
    const settings = new UspEnvironmentSection({
      USP_REGION: "   ",
      USP_SUBSCRIPTION_KEY: "",
      USP_MODE: "shouting",
      USP_LOG_LEVEL: "loud",
    }).read();

    expect(settings.region).to.equal("westus");
    expect(settings.subscriptionKey).to.equal(undefined);
    expect(settings.mode).to.equal(RecognitionMode.Interactive);
    expect(settings.logLevel).to.equal("warn");
  });
});

suite("Unit: createClientFromEnvironment", () => {
  let logs: LogCapture;
  let service: ThreadService;
  const callbacks = new RecordingCallbacks();

  let channelCounter = 0;
  let sinkLines: Map<string, string[]>;

  const nextLogger = (): Logger => {
    channelCounter += 1;
    return new Logger(`EnvClientTest-${channelCounter}`);
  };

  setup(async () => {
    logs = captureLogs();
    sinkLines = new Map();
    Logger.useSinkFactory((channel): LogSink => {
      const lines: string[] = [];
      sinkLines.set(channel, lines);
      return { appendLine: (line) => lines.push(line) };
    });
    Logger.setDefaultLevel("warn");
    service = new ThreadService();
    await service.initialize();
  });

  teardown(async () => {
    Logger.setDefaultLevel(resolveLogLevel(process.env.USP_LOG_LEVEL, "warn"));
    await service.term(200);
    logs.dispose();
  });

  test("configures region, language, mode and key", () => {
    const client = createClientFromEnvironment(callbacks, service, {
      env: {
        USP_REGION: "northeurope",
        USP_SUBSCRIPTION_KEY: "test-secret",
        USP_LANGUAGE: "fr-FR",
        USP_MODE: "conversation",
      },
    });

    const built = client.buildConfig();

    expect(built.success).to.equal(true);
    if (built.success) {
      expect(built.value).to.include({
        region: "northeurope",
        language: "fr-FR",
        mode: RecognitionMode.Conversation,
        endpointType: EndpointType.Speech,
      });
      expect(built.value.endpointUrl).to.equal(undefined);
      expect(built.value.authentication).to.deep.equal({
        type: AuthenticationType.SubscriptionKey,
        value: "test-secret",
      });
    }
  });

  test("an explicit endpoint takes precedence over the region", () => {
    const client = createClientFromEnvironment(callbacks, service, {
      env: { USP_ENDPOINT: "wss://speech.test.local/v1", USP_SUBSCRIPTION_KEY: "test-secret" },
    });

    const built = client.buildConfig();

    expect(built.success).to.equal(true);
    if (built.success) {
      expect(built.value.endpointUrl).to.equal("wss://speech.test.local/v1");
    }
  });

  test("a missing key is reported when the config is built", () => {
    const client = createClientFromEnvironment(callbacks, service, { env: {} });

    const built = client.buildConfig();

    expect(built.success).to.equal(false);
    if (!built.success) {
      expect(built.error.message).to.equal("Authentication is required");
    }
  });

  test("the log level applies to the client's logger only", () => {
    const clientLogger = nextLogger();

    createClientFromEnvironment(callbacks, service, {
      env: { USP_LOG_LEVEL: "debug", USP_SUBSCRIPTION_KEY: "test-secret" },
      logger: clientLogger,
    });
    const unrelated = nextLogger();
    clientLogger.debug("client detail");
    unrelated.debug("unrelated detail");

    const clientLines = sinkLines.get(clientLogger.name) ?? [];
    expect(clientLines).to.have.length(1);
    expect(clientLines[0]).to.match(new RegExp(`\\[DEBUG\\] \\[${clientLogger.name}\\] client detail$`));
    expect(sinkLines.get(unrelated.name)).to.deep.equal([]);
    clientLogger.dispose();
    unrelated.dispose();
  });
});
