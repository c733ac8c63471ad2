import { Logger } from "../core/logger";
import { ThreadService } from "../threading/thread-service";
import { AuthenticationType, EndpointType, UspCallbacks } from "../types/usp";
import { UspClient, UspClientOptions } from "../usp/usp-client";
import { EnvironmentRecord, UspEnvironmentSection } from "./sections/usp-environment-section";

export interface EnvironmentClientOptions extends UspClientOptions {
  env?: EnvironmentRecord;
}

/**
 * Configures a {@link UspClient} from `USP_*` environment variables. An
 * explicit `USP_ENDPOINT` overrides the region. A missing subscription key is
 * left for {@link UspClient.buildConfig} to report. `USP_LOG_LEVEL` applies to
 * the client's logger, which its connections share.
 */
export function createClientFromEnvironment(
  callbacks: UspCallbacks,
  threadService: ThreadService,
  options: EnvironmentClientOptions = {},
): UspClient {
  const { env, ...clientOptions } = options;
  const settings = new UspEnvironmentSection(env).read();
  const logger = clientOptions.logger ?? new Logger("UspClient");
  logger.setLevel(settings.logLevel);

  const client = new UspClient(callbacks, threadService, { ...clientOptions, logger })
    .setRecognitionMode(settings.mode)
    .setRegion(settings.region)
    .setLanguage(settings.language);
  if (settings.subscriptionKey !== undefined) {
    client.setAuthentication(AuthenticationType.SubscriptionKey, settings.subscriptionKey);
  }
  if (settings.endpointUrl !== undefined) {
    client.setEndpointType(EndpointType.Speech).setEndpointUrl(settings.endpointUrl);
  }
  return client;
}
