import { EndpointType, RecognitionMode, SessionConfig } from "../types/usp";

export const QUERY_LANGUAGE = "language";
export const QUERY_TRANSLATION_SOURCE = "from";
export const QUERY_FORMAT = "format";
export const QUERY_CONNECTION_ID = "X-ConnectionId";
export const HEADER_CONNECTION_ID = "X-ConnectionId";

/**
 * Host suffix and path template per endpoint type. `{mode}` is replaced with
 * the recognition mode.
 */
const ENDPOINT_TEMPLATES: Record<EndpointType, { host: string; path: string }> = {
  [EndpointType.Speech]: {
    host: "stt.speech.microsoft.com",
    path: "/speech/recognition/{mode}/cognitiveservices/v1",
  },
  [EndpointType.Translation]: {
    host: "s2s.speech.microsoft.com",
    path: "/speech/translation/cognitiveservices/v1",
  },
  [EndpointType.Intent]: {
    host: "sr.speech.microsoft.com",
    path: "/speech/recognition/{mode}/cognitiveservices/v1",
  },
};

export function regionEndpoint(region: string, endpointType: EndpointType, mode: RecognitionMode): string {
  const template = ENDPOINT_TEMPLATES[endpointType];
  return `wss://${region}.${template.host}${template.path.replace("{mode}", mode)}`;
}

/**
 * Builds the handshake URL for a session. An explicit endpoint URL wins over
 * the region; query parameters already present on it are kept as given.
 */
export function resolveEndpointUrl(config: SessionConfig): string {
  const base =
    config.endpointUrl ?? regionEndpoint(config.region ?? "", config.endpointType, config.mode);
  const url = new URL(base);

  const languageKey =
    config.endpointType === EndpointType.Translation ? QUERY_TRANSLATION_SOURCE : QUERY_LANGUAGE;
  const defaults: Array<[string, string]> = [
    [languageKey, config.language],
    [QUERY_FORMAT, config.outputFormat],
    ...Object.entries(config.queryParameters),
  ];
  for (const [name, value] of defaults) {
    if (!url.searchParams.has(name)) {
      url.searchParams.set(name, value);
    }
  }
  url.searchParams.set(QUERY_CONNECTION_ID, config.connectionId);
  return url.toString();
}
