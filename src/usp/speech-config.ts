import * as os from "os";

export const SPEECH_CONFIG_PATH = "speech.config";

export const CLIENT_SYSTEM_NAME = "usp-stream-core";
export const CLIENT_SYSTEM_VERSION = "0.1.0";

export interface SpeechConfigPayload {
  context: {
    system: { name: string; version: string; build: string; lang: string };
    os: { platform: string; name: string; version: string };
  };
}

/**
 * Client context sent once per connection, before any audio.
 */
export function createSpeechConfigPayload(): SpeechConfigPayload {
  return {
    context: {
      system: {
        name: CLIENT_SYSTEM_NAME,
        version: CLIENT_SYSTEM_VERSION,
        build: `Node.js ${process.version}`,
        lang: "TypeScript",
      },
      os: {
        platform: os.platform(),
        name: os.type(),
        version: os.release(),
      },
    },
  };
}
