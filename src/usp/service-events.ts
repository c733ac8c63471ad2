import speechDetectedSchema from "../../schemas/usp/speech.detected.schema.json";
import speechHypothesisSchema from "../../schemas/usp/speech.hypothesis.schema.json";
import speechPhraseSchema from "../../schemas/usp/speech.phrase.schema.json";
import translationHypothesisSchema from "../../schemas/usp/translation.hypothesis.schema.json";
import translationPhraseSchema from "../../schemas/usp/translation.phrase.schema.json";
import turnEndSchema from "../../schemas/usp/turn.end.schema.json";
import turnStartSchema from "../../schemas/usp/turn.start.schema.json";
import type { Result } from "../types/error/usp-error";
import type {
  RecognitionStatus,
  SpeechEndDetectedMessage,
  SpeechFragmentMessage,
  SpeechHypothesisMessage,
  SpeechPhraseMessage,
  SpeechStartDetectedMessage,
  TranslationHypothesisMessage,
  TranslationPhraseMessage,
  TurnEndMessage,
  TurnStartMessage,
} from "../types/usp";
import { MessageSchemaRegistry, parseJsonBody, UspMessage } from "./message-codec";

export const SERVICE_PATHS = {
  turnStart: "turn.start",
  turnEnd: "turn.end",
  speechStartDetected: "speech.startDetected",
  speechEndDetected: "speech.endDetected",
  speechHypothesis: "speech.hypothesis",
  speechFragment: "speech.fragment",
  speechPhrase: "speech.phrase",
  translationHypothesis: "translation.hypothesis",
  translationPhrase: "translation.phrase",
} as const;

export type ServiceEvent =
  | { readonly type: "turnStart"; readonly message: TurnStartMessage }
  | { readonly type: "turnEnd"; readonly message: TurnEndMessage }
  | { readonly type: "speechStartDetected"; readonly message: SpeechStartDetectedMessage }
  | { readonly type: "speechEndDetected"; readonly message: SpeechEndDetectedMessage }
  | { readonly type: "speechHypothesis"; readonly message: SpeechHypothesisMessage }
  | { readonly type: "speechFragment"; readonly message: SpeechFragmentMessage }
  | { readonly type: "speechPhrase"; readonly message: SpeechPhraseMessage }
  | { readonly type: "translationHypothesis"; readonly message: TranslationHypothesisMessage }
  | { readonly type: "translationPhrase"; readonly message: TranslationPhraseMessage }
  | { readonly type: "unknown"; readonly path: string };

/**
 * Registry preloaded with the body schema of every path in {@link SERVICE_PATHS}.
 */
export function createServiceSchemaRegistry(): MessageSchemaRegistry {
  const registry = new MessageSchemaRegistry();
  registry.register(SERVICE_PATHS.turnStart, turnStartSchema);
  registry.register(SERVICE_PATHS.turnEnd, turnEndSchema);
  registry.register(SERVICE_PATHS.speechStartDetected, speechDetectedSchema);
  registry.register(SERVICE_PATHS.speechEndDetected, speechDetectedSchema);
  registry.register(SERVICE_PATHS.speechHypothesis, speechHypothesisSchema);
  registry.register(SERVICE_PATHS.speechFragment, speechHypothesisSchema);
  registry.register(SERVICE_PATHS.speechPhrase, speechPhraseSchema);
  registry.register(SERVICE_PATHS.translationHypothesis, translationHypothesisSchema);
  registry.register(SERVICE_PATHS.translationPhrase, translationPhraseSchema);
  return registry;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

function numberField(body: JsonRecord, key: string): number {
  const value = body[key];
  return typeof value === "number" ? value : 0;
}

function stringField(body: JsonRecord, key: string): string | undefined {
  const value = body[key];
  return typeof value === "string" ? value : undefined;
}

const RECOGNITION_STATUSES: readonly RecognitionStatus[] = [
  "Success",
  "NoMatch",
  "InitialSilenceTimeout",
  "BabbleTimeout",
  "Error",
  "EndOfDictation",
];

function recognitionStatus(body: JsonRecord): RecognitionStatus {
  const value = body.RecognitionStatus;
  return RECOGNITION_STATUSES.find((status) => status === value) ?? "Error";
}

function translations(body: JsonRecord): Record<string, string> {
  const translation = asRecord(body.Translation);
  const entries = Array.isArray(translation.Translations) ? translation.Translations : [];
  const result: Record<string, string> = {};
  for (const entry of entries) {
    const record = asRecord(entry);
    const language = stringField(record, "Language");
    const text = stringField(record, "Text");
    if (language !== undefined && text !== undefined) {
      result[language] = text;
    }
  }
  return result;
}

function hypothesis(body: JsonRecord): SpeechHypothesisMessage {
  return {
    text: stringField(body, "Text") ?? "",
    offset: numberField(body, "Offset"),
    duration: numberField(body, "Duration"),
  };
}

/**
 * Maps a decoded service message to a typed {@link ServiceEvent}.
 * Paths without a registered schema map to `unknown` and are not parsed.
 */
export function toServiceEvent(message: UspMessage, registry: MessageSchemaRegistry): Result<ServiceEvent> {
  if (!registry.hasSchema(message.path)) {
    return { success: true, value: { type: "unknown", path: message.path } };
  }
  const parsed = parseJsonBody(message, registry);
  if (!parsed.success) {
    return parsed;
  }
  const body = asRecord(parsed.value);

  switch (message.path) {
    case SERVICE_PATHS.turnStart:
      return {
        success: true,
        value: { type: "turnStart", message: { serviceTag: stringField(asRecord(body.context), "serviceTag") } },
      };
    case SERVICE_PATHS.turnEnd:
      return { success: true, value: { type: "turnEnd", message: {} } };
    case SERVICE_PATHS.speechStartDetected:
      return { success: true, value: { type: "speechStartDetected", message: { offset: numberField(body, "Offset") } } };
    case SERVICE_PATHS.speechEndDetected:
      return { success: true, value: { type: "speechEndDetected", message: { offset: numberField(body, "Offset") } } };
    case SERVICE_PATHS.speechHypothesis:
      return { success: true, value: { type: "speechHypothesis", message: hypothesis(body) } };
    case SERVICE_PATHS.speechFragment:
      return { success: true, value: { type: "speechFragment", message: hypothesis(body) } };
    case SERVICE_PATHS.speechPhrase:
      return {
        success: true,
        value: {
          type: "speechPhrase",
          message: {
            recognitionStatus: recognitionStatus(body),
            displayText: stringField(body, "DisplayText"),
            offset: numberField(body, "Offset"),
            duration: numberField(body, "Duration"),
          },
        },
      };
    case SERVICE_PATHS.translationHypothesis:
      return {
        success: true,
        value: {
          type: "translationHypothesis",
          message: { ...hypothesis(body), translations: translations(body) },
        },
      };
    case SERVICE_PATHS.translationPhrase:
      return {
        success: true,
        value: {
          type: "translationPhrase",
          message: {
            recognitionStatus: recognitionStatus(body),
            displayText: stringField(body, "Text"),
            offset: numberField(body, "Offset"),
            duration: numberField(body, "Duration"),
            translationStatus: stringField(asRecord(body.Translation), "TranslationStatus") ?? "",
            translations: translations(body),
          },
        },
      };
    default:
      return { success: true, value: { type: "unknown", path: message.path } };
  }
}
