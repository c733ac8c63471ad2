import type { TokenCredential } from "@azure/identity";
import type { ErrorCode } from "./error/error-taxonomy";
import type { UspError } from "./error/usp-error";

/**
 * Recognition modes. Each maps to a path segment of the speech endpoint.
 */
export enum RecognitionMode {
  Interactive = "interactive",
  Conversation = "conversation",
  Dictation = "dictation",
}

/**
 * Service category the session talks to.
 */
export enum EndpointType {
  Speech = "speech",
  Translation = "translation",
  Intent = "intent",
}

export enum AuthenticationType {
  SubscriptionKey = "subscription-key",
  AuthorizationToken = "authorization-token",
  AzureAD = "azure-ad",
}

/**
 * Lifecycle of a {@link UspConnection}. No state is re-entered.
 */
export enum ConnectionState {
  Idle = "idle",
  Connecting = "connecting",
  Connected = "connected",
  Closing = "closing",
  Closed = "closed",
  Faulted = "faulted",
}

export type OutputFormat = "simple" | "detailed";

export type SessionAuthentication =
  | { readonly type: AuthenticationType.SubscriptionKey; readonly value: string }
  | { readonly type: AuthenticationType.AuthorizationToken; readonly value: string }
  | {
      readonly type: AuthenticationType.AzureAD;
      readonly credential: TokenCredential;
      readonly scope: string;
    };

/**
 * Immutable configuration of one session, produced by {@link UspClient.buildConfig}.
 */
export interface SessionConfig {
  readonly mode: RecognitionMode;
  readonly endpointType: EndpointType;
  readonly region?: string;
  readonly endpointUrl?: string;
  readonly language: string;
  readonly outputFormat: OutputFormat;
  readonly authentication: SessionAuthentication;
  readonly connectionId: string;
  readonly queryParameters: Readonly<Record<string, string>>;
  readonly headers: Readonly<Record<string, string>>;
  readonly handshakeTimeoutMs: number;
  readonly closeTimeoutMs: number;
  readonly maxPendingFrames: number;
}

/**
 * Service result status carried by `speech.phrase` messages.
 */
export type RecognitionStatus =
  | "Success"
  | "NoMatch"
  | "InitialSilenceTimeout"
  | "BabbleTimeout"
  | "Error"
  | "EndOfDictation";

export interface SpeechStartDetectedMessage {
  offset: number;
}

export interface SpeechEndDetectedMessage {
  offset: number;
}

export interface SpeechHypothesisMessage {
  text: string;
  offset: number;
  duration: number;
}

export type SpeechFragmentMessage = SpeechHypothesisMessage;

export interface SpeechPhraseMessage {
  recognitionStatus: RecognitionStatus;
  displayText?: string;
  offset: number;
  duration: number;
}

export interface TranslationHypothesisMessage extends SpeechHypothesisMessage {
  translations: Record<string, string>;
}

export interface TranslationPhraseMessage extends SpeechPhraseMessage {
  translationStatus: string;
  translations: Record<string, string>;
}

export interface TurnStartMessage {
  serviceTag?: string;
}

export type TurnEndMessage = Record<string, never>;

/**
 * Consumer-supplied sink for connection events. Only `onError` is mandatory.
 *
 * @remarks
 * Every hook runs on the thread service dispatch context, in the order the
 * events were detected, and never inside {@link UspConnection.writeAudio}.
 */
export interface UspCallbacks {
  onError(isTransportError: boolean, errorCode: ErrorCode, errorMessage: string): void;
  onStateChange?(previous: ConnectionState, next: ConnectionState): void;
  onTurnStart?(message: TurnStartMessage): void;
  onSpeechStartDetected?(message: SpeechStartDetectedMessage): void;
  onSpeechHypothesis?(message: SpeechHypothesisMessage): void;
  onSpeechFragment?(message: SpeechFragmentMessage): void;
  onSpeechPhrase?(message: SpeechPhraseMessage): void;
  onSpeechEndDetected?(message: SpeechEndDetectedMessage): void;
  onTranslationHypothesis?(message: TranslationHypothesisMessage): void;
  onTranslationPhrase?(message: TranslationPhraseMessage): void;
  onTurnEnd?(message: TurnEndMessage): void;
}

/**
 * Outcome of {@link UspConnection.writeAudio}. A rejected write has already been
 * reported through {@link UspCallbacks.onError}, except for an invalid length.
 */
export interface WriteAudioResult {
  readonly accepted: boolean;
  readonly error?: UspError;
}
