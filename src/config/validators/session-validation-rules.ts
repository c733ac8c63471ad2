import {
  AuthenticationType,
  EndpointType,
  OutputFormat,
  RecognitionMode,
  SessionAuthentication,
} from '../../types/usp';

/**
 * Accumulated builder input, validated before it becomes a {@link SessionConfig}.
 */
export interface SessionDraft {
  mode: RecognitionMode;
  endpointType: EndpointType;
  region?: string;
  endpointUrl?: string;
  language: string;
  outputFormat: OutputFormat;
  authentication?: SessionAuthentication;
  /** Set when the last credential did not fit its authentication type. */
  authenticationMismatch?: string;
  queryParameters: Record<string, string>;
  headers: Record<string, string>;
  handshakeTimeoutMs: number;
  closeTimeoutMs: number;
  maxPendingFrames: number;
  allowInsecureEndpoint: boolean;
}

export const SessionValidationCodes = {
  MISSING_AUTHENTICATION: 'MISSING_AUTHENTICATION',
  CREDENTIAL_TYPE_MISMATCH: 'CREDENTIAL_TYPE_MISMATCH',
  EMPTY_CREDENTIAL: 'EMPTY_CREDENTIAL',
  MISSING_SCOPE: 'MISSING_SCOPE',
  MISSING_ENDPOINT: 'MISSING_ENDPOINT',
  INVALID_REGION: 'INVALID_REGION',
  INVALID_ENDPOINT_URL: 'INVALID_ENDPOINT_URL',
  INSECURE_ENDPOINT: 'INSECURE_ENDPOINT',
  INVALID_LANGUAGE: 'INVALID_LANGUAGE',
  RESERVED_HEADER: 'RESERVED_HEADER',
  OUT_OF_RANGE: 'OUT_OF_RANGE',
} as const;

export type SessionValidationCode = typeof SessionValidationCodes[keyof typeof SessionValidationCodes];

export interface SessionValidationIssue {
  path: string;
  code: SessionValidationCode;
  message: string;
  remediation: string;
}

export type SessionValidationRule = (draft: SessionDraft) => SessionValidationIssue[];

const REGION_PATTERN = /^[a-z0-9-]+$/;
const LANGUAGE_PATTERN = /^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})*$/;
const RESERVED_HEADERS = ['ocp-apim-subscription-key', 'authorization', 'x-connectionid'];

function issue(path: string, code: SessionValidationCode, message: string, remediation: string): SessionValidationIssue {
  return { path, code, message, remediation };
}

export const authenticationRule: SessionValidationRule = ({ authentication, authenticationMismatch }) => {
  if (authenticationMismatch !== undefined) {
    return [issue('authentication', SessionValidationCodes.CREDENTIAL_TYPE_MISMATCH, authenticationMismatch, 'Pass a TokenCredential for azure-ad and a string for subscription-key or authorization-token')];
  }
  if (!authentication) {
    return [issue('authentication', SessionValidationCodes.MISSING_AUTHENTICATION, 'Authentication is required', 'Call setAuthentication() with a subscription key, token or credential')];
  }
  if (authentication.type === AuthenticationType.AzureAD) {
    return authentication.scope.trim().length === 0
      ? [issue('authentication.scope', SessionValidationCodes.MISSING_SCOPE, 'Token scope cannot be empty', 'Pass the scope to request tokens for, e.g. https://cognitiveservices.azure.com/.default')]
      : [];
  }
  if (authentication.value.trim().length === 0) {
    return [issue('authentication.value', SessionValidationCodes.EMPTY_CREDENTIAL, 'Credential cannot be empty', 'Provide the subscription key or authorization token')];
  }
  return [];
};

export const endpointRule: SessionValidationRule = ({ region, endpointUrl, allowInsecureEndpoint }) => {
  if (endpointUrl === undefined) {
    if (!region) {
      return [issue('region', SessionValidationCodes.MISSING_ENDPOINT, 'Either a region or an endpoint URL is required', 'Call setRegion() or setEndpointUrl()')];
    }
    if (!REGION_PATTERN.test(region)) {
      return [issue('region', SessionValidationCodes.INVALID_REGION, `Region "${region}" is not a valid region name`, 'Use the lowercase region identifier, e.g. westus')];
    }
    return [];
  }

  let parsed: URL;
  try {
    parsed = new URL(endpointUrl);
  } catch {
    return [issue('endpointUrl', SessionValidationCodes.INVALID_ENDPOINT_URL, 'Endpoint URL is not a valid URL', 'Use an absolute URL such as wss://<host>/<path>')];
  }
  if (parsed.protocol === 'wss:') {
    return [];
  }
  if (parsed.protocol === 'ws:' && allowInsecureEndpoint) {
    return [];
  }
  return [issue('endpointUrl', SessionValidationCodes.INSECURE_ENDPOINT, `Endpoint URL scheme ${parsed.protocol} is not allowed`, 'Use a wss:// endpoint')];
};

export const languageRule: SessionValidationRule = ({ language }) =>
  LANGUAGE_PATTERN.test(language)
    ? []
    : [issue('language', SessionValidationCodes.INVALID_LANGUAGE, `Language "${language}" is not a valid locale`, 'Use a BCP-47 locale such as en-US')];

export const headerRule: SessionValidationRule = ({ headers }) =>
  Object.keys(headers)
    .filter((name) => RESERVED_HEADERS.includes(name.toLowerCase()))
    .map((name) => issue(`headers.${name}`, SessionValidationCodes.RESERVED_HEADER, `Header ${name} is managed by the session`, 'Use setAuthentication() for credentials; the connection id is generated'));

export const numericRangesRule: SessionValidationRule = ({ handshakeTimeoutMs, closeTimeoutMs, maxPendingFrames }) => {
  const issues: SessionValidationIssue[] = [];
  if (!Number.isFinite(handshakeTimeoutMs) || handshakeTimeoutMs <= 0) {
    issues.push(issue('handshakeTimeoutMs', SessionValidationCodes.OUT_OF_RANGE, 'Handshake timeout must be a positive number of milliseconds', 'Pass a value such as 10000'));
  }
  if (!Number.isFinite(closeTimeoutMs) || closeTimeoutMs < 0) {
    issues.push(issue('closeTimeoutMs', SessionValidationCodes.OUT_OF_RANGE, 'Close timeout must be >= 0 ms', 'Pass a value such as 5000'));
  }
  if (!Number.isInteger(maxPendingFrames) || maxPendingFrames < 1) {
    issues.push(issue('maxPendingFrames', SessionValidationCodes.OUT_OF_RANGE, 'Pending frame limit must be a positive integer', 'Pass a value such as 64'));
  }
  return issues;
};

export const SESSION_VALIDATION_RULES: readonly SessionValidationRule[] = [
  authenticationRule,
  endpointRule,
  languageRule,
  headerRule,
  numericRangesRule,
];

export function validateSessionDraft(draft: SessionDraft): SessionValidationIssue[] {
  return SESSION_VALIDATION_RULES.flatMap((rule) => rule(draft));
}
