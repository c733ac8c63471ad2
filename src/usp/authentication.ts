import { createUspError, wrapError } from "../helpers/error/envelope";
import { ErrorCode } from "../types/error/error-taxonomy";
import type { Result } from "../types/error/usp-error";
import { AuthenticationType, SessionAuthentication } from "../types/usp";

export const HEADER_SUBSCRIPTION_KEY = "Ocp-Apim-Subscription-Key";
export const HEADER_AUTHORIZATION = "Authorization";

/**
 * Turns the session credential into handshake headers. Azure AD credentials
 * are exchanged for a bearer token on every call.
 */
export async function resolveAuthenticationHeaders(
  authentication: SessionAuthentication,
  connectionId: string,
): Promise<Result<Record<string, string>>> {
  switch (authentication.type) {
    case AuthenticationType.SubscriptionKey:
      return { success: true, value: { [HEADER_SUBSCRIPTION_KEY]: authentication.value } };
    case AuthenticationType.AuthorizationToken:
      return { success: true, value: { [HEADER_AUTHORIZATION]: `Bearer ${authentication.value}` } };
    case AuthenticationType.AzureAD: {
      try {
        const token = await authentication.credential.getToken(authentication.scope);
        if (!token) {
          return {
            success: false,
            error: createUspError({
              kind: "connection",
              code: ErrorCode.AuthenticationError,
              message: `No access token was issued for scope ${authentication.scope}`,
              connectionId,
            }),
          };
        }
        return { success: true, value: { [HEADER_AUTHORIZATION]: `Bearer ${token.token}` } };
      } catch (error: unknown) {
        return {
          success: false,
          error: wrapError({
            kind: "connection",
            code: ErrorCode.AuthenticationError,
            error,
            connectionId,
          }),
        };
      }
    }
  }
}
