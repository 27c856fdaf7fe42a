/**
 * Path vocabularies and endpoint classifiers.
 *
 * All predicates are pure and case-insensitive.
 */

const LOGIN_HINTS = /(login|signin|auth|token|session|oauth|sso|authenticate)/i;

const IDENTITY_HINTS = /(whoami|profile|account|user|users|customer|customers|admin|member)/i;

const API_HINTS = /(\/api\/|\/rest\/|\/graphql|\/v\d+\/|\.json|\.xml)/i;

const SENSITIVE_ENDPOINTS =
  /(\/export|\/download|\/backup|\/dump|\/database|\/admin\/users|\/api\/users|\.sql|\.db|\.bak)/i;

const SESSION_PARAMS = /(session|sessionid|sid|jsessionid|phpsessid)/i;

/** Login, token, session or SSO endpoints. */
export function isLoginPath(path: string): boolean {
  return LOGIN_HINTS.test(path);
}

/** Identity, profile, account or user endpoints. */
export function isIdentityPath(path: string): boolean {
  return IDENTITY_HINTS.test(path);
}

export function isApiEndpoint(path: string): boolean {
  return API_HINTS.test(path);
}

/** Endpoints that export or expose bulk data. */
export function isSensitiveEndpoint(path: string): boolean {
  return SENSITIVE_ENDPOINTS.test(path);
}

export function hasSessionParameter(url: string): boolean {
  return SESSION_PARAMS.test(url);
}
