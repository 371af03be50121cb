import { AuthError, type AuthChallenge } from '@errors';
import type {
  ApiKeyCredential,
  BasicAuthCredential,
  BearerTokenCredential,
  RequestHeaders,
} from '@packages/types/auth';

/**
* Credential Extractors
*
* Pure parsing of request headers into raw credentials. Nothing here checks
* whether a credential is *correct*; that is the pipeline's job. Every failure
* is an AuthError, nothing else is thrown.
*/

// ============================================================================
// Constants
// ============================================================================

const AUTHORIZATION_HEADER = 'authorization';

// Header values that would survive conversion to visible ASCII text
// (HTAB, SP and 0x21-0x7E)
const HEADER_TEXT_REGEX = /^[\t\x20-\x7e]*$/;

// Standard alphabet, padded, no whitespace
const BASE64_REGEX = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

// ============================================================================
// Header helpers
// ============================================================================

/**
* Read a header as text. Repeated headers yield their first value.
* @returns undefined when absent
* @throws {AuthError} MALFORMED_CREDENTIAL when the value is not header text
*/
function readHeaderText(
  headers: RequestHeaders,
  name: string,
  challenge?: AuthChallenge
): string | undefined {
  const raw = headers[name.toLowerCase()];
  const value = Array.isArray(raw) ? raw[0] : raw;

  if (value === undefined) {
    return undefined;
  }

  if (!HEADER_TEXT_REGEX.test(value)) {
    throw AuthError.malformedCredential(`Header ${name} contains invalid characters`, challenge);
  }

  return value;
}

/**
* Split "<scheme> <rest>" on the first space and require an exact scheme match.
*/
function stripScheme(authorization: string, scheme: AuthChallenge): string {
  const separator = authorization.indexOf(' ');
  if (separator === -1 || authorization.slice(0, separator) !== scheme) {
    throw AuthError.malformedCredential(`Authorization header is not ${scheme}`, scheme);
  }
  return authorization.slice(separator + 1);
}

function readAuthorization(headers: RequestHeaders, scheme: AuthChallenge): string {
  const authorization = readHeaderText(headers, AUTHORIZATION_HEADER, scheme);
  if (authorization === undefined) {
    throw AuthError.missingCredential('Authorization header not found', scheme);
  }
  return authorization;
}

// ============================================================================
// Extractors
// ============================================================================

/**
* Extract an API key from the configured header.
*
* @param headerName - Header carrying the key (case-insensitive)
* @throws {AuthError} MISSING_CREDENTIAL or MALFORMED_CREDENTIAL
*/
export function extractApiKey(headers: RequestHeaders, headerName: string): ApiKeyCredential {
  const value = readHeaderText(headers, headerName);

  if (value === undefined) {
    throw AuthError.missingCredential(`API key header ${headerName} not found`);
  }

  return { type: 'api-key', value };
}

/**
* Extract a Basic credential pair from the Authorization header.
*
* The decoded text is split on the first ':'; without one the whole text is
* the username and the password is absent.
*
* @throws {AuthError} MISSING_CREDENTIAL, MALFORMED_CREDENTIAL or DECODE_FAILURE
*/
export function extractBasicAuth(headers: RequestHeaders): BasicAuthCredential {
  const encoded = stripScheme(readAuthorization(headers, 'Basic'), 'Basic');

  if (!BASE64_REGEX.test(encoded)) {
    throw AuthError.decodeFailure('Authorization header could not be decoded as base64', 'Basic');
  }

  let decoded: string;
  try {
    decoded = utf8Decoder.decode(Buffer.from(encoded, 'base64'));
  } catch (error) {
    throw AuthError.decodeFailure('Decoded authorization header is not valid UTF-8', 'Basic', error);
  }

  const separator = decoded.indexOf(':');
  if (separator === -1) {
    return { type: 'basic', username: decoded, password: undefined };
  }

  return {
    type: 'basic',
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

/**
* Extract a bearer token from the Authorization header.
*
* @throws {AuthError} MISSING_CREDENTIAL or MALFORMED_CREDENTIAL
*/
export function extractBearerToken(headers: RequestHeaders): BearerTokenCredential {
  const token = stripScheme(readAuthorization(headers, 'Bearer'), 'Bearer');
  return { type: 'bearer', token };
}

/**
* Encode a Basic credential pair as an Authorization header value
*/
export function encodeBasicAuth(username: string, password?: string): string {
  const pair = password === undefined ? username : `${username}:${password}`;
  return `Basic ${Buffer.from(pair, 'utf8').toString('base64')}`;
}
