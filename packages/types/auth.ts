/**
 * Canonical credential and principal types
 *
 * RawCredential is what the extractors parse out of request headers, before
 * any verification. Principal is what the authorization pipeline hands to
 * request handlers once a credential has been accepted.
 */

import type { ValidatedClaims } from '@security/jwt';

// ============================================================================
// Raw credentials (parsed, not yet verified)
// ============================================================================

export interface ApiKeyCredential {
  type: 'api-key';
  value: string;
}

export interface BasicAuthCredential {
  type: 'basic';
  username: string;
  /** Undefined when the decoded pair carries no ':' */
  password?: string | undefined;
}

export interface BearerTokenCredential {
  type: 'bearer';
  token: string;
}

export type RawCredential = ApiKeyCredential | BasicAuthCredential | BearerTokenCredential;

export type CredentialType = RawCredential['type'];

// ============================================================================
// Principals (verified)
// ============================================================================

export interface ApiKeyPrincipal {
  type: 'api-key';
  apiKey: string;
}

export interface BasicAuthPrincipal {
  type: 'basic';
  username: string;
  password?: string | undefined;
}

export interface JwtPrincipal<C = unknown> {
  type: 'jwt';
  token: string;
  claims: ValidatedClaims<C>;
}

export type Principal<C = unknown> = ApiKeyPrincipal | BasicAuthPrincipal | JwtPrincipal<C>;

/**
 * Header record as exposed by Node and Fastify (lower-cased names)
 */
export type RequestHeaders = Readonly<Record<string, string | string[] | undefined>>;

// ============================================================================
// Role helpers
// ============================================================================

/**
 * Check if a role list contains at least one of the allowed roles
 */
export function hasAnyRole(roles: readonly string[], allowedRoles: readonly string[]): boolean {
  return roles.some(role => allowedRoles.includes(role));
}
