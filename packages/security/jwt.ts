import { createPublicKey, type KeyObject } from 'crypto';
import jwt, { type Algorithm, type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';

import { AuthError, getErrorMessage, type AuthChallenge } from '@errors';
import { hasAnyRole } from '@packages/types/auth';

import type { KeySetSnapshot } from './jwks';

/**
* JWT Verification
*
* Verifies a bearer token against the current key set snapshot. The steps run
* in a fixed order and stop at the first failure:
*
*   1. decode the header (no verification) and read its kid
*   2. find the key with that kid
*   3. require an RSA key
*   4. build a public key from its modulus and exponent
*   5. take the algorithm from the key, never from the token
*   6. verify signature, expiry, not-before, audience and issuer
*   7. classify the failure (expired vs invalid)
*   8. validate the payload shape
*
* Only step 8 is reported as an internal error: a well-signed token whose
* claims the service cannot read points at a misconfigured schema, not at
* the caller.
*/

// ============================================================================
// Schemas
// ============================================================================

/** Registered claims; everything else is passed through */
export const RegisteredClaimsSchema = z.object({
  iss: z.string().optional(),
  sub: z.string().optional(),
  aud: z.union([z.string(), z.array(z.string())]).optional(),
  exp: z.number(),
  nbf: z.number().optional(),
  iat: z.number().optional(),
  jti: z.string().optional(),
}).passthrough();

export type RegisteredClaims = z.infer<typeof RegisteredClaimsSchema>;

export type ClaimsSchema<C> = z.ZodType<C, z.ZodTypeDef, unknown>;

// ============================================================================
// Algorithms
// ============================================================================

const RSA_ALGORITHMS = ['RS256', 'RS384', 'RS512', 'PS256', 'PS384', 'PS512'] as const satisfies readonly Algorithm[];

export type RsaAlgorithm = typeof RSA_ALGORITHMS[number];

/**
* Map a JWK "alg" value to a supported verification algorithm
*/
export function toRsaAlgorithm(alg: string | undefined): RsaAlgorithm | undefined {
  return RSA_ALGORITHMS.find(candidate => candidate === alg);
}

// ============================================================================
// ValidatedClaims
// ============================================================================

const VERIFIED: unique symbol = Symbol('ValidatedClaims');

/**
* Claims that passed verification. Only verifyJwt() can construct one.
*/
export class ValidatedClaims<C> {
  readonly claims: C;
  readonly kid: string;
  readonly expiresAt: Date;

  constructor(issuer: typeof VERIFIED, claims: C, kid: string, expiresAt: Date) {
    if (issuer !== VERIFIED) {
      throw new TypeError('ValidatedClaims can only be produced by verifyJwt');
    }
    this.claims = claims;
    this.kid = kid;
    this.expiresAt = expiresAt;
    Object.freeze(this);
  }
}

// ============================================================================
// Verification
// ============================================================================

export interface JwtVerifyOptions<C> {
  /** Accepted audiences; at least one */
  audiences: readonly string[];
  /** Accepted issuers; at least one */
  issuers: readonly string[];
  /** @default true */
  validateNotBefore?: boolean | undefined;
  /** @default 0 */
  clockToleranceSeconds?: number | undefined;
  claimsSchema: ClaimsSchema<C>;
}

function toPublicKey(n: string, e: string): KeyObject {
  return createPublicKey({ key: { kty: 'RSA', n, e }, format: 'jwk' });
}

/**
* Verify a token and return its validated claims.
*
* @throws {AuthError} TOKEN_INVALID, TOKEN_EXPIRED, or INTERNAL_ERROR when the
* payload does not match claimsSchema
*/
export function verifyJwt<C>(
  token: string,
  snapshot: KeySetSnapshot,
  options: JwtVerifyOptions<C>
): ValidatedClaims<C> {
  const [firstAudience, ...otherAudiences] = options.audiences;
  const [firstIssuer, ...otherIssuers] = options.issuers;
  if (firstAudience === undefined || firstIssuer === undefined) {
    throw AuthError.internal('Token verification requires at least one audience and one issuer');
  }

  const decoded = jwt.decode(token, { complete: true });
  if (decoded === null) {
    throw AuthError.tokenInvalid('Token could not be decoded');
  }

  // Header JSON is caller-controlled: kid may be null or a number despite its type
  const kid: unknown = decoded.header.kid;
  if (typeof kid !== 'string' || kid.length === 0) {
    throw AuthError.tokenInvalid('Token header has no kid');
  }

  const key = snapshot.keys.get(kid);
  if (key === undefined) {
    throw AuthError.tokenInvalid(`No matching key found for kid ${kid}`, undefined, { kid });
  }

  if (key.kty !== 'RSA') {
    throw AuthError.tokenInvalid(`Unsupported key type ${key.kty}`, undefined, { kid });
  }

  if (key.n === undefined || key.e === undefined) {
    throw AuthError.tokenInvalid('Key has no RSA modulus or exponent', undefined, { kid });
  }

  let publicKey: KeyObject;
  try {
    publicKey = toPublicKey(key.n, key.e);
  } catch (error) {
    throw AuthError.tokenInvalid('Key could not be converted to a public key', error, { kid });
  }

  const algorithm = toRsaAlgorithm(key.alg);
  if (algorithm === undefined) {
    throw AuthError.tokenInvalid(`Unsupported key algorithm ${key.alg ?? 'none'}`, undefined, { kid });
  }

  let payload: string | JwtPayload;
  try {
    payload = jwt.verify(token, publicKey, {
      algorithms: [algorithm],
      audience: [firstAudience, ...otherAudiences],
      issuer: [firstIssuer, ...otherIssuers],
      ignoreNotBefore: options.validateNotBefore === false,
      clockTolerance: options.clockToleranceSeconds ?? 0,
    });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw AuthError.tokenExpired(error.expiredAt, error);
    }
    throw AuthError.tokenInvalid(getErrorMessage(error), error, { kid });
  }

  if (typeof payload === 'string') {
    throw AuthError.tokenInvalid('Token payload is not a JSON object', undefined, { kid });
  }

  if (payload.exp === undefined) {
    throw AuthError.tokenInvalid('Token is missing required claim: exp', undefined, { kid });
  }

  const parsed = options.claimsSchema.safeParse(payload);
  if (!parsed.success) {
    throw AuthError.internal('Token claims do not match the expected shape', parsed.error, {
      kid,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return new ValidatedClaims(VERIFIED, parsed.data, kid, new Date(payload.exp * 1000));
}

// ============================================================================
// Roles
// ============================================================================

const RolesClaimSchema = z.object({ roles: z.array(z.string()) });
const RoleClaimSchema = z.object({ role: z.string() });

/**
* Read roles from a "roles" array claim, or a single "role" claim
*/
export function rolesFromClaims(claims: unknown): string[] {
  const many = RolesClaimSchema.safeParse(claims);
  if (many.success) {
    return many.data.roles;
  }
  const one = RoleClaimSchema.safeParse(claims);
  return one.success ? [one.data.role] : [];
}

/**
* Require at least one of the allowed roles.
* @throws {AuthError} INSUFFICIENT_ROLE
*/
export function requireRole(
  roles: readonly string[],
  allowedRoles: readonly string[],
  challenge: AuthChallenge = 'Bearer'
): void {
  if (!hasAnyRole(roles, allowedRoles)) {
    throw AuthError.insufficientRole(allowedRoles, challenge);
  }
}
