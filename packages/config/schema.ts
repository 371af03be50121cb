/**
 * Authentication Environment Schema
 *
 * Zod schema for every environment variable the auth layer reads.
 * Used by loadAuthConfig() for fail-fast boot validation.
 *
 * @module @config/schema
 */

import { z } from 'zod';

import { ERROR_VERBOSITIES } from '@errors';

// ============================================================================
// Reusable validators
// ============================================================================

/** Comma-separated list; blank entries dropped */
const commaList = z
  .string()
  .optional()
  .transform((value) => (value ?? '').split(',').map(s => s.trim()).filter(Boolean));

/** Only explicit true/false/1/0 are accepted */
const boolFlag = (defaultValue: boolean) => z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1'));

// RFC 9110 token characters
const headerName = z
  .string()
  .regex(/^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/, { message: 'Not a valid HTTP header name' })
  .transform((value) => value.toLowerCase());

const basicAuthUser = z
  .string()
  .regex(/^[^:]+:.*$/, { message: 'Basic auth users must be written as user:password' })
  .transform((entry) => {
    const separator = entry.indexOf(':');
    return { username: entry.slice(0, separator), password: entry.slice(separator + 1) };
  });

// ============================================================================
// Environment schema
// ============================================================================

export const authEnvSchema = z.object({
  ERROR_VERBOSITY: z.enum(ERROR_VERBOSITIES).default('message'),

  // -- API keys --
  API_KEY_HEADER: headerName.default('x-api-key'),
  API_KEYS: commaList,

  // -- Basic auth --
  BASIC_AUTH_USERS: commaList.pipe(z.array(basicAuthUser)),

  // -- JWT --
  JWT_ISSUER: commaList,
  JWT_AUDIENCE: commaList,
  JWKS_URI: z.string().url().optional(),
  JWKS_TTL_SECONDS: z.coerce.number().int().nonnegative().default(300),
  JWKS_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  JWT_VALIDATE_NOT_BEFORE: boolFlag(true),
  JWT_CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().nonnegative().default(0),
}).superRefine((env, ctx) => {
  if (env.JWT_ISSUER.length > 0 && env.JWT_AUDIENCE.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['JWT_AUDIENCE'],
      message: 'JWT_AUDIENCE is required when JWT_ISSUER is set',
    });
  }
  if (env.JWKS_URI !== undefined && env.JWT_ISSUER.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['JWT_ISSUER'],
      message: 'JWT_ISSUER is required when JWKS_URI is set',
    });
  }
});

export type AuthEnv = z.infer<typeof authEnvSchema>;
