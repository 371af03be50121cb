import type { FastifyReply, FastifyRequest } from 'fastify';

import { sendAuthError, toAuthError, type ErrorVerbosity } from '@errors';
import { getLogger } from '@kernel/logger';
import { sanitizeHeaders } from '@kernel/redaction';
import { requireRole, rolesFromClaims, type AuthorizationPipeline, type ClaimsSchema } from '@security';
import type { Principal } from '@packages/types/auth';

/**
* Fastify authentication preHandlers
*
* Each guard runs one scheme through the pipeline. On success the principal
* is attached to request.principal; on failure the error is rendered with the
* configured verbosity and the route handler never runs.
*
* @example
* ```typescript
* const guards = { pipeline, verbosity: config.errorVerbosity };
* app.get('/books', { preHandler: requireApiKey(guards) }, handler);
* app.get('/me', { preHandler: requireJwt(guards, ProfileClaims, { roles: ['reader'] }) }, handler);
* ```
*/

const logger = getLogger('auth-middleware');

declare module 'fastify' {
  interface FastifyRequest {
    principal?: Principal;
  }
}

export interface AuthGuardContext {
  pipeline: AuthorizationPipeline;
  verbosity: ErrorVerbosity;
}

export type AuthPreHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | void>;

export interface RequireJwtOptions<C> {
  /** Principal must hold at least one of these */
  roles?: readonly string[] | undefined;
  /** Where roles live in the claims; defaults to a "roles" array or "role" string */
  rolesOf?: ((claims: C) => readonly string[]) | undefined;
}

function guard(
  context: AuthGuardContext,
  authenticate: (request: FastifyRequest) => Promise<Principal>
): AuthPreHandler {
  return async (request, reply) => {
    try {
      request.principal = await authenticate(request);
    } catch (error) {
      const authError = toAuthError(error);
      logger.debug('Authentication rejected', {
        method: request.method,
        url: request.url,
        kind: authError.kind,
        headers: sanitizeHeaders(request.headers, [context.pipeline.apiKeyHeader]),
      });
      return sendAuthError(reply, authError, context.verbosity);
    }
  };
}

export function requireApiKey(context: AuthGuardContext): AuthPreHandler {
  return guard(context, request => context.pipeline.authenticateApiKey(request.headers));
}

export function requireBasicAuth(context: AuthGuardContext): AuthPreHandler {
  return guard(context, request => context.pipeline.authenticateBasicAuth(request.headers));
}

export function requireJwt<C>(
  context: AuthGuardContext,
  claimsSchema: ClaimsSchema<C>,
  options: RequireJwtOptions<C> = {}
): AuthPreHandler {
  const { roles, rolesOf } = options;

  return guard(context, async request => {
    const principal = await context.pipeline.authenticateBearer(request.headers, claimsSchema);
    if (roles !== undefined) {
      const claims = principal.claims.claims;
      requireRole(rolesOf ? rolesOf(claims) : rolesFromClaims(claims), roles);
    }
    return principal;
  });
}

/**
* Attach an API key principal when one is presented and valid; never rejects
*/
export function optionalApiKey(context: AuthGuardContext): AuthPreHandler {
  return async request => {
    const principal = await context.pipeline.optional(context.pipeline.authenticateApiKey(request.headers));
    if (principal !== undefined) {
      request.principal = principal;
    }
  };
}
