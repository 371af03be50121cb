/**
 * Fastify reply helper for authentication failures.
 *
 * Every rejection produced by the auth preHandlers goes through sendAuthError
 * so the verbosity policy is applied in exactly one place.
 */

import type { FastifyReply } from 'fastify';
import { renderAuthError, type AuthError, type ErrorVerbosity } from './index';

/**
 * Render an AuthError with the given verbosity and send it.
 * Sets WWW-Authenticate when the error carries a challenge (except at 'none').
 */
export function sendAuthError(
  reply: FastifyReply,
  error: AuthError,
  verbosity: ErrorVerbosity
): FastifyReply {
  const rendered = renderAuthError(error, verbosity);

  for (const [name, value] of Object.entries(rendered.headers)) {
    reply.header(name, value);
  }

  reply.status(rendered.statusCode);
  return rendered.body === undefined ? reply.send() : reply.send(rendered.body);
}
