import { z } from 'zod';

import { getErrorMessage } from '@errors';
import { getLogger } from '@kernel/logger';

import type { FetchFn } from './jwks';

const logger = getLogger('openid-configuration');

/**
* OpenID Provider discovery.
* Used at startup to find the key set location when only an issuer is configured.
*/

export const OpenIdConfigurationSchema = z.object({
  issuer: z.string().min(1),
  jwks_uri: z.string().url(),
  authorization_endpoint: z.string().optional(),
  token_endpoint: z.string().optional(),
  userinfo_endpoint: z.string().optional(),
  request_parameter_supported: z.boolean().optional(),
  request_uri_parameter_supported: z.boolean().optional(),
  id_token_signing_alg_values_supported: z.array(z.string()).optional(),
  response_types_supported: z.array(z.string()).optional(),
  scopes_supported: z.array(z.string()).optional(),
  claims_supported: z.array(z.string()).optional(),
  subject_types_supported: z.array(z.string()).optional(),
  grant_types_supported: z.array(z.string()).optional(),
  token_endpoint_auth_methods_supported: z.array(z.string()).optional(),
}).passthrough();

export type OpenIdConfiguration = z.infer<typeof OpenIdConfigurationSchema>;

export class DiscoveryError extends Error {
  readonly code = 'DISCOVERY_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DiscoveryError';
  }
}

const WELL_KNOWN_PATH = '.well-known/openid-configuration';

/**
* Discovery document URL for an issuer
*/
export function discoveryUrl(issuer: string): string {
  return issuer.endsWith('/') ? `${issuer}${WELL_KNOWN_PATH}` : `${issuer}/${WELL_KNOWN_PATH}`;
}

export interface DiscoveryOptions {
  /** @default 5000 */
  timeoutMs?: number | undefined;
  fetch?: FetchFn | undefined;
}

/**
* Fetch and validate an issuer's discovery document.
* @throws {DiscoveryError}
*/
export async function fetchOpenIdConfiguration(
  issuer: string,
  options: DiscoveryOptions = {}
): Promise<OpenIdConfiguration> {
  const url = discoveryUrl(issuer);
  const fetchFn: FetchFn = options.fetch ?? ((target, init) => fetch(target, init));
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? 5000);

  let body: unknown;
  try {
    const response = await fetchFn(url, {
      headers: { Accept: 'application/json' },
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new DiscoveryError(`Discovery request to ${url} failed: HTTP ${response.status}`);
    }
    body = await response.json();
  } catch (error) {
    if (error instanceof DiscoveryError) {
      throw error;
    }
    throw new DiscoveryError(`Discovery request to ${url} failed: ${getErrorMessage(error)}`, { cause: error });
  } finally {
    clearTimeout(timeout);
  }

  const parsed = OpenIdConfigurationSchema.safeParse(body);
  if (!parsed.success) {
    throw new DiscoveryError(`Discovery document from ${url} is invalid: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }

  if (parsed.data.issuer !== issuer) {
    logger.warn('Discovery document issuer differs from configured issuer', {
      configured: issuer,
      advertised: parsed.data.issuer,
    });
  }

  return parsed.data;
}

/**
* Key set location: the configured URI, else the one the first issuer advertises
*/
export async function resolveJwksUri(
  jwt: { issuers: readonly string[]; jwksUri?: string | undefined },
  options: DiscoveryOptions = {}
): Promise<string> {
  if (jwt.jwksUri !== undefined) {
    return jwt.jwksUri;
  }

  const [issuer] = jwt.issuers;
  if (issuer === undefined) {
    throw new DiscoveryError('No issuer configured to discover a key set from');
  }

  const configuration = await fetchOpenIdConfiguration(issuer, options);
  logger.info('Discovered key set location', { issuer, jwksUri: configuration.jwks_uri });
  return configuration.jwks_uri;
}
