import type { AuthConfig } from '@config';
import { AuthError, toAuthError } from '@errors';
import { getLogger } from '@kernel/logger';
import type {
  ApiKeyPrincipal,
  BasicAuthPrincipal,
  CredentialType,
  JwtPrincipal,
  Principal,
  RequestHeaders,
} from '@packages/types/auth';

import { extractApiKey, extractBasicAuth, extractBearerToken } from './extractors';
import type { KeySetCache } from './jwks';
import { RegisteredClaimsSchema, verifyJwt, type ClaimsSchema, type RegisteredClaims } from './jwt';
import {
  StaticApiKeyProvider,
  StaticBasicAuthProvider,
  type ApiKeyProvider,
  type BasicAuthProvider,
} from './providers';

const logger = getLogger('auth-pipeline');

/**
* Authorization Pipeline
*
* Runs extraction then verification for one scheme and hands back a
* principal. The first failure wins; anything thrown that is not an
* AuthError becomes INTERNAL_ERROR. Holds no per-request state.
*/

export type AuthDecision<P = Principal> =
  | { ok: true; principal: P }
  | { ok: false; error: AuthError };

export interface JwtPipelineOptions {
  audiences: readonly string[];
  issuers: readonly string[];
  validateNotBefore: boolean;
  clockToleranceSeconds: number;
}

export interface AuthorizationPipelineOptions {
  /** @default 'x-api-key' */
  apiKeyHeader?: string | undefined;
  apiKeyProvider?: ApiKeyProvider | undefined;
  basicAuthProvider?: BasicAuthProvider | undefined;
  keySetCache?: KeySetCache | undefined;
  jwt?: JwtPipelineOptions | undefined;
}

export class AuthorizationPipeline {
  /** Lower-cased header carrying the API key */
  readonly apiKeyHeader: string;
  private readonly apiKeyProvider: ApiKeyProvider | undefined;
  private readonly basicAuthProvider: BasicAuthProvider | undefined;
  private readonly keySetCache: KeySetCache | undefined;
  private readonly jwt: JwtPipelineOptions | undefined;

  constructor(options: AuthorizationPipelineOptions) {
    this.apiKeyHeader = (options.apiKeyHeader ?? 'x-api-key').toLowerCase();
    this.apiKeyProvider = options.apiKeyProvider;
    this.basicAuthProvider = options.basicAuthProvider;
    this.keySetCache = options.keySetCache;
    this.jwt = options.jwt;
  }

  /**
  * Pipeline backed by the configured allow-lists
  */
  static fromConfig(config: AuthConfig, keySetCache?: KeySetCache): AuthorizationPipeline {
    return new AuthorizationPipeline({
      apiKeyHeader: config.apiKey.headerName,
      apiKeyProvider: new StaticApiKeyProvider(config.apiKey.keys),
      basicAuthProvider: new StaticBasicAuthProvider(config.basicAuth.users),
      keySetCache,
      jwt: config.jwt,
    });
  }

  async authenticateApiKey(headers: RequestHeaders): Promise<ApiKeyPrincipal> {
    const credential = extractApiKey(headers, this.apiKeyHeader);

    if (this.apiKeyProvider === undefined) {
      throw AuthError.internal('API key authentication is not configured');
    }

    let valid: boolean;
    try {
      valid = await this.apiKeyProvider.validate(credential.value);
    } catch (error) {
      throw AuthError.internal('API key provider failed', error);
    }

    if (!valid) {
      throw AuthError.invalidCredential('API key is not valid');
    }

    return { type: 'api-key', apiKey: credential.value };
  }

  async authenticateBasicAuth(headers: RequestHeaders): Promise<BasicAuthPrincipal> {
    const credential = extractBasicAuth(headers);

    if (this.basicAuthProvider === undefined) {
      throw AuthError.internal('Basic authentication is not configured');
    }

    let valid: boolean;
    try {
      valid = await this.basicAuthProvider.authenticate(credential.username, credential.password);
    } catch (error) {
      throw AuthError.internal('Basic auth provider failed', error, { username: credential.username });
    }

    if (!valid) {
      throw AuthError.invalidCredential('Username or password is not valid', 'Basic');
    }

    return { type: 'basic', username: credential.username, password: credential.password };
  }

  authenticateBearer(headers: RequestHeaders): Promise<JwtPrincipal<RegisteredClaims>>;
  authenticateBearer<C>(headers: RequestHeaders, schema: ClaimsSchema<C>): Promise<JwtPrincipal<C>>;
  authenticateBearer<C>(
    headers: RequestHeaders,
    schema?: ClaimsSchema<C>
  ): Promise<JwtPrincipal<C> | JwtPrincipal<RegisteredClaims>> {
    if (schema === undefined) {
      return this.verifyBearer(headers, RegisteredClaimsSchema);
    }
    return this.verifyBearer(headers, schema);
  }

  /**
  * Authenticate with one scheme. Never rejects.
  */
  async authorize(headers: RequestHeaders, scheme: CredentialType): Promise<AuthDecision> {
    try {
      switch (scheme) {
        case 'api-key':
          return { ok: true, principal: await this.authenticateApiKey(headers) };
        case 'basic':
          return { ok: true, principal: await this.authenticateBasicAuth(headers) };
        case 'bearer':
          return { ok: true, principal: await this.authenticateBearer(headers) };
      }
    } catch (error) {
      return { ok: false, error: toAuthError(error) };
    }
  }

  /**
  * Resolve to undefined instead of failing. The failure is still logged.
  */
  async optional<P>(attempt: Promise<P>): Promise<P | undefined> {
    try {
      return await attempt;
    } catch (error) {
      logger.debug('Optional authentication skipped', { kind: toAuthError(error).kind });
      return undefined;
    }
  }

  private async verifyBearer<C>(headers: RequestHeaders, schema: ClaimsSchema<C>): Promise<JwtPrincipal<C>> {
    const credential = extractBearerToken(headers);

    if (this.keySetCache === undefined || this.jwt === undefined) {
      throw AuthError.internal('Bearer authentication is not configured');
    }

    const snapshot = await this.keySetCache.snapshot();
    const claims = verifyJwt(credential.token, snapshot, { ...this.jwt, claimsSchema: schema });

    return { type: 'jwt', token: credential.token, claims };
  }
}
