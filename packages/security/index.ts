/**
 * Security Package
 * Credential extraction, key set caching, token verification and the authorization pipeline
 */

// Credential extraction
export {
  extractApiKey,
  extractBasicAuth,
  extractBearerToken,
  encodeBasicAuth,
} from './extractors';

// Allow-list providers
export {
  constantTimeCompare,
  StaticApiKeyProvider,
  StaticBasicAuthProvider,
  type ApiKeyProvider,
  type BasicAuthProvider,
} from './providers';

// Key set cache
export {
  KeySetCache,
  KeySetError,
  fetchKeySet,
  JsonWebKeySchema,
  JsonWebKeySetSchema,
  type JsonWebKey,
  type KeySetSnapshot,
  type KeySetCacheOptions,
  type KeySetErrorCode,
  type FetchFn,
  type FetchInit,
} from './jwks';

// JWT verification
export {
  verifyJwt,
  requireRole,
  rolesFromClaims,
  toRsaAlgorithm,
  ValidatedClaims,
  RegisteredClaimsSchema,
  type RegisteredClaims,
  type ClaimsSchema,
  type JwtVerifyOptions,
  type RsaAlgorithm,
} from './jwt';

// OpenID discovery
export {
  fetchOpenIdConfiguration,
  resolveJwksUri,
  discoveryUrl,
  DiscoveryError,
  OpenIdConfigurationSchema,
  type OpenIdConfiguration,
  type DiscoveryOptions,
} from './openid-configuration';

// Pipeline
export {
  AuthorizationPipeline,
  type AuthDecision,
  type AuthorizationPipelineOptions,
  type JwtPipelineOptions,
} from './pipeline';
