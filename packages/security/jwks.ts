import { z } from 'zod';

import { getErrorMessage } from '@errors';
import { getLogger } from '@kernel/logger';

const logger = getLogger('jwks');

/**
* Key Set Cache
*
* Holds the JSON Web Key Set used to verify bearer tokens. The set is fetched
* once at startup (a failure there is fatal) and refreshed lazily: a read
* that finds the snapshot older than its TTL fetches a new one before
* answering. A failed refresh is logged and the stale snapshot is served.
*
* Snapshots are immutable and swapped by a single reference assignment, so a
* reader always sees one complete key set. Concurrent stale reads may each
* trigger a fetch; the last one to resolve wins.
*/

// ============================================================================
// Schemas
// ============================================================================

export const JsonWebKeySchema = z.object({
  kty: z.string().min(1),
  kid: z.string().min(1).optional(),
  alg: z.string().optional(),
  use: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
}).passthrough();

export const JsonWebKeySetSchema = z.object({
  keys: z.array(JsonWebKeySchema),
});

export type JsonWebKey = z.infer<typeof JsonWebKeySchema>;

// ============================================================================
// Types
// ============================================================================

export interface KeySetSnapshot {
  /** Keys indexed by kid */
  readonly keys: ReadonlyMap<string, JsonWebKey>;
  /** Epoch ms of the fetch that produced this snapshot */
  readonly fetchedAt: number;
}

export interface FetchInit {
  headers: Record<string, string>;
  signal: AbortSignal;
}

/** Minimal fetch signature; the global fetch satisfies it */
export type FetchFn = (url: string, init: FetchInit) => Promise<Response>;

export interface KeySetCacheOptions {
  jwksUri: string;
  ttlSeconds: number;
  /** @default 5000 */
  fetchTimeoutMs?: number | undefined;
  fetch?: FetchFn | undefined;
  /** Epoch ms clock */
  now?: (() => number) | undefined;
}

export type KeySetErrorCode = 'KEY_SET_FETCH_FAILED' | 'KEY_SET_INVALID';

export class KeySetError extends Error {
  constructor(
    message: string,
    public readonly code: KeySetErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'KeySetError';
  }
}

const DEFAULT_FETCH_TIMEOUT_MS = 5000;

/** Map that refuses writes once sealed */
class SealedKeyMap extends Map<string, JsonWebKey> {
  private sealed = false;

  seal(): this {
    this.sealed = true;
    Object.freeze(this);
    return this;
  }

  override set(kid: string, key: JsonWebKey): this {
    this.assertWritable();
    return super.set(kid, key);
  }

  override delete(kid: string): boolean {
    this.assertWritable();
    return super.delete(kid);
  }

  override clear(): void {
    this.assertWritable();
    super.clear();
  }

  private assertWritable(): void {
    if (this.sealed) {
      throw new TypeError('Key set snapshots are read-only');
    }
  }
}

// ============================================================================
// Fetching
// ============================================================================

/**
* Fetch and parse a key set document.
* @throws {KeySetError}
*/
export async function fetchKeySet(
  jwksUri: string,
  fetchFn: FetchFn,
  timeoutMs: number,
  now: () => number
): Promise<KeySetSnapshot> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let body: unknown;
  try {
    const response = await fetchFn(jwksUri, {
      headers: { Accept: 'application/json' },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new KeySetError(
        `Failed to fetch key set from ${jwksUri}: HTTP ${response.status}`,
        'KEY_SET_FETCH_FAILED'
      );
    }

    try {
      body = await response.json();
    } catch (error) {
      throw new KeySetError(
        `Failed to parse key set from ${jwksUri}: ${getErrorMessage(error)}`,
        'KEY_SET_INVALID',
        { cause: error }
      );
    }
  } catch (error) {
    if (error instanceof KeySetError) {
      throw error;
    }
    throw new KeySetError(
      `Failed to fetch key set from ${jwksUri}: ${getErrorMessage(error)}`,
      'KEY_SET_FETCH_FAILED',
      { cause: error }
    );
  } finally {
    clearTimeout(timeout);
  }

  const parsed = JsonWebKeySetSchema.safeParse(body);
  if (!parsed.success) {
    throw new KeySetError(
      `Failed to parse key set from ${jwksUri}: ${parsed.error.message}`,
      'KEY_SET_INVALID',
      { cause: parsed.error }
    );
  }

  const keys = new SealedKeyMap();
  for (const key of parsed.data.keys) {
    if (key.kid === undefined) {
      logger.debug('Skipping key without kid', { kty: key.kty });
      continue;
    }
    keys.set(key.kid, Object.freeze(key));
  }

  return Object.freeze({ keys: keys.seal(), fetchedAt: now() });
}

// ============================================================================
// KeySetCache
// ============================================================================

export class KeySetCache {
  private current: KeySetSnapshot;
  private readonly jwksUri: string;
  private readonly ttlMs: number;
  private readonly fetchTimeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  private constructor(options: KeySetCacheOptions, initial: KeySetSnapshot, fetchFn: FetchFn, now: () => number) {
    this.jwksUri = options.jwksUri;
    this.ttlMs = options.ttlSeconds * 1000;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.fetchFn = fetchFn;
    this.now = now;
    this.current = initial;
  }

  /**
  * Build a cache with its first snapshot.
  * @throws {KeySetError} when the initial fetch fails
  */
  static async create(options: KeySetCacheOptions): Promise<KeySetCache> {
    const fetchFn: FetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    const now = options.now ?? Date.now;

    const initial = await fetchKeySet(
      options.jwksUri,
      fetchFn,
      options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
      now
    );

    logger.info('Key set loaded', { jwksUri: options.jwksUri, keyCount: initial.keys.size });
    return new KeySetCache(options, initial, fetchFn, now);
  }

  /**
  * Current snapshot, refreshed first when older than the TTL.
  * Never rejects: a failed refresh yields the stale snapshot.
  */
  async snapshot(): Promise<KeySetSnapshot> {
    if (!this.isStale()) {
      return this.current;
    }

    try {
      return await this.refresh();
    } catch (error) {
      logger.error('Failed to refresh key set, serving stale keys', error instanceof Error ? error : undefined, {
        jwksUri: this.jwksUri,
        ageMs: this.now() - this.current.fetchedAt,
      });
      return this.current;
    }
  }

  /**
  * Fetch now, regardless of age.
  * @throws {KeySetError} the previous snapshot stays in place
  */
  async refresh(): Promise<KeySetSnapshot> {
    const next = await fetchKeySet(this.jwksUri, this.fetchFn, this.fetchTimeoutMs, this.now);
    this.current = next;
    logger.debug('Key set refreshed', { jwksUri: this.jwksUri, keyCount: next.keys.size });
    return next;
  }

  /** Snapshot without any refresh */
  peek(): KeySetSnapshot {
    return this.current;
  }

  isStale(): boolean {
    return this.now() - this.current.fetchedAt > this.ttlMs;
  }
}
