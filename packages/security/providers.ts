import { timingSafeEqual } from 'crypto';

import type { BasicAuthUser } from '@config';

/**
* Credential providers
*
* The allow-list oracle the authorization pipeline consults for API keys and
* Basic pairs. A provider answers true/false; if it cannot answer (backing
* store down) it throws, and the pipeline reports an internal error instead
* of a credential rejection.
*/

export interface ApiKeyProvider {
  validate(apiKey: string): Promise<boolean>;
}

export interface BasicAuthProvider {
  authenticate(username: string, password: string | undefined): Promise<boolean>;
}

/**
* Constant-time string comparison to prevent timing attacks.
* Two empty strings never match.
*/
export function constantTimeCompare(a: string, b: string): boolean {
  if (a.length === 0 || b.length === 0) {
    return false;
  }

  const aBuf = Buffer.from(a, 'utf8');
  const bBuf = Buffer.from(b, 'utf8');
  const maxLen = Math.max(aBuf.length, bBuf.length);

  const aPadded = Buffer.alloc(maxLen, 0);
  const bPadded = Buffer.alloc(maxLen, 0);
  aBuf.copy(aPadded);
  bBuf.copy(bPadded);

  return timingSafeEqual(aPadded, bPadded) && aBuf.length === bBuf.length;
}

/**
* API key allow-list from configuration.
* Every configured key is compared so timing does not reveal list position.
*/
export class StaticApiKeyProvider implements ApiKeyProvider {
  private readonly keys: readonly string[];

  constructor(keys: readonly string[]) {
    this.keys = [...keys];
  }

  async validate(apiKey: string): Promise<boolean> {
    let matched = false;
    for (const key of this.keys) {
      if (constantTimeCompare(apiKey, key)) {
        matched = true;
      }
    }
    return matched;
  }
}

/**
* Basic auth users from configuration. A pair without a password never matches.
*/
export class StaticBasicAuthProvider implements BasicAuthProvider {
  private readonly users: readonly BasicAuthUser[];

  constructor(users: readonly BasicAuthUser[]) {
    this.users = users.map(user => ({ ...user }));
  }

  async authenticate(username: string, password: string | undefined): Promise<boolean> {
    if (password === undefined) {
      return false;
    }

    let matched = false;
    for (const user of this.users) {
      const usernameMatches = constantTimeCompare(username, user.username);
      const passwordMatches = constantTimeCompare(password, user.password);
      if (usernameMatches && passwordMatches) {
        matched = true;
      }
    }
    return matched;
  }
}
