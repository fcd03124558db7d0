import { Logger } from '@nestjs/common';
import { isRecord, LooseRecord } from '../../utils/coerce.util';

const SAFETY_MARGIN_SECONDS = 60;
const DEFAULT_LIFETIME_SECONDS = 1740;
const MILLISECONDS_THRESHOLD = 1e10;

export interface AccessTokenGrant {
  accessToken: string;
  expiresAt: number; // epoch ms, safety margin already applied
}

export type AccessTokenFetcher = () => Promise<AccessTokenGrant>;

/**
 * Expiry of an OAuth token payload in epoch ms, minus a 60 s margin.
 *
 * expires_in is seconds from now; expires_at is an epoch timestamp in
 * seconds or milliseconds (values above 1e10 are milliseconds).
 */
export function tokenExpiresAt(payload: LooseRecord, nowMs: number): number {
  const { expires_in: expiresIn, expires_at: expiresAt } = payload;

  if (typeof expiresIn === 'number' && expiresIn > 0) {
    return nowMs + (expiresIn - SAFETY_MARGIN_SECONDS) * 1000;
  }
  if (typeof expiresAt === 'number' && expiresAt > 0) {
    const atMs =
      expiresAt > MILLISECONDS_THRESHOLD ? expiresAt : expiresAt * 1000;
    return atMs - SAFETY_MARGIN_SECONDS * 1000;
  }
  return nowMs + DEFAULT_LIFETIME_SECONDS * 1000;
}

/** Read access_token and its expiry from a token endpoint body. */
export function parseTokenPayload(
  body: unknown,
  nowMs: number,
): AccessTokenGrant | null {
  if (!isRecord(body) || typeof body.access_token !== 'string') {
    return null;
  }
  return {
    accessToken: body.access_token,
    expiresAt: tokenExpiresAt(body, nowMs),
  };
}

/**
 * Caches one access token. Concurrent callers share a single in-flight
 * fetch; a failed fetch is reported to every waiter and not cached.
 */
export class AccessTokenManager {
  private readonly logger = new Logger(AccessTokenManager.name);

  private cachedToken: { token: string; expiresAt: number } | null = null;
  private inFlight: Promise<string> | null = null;

  constructor(
    private readonly fetchToken: AccessTokenFetcher,
    private readonly now: () => number = Date.now,
  ) {}

  async getToken(): Promise<string> {
    if (this.cachedToken && this.cachedToken.expiresAt > this.now()) {
      return this.cachedToken.token;
    }

    if (!this.inFlight) {
      this.logger.debug('[Token Manager] Fetching new access token');
      this.inFlight = this.fetchToken()
        .then((grant) => {
          this.cachedToken = {
            token: grant.accessToken,
            expiresAt: grant.expiresAt,
          };
          return grant.accessToken;
        })
        .finally(() => {
          this.inFlight = null;
        });
    }

    return this.inFlight;
  }

  /** Drop the cached token so the next call fetches a fresh one. */
  invalidate(): void {
    this.cachedToken = null;
  }
}
