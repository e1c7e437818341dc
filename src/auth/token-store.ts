/**
 * Token Store: sole owner of the CRM OAuth token pair
 *
 * - The pair lives in memory as one frozen object, replaced whole on every
 *   grant, so readers never see an access token from one grant next to a
 *   refresh token from another
 * - Persisted to a JSON file (mode 0600) via temp file + rename
 * - Refresh is single-flight: concurrent callers share one in-flight grant
 * - A missing or corrupt file, or a rejected refresh, puts the store in
 *   NEEDS_AUTH until a new authorization code is exchanged
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { AuthExpiredError, errorMessage } from '../errors.js';
import type { OAuthGrant, OAuthGrantClient } from './oauth-client.js';

export type TokenState = 'READY' | 'NEEDS_AUTH';

export interface OAuthToken {
  readonly accessToken: string;
  readonly refreshToken: string;
  readonly expiresAt: string;
  readonly updatedAt: string;
}

export interface TokenStatus {
  state: TokenState;
  expiresAt: string | null;
  reason: string | null;
}

const isoDate = z.string().refine(value => !Number.isNaN(Date.parse(value)), 'invalid date');

const TokenFileSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresAt: isoDate,
  updatedAt: isoDate,
});

export interface TokenStoreOptions {
  filePath: string;
  oauth: OAuthGrantClient;
  /** Refresh when the access token expires within this window */
  refreshMarginMs: number;
  now?: () => number;
}

type ReauthListener = () => void;

export class TokenStore {
  private token: OAuthToken | null = null;
  private needsAuthReason: string | null = 'not loaded';
  private inflight: Promise<OAuthToken> | null = null;
  private readonly reauthListeners: ReauthListener[] = [];
  private readonly now: () => number;

  constructor(private readonly options: TokenStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Read the persisted pair. Never throws: absence or corruption is a
   * NEEDS_AUTH state, logged with the authorize URL.
   */
  async load(): Promise<TokenState> {
    let raw: string;
    try {
      raw = await readFile(this.options.filePath, 'utf8');
    } catch (err) {
      const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
      return this.enterNeedsAuth(missing ? 'token file missing' : `token file unreadable: ${errorMessage(err)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return this.enterNeedsAuth('token file is not valid JSON');
    }

    const parsed = TokenFileSchema.safeParse(json);
    if (!parsed.success) {
      return this.enterNeedsAuth('token file has an unexpected shape');
    }

    this.token = Object.freeze({ ...parsed.data });
    this.needsAuthReason = null;
    console.log('[auth] Token pair loaded', { expiresAt: parsed.data.expiresAt });
    return 'READY';
  }

  state(): TokenState {
    return this.needsAuthReason === null && this.token ? 'READY' : 'NEEDS_AUTH';
  }

  status(): TokenStatus {
    return {
      state: this.state(),
      expiresAt: this.token?.expiresAt ?? null,
      reason: this.needsAuthReason,
    };
  }

  authorizeUrl(): string {
    return this.options.oauth.authorizeUrl();
  }

  /**
   * Current access token, refreshed first when it is inside the safety margin.
   * @throws AuthExpiredError in NEEDS_AUTH
   */
  async getAccessToken(): Promise<string> {
    const token = this.requireToken();
    if (Date.parse(token.expiresAt) - this.now() <= this.options.refreshMarginMs) {
      return (await this.refresh(token.accessToken)).accessToken;
    }
    return token.accessToken;
  }

  /**
   * Refresh the pair. When `staleAccessToken` is given and another caller has
   * already replaced it, the current pair is returned without a new grant.
   */
  async refresh(staleAccessToken?: string): Promise<OAuthToken> {
    const token = this.requireToken();
    if (staleAccessToken !== undefined && token.accessToken !== staleAccessToken) {
      return token;
    }

    if (!this.inflight) {
      this.inflight = this.runRefresh(token).finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /** First-time (or repeated) authorization with a code from the OAuth redirect */
  async exchangeCode(code: string): Promise<OAuthToken> {
    const grant = await this.options.oauth.exchangeCode(code);
    const token = await this.commit(grant);
    console.log('[auth] Authorization code exchanged', { expiresAt: token.expiresAt });
    for (const listener of this.reauthListeners) {
      listener();
    }
    return token;
  }

  /** Called by the CRM client when a refreshed token is still rejected */
  markNeedsAuth(reason: string): void {
    if (this.needsAuthReason === null) {
      this.enterNeedsAuth(reason);
    }
  }

  onReauthorized(listener: ReauthListener): void {
    this.reauthListeners.push(listener);
  }

  private requireToken(): OAuthToken {
    if (this.needsAuthReason !== null || !this.token) {
      throw new AuthExpiredError(`CRM authorization required (${this.needsAuthReason ?? 'no token'})`);
    }
    return this.token;
  }

  private async runRefresh(token: OAuthToken): Promise<OAuthToken> {
    console.log('[auth] Refreshing access token');
    let grant: OAuthGrant;
    try {
      grant = await this.options.oauth.refresh(token.refreshToken);
    } catch (err) {
      if (err instanceof AuthExpiredError) {
        this.enterNeedsAuth('refresh token rejected');
      }
      throw err;
    }
    const next = await this.commit(grant);
    console.log('[auth] Access token refreshed', { expiresAt: next.expiresAt });
    return next;
  }

  /**
   * Swap in the new pair, then persist it. The old refresh token is already
   * spent at this point, so a failed write is logged rather than rolled back.
   */
  private async commit(grant: OAuthGrant): Promise<OAuthToken> {
    const now = this.now();
    const next: OAuthToken = Object.freeze({
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken,
      expiresAt: new Date(now + grant.expiresInSeconds * 1000).toISOString(),
      updatedAt: new Date(now).toISOString(),
    });

    this.token = next;
    this.needsAuthReason = null;

    try {
      await this.persist(next);
    } catch (err) {
      console.error('[auth] Failed to persist token pair, restart will require re-authorization', {
        file: this.options.filePath,
        error: errorMessage(err),
      });
    }
    return next;
  }

  private async persist(token: OAuthToken): Promise<void> {
    const file = this.options.filePath;
    const tmp = `${file}.${process.pid}.tmp`;
    await mkdir(dirname(file), { recursive: true });
    await writeFile(tmp, JSON.stringify(token, null, 2), { mode: 0o600 });
    await rename(tmp, file);
  }

  private enterNeedsAuth(reason: string): TokenState {
    this.needsAuthReason = reason;
    console.error('[auth] CRM authorization required', { reason });
    console.error(`[auth] Open ${this.authorizeUrl()} and send the code to GET /oauth?code=...`);
    return 'NEEDS_AUTH';
  }
}
