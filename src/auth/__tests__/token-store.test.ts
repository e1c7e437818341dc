/**
 * Tests for the Token Store
 *
 * Uses a real temp directory for the token file and a fake OAuth client.
 *
 * Tests cover:
 * - load: missing / corrupt / malformed file -> NEEDS_AUTH, valid file -> READY
 * - getAccessToken: refresh inside the safety margin
 * - refresh: single-flight under concurrency, stale-token short circuit
 * - refresh rejected -> NEEDS_AUTH
 * - exchangeCode: persists the pair (0600) and notifies listeners
 */

import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TokenStore } from '../token-store.js';
import type { OAuthGrant, OAuthGrantClient } from '../oauth-client.js';
import { AuthExpiredError } from '../../errors.js';

const NOW = Date.parse('2026-03-02T10:00:00.000Z');

function fakeOAuth() {
  return {
    authorizeUrl: vi.fn(() => 'https://crm.test/oauth?client_id=test-client'),
    exchangeCode: vi.fn<(code: string) => Promise<OAuthGrant>>(),
    refresh: vi.fn<(refreshToken: string) => Promise<OAuthGrant>>(),
  } satisfies OAuthGrantClient;
}

describe('TokenStore', () => {
  let dir: string;
  let filePath: string;
  let oauth: ReturnType<typeof fakeOAuth>;

  const createStore = () => new TokenStore({ filePath, oauth, refreshMarginMs: 5 * 60 * 1000, now: () => NOW });

  const writeTokenFile = (expiresInMs: number) =>
    writeFile(filePath, JSON.stringify({
      accessToken: 'access-1',
      refreshToken: 'refresh-1',
      expiresAt: new Date(NOW + expiresInMs).toISOString(),
      updatedAt: new Date(NOW - 1000).toISOString(),
    }));

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'token-store-'));
    filePath = join(dir, 'tokens.json');
    oauth = fakeOAuth();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('enters NEEDS_AUTH when the file is missing', async () => {
      const store = createStore();
      expect(await store.load()).toBe('NEEDS_AUTH');
      expect(store.status()).toEqual({ state: 'NEEDS_AUTH', expiresAt: null, reason: 'token file missing' });
      await expect(store.getAccessToken()).rejects.toBeInstanceOf(AuthExpiredError);
    });

    it('enters NEEDS_AUTH when the file is not JSON', async () => {
      await writeFile(filePath, '{"accessToken": ');
      const store = createStore();
      expect(await store.load()).toBe('NEEDS_AUTH');
      expect(store.status().reason).toBe('token file is not valid JSON');
    });

    it('enters NEEDS_AUTH when the file has the wrong shape', async () => {
      await writeFile(filePath, JSON.stringify({ accessToken: 'access-1' }));
      const store = createStore();
      expect(await store.load()).toBe('NEEDS_AUTH');
      expect(store.status().reason).toBe('token file has an unexpected shape');
    });

    it('logs the authorize URL when authorization is required', async () => {
      await createStore().load();
      expect(console.error).toHaveBeenCalledWith(
        '[auth] Open https://crm.test/oauth?client_id=test-client and send the code to GET /oauth?code=...',
      );
    });

    it('is READY with a valid file', async () => {
      await writeTokenFile(60 * 60 * 1000);
      const store = createStore();
      expect(await store.load()).toBe('READY');
      expect(store.status()).toEqual({ state: 'READY', expiresAt: '2026-03-02T11:00:00.000Z', reason: null });
    });
  });

  describe('getAccessToken', () => {
    it('returns the stored token while it is outside the margin', async () => {
      await writeTokenFile(60 * 60 * 1000);
      const store = createStore();
      await store.load();
      expect(await store.getAccessToken()).toBe('access-1');
      expect(oauth.refresh).not.toHaveBeenCalled();
    });

    it('refreshes a token that expires inside the margin and persists the new pair', async () => {
      await writeTokenFile(60 * 1000);
      oauth.refresh.mockResolvedValue({ accessToken: 'access-2', refreshToken: 'refresh-2', expiresInSeconds: 86400 });
      const store = createStore();
      await store.load();

      expect(await store.getAccessToken()).toBe('access-2');
      expect(oauth.refresh).toHaveBeenCalledWith('refresh-1');

      const persisted: unknown = JSON.parse(await readFile(filePath, 'utf8'));
      expect(persisted).toEqual({
        accessToken: 'access-2',
        refreshToken: 'refresh-2',
        expiresAt: '2026-03-03T10:00:00.000Z',
        updatedAt: '2026-03-02T10:00:00.000Z',
      });
      expect((await stat(filePath)).mode & 0o777).toBe(0o600);
    });
  });

  describe('refresh', () => {
    it('issues a single grant for concurrent callers', async () => {
      await writeTokenFile(60 * 60 * 1000);
      let resolveGrant: (grant: OAuthGrant) => void = () => {};
      oauth.refresh.mockReturnValue(new Promise<OAuthGrant>((resolve) => {
        resolveGrant = resolve;
      }));
      const store = createStore();
      await store.load();

      const pending = Array.from({ length: 5 }, () => store.refresh('access-1'));
      resolveGrant({ accessToken: 'access-2', refreshToken: 'refresh-2', expiresInSeconds: 86400 });
      const tokens = await Promise.all(pending);

      expect(oauth.refresh).toHaveBeenCalledTimes(1);
      expect(new Set(tokens.map((t) => t.accessToken))).toEqual(new Set(['access-2']));
    });

    it('returns the current pair when the caller holds an already replaced token', async () => {
      await writeTokenFile(60 * 60 * 1000);
      oauth.refresh.mockResolvedValue({ accessToken: 'access-2', refreshToken: 'refresh-2', expiresInSeconds: 86400 });
      const store = createStore();
      await store.load();

      await store.refresh('access-1');
      const again = await store.refresh('access-1');

      expect(again.accessToken).toBe('access-2');
      expect(oauth.refresh).toHaveBeenCalledTimes(1);
    });

    it('enters NEEDS_AUTH when the refresh token is rejected', async () => {
      await writeTokenFile(60 * 60 * 1000);
      oauth.refresh.mockRejectedValue(new AuthExpiredError('OAuth refresh_token grant rejected (400)'));
      const store = createStore();
      await store.load();

      await expect(store.refresh('access-1')).rejects.toBeInstanceOf(AuthExpiredError);
      expect(store.state()).toBe('NEEDS_AUTH');
      expect(store.status().reason).toBe('refresh token rejected');
    });
  });

  describe('exchangeCode', () => {
    it('stores the pair and notifies re-authorization listeners', async () => {
      oauth.exchangeCode.mockResolvedValue({ accessToken: 'access-9', refreshToken: 'refresh-9', expiresInSeconds: 3600 });
      const store = createStore();
      await store.load();
      const listener = vi.fn();
      store.onReauthorized(listener);

      const token = await store.exchangeCode('test-code');

      expect(oauth.exchangeCode).toHaveBeenCalledWith('test-code');
      expect(token.expiresAt).toBe('2026-03-02T11:00:00.000Z');
      expect(store.state()).toBe('READY');
      expect(listener).toHaveBeenCalledTimes(1);
      expect(await store.getAccessToken()).toBe('access-9');
      expect(JSON.parse(await readFile(filePath, 'utf8'))).toMatchObject({ accessToken: 'access-9' });
    });

    it('leaves the store unchanged when the exchange fails', async () => {
      oauth.exchangeCode.mockRejectedValue(new AuthExpiredError('OAuth authorization_code grant rejected (400)'));
      const store = createStore();
      await store.load();
      const listener = vi.fn();
      store.onReauthorized(listener);

      await expect(store.exchangeCode('test-code')).rejects.toBeInstanceOf(AuthExpiredError);
      expect(store.state()).toBe('NEEDS_AUTH');
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('markNeedsAuth', () => {
    it('switches a READY store to NEEDS_AUTH', async () => {
      await writeTokenFile(60 * 60 * 1000);
      const store = createStore();
      await store.load();

      store.markNeedsAuth('access token rejected right after refresh');

      expect(store.status()).toMatchObject({ state: 'NEEDS_AUTH', reason: 'access token rejected right after refresh' });
      await expect(store.getAccessToken()).rejects.toBeInstanceOf(AuthExpiredError);
    });
  });
});
