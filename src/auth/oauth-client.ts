/**
 * AmoCRM OAuth2 Client
 *
 * Talks to the account's /oauth2/access_token endpoint for the two grants
 * the service needs:
 * - authorization_code: first-time authorization (GET /oauth?code=...)
 * - refresh_token: renewal; AmoCRM rotates the refresh token on every call
 *
 * Errors are classified for the Token Store:
 * - 400/401 from the token endpoint -> AuthExpiredError (human must re-authorize)
 * - 429/5xx/network/timeout -> CrmTransientError
 * - unexpected response shape -> CrmPermanentError
 */

import { z } from 'zod';
import { AuthExpiredError, CrmPermanentError, CrmTransientError, errorMessage } from '../errors.js';

export interface OAuthClientOptions {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  timeoutMs: number;
}

export interface OAuthGrant {
  accessToken: string;
  refreshToken: string;
  expiresInSeconds: number;
}

/** What the Token Store needs from an OAuth client */
export interface OAuthGrantClient {
  authorizeUrl(): string;
  exchangeCode(code: string): Promise<OAuthGrant>;
  refresh(refreshToken: string): Promise<OAuthGrant>;
}

const TokenResponseSchema = z.object({
  token_type: z.string().optional(),
  expires_in: z.number().int().positive(),
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
});

export class AmoOAuthClient implements OAuthGrantClient {
  constructor(private readonly options: OAuthClientOptions) {}

  authorizeUrl(): string {
    const params = new URLSearchParams({
      client_id: this.options.clientId,
      redirect_uri: this.options.redirectUri,
      mode: 'post_message',
      state: 'call_sync_auth',
    });
    return `${this.options.baseUrl}/oauth?${params.toString()}`;
  }

  exchangeCode(code: string): Promise<OAuthGrant> {
    return this.grant({ grant_type: 'authorization_code', code });
  }

  refresh(refreshToken: string): Promise<OAuthGrant> {
    return this.grant({ grant_type: 'refresh_token', refresh_token: refreshToken });
  }

  private async grant(fields: Record<string, string>): Promise<OAuthGrant> {
    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/oauth2/access_token`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify({
          client_id: this.options.clientId,
          client_secret: this.options.clientSecret,
          redirect_uri: this.options.redirectUri,
          ...fields,
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new CrmTransientError(`OAuth token request failed: ${errorMessage(err)}`);
    }

    if (!response.ok) {
      const body = await response.text();
      if (response.status === 400 || response.status === 401) {
        throw new AuthExpiredError(`OAuth ${fields.grant_type} grant rejected (${response.status})`);
      }
      if (response.status === 429 || response.status >= 500) {
        throw new CrmTransientError(`OAuth token endpoint error: ${response.status}`, response.status, body);
      }
      throw new CrmPermanentError(`OAuth token endpoint error: ${response.status}`, response.status, body);
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new CrmPermanentError('OAuth token response has an unexpected shape');
    }

    return {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      expiresInSeconds: parsed.data.expires_in,
    };
  }
}
