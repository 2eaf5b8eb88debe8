/**
 * OAuth2 refresh-token exchange for the Salesforce connected app.
 *
 * Holds the single current access token for the process. The token is
 * fetched lazily on first use and replaced only when a caller reports it
 * invalid; nothing here predicts expiry.
 *
 * Exchanges are single-flight: while one is in progress every caller,
 * first-use or forced, awaits that same exchange.
 *
 * @module token-provider
 */

import { AuthError } from '../../shared/errors';
import { logger, maskSecret } from '../../shared/logger';
import { isSuccessStatus, type HttpResponse, type HttpTransport } from './http-transport';
import { oauthErrorSchema, tokenResponseSchema } from './salesforce.schemas';
import type { AccessToken, Credentials } from './salesforce.types';

export const DEFAULT_LOGIN_URL = 'https://login.salesforce.com';
const TOKEN_PATH = '/services/oauth2/token';

export interface TokenProviderOptions {
  credentials: Credentials;
  transport: HttpTransport;
  /** Authorization server base, e.g. https://test.salesforce.com for sandboxes. */
  loginUrl?: string;
  now?: () => Date;
}

/** Public contract for the token provider. */
export interface ITokenProvider {
  currentToken(): Promise<AccessToken>;
  forceRefresh(rejected?: AccessToken): Promise<AccessToken>;
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function describeOAuthError(response: HttpResponse): string {
  const parsed = oauthErrorSchema.safeParse(parseJson(response.body));
  if (!parsed.success) return `status ${response.status}`;
  const { error, error_description: description } = parsed.data;
  return description ? `${error}: ${description}` : error;
}

export class TokenProvider implements ITokenProvider {
  private readonly credentials: Credentials;
  private readonly transport: HttpTransport;
  private readonly tokenUrl: string;
  private readonly now: () => Date;

  private token: AccessToken | null = null;
  private inFlight: Promise<AccessToken> | null = null;

  constructor(options: TokenProviderOptions) {
    this.credentials = options.credentials;
    this.transport = options.transport;
    this.tokenUrl = `${(options.loginUrl ?? DEFAULT_LOGIN_URL).replace(/\/+$/, '')}${TOKEN_PATH}`;
    this.now = options.now ?? (() => new Date());
  }

  /** Cached token, or the result of a first exchange when there is none. */
  async currentToken(): Promise<AccessToken> {
    if (this.token) return this.token;
    return this.refreshOnce();
  }

  /**
   * Runs the refresh exchange and replaces the cached token.
   *
   * An exchange already in flight is always joined, whichever token the
   * caller saw rejected. Otherwise, pass the rejected token: if another
   * caller has already replaced it, the newer token is returned without
   * another exchange. Without an argument the exchange always runs.
   */
  async forceRefresh(rejected?: AccessToken): Promise<AccessToken> {
    if (this.inFlight) return this.inFlight;
    if (rejected && this.token && this.token !== rejected) {
      return this.token;
    }
    return this.refreshOnce();
  }

  private refreshOnce(): Promise<AccessToken> {
    if (!this.inFlight) {
      this.inFlight = this.exchange().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async exchange(): Promise<AccessToken> {
    const { clientId, clientSecret, refreshToken } = this.credentials;

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: 'POST',
        url: this.tokenUrl,
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams({
          grant_type: 'refresh_token',
          client_id: clientId,
          client_secret: clientSecret,
          refresh_token: refreshToken,
        }).toString(),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn('Salesforce token endpoint unreachable', { tokenUrl: this.tokenUrl, error: reason });
      throw new AuthError(`Salesforce token refresh failed: ${reason}`);
    }

    if (!isSuccessStatus(response.status)) {
      const detail = describeOAuthError(response);
      logger.warn('Salesforce token refresh rejected', {
        tokenUrl: this.tokenUrl,
        status: response.status,
        clientId: maskSecret(clientId),
      });
      throw new AuthError(`Salesforce token refresh failed (${response.status}): ${detail}`);
    }

    const parsed = tokenResponseSchema.safeParse(parseJson(response.body));
    if (!parsed.success) {
      logger.warn('Salesforce token response missing access_token', { tokenUrl: this.tokenUrl });
      throw new AuthError('Salesforce token refresh returned no access token');
    }

    const token: AccessToken = {
      value: parsed.data.access_token,
      acquiredAt: this.now(),
      instanceUrl: parsed.data.instance_url?.replace(/\/+$/, ''),
    };
    this.token = token;

    logger.info('Salesforce access token refreshed', {
      instanceUrl: token.instanceUrl ?? this.credentials.instanceUrl,
      token: maskSecret(token.value),
    });

    return token;
  }
}
