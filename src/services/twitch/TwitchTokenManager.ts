import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ExternalServiceError, httpStatusOf, toExternalServiceError } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';

const TOKEN_URL = 'https://id.twitch.tv/oauth2/token';
const EXPIRY_MARGIN_MS = 60_000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_in: z.number().int().positive().default(3600)
});

export interface TwitchCredentials {
  /** Which account the token belongs to, for logs only */
  label: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  accessToken?: string;
}

/**
 * Keeps one account's user access token fresh via the refresh-token grant.
 * Concurrent callers share a single refresh.
 */
export class TwitchTokenManager {
  private accessToken: string | null;
  private refreshToken: string;
  private expiresAt: number;
  private refreshing: Promise<string> | null = null;

  constructor(
    private readonly credentials: TwitchCredentials,
    private readonly http: AxiosInstance = axios,
    private readonly logger: Logger = defaultLogger,
    private readonly now: () => number = Date.now
  ) {
    this.accessToken = credentials.accessToken || null;
    this.refreshToken = credentials.refreshToken;
    // A configured token has no known expiry; it is used until Twitch rejects it
    this.expiresAt = this.accessToken ? Number.POSITIVE_INFINITY : 0;
  }

  get clientId(): string {
    return this.credentials.clientId;
  }

  async getAccessToken(): Promise<string> {
    if (this.accessToken && this.now() < this.expiresAt - EXPIRY_MARGIN_MS) {
      return this.accessToken;
    }
    return this.refresh();
  }

  /** Drop the current token after a 401 so the next call refreshes */
  invalidate(): void {
    this.accessToken = null;
    this.expiresAt = 0;
  }

  refresh(): Promise<string> {
    if (!this.refreshing) {
      this.refreshing = this.requestToken().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async requestToken(): Promise<string> {
    const { label, clientId, clientSecret } = this.credentials;
    if (!this.refreshToken) {
      throw new ExternalServiceError('Twitch OAuth', `No refresh token configured for ${label}`);
    }

    this.logger.info(`🔑 Refreshing Twitch token for ${label}`);
    let body: unknown;
    try {
      const response = await this.http.post(
        TOKEN_URL,
        new URLSearchParams({
          grant_type: 'refresh_token',
          refresh_token: this.refreshToken,
          client_id: clientId,
          client_secret: clientSecret
        }).toString(),
        { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } }
      );
      body = response.data;
    } catch (error) {
      const status = httpStatusOf(error);
      if (status === 400 || status === 401) {
        this.logger.error(`❌ Twitch rejected the refresh token for ${label}; re-authorize the account`);
      }
      throw toExternalServiceError('Twitch OAuth', error);
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError('Twitch OAuth', `Unexpected token response for ${label}`);
    }

    this.accessToken = parsed.data.access_token;
    this.expiresAt = this.now() + parsed.data.expires_in * 1000;
    if (parsed.data.refresh_token) {
      this.refreshToken = parsed.data.refresh_token;
    } else {
      this.logger.warn(`No new refresh token returned for ${label}, keeping the previous one`);
    }
    this.logger.info(`✅ Twitch token for ${label} valid until ${new Date(this.expiresAt).toISOString()}`);
    return parsed.data.access_token;
  }
}
