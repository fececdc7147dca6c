/**
 * Zoho OAuth2 Token Manager
 *
 * Caches the CRM access token in memory and refreshes it through the
 * refresh-token grant shortly before it expires. A static access token is
 * used as-is when no refresh credentials are configured.
 */

import axios, { AxiosInstance } from 'axios';
import logger from '../config/logger';
import { ZOHO } from '../config/constants';
import { ZohoConfig } from '../config/env';
import { ZohoTokenResponse } from '../types/zoho.types';
import { errorMessage } from '../utils/errors';

export type ZohoAuthMode = 'oauth2_refresh' | 'static_token' | 'not_configured';

export class ZohoTokenManager {
  private client: AxiosInstance;
  private log = logger.child({ service: 'zoho-auth' });
  private accessToken: string;
  private expiresAt = 0; // epoch ms; 0 = unknown expiry (static token)
  private refreshing: Promise<void> | null = null;

  constructor(
    private readonly config: ZohoConfig,
    client?: AxiosInstance,
    private readonly now: () => number = Date.now
  ) {
    this.accessToken = config.accessToken ?? '';
    this.client = client ?? axios.create({ timeout: 15000 });
  }

  get hasOAuthCredentials(): boolean {
    return Boolean(this.config.clientId && this.config.clientSecret && this.config.refreshToken);
  }

  get hasStaticToken(): boolean {
    return Boolean(this.config.accessToken);
  }

  get isConfigured(): boolean {
    return this.hasOAuthCredentials || this.hasStaticToken;
  }

  get authMode(): ZohoAuthMode {
    if (this.hasOAuthCredentials) return 'oauth2_refresh';
    return this.hasStaticToken ? 'static_token' : 'not_configured';
  }

  /**
   * Return a usable access token, refreshing first when needed. Concurrent
   * callers share one in-flight refresh. Returns '' when nothing is
   * configured or the refresh failed.
   */
  async getAccessToken(): Promise<string> {
    if (this.tokenIsValid() || !this.hasOAuthCredentials) {
      return this.accessToken;
    }

    if (!this.refreshing) {
      this.refreshing = this.refreshAccessToken().finally(() => {
        this.refreshing = null;
      });
    }

    await this.refreshing;
    return this.accessToken;
  }

  private tokenIsValid(): boolean {
    if (!this.accessToken) return false;
    if (this.expiresAt === 0) return true;
    return this.now() < this.expiresAt - ZOHO.REFRESH_BUFFER_SECONDS * 1000;
  }

  private async refreshAccessToken(): Promise<void> {
    this.log.info('Refreshing Zoho access token');

    const form = new URLSearchParams({
      refresh_token: this.config.refreshToken ?? '',
      client_id: this.config.clientId ?? '',
      client_secret: this.config.clientSecret ?? '',
      grant_type: 'refresh_token',
    });

    try {
      const response = await this.client.post<ZohoTokenResponse>(this.config.tokenUrl, form, {
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        this.log.error({ status: response.status }, 'Zoho token refresh failed');
        return;
      }

      const { access_token: accessToken, expires_in: expiresIn } = response.data;
      if (!accessToken) {
        this.log.error({ error: response.data.error }, 'Zoho token refresh response missing access_token');
        return;
      }

      const lifetimeSeconds = expiresIn ?? ZOHO.DEFAULT_EXPIRES_IN_SECONDS;
      this.accessToken = accessToken;
      this.expiresAt = this.now() + lifetimeSeconds * 1000;

      this.log.info({ expiresIn: lifetimeSeconds }, 'Zoho access token refreshed');
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, 'Zoho token refresh request failed');
    }
  }
}
