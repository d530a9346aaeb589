import { Logger } from '@nestjs/common';
import type { Route } from '@routecast/models';
import { DEFAULT_RETRY_OPTIONS, FetchError, RetryOptions, fetchWithRetry } from '@routecast/common';
import { StravaClient } from './strava-client.interface';
import {
  StravaRouteResponse,
  isStravaRouteResponse,
  isStravaTokenResponse,
} from './strava.types';

const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token';
const TOKEN_EXPIRY_MARGIN_SECONDS = 60;

export interface StravaHttpClientOptions {
  apiUrl: string;
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  retry?: RetryOptions;
}

interface AccessToken {
  value: string;
  expiresAt: number;
}

function toRoute(response: StravaRouteResponse): Route {
  return {
    id: response.id_str ?? String(response.id),
    athleteId: String(response.athlete.id),
    name: response.name,
    distance: response.distance,
  };
}

/**
 * Read-only Strava API client. Access tokens come from the refresh-token
 * grant and are reused until shortly before they expire.
 */
export class StravaHttpClient implements StravaClient {
  private readonly logger = new Logger(StravaHttpClient.name);
  private accessToken: AccessToken | null = null;
  private pendingToken: Promise<AccessToken> | null = null;
  private refreshToken: string;

  constructor(private readonly options: StravaHttpClientOptions) {
    this.refreshToken = options.refreshToken;
  }

  async getRoutes(athleteId: string): Promise<Route[]> {
    const url = `${this.options.apiUrl}/athletes/${encodeURIComponent(athleteId)}/routes`;
    const response = await this.authorizedGet(url);

    if (response.status === 404) {
      return [];
    }

    const data: unknown = await response.json();
    if (!Array.isArray(data)) {
      throw new FetchError('Unexpected Strava routes response', url, response.status);
    }

    return data.filter(isStravaRouteResponse).map(toRoute);
  }

  async getRoute(routeId: string): Promise<Route | null> {
    const url = `${this.options.apiUrl}/routes/${encodeURIComponent(routeId)}`;
    const response = await this.authorizedGet(url);

    if (response.status === 404) {
      return null;
    }

    const data: unknown = await response.json();
    if (!isStravaRouteResponse(data)) {
      throw new FetchError('Unexpected Strava route response', url, response.status);
    }

    return toRoute(data);
  }

  async exportGpx(routeId: string): Promise<string | null> {
    const url = `${this.options.apiUrl}/routes/${encodeURIComponent(routeId)}/export_gpx`;
    const response = await this.authorizedGet(url);

    if (response.status === 404) {
      return null;
    }

    return response.text();
  }

  private async authorizedGet(url: string): Promise<Response> {
    const token = await this.getAccessToken();

    return fetchWithRetry(
      url,
      { headers: { Authorization: `Bearer ${token}` } },
      this.options.retry ?? DEFAULT_RETRY_OPTIONS,
    );
  }

  private async getAccessToken(): Promise<string> {
    const nowSeconds = Math.floor(Date.now() / 1000);
    if (this.accessToken && this.accessToken.expiresAt - TOKEN_EXPIRY_MARGIN_SECONDS > nowSeconds) {
      return this.accessToken.value;
    }

    if (!this.pendingToken) {
      this.pendingToken = this.requestAccessToken().finally(() => {
        this.pendingToken = null;
      });
    }

    this.accessToken = await this.pendingToken;
    return this.accessToken.value;
  }

  private async requestAccessToken(): Promise<AccessToken> {
    const { tokenUrl, clientId, clientSecret } = this.options;

    if (!clientId || !clientSecret || !this.refreshToken) {
      throw new Error('Strava client ID, client secret and refresh token must be configured');
    }

    const response = await fetchWithRetry(
      tokenUrl,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          client_id: clientId,
          client_secret: clientSecret,
          grant_type: GRANT_TYPE_REFRESH_TOKEN,
          refresh_token: this.refreshToken,
        }).toString(),
      },
      this.options.retry ?? DEFAULT_RETRY_OPTIONS,
    );

    const data: unknown = response.status === 404 ? null : await response.json();
    if (!isStravaTokenResponse(data)) {
      throw new FetchError('Strava token refresh failed', tokenUrl, response.status);
    }

    // Strava may rotate the refresh token on every exchange.
    this.refreshToken = data.refresh_token || this.refreshToken;
    this.logger.debug(`Strava access token refreshed, expires at ${data.expires_at}`);

    return { value: data.access_token, expiresAt: data.expires_at };
  }
}
