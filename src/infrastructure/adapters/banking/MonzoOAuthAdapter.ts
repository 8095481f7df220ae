import { TokenResponseSchema } from '../../../application/dto/BankingApiDTO.js';
import { OAuthPort, OAuthTokenGrant } from '../../../application/ports/OAuthPort.js';
import { HttpTransport } from '../../http/FetchTransport.js';
import { readUpstream } from './readUpstream.js';

export interface MonzoOAuthConfig {
  clientId?: string;
  clientSecret?: string;
  clientHost?: string;
  apiBaseUrl: string;
  authBaseUrl: string;
}

const TOKEN_PATH = '/oauth2/token';

export class MonzoOAuthAdapter implements OAuthPort {
  constructor(
    private readonly config: MonzoOAuthConfig,
    private readonly transport: HttpTransport,
  ) {}

  isConfigured(): boolean {
    return Boolean(this.config.clientId && this.config.clientSecret && this.config.clientHost);
  }

  redirectUri(): string {
    return `${this.config.clientHost ?? ''}/callback`;
  }

  buildAuthorizeUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.config.clientId ?? '',
      redirect_uri: this.redirectUri(),
      response_type: 'code',
      state,
    });

    return `${this.config.authBaseUrl}/?${params.toString()}`;
  }

  async exchangeCode(code: string): Promise<OAuthTokenGrant> {
    if (!this.isConfigured()) {
      throw new Error('OAuth client is not configured. Set BANK_CLIENT_ID, BANK_CLIENT_SECRET and BANK_CLIENT_HOST.');
    }

    const response = await this.transport({
      url: new URL(TOKEN_PATH, this.config.apiBaseUrl).toString(),
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
      body: new URLSearchParams({
        grant_type: 'authorization_code',
        client_id: this.config.clientId ?? '',
        client_secret: this.config.clientSecret ?? '',
        redirect_uri: this.redirectUri(),
        code,
      }).toString(),
    });

    const token = readUpstream(response, TOKEN_PATH, TokenResponseSchema);

    return {
      accessToken: token.access_token,
      expiresInSeconds: token.expires_in,
      userId: token.user_id,
    };
  }
}
