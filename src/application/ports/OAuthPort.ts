export interface OAuthTokenGrant {
  accessToken: string;
  expiresInSeconds: number;
  userId: string;
}

export interface OAuthPort {
  isConfigured(): boolean;
  buildAuthorizeUrl(state: string): string;
  exchangeCode(code: string): Promise<OAuthTokenGrant>;
}
