export interface Session {
  id: string;
  oauthState?: string;
  accessToken?: string;
  expiresAt?: number; // epoch ms
  userId?: string;
}
