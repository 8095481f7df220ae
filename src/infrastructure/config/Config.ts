export interface AppConfig {
  banking: {
    clientId?: string;
    clientSecret?: string;
    /** Public origin of this service; the OAuth redirect URI is `<clientHost>/callback`. */
    clientHost?: string;
    apiBaseUrl: string;
    authBaseUrl: string;
  };
  app: {
    port: number;
    environment: string;
  };
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  return {
    banking: {
      clientId: env.BANK_CLIENT_ID,
      clientSecret: env.BANK_CLIENT_SECRET,
      clientHost: env.BANK_CLIENT_HOST,
      apiBaseUrl: env.BANK_API_BASE_URL ?? 'https://api.monzo.com',
      authBaseUrl: env.BANK_AUTH_BASE_URL ?? 'https://auth.monzo.com',
    },
    app: {
      port: Number(env.PORT ?? 4000),
      environment: env.NODE_ENV ?? 'development',
    },
  };
};
