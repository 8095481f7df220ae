import { AuthGuard } from '../../application/services/AuthGuard.js';
import { DashboardService } from '../../application/services/DashboardService.js';
import { LedgerCacheService } from '../../application/services/LedgerCacheService.js';
import { OAuthService } from '../../application/services/OAuthService.js';
import { BankingApiFactory } from '../../application/ports/BankingApiPort.js';
import { LedgerStorePort } from '../../application/ports/LedgerStorePort.js';
import { OAuthPort } from '../../application/ports/OAuthPort.js';
import { SessionStorePort } from '../../application/ports/SessionStorePort.js';
import { MonzoApiClient } from '../adapters/banking/MonzoApiClient.js';
import { MonzoOAuthAdapter } from '../adapters/banking/MonzoOAuthAdapter.js';
import { InMemoryLedgerStore } from '../adapters/storage/InMemoryLedgerStore.js';
import { InMemorySessionStore } from '../adapters/storage/InMemorySessionStore.js';
import { AppConfig, loadConfig } from '../config/Config.js';
import { HttpTransport, fetchTransport } from '../http/FetchTransport.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  transport?: HttpTransport;
  ledgerStore?: LedgerStorePort;
  sessionStore?: SessionStorePort;
  oauth?: OAuthPort;
  createClient?: BankingApiFactory;
  now?: () => number;
}

export class AppContainer {
  readonly config: AppConfig;

  readonly ledgerStore: LedgerStorePort;
  readonly sessionStore: SessionStorePort;
  readonly oauth: OAuthPort;
  readonly createClient: BankingApiFactory;
  readonly ledgerCache: LedgerCacheService;
  readonly dashboardService: DashboardService;
  readonly oauthService: OAuthService;
  readonly authGuard: AuthGuard;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();

    const transport = overrides.transport ?? fetchTransport;
    const now = overrides.now ?? (() => Date.now());
    const apiBaseUrl = this.config.banking.apiBaseUrl;

    this.ledgerStore = overrides.ledgerStore ?? new InMemoryLedgerStore();
    this.sessionStore = overrides.sessionStore ?? new InMemorySessionStore();
    this.oauth = overrides.oauth ?? new MonzoOAuthAdapter(this.config.banking, transport);
    this.createClient =
      overrides.createClient ??
      ((accessToken: string) => new MonzoApiClient(transport, { baseUrl: apiBaseUrl, accessToken }));

    this.ledgerCache = new LedgerCacheService(this.ledgerStore, () => new Date(now()));
    this.dashboardService = new DashboardService(this.ledgerCache);
    this.oauthService = new OAuthService(this.oauth, this.sessionStore, now);
    this.authGuard = new AuthGuard(this.sessionStore, this.oauthService, this.createClient, now);
  }

  hasOAuthClient(): boolean {
    return this.oauth.isConfigured();
  }
}
