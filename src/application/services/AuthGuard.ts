import { AuthExpiredError, NotAuthorizedError } from '../../domain/errors/AppError.js';
import { Session } from '../../domain/entities/Session.js';
import { BankingApiFactory, BankingApiPort } from '../ports/BankingApiPort.js';
import { SessionStorePort } from '../ports/SessionStorePort.js';
import { OAuthService } from './OAuthService.js';

export interface Authenticated {
  kind: 'authenticated';
  session: Session;
  userId: string;
  client: BankingApiPort;
}

export interface NeedsReauth {
  kind: 'needs-reauth';
  authUrl: string;
  reason: 'AUTH_EXPIRED' | 'NOT_AUTHORIZED';
}

export interface BadRequest {
  kind: 'bad-request';
  reason: string;
}

export type AuthResult = Authenticated | NeedsReauth | BadRequest;

export type GuardedResult<T> = { kind: 'ok'; value: T } | NeedsReauth | BadRequest;

/**
 * Resolves a session into an API client, or into the reason it cannot be.
 * Callers branch on `kind` instead of catching auth errors themselves.
 */
export class AuthGuard {
  constructor(
    private readonly sessions: SessionStorePort,
    private readonly oauth: OAuthService,
    private readonly createClient: BankingApiFactory,
    private readonly now: () => number = () => Date.now(),
  ) {}

  async check(sessionId: string | undefined): Promise<AuthResult> {
    if (!sessionId) {
      return { kind: 'bad-request', reason: 'sessionId is required' };
    }

    const session = await this.sessions.load(sessionId);

    if (!session?.accessToken || session.expiresAt === undefined || session.expiresAt < this.now()) {
      return this.reauth(sessionId, new AuthExpiredError());
    }

    const client = this.createClient(session.accessToken);

    if (session.userId) {
      return { kind: 'authenticated', session, userId: session.userId, client };
    }

    try {
      const { userId } = await client.whoAmI();
      const resolved: Session = { ...session, userId };

      await this.sessions.save(resolved);
      return { kind: 'authenticated', session: resolved, userId, client };
    } catch (error) {
      if (error instanceof NotAuthorizedError) {
        return this.reauth(sessionId, error);
      }
      throw error;
    }
  }

  /**
   * Runs `task` for an authenticated session. A credential rejected by
   * upstream mid-task turns into `needs-reauth`; other errors propagate.
   */
  async run<T>(sessionId: string | undefined, task: (auth: Authenticated) => Promise<T>): Promise<GuardedResult<T>> {
    const auth = await this.check(sessionId);

    if (auth.kind !== 'authenticated') {
      return auth;
    }

    try {
      return { kind: 'ok', value: await task(auth) };
    } catch (error) {
      if (error instanceof NotAuthorizedError) {
        return this.reauth(auth.session.id, error);
      }
      throw error;
    }
  }

  private async reauth(sessionId: string, error: AuthExpiredError | NotAuthorizedError): Promise<NeedsReauth> {
    console.log(`🔒 Session ${sessionId} needs re-authentication: ${error.code}`);
    const { authUrl } = await this.oauth.start(sessionId);

    return {
      kind: 'needs-reauth',
      authUrl,
      reason: error instanceof NotAuthorizedError ? 'NOT_AUTHORIZED' : 'AUTH_EXPIRED',
    };
  }
}
