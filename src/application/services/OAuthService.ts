import crypto from 'node:crypto';
import { StateMismatchError } from '../../domain/errors/AppError.js';
import { Session } from '../../domain/entities/Session.js';
import { OAuthPort } from '../ports/OAuthPort.js';
import { SessionStorePort } from '../ports/SessionStorePort.js';

const STATE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const STATE_LENGTH = 32;

export const randomState = (): string => {
  const bytes = crypto.randomBytes(STATE_LENGTH);
  return Array.from(bytes, (byte) => STATE_ALPHABET[byte % STATE_ALPHABET.length]).join('');
};

export interface OAuthCallbackInput {
  code?: string;
  state?: string;
}

export class OAuthService {
  constructor(
    private readonly oauth: OAuthPort,
    private readonly sessions: SessionStorePort,
    private readonly now: () => number = () => Date.now(),
    private readonly generateState: () => string = randomState,
  ) {}

  /** Issues a fresh state for the session and returns the URL to send the user to. */
  async start(sessionId: string): Promise<{ authUrl: string }> {
    const session = (await this.sessions.load(sessionId)) ?? { id: sessionId };
    const state = this.generateState();

    await this.sessions.save({ ...session, oauthState: state });

    return { authUrl: this.oauth.buildAuthorizeUrl(state) };
  }

  /**
   * Exchanges the callback code. The session is the one named by `sessionId`
   * or, when the caller cannot name it, the one that issued `state`.
   */
  async complete(input: OAuthCallbackInput, sessionId?: string): Promise<Session> {
    if (!input.code || !input.state) {
      throw new StateMismatchError('OAuth callback requires code and state');
    }

    const session = sessionId
      ? await this.sessions.load(sessionId)
      : await this.sessions.findByOAuthState(input.state);

    if (!session?.oauthState || session.oauthState !== input.state) {
      throw new StateMismatchError();
    }

    const grant = await this.oauth.exchangeCode(input.code);
    const updated: Session = {
      id: session.id,
      accessToken: grant.accessToken,
      expiresAt: this.now() + grant.expiresInSeconds * 1000,
      userId: grant.userId,
    };

    await this.sessions.save(updated);
    console.log(`🔑 OAuth completed for user ${grant.userId}`);

    return updated;
  }

  /** Drops the stored credential. Returns the user it belonged to, if known. */
  async logout(sessionId: string): Promise<string | undefined> {
    const session = await this.sessions.load(sessionId);

    if (!session) {
      return undefined;
    }

    await this.sessions.delete(sessionId);
    return session.userId;
  }
}
