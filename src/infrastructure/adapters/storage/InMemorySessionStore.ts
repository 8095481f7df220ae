import { SessionStorePort } from '../../../application/ports/SessionStorePort.js';
import { Session } from '../../../domain/entities/Session.js';

export class InMemorySessionStore implements SessionStorePort {
  private readonly sessions = new Map<string, Session>();

  async load(sessionId: string): Promise<Session | null> {
    return this.sessions.get(sessionId) ?? null;
  }

  async findByOAuthState(state: string): Promise<Session | null> {
    for (const session of this.sessions.values()) {
      if (session.oauthState === state) {
        return session;
      }
    }

    return null;
  }

  async save(session: Session): Promise<void> {
    this.sessions.set(session.id, session);
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }
}
