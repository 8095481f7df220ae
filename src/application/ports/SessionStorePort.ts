import { Session } from '../../domain/entities/Session.js';

export interface SessionStorePort {
  load(sessionId: string): Promise<Session | null>;
  findByOAuthState(state: string): Promise<Session | null>;
  save(session: Session): Promise<void>;
  delete(sessionId: string): Promise<void>;
}
