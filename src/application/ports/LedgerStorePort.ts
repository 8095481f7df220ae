import { Ledger } from '../../domain/entities/Ledger.js';

export interface LedgerStorePort {
  load(userId: string): Promise<Ledger | null>;
  save(ledger: Ledger): Promise<void>;
  delete(userId: string): Promise<void>;
}
