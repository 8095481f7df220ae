import { LedgerStorePort } from '../../../application/ports/LedgerStorePort.js';
import { Ledger } from '../../../domain/entities/Ledger.js';

export class InMemoryLedgerStore implements LedgerStorePort {
  private readonly ledgers = new Map<string, Ledger>();

  async load(userId: string): Promise<Ledger | null> {
    return this.ledgers.get(userId) ?? null;
  }

  async save(ledger: Ledger): Promise<void> {
    this.ledgers.set(ledger.userId, ledger);
  }

  async delete(userId: string): Promise<void> {
    this.ledgers.delete(userId);
  }

  size(): number {
    return this.ledgers.size;
  }
}
