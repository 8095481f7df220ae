import { Ledger } from '../../domain/entities/Ledger.js';
import { Pot } from '../../domain/entities/Pot.js';
import { TransactionItem } from '../../domain/entities/TransactionItem.js';
import { Timestamp, compareTimestamps } from '../../domain/services/Timestamp.js';
import { BankingApiPort } from '../ports/BankingApiPort.js';
import { LedgerStorePort } from '../ports/LedgerStorePort.js';

export type LedgerSource = Pick<BankingApiPort, 'fetchAccounts' | 'fetchPots' | 'fetchTransactionsForAccounts'>;

const byCreatedAt = (a: TransactionItem, b: TransactionItem): number => compareTimestamps(a.createdAt, b.createdAt);

/**
 * Per-user ledger cache. The first refresh fetches everything; later ones only
 * append transactions newer than the last cached item. Work on one user is
 * serialized, and every refresh stores a fresh snapshot, so two overlapping
 * requests for the same user cannot drop each other's items.
 */
export class LedgerCacheService {
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly store: LedgerStorePort,
    private readonly now: () => Date = () => new Date(),
  ) {}

  getOrRefresh(userId: string, source: LedgerSource): Promise<Ledger> {
    return this.exclusive(userId, async () => {
      const cached = await this.store.load(userId);
      const ledger = cached ? await this.refresh(cached, source) : await this.fetchFull(userId, source);

      await this.store.save(ledger);
      return ledger;
    });
  }

  invalidate(userId: string): Promise<void> {
    return this.exclusive(userId, () => this.store.delete(userId));
  }

  peek(userId: string): Promise<Ledger | null> {
    return this.store.load(userId);
  }

  private async fetchFull(userId: string, source: LedgerSource): Promise<Ledger> {
    const { accounts, pots } = await this.fetchAccountsAndPots(source);
    const fetched = await source.fetchTransactionsForAccounts(accounts.map((account) => account.id));
    const items = this.appendItems([], fetched);

    console.log(`📥 Loaded ledger for ${userId}: ${accounts.length} accounts, ${items.length} items`);

    return { userId, accounts, pots, items, refreshedAt: this.now().toISOString() };
  }

  private async refresh(cached: Ledger, source: LedgerSource): Promise<Ledger> {
    const { accounts, pots } = await this.fetchAccountsAndPots(source);
    const cursor = cached.items.at(-1)?.createdAt;
    const fetched = await source.fetchTransactionsForAccounts(
      accounts.map((account) => account.id),
      cursor?.raw,
    );
    const items = this.appendItems(cached.items, fetched, cursor);

    console.log(
      `🔄 Refreshed ledger for ${cached.userId}: +${items.length - cached.items.length} items (${items.length} total)`,
    );

    return { userId: cached.userId, accounts, pots, items, refreshedAt: this.now().toISOString() };
  }

  private async fetchAccountsAndPots(source: LedgerSource) {
    const accounts = await source.fetchAccounts();
    const potLists = await Promise.all(
      accounts.filter((account) => !account.closed).map((account) => source.fetchPots(account.id)),
    );
    const pots: Pot[] = potLists.flat().filter((pot) => !pot.deleted);

    return { accounts, pots };
  }

  /**
   * Appends `fetched` after `existing` without re-sorting what is cached.
   * Items already cached, repeated within the batch, or not strictly after
   * the cursor are dropped.
   */
  private appendItems(
    existing: readonly TransactionItem[],
    fetched: readonly TransactionItem[],
    cursor?: Timestamp,
  ): TransactionItem[] {
    const seen = new Set(existing.map((item) => item.id));
    const fresh: TransactionItem[] = [];

    for (const item of fetched) {
      if (seen.has(item.id)) {
        continue;
      }

      if (cursor && compareTimestamps(item.createdAt, cursor) <= 0) {
        continue;
      }

      seen.add(item.id);
      fresh.push(item);
    }

    return [...existing, ...fresh.sort(byCreatedAt)];
  }

  private exclusive<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(userId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail: Promise<void> = run
      .then(
        () => undefined,
        () => undefined,
      )
      .then(() => {
        if (this.queues.get(userId) === tail) {
          this.queues.delete(userId);
        }
      });

    this.queues.set(userId, tail);
    return run;
  }
}
