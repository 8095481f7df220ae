import { Account } from '../../domain/entities/Account.js';
import { Balance } from '../../domain/entities/Balance.js';
import { Pot } from '../../domain/entities/Pot.js';
import { TransactionItem } from '../../domain/entities/TransactionItem.js';
import { findDuplicateTransfers } from '../../domain/services/DuplicateTransferMatcher.js';
import { LedgerAggregate, aggregateLedger } from '../../domain/services/LedgerAggregator.js';
import { BankingApiPort } from '../ports/BankingApiPort.js';
import { LedgerCacheService } from './LedgerCacheService.js';

export interface DashboardView extends LedgerAggregate {
  accounts: readonly Account[];
  defaultAccount: Account | null;
  pots: readonly Pot[];
  balances: ReadonlyMap<string, Balance>;
  items: readonly TransactionItem[];
  /** Informational only; never subtracted from the aggregates. */
  duplicates: ReadonlySet<string>;
}

export class DashboardService {
  constructor(private readonly ledgerCache: LedgerCacheService) {}

  async buildDashboard(userId: string, client: BankingApiPort): Promise<DashboardView> {
    const ledger = await this.ledgerCache.getOrRefresh(userId, client);
    const balances = await Promise.all(ledger.accounts.map((account) => client.fetchBalance(account.id)));

    return {
      accounts: ledger.accounts,
      defaultAccount: ledger.accounts.find((account) => !account.closed) ?? null,
      pots: ledger.pots,
      balances: new Map(balances.map((balance) => [balance.accountId, balance])),
      items: ledger.items,
      ...aggregateLedger(ledger.items),
      duplicates: findDuplicateTransfers(ledger.items),
    };
  }

  clear(userId: string): Promise<void> {
    return this.ledgerCache.invalidate(userId);
  }
}
