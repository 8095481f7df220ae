import { Account } from '../../domain/entities/Account.js';
import { Balance } from '../../domain/entities/Balance.js';
import { Pot } from '../../domain/entities/Pot.js';
import { TransactionItem } from '../../domain/entities/TransactionItem.js';

/** Client bound to one user's bearer credential. Every value it returns is normalized. */
export interface BankingApiPort {
  whoAmI(): Promise<{ userId: string }>;
  fetchAccounts(): Promise<Account[]>;
  fetchPots(accountId: string): Promise<Pot[]>;
  fetchBalance(accountId: string): Promise<Balance>;
  /** Items strictly newer than `since` (when given), ascending. */
  fetchTransactions(accountId: string, since?: string): Promise<TransactionItem[]>;
  /** Concurrent per-account fetch merged into one ascending sequence. */
  fetchTransactionsForAccounts(accountIds: readonly string[], since?: string): Promise<TransactionItem[]>;
}

export type BankingApiFactory = (accessToken: string) => BankingApiPort;
