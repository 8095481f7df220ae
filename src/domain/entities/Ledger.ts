import { Account } from './Account.js';
import { Pot } from './Pot.js';
import { TransactionItem } from './TransactionItem.js';

/**
 * Cached view of one user's data. `items` is ascending by `createdAt` and
 * holds each transaction id at most once.
 */
export interface Ledger {
  userId: string;
  accounts: readonly Account[];
  pots: readonly Pot[];
  items: readonly TransactionItem[];
  refreshedAt: string; // ISO timestamp
}
