import { Money } from '../services/Money.js';
import { Timestamp } from '../services/Timestamp.js';

export const UNCATEGORIZED = 'Uncategorized';

export interface TransactionItem {
  id: string;
  accountId: string;
  createdAt: Timestamp;
  /** Positive is inbound, negative outbound. */
  amount: Money;
  description?: string;
  merchantName?: string;
  counterpartyName?: string;
  category: string;
  declineReason?: string;
  /** Set on incoming top-ups. */
  isLoad: boolean;
}
