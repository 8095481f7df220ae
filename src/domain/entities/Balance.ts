import { Money } from '../services/Money.js';

export interface Balance {
  accountId: string;
  balance: Money;
  totalBalance: Money;
  spendToday: Money;
}
