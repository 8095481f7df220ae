import { Money } from '../services/Money.js';

export interface Pot {
  id: string;
  name: string;
  balance: Money;
  deleted: boolean;
}
