import { Account } from '../../domain/entities/Account.js';
import { Balance } from '../../domain/entities/Balance.js';
import { Pot } from '../../domain/entities/Pot.js';
import { Money, minorToDecimal } from '../../domain/services/Money.js';
import { MonthlyBreakdown, MonthlyTotals } from '../../domain/services/MonthlyBuckets.js';
import { DashboardView } from '../services/DashboardService.js';

export interface AmountDTO {
  minor: number;
  decimal: string;
}

export interface TransactionItemDTO {
  id: string;
  accountId: string;
  created: string;
  amount: Money;
  description?: string;
  merchant?: string;
  counterparty?: string;
  category: string;
  declineReason?: string;
  isLoad: boolean;
  duplicate: boolean;
}

export interface DashboardResponseDTO {
  accounts: readonly Account[];
  defaultAccount: Account | null;
  pots: readonly Pot[];
  balances: Record<string, Balance>;
  items: TransactionItemDTO[];
  inbound: Record<string, AmountDTO>;
  outbound: Record<string, AmountDTO>;
  categories: Record<string, Record<string, AmountDTO>>;
  merchants: Record<string, Record<string, AmountDTO>>;
  duplicates: string[];
}

const toAmount = (minor: number): AmountDTO => ({ minor, decimal: minorToDecimal(minor) });

const mapValues = <A, B>(record: Record<string, A>, fn: (value: A) => B): Record<string, B> =>
  Object.fromEntries(Object.entries(record).map(([key, value]) => [key, fn(value)] as const));

const totalsToRecord = (totals: MonthlyTotals): Record<string, AmountDTO> => mapValues(totals.toRecord(), toAmount);

const breakdownToRecord = (breakdown: MonthlyBreakdown): Record<string, Record<string, AmountDTO>> =>
  mapValues(breakdown.toRecord(), (labels) => mapValues(labels, toAmount));

export const toDashboardResponse = (view: DashboardView): DashboardResponseDTO => ({
  accounts: view.accounts,
  defaultAccount: view.defaultAccount,
  pots: view.pots,
  balances: Object.fromEntries(view.balances),
  items: view.items.map((item) => ({
    id: item.id,
    accountId: item.accountId,
    created: item.createdAt.raw,
    amount: item.amount,
    description: item.description,
    merchant: item.merchantName,
    counterparty: item.counterpartyName,
    category: item.category,
    declineReason: item.declineReason,
    isLoad: item.isLoad,
    duplicate: view.duplicates.has(item.id),
  })),
  inbound: totalsToRecord(view.inbound),
  outbound: totalsToRecord(view.outbound),
  categories: breakdownToRecord(view.categories),
  merchants: breakdownToRecord(view.merchants),
  duplicates: Array.from(view.duplicates).sort(),
});
