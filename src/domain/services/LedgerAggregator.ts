import { TransactionItem } from '../entities/TransactionItem.js';
import { MonthlyBreakdown, MonthlyTotals } from './MonthlyBuckets.js';
import { toMonthKey } from './Timestamp.js';

export const TOP_UP_LABEL = 'Top-up';
export const UNKNOWN_MERCHANT_LABEL = '';

export interface LedgerAggregate {
  inbound: MonthlyTotals;
  outbound: MonthlyTotals;
  categories: MonthlyBreakdown;
  merchants: MonthlyBreakdown;
}

const presentName = (name: string | undefined): string | undefined => {
  const trimmed = name?.trim();
  return trimmed ? trimmed : undefined;
};

/** Merchant or counterparty name; the only names the duplicate matcher pairs on. */
export const resolveCounterpartyName = (item: TransactionItem): string | undefined =>
  presentName(item.merchantName) ?? presentName(item.counterpartyName);

export const resolveMerchantLabel = (item: TransactionItem): string => {
  const name = resolveCounterpartyName(item);

  if (name) {
    return name;
  }

  return item.isLoad ? TOP_UP_LABEL : UNKNOWN_MERCHANT_LABEL;
};

/** Zero-amount and declined items stay in the ledger but never count. */
export const isCountable = (item: TransactionItem): boolean =>
  item.amount.minor !== 0 && !item.declineReason;

export const aggregateLedger = (items: readonly TransactionItem[]): LedgerAggregate => {
  const aggregate: LedgerAggregate = {
    inbound: new MonthlyTotals(),
    outbound: new MonthlyTotals(),
    categories: new MonthlyBreakdown(),
    merchants: new MonthlyBreakdown(),
  };

  for (const item of items) {
    if (!isCountable(item)) {
      continue;
    }

    const month = toMonthKey(item.createdAt);
    const amount = item.amount.minor;

    if (amount > 0) {
      aggregate.inbound.add(month, amount);
    } else {
      aggregate.outbound.add(month, amount);
    }

    aggregate.categories.add(month, item.category, amount);
    aggregate.merchants.add(month, resolveMerchantLabel(item), amount);
  }

  return aggregate;
};
