import { TransactionItem } from '../entities/TransactionItem.js';
import { isCountable, resolveCounterpartyName } from './LedgerAggregator.js';

const pairKey = (name: string, minor: number): string => JSON.stringify([name, minor]);

/**
 * Streaming matcher for opposite-amount pairs with the same counterparty
 * (pot withdrawal mirrored by a pot deposit, refunds). Feed items in
 * ascending time order. Each item pairs at most once, always with the
 * earliest unmatched complement.
 */
export class DuplicateTransferMatcher {
  private readonly pending = new Map<string, string[]>();
  private readonly matched = new Set<string>();

  observe(item: TransactionItem): void {
    if (!isCountable(item)) {
      return;
    }

    const name = resolveCounterpartyName(item);

    if (!name) {
      return;
    }

    const complementKey = pairKey(name, -item.amount.minor);
    const waiting = this.pending.get(complementKey);

    if (waiting && waiting.length > 0) {
      const [earliest, ...rest] = waiting;

      if (rest.length > 0) {
        this.pending.set(complementKey, rest);
      } else {
        this.pending.delete(complementKey);
      }

      this.matched.add(item.id);
      this.matched.add(earliest);
      return;
    }

    const ownKey = pairKey(name, item.amount.minor);
    this.pending.set(ownKey, [...(this.pending.get(ownKey) ?? []), item.id]);
  }

  /** Number of ids still waiting for a complement. */
  get pendingCount(): number {
    let count = 0;
    for (const ids of this.pending.values()) {
      count += ids.length;
    }
    return count;
  }

  duplicates(): ReadonlySet<string> {
    return new Set(this.matched);
  }
}

export const findDuplicateTransfers = (items: readonly TransactionItem[]): ReadonlySet<string> => {
  const matcher = new DuplicateTransferMatcher();

  for (const item of items) {
    matcher.observe(item);
  }

  return matcher.duplicates();
};
