import { describe, expect, it } from 'vitest';
import { buildItem } from '../../testing/builders.js';
import { UNCATEGORIZED } from '../entities/TransactionItem.js';
import { aggregateLedger, resolveMerchantLabel } from './LedgerAggregator.js';

const items = [
  buildItem({ id: 'tx_1', created: '2023-01-02T09:00:00Z', amount: 250_000, counterparty: 'Employer Ltd', category: 'income' }),
  buildItem({ id: 'tx_2', created: '2023-01-05T12:30:00.120Z', amount: -1_250, merchant: 'Corner Cafe', category: 'eating_out' }),
  buildItem({ id: 'tx_3', created: '2023-01-09T18:00:00Z', amount: -3_499, merchant: 'Corner Cafe', category: 'eating_out' }),
  buildItem({ id: 'tx_4', created: '2023-01-20T08:00:00Z', amount: 0, merchant: 'Card Check', category: 'general' }),
  buildItem({ id: 'tx_5', created: '2023-01-21T08:00:00Z', amount: -9_900, merchant: 'Gadget Shop', declineReason: 'INSUFFICIENT_FUNDS' }),
  buildItem({ id: 'tx_6', created: '2023-01-31T23:59:59Z', amount: 5_000, isLoad: true, category: 'general' }),
  buildItem({ id: 'tx_7', created: '2023-02-01T00:00:00.500Z', amount: -2_000, category: 'transport' }),
];

describe('aggregateLedger', () => {
  it('splits sums by sign and month', () => {
    const aggregate = aggregateLedger(items);

    expect(aggregate.inbound.toRecord()).toEqual({ '2023-01': 255_000 });
    expect(aggregate.outbound.toRecord()).toEqual({ '2023-01': -4_749, '2023-02': -2_000 });
  });

  it('matches the sum of countable positive and negative amounts', () => {
    const aggregate = aggregateLedger(items);
    const countable = items.filter((item) => item.amount.minor !== 0 && !item.declineReason);

    const positives = countable.filter((item) => item.amount.minor > 0).reduce((sum, item) => sum + item.amount.minor, 0);
    const negatives = countable.filter((item) => item.amount.minor < 0).reduce((sum, item) => sum + item.amount.minor, 0);

    expect(aggregate.inbound.total()).toBe(positives);
    expect(aggregate.outbound.total()).toBe(negatives);
  });

  it('skips zero-amount and declined items everywhere', () => {
    const aggregate = aggregateLedger(items);

    expect(aggregate.merchants.get('2023-01', 'Card Check')).toBe(0);
    expect(aggregate.merchants.labels('2023-01')).not.toContain('Gadget Shop');
    expect(aggregate.categories.labels('2023-01')).toEqual(['eating_out', 'general', 'income']);
  });

  it('totals categories and merchants per month', () => {
    const aggregate = aggregateLedger(items);

    expect(aggregate.categories.toRecord()).toEqual({
      '2023-01': { eating_out: -4_749, general: 5_000, income: 250_000 },
      '2023-02': { transport: -2_000 },
    });
    expect(aggregate.merchants.toRecord()).toEqual({
      '2023-01': { 'Corner Cafe': -4_749, 'Employer Ltd': 250_000, 'Top-up': 5_000 },
      '2023-02': { '': -2_000 },
    });
  });

  it('lists months chronologically and reads absent keys as zero', () => {
    const aggregate = aggregateLedger(items);

    expect(aggregate.outbound.months()).toEqual(['2023-01', '2023-02']);
    expect(aggregate.inbound.get('2023-02')).toBe(0);
    expect(aggregate.categories.get('2024-01', 'income')).toBe(0);
  });

  it('returns empty maps for an empty ledger', () => {
    const aggregate = aggregateLedger([]);

    expect(aggregate.inbound.months()).toEqual([]);
    expect(aggregate.merchants.toRecord()).toEqual({});
  });
});

describe('resolveMerchantLabel', () => {
  const base = { id: 'tx', created: '2023-05-01T10:00:00Z', amount: 100 };

  it('prefers merchant, then counterparty', () => {
    expect(resolveMerchantLabel(buildItem({ ...base, merchant: 'Grocer', counterparty: 'Alex' }))).toBe('Grocer');
    expect(resolveMerchantLabel(buildItem({ ...base, counterparty: 'Alex' }))).toBe('Alex');
  });

  it('labels nameless top-ups and leaves other nameless items unknown', () => {
    expect(resolveMerchantLabel(buildItem({ ...base, isLoad: true }))).toBe('Top-up');
    expect(resolveMerchantLabel(buildItem({ ...base, isLoad: false }))).toBe('');
  });

  it('treats blank names as absent', () => {
    expect(resolveMerchantLabel(buildItem({ ...base, merchant: '  ', counterparty: 'Alex' }))).toBe('Alex');
  });

  it('uses the catch-all category when none is given', () => {
    expect(buildItem(base).category).toBe(UNCATEGORIZED);
  });
});
