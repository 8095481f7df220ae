import { z } from 'zod';
import {
  AccountsResponseSchema,
  BalanceResponseSchema,
  PotsResponseSchema,
  TransactionsResponseSchema,
  WhoAmIResponseSchema,
  WireAccountDTO,
  WirePotDTO,
  WireTransactionDTO,
} from '../../../application/dto/BankingApiDTO.js';
import { BankingApiPort } from '../../../application/ports/BankingApiPort.js';
import { Account } from '../../../domain/entities/Account.js';
import { Balance } from '../../../domain/entities/Balance.js';
import { Pot } from '../../../domain/entities/Pot.js';
import { TransactionItem, UNCATEGORIZED } from '../../../domain/entities/TransactionItem.js';
import { toMoney } from '../../../domain/services/Money.js';
import { compareTimestamps, isSameInstant, parseTimestamp } from '../../../domain/services/Timestamp.js';
import { HttpTransport } from '../../http/FetchTransport.js';
import { readUpstream } from './readUpstream.js';

export interface MonzoApiClientOptions {
  baseUrl: string;
  accessToken: string;
}

const byCreatedAt = (a: TransactionItem, b: TransactionItem): number => compareTimestamps(a.createdAt, b.createdAt);

const nonEmpty = (value: string | null | undefined): string | undefined => (value ? value : undefined);

export const toAccount = (wire: WireAccountDTO): Account => {
  const { id, closed, description, type, created, ...metadata } = wire;

  return { id, closed, description, type, created, metadata };
};

export const toPot = (wire: WirePotDTO): Pot => ({
  id: wire.id,
  name: wire.name,
  balance: toMoney(wire.balance, wire.currency),
  deleted: wire.deleted,
});

export const toTransactionItem = (wire: WireTransactionDTO, accountId: string): TransactionItem => {
  // An unexpanded merchant is only an id; it carries no name.
  const merchantName = wire.merchant && typeof wire.merchant === 'object' ? nonEmpty(wire.merchant.name) : undefined;

  return {
    id: wire.id,
    accountId: wire.account_id ?? accountId,
    createdAt: parseTimestamp(wire.created),
    amount: toMoney(wire.amount, wire.currency),
    description: nonEmpty(wire.description),
    merchantName,
    counterpartyName: nonEmpty(wire.counterparty?.name),
    category: nonEmpty(wire.category) ?? UNCATEGORIZED,
    declineReason: nonEmpty(wire.decline_reason),
    isLoad: wire.is_load,
  };
};

/**
 * Client for the upstream banking REST API, bound to one bearer token.
 * Converts minor-unit amounts and timestamp text into domain values at the
 * boundary so nothing downstream sees the wire format.
 */
export class MonzoApiClient implements BankingApiPort {
  constructor(
    private readonly transport: HttpTransport,
    private readonly options: MonzoApiClientOptions,
  ) {}

  async whoAmI(): Promise<{ userId: string }> {
    const body = await this.get('/ping/whoami', {}, WhoAmIResponseSchema);
    return { userId: body.user_id };
  }

  async fetchAccounts(): Promise<Account[]> {
    const body = await this.get('/accounts', {}, AccountsResponseSchema);
    return body.accounts.map(toAccount);
  }

  async fetchPots(accountId: string): Promise<Pot[]> {
    const body = await this.get('/pots', { current_account_id: accountId }, PotsResponseSchema);
    return body.pots.map(toPot);
  }

  async fetchBalance(accountId: string): Promise<Balance> {
    const body = await this.get('/balance', { account_id: accountId }, BalanceResponseSchema);

    return {
      accountId,
      balance: toMoney(body.balance, body.currency),
      totalBalance: toMoney(body.total_balance ?? body.balance, body.currency),
      spendToday: toMoney(body.spend_today, body.currency),
    };
  }

  async fetchTransactions(accountId: string, since?: string): Promise<TransactionItem[]> {
    const cursor = since ? parseTimestamp(since) : undefined;
    const query: Record<string, string> = { account_id: accountId, 'expand[]': 'merchant' };

    if (since) {
      query.since = since;
    }

    const body = await this.get('/transactions', query, TransactionsResponseSchema);
    const items = body.transactions.map((wire) => toTransactionItem(wire, accountId));

    // `since` is inclusive upstream; the item sitting on the cursor is already cached.
    return items.filter((item) => !cursor || !isSameInstant(item.createdAt, cursor)).sort(byCreatedAt);
  }

  async fetchTransactionsForAccounts(accountIds: readonly string[], since?: string): Promise<TransactionItem[]> {
    const batches = await Promise.all(accountIds.map((accountId) => this.fetchTransactions(accountId, since)));
    return batches.flat().sort(byCreatedAt);
  }

  private async get<S extends z.ZodTypeAny>(
    path: string,
    query: Record<string, string>,
    schema: S,
  ): Promise<z.output<S>> {
    const url = new URL(path, this.options.baseUrl);

    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    console.log(`🌐 API call: GET ${path}`);

    const response = await this.transport({
      url: url.toString(),
      method: 'GET',
      headers: {
        Authorization: `Bearer ${this.options.accessToken}`,
        Accept: 'application/json',
      },
    });

    return readUpstream(response, path, schema);
  }
}
