import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { OAuthPort, OAuthTokenGrant } from '../../application/ports/OAuthPort.js';
import { NotAuthorizedError } from '../../domain/errors/AppError.js';
import { FakeBankingApi, buildItem } from '../../testing/builders.js';
import { InMemoryLedgerStore } from '../adapters/storage/InMemoryLedgerStore.js';
import { AppContainer } from '../bootstrap/AppContainer.js';
import { loadConfig } from '../config/Config.js';
import { createApp } from './createApp.js';

const NOW = 1_700_000_000_000;

const stubOAuth: OAuthPort = {
  isConfigured: () => true,
  buildAuthorizeUrl: (state) => `https://auth.example.test/?state=${state}`,
  exchangeCode: async (): Promise<OAuthTokenGrant> => ({ accessToken: 'test-token', expiresInSeconds: 3_600, userId: 'user_1' }),
};

describe('createApp', () => {
  let server: Server;
  let baseUrl: string;
  let api: FakeBankingApi;
  let ledgerStore: InMemoryLedgerStore;
  let container: AppContainer;

  beforeEach(async () => {
    api = new FakeBankingApi();
    api.transactions = [
      buildItem({ id: 'tx_1', created: '2023-03-01T09:00:00Z', amount: -2_500, merchant: 'Bookshop' }),
      buildItem({ id: 'tx_2', created: '2023-03-02T09:00:00Z', amount: 2_500, merchant: 'Bookshop' }),
    ];
    ledgerStore = new InMemoryLedgerStore();
    container = new AppContainer({
      config: loadConfig({}),
      oauth: stubOAuth,
      ledgerStore,
      createClient: () => api,
      now: () => NOW,
    });

    server = createApp(container).listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();

    if (!address || typeof address === 'string') {
      throw new Error('Server did not bind to a TCP port');
    }

    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  const signIn = async (sessionId: string) => {
    const start = await fetch(`${baseUrl}/api/auth/start?sessionId=${sessionId}`);
    const { authUrl } = z.object({ authUrl: z.string() }).parse(await start.json());
    const state = new URL(authUrl).searchParams.get('state') ?? '';

    return fetch(`${baseUrl}/callback?code=code-1&state=${state}`);
  };

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/api/health`);

    expect(await response.json()).toEqual({ name: 'Ledger Dashboard API', version: '0.1.0', oauthConfigured: true });
  });

  it('sends an unauthenticated session to re-authenticate', async () => {
    const response = await fetch(`${baseUrl}/api/dashboard?sessionId=sess_1`);

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      error: 'AUTH_EXPIRED',
      authUrl: expect.stringMatching(/^https:\/\/auth\.example\.test\/\?state=[A-Z0-9]{32}$/),
    });
  });

  it('rejects a request without a session id', async () => {
    const response = await fetch(`${baseUrl}/api/dashboard`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'sessionId is required' });
  });

  it('completes OAuth and serves the dashboard', async () => {
    const callback = await signIn('sess_1');
    expect(await callback.json()).toEqual({ status: 'connected', sessionId: 'sess_1' });

    const response = await fetch(`${baseUrl}/api/dashboard?sessionId=sess_1`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      defaultAccount: { id: 'acc_main' },
      inbound: { '2023-03': { minor: 2_500, decimal: '25.00' } },
      outbound: { '2023-03': { minor: -2_500, decimal: '-25.00' } },
      duplicates: ['tx_1', 'tx_2'],
    });
  });

  it('answers a forged callback state with 400', async () => {
    await fetch(`${baseUrl}/api/auth/start?sessionId=sess_1`);

    const response = await fetch(`${baseUrl}/callback?sessionId=sess_1&code=code-1&state=FORGED`);

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: 'STATE_MISMATCH' });
  });

  it('re-authenticates when upstream rejects the token', async () => {
    await signIn('sess_1');
    api.fetchAccounts = async () => {
      throw new NotAuthorizedError('/accounts');
    };

    const response = await fetch(`${baseUrl}/api/dashboard?sessionId=sess_1`);

    expect(response.status).toBe(401);
    expect(await response.json()).toMatchObject({ error: 'NOT_AUTHORIZED' });
  });

  it('clears the cache and logs out', async () => {
    await signIn('sess_1');
    await fetch(`${baseUrl}/api/dashboard?sessionId=sess_1`);
    expect(ledgerStore.size()).toBe(1);

    const clear = await fetch(`${baseUrl}/api/clear`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ sessionId: 'sess_1' }),
    });
    expect(await clear.json()).toEqual({ cleared: true });
    expect(ledgerStore.size()).toBe(0);

    await fetch(`${baseUrl}/api/dashboard?sessionId=sess_1`);
    const logout = await fetch(`${baseUrl}/api/logout`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ sessionId: 'sess_1' }),
    });
    expect(await logout.json()).toEqual({ loggedOut: true });
    expect(ledgerStore.size()).toBe(0);

    const after = await fetch(`${baseUrl}/api/dashboard?sessionId=sess_1`);
    expect(after.status).toBe(401);
  });

  it('answers unknown API paths with 404', async () => {
    const response = await fetch(`${baseUrl}/api/nope`);

    expect(response.status).toBe(404);
  });
});
