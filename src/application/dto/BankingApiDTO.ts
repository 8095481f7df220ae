import { z } from 'zod';

// Wire shapes of the upstream banking API. Amounts are minor-unit integers and
// timestamps are text; both are normalized by the client, not here.

export const WireAccountSchema = z
  .object({
    id: z.string(),
    closed: z.boolean().default(false),
    description: z.string().default(''),
    type: z.string().optional(),
    created: z.string().optional(),
  })
  .passthrough();

export type WireAccountDTO = z.infer<typeof WireAccountSchema>;

export const AccountsResponseSchema = z.object({
  accounts: z.array(WireAccountSchema),
});

export const WirePotSchema = z
  .object({
    id: z.string(),
    name: z.string().default(''),
    balance: z.number(),
    currency: z.string().default('GBP'),
    deleted: z.boolean().default(false),
  })
  .passthrough();

export type WirePotDTO = z.infer<typeof WirePotSchema>;

export const PotsResponseSchema = z.object({
  pots: z.array(WirePotSchema),
});

export const BalanceResponseSchema = z
  .object({
    balance: z.number(),
    total_balance: z.number().optional(),
    currency: z.string(),
    spend_today: z.number().default(0),
  })
  .passthrough();

export type BalanceResponseDTO = z.infer<typeof BalanceResponseSchema>;

// With merchant expansion the merchant is an object; without it, an id string.
const WireMerchantSchema = z.union([
  z.object({ name: z.string().optional() }).passthrough(),
  z.string(),
  z.null(),
]);

const WireCounterpartySchema = z.union([z.object({ name: z.string().optional() }).passthrough(), z.null()]);

export const WireTransactionSchema = z
  .object({
    id: z.string(),
    account_id: z.string().optional(),
    created: z.string(),
    amount: z.number(),
    currency: z.string(),
    description: z.string().optional(),
    category: z.string().nullable().optional(),
    decline_reason: z.string().nullable().optional(),
    is_load: z.boolean().default(false),
    merchant: WireMerchantSchema.optional(),
    counterparty: WireCounterpartySchema.optional(),
  })
  .passthrough();

export type WireTransactionDTO = z.infer<typeof WireTransactionSchema>;

export const TransactionsResponseSchema = z.object({
  transactions: z.array(WireTransactionSchema),
});

export const WhoAmIResponseSchema = z
  .object({
    authenticated: z.boolean().optional(),
    user_id: z.string(),
  })
  .passthrough();

export const TokenResponseSchema = z
  .object({
    access_token: z.string(),
    expires_in: z.number(),
    user_id: z.string(),
    token_type: z.string().optional(),
  })
  .passthrough();

export type TokenResponseDTO = z.infer<typeof TokenResponseSchema>;
