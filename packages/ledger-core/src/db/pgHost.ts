/**
 * PostgreSQL execution host
 *
 * Listings, offers, fee config, the custodial token registry mirror and
 * account balances share one database, so a single transaction covers a
 * whole marketplace call. A transaction-scoped advisory lock serializes
 * mutations across every process pointed at the same database.
 */

import { MarketplaceError, TokenRegistryError } from '../errors';
import type {
  ExecutionHost,
  LedgerScope,
  LedgerStore,
  TokenRegistry,
  ValueTransfer,
} from '../ports';
import { DEFAULT_MARKETPLACE_FEE_BPS, type Identity, type TokenKey } from '../types';
import { logger } from '../utils/logger';
import { getPool, transaction as pgTransaction, type SqlClient } from './client';

// Arbitrary constant shared by every marketplace process
export const MARKETPLACE_LOCK_KEY = 7_340_021;

export type TransactionRunner = <T>(callback: (client: SqlClient) => Promise<T>) => Promise<T>;

export interface PgHostOptions {
  custodian: Identity;
  defaultFeeBps?: number;
  transaction?: TransactionRunner;
  reader?: SqlClient;
}

function toBigInt(value: unknown, column: string): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'string' || typeof value === 'number') return BigInt(value);
  throw new Error(`Unexpected ${column} value: ${String(value)}`);
}

function toIdentity(value: unknown, column: string): Identity {
  if (typeof value !== 'string') {
    throw new Error(`Unexpected ${column} value: ${String(value)}`);
  }
  return value;
}

function keyParams(key: TokenKey): [string, string] {
  return [key.asset, key.tokenId.toString()];
}

export function createPgStore(client: SqlClient, defaultFeeBps: number): LedgerStore {
  return {
    async getListing(key) {
      const { rows } = await client.query(
        'SELECT price, seller FROM listings WHERE asset = $1 AND token_id = $2',
        keyParams(key)
      );
      if (rows.length === 0) return null;
      return {
        price: toBigInt(rows[0].price, 'price'),
        seller: toIdentity(rows[0].seller, 'seller'),
      };
    },

    async putListing(key, listing) {
      await client.query(
        `INSERT INTO listings (asset, token_id, price, seller, updated_at)
         VALUES ($1, $2, $3, $4, NOW())
         ON CONFLICT (asset, token_id)
         DO UPDATE SET price = EXCLUDED.price, seller = EXCLUDED.seller, updated_at = NOW()`,
        [...keyParams(key), listing.price.toString(), listing.seller]
      );
    },

    async deleteListing(key) {
      await client.query('DELETE FROM listings WHERE asset = $1 AND token_id = $2', keyParams(key));
    },

    async getOffer(key, offerer) {
      const { rows } = await client.query(
        'SELECT amount FROM offers WHERE asset = $1 AND token_id = $2 AND offerer = $3',
        [...keyParams(key), offerer]
      );
      return rows.length === 0 ? 0n : toBigInt(rows[0].amount, 'amount');
    },

    async setOffer(key, offerer, amount) {
      if (amount === 0n) {
        await client.query(
          'DELETE FROM offers WHERE asset = $1 AND token_id = $2 AND offerer = $3',
          [...keyParams(key), offerer]
        );
        return;
      }
      await client.query(
        `INSERT INTO offers (asset, token_id, offerer, amount, created_at)
         VALUES ($1, $2, $3, $4, NOW())
         ON CONFLICT (asset, token_id, offerer) DO UPDATE SET amount = EXCLUDED.amount`,
        [...keyParams(key), offerer, amount.toString()]
      );
    },

    async getMarketplaceFee() {
      const { rows } = await client.query(
        "SELECT fee_bps FROM marketplace_config WHERE key = 'main'"
      );
      return rows.length === 0 ? defaultFeeBps : Number(rows[0].fee_bps);
    },

    async setMarketplaceFee(feeBps) {
      await client.query(
        `INSERT INTO marketplace_config (key, fee_bps, updated_at)
         VALUES ('main', $1, NOW())
         ON CONFLICT (key) DO UPDATE SET fee_bps = EXCLUDED.fee_bps, updated_at = NOW()`,
        [feeBps]
      );
    },
  };
}

export function createPgRegistry(client: SqlClient): TokenRegistry {
  async function loadToken(key: TokenKey, lock: boolean) {
    const { rows } = await client.query(
      `SELECT owner, approved FROM registry_tokens
       WHERE asset = $1 AND token_id = $2${lock ? ' FOR UPDATE' : ''}`,
      keyParams(key)
    );
    if (rows.length === 0) {
      throw new TokenRegistryError(`Token ${key.asset}:${key.tokenId} does not exist`);
    }
    const approved = rows[0].approved;
    return {
      owner: toIdentity(rows[0].owner, 'owner'),
      approved: approved === null ? null : toIdentity(approved, 'approved'),
    };
  }

  return {
    async ownerOf(key) {
      return (await loadToken(key, false)).owner;
    },

    async getApproved(key) {
      return (await loadToken(key, false)).approved;
    },

    async safeTransferFrom(operator, from, to, key) {
      const token = await loadToken(key, true);
      if (token.owner !== from) {
        throw new TokenRegistryError(`Transfer from ${from}, but token is owned by ${token.owner}`);
      }
      if (operator !== from && token.approved !== operator) {
        throw new TokenRegistryError(`${operator} is not approved for ${key.asset}:${key.tokenId}`);
      }
      await client.query(
        `UPDATE registry_tokens SET owner = $3, approved = NULL, updated_at = NOW()
         WHERE asset = $1 AND token_id = $2`,
        [...keyParams(key), to]
      );
    },
  };
}

export function createPgValueTransfer(client: SqlClient, custodian: Identity): ValueTransfer {
  async function credit(account: Identity, amount: bigint): Promise<void> {
    await client.query(
      `INSERT INTO account_balances (account, balance)
       VALUES ($1, $2)
       ON CONFLICT (account) DO UPDATE SET balance = account_balances.balance + EXCLUDED.balance`,
      [account, amount.toString()]
    );
  }

  async function debit(account: Identity, amount: bigint): Promise<boolean> {
    const { rows } = await client.query(
      `UPDATE account_balances SET balance = balance - $2
       WHERE account = $1 AND balance >= $2
       RETURNING balance`,
      [account, amount.toString()]
    );
    return rows.length > 0;
  }

  return {
    async collect(from, amount) {
      if (!(await debit(from, amount))) {
        throw new MarketplaceError('InsufficientFunds', {
          account: from,
          required: amount.toString(),
        });
      }
      await credit(custodian, amount);
    },

    async transfer(to, amount) {
      try {
        const { rows } = await client.query(
          'SELECT accepts_transfers FROM account_balances WHERE account = $1',
          [to]
        );
        if (rows.length > 0 && rows[0].accepts_transfers === false) {
          return false;
        }
        if (!(await debit(custodian, amount))) {
          return false;
        }
        await credit(to, amount);
        return true;
      } catch (error) {
        logger.error(
          'Value transfer query failed',
          { to, amount },
          error instanceof Error ? error : new Error(String(error))
        );
        return false;
      }
    },
  };
}

export class PgExecutionHost implements ExecutionHost {
  private readonly custodian: Identity;
  private readonly defaultFeeBps: number;
  private readonly transaction: TransactionRunner;
  private readonly reader: SqlClient | null;

  constructor(options: PgHostOptions) {
    this.custodian = options.custodian;
    this.defaultFeeBps = options.defaultFeeBps ?? DEFAULT_MARKETPLACE_FEE_BPS;
    this.transaction = options.transaction ?? pgTransaction;
    this.reader = options.reader ?? null;
  }

  runAtomic<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T> {
    return this.transaction(async (client) => {
      await client.query('SELECT pg_advisory_xact_lock($1)', [MARKETPLACE_LOCK_KEY]);
      return work({
        store: createPgStore(client, this.defaultFeeBps),
        registry: createPgRegistry(client),
        value: createPgValueTransfer(client, this.custodian),
      });
    });
  }

  view<T>(read: (store: LedgerStore) => Promise<T>): Promise<T> {
    return read(createPgStore(this.reader ?? getPool(), this.defaultFeeBps));
  }
}
