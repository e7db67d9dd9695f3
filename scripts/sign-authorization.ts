#!/usr/bin/env tsx
/**
 * Sign a collection fee authorization as the marketplace operator.
 *
 * Usage:
 *   MARKETPLACE_OPERATOR_SEED=<hex|base58> tsx scripts/sign-authorization.ts \
 *     --counterparty <id> --collection-owner <id> --fee-bps <n>
 *
 * Prints the JSON body fields expected by the buy and accept routes.
 */

import { z } from 'zod';
import {
  BPS_DENOMINATOR,
  formatIssues,
  identityFromPublicKey,
  identitySchema,
  keyPairFromSeed,
  signFeeAuthorization,
} from 'ledger-core';

const argsSchema = z.object({
  counterparty: identitySchema,
  'collection-owner': identitySchema,
  'fee-bps': z.coerce.number().int().min(0).max(BPS_DENOMINATOR),
  seed: z.string().min(1, 'MARKETPLACE_OPERATOR_SEED or --seed required'),
});

function parseFlags(argv: string[]): Record<string, string> {
  const flags: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--') && i + 1 < argv.length) {
      flags[arg.slice(2)] = argv[++i];
    }
  }
  return flags;
}

function main(): void {
  const parsed = argsSchema.safeParse({
    seed: process.env.MARKETPLACE_OPERATOR_SEED,
    ...parseFlags(process.argv.slice(2)),
  });
  if (!parsed.success) {
    for (const issue of formatIssues(parsed.error)) console.error(issue);
    process.exit(1);
  }

  const args = parsed.data;
  const keys = keyPairFromSeed(args.seed);
  const terms = {
    collectionOwner: args['collection-owner'],
    collectionFeeBps: args['fee-bps'],
    counterparty: args.counterparty,
  };

  console.log(
    JSON.stringify(
      {
        operator: identityFromPublicKey(keys.publicKey),
        authorization: signFeeAuthorization(keys.secretKey, terms),
        collectionOwner: terms.collectionOwner,
        collectionFeeBps: terms.collectionFeeBps,
      },
      null,
      2
    )
  );
}

main();
