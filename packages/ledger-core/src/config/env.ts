/**
 * Ledger configuration
 *
 * Parsed from process.env (loaded by dotenv in the entry point) and
 * validated once at boot.
 */

import { z } from 'zod';
import { BPS_DENOMINATOR, DEFAULT_MARKETPLACE_FEE_BPS } from '../types';

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export const identitySchema = z
  .string()
  .trim()
  .min(1, 'Identity required')
  .max(100, 'Identity too long');

const feeBpsSchema = z.coerce
  .number()
  .int('Fee must be an integer number of basis points')
  .min(0)
  .max(BPS_DENOMINATOR);

const ledgerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  LEDGER_BACKEND: z.enum(['memory', 'postgres']).default('memory'),
  MARKETPLACE_OPERATOR: identitySchema,
  MARKETPLACE_CUSTODIAN: identitySchema.default('marketplace'),
  MARKETPLACE_FEE_BPS: feeBpsSchema.default(DEFAULT_MARKETPLACE_FEE_BPS),
});

export interface LedgerConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
  backend: 'memory' | 'postgres';
  operator: string;
  custodian: string;
  marketplaceFeeBps: number;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = ledgerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const data = parsed.data;
  return {
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    backend: data.LEDGER_BACKEND,
    operator: data.MARKETPLACE_OPERATOR,
    custodian: data.MARKETPLACE_CUSTODIAN,
    marketplaceFeeBps: data.MARKETPLACE_FEE_BPS,
  };
}
