import { z } from 'zod';
import { ConfigError, formatIssues } from 'ledger-core';

const apiEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
  CORE_API_PORT: z.coerce.number().int().min(1).max(65535).default(4010),
  CORE_API_HOST: z.string().min(1).default('0.0.0.0'),
  CORE_API_SECRET: z.string().min(1).optional(),
  CORS_ORIGIN: z.string().min(1).default('http://localhost:3000'),
});

export interface ApiConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  port: number;
  host: string;
  // Shared with trusted front ends; unset disables the check
  secret?: string;
  corsOrigin: string;
}

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = apiEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const data = parsed.data;
  return {
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    port: data.CORE_API_PORT,
    host: data.CORE_API_HOST,
    secret: data.CORE_API_SECRET,
    corsOrigin: data.CORS_ORIGIN,
  };
}
