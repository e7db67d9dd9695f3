/**
 * Structured Logger
 *
 * Consistent logging across the ledger and the core API.
 * JSON lines in production, pretty output everywhere else.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function minLogLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (isLogLevel(configured)) return configured;
  // Default to 'info' in production, 'debug' in development
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLogLevel()];
}

// Amounts are bigint; JSON.stringify throws on them without this
function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry, replacer);
  }

  const parts = [
    `[${entry.timestamp}]`,
    `[${entry.level.toUpperCase()}]`,
    entry.message,
  ];

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context, replacer, 2));
  }

  if (entry.error) {
    parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    if (entry.error.stack) {
      parts.push(`\n  Stack: ${entry.error.stack}`);
    }
  }

  return parts.join(' ');
}

function log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  };

  if (error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  const formatted = formatEntry(entry);

  switch (level) {
    case 'debug':
    case 'info':
      console.log(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    case 'error':
      console.error(formatted);
      break;
  }
}

export const logger = {
  debug: (message: string, context?: LogContext) => log('debug', message, context),
  info: (message: string, context?: LogContext) => log('info', message, context),
  warn: (message: string, context?: LogContext) => log('warn', message, context),
  error: (message: string, context?: LogContext, error?: Error) =>
    log('error', message, context, error),

  listing: {
    listed: (asset: string, tokenId: bigint, seller: string, price: bigint) =>
      log('info', 'Item listed', { asset, tokenId, seller, price }),

    repriced: (asset: string, tokenId: bigint, seller: string, price: bigint) =>
      log('info', 'Listing price updated', { asset, tokenId, seller, price }),

    canceled: (asset: string, tokenId: bigint, seller: string) =>
      log('info', 'Listing canceled', { asset, tokenId, seller }),

    bought: (asset: string, tokenId: bigint, buyer: string, price: bigint, paid: bigint) =>
      log('info', 'Item bought', { asset, tokenId, buyer, price, paid }),
  },

  offer: {
    made: (asset: string, tokenId: bigint, offerer: string, price: bigint, staked: bigint) =>
      log('info', 'Offer made', { asset, tokenId, offerer, price, staked }),

    canceled: (asset: string, tokenId: bigint, offerer: string, refunded: bigint) =>
      log('info', 'Offer canceled', { asset, tokenId, offerer, refunded }),

    accepted: (asset: string, tokenId: bigint, owner: string, offerer: string, price: bigint) =>
      log('info', 'Offer accepted', { asset, tokenId, owner, offerer, price }),
  },

  settlement: {
    completed: (payee: string, totalPrice: bigint, shares: Record<string, bigint>) =>
      log('info', 'Proceeds transferred', { payee, totalPrice, ...shares }),

    transferFailed: (recipient: string, amount: bigint, leg: string) =>
      log('warn', 'Proceeds transfer failed', { recipient, amount, leg }),

    reverted: (operation: string, code: string, caller: string) =>
      log('warn', 'Marketplace call reverted', { operation, code, caller }),
  },

  auth: {
    badAuthorization: (counterparty: string, collectionOwner: string) =>
      log('warn', 'Fee authorization not signed by marketplace owner', {
        counterparty,
        collectionOwner,
      }),

    unauthorized: (endpoint: string, reason: string) =>
      log('warn', 'Unauthorized access attempt', { endpoint, reason }),
  },

  api: {
    request: (method: string, path: string, actorId?: string) =>
      log('debug', 'API request', { method, path, actorId }),

    error: (method: string, path: string, error: Error) =>
      log('error', 'API error', { method, path }, error),
  },
};
