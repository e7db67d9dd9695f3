/**
 * Typed marketplace failures.
 *
 * Every failure aborts the whole call; the execution host rolls back
 * anything the call already wrote before the error is rethrown.
 */

export type MarketplaceErrorCode =
  // Preconditions
  | 'NotOwner'
  | 'CanNotBeOwner'
  | 'AlreadyListed'
  | 'NotListed'
  | 'PriceMustBeAboveZero'
  | 'NotApprovedForMarketplace'
  | 'AlreadyOffered'
  | 'NoOffered'
  // Economic mismatch
  | 'PriceNotMet'
  | 'OfferPriceNotMet'
  | 'InsufficientFunds'
  // Authorization
  | 'NotSignedByMarketplaceOwner'
  | 'NotMarketplaceOwner'
  // Fee configuration
  | 'InvalidFeeBasisPoints'
  | 'CombinedFeesExceedPrice'
  // Downstream transfers
  | 'MarketplaceProceedsTransferFailed'
  | 'CollectionOwnerProceedsTransferFailed'
  | 'SellerProceedsTransferFailed'
  | 'CancelOfferProceedsTransferFailed'
  // Concurrency
  | 'ReentrantCall';

export type ErrorDetails = Record<string, string>;

export class MarketplaceError extends Error {
  readonly code: MarketplaceErrorCode;
  readonly details: ErrorDetails;

  constructor(code: MarketplaceErrorCode, details: ErrorDetails = {}, message?: string) {
    super(message ?? formatMessage(code, details));
    this.name = 'MarketplaceError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Raised by token registry implementations when ownership or approval
 * does not allow a transfer.
 */
export class TokenRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenRegistryError';
  }
}

export function isMarketplaceError(
  error: unknown,
  code?: MarketplaceErrorCode
): error is MarketplaceError {
  if (!(error instanceof MarketplaceError)) return false;
  return code === undefined || error.code === code;
}

function formatMessage(code: MarketplaceErrorCode, details: ErrorDetails): string {
  const args = Object.values(details);
  return args.length > 0 ? `${code}(${args.join(', ')})` : code;
}
