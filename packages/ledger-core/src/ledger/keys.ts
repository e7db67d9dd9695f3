import type { TokenKey } from '../types';

export function keyDetails(key: TokenKey): Record<string, string> {
  return { asset: key.asset, tokenId: key.tokenId.toString() };
}

// Strips operation fields so only the key reaches the store
export function tokenKey(input: TokenKey): TokenKey {
  return { asset: input.asset, tokenId: input.tokenId };
}
