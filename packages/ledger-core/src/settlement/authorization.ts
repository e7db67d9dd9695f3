import bs58 from 'bs58';
import nacl from 'tweetnacl';
import type { SignatureOracle } from '../ports';
import type { FeeAuthorization, FeeAuthorizationTerms, Identity } from '../types';
import { logger } from '../utils/logger';

/**
 * Message the marketplace operator signs to sanction a collection fee for
 * one specific buyer or accepting owner.
 */
export function buildFeeAuthorizationMessage(terms: FeeAuthorizationTerms): string {
  return [
    'Authorize marketplace collection fee',
    '',
    `Collection owner: ${terms.collectionOwner}`,
    `Collection fee (bps): ${terms.collectionFeeBps}`,
    `Counterparty: ${terms.counterparty}`,
  ].join('\n');
}

/**
 * Sign fee terms with an ed25519 secret key (64 bytes, tweetnacl layout).
 */
export function signFeeAuthorization(
  secretKey: Uint8Array,
  terms: FeeAuthorizationTerms
): FeeAuthorization {
  const keyPair = nacl.sign.keyPair.fromSecretKey(secretKey);
  const message = new TextEncoder().encode(buildFeeAuthorizationMessage(terms));
  const signature = nacl.sign.detached(message, keyPair.secretKey);

  return {
    signer: identityFromPublicKey(keyPair.publicKey),
    signature: bs58.encode(signature),
  };
}

export function identityFromPublicKey(publicKey: Uint8Array): Identity {
  return bs58.encode(publicKey);
}

export interface SigningKeyPair {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
}

/**
 * Derive a signing key pair from a 32-byte seed given as hex or base58.
 */
export function keyPairFromSeed(seed: string): SigningKeyPair {
  const bytes = /^[0-9a-fA-F]{64}$/.test(seed)
    ? Uint8Array.from(Buffer.from(seed, 'hex'))
    : bs58.decode(seed);

  if (bytes.length !== nacl.sign.seedLength) {
    throw new Error(`Seed must be ${nacl.sign.seedLength} bytes, got ${bytes.length}`);
  }
  return nacl.sign.keyPair.fromSeed(bytes);
}

/**
 * ed25519 signatures cannot be recovered from; the authorization names its
 * signer and recovery succeeds only when the signature verifies under that key.
 */
export class NaclSignatureOracle implements SignatureOracle {
  recoverSigner(message: string, authorization: FeeAuthorization): Identity | null {
    let publicKey: Uint8Array;
    let signature: Uint8Array;
    try {
      publicKey = bs58.decode(authorization.signer);
      signature = bs58.decode(authorization.signature);
    } catch (error) {
      logger.debug('Malformed fee authorization', {
        signer: authorization.signer,
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    if (
      publicKey.length !== nacl.sign.publicKeyLength ||
      signature.length !== nacl.sign.signatureLength
    ) {
      return null;
    }

    const valid = nacl.sign.detached.verify(
      new TextEncoder().encode(message),
      signature,
      publicKey
    );
    return valid ? authorization.signer : null;
  }
}
