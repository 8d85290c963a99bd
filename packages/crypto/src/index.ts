import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { BftSimError, BftSimErrorCode, isNonEmptyString } from '@bftsim/types';

export type { HashHex, SignatureToken } from './types';

import type { HashHex, SignatureToken } from './types';

/** Number of digest hex characters kept in a signature token. */
export const SIGNATURE_DIGEST_LENGTH = 6;

const SIGNATURE_PATTERN = /^SIG\((.+):([0-9a-f]{6})\)$/;

/**
 * SHA-256 of raw bytes, hex-encoded.
 *
 * @example
 * ```typescript
 * sha256(new Uint8Array()); // 'e3b0c442...b855'
 * ```
 */
export function sha256(data: Uint8Array): HashHex {
  return bytesToHex(nobleSha256(data));
}

/** SHA-256 of a UTF-8 string. */
export function sha256String(data: string): HashHex {
  return sha256(utf8ToBytes(data));
}

/**
 * Deterministic JSON serialization: object keys are sorted recursively and
 * `undefined` members dropped, so key insertion order never changes the output.
 *
 * @example
 * ```typescript
 * canonicalizeJson({ z: 1, a: 2 }); // '{"a":2,"z":1}'
 * ```
 */
export function canonicalizeJson(obj: unknown): string {
  return JSON.stringify(sortKeys(obj));
}

function sortKeys(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, member] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (member !== undefined) {
        sorted[key] = sortKeys(member);
      }
    }
    return sorted;
  }
  return value;
}

/** SHA-256 of the canonical JSON form of `obj`. */
export function sha256Object(obj: unknown): HashHex {
  return sha256String(canonicalizeJson(obj));
}

/**
 * Produce the signature token a signer attaches to a vote for a proposal.
 *
 * Pure: the same signer and proposal identity always yield the same token.
 * There is no key material and no verification step.
 *
 * @param signerId - Validator id casting the vote.
 * @param proposalId - Proposal identity, e.g. `"X@v1"`.
 *
 * @example
 * ```typescript
 * signToken('A', 'X@v1'); // 'SIG(A:<6 hex>)'
 * ```
 */
export function signToken(signerId: string, proposalId: string): SignatureToken {
  if (!isNonEmptyString(signerId) || !isNonEmptyString(proposalId)) {
    throw new BftSimError(
      BftSimErrorCode.INVALID_VOTE,
      `signToken() needs a signer and a proposal id, got '${signerId}' and '${proposalId}'`,
    );
  }
  const digest = sha256String(`${signerId}|${proposalId}`);
  return `SIG(${signerId}:${digest.slice(0, SIGNATURE_DIGEST_LENGTH)})`;
}

/** The signer id embedded in a token, or `undefined` for malformed tokens. */
export function tokenSigner(token: SignatureToken): string | undefined {
  return SIGNATURE_PATTERN.exec(token)?.[1];
}
