/** Hex-encoded SHA-256 digest (64 lowercase hex characters). */
export type HashHex = string;

/**
 * Opaque vote signature of the form `SIG(<signer>:<6 hex chars>)`.
 * Tags vote provenance only; nothing verifies it.
 */
export type SignatureToken = string;
