/**
 * Error code system for the bftsim packages.
 *
 * Every error carries a code (BFTSIM_Exxx) that maps to one failure mode,
 * so callers branch on codes instead of parsing messages.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All bftsim error codes. */
export enum BftSimErrorCode {
  // Configuration (1xx)
  /** The validator count is not an integer in the supported range. */
  INVALID_VALIDATOR_COUNT = 'BFTSIM_E100',
  /** The fault bound exceeds floor((N - 1) / 3) or is negative. */
  INVALID_FAULT_BOUND = 'BFTSIM_E101',
  /** The quorum threshold is not an integer in 1..N. */
  INVALID_QUORUM = 'BFTSIM_E102',
  /** The configured faulty leader is not one of the validators. */
  UNKNOWN_LEADER = 'BFTSIM_E103',
  /** A configured validator id (e.g. a double signer) does not exist. */
  UNKNOWN_VALIDATOR = 'BFTSIM_E104',
  /** The pacing delay is negative or too large. */
  INVALID_STEP_DELAY = 'BFTSIM_E105',
  /** The attack type is not one of the known selectors. */
  INVALID_ATTACK_TYPE = 'BFTSIM_E106',
  /** The configuration file could not be parsed or has bad fields. */
  INVALID_CONFIG_FILE = 'BFTSIM_E107',

  // Protocol values (2xx)
  /** A proposal was built with an empty id or a non-positive view. */
  INVALID_PROPOSAL = 'BFTSIM_E200',
  /** A vote has an empty voter id or a signature from someone else. */
  INVALID_VOTE = 'BFTSIM_E201',

  // Scenario (3xx)
  /** A round threw while executing and was aborted. */
  ROUND_FAILED = 'BFTSIM_E300',

  // CLI (4xx)
  /** The command is not known to the CLI. */
  UNKNOWN_COMMAND = 'BFTSIM_E400',
  /** A command-line option has a missing or malformed value. */
  INVALID_OPTION = 'BFTSIM_E401',
}

// ─── Error class ────────────────────────────────────────────────────────────────

/** Options for constructing a BftSimError. */
export interface BftSimErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error. */
  cause?: Error;
}

/**
 * Base error class for all bftsim errors.
 *
 * @example
 * ```typescript
 * throw new BftSimError(
 *   BftSimErrorCode.INVALID_FAULT_BOUND,
 *   'f = 3 exceeds floor((7 - 1) / 3) = 2',
 *   { hint: 'Lower --faults or add validators' }
 * );
 * ```
 */
export class BftSimError extends Error {
  readonly code: BftSimErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: BftSimErrorCode, message: string, options?: BftSimErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'BftSimError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /** Structured representation for log entries and JSON output. */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Format an error for terminal output.
 *
 * @example
 * ```typescript
 * formatError(err);
 * // [BFTSIM_E101] f = 3 exceeds floor((7 - 1) / 3) = 2
 * // Hint: Lower --faults or add validators
 * ```
 */
export function formatError(error: BftSimError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}

/** Render any thrown value as a one-line message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
