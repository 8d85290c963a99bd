import { maxFaultTolerance, quorumFor } from '@bftsim/consensus';
import type { ValidatorId } from '@bftsim/consensus';
import {
  BftSimError,
  BftSimErrorCode,
  isFiniteNumber,
  isInteger,
  isNonEmptyString,
  isOneOf,
} from '@bftsim/types';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Attack selectors. Only some have a round script; see `scenarioFor`. */
export const ATTACK_TYPES = ['equivocation', 'withhold-qc', 'drop-messages'] as const;

export type AttackType = (typeof ATTACK_TYPES)[number];

export const MIN_VALIDATORS = 4;
export const MAX_VALIDATORS = 13;
export const DEFAULT_VALIDATORS = 7;
/** Seconds between phases; only presentation reads it. */
export const DEFAULT_STEP_DELAY = 0.9;
export const MAX_STEP_DELAY = 10;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SimulationConfigInput {
  validatorCount?: number;
  /** Fault bound f. Defaults to max(1, min(2, floor((N - 1) / 3))). */
  faultTolerance?: number;
  /** Quorum override. Defaults to 2f + 1. */
  quorum?: number;
  /**
   * Byzantine leader of the first view. `undefined` picks the first
   * validator; `null` means no faulty leader (plain rotation).
   */
  faultyLeader?: ValidatorId | null;
  attack?: AttackType;
  /** Validators that sign every proposal of an attack round. */
  doubleSigners?: readonly ValidatorId[];
  stepDelay?: number;
}

export interface SimulationConfig {
  readonly validatorCount: number;
  readonly faultTolerance: number;
  readonly quorum: number;
  /** Fixed rotation order. */
  readonly validators: readonly ValidatorId[];
  readonly faultyLeader: ValidatorId | null;
  readonly attack: AttackType;
  readonly doubleSigners: readonly ValidatorId[];
  readonly stepDelay: number;
}

// ---------------------------------------------------------------------------
// Validator ids
// ---------------------------------------------------------------------------

/** `A`..`Z` for the first 26 validators, `Node<i>` after that. */
export function validatorIds(count: number): ValidatorId[] {
  const ids: ValidatorId[] = [];
  for (let i = 0; i < count; i++) {
    ids.push(i < 26 ? String.fromCharCode(65 + i) : `Node${i}`);
  }
  return ids;
}

export function defaultFaultTolerance(validatorCount: number): number {
  return Math.max(1, Math.min(2, maxFaultTolerance(validatorCount)));
}

/**
 * Parse an attack selector from user text.
 *
 * @throws {BftSimError} INVALID_ATTACK_TYPE for anything outside {@link ATTACK_TYPES}.
 */
export function parseAttackType(text: string): AttackType {
  const normalized = text.trim().toLowerCase();
  if (!isOneOf(normalized, ATTACK_TYPES)) {
    throw new BftSimError(
      BftSimErrorCode.INVALID_ATTACK_TYPE,
      `Unknown attack type '${text}'`,
      { hint: `Use one of: ${ATTACK_TYPES.join(', ')}` },
    );
  }
  return normalized;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Apply defaults and validate a configuration. Runs before any round so
 * that bad quorum math is rejected up front.
 *
 * @throws {BftSimError} with a configuration error code.
 */
export function resolveConfig(input: SimulationConfigInput = {}): SimulationConfig {
  const validatorCount = input.validatorCount ?? DEFAULT_VALIDATORS;
  if (!isInteger(validatorCount) || validatorCount < MIN_VALIDATORS || validatorCount > MAX_VALIDATORS) {
    throw new BftSimError(
      BftSimErrorCode.INVALID_VALIDATOR_COUNT,
      `Validator count must be an integer between ${MIN_VALIDATORS} and ${MAX_VALIDATORS}, got ${validatorCount}`,
      { context: { validatorCount } },
    );
  }

  const maxF = maxFaultTolerance(validatorCount);
  const faultTolerance = input.faultTolerance ?? defaultFaultTolerance(validatorCount);
  if (!isInteger(faultTolerance) || faultTolerance < 0 || faultTolerance > maxF) {
    throw new BftSimError(
      BftSimErrorCode.INVALID_FAULT_BOUND,
      `Fault tolerance must be an integer between 0 and floor((${validatorCount} - 1) / 3) = ${maxF}, got ${faultTolerance}`,
      { hint: 'Lower the fault bound or add validators', context: { validatorCount, faultTolerance } },
    );
  }

  const quorum = input.quorum ?? quorumFor(faultTolerance);
  if (!isInteger(quorum) || quorum < 1 || quorum > validatorCount) {
    throw new BftSimError(
      BftSimErrorCode.INVALID_QUORUM,
      `Quorum must be an integer between 1 and ${validatorCount}, got ${quorum}`,
      { context: { validatorCount, quorum } },
    );
  }

  const validators = validatorIds(validatorCount);

  let faultyLeader: ValidatorId | null;
  if (input.faultyLeader === undefined) {
    faultyLeader = validators[0] ?? null;
  } else if (input.faultyLeader === null) {
    faultyLeader = null;
  } else if (validators.includes(input.faultyLeader)) {
    faultyLeader = input.faultyLeader;
  } else {
    throw new BftSimError(
      BftSimErrorCode.UNKNOWN_LEADER,
      `Faulty leader '${input.faultyLeader}' is not one of ${validators.join(', ')}`,
      { hint: "Pick a validator id or 'none'" },
    );
  }

  const attack = input.attack ?? 'equivocation';
  if (!isOneOf(attack, ATTACK_TYPES)) {
    throw new BftSimError(
      BftSimErrorCode.INVALID_ATTACK_TYPE,
      `Unknown attack type '${String(attack)}'`,
      { hint: `Use one of: ${ATTACK_TYPES.join(', ')}` },
    );
  }

  const doubleSigners: ValidatorId[] = [];
  for (const id of input.doubleSigners ?? []) {
    if (!isNonEmptyString(id) || !validators.includes(id)) {
      throw new BftSimError(
        BftSimErrorCode.UNKNOWN_VALIDATOR,
        `Double signer '${id}' is not one of ${validators.join(', ')}`,
      );
    }
    if (!doubleSigners.includes(id)) {
      doubleSigners.push(id);
    }
  }

  const stepDelay = input.stepDelay ?? DEFAULT_STEP_DELAY;
  if (!isFiniteNumber(stepDelay) || stepDelay < 0 || stepDelay > MAX_STEP_DELAY) {
    throw new BftSimError(
      BftSimErrorCode.INVALID_STEP_DELAY,
      `Step delay must be between 0 and ${MAX_STEP_DELAY} seconds, got ${stepDelay}`,
    );
  }

  return Object.freeze({
    validatorCount,
    faultTolerance,
    quorum,
    validators: Object.freeze(validators),
    faultyLeader,
    attack,
    doubleSigners: Object.freeze(doubleSigners),
    stepDelay,
  });
}
