import type { ValidatorId } from '@bftsim/consensus';
import { BftSimError, BftSimErrorCode } from '@bftsim/types';

import type { AttackType } from './config';

// ---------------------------------------------------------------------------
// Round specifications
// ---------------------------------------------------------------------------

/**
 * How a round picks its leader.
 * - `faulty`: the configured faulty leader, else the current rotation leader.
 * - `rotation`: the current rotation leader (advanced by each view change).
 */
export type LeaderPolicy = 'faulty' | 'rotation';

/** Which validators a proposal is shown to. Halves split at floor(N / 2). */
export type TargetSelector = 'all' | 'lower-half' | 'upper-half';

export interface ProposalSpec {
  blockId: string;
  targets: TargetSelector;
}

/**
 * One round of a scenario.
 *
 * `attack` rounds expect no quorum and end with an evidence report;
 * `commit` rounds expect quorum and apply the commit on every node.
 */
export interface RoundSpec {
  name: string;
  kind: 'attack' | 'commit';
  leader: LeaderPolicy;
  proposals: readonly ProposalSpec[];
}

export interface Scenario {
  attack: AttackType;
  description: string;
  rounds: readonly RoundSpec[];
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/** Faulty leader splits the validators between X and Y, then an honest leader commits Z. */
export const EQUIVOCATION_SCENARIO: Scenario = {
  attack: 'equivocation',
  description: 'Leader equivocates with two proposals sent to disjoint halves, followed by an honest recovery round',
  rounds: [
    {
      name: 'equivocation',
      kind: 'attack',
      leader: 'faulty',
      proposals: [
        { blockId: 'X', targets: 'lower-half' },
        { blockId: 'Y', targets: 'upper-half' },
      ],
    },
    {
      name: 'recovery',
      kind: 'commit',
      leader: 'rotation',
      proposals: [{ blockId: 'Z', targets: 'all' }],
    },
  ],
};

const SCENARIOS: Partial<Record<AttackType, Scenario>> = {
  equivocation: EQUIVOCATION_SCENARIO,
};

/** The round script for an attack, or `undefined` when none is implemented. */
export function scenarioFor(attack: AttackType): Scenario | undefined {
  return SCENARIOS[attack];
}

export function implementedAttacks(): AttackType[] {
  return Object.values(SCENARIOS).map((scenario) => scenario.attack);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function selectTargets(selector: TargetSelector, validators: readonly ValidatorId[]): ValidatorId[] {
  const half = Math.floor(validators.length / 2);
  switch (selector) {
    case 'all':
      return [...validators];
    case 'lower-half':
      return validators.slice(0, half);
    case 'upper-half':
      return validators.slice(half);
  }
}

/** Validator at `index` in rotation order, wrapping around. */
export function leaderAt(validators: readonly ValidatorId[], index: number): ValidatorId {
  const leader = validators[((index % validators.length) + validators.length) % validators.length];
  if (leader === undefined) {
    throw new BftSimError(BftSimErrorCode.INVALID_VALIDATOR_COUNT, 'Cannot pick a leader from an empty validator set');
  }
  return leader;
}

/**
 * The validator after `current` in rotation order; the first one if `current`
 * is unknown.
 *
 * The view change hands leadership to the successor of the faulty leader, not
 * to a fixed second validator, so a faulty leader other than A still gives
 * way to its neighbour (faulty leader C is followed by D).
 */
export function nextLeader(validators: readonly ValidatorId[], current: ValidatorId): ValidatorId {
  const index = validators.indexOf(current);
  return leaderAt(validators, index === -1 ? 0 : index + 1);
}
