import { signToken } from '@bftsim/crypto';
import { BftSimError, BftSimErrorCode, isInteger, isNonEmptyString } from '@bftsim/types';

import type {
  EquivocationEvidence,
  Proposal,
  ProposalId,
  ValidatorId,
  View,
  Vote,
} from './types';

/** Parent id used when no chain state is tracked. */
export const GENESIS = 'GENESIS';

export interface ProposalInput {
  blockId: string;
  view: View;
  proposerId: ValidatorId;
  /** Defaults to {@link GENESIS}. */
  parentId?: string;
}

/**
 * Build an immutable proposal.
 *
 * @throws {BftSimError} INVALID_PROPOSAL for empty ids or a view that is not a positive integer.
 */
export function createProposal(input: ProposalInput): Proposal {
  const parentId = input.parentId ?? GENESIS;
  if (!isNonEmptyString(input.blockId)) {
    throw new BftSimError(BftSimErrorCode.INVALID_PROPOSAL, 'Proposal blockId must be a non-empty string');
  }
  if (!isNonEmptyString(input.proposerId)) {
    throw new BftSimError(BftSimErrorCode.INVALID_PROPOSAL, 'Proposal proposerId must be a non-empty string');
  }
  if (!isNonEmptyString(parentId)) {
    throw new BftSimError(BftSimErrorCode.INVALID_PROPOSAL, 'Proposal parentId must be a non-empty string');
  }
  if (!isInteger(input.view) || input.view < 1) {
    throw new BftSimError(
      BftSimErrorCode.INVALID_PROPOSAL,
      `Proposal view must be a positive integer, got ${input.view}`,
      { context: { blockId: input.blockId } },
    );
  }
  return Object.freeze({
    blockId: input.blockId,
    parentId,
    view: input.view,
    proposerId: input.proposerId,
  });
}

export function proposalId(proposal: Proposal): ProposalId {
  return `${proposal.blockId}@v${proposal.view}`;
}

/** Two distinct blocks from one proposer in one view. */
export function conflicting(a: Proposal, b: Proposal): boolean {
  return a.view === b.view && a.proposerId === b.proposerId && a.blockId !== b.blockId;
}

/** Sign `proposal` on behalf of `voterId`. */
export function createVote(voterId: ValidatorId, proposal: Proposal): Vote {
  if (!isNonEmptyString(voterId)) {
    throw new BftSimError(BftSimErrorCode.INVALID_VOTE, 'Vote voterId must be a non-empty string');
  }
  return Object.freeze({
    voterId,
    proposal,
    signature: signToken(voterId, proposalId(proposal)),
  });
}

/** Build evidence with the two proposal ids in ascending order. */
export function createEvidence(
  voterId: ValidatorId,
  first: Proposal,
  second: Proposal,
): EquivocationEvidence {
  const a = proposalId(first);
  const b = proposalId(second);
  return Object.freeze({
    voterId,
    proposerId: first.proposerId,
    view: first.view,
    proposalA: a <= b ? a : b,
    proposalB: a <= b ? b : a,
  });
}

/** Dedup key for evidence. Independent of discovery order. */
export function evidenceKey(evidence: EquivocationEvidence): string {
  return `${evidence.voterId}|${evidence.proposalA}|${evidence.proposalB}`;
}
