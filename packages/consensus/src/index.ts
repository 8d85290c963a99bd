/**
 * @bftsim/consensus: per-validator protocol state for a HotStuff-style
 * quorum-certificate protocol.
 *
 * @packageDocumentation
 */

export type {
  ValidatorId,
  View,
  ProposalId,
  Proposal,
  Vote,
  EquivocationEvidence,
  QuorumCertificate,
  RecordVoteResult,
  NodeSnapshot,
} from './types';

export {
  GENESIS,
  createProposal,
  proposalId,
  conflicting,
  createVote,
  createEvidence,
  evidenceKey,
} from './proposal';
export type { ProposalInput } from './proposal';

export { NodeState } from './node-state';

/**
 * Quorum threshold `2f + 1` for a fault bound `f`.
 *
 * With `N = 3f + 1` validators, two disjoint groups can never both reach it.
 */
export function quorumFor(faultTolerance: number): number {
  return 2 * faultTolerance + 1;
}

/** Largest fault bound `floor((N - 1) / 3)` that `N` validators tolerate. */
export function maxFaultTolerance(validatorCount: number): number {
  return Math.max(0, Math.floor((validatorCount - 1) / 3));
}
