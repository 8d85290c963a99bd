import type { SignatureToken } from '@bftsim/crypto';

/** Validator identifier, e.g. `"A"` or `"Node26"`. */
export type ValidatorId = string;

/** Consensus view number (1-based). */
export type View = number;

/** Proposal identity string `"<blockId>@v<view>"`. */
export type ProposalId = string;

/**
 * A candidate block proposed by a leader in a view.
 * Identity is `(blockId, view)`; the proposer is not part of it.
 */
export interface Proposal {
  readonly blockId: string;
  readonly parentId: string;
  readonly view: View;
  readonly proposerId: ValidatorId;
}

/** A voter's signed endorsement of one proposal. */
export interface Vote {
  readonly voterId: ValidatorId;
  readonly proposal: Proposal;
  readonly signature: SignatureToken;
}

/**
 * Proof that `voterId` signed two distinct proposals from the same proposer
 * in the same view. `proposalA` sorts before `proposalB`.
 */
export interface EquivocationEvidence {
  readonly voterId: ValidatorId;
  readonly proposerId: ValidatorId;
  readonly view: View;
  readonly proposalA: ProposalId;
  readonly proposalB: ProposalId;
}

/** A proposal plus the ascending, duplicate-free set of voters that certified it. */
export interface QuorumCertificate {
  readonly proposal: Proposal;
  readonly voters: readonly ValidatorId[];
}

export interface RecordVoteResult {
  /** False when the vote repeated one already held for the same proposal. */
  accepted: boolean;
  duplicate: boolean;
  /** Evidence first derived by this vote. */
  evidence: EquivocationEvidence[];
}

/** Plain-data view of a node's protocol state. */
export interface NodeSnapshot {
  id: ValidatorId;
  votes: Record<ProposalId, ValidatorId[]>;
  evidence: EquivocationEvidence[];
  committed: string[];
  highestQC: QuorumCertificate | null;
}
