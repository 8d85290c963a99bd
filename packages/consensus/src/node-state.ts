import { tokenSigner } from '@bftsim/crypto';
import { BftSimError, BftSimErrorCode, isInteger } from '@bftsim/types';

import { conflicting, createEvidence, evidenceKey, proposalId } from './proposal';
import type {
  EquivocationEvidence,
  NodeSnapshot,
  Proposal,
  ProposalId,
  QuorumCertificate,
  RecordVoteResult,
  ValidatorId,
  Vote,
} from './types';

/** Index key grouping every vote a voter cast for one proposer in one view. */
function slotKey(vote: Vote): string {
  return `${vote.voterId}|${vote.proposal.view}|${vote.proposal.proposerId}`;
}

/**
 * Protocol state held by one validator: received votes, the equivocation
 * evidence derived from them, certificates and the commit log.
 *
 * Mutated only through {@link recordVote}, {@link tryFormQC} and
 * {@link applyQCCommit}. Evidence and the commit log only ever grow.
 */
export class NodeState {
  readonly id: ValidatorId;

  private readonly votesByProposal = new Map<ProposalId, Vote[]>();
  /** voter|view|proposer -> proposal id -> vote. */
  private readonly votesBySlot = new Map<string, Map<ProposalId, Vote>>();
  private readonly evidenceByKey = new Map<string, EquivocationEvidence>();
  private readonly committedBlocks: string[] = [];
  private highest: QuorumCertificate | undefined;

  constructor(id: ValidatorId) {
    this.id = id;
  }

  /**
   * Store a vote and derive equivocation evidence from it.
   *
   * A second vote by the same voter for the same proposal identity is
   * not counted again toward the quorum. It still reaches the voter's
   * per-proposer index, since the proposer may differ from the first one.
   */
  recordVote(vote: Vote): RecordVoteResult {
    if (tokenSigner(vote.signature) !== vote.voterId) {
      throw new BftSimError(
        BftSimErrorCode.INVALID_VOTE,
        `Vote from '${vote.voterId}' carries a signature that is not theirs`,
        { context: { node: this.id, signature: vote.signature } },
      );
    }
    const pid = proposalId(vote.proposal);
    const derived = this.indexBySlot(vote, pid);

    let votes = this.votesByProposal.get(pid);
    if (votes === undefined) {
      votes = [];
      this.votesByProposal.set(pid, votes);
    }
    if (votes.some((held) => held.voterId === vote.voterId)) {
      return { accepted: false, duplicate: true, evidence: derived };
    }
    votes.push(vote);
    return { accepted: true, duplicate: false, evidence: derived };
  }

  /** Add `vote` to its voter|view|proposer slot and return any new evidence. */
  private indexBySlot(vote: Vote, pid: ProposalId): EquivocationEvidence[] {
    const key = slotKey(vote);
    let slot = this.votesBySlot.get(key);
    if (slot === undefined) {
      slot = new Map<ProposalId, Vote>();
      this.votesBySlot.set(key, slot);
    }

    const derived: EquivocationEvidence[] = [];
    for (const other of slot.values()) {
      if (!conflicting(other.proposal, vote.proposal)) continue;
      const evidence = createEvidence(vote.voterId, other.proposal, vote.proposal);
      const id = evidenceKey(evidence);
      if (!this.evidenceByKey.has(id)) {
        this.evidenceByKey.set(id, evidence);
        derived.push(evidence);
      }
    }
    if (!slot.has(pid)) {
      slot.set(pid, vote);
    }
    return derived;
  }

  /**
   * Form a QC for `proposal` if at least `quorum` distinct voters endorsed it.
   *
   * The certificate holds the first `quorum` voters in arrival order, sorted
   * ascending, so repeated calls over the same votes return equal QCs.
   */
  tryFormQC(proposal: Proposal, quorum: number): QuorumCertificate | undefined {
    if (!isInteger(quorum) || quorum < 1) {
      throw new BftSimError(
        BftSimErrorCode.INVALID_QUORUM,
        `Quorum must be a positive integer, got ${quorum}`,
        { context: { node: this.id } },
      );
    }
    const votes = this.votesByProposal.get(proposalId(proposal)) ?? [];
    if (votes.length < quorum) {
      return undefined;
    }

    const voters = votes.slice(0, quorum).map((vote) => vote.voterId).sort();
    const qc: QuorumCertificate = Object.freeze({ proposal, voters: Object.freeze(voters) });
    if (this.highest === undefined || proposal.view > this.highest.proposal.view) {
      this.highest = qc;
    }
    return qc;
  }

  /**
   * Commit the QC's block. Returns false when the block was already committed.
   *
   * The QC is trusted as-is: there is no check that it extends the committed chain.
   */
  applyQCCommit(qc: QuorumCertificate): boolean {
    const { blockId } = qc.proposal;
    if (this.hasCommitted(blockId)) {
      return false;
    }
    this.committedBlocks.push(blockId);
    return true;
  }

  get committed(): readonly string[] {
    return [...this.committedBlocks];
  }

  /** Evidence in discovery order. */
  get evidence(): readonly EquivocationEvidence[] {
    return [...this.evidenceByKey.values()];
  }

  get highestQC(): QuorumCertificate | undefined {
    return this.highest;
  }

  hasCommitted(blockId: string): boolean {
    return this.committedBlocks.includes(blockId);
  }

  votesFor(proposal: Proposal | ProposalId): readonly Vote[] {
    const pid = typeof proposal === 'string' ? proposal : proposalId(proposal);
    return [...(this.votesByProposal.get(pid) ?? [])];
  }

  voteCount(proposal: Proposal | ProposalId): number {
    return this.votesFor(proposal).length;
  }

  /** Proposal identities in first-seen order. */
  proposalIds(): ProposalId[] {
    return [...this.votesByProposal.keys()];
  }

  snapshot(): NodeSnapshot {
    const votes: Record<ProposalId, ValidatorId[]> = {};
    for (const [pid, held] of this.votesByProposal) {
      votes[pid] = held.map((vote) => vote.voterId);
    }
    return {
      id: this.id,
      votes,
      evidence: [...this.evidence],
      committed: [...this.committedBlocks],
      highestQC: this.highest ?? null,
    };
  }
}
