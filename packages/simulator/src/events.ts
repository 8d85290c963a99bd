import type {
  EquivocationEvidence,
  Proposal,
  ProposalId,
  ValidatorId,
  View,
} from '@bftsim/consensus';
import type { SignatureToken } from '@bftsim/crypto';

import type { AttackType } from './config';

/** Driver phases, in the order a complete run visits them. */
export const PHASE_ORDER = [
  'proposal',
  'voting',
  'qc-formation',
  'evidence-report',
  'view-change',
  'safe-round',
  'commit',
  'complete',
] as const;

export type RoundPhase = (typeof PHASE_ORDER)[number];

export type SimulationStatus = 'completed' | 'not-implemented' | 'failed';

export type WarningCode =
  /** A QC formed in a round where the split should have prevented it. */
  | 'unexpected-qc'
  /** QCs formed for two conflicting proposals of one view. */
  | 'safety-violation'
  /** An honest round failed to certify its proposal. */
  | 'missing-quorum';

interface EventBase {
  phase: RoundPhase;
  view: View;
}

export interface RunStartedEvent extends EventBase {
  kind: 'run-started';
  validators: ValidatorId[];
  faultyLeader: ValidatorId | null;
  quorum: number;
  faultTolerance: number;
  attack: AttackType;
  doubleSigners: ValidatorId[];
}

export interface LeaderElectedEvent extends EventBase {
  kind: 'leader-elected';
  leader: ValidatorId;
  faulty: boolean;
}

export interface ProposalDispatchedEvent extends EventBase {
  kind: 'proposal-dispatched';
  proposal: Proposal;
  proposalId: ProposalId;
  recipients: ValidatorId[];
}

export interface VoteCastEvent extends EventBase {
  kind: 'vote-cast';
  voterId: ValidatorId;
  proposalId: ProposalId;
  signature: SignatureToken;
  /** The voter also signs a conflicting proposal this view. */
  doubleSigned: boolean;
}

export interface QCOutcomeEvent extends EventBase {
  kind: 'qc-outcome';
  proposalId: ProposalId;
  formed: boolean;
  /** Whether this outcome is the one the round expects. */
  expected: boolean;
  /** Voters of the first certificate formed, empty when none. */
  voters: ValidatorId[];
  /** Nodes that formed a certificate. */
  nodes: ValidatorId[];
}

/** Split vote correctly stopped every proposal short of quorum. */
export interface NoQuorumEvent extends EventBase {
  kind: 'no-quorum';
  proposalIds: ProposalId[];
}

export interface WarningEvent extends EventBase {
  kind: 'warning';
  code: WarningCode;
  message: string;
  proposalIds: ProposalId[];
}

export interface EvidenceReportEvent extends EventBase {
  kind: 'evidence-report';
  evidence: EquivocationEvidence[];
}

export interface ViewChangeEvent extends EventBase {
  kind: 'view-change';
  fromView: View;
  leader: ValidatorId;
}

export interface CommitEvent extends EventBase {
  kind: 'commit';
  blockId: string;
  proposalId: ProposalId;
  /** Nodes that newly appended the block. */
  nodes: ValidatorId[];
}

export interface CommitLogEvent extends EventBase {
  kind: 'commit-log';
  commits: Record<ValidatorId, string[]>;
}

export interface NotImplementedEvent extends EventBase {
  kind: 'not-implemented';
  attack: AttackType;
  message: string;
}

export interface RoundFailedEvent extends EventBase {
  kind: 'round-failed';
  round: string;
  error: { code?: string; message: string };
}

export interface RunCompletedEvent extends EventBase {
  kind: 'run-completed';
  status: SimulationStatus;
}

export type SimulationEvent =
  | RunStartedEvent
  | LeaderElectedEvent
  | ProposalDispatchedEvent
  | VoteCastEvent
  | QCOutcomeEvent
  | NoQuorumEvent
  | WarningEvent
  | EvidenceReportEvent
  | ViewChangeEvent
  | CommitEvent
  | CommitLogEvent
  | NotImplementedEvent
  | RoundFailedEvent
  | RunCompletedEvent;

export type SimulationEventKind = SimulationEvent['kind'];

/** Narrow an event list to one kind. */
export function eventsOfKind<K extends SimulationEventKind>(
  events: readonly SimulationEvent[],
  kind: K,
): Extract<SimulationEvent, { kind: K }>[] {
  return events.filter((event): event is Extract<SimulationEvent, { kind: K }> => event.kind === kind);
}
