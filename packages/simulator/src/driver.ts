import {
  NodeState,
  conflicting,
  createProposal,
  createVote,
  evidenceKey,
  proposalId,
} from '@bftsim/consensus';
import type {
  EquivocationEvidence,
  Proposal,
  ProposalId,
  QuorumCertificate,
  ValidatorId,
  Vote,
} from '@bftsim/consensus';
import { sha256Object } from '@bftsim/crypto';
import type { HashHex } from '@bftsim/crypto';
import {
  BftSimError,
  BftSimErrorCode,
  errorMessage,
  silentLogger,
} from '@bftsim/types';
import type { Logger } from '@bftsim/types';

import { resolveConfig } from './config';
import type { SimulationConfig, SimulationConfigInput } from './config';
import type {
  RoundPhase,
  SimulationEvent,
  SimulationStatus,
  WarningCode,
  WarningEvent,
} from './events';
import { leaderAt, nextLeader, scenarioFor, selectTargets } from './rounds';
import type { LeaderPolicy, RoundSpec, Scenario } from './rounds';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SimulationOptions {
  logger?: Logger;
  /** Called synchronously for every event as it is emitted. */
  onEvent?: (event: SimulationEvent) => void;
  /** Round script to use instead of the one registered for the attack. */
  scenario?: Scenario;
}

export interface SimulationResult {
  status: SimulationStatus;
  config: SimulationConfig;
  events: SimulationEvent[];
  /** First certificate formed for each certified proposal. */
  qcs: QuorumCertificate[];
  /** Evidence aggregated across every node, deduplicated. */
  evidence: EquivocationEvidence[];
  /** Per-node commit logs. */
  commits: Record<ValidatorId, string[]>;
  warnings: WarningEvent[];
  finalView: number;
  /** Phases visited, in order. */
  phases: RoundPhase[];
  /** Digest of the protocol outcome; equal for equal runs. */
  fingerprint: HashHex;
  error?: { code?: string; message: string };
}

interface DispatchedProposal {
  proposal: Proposal;
  targets: ValidatorId[];
}

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

/**
 * Sequences one run: a scripted list of rounds, each proposing, fanning
 * votes out to every node, forming certificates and then either reporting
 * evidence (attack rounds) or committing (commit rounds). Views advance
 * between rounds.
 *
 * Everything is synchronous. Each vote reaches every node before the next
 * vote is cast, so all nodes see the same delivery order.
 */
export class Simulation {
  readonly config: SimulationConfig;

  private readonly log: Logger;
  private readonly onEvent: ((event: SimulationEvent) => void) | undefined;
  private readonly scenario: Scenario | undefined;

  private nodeStates = new Map<ValidatorId, NodeState>();
  private events: SimulationEvent[] = [];
  private phases: RoundPhase[] = [];
  private warnings: WarningEvent[] = [];
  private qcs = new Map<ProposalId, QuorumCertificate>();
  private evidence = new Map<string, EquivocationEvidence>();
  private view = 1;
  private leader: ValidatorId | undefined;

  constructor(config: SimulationConfig, options: SimulationOptions = {}) {
    this.config = config;
    this.log = (options.logger ?? silentLogger).child('simulator.driver', { attack: config.attack });
    this.onEvent = options.onEvent;
    this.scenario = options.scenario ?? scenarioFor(config.attack);
    this.reset();
  }

  /** Protocol state of every validator, keyed by id. */
  get nodes(): ReadonlyMap<ValidatorId, NodeState> {
    return this.nodeStates;
  }

  node(id: ValidatorId): NodeState {
    const state = this.nodeStates.get(id);
    if (state === undefined) {
      throw new BftSimError(BftSimErrorCode.UNKNOWN_VALIDATOR, `No validator '${id}' in this simulation`);
    }
    return state;
  }

  /** Hand a vote to every node, in validator order. */
  deliver(vote: Vote): void {
    for (const state of this.nodeStates.values()) {
      const result = state.recordVote(vote);
      if (result.evidence.length > 0) {
        this.log.debug('Node derived equivocation evidence', {
          node: state.id,
          voter: vote.voterId,
          count: result.evidence.length,
        });
      }
    }
  }

  /**
   * Execute the scenario from a fresh state. Returns a result for every
   * outcome; only configuration problems throw, and those are caught earlier
   * by {@link resolveConfig}.
   */
  run(): SimulationResult {
    this.reset();
    const { config } = this;

    this.emit({
      kind: 'run-started',
      phase: 'proposal',
      view: this.view,
      validators: [...config.validators],
      faultyLeader: config.faultyLeader,
      quorum: config.quorum,
      faultTolerance: config.faultTolerance,
      attack: config.attack,
      doubleSigners: [...config.doubleSigners],
    });
    this.log.info('Run started', { validators: config.validatorCount, quorum: config.quorum });

    const scenario = this.scenario;
    if (scenario === undefined) {
      const message = `Attack type '${config.attack}' has no round script`;
      this.log.warn(message);
      this.emit({
        kind: 'not-implemented',
        phase: 'complete',
        view: this.view,
        attack: config.attack,
        message,
      });
      return this.finish('not-implemented');
    }

    for (const [index, round] of scenario.rounds.entries()) {
      try {
        if (index > 0) {
          this.changeView();
        }
        this.runRound(round);
      } catch (err) {
        const error = {
          code: err instanceof BftSimError ? err.code : BftSimErrorCode.ROUND_FAILED,
          message: errorMessage(err),
        };
        this.log.error('Round failed', { round: round.name, error: error.message });
        this.emit({
          kind: 'round-failed',
          phase: this.currentPhase(),
          view: this.view,
          round: round.name,
          error,
        });
        return this.finish('failed', error);
      }
    }

    return this.finish('completed');
  }

  // ── Rounds ──────────────────────────────────────────────────────────────────

  private runRound(round: RoundSpec): void {
    const attack = round.kind === 'attack';
    const openPhase: RoundPhase = attack ? 'proposal' : 'safe-round';
    this.log.debug('Round started', { round: round.name, view: this.view });

    const leader = this.selectLeader(round.leader);
    this.emit({
      kind: 'leader-elected',
      phase: openPhase,
      view: this.view,
      leader,
      faulty: leader === this.config.faultyLeader,
    });

    const dispatched: DispatchedProposal[] = round.proposals.map((spec) => ({
      proposal: createProposal({ blockId: spec.blockId, view: this.view, proposerId: leader }),
      targets: selectTargets(spec.targets, this.config.validators),
    }));
    for (const { proposal, targets } of dispatched) {
      this.emit({
        kind: 'proposal-dispatched',
        phase: openPhase,
        view: this.view,
        proposal,
        proposalId: proposalId(proposal),
        recipients: targets,
      });
    }

    const votePhase: RoundPhase = attack ? 'voting' : 'safe-round';
    for (const { proposal, targets } of dispatched) {
      const extra = attack ? this.config.doubleSigners.filter((id) => !targets.includes(id)) : [];
      for (const voterId of [...targets, ...extra]) {
        this.castVote(voterId, proposal, votePhase, attack && this.config.doubleSigners.includes(voterId));
      }
    }

    if (attack) {
      this.certifyAttackRound(dispatched.map((d) => d.proposal));
      this.reportEvidence();
    } else {
      this.commitRound(dispatched.map((d) => d.proposal));
    }
  }

  private castVote(voterId: ValidatorId, proposal: Proposal, phase: RoundPhase, doubleSigned: boolean): void {
    const vote = createVote(voterId, proposal);
    this.deliver(vote);
    this.emit({
      kind: 'vote-cast',
      phase,
      view: this.view,
      voterId,
      proposalId: proposalId(proposal),
      signature: vote.signature,
      doubleSigned,
    });
  }

  private certifyAttackRound(proposals: Proposal[]): void {
    const certified: QuorumCertificate[] = [];
    for (const proposal of proposals) {
      const { qc, nodes } = this.formQC(proposal);
      this.emit({
        kind: 'qc-outcome',
        phase: 'qc-formation',
        view: this.view,
        proposalId: proposalId(proposal),
        formed: qc !== undefined,
        expected: qc === undefined,
        voters: qc ? [...qc.voters] : [],
        nodes,
      });
      if (qc !== undefined) {
        certified.push(qc);
        this.warn('unexpected-qc', `QC formed for ${proposalId(proposal)} in an attack round`, [proposalId(proposal)]);
      }
    }

    if (certified.length === 0) {
      const ids = proposals.map(proposalId);
      this.log.info('No proposal reached quorum; safety preserved', { proposals: ids });
      this.emit({ kind: 'no-quorum', phase: 'qc-formation', view: this.view, proposalIds: ids });
      return;
    }

    const conflicts = certified.filter((qc) =>
      certified.some((other) => conflicting(qc.proposal, other.proposal)),
    );
    if (conflicts.length > 1) {
      const ids = conflicts.map((qc) => proposalId(qc.proposal));
      this.warn('safety-violation', `Conflicting QCs formed in view ${this.view}: ${ids.join(', ')}`, ids);
    }
  }

  private commitRound(proposals: Proposal[]): void {
    for (const proposal of proposals) {
      const pid = proposalId(proposal);
      let first: QuorumCertificate | undefined;
      const formedBy: ValidatorId[] = [];
      const committedBy: ValidatorId[] = [];
      for (const state of this.nodeStates.values()) {
        const qc = state.tryFormQC(proposal, this.config.quorum);
        if (qc === undefined) continue;
        first ??= qc;
        formedBy.push(state.id);
        if (state.applyQCCommit(qc)) {
          committedBy.push(state.id);
        }
      }

      this.emit({
        kind: 'qc-outcome',
        phase: 'commit',
        view: this.view,
        proposalId: pid,
        formed: first !== undefined,
        expected: first !== undefined,
        voters: first ? [...first.voters] : [],
        nodes: formedBy,
      });

      if (first === undefined) {
        this.warn('missing-quorum', `No QC formed for ${pid} in an honest round`, [pid]);
        continue;
      }
      this.qcs.set(pid, first);
      this.log.info('Block committed', { block: proposal.blockId, nodes: committedBy.length });
      this.emit({
        kind: 'commit',
        phase: 'commit',
        view: this.view,
        blockId: proposal.blockId,
        proposalId: pid,
        nodes: committedBy,
      });
    }
  }

  private formQC(proposal: Proposal): { qc: QuorumCertificate | undefined; nodes: ValidatorId[] } {
    let first: QuorumCertificate | undefined;
    const nodes: ValidatorId[] = [];
    for (const state of this.nodeStates.values()) {
      const qc = state.tryFormQC(proposal, this.config.quorum);
      if (qc !== undefined) {
        first ??= qc;
        nodes.push(state.id);
      }
    }
    if (first !== undefined) {
      this.qcs.set(proposalId(proposal), first);
    }
    return { qc: first, nodes };
  }

  private reportEvidence(): void {
    for (const state of this.nodeStates.values()) {
      for (const item of state.evidence) {
        const key = evidenceKey(item);
        if (!this.evidence.has(key)) {
          this.evidence.set(key, item);
        }
      }
    }
    const evidence = [...this.evidence.values()];
    if (evidence.length > 0) {
      this.log.warn('Equivocation evidence collected', { count: evidence.length });
    }
    this.emit({ kind: 'evidence-report', phase: 'evidence-report', view: this.view, evidence });
  }

  private changeView(): void {
    const fromView = this.view;
    this.view += 1;
    this.leader = nextLeader(this.config.validators, this.rotationLeader());
    this.log.info('View change', { fromView, view: this.view, leader: this.leader });
    this.emit({ kind: 'view-change', phase: 'view-change', view: this.view, fromView, leader: this.leader });
  }

  private selectLeader(policy: LeaderPolicy): ValidatorId {
    const leader = policy === 'faulty' && this.config.faultyLeader !== null
      ? this.config.faultyLeader
      : this.rotationLeader();
    this.leader = leader;
    return leader;
  }

  private rotationLeader(): ValidatorId {
    return this.leader ?? leaderAt(this.config.validators, 0);
  }

  // ── Bookkeeping ─────────────────────────────────────────────────────────────

  private warn(code: WarningCode, message: string, proposalIds: ProposalId[]): void {
    const event: WarningEvent = { kind: 'warning', phase: this.currentPhase(), view: this.view, code, message, proposalIds };
    this.warnings.push(event);
    this.log.warn(message, { code });
    this.emit(event);
  }

  private emit(event: SimulationEvent): void {
    if (this.phases[this.phases.length - 1] !== event.phase) {
      this.phases.push(event.phase);
      this.log.debug('Phase entered', { phase: event.phase, view: event.view });
    }
    this.events.push(event);
    this.onEvent?.(event);
  }

  private currentPhase(): RoundPhase {
    return this.phases[this.phases.length - 1] ?? 'proposal';
  }

  private finish(status: SimulationStatus, error?: { code?: string; message: string }): SimulationResult {
    const commits: Record<ValidatorId, string[]> = {};
    for (const [id, state] of this.nodeStates) {
      commits[id] = [...state.committed];
    }
    if (status !== 'not-implemented') {
      this.emit({ kind: 'commit-log', phase: 'complete', view: this.view, commits });
    }
    this.emit({ kind: 'run-completed', phase: 'complete', view: this.view, status });
    this.log.info('Run completed', { status, view: this.view });

    const qcs = [...this.qcs.values()];
    const evidence = [...this.evidence.values()];
    return {
      status,
      config: this.config,
      events: [...this.events],
      qcs,
      evidence,
      commits,
      warnings: [...this.warnings],
      finalView: this.view,
      phases: [...this.phases],
      fingerprint: sha256Object({
        status,
        qcs: qcs.map((qc) => ({ proposal: proposalId(qc.proposal), voters: qc.voters })),
        evidence,
        commits,
      }),
      ...(error !== undefined ? { error } : {}),
    };
  }

  private reset(): void {
    this.nodeStates = new Map(
      this.config.validators.map((id): [ValidatorId, NodeState] => [id, new NodeState(id)]),
    );
    this.events = [];
    this.phases = [];
    this.warnings = [];
    this.qcs = new Map<ProposalId, QuorumCertificate>();
    this.evidence = new Map<string, EquivocationEvidence>();
    this.view = 1;
    this.leader = undefined;
  }
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/**
 * Validate `input` and build a simulation.
 *
 * @throws {BftSimError} for configuration errors, before anything runs.
 */
export function createSimulation(input: SimulationConfigInput = {}, options?: SimulationOptions): Simulation {
  return new Simulation(resolveConfig(input), options);
}

/**
 * Validate `input`, run it once and return the result.
 *
 * @example
 * ```typescript
 * const result = runSimulation({ validatorCount: 7, faultTolerance: 2 });
 * result.commits.A; // ['Z']
 * ```
 */
export function runSimulation(input: SimulationConfigInput = {}, options?: SimulationOptions): SimulationResult {
  return createSimulation(input, options).run();
}
