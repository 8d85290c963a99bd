/**
 * @bftsim/simulator: configuration, round scripts and the scenario driver.
 *
 * @packageDocumentation
 */

export {
  ATTACK_TYPES,
  MIN_VALIDATORS,
  MAX_VALIDATORS,
  DEFAULT_VALIDATORS,
  DEFAULT_STEP_DELAY,
  MAX_STEP_DELAY,
  validatorIds,
  defaultFaultTolerance,
  parseAttackType,
  resolveConfig,
} from './config';
export type { AttackType, SimulationConfig, SimulationConfigInput } from './config';

export { PHASE_ORDER, eventsOfKind } from './events';
export type {
  RoundPhase,
  SimulationStatus,
  WarningCode,
  SimulationEvent,
  SimulationEventKind,
  RunStartedEvent,
  LeaderElectedEvent,
  ProposalDispatchedEvent,
  VoteCastEvent,
  QCOutcomeEvent,
  NoQuorumEvent,
  WarningEvent,
  EvidenceReportEvent,
  ViewChangeEvent,
  CommitEvent,
  CommitLogEvent,
  NotImplementedEvent,
  RoundFailedEvent,
  RunCompletedEvent,
} from './events';

export {
  EQUIVOCATION_SCENARIO,
  scenarioFor,
  implementedAttacks,
  selectTargets,
  leaderAt,
  nextLeader,
} from './rounds';
export type { LeaderPolicy, TargetSelector, ProposalSpec, RoundSpec, Scenario } from './rounds';

export { buildTopology } from './topology';
export type { Topology, TopologyNode } from './topology';

export { Simulation, createSimulation, runSimulation } from './driver';
export type { SimulationOptions, SimulationResult } from './driver';
