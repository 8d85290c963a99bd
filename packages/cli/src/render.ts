/**
 * Text rendering of simulator events and results for the terminal.
 */

import type { SimulationEvent, SimulationResult, Topology } from '@bftsim/simulator';

import {
  banner,
  bold,
  cyan,
  dim,
  error,
  header,
  info,
  keyValue,
  magenta,
  red,
  success,
  table,
  warning,
  yellow,
} from './format';

function list(ids: readonly string[]): string {
  return ids.length > 0 ? ids.join(', ') : 'none';
}

/** Lines for one event, without the phase banner. */
export function renderEvent(event: SimulationEvent): string[] {
  switch (event.kind) {
    case 'run-started':
      return [
        header('BFT safety simulation'),
        keyValue([
          ['Validators', `${event.validators.join(' ')} (N = ${event.validators.length})`],
          ['Fault bound', `f = ${event.faultTolerance}`],
          ['Quorum', String(event.quorum)],
          ['Faulty leader', event.faultyLeader ?? 'none'],
          ['Attack', event.attack],
          ['Double signers', list(event.doubleSigners)],
        ]),
      ];

    case 'leader-elected':
      return [info(`View ${event.view}: leader ${bold(event.leader)}${event.faulty ? red(' (faulty)') : ''}`)];

    case 'proposal-dispatched':
      return [`  ${event.proposal.proposerId} proposes ${cyan(event.proposalId)} to ${list(event.recipients)}`];

    case 'vote-cast':
      return [
        `    ${event.voterId} votes ${event.proposalId} ${dim(event.signature)}${event.doubleSigned ? magenta(' [double-signed]') : ''}`,
      ];

    case 'qc-outcome': {
      const text = event.formed
        ? `QC for ${event.proposalId}: ${list(event.voters)} (formed on ${event.nodes.length} nodes)`
        : `No QC for ${event.proposalId}`;
      return [event.expected ? success(text) : error(text)];
    }

    case 'no-quorum':
      return [success(`Safety preserved: no quorum for ${event.proposalIds.join(' or ')}`)];

    case 'warning':
      return [warning(`${event.message} (${event.code})`)];

    case 'evidence-report':
      if (event.evidence.length === 0) {
        return [info('No equivocation evidence')];
      }
      return [
        warning(`Equivocation evidence: ${event.evidence.length}`),
        ...event.evidence.map(
          (e) => `  ${yellow(e.voterId)} signed ${e.proposalA} and ${e.proposalB} (view ${e.view}, proposer ${e.proposerId})`,
        ),
      ];

    case 'view-change':
      return [info(`View ${event.fromView} -> ${event.view}, leader ${bold(event.leader)}`)];

    case 'commit':
      return event.nodes.length > 0
        ? [success(`Committed ${bold(event.blockId)} on ${list(event.nodes)}`)]
        : [info(`${event.blockId} already committed`)];

    case 'commit-log':
      return [
        header('Commit log'),
        table(
          ['Node', 'Committed'],
          Object.entries(event.commits).map(([id, blocks]) => [id, blocks.length > 0 ? blocks.join(' -> ') : '(empty)']),
        ),
      ];

    case 'not-implemented':
      return [warning(event.message)];

    case 'round-failed': {
      const code = event.error.code !== undefined ? `[${event.error.code}] ` : '';
      return [error(`Round '${event.round}' failed: ${code}${event.error.message}`)];
    }

    case 'run-completed':
      switch (event.status) {
        case 'completed':
          return [success('Run completed')];
        case 'not-implemented':
          return [warning('Run not implemented')];
        case 'failed':
          return [error('Run failed')];
      }
  }
}

/**
 * Stateful renderer that prefixes a banner whenever the phase or view
 * changes. `changed` tells the caller a new phase started, for pacing.
 */
export class EventRenderer {
  private lastKey: string | undefined;

  render(event: SimulationEvent): { lines: string[]; changed: boolean } {
    const lines = renderEvent(event);
    if (event.kind === 'run-started') {
      return { lines, changed: false };
    }
    const key = `${event.phase}@${event.view}`;
    if (key === this.lastKey) {
      return { lines, changed: false };
    }
    const changed = this.lastKey !== undefined;
    this.lastKey = key;
    return { lines: [banner(`${event.phase} (view ${event.view})`), ...lines], changed };
  }
}

/** Closing summary printed after the event stream. */
export function renderSummary(result: SimulationResult): string {
  return keyValue([
    ['Status', result.status],
    ['Final view', String(result.finalView)],
    ['QCs', list(result.qcs.map((qc) => `${qc.proposal.blockId}@v${qc.proposal.view}`))],
    ['Evidence', String(result.evidence.length)],
    ['Warnings', String(result.warnings.length)],
    ['Fingerprint', dim(result.fingerprint.slice(0, 16))],
  ]);
}

export function renderTopology(topology: Topology): string {
  return [
    header('Topology'),
    table(
      ['Node', 'Role', 'Links'],
      topology.nodes.map((node) => {
        const links = topology.edges
          .filter(([a, b]) => a === node.id || b === node.id)
          .map(([a, b]) => (a === node.id ? b : a));
        return [node.id, node.faulty ? red('faulty leader') : 'validator', links.join(' ')];
      }),
    ),
    dim(`${topology.nodes.length} nodes, ${topology.edges.length} edges`),
  ].join('\n');
}
