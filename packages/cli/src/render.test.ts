import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTopology, eventsOfKind, runSimulation } from '@bftsim/simulator';
import type { SimulationEvent } from '@bftsim/simulator';
import { setColorsEnabled } from './format';
import { EventRenderer, renderEvent, renderSummary, renderTopology } from './render';

beforeEach(() => {
  setColorsEnabled(false);
});

afterEach(() => {
  setColorsEnabled(true);
});

function firstOf<K extends SimulationEvent['kind']>(
  events: SimulationEvent[],
  kind: K,
): Extract<SimulationEvent, { kind: K }> {
  const [event] = eventsOfKind(events, kind);
  if (event === undefined) throw new Error(`no ${kind} event`);
  return event;
}

describe('renderEvent', () => {
  const { events } = runSimulation({ stepDelay: 0 });

  it('prints the run header as aligned settings', () => {
    const [title, settings] = renderEvent(firstOf(events, 'run-started'));
    expect(title).toBe('BFT safety simulation');
    expect(settings?.split('\n')).toEqual([
      'Validators      A B C D E F G (N = 7)',
      'Fault bound     f = 2',
      'Quorum          5',
      'Faulty leader   A',
      'Attack          equivocation',
      'Double signers  none',
    ]);
  });

  it('marks the faulty leader', () => {
    expect(renderEvent(firstOf(events, 'leader-elected'))).toEqual(['[INFO] View 1: leader A (faulty)']);
  });

  it('lists proposal recipients', () => {
    expect(renderEvent(firstOf(events, 'proposal-dispatched'))).toEqual(['  A proposes X@v1 to A, B, C']);
  });

  it('shows the vote signature', () => {
    const vote = firstOf(events, 'vote-cast');
    expect(renderEvent(vote)).toEqual([`    A votes X@v1 ${vote.signature}`]);
  });

  it('reports QC outcomes', () => {
    const outcomes = eventsOfKind(events, 'qc-outcome').map((e) => renderEvent(e)[0]);
    expect(outcomes).toEqual([
      '[OK] No QC for X@v1',
      '[OK] No QC for Y@v1',
      '[OK] QC for Z@v2: A, B, C, D, E (formed on 7 nodes)',
    ]);
  });

  it('reports preserved safety, view change and commit', () => {
    expect(renderEvent(firstOf(events, 'no-quorum'))).toEqual(['[OK] Safety preserved: no quorum for X@v1 or Y@v1']);
    expect(renderEvent(firstOf(events, 'evidence-report'))).toEqual(['[INFO] No equivocation evidence']);
    expect(renderEvent(firstOf(events, 'view-change'))).toEqual(['[INFO] View 1 -> 2, leader B']);
    expect(renderEvent(firstOf(events, 'commit'))).toEqual(['[OK] Committed Z on A, B, C, D, E, F, G']);
    expect(renderEvent(firstOf(events, 'run-completed'))).toEqual(['[OK] Run completed']);
  });

  it('renders the commit log as a table', () => {
    const [title, body] = renderEvent(firstOf(events, 'commit-log'));
    expect(title).toBe('Commit log');
    expect(body?.split('\n').slice(0, 3)).toEqual(['Node  Committed', '────  ─────────', 'A     Z']);
  });

  it('lists equivocation evidence', () => {
    const result = runSimulation({ doubleSigners: ['D'] });
    expect(renderEvent(firstOf(result.events, 'evidence-report'))).toEqual([
      '[WARN] Equivocation evidence: 1',
      '  D signed X@v1 and Y@v1 (view 1, proposer A)',
    ]);
    const [dVote] = eventsOfKind(result.events, 'vote-cast').filter((e) => e.voterId === 'D');
    if (dVote === undefined) throw new Error('no vote from D');
    expect(renderEvent(dVote)).toEqual([`    D votes X@v1 ${dVote.signature} [double-signed]`]);
  });

  it('shows warnings with their code', () => {
    const result = runSimulation({ quorum: 4 });
    expect(renderEvent(firstOf(result.events, 'warning'))).toEqual([
      '[WARN] QC formed for Y@v1 in an attack round (unexpected-qc)',
    ]);
    expect(eventsOfKind(result.events, 'qc-outcome').slice(0, 2).map((e) => renderEvent(e)[0])).toEqual([
      '[OK] No QC for X@v1',
      '[ERROR] QC for Y@v1: D, E, F, G (formed on 7 nodes)',
    ]);
  });

  it('renders unimplemented attacks and failed rounds', () => {
    const result = runSimulation({ attack: 'withhold-qc' });
    expect(renderEvent(firstOf(result.events, 'not-implemented'))).toEqual([
      "[WARN] Attack type 'withhold-qc' has no round script",
    ]);
    expect(renderEvent(firstOf(result.events, 'run-completed'))).toEqual(['[WARN] Run not implemented']);
    expect(
      renderEvent({
        kind: 'round-failed',
        phase: 'proposal',
        view: 1,
        round: 'broken',
        error: { code: 'BFTSIM_E200', message: 'Proposal blockId must be a non-empty string' },
      }),
    ).toEqual(["[ERROR] Round 'broken' failed: [BFTSIM_E200] Proposal blockId must be a non-empty string"]);
  });
});

describe('EventRenderer', () => {
  it('adds a banner at each phase change and flags it for pacing', () => {
    const { events } = runSimulation({ stepDelay: 0 });
    const renderer = new EventRenderer();
    const banners: string[] = [];
    let changes = 0;
    for (const event of events) {
      const { lines, changed } = renderer.render(event);
      banners.push(...lines.filter((line) => line.startsWith('──')));
      if (changed) changes += 1;
    }
    expect(banners).toEqual([
      '── proposal (view 1) ──',
      '── voting (view 1) ──',
      '── qc-formation (view 1) ──',
      '── evidence-report (view 1) ──',
      '── view-change (view 2) ──',
      '── safe-round (view 2) ──',
      '── commit (view 2) ──',
      '── complete (view 2) ──',
    ]);
    expect(changes).toBe(7);
  });
});

describe('renderSummary', () => {
  it('summarizes the outcome', () => {
    const result = runSimulation();
    expect(renderSummary(result).split('\n').slice(0, 5)).toEqual([
      'Status       completed',
      'Final view   2',
      'QCs          Z@v2',
      'Evidence     0',
      'Warnings     0',
    ]);
  });
});

describe('renderTopology', () => {
  it('lists each node with its role and links', () => {
    const out = renderTopology(buildTopology(['A', 'B', 'C', 'D'], 'A'));
    expect(out.split('\n')).toEqual([
      'Topology',
      'Node  Role           Links',
      '────  ─────────────  ─────',
      'A     faulty leader  B D C',
      'B     validator      A C D',
      'C     validator      B D A',
      'D     validator      C A B',
      '4 nodes, 6 edges',
    ]);
  });
});
