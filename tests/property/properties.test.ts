/**
 * Seeded property tests across the consensus and simulator packages.
 *
 * Each property runs RUNS iterations drawn from a fixed-seed generator, so
 * failures reproduce; the failing seed and iteration are in the test name.
 */

import { describe, it, expect } from 'vitest';

import {
  NodeState,
  createProposal,
  createVote,
  maxFaultTolerance,
  quorumFor,
} from '@bftsim/consensus';
import type { Proposal, ValidatorId } from '@bftsim/consensus';
import { MAX_VALIDATORS, MIN_VALIDATORS, runSimulation, selectTargets, validatorIds } from '@bftsim/simulator';

// ---------------------------------------------------------------------------
// Generators
// ---------------------------------------------------------------------------

const RUNS = 40;
const SEED = 0x5eed;

/** mulberry32: small deterministic PRNG returning floats in [0, 1). */
function prng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

interface Gen {
  int(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
  shuffle<T>(items: readonly T[]): T[];
  subset<T>(items: readonly T[]): T[];
}

function gen(seed: number): Gen {
  const next = prng(seed);
  const int = (min: number, max: number): number => min + Math.floor(next() * (max - min + 1));
  return {
    int,
    pick<T>(items: readonly T[]): T {
      const item = items[int(0, items.length - 1)];
      if (item === undefined) throw new Error('pick from empty list');
      return item;
    },
    shuffle<T>(items: readonly T[]): T[] {
      const out = [...items];
      for (let i = out.length - 1; i > 0; i--) {
        const j = int(0, i);
        const a = out[i];
        const b = out[j];
        if (a === undefined || b === undefined) continue;
        out[i] = b;
        out[j] = a;
      }
      return out;
    },
    subset<T>(items: readonly T[]): T[] {
      return items.filter(() => next() < 0.3);
    },
  };
}

function forAll(name: string, property: (g: Gen, run: number) => void): void {
  it(`${name} (seed ${SEED}, ${RUNS} runs)`, () => {
    const g = gen(SEED);
    for (let run = 0; run < RUNS; run++) {
      property(g, run);
    }
  });
}

const BLOCKS = ['P', 'Q', 'R', 'S', 'T'];

function randomProposal(g: Gen, proposerId: ValidatorId, view: number): Proposal {
  return createProposal({ blockId: g.pick(BLOCKS), view, proposerId });
}

// ---------------------------------------------------------------------------
// Vote ingestion
// ---------------------------------------------------------------------------

describe('equivocation detection', () => {
  forAll('two conflicting votes yield the same evidence in either order', (g) => {
    const voter = g.pick(validatorIds(MAX_VALIDATORS));
    const proposer = g.pick(validatorIds(MAX_VALIDATORS));
    const view = g.int(1, 50);
    const [a = 'P', b = 'Q'] = g.shuffle(BLOCKS);
    const first = createProposal({ blockId: a, view, proposerId: proposer });
    const second = createProposal({ blockId: b, view, proposerId: proposer });

    const forward = new NodeState('obs1');
    forward.recordVote(createVote(voter, first));
    forward.recordVote(createVote(voter, second));

    const backward = new NodeState('obs2');
    backward.recordVote(createVote(voter, second));
    backward.recordVote(createVote(voter, first));

    expect(forward.evidence).toHaveLength(1);
    expect(backward.evidence).toEqual(forward.evidence);
    expect(forward.evidence[0]?.voterId).toBe(voter);
  });

  forAll('one vote per voter and slot never yields evidence', (g) => {
    const node = new NodeState('obs');
    const voters = validatorIds(g.int(MIN_VALIDATORS, MAX_VALIDATORS));
    const proposer = g.pick(voters);
    const views = [1, 2, 3];
    for (const view of views) {
      for (const voter of g.shuffle(voters)) {
        const vote = createVote(voter, randomProposal(g, proposer, view));
        node.recordVote(vote);
        // Replaying the same vote is a duplicate, not an equivocation.
        expect(node.recordVote(vote).duplicate).toBe(true);
      }
    }
    expect(node.evidence).toEqual([]);
  });

  forAll('votes for different views or proposers never conflict', (g) => {
    const node = new NodeState('obs');
    const voter = g.pick(validatorIds(7));
    node.recordVote(createVote(voter, createProposal({ blockId: 'P', view: 1, proposerId: 'A' })));
    node.recordVote(createVote(voter, createProposal({ blockId: 'Q', view: g.int(2, 9), proposerId: 'A' })));
    node.recordVote(createVote(voter, createProposal({ blockId: 'R', view: 1, proposerId: g.pick(['B', 'C', 'D']) })));
    expect(node.evidence).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// QC formation
// ---------------------------------------------------------------------------

describe('QC formation', () => {
  forAll('voters are the first Q arrivals, sorted, on every node', (g) => {
    const ids = validatorIds(g.int(MIN_VALIDATORS, MAX_VALIDATORS));
    const quorum = g.int(1, ids.length);
    const proposal = createProposal({ blockId: 'P', view: g.int(1, 9), proposerId: g.pick(ids) });
    const arrival = g.shuffle(ids);

    const a = new NodeState('a');
    const b = new NodeState('b');
    for (const voter of arrival) {
      const vote = createVote(voter, proposal);
      a.recordVote(vote);
      b.recordVote(vote);
    }

    const qc = a.tryFormQC(proposal, quorum);
    expect(qc?.voters).toEqual(arrival.slice(0, quorum).sort());
    expect(a.tryFormQC(proposal, quorum)).toEqual(qc);
    expect(b.tryFormQC(proposal, quorum)).toEqual(qc);
  });

  forAll('no QC below quorum', (g) => {
    const ids = validatorIds(g.int(MIN_VALIDATORS, MAX_VALIDATORS));
    const quorum = g.int(2, ids.length);
    const proposal = createProposal({ blockId: 'P', view: 1, proposerId: 'A' });
    const node = new NodeState('n');
    for (const voter of g.shuffle(ids).slice(0, quorum - 1)) {
      node.recordVote(createVote(voter, proposal));
    }
    expect(node.tryFormQC(proposal, quorum)).toBeUndefined();
  });

  forAll('the highest QC never moves to a lower view', (g) => {
    const node = new NodeState('n');
    const ids = validatorIds(4);
    let top = 0;
    for (let i = 0; i < 6; i++) {
      const view = g.int(1, 20);
      const proposal = createProposal({ blockId: 'P', view, proposerId: 'A' });
      for (const voter of ids) node.recordVote(createVote(voter, proposal));
      node.tryFormQC(proposal, 3);
      top = Math.max(top, view);
      expect(node.highestQC?.proposal.view).toBe(top);
    }
  });
});

// ---------------------------------------------------------------------------
// Scenario outcomes
// ---------------------------------------------------------------------------

describe('equivocation scenario', () => {
  forAll('a half is certified exactly when it reaches quorum', (g, run) => {
    const validatorCount = g.int(MIN_VALIDATORS, MAX_VALIDATORS);
    const faultTolerance = g.int(0, maxFaultTolerance(validatorCount));
    const ids = validatorIds(validatorCount);
    const doubleSigners = g.subset(ids);
    const result = runSimulation({ validatorCount, faultTolerance, doubleSigners, stepDelay: 0 });

    const quorum = quorumFor(faultTolerance);
    const xVoters = new Set([...selectTargets('lower-half', ids), ...doubleSigners]);
    const yVoters = new Set([...selectTargets('upper-half', ids), ...doubleSigners]);
    const xCertified = xVoters.size >= quorum;
    const yCertified = yVoters.size >= quorum;

    const attackQCs = result.qcs.filter((qc) => qc.proposal.view === 1).map((qc) => qc.proposal.blockId);
    const expected = [...(xCertified ? ['X'] : []), ...(yCertified ? ['Y'] : [])];
    expect(attackQCs, `run ${run}`).toEqual(expected);

    const codes = result.warnings.map((w) => w.code);
    expect(codes.includes('safety-violation'), `run ${run}`).toBe(xCertified && yCertified);
    expect(codes.filter((c) => c === 'unexpected-qc'), `run ${run}`).toHaveLength(expected.length);
  });

  forAll('evidence names exactly the double signers', (g) => {
    const ids = validatorIds(g.int(MIN_VALIDATORS, MAX_VALIDATORS));
    const doubleSigners = g.subset(ids);
    const result = runSimulation({ validatorCount: ids.length, doubleSigners, stepDelay: 0 });
    expect(result.evidence.map((e) => e.voterId).sort()).toEqual([...doubleSigners].sort());
    for (const item of result.evidence) {
      expect(item).toMatchObject({ view: 1, proposalA: 'X@v1', proposalB: 'Y@v1' });
    }
  });

  forAll('every node commits Z exactly once and identical runs agree', (g) => {
    const validatorCount = g.int(MIN_VALIDATORS, MAX_VALIDATORS);
    const input = {
      validatorCount,
      faultyLeader: g.pick([null, ...validatorIds(validatorCount)]),
      doubleSigners: g.subset(validatorIds(validatorCount)),
      stepDelay: 0,
    };
    const first = runSimulation(input);
    const second = runSimulation(input);
    expect(Object.values(first.commits).every((blocks) => blocks.length === 1 && blocks[0] === 'Z')).toBe(true);
    expect(second.fingerprint).toBe(first.fingerprint);
    expect(second.events).toEqual(first.events);
  });
});
