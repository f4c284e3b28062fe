import { describe, it, expect } from 'vitest';
import type { GameState } from '@/engine/types';
import { processRound } from '@/engine/round-resolver';
import { fundraiseYield } from '@/engine/economy';
import { createPRNG } from '@/engine/prng';
import { makeCharacter, makeGameState, makeProject, quietConfig } from './fixtures';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function makeState(): GameState {
  return makeGameState([makeCharacter('A'), makeCharacter('B')]);
}

// ---------------------------------------------------------------------------
// fundraiseYield
// ---------------------------------------------------------------------------

describe('fundraiseYield', () => {
  it('returns the efficient share of the ask on success', () => {
    expect(fundraiseYield(1000, 1, 0.8, createPRNG(1))).toBe(800);
    expect(fundraiseYield(999, 1, 0.8, createPRNG(1))).toBe(799);
  });

  it('returns 0 when the roll fails', () => {
    expect(fundraiseYield(1000, 0, 0.8, createPRNG(1))).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Actions in a round
// ---------------------------------------------------------------------------

describe('fundraise', () => {
  it('adds the yield to the current period budget', () => {
    const { state, summaries } = processRound(makeState(), { A: [{ kind: 'fundraise', amount: 1000 }] }, 1, {
      config: quietConfig({ fundraiseSuccessRate: 1 }),
    });
    expect(state.characters.A.private.budget).toEqual({ '2030': 10800 });
    expect(summaries.A.digest).toContain('Success: Raised 800 for the 2030 budget (sought 1000)');
    expect(summaries.A.resources.budget).toBe(10800);
  });

  it('still succeeds as an action when it raises nothing', () => {
    const { state, summaries } = processRound(makeState(), { A: [{ kind: 'fundraise', amount: 1000 }] }, 1, {
      config: quietConfig({ fundraiseSuccessRate: 0 }),
    });
    expect(state.characters.A.private.budget).toEqual({ '2030': 10000 });
    expect(summaries.A.outcomes[0]).toMatchObject({
      status: 'success',
      detail: 'Fundraising drive raised nothing (sought 1000)',
    });
  });

  it('opens a budget entry for a new year', () => {
    const state = makeState();
    state.currentDate = '2030-12-27';
    const { state: next } = processRound(state, { A: [{ kind: 'fundraise', amount: 1000 }] }, 1, {
      config: quietConfig({ fundraiseSuccessRate: 1 }),
    });
    expect(next.characters.A.private.budget).toEqual({ '2030': 10000, '2031': 800 });
  });
});

describe('invest_capital', () => {
  it('converts budget into capital at the investment efficiency', () => {
    const { state, summaries } = processRound(makeState(), { A: [{ kind: 'invest_capital', amount: 1000 }] }, 1, {
      config: quietConfig(),
    });
    expect(state.characters.A.private.budget['2030']).toBe(9000);
    expect(state.characters.A.private.assets.capital).toBe(1900);
    expect(summaries.A.outcomes[0].detail).toBe('Invested 1000 of budget into 900 capital');
  });
});

describe('divest_capital', () => {
  it('converts uncommitted capital into budget at the divestment efficiency', () => {
    const { state, summaries } = processRound(makeState(), { A: [{ kind: 'divest_capital', amount: 500 }] }, 1, {
      config: quietConfig(),
    });
    expect(state.characters.A.private.assets.capital).toBe(500);
    expect(state.characters.A.private.budget['2030']).toBe(10350);
    expect(summaries.A.outcomes[0].detail).toBe('Divested 500 capital for 350 budget');
  });

  it('cannot touch capital reserved by a project', () => {
    const state = makeGameState([
      makeCharacter('A', { activeProjects: [makeProject({ committedCapital: 900 })] }),
      makeCharacter('B'),
    ]);
    const { summaries } = processRound(state, { A: [{ kind: 'divest_capital', amount: 200 }] }, 1, {
      config: quietConfig(),
    });
    expect(summaries.A.outcomes[0]).toMatchObject({ status: 'rejected', code: 'insufficient_resources' });
  });
});
