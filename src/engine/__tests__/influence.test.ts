import { describe, it, expect } from 'vitest';
import type { GameState } from '@/engine/types';
import { processRound } from '@/engine/round-resolver';
import { campaignGain } from '@/engine/influence';
import { makeCharacter, makeGameState, quietConfig } from './fixtures';

function makeState(): GameState {
  return makeGameState([makeCharacter('A'), makeCharacter('B')]);
}

describe('campaignGain', () => {
  it('adds spend over scaling to the base gain, to two decimals', () => {
    expect(campaignGain(0, 1, 1_000_000)).toBe(1);
    expect(campaignGain(250_000, 1, 1_000_000)).toBe(1.25);
    expect(campaignGain(1000, 1, 1_000_000)).toBe(1);
  });
});

describe('lobby and market campaigns', () => {
  it('raise standing and publish the message when they land', () => {
    const { state, summaries, events } = processRound(
      makeState(),
      { A: [{ kind: 'lobby', message: 'Standards now', budget: 1000 }] },
      1,
      { config: quietConfig({ lobbyBackfireRate: 0 }) },
    );
    const a = state.characters.A;
    expect(a.public.standing).toBe(1);
    expect(a.public.publicArtifacts).toEqual(['Standards now']);
    expect(a.private.budget['2030']).toBe(9000);
    expect(events).toEqual([{ round: 1, kind: 'announcement', description: 'Lobbying by A: "Standards now"' }]);
    expect(summaries.A.outcomes[0]).toMatchObject({
      status: 'success',
      code: null,
      detail: 'Lobbying campaign landed (standing +1)',
    });
    expect(summaries.B.publicViews.A.standing).toBe(1);
    expect(summaries.B.digest).toContain('Public: Lobbying by A: "Standards now"');
  });

  it('cost standing when they backfire', () => {
    const { state, summaries, events } = processRound(
      makeState(),
      { A: [{ kind: 'market', message: 'Best model ever', budget: 1000 }] },
      1,
      { config: quietConfig({ marketBackfireRate: 1 }) },
    );
    const a = state.characters.A;
    expect(a.public.standing).toBe(-2);
    expect(a.public.publicArtifacts).toEqual(['Backlash: Best model ever']);
    expect(a.private.budget['2030']).toBe(9000);
    expect(events).toEqual([
      { round: 1, kind: 'announcement', description: `A's marketing campaign backfired: "Best model ever"` },
    ]);
    expect(summaries.A.outcomes[0]).toMatchObject({
      status: 'failure',
      code: 'backfired',
      detail: 'Marketing campaign backfired (standing -2)',
    });
  });
});
