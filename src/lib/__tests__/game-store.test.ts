import { describe, it, expect } from 'vitest';
import { InMemoryGameStore } from '@/lib/game-store';
import { createSupabaseClient } from '@/lib/supabase';
import { initializeGameState } from '@/lib/game-initializer';
import { getBuiltInScenario } from '@/scenarios';

function freshState() {
  const scenario = getBuiltInScenario('frontier-labs');
  if (!scenario) throw new Error('frontier-labs is missing');
  return initializeGameState(scenario);
}

describe('InMemoryGameStore', () => {
  it('returns null for unknown games', async () => {
    expect(await new InMemoryGameStore().load('missing')).toBeNull();
  });

  it('returns a copy equal to what was saved', async () => {
    const store = new InMemoryGameStore();
    const state = freshState();
    await store.save('g1', state);

    const loaded = await store.load('g1');
    expect(loaded).toEqual(state);
    expect(loaded).not.toBe(state);
  });

  it('is unaffected by later changes to the saved state', async () => {
    const store = new InMemoryGameStore();
    const state = freshState();
    await store.save('g1', state);
    state.currentRound = 7;
    expect((await store.load('g1'))?.currentRound).toBe(0);
  });
});

describe('createSupabaseClient', () => {
  it('requires both environment variables', () => {
    expect(() => createSupabaseClient({})).toThrow(
      'Missing Supabase environment variables. Check that SUPABASE_URL and SUPABASE_ANON_KEY are set',
    );
    expect(() => createSupabaseClient({ SUPABASE_URL: 'http://localhost:54321' })).toThrow(
      /^Missing Supabase environment variables/,
    );
  });
});
