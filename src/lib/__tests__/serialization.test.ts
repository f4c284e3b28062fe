import { describe, it, expect } from 'vitest';
import type { GameState } from '@/engine/types';
import type { RoundSubmissions } from '@/engine/round-resolver';
import { processRound } from '@/engine/round-resolver';
import {
  deserializeGameState,
  parseActions,
  parseGameState,
  serializeGameState,
} from '@/lib/serialization';
import { initializeGameState, scenarioEngineConfig, scenarioRoundContext } from '@/lib/game-initializer';
import { getBuiltInScenario } from '@/scenarios';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function setup() {
  const scenario = getBuiltInScenario('frontier-labs');
  if (!scenario) throw new Error('frontier-labs is missing');
  const config = scenarioEngineConfig(scenario, { leakProbability: 0.3, randomEventProbability: 0.5 });
  return { state: initializeGameState(scenario), context: scenarioRoundContext(scenario, config) };
}

const submissions: RoundSubmissions = {
  'Meridian Labs': [{ kind: 'espionage', target: 'Northwind Research', focusArea: 'projects' }],
  'Northwind Research': [
    { kind: 'fundraise', amount: 400000 },
    { kind: 'send_message', to: 'Meridian Labs', body: 'Coffee next week?' },
  ],
  'Office of Technology Oversight': [{ kind: 'lobby', message: 'Mandatory evals for all labs', budget: 100000 }],
};

// ---------------------------------------------------------------------------
// Round trip
// ---------------------------------------------------------------------------

describe('serializeGameState / deserializeGameState', () => {
  it('round-trips a state with history', () => {
    const { state, context } = setup();
    const played = processRound(state, submissions, 5, context).state;
    expect(deserializeGameState(serializeGameState(played))).toEqual(played);
  });

  it('resumes a saved game exactly where it stopped', () => {
    const { state, context } = setup();
    const play = (s: GameState, round: number) => processRound(s, submissions, 1000 + round, context).state;

    let continuous = state;
    for (let round = 1; round <= 4; round++) continuous = play(continuous, round);

    let resumed = state;
    for (let round = 1; round <= 2; round++) resumed = play(resumed, round);
    resumed = deserializeGameState(serializeGameState(resumed));
    for (let round = 3; round <= 4; round++) resumed = play(resumed, round);

    expect(resumed).toEqual(continuous);
    expect(resumed.history[3].stateHash).toBe(continuous.history[3].stateHash);
  });

  it('rejects malformed JSON', () => {
    expect(() => deserializeGameState('{')).toThrow(/^Failed to parse game state JSON:/);
  });

  it('rejects structurally invalid states', () => {
    const { state } = setup();
    const broken = { ...state, currentRound: -1 };
    expect(() => parseGameState(broken)).toThrow(/^Game state validation failed: currentRound:/);
  });
});

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

describe('parseActions', () => {
  it('accepts well-formed actions', () => {
    const raw: unknown = JSON.parse(
      '[{"kind":"invest_capital","amount":100},{"kind":"send_message","to":"B","body":"hi"}]',
    );
    expect(parseActions(raw)).toEqual([
      { kind: 'invest_capital', amount: 100 },
      { kind: 'send_message', to: 'B', body: 'hi' },
    ]);
  });

  it('rejects unknown kinds', () => {
    expect(() => parseActions([{ kind: 'launch_rocket' }])).toThrow(/^Action validation failed: 0\.kind:/);
  });

  it('rejects missing fields', () => {
    expect(() => parseActions([{ kind: 'espionage', target: 'B' }])).toThrow(
      /^Action validation failed: 0\.focusArea:/,
    );
  });
});
