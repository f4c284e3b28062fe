// Shared test fixtures: small factories with explicit defaults.

import type { Character, GameState, ResearchProject } from '@/engine/types';
import type { CharacterInput } from '@/engine/entities';
import { createCharacter, createResearchProject } from '@/engine/entities';
import type { EngineConfigOverrides } from '@/engine/config';
import { resolveEngineConfig } from '@/engine/config';

export const START_DATE = '2030-01-01';

export function makeCharacter(
  name: string,
  privateOverrides: Partial<CharacterInput['private']> = {},
  publicOverrides: Partial<CharacterInput['public']> = {},
): Character {
  return createCharacter({
    name,
    private: {
      trueObjectives: `${name} wants to lead the field. Everything else is secondary.`,
      trueStrategy: `${name} plays it safe in public.`,
      budget: { '2030': 10000 },
      assets: { technicalCapability: 50, capital: 1000, human: 20 },
      ...privateOverrides,
    },
    public: {
      statedObjectives: `${name} builds useful tools.`,
      statedStrategy: 'Open collaboration.',
      ...publicOverrides,
    },
  });
}

export function makeProject(overrides: Partial<Parameters<typeof createResearchProject>[0]> = {}): ResearchProject {
  return createResearchProject({
    id: 'p1',
    topic: 'Fusion control',
    committedCapital: 800,
    committedTechnicalCapability: 0,
    committedHuman: 0,
    estimatedDurationRounds: 3,
    startedRound: 0,
    ...overrides,
  });
}

export function makeGameState(characters: Character[], overrides: Partial<GameState> = {}): GameState {
  const byName: Record<string, Character> = {};
  for (const c of characters) byName[c.name] = c;
  return {
    currentRound: 0,
    currentDate: START_DATE,
    roster: characters.map((c) => c.name),
    characters: byName,
    publicEvents: [],
    history: [],
    ...overrides,
  };
}

/** No leaks and no random events, so only submitted actions change the state. */
export function quietConfig(overrides: EngineConfigOverrides = {}) {
  return resolveEngineConfig({
    leakProbability: 0,
    leakBoostPerBreach: 0,
    randomEventProbability: 0,
    ...overrides,
  });
}
