// Game state initializer: pure functions, no side effects.
// Builds the round-0 GameState and the per-round resolution context from a
// validated scenario.

import type { EventSource, GameState, Character } from '@/engine/types';
import type { EngineConfig, EngineConfigOverrides } from '@/engine/config';
import { resolveEngineConfig } from '@/engine/config';
import { createCharacter, createResearchProject } from '@/engine/entities';
import type { RoundContext } from '@/engine/round-resolver';
import type { Scenario, ScenarioCharacter } from '@/scenarios/schema';

function buildCharacter(def: ScenarioCharacter): Character {
  return createCharacter({
    name: def.name,
    private: {
      trueObjectives: def.private.trueObjectives,
      trueStrategy: def.private.trueStrategy,
      budget: def.private.budget,
      assets: def.private.assets,
      counterIntelligence: def.private.counterIntelligence,
      activeProjects: def.private.projects.map((p) =>
        createResearchProject({ ...p, startedRound: 0 }),
      ),
    },
    public: {
      statedObjectives: def.public.statedObjectives,
      statedStrategy: def.public.statedStrategy,
      publicArtifacts: def.public.publicArtifacts,
      standing: def.public.standing,
    },
  });
}

export function initializeGameState(scenario: Scenario): GameState {
  const characters: Record<string, Character> = {};
  for (const def of scenario.characters) {
    characters[def.name] = buildCharacter(def);
  }

  return {
    currentRound: 0,
    currentDate: scenario.startDate,
    roster: scenario.characters.map((c) => c.name),
    characters,
    publicEvents: [],
    history: [],
  };
}

export function scenarioEventSource(scenario: Scenario): EventSource {
  return {
    randomEvents: [...scenario.randomEvents],
    fixedEvents: scenario.fixedEvents.map((e) => ({ ...e })),
  };
}

export function scenarioTopics(scenario: Scenario): string[] {
  return scenario.researchTopics.map((t) => t.name);
}

/** Scenario engine settings with caller overrides applied on top. */
export function scenarioEngineConfig(
  scenario: Scenario,
  overrides: EngineConfigOverrides = {},
): EngineConfig {
  return resolveEngineConfig({ ...scenario.engine, ...overrides });
}

export function scenarioRoundContext(scenario: Scenario, config: EngineConfig): RoundContext {
  return {
    config,
    events: scenarioEventSource(scenario),
    allowedTopics: scenario.restrictTopics ? scenarioTopics(scenario) : null,
  };
}
