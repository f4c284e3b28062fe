// Batch simulation runner. Plays independent games of one scenario, one per
// seed, with baseline agents and aggregates distributional statistics. Runs
// share no mutable state.

import type { EngineConfigOverrides } from '@/engine/config';
import type { GameState } from '@/engine/types';
import { hashGameState } from '@/engine/hash';
import type { Scenario } from '@/scenarios/schema';
import { createBaselineAgents } from '@/lib/baseline-agent';
import {
  initializeGameState,
  scenarioEngineConfig,
  scenarioRoundContext,
  scenarioTopics,
} from '@/lib/game-initializer';
import { RoundController } from '@/lib/round-controller';

export interface SimulationOptions {
  scenario: Scenario;
  seeds: number[];
  rounds: number;
  config?: EngineConfigOverrides;
}

export interface SimulationRun {
  seed: number;
  finalRound: number;
  finalDate: string;
  stateHash: string;
  completedProjects: number;
  cancelledProjects: number;
  espionageSuccesses: number;
  espionageFailures: number;
  leaks: number;
  finalCapital: Record<string, number>;
  finalStanding: Record<string, number>;
}

export interface SimulationReport {
  runs: SimulationRun[];
  totals: {
    completedProjects: number;
    espionageSuccesses: number;
    espionageFailures: number;
    leaks: number;
  };
  meanFinalCapital: Record<string, number>;
  meanFinalStanding: Record<string, number>;
}

/** Statistics for a single finished game. */
export function summarizeRun(seed: number, state: GameState): SimulationRun {
  let completedProjects = 0;
  let cancelledProjects = 0;
  const finalCapital: Record<string, number> = {};
  const finalStanding: Record<string, number> = {};

  for (const name of state.roster) {
    const character = state.characters[name];
    for (const project of character.private.activeProjects) {
      if (project.status === 'completed') completedProjects++;
      if (project.status === 'cancelled') cancelledProjects++;
    }
    finalCapital[name] = character.private.assets.capital;
    finalStanding[name] = character.public.standing;
  }

  let espionageSuccesses = 0;
  let espionageFailures = 0;
  for (const record of state.history) {
    for (const outcomes of Object.values(record.outcomes)) {
      for (const outcome of outcomes) {
        if (outcome.action.kind !== 'espionage') continue;
        if (outcome.status === 'success') espionageSuccesses++;
        if (outcome.status === 'failure') espionageFailures++;
      }
    }
  }

  return {
    seed,
    finalRound: state.currentRound,
    finalDate: state.currentDate,
    stateHash: hashGameState(state),
    completedProjects,
    cancelledProjects,
    espionageSuccesses,
    espionageFailures,
    leaks: state.publicEvents.filter((e) => e.kind === 'leak').length,
    finalCapital,
    finalStanding,
  };
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

export async function runSimulation(
  scenario: Scenario,
  seed: number,
  rounds: number,
  config: EngineConfigOverrides = {},
): Promise<SimulationRun> {
  const engineConfig = scenarioEngineConfig(scenario, config);
  const context = scenarioRoundContext(scenario, engineConfig);
  const state = initializeGameState(scenario);
  const topics = context.allowedTopics ?? scenarioTopics(scenario);

  const controller = new RoundController({
    state,
    agents: createBaselineAgents(state.roster, seed, { topics }),
    baseSeed: seed,
    context,
  });
  await controller.run(rounds);
  return summarizeRun(seed, controller.state);
}

export async function runSimulations(options: SimulationOptions): Promise<SimulationReport> {
  const runs: SimulationRun[] = [];
  for (const seed of options.seeds) {
    runs.push(await runSimulation(options.scenario, seed, options.rounds, options.config));
  }

  const roster = options.scenario.characters.map((c) => c.name);
  const meanFinalCapital: Record<string, number> = {};
  const meanFinalStanding: Record<string, number> = {};
  for (const name of roster) {
    meanFinalCapital[name] = mean(runs.map((r) => r.finalCapital[name] ?? 0));
    meanFinalStanding[name] = mean(runs.map((r) => r.finalStanding[name] ?? 0));
  }

  return {
    runs,
    totals: {
      completedProjects: runs.reduce((sum, r) => sum + r.completedProjects, 0),
      espionageSuccesses: runs.reduce((sum, r) => sum + r.espionageSuccesses, 0),
      espionageFailures: runs.reduce((sum, r) => sum + r.espionageFailures, 0),
      leaks: runs.reduce((sum, r) => sum + r.leaks, 0),
    },
    meanFinalCapital,
    meanFinalStanding,
  };
}
