#!/usr/bin/env node
import { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { EngineConfigOverrides } from '@/engine/config';
import { espionageDisclosureSchema } from '@/engine/config';
import type { Scenario } from '@/scenarios/schema';
import { builtInScenarioIds, getBuiltInScenario } from '@/scenarios';
import { loadScenarioFile } from '@/lib/scenario-loader';
import { createBaselineAgents } from '@/lib/baseline-agent';
import {
  initializeGameState,
  scenarioEngineConfig,
  scenarioRoundContext,
  scenarioTopics,
} from '@/lib/game-initializer';
import { RoundController } from '@/lib/round-controller';
import type { RoundResult } from '@/lib/round-controller';
import { runSimulations } from '@/lib/simulation-runner';
import { createSupabaseClient } from '@/lib/supabase';
import { SupabaseGameStore } from '@/lib/game-store';
import type { GameStore } from '@/lib/game-store';
import { toPositiveInt, toSeed } from '@/cli/options';

type RunOptions = {
  rounds: string;
  seed: string;
  runs: string;
  revealTargeting?: string;
  out?: string;
  persist?: boolean;
  gameId?: string;
  quiet?: boolean;
};

async function resolveScenario(ref: string): Promise<Scenario> {
  const builtIn = getBuiltInScenario(ref);
  if (builtIn) return builtIn;
  return loadScenarioFile(resolve(ref));
}

function engineOverrides(opts: RunOptions): EngineConfigOverrides {
  if (opts.revealTargeting === undefined) return {};
  const parsed = espionageDisclosureSchema.safeParse(opts.revealTargeting);
  if (!parsed.success) {
    throw new Error(`--reveal-targeting must be one of none, anonymous, attributed`);
  }
  return { espionageDisclosure: parsed.data };
}

/** One JSONL line per round: the record plus every character's summary. */
function transcriptLine(result: RoundResult): string {
  const record = result.state.history[result.state.history.length - 1];
  return JSON.stringify({
    round: result.round,
    seed: result.seed,
    date: result.state.currentDate,
    record,
    summaries: result.summaries,
  });
}

function printRound(result: RoundResult): void {
  console.log(`\n=== Round ${result.round} (${result.state.currentDate}) ===`);
  for (const event of result.events) {
    console.log(`  [${event.kind}] ${event.description}`);
  }
  for (const [name, summary] of Object.entries(result.summaries)) {
    const lines = summary.digest.filter((l) => /^(Success|Fail|Rejected):/.test(l));
    console.log(`  ${name}: ${lines.join(' | ') || 'no actions'}`);
  }
}

async function runSingle(scenario: Scenario, opts: RunOptions): Promise<void> {
  const rounds = toPositiveInt(opts.rounds, '--rounds');
  const seed = toSeed(opts.seed);
  const config = scenarioEngineConfig(scenario, engineOverrides(opts));
  const context = scenarioRoundContext(scenario, config);
  const state = initializeGameState(scenario);
  const topics = context.allowedTopics ?? scenarioTopics(scenario);

  let store: GameStore | undefined;
  if (opts.persist) {
    store = new SupabaseGameStore(createSupabaseClient());
  }

  const transcript: string[] = [];
  const controller = new RoundController({
    state,
    agents: createBaselineAgents(state.roster, seed, { topics }),
    baseSeed: seed,
    context,
    store,
    gameId: opts.gameId ?? `${scenario.id}-${seed}`,
    onRound: (result) => {
      transcript.push(transcriptLine(result));
      if (!opts.quiet) printRound(result);
    },
  });

  console.log(`Running ${scenario.name} for ${rounds} round(s) with seed ${seed}`);
  await controller.run(rounds);

  if (opts.out) {
    const target = resolve(opts.out);
    await writeFile(target, `${transcript.join('\n')}\n`, 'utf8');
    console.log(`Transcript written to ${target}`);
  }
}

async function runBatch(scenario: Scenario, opts: RunOptions, runs: number): Promise<void> {
  const rounds = toPositiveInt(opts.rounds, '--rounds');
  const base = toSeed(opts.seed);
  const seeds = Array.from({ length: runs }, (_, i) => base + i);

  console.log(`Running ${runs} independent game(s) of ${scenario.name}, ${rounds} round(s) each`);
  const report = await runSimulations({ scenario, seeds, rounds, config: engineOverrides(opts) });

  for (const run of report.runs) {
    console.log(
      `  seed ${run.seed}: ${run.completedProjects} completed, ${run.espionageSuccesses}/${run.espionageSuccesses + run.espionageFailures} espionage, ${run.leaks} leak(s)`,
    );
  }
  console.log('Mean final capital:');
  for (const [name, capital] of Object.entries(report.meanFinalCapital)) {
    console.log(`  ${name}: ${Math.round(capital)}`);
  }

  if (opts.out) {
    const target = resolve(opts.out);
    await writeFile(target, `${report.runs.map((r) => JSON.stringify(r)).join('\n')}\n`, 'utf8');
    console.log(`Run statistics written to ${target}`);
  }
}

const program = new Command();

program
  .name('research-sim')
  .description('Seeded resolution engine for a multi-party research strategy game')
  .version('0.1.0');

program
  .command('run')
  .description('play a scenario with baseline agents')
  .argument('[scenario]', `built-in scenario (${builtInScenarioIds().join(', ')}) or path to a scenario JSON file`, 'frontier-labs')
  .option('-r, --rounds <n>', 'number of rounds to play', '8')
  .option('-s, --seed <n>', 'base seed', '42')
  .option('--runs <n>', 'number of independent runs (seeds seed..seed+n-1)', '1')
  .option('--reveal-targeting <policy>', 'what a target learns from failed espionage: none | anonymous | attributed')
  .option('-o, --out <file>', 'write a JSONL transcript')
  .option('--persist', 'save each round to Supabase (needs SUPABASE_URL and SUPABASE_ANON_KEY)', false)
  .option('--game-id <id>', 'game id used when persisting')
  .option('-q, --quiet', 'only print the final outcome', false)
  .action(async (scenarioRef: string, opts: RunOptions) => {
    try {
      const scenario = await resolveScenario(scenarioRef);
      const runs = toPositiveInt(opts.runs, '--runs');
      if (runs > 1) {
        await runBatch(scenario, opts, runs);
      } else {
        await runSingle(scenario, opts);
      }
    } catch (err) {
      console.error(`Run failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  });

program
  .command('validate')
  .description('validate a scenario JSON file')
  .argument('<file>', 'path to scenario JSON')
  .action(async (file: string) => {
    try {
      const scenario = await loadScenarioFile(resolve(file));
      const state = initializeGameState(scenario);
      console.log(`OK: ${scenario.name} (${state.roster.length} characters, starts ${state.currentDate})`);
    } catch (err) {
      console.error(`Invalid scenario: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
