// Baseline policy: scripted, seeded decisions for characters with no external
// agent. Weighs a handful of plausible moves by the character's situation and
// only ever returns a submission that passes validation.
// Pure function: no side effects, no async.

import type { Action, Character, GameState, PrimaryAction, PRNG } from '@/engine/types';
import type { EngineConfig } from '@/engine/config';
import { pick, weightedChoice, chance } from '@/engine/prng';
import { activeProjects, availableAssets, currentBudget, resolutionDate } from '@/engine/entities';
import type { SubmissionReview } from '@/engine/actions';
import { validateSubmission } from '@/engine/actions';

/** What a character knows when deciding: its own state and who its rivals are. */
export interface PolicyView {
  /** Date of the round being decided. */
  date: string;
  character: Character;
  rivals: string[];
  validate(actions: readonly Action[]): SubmissionReview;
}

export interface BaselinePolicyOptions {
  /** Topics to draw from when starting research. */
  topics: readonly string[];
  /** Probability of also sending a message to a rival. */
  messageRate?: number;
}

const FALLBACK_TOPIC = 'Applied research';

const FOCUS_AREAS = ['budget', 'projects', 'strategy', 'objectives', 'assets'];

// ---------------------------------------------------------------------------
// Candidate generation
// ---------------------------------------------------------------------------

function candidateActions(
  view: PolicyView,
  prng: PRNG,
  options: BaselinePolicyOptions,
): Array<{ value: PrimaryAction; weight: number }> {
  const { character, rivals } = view;
  const budget = currentBudget(character, view.date);
  const available = availableAssets(character);
  const candidates: Array<{ value: PrimaryAction; weight: number }> = [];

  const fundraiseAmount = Math.max(100_000, Math.floor(available.capital * 0.25));
  candidates.push({
    value: { kind: 'fundraise', amount: fundraiseAmount, description: 'Investor round' },
    weight: budget < fundraiseAmount ? 4 : 1,
  });

  const running = activeProjects(character).length;
  if (available.capital >= 1000 && available.human >= 1) {
    const topic = options.topics.length > 0 ? pick(options.topics, prng) : FALLBACK_TOPIC;
    candidates.push({
      value: {
        kind: 'create_research_project',
        topic,
        committedCapital: Math.floor(available.capital * 0.4),
        committedTechnicalCapability: Math.floor(available.technicalCapability * 0.3),
        committedHuman: Math.floor(available.human * 0.3),
        estimatedDurationRounds: prng.nextInt(2, 5),
      },
      weight: running === 0 ? 4 : 1,
    });
  }

  if (budget >= 10_000) {
    candidates.push({
      value: { kind: 'invest_capital', amount: Math.floor(budget * 0.25) },
      weight: 1,
    });
  }

  if (rivals.length > 0) {
    const rival = pick(rivals, prng);
    candidates.push({
      value: { kind: 'espionage', target: rival, focusArea: pick(FOCUS_AREAS, prng) },
      weight: 1.5,
    });
    candidates.push({
      value: { kind: 'poach_talent', target: rival, budget: Math.floor(budget * 0.05) },
      weight: 1,
    });
  }

  const spend = Math.floor(budget * 0.05);
  candidates.push({
    value: { kind: 'lobby', message: `${character.name} backs responsible research standards`, budget: spend },
    weight: 0.75,
  });
  candidates.push({
    value: { kind: 'market', message: `${character.name} announces a new research milestone`, budget: spend },
    weight: 0.75,
  });

  return candidates;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export function chooseBaselineActions(
  view: PolicyView,
  prng: PRNG,
  options: BaselinePolicyOptions,
): Action[] {
  const { character, rivals } = view;
  const primary = weightedChoice(candidateActions(view, prng, options), prng);
  const actions: Action[] = [primary];

  if (rivals.length > 0 && chance(options.messageRate ?? 0.2, prng)) {
    actions.push({
      kind: 'send_message',
      to: pick(rivals, prng),
      body: `${character.name} is open to discussing shared research norms.`,
    });
  }

  const { accepted } = view.validate(actions);
  return accepted.length > 0 ? accepted : [{ kind: 'no_op' }];
}

/** Full-knowledge view for callers holding the whole GameState. */
export function policyViewFromState(
  state: GameState,
  name: string,
  config: EngineConfig,
  allowedTopics: readonly string[] | null = null,
): PolicyView {
  const character = state.characters[name];
  if (!character) {
    throw new Error(`Character ${name} is not part of this game`);
  }
  return {
    date: resolutionDate(state, config.calendarStepDays),
    character,
    rivals: state.roster.filter((n) => n !== name),
    validate: (actions) => validateSubmission(state, name, actions, { config, allowedTopics }),
  };
}
