// Round controller: owns the authoritative GameState across rounds. Each
// round it collects decisions from every agent concurrently (a barrier with a
// per-character timeout), re-asks agents whose submissions were rejected,
// resolves the round and hands summaries back for the next decision.

import type {
  Action,
  Character,
  GameState,
  PublicEvent,
  PublicView,
  ResolutionLog,
  Summary,
} from '@/engine/types';
import type { RejectedAction, SubmissionReview, ValidationOptions } from '@/engine/actions';
import { validateSubmission } from '@/engine/actions';
import { DEFAULT_ENGINE_CONFIG } from '@/engine/config';
import { mixSeed } from '@/engine/prng';
import type { RoundContext, RoundResolution } from '@/engine/round-resolver';
import { processRound } from '@/engine/round-resolver';
import { resolutionDate } from '@/engine/entities';
import type { GameStore } from '@/lib/game-store';

const RECENT_EVENT_COUNT = 5;

export interface AgentContext {
  /** Round about to be resolved. */
  round: number;
  date: string;
  /** The agent's own character; a copy the agent may freely modify. */
  character: Character;
  publicViews: Record<string, PublicView>;
  recentEvents: PublicEvent[];
  lastSummary: Summary | null;
  /** Rejections from the previous attempt this round; empty on the first. */
  rejections: RejectedAction[];
  attempt: number;
  /** Checks a candidate submission against the current state. */
  validate(actions: readonly Action[]): SubmissionReview;
}

export interface CharacterAgent {
  decide(context: AgentContext): Promise<Action[]>;
}

export interface RoundControllerOptions {
  state: GameState;
  agents: Record<string, CharacterAgent>;
  baseSeed: number;
  context?: RoundContext;
  /** Milliseconds each agent has to answer before it is treated as no_op. */
  decisionTimeoutMs?: number;
  /** Total attempts per agent per round, including the first. */
  maxAttempts?: number;
  store?: GameStore;
  gameId?: string;
  onRound?: (result: RoundResult) => void | Promise<void>;
}

export interface RoundResult extends RoundResolution {
  round: number;
  seed: number;
  submissions: Record<string, Action[]>;
}

class DecisionTimeout extends Error {
  constructor(name: string, ms: number) {
    super(`${name} did not answer within ${ms}ms`);
    this.name = 'DecisionTimeout';
  }
}

/** Seed for a given round, derived from the game's base seed. */
export function roundSeed(baseSeed: number, round: number): number {
  return mixSeed(baseSeed, round);
}

async function withTimeout<T>(work: Promise<T>, ms: number, name: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DecisionTimeout(name, ms)), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class RoundController {
  private current: GameState;
  private readonly summaries = new Map<string, Summary>();
  private readonly options: RoundControllerOptions;

  constructor(options: RoundControllerOptions) {
    this.options = options;
    this.current = options.state;
  }

  /** Picks a stored game back up from its last persisted round. */
  static async resume(
    options: Omit<RoundControllerOptions, 'state'> & { store: GameStore; gameId: string },
  ): Promise<RoundController> {
    const state = await options.store.load(options.gameId);
    if (!state) {
      throw new Error(`No stored game with id ${options.gameId}`);
    }
    return new RoundController({ ...options, state });
  }

  get state(): GameState {
    return this.current;
  }

  private validationOptions(): ValidationOptions {
    return {
      config: this.options.context?.config ?? DEFAULT_ENGINE_CONFIG,
      allowedTopics: this.options.context?.allowedTopics ?? null,
    };
  }

  private buildContext(name: string, attempt: number, rejections: RejectedAction[]): AgentContext {
    const validation = this.validationOptions();
    const state = this.current;
    const publicViews: Record<string, PublicView> = {};
    for (const other of state.roster) {
      if (other !== name) publicViews[other] = structuredClone(state.characters[other].public);
    }
    return {
      round: state.currentRound + 1,
      date: resolutionDate(state, validation.config.calendarStepDays),
      character: structuredClone(state.characters[name]),
      publicViews,
      recentEvents: structuredClone(state.publicEvents.slice(-RECENT_EVENT_COUNT)),
      lastSummary: this.summaries.get(name) ?? null,
      rejections,
      attempt,
      validate: (actions) => validateSubmission(state, name, actions, validation),
    };
  }

  private async collect(name: string, log: string[]): Promise<Action[]> {
    const agent = this.options.agents[name];
    if (!agent) {
      log.push(`${name}: no agent, no_op`);
      return [{ kind: 'no_op' }];
    }

    const timeoutMs = this.options.decisionTimeoutMs ?? 30_000;
    const maxAttempts = Math.max(1, this.options.maxAttempts ?? 3);
    const validation = this.validationOptions();

    let rejections: RejectedAction[] = [];
    let submission: Action[] = [{ kind: 'no_op' }];

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        submission = await withTimeout(
          agent.decide(this.buildContext(name, attempt, rejections)),
          timeoutMs,
          name,
        );
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        if (attempt === 1) {
          log.push(`${name}: ${reason}, no_op`);
          return [{ kind: 'no_op' }];
        }
        // Keep the previous attempt
        log.push(`${name}: ${reason}, keeping attempt ${attempt - 1}`);
        return submission;
      }

      rejections = validateSubmission(this.current, name, submission, validation).rejected;
      if (rejections.length === 0) return submission;
      log.push(`${name}: attempt ${attempt} had ${rejections.length} rejected action(s)`);
    }

    // Out of attempts: the engine reports the remaining rejections
    return submission;
  }

  /** Collects decisions, resolves one round and persists the result. */
  async playRound(): Promise<RoundResult> {
    const collectionLog: string[] = [];
    const roster = this.current.roster;
    const collected = await Promise.all(roster.map((name) => this.collect(name, collectionLog)));

    const submissions: Record<string, Action[]> = {};
    roster.forEach((name, i) => {
      submissions[name] = collected[i];
    });

    const round = this.current.currentRound + 1;
    const seed = roundSeed(this.options.baseSeed, round);
    const resolution = processRound(this.current, submissions, seed, this.options.context);

    this.current = resolution.state;
    for (const [name, summary] of Object.entries(resolution.summaries)) {
      this.summaries.set(name, summary);
    }

    if (this.options.store) {
      await this.options.store.save(this.options.gameId ?? 'default', this.current);
    }

    const collectionEntry: ResolutionLog = {
      phase: 'collection',
      messages: collectionLog.length > 0 ? collectionLog : [`Collected ${roster.length} submission(s)`],
    };
    const result: RoundResult = {
      ...resolution,
      logs: [collectionEntry, ...resolution.logs],
      round,
      seed,
      submissions,
    };

    if (this.options.onRound) await this.options.onRound(result);
    return result;
  }

  /** Plays rounds until the game reaches `rounds` total rounds. */
  async run(rounds: number): Promise<RoundResult[]> {
    const results: RoundResult[] = [];
    while (this.current.currentRound < rounds) {
      results.push(await this.playRound());
    }
    return results;
  }
}
