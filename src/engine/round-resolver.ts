// Round resolution pipeline: the Gamemaster. Runs the eight phases in a fixed
// order on a private copy of the incoming state. Either every phase completes
// and all invariants hold, or the round is rejected with ConsistencyViolation.

import type {
  Action,
  ActionOutcome,
  EventSource,
  GameState,
  PRNG,
  ResolutionLog,
  ResolutionPhase,
  RoundRecord,
  PublicEvent,
  Summary,
} from '@/engine/types';
import type { EngineConfig } from '@/engine/config';
import { DEFAULT_ENGINE_CONFIG } from '@/engine/config';
import { createPRNG, seedToNumber } from '@/engine/prng';
import { ConsistencyViolation, assertNever } from '@/engine/errors';
import {
  advanceDate,
  findInvariantViolations,
  findTransitionViolations,
} from '@/engine/entities';
import { isPrimaryAction, rejectionOutcome, validateSubmission } from '@/engine/actions';
import type { RoundWorkspace } from '@/engine/workspace';
import { createWorkspace, getCharacter, recordOutcome } from '@/engine/workspace';
import { applyDivest, applyFundraise, applyInvest } from '@/engine/economy';
import { advanceResearch, applyCancelProject, applyCreateProject } from '@/engine/research';
import { applyPoach } from '@/engine/talent';
import { propagateLeaks, queueEspionage, resolveEspionage } from '@/engine/intelligence';
import { applyCampaign } from '@/engine/influence';
import { NO_EVENTS, injectEvents } from '@/engine/events';
import { generateSummaries } from '@/engine/summary';
import { hashGameState } from '@/engine/hash';

export type RoundSubmissions = Record<string, readonly Action[]>;

export interface RoundContext {
  config?: EngineConfig;
  events?: EventSource;
  /** Restricts research topics when the scenario does. */
  allowedTopics?: readonly string[] | null;
}

export interface RoundResolution {
  state: GameState;
  summaries: Record<string, Summary>;
  /** Public events raised this round, in order. */
  events: PublicEvent[];
  logs: ResolutionLog[];
}

// ---------------------------------------------------------------------------
// Helper: build a log entry
// ---------------------------------------------------------------------------

function logPhase(phase: ResolutionPhase, messages: string[]): ResolutionLog {
  return { phase, messages };
}

// ---------------------------------------------------------------------------
// 1. Advance time
// ---------------------------------------------------------------------------

function advanceTime(ws: RoundWorkspace): ResolutionLog {
  ws.state.currentRound += 1;
  ws.state.currentDate = advanceDate(ws.state.currentDate, ws.config.calendarStepDays);
  return logPhase('time', [`Round ${ws.state.currentRound} begins on ${ws.state.currentDate}`]);
}

// ---------------------------------------------------------------------------
// 2. Deliver messages
// ---------------------------------------------------------------------------

function deliverMessages(ws: RoundWorkspace, accepted: Record<string, Action[]>): ResolutionLog {
  const messages: string[] = [];
  const round = ws.state.currentRound;

  for (const name of ws.state.roster) {
    for (const action of accepted[name] ?? []) {
      if (action.kind !== 'send_message') continue;
      getCharacter(ws, action.to).private.messagesReceived.push({
        from: name,
        to: action.to,
        round,
        body: action.body,
      });
      recordOutcome(ws, name, {
        action,
        status: 'success',
        code: null,
        detail: `Message delivered to ${action.to}`,
      });
      messages.push(`${name} → ${action.to}`);
    }
  }

  return logPhase('messages', messages.length > 0 ? messages : ['No messages']);
}

// ---------------------------------------------------------------------------
// 3. Apply primary actions
// ---------------------------------------------------------------------------

function applyPrimaryActions(
  ws: RoundWorkspace,
  accepted: Record<string, Action[]>,
  prng: PRNG,
): ResolutionLog {
  const messages: string[] = [];

  // Registration order decides contested resources
  for (const name of ws.state.roster) {
    for (const action of accepted[name] ?? []) {
      if (!isPrimaryAction(action)) continue;
      switch (action.kind) {
        case 'fundraise':
          messages.push(applyFundraise(ws, name, action, prng));
          break;
        case 'create_research_project':
          messages.push(applyCreateProject(ws, name, action));
          break;
        case 'cancel_research_project':
          messages.push(applyCancelProject(ws, name, action));
          break;
        case 'invest_capital':
          messages.push(applyInvest(ws, name, action));
          break;
        case 'divest_capital':
          messages.push(applyDivest(ws, name, action));
          break;
        case 'espionage':
          messages.push(queueEspionage(ws, name, action));
          break;
        case 'poach_talent':
          messages.push(applyPoach(ws, name, action, prng));
          break;
        case 'lobby':
        case 'market':
          messages.push(applyCampaign(ws, name, action, prng));
          break;
        default:
          assertNever(action);
      }
    }
  }

  return logPhase('actions', messages.length > 0 ? messages : ['No primary actions']);
}

// ---------------------------------------------------------------------------
// Main entry point
// ---------------------------------------------------------------------------

/**
 * Resolves one round. Deterministic in (state, submissions, rngSeed, context):
 * the same inputs always yield an identical new state. The input state is
 * never modified.
 *
 * Characters without a submission act as if they submitted no_op.
 *
 * @throws ConsistencyViolation when the resolved state would break an invariant.
 */
export function processRound(
  state: GameState,
  submissions: RoundSubmissions,
  rngSeed: number | string,
  context: RoundContext = {},
): RoundResolution {
  const config = context.config ?? DEFAULT_ENGINE_CONFIG;
  const prng = createPRNG(seedToNumber(rngSeed));
  const logs: ResolutionLog[] = [];

  // Validate every submission against the incoming state before any effect
  const accepted: Record<string, Action[]> = {};
  const rejected: Record<string, ActionOutcome[]> = {};
  const validationMessages: string[] = [];

  for (const name of Object.keys(submissions)) {
    if (!(name in state.characters)) {
      validationMessages.push(`Ignored submission from unknown character ${name}`);
    }
  }

  for (const name of state.roster) {
    const submitted = submissions[name] ?? [];
    const review = validateSubmission(state, name, submitted, {
      config,
      allowedTopics: context.allowedTopics ?? null,
    });
    accepted[name] = review.accepted;
    rejected[name] = review.rejected.map(rejectionOutcome);
    for (const r of review.rejected) {
      validationMessages.push(`${name}: rejected ${r.action.kind} (${r.code})`);
    }
  }
  logs.push(logPhase('validation', validationMessages.length > 0 ? validationMessages : ['All submissions valid']));

  const ws = createWorkspace(structuredClone(state), config);
  for (const [name, outcomes] of Object.entries(rejected)) {
    for (const outcome of outcomes) recordOutcome(ws, name, outcome);
  }

  // One fork per phase, taken in a fixed order
  const actionsPrng = prng.fork();
  const espionagePrng = prng.fork();
  const leaksPrng = prng.fork();
  const eventsPrng = prng.fork();

  logs.push(advanceTime(ws));
  logs.push(deliverMessages(ws, accepted));
  logs.push(applyPrimaryActions(ws, accepted, actionsPrng));
  logs.push(advanceResearch(ws));
  logs.push(resolveEspionage(ws, espionagePrng));
  logs.push(propagateLeaks(ws, leaksPrng));
  logs.push(injectEvents(ws, context.events ?? NO_EVENTS, eventsPrng));

  const { summaries, log: summaryLog } = generateSummaries(state, ws);
  logs.push(summaryLog);

  const violations = [
    ...findInvariantViolations(ws.state),
    ...findTransitionViolations(state, ws.state),
  ];
  if (violations.length > 0) {
    throw new ConsistencyViolation(ws.state.currentRound, violations);
  }

  const record: RoundRecord = structuredClone({
    round: ws.state.currentRound,
    date: ws.state.currentDate,
    outcomes: ws.outcomes,
    events: ws.events,
    stateHash: hashGameState(ws.state),
  });

  return {
    state: { ...ws.state, history: [...ws.state.history, record] },
    summaries,
    events: structuredClone(ws.events),
    logs,
  };
}
