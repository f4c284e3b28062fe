// Mutable scratch space for a single round. processRound deep-copies the
// incoming GameState into `state`; phase functions mutate the copy and record
// what happened here. Nothing in a workspace escapes until every invariant
// holds.

import type {
  ActionOutcome,
  Character,
  EspionageAction,
  GameState,
  PublicEvent,
  PublicEventKind,
} from '@/engine/types';
import type { EngineConfig } from '@/engine/config';
import { currentPeriod } from '@/engine/entities';

export interface QueuedEspionage {
  actor: string;
  action: EspionageAction;
}

export interface RoundWorkspace {
  state: GameState;
  config: EngineConfig;
  /** Per-character outcomes, in the order they were produced. */
  outcomes: Record<string, ActionOutcome[]>;
  /** Public events raised this round, in order. */
  events: PublicEvent[];
  espionageQueue: QueuedEspionage[];
  /** Successful espionage breaches suffered this round, by target. */
  breaches: Record<string, number>;
  /** Remaining poachable headcount per target; set when first targeted. */
  poachPools: Record<string, number>;
}

export function createWorkspace(state: GameState, config: EngineConfig): RoundWorkspace {
  const outcomes: Record<string, ActionOutcome[]> = {};
  for (const name of state.roster) outcomes[name] = [];
  return {
    state,
    config,
    outcomes,
    events: [],
    espionageQueue: [],
    breaches: {},
    poachPools: {},
  };
}

export function getCharacter(ws: RoundWorkspace, name: string): Character {
  const character = ws.state.characters[name];
  if (!character) {
    throw new Error(`Character ${name} is not part of this game`);
  }
  return character;
}

export function recordOutcome(ws: RoundWorkspace, actor: string, outcome: ActionOutcome): void {
  (ws.outcomes[actor] ??= []).push(outcome);
}

export function emitEvent(ws: RoundWorkspace, description: string, kind: PublicEventKind): PublicEvent {
  const event: PublicEvent = { round: ws.state.currentRound, description, kind };
  ws.state.publicEvents.push(event);
  ws.events.push(event);
  return event;
}

export function addArtifact(character: Character, artifact: string): void {
  if (!character.public.publicArtifacts.includes(artifact)) {
    character.public.publicArtifacts.push(artifact);
  }
}

export function alert(ws: RoundWorkspace, name: string, text: string): void {
  getCharacter(ws, name).private.alerts.push({ round: ws.state.currentRound, text });
}

// ---------------------------------------------------------------------------
// Budget bookkeeping (current period of the round being resolved)
// ---------------------------------------------------------------------------

export function budgetFor(ws: RoundWorkspace, character: Character): number {
  return character.private.budget[currentPeriod(ws.state.currentDate)] ?? 0;
}

export function adjustBudget(ws: RoundWorkspace, character: Character, delta: number): void {
  const period = currentPeriod(ws.state.currentDate);
  character.private.budget[period] = (character.private.budget[period] ?? 0) + delta;
}

/** Rounds to two decimals; used for reputation arithmetic. */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
