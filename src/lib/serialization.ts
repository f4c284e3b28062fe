// GameState serialization. The JSON form round-trips every field, so a game
// saved after round k resumes exactly as if it had never stopped.

import { z } from 'zod';
import type { Action, GameState } from '@/engine/types';
import { actionSchema, gameStateSchema } from '@/lib/state-schema';

function describeIssues(error: z.ZodError): string {
  return error.issues.slice(0, 5)
    .map((i) => `${i.path.join('.')}: ${i.message}`)
    .join('; ');
}

export function serializeGameState(state: GameState): string {
  return JSON.stringify(state);
}

export function parseGameState(raw: unknown): GameState {
  const result = gameStateSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Game state validation failed: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function deserializeGameState(json: string): GameState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new Error(`Failed to parse game state JSON: ${String(err)}`);
  }
  return parseGameState(parsed);
}

/** Validates untyped input (e.g. a parsed agent response) into actions. */
export function parseActions(raw: unknown): Action[] {
  const result = z.array(actionSchema).safeParse(raw);
  if (!result.success) {
    throw new Error(`Action validation failed: ${describeIssues(result.error)}`);
  }
  return result.data;
}
