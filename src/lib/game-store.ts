// Persistence of the authoritative GameState between rounds.

import type { SupabaseClient } from '@supabase/supabase-js';
import type { GameState } from '@/engine/types';
import { deserializeGameState, parseGameState, serializeGameState } from '@/lib/serialization';

export interface GameStore {
  save(gameId: string, state: GameState): Promise<void>;
  load(gameId: string): Promise<GameState | null>;
}

/** Keeps serialized snapshots in memory; used by tests and local CLI runs. */
export class InMemoryGameStore implements GameStore {
  private readonly snapshots = new Map<string, string>();

  async save(gameId: string, state: GameState): Promise<void> {
    this.snapshots.set(gameId, serializeGameState(state));
  }

  async load(gameId: string): Promise<GameState | null> {
    const json = this.snapshots.get(gameId);
    return json === undefined ? null : deserializeGameState(json);
  }
}

/** Stores states in the `games` table (`id`, `round`, `game_state` JSONB). */
export class SupabaseGameStore implements GameStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table = 'games',
  ) {}

  async save(gameId: string, state: GameState): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .upsert({ id: gameId, round: state.currentRound, game_state: state });
    if (error) {
      throw new Error(`Failed to save game ${gameId}: ${error.message}`);
    }
  }

  async load(gameId: string): Promise<GameState | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select('game_state')
      .eq('id', gameId)
      .maybeSingle();
    if (error) {
      throw new Error(`Failed to load game ${gameId}: ${error.message}`);
    }
    if (!data) return null;
    return parseGameState(data.game_state);
  }
}
