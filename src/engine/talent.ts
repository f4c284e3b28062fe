// Talent poaching. Each target exposes a small pool of uncommitted staff per
// round; the first successful poacher in resolution order takes all of it.

import type { PoachTalentAction, PRNG } from '@/engine/types';
import type { EngineConfig } from '@/engine/config';
import { chance } from '@/engine/prng';
import { availableAssets } from '@/engine/entities';
import type { RoundWorkspace } from '@/engine/workspace';
import { adjustBudget, alert, getCharacter, recordOutcome } from '@/engine/workspace';

export function poachSuccessProbability(spend: number, config: EngineConfig): number {
  return Math.min(config.poachBaseRate + spend / config.poachBudgetScaling, config.poachMaxRate);
}

export function poachablePool(freeHuman: number, config: EngineConfig): number {
  return Math.min(Math.floor(Math.max(0, freeHuman) * config.poachPoolFraction), config.poachPoolCap);
}

export function applyPoach(
  ws: RoundWorkspace,
  actor: string,
  action: PoachTalentAction,
  prng: PRNG,
): string {
  const attacker = getCharacter(ws, actor);
  const target = getCharacter(ws, action.target);

  adjustBudget(ws, attacker, -action.budget);

  const pool = ws.poachPools[target.name] ?? poachablePool(availableAssets(target).human, ws.config);
  ws.poachPools[target.name] = pool;

  if (pool <= 0) {
    recordOutcome(ws, actor, {
      action,
      status: 'failure',
      code: 'resource_depleted',
      detail: `No talent left to poach from ${target.name} this round`,
    });
    return `${actor} → ${target.name}: pool depleted`;
  }

  if (!chance(poachSuccessProbability(action.budget, ws.config), prng)) {
    recordOutcome(ws, actor, {
      action,
      status: 'failure',
      code: 'attempt_failed',
      detail: `Recruiting drive at ${target.name} failed`,
    });
    return `${actor} → ${target.name}: attempt failed`;
  }

  target.private.assets.human -= pool;
  attacker.private.assets.human += pool;
  ws.poachPools[target.name] = 0;

  alert(ws, target.name, `${pool} staff left to join ${actor}.`);
  recordOutcome(ws, actor, {
    action,
    status: 'success',
    code: null,
    detail: `Hired ${pool} staff away from ${target.name}`,
  });
  return `${actor} poached ${pool} from ${target.name}`;
}
