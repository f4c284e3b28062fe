// Economy effects: fundraising and moving value between budget and capital.

import type {
  DivestCapitalAction,
  FundraiseAction,
  InvestCapitalAction,
  PRNG,
} from '@/engine/types';
import { chance } from '@/engine/prng';
import { currentPeriod } from '@/engine/entities';
import type { RoundWorkspace } from '@/engine/workspace';
import { adjustBudget, getCharacter, recordOutcome } from '@/engine/workspace';

/**
 * Yield of a fundraising drive: a seeded roll against the success rate, then
 * a fixed efficiency on the requested amount. A failed roll yields 0.
 */
export function fundraiseYield(amount: number, successRate: number, efficiency: number, prng: PRNG): number {
  if (!chance(successRate, prng)) return 0;
  return Math.floor(amount * efficiency);
}

export function applyFundraise(
  ws: RoundWorkspace,
  actor: string,
  action: FundraiseAction,
  prng: PRNG,
): string {
  const character = getCharacter(ws, actor);
  const { fundraiseSuccessRate, fundraiseEfficiency } = ws.config;
  const raised = fundraiseYield(action.amount, fundraiseSuccessRate, fundraiseEfficiency, prng);
  const period = currentPeriod(ws.state.currentDate);

  adjustBudget(ws, character, raised);

  const detail = raised > 0
    ? `Raised ${raised} for the ${period} budget (sought ${action.amount})`
    : `Fundraising drive raised nothing (sought ${action.amount})`;
  recordOutcome(ws, actor, { action, status: 'success', code: null, detail });
  return `${actor} raised ${raised}`;
}

export function applyInvest(ws: RoundWorkspace, actor: string, action: InvestCapitalAction): string {
  const character = getCharacter(ws, actor);
  const gained = Math.floor(action.amount * ws.config.investEfficiency);

  adjustBudget(ws, character, -action.amount);
  character.private.assets.capital += gained;

  recordOutcome(ws, actor, {
    action,
    status: 'success',
    code: null,
    detail: `Invested ${action.amount} of budget into ${gained} capital`,
  });
  return `${actor} invested ${action.amount} → ${gained} capital`;
}

export function applyDivest(ws: RoundWorkspace, actor: string, action: DivestCapitalAction): string {
  const character = getCharacter(ws, actor);
  const gained = Math.floor(action.amount * ws.config.divestEfficiency);

  character.private.assets.capital -= action.amount;
  adjustBudget(ws, character, gained);

  recordOutcome(ws, actor, {
    action,
    status: 'success',
    code: null,
    detail: `Divested ${action.amount} capital for ${gained} budget`,
  });
  return `${actor} divested ${action.amount} → ${gained} budget`;
}
