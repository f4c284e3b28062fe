// Lobbying and marketing: public-facing campaigns that move a character's
// standing. Either can backfire on a seeded roll.

import type { LobbyAction, MarketAction, PRNG } from '@/engine/types';
import { chance } from '@/engine/prng';
import type { RoundWorkspace } from '@/engine/workspace';
import {
  addArtifact,
  adjustBudget,
  emitEvent,
  getCharacter,
  recordOutcome,
  round2,
} from '@/engine/workspace';

const CAMPAIGN_LABEL: Record<'lobby' | 'market', string> = {
  lobby: 'Lobbying',
  market: 'Marketing',
};

export function campaignGain(spend: number, standingGain: number, scaling: number): number {
  return round2(standingGain + spend / scaling);
}

export function applyCampaign(
  ws: RoundWorkspace,
  actor: string,
  action: LobbyAction | MarketAction,
  prng: PRNG,
): string {
  const character = getCharacter(ws, actor);
  const label = CAMPAIGN_LABEL[action.kind];
  const backfireRate = action.kind === 'lobby' ? ws.config.lobbyBackfireRate : ws.config.marketBackfireRate;

  adjustBudget(ws, character, -action.budget);

  if (chance(backfireRate, prng)) {
    const penalty = ws.config.backfirePenalty;
    character.public.standing = round2(character.public.standing - penalty);
    addArtifact(character, `Backlash: ${action.message}`);
    emitEvent(ws, `${actor}'s ${label.toLowerCase()} campaign backfired: "${action.message}"`, 'announcement');
    recordOutcome(ws, actor, {
      action,
      status: 'failure',
      code: 'backfired',
      detail: `${label} campaign backfired (standing -${penalty})`,
    });
    return `${actor} ${action.kind} backfired`;
  }

  const gain = campaignGain(action.budget, ws.config.standingGain, ws.config.influenceBudgetScaling);
  character.public.standing = round2(character.public.standing + gain);
  addArtifact(character, action.message);
  emitEvent(ws, `${label} by ${actor}: "${action.message}"`, 'announcement');
  recordOutcome(ws, actor, {
    action,
    status: 'success',
    code: null,
    detail: `${label} campaign landed (standing +${gain})`,
  });
  return `${actor} ${action.kind} landed (+${gain})`;
}
