// Wraps the baseline policy as a CharacterAgent for the round controller.
// Each agent owns its PRNG stream, so concurrent collection stays
// deterministic regardless of answer order.

import type { Action } from '@/engine/types';
import { createPRNG, hashSeed, mixSeed } from '@/engine/prng';
import type { BaselinePolicyOptions } from '@/engine/baseline-policy';
import { chooseBaselineActions } from '@/engine/baseline-policy';
import type { AgentContext, CharacterAgent } from '@/lib/round-controller';

export function createBaselineAgent(
  name: string,
  seed: number,
  options: BaselinePolicyOptions,
): CharacterAgent {
  const prng = createPRNG(mixSeed(seed, hashSeed(name)));
  return {
    async decide(context: AgentContext): Promise<Action[]> {
      return chooseBaselineActions(
        {
          date: context.date,
          character: context.character,
          rivals: Object.keys(context.publicViews),
          validate: context.validate,
        },
        prng,
        options,
      );
    },
  };
}

export function createBaselineAgents(
  roster: readonly string[],
  seed: number,
  options: BaselinePolicyOptions,
): Record<string, CharacterAgent> {
  const agents: Record<string, CharacterAgent> = {};
  for (const name of roster) agents[name] = createBaselineAgent(name, seed, options);
  return agents;
}
