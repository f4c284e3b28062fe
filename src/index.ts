export * from '@/engine/types';
export * from '@/engine/errors';
export * from '@/engine/config';
export * from '@/engine/prng';
export * from '@/engine/entities';
export * from '@/engine/actions';
export * from '@/engine/hash';
export * from '@/engine/baseline-policy';
export { processRound } from '@/engine/round-resolver';
export type { RoundContext, RoundResolution, RoundSubmissions } from '@/engine/round-resolver';

export type * from '@/scenarios/schema';
export { builtInScenarioIds, getBuiltInScenario } from '@/scenarios';

export * from '@/lib/scenario-loader';
export * from '@/lib/game-initializer';
export * from '@/lib/serialization';
export * from '@/lib/game-store';
export * from '@/lib/supabase';
export * from '@/lib/round-controller';
export * from '@/lib/baseline-agent';
export * from '@/lib/simulation-runner';
