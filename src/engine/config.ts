// Engine tuning constants. Every probability, rate and efficiency used during
// resolution lives here so scenarios and the CLI can override them.

import { z } from 'zod';

const rate = z.number().min(0).max(1);

export const espionageDisclosureSchema = z.enum(['none', 'anonymous', 'attributed']);

export type EspionageDisclosure = z.infer<typeof espionageDisclosureSchema>;

export const engineConfigSchema = z.object({
  // Calendar
  calendarStepDays: z.number().int().positive().default(90),

  // Submissions
  maxPrimaryActions: z.number().int().nonnegative().default(1),

  // Economy
  fundraiseSuccessRate: rate.default(0.7),
  fundraiseEfficiency: rate.default(0.8),
  investEfficiency: rate.default(0.9),
  divestEfficiency: rate.default(0.7),

  // Research
  refundFraction: rate.default(0.5),
  researchHumanScaling: z.number().positive().default(100),
  researchMaxStaffingBoost: z.number().nonnegative().default(1),

  // Espionage
  espionageScale: z.number().positive().default(20),
  espionageMinRate: rate.default(0.05),
  espionageMaxRate: rate.default(0.8),
  espionageRevealCount: z.number().int().positive().default(2),
  espionageDisclosure: espionageDisclosureSchema.default('anonymous'),

  // Talent
  poachBaseRate: rate.default(0.2),
  poachBudgetScaling: z.number().positive().default(500_000),
  poachMaxRate: rate.default(0.6),
  poachPoolFraction: rate.default(0.1),
  poachPoolCap: z.number().int().nonnegative().default(5),

  // Influence
  lobbyBackfireRate: rate.default(0.1),
  marketBackfireRate: rate.default(0.1),
  standingGain: z.number().nonnegative().default(1),
  influenceBudgetScaling: z.number().positive().default(1_000_000),
  backfirePenalty: z.number().nonnegative().default(2),

  // Leaks and exogenous events
  leakProbability: rate.default(0.05),
  leakBoostPerBreach: rate.default(0.1),
  leaksNudgePublicView: z.boolean().default(true),
  randomEventProbability: rate.default(0.1),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export const engineConfigOverridesSchema = engineConfigSchema.partial();

export type EngineConfigOverrides = z.infer<typeof engineConfigOverridesSchema>;

export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(overrides);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Engine config validation failed: ${issues}`);
  }
  if (result.data.espionageMinRate > result.data.espionageMaxRate) {
    throw new Error('Engine config validation failed: espionageMinRate exceeds espionageMaxRate');
  }
  return result.data;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = resolveEngineConfig();
