// Zod schema for runtime validation of scenario.json files.
// Mirrors the TypeScript interfaces in src/scenarios/schema.ts.

import { z } from 'zod';
import type { Scenario } from '@/scenarios/schema';
import { engineConfigOverridesSchema } from '@/engine/config';

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const assetBalanceSchema = z.object({
  technicalCapability: z.number().min(0).max(100),
  capital: z.number().int().nonnegative(),
  human: z.number().nonnegative(),
});

const scenarioProjectSchema = z.object({
  id: z.string().min(1),
  topic: z.string().min(1),
  committedCapital: z.number().int().nonnegative(),
  committedTechnicalCapability: z.number().nonnegative(),
  committedHuman: z.number().nonnegative(),
  estimatedDurationRounds: z.number().int().positive(),
  progress: z.number().min(0).max(1).default(0),
});

const scenarioCharacterSchema = z.object({
  name: z.string().min(1),
  private: z.object({
    trueObjectives: z.string(),
    trueStrategy: z.string(),
    budget: z.record(z.string().regex(/^\d{4}$/), z.number().nonnegative()),
    assets: assetBalanceSchema,
    counterIntelligence: z.number().nonnegative().default(0),
    projects: z.array(scenarioProjectSchema).default([]),
  }),
  public: z.object({
    statedObjectives: z.string(),
    statedStrategy: z.string(),
    publicArtifacts: z.array(z.string()).default([]),
    standing: z.number().default(0),
  }),
});

const researchTopicSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
});

const scheduledEventSchema = z.object({
  round: z.number().int().positive(),
  description: z.string().min(1),
});

export const scenarioSchema: z.ZodType<Scenario, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().default(''),
    startDate: isoDateSchema,
    characters: z.array(scenarioCharacterSchema).min(1),
    researchTopics: z.array(researchTopicSchema).default([]),
    restrictTopics: z.boolean().default(false),
    randomEvents: z.array(z.string().min(1)).default([]),
    fixedEvents: z.array(scheduledEventSchema).default([]),
    engine: engineConfigOverridesSchema.default({}),
  })
  .superRefine((scenario, ctx) => {
    const seen = new Set<string>();
    scenario.characters.forEach((c, i) => {
      if (seen.has(c.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['characters', i, 'name'],
          message: `duplicate character name ${c.name}`,
        });
      }
      seen.add(c.name);
    });
    if (scenario.restrictTopics && scenario.researchTopics.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['researchTopics'],
        message: 'restrictTopics requires at least one research topic',
      });
    }
  });
