// Zod schemas for persisted game states and externally supplied actions.
// Mirrors the TypeScript interfaces in src/engine/types.ts.

import { z } from 'zod';
import type { Action, GameState } from '@/engine/types';

const assetBalanceSchema = z.object({
  technicalCapability: z.number(),
  capital: z.number(),
  human: z.number(),
});

const researchProjectSchema = z.object({
  id: z.string(),
  topic: z.string(),
  committedCapital: z.number(),
  committedTechnicalCapability: z.number(),
  committedHuman: z.number(),
  spentCapital: z.number(),
  progress: z.number(),
  estimatedDurationRounds: z.number(),
  status: z.enum(['active', 'completed', 'cancelled']),
  startedRound: z.number(),
  completedRound: z.number().nullable(),
  cancelledRound: z.number().nullable(),
});

const messageSchema = z.object({
  from: z.string(),
  to: z.string(),
  round: z.number(),
  body: z.string(),
});

const publicEventSchema = z.object({
  round: z.number(),
  description: z.string(),
  kind: z.enum(['random', 'scheduled', 'leak', 'announcement']),
});

const intelligenceReportSchema = z.object({
  round: z.number(),
  target: z.string(),
  focusArea: z.string(),
  findings: z.array(z.object({
    facet: z.enum(['objectives', 'strategy', 'budget', 'assets', 'projects']),
    detail: z.string(),
  })),
});

const characterSchema = z.object({
  name: z.string(),
  private: z.object({
    trueObjectives: z.string(),
    trueStrategy: z.string(),
    budget: z.record(z.string(), z.number()),
    assets: assetBalanceSchema,
    counterIntelligence: z.number(),
    activeProjects: z.array(researchProjectSchema),
    messagesReceived: z.array(messageSchema),
    intelligence: z.array(intelligenceReportSchema),
    alerts: z.array(z.object({ round: z.number(), text: z.string() })),
  }),
  public: z.object({
    statedObjectives: z.string(),
    statedStrategy: z.string(),
    publicArtifacts: z.array(z.string()),
    standing: z.number(),
  }),
});

export const actionSchema: z.ZodType<Action> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fundraise'), amount: z.number(), description: z.string().optional() }),
  z.object({
    kind: z.literal('create_research_project'),
    projectId: z.string().optional(),
    topic: z.string(),
    committedCapital: z.number(),
    committedTechnicalCapability: z.number(),
    committedHuman: z.number(),
    estimatedDurationRounds: z.number(),
  }),
  z.object({ kind: z.literal('cancel_research_project'), projectId: z.string() }),
  z.object({ kind: z.literal('invest_capital'), amount: z.number() }),
  z.object({ kind: z.literal('divest_capital'), amount: z.number() }),
  z.object({ kind: z.literal('espionage'), target: z.string(), focusArea: z.string() }),
  z.object({ kind: z.literal('poach_talent'), target: z.string(), budget: z.number() }),
  z.object({ kind: z.literal('lobby'), message: z.string(), budget: z.number() }),
  z.object({ kind: z.literal('market'), message: z.string(), budget: z.number() }),
  z.object({ kind: z.literal('send_message'), to: z.string(), body: z.string() }),
  z.object({ kind: z.literal('no_op') }),
]);

const actionOutcomeSchema = z.object({
  action: actionSchema,
  status: z.enum(['success', 'failure', 'rejected']),
  code: z.enum([
    'insufficient_resources',
    'insufficient_budget',
    'unknown_character',
    'unknown_target',
    'unknown_project',
    'invalid_topic',
    'invalid_duration',
    'invalid_amount',
    'self_target',
    'too_many_actions',
    'empty_message',
    'resource_depleted',
    'attempt_failed',
    'backfired',
  ]).nullable(),
  detail: z.string(),
});

const roundRecordSchema = z.object({
  round: z.number(),
  date: z.string(),
  outcomes: z.record(z.string(), z.array(actionOutcomeSchema)),
  events: z.array(publicEventSchema),
  stateHash: z.string(),
});

export const gameStateSchema: z.ZodType<GameState> = z.object({
  currentRound: z.number().int().nonnegative(),
  currentDate: z.string(),
  roster: z.array(z.string()),
  characters: z.record(z.string(), characterSchema),
  publicEvents: z.array(publicEventSchema),
  history: z.array(roundRecordSchema),
});
