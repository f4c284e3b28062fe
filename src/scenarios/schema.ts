// Scenario package types: everything needed to set up a game at round 0.
// Runtime validation lives in src/lib/scenario-schema.ts.

import type { AssetBalance, ScheduledEvent } from '@/engine/types';
import type { EngineConfigOverrides } from '@/engine/config';

export interface ScenarioProject {
  id: string;
  topic: string;
  committedCapital: number;
  committedTechnicalCapability: number;
  committedHuman: number;
  estimatedDurationRounds: number;
  progress: number;
}

export interface ScenarioCharacter {
  name: string;
  private: {
    trueObjectives: string;
    trueStrategy: string;
    budget: Record<string, number>;
    assets: AssetBalance;
    counterIntelligence: number;
    projects: ScenarioProject[];
  };
  public: {
    statedObjectives: string;
    statedStrategy: string;
    publicArtifacts: string[];
    standing: number;
  };
}

export interface ResearchTopic {
  name: string;
  description: string;
}

export interface Scenario {
  id: string;
  name: string;
  description: string;
  /** ISO date of round 0. */
  startDate: string;
  characters: ScenarioCharacter[];
  researchTopics: ResearchTopic[];
  /** When true, projects may only use the listed topics. */
  restrictTopics: boolean;
  randomEvents: string[];
  fixedEvents: ScheduledEvent[];
  engine: EngineConfigOverrides;
}
