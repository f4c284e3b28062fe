// Entity constructors, derived read accessors and state invariants.
// Only the resolution engine mutates characters; everything here is read-only
// or builds fresh values.

import type {
  AssetBalance,
  Budget,
  Character,
  GameState,
  ResearchProject,
} from '@/engine/types';
import { ValidationError } from '@/engine/errors';

const EMPTY_ASSETS: AssetBalance = { technicalCapability: 0, capital: 0, human: 0 };

export const MAX_TECHNICAL_CAPABILITY = 100;

// ---------------------------------------------------------------------------
// Calendar
// ---------------------------------------------------------------------------

/** Budget period for an ISO date: its calendar year. */
export function currentPeriod(date: string): string {
  return date.slice(0, 4);
}

export function advanceDate(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  if (Number.isNaN(d.getTime())) {
    throw new Error(`Invalid game date: ${date}`);
  }
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/** Date of the round the next processRound call will resolve. */
export function resolutionDate(state: GameState, calendarStepDays: number): string {
  return advanceDate(state.currentDate, calendarStepDays);
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

export function activeProjects(character: Character): ResearchProject[] {
  return character.private.activeProjects.filter((p) => p.status === 'active');
}

export function findProject(character: Character, projectId: string): ResearchProject | undefined {
  return character.private.activeProjects.find((p) => p.id === projectId);
}

/** Capital still owed to a project plus the tech and staff it holds. */
export function outstandingCommitment(project: ResearchProject): AssetBalance {
  if (project.status !== 'active') return { ...EMPTY_ASSETS };
  return {
    capital: project.committedCapital - project.spentCapital,
    technicalCapability: project.committedTechnicalCapability,
    human: project.committedHuman,
  };
}

export function committedAssets(character: Character): AssetBalance {
  return character.private.activeProjects.reduce<AssetBalance>((acc, project) => {
    const o = outstandingCommitment(project);
    return {
      capital: acc.capital + o.capital,
      technicalCapability: acc.technicalCapability + o.technicalCapability,
      human: acc.human + o.human,
    };
  }, { ...EMPTY_ASSETS });
}

/** Total assets minus everything held by active projects. */
export function availableAssets(character: Character): AssetBalance {
  const { assets } = character.private;
  const committed = committedAssets(character);
  return {
    capital: assets.capital - committed.capital,
    technicalCapability: assets.technicalCapability - committed.technicalCapability,
    human: assets.human - committed.human,
  };
}

export function currentBudget(character: Character, date: string): number {
  return character.private.budget[currentPeriod(date)] ?? 0;
}

/** Slug of the topic, suffixed past ids the character holds or has `claimed`. */
export function projectIdForTopic(
  character: Character,
  topic: string,
  claimed: ReadonlySet<string> = new Set(),
): string {
  const base = topic
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '') || 'project';
  const taken = new Set([...character.private.activeProjects.map((p) => p.id), ...claimed]);
  if (!taken.has(base)) return base;
  let n = 2;
  while (taken.has(`${base}-${n}`)) n++;
  return `${base}-${n}`;
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export interface ResearchProjectInput {
  id: string;
  topic: string;
  committedCapital: number;
  committedTechnicalCapability: number;
  committedHuman: number;
  estimatedDurationRounds: number;
  startedRound: number;
  progress?: number;
  spentCapital?: number;
}

export function createResearchProject(input: ResearchProjectInput): ResearchProject {
  if (input.topic.trim() === '') {
    throw new ValidationError('invalid_topic', 'Research project topic must not be empty');
  }
  if (!Number.isInteger(input.estimatedDurationRounds) || input.estimatedDurationRounds <= 0) {
    throw new ValidationError(
      'invalid_duration',
      `Estimated duration must be a positive whole number of rounds, got ${input.estimatedDurationRounds}`,
    );
  }
  const commitments = [input.committedCapital, input.committedTechnicalCapability, input.committedHuman];
  if (commitments.some((v) => !Number.isFinite(v) || v < 0)) {
    throw new ValidationError('invalid_amount', `Project ${input.id}: commitments must be non-negative`);
  }
  const progress = input.progress ?? 0;
  if (progress < 0 || progress > 1) {
    throw new ValidationError('invalid_amount', `Project ${input.id}: progress must be within [0, 1]`);
  }

  return {
    id: input.id,
    topic: input.topic,
    committedCapital: input.committedCapital,
    committedTechnicalCapability: input.committedTechnicalCapability,
    committedHuman: input.committedHuman,
    spentCapital: input.spentCapital ?? Math.round(input.committedCapital * progress),
    progress,
    estimatedDurationRounds: input.estimatedDurationRounds,
    status: 'active',
    startedRound: input.startedRound,
    completedRound: null,
    cancelledRound: null,
  };
}

export interface CharacterInput {
  name: string;
  private: {
    trueObjectives: string;
    trueStrategy: string;
    budget: Budget;
    assets: AssetBalance;
    counterIntelligence?: number;
    activeProjects?: ResearchProject[];
  };
  public: {
    statedObjectives: string;
    statedStrategy: string;
    publicArtifacts?: string[];
    standing?: number;
  };
}

export function createCharacter(input: CharacterInput): Character {
  const { name } = input;
  if (name.trim() === '') {
    throw new ValidationError('unknown_character', 'Character name must not be empty');
  }

  const { assets } = input.private;
  if (assets.capital < 0 || assets.technicalCapability < 0 || assets.human < 0) {
    throw new ValidationError('invalid_amount', `${name}: assets must be non-negative`, name);
  }
  if (assets.technicalCapability > MAX_TECHNICAL_CAPABILITY) {
    throw new ValidationError(
      'invalid_amount',
      `${name}: technical capability cannot exceed ${MAX_TECHNICAL_CAPABILITY}`,
      name,
    );
  }

  const projects = input.private.activeProjects ?? [];
  const ids = new Set<string>();
  for (const p of projects) {
    if (ids.has(p.id)) {
      throw new ValidationError('invalid_topic', `${name}: duplicate project id ${p.id}`, name);
    }
    ids.add(p.id);
  }

  const character: Character = {
    name,
    private: {
      trueObjectives: input.private.trueObjectives,
      trueStrategy: input.private.trueStrategy,
      budget: { ...input.private.budget },
      assets: { ...assets },
      counterIntelligence: input.private.counterIntelligence ?? 0,
      activeProjects: projects.map((p) => ({ ...p })),
      messagesReceived: [],
      intelligence: [],
      alerts: [],
    },
    public: {
      statedObjectives: input.public.statedObjectives,
      statedStrategy: input.public.statedStrategy,
      publicArtifacts: [...new Set(input.public.publicArtifacts ?? [])],
      standing: input.public.standing ?? 0,
    },
  };

  const available = availableAssets(character);
  if (available.capital < 0 || available.technicalCapability < 0 || available.human < 0) {
    throw new ValidationError(
      'insufficient_resources',
      `${name}: project commitments exceed declared assets`,
      name,
    );
  }

  return character;
}

// ---------------------------------------------------------------------------
// Invariants
// ---------------------------------------------------------------------------

/** Every invariant a resolved state must satisfy; empty when consistent. */
export function findInvariantViolations(state: GameState): string[] {
  const violations: string[] = [];

  if (!Number.isInteger(state.currentRound) || state.currentRound < 0) {
    violations.push(`currentRound must be a non-negative integer, got ${state.currentRound}`);
  }

  const names = Object.keys(state.characters);
  const rosterSet = new Set(state.roster);
  if (rosterSet.size !== state.roster.length) {
    violations.push('roster contains duplicate names');
  }
  if (names.length !== state.roster.length || names.some((n) => !rosterSet.has(n))) {
    violations.push('roster does not match characters');
  }

  for (const [key, character] of Object.entries(state.characters)) {
    if (character.name !== key) {
      violations.push(`character keyed ${key} is named ${character.name}`);
    }
    const { assets, budget } = character.private;
    if (assets.capital < 0) violations.push(`${key}: negative capital (${assets.capital})`);
    if (assets.technicalCapability < 0) {
      violations.push(`${key}: negative technical capability (${assets.technicalCapability})`);
    }
    if (assets.technicalCapability > MAX_TECHNICAL_CAPABILITY) {
      violations.push(`${key}: technical capability above ${MAX_TECHNICAL_CAPABILITY}`);
    }
    if (assets.human < 0) violations.push(`${key}: negative human resources (${assets.human})`);

    for (const [period, amount] of Object.entries(budget)) {
      if (amount < 0) violations.push(`${key}: negative budget for ${period} (${amount})`);
    }

    const available = availableAssets(character);
    if (available.capital < 0) violations.push(`${key}: negative available capital (${available.capital})`);
    if (available.technicalCapability < 0) {
      violations.push(`${key}: negative available technical capability (${available.technicalCapability})`);
    }
    if (available.human < 0) violations.push(`${key}: negative available human (${available.human})`);

    const ids = new Set<string>();
    for (const project of character.private.activeProjects) {
      if (ids.has(project.id)) violations.push(`${key}: duplicate project id ${project.id}`);
      ids.add(project.id);
      if (project.progress < 0 || project.progress > 1) {
        violations.push(`${key}/${project.id}: progress ${project.progress} outside [0, 1]`);
      }
      if (project.spentCapital > project.committedCapital) {
        violations.push(`${key}/${project.id}: spent capital exceeds commitment`);
      }
      if (project.estimatedDurationRounds <= 0) {
        violations.push(`${key}/${project.id}: non-positive duration`);
      }
    }

    for (const message of character.private.messagesReceived) {
      if (message.to !== key) violations.push(`${key}: holds a message addressed to ${message.to}`);
      if (!(message.from in state.characters)) {
        violations.push(`${key}: message from unknown character ${message.from}`);
      }
    }
  }

  return violations;
}

/** Invariants relating a state to its successor. */
export function findTransitionViolations(before: GameState, after: GameState): string[] {
  const violations: string[] = [];

  if (after.currentRound !== before.currentRound + 1) {
    violations.push(`round advanced from ${before.currentRound} to ${after.currentRound}`);
  }

  for (const name of before.roster) {
    const prev = before.characters[name];
    const next = after.characters[name];
    if (!next) {
      violations.push(`${name} disappeared`);
      continue;
    }
    for (const project of prev.private.activeProjects) {
      const successor = findProject(next, project.id);
      if (!successor) {
        violations.push(`${name}/${project.id} disappeared`);
        continue;
      }
      if (project.status !== 'active' && successor.status !== project.status) {
        violations.push(`${name}/${project.id} left terminal status ${project.status}`);
      }
      if (successor.progress < project.progress) {
        violations.push(`${name}/${project.id} progress decreased`);
      }
    }
  }

  return violations;
}
