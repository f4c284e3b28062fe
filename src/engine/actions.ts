// Action validation. Runs before any effect is applied: a rejected action is
// reported back to its submitter and never touches anyone else's state.

import type {
  Action,
  ActionOutcome,
  AssetBalance,
  Character,
  GameState,
  PrimaryAction,
  RejectionCode,
  ValidationResult,
} from '@/engine/types';
import type { EngineConfig } from '@/engine/config';
import { DEFAULT_ENGINE_CONFIG } from '@/engine/config';
import { ValidationError, assertNever } from '@/engine/errors';
import {
  availableAssets,
  currentBudget,
  findProject,
  projectIdForTopic,
  resolutionDate,
} from '@/engine/entities';

export interface ValidationOptions {
  config: EngineConfig;
  /** When set, research topics must come from this list. */
  allowedTopics?: readonly string[] | null;
}

/**
 * Running view of what a character can still afford while their submission
 * is checked action by action, so that several accepted actions can never
 * jointly overspend.
 */
export interface ResourceLedger {
  available: AssetBalance;
  budget: number;
  cancelledProjects: Set<string>;
  claimedProjectIds: Set<string>;
  primaryCount: number;
}

export function isPrimaryAction(action: Action): action is PrimaryAction {
  return action.kind !== 'send_message' && action.kind !== 'no_op';
}

export function createLedger(character: Character, date: string): ResourceLedger {
  return {
    available: availableAssets(character),
    budget: currentBudget(character, date),
    cancelledProjects: new Set(),
    claimedProjectIds: new Set(),
    primaryCount: 0,
  };
}

function reject(code: RejectionCode, reason: string): ValidationResult {
  return { ok: false, code, reason };
}

const OK: ValidationResult = { ok: true };

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function checkTarget(state: GameState, actor: string, target: string): ValidationResult {
  if (!(target in state.characters)) {
    return reject('unknown_target', `Unknown character: ${target}`);
  }
  if (target === actor) {
    return reject('self_target', 'Cannot target yourself');
  }
  return OK;
}

function checkSpend(amount: number, ledger: ResourceLedger): ValidationResult {
  if (!isNonNegative(amount)) {
    return reject('invalid_amount', `Budget must be a non-negative number, got ${amount}`);
  }
  if (amount > ledger.budget) {
    return reject('insufficient_budget', `Requested ${amount} but only ${ledger.budget} budget remains`);
  }
  return OK;
}

// ---------------------------------------------------------------------------
// Single action
// ---------------------------------------------------------------------------

export function validateAction(
  action: Action,
  state: GameState,
  actor: string,
  options: ValidationOptions = { config: DEFAULT_ENGINE_CONFIG },
  ledger?: ResourceLedger,
): ValidationResult {
  const character = state.characters[actor];
  if (!character) {
    return reject('unknown_character', `Unknown character: ${actor}`);
  }
  const book = ledger ?? createLedger(character, resolutionDate(state, options.config.calendarStepDays));

  if (isPrimaryAction(action) && book.primaryCount >= options.config.maxPrimaryActions) {
    return reject(
      'too_many_actions',
      `At most ${options.config.maxPrimaryActions} primary action(s) per round`,
    );
  }

  switch (action.kind) {
    case 'fundraise':
      if (!isPositive(action.amount)) {
        return reject('invalid_amount', `Fundraising amount must be positive, got ${action.amount}`);
      }
      return OK;

    case 'create_research_project': {
      if (action.topic.trim() === '') {
        return reject('invalid_topic', 'Research topic must not be empty');
      }
      if (options.allowedTopics && !options.allowedTopics.includes(action.topic)) {
        return reject('invalid_topic', `Topic "${action.topic}" is not available in this scenario`);
      }
      if (!Number.isInteger(action.estimatedDurationRounds) || action.estimatedDurationRounds <= 0) {
        return reject(
          'invalid_duration',
          `Duration must be a positive whole number of rounds, got ${action.estimatedDurationRounds}`,
        );
      }
      if (action.projectId !== undefined) {
        if (action.projectId.trim() === '') {
          return reject('invalid_topic', 'Project id must not be empty');
        }
        if (findProject(character, action.projectId) || book.claimedProjectIds.has(action.projectId)) {
          return reject('invalid_topic', `Project id ${action.projectId} is already in use`);
        }
      }
      const { committedCapital, committedTechnicalCapability, committedHuman } = action;
      if (!Number.isInteger(committedCapital) || committedCapital < 0) {
        return reject('invalid_amount', `Committed capital must be a non-negative whole number, got ${committedCapital}`);
      }
      if (!isNonNegative(committedTechnicalCapability) || !isNonNegative(committedHuman)) {
        return reject('invalid_amount', 'Committed technical capability and human must be non-negative');
      }
      const shortfalls: string[] = [];
      if (committedCapital > book.available.capital) {
        shortfalls.push(`capital ${committedCapital} > ${book.available.capital}`);
      }
      if (committedTechnicalCapability > book.available.technicalCapability) {
        shortfalls.push(
          `technical capability ${committedTechnicalCapability} > ${book.available.technicalCapability}`,
        );
      }
      if (committedHuman > book.available.human) {
        shortfalls.push(`human ${committedHuman} > ${book.available.human}`);
      }
      if (shortfalls.length > 0) {
        return reject('insufficient_resources', `Insufficient available resources: ${shortfalls.join(', ')}`);
      }
      return OK;
    }

    case 'cancel_research_project': {
      const project = findProject(character, action.projectId);
      if (!project) {
        return reject('unknown_project', `No project with id ${action.projectId}`);
      }
      if (project.status !== 'active' || book.cancelledProjects.has(project.id)) {
        return reject('unknown_project', `Project ${action.projectId} is not active`);
      }
      return OK;
    }

    case 'invest_capital':
      if (!isPositive(action.amount)) {
        return reject('invalid_amount', `Investment must be positive, got ${action.amount}`);
      }
      if (action.amount > book.budget) {
        return reject('insufficient_budget', `Investment ${action.amount} exceeds budget ${book.budget}`);
      }
      return OK;

    case 'divest_capital':
      if (!Number.isInteger(action.amount) || action.amount <= 0) {
        return reject('invalid_amount', `Divestment must be a positive whole number, got ${action.amount}`);
      }
      if (action.amount > book.available.capital) {
        return reject(
          'insufficient_resources',
          `Cannot divest ${action.amount}: only ${book.available.capital} capital is uncommitted`,
        );
      }
      return OK;

    case 'espionage':
      return checkTarget(state, actor, action.target);

    case 'poach_talent': {
      const target = checkTarget(state, actor, action.target);
      if (!target.ok) return target;
      return checkSpend(action.budget, book);
    }

    case 'lobby':
    case 'market':
      if (action.message.trim() === '') {
        return reject('empty_message', `A ${action.kind} campaign needs a message`);
      }
      return checkSpend(action.budget, book);

    case 'send_message': {
      const target = checkTarget(state, actor, action.to);
      if (!target.ok) return target;
      if (action.body.trim() === '') {
        return reject('empty_message', 'Message body must not be empty');
      }
      return OK;
    }

    case 'no_op':
      return OK;

    default:
      return assertNever(action);
  }
}

/** Records an accepted action against the ledger. */
export function recordInLedger(action: Action, ledger: ResourceLedger, character: Character): void {
  if (isPrimaryAction(action)) ledger.primaryCount += 1;

  switch (action.kind) {
    case 'create_research_project':
      ledger.available.capital -= action.committedCapital;
      ledger.available.technicalCapability -= action.committedTechnicalCapability;
      ledger.available.human -= action.committedHuman;
      // Auto ids are claimed too, so a later explicit id cannot collide with one
      ledger.claimedProjectIds.add(
        action.projectId ?? projectIdForTopic(character, action.topic, ledger.claimedProjectIds),
      );
      break;
    case 'cancel_research_project':
      ledger.cancelledProjects.add(action.projectId);
      break;
    case 'invest_capital':
      ledger.budget -= action.amount;
      break;
    case 'divest_capital':
      ledger.available.capital -= action.amount;
      break;
    case 'poach_talent':
    case 'lobby':
    case 'market':
      ledger.budget -= action.budget;
      break;
    case 'fundraise':
    case 'espionage':
    case 'send_message':
    case 'no_op':
      break;
    default:
      assertNever(action);
  }
}

// ---------------------------------------------------------------------------
// Whole submission
// ---------------------------------------------------------------------------

export interface RejectedAction {
  action: Action;
  code: RejectionCode;
  reason: string;
}

export interface SubmissionReview {
  accepted: Action[];
  rejected: RejectedAction[];
}

export function rejectionOutcome(rejection: RejectedAction): ActionOutcome {
  return {
    action: rejection.action,
    status: 'rejected',
    code: rejection.code,
    detail: rejection.reason,
  };
}

export function validateSubmission(
  state: GameState,
  actor: string,
  actions: readonly Action[],
  options: ValidationOptions = { config: DEFAULT_ENGINE_CONFIG },
): SubmissionReview {
  const review: SubmissionReview = { accepted: [], rejected: [] };
  const character = state.characters[actor];

  const ledger = character
    ? createLedger(character, resolutionDate(state, options.config.calendarStepDays))
    : undefined;

  for (const action of actions) {
    const result = validateAction(action, state, actor, options, ledger);
    if (result.ok) {
      if (ledger && character) recordInLedger(action, ledger, character);
      review.accepted.push(action);
    } else {
      review.rejected.push({ action, code: result.code, reason: result.reason });
    }
  }

  return review;
}

/** Throwing variant for adapters that must hand the engine only valid input. */
export function assertValidSubmission(
  state: GameState,
  actor: string,
  actions: readonly Action[],
  options?: ValidationOptions,
): void {
  const [first] = validateSubmission(state, actor, actions, options).rejected;
  if (first) {
    throw new ValidationError(first.code, first.reason, actor);
  }
}
