// All type definitions for the research strategy resolution engine.

// ---------------------------------------------------------------------------
// PRNG (interface only: implementation in prng.ts)
// ---------------------------------------------------------------------------

export interface PRNG {
  next(): number;
  nextInt(min: number, max: number): number;
  fork(): PRNG;
  readonly state: number;
}

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

export interface AssetBalance {
  /** 0–100 */
  technicalCapability: number;
  /** Whole currency units. */
  capital: number;
  /** Headcount. */
  human: number;
}

/** Budget keyed by period (the calendar year of the game date, e.g. "2025"). */
export type Budget = Record<string, number>;

// ---------------------------------------------------------------------------
// Research projects
// ---------------------------------------------------------------------------

export type ProjectStatus = 'active' | 'completed' | 'cancelled';

export interface ResearchProject {
  id: string;
  topic: string;
  committedCapital: number;
  committedTechnicalCapability: number;
  committedHuman: number;
  /** Portion of committedCapital already consumed by progress. */
  spentCapital: number;
  progress: number;
  estimatedDurationRounds: number;
  status: ProjectStatus;
  startedRound: number;
  completedRound: number | null;
  cancelledRound: number | null;
}

// ---------------------------------------------------------------------------
// Communication, intelligence, public record
// ---------------------------------------------------------------------------

export interface Message {
  from: string;
  to: string;
  round: number;
  body: string;
}

export type PublicEventKind = 'random' | 'scheduled' | 'leak' | 'announcement';

export interface PublicEvent {
  round: number;
  description: string;
  kind: PublicEventKind;
}

export type IntelligenceFacet = 'objectives' | 'strategy' | 'budget' | 'assets' | 'projects';

export interface IntelligenceFinding {
  facet: IntelligenceFacet;
  detail: string;
}

export interface IntelligenceReport {
  round: number;
  target: string;
  focusArea: string;
  findings: IntelligenceFinding[];
}

export interface PrivateAlert {
  round: number;
  text: string;
}

// ---------------------------------------------------------------------------
// Characters
// ---------------------------------------------------------------------------

export interface PrivateInfo {
  trueObjectives: string;
  trueStrategy: string;
  budget: Budget;
  assets: AssetBalance;
  /** Added to technical capability when defending against espionage. */
  counterIntelligence: number;
  activeProjects: ResearchProject[];
  messagesReceived: Message[];
  intelligence: IntelligenceReport[];
  alerts: PrivateAlert[];
}

export interface PublicView {
  statedObjectives: string;
  statedStrategy: string;
  /** Insertion-ordered, no duplicates. */
  publicArtifacts: string[];
  standing: number;
}

export interface Character {
  name: string;
  private: PrivateInfo;
  public: PublicView;
}

// ---------------------------------------------------------------------------
// Actions: discriminated union
// ---------------------------------------------------------------------------

export interface FundraiseAction {
  kind: 'fundraise';
  amount: number;
  description?: string;
}

export interface CreateResearchProjectAction {
  kind: 'create_research_project';
  projectId?: string;
  topic: string;
  committedCapital: number;
  committedTechnicalCapability: number;
  committedHuman: number;
  estimatedDurationRounds: number;
}

export interface CancelResearchProjectAction {
  kind: 'cancel_research_project';
  projectId: string;
}

export interface InvestCapitalAction {
  kind: 'invest_capital';
  amount: number;
}

export interface DivestCapitalAction {
  kind: 'divest_capital';
  amount: number;
}

export interface EspionageAction {
  kind: 'espionage';
  target: string;
  focusArea: string;
}

export interface PoachTalentAction {
  kind: 'poach_talent';
  target: string;
  budget: number;
}

export interface LobbyAction {
  kind: 'lobby';
  message: string;
  budget: number;
}

export interface MarketAction {
  kind: 'market';
  message: string;
  budget: number;
}

export interface SendMessageAction {
  kind: 'send_message';
  to: string;
  body: string;
}

export interface NoOpAction {
  kind: 'no_op';
}

export type PrimaryAction =
  | FundraiseAction
  | CreateResearchProjectAction
  | CancelResearchProjectAction
  | InvestCapitalAction
  | DivestCapitalAction
  | EspionageAction
  | PoachTalentAction
  | LobbyAction
  | MarketAction;

export type Action = PrimaryAction | SendMessageAction | NoOpAction;

export type ActionKind = Action['kind'];

// ---------------------------------------------------------------------------
// Validation and outcomes
// ---------------------------------------------------------------------------

export type RejectionCode =
  | 'insufficient_resources'
  | 'insufficient_budget'
  | 'unknown_character'
  | 'unknown_target'
  | 'unknown_project'
  | 'invalid_topic'
  | 'invalid_duration'
  | 'invalid_amount'
  | 'self_target'
  | 'too_many_actions'
  | 'empty_message';

export type ValidationResult =
  | { ok: true }
  | { ok: false; code: RejectionCode; reason: string };

export type OutcomeStatus = 'success' | 'failure' | 'rejected';

export type OutcomeCode = RejectionCode | 'resource_depleted' | 'attempt_failed' | 'backfired';

export interface ActionOutcome {
  action: Action;
  status: OutcomeStatus;
  code: OutcomeCode | null;
  detail: string;
}

// ---------------------------------------------------------------------------
// Game state
// ---------------------------------------------------------------------------

export interface RoundRecord {
  round: number;
  date: string;
  outcomes: Record<string, ActionOutcome[]>;
  events: PublicEvent[];
  /** Hash of the resolved state before this record was appended. */
  stateHash: string;
}

export interface GameState {
  currentRound: number;
  /** ISO calendar date, YYYY-MM-DD. */
  currentDate: string;
  /** Character names in registration order; drives resolution order. */
  roster: string[];
  characters: Record<string, Character>;
  publicEvents: PublicEvent[];
  history: RoundRecord[];
}

export interface ScheduledEvent {
  round: number;
  description: string;
}

/** Exogenous event material supplied by the scenario. */
export interface EventSource {
  randomEvents: string[];
  fixedEvents: ScheduledEvent[];
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

export interface ProjectUpdate {
  id: string;
  topic: string;
  status: ProjectStatus;
  previousProgress: number;
  progress: number;
}

export interface ResourceSnapshot {
  assets: AssetBalance;
  available: AssetBalance;
  budget: number;
}

export interface Summary {
  character: string;
  round: number;
  date: string;
  outcomes: ActionOutcome[];
  messagesReceived: Message[];
  intelligence: IntelligenceReport[];
  alerts: PrivateAlert[];
  projects: ProjectUpdate[];
  publicEvents: PublicEvent[];
  /** Public views of every other character. */
  publicViews: Record<string, PublicView>;
  resources: ResourceSnapshot;
  digest: string[];
}

// ---------------------------------------------------------------------------
// Resolution logging
// ---------------------------------------------------------------------------

export type ResolutionPhase =
  | 'collection'
  | 'validation'
  | 'time'
  | 'messages'
  | 'actions'
  | 'research'
  | 'espionage'
  | 'leaks'
  | 'events'
  | 'summary';

export interface ResolutionLog {
  phase: ResolutionPhase;
  messages: string[];
}
