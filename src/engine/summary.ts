// Per-character round summaries. Each summary is built only from what that
// character is entitled to see: its own PrivateInfo, the public record and
// everyone else's PublicView.

import type {
  ActionOutcome,
  GameState,
  ProjectUpdate,
  PublicView,
  ResolutionLog,
  Summary,
} from '@/engine/types';
import { availableAssets, currentBudget, findProject } from '@/engine/entities';
import type { RoundWorkspace } from '@/engine/workspace';
import { getCharacter } from '@/engine/workspace';

const OUTCOME_PREFIX: Record<ActionOutcome['status'], string> = {
  success: 'Success',
  failure: 'Fail',
  rejected: 'Rejected',
};

function percent(progress: number): number {
  return Math.round(progress * 100);
}

function buildSummary(before: GameState, ws: RoundWorkspace, name: string): Summary {
  const { state } = ws;
  const round = state.currentRound;
  const character = getCharacter(ws, name);
  const previous = before.characters[name];

  const outcomes = ws.outcomes[name] ?? [];
  const messagesReceived = character.private.messagesReceived.filter((m) => m.round === round);
  const intelligence = character.private.intelligence.filter((r) => r.round === round);
  const alerts = character.private.alerts.filter((a) => a.round === round);

  const projects: ProjectUpdate[] = character.private.activeProjects
    .filter((p) => p.status === 'active' || p.completedRound === round || p.cancelledRound === round)
    .map((p) => ({
      id: p.id,
      topic: p.topic,
      status: p.status,
      previousProgress: findProject(previous, p.id)?.progress ?? 0,
      progress: p.progress,
    }));

  const publicViews: Record<string, PublicView> = {};
  for (const other of state.roster) {
    if (other !== name) publicViews[other] = getCharacter(ws, other).public;
  }

  const budget = currentBudget(character, state.currentDate);

  // Digest
  const digest: string[] = [`Round ${round} (${state.currentDate})`];
  for (const outcome of outcomes) {
    digest.push(`${OUTCOME_PREFIX[outcome.status]}: ${outcome.detail}`);
  }
  for (const message of messagesReceived) {
    digest.push(`Message from ${message.from}: ${message.body}`);
  }
  for (const report of intelligence) {
    for (const finding of report.findings) {
      digest.push(`Intelligence on ${report.target}: ${finding.detail}`);
    }
  }
  for (const a of alerts) digest.push(`Alert: ${a.text}`);
  for (const p of projects) {
    digest.push(`Project ${p.topic}: ${percent(p.previousProgress)}% → ${percent(p.progress)}% (${p.status})`);
  }
  for (const event of ws.events) digest.push(`Public: ${event.description}`);
  digest.push(`Budget ${budget}; capital ${character.private.assets.capital}`);

  return {
    character: name,
    round,
    date: state.currentDate,
    outcomes,
    messagesReceived,
    intelligence,
    alerts,
    projects,
    publicEvents: [...ws.events],
    publicViews,
    resources: {
      assets: { ...character.private.assets },
      available: availableAssets(character),
      budget,
    },
    digest,
  };
}

export function generateSummaries(
  before: GameState,
  ws: RoundWorkspace,
): { summaries: Record<string, Summary>; log: ResolutionLog } {
  const summaries: Record<string, Summary> = {};
  for (const name of ws.state.roster) {
    summaries[name] = structuredClone(buildSummary(before, ws, name));
  }
  return {
    summaries,
    log: { phase: 'summary', messages: [`Summaries generated for ${ws.state.roster.length} character(s)`] },
  };
}
