// Research projects: creation, cancellation and per-round progress.
//
// Commitments reserve resources rather than moving them. Capital is consumed
// as progress accrues (spentCapital tracks committedCapital × progress);
// technical capability and staff are held until the project ends. Cancelling
// recovers refundFraction of each; the rest is written off.

import type {
  CancelResearchProjectAction,
  CreateResearchProjectAction,
  ResearchProject,
  ResolutionLog,
} from '@/engine/types';
import type { EngineConfig } from '@/engine/config';
import {
  availableAssets,
  createResearchProject,
  findProject,
  projectIdForTopic,
} from '@/engine/entities';
import type { RoundWorkspace } from '@/engine/workspace';
import { getCharacter, recordOutcome } from '@/engine/workspace';

const COMPLETION_EPSILON = 1e-9;

export function applyCreateProject(
  ws: RoundWorkspace,
  actor: string,
  action: CreateResearchProjectAction,
): string {
  const character = getCharacter(ws, actor);
  const available = availableAssets(character);

  // Poaching earlier this round may have shrunk the free headcount
  if (
    action.committedCapital > available.capital ||
    action.committedTechnicalCapability > available.technicalCapability ||
    action.committedHuman > available.human
  ) {
    recordOutcome(ws, actor, {
      action,
      status: 'failure',
      code: 'resource_depleted',
      detail: `Could not start "${action.topic}": resources were depleted earlier this round`,
    });
    return `${actor}: project "${action.topic}" not started (resources depleted)`;
  }

  const project = createResearchProject({
    id: action.projectId ?? projectIdForTopic(character, action.topic),
    topic: action.topic,
    committedCapital: action.committedCapital,
    committedTechnicalCapability: action.committedTechnicalCapability,
    committedHuman: action.committedHuman,
    estimatedDurationRounds: action.estimatedDurationRounds,
    startedRound: ws.state.currentRound,
  });
  character.private.activeProjects.push(project);

  recordOutcome(ws, actor, {
    action,
    status: 'success',
    code: null,
    detail: `Started research project "${project.topic}" (${project.id}) committing ${project.committedCapital} capital`,
  });
  return `${actor} started ${project.id}`;
}

/** Capital returned to the owner when a project is cancelled now. */
export function cancellationRefund(project: ResearchProject, refundFraction: number): number {
  const unspent = project.committedCapital - project.spentCapital;
  return Math.floor(unspent * refundFraction);
}

export function applyCancelProject(
  ws: RoundWorkspace,
  actor: string,
  action: CancelResearchProjectAction,
): string {
  const character = getCharacter(ws, actor);
  const project = findProject(character, action.projectId);
  if (!project || project.status !== 'active') {
    // Validation guarantees an active project; reaching here is a bug
    throw new Error(`${actor}: cancel of non-active project ${action.projectId}`);
  }

  const { refundFraction } = ws.config;
  const unspent = project.committedCapital - project.spentCapital;
  const refund = cancellationRefund(project, refundFraction);
  const writeOff = unspent - refund;
  const techRefund = Math.floor(project.committedTechnicalCapability * refundFraction);
  const humanRefund = Math.floor(project.committedHuman * refundFraction);

  character.private.assets.capital -= writeOff;
  character.private.assets.technicalCapability -= project.committedTechnicalCapability - techRefund;
  character.private.assets.human -= project.committedHuman - humanRefund;
  project.status = 'cancelled';
  project.cancelledRound = ws.state.currentRound;

  recordOutcome(ws, actor, {
    action,
    status: 'success',
    code: null,
    detail:
      `Cancelled ${project.id}: recovered ${refund} of ${unspent} unspent capital, ` +
      `${techRefund} of ${project.committedTechnicalCapability} technical capability ` +
      `and ${humanRefund} of ${project.committedHuman} staff`,
  });
  return `${actor} cancelled ${project.id} (refund ${refund}, written off ${writeOff})`;
}

/** Progress a project gains in one round. Staffing shortens the schedule up to a cap. */
export function progressPerRound(project: ResearchProject, config: EngineConfig): number {
  const staffing = Math.min(
    project.committedHuman / config.researchHumanScaling,
    config.researchMaxStaffingBoost,
  );
  return (1 / project.estimatedDurationRounds) * (1 + staffing);
}

export function advanceResearch(ws: RoundWorkspace): ResolutionLog {
  const messages: string[] = [];
  const round = ws.state.currentRound;

  for (const name of ws.state.roster) {
    const character = getCharacter(ws, name);
    for (const project of character.private.activeProjects) {
      if (project.status !== 'active' || project.startedRound >= round) continue;

      let progress = Math.min(1, project.progress + progressPerRound(project, ws.config));
      if (progress >= 1 - COMPLETION_EPSILON) progress = 1;

      const spentTarget = Math.round(project.committedCapital * progress);
      const spend = spentTarget - project.spentCapital;
      character.private.assets.capital -= spend;
      project.spentCapital = spentTarget;
      project.progress = progress;

      if (progress === 1) {
        project.status = 'completed';
        project.completedRound = round;
        messages.push(`${name}/${project.id} completed`);
      } else {
        messages.push(`${name}/${project.id} at ${Math.round(progress * 100)}% (spent ${spend})`);
      }
    }
  }

  return { phase: 'research', messages: messages.length > 0 ? messages : ['No active research'] };
}
