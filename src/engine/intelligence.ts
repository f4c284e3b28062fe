// Espionage resolution and information leaks.
//
// Espionage findings are written only to the attacker's PrivateInfo. The
// attacker's identity reaches the target solely under the 'attributed'
// disclosure policy and never reaches the public record.

import type {
  Character,
  EspionageAction,
  IntelligenceFacet,
  IntelligenceFinding,
  PRNG,
  ResolutionLog,
} from '@/engine/types';
import type { EngineConfig } from '@/engine/config';
import { chance, sample } from '@/engine/prng';
import { activeProjects, currentBudget, currentPeriod } from '@/engine/entities';
import type { RoundWorkspace } from '@/engine/workspace';
import {
  addArtifact,
  alert,
  budgetFor,
  emitEvent,
  getCharacter,
  recordOutcome,
} from '@/engine/workspace';

export const INTELLIGENCE_FACETS: readonly IntelligenceFacet[] = [
  'objectives',
  'strategy',
  'budget',
  'assets',
  'projects',
];

// ---------------------------------------------------------------------------
// Espionage
// ---------------------------------------------------------------------------

export function queueEspionage(ws: RoundWorkspace, actor: string, action: EspionageAction): string {
  ws.espionageQueue.push({ actor, action });
  return `${actor} espionage on ${action.target} queued`;
}

/** Logistic on the capability differential, clamped to the configured band. */
export function espionageSuccessProbability(
  attacker: Character,
  target: Character,
  config: EngineConfig,
): number {
  const defence = target.private.assets.technicalCapability + target.private.counterIntelligence;
  const differential = attacker.private.assets.technicalCapability - defence;
  const logistic = 1 / (1 + Math.exp(-differential / config.espionageScale));
  return Math.min(Math.max(logistic, config.espionageMinRate), config.espionageMaxRate);
}

/** The facet named by the focus area comes first; the rest are drawn at random. */
export function chooseFacets(focusArea: string, count: number, prng: PRNG): IntelligenceFacet[] {
  const focus = focusArea.toLowerCase();
  const focused = INTELLIGENCE_FACETS.find((f) => focus.includes(f));
  if (!focused) return sample(INTELLIGENCE_FACETS, count, prng);
  const rest = INTELLIGENCE_FACETS.filter((f) => f !== focused);
  return [focused, ...sample(rest, count - 1, prng)];
}

export function describeFacet(target: Character, facet: IntelligenceFacet, date: string): string {
  const { private: info } = target;
  switch (facet) {
    case 'objectives':
      return `True objectives: ${info.trueObjectives}`;
    case 'strategy':
      return `True strategy: ${info.trueStrategy}`;
    case 'budget':
      return `Budget for ${currentPeriod(date)}: ${currentBudget(target, date)}`;
    case 'assets':
      return `Assets: capital ${info.assets.capital}, technical capability ${info.assets.technicalCapability}, human ${info.assets.human}`;
    case 'projects': {
      const projects = activeProjects(target);
      if (projects.length === 0) return 'No active research projects';
      const listed = projects.map((p) => `${p.topic} (${Math.round(p.progress * 100)}%)`);
      return `Active research: ${listed.join(', ')}`;
    }
  }
}

export function resolveEspionage(ws: RoundWorkspace, prng: PRNG): ResolutionLog {
  const messages: string[] = [];
  const { config } = ws;
  const round = ws.state.currentRound;

  for (const { actor, action } of ws.espionageQueue) {
    const attacker = getCharacter(ws, actor);
    const target = getCharacter(ws, action.target);
    const p = espionageSuccessProbability(attacker, target, config);

    if (chance(p, prng)) {
      const facets = chooseFacets(action.focusArea, config.espionageRevealCount, prng);
      const findings: IntelligenceFinding[] = facets.map((facet) => ({
        facet,
        detail: describeFacet(target, facet, ws.state.currentDate),
      }));
      attacker.private.intelligence.push({
        round,
        target: target.name,
        focusArea: action.focusArea,
        findings,
      });
      ws.breaches[target.name] = (ws.breaches[target.name] ?? 0) + 1;
      recordOutcome(ws, actor, {
        action,
        status: 'success',
        code: null,
        detail: `espionage against ${target.name} succeeded (${facets.join(', ')})`,
      });
      messages.push(`${actor} → ${target.name}: success (p=${p.toFixed(2)})`);
      continue;
    }

    recordOutcome(ws, actor, {
      action,
      status: 'failure',
      code: 'attempt_failed',
      detail: `espionage failed against ${target.name}`,
    });

    switch (config.espionageDisclosure) {
      case 'none':
        break;
      case 'anonymous':
        alert(ws, target.name, 'An espionage attempt against you was detected.');
        break;
      case 'attributed':
        alert(ws, target.name, `${actor} attempted espionage against you.`);
        break;
    }
    messages.push(`${actor} → ${target.name}: failed (p=${p.toFixed(2)})`);
  }

  return {
    phase: 'espionage',
    messages: messages.length > 0 ? messages : ['No espionage this round'],
  };
}

// ---------------------------------------------------------------------------
// Leaks
// ---------------------------------------------------------------------------

export function firstSentence(text: string): string {
  const trimmed = text.trim();
  const match = /^[^.!?]*[.!?]/.exec(trimmed);
  return (match ? match[0] : trimmed).trim();
}

export function leakProbability(ws: RoundWorkspace, name: string): number {
  const breaches = ws.breaches[name] ?? 0;
  return Math.min(1, ws.config.leakProbability + ws.config.leakBoostPerBreach * breaches);
}

export function propagateLeaks(ws: RoundWorkspace, prng: PRNG): ResolutionLog {
  const messages: string[] = [];

  for (const name of ws.state.roster) {
    if (!chance(leakProbability(ws, name), prng)) continue;

    const character = getCharacter(ws, name);
    const objective = firstSentence(character.private.trueObjectives);

    if (ws.config.leaksNudgePublicView && objective !== '' && chance(0.5, prng)) {
      addArtifact(character, `Reported objective: ${objective}`);
      emitEvent(ws, `Press reports suggest ${name} is privately pursuing: ${objective}`, 'leak');
      messages.push(`${name}: objective leaked`);
      continue;
    }

    const budget = budgetFor(ws, character);
    emitEvent(
      ws,
      `Leaked intelligence reports suggest ${name} has approximately $${budget} in budget and ${character.private.assets.human} human resources.`,
      'leak',
    );
    messages.push(`${name}: resources leaked`);
  }

  return { phase: 'leaks', messages: messages.length > 0 ? messages : ['No leaks'] };
}
