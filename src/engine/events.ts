// Exogenous events: scheduled scenario events plus a seeded chance of one
// random shock per round. Event text is opaque scenario data.

import type { EventSource, PRNG, ResolutionLog } from '@/engine/types';
import { chance, pick } from '@/engine/prng';
import type { RoundWorkspace } from '@/engine/workspace';
import { emitEvent } from '@/engine/workspace';

export const NO_EVENTS: EventSource = { randomEvents: [], fixedEvents: [] };

export function scheduledEventsFor(source: EventSource, round: number): string[] {
  return source.fixedEvents.filter((e) => e.round === round).map((e) => e.description);
}

export function injectEvents(ws: RoundWorkspace, source: EventSource, prng: PRNG): ResolutionLog {
  const messages: string[] = [];
  const round = ws.state.currentRound;

  for (const description of scheduledEventsFor(source, round)) {
    emitEvent(ws, description, 'scheduled');
    messages.push(`Scheduled: ${description}`);
  }

  if (source.randomEvents.length > 0 && chance(ws.config.randomEventProbability, prng)) {
    const description = pick(source.randomEvents, prng);
    emitEvent(ws, description, 'random');
    messages.push(`Random: ${description}`);
  }

  return { phase: 'events', messages: messages.length > 0 ? messages : ['No events'] };
}
