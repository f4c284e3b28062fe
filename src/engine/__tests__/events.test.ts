import { describe, it, expect } from 'vitest';
import type { EventSource, GameState } from '@/engine/types';
import { processRound } from '@/engine/round-resolver';
import { scheduledEventsFor } from '@/engine/events';
import { makeCharacter, makeGameState, quietConfig } from './fixtures';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function makeState(): GameState {
  return makeGameState([makeCharacter('A'), makeCharacter('B')]);
}

const source: EventSource = {
  randomEvents: ['A chip shortage hits the market'],
  fixedEvents: [
    { round: 1, description: 'Global AI safety summit opens' },
    { round: 2, description: 'New export rules take effect' },
  ],
};

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('scheduledEventsFor', () => {
  it('returns the descriptions scheduled for a round', () => {
    expect(scheduledEventsFor(source, 2)).toEqual(['New export rules take effect']);
    expect(scheduledEventsFor(source, 3)).toEqual([]);
  });
});

describe('event injection', () => {
  it('publishes scheduled events before any random one', () => {
    const { events, state } = processRound(makeState(), {}, 1, {
      config: quietConfig({ randomEventProbability: 1 }),
      events: source,
    });
    expect(events).toEqual([
      { round: 1, kind: 'scheduled', description: 'Global AI safety summit opens' },
      { round: 1, kind: 'random', description: 'A chip shortage hits the market' },
    ]);
    expect(state.publicEvents).toEqual(events);
  });

  it('skips random events at zero probability', () => {
    const { events } = processRound(makeState(), {}, 1, { config: quietConfig(), events: source });
    expect(events.map((e) => e.kind)).toEqual(['scheduled']);
  });

  it('publishes nothing without an event source', () => {
    const { events, logs } = processRound(makeState(), {}, 1, {
      config: quietConfig({ randomEventProbability: 1 }),
    });
    expect(events).toEqual([]);
    expect(logs.find((l) => l.phase === 'events')?.messages).toEqual(['No events']);
  });

  it('keeps earlier public events across rounds', () => {
    const first = processRound(makeState(), {}, 1, { config: quietConfig(), events: source });
    const second = processRound(first.state, {}, 2, { config: quietConfig(), events: source });
    expect(second.events).toEqual([{ round: 2, kind: 'scheduled', description: 'New export rules take effect' }]);
    expect(second.state.publicEvents.map((e) => e.description)).toEqual([
      'Global AI safety summit opens',
      'New export rules take effect',
    ]);
  });

  it('shows every character the same public events', () => {
    const { summaries } = processRound(makeState(), {}, 1, { config: quietConfig(), events: source });
    expect(summaries.A.publicEvents).toEqual(summaries.B.publicEvents);
    expect(summaries.A.digest).toContain('Public: Global AI safety summit opens');
  });
});
