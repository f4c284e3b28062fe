import { describe, it, expect } from 'vitest';
import {
  advanceDate,
  availableAssets,
  committedAssets,
  createCharacter,
  createResearchProject,
  currentBudget,
  currentPeriod,
  findInvariantViolations,
  findTransitionViolations,
  projectIdForTopic,
  resolutionDate,
} from '@/engine/entities';
import { ValidationError } from '@/engine/errors';
import { makeCharacter, makeGameState, makeProject } from './fixtures';

// ---------------------------------------------------------------------------
// Calendar
// ---------------------------------------------------------------------------

describe('calendar', () => {
  it('advances by whole days in UTC', () => {
    expect(advanceDate('2030-01-01', 90)).toBe('2030-04-01');
    expect(advanceDate('2030-04-01', 90)).toBe('2030-06-30');
    expect(advanceDate('2030-12-27', 90)).toBe('2031-03-27');
  });

  it('rejects malformed dates', () => {
    expect(() => advanceDate('not-a-date', 90)).toThrow('Invalid game date: not-a-date');
  });

  it('uses the calendar year as the budget period', () => {
    expect(currentPeriod('2031-03-27')).toBe('2031');
  });

  it('resolutionDate is the date of the next round', () => {
    const state = makeGameState([makeCharacter('A')]);
    expect(resolutionDate(state, 90)).toBe('2030-04-01');
  });
});

// ---------------------------------------------------------------------------
// Resource accounting
// ---------------------------------------------------------------------------

describe('availableAssets', () => {
  it('subtracts outstanding capital and held staff of active projects', () => {
    const c = makeCharacter('A', {
      assets: { technicalCapability: 50, capital: 1000, human: 20 },
      activeProjects: [
        makeProject({
          committedCapital: 800,
          committedTechnicalCapability: 10,
          committedHuman: 5,
          estimatedDurationRounds: 5,
          progress: 0.4,
        }),
      ],
    });
    expect(committedAssets(c)).toEqual({ capital: 480, technicalCapability: 10, human: 5 });
    expect(availableAssets(c)).toEqual({ capital: 520, technicalCapability: 40, human: 15 });
  });

  it('ignores finished projects', () => {
    const c = makeCharacter('A', { activeProjects: [makeProject()] });
    c.private.activeProjects[0].status = 'cancelled';
    expect(availableAssets(c)).toEqual({ capital: 1000, technicalCapability: 50, human: 20 });
  });

  it('reads the budget for the period of a date, defaulting to 0', () => {
    const c = makeCharacter('A', { budget: { '2030': 500 } });
    expect(currentBudget(c, '2030-06-30')).toBe(500);
    expect(currentBudget(c, '2031-01-01')).toBe(0);
  });
});

describe('projectIdForTopic', () => {
  it('slugs the topic', () => {
    expect(projectIdForTopic(makeCharacter('A'), 'Fusion Control: Phase II')).toBe('fusion-control-phase-ii');
  });

  it('disambiguates ids already in use', () => {
    const c = makeCharacter('A', {
      activeProjects: [
        makeProject({ id: 'fusion-control', committedCapital: 100 }),
        makeProject({ id: 'fusion-control-2', committedCapital: 100 }),
      ],
    });
    expect(projectIdForTopic(c, 'Fusion control')).toBe('fusion-control-3');
  });

  it('skips ids claimed but not yet created', () => {
    const claimed = new Set(['fusion-control']);
    expect(projectIdForTopic(makeCharacter('A'), 'Fusion control', claimed)).toBe('fusion-control-2');
  });
});

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

describe('createResearchProject', () => {
  it('derives spent capital from initial progress', () => {
    const p = makeProject({ committedCapital: 800, progress: 0.4 });
    expect(p.spentCapital).toBe(320);
    expect(p.status).toBe('active');
    expect(p.completedRound).toBeNull();
  });

  it.each([0, -1, 1.5])('rejects a duration of %s', (duration) => {
    expect(() => makeProject({ estimatedDurationRounds: duration })).toThrow(ValidationError);
  });

  it('rejects an empty topic with invalid_topic', () => {
    try {
      createResearchProject({
        id: 'x',
        topic: '   ',
        committedCapital: 0,
        committedTechnicalCapability: 0,
        committedHuman: 0,
        estimatedDurationRounds: 1,
        startedRound: 0,
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) expect(err.code).toBe('invalid_topic');
    }
  });
});

describe('createCharacter', () => {
  it('fills defaults', () => {
    const c = makeCharacter('A');
    expect(c.private.counterIntelligence).toBe(0);
    expect(c.private.messagesReceived).toEqual([]);
    expect(c.public.standing).toBe(0);
    expect(c.public.publicArtifacts).toEqual([]);
  });

  it('rejects commitments beyond declared assets', () => {
    expect(() =>
      makeCharacter('A', {
        assets: { technicalCapability: 50, capital: 100, human: 20 },
        activeProjects: [makeProject({ committedCapital: 500 })],
      }),
    ).toThrow('A: project commitments exceed declared assets');
  });

  it('rejects technical capability above 100', () => {
    expect(() => makeCharacter('A', { assets: { technicalCapability: 101, capital: 0, human: 0 } })).toThrow(
      'A: technical capability cannot exceed 100',
    );
  });

  it('rejects duplicate project ids', () => {
    expect(() =>
      makeCharacter('A', {
        activeProjects: [makeProject({ committedCapital: 10 }), makeProject({ committedCapital: 10 })],
      }),
    ).toThrow('A: duplicate project id p1');
  });

  it('de-duplicates public artifacts', () => {
    const c = makeCharacter('A', {}, { publicArtifacts: ['Paper', 'Paper', 'Demo'] });
    expect(c.public.publicArtifacts).toEqual(['Paper', 'Demo']);
  });
});

// ---------------------------------------------------------------------------
// Invariants
// ---------------------------------------------------------------------------

describe('findInvariantViolations', () => {
  it('accepts a consistent state', () => {
    const state = makeGameState([makeCharacter('A'), makeCharacter('B')]);
    expect(findInvariantViolations(state)).toEqual([]);
  });

  it('reports negative available capital', () => {
    const a = makeCharacter('A');
    a.private.activeProjects.push(makeProject({ committedCapital: 1500 }));
    const state = makeGameState([a]);
    expect(findInvariantViolations(state)).toEqual(['A: negative available capital (-500)']);
  });

  it('reports a roster that does not match the characters', () => {
    const state = makeGameState([makeCharacter('A')], { roster: ['A', 'B'] });
    expect(findInvariantViolations(state)).toContain('roster does not match characters');
  });
});

describe('findTransitionViolations', () => {
  it('requires the round to advance by exactly one', () => {
    const before = makeGameState([makeCharacter('A')]);
    const after = makeGameState([makeCharacter('A')], { currentRound: 2 });
    expect(findTransitionViolations(before, after)).toEqual(['round advanced from 0 to 2']);
  });

  it('flags a project that leaves a terminal status', () => {
    const prev = makeCharacter('A', { activeProjects: [makeProject()] });
    prev.private.activeProjects[0].status = 'cancelled';
    const next = makeCharacter('A', { activeProjects: [makeProject()] });
    const before = makeGameState([prev]);
    const after = makeGameState([next], { currentRound: 1 });
    expect(findTransitionViolations(before, after)).toEqual(['A/p1 left terminal status cancelled']);
  });

  it('flags decreasing progress', () => {
    const before = makeGameState([makeCharacter('A', { activeProjects: [makeProject({ progress: 0.5 })] })]);
    const after = makeGameState([makeCharacter('A', { activeProjects: [makeProject({ progress: 0.25 })] })], {
      currentRound: 1,
    });
    expect(findTransitionViolations(before, after)).toEqual(['A/p1 progress decreased']);
  });
});
