import { describe, it, expect } from 'vitest';
import { loadScenario, loadScenarioFromJson } from '@/lib/scenario-loader';
import { builtInScenarioIds, getBuiltInScenario } from '@/scenarios';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function makeRawScenario(): Record<string, unknown> {
  return {
    id: 'duel',
    name: 'Duel',
    startDate: '2030-01-01',
    characters: [
      {
        name: 'A',
        private: {
          trueObjectives: 'Win.',
          trueStrategy: 'Spend.',
          budget: { '2030': 1000 },
          assets: { technicalCapability: 40, capital: 500, human: 10 },
        },
        public: { statedObjectives: 'Help.', statedStrategy: 'Share.' },
      },
      {
        name: 'B',
        private: {
          trueObjectives: 'Survive.',
          trueStrategy: 'Save.',
          budget: { '2030': 1000 },
          assets: { technicalCapability: 30, capital: 500, human: 10 },
        },
        public: { statedObjectives: 'Help.', statedStrategy: 'Share.' },
      },
    ],
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('loadScenario', () => {
  it('fills defaults for optional fields', () => {
    const scenario = loadScenario(makeRawScenario());
    expect(scenario.description).toBe('');
    expect(scenario.researchTopics).toEqual([]);
    expect(scenario.restrictTopics).toBe(false);
    expect(scenario.randomEvents).toEqual([]);
    expect(scenario.fixedEvents).toEqual([]);
    expect(scenario.engine).toEqual({});
    expect(scenario.characters[0].private.counterIntelligence).toBe(0);
    expect(scenario.characters[0].private.projects).toEqual([]);
    expect(scenario.characters[0].public.standing).toBe(0);
  });

  it('rejects non-objects', () => {
    expect(() => loadScenario(null)).toThrow('Scenario data must be a non-null object');
    expect(() => loadScenario('frontier')).toThrow('Scenario data must be a non-null object');
  });

  it('rejects malformed dates', () => {
    const raw = { ...makeRawScenario(), startDate: '1 Jan 2030' };
    expect(() => loadScenario(raw)).toThrow('Scenario validation failed: startDate: expected YYYY-MM-DD');
  });

  it('rejects duplicate character names', () => {
    const raw = makeRawScenario();
    const characters = raw.characters;
    if (!Array.isArray(characters)) throw new Error('fixture has no characters');
    raw.characters = [characters[0], characters[0]];
    expect(() => loadScenario(raw)).toThrow(
      'Scenario validation failed: characters.1.name: duplicate character name A',
    );
  });

  it('requires topics when topics are restricted', () => {
    const raw = { ...makeRawScenario(), restrictTopics: true };
    expect(() => loadScenario(raw)).toThrow(
      'Scenario validation failed: researchTopics: restrictTopics requires at least one research topic',
    );
  });

  it('validates engine overrides', () => {
    const raw = { ...makeRawScenario(), engine: { refundFraction: 2 } };
    expect(() => loadScenario(raw)).toThrow(/^Scenario validation failed: engine\.refundFraction:/);
  });
});

describe('loadScenarioFromJson', () => {
  it('parses and validates', () => {
    expect(loadScenarioFromJson(JSON.stringify(makeRawScenario())).id).toBe('duel');
  });

  it('reports invalid JSON', () => {
    expect(() => loadScenarioFromJson('{ nope')).toThrow(/^Failed to parse scenario JSON: SyntaxError/);
  });
});

describe('built-in scenarios', () => {
  it('lists frontier-labs', () => {
    expect(builtInScenarioIds()).toEqual(['frontier-labs']);
  });

  it('loads frontier-labs', () => {
    const scenario = getBuiltInScenario('frontier-labs');
    expect(scenario?.name).toBe('Frontier Labs');
    expect(scenario?.startDate).toBe('2027-01-01');
    expect(scenario?.characters.map((c) => c.name)).toEqual([
      'Meridian Labs',
      'Northwind Research',
      'Office of Technology Oversight',
    ]);
    expect(scenario?.researchTopics).toHaveLength(5);
  });

  it('returns null for unknown ids', () => {
    expect(getBuiltInScenario('nope')).toBeNull();
  });
});
