// Scenario loader: validates and returns a typed Scenario.
// Uses Zod schema for full runtime validation.

import { readFile } from 'node:fs/promises';
import type { Scenario } from '@/scenarios/schema';
import { scenarioSchema } from '@/lib/scenario-schema';

export function loadScenario(raw: unknown): Scenario {
  if (raw === null || typeof raw !== 'object') {
    throw new Error('Scenario data must be a non-null object');
  }

  const result = scenarioSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.slice(0, 5)
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Scenario validation failed: ${issues}`);
  }

  return result.data;
}

export function loadScenarioFromJson(json: string): Scenario {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new Error(`Failed to parse scenario JSON: ${String(err)}`);
  }
  return loadScenario(parsed);
}

export async function loadScenarioFile(path: string): Promise<Scenario> {
  const json = await readFile(path, 'utf8');
  return loadScenarioFromJson(json);
}
