// Built-in scenario registry.

import type { Scenario } from '@/scenarios/schema';
import { loadScenario } from '@/lib/scenario-loader';
import frontierLabs from '@/scenarios/frontier-labs/scenario.json';

const BUILT_IN: Record<string, unknown> = {
  'frontier-labs': frontierLabs,
};

export function builtInScenarioIds(): string[] {
  return Object.keys(BUILT_IN);
}

export function getBuiltInScenario(id: string): Scenario | null {
  const raw = BUILT_IN[id];
  return raw === undefined ? null : loadScenario(raw);
}
