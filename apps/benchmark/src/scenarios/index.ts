import type { Scenario } from '../types.js';
import { cpuPerformance } from './cpu.js';
import { createMemoryScenario } from './memory.js';

export type ScenarioKind = 'cpu' | 'memory';

export function getScenarios(kinds: ScenarioKind[], vcpuCounts: number[]): Scenario[] {
  const scenarios: Scenario[] = [];

  if (kinds.includes('cpu')) {
    scenarios.push(cpuPerformance);
  }

  if (kinds.includes('memory')) {
    scenarios.push(...vcpuCounts.map(createMemoryScenario));
  }

  return scenarios;
}

export * from './cpu.js';
export * from './memory.js';
