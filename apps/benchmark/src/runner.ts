import { writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import {
  BenchmarkRunner,
  formatFailure,
  formatMs,
  isHarnessError,
  verdictLabel,
  type IExecutionTarget,
} from '@vmbench/core';
import { redactConfig } from './config.js';
import type { HarnessConfig, Scenario, ScenarioContext, ScenarioFailure, ScenarioResult } from './types.js';

/**
 * Runs scenarios one after another against a host and a guest target.
 * A failing scenario is recorded with its stage and output, then the next one runs.
 */
export class ScenarioRunner {
  private readonly config: HarnessConfig;
  private readonly host: IExecutionTarget;
  private readonly guest: IExecutionTarget;
  private readonly runner = new BenchmarkRunner();
  private results: ScenarioResult[] = [];

  constructor(config: HarnessConfig, host: IExecutionTarget, guest: IExecutionTarget) {
    this.config = config;
    this.host = host;
    this.guest = guest;
  }

  async run(scenarios: Scenario[]): Promise<ScenarioResult[]> {
    this.results = [];

    for (const scenario of scenarios) {
      const result = await this.runScenario(scenario);
      this.results.push(result);
    }

    return this.results;
  }

  get passed(): boolean {
    return this.results.length > 0 && this.results.every(r => r.passed);
  }

  private async runScenario(scenario: Scenario): Promise<ScenarioResult> {
    console.log(`Running: ${scenario.name}`);
    if (this.config.verbose) {
      console.log(`  ${scenario.description}`);
    }

    const ctx: ScenarioContext = {
      host: this.host,
      guest: this.guest,
      runner: this.runner,
      config: this.config,
    };

    const startTime = performance.now();
    let result: Pick<ScenarioResult, 'passed' | 'comparisons' | 'failure'>;

    try {
      const comparisons = await scenario.run(ctx);
      result = {
        passed: comparisons.length > 0 && comparisons.every(c => c.passed),
        comparisons,
      };
    } catch (err) {
      const failure = describeFailure(err);
      console.error(`  ${scenario.name} failed\n${failure.detail}`);
      result = { passed: false, comparisons: [], failure };
    }

    const durationMs = performance.now() - startTime;
    console.log(`  ${verdictLabel(result.passed)} in ${formatMs(durationMs)}\n`);

    return {
      scenario: scenario.name,
      ...result,
      durationMs,
      timestamp: new Date().toISOString(),
      metadata: {
        nodeVersion: process.version,
        platform: process.platform,
        arch: process.arch,
      },
    };
  }

  async saveResults(): Promise<string> {
    await mkdir(this.config.outputDir, { recursive: true });

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const filename = `benchmark-${timestamp}.json`;
    const filepath = join(this.config.outputDir, filename);

    const output = {
      config: redactConfig(this.config),
      results: this.results,
      summary: this.generateSummary(),
    };

    await writeFile(filepath, JSON.stringify(output, null, 2));
    console.log(`\nResults saved to: ${filepath}`);

    return filepath;
  }

  generateSummary(): Record<string, Record<string, { ratio: number; passed: boolean }>> {
    const summary: Record<string, Record<string, { ratio: number; passed: boolean }>> = {};

    for (const result of this.results) {
      const scenarioSummary = summary[result.scenario] ?? {};
      for (const comparison of result.comparisons) {
        for (const metric of comparison.metrics) {
          scenarioSummary[metric.name] = { ratio: metric.ratio, passed: metric.passed };
        }
      }
      summary[result.scenario] = scenarioSummary;
    }

    return summary;
  }

  printSummaryTable(): void {
    console.log('\n=== Summary ===\n');

    const columns = ['Scenario', 'Metric', 'Host', 'Guest', 'Ratio', 'Verdict'];
    const widths = [28, 40, 14, 14, 8, 7];
    const row = (cells: string[]): string => cells.map((c, i) => c.padEnd(widths[i] ?? 10)).join(' | ');

    const header = row(columns);
    console.log(header);
    console.log('-'.repeat(header.length));

    for (const result of this.results) {
      if (result.failure) {
        console.log(row([result.scenario, `${result.failure.stage} failure`, '', '', '', 'FAIL']));
        continue;
      }
      for (const comparison of result.comparisons) {
        for (const metric of comparison.metrics) {
          console.log(row([
            result.scenario,
            metric.name,
            String(metric.host),
            String(metric.guest),
            metric.ratio.toFixed(4),
            verdictLabel(metric.passed),
          ]));
        }
      }
    }

    console.log(`\nTarget ratio: ${this.config.targetRatio} | Overall: ${verdictLabel(this.passed)}`);
  }
}

export function describeFailure(err: unknown): ScenarioFailure {
  if (isHarnessError(err)) {
    return { stage: err.stage, message: err.message, detail: formatFailure(err) };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { stage: 'unknown', message, detail: `[unknown] ${message}` };
}
