import type { HarnessError } from './errors.js';
import type { ComparisonResult } from './types.js';

export function verdictLabel(passed: boolean): 'PASS' | 'FAIL' {
  return passed ? 'PASS' : 'FAIL';
}

/**
 * One line per metric: `<name> <ratio> - <verdict> host : <value> guest : <value>`
 */
export function formatComparison(result: ComparisonResult): string[] {
  return result.metrics.map(m =>
    `${m.name} ${m.ratio.toFixed(4)} - ${verdictLabel(m.passed)} host : ${m.host} guest : ${m.guest}`
  );
}

/**
 * Describe a failed stage together with the text it captured
 */
export function formatFailure(err: HarnessError): string {
  const lines = [`[${err.stage}] ${err.name}: ${err.message}`];
  if (err.target) lines.push(`  target: ${err.target}`);
  if (err.command) lines.push(`  command: ${err.command}`);
  if (err.stdout) lines.push('  stdout:', indent(err.stdout));
  if (err.stderr) lines.push('  stderr:', indent(err.stderr));
  return lines.join('\n');
}

function indent(text: string): string {
  return text.trimEnd().split('\n').map(line => `    ${line}`).join('\n');
}
