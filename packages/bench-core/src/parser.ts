import { parse as parseYaml } from 'yaml';
import { ParseError } from './errors.js';
import type {
  BenchmarkDescriptor,
  KernelMetrics,
  MetricExtraction,
  MetricRecord,
  MetricUnit,
} from './types.js';

type Structured = Extract<MetricExtraction, { strategy: 'structured' }>;
type Positional = Extract<MetricExtraction, { strategy: 'positional' }>;

/**
 * Turn captured benchmark output into a metric record.
 * Throws ParseError rather than returning a partial record.
 */
export function parseResult(rawOutput: string, descriptor: BenchmarkDescriptor): MetricRecord {
  const extraction = descriptor.extraction;
  const kernels = extraction.strategy === 'structured'
    ? parseStructured(rawOutput, extraction)
    : parsePositional(rawOutput, extraction);

  return { benchmark: descriptor.name, kernels };
}

function parseStructured(raw: string, extraction: Structured): Record<string, KernelMetrics> {
  if (extraction.marker !== undefined && !raw.includes(extraction.marker)) {
    throw new ParseError(`Output does not contain "${extraction.marker}"`, { stdout: raw });
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (err) {
    throw new ParseError(`Output is not valid YAML: ${err instanceof Error ? err.message : err}`, {
      stdout: raw,
      cause: err,
    });
  }

  const kernels: Record<string, Record<string, number>> = {};
  for (const field of extraction.fields) {
    const value = lookup(document, field.path);
    if (value === undefined) {
      throw new ParseError(`Missing field ${formatPath(field.path)}`, { stdout: raw });
    }
    const kernel = kernels[field.kernel] ?? {};
    kernel[field.metric] = convert(value, field, `${field.kernel}/${field.metric}`, raw);
    kernels[field.kernel] = kernel;
  }
  return kernels;
}

function parsePositional(raw: string, extraction: Positional): Record<string, KernelMetrics> {
  const lines = raw.split('\n');
  if (lines.length <= 1) {
    throw new ParseError('Output has no line structure', { stdout: raw });
  }

  if (extraction.marker !== undefined) {
    const line = lineAt(lines, extraction.marker.line);
    if (line === undefined || !line.includes(extraction.marker.text)) {
      throw new ParseError(
        `"${extraction.marker.text}" not found on line ${extraction.marker.line}`,
        { stdout: raw }
      );
    }
  }

  const kernels: Record<string, Record<string, number>> = {};
  for (const row of extraction.rows) {
    const line = lineAt(lines, row.line);
    if (line === undefined) {
      throw new ParseError(`Line ${row.line} for ${row.kernel} is out of range`, { stdout: raw });
    }
    const columns = line.trim().replace(/\s+/g, ' ').split(' ');
    const kernel: Record<string, number> = {};
    for (const column of extraction.columns) {
      const cell = columns[column.index];
      if (cell === undefined) {
        throw new ParseError(`${row.kernel}: no column ${column.index} in "${line}"`, { stdout: raw });
      }
      kernel[column.metric] = convert(cell, column, `${row.kernel}/${column.metric}`, raw);
    }
    kernels[row.kernel] = kernel;
  }
  return kernels;
}

function lineAt(lines: string[], index: number): string | undefined {
  return lines[index < 0 ? lines.length + index : index];
}

function lookup(document: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = document;
  for (const key of path) {
    if (typeof key === 'number') {
      if (!Array.isArray(current)) return undefined;
      current = current[key];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[key];
    }
  }
  return current;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function convert(value: unknown, unit: MetricUnit, name: string, raw: string): number {
  const numeric = typeof value === 'number'
    ? value
    : typeof value === 'string' && value.trim() !== ''
      ? Number(value.trim())
      : Number.NaN;
  if (!Number.isFinite(numeric)) {
    throw new ParseError(`${name}: ${JSON.stringify(value)} is not a number`, { stdout: raw });
  }
  const divisor = unit.divisor ?? 1;
  return divisor === 1 ? numeric : numeric / divisor;
}

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.map(key => (typeof key === 'number' ? `[${key}]` : `.${key}`)).join('').replace(/^\./, '');
}
