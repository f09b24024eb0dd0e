import { z } from 'zod';
import type { HarnessConfig } from './types.js';

const csvNumbers = z
  .union([z.string(), z.array(z.coerce.number())])
  .transform((value, ctx) => {
    const items = typeof value === 'string'
      ? value.split(',').map(v => v.trim()).filter(v => v !== '').map(Number)
      : value;
    if (items.length === 0 || items.some(n => !Number.isInteger(n) || n < 1)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a comma-separated list of positive integers' });
      return z.NEVER;
    }
    return items;
  });

/**
 * Raw option values as commander produces them (strings unless a flag is boolean)
 */
export const optionsSchema = z.object({
  guestHost: z.string().min(1).default('127.0.0.1'),
  guestPort: z.coerce.number().int().min(1).max(65535).default(22),
  guestUser: z.string().min(1).default('root'),
  guestPassword: z.string().optional(),
  guestKey: z.string().optional(),
  readyTimeout: z.coerce.number().int().min(1).default(10_000),
  connectRetries: z.coerce.number().int().min(1).default(30),

  target: z.coerce.number().positive().default(0.95),
  timeout: z.coerce.number().int().min(1).default(600_000),
  output: z.string().min(1).default('./results'),
  verbose: z.boolean().default(false),

  jobs: z.string().min(1).default('./configs'),
  remoteDir: z.string().min(1).default('/tmp'),
  hostCpu: z.coerce.number().int().min(0).default(71),
  guestCpu: z.coerce.number().int().min(0).default(3),
  outputFile: z.string().min(1).default('out.yaml'),

  source: z.string().min(1).default('./stream.c'),
  vcpus: csvNumbers.default('1'),
  remoteRoot: z.string().min(1).default('/root'),
  libPath: z.string().min(1).default('/usr/lib/x86_64-linux-gnu/libgomp.so.1'),
  march: z.string().min(1).default('znver1'),
  sizeFromL3: z.boolean().default(false),
  ntimes: z.coerce.number().int().min(2).default(100),
  offset: z.coerce.number().int().min(0).default(512),
});

/**
 * Validate CLI options and shape them into the harness configuration
 */
export function loadConfig(raw: Record<string, unknown>): HarnessConfig {
  const parsed = optionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `  --${toFlag(issue.path.join('.'))}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid options:\n${issues}`);
  }
  const o = parsed.data;

  return {
    guest: {
      host: o.guestHost,
      port: o.guestPort,
      username: o.guestUser,
      password: o.guestPassword,
      privateKeyPath: o.guestKey,
      readyTimeoutMs: o.readyTimeout,
      connectRetries: o.connectRetries,
    },
    targetRatio: o.target,
    timeoutMs: o.timeout,
    outputDir: o.output,
    verbose: o.verbose,
    cpu: {
      jobsDir: o.jobs,
      remoteDir: o.remoteDir,
      hostCpu: o.hostCpu,
      guestCpu: o.guestCpu,
      outputFile: o.outputFile,
    },
    memory: {
      source: o.source,
      vcpus: o.vcpus,
      remoteRoot: o.remoteRoot,
      libPath: o.libPath,
      march: o.march,
      sizeFromL3: o.sizeFromL3,
      ntimes: o.ntimes,
      offset: o.offset,
    },
  };
}

/**
 * Config as written to the results file, without credentials
 */
export function redactConfig(config: HarnessConfig): HarnessConfig {
  const { password: _password, ...guest } = config.guest;
  return { ...config, guest };
}

function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, c => `-${c.toLowerCase()}`);
}
