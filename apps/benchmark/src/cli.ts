#!/usr/bin/env node

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { LocalTarget, RemoteTarget, waitForSSH } from '@vmbench/core';
import { loadConfig } from './config.js';
import { ScenarioRunner } from './runner.js';
import { getScenarios, type ScenarioKind } from './scenarios/index.js';

const program = new Command();

program
  .name('vm-bench')
  .description('Compare CPU and memory performance of a running guest VM against its host')
  .version('0.1.0')
  .option('--guest-host <host>', 'Guest SSH address (default: 127.0.0.1)')
  .option('--guest-port <port>', 'Guest SSH port (default: 22)')
  .option('--guest-user <user>', 'Guest SSH user (default: root)')
  .option('--guest-password <password>', 'Guest SSH password')
  .option('--guest-key <path>', 'Private key for guest SSH')
  .option('--ready-timeout <ms>', 'SSH handshake timeout (default: 10000)')
  .option('--connect-retries <n>', 'SSH connection attempts (default: 30)')
  .option('-t, --target <ratio>', 'Minimum guest/host ratio (default: 0.95)')
  .option('--timeout <ms>', 'Per-command timeout (default: 600000)')
  .option('-o, --output <dir>', 'Output directory for results (default: ./results)')
  .option('-v, --verbose', 'Verbose output');

program
  .command('cpu')
  .description('Run stress-ng job files on host and guest')
  .option('-j, --jobs <dir>', 'Directory of stress-ng job files (default: ./configs)')
  .option('--remote-dir <dir>', 'Guest directory the jobs are copied into (default: /tmp)')
  .option('--host-cpu <n>', 'Host CPU to pin stress-ng to (default: 71)')
  .option('--guest-cpu <n>', 'Guest CPU to pin stress-ng to (default: 3)')
  .option('--output-file <file>', 'YAML report path used by stress-ng (default: out.yaml)')
  .action(async (_options, command: Command) => {
    await runHarness(['cpu'], command.optsWithGlobals());
  });

program
  .command('memory')
  .description('Run the STREAM memory benchmark on host and guest')
  .option('-s, --source <file>', 'STREAM C source (default: ./stream.c)')
  .option('--vcpus <counts>', 'Comma-separated thread counts, one scenario each (default: 1)')
  .option('--remote-root <dir>', 'Guest directory for the binary (default: /root)')
  .option('--lib-path <path>', 'OpenMP runtime copied to the guest (default: /usr/lib/x86_64-linux-gnu/libgomp.so.1)')
  .option('--march <arch>', 'gcc -march value (default: znver1)')
  .option('--size-from-l3', 'Size arrays from the host L3 cache')
  .option('--ntimes <n>', 'STREAM repetitions (default: 100)')
  .option('--offset <n>', 'STREAM array offset (default: 512)')
  .action(async (_options, command: Command) => {
    await runHarness(['memory'], command.optsWithGlobals());
  });

async function runHarness(kinds: ScenarioKind[], rawOptions: Record<string, unknown>): Promise<void> {
  const config = loadConfig(rawOptions);

  console.log('VM Performance Harness');
  console.log('======================\n');
  console.log('Configuration:');
  console.log(`  Guest: ${config.guest.username}@${config.guest.host}:${config.guest.port}`);
  console.log(`  Target ratio: ${config.targetRatio}`);
  console.log(`  Timeout: ${config.timeoutMs}ms`);
  if (kinds.includes('memory')) {
    console.log(`  vCPUs: ${config.memory.vcpus.join(', ')}`);
  }
  console.log('');

  const privateKey = config.guest.privateKeyPath
    ? await readFile(config.guest.privateKeyPath)
    : undefined;

  console.log('Connecting to guest...');
  const ssh = await waitForSSH({
    host: config.guest.host,
    port: config.guest.port,
    username: config.guest.username,
    password: config.guest.password,
    privateKey,
    readyTimeout: config.guest.readyTimeoutMs,
  }, { maxRetries: config.guest.connectRetries });
  console.log('');

  try {
    const runner = new ScenarioRunner(
      config,
      new LocalTarget({ defaultTimeoutMs: config.timeoutMs }),
      new RemoteTarget(ssh, { defaultTimeoutMs: config.timeoutMs })
    );

    await runner.run(getScenarios(kinds, config.memory.vcpus));
    runner.printSummaryTable();
    await runner.saveResults();

    process.exitCode = runner.passed ? 0 : 1;
  } finally {
    ssh.disconnect();
  }
}

program.parseAsync().catch((err: unknown) => {
  console.error('Benchmark failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
