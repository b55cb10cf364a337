import chalk from 'chalk';
import dotenv from 'dotenv';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { InterruptedError, describeError, type ExperimentParams } from '@netexp/common';
import { toCsv } from './artifacts.js';
import type { EmulationBackend } from './backend.js';
import { loadConfig, type RunnerConfig } from './config.js';
import { ExperimentRunner } from './experimentRunner.js';
import { abortOnInterrupt } from './interrupts.js';
import { createLogger } from './logger.js';
import { NetnsBackend } from './netnsBackend.js';
import { extractExperimentSummary, type ExperimentSummary } from './summary.js';

const logger = createLogger('sweep');

export type SweepSet = 'bw' | 'delay' | 'loss';

export const SWEEP_SETS: Record<SweepSet, { label: string; values: ReadonlyArray<number | string> }> = {
  bw: { label: 'Varying Bandwidth', values: [10, 15, 20, 35] },
  delay: { label: 'Varying Delay', values: ['1ms', '2ms', '5ms', '10ms'] },
  loss: { label: 'Varying Loss', values: [0, 2, 5, 10] },
};

export const SWEEP_BASELINE = { bandwidthMbps: 15, delay: '2ms', lossPercent: 2 } as const;

export interface SweepRun {
  set: SweepSet;
  params: ExperimentParams;
  outputDir: string;
}

export interface SweepRow {
  params: ExperimentParams;
  summary: ExperimentSummary;
}

function isSweepSet(value: string): value is SweepSet {
  return Object.keys(SWEEP_SETS).includes(value);
}

export function parseSweepSets(arg: string | undefined): SweepSet[] {
  if (!arg || arg === 'all') {
    return ['bw', 'delay', 'loss'];
  }
  if (!isSweepSet(arg)) {
    throw new Error(`Unknown sweep set "${arg}"; expected bw, delay, loss or all`);
  }
  return [arg];
}

export function sweepSetDir(root: string, set: SweepSet): string {
  return join(root, `${set}_vary`);
}

/** One run per value of `set`, the other two parameters held at the baseline. */
export function planSweep(set: SweepSet, base: ExperimentParams, root: string): SweepRun[] {
  return SWEEP_SETS[set].values.map((value) => {
    const params: ExperimentParams = { ...base, ...SWEEP_BASELINE };
    if (set === 'bw') {
      params.bandwidthMbps = Number(value);
    } else if (set === 'delay') {
      params.delay = String(value);
    } else {
      params.lossPercent = Number(value);
    }
    const name = `bw${params.bandwidthMbps}_delay${params.delay}_loss${Math.trunc(params.lossPercent)}`;
    return { set, params, outputDir: join(sweepSetDir(root, set), name) };
  });
}

export function summaryCsv(rows: readonly SweepRow[]): string {
  return toCsv(
    ['bandwidth_mbps', 'delay', 'loss_pct', 'bottleneck1_throughput_mbps', 'bottleneck2_throughput_mbps', 'avg_rtt_ms'],
    rows.map(({ params, summary }) => [
      params.bandwidthMbps,
      params.delay,
      params.lossPercent,
      summary.bottleneck1ThroughputMbps,
      summary.bottleneck2ThroughputMbps,
      summary.avgRttMs,
    ])
  );
}

export interface SweepOptions {
  backend: EmulationBackend;
  config: RunnerConfig;
  sets: readonly SweepSet[];
  root: string;
  signal?: AbortSignal;
}

/**
 * Runs every planned experiment one after another. A failed run is reported
 * and skipped; an interrupt ends the whole sweep.
 */
export async function runSweep(options: SweepOptions): Promise<Map<SweepSet, SweepRow[]>> {
  const results = new Map<SweepSet, SweepRow[]>();

  for (const set of options.sets) {
    console.log('\n' + chalk.cyan('#'.repeat(70)));
    console.log(chalk.cyan(`# ${SWEEP_SETS[set].label}`));
    console.log(chalk.cyan('#'.repeat(70)));

    const rows: SweepRow[] = [];
    for (const run of planSweep(set, options.config.experiment, options.root)) {
      const { params } = run;
      console.log(`Running: bw=${params.bandwidthMbps}Mbps, delay=${params.delay}, loss=${params.lossPercent}%`);

      const runner = new ExperimentRunner({
        backend: options.backend,
        config: { ...options.config, experiment: params, outputDir: run.outputDir },
      });
      try {
        const report = await runner.run(options.signal);
        rows.push({ params, summary: await extractExperimentSummary(report.outputDir) });
        console.log(chalk.green('  completed'));
      } catch (error) {
        if (error instanceof InterruptedError) {
          throw error;
        }
        console.log(chalk.red(`  failed: ${describeError(error)}`));
        logger.error({ err: error }, `Sweep run ${run.outputDir} failed`);
      }
    }

    results.set(set, rows);
    if (rows.length > 0) {
      await mkdir(sweepSetDir(options.root, set), { recursive: true });
      await writeFile(join(sweepSetDir(options.root, set), 'summary.csv'), summaryCsv(rows), 'utf-8');
    }
  }
  return results;
}

function printSummary(results: ReadonlyMap<SweepSet, SweepRow[]>): void {
  console.log('\n' + '='.repeat(70));
  console.log('SWEEP SUMMARY');
  console.log('='.repeat(70));
  for (const [set, rows] of results) {
    console.log(`\n${SWEEP_SETS[set].label}:`);
    console.log(`${'BW'.padEnd(6)} ${'Delay'.padEnd(8)} ${'Loss'.padEnd(6)} ${'B1 Tput'.padEnd(10)} ${'B2 Tput'.padEnd(10)} Avg RTT`);
    for (const { params, summary } of rows) {
      console.log(
        `${String(params.bandwidthMbps).padEnd(6)} ${params.delay.padEnd(8)} ${String(params.lossPercent).padEnd(6)} ` +
          `${summary.bottleneck1ThroughputMbps.toFixed(2).padEnd(10)} ${summary.bottleneck2ThroughputMbps.toFixed(2).padEnd(10)} ` +
          `${summary.avgRttMs.toFixed(2)}`
      );
    }
  }
}

async function main(): Promise<number> {
  dotenv.config();
  const config = loadConfig();
  const sets = parseSweepSets(process.argv[2]);
  const root = join(config.outputRoot, `${config.experiment.topology}_sweep`);

  const abort = new AbortController();
  const releaseSignals = abortOnInterrupt(abort, 'stopping the current run and tearing down...');

  const started = new Date();
  console.log(chalk.bold(`Sweep over ${sets.join(', ')} on ${config.experiment.topology}, started ${started.toISOString()}`));

  try {
    const results = await runSweep({
      backend: new NetnsBackend({ prefix: config.netnsPrefix }),
      config,
      sets,
      root,
      signal: abort.signal,
    });
    printSummary(results);
    const minutes = ((Date.now() - started.getTime()) / 60000).toFixed(1);
    console.log(chalk.green(`\nSweep finished in ${minutes} min; results under ${root}`));
    return 0;
  } catch (error) {
    if (error instanceof InterruptedError) {
      console.error(chalk.yellow('Sweep interrupted'));
      return 130;
    }
    console.error(chalk.red(`Sweep failed: ${describeError(error)}`));
    return 1;
  } finally {
    releaseSignals();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ err: error }, 'Unexpected failure');
      process.exitCode = 1;
    }
  );
}
