import chalk from 'chalk';
import dotenv from 'dotenv';
import type { Server } from 'http';
import { ExperimentError, InterruptedError, describeError } from '@netexp/common';
import { loadConfig, type RunnerConfig } from './config.js';
import { ExperimentRunner, type ExperimentReport } from './experimentRunner.js';
import { abortOnInterrupt } from './interrupts.js';
import { createLogger } from './logger.js';
import { NetnsBackend } from './netnsBackend.js';
import { startStatusServer, stopStatusServer } from './statusServer.js';

dotenv.config();

const logger = createLogger('cli');

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_INTERRUPTED = 130;

function printBanner(config: RunnerConfig): void {
  const params = config.experiment;
  console.log('\n' + chalk.cyan('='.repeat(70)));
  console.log(chalk.bold.white(`  Network experiment: ${params.topology}`));
  console.log(chalk.cyan('='.repeat(70)));
  console.log(
    `  Bottleneck: ${chalk.yellow(`${params.bandwidthMbps} Mbps`)} | Delay: ${chalk.yellow(params.delay)} | ` +
      `Loss: ${chalk.yellow(`${params.lossPercent}%`)}`
  );
  console.log(`  Hosts: ${params.hostCount} (${params.hostCount / 2} flows) | Duration: ${params.durationSeconds}s`);
  console.log(`  Traffic: ${config.traffic.pattern} | Server port: ${config.traffic.port}`);
  if (config.statusPort > 0) {
    console.log(`  Status: http://localhost:${config.statusPort}/experiment`);
  }
  console.log(chalk.cyan('='.repeat(70)) + '\n');
}

function printReport(report: ExperimentReport): void {
  const { metadata, interfaceSummary } = report.result;
  console.log('\n' + chalk.green(`Results written to ${report.outputDir}`));
  for (const row of interfaceSummary) {
    console.log(`  ${row.interface.padEnd(12)} ${row.throughputMbps.toFixed(2).padStart(8)} Mbps`);
  }
  if (metadata.degradedFlowCount > 0) {
    console.log(chalk.yellow(`  ${metadata.degradedFlowCount}/${metadata.flowCount} flows degraded`));
  }
  if (metadata.missedTicks > 0) {
    console.log(chalk.yellow(`  ${metadata.missedTicks} sampler ticks skipped`));
  }
}

export async function main(): Promise<number> {
  let config: RunnerConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(chalk.red(`Invalid configuration: ${describeError(error)}`));
    return EXIT_FAILED;
  }
  printBanner(config);

  const runner = new ExperimentRunner({
    backend: new NetnsBackend({ prefix: config.netnsPrefix }),
    config,
  });

  const abort = new AbortController();
  const releaseSignals = abortOnInterrupt(abort, 'stopping traffic and tearing down...');

  let server: Server | null = null;
  try {
    if (config.statusPort > 0) {
      server = await startStatusServer(runner.status, config.statusPort);
    }
    const report = await runner.run(abort.signal);
    printReport(report);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof InterruptedError) {
      console.error(chalk.yellow(`${error.message}; no results written`));
      return EXIT_INTERRUPTED;
    }
    if (error instanceof ExperimentError) {
      console.error(chalk.red(`${error.name}: ${error.message}`));
    } else {
      logger.error({ err: error }, 'Experiment failed');
    }
    return EXIT_FAILED;
  } finally {
    releaseSignals();
    if (server) {
      await stopStatusServer(server).catch((error: unknown) => {
        logger.warn({ err: error }, 'Status endpoint did not close cleanly');
      });
    }
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.fatal({ err: error }, 'Unexpected failure');
    process.exitCode = EXIT_FAILED;
  }
);
