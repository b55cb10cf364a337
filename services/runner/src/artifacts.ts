import { mkdir, mkdtemp, rename, rm, stat, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { ExperimentParams, ExperimentResult, MetricSample } from '@netexp/common';
import { createLogger } from './logger.js';

const logger = createLogger('artifacts');

export const ARTIFACT_FILES = {
  switches: 'switches.csv',
  interfaces: 'interfaces.csv',
  rtt: 'rtt.csv',
  bytes: 'bytes.csv',
  cwnd: 'cwnd.csv',
  metadata: 'metadata.json',
} as const;

/** e.g. `dumbbell_bw15_delay2ms_loss2`; loss is truncated to an integer. */
export function experimentDirName(params: Pick<ExperimentParams, 'topology' | 'bandwidthMbps' | 'delay' | 'lossPercent'>): string {
  return `${params.topology}_bw${params.bandwidthMbps}_delay${params.delay}_loss${Math.trunc(params.lossPercent)}`;
}

export function toCsv(header: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | number>>): string {
  return [header, ...rows].map((row) => row.join(',')).join('\n') + '\n';
}

function seriesCsv(header: readonly [string, string], series: readonly MetricSample[]): string {
  return toCsv(
    header,
    series.map((point) => [point.timestampSecondsSinceStart, point.value])
  );
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes every artifact of `result` into a scratch directory beside
 * `targetDir` and renames it into place, so a reader never sees a partial
 * set. An existing `targetDir` is replaced.
 */
export async function writeArtifacts(result: ExperimentResult, targetDir: string): Promise<string[]> {
  const parent = dirname(targetDir);
  await mkdir(parent, { recursive: true });
  const scratch = await mkdtemp(join(parent, `.${basename(targetDir)}-`));

  const files: Array<[string, string]> = [
    [
      ARTIFACT_FILES.switches,
      toCsv(
        ['interface', 'throughput_mbps', 'duration_sec'],
        result.interfaceSummary.map((row) => [row.interface, row.throughputMbps, row.durationSeconds])
      ),
    ],
    [
      ARTIFACT_FILES.interfaces,
      toCsv(
        ['time_sec', 'interface', 'throughput_mbps'],
        result.interfaceSeries.map((point) => [point.timestampSecondsSinceStart, point.interfaceOrFlowId, point.value])
      ),
    ],
    [ARTIFACT_FILES.rtt, seriesCsv(['time_sec', 'avg_rtt_ms'], result.rttSeries)],
    [ARTIFACT_FILES.bytes, seriesCsv(['time_sec', 'total_bytes_sent'], result.bytesSeries)],
  ];
  if (result.cwndSeries) {
    files.push([ARTIFACT_FILES.cwnd, seriesCsv(['time_sec', 'window'], result.cwndSeries)]);
  }
  files.push([ARTIFACT_FILES.metadata, JSON.stringify(result.metadata, null, 2) + '\n']);

  try {
    for (const [name, content] of files) {
      await writeFile(join(scratch, name), content, 'utf-8');
    }
    if (await exists(targetDir)) {
      logger.warn(`Replacing existing results in ${targetDir}`);
      await rm(targetDir, { recursive: true, force: true });
    }
    await rename(scratch, targetDir);
  } catch (error) {
    await rm(scratch, { recursive: true, force: true });
    throw error;
  }

  logger.info(`Wrote ${files.length} artifacts to ${targetDir}`);
  return files.map(([name]) => name);
}
