import { readFile } from 'fs/promises';
import { join } from 'path';
import { mean, round } from '@netexp/common';
import { ARTIFACT_FILES } from './artifacts.js';

export type CsvRow = Record<string, string>;

export function parseCsv(content: string): CsvRow[] {
  const lines = content
    .trim()
    .split('\n')
    .filter((line) => line.trim().length > 0);
  if (lines.length < 2) {
    return [];
  }

  const headers = lines[0].split(',').map((h) => h.trim());
  return lines.slice(1).map((line) => {
    const values = line.split(',').map((v) => v.trim());
    const row: CsvRow = {};
    headers.forEach((header, idx) => {
      row[header] = values[idx] ?? '';
    });
    return row;
  });
}

function numeric(value: string | undefined): number {
  const parsed = parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : 0;
}

export async function readMeanRtt(rttCsvPath: string): Promise<number> {
  const rows = parseCsv(await readFile(rttCsvPath, 'utf-8'));
  return round(mean(rows.map((row) => numeric(row.avg_rtt_ms))), 2);
}

export interface InterfaceThroughput {
  interface: string;
  throughputMbps: number;
}

/** Rows of a switches.csv in file order: bottleneck tx, bottleneck rx, then extras. */
export async function readInterfaceThroughputs(switchesCsvPath: string): Promise<InterfaceThroughput[]> {
  const rows = parseCsv(await readFile(switchesCsvPath, 'utf-8'));
  return rows.map((row) => ({ interface: row.interface ?? '', throughputMbps: numeric(row.throughput_mbps) }));
}

export interface ExperimentSummary {
  bottleneck1ThroughputMbps: number;
  bottleneck2ThroughputMbps: number;
  avgRttMs: number;
  interfaces: InterfaceThroughput[];
}

/**
 * Headline numbers of one experiment directory. The second bottleneck is the
 * first extra monitored interface, 0 for topologies without one.
 */
export async function extractExperimentSummary(dir: string): Promise<ExperimentSummary> {
  const interfaces = await readInterfaceThroughputs(join(dir, ARTIFACT_FILES.switches));
  const avgRttMs = await readMeanRtt(join(dir, ARTIFACT_FILES.rtt));

  return {
    bottleneck1ThroughputMbps: round(interfaces[0]?.throughputMbps ?? 0, 2),
    bottleneck2ThroughputMbps: round(interfaces[2]?.throughputMbps ?? 0, 2),
    avgRttMs,
    interfaces,
  };
}
