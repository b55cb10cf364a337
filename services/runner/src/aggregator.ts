import {
  bytesToMbps,
  mean,
  round,
  type ExperimentMetadata,
  type ExperimentResult,
  type InterfaceSummaryRow,
  type MetricSample,
} from '@netexp/common';
import type { FlowLog } from './flowLogSource.js';
import type { InterfaceMeasurement } from './interfaceSampler.js';

export const RTT_SERIES_ID = 'avg_rtt_ms';
export const BYTES_SERIES_ID = 'total_bytes_sent';
export const CWND_SERIES_ID = 'window';

interface Bucket {
  rtt: number[];
  cwnd: number[];
  bytes: number;
}

function sample(time: number, id: string, value: number): MetricSample {
  return Object.freeze({ timestampSecondsSinceStart: time, interfaceOrFlowId: id, value });
}

/**
 * Folds raw counters and per-flow progress into the persisted series. Every
 * series covers seconds 1..D exactly; a second nobody reported for is a zero
 * row. Only positive RTTs count as observations.
 */
export function aggregate(
  measurement: InterfaceMeasurement,
  logs: readonly FlowLog[],
  metadata: ExperimentMetadata
): ExperimentResult {
  const duration = metadata.durationSeconds;
  const buckets: Bucket[] = Array.from({ length: duration + 1 }, () => ({ rtt: [], cwnd: [], bytes: 0 }));
  let reportsCwnd = false;

  for (const log of logs) {
    for (const record of log.records) {
      if (record.time < 1 || record.time > duration) {
        continue;
      }
      const bucket = buckets[record.time];
      bucket.bytes += record.bytes_sent;
      if (record.rtt_ms != null && record.rtt_ms > 0) {
        bucket.rtt.push(record.rtt_ms);
      }
      if (record.cwnd_bytes !== undefined) {
        bucket.cwnd.push(record.cwnd_bytes);
        reportsCwnd = true;
      }
    }
  }

  const rttSeries: MetricSample[] = [];
  const bytesSeries: MetricSample[] = [];
  const cwndSeries: MetricSample[] = [];
  for (let time = 1; time <= duration; time++) {
    const bucket = buckets[time];
    rttSeries.push(sample(time, RTT_SERIES_ID, round(mean(bucket.rtt), 2)));
    bytesSeries.push(sample(time, BYTES_SERIES_ID, bucket.bytes));
    cwndSeries.push(sample(time, CWND_SERIES_ID, Math.trunc(mean(bucket.cwnd))));
  }

  const interfaceSummary: InterfaceSummaryRow[] = measurement.totals.map((total) => ({
    interface: total.interfaceId,
    throughputMbps: round(bytesToMbps(total.bytes, duration), 2),
    durationSeconds: duration,
  }));

  return {
    metadata,
    interfaceSeries: measurement.samples,
    interfaceSummary,
    rttSeries,
    bytesSeries,
    cwndSeries: reportsCwnd ? cwndSeries : null,
  };
}
