import axios from 'axios';
import dotenv from 'dotenv';
import type { ExperimentStatus } from '../src/statusStore.js';

dotenv.config();

const STATUS_URL = process.env.STATUS_URL || `http://localhost:${process.env.STATUS_PORT || '4500'}`;
const POLL_MS = parseInt(process.env.MONITOR_POLL_MS || '2000', 10);

let lastDegradedCount = 0;

function formatRates(rates: Record<string, number>): string {
  return Object.entries(rates)
    .map(([iface, mbps]) => `${iface}:${mbps.toFixed(2)}Mbps`)
    .join(' ');
}

function formatHandles(status: ExperimentStatus): string {
  const counts = new Map<string, number>();
  for (const handle of status.handles) {
    const key = `${handle.role}/${handle.state}`;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts.entries()].map(([key, count]) => `${key}=${count}`).join(' ');
}

async function monitor(): Promise<void> {
  try {
    const { data: status } = await axios.get<ExperimentStatus>(`${STATUS_URL}/experiment`, { timeout: 1500 });

    const timestamp = new Date().toISOString().substring(11, 19);
    const second = status.lastSampleSecond === null ? '-' : `${status.lastSampleSecond}s`;
    console.log(`[${timestamp}] ${status.phase} t=${second} ${formatHandles(status)} ${formatRates(status.latestRates)}`);

    if (status.degradedFlows.length > lastDegradedCount) {
      for (const flow of status.degradedFlows.slice(lastDegradedCount)) {
        console.log(`  ! flow ${flow.flowId} degraded (${flow.reason}): ${flow.detail}`);
      }
      lastDegradedCount = status.degradedFlows.length;
    }
    if (status.error) {
      console.log(`  ! ${status.error}`);
    }
  } catch (error) {
    if (axios.isAxiosError(error)) {
      console.error(`[ERROR] Status endpoint unreachable: ${error.message}`);
    } else {
      console.error(`[ERROR] ${String(error)}`);
    }
  }
}

console.log(`Experiment monitor polling ${STATUS_URL} every ${POLL_MS}ms`);

const timer = setInterval(() => {
  monitor().catch((error: unknown) => console.error(`[ERROR] ${String(error)}`));
}, POLL_MS);

const stop = (): void => {
  clearInterval(timer);
  console.log('\nMonitor stopped');
};
process.once('SIGINT', stop);
process.once('SIGTERM', stop);
