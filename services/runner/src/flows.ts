import { join } from 'path';
import type { FlowAssignment } from '@netexp/common';

/**
 * First half of the hosts send, second half receive; source i talks to
 * destination i.
 */
export function assignFlows(hosts: readonly string[]): FlowAssignment[] {
  if (hosts.length < 2 || hosts.length % 2 !== 0) {
    throw new Error(`Need an even number of hosts (at least 2) to pair flows, got ${hosts.length}`);
  }

  const mid = hosts.length / 2;
  return hosts.slice(0, mid).map((source, i) => {
    const destination = hosts[mid + i];
    return { flowId: `${source}-${destination}`, source, destination };
  });
}

export function flowMetricsPath(logDir: string, flow: FlowAssignment): string {
  return join(logDir, `${flow.source}_metrics.jsonl`);
}

/** Fair share of the bottleneck for each flow. */
export function perFlowRateMbps(bandwidthMbps: number, flowCount: number): number {
  return flowCount > 0 ? bandwidthMbps / flowCount : bandwidthMbps;
}
