import {
  describeError,
  now,
  type ExperimentParams,
  type FlowDegraded,
  type MetricSample,
} from '@netexp/common';
import type { RunHandleSnapshot } from './runHandle.js';

export type ExperimentPhase =
  | 'idle'
  | 'provisioning'
  | 'building'
  | 'starting_servers'
  | 'traffic'
  | 'collecting'
  | 'writing'
  | 'tearing_down'
  | 'done'
  | 'failed';

export interface ExperimentStatus {
  phase: ExperimentPhase;
  experiment: ExperimentParams | null;
  trafficStartedAt: number | null;
  handles: RunHandleSnapshot[];
  /** Last sampled rate per monitored interface, in Mbps. */
  latestRates: Record<string, number>;
  lastSampleSecond: number | null;
  degradedFlows: FlowDegraded[];
  outputDir: string | null;
  error: string | null;
  updatedAt: number;
}

function initialStatus(): ExperimentStatus {
  return {
    phase: 'idle',
    experiment: null,
    trafficStartedAt: null,
    handles: [],
    latestRates: {},
    lastSampleSecond: null,
    degradedFlows: [],
    outputDir: null,
    error: null,
    updatedAt: now(),
  };
}

/** What the status endpoint reports about the experiment in progress. */
export class StatusStore {
  private status: ExperimentStatus = initialStatus();

  snapshot(): ExperimentStatus {
    return {
      ...this.status,
      handles: [...this.status.handles],
      latestRates: { ...this.status.latestRates },
      degradedFlows: [...this.status.degradedFlows],
    };
  }

  begin(experiment: ExperimentParams): void {
    this.status = { ...initialStatus(), experiment, phase: 'provisioning' };
  }

  setPhase(phase: ExperimentPhase): void {
    this.status.phase = phase;
    this.touch();
  }

  trafficStarted(at: number): void {
    this.status.trafficStartedAt = at;
    this.status.phase = 'traffic';
    this.touch();
  }

  updateHandle(handle: RunHandleSnapshot): void {
    const index = this.status.handles.findIndex((existing) => existing.id === handle.id);
    if (index === -1) {
      this.status.handles.push(handle);
    } else {
      this.status.handles[index] = handle;
    }
    this.touch();
  }

  recordSamples(samples: readonly MetricSample[]): void {
    for (const sample of samples) {
      this.status.latestRates[sample.interfaceOrFlowId] = sample.value;
      this.status.lastSampleSecond = sample.timestampSecondsSinceStart;
    }
    this.touch();
  }

  recordDegraded(flow: FlowDegraded): void {
    if (!this.status.degradedFlows.some((existing) => existing.flowId === flow.flowId)) {
      this.status.degradedFlows.push(flow);
    }
    this.touch();
  }

  finish(outputDir: string): void {
    this.status.outputDir = outputDir;
    this.status.phase = 'done';
    this.touch();
  }

  fail(error: unknown): void {
    this.status.error = describeError(error);
    this.status.phase = 'failed';
    this.touch();
  }

  private touch(): void {
    this.status.updatedAt = now();
  }
}
