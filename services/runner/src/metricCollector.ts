import type { FlowAssignment, FlowDegraded } from '@netexp/common';
import type { EmulationBackend } from './backend.js';
import type { FlowLog, FlowLogSource } from './flowLogSource.js';
import { InterfaceSampler, type InterfaceMeasurement, type SamplerOptions } from './interfaceSampler.js';
import { createLogger } from './logger.js';
import type { MonitoredInterface } from './topologyBuilder.js';

const logger = createLogger('collector');

export interface CollectedFlowLogs {
  logs: FlowLog[];
  degraded: FlowDegraded[];
}

/** Live interface sampling during traffic, per-flow log reading after it. */
export class MetricCollector {
  private sampler: InterfaceSampler | null = null;
  private measurement: InterfaceMeasurement | null = null;

  constructor(
    private readonly backend: EmulationBackend,
    private readonly samplerOptions: SamplerOptions,
    private readonly logSource: FlowLogSource
  ) {}

  async startSampling(targets: readonly MonitoredInterface[], startedAt: number): Promise<void> {
    if (this.sampler) {
      throw new Error('Sampling already started');
    }
    this.sampler = new InterfaceSampler(this.backend, targets, this.samplerOptions);
    await this.sampler.start(startedAt);
  }

  async stopSampling(): Promise<InterfaceMeasurement> {
    if (!this.sampler) {
      throw new Error('Sampling was never started');
    }
    this.measurement = await this.sampler.stop();
    return this.measurement;
  }

  /** The measurement taken by the last `stopSampling`. */
  takeMeasurement(): InterfaceMeasurement {
    if (!this.measurement) {
      throw new Error('No interface measurement: sampling did not complete');
    }
    return this.measurement;
  }

  async collectFlowLogs(flows: readonly FlowAssignment[]): Promise<CollectedFlowLogs> {
    const results = await Promise.all(flows.map((flow) => this.logSource.read(flow)));
    const logs: FlowLog[] = [];
    const degraded: FlowDegraded[] = [];

    for (const result of results) {
      if (result.ok) {
        logs.push(result.log);
        if (result.log.discarded > 0) {
          logger.debug(`${result.log.flow.flowId}: discarded ${result.log.discarded} malformed lines`);
        }
      } else {
        degraded.push(result.degraded);
        logger.warn(`Flow ${result.degraded.flowId} excluded (${result.degraded.reason}): ${result.degraded.detail}`);
      }
    }

    logger.info(`Collected progress logs of ${logs.length}/${flows.length} flows`);
    return { logs, degraded };
  }

  dispose(): void {
    this.sampler?.dispose();
  }
}
