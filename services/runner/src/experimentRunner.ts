import { mkdir, rm } from 'fs/promises';
import { join } from 'path';
import {
  InterruptedError,
  topologyTemplates,
  type ExperimentMetadata,
  type ExperimentResult,
  type FlowDegraded,
} from '@netexp/common';
import { aggregate } from './aggregator.js';
import { experimentDirName, writeArtifacts } from './artifacts.js';
import type { EmulationBackend } from './backend.js';
import { BackendLease } from './backendLease.js';
import { CertificateProvisioner, type CertBundle } from './certificates.js';
import type { RunnerConfig } from './config.js';
import { FileFlowLogSource, type FlowLogSource } from './flowLogSource.js';
import { assignFlows, flowMetricsPath, perFlowRateMbps } from './flows.js';
import { createLogger } from './logger.js';
import { MetricCollector } from './metricCollector.js';
import { ProcessOrchestrator, type RunOutcome } from './orchestrator.js';
import { StatusStore } from './statusStore.js';
import { TopologyBuilder, type LiveTopology } from './topologyBuilder.js';

const logger = createLogger('experiment');

export interface ExperimentRunnerOptions {
  backend: EmulationBackend;
  config: RunnerConfig;
  certificates?: CertificateProvisioner;
  /** Defaults to the metrics files the clients write under the run's log directory. */
  logSource?: FlowLogSource;
  status?: StatusStore;
  livenessPollMs?: number;
  readyPollMs?: number;
}

export interface ExperimentReport {
  outputDir: string;
  artifacts: string[];
  result: ExperimentResult;
}

function interruptSignalName(signal: AbortSignal | undefined): string {
  return typeof signal?.reason === 'string' ? signal.reason : 'SIGINT';
}

/**
 * Runs one experiment end to end: certificate, backend lease, topology,
 * traffic with live sampling, log collection, aggregation, artifacts. The
 * topology is torn down and the lease released on every exit path.
 */
export class ExperimentRunner {
  readonly status: StatusStore;
  private live: LiveTopology | null = null;
  private collector: MetricCollector | null = null;

  constructor(private readonly options: ExperimentRunnerOptions) {
    this.status = options.status ?? new StatusStore();
  }

  get outputDir(): string {
    const { config } = this.options;
    return config.outputDir ?? join(config.outputRoot, experimentDirName(config.experiment));
  }

  async run(signal?: AbortSignal): Promise<ExperimentReport> {
    const { backend, config } = this.options;
    const params = config.experiment;
    this.status.begin(params);
    logger.info(
      `Experiment ${experimentDirName(params)}: ${params.hostCount} hosts, ${params.durationSeconds}s, ` +
        `${params.bandwidthMbps} Mbps bottleneck`
    );

    let certs: CertBundle;
    let lease: BackendLease;
    try {
      const certificates = this.options.certificates ?? new CertificateProvisioner(join(config.workDir, 'certs'));
      certs = await certificates.ensure();
      lease = await BackendLease.acquire(backend, experimentDirName(params));
    } catch (error) {
      this.status.fail(error);
      throw error;
    }

    let report: ExperimentReport;
    try {
      if (signal?.aborted) {
        throw new InterruptedError(interruptSignalName(signal));
      }
      report = await this.execute(certs, signal);
    } catch (error) {
      await this.cleanup(lease, true);
      this.status.fail(error);
      throw error;
    }

    try {
      await this.cleanup(lease, false);
    } catch (error) {
      this.status.fail(error);
      throw error;
    }
    this.status.finish(report.outputDir);
    return report;
  }

  private async execute(certs: CertBundle, signal?: AbortSignal): Promise<ExperimentReport> {
    const { backend, config } = this.options;
    const params = config.experiment;
    const duration = params.durationSeconds;
    const logDir = join(config.workDir, 'logs', experimentDirName(params));

    this.status.setPhase('building');
    const spec = topologyTemplates[params.topology](params);
    const live = await new TopologyBuilder(backend).build(spec);
    this.live = live;

    const flows = assignFlows(spec.hosts);
    await rm(logDir, { recursive: true, force: true });
    await mkdir(logDir, { recursive: true });

    // Ends the traffic phase early: the caller's signal or a sampler failure.
    const phase = new AbortController();
    const forwardAbort = (): void => phase.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const collector = new MetricCollector(
      backend,
      {
        tickMs: config.sampleTickMs,
        onSample: (samples) => this.status.recordSamples(samples),
        onFatal: (error) => phase.abort(error),
      },
      this.options.logSource ?? new FileFlowLogSource((flow) => flowMetricsPath(logDir, flow))
    );
    this.collector = collector;

    const orchestrator = new ProcessOrchestrator(
      backend,
      {
        ...config.traffic,
        logDir,
        ratePerFlowMbps: perFlowRateMbps(params.bandwidthMbps, flows.length),
        livenessPollMs: this.options.livenessPollMs,
        readyPollMs: this.options.readyPollMs,
      },
      {
        onTrafficStart: async (startedAt) => {
          this.status.trafficStarted(startedAt);
          await collector.startSampling(live.monitoredInterfaces(), startedAt);
        },
        onTrafficEnd: async () => {
          await collector.stopSampling();
        },
        onHandleChange: (handle) => this.status.updateHandle(handle.snapshot()),
        onFlowDegraded: (flow) => this.status.recordDegraded(flow),
      }
    );

    this.status.setPhase('starting_servers');
    let outcome: RunOutcome;
    try {
      outcome = await orchestrator.run(live, flows, certs, duration, phase.signal);
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    if (outcome.interrupted) {
      throw new InterruptedError(interruptSignalName(signal));
    }

    this.status.setPhase('collecting');
    const collected = await collector.collectFlowLogs(flows);
    const degraded = new Map<string, FlowDegraded>();
    for (const flow of [...outcome.degraded, ...collected.degraded]) {
      if (!degraded.has(flow.flowId)) {
        degraded.set(flow.flowId, flow);
      }
    }

    const measurement = collector.takeMeasurement();
    const metadata: ExperimentMetadata = {
      topology: params.topology,
      bandwidthMbps: params.bandwidthMbps,
      delay: params.delay,
      lossPercent: params.lossPercent,
      durationSeconds: duration,
      hostCount: params.hostCount,
      flowCount: flows.length,
      startedAt: new Date(outcome.trafficStartedAt).toISOString(),
      missedTicks: measurement.missedTicks,
      degradedFlowCount: degraded.size,
      degradedFlows: [...degraded.values()],
    };
    const result = aggregate(measurement, collected.logs, metadata);

    this.status.setPhase('writing');
    const outputDir = this.outputDir;
    const artifacts = await writeArtifacts(result, outputDir);

    if (degraded.size > 0) {
      logger.warn(`${degraded.size}/${flows.length} flows degraded`);
    }
    return { outputDir, artifacts, result };
  }

  private async cleanup(lease: BackendLease, failing: boolean): Promise<void> {
    this.collector?.dispose();
    this.collector = null;
    this.status.setPhase('tearing_down');
    try {
      if (this.live) {
        await this.live.teardown();
      }
    } catch (error) {
      if (!failing) {
        throw error;
      }
      logger.error({ err: error }, 'Teardown failed after an earlier error');
    } finally {
      this.live = null;
      lease.release();
    }
  }
}
