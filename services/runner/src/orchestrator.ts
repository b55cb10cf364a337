import { mkdir } from 'fs/promises';
import { join } from 'path';
import {
  ServerStartError,
  TeardownError,
  describeError,
  now,
  sleep,
  type FlowAssignment,
  type FlowDegraded,
  type FlowDegradedReason,
  type HostRole,
} from '@netexp/common';
import type { EmulationBackend } from './backend.js';
import type { CertBundle } from './certificates.js';
import type { TrafficSettings } from './config.js';
import { flowMetricsPath } from './flows.js';
import { createLogger } from './logger.js';
import { waitForReady } from './readiness.js';
import { RunHandle, describeExit, type RunState } from './runHandle.js';
import type { LiveTopology } from './topologyBuilder.js';

const logger = createLogger('orchestrator');

export interface OrchestratorOptions extends TrafficSettings {
  logDir: string;
  ratePerFlowMbps: number | null;
  livenessPollMs?: number;
  readyPollMs?: number;
}

export interface OrchestratorHooks {
  /** Runs right before the first client is launched. */
  onTrafficStart?: (startedAt: number) => Promise<void> | void;
  /** Runs at the deadline (or interrupt), before any process is stopped. */
  onTrafficEnd?: () => Promise<void> | void;
  onHandleChange?: (handle: RunHandle) => void;
  onFlowDegraded?: (flow: FlowDegraded) => void;
}

export interface RunOutcome {
  handles: readonly RunHandle[];
  trafficStartedAt: number;
  trafficEndedAt: number;
  degraded: FlowDegraded[];
  interrupted: boolean;
}

interface ClientRun {
  flow: FlowAssignment;
  handle: RunHandle;
}

/**
 * Launches one server per destination and one client per source, holds the
 * traffic phase open for the experiment duration and stops everything it
 * started, clients first.
 */
export class ProcessOrchestrator {
  private handles: RunHandle[] = [];
  private degraded = new Map<string, FlowDegraded>();

  constructor(
    private readonly backend: EmulationBackend,
    private readonly options: OrchestratorOptions,
    private readonly hooks: OrchestratorHooks = {}
  ) {}

  get runHandles(): readonly RunHandle[] {
    return this.handles;
  }

  async run(
    live: LiveTopology,
    flows: readonly FlowAssignment[],
    certs: CertBundle,
    durationSeconds: number,
    signal?: AbortSignal
  ): Promise<RunOutcome> {
    this.handles = [];
    this.degraded.clear();
    await mkdir(this.options.logDir, { recursive: true });

    let outcome: RunOutcome;
    try {
      outcome = await this.drive(live, flows, certs, durationSeconds, signal);
    } catch (error) {
      await this.stopAll().catch((teardownError: unknown) => {
        logger.error({ err: teardownError }, 'Stopping processes after a failed run also failed');
      });
      throw error;
    }

    await this.stopAll();
    return outcome;
  }

  private async drive(
    live: LiveTopology,
    flows: readonly FlowAssignment[],
    certs: CertBundle,
    durationSeconds: number,
    signal?: AbortSignal
  ): Promise<RunOutcome> {
    const servers = await this.startServers(live, flows, certs, signal);
    if (signal?.aborted) {
      const stoppedAt = now();
      logger.warn('Interrupted while servers were starting');
      return {
        handles: [...this.handles],
        trafficStartedAt: stoppedAt,
        trafficEndedAt: stoppedAt,
        degraded: [],
        interrupted: true,
      };
    }

    const trafficStartedAt = now();
    await this.hooks.onTrafficStart?.(trafficStartedAt);
    const clients = await this.startClients(live, flows, durationSeconds, signal);

    for (const server of servers.values()) {
      this.move(server, 'running');
    }
    logger.info(`${clients.length}/${flows.length} clients running for ${durationSeconds}s`);

    const deadline = trafficStartedAt + durationSeconds * 1000;
    const pollMs = this.options.livenessPollMs ?? 250;
    while (!signal?.aborted) {
      const remaining = deadline - now();
      if (remaining <= 0) {
        break;
      }
      await sleep(Math.min(remaining, pollMs), signal);
      this.checkLiveness(clients, servers, flows, trafficStartedAt);
    }
    this.checkLiveness(clients, servers, flows, trafficStartedAt);

    const interrupted = signal?.aborted ?? false;
    const trafficEndedAt = now();
    if (interrupted) {
      logger.warn(`Traffic phase interrupted after ${((trafficEndedAt - trafficStartedAt) / 1000).toFixed(1)}s`);
    }
    await this.hooks.onTrafficEnd?.();

    return {
      handles: [...this.handles],
      trafficStartedAt,
      trafficEndedAt,
      degraded: [...this.degraded.values()],
      interrupted,
    };
  }

  private async startServers(
    live: LiveTopology,
    flows: readonly FlowAssignment[],
    certs: CertBundle,
    signal?: AbortSignal
  ): Promise<Map<string, RunHandle>> {
    const servers = new Map<string, RunHandle>();
    const destinations = [...new Set(flows.map((flow) => flow.destination))];

    for (const host of destinations) {
      if (signal?.aborted) {
        return servers;
      }
      try {
        servers.set(host, await this.launch('server', host, this.serverCommand(live.addressOf(host), certs)));
      } catch (error) {
        throw new ServerStartError([host], `Could not launch server on ${host}: ${describeError(error)}`, {
          cause: error,
        });
      }
    }

    const results = await Promise.allSettled(
      [...servers.values()].map((handle) =>
        waitForReady(
          handle,
          {
            pattern: this.options.readyPattern,
            timeoutMs: this.options.readyTimeoutMs,
            settleMs: this.options.settleMs,
            pollMs: this.options.readyPollMs,
          },
          signal
        )
      )
    );
    if (signal?.aborted) {
      return servers;
    }

    const failedHosts: string[] = [];
    const reasons: string[] = [];
    [...servers.values()].forEach((handle, index) => {
      const result = results[index];
      if (result.status === 'fulfilled') {
        this.move(handle, 'ready');
      } else {
        failedHosts.push(handle.hostId);
        reasons.push(describeError(result.reason));
      }
    });

    if (failedHosts.length > 0) {
      throw new ServerStartError(failedHosts, `Servers not ready on ${failedHosts.join(', ')}: ${reasons.join('; ')}`);
    }

    logger.info(`${servers.size} servers ready`);
    return servers;
  }

  private async startClients(
    live: LiveTopology,
    flows: readonly FlowAssignment[],
    durationSeconds: number,
    signal?: AbortSignal
  ): Promise<ClientRun[]> {
    const clients: ClientRun[] = [];

    for (const [index, flow] of flows.entries()) {
      if (index > 0 && this.options.staggerMs > 0) {
        await sleep(this.options.staggerMs, signal);
      }
      if (signal?.aborted) {
        break;
      }

      try {
        const command = this.clientCommand(live.addressOf(flow.destination), flow, durationSeconds);
        const handle = await this.launch('client', flow.source, command);
        this.move(handle, 'running');
        clients.push({ flow, handle });
      } catch (error) {
        this.degrade(flow, 'launch_failed', `client launch failed: ${describeError(error)}`, 0);
      }
    }
    return clients;
  }

  private checkLiveness(
    clients: readonly ClientRun[],
    servers: ReadonlyMap<string, RunHandle>,
    flows: readonly FlowAssignment[],
    trafficStartedAt: number
  ): void {
    const secondOf = (handle: RunHandle): number =>
      Math.floor(((handle.exitedAt ?? now()) - trafficStartedAt) / 1000);

    for (const { flow, handle } of clients) {
      if (handle.hasExited && handle.state === 'running') {
        this.move(handle, 'degraded');
        this.degrade(flow, 'early_exit', `client ${describeExit(handle)}`, secondOf(handle));
      }
    }

    for (const [host, handle] of servers) {
      if (handle.hasExited && handle.state === 'running') {
        this.move(handle, 'degraded');
        for (const flow of flows.filter((candidate) => candidate.destination === host)) {
          this.degrade(flow, 'server_exit', `server on ${host} ${describeExit(handle)}`, secondOf(handle));
        }
      }
    }
  }

  private async stopAll(): Promise<void> {
    const errors: unknown[] = [];

    for (const role of ['client', 'server'] as const) {
      const group = this.handles.filter((handle) => handle.role === role);
      const results = await Promise.allSettled(group.map((handle) => this.terminate(handle)));
      for (const result of results) {
        if (result.status === 'rejected') {
          errors.push(result.reason);
        }
      }
    }

    if (errors.length > 0) {
      throw new TeardownError(
        errors,
        `Failed to stop ${errors.length} process(es): ${errors.map(describeError).join('; ')}`
      );
    }
  }

  private async terminate(handle: RunHandle): Promise<void> {
    if (handle.state === 'terminated') {
      return;
    }

    const grace = this.options.terminateGraceMs;
    if (!handle.hasExited) {
      handle.signal('SIGTERM');
      if (!(await handle.waitForExit(grace))) {
        logger.warn(`${handle.id} (pid ${handle.pid}) ignored SIGTERM, sending SIGKILL`);
        handle.signal('SIGKILL');
        if (!(await handle.waitForExit(grace))) {
          throw new Error(`${handle.id} (pid ${handle.pid}) still running after SIGKILL`);
        }
      }
    }
    this.move(handle, 'terminated');
  }

  private async launch(role: HostRole, hostId: string, command: string[]): Promise<RunHandle> {
    const logPath = join(this.options.logDir, `${hostId}_${role}.log`);
    const startedAt = now();
    const child = await this.backend.execInHost(hostId, command, { logPath });
    const handle = new RunHandle(role, hostId, logPath, child, startedAt);
    this.handles.push(handle);
    this.hooks.onHandleChange?.(handle);
    logger.debug({ pid: child.pid, command }, `Started ${handle.id}`);
    return handle;
  }

  private move(handle: RunHandle, state: RunState): void {
    handle.transition(state);
    this.hooks.onHandleChange?.(handle);
  }

  private degrade(flow: FlowAssignment, reason: FlowDegradedReason, detail: string, atSecond: number): void {
    if (this.degraded.has(flow.flowId)) {
      return;
    }
    const record: FlowDegraded = { flowId: flow.flowId, reason, detail, atSecond };
    this.degraded.set(flow.flowId, record);
    logger.warn(`Flow ${flow.flowId} degraded at ${atSecond}s: ${detail}`);
    this.hooks.onFlowDegraded?.(record);
  }

  private serverCommand(address: string, certs: CertBundle): string[] {
    return [
      ...this.options.serverCommand,
      '--host', address,
      '--port', String(this.options.port),
      '--cert', certs.certPath,
      '--key', certs.keyPath,
      '--log-level', this.options.processLogLevel,
    ];
  }

  private clientCommand(serverAddress: string, flow: FlowAssignment, durationSeconds: number): string[] {
    const command = [
      ...this.options.clientCommand,
      '--host', serverAddress,
      '--port', String(this.options.port),
      '--duration', String(durationSeconds),
      '--pattern', this.options.pattern,
      '--metrics-file', flowMetricsPath(this.options.logDir, flow),
      '--no-verify',
      '--log-level', this.options.processLogLevel,
    ];
    if (this.options.ratePerFlowMbps !== null) {
      command.push('--rate', String(this.options.ratePerFlowMbps));
    }
    return command;
  }
}
