import {
  SamplerError,
  bytesToMbps,
  describeError,
  now,
  round,
  type CounterDirection,
  type MetricSample,
} from '@netexp/common';
import type { EmulationBackend } from './backend.js';
import { createLogger } from './logger.js';
import type { MonitoredInterface } from './topologyBuilder.js';

const logger = createLogger('sampler');

export interface InterfaceTotal {
  interfaceId: string;
  direction: CounterDirection;
  bottleneck: boolean;
  bytes: number;
}

export interface InterfaceMeasurement {
  /** Mbps per interface, one sample per completed tick. */
  samples: MetricSample[];
  /** Bytes counted between the baseline and the final read. */
  totals: InterfaceTotal[];
  missedTicks: number;
}

export interface SamplerOptions {
  tickMs: number;
  onSample?: (samples: readonly MetricSample[]) => void;
  /** Called once when a counter cannot be read; sampling stops afterwards. */
  onFatal?: (error: SamplerError) => void;
}

/**
 * Reads byte counters at `start + k * tickMs`. A tick that fires late, or while
 * the previous read is still outstanding, is skipped and counted rather than
 * shifting the schedule.
 */
export class InterfaceSampler {
  private startedAt = 0;
  private baseline: number[] = [];
  private last: number[] = [];
  private lastReadAt = 0;
  private samples: MetricSample[] = [];
  private missed = 0;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private fatal: SamplerError | null = null;
  private running = false;

  constructor(
    private readonly backend: EmulationBackend,
    private readonly targets: readonly MonitoredInterface[],
    private readonly options: SamplerOptions
  ) {}

  get missedTicks(): number {
    return this.missed;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(startedAt: number = now()): Promise<void> {
    if (this.running) {
      throw new Error('Sampler already started');
    }

    this.startedAt = startedAt;
    this.samples = [];
    this.missed = 0;
    this.fatal = null;

    this.baseline = await this.readAll();
    this.last = [...this.baseline];
    this.lastReadAt = now();
    this.running = true;
    logger.debug(`Sampling ${this.targets.length} interfaces every ${this.options.tickMs}ms`);
    this.schedule(1);
  }

  async stop(): Promise<InterfaceMeasurement> {
    this.cancelTimer();
    this.running = false;
    if (this.inFlight) {
      await this.inFlight;
    }
    if (this.fatal) {
      throw this.fatal;
    }

    const final = await this.readAll();
    const totals = this.targets.map((target, index) => ({
      interfaceId: target.interfaceId,
      direction: target.direction,
      bottleneck: target.bottleneck,
      bytes: Math.max(0, final[index] - this.baseline[index]),
    }));

    if (this.missed > 0) {
      logger.warn(`${this.missed} sampler ticks were skipped`);
    }
    return { samples: [...this.samples], totals, missedTicks: this.missed };
  }

  dispose(): void {
    this.cancelTimer();
    this.running = false;
  }

  private schedule(tick: number): void {
    if (!this.running) {
      return;
    }

    let next = tick;
    while (this.startedAt + next * this.options.tickMs < now() - this.options.tickMs / 2) {
      this.skip(next, 'timer fired late');
      next++;
    }

    const delay = Math.max(0, this.startedAt + next * this.options.tickMs - now());
    this.timer = setTimeout(() => {
      this.timer = null;
      if (this.inFlight) {
        this.skip(next, 'previous read still in flight');
        this.schedule(next + 1);
        return;
      }
      this.inFlight = this.tick(next).finally(() => {
        this.inFlight = null;
      });
      this.schedule(next + 1);
    }, delay);
  }

  private async tick(tick: number): Promise<void> {
    let values: number[];
    try {
      values = await this.readAll();
    } catch (error) {
      this.fail(error);
      return;
    }

    const readAt = now();
    const elapsedSeconds = (readAt - this.lastReadAt) / 1000;
    const timestamp = round((tick * this.options.tickMs) / 1000, 3);

    const batch = this.targets.map((target, index): MetricSample => {
      const delta = Math.max(0, values[index] - this.last[index]);
      return Object.freeze({
        timestampSecondsSinceStart: timestamp,
        interfaceOrFlowId: target.interfaceId,
        value: round(bytesToMbps(delta, elapsedSeconds), 3),
      });
    });

    this.last = values;
    this.lastReadAt = readAt;
    this.samples.push(...batch);
    this.options.onSample?.(batch);
  }

  private skip(tick: number, reason: string): void {
    this.missed++;
    logger.warn(`Skipped sampler tick ${tick}: ${reason}`);
  }

  private fail(error: unknown): void {
    if (this.fatal) {
      return;
    }
    this.fatal =
      error instanceof SamplerError
        ? error
        : new SamplerError('unknown', `Interface sampling failed: ${describeError(error)}`, { cause: error });
    this.dispose();
    logger.error({ err: this.fatal }, 'Interface sampling stopped');
    this.options.onFatal?.(this.fatal);
  }

  private async readAll(): Promise<number[]> {
    return Promise.all(
      this.targets.map(async (target) => {
        try {
          return await this.backend.readInterfaceCounter(target.interfaceId, target.direction);
        } catch (error) {
          throw new SamplerError(
            target.interfaceId,
            `Cannot read ${target.direction} counter of ${target.interfaceId}: ${describeError(error)}`,
            { cause: error }
          );
        }
      })
    );
  }

  private cancelTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
