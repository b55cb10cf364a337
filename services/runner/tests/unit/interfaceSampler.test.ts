import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SamplerError, type MetricSample } from '@netexp/common';
import { InterfaceSampler } from '../../src/interfaceSampler.js';
import type { MonitoredInterface } from '../../src/topologyBuilder.js';
import { FakeBackend } from '../fakes.js';

const targets: MonitoredInterface[] = [
  { interfaceId: 's1-eth21', node: 's1', peer: 's2', direction: 'tx', bottleneck: true },
  { interfaceId: 's2-eth21', node: 's2', peer: 's1', direction: 'rx', bottleneck: true },
];

describe('InterfaceSampler', () => {
  let backend: FakeBackend;

  beforeEach(() => {
    vi.useFakeTimers();
    backend = new FakeBackend();
    backend.setCounter('s1-eth21', 'tx', 500);
    backend.setCounter('s2-eth21', 'rx', 500);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('turns counter deltas into Mbps once per tick', async () => {
    const batches: Array<readonly MetricSample[]> = [];
    const sampler = new InterfaceSampler(backend, targets, {
      tickMs: 1000,
      onSample: (samples) => batches.push(samples),
    });

    await sampler.start(Date.now());
    backend.setCounter('s1-eth21', 'tx', 1_250_500);
    backend.setCounter('s2-eth21', 'rx', 1_000_500);
    await vi.advanceTimersByTimeAsync(1000);
    backend.setCounter('s1-eth21', 'tx', 2_500_500);
    backend.setCounter('s2-eth21', 'rx', 1_500_500);
    await vi.advanceTimersByTimeAsync(1000);

    const measurement = await sampler.stop();

    expect(measurement.samples).toEqual([
      { timestampSecondsSinceStart: 1, interfaceOrFlowId: 's1-eth21', value: 10 },
      { timestampSecondsSinceStart: 1, interfaceOrFlowId: 's2-eth21', value: 8 },
      { timestampSecondsSinceStart: 2, interfaceOrFlowId: 's1-eth21', value: 10 },
      { timestampSecondsSinceStart: 2, interfaceOrFlowId: 's2-eth21', value: 4 },
    ]);
    expect(measurement.totals).toEqual([
      { interfaceId: 's1-eth21', direction: 'tx', bottleneck: true, bytes: 2_500_000 },
      { interfaceId: 's2-eth21', direction: 'rx', bottleneck: true, bytes: 1_500_000 },
    ]);
    expect(measurement.missedTicks).toBe(0);
    expect(batches).toHaveLength(2);
  });

  it('never reports a negative rate when a counter goes backwards', async () => {
    const sampler = new InterfaceSampler(backend, targets, { tickMs: 1000 });

    await sampler.start(Date.now());
    backend.setCounter('s1-eth21', 'tx', 100);
    await vi.advanceTimersByTimeAsync(1000);
    const measurement = await sampler.stop();

    expect(measurement.samples[0].value).toBe(0);
    expect(measurement.totals[0].bytes).toBe(0);
  });

  it('skips a tick while the previous read is still running', async () => {
    const sampler = new InterfaceSampler(backend, targets, { tickMs: 1000 });

    await sampler.start(Date.now());
    backend.readDelayMs = 1500;
    await vi.advanceTimersByTimeAsync(2100);
    expect(sampler.missedTicks).toBe(1);

    backend.readDelayMs = 0;
    await vi.advanceTimersByTimeAsync(1000);
    const measurement = await sampler.stop();

    expect(measurement.samples.map((sample) => sample.timestampSecondsSinceStart)).toEqual([1, 1, 3, 3]);
    expect(measurement.missedTicks).toBe(1);
  });

  it('stops and reports when a counter cannot be read', async () => {
    const failures: SamplerError[] = [];
    const sampler = new InterfaceSampler(backend, targets, {
      tickMs: 1000,
      onFatal: (error) => failures.push(error),
    });

    await sampler.start(Date.now());
    backend.failingCounters.add('s2-eth21');
    await vi.advanceTimersByTimeAsync(3000);

    expect(failures).toHaveLength(1);
    expect(failures[0]).toBeInstanceOf(SamplerError);
    expect(failures[0].interfaceId).toBe('s2-eth21');
    expect(sampler.isRunning).toBe(false);
    await expect(sampler.stop()).rejects.toBe(failures[0]);
  });

  it('fails to start when the baseline cannot be read', async () => {
    backend.failingCounters.add('s1-eth21');
    const sampler = new InterfaceSampler(backend, targets, { tickMs: 1000 });

    await expect(sampler.start(Date.now())).rejects.toThrow('Cannot read tx counter of s1-eth21');
  });
});
