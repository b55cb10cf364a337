import axios from 'axios';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ExperimentParams } from '@netexp/common';
import { startStatusServer, stopStatusServer } from '../../src/statusServer.js';
import { StatusStore, type ExperimentStatus } from '../../src/statusStore.js';

const params: ExperimentParams = {
  topology: 'dumbbell',
  bandwidthMbps: 15,
  delay: '2ms',
  lossPercent: 2,
  durationSeconds: 5,
  hostCount: 4,
  accessBandwidthMbps: 100,
  accessDelay: '1ms',
  maxQueuePackets: 100,
};

describe('StatusStore', () => {
  it('tracks the latest rate per interface', () => {
    const store = new StatusStore();
    store.begin(params);
    store.trafficStarted(1000);
    store.recordSamples([
      { timestampSecondsSinceStart: 1, interfaceOrFlowId: 's1-eth3', value: 12.5 },
      { timestampSecondsSinceStart: 1, interfaceOrFlowId: 's2-eth3', value: 11 },
    ]);
    store.recordSamples([{ timestampSecondsSinceStart: 2, interfaceOrFlowId: 's1-eth3', value: 14 }]);

    const status = store.snapshot();
    expect(status.phase).toBe('traffic');
    expect(status.latestRates).toEqual({ 's1-eth3': 14, 's2-eth3': 11 });
    expect(status.lastSampleSecond).toBe(2);
  });

  it('records each degraded flow once', () => {
    const store = new StatusStore();
    store.recordDegraded({ flowId: 'h0-h2', reason: 'early_exit', detail: 'client exited with code 1' });
    store.recordDegraded({ flowId: 'h0-h2', reason: 'log_missing', detail: 'missing' });

    expect(store.snapshot().degradedFlows).toEqual([
      { flowId: 'h0-h2', reason: 'early_exit', detail: 'client exited with code 1' },
    ]);
  });

  it('does not let callers mutate the stored status', () => {
    const store = new StatusStore();
    store.snapshot().degradedFlows.push({ flowId: 'x', reason: 'no_progress', detail: '' });

    expect(store.snapshot().degradedFlows).toEqual([]);
  });

  it('keeps the error message when a run fails', () => {
    const store = new StatusStore();
    store.begin(params);
    store.fail(new Error('Servers not ready on h2'));

    expect(store.snapshot()).toMatchObject({ phase: 'failed', error: 'Servers not ready on h2' });
  });
});

describe('status server', () => {
  let store: StatusStore;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    store = new StatusStore();
    server = await startStatusServer(store, 0);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('status server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await stopStatusServer(server);
  });

  it('answers health checks', async () => {
    const response = await axios.get(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ status: 'ok' });
  });

  it('reports the experiment in progress', async () => {
    store.begin(params);
    store.setPhase('starting_servers');

    const response = await axios.get<ExperimentStatus>(`${baseUrl}/experiment`);

    expect(response.data.phase).toBe('starting_servers');
    expect(response.data.experiment).toEqual(params);
    expect(response.data.handles).toEqual([]);
  });
});
