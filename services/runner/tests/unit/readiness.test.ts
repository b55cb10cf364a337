import { appendFile, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NotReadyError, waitForReady } from '../../src/readiness.js';
import { RunHandle } from '../../src/runHandle.js';
import { FakeProcess } from '../fakes.js';

describe('waitForReady', () => {
  let dir: string;
  let logPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'netexp-ready-'));
    logPath = join(dir, 'h2_server.log');
    await writeFile(logPath, '');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('treats a server that survives the settle window as ready', async () => {
    const run = new RunHandle('server', 'h2', logPath, new FakeProcess());
    await expect(waitForReady(run, { pattern: null, timeoutMs: 1000, settleMs: 20 })).resolves.toBeUndefined();
  });

  it('fails when the server dies during the settle window', async () => {
    const process = new FakeProcess();
    const run = new RunHandle('server', 'h2', logPath, process);
    setTimeout(() => process.exit(1), 5);

    await expect(waitForReady(run, { pattern: null, timeoutMs: 1000, settleMs: 500 })).rejects.toThrow(
      'h2:server exited with code 1 before it was ready'
    );
  });

  it('waits for the ready line in the log', async () => {
    const run = new RunHandle('server', 'h2', logPath, new FakeProcess());
    setTimeout(() => {
      appendFile(logPath, 'INFO listening on 10.0.0.3:4433\n').catch(() => undefined);
    }, 30);

    await expect(
      waitForReady(run, { pattern: /listening on/, timeoutMs: 2000, settleMs: 0, pollMs: 10 })
    ).resolves.toBeUndefined();
  });

  it('gives up after the timeout', async () => {
    const run = new RunHandle('server', 'h2', logPath, new FakeProcess());

    const attempt = waitForReady(run, { pattern: /listening on/, timeoutMs: 60, settleMs: 0, pollMs: 10 });

    await expect(attempt).rejects.toBeInstanceOf(NotReadyError);
    await expect(attempt).rejects.toThrow('printed nothing matching /listening on/ within 60ms');
  });

  it('returns as soon as the run is interrupted while waiting for the ready line', async () => {
    const run = new RunHandle('server', 'h2', logPath, new FakeProcess());
    const abort = new AbortController();
    setTimeout(() => abort.abort('SIGINT'), 20);
    const started = Date.now();

    await waitForReady(run, { pattern: /listening on/, timeoutMs: 5000, settleMs: 0, pollMs: 10 }, abort.signal);

    expect(abort.signal.aborted).toBe(true);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('cuts the settle window short when interrupted', async () => {
    const run = new RunHandle('server', 'h2', logPath, new FakeProcess());
    const abort = new AbortController();
    setTimeout(() => abort.abort('SIGINT'), 20);
    const started = Date.now();

    await waitForReady(run, { pattern: null, timeoutMs: 5000, settleMs: 5000 }, abort.signal);

    expect(Date.now() - started).toBeLessThan(1000);
  });
});
