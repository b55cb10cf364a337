import { readFile } from 'fs/promises';
import { now, sleep } from '@netexp/common';
import { describeExit, type RunHandle } from './runHandle.js';

export interface ReadinessOptions {
  /** Line the server prints once it listens. Without one, surviving `settleMs` counts as ready. */
  pattern: RegExp | null;
  timeoutMs: number;
  settleMs: number;
  pollMs?: number;
}

export class NotReadyError extends Error {}

async function readLog(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch {
    return '';
  }
}

/**
 * Resolves once the server is ready, or as soon as `signal` aborts; callers
 * check `signal.aborted` afterwards.
 */
export async function waitForReady(handle: RunHandle, options: ReadinessOptions, signal?: AbortSignal): Promise<void> {
  const { pattern, timeoutMs } = options;

  if (!pattern) {
    const exited = await handle.waitForExit(Math.min(options.settleMs, timeoutMs), signal);
    if (exited) {
      throw new NotReadyError(`${handle.id} ${describeExit(handle)} before it was ready`);
    }
    return;
  }

  const pollMs = options.pollMs ?? 100;
  const deadline = now() + timeoutMs;

  while (now() < deadline) {
    if (signal?.aborted) {
      return;
    }
    if (pattern.test(await readLog(handle.logPath))) {
      return;
    }
    if (handle.hasExited) {
      throw new NotReadyError(`${handle.id} ${describeExit(handle)} before it was ready`);
    }
    await sleep(Math.min(pollMs, Math.max(0, deadline - now())), signal);
  }

  if (signal?.aborted || pattern.test(await readLog(handle.logPath))) {
    return;
  }
  throw new NotReadyError(`${handle.id} printed nothing matching ${pattern} within ${timeoutMs}ms`);
}
