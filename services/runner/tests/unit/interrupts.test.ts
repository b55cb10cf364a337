import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { abortOnInterrupt } from '../../src/interrupts.js';

describe('abortOnInterrupt', () => {
  let release: () => void = () => undefined;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    release();
    vi.restoreAllMocks();
  });

  it('aborts with the first signal and keeps handling later ones', () => {
    const before = process.listenerCount('SIGINT');
    const controller = new AbortController();
    release = abortOnInterrupt(controller, 'tearing down...');

    process.emit('SIGTERM', 'SIGTERM');
    process.emit('SIGINT', 'SIGINT');

    expect(controller.signal.reason).toBe('SIGTERM');
    expect(process.listenerCount('SIGINT')).toBe(before + 1);
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it('removes its handlers when released', () => {
    const sigint = process.listenerCount('SIGINT');
    const sigterm = process.listenerCount('SIGTERM');
    release = abortOnInterrupt(new AbortController(), 'tearing down...');

    release();

    expect(process.listenerCount('SIGINT')).toBe(sigint);
    expect(process.listenerCount('SIGTERM')).toBe(sigterm);
  });
});
