import { describe, expect, it } from 'vitest';
import { TopologyError } from '@netexp/common';
import { BackendLease } from '../../src/backendLease.js';
import { FakeBackend } from '../fakes.js';

describe('BackendLease', () => {
  it('fails fast while another experiment holds the backend', async () => {
    const backend = new FakeBackend();
    const first = await BackendLease.acquire(backend, 'first');

    await expect(BackendLease.acquire(backend, 'second')).rejects.toThrow('already in use by first');

    first.release();
    const second = await BackendLease.acquire(backend, 'second');
    expect(second.isReleased).toBe(false);
    second.release();
  });

  it('refuses a backend with leftovers from an earlier run', async () => {
    const backend = new FakeBackend();
    backend.residual = true;

    await expect(BackendLease.acquire(backend, 'run')).rejects.toBeInstanceOf(TopologyError);

    backend.residual = false;
    const lease = await BackendLease.acquire(backend, 'run');
    lease.release();
  });

  it('can be released more than once', async () => {
    const lease = await BackendLease.acquire(new FakeBackend(), 'run');
    lease.release();
    lease.release();
    expect(lease.isReleased).toBe(true);
  });

  it('leases each backend separately', async () => {
    const a = await BackendLease.acquire(new FakeBackend(), 'a');
    const b = await BackendLease.acquire(new FakeBackend(), 'b');
    a.release();
    b.release();
  });
});
