import { TopologyError, describeError } from '@netexp/common';
import type { EmulationBackend } from './backend.js';

const leases = new WeakMap<EmulationBackend, BackendLease>();

/**
 * Exclusive claim on an emulation backend. Only one experiment may hold it;
 * a second `acquire` fails immediately instead of waiting.
 */
export class BackendLease {
  private released = false;

  private constructor(
    readonly backend: EmulationBackend,
    readonly owner: string
  ) {}

  static async acquire(backend: EmulationBackend, owner: string): Promise<BackendLease> {
    const current = leases.get(backend);
    if (current) {
      throw new TopologyError(
        `Emulation backend is already in use by ${current.owner}; run experiments one at a time`
      );
    }

    const lease = new BackendLease(backend, owner);
    leases.set(backend, lease);

    let residual: boolean;
    try {
      residual = await backend.hasResidualState();
    } catch (error) {
      lease.release();
      throw new TopologyError(`Could not inspect emulation backend: ${describeError(error)}`, { cause: error });
    }

    if (residual) {
      lease.release();
      throw new TopologyError(
        'Emulation backend still holds objects from an earlier topology; remove them before starting'
      );
    }
    return lease;
  }

  get isReleased(): boolean {
    return this.released;
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    if (leases.get(this.backend) === this) {
      leases.delete(this.backend);
    }
  }
}
