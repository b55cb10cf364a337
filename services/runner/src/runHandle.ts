import { now, sleep, type HostRole } from '@netexp/common';
import type { ProcessExit, ProcessHandle } from './backend.js';

export type RunState = 'starting' | 'ready' | 'running' | 'degraded' | 'terminated';

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  starting: ['ready', 'running', 'terminated'],
  ready: ['running', 'degraded', 'terminated'],
  running: ['degraded', 'terminated'],
  degraded: ['terminated'],
  terminated: [],
};

export class InvalidTransitionError extends Error {}

export interface RunHandleSnapshot {
  id: string;
  role: HostRole;
  hostId: string;
  pid: number;
  state: RunState;
  startedAt: number;
  exitedAt: number | null;
}

/**
 * One launched client or server process. Only the orchestrator moves a
 * handle between states; everyone else reads it.
 */
export class RunHandle {
  private current: RunState = 'starting';
  private exitInfo: ProcessExit | null = null;
  private exitTime: number | null = null;
  readonly exited: Promise<ProcessExit>;

  constructor(
    readonly role: HostRole,
    readonly hostId: string,
    readonly logPath: string,
    private readonly process: ProcessHandle,
    readonly startedAt: number = now()
  ) {
    this.exited = process.exited.then((exit) => {
      this.exitInfo = exit;
      this.exitTime = now();
      return exit;
    });
  }

  get id(): string {
    return `${this.hostId}:${this.role}`;
  }

  get pid(): number {
    return this.process.pid;
  }

  get state(): RunState {
    return this.current;
  }

  get hasExited(): boolean {
    return this.exitInfo !== null;
  }

  get exit(): ProcessExit | null {
    return this.exitInfo;
  }

  get exitedAt(): number | null {
    return this.exitTime;
  }

  canTransition(to: RunState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: RunState): void {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(`${this.id} cannot move from ${this.current} to ${to}`);
    }
    this.current = to;
  }

  signal(signal: NodeJS.Signals): boolean {
    return this.process.kill(signal);
  }

  /** True if the process exits within `ms`. Gives up early, returning false, once `signal` aborts. */
  async waitForExit(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (this.hasExited) {
      return true;
    }
    if (signal?.aborted) {
      return false;
    }
    const timer = new AbortController();
    const stop = (): void => timer.abort();
    signal?.addEventListener('abort', stop, { once: true });
    try {
      return await Promise.race([
        this.exited.then(() => true),
        sleep(ms, timer.signal).then(() => false),
      ]);
    } finally {
      signal?.removeEventListener('abort', stop);
      timer.abort();
    }
  }

  snapshot(): RunHandleSnapshot {
    return {
      id: this.id,
      role: this.role,
      hostId: this.hostId,
      pid: this.pid,
      state: this.current,
      startedAt: this.startedAt,
      exitedAt: this.exitTime,
    };
  }
}

/** e.g. `exited with code 1` or `was killed by SIGKILL`. */
export function describeExit(handle: RunHandle): string {
  const exit = handle.exit;
  if (!exit) {
    return 'exited';
  }
  return exit.signal ? `was killed by ${exit.signal}` : `exited with code ${exit.code}`;
}
