import type { CounterDirection } from '@netexp/common';

export interface LinkShaping {
  bandwidthMbps: number;
  delay: string;
  lossPercent: number;
  maxQueuePackets: number;
}

/** Interface names created for a link, one per endpoint. */
export interface CreatedLink {
  interfaceA: string;
  interfaceB: string;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ProcessHandle {
  readonly pid: number;
  /** Settles once the process has exited; never rejects. */
  readonly exited: Promise<ProcessExit>;
  kill(signal: NodeJS.Signals): boolean;
}

export interface ExecOptions {
  /** stdout and stderr are appended here. */
  logPath: string;
}

/**
 * Primitives the experiment core needs from a network emulator. The backend
 * is process-wide state: one topology at a time, released by `destroyAll`.
 */
export interface EmulationBackend {
  createHost(id: string, address: string): Promise<void>;
  createSwitch(id: string): Promise<void>;
  createLink(endpointA: string, endpointB: string, shaping: LinkShaping): Promise<CreatedLink>;
  execInHost(hostId: string, command: readonly string[], options: ExecOptions): Promise<ProcessHandle>;
  readInterfaceCounter(interfaceId: string, direction: CounterDirection): Promise<number>;
  /** Best-effort check for objects left behind by another run. */
  hasResidualState(): Promise<boolean>;
  destroyAll(): Promise<void>;
}
