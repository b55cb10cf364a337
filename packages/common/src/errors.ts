export type ExperimentErrorKind =
  | 'topology'
  | 'provisioning'
  | 'server_start'
  | 'sampler'
  | 'interrupted'
  | 'teardown';

/** Base of every error that aborts an experiment. */
export abstract class ExperimentError extends Error {
  abstract readonly kind: ExperimentErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TopologyError extends ExperimentError {
  readonly kind = 'topology';
}

export class ProvisioningError extends ExperimentError {
  readonly kind = 'provisioning';
}

export class ServerStartError extends ExperimentError {
  readonly kind = 'server_start';

  constructor(
    readonly hostIds: readonly string[],
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class SamplerError extends ExperimentError {
  readonly kind = 'sampler';

  constructor(
    readonly interfaceId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class InterruptedError extends ExperimentError {
  readonly kind = 'interrupted';

  constructor(readonly signal: string = 'SIGINT') {
    super(`Experiment interrupted by ${signal}`);
  }
}

export class TeardownError extends ExperimentError {
  readonly kind = 'teardown';

  constructor(
    readonly errors: readonly unknown[],
    message: string
  ) {
    super(message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
