export type SimulationErrorCode = 'INVALID_STATE' | 'NON_FINITE_VALUE' | 'EMPTY_POPULATION';

export class SimulationError extends Error {
  constructor(
    message: string,
    public readonly code: SimulationErrorCode,
    public readonly entityId?: string
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}

export class MetricPublishError extends Error {
  constructor(
    message: string,
    public readonly metric: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'MetricPublishError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
