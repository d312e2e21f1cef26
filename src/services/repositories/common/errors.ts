import type { TherapyItemKey } from '../../../types/therapy';

export class RepositoryValidationError extends Error {
  readonly code = 'validation_failed' as const;

  constructor(message: string) {
    super(message);
    this.name = 'RepositoryValidationError';
  }
}

export class SinkWriteError extends Error {
  readonly code = 'sink_write_failed' as const;

  constructor(
    message: string,
    readonly key: TherapyItemKey,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'SinkWriteError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error ?? 'Unknown error');
}
