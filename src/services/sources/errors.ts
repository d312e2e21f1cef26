import type { SourceName } from '../../types/therapy';

export class SourceUnavailableError extends Error {
  readonly code = 'source_unavailable' as const;

  constructor(
    readonly sourceName: SourceName,
    message: string,
  ) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

export class MalformedRecordError extends Error {
  readonly code = 'malformed_record' as const;

  constructor(
    readonly sourceName: SourceName,
    message: string,
    readonly recordRef: string | null = null,
  ) {
    super(message);
    this.name = 'MalformedRecordError';
  }
}
