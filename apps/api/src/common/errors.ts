export type SourceFailureReason = 'unavailable' | 'timeout' | 'malformed-payload';

/**
 * A collaborator produced no usable data for this run. The scan treats the
 * source as absent and keeps going.
 */
export class SourceUnavailableError extends Error {
  constructor(
    readonly source: string,
    readonly reason: SourceFailureReason,
    message: string,
  ) {
    super(`${source} unavailable (${reason}): ${message}`);
    this.name = 'SourceUnavailableError';
  }
}

export class InsufficientHistoryError extends Error {
  constructor(
    readonly symbol: string,
    readonly samples: number,
    readonly required: number,
  ) {
    super(`Insufficient data for ${symbol}: ${samples} samples (need ${required}+)`);
    this.name = 'InsufficientHistoryError';
  }
}

export class MalformedRecordError extends Error {
  constructor(
    readonly source: string,
    readonly index: number,
    readonly problems: string[],
  ) {
    super(`${source} record #${index} skipped: ${problems.join('; ')}`);
    this.name = 'MalformedRecordError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
