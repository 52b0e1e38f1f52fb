/** A source could not be reached at all during a scan. */
export class SourceUnavailableError extends Error {
  constructor(
    readonly sourceId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SourceUnavailableError';
  }
}

/** A raw record lacks a field the aggregator needs to key it. */
export class MalformedRecordError extends Error {
  constructor(
    readonly sourceId: string,
    readonly field: string,
  ) {
    super(`Record from ${sourceId} is missing a valid ${field}`);
    this.name = 'MalformedRecordError';
  }
}
