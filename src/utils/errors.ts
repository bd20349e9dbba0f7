/**
 * Non-2xx response from an upstream endpoint
 */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`Request to ${url} returned HTTP ${status}`);
    this.name = 'HttpStatusError';
  }
}

export type ListingFileErrorKind = 'missing' | 'malformed';

/**
 * A listing file that a job depends on is absent or unreadable.
 * Always fatal: it means the jobs were run out of order.
 */
export class ListingFileError extends Error {
  constructor(
    readonly kind: ListingFileErrorKind,
    readonly path: string,
    detail?: string
  ) {
    super(
      kind === 'missing'
        ? `Listing file not found: ${path}. Run the listing collector first.`
        : `Listing file ${path} is malformed${detail ? `: ${detail}` : ''}`
    );
    this.name = 'ListingFileError';
  }
}

/**
 * Identifier that cannot be used as a cache file name
 */
export class InvalidJobIdError extends Error {
  constructor(readonly jobId: string) {
    super(`Job id ${JSON.stringify(jobId)} is not a valid cache file name`);
    this.name = 'InvalidJobIdError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
