export type ExternalService = 'indexer' | 'download-client';

/**
 * Failure talking to an indexer or download client. Callers treat it as soft:
 * the source is skipped for the current cycle.
 */
export class ExternalServiceError extends Error {
  constructor(
    readonly service: ExternalService,
    readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExternalServiceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
