export type AnalysisErrorCode =
  | 'MALFORMED_RECORD'
  | 'MISSING_PRIOR_SNAPSHOT'
  | 'PERSISTENCE_FAILURE'
  | 'NOTIFICATION_FAILURE'
  | 'FETCH_FAILURE'
  | 'CONFIG_INVALID';

export class AnalysisError extends Error {
  constructor(
    public code: AnalysisErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AnalysisError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
