/**
 * Error codes for conditions the pipeline cannot turn into a failure value.
 *
 * Expected failures (bad model output, unknown company, broken store file)
 * are reported as values by the stages and the store; this error type is for
 * configuration and wiring problems and for the tool layer.
 *
 * @module types/errors
 */

export type PipelineErrorCode =
  | 'CONFIG_INVALID'
  | 'PROVIDER_UNAVAILABLE'
  | 'COLLABORATOR_FAILURE'
  | 'UNKNOWN_TOOL'
  | 'INVALID_ARGUMENTS';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: PipelineErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.context = context;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
