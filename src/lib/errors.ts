// src/lib/errors.ts

export type PipelineErrorKind =
  | "ExtractionError"
  | "PreprocessingUnavailable"
  | "EmbeddingProviderError"
  | "EmbeddingDimensionError"
  | "DimensionReductionError"
  | "IndexProvisioningError"
  | "VectorDeletionError"
  | "AnswerGenerationError"
  | "ConfigurationError"
  | "NoDocumentLoaded"
  | "UploadSuperseded"
  | "InvalidRequestError";

const HTTP_STATUS: Record<PipelineErrorKind, number> = {
  ExtractionError: 422,
  PreprocessingUnavailable: 500,
  EmbeddingProviderError: 502,
  EmbeddingDimensionError: 500,
  DimensionReductionError: 500,
  IndexProvisioningError: 502,
  VectorDeletionError: 502,
  AnswerGenerationError: 502,
  ConfigurationError: 500,
  NoDocumentLoaded: 409,
  UploadSuperseded: 409,
  InvalidRequestError: 400,
};

/**
 * Base class for every failure the pipeline reports. `kind` is the
 * discriminant callers switch on; the original failure, if any, is kept as
 * `cause`.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get httpStatus(): number {
    return HTTP_STATUS[this.kind];
  }
}

export class ExtractionError extends PipelineError {
  readonly kind = "ExtractionError";
}

export class PreprocessingUnavailable extends PipelineError {
  readonly kind = "PreprocessingUnavailable";
}

export class EmbeddingProviderError extends PipelineError {
  readonly kind = "EmbeddingProviderError";
}

export class EmbeddingDimensionError extends PipelineError {
  readonly kind = "EmbeddingDimensionError";
}

export class DimensionReductionError extends PipelineError {
  readonly kind = "DimensionReductionError";
}

export class IndexProvisioningError extends PipelineError {
  readonly kind = "IndexProvisioningError";
}

export class VectorDeletionError extends PipelineError {
  readonly kind = "VectorDeletionError";
}

export class AnswerGenerationError extends PipelineError {
  readonly kind = "AnswerGenerationError";
}

export class ConfigurationError extends PipelineError {
  readonly kind = "ConfigurationError";
}

export class NoDocumentLoaded extends PipelineError {
  readonly kind = "NoDocumentLoaded";
}

export class UploadSuperseded extends PipelineError {
  readonly kind = "UploadSuperseded";
}

export class InvalidRequestError extends PipelineError {
  readonly kind = "InvalidRequestError";
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Pass pipeline errors through untouched, wrap anything else with `wrap`.
 */
export function asPipelineError(
  err: unknown,
  wrap: (message: string, cause: unknown) => PipelineError
): PipelineError {
  if (isPipelineError(err)) return err;
  return wrap(errorMessage(err), err);
}
