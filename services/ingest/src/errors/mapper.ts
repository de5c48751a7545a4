import { ZodError } from 'zod';
import { EnvConfigError } from '@aquifer/shared';
import { HttpError, toHttpError } from './httpError';
import {
  DatasetNotFoundError,
  IngestError,
  InferenceUnavailableError,
  InvalidTransitionError,
  InvalidUploadError,
  MappingValidationError,
  RawSourceMissingError,
  RetryNotAllowedError,
  StaleTransitionError
} from './ingestErrors';

export function mapToHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) {
    return err;
  }

  if (err instanceof DatasetNotFoundError) {
    return new HttpError(404, 'not_found', err.message);
  }

  if (err instanceof MappingValidationError) {
    return new HttpError(422, 'validation_error', err.message, { issues: err.issues });
  }

  if (err instanceof ZodError) {
    return new HttpError(400, 'bad_request', 'Request payload is invalid', { issues: err.issues });
  }

  if (err instanceof InvalidUploadError) {
    return new HttpError(400, 'invalid_upload', err.message, { problems: err.problems });
  }

  if (err instanceof StaleTransitionError) {
    return new HttpError(409, 'stale_transition', err.message, { expected: err.expected, actual: err.actual });
  }

  if (err instanceof InvalidTransitionError) {
    return new HttpError(409, 'invalid_transition', err.message, { from: err.from, to: err.to });
  }

  if (err instanceof RetryNotAllowedError) {
    return new HttpError(409, 'retry_not_allowed', err.message);
  }

  if (err instanceof InferenceUnavailableError) {
    return new HttpError(503, 'inference_unavailable', err.message);
  }

  if (err instanceof RawSourceMissingError) {
    return new HttpError(422, 'raw_source_missing', err.message);
  }

  if (err instanceof IngestError) {
    return new HttpError(422, 'ingest_failed', err.message, {
      code: err.code,
      retryable: err.retryable,
      ...(err.details === undefined ? {} : { details: err.details })
    });
  }

  if (err instanceof EnvConfigError) {
    return new HttpError(500, 'configuration_error', err.message, { issues: err.issues });
  }

  const httpLike = toHttpError(err);
  if (httpLike) {
    return httpLike;
  }

  const message = err instanceof Error ? err.message : 'Unknown error';
  return new HttpError(500, 'internal_error', message);
}
