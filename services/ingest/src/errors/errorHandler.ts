import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import type { HttpError } from './httpError';
import { mapToHttpError } from './mapper';

export type ErrorBody = {
  statusCode: number;
  error: string;
  message: string;
  details?: unknown;
};

export type IngestErrorHandler = (
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
) => void;

export function toErrorBody(httpError: HttpError): ErrorBody {
  const body: ErrorBody = {
    statusCode: httpError.statusCode,
    error: httpError.code,
    message: httpError.message
  };
  if (httpError.details !== undefined) {
    body.details = httpError.details;
  }
  return body;
}

function logMappedError(request: FastifyRequest, error: Error, httpError: HttpError): void {
  if (httpError.statusCode >= 500) {
    request.log.error({ err: error, code: httpError.code }, 'request failed');
    return;
  }
  if (httpError.statusCode === 409) {
    // Lost races and refused moves are expected under concurrency but worth seeing.
    request.log.warn({ code: httpError.code, details: httpError.details }, error.message);
    return;
  }
  request.log.debug({ code: httpError.code }, error.message);
}

export function createHttpErrorHandler(): IngestErrorHandler {
  return (error, request, reply) => {
    const httpError = mapToHttpError(error);
    logMappedError(request, error, httpError);

    if (reply.sent) {
      return;
    }
    reply.status(httpError.statusCode).send(toErrorBody(httpError));
  };
}
