export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

type HttpLike = {
  statusCode: unknown;
  code: unknown;
  message?: unknown;
  details?: unknown;
};

function isHttpLike(err: unknown): err is HttpLike {
  return typeof err === 'object' && err !== null && 'statusCode' in err && 'code' in err;
}

export function toHttpError(err: unknown): HttpError | null {
  if (err instanceof HttpError) {
    return err;
  }
  if (isHttpLike(err)) {
    const statusCode = typeof err.statusCode === 'number' ? err.statusCode : 500;
    const code = typeof err.code === 'string' ? err.code : 'unknown_error';
    const message = typeof err.message === 'string' ? err.message : 'Unknown error';
    return new HttpError(statusCode, code, message, err.details);
  }
  return null;
}
