export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class HttpError extends AppError {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

/** Remote page request failed: non-2xx, network failure, or a body that does not parse. */
export class TransportError extends AppError {
  readonly resource: string;
  readonly url: string;
  readonly status?: number;

  constructor(
    message: string,
    { resource, url, status, cause }: { resource: string; url: string; status?: number; cause?: unknown }
  ) {
    super(message, { cause });
    this.resource = resource;
    this.url = url;
    this.status = status;
  }
}

export class StorageConnectError extends AppError {
  constructor(cause: unknown) {
    super(`cannot connect to storage: ${describeError(cause)}`, { cause });
  }
}

/** A transaction was rolled back. `operation` names the writer call that failed. */
export class WriteError extends AppError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${describeError(cause)}`, { cause });
    this.operation = operation;
  }
}

export type ReferentialRejection = {
  childId: number;
  parentId: number;
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}
