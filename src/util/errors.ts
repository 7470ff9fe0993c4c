import { ZodError } from 'zod';

export class KgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The Kubernetes client could not be configured (no usable kube-config and
 * no in-cluster service account). Raised before any API call is made.
 */
export class ConnectivityError extends KgeError {}

/**
 * A list call against the API server failed after the client was configured.
 */
export class QueryError extends KgeError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${describeError(cause)}`, { cause });
    this.operation = operation;
  }
}

interface ApiErrorLike {
  code?: unknown;
  body?: unknown;
}

function isApiErrorLike(value: unknown): value is ApiErrorLike {
  return typeof value === 'object' && value !== null && ('body' in value || 'code' in value);
}

function messageFromBody(body: unknown): string | undefined {
  if (typeof body === 'string') {
    try {
      return messageFromBody(JSON.parse(body));
    } catch {
      return body.trim() || undefined;
    }
  }

  if (typeof body === 'object' && body !== null && 'message' in body) {
    const { message } = body;
    return typeof message === 'string' && message ? message : undefined;
  }

  return undefined;
}

/**
 * Human-readable cause for any thrown value. API exceptions from
 * @kubernetes/client-node carry the server's Status object in `body`; its
 * message is preferred over the generic "HTTP-Code: 403" text.
 */
export function describeError(error: unknown): string {
  if (error instanceof QueryError && error.cause !== undefined) {
    return describeError(error.cause);
  }

  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }

  if (isApiErrorLike(error)) {
    const fromBody = messageFromBody(error.body);
    if (fromBody) {
      return typeof error.code === 'number' ? `${fromBody} (HTTP ${error.code})` : fromBody;
    }
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
