/**
 * Error taxonomy shared by every package.
 *
 * ValidationError marks configuration or programming mistakes and is never retried.
 * LlmResponseError marks malformed model output, which is worth a re-ask.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly entity: string,
    public readonly key: string | number
  ) {
    super(`${entity} not found: ${key}`);
    this.name = 'NotFoundError';
  }
}

export class RemoteServiceError extends Error {
  constructor(
    public readonly service: string,
    message: string,
    public readonly statusCode?: number,
    public readonly responseBody?: string
  ) {
    super(message);
    this.name = 'RemoteServiceError';
  }
}

export class LlmResponseError extends Error {
  constructor(
    message: string,
    public readonly rawResponse?: string
  ) {
    super(message);
    this.name = 'LlmResponseError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
