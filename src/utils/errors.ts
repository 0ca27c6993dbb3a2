import axios from 'axios';

export class InvalidVoteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidVoteError';
  }
}

/** The mirror does not have the `[Votes, Game]` shape; never tolerated */
export class MirrorSchemaError extends Error {
  constructor(public readonly detail: string) {
    super(`Unexpected mirror layout: ${detail}`);
    this.name = 'MirrorSchemaError';
  }
}

export class ExternalServiceError extends Error {
  constructor(
    public readonly service: string,
    message: string,
    public readonly status?: number,
    public readonly originalError?: unknown
  ) {
    super(`${service}: ${message}`);
    this.name = 'ExternalServiceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP status of a failed axios or googleapis (gaxios) call, if it got that far
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (axios.isAxiosError(error)) {
    return error.response?.status;
  }
  if (typeof error === 'object' && error !== null && 'response' in error) {
    const response = error.response;
    if (typeof response === 'object' && response !== null && 'status' in response) {
      return typeof response.status === 'number' ? response.status : undefined;
    }
  }
  return undefined;
}

export function toExternalServiceError(service: string, error: unknown): ExternalServiceError {
  if (error instanceof ExternalServiceError) {
    return error;
  }
  return new ExternalServiceError(service, errorMessage(error), httpStatusOf(error), error);
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}
