// src/utils/errors.ts

export abstract class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends DomainError {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
  }
}

export class InvalidQueryError extends ValidationError {}

export class ConfigurationError extends DomainError {
  constructor(
    message: string,
    public readonly key: string
  ) {
    super(message);
  }
}

export class CorpusSnapshotError extends DomainError {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
  }
}

export class EmbeddingError extends DomainError {}

export class VectorStoreError extends DomainError {}

export interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string;
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return { statusCode: 400, error: 'Bad Request', message: error.message };
  }
  if (error instanceof DomainError) {
    return { statusCode: 500, error: error.name, message: error.message };
  }
  const message = error instanceof Error ? error.message : 'An unknown error occurred';
  return { statusCode: 500, error: 'Internal Server Error', message };
}
