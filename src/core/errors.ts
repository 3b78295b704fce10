import { ZodError } from 'zod';

export type MnemosErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION'
  | 'BACKEND_UNAVAILABLE'
  | 'CONCURRENT_MODIFICATION'
  | 'SESSION_STATE';

export class MnemosError extends Error {
  constructor(
    readonly code: MnemosErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends MnemosError {
  constructor(
    readonly entity: string,
    readonly ref: string
  ) {
    super('NOT_FOUND', `${entity} not found: ${ref}`);
  }
}

export class ValidationError extends MnemosError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super('VALIDATION', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }

  static fromZod(context: string, error: ZodError): ValidationError {
    const issues = error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'input';
      return `${where} ${issue.message}`;
    });
    return new ValidationError(`Invalid ${context}`, issues);
  }
}

export class BackendUnavailableError extends MnemosError {
  constructor(
    readonly backend: string,
    cause: unknown
  ) {
    super(
      'BACKEND_UNAVAILABLE',
      `${backend} unavailable: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export class ConcurrentModificationError extends MnemosError {
  constructor(
    readonly entity: string,
    readonly ref: string,
    detail: string
  ) {
    super('CONCURRENT_MODIFICATION', `${entity} ${ref} was modified concurrently: ${detail}`);
  }
}

export class SessionStateError extends MnemosError {
  constructor(message: string) {
    super('SESSION_STATE', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
