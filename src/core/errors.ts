export class DeskError extends Error {
    constructor(
      message: string,
      public code: string,
      public statusCode: number = 500,
      public details?: Record<string, unknown>
    ) {
      super(message);
      this.name = 'DeskError';
      Error.captureStackTrace(this, this.constructor);
    }
  }

  export class ValidationError extends DeskError {
    constructor(message: string = 'Validation failed', details?: Record<string, unknown>) {
      super(message, 'VALIDATION_ERROR', 400, details);
      this.name = 'ValidationError';
    }
  }

  export type TokenizeFailure = 'UnparseableNumber';

  export class TokenizeError extends DeskError {
    constructor(
      public reason: TokenizeFailure,
      public fragment: string
    ) {
      super(`"${fragment}" is not a valid amount`, 'UNPARSEABLE_NUMBER', 400, { reason, fragment });
      this.name = 'TokenizeError';
    }
  }

  export type InterpretFailure = 'EmptyClientMatcher';

  export class InterpretError extends DeskError {
    constructor(public reason: InterpretFailure) {
      super('Please include a client name in the query', 'EMPTY_CLIENT_MATCHER', 400, { reason });
      this.name = 'InterpretError';
    }
  }

  export class FetchError extends DeskError {
    constructor(message: string = 'Record store request failed', details?: Record<string, unknown>) {
      super(message, 'FETCH_ERROR', 502, details);
      this.name = 'FetchError';
    }
  }

  export class RenderError extends DeskError {
    constructor(message: string = 'Document rendering failed', details?: Record<string, unknown>) {
      super(message, 'RENDER_ERROR', 500, details);
      this.name = 'RenderError';
    }
  }

  export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
