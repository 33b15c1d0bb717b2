export class CriteriaError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'CriteriaError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidInputError extends CriteriaError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'INVALID_INPUT', cause);
    this.name = 'InvalidInputError';
  }
}
