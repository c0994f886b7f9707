import { z } from 'zod';

export class FieldSpecError extends Error {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(`Field "${field}": ${message}`);
    this.name = 'FieldSpecError';
  }
}

export class UnknownComparatorError extends FieldSpecError {
  constructor(
    field: string,
    public readonly kind: string
  ) {
    super(field, `unknown comparator kind "${kind}"`);
    this.name = 'UnknownComparatorError';
  }
}

export class InputValidationError extends Error {
  constructor(
    public readonly source: string,
    public readonly validationErrors: z.ZodError
  ) {
    super(`Invalid input in ${source}:\n${formatValidationErrors(validationErrors)}`);
    this.name = 'InputValidationError';
    this.cause = validationErrors;
  }
}

export class InputReadError extends Error {
  constructor(
    public readonly source: string,
    public readonly originalError: Error
  ) {
    super(`Failed to read ${source}: ${originalError.message}`);
    this.name = 'InputReadError';
    this.cause = originalError;
  }
}

export class AccumulatorFinalizedError extends Error {
  constructor() {
    super('ConfusionAccumulator has already been finalized');
    this.name = 'AccumulatorFinalizedError';
  }
}

function formatValidationErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => `- ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}
