import { ZodError } from 'zod';

export class NotFoundError extends Error {
  public statusCode = 404;

  constructor(resource: string, id?: string) {
    super(id ? `${resource} with id '${id}' not found` : `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

/**
 * Business-rule failure. Expected, surfaced to the caller, and aborts the
 * enclosing transaction.
 */
export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * A default guard vetoed a transition for the entity's current status.
 */
export class TransitionRejectedError extends ValidationError {
  public statusCode = 422;
  public readonly entityType: string;
  public readonly entityId: string;
  public readonly currentStatus: string;
  public readonly transition: string;

  constructor(
    message: string,
    context: { entityType: string; entityId: string; currentStatus: string; transition: string },
  ) {
    super(message, { ...context });
    this.name = 'TransitionRejectedError';
    this.entityType = context.entityType;
    this.entityId = context.entityId;
    this.currentStatus = context.currentStatus;
    this.transition = context.transition;
  }
}

/**
 * Programming defect: unknown transition or operation, missing repository or
 * mutation method. Never retried.
 */
export class ConfigurationError extends Error {
  public statusCode = 500;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class CascadeDepthExceededError extends ConfigurationError {
  public readonly depth: number;

  constructor(depth: number, maxDepth: number, entityKey: string) {
    super(`Cascade depth ${depth} exceeds the limit of ${maxDepth} at ${entityKey}`);
    this.name = 'CascadeDepthExceededError';
    this.depth = depth;
  }
}

/**
 * A compensating action failed. Only ever logged; never masks the error that
 * triggered the compensation.
 */
export class CompensationError extends Error {
  public readonly operationIndex: number;

  constructor(operationIndex: number, cause: unknown) {
    super(
      `Compensation for operation ${operationIndex} failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
    this.name = 'CompensationError';
    this.operationIndex = operationIndex;
  }
}

/**
 * Convert a zod failure into a ValidationError carrying the flattened issues.
 */
export function fromZodError(error: ZodError, message = 'Validation failed'): ValidationError {
  return new ValidationError(message, {
    issues: error.issues.map((issue) => ({
      path: issue.path.map(String).join('.'),
      message: issue.message,
    })),
  });
}
