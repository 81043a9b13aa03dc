import type { TaskEvent, TaskStatus } from '../types/index.js';

/**
 * Stable error codes shared with the HTTP error envelope.
 */
export const ErrorCode = {
  BAD_REQUEST: 'BAD_REQUEST',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  RATE_LIMITED: 'RATE_LIMITED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for every error the control plane raises on purpose.
 */
export abstract class CrawlControlError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class TaskNotFoundError extends CrawlControlError {
  readonly code = ErrorCode.NOT_FOUND;
  readonly statusCode = 404;

  constructor(public readonly taskId: string) {
    super(`Task not found: ${taskId}`, { taskId });
  }
}

export class InvalidRequestError extends CrawlControlError {
  readonly code = ErrorCode.BAD_REQUEST;
  readonly statusCode = 400;
}

export class SpiderNotFoundError extends CrawlControlError {
  readonly code = ErrorCode.BAD_REQUEST;
  readonly statusCode = 400;

  constructor(
    public readonly spiderName: string,
    allowed: string[]
  ) {
    super(`Unknown spider: ${spiderName}`, { spiderName, allowed });
  }
}

export class TaskNotStoppableError extends CrawlControlError {
  readonly code = ErrorCode.CONFLICT;
  readonly statusCode = 409;

  constructor(
    public readonly taskId: string,
    public readonly status: TaskStatus
  ) {
    super(`Task ${taskId} cannot be stopped in status '${status}'`, { taskId, status });
  }
}

/**
 * Raised when the shared cache or the relational store is unreachable.
 */
export class TransientInfrastructureError extends CrawlControlError {
  readonly code = ErrorCode.SERVICE_UNAVAILABLE;
  readonly statusCode = 503;

  constructor(
    public readonly component: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${component} unavailable: ${message}`, { component });
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Error thrown when a state transition is not allowed from the current state.
 */
export class InvalidTransitionError extends CrawlControlError {
  readonly code = ErrorCode.INTERNAL_ERROR;
  readonly statusCode = 500;

  constructor(
    public readonly taskId: string,
    public readonly fromState: TaskStatus,
    public readonly event: TaskEvent,
    public readonly validEvents: TaskEvent[]
  ) {
    super(
      `Invalid transition: Cannot apply '${event}' to task ${taskId} ` +
        `in state '${fromState}'. Valid events: [${validEvents.join(', ')}]`
    );
  }
}

export function isCrawlControlError(error: unknown): error is CrawlControlError {
  return error instanceof CrawlControlError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
