export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum ECS_ERROR {
  ENTITY_NOT_FOUND = "ENTITY_NOT_FOUND",
  INVALID_COMPONENT = "INVALID_COMPONENT",
  INVALID_EVENT = "INVALID_EVENT",
  UNKNOWN_PHASE = "UNKNOWN_PHASE",
}

export class ECSError extends AppError {
  constructor(
    public readonly category: ECS_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_ecs_error(error: unknown): error is ECSError {
  return error instanceof ECSError;
}
