/***
 * Type errors — Failures raised by branded-id validation.
 *
 * Kept apart from ECSError so the primitives below have no dependency
 * on the runtime's own error categories.
 *
 ***/

import { AppError } from "utils/error";

export enum TYPE_ERROR {
  VALIDATION_FAIL_CONDITION = "VALIDATION_FAIL_CONDITION",
}

export class TypeError extends AppError {
  constructor(
    public readonly category: TYPE_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
