/**
 * Errors raised by the planning core.
 * Unavailable market data is not an error: adapters return null and the
 * affected signal degrades to false.
 */

export type PlannerErrorCode = "invalid_input";

export class InvalidInputError extends Error {
  code: PlannerErrorCode;
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InvalidInputError";
    this.code = "invalid_input";
    this.issues = issues.length > 0 ? issues : [message];
  }
}

export const isInvalidInputError = (value: unknown): value is InvalidInputError =>
  value instanceof InvalidInputError;

/**
 * Extracts a printable message from any thrown value.
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
