export type BudgetErrorCode =
  | "CONFIG_INVALID"
  | "CLOCK_INVALID"
  | "UNKNOWN_CONFIG"
  | "PROJECT_INVALID"
  | "SPEND_INVALID"
  | "REQUEST_INVALID";

/** Wire shape of a BudgetError, as returned by the HTTP surface. */
export type BudgetErrorReply = {
  error: BudgetErrorCode;
  explanation: string;
  details?: Record<string, unknown>;
};

/**
 * BudgetError is the single error type thrown by project-budgets.
 *
 * - `code` is stable, for programmatic handling and HTTP status mapping
 * - `explanation` is the human-readable part, for logs
 * - `details` carries optional context (offending values, validation issues)
 *
 * The tracker itself never throws; errors come from configuration and from the
 * registry enforcing the caller contract.
 */
export class BudgetError extends Error {
  readonly code: BudgetErrorCode;
  readonly explanation: string;
  readonly details?: Record<string, unknown>;

  constructor(code: BudgetErrorCode, explanation: string, details?: Record<string, unknown>) {
    super(`${code}: ${explanation}`);
    this.name = "BudgetError";
    this.code = code;
    this.explanation = explanation;
    this.details = details;
  }

  /** Drops the stack and message prefix; `JSON.stringify` picks this up directly. */
  toJSON(): BudgetErrorReply {
    return this.details === undefined
      ? { error: this.code, explanation: this.explanation }
      : { error: this.code, explanation: this.explanation, details: this.details };
  }
}
