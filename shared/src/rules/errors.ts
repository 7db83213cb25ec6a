export type RulesErrorCode =
  | "NotFound"
  | "InvalidInput"
  | "PrerequisitesNotMet"
  | "DutyRequired"
  | "RaceMismatch"
  | "BudgetExceeded"
  | "AlreadyPossessed"
  | "NoPendingChoice"
  | "WrongCount"
  | "InvalidOption"
  | "InvalidAbilityIncrease"
  | "StepOutOfOrder"
  | "ChoicesPending";

export type RulesErrorDetails = Record<string, unknown>;

/**
 * Rule violation raised at the builder boundary. The character being built
 * is never modified when one of these is thrown.
 */
export class RulesError extends Error {
  readonly code: RulesErrorCode;
  readonly details?: RulesErrorDetails;

  constructor(code: RulesErrorCode, message: string, details?: RulesErrorDetails) {
    super(message);
    this.name = "RulesError";
    this.code = code;
    this.details = details;
  }
}

export const isRulesError = (err: unknown): err is RulesError => err instanceof RulesError;
