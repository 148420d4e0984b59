export type MachineErrorCode = "TAPE_BLANK" | "RULE_NOT_FOUND" | "STEP_LIMIT_EXCEEDED";

export class MachineError extends Error {
  readonly code: MachineErrorCode;

  constructor(message: string, code: MachineErrorCode) {
    super(message);
    this.name = "MachineError";
    this.code = code;
  }
}

export class TapeBlankError extends MachineError {
  constructor() {
    super("The input tape is blank.", "TAPE_BLANK");
    this.name = "TapeBlankError";
  }
}

export class RuleNotFoundError extends MachineError {
  readonly state: string;
  readonly symbol: string;

  constructor(state: string, symbol: string) {
    super(`No rule found from state ${state} with symbol ${symbol}.`, "RULE_NOT_FOUND");
    this.name = "RuleNotFoundError";
    this.state = state;
    this.symbol = symbol;
  }
}

export class StepLimitExceededError extends MachineError {
  readonly limit: number;

  constructor(limit: number) {
    super(`Machine did not halt within ${limit} steps.`, "STEP_LIMIT_EXCEEDED");
    this.name = "StepLimitExceededError";
    this.limit = limit;
  }
}
