import type { Diagnostic } from "./diagnostics.ts";

export type RuleFileErrorCode = "INCORRECT_SYMBOL_COUNT" | "INVALID_DIRECTION";

export class RuleFileError extends Error {
  readonly code: RuleFileErrorCode;
  readonly diagnostics: Diagnostic[];

  constructor(message: string, code: RuleFileErrorCode, diagnostics: Diagnostic[]) {
    super(message);
    this.name = "RuleFileError";
    this.code = code;
    this.diagnostics = diagnostics;
  }
}

export class IncorrectSymbolCountError extends RuleFileError {
  readonly count: number;

  constructor(count: number, diagnostics: Diagnostic[] = []) {
    super(
      `Incorrect number of rule symbols (must be a multiple of 5, is ${count}).`,
      "INCORRECT_SYMBOL_COUNT",
      diagnostics
    );
    this.name = "IncorrectSymbolCountError";
    this.count = count;
  }
}

export class InvalidDirectionError extends RuleFileError {
  readonly token: string;

  constructor(token: string, diagnostics: Diagnostic[] = []) {
    super(`Rule direction must be an integer, found "${token}".`, "INVALID_DIRECTION", diagnostics);
    this.name = "InvalidDirectionError";
    this.token = token;
  }
}
