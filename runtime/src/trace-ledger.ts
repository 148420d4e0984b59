import { appendFileSync } from "node:fs";

import type { TuringMachine } from "./engine.ts";
import { MachineError } from "./errors.ts";
import { ContractValidationError } from "./machine-config.ts";

export const TRACE_LEDGER_SCHEMA_VERSION = "0.1.0";

export interface TraceLedgerError {
  name: string;
  message: string;
}

export interface TraceLedgerEntryV0 {
  schema_version: typeof TRACE_LEDGER_SCHEMA_VERSION;
  run_id: string;
  started_at: string;
  completed_at: string;
  machine: {
    initial_state: string;
    halt_state: string;
    rule_count: number;
  };
  input: string;
  outcome:
    | {
        status: "halted";
        steps: number;
        head_moves: number;
        final_state: string;
        path: string[];
        tape: string;
      }
    | {
        status: "failure";
        code: string;
        steps: number;
        error: TraceLedgerError;
      };
}

export interface CreateTraceLedgerEntryParams {
  machine: TuringMachine;
  input: string;
  runId: string;
  startedAt: string;
  completedAt: string;
  failure?: { error: unknown };
}

export interface EmitTraceLedgerEntryOptions {
  outputPath?: string;
}

export function toTraceLedgerError(error: unknown): TraceLedgerError {
  if (error instanceof Error) {
    const normalizedErrorName = error.name.trim();
    return {
      name: normalizedErrorName.length > 0 ? normalizedErrorName : "Error",
      message: error.message
    };
  }

  return {
    name: "NonErrorThrown",
    message: String(error)
  };
}

function resolveFailureCode(error: unknown, traceError: TraceLedgerError): string {
  if (error instanceof MachineError || error instanceof ContractValidationError) {
    return error.code;
  }

  return traceError.name;
}

export function createTraceLedgerEntry(params: CreateTraceLedgerEntryParams): TraceLedgerEntryV0 {
  const { machine } = params;
  let outcome: TraceLedgerEntryV0["outcome"];

  if (params.failure === undefined) {
    outcome = {
      status: "halted",
      steps: machine.stepCount,
      head_moves: machine.headMoveCount,
      final_state: machine.currentState,
      path: machine.path,
      tape: machine.tape.toDisplayString()
    };
  } else {
    const error = toTraceLedgerError(params.failure.error);
    outcome = {
      status: "failure",
      code: resolveFailureCode(params.failure.error, error),
      steps: machine.stepCount,
      error
    };
  }

  return {
    schema_version: TRACE_LEDGER_SCHEMA_VERSION,
    run_id: params.runId,
    started_at: params.startedAt,
    completed_at: params.completedAt,
    machine: {
      initial_state: machine.config.initialState,
      halt_state: machine.config.haltState,
      rule_count: machine.ruleTable.size
    },
    input: params.input,
    outcome
  };
}

export function emitTraceLedgerEntry(
  entry: TraceLedgerEntryV0,
  options: EmitTraceLedgerEntryOptions = {}
): void {
  if (!options.outputPath) {
    return;
  }

  appendFileSync(options.outputPath, `${JSON.stringify(entry)}\n`, "utf8");
}
