import { randomUUID } from "node:crypto";

import type { TuringMachine } from "./engine.ts";
import { createTraceLedgerEntry, emitTraceLedgerEntry, type TraceLedgerEntryV0 } from "./trace-ledger.ts";

export { TuringMachine, type RunOptions } from "./engine.ts";
export {
  MachineError,
  RuleNotFoundError,
  StepLimitExceededError,
  TapeBlankError,
  type MachineErrorCode
} from "./errors.ts";
export {
  ContractValidationError,
  DEFAULT_HALT_STATE,
  DEFAULT_INITIAL_STATE,
  resolveMachineConfig,
  type ConfigEntries,
  type ContractValidationCode,
  type ContractValidationIssue,
  type MachineConfig
} from "./machine-config.ts";
export { RuleTable, WILDCARD_SYMBOL, formatRule, type Rule } from "./rule-table.ts";
export { BLANK_SYMBOL, Tape, type TapeBounds, type TapeCell } from "./tape.ts";
export {
  TRACE_LEDGER_SCHEMA_VERSION,
  createTraceLedgerEntry,
  emitTraceLedgerEntry,
  toTraceLedgerError,
  type CreateTraceLedgerEntryParams,
  type TraceLedgerEntryV0,
  type TraceLedgerError
} from "./trace-ledger.ts";

export interface MachineRunResult {
  ok: true;
  runId: string;
  finalState: string;
  stepCount: number;
  headMoveCount: number;
  path: string[];
  tape: string;
}

export interface RunMachineOptions {
  traceLedgerPath?: string;
  maxSteps?: number;
  now?: () => Date;
  runIdFactory?: () => string;
  /** Called when the ledger line cannot be appended; the run result is unaffected. */
  onLedgerError?: (error: unknown) => void;
}

function normalizeOutputPath(outputPath?: string): string | undefined {
  if (typeof outputPath !== "string") {
    return undefined;
  }

  const trimmed = outputPath.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveRunId(runIdFactory: () => string): string {
  const rawRunId = runIdFactory().trim();
  return rawRunId.length > 0 ? rawRunId : randomUUID();
}

function resolveTimestamp(now: () => Date): string {
  const candidate = now();
  if (Number.isFinite(candidate.getTime())) {
    return candidate.toISOString();
  }

  return new Date().toISOString();
}

function writeLedgerEntry(
  entry: TraceLedgerEntryV0,
  traceLedgerPath: string | undefined,
  onLedgerError: ((error: unknown) => void) | undefined
): void {
  if (!traceLedgerPath) {
    return;
  }

  try {
    emitTraceLedgerEntry(entry, { outputPath: traceLedgerPath });
  } catch (error) {
    onLedgerError?.(error);
  }
}

/**
 * Feeds `input` to the machine, runs it to the halting state and appends one
 * ledger line describing the run when a ledger path is configured. Machine
 * errors are rethrown after the failure line is written.
 */
export function runMachine(
  machine: TuringMachine,
  input: string,
  options: RunMachineOptions = {}
): MachineRunResult {
  const now = options.now ?? (() => new Date());
  const runId = resolveRunId(options.runIdFactory ?? randomUUID);
  const traceLedgerPath = normalizeOutputPath(options.traceLedgerPath);
  const startedAt = resolveTimestamp(now);

  try {
    machine.assignTape(input);
    machine.run({ maxSteps: options.maxSteps });
  } catch (error) {
    writeLedgerEntry(
      createTraceLedgerEntry({
        machine,
        input,
        runId,
        startedAt,
        completedAt: resolveTimestamp(now),
        failure: { error }
      }),
      traceLedgerPath,
      options.onLedgerError
    );
    throw error;
  }

  writeLedgerEntry(
    createTraceLedgerEntry({ machine, input, runId, startedAt, completedAt: resolveTimestamp(now) }),
    traceLedgerPath,
    options.onLedgerError
  );

  return {
    ok: true,
    runId,
    finalState: machine.currentState,
    stepCount: machine.stepCount,
    headMoveCount: machine.headMoveCount,
    path: machine.path,
    tape: machine.tape.toDisplayString()
  };
}
