import { randomUUID } from "node:crypto";
import { readFileSync } from "node:fs";
import { setTimeout as sleep } from "node:timers/promises";

import { RuleFileError, formatDiagnostic, parseRuleFile } from "../../parser/src/index.ts";
import {
  MachineError,
  RuleTable,
  StepLimitExceededError,
  TuringMachine,
  createTraceLedgerEntry,
  emitTraceLedgerEntry,
  resolveMachineConfig,
  runMachine
} from "../../runtime/src/index.ts";
import { CliUsageError, USAGE, parseCliArgs, type CliOptions } from "./args.ts";
import { MachineDisplay, type OutputSink } from "./display.ts";
import { KeyReader, isInterrupt, type KeypressInput } from "./keypress.ts";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 130;

export interface CliIo {
  stdin: KeypressInput;
  stdout: OutputSink;
  stderr: OutputSink;
}

class SteppingInterruptedError extends Error {
  constructor() {
    super("Stepping interrupted");
    this.name = "SteppingInterruptedError";
  }
}

function processIo(): CliIo {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr
  };
}

function describeError(error: unknown): string[] {
  if (error instanceof RuleFileError && error.diagnostics.length > 0) {
    return error.diagnostics.map(formatDiagnostic);
  }

  return [error instanceof Error ? error.message : String(error)];
}

function reportError(io: CliIo, error: unknown): void {
  for (const line of describeError(error)) {
    io.stderr.write(`error: ${line}\n`);
  }
}

function loadMachine(options: CliOptions): TuringMachine {
  const source = readFileSync(options.rulesPath, "utf8");
  const parsed = parseRuleFile(source, { file: options.rulesPath });
  return new TuringMachine(new RuleTable(parsed.rules), resolveMachineConfig(parsed.config));
}

function recordRun(
  io: CliIo,
  traceLedgerPath: string | undefined,
  params: Parameters<typeof createTraceLedgerEntry>[0]
): void {
  if (traceLedgerPath === undefined) {
    return;
  }

  try {
    emitTraceLedgerEntry(createTraceLedgerEntry(params), { outputPath: traceLedgerPath });
  } catch (error) {
    warnLedgerWrite(io, error);
  }
}

function warnLedgerWrite(io: CliIo, error: unknown): void {
  io.stderr.write(`warning: could not write trace ledger: ${describeError(error).join("; ")}\n`);
}

function checkStepLimit(machine: TuringMachine, maxSteps: number | undefined): void {
  if (maxSteps !== undefined && machine.stepCount >= maxSteps) {
    throw new StepLimitExceededError(maxSteps);
  }
}

async function driveMachine(
  machine: TuringMachine,
  options: CliOptions,
  display: MachineDisplay,
  keys: KeyReader
): Promise<void> {
  if (options.steppingMode) {
    while (!machine.isHalted) {
      checkStepLimit(machine, options.maxSteps);
      const key = await keys.readKey();
      if (key === null || isInterrupt(key)) {
        throw new SteppingInterruptedError();
      }
      if (key.sequence === "i") {
        display.verbose = !display.verbose;
      }

      machine.step();
      display.printStep(machine);
    }
    return;
  }

  while (!machine.isHalted) {
    checkStepLimit(machine, options.maxSteps);
    machine.step();
    display.printStep(machine);

    if (!machine.isHalted && options.stepTimeMs > 0) {
      await sleep(options.stepTimeMs);
    }
  }
}

async function executeInput(
  machine: TuringMachine,
  input: string,
  options: CliOptions,
  display: MachineDisplay,
  io: CliIo,
  keys: KeyReader
): Promise<void> {
  if (options.silent) {
    runMachine(machine, input, {
      traceLedgerPath: options.traceLedgerPath,
      maxSteps: options.maxSteps,
      onLedgerError: (error) => warnLedgerWrite(io, error)
    });
    display.printStep(machine);
    return;
  }

  const runId = randomUUID();
  const startedAt = new Date().toISOString();

  try {
    machine.assignTape(input);
    display.printState(machine, false);
    await driveMachine(machine, options, display, keys);
  } catch (error) {
    recordRun(io, options.traceLedgerPath, {
      machine,
      input,
      runId,
      startedAt,
      completedAt: new Date().toISOString(),
      failure: { error }
    });
    throw error;
  }

  recordRun(io, options.traceLedgerPath, {
    machine,
    input,
    runId,
    startedAt,
    completedAt: new Date().toISOString()
  });
}

/**
 * Runs the interpreter for one command line. Machine errors end the current
 * input; in loop mode the next input is read from stdin until it closes.
 */
export async function runCli(argv: readonly string[], io: CliIo = processIo()): Promise<number> {
  let options: CliOptions;
  try {
    const parsed = parseCliArgs(argv);
    if (parsed.kind === "help") {
      io.stdout.write(`${USAGE}\n`);
      return EXIT_OK;
    }
    options = parsed.options;
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr.write(`error: ${error.message}\n\n${USAGE}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  let machine: TuringMachine;
  try {
    machine = loadMachine(options);
  } catch (error) {
    reportError(io, error);
    return EXIT_FAILURE;
  }

  const display = new MachineDisplay(io.stdout, options);
  const keys = new KeyReader(io.stdin);
  let input = options.input;
  let exitCode = EXIT_OK;

  try {
    do {
      if (options.loopMode && input.length === 0) {
        io.stdout.write("\nInput additional tape.\n");
        const line = await keys.readLine();
        if (line === null) {
          break;
        }
        io.stdout.write("\n");
        input = line.trim();
        if (input.length === 0) {
          continue;
        }
      }

      try {
        await executeInput(machine, input, options, display, io, keys);
        exitCode = EXIT_OK;
      } catch (error) {
        if (error instanceof SteppingInterruptedError) {
          io.stdout.write("\n");
          return EXIT_INTERRUPTED;
        }
        if (!(error instanceof MachineError)) {
          throw error;
        }

        reportError(io, error);
        exitCode = EXIT_FAILURE;
      }

      input = "";
    } while (options.loopMode);
  } finally {
    keys.close();
  }

  return exitCode;
}
