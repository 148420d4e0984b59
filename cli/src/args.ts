export const DEFAULT_STEP_TIME_MS = 250;

export interface CliOptions {
  rulesPath: string;
  input: string;
  showRules: boolean;
  stepTimeMs: number;
  silent: boolean;
  verbose: boolean;
  live: boolean;
  showPath: boolean;
  steppingMode: boolean;
  loopMode: boolean;
  maxSteps?: number;
  traceLedgerPath?: string;
}

export type ParsedCliArgs = { kind: "help" } | { kind: "run"; options: CliOptions };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = [
  "Usage: tm <rules-file> [input] [options]",
  "",
  "Simulates the action of a Turing machine.",
  "",
  "Options:",
  "  --rules               show the applied rule beside each state",
  "  --step-time <secs>    delay between steps in seconds (default 0.25)",
  "  --fast                no delay between steps (same as --step-time 0)",
  "  --silent              hide intermediate states",
  "  --verbose             show step count, head moves and path beside each state",
  "  --live                redraw a single continuously changing line",
  "  --no-path             omit the state path from the summary",
  "  --max-steps <n>       give up on a run after <n> steps",
  "  --trace-ledger <path> append one JSON line per run to <path>",
  "  -s                    stepping mode: press a key for each step (i toggles verbose)",
  "  -l                    loop mode: prompt for more input after each run",
  "  -h, --help            show this message"
].join("\n");

function parseStepTime(value: string | undefined): number {
  if (value === undefined) {
    throw new CliUsageError("Missing value for --step-time");
  }

  const seconds = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(seconds) || seconds < 0) {
    throw new CliUsageError(`Invalid --step-time value "${value}"`);
  }

  return Math.round(seconds * 1000);
}

function parseMaxSteps(value: string | undefined): number {
  if (value === undefined) {
    throw new CliUsageError("Missing value for --max-steps");
  }
  if (!/^[0-9]+$/.test(value) || Number(value) === 0) {
    throw new CliUsageError(`Invalid --max-steps value "${value}"`);
  }

  return Number(value);
}

export function parseCliArgs(argv: readonly string[]): ParsedCliArgs {
  const positionals: string[] = [];
  const options: Omit<CliOptions, "rulesPath" | "input"> = {
    showRules: false,
    stepTimeMs: DEFAULT_STEP_TIME_MS,
    silent: false,
    verbose: false,
    live: false,
    showPath: true,
    steppingMode: false,
    loopMode: false
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    }
    if (arg === "--rules") {
      options.showRules = true;
    } else if (arg === "--step-time") {
      options.stepTimeMs = parseStepTime(argv[i + 1]);
      i += 1;
    } else if (arg.startsWith("--step-time=")) {
      options.stepTimeMs = parseStepTime(arg.slice("--step-time=".length));
    } else if (arg === "--fast") {
      options.stepTimeMs = 0;
    } else if (arg === "--silent") {
      options.silent = true;
    } else if (arg === "--verbose") {
      options.verbose = true;
    } else if (arg === "--live") {
      options.live = true;
    } else if (arg === "--no-path") {
      options.showPath = false;
    } else if (arg === "--max-steps") {
      options.maxSteps = parseMaxSteps(argv[i + 1]);
      i += 1;
    } else if (arg === "--trace-ledger") {
      const value = argv[i + 1];
      if (value === undefined || value.trim().length === 0) {
        throw new CliUsageError("Missing value for --trace-ledger");
      }
      options.traceLedgerPath = value;
      i += 1;
    } else if (arg === "-s") {
      options.steppingMode = true;
    } else if (arg === "-l") {
      options.loopMode = true;
    } else if (arg.startsWith("-") && arg.length > 1) {
      throw new CliUsageError(`Unknown option "${arg}"`);
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length === 0) {
    throw new CliUsageError("Missing required argument: rules file path");
  }
  if (positionals.length > 2) {
    throw new CliUsageError(`Unexpected argument "${positionals[2]}"`);
  }

  const [rulesPath, input] = positionals;
  if (input === undefined && !options.loopMode) {
    throw new CliUsageError("Missing required argument: input tape");
  }

  return {
    kind: "run",
    options: { rulesPath, input: input ?? "", ...options }
  };
}
