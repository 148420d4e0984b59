import { BLANK_SYMBOL, formatRule, type TuringMachine } from "../../runtime/src/index.ts";

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface DisplayOptions {
  showRules: boolean;
  showPath: boolean;
  silent: boolean;
  verbose: boolean;
  live: boolean;
}

const HEAD_MARKER = "|";

function renderSymbol(symbol: string): string {
  return symbol === BLANK_SYMBOL ? " " : symbol;
}

/**
 * Renders the tape between its outermost stored cells. With `showHead`, the
 * head marker goes before the cell under the head, or at either edge when the
 * head sits one cell past the stored content.
 */
export function formatTape(machine: TuringMachine, showHead: boolean): string {
  const cells = machine.tape.cells();
  const rendered = cells.map((cell) => renderSymbol(cell.symbol));

  if (!showHead) {
    return `${rendered.join("")} `;
  }

  const headIndex = cells.findIndex((cell) => cell.position === machine.head);
  if (headIndex >= 0) {
    rendered.splice(headIndex, 0, HEAD_MARKER);
  } else if (cells.length > 0 && machine.head < cells[0].position) {
    rendered.unshift(HEAD_MARKER);
  } else {
    rendered.push(HEAD_MARKER);
  }

  return rendered.join("");
}

export function formatStateLine(
  machine: TuringMachine,
  options: { showHead: boolean; showRules: boolean }
): string {
  let line = `${machine.stepCount} (${machine.currentState}): >${formatTape(machine, options.showHead)}<`;

  if (options.showRules) {
    line += ` R: ${machine.lastRule === null ? "-" : formatRule(machine.lastRule)}`;
  }

  return line;
}

export function formatTracking(machine: TuringMachine, showPath: boolean): string[] {
  const lines = [`Steps: ${machine.stepCount}`, `Head moves: ${machine.headMoveCount}`];

  if (showPath) {
    lines.push(`State path: ${machine.path.join(" -> ")}`);
  }

  return lines;
}

export class MachineDisplay {
  verbose: boolean;

  private readonly output: OutputSink;
  private readonly options: DisplayOptions;
  private liveMaxLength = 0;

  constructor(output: OutputSink, options: DisplayOptions) {
    this.output = output;
    this.options = options;
    this.verbose = options.verbose;
  }

  printState(machine: TuringMachine, showHead: boolean, silentOverride = false): void {
    if (this.options.silent && !silentOverride) {
      return;
    }

    let line = formatStateLine(machine, { showHead, showRules: this.options.showRules });
    if (this.verbose) {
      line += ` ${formatTracking(machine, this.options.showPath).join(" ")}`;
    }

    // Live mode rewrites the same line, so pad over whatever the longest
    // previous line left behind.
    this.liveMaxLength = Math.max(this.liveMaxLength, line.length);
    const padding = this.options.live ? " ".repeat(this.liveMaxLength - line.length) : "";

    this.output.write(`${line}${padding}${this.options.live ? "\r" : "\n"}`);
  }

  printStep(machine: TuringMachine): void {
    if (!machine.isHalted) {
      this.printState(machine, true);
      return;
    }

    this.printState(machine, false, true);
    this.output.write("\n");
    if (this.options.live) {
      this.output.write("\n");
    }
    this.printTracking(machine);
  }

  printTracking(machine: TuringMachine): void {
    for (const line of formatTracking(machine, this.options.showPath)) {
      this.output.write(`${line}\n`);
    }
  }
}
