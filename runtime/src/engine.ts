import { StepLimitExceededError, TapeBlankError } from "./errors.ts";
import type { MachineConfig } from "./machine-config.ts";
import { WILDCARD_SYMBOL, type Rule, type RuleTable } from "./rule-table.ts";
import { Tape } from "./tape.ts";

export interface RunOptions {
  /** Steps allowed in this call before giving up; unlimited when omitted. */
  maxSteps?: number;
}

/**
 * Single-tape machine over a quintuple rule table.
 *
 * `step()` either applies one rule completely or throws before touching the
 * tape or any tracking field. The machine is halted once the current state
 * equals the configured halting label; `step()` itself does not check this.
 */
export class TuringMachine {
  readonly ruleTable: RuleTable;
  readonly config: MachineConfig;

  private currentTape = new Tape();
  private state: string;
  private headPosition = 0;
  private steps = 0;
  private headMoves = 0;
  private visited: string[];
  private appliedRule: Rule | null = null;

  constructor(ruleTable: RuleTable, config: MachineConfig) {
    this.ruleTable = ruleTable;
    this.config = config;
    this.state = config.initialState;
    this.visited = [config.initialState];
  }

  get tape(): Tape {
    return this.currentTape;
  }

  get currentState(): string {
    return this.state;
  }

  get head(): number {
    return this.headPosition;
  }

  get stepCount(): number {
    return this.steps;
  }

  get headMoveCount(): number {
    return this.headMoves;
  }

  get path(): string[] {
    return [...this.visited];
  }

  get lastRule(): Rule | null {
    return this.appliedRule;
  }

  get isHalted(): boolean {
    return this.state === this.config.haltState;
  }

  assignTape(input: string): void {
    this.currentTape = new Tape(input);
    this.reset();
  }

  reset(): void {
    this.state = this.config.initialState;
    this.headPosition = 0;
    this.steps = 0;
    this.headMoves = 0;
    this.visited = [this.config.initialState];
    this.appliedRule = null;
  }

  step(): void {
    if (this.currentTape.isBlank()) {
      throw new TapeBlankError();
    }

    const scan = this.currentTape.get(this.headPosition);
    const rule = this.ruleTable.findRule(this.state, scan);

    const write = rule.writeSymbol === WILDCARD_SYMBOL ? scan : rule.writeSymbol;
    this.currentTape.set(this.headPosition, write);

    const direction = Math.sign(rule.direction);
    this.state = rule.toState;
    this.headPosition += direction;
    if (direction !== 0) {
      this.headMoves += 1;
    }

    this.visited.push(this.state);
    this.steps += 1;
    this.appliedRule = rule;
  }

  run(options: RunOptions = {}): Tape {
    const limit = options.maxSteps ?? Number.POSITIVE_INFINITY;
    let taken = 0;

    while (!this.isHalted) {
      if (taken >= limit) {
        throw new StepLimitExceededError(limit);
      }
      this.step();
      taken += 1;
    }

    return this.currentTape;
  }
}
