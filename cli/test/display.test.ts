import assert from "node:assert/strict";
import test from "node:test";

import { RuleTable, TuringMachine, resolveMachineConfig, type Rule } from "../../runtime/src/index.ts";
import { MachineDisplay, formatStateLine, formatTape, formatTracking, type DisplayOptions } from "../src/display.ts";

function rule(fromState: string, matchSymbol: string, toState: string, writeSymbol: string, direction: number): Rule {
  return { fromState, matchSymbol, toState, writeSymbol, direction };
}

function createUnaryIncrementMachine(): TuringMachine {
  return new TuringMachine(
    new RuleTable([rule("1", "1", "1", "1", 1), rule("1", "_", "0", "1", 0)]),
    resolveMachineConfig()
  );
}

function createRecorder(): { write(chunk: string): void; text(): string } {
  const chunks: string[] = [];
  return {
    write(chunk: string) {
      chunks.push(chunk);
    },
    text() {
      return chunks.join("");
    }
  };
}

const plainOptions: DisplayOptions = {
  showRules: false,
  showPath: true,
  silent: false,
  verbose: false,
  live: false
};

test("formatTape pads without a head marker and places the marker before the head cell", () => {
  const machine = createUnaryIncrementMachine();
  machine.assignTape("111");

  assert.equal(formatTape(machine, false), "111 ");
  assert.equal(formatTape(machine, true), "|111");

  machine.step();
  assert.equal(formatTape(machine, true), "1|11");

  machine.step();
  machine.step();
  assert.equal(formatTape(machine, true), "111|");
});

test("formatTape renders blank cells as spaces and a head left of the content", () => {
  const machine = new TuringMachine(
    new RuleTable([rule("1", "*", "2", "*", -1), rule("2", "_", "0", "*", 0)]),
    resolveMachineConfig()
  );
  machine.assignTape("a");

  machine.step();
  assert.equal(formatTape(machine, true), "|a");

  machine.step();
  assert.equal(formatTape(machine, true), "| a");
  assert.equal(formatTape(machine, false), " a ");
});

test("formatStateLine shows step count, state, tape and optionally the last rule", () => {
  const machine = createUnaryIncrementMachine();
  machine.assignTape("111");

  assert.equal(formatStateLine(machine, { showHead: false, showRules: true }), "0 (1): >111 < R: -");

  machine.step();
  assert.equal(formatStateLine(machine, { showHead: true, showRules: false }), "1 (1): >1|11<");
  assert.equal(formatStateLine(machine, { showHead: true, showRules: true }), "1 (1): >1|11< R: 1 1 1 1 1");
});

test("formatTracking lists steps, head moves and the state path", () => {
  const machine = createUnaryIncrementMachine();
  machine.assignTape("111");
  machine.run();

  assert.deepEqual(formatTracking(machine, true), [
    "Steps: 4",
    "Head moves: 3",
    "State path: 1 -> 1 -> 1 -> 1 -> 0"
  ]);
  assert.deepEqual(formatTracking(machine, false), ["Steps: 4", "Head moves: 3"]);
});

test("MachineDisplay prints every step and a summary once halted", () => {
  const machine = createUnaryIncrementMachine();
  const output = createRecorder();
  const display = new MachineDisplay(output, plainOptions);

  machine.assignTape("111");
  display.printState(machine, false);
  while (!machine.isHalted) {
    machine.step();
    display.printStep(machine);
  }

  assert.equal(
    output.text(),
    [
      "0 (1): >111 <",
      "1 (1): >1|11<",
      "2 (1): >11|1<",
      "3 (1): >111|<",
      "4 (0): >1111 <",
      "",
      "Steps: 4",
      "Head moves: 3",
      "State path: 1 -> 1 -> 1 -> 1 -> 0",
      ""
    ].join("\n")
  );
});

test("MachineDisplay in silent mode prints only the halted state and summary", () => {
  const machine = createUnaryIncrementMachine();
  const output = createRecorder();
  const display = new MachineDisplay(output, { ...plainOptions, silent: true, showPath: false });

  machine.assignTape("1");
  display.printState(machine, false);
  machine.step();
  display.printStep(machine);
  machine.step();
  display.printStep(machine);

  assert.equal(output.text(), "2 (0): >11 <\n\nSteps: 2\nHead moves: 1\n");
});

test("MachineDisplay in verbose mode appends tracking to each state line", () => {
  const machine = createUnaryIncrementMachine();
  const output = createRecorder();
  const display = new MachineDisplay(output, { ...plainOptions, verbose: true });

  machine.assignTape("111");
  display.printState(machine, false);

  assert.equal(output.text(), "0 (1): >111 < Steps: 0 Head moves: 0 State path: 1\n");
});

test("MachineDisplay in live mode rewrites one line and pads shorter lines", () => {
  const machine = new TuringMachine(new RuleTable([rule("1", "*", "0", "*", 0)]), resolveMachineConfig());
  const output = createRecorder();
  const display = new MachineDisplay(output, { ...plainOptions, live: true });

  machine.assignTape("abcdef");
  display.printState(machine, false);
  machine.assignTape("ab");
  display.printState(machine, false);
  machine.step();
  display.printStep(machine);

  assert.equal(
    output.text(),
    [
      "0 (1): >abcdef <\r",
      "0 (1): >ab <    \r",
      "1 (0): >ab <    \r",
      "\n\n",
      "Steps: 1\nHead moves: 0\nState path: 1 -> 0\n"
    ].join("")
  );
});
