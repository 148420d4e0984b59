import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import test from "node:test";

import { RuleTable, TuringMachine, resolveMachineConfig } from "../../runtime/src/index.ts";
import { parseRuleFile } from "../src/index.ts";

function readExample(name: string): string {
  return readFileSync(new URL(`../../examples/${name}`, import.meta.url), "utf8");
}

function loadExampleMachine(name: string): TuringMachine {
  const parsed = parseRuleFile(readExample(name), { file: name });
  return new TuringMachine(new RuleTable(parsed.rules), resolveMachineConfig(parsed.config));
}

test("unary increment example appends one stroke", () => {
  const machine = loadExampleMachine("unary-increment.tm");
  machine.assignTape("111");
  const tape = machine.run();

  assert.equal(tape.toDisplayString(), "1111");
  assert.equal(machine.currentState, "0");
  assert.equal(machine.stepCount, 4);
  assert.equal(machine.headMoveCount, 3);
});

test("binary increment example uses its configured init and halt states", () => {
  const machine = loadExampleMachine("binary-increment.tm");
  assert.equal(machine.config.initialState, "right");
  assert.equal(machine.config.haltState, "done");

  machine.assignTape("1011");
  machine.run();

  assert.equal(machine.tape.toDisplayString(), "1100_");
  assert.equal(machine.stepCount, 8);
  assert.equal(machine.headMoveCount, 7);
  assert.deepEqual(machine.path, [
    "right",
    "right",
    "right",
    "right",
    "right",
    "carry",
    "carry",
    "carry",
    "done"
  ]);
});

test("binary increment example grows the tape to the left on overflow", () => {
  const machine = loadExampleMachine("binary-increment.tm");
  machine.assignTape("111");
  machine.run();

  assert.equal(machine.tape.toDisplayString(), "1000_");
  assert.equal(machine.head, -1);
  assert.deepEqual(machine.tape.bounds, { start: -1, end: 3 });
});
