import assert from "node:assert/strict";
import test from "node:test";

import {
  ContractValidationError,
  DEFAULT_HALT_STATE,
  DEFAULT_INITIAL_STATE,
  resolveMachineConfig,
  type ConfigEntries
} from "../src/index.ts";

function expectContractValidationError(
  operation: () => unknown,
  expectation: {
    code: "INVALID_INPUT" | "SCHEMA_VALIDATION_FAILED";
    messageIncludes: string;
    hasKeyword?: string;
    hasInstancePath?: string;
  }
): void {
  assert.throws(operation, (error) => {
    assert.ok(error instanceof ContractValidationError);
    assert.equal(error.code, expectation.code);
    assert.equal(error.message.includes(expectation.messageIncludes), true);
    if (expectation.hasKeyword !== undefined) {
      assert.equal(
        error.issues.some((issue) => issue.keyword === expectation.hasKeyword),
        true
      );
    }
    if (expectation.hasInstancePath !== undefined) {
      assert.equal(
        error.issues.some((issue) => issue.instancePath === expectation.hasInstancePath),
        true
      );
    }
    return true;
  });
}

test("resolveMachineConfig falls back to the default state labels", () => {
  const config = resolveMachineConfig();

  assert.deepEqual(config, { initialState: DEFAULT_INITIAL_STATE, haltState: DEFAULT_HALT_STATE });
  assert.equal(config.initialState, "1");
  assert.equal(config.haltState, "0");
  assert.equal(Object.isFrozen(config), true);
});

test("resolveMachineConfig reads init and halt from a parsed map", () => {
  const config = resolveMachineConfig(
    new Map([
      ["init", "A"],
      ["halt", "Z"],
      ["speed", "fast"]
    ])
  );

  assert.deepEqual(config, { initialState: "A", haltState: "Z" });
});

test("resolveMachineConfig accepts plain records and partial overrides", () => {
  assert.deepEqual(resolveMachineConfig({ halt: "stop" }), { initialState: "1", haltState: "stop" });
});

test("resolveMachineConfig rejects state labels that no rule could name", () => {
  expectContractValidationError(() => resolveMachineConfig({ init: "#start" }), {
    code: "SCHEMA_VALIDATION_FAILED",
    messageIncludes: "Machine configuration validation failed at /init",
    hasKeyword: "pattern",
    hasInstancePath: "/init"
  });
});

test("resolveMachineConfig rejects non-string entries", () => {
  expectContractValidationError(
    () => resolveMachineConfig({ halt: 3 } as unknown as ConfigEntries),
    {
      code: "SCHEMA_VALIDATION_FAILED",
      messageIncludes: "/halt",
      hasKeyword: "type"
    }
  );
});

test("resolveMachineConfig rejects entries that are not a map or object", () => {
  expectContractValidationError(() => resolveMachineConfig([] as unknown as ConfigEntries), {
    code: "INVALID_INPUT",
    messageIncludes: "Machine configuration entries must be an object or a map"
  });
});
