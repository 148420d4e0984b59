import { readFileSync } from "node:fs";
import { createRequire } from "node:module";

import type { ErrorObject, ValidateFunction } from "ajv/dist/2020.js";

export const DEFAULT_INITIAL_STATE = "1";
export const DEFAULT_HALT_STATE = "0";

export interface MachineConfig {
  readonly initialState: string;
  readonly haltState: string;
}

export type ConfigEntries = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

export type ContractValidationCode = "INVALID_INPUT" | "SCHEMA_VALIDATION_FAILED";

export interface ContractValidationIssue {
  instancePath: string;
  keyword: string;
  message: string;
}

export class ContractValidationError extends Error {
  readonly code: ContractValidationCode;
  readonly issues: ContractValidationIssue[];

  constructor(params: { code: ContractValidationCode; message: string; issues?: ContractValidationIssue[] }) {
    super(params.message);
    this.name = "ContractValidationError";
    this.code = params.code;
    this.issues = params.issues ?? [];
  }
}

type Ajv2020Constructor = new (options: { allErrors: boolean }) => {
  compile(schema: object): ValidateFunction;
};

let machineConfigValidator: ValidateFunction | null = null;
let ajv2020Constructor: Ajv2020Constructor | null = null;

function resolveAjv2020Constructor(moduleValue: unknown): Ajv2020Constructor {
  const candidate = moduleValue as
    | Ajv2020Constructor
    | { default?: Ajv2020Constructor; Ajv2020?: Ajv2020Constructor };

  if (typeof candidate === "function") {
    return candidate;
  }
  if (candidate.default && typeof candidate.default === "function") {
    return candidate.default;
  }
  if (candidate.Ajv2020 && typeof candidate.Ajv2020 === "function") {
    return candidate.Ajv2020;
  }

  throw new Error("Unable to resolve Ajv2020 constructor");
}

function getAjv2020Constructor(): Ajv2020Constructor {
  if (ajv2020Constructor) {
    return ajv2020Constructor;
  }

  const nodeRequire = createRequire(import.meta.url);
  ajv2020Constructor = resolveAjv2020Constructor(nodeRequire("ajv/dist/2020.js"));
  return ajv2020Constructor;
}

function getMachineConfigValidator(): ValidateFunction {
  if (machineConfigValidator) {
    return machineConfigValidator;
  }

  const Ajv2020Constructor = getAjv2020Constructor();
  const ajv = new Ajv2020Constructor({ allErrors: true });
  machineConfigValidator = ajv.compile(loadSchema("../schemas/machine-config.schema.json"));
  return machineConfigValidator;
}

function loadSchema(relativePathFromSource: string): object {
  const fileContents = readFileSync(new URL(relativePathFromSource, import.meta.url), "utf8");
  return JSON.parse(fileContents) as object;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toEntryRecord(entries: unknown): Record<string, unknown> {
  if (entries instanceof Map) {
    const record: Record<string, unknown> = {};
    for (const [key, value] of entries) {
      record[String(key)] = value;
    }
    return record;
  }

  if (!isRecord(entries)) {
    throw new ContractValidationError({
      code: "INVALID_INPUT",
      message: "Machine configuration entries must be an object or a map"
    });
  }

  return { ...entries };
}

function mapAjvIssues(errors: ErrorObject[] | null | undefined): ContractValidationIssue[] {
  return (errors ?? []).map((error) => ({
    instancePath: error.instancePath,
    keyword: error.keyword,
    message: error.message ?? "validation failed"
  }));
}

function readStateLabel(record: Record<string, unknown>, key: string, fallback: string): string {
  const value = record[key];
  return typeof value === "string" ? value : fallback;
}

/**
 * Builds the immutable machine configuration from parsed rule-file entries.
 * Only `init` and `halt` are read; every other key is validated as a string
 * and left for callers.
 */
export function resolveMachineConfig(entries: ConfigEntries = new Map()): MachineConfig {
  const record = toEntryRecord(entries);
  const validate = getMachineConfigValidator();
  const validationResult = validate(record);

  if (typeof validationResult !== "boolean") {
    throw new ContractValidationError({
      code: "SCHEMA_VALIDATION_FAILED",
      message: "Machine configuration validation failed: async schema validators are not supported"
    });
  }

  if (!validationResult) {
    const issues = mapAjvIssues(validate.errors);
    const firstIssue = issues[0];
    const issuePath = firstIssue?.instancePath || "/";
    const issueMessage = firstIssue?.message ?? "validation failed";

    throw new ContractValidationError({
      code: "SCHEMA_VALIDATION_FAILED",
      message: `Machine configuration validation failed at ${issuePath}: ${issueMessage}`,
      issues
    });
  }

  return Object.freeze({
    initialState: readStateLabel(record, "init", DEFAULT_INITIAL_STATE),
    haltState: readStateLabel(record, "halt", DEFAULT_HALT_STATE)
  });
}
