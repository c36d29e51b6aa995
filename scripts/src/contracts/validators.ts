import { fileURLToPath } from "node:url";

import AjvModule, { type ErrorObject, type ValidateFunction } from "ajv";

import type { ParseIssueKind, RawLogEntry } from "lib/report/types.js";

import { readJsonFile } from "../utils/fs.js";

const LOG_RECORD_SCHEMA_PATH = fileURLToPath(new URL("../../../lib/log_record.schema.json", import.meta.url));

// ajv ships CommonJS; loaded as ESM the class sits on `.default`.
const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });

let logRecordValidator: ValidateFunction<RawLogEntry> | null = null;

export type EntryValidation =
  | { valid: true; entry: RawLogEntry }
  | { valid: false; kind: ParseIssueKind; errors: string[] };

export async function loadLogRecordValidator(): Promise<ValidateFunction<RawLogEntry>> {
  if (!logRecordValidator) {
    const schema = await readJsonFile(LOG_RECORD_SCHEMA_PATH);
    if (!isRecord(schema)) {
      throw new Error(`Log record schema missing at ${LOG_RECORD_SCHEMA_PATH}`);
    }
    logRecordValidator = ajv.compile<RawLogEntry>(schema);
  }
  return logRecordValidator;
}

export function validateLogEntry(validate: ValidateFunction<RawLogEntry>, candidate: unknown): EntryValidation {
  if (validate(candidate)) {
    return { valid: true, entry: candidate };
  }
  const errors = validate.errors ?? [];
  // Enum failures mean the shape was right but a value is outside the closed vocabulary.
  const kind: ParseIssueKind = errors.some((error) => error.keyword === "enum") ? "invalid-value" : "invalid-shape";
  return { valid: false, kind, errors: formatErrors(errors) };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatErrors(errors: ErrorObject[]): string[] {
  if (errors.length === 0) {
    return ["Unknown validation error"];
  }
  return errors
    .filter((error) => error.keyword !== "anyOf")
    .map((error) => `${error.instancePath || "/"} ${error.message ?? "invalid"}`);
}
