import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { SchemaObject, ValidateFunction } from "ajv";
import { getRepoRoot } from "../paths";

export type ValidationIssue = {
  path: string;
  message: string;
};

export type ValidationResult = {
  valid: boolean;
  issues: ValidationIssue[];
};

const compiled = new Map<string, ValidateFunction>();

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function loadValidator(schemaFile: string): ValidateFunction | null {
  const cached = compiled.get(schemaFile);
  if (cached) {
    return cached;
  }
  const schemaPath = path.join(getRepoRoot(), "schemas", schemaFile);
  if (!fs.existsSync(schemaPath)) {
    return null;
  }
  const schema: unknown = JSON.parse(fs.readFileSync(schemaPath, "utf-8"));
  if (!isSchemaObject(schema)) {
    return null;
  }
  const ajv = new Ajv2020({ allErrors: true });
  const validate = ajv.compile(schema);
  compiled.set(schemaFile, validate);
  return validate;
}

export function validateJson(schemaFile: string, data: unknown): ValidationResult {
  const validate = loadValidator(schemaFile);
  if (!validate) {
    return { valid: false, issues: [{ path: "", message: `Schema not found: ${schemaFile}` }] };
  }
  const valid = validate(data);
  const issues = (validate.errors ?? []).map((error) => ({
    path: error.instancePath,
    message: `${error.instancePath || "/"} ${error.message ?? "is invalid"}`.trim()
  }));
  return { valid: Boolean(valid), issues };
}
