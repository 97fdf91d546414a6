import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { SchemaObject } from "ajv";
import { getRepoRoot } from "../paths";

export type ValidationOutcome = { valid: boolean; errors: string[] };

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function loadSchemas(root: string): Map<string, SchemaObject> {
  const schemaDir = path.join(root, "schemas");
  const schemaFiles = fs.readdirSync(schemaDir).filter((file) => file.endsWith(".schema.json"));
  const schemas = new Map<string, SchemaObject>();
  for (const file of schemaFiles) {
    const schema: unknown = JSON.parse(fs.readFileSync(path.join(schemaDir, file), "utf-8"));
    if (!isSchemaObject(schema)) {
      continue;
    }
    schemas.set(file, { ...schema, $id: typeof schema.$id === "string" ? schema.$id : file });
  }
  return schemas;
}

let cached: Ajv2020 | null = null;

function getValidator(): Ajv2020 {
  if (cached) {
    return cached;
  }
  const ajv = new Ajv2020({ allErrors: true });
  for (const [file, schema] of loadSchemas(getRepoRoot())) {
    ajv.addSchema(schema, file);
  }
  cached = ajv;
  return ajv;
}

export function validateJson(schemaFile: string, data: unknown): ValidationOutcome {
  const validate = getValidator().getSchema(schemaFile);
  if (!validate) {
    return { valid: false, errors: [`Schema not found: ${schemaFile}`] };
  }
  const valid = validate(data);
  const errors = (validate.errors ?? []).map((error) => `${error.instancePath} ${error.message ?? ""}`.trim());
  return { valid: Boolean(valid), errors };
}
