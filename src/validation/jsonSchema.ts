import { promises as fs } from "fs";
import path from "path";
import Ajv, { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { projectRoot } from "../io/paths";

/** Schemas shipped under contracts/schemas, by file stem. */
export type ContractName = "aggregation_report";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validatorCache = new Map<ContractName, ValidateFunction>();

export function contractsSchemasDir(): string {
  return path.join(projectRoot(), "contracts", "schemas");
}

export function contractSchemaPath(name: ContractName): string {
  return path.join(contractsSchemasDir(), `${name}.schema.json`);
}

async function loadJsonSchema(schemaPath: string): Promise<object> {
  const content = await fs.readFile(schemaPath, "utf8");
  if (!content.trim()) {
    throw new Error(`Schema file is empty: ${schemaPath}`);
  }
  return JSON.parse(content) as object;
}

export async function getContractValidator(name: ContractName): Promise<ValidateFunction> {
  const cached = validatorCache.get(name);
  if (cached) return cached;
  const validator = ajv.compile(await loadJsonSchema(contractSchemaPath(name)));
  validatorCache.set(name, validator);
  return validator;
}

export function formatSchemaErrors(validator: ValidateFunction): string {
  return (validator.errors ?? [])
    .map((error) => `${error.instancePath || "<root>"} ${error.message}`)
    .join("; ");
}

export async function assertMatchesContract(name: ContractName, data: unknown, label: string): Promise<void> {
  const validator = await getContractValidator(name);
  if (validator(data)) return;
  throw new Error(`${label} failed schema validation: ${formatSchemaErrors(validator)}`);
}
