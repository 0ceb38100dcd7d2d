import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';

// ajv is CommonJS; under NodeNext the default import is the module object
const Ajv = AjvModule.default;

const __dirname = dirname(fileURLToPath(import.meta.url));

// Schemas stay at the project root: src/utils -> ../../, dist/src/utils -> ../../../
const SCHEMA_DIRS = [join(__dirname, '..', '..', 'schemas'), join(__dirname, '..', '..', '..', 'schemas')];

export function schemaPath(fileName: string): string {
  for (const dir of SCHEMA_DIRS) {
    const candidate = join(dir, fileName);
    if (existsSync(candidate)) return candidate;
  }
  throw new Error(`schema ${fileName} not found in ${SCHEMA_DIRS.join(' or ')}`);
}

export function readSchema(fileName: string): object {
  const parsed: unknown = JSON.parse(readFileSync(schemaPath(fileName), 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`schema ${fileName} is not a JSON object`);
  }
  return parsed;
}

export function createAjv(): InstanceType<typeof Ajv> {
  return new Ajv({ strict: true, allErrors: true, allowUnionTypes: true });
}

/** Renders ajv errors as `"/path: message"` lines. */
export function formatSchemaErrors(errors: readonly ErrorObject[] | null | undefined): string[] {
  if (!errors) return [];
  return errors.map(error => `${error.instancePath || '/'}: ${error.message ?? 'is invalid'}`);
}

export type { ErrorObject, ValidateFunction };
