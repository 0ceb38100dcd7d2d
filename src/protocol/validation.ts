import { createAjv, formatSchemaErrors, readSchema, type ValidateFunction } from '../utils/schemas.js';
import type { CondaBuildParams, CondaMetadataParams, InitializeParams } from './types.js';

const SCHEMA_ID = 'https://conda-build-backends.local/schemas/protocol.json';

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export type ParamsValidator<T> = (value: unknown) => ValidationResult<T>;

interface ProtocolValidators {
  readonly initialize: ParamsValidator<InitializeParams>;
  readonly condaMetadata: ParamsValidator<CondaMetadataParams>;
  readonly condaBuild: ParamsValidator<CondaBuildParams>;
}

function wrap<T>(validate: ValidateFunction<T>): ParamsValidator<T> {
  return value => (validate(value) ? { ok: true, value } : { ok: false, errors: formatSchemaErrors(validate.errors) });
}

let validators: ProtocolValidators | null = null;

/** Validators for every request's params, compiled once from `schemas/protocol.schema.json`. */
export function protocolValidators(): ProtocolValidators {
  if (validators === null) {
    const ajv = createAjv();
    ajv.addSchema(readSchema('protocol.schema.json'));
    validators = {
      initialize: wrap(ajv.compile<InitializeParams>({ $ref: `${SCHEMA_ID}#/$defs/InitializeParams` })),
      condaMetadata: wrap(ajv.compile<CondaMetadataParams>({ $ref: `${SCHEMA_ID}#/$defs/CondaMetadataParams` })),
      condaBuild: wrap(ajv.compile<CondaBuildParams>({ $ref: `${SCHEMA_ID}#/$defs/CondaBuildParams` })),
    };
  }
  return validators;
}
