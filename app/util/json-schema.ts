import fs from 'fs';
import path from 'path';
import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { isRecord } from './object';
import { RequestValidationError } from './errors';

const SCHEMA_DIR = path.join(__dirname, '..', 'schemas');
const STAC_SCHEMA_BASE = 'https://schemas.stacspec.org/v1.0.0/item-spec/json-schema/';

export type StacSchemaName = 'item' | 'itemcollection';

/**
 * Reads a JSON schema bundled with the service
 * @param file - path of the schema relative to the schema directory
 */
function readSchema(file: string): { [key: string]: unknown } {
  const schema: unknown = JSON.parse(fs.readFileSync(path.join(SCHEMA_DIR, file), 'utf8'));
  if (!isRecord(schema)) {
    throw new TypeError(`${file} is not a JSON schema`);
  }
  return schema;
}

let _validator: Ajv;
/**
 * @returns a memoized validator holding every bundled schema
 */
function validator(): Ajv {
  if (_validator) return _validator;
  _validator = new Ajv({ allErrors: true });
  addFormats(_validator);
  for (const file of fs.readdirSync(path.join(SCHEMA_DIR, 'stac'))) {
    _validator.addSchema(readSchema(path.join('stac', file)));
  }
  _validator.addSchema(readSchema('search-body.json'), 'search-body');
  return _validator;
}

/**
 * Returns the validation function of a bundled STAC schema
 * @param name - the schema name
 */
export function getStacValidator(name: StacSchemaName): ValidateFunction {
  const validate = validator().getSchema(`${STAC_SCHEMA_BASE}${name}.json`);
  if (!validate) {
    throw new Error(`Missing STAC schema ${name}.json`);
  }
  return validate;
}

/**
 * Formats validation errors for a response
 * @param errors - the errors reported by ajv
 * @param dataVar - the name to give the validated value
 */
export function describeErrors(errors: ErrorObject[] | null | undefined, dataVar: string): string {
  return validator().errorsText(errors, { dataVar });
}

/**
 * Validates the body of a POST search
 * @param body - the parsed body
 * @throws RequestValidationError - if the body does not match the search schema
 */
export function validateSearchBody(body: unknown): void {
  const validate = validator().getSchema('search-body');
  if (!validate) {
    throw new Error('Missing search body schema');
  }
  if (!validate(body)) {
    throw new RequestValidationError(`Invalid search: ${describeErrors(validate.errors, 'body')}`);
  }
}
