import { expect } from 'chai';
import { describeErrors, getStacValidator, StacSchemaName } from '../../app/util/json-schema';

/**
 * Asserts that the value is valid against one of the bundled STAC schemas
 *
 * @param name - the schema to validate against
 * @param value - the STAC JSON, usually a response body
 */
export function expectValidStac(name: StacSchemaName, value: unknown): void {
  const validate = getStacValidator(name);
  const valid = validate(value);
  expect(valid, describeErrors(validate.errors, name)).to.equal(true);
}
