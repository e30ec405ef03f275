/**
 * Response shape checks. Only the fields the code reads are described;
 * everything else passes through untouched.
 */

import AjvModule from 'ajv';
import type { SchemaObject, ValidateFunction } from 'ajv';

const Ajv = AjvModule.default;
// ownProperties: payload keys such as `toString` must not resolve to Object.prototype
const ajv = new Ajv({ allErrors: true, ownProperties: true });

export class ResponseShapeError extends Error {
  constructor(what: string, detail: string) {
    super(`Unexpected ${what} response: ${detail}`);
    this.name = 'ResponseShapeError';
  }
}

export function compileShape<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function expectShape<T>(validate: ValidateFunction<T>, data: unknown, what: string): T {
  if (validate(data)) return data;
  throw new ResponseShapeError(what, ajv.errorsText(validate.errors));
}
