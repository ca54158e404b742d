/**
 * JSON Schema request validation for pipestep.
 *
 * Compiles a schema with ajv once and returns a function usable as a
 * pipeline definition's `validate`. Rejects prototype pollution keys
 * before the schema runs.
 */

import _Ajv from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import { StepResult } from './pipeline/step-result.js';

// ---------------------------------------------------------------------------
// Prototype pollution keys
// ---------------------------------------------------------------------------

const POLLUTION_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

function checkPollutionKeys(value: unknown, path: string, seen = new WeakSet<object>()): string[] {
  if (value === null || typeof value !== 'object' || seen.has(value)) {
    return [];
  }
  seen.add(value);

  const errors: string[] = [];

  if (Array.isArray(value)) {
    for (const [index, item] of value.entries()) {
      errors.push(...checkPollutionKeys(item, `${path}/${index}`, seen));
    }
    return errors;
  }

  for (const key of Object.keys(value)) {
    if (POLLUTION_KEYS.has(key)) {
      errors.push(`${path}/${key}: prototype pollution key "${key}" is not allowed`);
    }
    const child: unknown = Reflect.get(value, key);
    errors.push(...checkPollutionKeys(child, `${path}/${key}`, seen));
  }

  return errors;
}

// ---------------------------------------------------------------------------
// createSchemaValidator
// ---------------------------------------------------------------------------

export type RequestValidator<TIn> = (request: TIn) => StepResult<void>;

/**
 * Compile `schema` and return a validator producing VALIDATION failures.
 * The failure message lists every schema violation, separated by `; `.
 *
 * @throws If the schema itself is invalid.
 */
export function createSchemaValidator<TIn>(schema: Record<string, unknown>): RequestValidator<TIn> {
  const ajv = new Ajv({ allErrors: true, strict: false });
  const validateFn = ajv.compile(schema);

  return (request) => {
    const pollutionErrors = checkPollutionKeys(request, '');
    if (pollutionErrors.length > 0) {
      return StepResult.validationFailure(pollutionErrors.join('; '));
    }

    if (validateFn(request)) {
      return StepResult.success();
    }

    const errors = (validateFn.errors ?? []).map((err) => {
      let text = err.message ?? 'unknown error';
      if (err.keyword === 'additionalProperties') {
        text = `additional property "${String(err.params['additionalProperty'])}" not allowed`;
      } else if (err.keyword === 'required') {
        text = `required property "${String(err.params['missingProperty'])}" is missing`;
      }
      return err.instancePath ? `${err.instancePath}: ${text}` : text;
    });

    return StepResult.validationFailure(errors.join('; '));
  };
}
