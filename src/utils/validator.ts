import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)` which may be sync or async.
 * - A throwing validator, sync or async, is wrapped in a `ValidationError` with the thrown error as `cause`.
 * - If the validation result contains `issues`, a `ValidationError` carrying those issues is returned.
 * - On successful validation without issues, returns `[null, result.value]`.
 *
 * @param input - The value to validate, typically a decoded JSON body.
 * @param schema - The StandardSchemaV1 schema used for validation.
 * @param subject - What is being validated, used in error messages.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  subject = 'data',
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError(`error validating ${subject} on validation start`, [], { cause: err }), null];
  }

  const [errAsync, settled] = await safeWrapAsync(() => Promise.resolve(result));
  if (errAsync) {
    return [new ValidationError(`error validating ${subject} asynchronously`, [], { cause: errAsync }), null];
  }

  if (!settled || typeof settled !== 'object') {
    return [new ValidationError(`error validating ${subject}, validator returned no result`, []), null];
  }

  if (settled.issues) {
    return [new ValidationError(`error validating ${subject}`, settled.issues), null];
  }

  return [null, settled.value];
}
