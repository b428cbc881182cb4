import { LLSDError, LLSDErrorCode } from '../codec/errors.js';
import { LLSDType, LLSDValue, describe } from './types.js';

export type AccessResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LLSDError };

type PayloadOf<K extends LLSDType> = Extract<LLSDValue, { type: K }> extends { value: infer P } ? P : null;

function access<K extends LLSDType>(value: LLSDValue, expected: K, read: (v: Extract<LLSDValue, { type: K }>) => PayloadOf<K>): AccessResult<PayloadOf<K>> {
  if (isType(value, expected)) {
    return { ok: true, value: read(value) };
  }
  return {
    ok: false,
    error: new LLSDError(LLSDErrorCode.WrongVariant, `Expected ${expected}, found ${describe(value)}`, {}, { expected, actual: value.type })
  };
}

export function isType<K extends LLSDType>(value: LLSDValue, type: K): value is Extract<LLSDValue, { type: K }> {
  return value.type === type;
}

export const asUndef = (v: LLSDValue): AccessResult<null> => access(v, 'undef', () => null);
export const asBoolean = (v: LLSDValue): AccessResult<boolean> => access(v, 'boolean', n => n.value);
export const asInteger = (v: LLSDValue): AccessResult<number> => access(v, 'integer', n => n.value);
export const asReal = (v: LLSDValue): AccessResult<number> => access(v, 'real', n => n.value);
// Byte payloads are returned as copies so the tree stays unchanged.
export const asUuid = (v: LLSDValue): AccessResult<Uint8Array> => access(v, 'uuid', n => n.value.slice());
export const asString = (v: LLSDValue): AccessResult<string> => access(v, 'string', n => n.value);
export const asDate = (v: LLSDValue): AccessResult<number> => access(v, 'date', n => n.value);
export const asUri = (v: LLSDValue): AccessResult<string> => access(v, 'uri', n => n.value);
export const asBinary = (v: LLSDValue): AccessResult<Uint8Array> => access(v, 'binary', n => n.value.slice());
export const asArray = (v: LLSDValue): AccessResult<readonly LLSDValue[]> => access(v, 'array', n => n.value);
export const asMap = (v: LLSDValue): AccessResult<ReadonlyMap<string, LLSDValue>> => access(v, 'map', n => n.value);

/** Returns the payload or throws the access error. */
export function unwrap<T>(result: AccessResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
