import { LLSDError, LLSDErrorCode } from '../codec/errors.js';
import { isInt32, secondsFromDate, uuidFromText } from '../codec/primitives.js';

/**
 * One node of an LLSD tree. The tree is immutable: constructors copy and
 * freeze their inputs, and nothing exposes a mutating operation.
 */
export type LLSDValue =
  | LLSDUndef
  | LLSDBoolean
  | LLSDInteger
  | LLSDReal
  | LLSDUuid
  | LLSDString
  | LLSDDate
  | LLSDUri
  | LLSDBinary
  | LLSDArray
  | LLSDMap;

export interface LLSDUndef { readonly type: 'undef' }
export interface LLSDBoolean { readonly type: 'boolean'; readonly value: boolean }
/** 32-bit signed integer. */
export interface LLSDInteger { readonly type: 'integer'; readonly value: number }
export interface LLSDReal { readonly type: 'real'; readonly value: number }
/** 16 raw bytes. */
export interface LLSDUuid { readonly type: 'uuid'; readonly value: Uint8Array }
export interface LLSDString { readonly type: 'string'; readonly value: string }
/** Whole seconds since 1970-01-01T00:00:00Z. */
export interface LLSDDate { readonly type: 'date'; readonly value: number }
export interface LLSDUri { readonly type: 'uri'; readonly value: string }
export interface LLSDBinary { readonly type: 'binary'; readonly value: Uint8Array }
export interface LLSDArray { readonly type: 'array'; readonly value: readonly LLSDValue[] }
export interface LLSDMap { readonly type: 'map'; readonly value: ReadonlyMap<string, LLSDValue> }

export type LLSDType = LLSDValue['type'];

export type LLSDEntries = Iterable<readonly [string, LLSDValue]>;

/**
 * Accumulates map entries with last-write-wins semantics. A repeated key
 * replaces the earlier value and moves to the end of iteration order.
 */
export class MapBuilder {
  private entries = new Map<string, LLSDValue>();

  set(key: string, value: LLSDValue): this {
    if (this.entries.has(key)) this.entries.delete(key);
    this.entries.set(key, value);
    return this;
  }

  get size(): number {
    return this.entries.size;
  }

  build(): LLSDMap {
    const value = this.entries;
    this.entries = new Map();
    return frozen({ type: 'map', value });
  }
}

function frozen<T extends LLSDValue>(node: T): T {
  Object.freeze(node);
  return node;
}

const UNDEF = frozen<LLSDUndef>({ type: 'undef' });
const TRUE = frozen<LLSDBoolean>({ type: 'boolean', value: true });
const FALSE = frozen<LLSDBoolean>({ type: 'boolean', value: false });

export const LLSD = {
  undef(): LLSDUndef {
    return UNDEF;
  },

  boolean(value: boolean): LLSDBoolean {
    return value ? TRUE : FALSE;
  },

  integer(value: number): LLSDInteger {
    if (!isInt32(value)) {
      throw new LLSDError(LLSDErrorCode.InvalidInteger, `Integer out of 32-bit range: ${value}`);
    }
    return frozen<LLSDInteger>({ type: 'integer', value: value === 0 ? 0 : value });
  },

  real(value: number): LLSDReal {
    return frozen<LLSDReal>({ type: 'real', value });
  },

  /** Accepts 16 raw bytes or the hyphenated text form. */
  uuid(value: Uint8Array | string): LLSDUuid {
    const bytes = typeof value === 'string' ? uuidFromText(value) : Uint8Array.from(value);
    if (bytes.length !== 16) {
      throw new LLSDError(LLSDErrorCode.InvalidUuid, `UUID must be 16 bytes, got ${bytes.length}`);
    }
    return frozen<LLSDUuid>({ type: 'uuid', value: bytes });
  },

  string(value: string): LLSDString {
    return frozen<LLSDString>({ type: 'string', value });
  },

  /** Epoch seconds, or a `Date`; sub-second precision is floored away. */
  date(value: number | Date): LLSDDate {
    const seconds = value instanceof Date ? secondsFromDate(value) : Math.floor(value);
    if (!Number.isSafeInteger(seconds)) {
      throw new LLSDError(LLSDErrorCode.InvalidDate, `Date is not representable: ${String(value)}`);
    }
    return frozen<LLSDDate>({ type: 'date', value: seconds === 0 ? 0 : seconds });
  },

  uri(value: string): LLSDUri {
    return frozen<LLSDUri>({ type: 'uri', value });
  },

  binary(value: Uint8Array | readonly number[]): LLSDBinary {
    return frozen<LLSDBinary>({ type: 'binary', value: Uint8Array.from(value) });
  },

  array(items: Iterable<LLSDValue> = []): LLSDArray {
    return frozen<LLSDArray>({ type: 'array', value: Object.freeze(Array.from(items)) });
  },

  /** Entries in order; a repeated key keeps its last value. */
  map(entries: LLSDEntries = []): LLSDMap {
    const builder = new MapBuilder();
    for (const [key, value] of entries) builder.set(key, value);
    return builder.build();
  },

  record(fields: Readonly<Record<string, LLSDValue>>): LLSDMap {
    return LLSD.map(Object.entries(fields));
  }
};

/** Short human-readable name of a value's variant, for messages. */
export function describe(value: LLSDValue): string {
  switch (value.type) {
    case 'array':
      return `array[${value.value.length}]`;
    case 'map':
      return `map{${value.value.size}}`;
    default:
      return value.type;
  }
}
