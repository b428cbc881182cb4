import { LLSDValue } from './types.js';

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Structural equality. Arrays compare in order; maps compare by key set and
 * values regardless of iteration order. Reals use `Object.is`, so NaN
 * equals NaN and -0 differs from 0.
 */
export function equals(a: LLSDValue, b: LLSDValue): boolean {
  switch (a.type) {
    case 'undef':
      return b.type === 'undef';
    case 'boolean':
      return b.type === 'boolean' && b.value === a.value;
    case 'integer':
      return b.type === 'integer' && b.value === a.value;
    case 'string':
      return b.type === 'string' && b.value === a.value;
    case 'date':
      return b.type === 'date' && b.value === a.value;
    case 'uri':
      return b.type === 'uri' && b.value === a.value;
    case 'real':
      return b.type === 'real' && Object.is(a.value, b.value);
    case 'uuid':
      return b.type === 'uuid' && bytesEqual(a.value, b.value);
    case 'binary':
      return b.type === 'binary' && bytesEqual(a.value, b.value);
    case 'array': {
      if (b.type !== 'array' || a.value.length !== b.value.length) return false;
      const other = b.value;
      return a.value.every((item, i) => equals(item, other[i]));
    }
    case 'map': {
      if (b.type !== 'map' || a.value.size !== b.value.size) return false;
      for (const [key, value] of a.value) {
        const counterpart = b.value.get(key);
        if (counterpart === undefined || !equals(value, counterpart)) return false;
      }
      return true;
    }
  }
}
