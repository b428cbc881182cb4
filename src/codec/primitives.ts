import { TextDecoder, TextEncoder } from 'util';
import { LLSDError, LLSDErrorCode } from './errors.js';

// Low-level conversions shared by the XML, binary and notation codecs.

export const NIL_UUID = new Uint8Array(16);

const UUID_TEXT = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;
const BASE64_TEXT = /^[A-Za-z0-9+/]*={0,2}$/;
const BASE16_TEXT = /^(?:[0-9a-fA-F]{2})*$/;
const INTEGER_TEXT = /^[+-]?\d+$/;
const REAL_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const DATE_TEXT = /^([+-]\d{6}|\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;
const WHITESPACE = /\s+/g;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
// ECMAScript Date range, in seconds.
const MAX_DATE_SECONDS = 8.64e12;

const utf8Encoder = new TextEncoder();

// ---- UUID ----

export function uuidToText(bytes: Uint8Array): string {
  if (bytes.length !== 16) {
    throw new LLSDError(LLSDErrorCode.InvalidUuid, `UUID must be 16 bytes, got ${bytes.length}`);
  }
  const hex = encodeBase16(bytes);
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

export function uuidFromText(text: string): Uint8Array {
  if (!UUID_TEXT.test(text)) {
    throw new LLSDError(LLSDErrorCode.InvalidUuid, `Invalid UUID text: ${JSON.stringify(text)}`);
  }
  return decodeBase16(text.replace(/-/g, ''));
}

// ---- Date ----

/** Renders whole epoch seconds as `YYYY-MM-DDTHH:MM:SSZ`. */
export function formatDate(seconds: number): string {
  if (!Number.isSafeInteger(seconds) || Math.abs(seconds) > MAX_DATE_SECONDS) {
    throw new LLSDError(LLSDErrorCode.InvalidDate, `Date out of range: ${seconds} seconds`);
  }
  return new Date(seconds * 1000).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Parses an ISO-8601 UTC timestamp into epoch seconds.
 * Fractional seconds are dropped; a numeric offset is folded into UTC.
 */
export function parseDate(text: string): number {
  const m = DATE_TEXT.exec(text);
  if (!m) {
    throw new LLSDError(LLSDErrorCode.InvalidDate, `Invalid date: ${JSON.stringify(text)}`);
  }
  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(part => parseInt(part, 10));
  const zone = m[7];
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    throw new LLSDError(LLSDErrorCode.InvalidDate, `Invalid date: ${JSON.stringify(text)}`);
  }
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  d.setUTCHours(hour, minute, second, 0);
  if (Number.isNaN(d.getTime()) || d.getUTCDate() !== day || d.getUTCMonth() !== month - 1) {
    throw new LLSDError(LLSDErrorCode.InvalidDate, `Invalid date: ${JSON.stringify(text)}`);
  }
  let seconds = d.getTime() / 1000;
  if (zone !== 'Z' && zone !== 'z') {
    const sign = zone[0] === '-' ? -1 : 1;
    const offHours = parseInt(zone.slice(1, 3), 10);
    const offMinutes = parseInt(zone.slice(4, 6), 10);
    if (offHours > 23 || offMinutes > 59) {
      throw new LLSDError(LLSDErrorCode.InvalidDate, `Invalid UTC offset in date: ${JSON.stringify(text)}`);
    }
    seconds -= sign * (offHours * 3600 + offMinutes * 60);
  }
  return seconds;
}

/** Floors a JavaScript `Date` to whole epoch seconds. */
export function secondsFromDate(date: Date): number {
  const ms = date.getTime();
  if (Number.isNaN(ms)) {
    throw new LLSDError(LLSDErrorCode.InvalidDate, 'Invalid Date object');
  }
  return Math.floor(ms / 1000);
}

// ---- Binary as text ----

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

export function decodeBase64(text: string): Uint8Array {
  const clean = text.replace(WHITESPACE, '');
  if (clean.length % 4 !== 0 || !BASE64_TEXT.test(clean)) {
    throw new LLSDError(LLSDErrorCode.InvalidBinary, 'Invalid base64 text');
  }
  return Uint8Array.from(Buffer.from(clean, 'base64'));
}

export function encodeBase16(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}

export function decodeBase16(text: string): Uint8Array {
  const clean = text.replace(WHITESPACE, '');
  if (!BASE16_TEXT.test(clean)) {
    throw new LLSDError(LLSDErrorCode.InvalidBinary, 'Invalid base16 text');
  }
  return Uint8Array.from(Buffer.from(clean, 'hex'));
}

/**
 * Decodes binary text given the discriminator carried by the surrounding
 * format (`encoding` attribute in XML, `b64`/`b16` prefix in notation).
 */
export function decodeBinaryText(text: string, encoding: string): Uint8Array {
  switch (encoding.toLowerCase()) {
    case 'base64':
    case 'b64':
      return decodeBase64(text);
    case 'base16':
    case 'hex':
    case 'b16':
      return decodeBase16(text);
    case 'base85':
    case 'b85':
      throw new LLSDError(LLSDErrorCode.UnsupportedForm, 'base85 binary encoding is not supported');
    default:
      throw new LLSDError(LLSDErrorCode.InvalidBinary, `Unknown binary encoding: ${JSON.stringify(encoding)}`);
  }
}

// ---- UTF-8 ----

export function encodeUtf8(text: string): Uint8Array {
  if (LONE_SURROGATE.test(text)) {
    throw new LLSDError(LLSDErrorCode.UnrepresentableText, 'String contains an unpaired surrogate');
  }
  return utf8Encoder.encode(text);
}

export function decodeUtf8(bytes: Uint8Array, offset?: number): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (err) {
    throw new LLSDError(LLSDErrorCode.InvalidString, 'Invalid UTF-8 in string', { offset }, err);
  }
}

export function hasLoneSurrogate(text: string): boolean {
  return LONE_SURROGATE.test(text);
}

// ---- Numbers ----

export function isInt32(n: number): boolean {
  return Number.isInteger(n) && n >= INT32_MIN && n <= INT32_MAX;
}

/** Guards serializers against hand-built integer nodes outside int32. */
export function checkInt32(n: number): number {
  if (!isInt32(n)) {
    throw new LLSDError(LLSDErrorCode.InvalidInteger, `Integer out of 32-bit range: ${n}`);
  }
  return n;
}

/** Decimal integer text to int32. Out-of-range input is an error, never wrapped. */
export function parseInteger(text: string, offset?: number): number {
  if (!INTEGER_TEXT.test(text)) {
    throw new LLSDError(LLSDErrorCode.InvalidInteger, `Invalid integer: ${JSON.stringify(text)}`, { offset });
  }
  const n = Number(text);
  if (!isInt32(n)) {
    throw new LLSDError(LLSDErrorCode.InvalidInteger, `Integer out of 32-bit range: ${text}`, { offset });
  }
  return n === 0 ? 0 : n;
}

export type NonFiniteWord = 'nan' | 'inf' | '-inf';

const NON_FINITE_WORDS: Record<string, number> = {
  'nan': NaN,
  '+nan': NaN,
  '-nan': NaN,
  'inf': Infinity,
  '+inf': Infinity,
  'infinity': Infinity,
  '+infinity': Infinity,
  '-inf': -Infinity,
  '-infinity': -Infinity
};

export function isNonFiniteWord(text: string): boolean {
  return Object.prototype.hasOwnProperty.call(NON_FINITE_WORDS, text.toLowerCase());
}

/**
 * Decimal real text to a double. `allowNonFinite` admits the `nan`/`inf`
 * spellings; otherwise they fail with `NonFiniteReal`.
 */
export function parseReal(text: string, allowNonFinite: boolean, offset?: number): number {
  if (REAL_TEXT.test(text)) return Number(text);
  if (isNonFiniteWord(text)) {
    if (allowNonFinite) return NON_FINITE_WORDS[text.toLowerCase()];
    throw new LLSDError(LLSDErrorCode.NonFiniteReal, `Non-finite real ${JSON.stringify(text)} is not accepted here`, { offset });
  }
  throw new LLSDError(LLSDErrorCode.InvalidReal, `Invalid real: ${JSON.stringify(text)}`, { offset });
}

/** Shortest round-trip decimal for a finite double. */
export function formatReal(n: number): string {
  if (Object.is(n, -0)) return '-0';
  return String(n);
}

export function nonFiniteWord(n: number): NonFiniteWord {
  if (Number.isNaN(n)) return 'nan';
  return n > 0 ? 'inf' : '-inf';
}
