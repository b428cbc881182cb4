import { LLSDValue, LLSD, MapBuilder } from '../value/types.js';
import { LLSDError, LLSDErrorCode } from './errors.js';
import { DecodedGuardrails, checkDepth, checkInputSize, resolveGuardrails } from './guards.js';
import {
  checkInt32,
  decodeBinaryText,
  decodeUtf8,
  encodeBase16,
  encodeBase64,
  encodeUtf8,
  formatDate,
  formatReal,
  parseDate,
  parseInteger,
  parseReal,
  uuidFromText,
  uuidToText
} from './primitives.js';
import { LLSDCodec, NotationSerializeOptions, ParseOptions, SerializeOptions } from './types.js';

export const LLSD_NOTATION_HEADER = '<? llsd/notation ?>\n';

/**
 * `stream` admits byte-counted `s(N)` and `b(N)` spans holding arbitrary
 * bytes; `string` refuses them so the text stays valid Unicode.
 */
export type NotationVariant = 'stream' | 'string';

const UUID_TEXT_LENGTH = 36;

const ch = (c: string): number => c.charCodeAt(0);

const C = {
  quote: ch("'"),
  dquote: ch('"'),
  backslash: ch('\\'),
  openParen: ch('('),
  closeParen: ch(')'),
  openBracket: ch('['),
  closeBracket: ch(']'),
  openBrace: ch('{'),
  closeBrace: ch('}'),
  comma: ch(','),
  colon: ch(':'),
  lt: ch('<')
} as const;

const SIMPLE_ESCAPES = new Map<string, number>([
  ['a', 0x07],
  ['b', 0x08],
  ['f', 0x0c],
  ['n', 0x0a],
  ['r', 0x0d],
  ['t', 0x09],
  ['v', 0x0b]
]);

const BOOLEAN_WORDS = new Map<string, boolean>([
  ['t', true],
  ['T', true],
  ['true', true],
  ['TRUE', true],
  ['f', false],
  ['F', false],
  ['false', false],
  ['FALSE', false]
]);

function isWhitespace(b: number): boolean {
  return b === 0x20 || b === 0x09 || b === 0x0a || b === 0x0d;
}

function isDigit(b: number): boolean {
  return b >= 0x30 && b <= 0x39;
}

function isAlpha(b: number): boolean {
  return (b >= 0x41 && b <= 0x5a) || (b >= 0x61 && b <= 0x7a);
}

function isHex(b: number): boolean {
  return isDigit(b) || (b >= 0x41 && b <= 0x46) || (b >= 0x61 && b <= 0x66);
}

function isRealChar(b: number): boolean {
  return isDigit(b) || isAlpha(b) || b === 0x2b || b === 0x2d || b === 0x2e;
}

function show(b: number): string {
  return b >= 0x20 && b < 0x7f ? `'${String.fromCharCode(b)}'` : `0x${b.toString(16).padStart(2, '0')}`;
}

function ascii(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

/** Recursive-descent reader over the UTF-8 bytes of a notation document. */
export class NotationReader {
  private pos = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly variant: NotationVariant,
    private readonly guardrails: DecodedGuardrails
  ) {}

  get offset(): number {
    return this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.bytes.length;
  }

  private peek(): number | undefined {
    return this.pos < this.bytes.length ? this.bytes[this.pos] : undefined;
  }

  private eof(what: string): LLSDError {
    return new LLSDError(LLSDErrorCode.UnterminatedStructure, `Unexpected end of input in ${what}`, { offset: this.pos });
  }

  private next(what: string): number {
    if (this.pos >= this.bytes.length) throw this.eof(what);
    return this.bytes[this.pos++];
  }

  skipWhitespace(): void {
    while (this.pos < this.bytes.length && isWhitespace(this.bytes[this.pos])) this.pos++;
  }

  /** Skips a leading `<? llsd/notation ?>` line if one is present. */
  skipHeader(): void {
    this.skipWhitespace();
    if (this.peek() !== C.lt || this.bytes[this.pos + 1] !== ch('?')) return;
    const start = this.pos;
    let end = start + 2;
    while (end + 1 < this.bytes.length && !(this.bytes[end] === ch('?') && this.bytes[end + 1] === ch('>'))) end++;
    if (end + 1 >= this.bytes.length) {
      throw new LLSDError(LLSDErrorCode.BadHeader, 'Unterminated notation header', { offset: start });
    }
    const label = ascii(this.bytes.subarray(start + 2, end)).trim().toLowerCase();
    if (label !== 'llsd/notation') {
      throw new LLSDError(LLSDErrorCode.BadHeader, `Unexpected header ${JSON.stringify(label)}`, { offset: start });
    }
    this.pos = end + 2;
    this.skipWhitespace();
  }

  private run(accept: (b: number) => boolean): string {
    const start = this.pos;
    while (this.pos < this.bytes.length && accept(this.bytes[this.pos])) this.pos++;
    return ascii(this.bytes.subarray(start, this.pos));
  }

  private expect(expected: number, what: string): void {
    const at = this.pos;
    const b = this.next(what);
    if (b !== expected) {
      throw new LLSDError(LLSDErrorCode.StructuralError, `Expected ${show(expected)} in ${what}, found ${show(b)}`, { offset: at });
    }
  }

  private openQuote(what: string): number {
    const at = this.pos;
    const q = this.next(what);
    if (q !== C.quote && q !== C.dquote) {
      throw new LLSDError(LLSDErrorCode.StructuralError, `${what} must be quoted, found ${show(q)}`, { offset: at });
    }
    return q;
  }

  /** Bytes of a quoted body up to the closing `quote`, escapes resolved. */
  private quotedBytes(quote: number, what: string): Uint8Array {
    const out: number[] = [];
    for (;;) {
      const b = this.next(what);
      if (b === quote) break;
      if (b !== C.backslash) {
        out.push(b);
        continue;
      }
      const at = this.pos - 1;
      const e = this.next(what);
      const letter = String.fromCharCode(e);
      if (letter === 'x') {
        const hex = [this.next(what), this.next(what)];
        if (!hex.every(isHex)) {
          throw new LLSDError(LLSDErrorCode.InvalidString, `Invalid \\x escape in ${what}`, { offset: at });
        }
        const code = parseInt(ascii(Uint8Array.from(hex)), 16);
        if (this.variant === 'stream' || code < 0x80) {
          out.push(code);
        } else {
          // Text input: \xHH names the code point U+00HH.
          out.push(0xc0 | (code >> 6), 0x80 | (code & 0x3f));
        }
      } else {
        out.push(SIMPLE_ESCAPES.get(letter) ?? e);
      }
    }
    return Uint8Array.from(out);
  }

  private quotedText(what: string): string {
    const start = this.pos;
    const quote = this.openQuote(what);
    return decodeUtf8(this.quotedBytes(quote, what), start);
  }

  /** `(N)` then a quote, exactly N raw bytes and the same quote. */
  private counted(what: string, start: number): Uint8Array {
    if (this.variant === 'string') {
      throw new LLSDError(LLSDErrorCode.UnsupportedForm, `Byte-counted ${what} is not allowed in string notation`, { offset: start });
    }
    this.expect(C.openParen, what);
    const at = this.pos;
    const digits = this.run(isDigit);
    if (digits === '') {
      if (this.atEnd()) throw this.eof(what);
      throw new LLSDError(LLSDErrorCode.StructuralError, `Missing byte count in ${what}`, { offset: at });
    }
    const n = Number(digits);
    this.expect(C.closeParen, what);
    const quote = this.openQuote(what);
    if (n > this.bytes.length - this.pos) {
      throw new LLSDError(LLSDErrorCode.UnterminatedStructure, `${what} declares ${n} bytes but only ${this.bytes.length - this.pos} remain`, { offset: at });
    }
    const body = this.bytes.slice(this.pos, this.pos + n);
    this.pos += n;
    this.expect(quote, what);
    return body;
  }

  value(depth: number): LLSDValue {
    this.skipWhitespace();
    const start = this.pos;
    const b = this.next('value');
    switch (String.fromCharCode(b)) {
      case '!':
        return LLSD.undef();
      case '1':
        return LLSD.boolean(true);
      case '0':
        return LLSD.boolean(false);
      case 't':
      case 'T':
      case 'f':
      case 'F': {
        const word = String.fromCharCode(b) + this.run(isAlpha);
        const flag = BOOLEAN_WORDS.get(word);
        if (flag === undefined) {
          throw new LLSDError(LLSDErrorCode.InvalidBoolean, `Invalid boolean ${JSON.stringify(word)}`, { offset: start });
        }
        return LLSD.boolean(flag);
      }
      case 'i':
        return LLSD.integer(parseInteger(this.run(c => isDigit(c) || c === 0x2b || c === 0x2d), start));
      case 'r':
        return LLSD.real(parseReal(this.run(isRealChar), false, start));
      case 'u': {
        if (this.bytes.length - this.pos < UUID_TEXT_LENGTH) throw this.eof('uuid');
        const text = ascii(this.bytes.subarray(this.pos, this.pos + UUID_TEXT_LENGTH));
        this.pos += UUID_TEXT_LENGTH;
        try {
          return LLSD.uuid(uuidFromText(text));
        } catch (err) {
          throw new LLSDError(LLSDErrorCode.InvalidUuid, `Invalid uuid ${JSON.stringify(text)}`, { offset: start }, err);
        }
      }
      case "'":
      case '"':
        return LLSD.string(decodeUtf8(this.quotedBytes(b, 'string'), start));
      case 's':
        return LLSD.string(decodeUtf8(this.counted('string', start), start));
      case 'l':
        return LLSD.uri(this.quotedText('uri'));
      case 'd': {
        const text = this.quotedText('date');
        try {
          return LLSD.date(parseDate(text));
        } catch (err) {
          throw new LLSDError(LLSDErrorCode.InvalidDate, `Invalid date ${JSON.stringify(text)}`, { offset: start }, err);
        }
      }
      case 'b':
        return LLSD.binary(this.binary(start));
      case '[':
        checkDepth(depth + 1, this.guardrails, start);
        return this.array(depth + 1);
      case '{':
        checkDepth(depth + 1, this.guardrails, start);
        return this.map(depth + 1);
      default:
        throw new LLSDError(LLSDErrorCode.UnknownType, `Unexpected ${show(b)} where a value was expected`, { offset: start });
    }
  }

  private binary(start: number): Uint8Array {
    if (this.peek() === C.openParen) return this.counted('binary', start);
    const base = this.run(isDigit);
    const text = this.quotedText('binary');
    try {
      return decodeBinaryText(text, `b${base}`);
    } catch (err) {
      if (err instanceof LLSDError) {
        throw new LLSDError(err.code, err.message, { offset: start }, err.detail);
      }
      throw err;
    }
  }

  /** After an item: an optional `,`, then `close` ends or another item follows. */
  private separator(close: number, what: string): boolean {
    this.skipWhitespace();
    if (this.peek() === C.comma) {
      this.pos++;
      this.skipWhitespace();
    }
    if (this.atEnd()) throw this.eof(what);
    if (this.peek() === close) {
      this.pos++;
      return true;
    }
    return false;
  }

  private array(depth: number): LLSDValue {
    const items: LLSDValue[] = [];
    this.skipWhitespace();
    if (this.peek() === C.closeBracket) {
      this.pos++;
      return LLSD.array(items);
    }
    do {
      items.push(this.value(depth));
    } while (!this.separator(C.closeBracket, 'array'));
    return LLSD.array(items);
  }

  private key(): string {
    this.skipWhitespace();
    const start = this.pos;
    if (this.peek() === ch('s')) {
      this.pos++;
      return decodeUtf8(this.counted('map key', start), start);
    }
    return this.quotedText('map key');
  }

  private map(depth: number): LLSDValue {
    const builder = new MapBuilder();
    this.skipWhitespace();
    if (this.peek() === C.closeBrace) {
      this.pos++;
      return builder.build();
    }
    do {
      const key = this.key();
      this.skipWhitespace();
      this.expect(C.colon, 'map');
      builder.set(key, this.value(depth));
    } while (!this.separator(C.closeBrace, 'map'));
    return builder.build();
  }
}

/** Reads one complete notation document; trailing non-whitespace is an error. */
export function readNotation(bytes: Uint8Array, variant: NotationVariant, options: ParseOptions = {}): LLSDValue {
  const guardrails = resolveGuardrails(options);
  checkInputSize(bytes.length, guardrails);
  const reader = new NotationReader(bytes, variant, guardrails);
  reader.skipHeader();
  const value = reader.value(0);
  reader.skipWhitespace();
  if (!reader.atEnd()) {
    throw new LLSDError(LLSDErrorCode.StructuralError, 'Unexpected trailing content after value', { offset: reader.offset });
  }
  return value;
}

/** Parses byte-stream notation. */
export function parseNotation(buf: Uint8Array | string, options: ParseOptions = {}): LLSDValue {
  return readNotation(typeof buf === 'string' ? encodeUtf8(buf) : buf, 'stream', options);
}

const CONTROL_ESCAPES: Record<string, string> = {
  '\x07': '\\a',
  '\b': '\\b',
  '\f': '\\f',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\v': '\\v'
};

/** Quotes text with `delim`, escaping the delimiter, backslash and control characters. */
export function quoteNotation(text: string, delim: "'" | '"'): string {
  const escaped = text.replace(/[\\'"\u0000-\u001f\u007f]/g, c => {
    if (c === '\\' || c === delim) return `\\${c}`;
    if (c === "'" || c === '"') return c;
    return CONTROL_ESCAPES[c] ?? `\\x${c.charCodeAt(0).toString(16).padStart(2, '0')}`;
  });
  return `${delim}${escaped}${delim}`;
}

export type NotationPart = string | Uint8Array;

/**
 * Emits notation as text parts plus raw byte spans. Raw spans appear only
 * for byte-counted forms, which the `string` variant never writes.
 */
export class NotationWriter {
  readonly parts: NotationPart[] = [];
  private readonly limits: Pick<DecodedGuardrails, 'maxDepth'>;
  private readonly binaryForm: NonNullable<NotationSerializeOptions['binary']>;
  private readonly countedStrings: boolean;

  constructor(private readonly variant: NotationVariant, options: NotationSerializeOptions) {
    this.binaryForm = options.binary ?? (variant === 'stream' ? 'raw' : 'base64');
    this.countedStrings = options.countedStrings ?? false;
    if (variant === 'string' && (this.binaryForm === 'raw' || this.countedStrings)) {
      throw new LLSDError(LLSDErrorCode.UnsupportedForm, 'String notation cannot carry byte-counted spans');
    }
    this.limits = { maxDepth: options.maxDepth ?? resolveGuardrails().maxDepth };
    if (options.header) this.parts.push(LLSD_NOTATION_HEADER);
  }

  private counted(prefix: string, bytes: Uint8Array): void {
    this.parts.push(`${prefix}(${bytes.length})"`, bytes, '"');
  }

  value(v: LLSDValue, depth: number): void {
    switch (v.type) {
      case 'undef':
        this.parts.push('!');
        break;
      case 'boolean':
        this.parts.push(v.value ? 'T' : 'F');
        break;
      case 'integer':
        this.parts.push(`i${checkInt32(v.value)}`);
        break;
      case 'real':
        if (!Number.isFinite(v.value)) {
          throw new LLSDError(LLSDErrorCode.NonFiniteReal, `Notation cannot represent the real ${v.value}`);
        }
        this.parts.push(`r${formatReal(v.value)}`);
        break;
      case 'uuid':
        this.parts.push(`u${uuidToText(v.value)}`);
        break;
      case 'string':
        if (this.countedStrings) {
          this.counted('s', encodeUtf8(v.value));
        } else {
          this.parts.push(quoteNotation(v.value, "'"));
        }
        break;
      case 'uri':
        this.parts.push(`l${quoteNotation(v.value, '"')}`);
        break;
      case 'date':
        this.parts.push(`d"${formatDate(v.value)}"`);
        break;
      case 'binary':
        if (this.binaryForm === 'raw') {
          this.counted('b', v.value);
        } else if (this.binaryForm === 'base16') {
          this.parts.push(`b16"${encodeBase16(v.value)}"`);
        } else {
          this.parts.push(`b64"${encodeBase64(v.value)}"`);
        }
        break;
      case 'array': {
        checkDepth(depth + 1, this.limits);
        this.parts.push('[');
        let first = true;
        for (const item of v.value) {
          if (!first) this.parts.push(',');
          first = false;
          this.value(item, depth + 1);
        }
        this.parts.push(']');
        break;
      }
      case 'map': {
        checkDepth(depth + 1, this.limits);
        this.parts.push('{');
        let first = true;
        for (const [key, item] of v.value) {
          if (!first) this.parts.push(',');
          first = false;
          this.parts.push(quoteNotation(key, "'"), ':');
          this.value(item, depth + 1);
        }
        this.parts.push('}');
        break;
      }
    }
  }

  toBytes(): Uint8Array {
    const chunks = this.parts.map(p => (typeof p === 'string' ? encodeUtf8(p) : p));
    const out = new Uint8Array(chunks.reduce((n, c) => n + c.length, 0));
    let at = 0;
    for (const chunk of chunks) {
      out.set(chunk, at);
      at += chunk.length;
    }
    return out;
  }
}

/** Serializes byte-stream notation. Binary defaults to raw `b(N)` spans. */
export function serializeNotation(value: LLSDValue, options: NotationSerializeOptions = {}): Uint8Array {
  const writer = new NotationWriter('stream', options);
  writer.value(value, 0);
  return writer.toBytes();
}

export const notationCodec: LLSDCodec = {
  name: 'notation',
  contentTypes: ['application/llsd+notation'],
  isBinary: true,
  parse(buf: Uint8Array | string, options?: ParseOptions): LLSDValue {
    return parseNotation(buf, options);
  },
  serialize(value: LLSDValue, options?: SerializeOptions): Uint8Array {
    return serializeNotation(value, options);
  }
};
