import { LLSDValue, LLSD, MapBuilder } from '../value/types.js';
import { LLSDError, LLSDErrorCode } from './errors.js';
import { DecodedGuardrails, checkDepth, checkInputSize, resolveGuardrails } from './guards.js';
import { checkInt32, decodeUtf8, encodeUtf8 } from './primitives.js';
import { BinaryParseOptions, BinarySerializeOptions, LLSDCodec, ParseOptions, SerializeOptions } from './types.js';

export const LLSD_BINARY_HEADER = '<? LLSD/Binary ?>\n';
// Header spelling written by some other implementations; accepted on input.
const LLSD_BINARY_HEADER_COMPACT = '<?llsd/binary?>\n';

const HEADERS = [LLSD_BINARY_HEADER, LLSD_BINARY_HEADER_COMPACT].map(h => Buffer.from(h, 'ascii'));

// Dates are int64 seconds on the wire but safe integers in memory.
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/** One-byte type tags of the binary wire format. */
export const BinaryTag = {
  Undef: 0x21, // !
  True: 0x31, // 1
  False: 0x30, // 0
  Integer: 0x69, // i
  Real: 0x72, // r
  Uuid: 0x75, // u
  String: 0x73, // s
  Date: 0x64, // d
  Uri: 0x6c, // l
  Binary: 0x62, // b
  ArrayOpen: 0x5b, // [
  ArrayClose: 0x5d, // ]
  MapOpen: 0x7b, // {
  MapClose: 0x7d, // }
  MapKey: 0x6b // k
} as const;

function tagName(tag: number): string {
  return tag >= 0x20 && tag < 0x7f ? `'${String.fromCharCode(tag)}'` : `0x${tag.toString(16).padStart(2, '0')}`;
}

function toBytes(buf: Uint8Array | string): Uint8Array {
  return typeof buf === 'string' ? Buffer.from(buf, 'binary') : buf;
}

function headerLength(bytes: Uint8Array): number {
  for (const h of HEADERS) {
    if (bytes.length >= h.length && h.every((b, i) => bytes[i] === b)) return h.length;
  }
  return -1;
}

class BinaryReader {
  private pos = 0;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array, private readonly guardrails: DecodedGuardrails) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.pos;
  }

  skip(n: number): void {
    this.pos += n;
  }

  atEnd(): boolean {
    return this.pos >= this.bytes.length;
  }

  private need(n: number, what: string): void {
    if (this.bytes.length - this.pos < n) {
      throw new LLSDError(
        LLSDErrorCode.TruncatedInput,
        `Truncated input reading ${what}: need ${n} bytes, ${this.bytes.length - this.pos} remain`,
        { offset: this.pos }
      );
    }
  }

  u8(what: string): number {
    this.need(1, what);
    return this.bytes[this.pos++];
  }

  u32(what: string): number {
    this.need(4, what);
    const v = this.view.getUint32(this.pos, false);
    this.pos += 4;
    return v;
  }

  i32(): number {
    this.need(4, 'integer');
    const v = this.view.getInt32(this.pos, false);
    this.pos += 4;
    return v;
  }

  f64(what: string): number {
    this.need(8, what);
    const v = this.view.getFloat64(this.pos, false);
    this.pos += 8;
    return v;
  }

  i64(what: string): bigint {
    this.need(8, what);
    const v = this.view.getBigInt64(this.pos, false);
    this.pos += 8;
    return v;
  }

  take(n: number, what: string): Uint8Array {
    this.need(n, what);
    const out = this.bytes.slice(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  sized(what: string): Uint8Array {
    const length = this.u32(`${what} length`);
    return this.take(length, what);
  }

  text(what: string): string {
    const start = this.pos;
    return decodeUtf8(this.sized(what), start);
  }

  value(depth: number): LLSDValue {
    const start = this.pos;
    const tag = this.u8('type tag');
    switch (tag) {
      case BinaryTag.Undef:
        return LLSD.undef();
      case BinaryTag.True:
        return LLSD.boolean(true);
      case BinaryTag.False:
        return LLSD.boolean(false);
      case BinaryTag.Integer:
        return LLSD.integer(this.i32());
      case BinaryTag.Real:
        return LLSD.real(this.f64('real'));
      case BinaryTag.Uuid:
        return LLSD.uuid(this.take(16, 'uuid'));
      case BinaryTag.String:
        return LLSD.string(this.text('string'));
      case BinaryTag.Uri:
        return LLSD.uri(this.text('uri'));
      case BinaryTag.Binary:
        return LLSD.binary(this.sized('binary'));
      case BinaryTag.Date: {
        const seconds = this.i64('date');
        if (seconds < MIN_SAFE || seconds > MAX_SAFE) {
          throw new LLSDError(LLSDErrorCode.InvalidDate, `Date ${seconds} is outside the representable range`, { offset: start + 1 });
        }
        return LLSD.date(Number(seconds));
      }
      case BinaryTag.ArrayOpen:
        return this.array(depth + 1, start);
      case BinaryTag.MapOpen:
        return this.map(depth + 1, start);
      default:
        throw new LLSDError(LLSDErrorCode.UnknownTag, `Unknown binary type tag ${tagName(tag)}`, { offset: start });
    }
  }

  // Each element takes at least one byte, so a count beyond the remaining
  // input is rejected before any storage is sized from it.
  private count(what: string): number {
    const at = this.pos;
    const n = this.u32(`${what} count`);
    if (n > this.bytes.length - this.pos) {
      throw new LLSDError(LLSDErrorCode.TruncatedInput, `${what} declares ${n} entries but only ${this.bytes.length - this.pos} bytes remain`, { offset: at });
    }
    return n;
  }

  private array(depth: number, start: number): LLSDValue {
    checkDepth(depth, this.guardrails, start);
    const n = this.count('array');
    const items: LLSDValue[] = new Array(n);
    for (let i = 0; i < n; i++) items[i] = this.value(depth);
    this.close(BinaryTag.ArrayClose, 'array');
    return LLSD.array(items);
  }

  private map(depth: number, start: number): LLSDValue {
    checkDepth(depth, this.guardrails, start);
    const n = this.count('map');
    const builder = new MapBuilder();
    for (let i = 0; i < n; i++) {
      const at = this.pos;
      const prefix = this.u8('map key tag');
      if (prefix !== BinaryTag.MapKey) {
        throw new LLSDError(LLSDErrorCode.StructuralError, `Map key must start with 'k', found ${tagName(prefix)}`, { offset: at });
      }
      const key = this.text('map key');
      builder.set(key, this.value(depth));
    }
    this.close(BinaryTag.MapClose, 'map');
    return builder.build();
  }

  private close(expected: number, what: string): void {
    const at = this.pos;
    const tag = this.u8(`${what} terminator`);
    if (tag !== expected) {
      throw new LLSDError(LLSDErrorCode.StructuralError, `${what} must end with ${tagName(expected)}, found ${tagName(tag)}`, { offset: at });
    }
  }
}

/** Parses a complete binary LLSD document. */
export function parseBinary(buf: Uint8Array | string, options: BinaryParseOptions = {}): LLSDValue {
  const bytes = toBytes(buf);
  const guardrails = resolveGuardrails(options);
  checkInputSize(bytes.length, guardrails);
  const reader = new BinaryReader(bytes, guardrails);
  if (options.header !== false) {
    const skip = headerLength(bytes);
    if (skip < 0) {
      throw new LLSDError(LLSDErrorCode.BadHeader, `Binary LLSD must begin with ${JSON.stringify(LLSD_BINARY_HEADER)}`, { offset: 0 });
    }
    reader.skip(skip);
  }
  const value = reader.value(0);
  if (!reader.atEnd()) {
    throw new LLSDError(LLSDErrorCode.StructuralError, 'Unexpected trailing bytes after value', { offset: reader.offset });
  }
  return value;
}

class BinaryWriter {
  private chunks: Uint8Array[] = [];
  private length = 0;

  private readonly limits: Pick<DecodedGuardrails, 'maxDepth'>;

  constructor(maxDepth: number) {
    this.limits = { maxDepth };
  }

  private push(chunk: Uint8Array): void {
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  private tag(tag: number): void {
    this.push(Uint8Array.of(tag));
  }

  private u32(n: number): void {
    const b = new Uint8Array(4);
    new DataView(b.buffer).setUint32(0, n, false);
    this.push(b);
  }

  private sized(bytes: Uint8Array): void {
    this.u32(bytes.length);
    this.push(bytes);
  }

  raw(bytes: Uint8Array): void {
    this.push(bytes);
  }

  value(v: LLSDValue, depth: number): void {
    switch (v.type) {
      case 'undef':
        this.tag(BinaryTag.Undef);
        break;
      case 'boolean':
        this.tag(v.value ? BinaryTag.True : BinaryTag.False);
        break;
      case 'integer': {
        const b = new Uint8Array(5);
        b[0] = BinaryTag.Integer;
        new DataView(b.buffer).setInt32(1, checkInt32(v.value), false);
        this.push(b);
        break;
      }
      case 'real': {
        const b = new Uint8Array(9);
        b[0] = BinaryTag.Real;
        new DataView(b.buffer).setFloat64(1, v.value, false);
        this.push(b);
        break;
      }
      case 'date': {
        const b = new Uint8Array(9);
        b[0] = BinaryTag.Date;
        new DataView(b.buffer).setBigInt64(1, BigInt(v.value), false);
        this.push(b);
        break;
      }
      case 'uuid':
        this.tag(BinaryTag.Uuid);
        this.push(v.value);
        break;
      case 'string':
        this.tag(BinaryTag.String);
        this.sized(encodeUtf8(v.value));
        break;
      case 'uri':
        this.tag(BinaryTag.Uri);
        this.sized(encodeUtf8(v.value));
        break;
      case 'binary':
        this.tag(BinaryTag.Binary);
        this.sized(v.value);
        break;
      case 'array':
        checkDepth(depth + 1, this.limits);
        this.tag(BinaryTag.ArrayOpen);
        this.u32(v.value.length);
        for (const item of v.value) this.value(item, depth + 1);
        this.tag(BinaryTag.ArrayClose);
        break;
      case 'map':
        checkDepth(depth + 1, this.limits);
        this.tag(BinaryTag.MapOpen);
        this.u32(v.value.size);
        for (const [key, item] of v.value) {
          this.tag(BinaryTag.MapKey);
          this.sized(encodeUtf8(key));
          this.value(item, depth + 1);
        }
        this.tag(BinaryTag.MapClose);
        break;
    }
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.length);
    let at = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, at);
      at += chunk.length;
    }
    return out;
  }
}

/** Serializes a value to binary LLSD, header included unless `header: false`. */
export function serializeBinary(value: LLSDValue, options: BinarySerializeOptions = {}): Uint8Array {
  const writer = new BinaryWriter(options.maxDepth ?? resolveGuardrails().maxDepth);
  if (options.header !== false) writer.raw(Buffer.from(LLSD_BINARY_HEADER, 'ascii'));
  writer.value(value, 0);
  return writer.finish();
}

export const binaryCodec: LLSDCodec = {
  name: 'binary',
  contentTypes: ['application/llsd+binary', 'application/octet-stream'],
  isBinary: true,
  parse(buf: Uint8Array | string, options?: ParseOptions): LLSDValue {
    return parseBinary(buf, options);
  },
  serialize(value: LLSDValue, options?: SerializeOptions): Uint8Array {
    return serializeBinary(value, options);
  }
};
