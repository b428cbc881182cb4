import { LLSDValue } from '../value/types.js';
import { CodecConfig, CodecConfigInput, resolveCodecConfig } from '../config/loader.js';
import { logCodecEvent } from '../log/jsonl.js';
import { binaryCodec, LLSD_BINARY_HEADER, parseBinary } from './binary.js';
import { LLSDError, LLSDErrorCode, isLLSDError } from './errors.js';
import { notationCodec, parseNotation } from './notation.js';
import { notationStringCodec } from './notation-string.js';
import { CodecName, LLSDCodec, ParseOptions, SerializeOptions } from './types.js';
import { parseXml, xmlCodec } from './xml.js';

export interface CodecMetricsSnapshot {
  requestsByCodec: Record<string, number>;
  bytesInByCodec: Record<string, number>;
  bytesOutByCodec: Record<string, number>;
  parseErrorsByCodec: Record<string, number>;
  serializeErrorsByCodec: Record<string, number>;
  limitViolationsByCodec: Record<string, number>;
}

function bump(map: Map<string, number>, key: string, by = 1): void {
  map.set(key, (map.get(key) || 0) + by);
}

function byteLength(buf: Uint8Array | string): number {
  return typeof buf === 'string' ? Buffer.byteLength(buf, 'utf8') : buf.length;
}

export class CodecRegistry {
  private codecs = new Map<string, LLSDCodec>();
  private requests = new Map<string, number>();
  private bytesIn = new Map<string, number>();
  private bytesOut = new Map<string, number>();
  private parseErrors = new Map<string, number>();
  private serializeErrors = new Map<string, number>();
  private limitViolations = new Map<string, number>();

  constructor(readonly config: CodecConfig = resolveCodecConfig()) {}

  register(codec: LLSDCodec): void {
    this.codecs.set(codec.name, codec);
  }

  get(name: string): LLSDCodec | undefined {
    return this.codecs.get(name);
  }

  list(): LLSDCodec[] {
    return Array.from(this.codecs.values());
  }

  getDefault(): LLSDCodec {
    return this.require(this.config.defaultCodec);
  }

  private require(name: string): LLSDCodec {
    const codec = this.codecs.get(name);
    if (!codec) {
      throw new LLSDError(LLSDErrorCode.UnknownType, `No codec registered under ${JSON.stringify(name)}`);
    }
    return codec;
  }

  /** Codec whose content types include `contentType`; parameters such as charset are ignored. */
  forContentType(contentType?: string): LLSDCodec | undefined {
    const ct = (contentType || '').split(';')[0].trim().toLowerCase();
    if (!ct) return undefined;
    for (const c of this.codecs.values()) {
      if (c.contentTypes.includes(ct)) return c;
    }
    return undefined;
  }

  parseOptions(): ParseOptions {
    return { ...this.config.limits };
  }

  serializeOptions(name: CodecName): SerializeOptions {
    const { xml, notation, limits } = this.config;
    switch (name) {
      case 'xml':
        return { pretty: xml.pretty, indent: xml.indent, maxDepth: limits.maxDepth };
      case 'binary':
        return { maxDepth: limits.maxDepth };
      case 'notation':
        return { binary: notation.binary, maxDepth: limits.maxDepth };
      case 'notation-string':
        // Raw spans cannot appear in the text variant.
        return { binary: notation.binary === 'raw' ? 'base64' : notation.binary, maxDepth: limits.maxDepth };
    }
  }

  /** Parses with the named codec under the configured limits, recording metrics. */
  parse(name: string, buf: Uint8Array | string): LLSDValue {
    const codec = this.require(name);
    const bytes = byteLength(buf);
    const t0 = Date.now();
    bump(this.requests, codec.name);
    bump(this.bytesIn, codec.name, bytes);
    try {
      const value = codec.parse(buf, this.parseOptions());
      logCodecEvent({ ts: new Date().toISOString(), codec: codec.name, op: 'parse', bytes, durMs: Date.now() - t0 });
      return value;
    } catch (err) {
      this.recordFailure(codec.name, 'parse', bytes, Date.now() - t0, err);
      throw err;
    }
  }

  serialize(name: string, value: LLSDValue): Uint8Array {
    const codec = this.require(name);
    const t0 = Date.now();
    bump(this.requests, codec.name);
    try {
      const out = codec.serialize(value, this.serializeOptions(codec.name));
      bump(this.bytesOut, codec.name, out.length);
      logCodecEvent({ ts: new Date().toISOString(), codec: codec.name, op: 'serialize', bytes: out.length, durMs: Date.now() - t0 });
      return out;
    } catch (err) {
      this.recordFailure(codec.name, 'serialize', 0, Date.now() - t0, err);
      throw err;
    }
  }

  private recordFailure(codec: CodecName, op: 'parse' | 'serialize', bytes: number, durMs: number, err: unknown): void {
    bump(op === 'parse' ? this.parseErrors : this.serializeErrors, codec);
    if (isLLSDError(err) && err.code === LLSDErrorCode.LimitExceeded) bump(this.limitViolations, codec);
    logCodecEvent({
      ts: new Date().toISOString(),
      codec,
      op,
      bytes,
      durMs,
      error: err instanceof Error ? err.message : String(err),
      kind: isLLSDError(err) ? err.kind : undefined
    });
  }

  getMetrics(): CodecMetricsSnapshot {
    return {
      requestsByCodec: Object.fromEntries(this.requests),
      bytesInByCodec: Object.fromEntries(this.bytesIn),
      bytesOutByCodec: Object.fromEntries(this.bytesOut),
      parseErrorsByCodec: Object.fromEntries(this.parseErrors),
      serializeErrorsByCodec: Object.fromEntries(this.serializeErrors),
      limitViolationsByCodec: Object.fromEntries(this.limitViolations)
    };
  }
}

export const BUILTIN_CODECS: readonly LLSDCodec[] = [xmlCodec, binaryCodec, notationCodec, notationStringCodec];

/** Registry holding the four built-in codecs; `config` is merged over file and environment settings. */
export function createDefaultRegistry(config?: CodecConfigInput): CodecRegistry {
  const registry = new CodecRegistry(resolveCodecConfig(config));
  for (const codec of BUILTIN_CODECS) registry.register(codec);
  return registry;
}

export type DetectedFormat = 'binary' | 'xml' | 'notation';

interface Sniffed {
  format: DetectedFormat;
  headerless?: boolean;
}

const BINARY_HEADER_SPELLINGS = [LLSD_BINARY_HEADER, '<?llsd/binary?>\n'];
// First characters a headerless notation value can start with.
const NOTATION_LEADS = new Set('!01tTfFirudslb[{\'"');

function sniff(buf: Uint8Array | string): Sniffed | undefined {
  const bytes = typeof buf === 'string' ? Buffer.from(buf, 'utf8') : Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength);
  const head = bytes.subarray(0, 64).toString('latin1');
  if (BINARY_HEADER_SPELLINGS.some(h => head.startsWith(h))) return { format: 'binary' };

  // Headerless binary: a container tag followed by a count whose high byte is zero.
  if ((head[0] === '[' || head[0] === '{') && bytes.length >= 5 && bytes[1] === 0) {
    return { format: 'binary', headerless: true };
  }

  const text = head.replace(/^\u00ef\u00bb\u00bf/, '').trimStart();
  const lower = text.toLowerCase();
  if (lower.startsWith('<?xml') || lower.startsWith('<llsd')) return { format: 'xml' };
  if (/^<\?\s*llsd\/notation\s*\?>/.test(lower)) return { format: 'notation' };
  if (text.length > 0 && NOTATION_LEADS.has(text[0])) return { format: 'notation' };
  return undefined;
}

/** Guesses the encoding of a document from its first bytes. */
export function detectFormat(buf: Uint8Array | string): DetectedFormat | undefined {
  return sniff(buf)?.format;
}

/** Parses a document in whichever format `detectFormat` recognizes. */
export function parseAny(buf: Uint8Array | string, options: ParseOptions = {}): LLSDValue {
  const detected = sniff(buf);
  if (!detected) {
    throw new LLSDError(LLSDErrorCode.UnknownType, 'Unrecognized LLSD document format', { offset: 0 });
  }
  switch (detected.format) {
    case 'binary':
      return parseBinary(buf, { ...options, header: !detected.headerless });
    case 'xml':
      return parseXml(buf, options);
    case 'notation':
      return parseNotation(buf, options);
  }
}
