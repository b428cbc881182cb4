import { LLSDValue } from '../value/types.js';
import { DecodedGuardrails } from './guards.js';

export type CodecName = 'xml' | 'binary' | 'notation' | 'notation-string';

export type ParseOptions = Partial<DecodedGuardrails>;

export interface LLSDCodec {
  name: CodecName;
  contentTypes: string[]; // first entry is the canonical media type
  isBinary: boolean;
  parse(buf: Uint8Array | string, options?: ParseOptions): LLSDValue;
  serialize(value: LLSDValue, options?: SerializeOptions): Uint8Array;
}

export interface XmlSerializeOptions {
  pretty?: boolean;
  indent?: number;
  maxDepth?: number;
}

export interface BinaryParseOptions extends ParseOptions {
  /** Set false to accept a bare value without the `<? LLSD/Binary ?>` line. */
  header?: boolean;
}

export interface BinarySerializeOptions {
  header?: boolean;
  maxDepth?: number;
}

export type NotationBinaryForm = 'raw' | 'base64' | 'base16';

export interface NotationSerializeOptions {
  /** `raw` writes byte-counted `b(N)"…"` spans. */
  binary?: NotationBinaryForm;
  /** Write strings as byte-counted `s(N)"…"` spans. */
  countedStrings?: boolean;
  header?: boolean;
  maxDepth?: number;
}

/** Same shape as the byte-stream options; `raw` and `countedStrings` are refused. */
export type NotationStringSerializeOptions = NotationSerializeOptions;

/** Union of every codec's serializer options; each codec reads the fields it knows. */
export interface SerializeOptions extends XmlSerializeOptions, NotationSerializeOptions {}
