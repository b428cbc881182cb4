import { LLSDValue } from '../value/types.js';
import { LLSDError, LLSDErrorCode } from './errors.js';
import { NotationWriter, readNotation } from './notation.js';
import { encodeUtf8, hasLoneSurrogate } from './primitives.js';
import { LLSDCodec, NotationStringSerializeOptions, ParseOptions, SerializeOptions } from './types.js';

// Noncharacters are legal Unicode scalar values but not XML character data.
const NOT_CHARACTER_DATA = /[\uFFFE\uFFFF]/;

/**
 * Parses the text variant of notation. Byte-counted `s(N)`/`b(N)` spans
 * fail with `UnsupportedForm`; error offsets count UTF-8 bytes.
 */
export function parseNotationString(text: string | Uint8Array, options: ParseOptions = {}): LLSDValue {
  return readNotation(typeof text === 'string' ? encodeUtf8(text) : text, 'string', options);
}

/**
 * Serializes to notation text that is valid Unicode and safe to embed as
 * XML character data. Binary is written as `b64"…"` unless `binary: 'base16'`.
 */
export function serializeNotationString(value: LLSDValue, options: NotationStringSerializeOptions = {}): string {
  const writer = new NotationWriter('string', options);
  writer.value(value, 0);
  let out = '';
  for (const part of writer.parts) {
    if (typeof part !== 'string') {
      throw new LLSDError(LLSDErrorCode.UnsupportedForm, 'String notation cannot carry raw byte spans');
    }
    out += part;
  }
  if (hasLoneSurrogate(out) || NOT_CHARACTER_DATA.test(out)) {
    throw new LLSDError(LLSDErrorCode.UnrepresentableText, 'Value contains text that string notation cannot carry');
  }
  return out;
}

export const notationStringCodec: LLSDCodec = {
  name: 'notation-string',
  contentTypes: ['text/llsd+notation'],
  isBinary: false,
  parse(buf: Uint8Array | string, options?: ParseOptions): LLSDValue {
    return parseNotationString(buf, options);
  },
  serialize(value: LLSDValue, options?: SerializeOptions): Uint8Array {
    return encodeUtf8(serializeNotationString(value, options));
  }
};
