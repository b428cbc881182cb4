export * from './value/index.js';
export * from './codec/errors.js';
export * from './codec/types.js';
export { DEFAULT_GUARDRAILS, getGuardrailsFromEnv } from './codec/guards.js';
export type { DecodedGuardrails } from './codec/guards.js';
export {
  NIL_UUID,
  uuidToText,
  uuidFromText,
  formatDate,
  parseDate,
  encodeBase64,
  decodeBase64,
  encodeBase16,
  decodeBase16,
  decodeBinaryText,
  parseInteger,
  formatReal
} from './codec/primitives.js';
export { parseXml, serializeXml, serializeXmlString, xmlCodec, LLSD_XML_DECLARATION } from './codec/xml.js';
export { parseBinary, serializeBinary, binaryCodec, LLSD_BINARY_HEADER } from './codec/binary.js';
export { parseNotation, serializeNotation, notationCodec, LLSD_NOTATION_HEADER } from './codec/notation.js';
export { parseNotationString, serializeNotationString, notationStringCodec } from './codec/notation-string.js';
export { CodecRegistry, createDefaultRegistry, detectFormat, parseAny, BUILTIN_CODECS } from './codec/registry.js';
export type { CodecMetricsSnapshot, DetectedFormat } from './codec/registry.js';
export { ConfigError, DEFAULT_CODEC_CONFIG, loadCodecConfig, resolveCodecConfig } from './config/loader.js';
export type { CodecConfig, CodecConfigInput } from './config/loader.js';
export { closeCodecLog } from './log/jsonl.js';
