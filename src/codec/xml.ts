import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { LLSDValue, LLSD, MapBuilder } from '../value/types.js';
import { LLSDError, LLSDErrorCode } from './errors.js';
import { DecodedGuardrails, checkDepth, checkInputSize, resolveGuardrails } from './guards.js';
import {
  NIL_UUID,
  checkInt32,
  decodeBinaryText,
  decodeUtf8,
  encodeBase64,
  encodeUtf8,
  formatDate,
  formatReal,
  hasLoneSurrogate,
  nonFiniteWord,
  parseDate,
  parseInteger,
  parseReal,
  uuidFromText,
  uuidToText
} from './primitives.js';
import { LLSDCodec, ParseOptions, SerializeOptions, XmlSerializeOptions } from './types.js';

export const LLSD_XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const TEXT = '#text';
const ATTRS = ':@';

// Characters XML 1.0 cannot carry, escaped or not.
const XML_ILLEGAL = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/;
const XML_ESCAPES: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
  "'": '&apos;',
  '"': '&quot;',
  // A bare CR would be folded into LF by any conforming reader.
  '\r': '&#13;'
};

export function createXmlParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    processEntities: true,
    htmlEntities: true
  });
}

interface XmlElement {
  name: string;
  children: unknown[];
  attrs: Record<string, unknown>;
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

/** Ordered-mode nodes are `{ tag: children, ':@'?: attrs }` or `{ '#text': text }`. */
function toNode(node: unknown): XmlElement | string {
  if (!isRecord(node)) {
    throw new LLSDError(LLSDErrorCode.MalformedXml, 'Unexpected XML node shape');
  }
  if (TEXT in node) return String(node[TEXT]);
  const name = Object.keys(node).find(k => k !== ATTRS);
  const children = name === undefined ? undefined : node[name];
  if (name === undefined || !Array.isArray(children)) {
    throw new LLSDError(LLSDErrorCode.MalformedXml, 'Unexpected XML node shape');
  }
  const attrs = node[ATTRS];
  return { name, children, attrs: isRecord(attrs) ? attrs : {} };
}

function elementChildren(parent: string, children: unknown[]): XmlElement[] {
  const out: XmlElement[] = [];
  for (const child of children) {
    const node = toNode(child);
    if (typeof node === 'string') {
      if (node.trim() !== '') {
        throw new LLSDError(LLSDErrorCode.StructuralError, `Unexpected text inside <${parent}>: ${JSON.stringify(node.trim())}`);
      }
      continue;
    }
    out.push(node);
  }
  return out;
}

function textContent(el: XmlElement): string {
  let text = '';
  for (const child of el.children) {
    const node = toNode(child);
    if (typeof node !== 'string') {
      throw new LLSDError(LLSDErrorCode.StructuralError, `<${el.name}> may not contain <${node.name}>`);
    }
    text += node;
  }
  return text;
}

function parseBoolean(text: string): boolean {
  switch (text) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
    case '':
      return false;
    default:
      throw new LLSDError(LLSDErrorCode.InvalidBoolean, `Invalid boolean: ${JSON.stringify(text)}`);
  }
}

function readElement(el: XmlElement, depth: number, guardrails: DecodedGuardrails): LLSDValue {
  switch (el.name) {
    case 'undef':
      textContent(el);
      return LLSD.undef();
    case 'boolean':
      return LLSD.boolean(parseBoolean(textContent(el).trim()));
    case 'integer': {
      const text = textContent(el).trim();
      return LLSD.integer(text === '' ? 0 : parseInteger(text));
    }
    case 'real': {
      const text = textContent(el).trim();
      return LLSD.real(text === '' ? 0 : parseReal(text, true));
    }
    case 'uuid': {
      const text = textContent(el).trim();
      return LLSD.uuid(text === '' ? NIL_UUID : uuidFromText(text));
    }
    case 'string':
      return LLSD.string(textContent(el));
    case 'uri':
      return LLSD.uri(textContent(el));
    case 'date': {
      const text = textContent(el).trim();
      return LLSD.date(text === '' ? 0 : parseDate(text));
    }
    case 'binary': {
      const encoding = el.attrs.encoding;
      return LLSD.binary(decodeBinaryText(textContent(el), typeof encoding === 'string' ? encoding : 'base64'));
    }
    case 'array': {
      checkDepth(depth + 1, guardrails);
      return LLSD.array(elementChildren('array', el.children).map(child => readElement(child, depth + 1, guardrails)));
    }
    case 'map':
      checkDepth(depth + 1, guardrails);
      return readMap(elementChildren('map', el.children), depth + 1, guardrails);
    default:
      throw new LLSDError(LLSDErrorCode.UnknownType, `Unknown LLSD element <${el.name}>`);
  }
}

function readMap(children: XmlElement[], depth: number, guardrails: DecodedGuardrails): LLSDValue {
  const builder = new MapBuilder();
  for (let i = 0; i < children.length; i += 2) {
    const keyEl = children[i];
    if (keyEl.name !== 'key') {
      throw new LLSDError(LLSDErrorCode.StructuralError, `Expected <key> in map, found <${keyEl.name}>`);
    }
    const key = textContent(keyEl);
    const valueEl = children[i + 1];
    if (valueEl === undefined) {
      throw new LLSDError(LLSDErrorCode.StructuralError, `Map key ${JSON.stringify(key)} has no value`);
    }
    if (valueEl.name === 'key') {
      throw new LLSDError(LLSDErrorCode.StructuralError, `Map key ${JSON.stringify(key)} is followed by another <key>`);
    }
    builder.set(key, readElement(valueEl, depth, guardrails));
  }
  return builder.build();
}

function toText(buf: Uint8Array | string): string {
  const text = typeof buf === 'string' ? buf : decodeUtf8(buf);
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/** Parses a complete `<llsd>` XML document. */
export function parseXml(buf: Uint8Array | string, options: ParseOptions = {}): LLSDValue {
  const guardrails = resolveGuardrails(options);
  checkInputSize(typeof buf === 'string' ? Buffer.byteLength(buf, 'utf8') : buf.length, guardrails);
  const text = toText(buf);

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new LLSDError(LLSDErrorCode.MalformedXml, `Malformed XML: ${msg}`, { line, column: col }, validation.err);
  }

  let document: unknown;
  try {
    document = createXmlParser().parse(text);
  } catch (err) {
    throw new LLSDError(LLSDErrorCode.MalformedXml, `Malformed XML: ${err instanceof Error ? err.message : String(err)}`, {}, err);
  }
  if (!Array.isArray(document)) {
    throw new LLSDError(LLSDErrorCode.MalformedXml, 'XML parser returned no document');
  }

  const roots = elementChildren('document', document);
  if (roots.length !== 1 || roots[0].name !== 'llsd') {
    throw new LLSDError(LLSDErrorCode.StructuralError, 'Document root must be a single <llsd> element');
  }
  const values = elementChildren('llsd', roots[0].children);
  if (values.length !== 1) {
    throw new LLSDError(LLSDErrorCode.StructuralError, `<llsd> must contain exactly one value, found ${values.length}`);
  }
  return readElement(values[0], 0, guardrails);
}

export function escapeXmlText(text: string): string {
  if (XML_ILLEGAL.test(text) || hasLoneSurrogate(text)) {
    throw new LLSDError(LLSDErrorCode.UnrepresentableText, `Text contains characters XML cannot represent: ${JSON.stringify(text)}`);
  }
  return text.replace(/[<>&'"\r]/g, ch => XML_ESCAPES[ch]);
}

class XmlWriter {
  private readonly parts: string[] = [];
  private readonly limits: Pick<DecodedGuardrails, 'maxDepth'>;

  constructor(private readonly indent: number, maxDepth: number) {
    this.limits = { maxDepth };
  }

  private line(depth: number, markup: string): void {
    if (this.indent > 0) {
      this.parts.push(' '.repeat(depth * this.indent), markup, '\n');
    } else {
      this.parts.push(markup);
    }
  }

  private leaf(depth: number, tag: string, text: string, attrs = ''): void {
    this.line(depth, text === '' ? `<${tag}${attrs} />` : `<${tag}${attrs}>${escapeXmlText(text)}</${tag}>`);
  }

  open(depth: number, tag: string): void {
    this.line(depth, `<${tag}>`);
  }

  close(depth: number, tag: string): void {
    this.line(depth, `</${tag}>`);
  }

  value(v: LLSDValue, depth: number): void {
    switch (v.type) {
      case 'undef':
        this.leaf(depth, 'undef', '');
        break;
      case 'boolean':
        this.leaf(depth, 'boolean', v.value ? 'true' : 'false');
        break;
      case 'integer':
        this.leaf(depth, 'integer', String(checkInt32(v.value)));
        break;
      case 'real':
        this.leaf(depth, 'real', Number.isFinite(v.value) ? formatReal(v.value) : nonFiniteWord(v.value));
        break;
      case 'uuid':
        this.leaf(depth, 'uuid', uuidToText(v.value));
        break;
      case 'string':
        this.leaf(depth, 'string', v.value);
        break;
      case 'uri':
        this.leaf(depth, 'uri', v.value);
        break;
      case 'date':
        this.leaf(depth, 'date', formatDate(v.value));
        break;
      case 'binary':
        this.leaf(depth, 'binary', encodeBase64(v.value), ' encoding="base64"');
        break;
      case 'array':
        checkDepth(depth + 1, this.limits);
        this.open(depth, 'array');
        for (const item of v.value) this.value(item, depth + 1);
        this.close(depth, 'array');
        break;
      case 'map':
        checkDepth(depth + 1, this.limits);
        this.open(depth, 'map');
        for (const [key, item] of v.value) {
          this.leaf(depth + 1, 'key', key);
          this.value(item, depth + 1);
        }
        this.close(depth, 'map');
        break;
    }
  }

  toString(): string {
    return this.parts.join('');
  }
}

/** Serializes a value as an XML document string. */
export function serializeXmlString(value: LLSDValue, options: XmlSerializeOptions = {}): string {
  const indent = options.pretty ? (options.indent ?? 2) : 0;
  const writer = new XmlWriter(indent, options.maxDepth ?? resolveGuardrails().maxDepth);
  writer.value(value, 0);
  const body = writer.toString();
  return indent > 0
    ? `${LLSD_XML_DECLARATION}\n<llsd>\n${body}</llsd>\n`
    : `${LLSD_XML_DECLARATION}\n<llsd>${body}</llsd>`;
}

export function serializeXml(value: LLSDValue, options: XmlSerializeOptions = {}): Uint8Array {
  return encodeUtf8(serializeXmlString(value, options));
}

export const xmlCodec: LLSDCodec = {
  name: 'xml',
  contentTypes: ['application/llsd+xml', 'application/xml', 'text/xml'],
  isBinary: false,
  parse(buf: Uint8Array | string, options?: ParseOptions): LLSDValue {
    return parseXml(buf, options);
  },
  serialize(value: LLSDValue, options?: SerializeOptions): Uint8Array {
    return serializeXml(value, options);
  }
};
