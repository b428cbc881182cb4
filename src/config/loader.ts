import * as fs from 'fs';
import * as YAML from 'yaml';
import { DEFAULT_GUARDRAILS, DecodedGuardrails } from '../codec/guards.js';
import { CodecName, NotationBinaryForm } from '../codec/types.js';

export interface CodecConfig {
  limits: DecodedGuardrails;
  defaultCodec: CodecName;
  xml: { pretty: boolean; indent: number };
  notation: { binary: NotationBinaryForm };
}

export interface CodecConfigInput {
  limits?: Partial<DecodedGuardrails>;
  defaultCodec?: CodecName;
  xml?: Partial<CodecConfig['xml']>;
  notation?: Partial<CodecConfig['notation']>;
}

export const DEFAULT_CODEC_CONFIG: CodecConfig = {
  limits: { ...DEFAULT_GUARDRAILS },
  defaultCodec: 'xml',
  xml: { pretty: false, indent: 2 },
  notation: { binary: 'raw' }
};

const CODEC_NAMES: readonly CodecName[] = ['xml', 'binary', 'notation', 'notation-string'];
const BINARY_FORMS: readonly NotationBinaryForm[] = ['raw', 'base64', 'base16'];

export class ConfigError extends Error {
  constructor(public readonly field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = 'ConfigError';
  }
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function section(raw: Record<string, unknown>, field: string): Record<string, unknown> | undefined {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) throw new ConfigError(field, 'must be a mapping');
  return value;
}

function positiveInt(value: unknown, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(field, `must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return value;
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], field: string): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find(a => a === value);
  if (match === undefined) {
    throw new ConfigError(field, `must be one of ${allowed.join(', ')}, got ${JSON.stringify(value)}`);
  }
  return match;
}

function bool(value: unknown, field: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw new ConfigError(field, `must be true or false, got ${JSON.stringify(value)}`);
  return value;
}

/** Validates a parsed YAML document into a partial config. */
export function validateCodecConfig(raw: unknown): CodecConfigInput {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw new ConfigError('config', 'must be a mapping');

  const out: CodecConfigInput = {};
  const limits = section(raw, 'limits');
  if (limits) {
    out.limits = {
      maxDepth: positiveInt(limits.maxDepth, 'limits.maxDepth'),
      maxInputSize: positiveInt(limits.maxInputSize, 'limits.maxInputSize')
    };
  }
  out.defaultCodec = oneOf(raw.defaultCodec, CODEC_NAMES, 'defaultCodec');
  const xml = section(raw, 'xml');
  if (xml) {
    const indent = xml.indent === 0 ? 0 : positiveInt(xml.indent, 'xml.indent');
    out.xml = { pretty: bool(xml.pretty, 'xml.pretty'), indent };
  }
  const notation = section(raw, 'notation');
  if (notation) {
    out.notation = { binary: oneOf(notation.binary, BINARY_FORMS, 'notation.binary') };
  }
  return out;
}

export function loadCodecConfig(path: string): CodecConfigInput {
  let content: string;
  try {
    content = fs.readFileSync(path, 'utf8');
  } catch (e) {
    throw new ConfigError('path', `cannot read ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let doc: unknown;
  try {
    doc = YAML.parse(content);
  } catch (e) {
    throw new ConfigError('config', `invalid YAML in ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return validateCodecConfig(doc);
}

function envPositiveInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(name, `must be a positive integer, got ${JSON.stringify(raw)}`);
  }
  return n;
}

export function configFromEnv(): CodecConfigInput {
  return {
    limits: {
      maxDepth: envPositiveInt('LLSD_CODEC_MAX_DEPTH'),
      maxInputSize: envPositiveInt('LLSD_CODEC_MAX_INPUT_SIZE')
    },
    defaultCodec: oneOf(process.env.LLSD_DEFAULT_CODEC || undefined, CODEC_NAMES, 'LLSD_DEFAULT_CODEC')
  };
}

function pick<T>(...values: (T | undefined)[]): T | undefined {
  let out: T | undefined;
  for (const v of values) if (v !== undefined) out = v;
  return out;
}

/** Later layers win field by field; undefined fields fall through. */
export function mergeCodecConfig(base: CodecConfig, ...layers: CodecConfigInput[]): CodecConfig {
  return {
    limits: {
      maxDepth: pick(base.limits.maxDepth, ...layers.map(l => l.limits?.maxDepth)) ?? base.limits.maxDepth,
      maxInputSize: pick(base.limits.maxInputSize, ...layers.map(l => l.limits?.maxInputSize)) ?? base.limits.maxInputSize
    },
    defaultCodec: pick(base.defaultCodec, ...layers.map(l => l.defaultCodec)) ?? base.defaultCodec,
    xml: {
      pretty: pick(base.xml.pretty, ...layers.map(l => l.xml?.pretty)) ?? base.xml.pretty,
      indent: pick(base.xml.indent, ...layers.map(l => l.xml?.indent)) ?? base.xml.indent
    },
    notation: {
      binary: pick(base.notation.binary, ...layers.map(l => l.notation?.binary)) ?? base.notation.binary
    }
  };
}

/**
 * Defaults, then the YAML file (`configPath` or LLSD_CODEC_CONFIG), then
 * environment, then `overrides`.
 */
export function resolveCodecConfig(overrides: CodecConfigInput = {}, configPath?: string): CodecConfig {
  const file = configPath ?? process.env.LLSD_CODEC_CONFIG;
  const fromFile = file ? loadCodecConfig(file) : {};
  return mergeCodecConfig(DEFAULT_CODEC_CONFIG, fromFile, configFromEnv(), validateCodecConfig(overrides));
}
