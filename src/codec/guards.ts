import { LLSDError, LLSDErrorCode } from './errors.js';

export interface DecodedGuardrails {
  /** Largest input buffer a parser accepts, in bytes. */
  maxInputSize: number;
  /** Deepest array/map nesting a parser or serializer accepts. */
  maxDepth: number;
}

export const DEFAULT_GUARDRAILS: Readonly<DecodedGuardrails> = Object.freeze({
  maxInputSize: 10485760,
  maxDepth: 64
});

function positiveIntFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = parseInt(raw, 10);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function getGuardrailsFromEnv(): DecodedGuardrails {
  return {
    maxInputSize: positiveIntFromEnv('LLSD_CODEC_MAX_INPUT_SIZE', DEFAULT_GUARDRAILS.maxInputSize),
    maxDepth: positiveIntFromEnv('LLSD_CODEC_MAX_DEPTH', DEFAULT_GUARDRAILS.maxDepth)
  };
}

export function resolveGuardrails(overrides?: Partial<DecodedGuardrails>): DecodedGuardrails {
  return { ...getGuardrailsFromEnv(), ...stripUndefined(overrides) };
}

function stripUndefined(overrides?: Partial<DecodedGuardrails>): Partial<DecodedGuardrails> {
  const out: Partial<DecodedGuardrails> = {};
  if (overrides?.maxInputSize !== undefined) out.maxInputSize = overrides.maxInputSize;
  if (overrides?.maxDepth !== undefined) out.maxDepth = overrides.maxDepth;
  return out;
}

export function checkInputSize(size: number, guardrails: DecodedGuardrails): void {
  if (size > guardrails.maxInputSize) {
    throw new LLSDError(
      LLSDErrorCode.LimitExceeded,
      `Input of ${size} bytes exceeds the ${guardrails.maxInputSize} byte limit`,
      {},
      { reason: 'input_size_exceeded', limit: guardrails.maxInputSize, actual: size }
    );
  }
}

/** Called on entry to each array or map; `depth` counts the container being entered. */
export function checkDepth(depth: number, guardrails: Pick<DecodedGuardrails, 'maxDepth'>, offset?: number): void {
  if (depth > guardrails.maxDepth) {
    throw new LLSDError(
      LLSDErrorCode.LimitExceeded,
      `Nesting depth exceeds the limit of ${guardrails.maxDepth}`,
      { offset },
      { reason: 'depth_exceeded', limit: guardrails.maxDepth, actual: depth }
    );
  }
}
