// Error taxonomy shared by the value model and every codec.

export enum LLSDErrorKind {
  MalformedStructure = 'MalformedStructure',
  UnknownType = 'UnknownType',
  TypeMismatch = 'TypeMismatch',
  InvalidPrimitive = 'InvalidPrimitive',
  UnsupportedValue = 'UnsupportedValue'
}

export enum LLSDErrorCode {
  MalformedXml = 'MalformedXml',
  StructuralError = 'StructuralError',
  BadHeader = 'BadHeader',
  TruncatedInput = 'TruncatedInput',
  UnterminatedStructure = 'UnterminatedStructure',
  LimitExceeded = 'LimitExceeded',
  UnknownType = 'UnknownType',
  UnknownTag = 'UnknownTag',
  WrongVariant = 'WrongVariant',
  InvalidUuid = 'InvalidUuid',
  InvalidDate = 'InvalidDate',
  InvalidBinary = 'InvalidBinary',
  InvalidInteger = 'InvalidInteger',
  InvalidReal = 'InvalidReal',
  InvalidBoolean = 'InvalidBoolean',
  InvalidString = 'InvalidString',
  UnsupportedForm = 'UnsupportedForm',
  NonFiniteReal = 'NonFiniteReal',
  UnrepresentableText = 'UnrepresentableText'
}

const kindByCode: Record<LLSDErrorCode, LLSDErrorKind> = {
  [LLSDErrorCode.MalformedXml]: LLSDErrorKind.MalformedStructure,
  [LLSDErrorCode.StructuralError]: LLSDErrorKind.MalformedStructure,
  [LLSDErrorCode.BadHeader]: LLSDErrorKind.MalformedStructure,
  [LLSDErrorCode.TruncatedInput]: LLSDErrorKind.MalformedStructure,
  [LLSDErrorCode.UnterminatedStructure]: LLSDErrorKind.MalformedStructure,
  [LLSDErrorCode.LimitExceeded]: LLSDErrorKind.MalformedStructure,
  [LLSDErrorCode.UnknownType]: LLSDErrorKind.UnknownType,
  [LLSDErrorCode.UnknownTag]: LLSDErrorKind.UnknownType,
  [LLSDErrorCode.WrongVariant]: LLSDErrorKind.TypeMismatch,
  [LLSDErrorCode.InvalidUuid]: LLSDErrorKind.InvalidPrimitive,
  [LLSDErrorCode.InvalidDate]: LLSDErrorKind.InvalidPrimitive,
  [LLSDErrorCode.InvalidBinary]: LLSDErrorKind.InvalidPrimitive,
  [LLSDErrorCode.InvalidInteger]: LLSDErrorKind.InvalidPrimitive,
  [LLSDErrorCode.InvalidReal]: LLSDErrorKind.InvalidPrimitive,
  [LLSDErrorCode.InvalidBoolean]: LLSDErrorKind.InvalidPrimitive,
  [LLSDErrorCode.InvalidString]: LLSDErrorKind.InvalidPrimitive,
  [LLSDErrorCode.UnsupportedForm]: LLSDErrorKind.UnsupportedValue,
  [LLSDErrorCode.NonFiniteReal]: LLSDErrorKind.UnsupportedValue,
  [LLSDErrorCode.UnrepresentableText]: LLSDErrorKind.UnsupportedValue
};

export interface LLSDErrorPosition {
  /** Byte offset into the input (binary and notation). */
  offset?: number;
  /** 1-based line and column (XML). */
  line?: number;
  column?: number;
}

export class LLSDError extends Error {
  readonly kind: LLSDErrorKind;
  readonly offset?: number;
  readonly line?: number;
  readonly column?: number;

  constructor(public readonly code: LLSDErrorCode, message: string, position: LLSDErrorPosition = {}, public readonly detail?: unknown) {
    super(LLSDError.formatMessage(message, position));
    this.name = 'LLSDError';
    this.kind = kindOf(code);
    this.offset = position.offset;
    this.line = position.line;
    this.column = position.column;
  }

  private static formatMessage(message: string, position: LLSDErrorPosition): string {
    if (position.line !== undefined) {
      return `${message} (line ${position.line}, column ${position.column ?? 0})`;
    }
    if (position.offset !== undefined) {
      return `${message} (at byte ${position.offset})`;
    }
    return message;
  }
}

export function isLLSDError(err: unknown): err is LLSDError {
  return err instanceof LLSDError;
}

export function kindOf(code: LLSDErrorCode): LLSDErrorKind {
  return kindByCode[code];
}
