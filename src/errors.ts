export type JsonToStructErrorCode = 'DECODE_ERROR' | 'UNSUPPORTED_SHAPE' | 'INVALID_OPTIONS';

/**
 * Base class for every failure `generate()` reports to its caller.
 */
export class JsonToStructError extends Error {
  public readonly code: JsonToStructErrorCode;

  constructor(code: JsonToStructErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JsonToStructError';
    this.code = code;
  }
}

/**
 * The input is not valid JSON.
 */
export class DecodeError extends JsonToStructError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE_ERROR', message, options);
    this.name = 'DecodeError';
  }
}

/**
 * The top-level value is neither an object nor a non-empty array of objects.
 */
export class UnsupportedShapeError extends JsonToStructError {
  constructor(message: string) {
    super('UNSUPPORTED_SHAPE', message);
    this.name = 'UnsupportedShapeError';
  }
}

export class OptionsError extends JsonToStructError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_OPTIONS', `invalid options: ${issues.join('; ')}`);
    this.name = 'OptionsError';
    this.issues = issues;
  }
}
