// Error codes for codec operations
export const CodecErrorCode = {
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_CONFIG: 'INVALID_CONFIG',
  INVALID_DICTIONARY: 'INVALID_DICTIONARY',
  CAPACITY_EXCEEDED: 'CAPACITY_EXCEEDED',
  DICTIONARY_MISS: 'DICTIONARY_MISS',
  VERSION_MISMATCH: 'VERSION_MISMATCH',
  MALFORMED_STREAM: 'MALFORMED_STREAM',
} as const;

export type CodecErrorCode =
  (typeof CodecErrorCode)[keyof typeof CodecErrorCode];

export interface CodecErrorDetails {
  context?: Record<string, unknown>;
  // Untouched input handed back on VERSION_MISMATCH
  payload?: Uint8Array;
}

export class CodecError extends Error {
  readonly code: CodecErrorCode;
  readonly context: Record<string, unknown>;
  readonly payload?: Uint8Array;
  readonly timestamp: number;

  constructor(
    code: CodecErrorCode,
    message: string,
    details: CodecErrorDetails = {}
  ) {
    super(message);
    this.name = 'CodecError';
    this.code = code;
    this.context = details.context ?? {};
    this.payload = details.payload;
    this.timestamp = Date.now();
  }
}

export function isCodecError(
  error: unknown,
  code?: CodecErrorCode
): error is CodecError {
  return (
    error instanceof CodecError && (code === undefined || error.code === code)
  );
}

export function dictionaryMiss(
  stage: string,
  index: number
): CodecError {
  return new CodecError(
    CodecErrorCode.DICTIONARY_MISS,
    `No ${stage} dictionary entry for index ${index}`,
    { context: { stage, index } }
  );
}

export function malformedStream(
  message: string,
  offset?: number
): CodecError {
  return new CodecError(CodecErrorCode.MALFORMED_STREAM, message, {
    context: offset === undefined ? {} : { offset },
  });
}
