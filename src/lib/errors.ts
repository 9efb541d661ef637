export type VerificationErrorCode =
  | 'document_read'
  | 'safety_block'
  | 'response_parse'
  | 'validation'
  | 'model_not_found';

export abstract class VerificationError extends Error {
  abstract readonly code: VerificationErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DocumentReadError extends VerificationError {
  readonly code = 'document_read';
  readonly documentName: string | null;

  constructor(message: string, options: { cause?: unknown; documentName?: string } = {}) {
    super(message, { cause: options.cause });
    this.documentName = options.documentName ?? null;
  }
}

/** The model declined to answer normally. Remedy: rephrase or resubmit. */
export class SafetyBlockError extends VerificationError {
  readonly code = 'safety_block';
  readonly reason: string;

  constructor(message: string, reason: string) {
    super(message);
    this.reason = reason;
  }
}

/** Text came back but no array survived repair. Remedy: reduce input size and retry. */
export class ResponseParseError extends VerificationError {
  readonly code = 'response_parse';
  readonly rawResponse: string;

  constructor(message: string, rawResponse: string, options?: { cause?: unknown }) {
    super(message, options);
    this.rawResponse = rawResponse;
  }
}

export class ValidationError extends VerificationError {
  readonly code = 'validation';
}

export class ModelNotFoundError extends VerificationError {
  readonly code = 'model_not_found';
  readonly model: string;

  constructor(model: string, options?: { cause?: unknown }) {
    super(`Model "${model}" was not found or does not support generateContent`, options);
    this.model = model;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
