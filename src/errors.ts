import type { StageName } from './types/analysis';

/**
 * Client-side problems with the request. Raised before any generative call
 * and mapped to HTTP 400.
 */
export class ValidationError extends Error {
  readonly status = 400;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

export class UnsupportedFormatError extends ValidationError {
  constructor(readonly extension: string) {
    super(`Unsupported file format: ${extension || '(none)'}`);
    this.name = 'UnsupportedFormatError';
  }
}

export class InsufficientTextError extends ValidationError {
  constructor(readonly length: number) {
    super('Could not extract sufficient text from the file. Please check the file format.');
    this.name = 'InsufficientTextError';
  }
}

export class UnreadableDocumentError extends ValidationError {
  constructor(readonly fileName: string, options?: { cause?: unknown }) {
    super(`Could not read the document '${fileName}'. Please upload a valid PDF or DOCX file.`, options);
    this.name = 'UnreadableDocumentError';
  }
}

export class UnsupportedLanguageError extends ValidationError {
  constructor(readonly language: string, supported: readonly string[]) {
    super(`Invalid output_language '${language}'. Supported: ${supported.join(', ')}`);
    this.name = 'UnsupportedLanguageError';
  }
}

export class InvalidSocialLinkError extends ValidationError {
  constructor(
    readonly platform: string,
    readonly expected: string,
  ) {
    super(`Invalid ${platform} URL. Must contain ${expected}`);
    this.name = 'InvalidSocialLinkError';
  }
}

export class InvalidTierError extends ValidationError {
  constructor(readonly tier: string) {
    super(`Invalid tier '${tier}'. Must be 'free' or 'premium'`);
    this.name = 'InvalidTierError';
  }
}

export class InvalidRequestError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

/**
 * The generative provider could not be reached or refused the call.
 * Fatal for the request (HTTP 502), never retried.
 */
export class TransformUnavailableError extends Error {
  readonly status = 502;

  constructor(
    readonly stage: StageName,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Transform stage '${stage}' unavailable: ${detail}`, options);
    this.name = 'TransformUnavailableError';
  }
}

/**
 * The provider answered, but not with JSON of the expected shape.
 * The orchestrator absorbs it and continues with the stage's empty value.
 */
export class MalformedTransformOutputError extends Error {
  constructor(
    readonly stage: StageName,
    readonly excerpt: string,
  ) {
    super(`Transform stage '${stage}' returned malformed output`);
    this.name = 'MalformedTransformOutputError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
