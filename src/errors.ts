import type { ChapterStage } from './types';

export class PipelineError extends Error {
  readonly stage?: ChapterStage;

  constructor(message: string, options: { stage?: ChapterStage; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.stage = options.stage;
  }
}

/**
 * Raised while loading settings. Aborts the whole run before any chapter starts.
 */
export class ConfigurationError extends PipelineError {
  constructor(
    readonly field: string,
    detail: string,
    cause?: unknown
  ) {
    super(`Invalid configuration at "${field}": ${detail}`, { cause });
  }
}

export class ChapterNotFoundError extends PipelineError {
  constructor(
    readonly chapter: number,
    readonly path: string
  ) {
    super(`Chapter ${chapter} not found at ${path}`, { stage: 'TextResolved' });
  }
}

export class PromptNotFoundError extends PipelineError {
  constructor(
    readonly scene: number,
    readonly available: number[]
  ) {
    super(
      `No image prompt for scene ${scene} (configured scenes: ${available.join(', ') || 'none'})`,
      { stage: 'IllustrationReady' }
    );
  }
}

export class SynthesisError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'NarrationReady', cause });
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'IllustrationReady', cause });
  }
}

export class EncodingError extends PipelineError {
  constructor(
    message: string,
    readonly diagnostics = ''
  ) {
    super(diagnostics ? `${message}\n${diagnostics}` : message, { stage: 'Assembled' });
  }
}

/**
 * A provider failure that is expected to clear up on retry: rate limiting,
 * 5xx responses, timeouts and dropped connections.
 */
export class TransientProviderError extends Error {
  constructor(
    message: string,
    readonly retryAfterMs?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransientProviderError';
  }
}

export function isTransient(error: unknown): error is TransientProviderError {
  return error instanceof TransientProviderError;
}

/**
 * Errors from Node's own modules may come from another realm, so these
 * helpers read the error's shape rather than relying on `instanceof Error`.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function errorName(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return 'Error';
}

/** The `code` of a system error such as `ENOENT`, if it has one. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isMissingFile(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}
