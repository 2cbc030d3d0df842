export type PipelineErrorCode =
  | 'EXTRACTION_FAILED'
  | 'GENERATION_FAILED'
  | 'IMAGE_FAILED'
  | 'VIDEO_FAILED'
  | 'VIDEO_TIMEOUT'
  | 'UPLOAD_FAILED'
  | 'HTTP_ERROR';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

export class ExtractionError extends PipelineError {
  constructor(message: string) {
    super('EXTRACTION_FAILED', message);
    this.name = 'ExtractionError';
  }
}

export class GenerationError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super('GENERATION_FAILED', message, options);
    this.name = 'GenerationError';
    this.issues = issues;
  }
}

export class ImageGenerationError extends PipelineError {
  readonly sceneIndex: number;

  constructor(sceneIndex: number, message: string) {
    super('IMAGE_FAILED', message);
    this.name = 'ImageGenerationError';
    this.sceneIndex = sceneIndex;
  }
}

export class VideoGenerationError extends PipelineError {
  readonly bodyExcerpt: string | null;

  constructor(message: string, bodyExcerpt: string | null = null, code: PipelineErrorCode = 'VIDEO_FAILED') {
    super(code, message);
    this.name = 'VideoGenerationError';
    this.bodyExcerpt = bodyExcerpt;
  }
}

export class VideoTimeoutError extends VideoGenerationError {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`Video job did not finish after ${attempts} polling attempts`, null, 'VIDEO_TIMEOUT');
    this.name = 'VideoTimeoutError';
    this.attempts = attempts;
  }
}

export class UploadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPLOAD_FAILED', message, options);
    this.name = 'UploadError';
  }
}

export class HttpError extends PipelineError {
  readonly status: number;
  readonly bodyExcerpt: string;

  constructor(status: number, url: string, body: string) {
    const excerpt = excerptOf(body);
    super('HTTP_ERROR', `HTTP ${status} from ${redactUrl(url)}${excerpt ? `: ${excerpt}` : ''}`);
    this.name = 'HttpError';
    this.status = status;
    this.bodyExcerpt = excerpt;
  }
}

const EXCERPT_LIMIT = 300;

export function excerptOf(body: string, limit = EXCERPT_LIMIT): string {
  const flat = body.replace(/\s+/g, ' ').trim();
  return flat.length > limit ? `${flat.slice(0, limit)}...` : flat;
}

function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return url;
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function errorStatus(error: unknown): number | null {
  if (error instanceof HttpError) return error.status;
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    return typeof status === 'number' ? status : null;
  }
  return null;
}
