import { ExtractionError } from '@/lib/errors';
import type { ExtractedDocument } from '@/types/storyboard';

export const MAX_SEGMENT_CHARS = 3500;
const BINARY_SAMPLE_CHARS = 2048;
const BINARY_CONTROL_RATIO = 0.15;
const TOKENS_PER_WORD = 1.3;

export function extract(
  documentName: string,
  rawText: string | null | undefined,
  contentType?: string | null
): ExtractedDocument {
  if (rawText === null || rawText === undefined) {
    throw new ExtractionError(`Document '${documentName}' payload was null; cannot continue.`);
  }

  if (appearsBinary(rawText)) {
    throw new ExtractionError(
      `Document '${documentName}' is not a supported text format. ContentType='${contentType ?? '(unknown)'}'.`
    );
  }

  const fullText = normalizeText(rawText);
  if (!fullText) {
    throw new ExtractionError(`Document '${documentName}' appears to be empty after normalization.`);
  }

  const segments = segmentText(fullText);
  const wordCount = countWords(fullText);
  const estimatedTokenCount = Math.ceil(wordCount * TOKENS_PER_WORD);

  console.info(
    `[extract] ${documentName} words=${wordCount} segments=${segments.length} tokens~${estimatedTokenCount} type=${contentType ?? '(unknown)'}`
  );

  return {
    documentName,
    fullText,
    segments,
    wordCount,
    estimatedTokenCount,
    contentType: contentType ?? null
  };
}

function isControl(code: number): boolean {
  return code <= 0x1f || (code >= 0x7f && code <= 0x9f);
}

export function appearsBinary(content: string): boolean {
  const sampleLength = Math.min(BINARY_SAMPLE_CHARS, content.length);
  if (sampleLength === 0) return false;
  let controlCount = 0;
  for (let i = 0; i < sampleLength; i += 1) {
    const ch = content[i];
    if (ch === '\r' || ch === '\n' || ch === '\t') continue;
    if (isControl(content.charCodeAt(i))) {
      controlCount += 1;
    }
  }
  return controlCount > sampleLength * BINARY_CONTROL_RATIO;
}

export function normalizeText(input: string): string {
  const out: string[] = [];
  let consecutiveBlank = 0;
  for (const line of input.split(/\r\n|\r|\n/)) {
    const trimmed = line.trimEnd();
    if (!trimmed) {
      consecutiveBlank += 1;
      if (consecutiveBlank > 1) continue;
      out.push('');
    } else {
      consecutiveBlank = 0;
      out.push(trimmed);
    }
  }
  return out.join('\n').trim();
}

export function segmentText(text: string, maxChars = MAX_SEGMENT_CHARS): string[] {
  const packed: string[] = [];
  let current = '';
  for (const line of text.split('\n')) {
    if (current.length + line.length + 1 > maxChars && current.length > 0) {
      packed.push(current.trim());
      current = '';
    }
    current += `${line}\n`;
  }
  if (current.length > 0) {
    packed.push(current.trim());
  }

  const segments: string[] = [];
  for (const seg of packed) {
    if (seg.length <= maxChars) {
      if (seg) segments.push(seg);
      continue;
    }
    for (let offset = 0; offset < seg.length; offset += maxChars) {
      const slice = seg.slice(offset, offset + maxChars).trim();
      if (slice) segments.push(slice);
    }
  }

  return segments.length ? segments : [text.trim()];
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}
