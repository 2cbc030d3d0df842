export type MediaPayload =
  | { kind: 'inline'; bytes: Uint8Array; contentType: string | null }
  | { kind: 'url'; url: string };

export type JobState = 'running' | 'succeeded' | 'failed';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(source: unknown, ...keys: string[]): string | null {
  if (!isRecord(source)) return null;
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return null;
}

export function readNumber(source: unknown, ...keys: string[]): number | null {
  if (!isRecord(source)) return null;
  for (const key of keys) {
    const value = source[key];
    const num = typeof value === 'string' ? Number(value) : value;
    if (typeof num === 'number' && Number.isFinite(num)) return num;
  }
  return null;
}

const SUCCEEDED = new Set(['succeeded', 'success', 'completed', 'complete', 'done']);
const FAILED = new Set(['failed', 'failure', 'error', 'cancelled', 'canceled', 'expired']);

/** Maps provider status strings onto three states; anything unrecognised counts as still running. */
export function normalizeJobState(status: string | null): JobState | null {
  if (!status) return null;
  const norm = status.trim().toLowerCase().replace(/[\s_-]/g, '');
  if (SUCCEEDED.has(norm)) return 'succeeded';
  if (FAILED.has(norm)) return 'failed';
  return 'running';
}

export function readJobState(body: unknown): JobState | null {
  return normalizeJobState(readString(body, 'status', 'state'));
}

const DATA_URI = /^data:([^;,]+)?(?:;[^,]*)?;base64,/i;

export function decodeBase64(value: string): { bytes: Uint8Array; contentType: string | null } {
  const match = DATA_URI.exec(value);
  const body = match ? value.slice(match[0].length) : value;
  return { bytes: new Uint8Array(Buffer.from(body.replace(/\s+/g, ''), 'base64')), contentType: match?.[1] ?? null };
}

function payloadFrom(item: unknown, base64Keys: string[], urlKeys: string[]): MediaPayload | null {
  const b64 = readString(item, ...base64Keys);
  if (b64) {
    const decoded = decodeBase64(b64);
    if (decoded.bytes.length > 0) {
      return { kind: 'inline', ...decoded };
    }
  }
  const url = readString(item, ...urlKeys);
  return url ? { kind: 'url', url } : null;
}

const OUTPUT_LIST_KEYS = ['data', 'output', 'outputs', 'generations', 'results', 'images', 'videos'];
const NESTED_RESULT_KEYS = ['result', 'response'];

/** Candidate output items in provider order: list entries first, then the object itself. */
export function outputItems(body: unknown): unknown[] {
  if (!isRecord(body)) return [];
  const items: unknown[] = [];
  for (const key of OUTPUT_LIST_KEYS) {
    const value = body[key];
    if (Array.isArray(value)) items.push(...value);
  }
  for (const key of NESTED_RESULT_KEYS) {
    const nested = body[key];
    if (isRecord(nested)) items.push(...outputItems(nested), nested);
  }
  items.push(body);
  return items;
}

export function firstImagePayload(body: unknown): MediaPayload | null {
  for (const item of outputItems(body)) {
    const payload = payloadFrom(item, ['b64_json', 'b64', 'base64', 'image_base64'], ['url', 'image_url', 'uri']);
    if (payload) return payload;
  }
  return null;
}

export function firstVideoPayload(body: unknown): MediaPayload | null {
  for (const item of outputItems(body)) {
    const payload = payloadFrom(
      item,
      ['video_base64', 'b64_json', 'b64', 'base64'],
      ['video_url', 'url', 'download_url', 'uri']
    );
    if (payload) return payload;
  }
  return null;
}

export function firstThumbnailPayload(body: unknown): MediaPayload | null {
  for (const item of outputItems(body)) {
    const direct = payloadFrom(item, ['thumbnail_base64', 'thumbnail_b64'], ['thumbnail_url']);
    if (direct) return direct;
    if (isRecord(item)) {
      const nested = payloadFrom(item.thumbnail, ['b64_json', 'b64', 'base64'], ['url', 'uri']);
      if (nested) return nested;
      const url = readString(item, 'thumbnail');
      if (url) return { kind: 'url', url };
    }
  }
  return null;
}

export type OperationLocator = { url: string; id: string | null };

function appendPath(endpoint: string, id: string): string {
  const url = new URL(endpoint);
  url.pathname = `${url.pathname.replace(/\/+$/, '')}/${encodeURIComponent(id)}`;
  return url.toString();
}

/**
 * A submission is long-running when it returns an `operation-location` header,
 * or a job id whose status is not yet terminal.
 */
export function operationLocator(
  endpoint: string,
  operationLocation: string | null,
  body: unknown
): OperationLocator | null {
  const id = readString(body, 'id', 'job_id', 'jobId', 'operation_id', 'operationId');
  if (operationLocation) {
    return { url: new URL(operationLocation, endpoint).toString(), id };
  }
  if (id && readJobState(body) === 'running') {
    return { url: appendPath(endpoint, id), id };
  }
  return null;
}
