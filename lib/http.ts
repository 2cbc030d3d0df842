import { HttpError } from '@/lib/errors';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type JsonResponse = {
  status: number;
  headers: Headers;
  body: unknown;
  text: string;
};

export type DownloadedBytes = {
  bytes: Uint8Array;
  contentType: string | null;
};

function parseBody(text: string): unknown {
  if (!text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export async function requestJson(
  fetchImpl: FetchLike,
  url: string,
  init: { method?: 'GET' | 'POST'; headers?: Record<string, string>; json?: unknown; signal?: AbortSignal } = {}
): Promise<JsonResponse> {
  const headers: Record<string, string> = { accept: 'application/json', ...init.headers };
  let body: string | undefined;
  if (init.json !== undefined) {
    headers['content-type'] = 'application/json';
    body = JSON.stringify(init.json);
  }
  const response = await fetchImpl(url, {
    method: init.method ?? (body === undefined ? 'GET' : 'POST'),
    headers,
    body,
    signal: init.signal
  });
  const text = await response.text();
  if (!response.ok) {
    throw new HttpError(response.status, url, text);
  }
  return { status: response.status, headers: response.headers, body: parseBody(text), text };
}

export async function fetchBytes(
  fetchImpl: FetchLike,
  url: string,
  init: { headers?: Record<string, string>; signal?: AbortSignal } = {}
): Promise<DownloadedBytes> {
  const response = await fetchImpl(url, { method: 'GET', headers: init.headers, signal: init.signal });
  if (!response.ok) {
    throw new HttpError(response.status, url, await response.text());
  }
  const buffer = await response.arrayBuffer();
  return { bytes: new Uint8Array(buffer), contentType: response.headers.get('content-type') };
}
