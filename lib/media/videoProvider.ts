import { fetchBytes, requestJson } from '@/lib/http';
import type { DownloadedBytes, FetchLike } from '@/lib/http';
import { operationLocator, readJobState, readString } from '@/lib/media/payload';
import type { JobState } from '@/lib/media/payload';

export type VideoRequest = {
  deployment: string;
  prompt: string;
  durationSeconds: number;
  aspectRatio: string;
  format: string;
};

export type VideoSubmission =
  | { kind: 'long-running'; operationUrl: string; operationId: string | null; body: unknown }
  | { kind: 'immediate'; operationId: string | null; body: unknown };

export type JobPoll = {
  state: JobState;
  body: unknown;
  text: string;
};

export interface VideoProvider {
  submit(request: VideoRequest, signal?: AbortSignal): Promise<VideoSubmission>;
  poll(operationUrl: string, signal?: AbortSignal): Promise<JobPoll>;
  download(url: string, signal?: AbortSignal): Promise<DownloadedBytes>;
}

export function classifyVideoSubmission(endpoint: string, operationLocation: string | null, body: unknown): VideoSubmission {
  const locator = operationLocator(endpoint, operationLocation, body);
  if (locator) {
    return { kind: 'long-running', operationUrl: locator.url, operationId: locator.id, body };
  }
  return { kind: 'immediate', operationId: readString(body, 'id', 'job_id', 'operation_id'), body };
}

/** Job-style video API: POST to submit, GET the operation URL to poll. */
export class HttpVideoProvider implements VideoProvider {
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: { endpoint: string; apiKey: string; fetchImpl?: FetchLike }) {
    this.endpoint = options.endpoint;
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private headersFor(url: string): Record<string, string> {
    // credentials stay with the configured host
    if (new URL(url, this.endpoint).origin !== new URL(this.endpoint).origin) return {};
    return { 'api-key': this.apiKey, authorization: `Bearer ${this.apiKey}` };
  }

  async submit(request: VideoRequest, signal?: AbortSignal): Promise<VideoSubmission> {
    const response = await requestJson(this.fetchImpl, this.endpoint, {
      method: 'POST',
      headers: this.headersFor(this.endpoint),
      json: {
        model: request.deployment,
        prompt: request.prompt,
        duration_seconds: request.durationSeconds,
        aspect_ratio: request.aspectRatio,
        format: request.format
      },
      signal
    });
    return classifyVideoSubmission(this.endpoint, response.headers.get('operation-location'), response.body);
  }

  async poll(operationUrl: string, signal?: AbortSignal): Promise<JobPoll> {
    const response = await requestJson(this.fetchImpl, operationUrl, { headers: this.headersFor(operationUrl), signal });
    return { state: readJobState(response.body) ?? 'running', body: response.body, text: response.text };
  }

  download(url: string, signal?: AbortSignal): Promise<DownloadedBytes> {
    return fetchBytes(this.fetchImpl, url, { headers: this.headersFor(url), signal });
  }
}
