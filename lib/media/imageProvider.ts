import type OpenAI from 'openai';
import { fetchBytes, requestJson } from '@/lib/http';
import type { DownloadedBytes, FetchLike } from '@/lib/http';
import { firstImagePayload, operationLocator, readJobState } from '@/lib/media/payload';
import type { MediaPayload } from '@/lib/media/payload';
import type { JobPoll } from '@/lib/media/videoProvider';

export type ImageRequestMode = { kind: 'immediate'; size: '1024x1024' } | { kind: 'long-running'; size: '1792x1024' };

const LONG_RUNNING_NAME = /(async|job|batch|queue|lro|long[-_]?running)/i;

/** Deployment names that advertise an async/job API are polled; everything else answers inline. */
export function selectImageMode(deployment: string): ImageRequestMode {
  return LONG_RUNNING_NAME.test(deployment)
    ? { kind: 'long-running', size: '1792x1024' }
    : { kind: 'immediate', size: '1024x1024' };
}

export interface ImageProvider {
  generate(deployment: string, prompt: string, size: '1024x1024', signal?: AbortSignal): Promise<MediaPayload | null>;
  submit(deployment: string, prompt: string, size: '1792x1024', signal?: AbortSignal): Promise<{ operationUrl: string }>;
  poll(operationUrl: string, signal?: AbortSignal): Promise<JobPoll>;
  download(url: string, signal?: AbortSignal): Promise<DownloadedBytes>;
}

/** Inline generation through the openai SDK; job-style generation over HTTP against `jobUrl`. */
export class OpenAIImageProvider implements ImageProvider {
  private readonly client: OpenAI | null;
  private readonly jobUrl: string | null;
  private readonly apiKey: string | null;
  private readonly fetchImpl: FetchLike;

  constructor(options: { client: OpenAI | null; jobUrl?: string | null; apiKey?: string | null; fetchImpl?: FetchLike }) {
    this.client = options.client;
    this.jobUrl = options.jobUrl ?? null;
    this.apiKey = options.apiKey ?? null;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private authHeaders(url: string): Record<string, string> {
    if (!this.apiKey || !this.jobUrl || new URL(url, this.jobUrl).origin !== new URL(this.jobUrl).origin) return {};
    return { 'api-key': this.apiKey, authorization: `Bearer ${this.apiKey}` };
  }

  async generate(deployment: string, prompt: string, size: '1024x1024', signal?: AbortSignal): Promise<MediaPayload | null> {
    if (!this.client) {
      throw new Error('No image client configured');
    }
    const response = await this.client.images.generate(
      { model: deployment, prompt, n: 1, size, response_format: 'b64_json' },
      { signal }
    );
    return firstImagePayload(response);
  }

  async submit(deployment: string, prompt: string, size: '1792x1024', signal?: AbortSignal): Promise<{ operationUrl: string }> {
    if (!this.jobUrl) {
      throw new Error('No image job URL configured');
    }
    const response = await requestJson(this.fetchImpl, this.jobUrl, {
      method: 'POST',
      headers: this.authHeaders(this.jobUrl),
      json: { model: deployment, prompt, size, n: 1 },
      signal
    });
    const locator = operationLocator(this.jobUrl, response.headers.get('operation-location'), response.body);
    if (!locator) {
      throw new Error('Image job submission returned no operation location');
    }
    return { operationUrl: locator.url };
  }

  async poll(operationUrl: string, signal?: AbortSignal): Promise<JobPoll> {
    const response = await requestJson(this.fetchImpl, operationUrl, { headers: this.authHeaders(operationUrl), signal });
    return { state: readJobState(response.body) ?? 'running', body: response.body, text: response.text };
  }

  download(url: string, signal?: AbortSignal): Promise<DownloadedBytes> {
    return fetchBytes(this.fetchImpl, url, { headers: this.authHeaders(url), signal });
  }
}
