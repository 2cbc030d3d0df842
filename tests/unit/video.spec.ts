import { describe, expect, it, vi } from 'vitest';
import type { PipelineConfig } from '@/config/pipeline';
import { HttpError } from '@/lib/errors';
import type { DownloadedBytes } from '@/lib/http';
import { generateVideo, videoPollPolicy } from '@/lib/media/video';
import type { JobPoll, VideoProvider, VideoRequest, VideoSubmission } from '@/lib/media/videoProvider';
import { classifyVideoSubmission, HttpVideoProvider } from '@/lib/media/videoProvider';
import { InMemoryObjectStore } from '@/lib/storage/memoryStore';
import { mp4Bytes } from '../support/fakes';
import { makeScene } from '../support/scenes';

class FakeVideo implements VideoProvider {
  readonly requests: VideoRequest[] = [];
  submission: VideoSubmission | Error = {
    kind: 'long-running',
    operationUrl: 'https://video.example.test/jobs/op-1',
    operationId: 'op-1',
    body: {}
  };
  polls: JobPoll[] = [];
  files = new Map<string, DownloadedBytes>();

  async submit(request: VideoRequest): Promise<VideoSubmission> {
    this.requests.push(request);
    if (this.submission instanceof Error) throw this.submission;
    return this.submission;
  }

  async poll(): Promise<JobPoll> {
    return this.polls.shift() ?? { state: 'running', body: { status: 'running' }, text: '{"status":"running"}' };
  }

  async download(url: string): Promise<DownloadedBytes> {
    const file = this.files.get(url);
    if (!file) throw new Error(`unexpected download ${url}`);
    return file;
  }
}

const config: PipelineConfig['video'] = {
  enabled: true,
  endpoint: 'https://video.example.test/jobs',
  apiKey: 'test-key',
  deployment: 'video-model',
  aspectRatio: '16:9',
  format: 'mp4',
  poll: { maxAttempts: 3, stepMs: 5, maxDelayMs: 8 }
};

const scenes = [makeScene(1, { imageUrl: 'memory://storyboard-images/handbook/scene-01.png' }), makeScene(2)];
const noSleep = async () => undefined;

describe('generateVideo', () => {
  it('polls a long-running job and uploads clip and thumbnail', async () => {
    const provider = new FakeVideo();
    provider.polls = [
      { state: 'running', body: { status: 'running' }, text: '' },
      {
        state: 'succeeded',
        body: {
          status: 'succeeded',
          data: [{ url: 'https://cdn.example.test/clip.mp4' }],
          thumbnail_url: 'https://cdn.example.test/thumb.jpg',
          duration_seconds: 48
        },
        text: ''
      }
    ];
    provider.files.set('https://cdn.example.test/clip.mp4', { bytes: mp4Bytes(), contentType: 'video/mp4' });
    provider.files.set('https://cdn.example.test/thumb.jpg', { bytes: new Uint8Array([255, 216]), contentType: 'image/jpeg' });
    const store = new InMemoryObjectStore();
    const delays: number[] = [];

    const asset = await generateVideo('Handbook.txt', 'Release handbook', scenes, {
      config,
      provider,
      store,
      sleep: async (ms) => {
        delays.push(ms);
      }
    });

    expect(delays).toEqual([5, 8]);
    expect(provider.requests[0]).toMatchObject({ deployment: 'video-model', durationSeconds: 45, aspectRatio: '16:9', format: 'mp4' });
    expect(asset).toMatchObject({
      status: 'success',
      mp4Url: 'memory://video-assets/handbook/clip.mp4',
      thumbnailUrl: 'memory://video-assets/handbook/thumbnail.jpg',
      durationSeconds: 48,
      operationId: 'op-1',
      sourceUrl: 'https://cdn.example.test/clip.mp4',
      thumbnailSourceUrl: 'https://cdn.example.test/thumb.jpg',
      contentType: 'video/mp4',
      byteLength: 16,
      containerFourCc: 'ftyp',
      majorBrand: 'isom',
      isLikelyMp4: true,
      error: null
    });
    expect(asset.prompt).toBe(provider.requests[0].prompt);
    expect(Object.isFrozen(asset)).toBe(true);
    expect(await store.readBytes('video-assets', 'handbook/clip.mp4')).toEqual(mp4Bytes());
    expect(store.contentTypeOf('video-assets', 'handbook/clip.mp4')).toBe('video/mp4');
  });

  it('uploads a non-MP4 payload but flags it', async () => {
    const provider = new FakeVideo();
    provider.submission = {
      kind: 'immediate',
      operationId: null,
      body: { video_base64: Buffer.from(mp4Bytes('moov', 'mvhd')).toString('base64') }
    };
    const asset = await generateVideo('Handbook.txt', 'Release handbook', scenes, {
      config,
      provider,
      store: new InMemoryObjectStore(),
      sleep: noSleep
    });
    expect(asset).toMatchObject({
      status: 'success',
      isLikelyMp4: false,
      containerFourCc: 'moov',
      contentType: null,
      durationSeconds: 45,
      thumbnailUrl: 'memory://storyboard-images/handbook/scene-01.png',
      sourceUrl: null
    });
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('payload does not look like MP4 (box=moov'));
  });

  it('returns a failed asset when the job fails', async () => {
    const provider = new FakeVideo();
    provider.polls = [{ state: 'failed', body: { status: 'failed' }, text: '{"status":"failed","error":"quota"}' }];
    const asset = await generateVideo('Handbook.txt', '', scenes, { config, provider, store: new InMemoryObjectStore(), sleep: noSleep });
    expect(asset).toMatchObject({
      status: 'failed',
      error: 'Video job reported failure',
      operationId: 'op-1',
      durationSeconds: 45,
      mp4Url: null
    });
  });

  it('returns a failed asset after the polling attempts run out', async () => {
    const asset = await generateVideo('Handbook.txt', '', scenes, {
      config,
      provider: new FakeVideo(),
      store: new InMemoryObjectStore(),
      sleep: noSleep
    });
    expect(asset).toMatchObject({ status: 'failed', error: 'Video job did not finish after 3 polling attempts' });
  });

  it('returns a failed asset when submission is rejected', async () => {
    const provider = new FakeVideo();
    provider.submission = new HttpError(500, 'https://video.example.test/jobs?key=test-key', 'oops');
    const asset = await generateVideo('Handbook.txt', '', scenes, { config, provider, store: new InMemoryObjectStore() });
    expect(asset).toMatchObject({ status: 'failed', error: 'HTTP 500 from https://video.example.test/jobs: oops' });
  });

  it('returns a failed asset when no style profile is available', async () => {
    const provider = new FakeVideo();
    const asset = await generateVideo('Handbook.txt', '', scenes, {
      config,
      provider,
      store: new InMemoryObjectStore(),
      styles: []
    });
    expect(asset).toMatchObject({
      status: 'failed',
      error: 'No video style profiles configured',
      prompt: '',
      durationSeconds: 45,
      operationId: null
    });
    expect(provider.requests).toEqual([]);
  });

  it('turns cancellation into a failed asset', async () => {
    const controller = new AbortController();
    controller.abort();
    const asset = await generateVideo('Handbook.txt', '', scenes, {
      config,
      provider: new FakeVideo(),
      store: new InMemoryObjectStore(),
      signal: controller.signal
    });
    expect(asset.status).toBe('failed');
  });

  it('skips without scenes, when disabled, or without credentials', async () => {
    const store = new InMemoryObjectStore();
    const provider = new FakeVideo();
    expect((await generateVideo('a.txt', '', [], { config, provider, store })).error).toBe('no scenes to render');
    expect((await generateVideo('a.txt', '', scenes, { config: { ...config, enabled: false }, provider, store })).error).toBe(
      'video generation disabled'
    );
    const missing = await generateVideo('a.txt', '', scenes, { config: { ...config, apiKey: null }, provider, store });
    expect(missing).toMatchObject({ status: 'skipped', error: 'video endpoint, key or deployment not configured', mp4Url: null });
    expect(provider.requests).toEqual([]);
  });

  it('grows the poll delay by a fixed step up to the cap', () => {
    const policy = videoPollPolicy({ maxAttempts: 20, stepMs: 5000, maxDelayMs: 30000 });
    expect([1, 2, 3, 6, 7, 20].map(policy.delayFn)).toEqual([5000, 10000, 15000, 30000, 30000, 30000]);
  });
});

describe('video submissions', () => {
  it('treats a pending job id as long-running', () => {
    expect(classifyVideoSubmission('https://video.example.test/jobs', null, { id: 'job-9', status: 'queued' })).toEqual({
      kind: 'long-running',
      operationUrl: 'https://video.example.test/jobs/job-9',
      operationId: 'job-9',
      body: { id: 'job-9', status: 'queued' }
    });
  });

  it('treats a finished job body as immediate', () => {
    const body = { id: 'job-9', status: 'succeeded', video_url: 'https://cdn.example.test/v.mp4' };
    expect(classifyVideoSubmission('https://video.example.test/jobs', null, body)).toEqual({
      kind: 'immediate',
      operationId: 'job-9',
      body
    });
  });

  it('sends credentials only to the configured host', async () => {
    const fetchImpl = vi.fn(async (url: string, _init?: RequestInit) => {
      if (url === 'https://video.example.test/jobs') {
        return new Response(JSON.stringify({ status: 'queued' }), {
          status: 202,
          headers: { 'operation-location': 'https://video.example.test/ops/1' }
        });
      }
      return new Response(new Uint8Array([1, 2, 3]), { status: 200, headers: { 'content-type': 'video/mp4' } });
    });
    const provider = new HttpVideoProvider({ endpoint: 'https://video.example.test/jobs', apiKey: 'test-key', fetchImpl });

    const submission = await provider.submit({
      deployment: 'video-model',
      prompt: 'p',
      durationSeconds: 45,
      aspectRatio: '16:9',
      format: 'mp4'
    });
    expect(submission).toMatchObject({ kind: 'long-running', operationUrl: 'https://video.example.test/ops/1' });

    const [, submitInit] = fetchImpl.mock.calls[0];
    expect(new Headers(submitInit?.headers).get('api-key')).toBe('test-key');
    expect(JSON.parse(String(submitInit?.body))).toEqual({
      model: 'video-model',
      prompt: 'p',
      duration_seconds: 45,
      aspect_ratio: '16:9',
      format: 'mp4'
    });

    const file = await provider.download('https://cdn.example.test/clip.mp4');
    expect(file).toEqual({ bytes: new Uint8Array([1, 2, 3]), contentType: 'video/mp4' });
    const [, downloadInit] = fetchImpl.mock.calls[1];
    expect(new Headers(downloadInit?.headers).get('api-key')).toBeNull();
  });
});
