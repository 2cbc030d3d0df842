import { describe, expect, it } from 'vitest';
import type { PipelineConfig } from '@/config/pipeline';
import { narrateScenes } from '@/lib/media/narration';
import type { SpeechOptions, SpeechProvider } from '@/lib/media/narration';
import { InMemoryObjectStore } from '@/lib/storage/memoryStore';
import { withStatus } from '../support/fakes';
import { makeScene } from '../support/scenes';

const MP3 = new Uint8Array([73, 68, 51]);

class FakeSpeech implements SpeechProvider {
  readonly calls: { text: string; options: SpeechOptions }[] = [];
  constructor(private readonly failures: Error[] = []) {}

  async synthesize(text: string, options: SpeechOptions): Promise<Uint8Array> {
    this.calls.push({ text, options });
    const failure = this.failures.shift();
    if (failure) throw failure;
    return MP3;
  }
}

const config: PipelineConfig['narration'] = { enabled: true, model: 'gpt-4o-mini-tts', voice: 'nova' };

describe('narrateScenes', () => {
  it('uploads one clip per scene and sets the audio URL', async () => {
    const store = new InMemoryObjectStore();
    const provider = new FakeSpeech();
    const out = await narrateScenes('Handbook.txt', [makeScene(1)], { config, provider, store });
    expect(out[0].audioUrl).toBe('memory://storyboard-audio/handbook/scene-01.mp3');
    expect(provider.calls[0]).toMatchObject({
      text: 'Narration for scene 1.',
      options: { model: 'gpt-4o-mini-tts', voice: 'nova', format: 'mp3' }
    });
    expect(await store.readBytes('storyboard-audio', 'handbook/scene-01.mp3')).toEqual(MP3);
    expect(store.contentTypeOf('storyboard-audio', 'handbook/scene-01.mp3')).toBe('audio/mpeg');
  });

  it('retries server errors with exponential backoff', async () => {
    const provider = new FakeSpeech([withStatus('busy', 503), withStatus('busy', 429)]);
    const delays: number[] = [];
    const out = await narrateScenes('Handbook.txt', [makeScene(1)], {
      config,
      provider,
      store: new InMemoryObjectStore(),
      sleep: async (ms) => {
        delays.push(ms);
      }
    });
    expect(provider.calls).toHaveLength(3);
    expect(delays).toEqual([500, 1000]);
    expect(out[0].audioUrl).not.toBeNull();
  });

  it('does not retry client errors and leaves the scene silent', async () => {
    const provider = new FakeSpeech([withStatus('bad voice', 400)]);
    const out = await narrateScenes('Handbook.txt', [makeScene(1), makeScene(2)], {
      config,
      provider,
      store: new InMemoryObjectStore(),
      sleep: async () => undefined
    });
    expect(provider.calls).toHaveLength(2);
    expect(out.map((s) => s.audioUrl)).toEqual([null, 'memory://storyboard-audio/handbook/scene-02.mp3']);
  });

  it('is off unless enabled', async () => {
    const provider = new FakeSpeech();
    const scenes = [makeScene(1)];
    const out = await narrateScenes('Handbook.txt', scenes, {
      config: { ...config, enabled: false },
      provider,
      store: new InMemoryObjectStore()
    });
    expect(out).toEqual(scenes);
    expect(provider.calls).toEqual([]);
  });
});
