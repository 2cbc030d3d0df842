import type OpenAI from 'openai';
import type { PipelineConfig } from '@/config/pipeline';
import { errorMessage } from '@/lib/errors';
import { exponentialBackoff, isAbortError, isRetryableError, withRetry } from '@/lib/retry';
import type { RetryPolicy, Sleep } from '@/lib/retry';
import { CONTAINERS, sceneAssetName } from '@/lib/storage/objectStore';
import type { ObjectStore } from '@/lib/storage/objectStore';
import type { Scene } from '@/types/storyboard';

export type SpeechFormat = 'mp3' | 'wav';

export type SpeechOptions = {
  model: string;
  voice: PipelineConfig['narration']['voice'];
  format: SpeechFormat;
  signal?: AbortSignal;
};

export interface SpeechProvider {
  synthesize(text: string, options: SpeechOptions): Promise<Uint8Array>;
}

export class OpenAISpeechProvider implements SpeechProvider {
  constructor(private readonly client: OpenAI) {}

  async synthesize(text: string, options: SpeechOptions): Promise<Uint8Array> {
    const response = await this.client.audio.speech.create(
      {
        model: options.model,
        voice: options.voice,
        input: text,
        response_format: options.format
      },
      { signal: options.signal }
    );
    return new Uint8Array(await response.arrayBuffer());
  }
}

export const NARRATION_RETRY: RetryPolicy = { maxAttempts: 3, delayFn: exponentialBackoff(500, 8000) };

export type NarrationDeps = {
  config: PipelineConfig['narration'];
  provider: SpeechProvider | null;
  store: ObjectStore;
  retry?: RetryPolicy;
  sleep?: Sleep;
  signal?: AbortSignal;
};

export async function narrateScenes(docName: string, scenes: readonly Scene[], deps: NarrationDeps): Promise<Scene[]> {
  const { config, provider } = deps;
  if (!config.enabled || !provider) {
    return [...scenes];
  }

  const out: Scene[] = [];
  for (const scene of scenes) {
    if (scene.audioUrl || !scene.narration.trim()) {
      out.push(scene);
      continue;
    }
    try {
      const audio = await withRetry(
        () => provider.synthesize(scene.narration, { model: config.model, voice: config.voice, format: 'mp3', signal: deps.signal }),
        deps.retry ?? NARRATION_RETRY,
        { sleep: deps.sleep, signal: deps.signal, shouldRetry: (err) => !isAbortError(err) && isRetryableError(err) }
      );
      const name = sceneAssetName(docName, scene.index, 'mp3');
      await deps.store.writeBytes(CONTAINERS.audio, name, audio, 'audio/mpeg');
      out.push({ ...scene, audioUrl: await deps.store.getReadUrl(CONTAINERS.audio, name) });
    } catch (err) {
      if (isAbortError(err) || deps.signal?.aborted) throw err;
      console.warn(`[narration] ${docName}: scene ${scene.index} failed: ${errorMessage(err)}`);
      out.push(scene);
    }
  }
  const voiced = out.filter((scene) => scene.audioUrl).length;
  console.info(`[narration] ${docName}: voiced ${voiced}/${scenes.length} voice=${config.voice}`);
  return out;
}
