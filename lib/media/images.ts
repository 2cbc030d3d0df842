import type { PipelineConfig } from '@/config/pipeline';
import { errorMessage, excerptOf, ImageGenerationError } from '@/lib/errors';
import type { ImageProvider, ImageRequestMode } from '@/lib/media/imageProvider';
import { selectImageMode } from '@/lib/media/imageProvider';
import { firstImagePayload } from '@/lib/media/payload';
import type { MediaPayload } from '@/lib/media/payload';
import { isAbortError, linearBackoff, pollUntil } from '@/lib/retry';
import type { PollStep, RetryPolicy, Sleep } from '@/lib/retry';
import { resolveVisualPrompt } from '@/lib/storyboard/materialize';
import { CONTAINERS, sceneAssetName } from '@/lib/storage/objectStore';
import type { ObjectStore } from '@/lib/storage/objectStore';
import type { Scene } from '@/types/storyboard';

export type ImageDeps = {
  config: PipelineConfig['images'];
  provider: ImageProvider | null;
  store: ObjectStore;
  summary?: string;
  sleep?: Sleep;
  signal?: AbortSignal;
};

export function imagePollPolicy(poll: PipelineConfig['images']['poll']): RetryPolicy {
  return { maxAttempts: poll.maxAttempts, delayFn: linearBackoff(poll.delayMs, poll.maxDelayMs) };
}

async function requestImage(
  scene: Scene,
  prompt: string,
  deployment: string,
  mode: ImageRequestMode,
  provider: ImageProvider,
  deps: ImageDeps
): Promise<MediaPayload> {
  if (mode.kind === 'immediate') {
    const payload = await provider.generate(deployment, prompt, mode.size, deps.signal);
    if (!payload) throw new ImageGenerationError(scene.index, 'image response carried no image data');
    return payload;
  }

  const { operationUrl } = await provider.submit(deployment, prompt, mode.size, deps.signal);
  const policy = imagePollPolicy(deps.config.poll);
  const outcome = await pollUntil(
    async (): Promise<PollStep<unknown>> => {
      const status = await provider.poll(operationUrl, deps.signal);
      if (status.state === 'failed') {
        throw new ImageGenerationError(scene.index, `image job failed: ${excerptOf(status.text)}`);
      }
      return status.state === 'succeeded' ? { done: true, value: status.body } : { done: false };
    },
    policy,
    { sleep: deps.sleep, signal: deps.signal }
  );
  if (!outcome) {
    throw new ImageGenerationError(scene.index, `image job timed out after ${policy.maxAttempts} polling attempts`);
  }
  const payload = firstImagePayload(outcome.value);
  if (!payload) throw new ImageGenerationError(scene.index, 'image job succeeded without image data');
  return payload;
}

/**
 * Renders one image per scene that has none yet, sequentially. A scene whose
 * image fails keeps `imageUrl: null`; the other scenes carry on.
 */
export async function populateImages(docName: string, scenes: readonly Scene[], deps: ImageDeps): Promise<Scene[]> {
  const { config, provider } = deps;
  if (!config.enabled || !config.deployment || !provider) {
    console.info('[images] skipped: image generation disabled or not configured');
    return [...scenes];
  }
  const deployment = config.deployment;
  const mode = selectImageMode(deployment);
  if (mode.kind === 'long-running' && !config.jobUrl) {
    console.warn(`[images] skipped: deployment ${deployment} needs IMAGE_JOB_URL`);
    return [...scenes];
  }

  const out: Scene[] = [];
  let rendered = 0;
  for (const scene of scenes) {
    if (scene.imageUrl) {
      out.push(scene);
      continue;
    }
    try {
      const prompt = resolveVisualPrompt(scene, deps.summary);
      const payload = await requestImage(scene, prompt, deployment, mode, provider, deps);
      const bytes = payload.kind === 'inline' ? payload.bytes : (await provider.download(payload.url, deps.signal)).bytes;
      const name = sceneAssetName(docName, scene.index, 'png');
      await deps.store.writeBytes(CONTAINERS.images, name, bytes, 'image/png');
      const imageUrl = await deps.store.getReadUrl(CONTAINERS.images, name);
      out.push({ ...scene, imageUrl, imageAlt: scene.title });
      rendered += 1;
    } catch (err) {
      if (isAbortError(err) || deps.signal?.aborted) throw err;
      console.warn(`[images] ${docName}: scene ${scene.index} failed: ${errorMessage(err)}`);
      out.push(scene);
    }
  }
  console.info(`[images] ${docName}: rendered ${rendered}/${scenes.length} (${mode.kind})`);
  return out;
}
