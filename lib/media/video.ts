import type { PipelineConfig } from '@/config/pipeline';
import { errorMessage, excerptOf, VideoGenerationError, VideoTimeoutError } from '@/lib/errors';
import { inspectMp4 } from '@/lib/media/mp4';
import { firstThumbnailPayload, firstVideoPayload, readNumber } from '@/lib/media/payload';
import type { MediaPayload } from '@/lib/media/payload';
import { failedVideo, skippedVideo, successVideo } from '@/lib/media/videoAsset';
import { buildVideoPrompt, selectStyle, videoDurationSeconds } from '@/lib/media/videoPrompt';
import type { StyleProfile } from '@/lib/media/videoPrompt';
import type { VideoProvider } from '@/lib/media/videoProvider';
import { pollUntil, steppedBackoff } from '@/lib/retry';
import type { PollStep, RetryPolicy, Sleep } from '@/lib/retry';
import { CONTAINERS, safeDocBase } from '@/lib/storage/objectStore';
import type { ObjectStore } from '@/lib/storage/objectStore';
import type { Scene, VideoAsset } from '@/types/storyboard';

export type VideoDeps = {
  config: PipelineConfig['video'];
  provider: VideoProvider | null;
  store: ObjectStore;
  styles?: readonly StyleProfile[];
  sleep?: Sleep;
  signal?: AbortSignal;
};

export function videoPollPolicy(poll: PipelineConfig['video']['poll']): RetryPolicy {
  return { maxAttempts: poll.maxAttempts, delayFn: steppedBackoff(poll.stepMs, poll.stepMs, poll.maxDelayMs) };
}

async function resolveBytes(
  payload: MediaPayload,
  provider: VideoProvider,
  signal?: AbortSignal
): Promise<{ bytes: Uint8Array; contentType: string | null; sourceUrl: string | null }> {
  if (payload.kind === 'inline') {
    return { bytes: payload.bytes, contentType: payload.contentType, sourceUrl: null };
  }
  const downloaded = await provider.download(payload.url, signal);
  return { ...downloaded, sourceUrl: payload.url };
}

function thumbnailExtension(contentType: string | null, sourceUrl: string | null): 'png' | 'jpg' {
  if (contentType && /jpe?g/i.test(contentType)) return 'jpg';
  if (!contentType && sourceUrl && /\.jpe?g(\?|$)/i.test(sourceUrl)) return 'jpg';
  return 'png';
}

async function awaitResult(
  provider: VideoProvider,
  operationUrl: string,
  policy: RetryPolicy,
  deps: VideoDeps
): Promise<unknown> {
  const outcome = await pollUntil(
    async (attempt): Promise<PollStep<unknown>> => {
      const status = await provider.poll(operationUrl, deps.signal);
      console.info(`[video] poll attempt=${attempt}/${policy.maxAttempts} state=${status.state}`);
      if (status.state === 'failed') {
        throw new VideoGenerationError('Video job reported failure', excerptOf(status.text));
      }
      return status.state === 'succeeded' ? { done: true, value: status.body } : { done: false };
    },
    policy,
    { sleep: deps.sleep, signal: deps.signal }
  );
  if (!outcome) {
    throw new VideoTimeoutError(policy.maxAttempts);
  }
  return outcome.value;
}

/** Produces one clip for the storyboard. Never throws; failures come back as a `failed` asset. */
export async function generateVideo(
  docName: string,
  summary: string,
  scenes: readonly Scene[],
  deps: VideoDeps
): Promise<VideoAsset> {
  const { config, provider } = deps;
  if (!scenes.length) {
    return skippedVideo('no scenes to render');
  }
  if (!config.enabled) {
    return skippedVideo('video generation disabled');
  }
  if (!provider || !config.endpoint || !config.apiKey || !config.deployment) {
    console.info('[video] skipped: endpoint, key or deployment not configured');
    return skippedVideo('video endpoint, key or deployment not configured');
  }

  const durationSeconds = videoDurationSeconds(scenes.length);
  let prompt = '';
  let operationId: string | null = null;

  try {
    const style = selectStyle({ docName, summary, scenes }, deps.styles);
    prompt = buildVideoPrompt({ docName, summary, scenes, style });
    console.info(`[video] ${docName}: submitting style=${style.id} duration=${durationSeconds}s`);
    const submission = await provider.submit(
      {
        deployment: config.deployment,
        prompt,
        durationSeconds,
        aspectRatio: config.aspectRatio,
        format: config.format
      },
      deps.signal
    );
    operationId = submission.operationId;

    const result =
      submission.kind === 'long-running'
        ? await awaitResult(provider, submission.operationUrl, videoPollPolicy(config.poll), deps)
        : submission.body;

    const payload = firstVideoPayload(result);
    if (!payload) {
      throw new VideoGenerationError('Video result carried no video payload', excerptOf(JSON.stringify(result) ?? ''));
    }
    const clip = await resolveBytes(payload, provider, deps.signal);
    const inspection = inspectMp4(clip.bytes, clip.contentType);
    if (!inspection.isLikelyMp4) {
      console.warn(
        `[video] ${docName}: payload does not look like MP4 (box=${inspection.containerFourCc ?? 'n/a'} bytes=${inspection.byteLength} head=${inspection.hexPrefix}); uploading anyway`
      );
    }

    const folder = safeDocBase(docName);
    const clipName = `${folder}/clip.mp4`;
    await deps.store.writeBytes(CONTAINERS.video, clipName, clip.bytes, 'video/mp4');
    const mp4Url = await deps.store.getReadUrl(CONTAINERS.video, clipName);

    let thumbnailUrl: string | null = scenes[0].imageUrl;
    let thumbnailSourceUrl: string | null = null;
    const thumbPayload = firstThumbnailPayload(result);
    if (thumbPayload) {
      try {
        const thumb = await resolveBytes(thumbPayload, provider, deps.signal);
        const thumbName = `${folder}/thumbnail.${thumbnailExtension(thumb.contentType, thumb.sourceUrl)}`;
        await deps.store.writeBytes(CONTAINERS.video, thumbName, thumb.bytes);
        thumbnailUrl = await deps.store.getReadUrl(CONTAINERS.video, thumbName);
        thumbnailSourceUrl = thumb.sourceUrl;
      } catch (err) {
        console.warn(`[video] ${docName}: thumbnail unavailable: ${errorMessage(err)}`);
      }
    }

    console.info(`[video] ${docName}: uploaded ${CONTAINERS.video}/${clipName} (${inspection.byteLength} bytes)`);
    return successVideo({
      mp4Url,
      thumbnailUrl,
      durationSeconds: readNumber(result, 'duration_seconds', 'durationSeconds', 'duration') ?? durationSeconds,
      prompt,
      operationId,
      sourceUrl: clip.sourceUrl,
      thumbnailSourceUrl,
      inspection
    });
  } catch (err) {
    const detail = err instanceof VideoGenerationError && err.bodyExcerpt ? ` (${err.bodyExcerpt})` : '';
    console.error(`[video] ${docName}: ${errorMessage(err)}${detail}`);
    return failedVideo(errorMessage(err), { prompt, durationSeconds, operationId });
  }
}
