import { emptyInspection } from '@/lib/media/mp4';
import type { VideoAsset, VideoInspection } from '@/types/storyboard';

type Base = Omit<VideoAsset, 'status' | 'error'>;

function blank(prompt: string, durationSeconds: number): Base {
  return {
    mp4Url: null,
    thumbnailUrl: null,
    durationSeconds,
    prompt,
    operationId: null,
    sourceUrl: null,
    thumbnailSourceUrl: null,
    ...emptyInspection()
  };
}

export function skippedVideo(reason: string, prompt = ''): VideoAsset {
  const asset: VideoAsset = { ...blank(prompt, 0), status: 'skipped', error: reason };
  return Object.freeze(asset);
}

export function failedVideo(
  error: string,
  details: { prompt?: string; durationSeconds?: number; operationId?: string | null } = {}
): VideoAsset {
  const asset: VideoAsset = {
    ...blank(details.prompt ?? '', details.durationSeconds ?? 0),
    operationId: details.operationId ?? null,
    status: 'failed',
    error
  };
  return Object.freeze(asset);
}

export function successVideo(args: {
  mp4Url: string;
  thumbnailUrl: string | null;
  durationSeconds: number;
  prompt: string;
  operationId: string | null;
  sourceUrl: string | null;
  thumbnailSourceUrl: string | null;
  inspection: VideoInspection;
}): VideoAsset {
  const asset: VideoAsset = {
    status: 'success',
    mp4Url: args.mp4Url,
    thumbnailUrl: args.thumbnailUrl,
    durationSeconds: args.durationSeconds,
    prompt: args.prompt,
    operationId: args.operationId,
    sourceUrl: args.sourceUrl,
    thumbnailSourceUrl: args.thumbnailSourceUrl,
    error: null,
    ...args.inspection
  };
  return Object.freeze(asset);
}
