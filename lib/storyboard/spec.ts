import type { GenerationSpec } from '@/types/storyboard';

const SCENE_BUCKETS: { maxWords: number; scenes: number }[] = [
  { maxWords: 350, scenes: 3 },
  { maxWords: 650, scenes: 4 },
  { maxWords: 950, scenes: 5 }
];
const MAX_BUCKET_SCENES = 6;
const MIN_QUIZ = 3;
const MAX_QUIZ = 6;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function targetSceneCount(wordCount: number): number {
  const bucket = SCENE_BUCKETS.find((b) => wordCount <= b.maxWords);
  return bucket ? bucket.scenes : MAX_BUCKET_SCENES;
}

export function targetQuizCount(sceneCount: number): number {
  return clamp(Math.round(sceneCount * 1.2), MIN_QUIZ, MAX_QUIZ);
}

export function computeGenerationSpec(wordCount: number, options: { maxScenes?: number | null } = {}): GenerationSpec {
  let scenes = targetSceneCount(wordCount);
  if (typeof options.maxScenes === 'number' && Number.isFinite(options.maxScenes)) {
    scenes = Math.min(scenes, Math.max(1, Math.floor(options.maxScenes)));
  }
  return {
    targetSceneCount: scenes,
    targetQuizCount: targetQuizCount(scenes),
    wordCount
  };
}
