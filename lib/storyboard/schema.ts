import { z } from 'zod';
import type { GenerationSpec } from '@/types/storyboard';

export const SUMMARY_MAX_CHARS = 250;
export const MAX_KEYWORDS = 6;

const text = z.string().nullish().catch(null);

export const RawSceneSchema = z.object({
  title: text,
  narration: text,
  keywords: z.array(z.string()).nullish().catch(null),
  visualPrompt: text,
  badge: text
});

export const RawQuizItemSchema = z.object({
  id: z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .nullish()
    .catch(null),
  question: text,
  options: z.array(z.string()).nullish().catch(null),
  correctIndex: z.number().nullish().catch(null),
  explanation: text
});

/** Loose shape of the model's JSON; completeness is checked by `validateGeneration`. */
export const RawGenerationSchema = z.object({
  summary: text,
  scenes: z.array(RawSceneSchema).nullish(),
  quiz: z.array(RawQuizItemSchema).nullish(),
  shortfallNote: text
});

export type RawScene = z.infer<typeof RawSceneSchema>;
export type RawQuizItem = z.infer<typeof RawQuizItemSchema>;
export type RawGeneration = z.infer<typeof RawGenerationSchema>;

const filled = (value: string | null | undefined): value is string => typeof value === 'string' && value.trim().length > 0;

/** All-or-nothing completeness check; returns the list of problems (empty when valid). */
export function validateGeneration(raw: RawGeneration, spec: GenerationSpec): string[] {
  const issues: string[] = [];
  if (!filled(raw.summary)) {
    issues.push('summary is empty');
  }

  const scenes = raw.scenes ?? [];
  if (scenes.length < spec.targetSceneCount) {
    if (scenes.length === 0) {
      issues.push('no scenes returned');
    } else if (!filled(raw.shortfallNote)) {
      issues.push(`expected ${spec.targetSceneCount} scenes, got ${scenes.length} without a shortfallNote`);
    }
  }
  scenes.forEach((scene, i) => {
    if (!filled(scene.title)) issues.push(`scene ${i + 1} has no title`);
    if (!filled(scene.narration)) issues.push(`scene ${i + 1} has no narration`);
    if (!filled(scene.visualPrompt)) issues.push(`scene ${i + 1} has no visualPrompt`);
  });

  const quiz = raw.quiz ?? [];
  if (quiz.length < spec.targetQuizCount) {
    issues.push(`expected ${spec.targetQuizCount} quiz questions, got ${quiz.length}`);
  }
  quiz.forEach((item, i) => {
    const options = item.options ?? [];
    if (options.length !== 4) {
      issues.push(`quiz ${i + 1} has ${options.length} options`);
    }
    const idx = item.correctIndex;
    if (typeof idx !== 'number' || !Number.isInteger(idx) || idx < 0 || idx > 3) {
      issues.push(`quiz ${i + 1} correctIndex out of range`);
    }
  });

  return issues;
}

export function buildStoryboardJsonSchema(spec: GenerationSpec, maxScenes: number): Record<string, unknown> {
  return {
    type: 'object',
    required: ['summary', 'scenes', 'quiz'],
    properties: {
      summary: { type: 'string', maxLength: SUMMARY_MAX_CHARS },
      scenes: {
        type: 'array',
        minItems: 1,
        maxItems: Math.max(spec.targetSceneCount, maxScenes),
        items: {
          type: 'object',
          required: ['title', 'narration', 'visualPrompt'],
          properties: {
            title: { type: 'string', maxLength: 120 },
            narration: { type: 'string', maxLength: 400 },
            keywords: { type: 'array', items: { type: 'string' }, maxItems: MAX_KEYWORDS },
            visualPrompt: { type: 'string' },
            badge: { type: 'string', maxLength: 40 }
          }
        }
      },
      quiz: {
        type: 'array',
        minItems: spec.targetQuizCount,
        maxItems: spec.targetQuizCount,
        items: {
          type: 'object',
          required: ['question', 'options', 'correctIndex'],
          properties: {
            id: { type: 'string' },
            question: { type: 'string', maxLength: 200 },
            options: { type: 'array', minItems: 4, maxItems: 4, items: { type: 'string', maxLength: 120 } },
            correctIndex: { type: 'integer', minimum: 0, maximum: 3 },
            explanation: { type: 'string' }
          }
        }
      },
      shortfallNote: { type: 'string' }
    }
  };
}
