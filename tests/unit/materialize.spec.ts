import { describe, expect, it } from 'vitest';
import {
  clampCorrectIndex,
  dedupeOptions,
  ensureUniqueIds,
  materializeGeneration,
  padOptions,
  questionFromGeneration,
  sceneFromGeneration,
  titleFromText,
  truncateText
} from '@/lib/storyboard/materialize';
import { buildStoryboardJsonSchema, validateGeneration } from '@/lib/storyboard/schema';
import type { GenerationSpec, QuizQuestion } from '@/types/storyboard';
import { validGeneration } from '../support/fakes';

const spec: GenerationSpec = { targetSceneCount: 3, targetQuizCount: 4, wordCount: 300 };

const question = (id: string): QuizQuestion => ({ id, text: 'Q?', options: ['a', 'b', 'c', 'd'], correctIndex: 0, explanation: null });

describe('text helpers', () => {
  it('truncates with an ellipsis inside the limit', () => {
    expect(truncateText('abcdefghij', 8)).toBe('abcde...');
    expect(truncateText('short', 8)).toBe('short');
  });

  it('title-cases the first six words', () => {
    expect(titleFromText('hello, WORLD! this is a long sentence', 0)).toBe('Hello World This Is A Long');
  });

  it('falls back to a numbered title without words', () => {
    expect(titleFromText('!!! ???', 2)).toBe('Key Insight 3');
  });
});

describe('options', () => {
  it('pads to four options without repeating an existing one', () => {
    expect(padOptions(['  Yes ', '', 'not specified'])).toEqual([
      'Yes',
      'not specified',
      'Configuration detail',
      'Best practice'
    ]);
  });

  it('fills an empty list with the filler labels', () => {
    expect(padOptions([])).toEqual(['Not specified', 'Configuration detail', 'Best practice', 'Review documentation']);
  });

  it('keeps only the first four options', () => {
    expect(padOptions(['a', 'b', 'c', 'd', 'e'])).toEqual(['a', 'b', 'c', 'd']);
  });

  it('moves the correct index past dropped duplicates and blanks', () => {
    expect(dedupeOptions(['Alpha', 'alpha', 'Bravo', 'Charlie'], 2)).toEqual({
      options: ['Alpha', 'Bravo', 'Charlie'],
      correctIndex: 1
    });
    expect(dedupeOptions(['', 'Alpha', 'Bravo', 'Charlie'], 3)).toEqual({
      options: ['Alpha', 'Bravo', 'Charlie'],
      correctIndex: 2
    });
  });

  it('keeps a correct option that sits past the fourth', () => {
    expect(dedupeOptions(['a', 'b', 'c', 'd', 'e'], 4)).toEqual({ options: ['a', 'b', 'c', 'e'], correctIndex: 3 });
  });

  it('points at the first option when the correct one is blank', () => {
    expect(dedupeOptions([' ', 'a'], 0)).toEqual({ options: ['a'], correctIndex: 0 });
  });

  it('keeps the answer key of a generated question with a repeated option', () => {
    const question = questionFromGeneration(
      { id: 'q1', question: 'Which?', options: ['Yes', 'yes', 'No', 'Maybe'], correctIndex: 2, explanation: null },
      0
    );
    expect(question.options).toEqual(['Yes', 'No', 'Maybe', 'Not specified']);
    expect(question.options[question.correctIndex]).toBe('No');
  });

  it('clamps the correct index into range', () => {
    expect(clampCorrectIndex(7)).toBe(3);
    expect(clampCorrectIndex(-2)).toBe(0);
    expect(clampCorrectIndex(2.9)).toBe(2);
    expect(clampCorrectIndex(Number.NaN)).toBe(0);
    expect(clampCorrectIndex(null)).toBe(0);
  });

  it('renumbers duplicate and blank ids', () => {
    expect(ensureUniqueIds([question('q2'), question('q2'), question('')]).map((q) => q.id)).toEqual(['q2', 'q3', 'q4']);
  });
});

describe('sceneFromGeneration', () => {
  it('derives missing fields from the narration', () => {
    const scene = sceneFromGeneration(
      { title: null, narration: 'deploy the service quickly', keywords: ['Ops', 'ops', ' '], visualPrompt: null, badge: ' ' },
      0,
      'Summary'
    );
    expect(scene).toEqual({
      index: 1,
      title: 'Deploy The Service Quickly',
      narration: 'deploy the service quickly',
      keywords: ['Ops'],
      visualPrompt:
        'Isometric professional illustration depicting Ops concept, set in the context of Summary, modern technology theme, high contrast lighting, no text overlay.',
      badge: null,
      imageUrl: null,
      imageAlt: null,
      audioUrl: null
    });
  });

  it('keeps an explicit visual prompt', () => {
    expect(sceneFromGeneration({ title: 'T', narration: 'N', visualPrompt: ' Wide shot ' }, 4, '').visualPrompt).toBe('Wide shot');
  });
});

describe('materializeGeneration', () => {
  it('caps scenes at maxScenes and the quiz at the target', () => {
    const raw = validGeneration(10, 5);
    const content = materializeGeneration({ ...raw, summary: 'x'.repeat(300) }, spec, { maxScenes: 8 });
    expect(content.scenes).toHaveLength(8);
    expect(content.scenes.map((s) => s.index)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(content.quiz).toHaveLength(4);
    expect(content.summary).toHaveLength(250);
    expect(content.summary.endsWith('...')).toBe(true);
  });

  it('materializes quiz items with clamped fields', () => {
    const content = materializeGeneration(
      { summary: 'S', scenes: [], quiz: [{ id: null, question: null, options: ['Only'], correctIndex: 9, explanation: '  ' }] },
      spec
    );
    expect(content.quiz).toEqual([
      {
        id: 'q1',
        text: 'Which statement best matches the training content?',
        options: ['Only', 'Not specified', 'Configuration detail', 'Best practice'],
        correctIndex: 3,
        explanation: null
      }
    ]);
  });
});

describe('validateGeneration', () => {
  it('accepts a complete generation', () => {
    expect(validateGeneration(validGeneration(3, 4), spec)).toEqual([]);
  });

  it('lists every missing part', () => {
    expect(validateGeneration({ summary: '', scenes: [], quiz: [] }, spec)).toEqual([
      'summary is empty',
      'no scenes returned',
      'expected 4 quiz questions, got 0'
    ]);
  });

  it('rejects the whole generation when one scene lacks a visual prompt', () => {
    const raw = validGeneration(3, 4);
    const scenes = (raw.scenes ?? []).map((scene, i) => (i === 1 ? { ...scene, visualPrompt: '  ' } : scene));
    expect(validateGeneration({ ...raw, scenes }, spec)).toEqual(['scene 2 has no visualPrompt']);
  });

  it('accepts fewer scenes only with a shortfall note', () => {
    const raw = validGeneration(2, 4);
    expect(validateGeneration(raw, spec)).toEqual(['expected 3 scenes, got 2 without a shortfallNote']);
    expect(validateGeneration({ ...raw, shortfallNote: 'short document' }, spec)).toEqual([]);
  });

  it('flags scenes and quiz items that are incomplete', () => {
    const raw = validGeneration(3, 4);
    const scenes = [{ title: 'T', narration: ' ', visualPrompt: 'P' }, ...(raw.scenes ?? []).slice(1)];
    const quiz = [{ question: 'Q', options: ['a', 'b', 'c'], correctIndex: 4 }, ...(raw.quiz ?? []).slice(1)];
    expect(validateGeneration({ ...raw, scenes, quiz }, spec)).toEqual([
      'scene 1 has no narration',
      'quiz 1 has 3 options',
      'quiz 1 correctIndex out of range'
    ]);
  });

  it('sizes the JSON schema from the generation spec', () => {
    expect(buildStoryboardJsonSchema(spec, 8)).toMatchObject({
      properties: {
        scenes: { minItems: 1, maxItems: 8 },
        quiz: { minItems: 4, maxItems: 4 }
      }
    });
  });
});
