import { describe, expect, it } from 'vitest';
import { CostLimitError } from '@/lib/cost-tracker';
import { GenerationError, isGenerationError } from '@/lib/errors';
import {
  buildDocumentBlocks,
  buildMessages,
  generateStoryboard,
  parseGenerationText,
  RESPONSE_FORMAT_NAME
} from '@/lib/storyboard/generator';
import type { GenerationSpec } from '@/types/storyboard';
import { FakeChat, validGeneration, withStatus } from '../support/fakes';

const spec: GenerationSpec = { targetSceneCount: 3, targetQuizCount: 4, wordCount: 300 };
const input = { documentName: 'handbook.txt', fullText: 'Full text body.', segments: ['First part.', 'Second part.'], spec };

describe('buildDocumentBlocks', () => {
  it('delimits each segment with its position', () => {
    expect(buildDocumentBlocks({ fullText: 'ignored', segments: ['One.', 'Two.'] })).toBe(
      '<<<SEGMENT 1/2>>>\nOne.\n<<<END SEGMENT 1>>>\n\n<<<SEGMENT 2/2>>>\nTwo.\n<<<END SEGMENT 2>>>'
    );
  });

  it('truncates the full text when there are no segments', () => {
    expect(buildDocumentBlocks({ fullText: 'abcdefghij', segments: [] }, 4)).toBe('<<<DOCUMENT>>>\nabcd\n<<<END DOCUMENT>>>');
  });
});

describe('buildMessages', () => {
  it('renders counts and document blocks into the prompts', () => {
    const [system, user] = buildMessages(input);
    expect(system.role).toBe('system');
    expect(user.role).toBe('user');
    expect(user.content).toContain('Exactly 3 storyboard scenes');
    expect(user.content).toContain('Exactly 4 quiz questions');
    expect(user.content).toContain('Document title: handbook.txt');
    expect(user.content.endsWith('<<<SEGMENT 2/2>>>\nSecond part.\n<<<END SEGMENT 2>>>')).toBe(true);
    expect(user.content).not.toContain('{{');
  });
});

describe('parseGenerationText', () => {
  it('skips a preamble before the JSON object', () => {
    const parsed = parseGenerationText(`Here is the package:\n${JSON.stringify({ summary: 'S', scenes: [], quiz: [] })}`);
    expect(parsed).toMatchObject({ summary: 'S', scenes: [], quiz: [] });
  });

  it('repairs a trailing comma', () => {
    expect(parseGenerationText('{"summary": "Deploys", "scenes": [], "quiz": [],}')).toMatchObject({
      summary: 'Deploys',
      scenes: [],
      quiz: []
    });
  });

  it('returns null without a JSON object', () => {
    expect(parseGenerationText('I cannot help with that.')).toBeNull();
  });

  it('accepts numeric quiz ids as strings', () => {
    const parsed = parseGenerationText(JSON.stringify({ summary: 'S', quiz: [{ id: 7, question: 'Q?' }] }));
    expect(parsed?.quiz?.[0].id).toBe('7');
  });
});

describe('generateStoryboard', () => {
  it('returns the parsed generation and sends the schema response format', async () => {
    const chat = new FakeChat(JSON.stringify(validGeneration(3, 4)));
    const raw = await generateStoryboard(input, { chat, deployment: 'gpt-4o-mini', temperature: 0.2, maxScenes: 8 });
    expect(raw?.scenes).toHaveLength(3);
    expect(chat.calls).toHaveLength(1);
    expect(chat.calls[0].deploymentId).toBe('gpt-4o-mini');
    expect(chat.calls[0].options.temperature).toBe(0.2);
    expect(chat.calls[0].options.responseFormat?.name).toBe(RESPONSE_FORMAT_NAME);
  });

  it('omits the response format when JSON schema mode is off', async () => {
    const chat = new FakeChat(JSON.stringify(validGeneration(3, 4)));
    await generateStoryboard(input, { chat, deployment: 'm', jsonSchema: false });
    expect(chat.calls[0].options.responseFormat).toBeNull();
  });

  it('resolves null for malformed output unless strict', async () => {
    await expect(generateStoryboard(input, { chat: new FakeChat('not json at all'), deployment: 'm' })).resolves.toBeNull();
    await expect(
      generateStoryboard(input, { chat: new FakeChat('not json at all'), deployment: 'm', strict: true })
    ).rejects.toThrow('assistant response was not valid storyboard JSON');
  });

  it('rejects the whole generation when one scene lacks a visual prompt', async () => {
    const raw = validGeneration(3, 4);
    const scenes = (raw.scenes ?? []).map((scene, i) => (i === 2 ? { ...scene, visualPrompt: '' } : scene));
    const chat = new FakeChat(JSON.stringify({ ...raw, scenes }));
    await expect(generateStoryboard(input, { chat, deployment: 'm' })).resolves.toBeNull();
  });

  it('reports validation issues in strict mode', async () => {
    const chat = new FakeChat(JSON.stringify(validGeneration(3, 2)));
    const error = await generateStoryboard(input, { chat, deployment: 'm', strict: true }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(GenerationError);
    expect(isGenerationError(error)).toBe(true);
    expect(isGenerationError(new Error('other'))).toBe(false);
    expect(error).toMatchObject({ message: 'generated content failed validation', issues: ['expected 4 quiz questions, got 2'] });
  });

  it('fails without a chat provider', async () => {
    await expect(generateStoryboard(input, { chat: null, deployment: 'm' })).resolves.toBeNull();
    await expect(generateStoryboard(input, { chat: null, deployment: 'm', strict: true })).rejects.toThrow(
      'no chat provider configured'
    );
  });

  it('includes the status of a failed chat call', async () => {
    const chat = new FakeChat(withStatus('boom', 500));
    await expect(generateStoryboard(input, { chat, deployment: 'm', strict: true })).rejects.toThrow(
      'chat request failed (status 500): boom'
    );
  });

  it('lets cost limit errors through even when not strict', async () => {
    const chat = new FakeChat(new CostLimitError('Model cost limit exceeded'));
    await expect(generateStoryboard(input, { chat, deployment: 'm' })).rejects.toBeInstanceOf(CostLimitError);
  });
});
