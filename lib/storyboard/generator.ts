import { jsonrepair } from 'jsonrepair';
import { isCostLimitError } from '@/lib/cost-tracker';
import { errorMessage, errorStatus, GenerationError } from '@/lib/errors';
import type { ChatMessage, ChatProvider } from '@/lib/openai-client';
import { loadPrompt, renderPrompt } from '@/lib/prompts';
import { isAbortError } from '@/lib/retry';
import { buildStoryboardJsonSchema, RawGenerationSchema, validateGeneration } from '@/lib/storyboard/schema';
import type { RawGeneration } from '@/lib/storyboard/schema';
import type { GenerationSpec } from '@/types/storyboard';

export const DEFAULT_CONTEXT_CHARS = 6000;
export const RESPONSE_FORMAT_NAME = 'storyboard_package';

export type GeneratorInput = {
  documentName: string;
  fullText: string;
  segments?: readonly string[] | null;
  spec: GenerationSpec;
};

export type GeneratorOptions = {
  chat: ChatProvider | null;
  deployment: string;
  temperature?: number;
  maxTokens?: number;
  jsonSchema?: boolean;
  contextChars?: number;
  maxScenes?: number;
  /** Throw `GenerationError` instead of resolving `null`. */
  strict?: boolean;
  signal?: AbortSignal;
};

export function buildDocumentBlocks(
  input: Pick<GeneratorInput, 'fullText' | 'segments'>,
  contextChars = DEFAULT_CONTEXT_CHARS
): string {
  const segments = (input.segments ?? []).filter((segment) => segment.trim().length > 0);
  if (segments.length) {
    const total = segments.length;
    return segments
      .map((segment, i) => `<<<SEGMENT ${i + 1}/${total}>>>\n${segment.trim()}\n<<<END SEGMENT ${i + 1}>>>`)
      .join('\n\n');
  }
  return `<<<DOCUMENT>>>\n${input.fullText.slice(0, Math.max(0, contextChars)).trim()}\n<<<END DOCUMENT>>>`;
}

export function buildMessages(input: GeneratorInput, contextChars = DEFAULT_CONTEXT_CHARS): ChatMessage[] {
  const vars = {
    documentName: input.documentName,
    sceneCount: input.spec.targetSceneCount,
    quizCount: input.spec.targetQuizCount,
    documentBlocks: buildDocumentBlocks(input, contextChars)
  };
  return [
    { role: 'system', content: renderPrompt(loadPrompt('storyboard.system.md'), vars) },
    { role: 'user', content: renderPrompt(loadPrompt('storyboard.user.md'), vars) }
  ];
}

/** Drops any preamble before the first `{`, then parses (repairing if needed) and shape-checks. */
export function parseGenerationText(text: string): RawGeneration | null {
  const start = text.indexOf('{');
  if (start < 0) return null;
  const body = text.slice(start);

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    try {
      json = JSON.parse(jsonrepair(body));
    } catch {
      return null;
    }
  }

  const parsed = RawGenerationSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export async function generateStoryboard(input: GeneratorInput, options: GeneratorOptions): Promise<RawGeneration | null> {
  const fail = (message: string, issues: string[] = [], cause?: unknown): null => {
    if (options.strict) {
      throw new GenerationError(message, issues, { cause });
    }
    console.warn(`[storyboard] ${input.documentName}: ${message}${issues.length ? ` (${issues.join('; ')})` : ''}`);
    return null;
  };

  if (!options.chat) {
    return fail('no chat provider configured');
  }

  const messages = buildMessages(input, options.contextChars ?? DEFAULT_CONTEXT_CHARS);
  const useSchema = options.jsonSchema ?? true;

  let text: string;
  try {
    text = await options.chat.complete(options.deployment, messages, {
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      responseFormat: useSchema
        ? {
            name: RESPONSE_FORMAT_NAME,
            schema: buildStoryboardJsonSchema(input.spec, options.maxScenes ?? input.spec.targetSceneCount),
            strict: false
          }
        : null,
      signal: options.signal
    });
  } catch (err) {
    if (isCostLimitError(err) || isAbortError(err) || options.signal?.aborted) throw err;
    const status = errorStatus(err);
    return fail(`chat request failed${status !== null ? ` (status ${status})` : ''}: ${errorMessage(err)}`, [], err);
  }

  const raw = parseGenerationText(text);
  if (!raw) {
    return fail('assistant response was not valid storyboard JSON');
  }

  const issues = validateGeneration(raw, input.spec);
  if (issues.length) {
    return fail('generated content failed validation', issues);
  }

  console.info(
    `[storyboard] ${input.documentName}: generated scenes=${raw.scenes?.length ?? 0} quiz=${raw.quiz?.length ?? 0}`
  );
  return raw;
}
