import { z } from 'zod';

export const TTS_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type TtsVoice = (typeof TTS_VOICES)[number];

export type GenerationFailurePolicy = 'fallback' | 'abort';

export type ChatConnection =
  | { provider: 'azure'; endpoint: string; apiKey: string; apiVersion: string }
  | { provider: 'openai'; apiKey: string; baseUrl: string | null };

export type PipelineConfig = {
  chat: {
    connection: ChatConnection | null;
    deployment: string;
    temperature: number;
    maxTokens: number;
    jsonSchema: boolean;
    contextChars: number;
  };
  generation: {
    onFailure: GenerationFailurePolicy;
    maxScenes: number;
    quizGrounding: boolean;
  };
  images: {
    enabled: boolean;
    deployment: string | null;
    jobUrl: string | null;
    poll: { maxAttempts: number; delayMs: number; maxDelayMs: number };
  };
  video: {
    enabled: boolean;
    endpoint: string | null;
    apiKey: string | null;
    deployment: string | null;
    aspectRatio: string;
    format: string;
    poll: { maxAttempts: number; stepMs: number; maxDelayMs: number };
  };
  narration: {
    enabled: boolean;
    model: string;
    voice: TtsVoice;
  };
  storage: {
    root: string;
    publicBaseUrl: string | null;
  };
};

type EnvRecord = Record<string, string | undefined>;

function parseFlag(value: unknown, fallback: boolean): unknown {
  if (value === undefined || value === null || value === '') return fallback;
  if (typeof value === 'boolean') return value;
  const norm = String(value).trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(norm)) return true;
  if (['false', '0', 'no', 'off'].includes(norm)) return false;
  return value;
}

const flag = (fallback: boolean) => z.preprocess((v) => parseFlag(v, fallback), z.boolean());

const text = z.preprocess(
  (v) => (typeof v === 'string' && v.trim().length > 0 ? v.trim() : undefined),
  z.string().optional()
);

const numberWithDefault = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number().finite());

const intWithDefault = (fallback: number, min: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number().int().min(min));

const EnvSchema = z.object({
  OPENAI_API_KEY: text,
  OPENAI_BASE_URL: text,
  OPENAI_MODEL: text,
  AZURE_OPENAI_ENDPOINT: text,
  AZURE_OPENAI_API_KEY: text,
  AZURE_OPENAI_API_VERSION: text,
  CHAT_DEPLOYMENT: text,
  CHAT_TEMPERATURE: numberWithDefault(0.2),
  CHAT_MAX_TOKENS: intWithDefault(2000, 256),
  CHAT_JSON_SCHEMA: flag(true),
  CONTEXT_CHARS: intWithDefault(6000, 500),
  ON_GENERATION_FAILURE: z.preprocess(
    (v) => (typeof v === 'string' && v.trim() ? v.trim().toLowerCase() : 'fallback'),
    z.enum(['fallback', 'abort'])
  ),
  MAX_SCENES: intWithDefault(8, 1),
  QUIZ_GROUNDING: flag(true),
  ENABLE_IMAGES: flag(true),
  IMAGE_DEPLOYMENT: text,
  IMAGE_JOB_URL: text,
  IMAGE_POLL_MAX_ATTEMPTS: intWithDefault(10, 1),
  IMAGE_POLL_DELAY_MS: intWithDefault(2000, 0),
  IMAGE_POLL_MAX_DELAY_MS: intWithDefault(10000, 0),
  ENABLE_VIDEO: flag(true),
  VIDEO_ENDPOINT: text,
  VIDEO_API_KEY: text,
  VIDEO_DEPLOYMENT: text,
  VIDEO_ASPECT_RATIO: text,
  VIDEO_FORMAT: text,
  VIDEO_POLL_MAX_ATTEMPTS: intWithDefault(20, 1),
  VIDEO_POLL_STEP_MS: intWithDefault(5000, 0),
  VIDEO_POLL_MAX_DELAY_MS: intWithDefault(30000, 0),
  ENABLE_NARRATION: flag(false),
  TTS_MODEL: text,
  TTS_VOICE: z.preprocess(
    (v) => (typeof v === 'string' && v.trim() ? v.trim().toLowerCase() : 'alloy'),
    z.enum(TTS_VOICES)
  ),
  STORAGE_DIR: text,
  STORAGE_PUBLIC_BASE_URL: text
});

export function loadPipelineConfig(env: EnvRecord = process.env): PipelineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid pipeline configuration: ${detail}`);
  }
  const e = parsed.data;

  let connection: ChatConnection | null = null;
  if (e.AZURE_OPENAI_ENDPOINT && e.AZURE_OPENAI_API_KEY) {
    connection = {
      provider: 'azure',
      endpoint: e.AZURE_OPENAI_ENDPOINT.replace(/\/+$/, ''),
      apiKey: e.AZURE_OPENAI_API_KEY,
      apiVersion: e.AZURE_OPENAI_API_VERSION ?? '2024-08-01-preview'
    };
  } else if (e.OPENAI_API_KEY) {
    connection = { provider: 'openai', apiKey: e.OPENAI_API_KEY, baseUrl: e.OPENAI_BASE_URL ?? null };
  }

  return {
    chat: {
      connection,
      deployment: e.CHAT_DEPLOYMENT ?? e.OPENAI_MODEL ?? 'gpt-4o-mini',
      temperature: e.CHAT_TEMPERATURE,
      maxTokens: e.CHAT_MAX_TOKENS,
      jsonSchema: e.CHAT_JSON_SCHEMA,
      contextChars: e.CONTEXT_CHARS
    },
    generation: {
      onFailure: e.ON_GENERATION_FAILURE,
      maxScenes: e.MAX_SCENES,
      quizGrounding: e.QUIZ_GROUNDING
    },
    images: {
      enabled: e.ENABLE_IMAGES,
      deployment: e.IMAGE_DEPLOYMENT ?? null,
      jobUrl: e.IMAGE_JOB_URL ?? null,
      poll: {
        maxAttempts: e.IMAGE_POLL_MAX_ATTEMPTS,
        delayMs: e.IMAGE_POLL_DELAY_MS,
        maxDelayMs: e.IMAGE_POLL_MAX_DELAY_MS
      }
    },
    video: {
      enabled: e.ENABLE_VIDEO,
      endpoint: e.VIDEO_ENDPOINT ?? null,
      apiKey: e.VIDEO_API_KEY ?? e.AZURE_OPENAI_API_KEY ?? null,
      deployment: e.VIDEO_DEPLOYMENT ?? null,
      aspectRatio: e.VIDEO_ASPECT_RATIO ?? '16:9',
      format: e.VIDEO_FORMAT ?? 'mp4',
      poll: {
        maxAttempts: e.VIDEO_POLL_MAX_ATTEMPTS,
        stepMs: e.VIDEO_POLL_STEP_MS,
        maxDelayMs: e.VIDEO_POLL_MAX_DELAY_MS
      }
    },
    narration: {
      enabled: e.ENABLE_NARRATION,
      model: e.TTS_MODEL ?? 'gpt-4o-mini-tts',
      voice: e.TTS_VOICE
    },
    storage: {
      root: e.STORAGE_DIR ?? 'storage',
      publicBaseUrl: e.STORAGE_PUBLIC_BASE_URL ? e.STORAGE_PUBLIC_BASE_URL.replace(/\/+$/, '') : null
    }
  };
}
