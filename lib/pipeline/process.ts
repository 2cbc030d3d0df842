import type { PipelineConfig } from '@/config/pipeline';
import { runWithCostTracking } from '@/lib/cost-tracker';
import type { CostSummary } from '@/lib/cost-tracker';
import { extract } from '@/lib/extract';
import type { FetchLike } from '@/lib/http';
import { OpenAIImageProvider } from '@/lib/media/imageProvider';
import type { ImageProvider } from '@/lib/media/imageProvider';
import { populateImages } from '@/lib/media/images';
import { narrateScenes, OpenAISpeechProvider } from '@/lib/media/narration';
import type { SpeechProvider } from '@/lib/media/narration';
import { generateVideo } from '@/lib/media/video';
import type { StyleProfile } from '@/lib/media/videoPrompt';
import { HttpVideoProvider } from '@/lib/media/videoProvider';
import type { VideoProvider } from '@/lib/media/videoProvider';
import { createChatProvider, getOpenAIClient } from '@/lib/openai-client';
import type { ChatProvider } from '@/lib/openai-client';
import type { Sleep } from '@/lib/retry';
import { FileSystemObjectStore } from '@/lib/storage/fsStore';
import type { ObjectStore } from '@/lib/storage/objectStore';
import { RetryingObjectStore } from '@/lib/storage/retrying';
import { buildFallback } from '@/lib/storyboard/fallback';
import { generateStoryboard } from '@/lib/storyboard/generator';
import { groundQuiz } from '@/lib/storyboard/grounding';
import { buildManifest, buildQuizDocument, publish } from '@/lib/storyboard/manifest';
import { materializeGeneration } from '@/lib/storyboard/materialize';
import { computeGenerationSpec } from '@/lib/storyboard/spec';
import type { DocumentInput, Manifest, QuizDocument, StoryboardContent } from '@/types/storyboard';

export type PipelineDeps = {
  config: PipelineConfig;
  store: ObjectStore;
  chat: ChatProvider | null;
  images: ImageProvider | null;
  video: VideoProvider | null;
  speech: SpeechProvider | null;
  styles?: readonly StyleProfile[];
  sleep?: Sleep;
  now?: () => Date;
  costLimitUsd?: number;
};

export type ContentSource = 'generated' | 'fallback';

export type ProcessOutcome = {
  manifest: Manifest;
  quiz: QuizDocument;
  source: ContentSource;
  manifestPath: string;
  quizPath: string;
  cost: CostSummary;
};

/** Wires real providers from configuration. Missing credentials leave the matching provider null. */
export function createPipelineDeps(
  config: PipelineConfig,
  overrides: { store?: ObjectStore; fetchImpl?: FetchLike } = {}
): PipelineDeps {
  const connection = config.chat.connection;
  const client = connection ? getOpenAIClient(connection) : null;
  const store =
    overrides.store ??
    new RetryingObjectStore(
      new FileSystemObjectStore({ root: config.storage.root, publicBaseUrl: config.storage.publicBaseUrl })
    );

  const images =
    config.images.enabled && (client || config.images.jobUrl)
      ? new OpenAIImageProvider({
          client,
          jobUrl: config.images.jobUrl,
          apiKey: connection?.apiKey ?? null,
          fetchImpl: overrides.fetchImpl
        })
      : null;
  const video =
    config.video.endpoint && config.video.apiKey
      ? new HttpVideoProvider({ endpoint: config.video.endpoint, apiKey: config.video.apiKey, fetchImpl: overrides.fetchImpl })
      : null;
  const speech = config.narration.enabled && client ? new OpenAISpeechProvider(client) : null;

  return { config, store, chat: createChatProvider(connection), images, video, speech };
}

async function produceContent(
  doc: { documentName: string; fullText: string; segments: string[]; wordCount: number },
  deps: PipelineDeps,
  signal?: AbortSignal
): Promise<{ content: StoryboardContent; source: ContentSource }> {
  const { chat: chatConfig, generation } = deps.config;
  const spec = computeGenerationSpec(doc.wordCount, { maxScenes: generation.maxScenes });
  console.info(`[pipeline] ${doc.documentName}: target scenes=${spec.targetSceneCount} quiz=${spec.targetQuizCount}`);

  const raw = await generateStoryboard(
    { documentName: doc.documentName, fullText: doc.fullText, segments: doc.segments, spec },
    {
      chat: deps.chat,
      deployment: chatConfig.deployment,
      temperature: chatConfig.temperature,
      maxTokens: chatConfig.maxTokens,
      jsonSchema: chatConfig.jsonSchema,
      contextChars: chatConfig.contextChars,
      maxScenes: generation.maxScenes,
      strict: generation.onFailure === 'abort',
      signal
    }
  );

  if (!raw) {
    return { content: buildFallback(doc.fullText, spec), source: 'fallback' };
  }

  const content = materializeGeneration(raw, spec, { maxScenes: generation.maxScenes });
  if (!generation.quizGrounding) {
    return { content, source: 'generated' };
  }
  const quiz = groundQuiz(
    content.quiz,
    { fullText: doc.fullText, segments: doc.segments, scenes: content.scenes },
    spec.targetQuizCount
  );
  return { content: { ...content, quiz }, source: 'generated' };
}

/**
 * Runs one document end to end: extract, generate (or fall back), images,
 * narration, video, publish. Only extraction, `abort`-mode generation failures,
 * cost-limit breaches and cancellation reject; nothing is written in those cases.
 */
export async function processDocument(
  input: DocumentInput,
  deps: PipelineDeps,
  options: { signal?: AbortSignal } = {}
): Promise<ProcessOutcome> {
  const { signal } = options;
  const now = deps.now ?? (() => new Date());
  const started = Date.now();

  const { value, cost } = await runWithCostTracking(
    async () => {
      signal?.throwIfAborted();
      const doc = extract(input.name, input.rawText, input.contentType);
      const { content, source } = await produceContent(doc, deps, signal);
      console.info(
        `[pipeline] ${doc.documentName}: content source=${source} scenes=${content.scenes.length} quiz=${content.quiz.length}`
      );

      signal?.throwIfAborted();
      let scenes = await populateImages(doc.documentName, content.scenes, {
        config: deps.config.images,
        provider: deps.images,
        store: deps.store,
        summary: content.summary,
        sleep: deps.sleep,
        signal
      });

      signal?.throwIfAborted();
      scenes = await narrateScenes(doc.documentName, scenes, {
        config: deps.config.narration,
        provider: deps.speech,
        store: deps.store,
        sleep: deps.sleep,
        signal
      });

      signal?.throwIfAborted();
      const videoAsset = await generateVideo(doc.documentName, content.summary, scenes, {
        config: deps.config.video,
        provider: deps.video,
        store: deps.store,
        styles: deps.styles,
        sleep: deps.sleep,
        signal
      });
      console.info(`[pipeline] ${doc.documentName}: video status=${videoAsset.status}`);

      signal?.throwIfAborted();
      const createdUtc = now().toISOString();
      const manifest = buildManifest({ docName: doc.documentName, summary: content.summary, scenes, videoAsset, createdUtc });
      const quiz = buildQuizDocument({ docName: doc.documentName, questions: content.quiz, createdUtc });
      const paths = await publish(deps.store, doc.documentName, manifest, quiz);
      return { manifest, quiz, source, ...paths };
    },
    { limitUsd: deps.costLimitUsd }
  );

  console.info(
    `[pipeline] ${input.name}: done in ${Date.now() - started}ms cost=$${cost.total_cost_usd.toFixed(4)} tokens=${cost.total_tokens}`
  );
  return { ...value, cost };
}
