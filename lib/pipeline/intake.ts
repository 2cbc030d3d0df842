import { z } from 'zod';
import { errorMessage, UploadError } from '@/lib/errors';
import { CONTAINERS } from '@/lib/storage/objectStore';
import type { ContainerName, ObjectStore } from '@/lib/storage/objectStore';
import { manifestBlobName, quizBlobName } from '@/lib/storyboard/manifest';
import type { Manifest, QuizDocument } from '@/types/storyboard';

export const MAX_UPLOAD_CHARS = 200_000;

export function sanitizeUploadName(name: string): string {
  const cleaned = name.trim().replace(/\.\./g, '_').replace(/[/\\]/g, '_');
  return cleaned || 'unnamed';
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/** UTC `YYYYMMDDHHmmss`. */
export function uploadTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

export type SavedUpload = { blobName: string; path: string; chars: number };

export async function saveUpload(
  store: ObjectStore,
  name: string,
  content: string,
  now: Date = new Date()
): Promise<SavedUpload> {
  if (!content.trim()) {
    throw new UploadError('Upload content is empty');
  }
  if (content.length > MAX_UPLOAD_CHARS) {
    throw new UploadError(`Upload exceeds ${MAX_UPLOAD_CHARS} characters (${content.length})`);
  }
  const blobName = `${uploadTimestamp(now)}_${sanitizeUploadName(name)}`;
  try {
    await store.writeBytes(CONTAINERS.uploads, blobName, content, 'text/plain; charset=utf-8');
  } catch (err) {
    if (err instanceof UploadError) throw err;
    throw new UploadError(`Failed to store upload ${blobName}: ${errorMessage(err)}`, { cause: err });
  }
  console.info(`[intake] stored ${CONTAINERS.uploads}/${blobName} (${content.length} chars)`);
  return { blobName, path: `${CONTAINERS.uploads}/${blobName}`, chars: content.length };
}

export type ProcessingState = 'processed' | 'uploaded' | 'missing';

export type ProcessingStatus = {
  doc: string;
  status: ProcessingState;
  videoReady: boolean;
  quizReady: boolean;
};

export async function getProcessingStatus(store: ObjectStore, docName: string): Promise<ProcessingStatus> {
  const [uploaded, videoReady, quizReady] = await Promise.all([
    store.exists(CONTAINERS.uploads, docName),
    store.exists(CONTAINERS.manifests, manifestBlobName(docName)),
    store.exists(CONTAINERS.quizzes, quizBlobName(docName))
  ]);
  const status: ProcessingState = videoReady ? 'processed' : uploaded ? 'uploaded' : 'missing';
  return { doc: docName, status, videoReady, quizReady };
}

const nullableString = z.string().nullable();

const QuizQuestionSchema = z.object({
  id: z.string(),
  text: z.string(),
  options: z.array(z.string()),
  correctIndex: z.number().int(),
  explanation: nullableString
});

const QuizDocumentSchema = z.object({
  sourceDocument: z.string(),
  createdUtc: z.string(),
  questions: z.array(QuizQuestionSchema)
});

const ManifestSchema = z.object({
  sourceDocument: z.string(),
  summary: z.string(),
  sceneCount: z.number().int(),
  createdUtc: z.string(),
  scenes: z.array(
    z.object({
      index: z.number().int(),
      title: z.string(),
      text: z.string(),
      keywords: z.array(z.string()),
      badge: nullableString,
      imageUrl: nullableString,
      imageAlt: nullableString,
      visualPrompt: z.string(),
      audioUrl: nullableString
    })
  ),
  videoAsset: z.object({
    status: z.enum(['skipped', 'failed', 'success']),
    mp4Url: nullableString,
    thumbnailUrl: nullableString,
    durationSeconds: z.number(),
    prompt: z.string(),
    operationId: nullableString,
    sourceUrl: nullableString,
    thumbnailSourceUrl: nullableString,
    error: nullableString,
    contentType: nullableString,
    byteLength: z.number(),
    containerFourCc: nullableString,
    majorBrand: nullableString,
    hexPrefix: z.string(),
    isLikelyMp4: z.boolean()
  })
});

async function readJson<T>(store: ObjectStore, container: ContainerName, name: string, schema: z.ZodType<T>): Promise<T | null> {
  const text = await store.readText(container, name);
  if (text === null) return null;
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    console.warn(`[intake] ${container}/${name} is not valid JSON: ${errorMessage(err)}`);
    return null;
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    console.warn(`[intake] ${container}/${name} does not match the expected shape`);
    return null;
  }
  return parsed.data;
}

export function loadManifest(store: ObjectStore, docName: string): Promise<Manifest | null> {
  return readJson(store, CONTAINERS.manifests, manifestBlobName(docName), ManifestSchema);
}

export function loadQuizDocument(store: ObjectStore, docName: string): Promise<QuizDocument | null> {
  return readJson(store, CONTAINERS.quizzes, quizBlobName(docName), QuizDocumentSchema);
}
