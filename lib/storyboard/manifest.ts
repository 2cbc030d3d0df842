import { errorMessage } from '@/lib/errors';
import { baseName, changeExtension, CONTAINERS } from '@/lib/storage/objectStore';
import type { ObjectStore } from '@/lib/storage/objectStore';
import type { Manifest, QuizDocument, QuizQuestion, Scene, VideoAsset } from '@/types/storyboard';

export function manifestBlobName(docName: string): string {
  return changeExtension(baseName(docName), '.video.json');
}

export function quizBlobName(docName: string): string {
  return changeExtension(baseName(docName), '.quiz.json');
}

export function buildManifest(args: {
  docName: string;
  summary: string;
  scenes: readonly Scene[];
  videoAsset: VideoAsset;
  createdUtc: string;
}): Manifest {
  return {
    sourceDocument: args.docName,
    summary: args.summary,
    sceneCount: args.scenes.length,
    createdUtc: args.createdUtc,
    scenes: args.scenes.map((scene) => ({
      index: scene.index,
      title: scene.title,
      text: scene.narration,
      keywords: [...scene.keywords],
      badge: scene.badge,
      imageUrl: scene.imageUrl,
      imageAlt: scene.imageAlt,
      visualPrompt: scene.visualPrompt,
      audioUrl: scene.audioUrl
    })),
    videoAsset: args.videoAsset
  };
}

export function buildQuizDocument(args: {
  docName: string;
  questions: readonly QuizQuestion[];
  createdUtc: string;
}): QuizDocument {
  return {
    sourceDocument: args.docName,
    createdUtc: args.createdUtc,
    questions: args.questions.map((question) => ({ ...question, options: [...question.options] }))
  };
}

export type PublishedPaths = {
  manifestPath: string;
  quizPath: string;
};

/**
 * Writes both artifacts as indented JSON, overwriting earlier runs. The quiz is
 * written first and removed again if the manifest write fails, so either both
 * artifacts are present or neither is.
 */
export async function publish(
  store: ObjectStore,
  docName: string,
  manifest: Manifest,
  quiz: QuizDocument
): Promise<PublishedPaths> {
  const manifestName = manifestBlobName(docName);
  const quizName = quizBlobName(docName);
  await store.writeBytes(CONTAINERS.quizzes, quizName, JSON.stringify(quiz, null, 2), 'application/json');
  try {
    await store.writeBytes(CONTAINERS.manifests, manifestName, JSON.stringify(manifest, null, 2), 'application/json');
  } catch (err) {
    try {
      await store.delete(CONTAINERS.quizzes, quizName);
    } catch (cleanupErr) {
      console.error(`[publish] ${docName}: could not remove ${CONTAINERS.quizzes}/${quizName}: ${errorMessage(cleanupErr)}`);
    }
    throw err;
  }
  console.info(`[publish] ${docName} -> ${CONTAINERS.manifests}/${manifestName}, ${CONTAINERS.quizzes}/${quizName}`);
  return {
    manifestPath: `${CONTAINERS.manifests}/${manifestName}`,
    quizPath: `${CONTAINERS.quizzes}/${quizName}`
  };
}
