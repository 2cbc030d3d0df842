export type DocumentInput = {
  name: string;
  rawText: string | null | undefined;
  contentType?: string | null;
};

export type ExtractedDocument = {
  documentName: string;
  fullText: string;
  segments: string[];
  wordCount: number;
  estimatedTokenCount: number;
  contentType: string | null;
};

export type GenerationSpec = {
  targetSceneCount: number;
  targetQuizCount: number;
  wordCount: number;
};

export type Scene = {
  index: number;
  title: string;
  narration: string;
  keywords: string[];
  visualPrompt: string;
  badge: string | null;
  imageUrl: string | null;
  imageAlt: string | null;
  audioUrl: string | null;
};

export type QuizQuestion = {
  id: string;
  text: string;
  options: string[];
  correctIndex: number;
  explanation: string | null;
};

export type VideoStatus = 'skipped' | 'failed' | 'success';

export type VideoInspection = {
  contentType: string | null;
  byteLength: number;
  containerFourCc: string | null;
  majorBrand: string | null;
  hexPrefix: string;
  isLikelyMp4: boolean;
};

export type VideoAsset = Readonly<
  {
    status: VideoStatus;
    mp4Url: string | null;
    thumbnailUrl: string | null;
    durationSeconds: number;
    prompt: string;
    operationId: string | null;
    sourceUrl: string | null;
    thumbnailSourceUrl: string | null;
    error: string | null;
  } & VideoInspection
>;

export type ManifestScene = {
  index: number;
  title: string;
  text: string;
  keywords: string[];
  badge: string | null;
  imageUrl: string | null;
  imageAlt: string | null;
  visualPrompt: string;
  audioUrl: string | null;
};

export type Manifest = {
  sourceDocument: string;
  summary: string;
  sceneCount: number;
  createdUtc: string;
  scenes: ManifestScene[];
  videoAsset: VideoAsset;
};

export type QuizDocument = {
  sourceDocument: string;
  createdUtc: string;
  questions: QuizQuestion[];
};

export type StoryboardContent = {
  summary: string;
  scenes: Scene[];
  quiz: QuizQuestion[];
};
