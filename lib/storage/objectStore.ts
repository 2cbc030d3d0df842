export const CONTAINERS = {
  uploads: 'uploaded-docs',
  manifests: 'generated-videos',
  quizzes: 'quiz-data',
  images: 'storyboard-images',
  audio: 'storyboard-audio',
  video: 'video-assets'
} as const;

export type ContainerName = (typeof CONTAINERS)[keyof typeof CONTAINERS];

export type StoreBody = Uint8Array | string;

/**
 * Flat container/name blob store. Names may contain `/` to group artifacts
 * per document; implementations treat them as opaque keys.
 */
export interface ObjectStore {
  readText(container: ContainerName, name: string): Promise<string | null>;
  readBytes(container: ContainerName, name: string): Promise<Uint8Array | null>;
  /** `contentType` is a hint for stores that keep blob metadata; others ignore it. */
  writeBytes(container: ContainerName, name: string, body: StoreBody, contentType?: string): Promise<void>;
  exists(container: ContainerName, name: string): Promise<boolean>;
  /** Sorted names in the container, limited to those starting with `prefix`. */
  listNames(container: ContainerName, prefix?: string): Promise<string[]>;
  /** Removes the blob; a missing blob is not an error. */
  delete(container: ContainerName, name: string): Promise<void>;
  /** Long-lived URL a browser can use to fetch the blob. */
  getReadUrl(container: ContainerName, name: string): Promise<string>;
}

export function baseName(docName: string): string {
  const slash = Math.max(docName.lastIndexOf('/'), docName.lastIndexOf('\\'));
  return slash >= 0 ? docName.slice(slash + 1) : docName;
}

export function stripExtension(name: string): string {
  const file = baseName(name);
  const dot = file.lastIndexOf('.');
  return dot > 0 ? file.slice(0, dot) : file;
}

export function changeExtension(name: string, extension: string): string {
  const file = baseName(name);
  const prefix = name.slice(0, name.length - file.length);
  const ext = extension.startsWith('.') ? extension : `.${extension}`;
  const dot = file.lastIndexOf('.');
  return `${prefix}${dot >= 0 ? file.slice(0, dot) : file}${ext}`;
}

/** Lowercase slug of the document base name used as a per-document folder. */
export function safeDocBase(docName: string): string {
  const slug = stripExtension(docName)
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'document';
}

export function sceneAssetName(docName: string, sceneIndex: number, extension: string): string {
  return `${safeDocBase(docName)}/scene-${String(sceneIndex).padStart(2, '0')}.${extension}`;
}

const CONTENT_TYPES: Record<string, string> = {
  json: 'application/json',
  txt: 'text/plain; charset=utf-8',
  md: 'text/markdown; charset=utf-8',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  mp4: 'video/mp4'
};

export function guessContentType(name: string): string {
  const dot = name.lastIndexOf('.');
  const ext = dot >= 0 ? name.slice(dot + 1).toLowerCase() : '';
  return CONTENT_TYPES[ext] ?? 'application/octet-stream';
}

export function toBytes(body: StoreBody): Uint8Array {
  return typeof body === 'string' ? new TextEncoder().encode(body) : body;
}
