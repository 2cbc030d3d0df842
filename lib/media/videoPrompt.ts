import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { clamp } from '@/lib/storyboard/spec';
import { resolveVisualPrompt } from '@/lib/storyboard/materialize';
import { baseName, stripExtension } from '@/lib/storage/objectStore';
import type { Scene } from '@/types/storyboard';

export const DEFAULT_STYLE_ID = 'explainer';
export const MAX_PROMPT_SHOTS = 8;
const SECONDS_PER_SCENE = 12;
const MIN_DURATION_SECONDS = 45;
const MAX_DURATION_SECONDS = 120;

export const StyleProfileSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  keywords: z.array(z.string().min(1)),
  visualStyle: z.string().min(1),
  cameraMotion: z.string().min(1),
  lighting: z.string().min(1),
  avoid: z.array(z.string())
});

export type StyleProfile = Readonly<
  Omit<z.infer<typeof StyleProfileSchema>, 'keywords' | 'avoid'> & {
    keywords: readonly string[];
    avoid: readonly string[];
  }
>;

const StyleProfileListSchema = z
  .array(StyleProfileSchema)
  .nonempty()
  .refine((list) => list.some((profile) => profile.id === DEFAULT_STYLE_ID), {
    message: `style list must include '${DEFAULT_STYLE_ID}'`
  });

const STYLES_PATH = fileURLToPath(new URL('../../config/video-styles.json', import.meta.url));
let cachedProfiles: readonly StyleProfile[] | null = null;

export function parseStyleProfiles(json: unknown): readonly StyleProfile[] {
  const parsed = StyleProfileListSchema.parse(json);
  return Object.freeze(
    parsed.map((profile) =>
      Object.freeze({
        ...profile,
        keywords: Object.freeze(profile.keywords.map((keyword) => keyword.toLowerCase())),
        avoid: Object.freeze([...profile.avoid])
      })
    )
  );
}

export function loadStyleProfiles(): readonly StyleProfile[] {
  if (!cachedProfiles) {
    const raw: unknown = JSON.parse(readFileSync(STYLES_PATH, 'utf8'));
    cachedProfiles = parseStyleProfiles(raw);
  }
  return cachedProfiles;
}

/** Human-readable label from an upload name such as `20240101120000_release-notes.txt`. */
export function documentLabel(docName: string): string {
  const label = stripExtension(baseName(docName))
    .replace(/^\d{14}_/, '')
    .replace(/[_-]+/g, ' ')
    .trim();
  return label || 'the uploaded document';
}

export type StyleSource = {
  docName: string;
  summary: string;
  scenes: readonly Pick<Scene, 'title' | 'narration' | 'keywords'>[];
};

export function styleTokens(source: StyleSource): string[] {
  const parts = [
    ...source.scenes.flatMap((scene) => scene.keywords),
    ...source.scenes.map((scene) => scene.title),
    source.summary,
    ...source.scenes.map((scene) => scene.narration),
    documentLabel(source.docName)
  ];
  return parts.flatMap((part) => part.toLowerCase().split(/[^a-z0-9]+/)).filter((token) => token.length > 2);
}

export function scoreStyle(profile: StyleProfile, tokens: readonly string[]): number {
  const keywords = new Set(profile.keywords);
  return tokens.reduce((score, token) => (keywords.has(token) ? score + 1 : score), 0);
}

/** Highest score wins; ties keep the earlier profile; no match at all picks the default style. */
export function selectStyle(source: StyleSource, profiles: readonly StyleProfile[] = loadStyleProfiles()): StyleProfile {
  const tokens = styleTokens(source);
  let best: StyleProfile | null = null;
  let bestScore = 0;
  for (const profile of profiles) {
    const score = scoreStyle(profile, tokens);
    if (score > bestScore) {
      best = profile;
      bestScore = score;
    }
  }
  if (best) return best;
  const fallback = profiles.find((profile) => profile.id === DEFAULT_STYLE_ID) ?? profiles[0];
  if (!fallback) {
    throw new Error('No video style profiles configured');
  }
  return fallback;
}

export function videoDurationSeconds(sceneCount: number): number {
  return clamp(Math.max(1, sceneCount) * SECONDS_PER_SCENE, MIN_DURATION_SECONDS, MAX_DURATION_SECONDS);
}

function sentence(text: string): string {
  const trimmed = text.trim();
  return /[.!?]$/.test(trimmed) ? trimmed : `${trimmed}.`;
}

export function buildVideoPrompt(args: {
  docName: string;
  summary: string;
  scenes: readonly Scene[];
  style: StyleProfile;
}): string {
  const { style } = args;
  const lines = [`Create a ${style.label.toLowerCase()} video about ${documentLabel(args.docName)}, rendered as ${style.visualStyle}.`];
  if (args.summary.trim()) {
    lines.push(`Summary: ${sentence(args.summary)}`);
  }
  lines.push(`Camera: ${sentence(style.cameraMotion)}`);
  lines.push(`Lighting: ${sentence(style.lighting)}`);
  if (style.avoid.length) {
    lines.push(`Avoid: ${style.avoid.join(', ')}.`);
  }
  for (const scene of args.scenes.slice(0, MAX_PROMPT_SHOTS)) {
    const keywords = scene.keywords.length ? ` Keywords: ${scene.keywords.join(', ')}.` : '';
    lines.push(
      `Shot ${scene.index}: ${sentence(scene.title)} ${sentence(scene.narration)}${keywords} Visual: ${sentence(
        resolveVisualPrompt(scene, args.summary)
      )}`
    );
  }
  lines.push(`Keep one consistent ${style.visualStyle} look across every shot.`);
  return lines.join('\n');
}
