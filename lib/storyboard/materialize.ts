import type { GenerationSpec, QuizQuestion, Scene, StoryboardContent } from '@/types/storyboard';
import { MAX_KEYWORDS, SUMMARY_MAX_CHARS } from '@/lib/storyboard/schema';
import type { RawGeneration, RawQuizItem, RawScene } from '@/lib/storyboard/schema';

export const DEFAULT_QUESTION_TEXT = 'Which statement best matches the training content?';
export const OPTION_FILLERS = ['Not specified', 'Configuration detail', 'Best practice', 'Review documentation'] as const;
export const DEFAULT_MAX_SCENES = 8;

function clean(value: string | null | undefined): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function truncateText(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, Math.max(0, max - 3)).trimEnd()}...`;
}

function alnumWords(text: string): string[] {
  return text
    .split(' ')
    .map((word) => word.replace(/[^\p{L}\p{N}]/gu, ''))
    .filter((word) => word.length > 0);
}

/** Title-cases the first six alphanumeric words; `Key Insight {n}` when there are none. */
export function titleFromText(text: string, index: number): string {
  const words = alnumWords(text).slice(0, 6);
  if (!words.length) {
    return `Key Insight ${index + 1}`;
  }
  return words
    .map((word) => word.toLowerCase())
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function normalizeKeywords(keywords: readonly string[] | null | undefined, max = MAX_KEYWORDS): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of keywords ?? []) {
    const keyword = raw.trim();
    const key = keyword.toLowerCase();
    if (!keyword || seen.has(key)) continue;
    seen.add(key);
    out.push(keyword);
    if (out.length >= max) break;
  }
  return out;
}

export function composeVisualPrompt(scene: Pick<Scene, 'title' | 'keywords'>, summary?: string | null): string {
  const primary = scene.keywords[0] ?? scene.title;
  const context = clean(summary);
  const about = context ? `, set in the context of ${truncateText(context, 120)}` : '';
  return `Isometric professional illustration depicting ${primary} concept${about}, modern technology theme, high contrast lighting, no text overlay.`;
}

export function resolveVisualPrompt(scene: Pick<Scene, 'title' | 'keywords' | 'visualPrompt'>, summary?: string | null): string {
  const explicit = clean(scene.visualPrompt);
  return explicit || composeVisualPrompt(scene, summary);
}

export function sceneFromGeneration(raw: RawScene, index: number, summary: string): Scene {
  const rawTitle = clean(raw.title);
  let narration = clean(raw.narration) || rawTitle;
  const title = rawTitle || titleFromText(narration, index);
  if (!narration) narration = title;
  const keywords = normalizeKeywords(raw.keywords);
  const scene: Scene = {
    index: index + 1,
    title,
    narration,
    keywords,
    visualPrompt: clean(raw.visualPrompt),
    badge: clean(raw.badge) || null,
    imageUrl: null,
    imageAlt: null,
    audioUrl: null
  };
  return { ...scene, visualPrompt: resolveVisualPrompt(scene, summary) };
}

export function clampCorrectIndex(value: number | null | undefined, optionCount = 4): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return 0;
  return Math.min(optionCount - 1, Math.max(0, Math.trunc(value)));
}

/** Pads to exactly four options with filler labels that do not repeat an existing option. */
export function padOptions(options: readonly string[]): string[] {
  const out = options
    .map((option) => option.trim())
    .filter((option) => option.length > 0)
    .slice(0, 4);
  const taken = new Set(out.map((option) => option.toLowerCase()));
  const candidates: string[] = [...OPTION_FILLERS];
  let extra = 1;
  while (out.length < 4) {
    const next = candidates.shift() ?? `Alternative option ${extra++}`;
    if (taken.has(next.toLowerCase())) continue;
    taken.add(next.toLowerCase());
    out.push(next);
  }
  return out;
}

/**
 * Trims options, drops blanks and case-insensitive repeats, keeps at most four,
 * and moves `correctIndex` to where the correct option ends up. A correct option
 * past the fourth kept one takes the fourth slot; a blank one maps to 0.
 */
export function dedupeOptions(
  options: readonly string[],
  correctIndex: number | null | undefined
): { options: string[]; correctIndex: number } {
  const correct = (options[clampCorrectIndex(correctIndex, Math.max(1, options.length))] ?? '').trim().toLowerCase();
  const unique: string[] = [];
  const seen = new Set<string>();
  for (const raw of options) {
    const option = raw.trim();
    if (!option || seen.has(option.toLowerCase())) continue;
    seen.add(option.toLowerCase());
    unique.push(option);
  }

  const kept = unique.slice(0, 4);
  if (!correct) return { options: kept, correctIndex: 0 };
  const index = kept.findIndex((option) => option.toLowerCase() === correct);
  if (index >= 0) return { options: kept, correctIndex: index };
  const moved = unique.find((option) => option.toLowerCase() === correct) ?? correct;
  kept[3] = moved;
  return { options: kept, correctIndex: 3 };
}

export function questionFromGeneration(raw: RawQuizItem, index: number): QuizQuestion {
  const kept = dedupeOptions(raw.options ?? [], raw.correctIndex);
  return {
    id: clean(raw.id) || `q${index + 1}`,
    text: clean(raw.question) || DEFAULT_QUESTION_TEXT,
    options: padOptions(kept.options),
    correctIndex: kept.correctIndex,
    explanation: clean(raw.explanation) || null
  };
}

export function ensureUniqueIds(questions: readonly QuizQuestion[]): QuizQuestion[] {
  const seen = new Set<string>();
  return questions.map((question, i) => {
    let id = question.id.trim();
    if (!id || seen.has(id)) {
      let n = i + 1;
      while (seen.has(`q${n}`)) n += 1;
      id = `q${n}`;
    }
    seen.add(id);
    return id === question.id ? question : { ...question, id };
  });
}

export function materializeGeneration(
  raw: RawGeneration,
  spec: GenerationSpec,
  options: { maxScenes?: number } = {}
): StoryboardContent {
  const maxScenes = Math.max(1, Math.floor(options.maxScenes ?? DEFAULT_MAX_SCENES));
  const summary = truncateText(clean(raw.summary), SUMMARY_MAX_CHARS);
  const scenes = (raw.scenes ?? []).slice(0, maxScenes).map((scene, i) => sceneFromGeneration(scene, i, summary));
  const quiz = ensureUniqueIds((raw.quiz ?? []).slice(0, spec.targetQuizCount).map(questionFromGeneration));
  return { summary, scenes, quiz };
}
