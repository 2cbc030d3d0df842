import type { GenerationSpec, QuizQuestion, Scene, StoryboardContent } from '@/types/storyboard';
import { composeVisualPrompt, titleFromText, truncateText } from '@/lib/storyboard/materialize';

export const PLACEHOLDER_NARRATION =
  'The uploaded document did not contain enough readable text to generate a storyboard. Add richer descriptions to unlock full AI visuals.';

const MIN_LINE_CHARS = 25;
const LONG_LINE_CHARS = 120;
const SUMMARY_CHARS = 160;
const OPTION_CHARS = 90;
const BADGES = ['Overview', 'Deep Dive', 'Benefits'];
const TOPIC_PADDING = ['Overview', 'Architecture', 'Operations', 'Summary'];
const GENERIC_DISTRACTORS = [
  'A topic the document does not cover',
  'An unrelated configuration step',
  'A retired legacy process'
];

function alnumWords(text: string): string[] {
  return text
    .split(' ')
    .map((word) => word.replace(/[^\p{L}\p{N}]/gu, ''))
    .filter((word) => word.length > 0);
}

export function guessKeywords(text: string, max = 5): string[] {
  const out: string[] = [];
  for (const word of alnumWords(text)) {
    if (word.length <= 3) continue;
    const lower = word.toLowerCase();
    if (!out.includes(lower)) out.push(lower);
    if (out.length >= max) break;
  }
  return out;
}

/** Splits at the first `.` (else `,`) at or past the midpoint when both halves stay substantial. */
export function splitLongLine(line: string): [string, string] | null {
  if (line.length <= LONG_LINE_CHARS) return null;
  const midpoint = Math.floor(line.length / 2);
  let splitIndex = line.indexOf('.', midpoint);
  if (splitIndex <= 0) {
    splitIndex = line.indexOf(',', midpoint);
  }
  if (splitIndex <= 60 || splitIndex >= line.length - 40) return null;
  const first = line.slice(0, splitIndex + 1).trim();
  const second = line.slice(splitIndex + 1).trim();
  return first && second ? [first, second] : null;
}

export function qualifyingLines(documentText: string, target: number): string[] {
  const lines: string[] = [];
  for (const raw of documentText.split(/[\r\n]+/)) {
    const line = raw.trim();
    if (line.length > MIN_LINE_CHARS && !lines.includes(line)) {
      lines.push(line);
    }
  }

  if (lines.length > 0 && lines.length < target) {
    const expanded = [...lines];
    for (const line of lines) {
      if (expanded.length >= target) break;
      const halves = splitLongLine(line);
      if (!halves) continue;
      for (const half of halves) {
        if (expanded.length >= target) break;
        if (!expanded.includes(half)) expanded.push(half);
      }
    }
    return expanded;
  }

  return lines;
}

function fallbackScene(text: string, idx: number): Scene {
  const title = titleFromText(text, idx);
  const keywords = guessKeywords(text);
  return {
    index: idx + 1,
    title,
    narration: text,
    keywords,
    visualPrompt: composeVisualPrompt({ title, keywords }),
    badge: BADGES[idx] ?? null,
    imageUrl: null,
    imageAlt: null,
    audioUrl: null
  };
}

/** Exactly four case-insensitively distinct options: `primary` first, then `padding`. */
function fourOptions(primary: readonly string[], padding: readonly string[]): string[] {
  const out: string[] = [];
  const taken = new Set<string>();
  const push = (option: string) => {
    const key = option.toLowerCase();
    if (!option || taken.has(key) || out.length >= 4) return;
    taken.add(key);
    out.push(option);
  };
  primary.forEach(push);
  padding.forEach(push);
  for (let n = 1; out.length < 4; n += 1) push(`Alternative option ${n}`);
  return out;
}

function topicQuestion(firstLine: string): QuizQuestion {
  const words: string[] = [];
  for (const word of alnumWords(firstLine)) {
    if (word.length > 3 && !words.includes(word)) words.push(word);
    if (words.length >= 4) break;
  }
  return {
    id: 'q1',
    text: 'What is the central topic highlighted in this training asset?',
    options: fourOptions(words, TOPIC_PADDING),
    correctIndex: 0,
    explanation: 'Focus on the opening paragraph to recall the theme.'
  };
}

function sceneQuestion(scenes: readonly Scene[], sceneIdx: number, id: string): QuizQuestion {
  const scene = scenes[sceneIdx];
  const others: string[] = [];
  for (let step = 1; step < scenes.length; step += 1) {
    others.push(truncateText(scenes[(sceneIdx + step) % scenes.length].narration, OPTION_CHARS));
  }
  return {
    id,
    text: `Which description matches scene ${scene.index}: "${scene.title}"?`,
    options: fourOptions([truncateText(scene.narration, OPTION_CHARS), ...others], GENERIC_DISTRACTORS),
    correctIndex: 0,
    explanation: `Scene ${scene.index} covers this point.`
  };
}

type FillerBuilder = (scenes: readonly Scene[], id: string) => QuizQuestion;

const FILLERS: FillerBuilder[] = [
  (scenes, id) => ({
    id,
    text: 'How many major concepts were emphasized?',
    options: ['One', 'Two', 'Three or more', 'None'],
    correctIndex: scenes.length >= 3 ? 2 : scenes.length === 2 ? 1 : 0,
    explanation: 'Each scene maps to a concept.'
  }),
  (_scenes, id) => ({
    id,
    text: 'What turns the uploaded document into storyboard scenes and quizzes?',
    options: ['A language-model generation pipeline', 'A file transfer service', 'A message queue', 'A content delivery network'],
    correctIndex: 0,
    explanation: 'A language model drafts the scenes and quiz from the document text.'
  }),
  (scenes, id) => ({
    id,
    text: 'Which scene opens the storyboard?',
    options: fourOptions(
      scenes.map((scene) => scene.title),
      GENERIC_DISTRACTORS
    ),
    correctIndex: 0,
    explanation: 'The storyboard plays its scenes in document order.'
  })
];

export function buildFallback(documentText: string, spec: GenerationSpec): StoryboardContent {
  const target = Math.max(1, spec.targetSceneCount);
  let lines = qualifyingLines(documentText, target);
  if (!lines.length) {
    lines = [PLACEHOLDER_NARRATION];
  }

  const first = lines[0];
  const summary = first.length > SUMMARY_CHARS ? `${first.slice(0, SUMMARY_CHARS)}...` : first;
  const scenes = lines.slice(0, target).map(fallbackScene);

  const quiz: QuizQuestion[] = [topicQuestion(first)];
  for (let i = 0; i < scenes.length && quiz.length < spec.targetQuizCount; i += 1) {
    quiz.push(sceneQuestion(scenes, i, `q${quiz.length + 1}`));
  }
  for (let f = 0; quiz.length < spec.targetQuizCount; f += 1) {
    quiz.push(FILLERS[f % FILLERS.length](scenes, `q${quiz.length + 1}`));
  }

  console.info(`[storyboard] fallback scenes=${scenes.length} quiz=${quiz.length}`);
  return { summary, scenes, quiz: quiz.slice(0, Math.max(1, spec.targetQuizCount)) };
}
