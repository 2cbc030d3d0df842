import type { QuizQuestion, Scene } from '@/types/storyboard';
import { dedupeOptions, ensureUniqueIds } from '@/lib/storyboard/materialize';

export type GroundingContext = {
  fullText: string;
  segments: readonly string[];
  scenes: readonly Pick<Scene, 'narration'>[];
};

const MAX_FACTS = 120;
const MIN_FACT_CHARS = 35;
const MAX_FACT_CHARS = 260;
const MIN_FACT_WORDS = 6;
const OVERLAP_THRESHOLD = 0.4;
const OPTION_CHARS = 120;
const SUPPORTED_STATEMENT = 'Which statement is supported by the document?';

const SENTENCE_SPLIT = /(?<=[.?!])\s+/;
const BULLET_PREFIX = /^\s*([-*•●]\s+)/;
const NON_WORD = /[^a-z0-9]+/gi;

const SUBJECT_SEPARATORS = [
  ' consists of ',
  ' focuses on ',
  ' focus on ',
  ' is about ',
  ' is defined as ',
  ' is defined by ',
  ' is described as ',
  ' is described by ',
  ' is ',
  ' are ',
  ' includes ',
  ' contains ',
  ' covers ',
  ' requires ',
  ' ensures ',
  ' enables ',
  ' provides ',
  ' delivers ',
  ' supports ',
  ' means ',
  ' describes ',
  ' details ',
  ' explains ',
  ' outlines ',
  ' specifies ',
  ' highlights ',
  ' demonstrates ',
  ' shows ',
  ' allows ',
  ' helps ',
  ' uses '
];

const ANTONYMS: [string, string][] = [
  ['must', 'should consider'],
  ['required', 'optional'],
  ['enables', 'prevents'],
  ['ensures', 'cannot guarantee'],
  ['increase', 'reduce'],
  ['improve', 'weaken'],
  ['supports', 'ignores'],
  ['recommended', 'discouraged']
];

const OPTION_FILLERS = ['Not stated in the document', 'Contradicted by the text', 'Irrelevant detail'];

export function truncateOption(text: string): string {
  const cleaned = text.trim().replace(/\s+/g, ' ');
  return cleaned.length <= OPTION_CHARS ? cleaned : `${cleaned.slice(0, OPTION_CHARS).trimEnd()}...`;
}

function splitSentences(text: string): string[] {
  if (!text.trim()) return [];
  return text
    .split(SENTENCE_SPLIT)
    .map((sentence) => sentence.trim())
    .filter(Boolean);
}

export function extractFactCandidates(context: GroundingContext): string[] {
  const candidates = [
    ...context.segments.flatMap(splitSentences),
    ...splitSentences(context.fullText),
    ...context.scenes.map((scene) => scene.narration).filter((narration) => narration.trim().length > 0)
  ];

  const facts: string[] = [];
  const seen = new Set<string>();
  for (const candidate of candidates) {
    const cleaned = candidate.trim().replace(BULLET_PREFIX, '').replace(/\s+/g, ' ');
    if (cleaned.length < MIN_FACT_CHARS || cleaned.length > MAX_FACT_CHARS) continue;
    if (cleaned.split(' ').length < MIN_FACT_WORDS) continue;
    const key = cleaned.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      facts.push(cleaned);
    }
    if (facts.length >= MAX_FACTS) break;
  }
  return facts;
}

function tokenize(text: string): string[] {
  return [...new Set(text.toLowerCase().split(NON_WORD).filter((token) => token.length > 3))];
}

function normalizeForComparison(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim().replace(NON_WORD, ' ').trim();
}

/** Share of `a`'s long tokens that also appear in `b`. */
export function tokenOverlap(a: string, b: string): number {
  const tokensA = tokenize(a);
  const tokensB = new Set(tokenize(b));
  if (!tokensA.length || !tokensB.size) return 0;
  return tokensA.filter((token) => tokensB.has(token)).length / tokensA.length;
}

export function findSupportingFact(target: string, facts: readonly string[], fullText: string): string | null {
  const normalizedTarget = normalizeForComparison(target);
  if (!normalizedTarget) return null;
  for (const fact of facts) {
    if (tokenOverlap(normalizedTarget, normalizeForComparison(fact)) >= OVERLAP_THRESHOLD) {
      return fact;
    }
  }
  if (fullText && fullText.toLowerCase().includes(target.trim().toLowerCase())) {
    return truncateOption(target);
  }
  return null;
}

/** Deduplicated options padded to four, with the correct answer's index carried along. */
export function prepareOptions(
  options: readonly string[],
  correctIndex: number | null | undefined
): { options: string[]; correctIndex: number } {
  const kept = dedupeOptions(options, correctIndex);
  const unique = [...kept.options];
  const seen = new Set(unique.map((option) => option.toLowerCase()));
  for (let filler = 0; unique.length < 4; filler += 1) {
    const next = OPTION_FILLERS[filler] ?? `Alternative option ${filler + 1}`;
    if (seen.has(next.toLowerCase())) continue;
    seen.add(next.toLowerCase());
    unique.push(next);
  }
  return { options: unique, correctIndex: kept.correctIndex };
}

/** Deterministic shuffle: rotate left by the first option's length mod 4. */
export function rotateOptions(options: readonly string[]): { options: string[]; correctIndex: number } {
  if (options.length !== 4) {
    return { options: [...options], correctIndex: 0 };
  }
  const rotation = options[0].length % 4;
  if (rotation === 0) {
    return { options: [...options], correctIndex: 0 };
  }
  return {
    options: [...options.slice(rotation), ...options.slice(0, rotation)],
    correctIndex: (4 - rotation) % 4
  };
}

export function appendEvidence(explanation: string, evidence: string): string {
  let trimmed = explanation.trim();
  if (trimmed.toLowerCase().includes(evidence.toLowerCase())) {
    return trimmed;
  }
  if (!trimmed.endsWith('.')) {
    trimmed += '.';
  }
  return `${trimmed} Evidence: ${evidence}`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Mutated copies of `fact` that differ from it and from every option in `exclude`, case-insensitively. */
export function distractorsFromFact(fact: string, needed: number, exclude: Iterable<string> = []): string[] {
  const distractors: string[] = [];
  if (needed <= 0) return distractors;
  const taken = new Set([fact.toLowerCase(), truncateOption(fact).toLowerCase()]);
  for (const option of exclude) taken.add(option.toLowerCase());
  const offer = (candidate: string): boolean => {
    const key = candidate.toLowerCase();
    if (!taken.has(key)) {
      taken.add(key);
      distractors.push(candidate);
    }
    return distractors.length >= needed;
  };

  for (const match of new Set(fact.match(/\d+/g) ?? [])) {
    const value = Number.parseInt(match, 10);
    if (!Number.isFinite(value)) continue;
    if (offer(truncateOption(fact.split(match).join(String(value + 1))))) return distractors;
  }

  const lower = fact.toLowerCase();
  for (const [word, replacement] of ANTONYMS) {
    if (!lower.includes(word)) continue;
    if (offer(truncateOption(fact.replace(new RegExp(escapeRegExp(word), 'gi'), replacement)))) return distractors;
  }

  for (let n = 1; distractors.length < needed; n += 1) {
    offer(`Statement not aligned with the document (${n})`);
  }
  return distractors;
}

export function composeQuestionParts(
  fact: string,
  allFacts: readonly string[]
): { question: string; correct: string; distractors: string[] } | null {
  if (!fact.trim()) return null;

  let subject = '';
  let remainder = fact;
  const lower = fact.toLowerCase();
  for (const separator of SUBJECT_SEPARATORS) {
    const index = lower.indexOf(separator);
    if (index > 10) {
      subject = fact.slice(0, index).trim();
      remainder = fact.slice(index + separator.length).trim();
      break;
    }
  }
  if (!subject) {
    subject = fact.split(' ').filter(Boolean).slice(0, 6).join(' ');
    remainder = fact;
  }
  if (remainder.trim().length < 15) return null;

  const correct = truncateOption(remainder);
  const distractors: string[] = [];
  const taken = new Set([correct.toLowerCase()]);
  for (const alt of allFacts) {
    if (alt.toLowerCase() === lower) continue;
    const option = truncateOption(alt);
    if (taken.has(option.toLowerCase())) continue;
    taken.add(option.toLowerCase());
    distractors.push(option);
    if (distractors.length >= 3) break;
  }
  if (distractors.length < 3) {
    distractors.push(...distractorsFromFact(fact, 3 - distractors.length, taken));
  }

  return { question: `According to the document, what about ${subject}?`, correct, distractors: distractors.slice(0, 3) };
}

class QuestionTexts {
  private readonly used = new Set<string>();

  /** Records the text; false when it was already taken. */
  claim(text: string): boolean {
    const key = text.toLowerCase();
    if (this.used.has(key)) return false;
    this.used.add(key);
    return true;
  }
}

function normalizeGenerated(
  source: QuizQuestion,
  facts: readonly string[],
  fullText: string,
  nextIndex: number,
  texts: QuestionTexts
): QuizQuestion | null {
  if (!source.options.length) return null;
  const { options, correctIndex } = prepareOptions(source.options, source.correctIndex);
  const evidence = findSupportingFact(options[correctIndex], facts, fullText);
  if (!evidence) return null;

  let text = source.text.trim() || SUPPORTED_STATEMENT;
  if (!texts.claim(text)) {
    text = `${text} (${nextIndex})`;
    texts.claim(text);
  }

  return {
    id: source.id.trim() || `q${nextIndex}`,
    text,
    options,
    correctIndex,
    explanation: source.explanation?.trim()
      ? appendEvidence(source.explanation, evidence)
      : `Evidence from the document: ${evidence}`
  };
}

function factQuestions(facts: readonly string[], existing: number, needed: number, texts: QuestionTexts): QuizQuestion[] {
  const out: QuizQuestion[] = [];
  for (let attempt = 0; out.length < needed && attempt < facts.length * 3; attempt += 1) {
    const fact = facts[attempt % facts.length];
    const parts = composeQuestionParts(fact, facts);
    if (!parts) continue;
    const n = existing + out.length + 1;
    const question = texts.claim(parts.question) ? parts.question : `${parts.question} #${n}`;
    const rotated = rotateOptions([parts.correct, ...parts.distractors]);
    out.push({ id: `q${n}`, text: question, ...rotated, explanation: `Reference: ${fact}` });
  }
  return out;
}

function supportedStatementQuestion(fact: string, n: number, texts: QuestionTexts): QuizQuestion {
  const text = texts.claim(SUPPORTED_STATEMENT) ? SUPPORTED_STATEMENT : `${SUPPORTED_STATEMENT} #${n}`;
  const correct = truncateOption(fact);
  const rotated = rotateOptions([correct, ...distractorsFromFact(fact, 3, [correct])]);
  return { id: `q${n}`, text, ...rotated, explanation: `Reference: ${fact}` };
}

/**
 * Keeps generated questions whose correct answer is backed by the document,
 * then tops the quiz up to `target` with questions composed from document
 * facts, then with "supported statement" questions.
 */
export function groundQuiz(questions: readonly QuizQuestion[], context: GroundingContext, target: number): QuizQuestion[] {
  const facts = extractFactCandidates(context);
  if (!facts.length) {
    return questions.slice(0, target);
  }

  const texts = new QuestionTexts();
  const grounded: QuizQuestion[] = [];

  for (const question of questions) {
    if (grounded.length >= target) break;
    const kept = normalizeGenerated(question, facts, context.fullText, grounded.length + 1, texts);
    if (kept) grounded.push(kept);
  }
  const keptCount = grounded.length;

  if (grounded.length < target) {
    grounded.push(...factQuestions(facts, grounded.length, target - grounded.length, texts));
  }

  while (grounded.length < target) {
    grounded.push(supportedStatementQuestion(facts[grounded.length % facts.length], grounded.length + 1, texts));
  }

  console.info(
    `[storyboard] quiz grounding kept=${keptCount} composed=${grounded.length - keptCount} facts=${facts.length}`
  );
  return ensureUniqueIds(grounded.slice(0, target));
}
