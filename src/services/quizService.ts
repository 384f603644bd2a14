import { DataUnavailableError, PersistenceWriteError, StudyError } from '../errors.js';
import type {
  CharacterRecord,
  JlptLevel,
  MistakeEntry,
  Question,
  QuizItem,
  VocabularyRecord,
} from '../interfaces/study.interface.js';
import type { MistakeLedger } from './mistakeService.js';
import type { ProgressLedger } from './progressService.js';
import { vocabKey } from './progressService.js';

export const OPTION_COUNT = 4;

export type RandomSource = () => number;

/** Fisher-Yates; returns a new array. */
export function shuffleArray<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export function normalizeAnswer(value: string): string {
  return value.trim().toLowerCase();
}

export function vocabularyItem(record: VocabularyRecord, level: JlptLevel): QuizItem {
  return {
    key: vocabKey(record),
    prompt: `${record.kana} (${record.kanji})`,
    answer: record.meaning,
    kind: 'vocab',
    level,
  };
}

export function characterItem(record: CharacterRecord): QuizItem {
  return {
    key: record.character,
    prompt: record.character,
    answer: record.correctAnswer,
    kind: 'character',
    level: null,
  };
}

/** First occurrence of each key wins. */
export function distinctItems(pool: readonly QuizItem[]): QuizItem[] {
  const byKey = new Map<string, QuizItem>();
  for (const item of pool) {
    if (!byKey.has(item.key)) byKey.set(item.key, item);
  }
  return [...byKey.values()];
}

export type GenerateOptions = {
  /** Keys not to ask about. Ignored when it would leave nothing to ask. */
  exclude?: ReadonlySet<string>;
  random?: RandomSource;
};

/**
 * Shuffles the distinct-key pool, asks about the first item not excluded and
 * fills up to three more options from the rest of the shuffled pool. An item
 * whose answer reads the same as an option already taken is passed over, so
 * small pools give fewer options rather than repeated ones.
 */
export function generateQuestion(pool: readonly QuizItem[], options: GenerateOptions = {}): Question {
  const random = options.random ?? Math.random;
  const exclude = options.exclude ?? new Set<string>();
  const items = shuffleArray(distinctItems(pool), random);

  const correct = items.find((item) => !exclude.has(item.key)) ?? items[0];
  if (!correct) {
    throw new DataUnavailableError('quiz', 'nothing to ask about');
  }

  const answers = [correct.answer];
  const taken = new Set([normalizeAnswer(correct.answer)]);

  for (const item of items) {
    if (answers.length >= OPTION_COUNT) break;
    if (item.key === correct.key) continue;

    const normalized = normalizeAnswer(item.answer);
    if (taken.has(normalized)) continue;

    taken.add(normalized);
    answers.push(item.answer);
  }

  return {
    key: correct.key,
    prompt: correct.prompt,
    correctAnswer: correct.answer,
    options: shuffleArray(answers, random),
  };
}

export function evaluateAnswer(question: Question, userInput: string): { isCorrect: boolean } {
  return { isCorrect: normalizeAnswer(userInput) === normalizeAnswer(question.correctAnswer) };
}

export type SessionState = 'awaiting-answer' | 'showing-feedback' | 'finished';

export type QuizPlan =
  | {
      mode: 'quiz';
      pool: QuizItem[];
      questionCount: number;
      excludeMastered?: boolean;
    }
  | {
      mode: 'review';
      targets: QuizItem[];
      /** Items the options for `target` are drawn from */
      poolFor: (target: QuizItem) => QuizItem[];
    };

export type AnswerOutcome = {
  question: Question;
  item: QuizItem;
  userAnswer: string;
  isCorrect: boolean;
  newlyMastered: boolean;
  cleared: boolean;
  /** Set when a ledger could not be saved; the answer still counts in memory */
  warning?: string;
};

export type SessionSummary = {
  total: number;
  answered: number;
  correct: number;
  missed: AnswerOutcome[];
};

export type QuizSessionDeps = {
  progress: ProgressLedger;
  mistakes: MistakeLedger;
  random?: RandomSource;
  clock?: () => Date;
};

/**
 * One bounded run of questions. Every answer is written to the ledgers as soon
 * as it is given, so quitting keeps whatever was already answered.
 *
 * awaiting-answer -> showing-feedback -> awaiting-answer | finished
 */
export class QuizSession {
  private _state: SessionState = 'awaiting-answer';
  private currentQuestion: Question | null = null;
  private readonly asked = new Set<string>();
  private readonly outcomes: AnswerOutcome[] = [];
  private readonly items: Map<string, QuizItem>;
  private readonly reviewQueue: QuizItem[];
  private readonly random: RandomSource;
  private readonly clock: () => Date;
  readonly total: number;

  constructor(private readonly plan: QuizPlan, private readonly deps: QuizSessionDeps) {
    this.random = deps.random ?? Math.random;
    this.clock = deps.clock ?? (() => new Date());

    if (plan.mode === 'quiz') {
      const pool = distinctItems(plan.pool);
      this.items = new Map(pool.map((item) => [item.key, item]));
      this.reviewQueue = [];
      this.total = Math.max(0, Math.min(plan.questionCount, pool.length));
    } else {
      this.reviewQueue = shuffleArray(distinctItems(plan.targets), this.random);
      this.items = new Map(this.reviewQueue.map((item) => [item.key, item]));
      this.total = this.reviewQueue.length;
    }

    this.advance();
  }

  get state(): SessionState {
    return this._state;
  }

  /** Number of the current question, counting from 1. */
  get position(): number {
    return this.outcomes.length + (this._state === 'awaiting-answer' ? 1 : 0);
  }

  current(): Question | null {
    return this._state === 'awaiting-answer' ? this.currentQuestion : null;
  }

  answer(userInput: string): AnswerOutcome {
    const question = this.currentQuestion;
    if (this._state !== 'awaiting-answer' || !question) {
      throw new StudyError('No question is waiting for an answer');
    }

    const item = this.itemFor(question);
    const { isCorrect } = evaluateAnswer(question, userInput);
    const outcome: AnswerOutcome = {
      question,
      item,
      userAnswer: userInput.trim(),
      isCorrect,
      newlyMastered: false,
      cleared: false,
    };

    if (isCorrect) {
      if (item.kind === 'vocab' && item.level) {
        const level = item.level;
        this.commit(outcome, () => {
          outcome.newlyMastered = this.deps.progress.markMastered(level, item.key);
        });
      }
      if (this.plan.mode === 'review') {
        this.commit(outcome, () => {
          outcome.cleared = this.deps.mistakes.clear(item.key);
        });
      }
    } else {
      this.commit(outcome, () => {
        this.deps.mistakes.record(
          {
            key: item.key,
            kind: item.kind,
            level: item.level,
            prompt: item.prompt,
            correctAnswer: item.answer,
            userAnswer: outcome.userAnswer,
          },
          this.clock()
        );
      });
    }

    this.outcomes.push(outcome);
    this._state = 'showing-feedback';
    return outcome;
  }

  /** Moves past the feedback; returns the next question or null when done. */
  next(): Question | null {
    if (this._state !== 'showing-feedback') {
      throw new StudyError('There is no answered question to move past');
    }
    this.advance();
    return this.current();
  }

  quit(): void {
    this._state = 'finished';
    this.currentQuestion = null;
  }

  summary(): SessionSummary {
    return {
      total: this.total,
      answered: this.outcomes.length,
      correct: this.outcomes.filter((o) => o.isCorrect).length,
      missed: this.outcomes.filter((o) => !o.isCorrect),
    };
  }

  private advance(): void {
    if (this.outcomes.length >= this.total) {
      this.quit();
      return;
    }

    const question = this.plan.mode === 'quiz' ? this.nextQuizQuestion() : this.nextReviewQuestion(this.plan);
    this.asked.add(question.key);
    this.currentQuestion = question;
    this._state = 'awaiting-answer';
  }

  private nextQuizQuestion(): Question {
    const pool = [...this.items.values()];
    const exclude = new Set(this.asked);

    if (this.plan.mode === 'quiz' && this.plan.excludeMastered) {
      const mastered = pool.filter((item) => this.isMastered(item) && !exclude.has(item.key));
      if (mastered.length + exclude.size < pool.length) {
        mastered.forEach((item) => exclude.add(item.key));
      }
    }

    return generateQuestion(pool, { exclude, random: this.random });
  }

  private nextReviewQuestion(plan: Extract<QuizPlan, { mode: 'review' }>): Question {
    const target = this.reviewQueue[this.outcomes.length];
    const pool = distinctItems([target, ...plan.poolFor(target)]);
    const exclude = new Set(pool.filter((item) => item.key !== target.key).map((item) => item.key));
    return generateQuestion(pool, { exclude, random: this.random });
  }

  private isMastered(item: QuizItem): boolean {
    return item.kind === 'vocab' && item.level !== null && this.deps.progress.has(item.level, item.key);
  }

  private itemFor(question: Question): QuizItem {
    const item = this.items.get(question.key);
    if (!item) throw new StudyError(`Unknown quiz item ${question.key}`);
    return item;
  }

  private commit(outcome: AnswerOutcome, write: () => void): void {
    try {
      write();
    } catch (err) {
      if (!(err instanceof PersistenceWriteError)) throw err;
      console.error(`❌ ${err.message}`);
      outcome.warning = `${err.message}. Progress from this session may not be kept.`;
    }
  }
}

export type Grade = 'perfect' | 'great' | 'keep-going';

export function grade(correct: number, total: number): Grade {
  if (total === 0) return 'keep-going';
  if (correct === total) return 'perfect';
  if (correct >= total * 0.6) return 'great';
  return 'keep-going';
}

export type ReviewSources = {
  vocabulary: Record<JlptLevel, VocabularyRecord[]>;
  characters: CharacterRecord[];
};

/**
 * Turns saved mistakes back into quiz items. Options for a vocabulary
 * mistake come from its own level, for a character from the character list.
 * Mistakes whose record is no longer in the data files are left out.
 */
export function buildReviewPlan(entries: readonly MistakeEntry[], sources: ReviewSources): Extract<QuizPlan, { mode: 'review' }> {
  const levelItems = new Map<JlptLevel, QuizItem[]>();
  const levelPool = (level: JlptLevel): QuizItem[] => {
    let items = levelItems.get(level);
    if (!items) {
      items = sources.vocabulary[level].map((record) => vocabularyItem(record, level));
      levelItems.set(level, items);
    }
    return items;
  };
  const characterPool = sources.characters.map(characterItem);

  const targets: QuizItem[] = [];
  for (const entry of entries) {
    const pool = entry.kind === 'vocab' && entry.level ? levelPool(entry.level) : entry.kind === 'character' ? characterPool : [];
    const item = pool.find((candidate) => candidate.key === entry.key);
    if (!item) {
      console.warn(`⚠️ Mistake "${entry.prompt}" no longer matches any record, leaving it out`);
      continue;
    }
    targets.push(item);
  }

  return {
    mode: 'review',
    targets,
    poolFor: (target) => (target.kind === 'vocab' && target.level ? levelPool(target.level) : characterPool),
  };
}
