import * as fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DataUnavailableError, StudyError } from '../errors.js';
import type { JlptLevel, Question, QuizItem, VocabularyRecord } from '../interfaces/study.interface.js';
import { MistakeLedger } from './mistakeService.js';
import { ProgressLedger } from './progressService.js';
import {
  QuizSession,
  buildReviewPlan,
  characterItem,
  evaluateAnswer,
  generateQuestion,
  grade,
  shuffleArray,
  vocabularyItem,
} from './quizService.js';

const WATER: VocabularyRecord = { kanji: '水', kana: 'みず', meaning: 'water' };
const FIRE: VocabularyRecord = { kanji: '火', kana: 'ひ', meaning: 'fire' };
const MOUNTAIN: VocabularyRecord = { kanji: '山', kana: 'やま', meaning: 'mountain' };
const RIVER: VocabularyRecord = { kanji: '川', kana: 'かわ', meaning: 'river' };
const TREE: VocabularyRecord = { kanji: '木', kana: 'き', meaning: 'tree' };
const RAIN: VocabularyRecord = { kanji: '雨', kana: 'あめ', meaning: 'rain' };

const items = (records: VocabularyRecord[], level: JlptLevel = 'N5'): QuizItem[] =>
  records.map((record) => vocabularyItem(record, level));

const wrongOption = (question: Question): string => {
  const option = question.options.find((candidate) => candidate !== question.correctAnswer);
  if (option === undefined) throw new Error('question has a single option');
  return option;
};

describe('shuffleArray', () => {
  it('returns a permutation without touching the input', () => {
    const input = [1, 2, 3, 4, 5];
    const shuffled = shuffleArray(input);

    expect(input).toEqual([1, 2, 3, 4, 5]);
    expect([...shuffled].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it('follows the random source', () => {
    // always picking index 0 rotates the array left
    expect(shuffleArray(['a', 'b', 'c'], () => 0)).toEqual(['b', 'c', 'a']);
  });
});

describe('generateQuestion', () => {
  const pool = items([WATER, FIRE, MOUNTAIN, RIVER, TREE, RAIN]);

  it('offers four distinct options with exactly one correct answer', () => {
    for (let run = 0; run < 200; run++) {
      const question = generateQuestion(pool);

      expect(question.options).toHaveLength(4);
      expect(new Set(question.options).size).toBe(4);
      expect(question.options.filter((option) => option === question.correctAnswer)).toHaveLength(1);
    }
  });

  it('pairs the prompt with its own answer', () => {
    for (let run = 0; run < 50; run++) {
      const question = generateQuestion(pool);
      const item = pool.find((candidate) => candidate.key === question.key);
      expect(item?.prompt).toBe(question.prompt);
      expect(item?.answer).toBe(question.correctAnswer);
    }
  });

  it('offers only three options when the table has three records', () => {
    const question = generateQuestion(items([WATER, FIRE, MOUNTAIN]));

    expect(question.options).toHaveLength(3);
    expect([...question.options].sort()).toEqual(['fire', 'mountain', 'water']);
  });

  it('never asks about an excluded key while others remain', () => {
    const small = items([WATER, FIRE, MOUNTAIN]);
    const exclude = new Set([small[0].key]);

    for (let run = 0; run < 100; run++) {
      expect(['fire', 'mountain']).toContain(generateQuestion(small, { exclude }).correctAnswer);
    }
  });

  it('falls back to the whole pool when every key is excluded', () => {
    const single = items([WATER]);
    const question = generateQuestion(single, { exclude: new Set([single[0].key]) });

    expect(question).toEqual({ key: '水|みず', prompt: 'みず (水)', correctAnswer: 'water', options: ['water'] });
  });

  it('does not repeat an answer shared by two records', () => {
    const shared = items([WATER, { kanji: '氵', kana: 'さんずい', meaning: 'Water' }, FIRE]);

    for (let run = 0; run < 100; run++) {
      const question = generateQuestion(shared);
      expect(question.options).toHaveLength(2);
      expect(new Set(question.options.map((option) => option.toLowerCase())).size).toBe(2);
    }
  });

  it('ignores duplicate keys in the pool', () => {
    const question = generateQuestion(items([WATER, WATER, FIRE]));
    expect(question.options).toHaveLength(2);
  });

  it('throws DataUnavailableError for an empty pool', () => {
    expect(() => generateQuestion([])).toThrow(DataUnavailableError);
  });
});

describe('evaluateAnswer', () => {
  const question: Question = { key: 'か', prompt: 'か', correctAnswer: 'ka', options: ['ka', 'ki', 'ku', 'ke'] };

  it('ignores case and surrounding whitespace', () => {
    expect(evaluateAnswer(question, 'Ka')).toEqual({ isCorrect: true });
    expect(evaluateAnswer(question, 'ka')).toEqual({ isCorrect: true });
    expect(evaluateAnswer(question, ' ka ')).toEqual({ isCorrect: true });
    expect(evaluateAnswer(question, 'ki')).toEqual({ isCorrect: false });
  });
});

describe('grade', () => {
  it('sorts scores into perfect, great and keep-going', () => {
    expect(grade(10, 10)).toBe('perfect');
    expect(grade(6, 10)).toBe('great');
    expect(grade(5, 10)).toBe('keep-going');
    expect(grade(0, 0)).toBe('keep-going');
  });
});

describe('QuizSession', () => {
  let dir: string;
  let progress: ProgressLedger;
  let mistakes: MistakeLedger;
  const clock = () => new Date('2024-06-01T09:30:00.000Z');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nihongo-quiz-'));
    progress = new ProgressLedger(path.join(dir, 'user_progress.csv'));
    mistakes = new MistakeLedger(path.join(dir, 'mistakes.csv'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('asks each record at most once and stops at the pool size', () => {
    const session = new QuizSession(
      { mode: 'quiz', pool: items([WATER, FIRE, MOUNTAIN]), questionCount: 10 },
      { progress, mistakes, clock }
    );
    const asked: string[] = [];

    expect(session.total).toBe(3);
    for (let question = session.current(); question; question = session.current()) {
      expect(session.state).toBe('awaiting-answer');
      asked.push(question.key);
      session.answer(question.correctAnswer);
      expect(session.state).toBe('showing-feedback');
      session.next();
    }

    expect(session.state).toBe('finished');
    expect([...asked].sort()).toEqual(['山|やま', '水|みず', '火|ひ'].sort());
    expect(progress.count('N5')).toBe(3);
    expect(session.summary()).toEqual({ total: 3, answered: 3, correct: 3, missed: [] });
  });

  it('stops after the configured number of questions', () => {
    const session = new QuizSession(
      { mode: 'quiz', pool: items([WATER, FIRE, MOUNTAIN, RIVER, TREE]), questionCount: 2 },
      { progress, mistakes, clock }
    );

    const first = session.current();
    if (!first) throw new Error('expected a question');
    session.answer(first.correctAnswer);
    const second = session.next();
    if (!second) throw new Error('expected a second question');
    session.answer(second.correctAnswer);

    expect(session.next()).toBeNull();
    expect(session.state).toBe('finished');
  });

  it('records a wrong answer with the current time', () => {
    const session = new QuizSession(
      { mode: 'quiz', pool: items([WATER, FIRE, MOUNTAIN]), questionCount: 1 },
      { progress, mistakes, clock }
    );
    const question = session.current();
    if (!question) throw new Error('expected a question');

    const outcome = session.answer(wrongOption(question));

    expect(outcome.isCorrect).toBe(false);
    expect(mistakes.get(question.key)).toMatchObject({
      count: 1,
      correctAnswer: question.correctAnswer,
      userAnswer: outcome.userAnswer,
      lastSeen: clock(),
    });
    expect(progress.count('N5')).toBe(0);
  });

  it('keeps answers already given when the learner quits', () => {
    const session = new QuizSession(
      { mode: 'quiz', pool: items([WATER, FIRE, MOUNTAIN]), questionCount: 3 },
      { progress, mistakes, clock }
    );
    const first = session.current();
    if (!first) throw new Error('expected a question');
    session.answer(first.correctAnswer);
    const second = session.next();
    if (!second) throw new Error('expected a second question');

    session.quit();

    expect(session.state).toBe('finished');
    expect(session.current()).toBeNull();
    expect(progress.has('N5', first.key)).toBe(true);
    expect(new ProgressLedger(path.join(dir, 'user_progress.csv')).count('N5')).toBe(1);
    expect(session.summary().answered).toBe(1);
  });

  it('skips mastered words while unmastered ones remain', () => {
    const pool = items([WATER, FIRE, MOUNTAIN]);
    progress.markMastered('N5', pool[0].key);

    const session = new QuizSession(
      { mode: 'quiz', pool, questionCount: 2, excludeMastered: true },
      { progress, mistakes, clock }
    );
    const asked: string[] = [];
    for (let question = session.current(); question; question = session.current()) {
      asked.push(question.correctAnswer);
      session.answer(question.correctAnswer);
      session.next();
    }

    expect(asked.sort()).toEqual(['fire', 'mountain']);
  });

  it('rejects an answer when no question is waiting', () => {
    const session = new QuizSession(
      { mode: 'quiz', pool: items([WATER, FIRE]), questionCount: 1 },
      { progress, mistakes, clock }
    );
    const question = session.current();
    if (!question) throw new Error('expected a question');
    session.answer(question.correctAnswer);

    expect(() => session.answer(question.correctAnswer)).toThrow(StudyError);
  });

  it('finishes at once on an empty pool', () => {
    const session = new QuizSession({ mode: 'quiz', pool: [], questionCount: 10 }, { progress, mistakes, clock });
    expect(session.state).toBe('finished');
    expect(session.current()).toBeNull();
  });

  it('records character mistakes but does not master characters', () => {
    const pool = [
      characterItem({ character: 'か', correctAnswer: 'ka' }),
      characterItem({ character: 'き', correctAnswer: 'ki' }),
    ];
    const session = new QuizSession({ mode: 'quiz', pool, questionCount: 2 }, { progress, mistakes, clock });

    const first = session.current();
    if (!first) throw new Error('expected a question');
    session.answer(first.correctAnswer);
    const second = session.next();
    if (!second) throw new Error('expected a second question');
    session.answer(wrongOption(second));

    expect(mistakes.get(second.key)).toMatchObject({ kind: 'character', level: null, count: 1 });
    expect(progress.count('N5')).toBe(0);
  });

  it('carries on with a warning when a ledger cannot be saved', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const file = path.join(dir, 'user_progress.csv');
    fs.rmSync(file);
    fs.mkdirSync(file);

    const session = new QuizSession(
      { mode: 'quiz', pool: items([WATER, FIRE]), questionCount: 2 },
      { progress, mistakes, clock }
    );
    const question = session.current();
    if (!question) throw new Error('expected a question');
    const outcome = session.answer(question.correctAnswer);

    expect(outcome.isCorrect).toBe(true);
    expect(outcome.warning).toBe('Could not save user_progress.csv. Progress from this session may not be kept.');
    expect(progress.has('N5', question.key)).toBe(true);
    expect(session.next()).not.toBeNull();
  });

  describe('review mode', () => {
    const vocabulary = { N5: [WATER, FIRE, MOUNTAIN], N4: [RIVER], N3: [], N2: [], N1: [] };

    beforeEach(() => {
      mistakes.record(
        {
          key: '水|みず',
          kind: 'vocab',
          level: 'N5',
          prompt: 'みず (水)',
          correctAnswer: 'water',
          userAnswer: 'fire',
        },
        new Date('2024-05-01T00:00:00.000Z')
      );
    });

    it('clears a mistake answered correctly and masters the word', () => {
      const session = new QuizSession(buildReviewPlan(mistakes.list(), { vocabulary, characters: [] }), {
        progress,
        mistakes,
        clock,
      });
      const question = session.current();
      if (!question) throw new Error('expected a question');

      expect(question.key).toBe('水|みず');
      expect([...question.options].sort()).toEqual(['fire', 'mountain', 'water']);

      const outcome = session.answer('WATER');

      expect(outcome).toMatchObject({ isCorrect: true, cleared: true, newlyMastered: true });
      expect(mistakes.size()).toBe(0);
      expect(progress.has('N5', '水|みず')).toBe(true);
      expect(session.next()).toBeNull();
    });

    it('counts another miss when the review answer is wrong', () => {
      const session = new QuizSession(buildReviewPlan(mistakes.list(), { vocabulary, characters: [] }), {
        progress,
        mistakes,
        clock,
      });
      const question = session.current();
      if (!question) throw new Error('expected a question');

      session.answer(wrongOption(question));

      expect(mistakes.get('水|みず')).toMatchObject({ count: 2, lastSeen: clock() });
    });

    it('leaves out mistakes that no longer match a record', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      mistakes.record({
        key: '消|きえる',
        kind: 'vocab',
        level: 'N5',
        prompt: 'きえる (消)',
        correctAnswer: 'gone',
        userAnswer: 'water',
      });

      const plan = buildReviewPlan(mistakes.list(), { vocabulary, characters: [] });

      expect(plan.targets.map((target) => target.key)).toEqual(['水|みず']);
      expect(console.warn).toHaveBeenCalledWith('⚠️ Mistake "きえる (消)" no longer matches any record, leaving it out');
    });
  });
});
