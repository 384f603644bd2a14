export const JLPT_LEVELS = ['N5', 'N4', 'N3', 'N2', 'N1'] as const;

export type JlptLevel = (typeof JLPT_LEVELS)[number];

export type VocabularyRecord = {
  kanji: string;
  kana: string;
  meaning: string;
};

export type CharacterRecord = {
  character: string;
  correctAnswer: string;
};

export type MistakeKind = 'vocab' | 'character';

export interface MistakeEntry {
  key: string;
  kind: MistakeKind;
  level: JlptLevel | null;
  prompt: string;
  correctAnswer: string;
  userAnswer: string;
  count: number;
  lastSeen: Date;
}

/**
 * What the quiz engine needs from a record: a stable key, the text shown to
 * the learner and the answer it expects.
 */
export type QuizItem = {
  key: string;
  prompt: string;
  answer: string;
  kind: MistakeKind;
  level: JlptLevel | null;
};

export type Question = {
  key: string;
  prompt: string;
  correctAnswer: string;
  options: string[];
};

export type LevelProgress = {
  level: JlptLevel;
  mastered: number;
  total: number;
};
