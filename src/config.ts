import path from 'path';
import { z } from 'zod';
import type { JlptLevel } from './interfaces/study.interface.js';

export const DEFAULT_QUESTION_COUNT = 10;

export type StudyConfig = {
  dataDir: string;
  stateDir: string;
  questionCount: number;
  vocabFiles: Record<JlptLevel, string>;
  characterFile: string;
  progressFile: string;
  mistakesFile: string;
};

const QuestionCountSchema = z.coerce.number().int().min(1).max(100);

function readQuestionCount(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_QUESTION_COUNT;

  const parsed = QuestionCountSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`⚠️ Ignoring NIHONGO_QUESTION_COUNT="${raw}", using ${DEFAULT_QUESTION_COUNT}`);
    return DEFAULT_QUESTION_COUNT;
  }
  return parsed.data;
}

/**
 * Builds the file layout from the environment. `dotenv` is loaded by the
 * entry point, so this only reads what is already in `env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StudyConfig {
  const dataDir = env.NIHONGO_DATA_DIR?.trim() || 'data';
  const stateDir = env.NIHONGO_STATE_DIR?.trim() || dataDir;

  const vocabFile = (level: JlptLevel) => path.join(dataDir, `jlpt_${level.toLowerCase()}.csv`);

  return {
    dataDir,
    stateDir,
    questionCount: readQuestionCount(env.NIHONGO_QUESTION_COUNT),
    vocabFiles: {
      N5: vocabFile('N5'),
      N4: vocabFile('N4'),
      N3: vocabFile('N3'),
      N2: vocabFile('N2'),
      N1: vocabFile('N1'),
    },
    characterFile: path.join(dataDir, 'characters.csv'),
    progressFile: path.join(stateDir, 'user_progress.csv'),
    mistakesFile: path.join(stateDir, 'mistakes.csv'),
  };
}
