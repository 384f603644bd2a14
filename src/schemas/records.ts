/**
 * Row schemas for the CSV files the app reads and writes.
 *
 * Every cell arrives as a string; these schemas trim it, reject empty
 * fields and turn the row into the typed record the services work with.
 */

import { z } from 'zod';
import { JLPT_LEVELS } from '../interfaces/study.interface.js';

const Cell = z.string().trim().min(1, 'empty field');

export const JlptLevelSchema = z.enum(JLPT_LEVELS);

export const VocabularyRowSchema = z
  .object({
    Kanji: Cell,
    Kana: Cell,
    Meaning: Cell,
  })
  .transform((row) => ({ kanji: row.Kanji, kana: row.Kana, meaning: row.Meaning }));

// Older data files spell the answer column "Correct Answer"
export const CharacterRowSchema = z
  .union([
    z.object({ Character: Cell, CorrectAnswer: Cell }),
    z.object({ Character: Cell, 'Correct Answer': Cell }).transform((row) => ({
      Character: row.Character,
      CorrectAnswer: row['Correct Answer'],
    })),
  ])
  .transform((row) => ({ character: row.Character, correctAnswer: row.CorrectAnswer }));

export const PROGRESS_HEADER = ['Level', 'Kanji', 'Kana'];

export const ProgressRowSchema = z
  .object({
    Level: JlptLevelSchema,
    Kanji: Cell,
    Kana: Cell,
  })
  .transform((row) => ({ level: row.Level, kanji: row.Kanji, kana: row.Kana }));

export const MISTAKES_HEADER = [
  'Key',
  'Kind',
  'Level',
  'Prompt',
  'CorrectAnswer',
  'UserAnswer',
  'Count',
  'LastSeen',
];

export const MistakeRowSchema = z
  .object({
    Key: Cell,
    Kind: z.enum(['vocab', 'character']),
    Level: z.union([JlptLevelSchema, z.literal('')]),
    Prompt: Cell,
    CorrectAnswer: Cell,
    UserAnswer: z.string(),
    Count: z.string().trim().regex(/^\d+$/, 'count must be a whole number').transform(Number).pipe(z.number().int().min(1)),
    LastSeen: z
      .string()
      .trim()
      .transform((value) => new Date(value))
      .refine((date) => !Number.isNaN(date.getTime()), 'invalid timestamp'),
  })
  .refine((row) => row.Kind === 'character' || row.Level !== '', {
    message: 'vocabulary mistakes need a level',
  })
  .transform((row) => ({
    key: row.Key,
    kind: row.Kind,
    level: row.Level === '' ? null : row.Level,
    prompt: row.Prompt,
    correctAnswer: row.CorrectAnswer,
    userAnswer: row.UserAnswer,
    count: row.Count,
    lastSeen: row.LastSeen,
  }));

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
