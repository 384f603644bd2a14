import * as fs from 'fs';
import { DataUnavailableError, describeError } from '../errors.js';
import {
  JLPT_LEVELS,
  JlptLevel,
  LevelProgress,
  VocabularyRecord,
} from '../interfaces/study.interface.js';
import { PROGRESS_HEADER, ProgressRowSchema } from '../schemas/records.js';
import { writeTable } from './csvService.js';
import { readRows } from './dataService.js';

const KEY_SEPARATOR = '|';

export function vocabKey(record: Pick<VocabularyRecord, 'kanji' | 'kana'>): string {
  return `${record.kanji}${KEY_SEPARATOR}${record.kana}`;
}

function splitVocabKey(key: string): [kanji: string, kana: string] {
  const at = key.lastIndexOf(KEY_SEPARATOR);
  return at === -1 ? [key, ''] : [key.slice(0, at), key.slice(at + 1)];
}

export type MasteredSets = Record<JlptLevel, Set<string>>;

function emptyMastery(): MasteredSets {
  return { N5: new Set(), N4: new Set(), N3: new Set(), N2: new Set(), N1: new Set() };
}

/**
 * Vocabulary the learner has answered correctly at least once, per level.
 * The whole ledger is rewritten on every change so nothing is lost if the
 * process stops mid-quiz.
 */
export class ProgressLedger {
  private mastery: MasteredSets = emptyMastery();

  constructor(private readonly filePath: string) {
    this.reload();
  }

  /** Re-reads the file, creating it when it does not exist yet. */
  private reload(): void {
    this.mastery = emptyMastery();

    if (!fs.existsSync(this.filePath)) {
      try {
        this.persist();
      } catch (err) {
        console.error(`❌ ${describeError(err)}`);
      }
      return;
    }

    try {
      for (const row of readRows(this.filePath, ProgressRowSchema)) {
        // Set membership drops duplicate rows
        this.mastery[row.level].add(vocabKey(row));
      }
    } catch (err) {
      if (!(err instanceof DataUnavailableError)) throw err;
      console.warn(`⚠️ Starting with empty progress (${describeError(err)})`);
    }
  }

  load(level: JlptLevel): ReadonlySet<string> {
    return this.mastery[level];
  }

  has(level: JlptLevel, key: string): boolean {
    return this.mastery[level].has(key);
  }

  /**
   * Returns false when the key was already mastered. A failed write throws
   * `PersistenceWriteError`, but the key stays mastered in memory.
   */
  markMastered(level: JlptLevel, key: string): boolean {
    if (this.mastery[level].has(key)) return false;

    this.mastery[level].add(key);
    this.persist();
    return true;
  }

  count(level: JlptLevel): number {
    return this.mastery[level].size;
  }

  summary(tables: Record<JlptLevel, VocabularyRecord[]>): LevelProgress[] {
    return JLPT_LEVELS.map((level) => ({
      level,
      mastered: this.count(level),
      total: tables[level].length,
    }));
  }

  reset(): void {
    this.mastery = emptyMastery();
    this.persist();
  }

  private persist(): void {
    const rows = JLPT_LEVELS.flatMap((level) =>
      [...this.mastery[level]].map((key) => [level, ...splitVocabKey(key)])
    );
    writeTable(this.filePath, PROGRESS_HEADER, rows);
  }
}
