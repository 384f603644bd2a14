import path from 'path';
import type { z } from 'zod';
import type { StudyConfig } from '../config.js';
import { DataUnavailableError, MalformedRowError, describeError } from '../errors.js';
import {
  CharacterRecord,
  JlptLevel,
  VocabularyRecord,
} from '../interfaces/study.interface.js';
import { CharacterRowSchema, VocabularyRowSchema, describeIssues } from '../schemas/records.js';
import { readTable, rowToRecord } from './csvService.js';

/**
 * Reads a CSV file through a row schema. Rows that do not fit are skipped with
 * a warning.
 */
export function readRows<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S>[] {
  const source = path.basename(filePath);
  const { header, rows } = readTable(filePath);
  const records: z.output<S>[] = [];

  for (const row of rows) {
    const raw = rowToRecord(header, row);
    if (!raw) {
      warnSkipped(new MalformedRowError(source, row.line, `expected ${header.length} columns, got ${row.cells.length}`));
      continue;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      warnSkipped(new MalformedRowError(source, row.line, describeIssues(parsed.error)));
      continue;
    }
    records.push(parsed.data);
  }

  return records;
}

/** Like `readRows`, but a file with no usable rows counts as unavailable. */
export function loadRecords<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S>[] {
  const records = readRows(filePath, schema);
  if (records.length === 0) {
    throw new DataUnavailableError(path.basename(filePath), 'no valid rows');
  }
  return records;
}

export function warnSkipped(err: MalformedRowError): void {
  console.warn(`⚠️ Skipping row, ${err.message}`);
}

export function loadLevel(config: StudyConfig, level: JlptLevel): VocabularyRecord[] {
  return loadRecords(config.vocabFiles[level], VocabularyRowSchema);
}

export function loadCharacters(config: StudyConfig): CharacterRecord[] {
  return loadRecords(config.characterFile, CharacterRowSchema);
}

function orEmpty<T>(load: () => T[]): T[] {
  try {
    return load();
  } catch (err) {
    if (err instanceof DataUnavailableError) {
      console.warn(`⚠️ No data found (${describeError(err)})`);
      return [];
    }
    throw err;
  }
}

export function loadLevelOrEmpty(config: StudyConfig, level: JlptLevel): VocabularyRecord[] {
  return orEmpty(() => loadLevel(config, level));
}

export function loadCharactersOrEmpty(config: StudyConfig): CharacterRecord[] {
  return orEmpty(() => loadCharacters(config));
}

export function loadAllLevels(config: StudyConfig): Record<JlptLevel, VocabularyRecord[]> {
  return {
    N5: loadLevelOrEmpty(config, 'N5'),
    N4: loadLevelOrEmpty(config, 'N4'),
    N3: loadLevelOrEmpty(config, 'N3'),
    N2: loadLevelOrEmpty(config, 'N2'),
    N1: loadLevelOrEmpty(config, 'N1'),
  };
}

