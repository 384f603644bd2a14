import * as fs from 'fs';
import { DataUnavailableError, describeError } from '../errors.js';
import type { MistakeEntry } from '../interfaces/study.interface.js';
import { MISTAKES_HEADER, MistakeRowSchema } from '../schemas/records.js';
import { writeTable } from './csvService.js';
import { readRows } from './dataService.js';

export type MistakeInput = Omit<MistakeEntry, 'count' | 'lastSeen'>;

/**
 * Wrong answers, one entry per key. Repeated misses bump `count` and
 * `lastSeen` instead of adding rows. `list()` returns the most recent miss
 * first; entries missed at the same instant keep the order they were added in.
 */
export class MistakeLedger {
  private entries = new Map<string, MistakeEntry>();

  constructor(private readonly filePath: string) {
    this.reload();
  }

  private reload(): void {
    this.entries = new Map();

    if (!fs.existsSync(this.filePath)) {
      try {
        this.persist();
      } catch (err) {
        console.error(`❌ ${describeError(err)}`);
      }
      return;
    }

    try {
      for (const entry of readRows(this.filePath, MistakeRowSchema)) {
        if (this.entries.has(entry.key)) {
          console.warn(`⚠️ Skipping duplicate mistake row for ${entry.key}`);
          continue;
        }
        this.entries.set(entry.key, entry);
      }
    } catch (err) {
      if (!(err instanceof DataUnavailableError)) throw err;
      console.warn(`⚠️ Starting with no saved mistakes (${describeError(err)})`);
    }
  }

  record(mistake: MistakeInput, timestamp: Date = new Date()): MistakeEntry {
    const existing = this.entries.get(mistake.key);
    const entry: MistakeEntry = existing
      ? { ...existing, userAnswer: mistake.userAnswer, count: existing.count + 1, lastSeen: timestamp }
      : { ...mistake, count: 1, lastSeen: timestamp };

    this.entries.set(entry.key, entry);
    this.persist();
    return entry;
  }

  get(key: string): MistakeEntry | undefined {
    return this.entries.get(key);
  }

  list(): MistakeEntry[] {
    return [...this.entries.values()].sort((a, b) => b.lastSeen.getTime() - a.lastSeen.getTime());
  }

  size(): number {
    return this.entries.size;
  }

  clear(key: string): boolean {
    if (!this.entries.delete(key)) return false;
    this.persist();
    return true;
  }

  reset(): void {
    this.entries = new Map();
    this.persist();
  }

  private persist(): void {
    const rows = [...this.entries.values()].map((entry) => [
      entry.key,
      entry.kind,
      entry.level ?? '',
      entry.prompt,
      entry.correctAnswer,
      entry.userAnswer,
      String(entry.count),
      entry.lastSeen.toISOString(),
    ]);
    writeTable(this.filePath, MISTAKES_HEADER, rows);
  }
}
