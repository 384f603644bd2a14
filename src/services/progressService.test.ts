import * as fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PersistenceWriteError } from '../errors.js';
import { JLPT_LEVELS } from '../interfaces/study.interface.js';
import { ProgressLedger, vocabKey } from './progressService.js';

describe('ProgressLedger', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nihongo-progress-'));
    file = path.join(dir, 'user_progress.csv');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const water = vocabKey({ kanji: '水', kana: 'みず' });
  const fire = vocabKey({ kanji: '火', kana: 'ひ' });
  const mountain = vocabKey({ kanji: '山', kana: 'やま' });

  it('creates the file with a header when it is missing', () => {
    new ProgressLedger(file);
    expect(fs.readFileSync(file, 'utf-8')).toBe('Level,Kanji,Kana\n');
  });

  it('counts N distinct correct answers as N and ignores repeats', () => {
    const ledger = new ProgressLedger(file);

    expect(ledger.markMastered('N5', water)).toBe(true);
    expect(ledger.markMastered('N5', fire)).toBe(true);
    expect(ledger.markMastered('N5', mountain)).toBe(true);
    expect(ledger.markMastered('N5', water)).toBe(false);

    expect(ledger.count('N5')).toBe(3);
    expect(ledger.count('N4')).toBe(0);
  });

  it('keeps levels apart', () => {
    const ledger = new ProgressLedger(file);
    ledger.markMastered('N5', water);
    ledger.markMastered('N3', water);

    expect(ledger.count('N5')).toBe(1);
    expect(ledger.count('N3')).toBe(1);
    expect(ledger.has('N3', water)).toBe(true);
    expect(ledger.has('N2', water)).toBe(false);
  });

  it('writes every mark straight away', () => {
    const ledger = new ProgressLedger(file);
    ledger.markMastered('N5', water);

    expect(fs.readFileSync(file, 'utf-8')).toBe('Level,Kanji,Kana\nN5,水,みず\n');
    expect(new ProgressLedger(file).load('N5')).toEqual(new Set([water]));
  });

  it('drops duplicate and malformed rows when loading', () => {
    fs.writeFileSync(file, 'Level,Kanji,Kana\nN5,水,みず\nN5,水,みず\nN9,火,ひ\nN4,山\n');
    const ledger = new ProgressLedger(file);

    expect(ledger.count('N5')).toBe(1);
    expect(JLPT_LEVELS.map((level) => ledger.count(level))).toEqual([1, 0, 0, 0, 0]);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('reset clears every level, in memory and on disk', () => {
    const ledger = new ProgressLedger(file);
    ledger.markMastered('N5', water);
    ledger.markMastered('N1', fire);

    ledger.reset();

    for (const level of JLPT_LEVELS) {
      expect(ledger.count(level)).toBe(0);
    }
    expect(new ProgressLedger(file).count('N5')).toBe(0);
  });

  it('reports how much of each level is mastered', () => {
    const ledger = new ProgressLedger(file);
    ledger.markMastered('N5', water);

    const summary = ledger.summary({
      N5: [
        { kanji: '水', kana: 'みず', meaning: 'water' },
        { kanji: '火', kana: 'ひ', meaning: 'fire' },
      ],
      N4: [],
      N3: [],
      N2: [],
      N1: [],
    });
    expect(summary[0]).toEqual({ level: 'N5', mastered: 1, total: 2 });
    expect(summary[4]).toEqual({ level: 'N1', mastered: 0, total: 0 });
  });

  it('keeps a mark in memory when the write fails', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const ledger = new ProgressLedger(file);
    fs.rmSync(file);
    fs.mkdirSync(file);

    expect(() => ledger.markMastered('N5', water)).toThrow(PersistenceWriteError);
    expect(ledger.count('N5')).toBe(1);
    expect(ledger.markMastered('N5', water)).toBe(false);
  });
});
