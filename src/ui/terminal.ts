import * as readline from 'readline/promises';
import { StudyError } from '../errors.js';

export class InputClosedError extends StudyError {
  constructor() {
    super('Input closed');
  }
}

export interface Terminal {
  ask(prompt: string): Promise<string>;
  print(text?: string): void;
}

export function createTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Terminal & { close(): void } {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  return {
    ask(prompt) {
      if (closed) return Promise.reject(new InputClosedError());

      return new Promise<string>((resolve, reject) => {
        const onClose = () => reject(new InputClosedError());
        rl.once('close', onClose);
        rl.question(prompt).then(
          (answer) => {
            rl.off('close', onClose);
            resolve(answer);
          },
          (err: unknown) => {
            rl.off('close', onClose);
            reject(err);
          }
        );
      });
    },
    print(text = '') {
      output.write(`${text}\n`);
    },
    close() {
      rl.close();
    },
  };
}

/**
 * Asks until the reply is one of `valid`. Replies are trimmed and compared
 * upper-cased, so "a" and " A " both pick "A".
 */
export async function chooseOption(terminal: Terminal, prompt: string, valid: readonly string[]): Promise<string> {
  const accepted = valid.map((option) => option.toUpperCase());

  for (;;) {
    const choice = (await terminal.ask(prompt)).trim().toUpperCase();
    if (accepted.includes(choice)) return choice;
    terminal.print(paint.red('Invalid choice. Please try again.'));
  }
}

export async function confirm(terminal: Terminal, prompt: string): Promise<boolean> {
  return (await chooseOption(terminal, `${prompt} [${paint.bold('Y/N')}] | `, ['Y', 'N'])) === 'Y';
}

// read on every call, so a NO_COLOR loaded from .env still applies
function style(code: string): (text: string) => string {
  return (text) => (process.env.NO_COLOR ? text : `\x1b[${code}m${text}\x1b[0m`);
}

export const paint = {
  blue: style('94'),
  green: style('92'),
  red: style('91'),
  yellow: style('93'),
  purple: style('95'),
  cyan: style('96'),
  bold: style('1'),
};

export function stripColour(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

// Hiragana, katakana, CJK ideographs and full-width forms take two columns
const WIDE = /[\u1100-\u115f\u2e80-\u303e\u3041-\u33ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7a3\uf900-\ufaff\ufe30-\ufe4f\uff00-\uff60\uffe0-\uffe6]/;

export function displayWidth(text: string): number {
  let width = 0;
  for (const ch of stripColour(text)) {
    width += WIDE.test(ch) ? 2 : 1;
  }
  return width;
}

/**
 * Lays cells out top-to-bottom in `columns` columns, padding each to
 * `columnWidth` display columns (at least two spaces between cells).
 */
export function formatColumns(cells: readonly string[], columns: number, columnWidth: number): string[] {
  const perColumn = Math.ceil(cells.length / columns);
  const lines: string[] = [];

  for (let row = 0; row < perColumn; row++) {
    let line = '';
    for (let col = 0; col < columns; col++) {
      const index = row + col * perColumn;
      if (index >= cells.length) continue;
      const cell = cells[index];
      const isLast = col === columns - 1 || index + perColumn >= cells.length;
      line += isLast ? cell : cell + ' '.repeat(Math.max(2, columnWidth - displayWidth(cell)));
    }
    lines.push(line);
  }
  return lines;
}
