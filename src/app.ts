import type { StudyConfig } from './config.js';
import { PersistenceWriteError, describeError } from './errors.js';
import { JLPT_LEVELS, JlptLevel, QuizItem } from './interfaces/study.interface.js';
import {
  loadAllLevels,
  loadCharactersOrEmpty,
  loadLevelOrEmpty,
} from './services/dataService.js';
import { MistakeLedger } from './services/mistakeService.js';
import { ProgressLedger } from './services/progressService.js';
import {
  QuizPlan,
  QuizSession,
  RandomSource,
  buildReviewPlan,
  characterItem,
  grade,
  vocabularyItem,
} from './services/quizService.js';
import {
  InputClosedError,
  Terminal,
  chooseOption,
  confirm,
  formatColumns,
  paint,
} from './ui/terminal.js';

export type AppDeps = {
  config: StudyConfig;
  terminal: Terminal;
  random?: RandomSource;
  clock?: () => Date;
};

const LEVEL_CHOICES: Record<string, JlptLevel> = { '1': 'N5', '2': 'N4', '3': 'N3', '4': 'N2', '5': 'N1' };
const LEVEL_LABELS: Record<JlptLevel, string> = {
  N5: 'Beginner',
  N4: 'Basic',
  N3: 'Intermediate',
  N2: 'Upper-Intermediate',
  N1: 'Advanced',
};
const RETURN_PROMPT = 'Press Enter to return to the Main Menu... | ';

type QuizTexts = {
  title: string;
  instruction: string;
};

/**
 * Menu loop. Resolves when the learner quits or input runs out.
 */
export async function runApp(deps: AppDeps): Promise<void> {
  const { terminal } = deps;
  const progress = new ProgressLedger(deps.config.progressFile);
  const mistakes = new MistakeLedger(deps.config.mistakesFile);
  const app = new StudyApp(deps, progress, mistakes);

  printTitle(terminal, 'Nihongo Drill');

  try {
    while (await app.mainMenu()) {
      // keep going until Quit
    }
  } catch (err) {
    if (!(err instanceof InputClosedError)) throw err;
    terminal.print();
  }
}

function printTitle(terminal: Terminal, title: string) {
  const border = '(◡‿◡✿)' + '-'.repeat(title.length) + '(◕▿◕✿)';
  terminal.print();
  terminal.print(paint.blue(border));
  terminal.print(`Welcome to ${paint.bold(title)}!`);
  terminal.print(paint.blue(border));
}

class StudyApp {
  private readonly terminal: Terminal;

  constructor(
    private readonly deps: AppDeps,
    private readonly progress: ProgressLedger,
    private readonly mistakes: MistakeLedger
  ) {
    this.terminal = deps.terminal;
  }

  /** Returns false once the learner has chosen to quit. */
  async mainMenu(): Promise<boolean> {
    const t = this.terminal;
    const count = this.mistakes.size();

    t.print();
    t.print(paint.cyan('Please choose what you want to do today!'));
    t.print();
    t.print(`1. ${paint.bold('JLPT Quiz')}`);
    t.print(`2. ${paint.bold('Character Quiz')}`);
    t.print(`3. ${paint.bold('Browse Vocabulary')}`);
    t.print(`4. ${paint.bold('Browse Characters')}`);
    t.print(`5. ${paint.bold('Mistake Practice')} [${paint.yellow(`${count} ${count === 1 ? 'mistake' : 'mistakes'} right now!`)}]`);
    t.print(`6. ${paint.bold('Reset')}`);
    t.print(`7. ${paint.bold('Quit')}`);
    t.print();

    const choice = await chooseOption(t, 'Choice | ', ['1', '2', '3', '4', '5', '6', '7']);
    switch (choice) {
      case '1':
        await this.jlptQuiz();
        return true;
      case '2':
        await this.characterQuiz();
        return true;
      case '3':
        await this.browseVocabulary();
        return true;
      case '4':
        await this.browseCharacters();
        return true;
      case '5':
        await this.mistakePractice();
        return true;
      case '6':
        await this.reset();
        return true;
      default:
        return !(await this.quit());
    }
  }

  private async chooseLevel(heading: string, describe: (level: JlptLevel) => string): Promise<JlptLevel | null> {
    const t = this.terminal;
    t.print();
    t.print(paint.blue(paint.bold(heading)));
    JLPT_LEVELS.forEach((level, index) => {
      t.print(`${index + 1}. ${paint.bold(level)} ${describe(level)}`);
    });
    t.print(`...or enter '${paint.bold('r')}' to return to the Main Menu!`);
    t.print();

    const choice = await chooseOption(t, 'Choice | ', [...Object.keys(LEVEL_CHOICES), 'R']);
    return LEVEL_CHOICES[choice] ?? null;
  }

  private async jlptQuiz() {
    const tables = loadAllLevels(this.deps.config);
    const summary = new Map(this.progress.summary(tables).map((row) => [row.level, row]));

    const level = await this.chooseLevel('JLPT Quiz', (lvl) => {
      const row = summary.get(lvl);
      return `[${paint.green(String(row?.mastered ?? 0))}/${row?.total ?? 0} mastered!]`;
    });
    if (!level) return;

    const table = tables[level];
    if (table.length === 0) {
      this.terminal.print(paint.red(`No vocabulary data found for ${level}!`));
      return;
    }

    const excludeMastered = await confirm(this.terminal, 'Skip words you have already mastered?');
    const pool = table.map((record) => vocabularyItem(record, level));

    this.terminal.print();
    this.terminal.print(paint.blue(`You have chosen ${paint.bold(level)}!`));
    await this.runQuiz(
      { mode: 'quiz', pool, questionCount: this.deps.config.questionCount, excludeMastered },
      { title: level, instruction: 'Choose the meaning most suited for the following vocabulary.' },
      pool
    );
  }

  private async characterQuiz() {
    const characters = loadCharactersOrEmpty(this.deps.config);
    if (characters.length === 0) {
      this.terminal.print(paint.red('No character data found!'));
      return;
    }

    const pool = characters.map(characterItem);
    this.terminal.print();
    this.terminal.print(paint.blue(`You have chosen ${paint.bold('Character Quiz')}!`));
    await this.runQuiz(
      { mode: 'quiz', pool, questionCount: this.deps.config.questionCount },
      { title: 'Character Quiz', instruction: 'Choose the reading most suited for the following character.' },
      pool
    );
  }

  private async mistakePractice() {
    const t = this.terminal;
    const entries = this.mistakes.list();

    if (entries.length === 0) {
      t.print();
      t.print(paint.yellow('There are no mistakes to practice right now.'));
      t.print('Complete some quizzes first and come back later!');
      await t.ask(RETURN_PROMPT);
      return;
    }

    const plan = buildReviewPlan(entries, {
      vocabulary: loadAllLevels(this.deps.config),
      characters: loadCharactersOrEmpty(this.deps.config),
    });
    if (plan.targets.length === 0) {
      t.print(paint.red('None of your saved mistakes match the current data files.'));
      return;
    }

    await this.runQuiz(plan, { title: 'Mistake Practice', instruction: 'Choose the answer for:' });
  }

  /**
   * Runs one session to the end or until the learner quits. `pool` is given
   * for ordinary quizzes so the misses can be reviewed straight away.
   */
  private async runQuiz(plan: QuizPlan, texts: QuizTexts, pool?: QuizItem[]): Promise<void> {
    const t = this.terminal;
    const session = new QuizSession(plan, {
      progress: this.progress,
      mistakes: this.mistakes,
      random: this.deps.random,
      clock: this.deps.clock,
    });
    const review = plan.mode === 'review';

    t.print();
    if (review) {
      t.print(paint.bold(paint.yellow(texts.title)));
      t.print(`Let's review ${session.total} ${session.total === 1 ? 'mistake' : 'mistakes'}.`);
      t.print('Answer correctly to clear a word from your mistake list.');
    } else {
      this.printTips();
    }

    for (let question = session.current(); question; question = session.current()) {
      t.print();
      t.print(paint.bold(`${review ? 'Review ' : ''}Q${session.position}. ${texts.instruction}`));
      t.print(paint.bold(paint.purple(question.prompt)));
      const letters = question.options.map((_, index) => String.fromCharCode(65 + index));
      question.options.forEach((option, index) => {
        t.print(`${paint.bold(letters[index])} | ${option}`);
      });
      t.print();

      const choice = await chooseOption(t, 'Answer | ', [...letters, 'Q']);
      if (choice === 'Q') {
        if (await confirm(t, paint.yellow('Are you sure you want to stop? Answers so far are already saved.'))) {
          session.quit();
          t.print(paint.red('Quiz stopped.'));
          break;
        }
        t.print(paint.green('Continuing...'));
        continue;
      }

      const outcome = session.answer(question.options[letters.indexOf(choice)]);
      if (outcome.isCorrect) {
        t.print(paint.green(review ? 'Correct! This word is removed from your mistakes.' : 'Correct.'));
      } else {
        const correctLetter = letters[question.options.indexOf(question.correctAnswer)];
        t.print(paint.red(review ? 'Still incorrect.' : 'Wrong.'));
        t.print(paint.yellow(`Correct Answer: ${correctLetter} | ${question.correctAnswer}.`));
      }
      if (outcome.warning) t.print(paint.red(outcome.warning));
      session.next();
    }

    const summary = session.summary();
    t.print();
    t.print(paint.bold(review ? 'Review Summary' : 'Quiz Summary'));
    if (review) {
      t.print(`You cleared ${paint.green(String(summary.correct))}/${summary.total} mistakes from your list.`);
      t.print(paint.yellow(`${this.mistakes.size()} mistakes remain in your practice list.`));
    } else {
      t.print(`You got ${paint.green(String(summary.correct))}/${summary.total} correct.`);
      if (summary.answered === summary.total) this.printGrade(summary.correct, summary.total);
    }

    if (!review && pool && summary.missed.length > 0) {
      const reviewPool = pool;
      t.print();
      t.print(paint.bold('Review these words:'));
      for (const miss of summary.missed) {
        t.print(`- ${paint.purple(miss.question.prompt)} (you chose: ${paint.red(miss.userAnswer)}, correct: ${paint.green(miss.question.correctAnswer)})`);
      }
      t.print();
      if (await confirm(t, 'Would you like to review these mistakes right now?')) {
        await this.runQuiz(
          { mode: 'review', targets: summary.missed.map((miss) => miss.item), poolFor: () => reviewPool },
          { title: 'Mistake Review', instruction: 'Choose the answer for:' }
        );
        return;
      }
      t.print(paint.blue('Good work! Your mistakes are saved for Mistake Practice.'));
    }

    await t.ask(RETURN_PROMPT);
  }

  private printTips() {
    const t = this.terminal;
    t.print(paint.bold('Tips:'));
    t.print(`- Inputs are ${paint.bold('NOT')} case-sensitive! (e.g. You can enter a or A.)`);
    t.print(`- Enter ${paint.bold('q')} to stop the quiz and return to the Main Menu. Answers already given stay saved.`);
  }

  private printGrade(correct: number, total: number) {
    switch (grade(correct, total)) {
      case 'perfect':
        this.terminal.print(paint.green('Perfect score!'));
        break;
      case 'great':
        this.terminal.print(paint.green('Great Job!'));
        break;
      case 'keep-going':
        this.terminal.print(paint.yellow('Keep going!'));
        break;
    }
  }

  private async browseVocabulary() {
    const level = await this.chooseLevel('Browse Vocabulary', (lvl) => `(${LEVEL_LABELS[lvl]})`);
    if (!level) return;

    const vocabulary = loadLevelOrEmpty(this.deps.config, level);
    if (vocabulary.length === 0) {
      this.terminal.print(paint.red(`No vocabulary data found for ${level}!`));
      return;
    }

    const t = this.terminal;
    t.print();
    t.print(paint.blue(paint.bold(`JLPT ${level} Vocabulary`)));
    t.print();
    const cells = vocabulary.map((record, index) =>
      `${String(index + 1).padStart(2)}. ${paint.purple(record.kanji)} (${record.kana}) - ${paint.green(record.meaning)}`
    );
    formatColumns(cells, 2, 55).forEach((line) => t.print(line));
    t.print();
    await t.ask(RETURN_PROMPT);
  }

  private async browseCharacters() {
    const characters = loadCharactersOrEmpty(this.deps.config);
    if (characters.length === 0) {
      this.terminal.print(paint.red('No character data found!'));
      return;
    }

    const t = this.terminal;
    t.print();
    t.print(paint.blue(paint.bold('Browse Characters')));
    t.print();
    const cells = characters.map((record, index) =>
      `${String(index + 1).padStart(2)}. ${paint.purple(record.character)} - ${paint.green(record.correctAnswer)}`
    );
    formatColumns(cells, 4, 25).forEach((line) => t.print(line));
    t.print();
    await t.ask(RETURN_PROMPT);
  }

  private async reset() {
    const t = this.terminal;
    const sure = await confirm(
      t,
      paint.red('WARNING: THIS WILL RESET ALL YOUR DATA INCLUDING PROGRESS AND MISTAKES.\nThis cannot be undone. Are you sure?')
    );
    if (!sure) {
      t.print(paint.green('Reset cancelled.'));
      return;
    }

    const failures: string[] = [];
    for (const ledger of [this.progress, this.mistakes]) {
      try {
        ledger.reset();
      } catch (err) {
        if (!(err instanceof PersistenceWriteError)) throw err;
        failures.push(describeError(err));
      }
    }

    if (failures.length === 0) {
      t.print(paint.green('All data has been reset successfully.'));
    } else {
      t.print(paint.red(`There was an issue resetting some data: ${failures.join('; ')}`));
    }
  }

  private async quit(): Promise<boolean> {
    const t = this.terminal;
    if (!(await confirm(t, paint.red('Are you sure you want to quit?')))) {
      t.print(paint.green('Continuing...'));
      return false;
    }
    t.print();
    t.print(paint.green('Thanks for studying! See you next time! 頑張りましょう！'));
    return true;
  }
}
