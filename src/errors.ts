export class StudyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A source file is missing or holds no usable rows. */
export class DataUnavailableError extends StudyError {
  constructor(readonly source: string, reason: string, options?: { cause?: unknown }) {
    super(`${source}: ${reason}`, options);
  }
}

export class MalformedRowError extends StudyError {
  constructor(readonly source: string, readonly line: number, reason: string) {
    super(`${source} line ${line}: ${reason}`);
  }
}

export class PersistenceWriteError extends StudyError {
  constructor(readonly target: string, options?: { cause?: unknown }) {
    super(`Could not save ${target}`, options);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
