// src/utils/errors.ts

/** Problems the person running the simulator can fix: bad names, bad flags, bad env. */
export class UserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends UserError {
  constructor(message: string, readonly options: readonly string[] = []) {
    super(message);
  }
}

/** Failure scoped to a single round; the batch keeps going. */
export class RoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ShoeExhaustedError extends RoundError {
  constructor(readonly dealt: number) {
    super(`shoe exhausted after ${dealt} cards`);
  }
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}
