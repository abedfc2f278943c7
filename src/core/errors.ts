export type FuzzyErrorCode = "INVALID_WORD" | "INVALID_ARGUMENT";

export class FuzzyIndexError extends Error {
  constructor(
    readonly code: FuzzyErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised when a word contains the reserved terminator symbol. */
export class InvalidWordError extends FuzzyIndexError {
  constructor(readonly word: string) {
    super("INVALID_WORD", `word must not contain the terminator symbol (U+0000): ${JSON.stringify(word)}`);
  }
}

export class InvalidDistanceError extends FuzzyIndexError {
  constructor(readonly value: number) {
    super("INVALID_ARGUMENT", `max distance must be a non-negative integer, got ${value}`);
  }
}

export function assertDistance(k: number): void {
  if (!Number.isSafeInteger(k) || k < 0) throw new InvalidDistanceError(k);
}
