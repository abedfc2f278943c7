import { InvalidWordError } from "./errors.js";

/** Appended to every stored word; marks the node above it as a complete word. */
export const TERMINATOR = "\0";

/** Splits into code points so that astral characters count as one edit. */
export function toSymbols(text: string): string[] {
  return Array.from(text);
}

export function reverseWord(text: string): string {
  return toSymbols(text).reverse().join("");
}

export function assertWord(word: string): void {
  if (word.includes(TERMINATOR)) throw new InvalidWordError(word);
}
