/**
 * Lengths and prefixes in code points, so a surrogate pair is one character
 * and is never split.
 */
export const countChars = (text: string): number => Array.from(text).length;

export const sliceChars = (text: string, maxChars: number): string =>
  Array.from(text).slice(0, maxChars).join("");
