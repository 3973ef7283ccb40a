import { randomInt } from 'crypto';
import { RANDOM_WORD } from '@formguard/shared';

function pick(chars: string): string {
  return chars[randomInt(chars.length)];
}

/**
 * Builds a random identifier-safe word from `[A-Za-z0-9_]` that never starts
 * with a digit. Its length is uniform in `[minLength, maxLength]`; minLength
 * is raised to 2 when lower.
 *
 * Words found in `recent` are discarded and regenerated. Accepted words are
 * added to `recent`, so a caller reusing one set never sees a repeat.
 */
export function buildRandomWord(
  minLength: number = RANDOM_WORD.DEFAULT_MIN_LENGTH,
  maxLength: number = RANDOM_WORD.DEFAULT_MAX_LENGTH,
  recent?: Set<string>,
): string {
  let length = Math.max(Math.floor(minLength), RANDOM_WORD.MIN_LENGTH);
  if (maxLength > length) {
    length = randomInt(length, Math.floor(maxLength) + 1);
  }

  for (;;) {
    let word = '';
    while (word.length < length) {
      word += pick(RANDOM_WORD.WORD_CHARS);
    }
    if (!/^[A-Za-z_]/.test(word)) {
      word = pick(RANDOM_WORD.LEADING_CHARS) + word.slice(1);
    }
    if (recent?.has(word)) continue;
    recent?.add(word);
    return word;
  }
}
