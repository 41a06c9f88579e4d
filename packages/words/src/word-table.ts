import { randomInt } from "node:crypto";
import { UnknownWordError } from "@wordgate/schemas";

/** Canonical vocabulary. Positions define the answer function. */
export const WORDS = Object.freeze([
  "sky", "lichen", "window", "road", "wall", "hill", "sand", "soil",
  "loam", "sun", "star", "root", "rain", "hand", "green", "blue",
  "red", "steam", "steel", "leaf", "house", "brush", "stair", "flower",
  "log", "vase", "painting", "cottage", "frog", "stone", "pond", "river",
] as const);

export type Word = (typeof WORDS)[number];

export const ANSWER_SHIFT = 3;

/** Returns an integer in [0, maxExclusive). */
export type RandomSource = (maxExclusive: number) => number;

const cryptoRandom: RandomSource = (maxExclusive) => randomInt(maxExclusive);

const positions = new Map<string, number>(WORDS.map((word, i): [string, number] => [word, i]));

export function indexOf(word: string): number {
  return positions.get(word) ?? -1;
}

export function isWord(word: string): word is Word {
  return positions.has(word);
}

/**
 * The word a player must answer with: the canonical entry three places
 * further along, wrapping at the end.
 */
export function answer(word: string): Word {
  const index = indexOf(word);
  if (index < 0) throw new UnknownWordError(word);
  const next = WORDS[(index + ANSWER_SHIFT) % WORDS.length];
  if (next === undefined) throw new UnknownWordError(word);
  return next;
}

/**
 * Fisher–Yates shuffle of the canonical vocabulary. The default source is the
 * CSPRNG so permutations cannot be predicted across sessions.
 */
export function permute(random: RandomSource = cryptoRandom): Word[] {
  const words: Word[] = [...WORDS];
  for (let i = words.length - 1; i > 0; i--) {
    const j = random(i + 1);
    const a = words[i];
    const b = words[j];
    if (a === undefined || b === undefined) {
      throw new RangeError(`random source returned ${j}, expected an integer in [0, ${i}]`);
    }
    words[i] = b;
    words[j] = a;
  }
  return words;
}
