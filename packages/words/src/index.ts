export { WORDS, ANSWER_SHIFT, indexOf, isWord, answer, permute } from "./word-table.js";
export type { Word, RandomSource } from "./word-table.js";
