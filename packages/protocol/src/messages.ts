export const ROUNDS = 4;
export const WORDS_PER_ROUND = 8;
export const DEFAULT_TIME_LIMIT_SECONDS = 5;

export const GREETING_PREFIX = Buffer.from("hello");
export const READY_PREFIX = Buffer.from("ok");

export const GREETING_REPLY = "hello! let's play a game :3\n";
export const BAD_GREETING = "that's not a nice greeting...\n";
// No trailing newline on these two; clients have always seen them this way.
export const DECLINED = "okay, we can play later then...";
export const TOO_SLOW = "you took too long!";
export const WRONG_WORD = "you said the wrong word!\n";

const WIN_PREFIX = Buffer.from("good job! the flag is ");
const NEWLINE = Buffer.from("\n");

export function winMessage(flag: Buffer): Buffer {
  return Buffer.concat([WIN_PREFIX, flag, NEWLINE]);
}

export function roundPrompt(words: readonly string[]): string {
  return `${words.join(" ")}\n`;
}

export function startsWith(message: Buffer, prefix: Buffer): boolean {
  return message.length >= prefix.length && message.subarray(0, prefix.length).equals(prefix);
}
