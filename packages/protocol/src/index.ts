export { FramedStream } from "./framed-stream.js";
export type { FramedStreamOptions, MessageChannel } from "./framed-stream.js";
export { SessionEngine, checkReply } from "./session-engine.js";
export type { SessionEngineOptions, ReplyMismatch } from "./session-engine.js";
export {
  ROUNDS,
  WORDS_PER_ROUND,
  DEFAULT_TIME_LIMIT_SECONDS,
  GREETING_REPLY,
  BAD_GREETING,
  DECLINED,
  TOO_SLOW,
  WRONG_WORD,
  winMessage,
  roundPrompt,
} from "./messages.js";
