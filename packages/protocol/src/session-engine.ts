import { PeerClosedError } from "@wordgate/schemas";
import type {
  Logger,
  SessionClosedPayload,
  SessionEvent,
  SessionEventListener,
  SessionEventType,
  SessionOutcome,
  SessionPhase,
} from "@wordgate/schemas";
import { answer, permute } from "@wordgate/words";
import type { MessageChannel } from "./framed-stream.js";
import {
  BAD_GREETING,
  DECLINED,
  DEFAULT_TIME_LIMIT_SECONDS,
  GREETING_PREFIX,
  GREETING_REPLY,
  READY_PREFIX,
  ROUNDS,
  TOO_SLOW,
  WORDS_PER_ROUND,
  WRONG_WORD,
  roundPrompt,
  startsWith,
  winMessage,
} from "./messages.js";

export interface SessionEngineOptions {
  sessionId: string;
  channel: MessageChannel;
  flag: Buffer;
  /** The session's shuffled vocabulary. Default: a fresh `permute()` */
  words?: readonly string[];
  /** Milliseconds since some fixed point. Default: Date.now */
  clock?: () => number;
  /** Whole seconds allowed from the first read to the last round prompt. Default: 5 */
  timeLimitSeconds?: number;
  logger?: Logger;
  onEvent?: SessionEventListener;
}

export interface ReplyMismatch {
  position: number;
  expected: string;
  actual: string;
}

// space, \t, \n, \v, \f, \r
const WHITESPACE_BYTES: ReadonlySet<number> = new Set([0x20, 0x09, 0x0a, 0x0b, 0x0c, 0x0d]);

function stripTrailingWhitespace(reply: Buffer): Buffer {
  let end = reply.length;
  while (end > 0 && WHITESPACE_BYTES.has(reply[end - 1] ?? 0)) end--;
  return reply.subarray(0, end);
}

/**
 * Compares a client reply with the answers for one round's prompt. Trailing
 * whitespace is dropped, tokens are split on single spaces and compared
 * byte-for-byte. Anything after the last expected token is ignored.
 */
export function checkReply(prompt: readonly string[], reply: Buffer): ReplyMismatch | null {
  // latin1 maps every byte to one code unit, so string equality is byte equality.
  const tokens = stripTrailingWhitespace(reply).toString("latin1").split(" ", prompt.length);
  for (const [position, word] of prompt.entries()) {
    const expected = answer(word);
    const actual = tokens[position] ?? "";
    if (expected !== actual) return { position, expected, actual };
  }
  return null;
}

const noopLogger: Logger = {
  info() {},
  warn() {},
  error() {},
  debug() {},
};

/**
 * Drives one client through greeting, readiness and four rounds. `run()`
 * resolves with how the session ended; only I/O failures other than the peer
 * hanging up reject.
 */
export class SessionEngine {
  readonly sessionId: string;
  private readonly channel: MessageChannel;
  private readonly flag: Buffer;
  private readonly words: readonly string[];
  private readonly clock: () => number;
  private readonly timeLimitSeconds: number;
  private readonly logger: Logger;
  private readonly onEvent: SessionEventListener | undefined;

  private _phase: SessionPhase = "await_greeting";
  private _round = 0;
  private startedAt: number | null = null;

  constructor(options: SessionEngineOptions) {
    const words = options.words ?? permute();
    if (words.length !== ROUNDS * WORDS_PER_ROUND) {
      throw new RangeError(`session needs ${ROUNDS * WORDS_PER_ROUND} words, got ${words.length}`);
    }
    this.sessionId = options.sessionId;
    this.channel = options.channel;
    this.flag = options.flag;
    this.words = words;
    this.clock = options.clock ?? Date.now;
    this.timeLimitSeconds = options.timeLimitSeconds ?? DEFAULT_TIME_LIMIT_SECONDS;
    this.logger = options.logger ?? noopLogger;
    this.onEvent = options.onEvent;
  }

  get phase(): SessionPhase {
    return this._phase;
  }

  /** Rounds passed so far. */
  get round(): number {
    return this._round;
  }

  /** The eight words prompted in round `i`. */
  promptFor(round: number): readonly string[] {
    return this.words.slice(round * WORDS_PER_ROUND, (round + 1) * WORDS_PER_ROUND);
  }

  async run(): Promise<SessionOutcome> {
    if (this.startedAt !== null) throw new Error(`session ${this.sessionId} has already run`);
    this.startedAt = this.clock();
    this.emit("session.opened", { time_limit_seconds: this.timeLimitSeconds });

    let outcome: SessionOutcome;
    try {
      outcome = await this.play();
    } catch (err) {
      if (err instanceof PeerClosedError) {
        outcome = "peer_closed";
      } else {
        this.close("io_error");
        throw err;
      }
    }
    this.close(outcome);
    return outcome;
  }

  private async play(): Promise<SessionOutcome> {
    const greeting = await this.channel.readMessage();
    if (!startsWith(greeting, GREETING_PREFIX)) {
      await this.reject(BAD_GREETING);
      return "bad_greeting";
    }
    await this.channel.writeMessage(GREETING_REPLY);

    this.setPhase("await_ready");
    const ready = await this.channel.readMessage();
    if (!startsWith(ready, READY_PREFIX)) {
      await this.reject(DECLINED);
      return "declined";
    }

    for (let round = 0; round < ROUNDS; round++) {
      this.setPhase("await_round");
      if (this.tookTooLong()) {
        await this.reject(TOO_SLOW);
        return "timed_out";
      }

      const prompt = this.promptFor(round);
      await this.channel.writeMessage(roundPrompt(prompt));
      const reply = await this.channel.readMessage();

      const mismatch = checkReply(prompt, reply);
      if (mismatch) {
        this.logger.warn(`expected ${mismatch.expected} got ${mismatch.actual}`, {
          round,
          position: mismatch.position,
        });
        await this.reject(WRONG_WORD);
        return "wrong_word";
      }

      this._round = round + 1;
      this.emit("session.round_passed", { round });
    }

    this.setPhase("won");
    await this.channel.writeMessage(winMessage(this.flag));
    return "won";
  }

  private tookTooLong(): boolean {
    const elapsedSeconds = Math.floor(this.elapsedMs() / 1000);
    return elapsedSeconds > this.timeLimitSeconds;
  }

  private elapsedMs(): number {
    return this.startedAt === null ? 0 : this.clock() - this.startedAt;
  }

  private async reject(diagnostic: string): Promise<void> {
    this.setPhase("rejected");
    await this.channel.writeMessage(diagnostic);
  }

  private setPhase(phase: SessionPhase): void {
    if (this._phase === phase) return;
    this._phase = phase;
    this.emit("session.phase_changed", { phase, round: this._round });
  }

  private close(outcome: SessionOutcome): void {
    this.setPhase("closed");
    const payload: SessionClosedPayload = {
      outcome,
      duration_ms: this.elapsedMs(),
      rounds_completed: this._round,
    };
    this.emit("session.closed", { ...payload });
  }

  private emit(type: SessionEventType, payload: Record<string, unknown>): void {
    if (!this.onEvent) return;
    const event: SessionEvent = {
      session_id: this.sessionId,
      type,
      timestamp: new Date().toISOString(),
      payload,
    };
    this.onEvent(event);
  }
}
