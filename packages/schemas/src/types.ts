/**
 * Wordgate Core Types
 *
 * Shared data models for the challenge server. The protocol engine,
 * dispatcher, logger and metrics collector all speak in these types.
 */

// ─── Session ────────────────────────────────────────────────────────

export type SessionPhase =
  | "await_greeting"
  | "await_ready"
  | "await_round"
  | "won"
  | "rejected"
  | "closed";

/** How a session ended. Everything except `io_error` is a normal outcome. */
export type SessionOutcome =
  | "won"
  | "bad_greeting"
  | "declined"
  | "timed_out"
  | "wrong_word"
  | "peer_closed"
  | "io_error";

// ─── Session Events ─────────────────────────────────────────────────

export type SessionEventType =
  | "session.opened"
  | "session.phase_changed"
  | "session.round_passed"
  | "session.closed";

export interface SessionEvent {
  session_id: string;
  type: SessionEventType;
  timestamp: string;
  payload: Record<string, unknown>;
}

export interface SessionClosedPayload {
  outcome: SessionOutcome;
  duration_ms: number;
  rounds_completed: number;
}

export type SessionEventListener = (event: SessionEvent) => void;

// ─── Logging ────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
