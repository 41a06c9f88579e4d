export { ChallengeServer, DEFAULT_HOST } from "./challenge-server.js";
export type { ChallengeServerConfig } from "./challenge-server.js";
export { SessionLogger } from "./session-logger.js";
export { REDACTED, redactPayload, redactString, secretStrings } from "./redact.js";
