/** A message shown until `durationMs` has passed since `createdAt`. */
export interface TimedMessage {
  message: string;
  createdAt: number;
}

export function createTimedMessage(message: string, nowMs: number): TimedMessage {
  return { message, createdAt: nowMs };
}

/** Expired strictly after the duration; at exactly `durationMs` it is still shown. */
export function isTimedMessageExpired(msg: TimedMessage, nowMs: number, durationMs: number): boolean {
  return nowMs - msg.createdAt > durationMs;
}
