/**
 * Wall clock port. The brain and the reward guard read time only through this,
 * so cooldown behaviour is testable without sleeping.
 */
export interface Clock {
  /** Milliseconds since the Unix epoch. */
  nowMs(): number;
  /** Resolves after `ms` milliseconds. */
  sleep(ms: number): Promise<void>;
}
