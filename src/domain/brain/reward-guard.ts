export interface RewardGuardOptions {
  readonly cooldownMs: number;
  /** Lowest policy score that may be rewarded. */
  readonly minimumScore?: number;
  readonly maxRewardsPerHour?: number;
}

export type RewardVerdict =
  | { readonly kind: 'allowed' }
  | { readonly kind: 'refused'; readonly reason: 'cooldown' | 'low_score' | 'hourly_limit' };

export const DEFAULT_MINIMUM_SCORE = 0.5;
export const DEFAULT_MAX_REWARDS_PER_HOUR = 30;

const HOUR_MS = 60 * 60 * 1000;

/**
 * Limits how often the dispenser fires: a cooldown between rewards, a score
 * floor, and a cap on rewards in the trailing hour.
 */
export class RewardGuard {
  private readonly grantedAt: number[] = [];
  private readonly minimumScore: number;
  private readonly maxPerHour: number;

  constructor(private readonly options: RewardGuardOptions) {
    this.minimumScore = options.minimumScore ?? DEFAULT_MINIMUM_SCORE;
    this.maxPerHour = options.maxRewardsPerHour ?? DEFAULT_MAX_REWARDS_PER_HOUR;
  }

  check(nowMs: number, score: number): RewardVerdict {
    const last = this.lastRewardAt;
    if (last !== undefined && nowMs - last < this.options.cooldownMs) {
      return { kind: 'refused', reason: 'cooldown' };
    }
    if (score < this.minimumScore) {
      return { kind: 'refused', reason: 'low_score' };
    }
    this.prune(nowMs);
    if (this.grantedAt.length >= this.maxPerHour) {
      return { kind: 'refused', reason: 'hourly_limit' };
    }
    return { kind: 'allowed' };
  }

  /**
   * Checks and, when allowed, records the reward at once, so a second caller
   * arriving before the dispenser answers already sees it.
   */
  tryReserve(nowMs: number, score: number): RewardVerdict {
    const verdict = this.check(nowMs, score);
    if (verdict.kind === 'allowed') this.noteReward(nowMs);
    return verdict;
  }

  /** Drops a reservation whose reward was never delivered. */
  release(nowMs: number): void {
    const index = this.grantedAt.lastIndexOf(nowMs);
    if (index >= 0) this.grantedAt.splice(index, 1);
  }

  noteReward(nowMs: number): void {
    this.grantedAt.push(nowMs);
  }

  get lastRewardAt(): number | undefined {
    return this.grantedAt[this.grantedAt.length - 1];
  }

  private prune(nowMs: number): void {
    while (this.grantedAt.length > 0 && nowMs - (this.grantedAt[0] ?? nowMs) >= HOUR_MS) {
      this.grantedAt.shift();
    }
  }
}
