/**
 * Keeps the reward finite for zero-duration, zero-cost jobs
 */
export const REWARD_EPSILON = 0.1;

/**
 * Reward for one job outcome
 *
 * reward = success / (minutes + costPerMinute * minutes + 0.1)
 *
 * The cost penalty adds currency to minutes: one currency unit weighs
 * the same as one minute of runtime.
 */
export function computeReward(success: boolean, durationSeconds: number, costPerMinute: number): number {
  if (!success) {
    return 0;
  }
  const minutes = durationSeconds / 60;
  const costPenalty = costPerMinute * minutes;
  return 1 / (minutes + costPenalty + REWARD_EPSILON);
}
