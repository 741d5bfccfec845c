export interface BackoffPolicy {
  initialDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

/**
 * Delay to use after `currentMs` has been slept. Never decreases and never
 * exceeds the cap.
 */
export function nextDelay(currentMs: number, policy: BackoffPolicy): number {
  return Math.min(currentMs * policy.factor, policy.maxDelayMs);
}

/**
 * The first `attempts` delays produced by the policy, in order.
 */
export function delaySchedule(policy: BackoffPolicy, attempts: number): number[] {
  const delays: number[] = [];
  let delay = Math.min(policy.initialDelayMs, policy.maxDelayMs);
  for (let i = 0; i < attempts; i++) {
    delays.push(delay);
    delay = nextDelay(delay, policy);
  }
  return delays;
}
