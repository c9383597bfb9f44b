/** Longest delay setTimeout honours; a longer one fires after 1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function timerDelay(ms: number): number {
  return Math.min(Math.max(ms, 0), MAX_TIMER_DELAY_MS);
}
