/**
 * Largest delay setTimeout honours; anything above fires after 1ms
 */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * setTimeout that re-arms until the whole of `ms` has passed.
 * Returns a function that cancels it.
 */
export function setLongTimeout(callback: () => void, ms: number): () => void {
  const deadline = Date.now() + ms;
  let timer: NodeJS.Timeout | undefined;

  const arm = () => {
    const remaining = deadline - Date.now();
    timer =
      remaining > MAX_TIMER_MS
        ? setTimeout(arm, MAX_TIMER_MS)
        : setTimeout(callback, Math.max(remaining, 0));
  };
  arm();

  return () => clearTimeout(timer);
}
