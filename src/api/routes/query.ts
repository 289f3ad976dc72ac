/**
 * Read a positive integer query parameter, clamped to `max`
 */
export function parseLimit(value: unknown, fallback: number, max: number): number {
  if (typeof value !== 'string') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.min(parsed, max);
}
