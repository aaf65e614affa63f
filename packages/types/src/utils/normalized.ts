/**
 * Result of a normalizer. `fallback` is true when the input could not be
 * parsed and `value` is the safe default (zero, or today's date).
 */
export interface Normalized<T> {
  value: T;
  fallback: boolean;
  warning?: string;
}

export function normalized<T>(value: T): Normalized<T> {
  return { value, fallback: false };
}

export function fellBack<T>(value: T, warning: string): Normalized<T> {
  return { value, fallback: true, warning };
}
