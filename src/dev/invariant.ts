/**
 * Invariant assertion utilities for correctness checking
 *
 * Core principle: fail fast when invariants are violated
 */

/**
 * Assert a condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context ? '\n' + JSON.stringify(context, null, 2) : '';
    throw new Error(`[frametree Invariant] ${message}${contextStr}`);
  }
}

/**
 * Assert a reference is not undefined
 * @internal
 */
export function assertDefined<T>(
  value: T | undefined,
  message: string
): asserts value is T {
  invariant(value !== undefined, message);
}

/**
 * Assert an index addresses one of `count` live slots
 * @internal
 */
export function assertIndexInRange(
  index: number,
  count: number,
  context: string
): void {
  invariant(
    Number.isInteger(index) && index >= 0 && index < count,
    `${context}: index ${index} is out of range`,
    { index, count }
  );
}
