/**
 * Shared test helpers.
 */

/** Run `fn` and return what it threw, or fail if it returned. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}
