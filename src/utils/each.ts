/**
 * Runs every step even when some of them throw,
 * then rethrows the first error (or all of them as `AggregateError`).
 * Registry listeners failing in the middle of a multi-record change
 * do not leave the change half applied.
 */
export function runAll(steps: readonly (() => unknown)[]) {
  const errors: unknown[] = [];
  for (const step of steps) {
    try {
      step();
    } catch (e) {
      errors.push(e);
    }
  }
  if (errors.length === 1) {
    throw errors[0];
  }
  if (errors.length > 1) {
    throw new AggregateError(errors, 'Registry listeners failed.');
  }
}
