/**
 * Shared test helpers.
 */

/**
 * Run `fn` and return the error it throws, failing if it throws nothing or
 * something of another type.
 */
export function thrownBy<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (e) {
    if (e instanceof type) return e;
    throw e;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}
