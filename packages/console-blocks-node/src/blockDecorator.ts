import { createBlock } from './block.js';
import type { BlockDecoratorOptions, BlockLine } from './types.js';

// Wrappers report the wrapped function's name and arity.
function keepIdentity<T extends (...args: never[]) => unknown>(
  original: { name: string; length: number },
  wrapped: T,
): T {
  return Object.defineProperties(wrapped, {
    name: { value: original.name },
    length: { value: original.length },
  });
}

/**
 * Wraps a function so every call is drawn as a block around it. The receiver, the
 * arguments and the return value pass through unchanged.
 *
 * @example
 * const migrate = withBlock(['Running migrations'])(runMigrations);
 */
export function withBlock(lines: readonly BlockLine[], options: BlockDecoratorOptions = {}) {
  return <TThis, TArgs extends unknown[], TResult>(fn: (this: TThis, ...args: TArgs) => TResult) =>
    keepIdentity(fn, function (this: TThis, ...args: TArgs): TResult {
      return createBlock({ ...options, lines, action: () => fn.apply(this, args) }).render();
    });
}

/** Same as {@link withBlock} for async functions: the success mark is drawn once the promise settles. */
export function withAsyncBlock(lines: readonly BlockLine[], options: BlockDecoratorOptions = {}) {
  return <TThis, TArgs extends unknown[], TResult>(fn: (this: TThis, ...args: TArgs) => Promise<TResult>) =>
    keepIdentity(fn, function (this: TThis, ...args: TArgs): Promise<Awaited<TResult>> {
      return createBlock({ ...options, lines, action: () => fn.apply(this, args) }).renderAsync();
    });
}
