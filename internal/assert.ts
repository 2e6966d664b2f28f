/** Throws an Error built from `args` when `fact` is false. */
export function check(fact: boolean, ...args: unknown[]): void {
  if (!fact)
    fail(...args);
}

export function fail(...args: unknown[]): never {
  args.unshift('2-3 tree'); // at beginning of message
  throw new Error(args.join(' '));
}
