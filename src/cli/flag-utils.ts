import { CliUsageError } from './errors.js';

/**
 * Remove every occurrence of an option named by `names` (`--config path`, `-c path` or
 * `--config=path`) from `args` and return the last value given.
 */
export function takeOption(args: string[], names: readonly string[]): string | undefined {
  let value: string | undefined;
  let index = 0;
  while (index < args.length) {
    const token = args[index] ?? '';
    const eq = token.indexOf('=');
    const name = token.startsWith('--') && eq > 0 ? token.slice(0, eq) : token;
    if (!names.includes(name)) {
      index += 1;
      continue;
    }
    if (name !== token) {
      value = token.slice(eq + 1);
      args.splice(index, 1);
      continue;
    }
    const next = args[index + 1];
    if (next === undefined || next.startsWith('-')) {
      throw new CliUsageError(`Flag '${token}' requires a value.`);
    }
    value = next;
    args.splice(index, 2);
  }
  return value;
}

/** Remove every switch named by `names` from `args`; true when any was present. */
export function takeSwitch(args: string[], names: readonly string[]): boolean {
  const before = args.length;
  for (let index = args.length - 1; index >= 0; index--) {
    if (names.includes(args[index] ?? '')) args.splice(index, 1);
  }
  return args.length !== before;
}
