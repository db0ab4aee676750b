const SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** POSIX single-quoting; make hands `$(CC)` to `/bin/sh`. */
export function shellQuote(arg: string): string {
  if (arg !== '' && SAFE.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function shellJoin(args: readonly string[]): string {
  return args.map(shellQuote).join(' ');
}
