/**
 * CLI utilities - shared flag helpers for scripts/
 */

type FlagName = string | readonly string[];

function names(flag: FlagName): readonly string[] {
  return typeof flag === "string" ? [flag] : flag;
}

/**
 * Value of a CLI flag; pass an array to accept aliases
 * @example parseFlag(['--days', '10'], '--days') // '10'
 * @example parseFlag(['--days=10'], '--days') // '10'
 * @example parseFlag(['-d', '10'], ['--days', '-d']) // '10'
 */
export function parseFlag(args: string[], flag: FlagName): string | undefined {
  const candidates = names(flag);
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    for (const name of candidates) {
      // --flag=value
      if (arg.startsWith(`${name}=`)) {
        return arg.slice(name.length + 1);
      }
      // --flag value
      if (arg === name && i + 1 < args.length && !args[i + 1].startsWith("-")) {
        return args[i + 1];
      }
    }
  }
  return undefined;
}

/**
 * Whether the flag (or any alias) is present
 * @example hasFlag(['--json', '--days', '3'], '--json') // true
 */
export function hasFlag(args: string[], flag: FlagName): boolean {
  const candidates = names(flag);
  return args.some((arg) => candidates.some((name) => arg === name || arg.startsWith(`${name}=`)));
}

/**
 * Arguments from process.argv without node and the script path
 */
export function getArgs(): string[] {
  return process.argv.slice(2);
}
