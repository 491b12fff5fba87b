/**
 * CLI Argument Parsing
 *
 * `--key=value` sets a flag, a bare `--key` sets it to true; everything else
 * is positional. The first positional is the command.
 *
 * Consumers: cli.ts
 */

export interface ParsedArgs {
  command: string | null;
  positionals: string[];
  flags: Record<string, string | true>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | true> = {};

  for (const arg of argv) {
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq === -1) {
      flags[body] = true;
    } else {
      flags[body.slice(0, eq)] = body.slice(eq + 1);
    }
  }

  return {
    command: positionals.shift() ?? null,
    positionals,
    flags,
  };
}

/** String value of a flag; undefined when absent or given without a value */
export function flagValue(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  return typeof value === 'string' ? value : undefined;
}

export function hasFlag(args: ParsedArgs, name: string): boolean {
  return args.flags[name] !== undefined;
}
