import { InputError } from '@/lib/errors';

export type ParsedArgs = {
  positional: string[];
  flags: Map<string, string | true>;
};

export type ArgOptions = {
  /** Flags that take a value, as `--name value` or `--name=value`. */
  values?: readonly string[];
  /** Flags that never take a value. */
  switches?: readonly string[];
};

export function parseArgv(argv: string[], options: ArgOptions = {}): ParsedArgs {
  const values = options.values ?? [];
  const switches = options.switches ?? [];
  const positional: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (switches.includes(name)) {
      flags.set(name, true);
    } else if (!values.includes(name)) {
      throw new InputError(`Unknown option --${name}`, { [name]: ['unknown option'] });
    } else if (eq !== -1) {
      flags.set(name, arg.slice(eq + 1));
    } else {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new InputError(`Missing value for --${name}`, { [name]: ['requires a value'] });
      }
      flags.set(name, next);
      i++;
    }
  }
  return { positional, flags };
}

export function flagValue(args: ParsedArgs, name: string): string | undefined {
  const v = args.flags.get(name);
  return typeof v === 'string' ? v : undefined;
}

export function requirePositional(args: ParsedArgs, names: readonly string[]): string[] {
  if (args.positional.length < names.length) {
    const missing = names.slice(args.positional.length);
    const fieldErrors = Object.fromEntries(missing.map((n) => [n, ['is required']]));
    throw new InputError(`Missing ${missing.map((n) => `<${n}>`).join(' ')}`, fieldErrors);
  }
  return args.positional;
}
