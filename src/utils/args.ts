export type CliArgs = Record<string, string | boolean>;

/** `--key value`, `--key=value` or a bare `--flag`. A repeated key keeps its last value. */
export function parseCliArgs(tokens: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('--') || token.length === 2) continue;

    const body = token.slice(2);
    const equals = body.indexOf('=');
    if (equals >= 0) {
      result[body.slice(0, equals)] = body.slice(equals + 1);
      continue;
    }

    const next = tokens[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      result[body] = next;
      i++;
    } else {
      result[body] = true;
    }
  }

  return result;
}

export function getStringArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

export function isFlagSet(args: CliArgs, key: string): boolean {
  const value = args[key];
  if (typeof value === 'boolean') return value;
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}
