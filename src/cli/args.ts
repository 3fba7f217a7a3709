/**
 * Minimal argv splitter: the first bare word is the command, `--name value`
 * and `--name=value` become options, `--flag` alone becomes true.
 * Validation of the values happens in the command's zod schema.
 */

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  options: Record<string, string | boolean>;
}

const BOOLEAN_FLAGS = new Set(['help', 'version']);

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const options: Record<string, string | boolean> = {};
  let command: string | undefined;
  let onlyPositionals = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }

    if (onlyPositionals || !arg.startsWith('-') || arg === '-') {
      if (command === undefined) {
        command = arg;
      } else {
        positionals.push(arg);
      }
      continue;
    }

    if (arg === '--') {
      onlyPositionals = true;
      continue;
    }

    if (arg === '-h') {
      options.help = true;
      continue;
    }
    if (arg === '-v') {
      options.version = true;
      continue;
    }

    const body = arg.replace(/^--?/, '');
    const eq = body.indexOf('=');
    if (eq >= 0) {
      options[body.slice(0, eq)] = body.slice(eq + 1);
      continue;
    }

    const next = argv[i + 1];
    if (!BOOLEAN_FLAGS.has(body) && next !== undefined && !next.startsWith('-')) {
      options[body] = next;
      i++;
    } else {
      options[body] = true;
    }
  }

  return { command, positionals, options };
}
