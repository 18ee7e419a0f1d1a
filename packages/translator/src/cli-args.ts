import { z } from 'zod';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const commandNames = [
  'help',
  'usage',
  'languages',
  'text',
  'document',
  'glossary-create',
  'glossary-list',
  'glossary-get',
  'glossary-entries',
  'glossary-delete',
] as const;

type CommandName = (typeof commandNames)[number];

const cliInputSchema = z.object({
  command: z.enum(commandNames),
  options: z.record(z.string(), z.string()),
});

/**
 * Parses `command --key=value --key value --flag` argument lists. A flag
 * without a value is read as `true`; arguments not starting with `--` are
 * ignored.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const separator = arg.indexOf('=');
    const key = separator === -1 ? arg.slice(2) : arg.slice(2, separator);
    if (!key) {
      continue;
    }

    if (separator !== -1) {
      options[key] = arg.slice(separator + 1);
      continue;
    }

    const next = rest[index + 1];
    if (next !== undefined && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

export function normalizeCommand(command?: string): string {
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    return 'help';
  }

  return command;
}

export { cliInputSchema, commandNames };
export type { CommandName, ParsedArgs };
