/**
 * Command-line parsing for the wordhoard CLI.
 *
 * Flags use the --key=value form; everything else is positional.
 */

export const DEFAULT_LOOKUP_WORDS = ['vital', 'house', 'cozen'];
export const DEFAULT_LOOKUP_OUTPUT = 'lookup/lookup.html';

export const USAGE = `Usage:
  wordhoard extract <input.txt> <output.zip> [--dictionary=PATH] [--encoding=ENC]
  wordhoard lookup [word...] [--dictionary=PATH] [--output=PATH]
  wordhoard serve [--port=N] [--dictionary=PATH]`;

export type Command =
  | { command: 'extract'; inputPath: string; outputPath: string; dictionaryPath?: string; inputEncoding?: string }
  | { command: 'lookup'; words: string[]; dictionaryPath?: string; outputPath: string }
  | { command: 'serve'; port?: number; dictionaryPath?: string };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const FLAG_PATTERN = /^--([\w-]+)=(.*)$/;

function splitArgs(args: string[]): { positional: string[]; flags: Map<string, string> } {
  const positional: string[] = [];
  const flags = new Map<string, string>();

  for (const arg of args) {
    const match = arg.match(FLAG_PATTERN);
    if (match) {
      flags.set(match[1], match[2]);
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Flags take the form --name=value, got ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  return { positional, flags };
}

function checkFlags(flags: Map<string, string>, allowed: string[]): void {
  for (const name of flags.keys()) {
    if (!allowed.includes(name)) {
      throw new UsageError(`Unknown flag --${name}`);
    }
  }
}

/**
 * Parse argv (without the node and script entries) into a command
 */
export function parseArgs(argv: string[]): Command {
  const [command, ...rest] = argv;
  const { positional, flags } = splitArgs(rest);

  switch (command) {
    case 'extract': {
      checkFlags(flags, ['dictionary', 'encoding']);
      if (positional.length !== 2) {
        throw new UsageError('extract takes an input path and an output path');
      }
      return {
        command,
        inputPath: positional[0],
        outputPath: positional[1],
        dictionaryPath: flags.get('dictionary'),
        inputEncoding: flags.get('encoding')
      };
    }

    case 'lookup': {
      checkFlags(flags, ['dictionary', 'output']);
      return {
        command,
        words: positional.length > 0 ? positional : DEFAULT_LOOKUP_WORDS,
        dictionaryPath: flags.get('dictionary'),
        outputPath: flags.get('output') ?? DEFAULT_LOOKUP_OUTPUT
      };
    }

    case 'serve': {
      checkFlags(flags, ['port', 'dictionary']);
      if (positional.length > 0) {
        throw new UsageError('serve takes no positional arguments');
      }
      const portArg = flags.get('port');
      let port: number | undefined;
      if (portArg !== undefined) {
        port = parseInt(portArg, 10);
        if (isNaN(port) || port <= 0) {
          throw new UsageError(`Invalid port: ${portArg}`);
        }
      }
      return { command, port, dictionaryPath: flags.get('dictionary') };
    }

    default:
      throw new UsageError(command ? `Unknown command: ${command}` : 'No command given');
  }
}
