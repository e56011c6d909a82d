// src/commands.ts
//
// Command implementations behind the `pathbridge` binary. Kept apart from
// cli.ts so they run against any Dispatcher and any output sink.

import { Dispatcher } from './core/Dispatcher.js';
import { CopyOptions } from './core/types.js';
import { formatSize } from './utils/format.js';

export interface CommandIO {
  log(message: string): void;
  error(message: string): void;
  write(chunk: Uint8Array | string): void;
}

export const USAGE = `Usage: pathbridge <command> [options]

Commands:
  ls <path> [--recursive] [--full-path]     List a directory or prefix
  cp <from> <to> [--no-overwrite] [--contents-only] [--concurrency N]
                                            Copy a file or directory tree
  rm <path> [--dry-run]                     Delete a file or directory tree
  du <path> [--human]                       Total size in bytes
  exists <path>                             Exit 0 if the path exists, 1 otherwise
  cat <path>                                Write a file to stdout

Paths are local, or s3://bucket/key (also s3a:// and s3n://).`;

interface ParsedArgs {
  positionals: string[];
  flags: Set<string>;
  values: Map<string, string>;
}

// Flags that consume the following argument
const VALUE_FLAGS = new Set(['--concurrency']);

function parseArgs(args: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], flags: new Set(), values: new Map() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('-')) {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    if (VALUE_FLAGS.has(name)) {
      const value = eq === -1 ? args[++i] : arg.slice(eq + 1);
      if (value === undefined) throw new Error(`${name} requires a value`);
      parsed.values.set(name, value);
    } else {
      parsed.flags.add(name === '-r' ? '--recursive' : name);
    }
  }
  return parsed;
}

function requirePaths(parsed: ParsedArgs, count: number, usage: string): string[] {
  if (parsed.positionals.length !== count) {
    throw new Error(`Usage: pathbridge ${usage}`);
  }
  return parsed.positionals;
}

/**
 * Run one command. Resolves to the process exit code; bad usage and
 * operation failures reject.
 */
export async function runCommand(argv: readonly string[], dispatcher: Dispatcher, io: CommandIO): Promise<number> {
  const [command, ...rest] = argv;
  const args = parseArgs(rest);

  switch (command) {
    case 'ls': {
      const [path] = requirePaths(args, 1, 'ls <path> [--recursive] [--full-path]');
      const entries = await dispatcher.list(path, {
        recursive: args.flags.has('--recursive'),
        fullPath: args.flags.has('--full-path'),
      });
      for (const entry of entries) io.log(entry);
      return 0;
    }

    case 'cp': {
      const [from, to] = requirePaths(args, 2, 'cp <from> <to> [--no-overwrite] [--contents-only] [--concurrency N]');
      const options: CopyOptions = {
        overwrite: !args.flags.has('--no-overwrite'),
        includeSourceDirName: !args.flags.has('--contents-only'),
      };
      const concurrency = args.values.get('--concurrency');
      if (concurrency !== undefined) {
        options.concurrency = Number(concurrency);
        if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
          throw new Error(`--concurrency must be a positive integer, got '${concurrency}'`);
        }
      }
      await dispatcher.copy(from, to, options);
      io.log(`Copied '${from}' to '${to}'`);
      return 0;
    }

    case 'rm': {
      const [path] = requirePaths(args, 1, 'rm <path> [--dry-run]');
      const dryRun = args.flags.has('--dry-run');
      const count = await dispatcher.remove(path, { dryRun });
      io.log(dryRun ? `Deleting '${path}' would remove ${count} file(s)` : `Removed ${count} file(s) from '${path}'`);
      return 0;
    }

    case 'du': {
      const [path] = requirePaths(args, 1, 'du <path> [--human]');
      const bytes = await dispatcher.size(path);
      io.log(args.flags.has('--human') ? formatSize(bytes) : String(bytes));
      return 0;
    }

    case 'exists': {
      const [path] = requirePaths(args, 1, 'exists <path>');
      const found = await dispatcher.exists(path);
      io.log(String(found));
      return found ? 0 : 1;
    }

    case 'cat': {
      const [path] = requirePaths(args, 1, 'cat <path>');
      io.write(await dispatcher.readBytes(path));
      return 0;
    }

    case undefined:
    case 'help':
    case '--help':
    case '-h':
      io.log(USAGE);
      return 0;

    default:
      io.error(`Unknown command '${command}'`);
      io.log(USAGE);
      return 2;
  }
}
