/**
 * json-to-struct command line
 *
 * Reads one JSON document from stdin and prints C++ struct declarations to stdout.
 */

import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { JsonToStructError, OptionsError } from './errors';
import { generate } from './jsonToStruct';
import { logDebug } from './logger';

export interface CliIO {
  stdin: NodeJS.ReadableStream & { isTTY?: boolean };
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

type CliOptions = {
  name: string;
  pkg: string;
  inferIntegers?: boolean;
  indent: number;
  verbose?: boolean;
};

// Single-dash long flags (-name=Foo, -pkg main) of earlier releases
const LEGACY_LONG_FLAG = /^-(name|pkg)(=|$)/;

function readVersion(): string {
  let version = '0.0.0';
  try {
    const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
      && typeof packageJson.version === 'string') {
      version = packageJson.version;
    }
  } catch (error) {
    logDebug('cli', 'Could not read package.json version, using fallback', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return version;
}

function parseIndent(value: string): number {
  const width = Number.parseInt(value, 10);
  if (Number.isNaN(width)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return width;
}

export function normalizeArgv(argv: readonly string[]): string[] {
  return argv.map(arg => (LEGACY_LONG_FLAG.test(arg) ? `-${arg}` : arg));
}

export function createProgram(io: CliIO): Command {
  return new Command()
    .name('json-to-struct')
    .description('Generate C++ struct definitions from a JSON document read on stdin')
    .version(readVersion())
    .option('-n, --name <name>', 'the name of the struct', 'Foo')
    .option('-p, --pkg <pkg>', 'the name of the package for the generated code', 'main')
    .option('--infer-integers', 'render integral numbers as int64_t instead of float')
    .option('--indent <width>', 'spaces per nesting level', parseIndent, 2)
    .option('--verbose', 'print inference warnings to stderr')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: str => { io.stdout.write(str); },
      writeErr: str => { io.stderr.write(str); },
      outputError: (str, write) => write(chalk.red(str)),
    });
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Runs the command line and resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const program = createProgram(io);
  try {
    program.parse(normalizeArgv(argv), { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  if (io.stdin.isTTY) {
    io.stderr.write(program.helpInformation());
    io.stderr.write('Expects input on stdin\n');
    return 1;
  }

  const options = program.opts<CliOptions>();
  const input = await readStream(io.stdin);
  logDebug('cli', 'Read stdin', { chars: input.length });

  try {
    const result = generate(input, {
      structName: options.name,
      packageName: options.pkg,
      inferIntegers: options.inferIntegers === true,
      indent: options.indent,
    });
    if (options.verbose === true) {
      for (const warning of result.warnings) {
        io.stderr.write(`${chalk.yellow(warning)}\n`);
      }
    }
    io.stdout.write(result.source);
    return 0;
  } catch (error) {
    if (error instanceof OptionsError) {
      io.stderr.write(`${chalk.red(error.message)}\n`);
      return 1;
    }
    if (error instanceof JsonToStructError) {
      io.stderr.write(`${chalk.red(`error parsing: ${error.message}`)}\n`);
      return 1;
    }
    throw error;
  }
}
