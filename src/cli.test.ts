import { Readable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { normalizeArgv, runCli, type CliIO } from './cli';

interface CliRun {
  code: number;
  stdout: string;
  stderr: string;
}

async function run(argv: string[], input: string, isTTY = false): Promise<CliRun> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CliIO = {
    stdin: Object.assign(Readable.from([input]), { isTTY }),
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    stderr: { write: (chunk: string) => stderr.push(chunk) },
  };
  const code = await runCli(argv, io);
  return { code, stdout: stdout.join(''), stderr: stderr.join('') };
}

describe('json-to-struct CLI', () => {
  it('prints the generated struct for JSON on stdin', async () => {
    const result = await run([], '{"quest_id":1}');
    expect(result).toEqual({ code: 0, stdout: 'struct Foo {\n  float questID;\n};\n', stderr: '' });
  });

  it('accepts the single-dash -name and -pkg flags', async () => {
    const result = await run(['-name=Quest', '-pkg=models'], '{"a":true}');
    expect(result.code).toBe(0);
    expect(result.stdout).toBe('struct Quest {\n  bool a;\n};\n');
  });

  it('passes indent and integer inference through', async () => {
    const result = await run(['--name', 'Quest', '--indent', '4', '--infer-integers'], '{"a":{"b":2}}');
    expect(result.code).toBe(0);
    expect(result.stdout).toBe([
      'struct Quest {',
      '    struct A {',
      '        int64_t b;',
      '    };',
      '    A a;',
      '};',
      '',
    ].join('\n'));
  });

  it('refuses to run on an interactive terminal', async () => {
    const result = await run([], '', true);
    expect(result.code).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain('Usage: json-to-struct');
    expect(result.stderr.endsWith('Expects input on stdin\n')).toBe(true);
  });

  it('reports malformed JSON on one line', async () => {
    const result = await run([], '{"a":');
    expect(result.code).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain('error parsing: ');
    expect(result.stderr.trimEnd().split('\n')).toHaveLength(1);
  });

  it('reports documents nested too deeply on one line', async () => {
    const result = await run([], '['.repeat(1001) + ']'.repeat(1001));
    expect(result.code).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain('error parsing: exceeded max depth');
    expect(result.stderr.trimEnd().split('\n')).toHaveLength(1);
  });

  it('reports unsupported shapes', async () => {
    const result = await run([], '[]');
    expect(result.code).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain('error parsing: empty array');
  });

  it('prints warnings only with --verbose', async () => {
    const quiet = await run([], '{"m":null}');
    expect(quiet.stderr).toBe('');

    const verbose = await run(['--verbose'], '{"m":null}');
    expect(verbose.code).toBe(0);
    expect(verbose.stdout).toBe('struct Foo {\n  std::any m;\n};\n');
    expect(verbose.stderr).toContain('Ambiguous: Foo.m (null value) is rendered as std::any');
  });

  it('rejects out-of-range options', async () => {
    const result = await run(['--indent', '12'], '{}');
    expect(result.code).toBe(1);
    expect(result.stderr).toContain('invalid options: indent: ');
  });

  it('rejects a non-numeric indent', async () => {
    const result = await run(['--indent', 'wide'], '{}');
    expect(result.code).toBe(1);
    expect(result.stdout).toBe('');
  });

  it('rejects unknown options and positional arguments', async () => {
    expect((await run(['--bogus'], '{}')).code).toBe(1);
    expect((await run(['input.json'], '{}')).code).toBe(1);
  });

  it('prints the version', async () => {
    const result = await run(['--version'], '');
    expect(result.code).toBe(0);
    expect(result.stdout).toMatch(/^\d+\.\d+\.\d+\n$/);
  });
});

describe('normalizeArgv', () => {
  it('rewrites single-dash long flags only', () => {
    expect(normalizeArgv(['-name=Foo', '-pkg', 'x', '-n', 'Bar', '--name=Baz', '-names'])).toEqual([
      '--name=Foo',
      '--pkg',
      'x',
      '-n',
      'Bar',
      '--name=Baz',
      '-names',
    ]);
  });
});
