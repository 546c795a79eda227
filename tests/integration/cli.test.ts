/**
 * Integration tests for the generate command
 */

import { describe, it, expect, vi } from 'vitest';
import { runGenerate, EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE } from '../../src/cli/commands/generate.js';
import { createProgram } from '../../src/cli/program.js';
import type { CommandIO } from '../../src/cli/io.js';
import { ErrorCode } from '../../src/utils/errors.js';

interface FakeIO extends CommandIO {
  out: string[];
  err: string[];
  written: Map<string, string>;
}

function fakeIO(files: Record<string, string> = {}, stdin = ''): FakeIO {
  const out: string[] = [];
  const err: string[] = [];
  const written = new Map<string, string>();
  return {
    out,
    err,
    written,
    readStdin: vi.fn(async () => stdin),
    readFile: async (path: string) => {
      const content = files[path];
      if (content === undefined) {
        throw new Error(`ENOENT: ${path}`);
      }
      return content;
    },
    writeFile: async (path: string, content: string) => {
      written.set(path, content);
    },
    stdout: (content: string) => {
      out.push(content);
    },
    stderr: (content: string) => {
      err.push(content);
    },
  };
}

function errorCode(io: FakeIO): unknown {
  const response: unknown = JSON.parse(io.err.join(''));
  if (typeof response === 'object' && response !== null && 'error' in response) {
    const { error } = response;
    if (typeof error === 'object' && error !== null && 'code' in error) {
      return error.code;
    }
  }
  return undefined;
}

describe('generate command', () => {
  it('should read stdin and print source', async () => {
    const io = fakeIO({}, '{"id": 1, "name": "a"}');
    const code = await runGenerate([], { rootName: 'User', quiet: true }, io);

    expect(code).toBe(EXIT_SUCCESS);
    expect(io.out.join('')).toBe('export interface User {\n  id: number;\n  name: string;\n}\n');
    expect(io.err).toEqual([]);
  });

  it('should merge samples from several formats and write a file', async () => {
    const io = fakeIO({ 'a.json': '{"id": 1}', 'b.yaml': 'id: 2\nname: x\n' });
    const code = await runGenerate(['a.json', 'b.yaml'], { target: 'rust', output: 'out.rs' }, io);

    expect(code).toBe(EXIT_SUCCESS);
    expect(io.out).toEqual([]);
    expect(io.written.get('out.rs')).toBe(
      [
        'use serde::{Deserialize, Serialize};',
        '',
        '#[derive(Debug, Clone, Serialize, Deserialize)]',
        'pub struct Root {',
        '    pub id: i64,',
        '    pub name: Option<String>,',
        '}',
        '',
      ].join('\n'),
    );

    const report: unknown = JSON.parse(io.err.join(''));
    expect(report).toMatchObject({
      status: 'success',
      target: 'rust',
      rootName: 'Root',
      stats: { typesCount: 1, fieldsCount: 2, optionalFieldsCount: 1, inputSize: 23 },
      complexity: { score: 1, label: 'Simple' },
    });
  });

  it('should keep whole-number float literals as floats', async () => {
    const io = fakeIO({ 'item.json': '{"price": 1.0, "qty": 2}', 'item.toml': 'price = 3.0\nqty = 4\n' });
    const code = await runGenerate(['item.json', 'item.toml'], { target: 'rust', quiet: true }, io);

    expect(code).toBe(EXIT_SUCCESS);
    expect(io.out.join('')).toContain('    pub price: f64,\n    pub qty: i64,\n');
  });

  it('should reject an unknown target before reading input', async () => {
    const io = fakeIO({}, '{"id": 1}');
    const code = await runGenerate([], { target: 'cobol' }, io);

    expect(code).toBe(EXIT_USAGE);
    expect(errorCode(io)).toBe(ErrorCode.UNREGISTERED_TARGET);
    expect(io.readStdin).not.toHaveBeenCalled();
  });

  it('should reject invalid options as usage errors', async () => {
    const io = fakeIO({}, '{"id": 1}');
    const code = await runGenerate([], { mapThreshold: -1 }, io);

    expect(code).toBe(EXIT_USAGE);
    expect(errorCode(io)).toBe(ErrorCode.CONFIG_ERROR);
  });

  it('should report unreadable input', async () => {
    const io = fakeIO();
    const code = await runGenerate(['missing.json'], {}, io);

    expect(code).toBe(EXIT_FAILURE);
    expect(errorCode(io)).toBe(ErrorCode.FILE_IO_ERROR);
  });

  it('should report malformed input', async () => {
    const io = fakeIO({ 'bad.json': '{"id": ' });
    const code = await runGenerate(['bad.json'], {}, io);

    expect(code).toBe(EXIT_FAILURE);
    expect(errorCode(io)).toBe(ErrorCode.PARSE_ERROR);
  });

  it('should report write failures', async () => {
    const io = fakeIO({}, '{"id": 1}');
    io.writeFile = async () => {
      throw new Error('EACCES');
    };
    const code = await runGenerate([], { output: 'locked.ts', quiet: true }, io);

    expect(code).toBe(EXIT_FAILURE);
    expect(errorCode(io)).toBe(ErrorCode.FILE_IO_ERROR);
  });

  it('should list registered targets', async () => {
    const io = fakeIO();
    const code = await runGenerate([], { listTargets: true }, io);

    expect(code).toBe(EXIT_SUCCESS);
    expect(io.out.join('')).toBe('typescript\nzod\npython\nrust\n');
  });
});

describe('program', () => {
  it('should register generate as the default command', () => {
    const program = createProgram();
    expect(program.commands.map((command) => command.name())).toEqual(['generate']);
  });
});
