/**
 * compile():
 * - success: program shape and a stable program_id
 * - syntax errors come back as a single SYNTAX_ERROR issue
 * - definition checks: errors fail the compile, warnings do not unless strict
 */
import { describe, it, expect } from 'vitest';

import { compile } from './index';
import { canonical_stringify, hash_sha256 } from '../utils/canonical.util';

const DAY = [
  'load table "weather"',
  'procedure day',
  '    if roll 1-3 on 1d6 => set-fact "party is lost"',
  '    roll on table "weather"',
  'end',
  'day',
].join('\n');

describe('compile', () => {
  it('compiles a valid script and produces a stable program_id', async () => {
    const result = await compile({ source: DAY });

    expect(result.ok).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.program?.tables).toEqual(['weather']);
    expect(Object.keys(result.program?.procedures_index ?? {})).toEqual(['day']);
    expect(result.program_id).toBe(hash_sha256(canonical_stringify({ statements: result.program?.statements })));
    expect(result.program?.program_id).toBe(result.program_id);

    const again = await compile({ source: DAY });
    expect(again.program_id).toBe(result.program_id);
  });

  it('reports syntax errors without a program', async () => {
    const result = await compile({ source: 'reminder "x' });
    expect(result).toMatchObject({ ok: false, program: null, program_id: null });
    expect(result.errors).toEqual([
      { code: 'SYNTAX_ERROR', path: '/lines/1', message: 'unterminated string literal (line 1, column 10)', line: 1 },
    ]);
  });

  it('rejects duplicate procedures', async () => {
    const result = await compile({ source: 'procedure a\nend\nprocedure a\nend\n' });
    expect(result.ok).toBe(false);
    expect(result.errors).toEqual([
      { code: 'DUPLICATE_PROCEDURE', path: '/statements/1', message: "procedure 'a' is already declared on line 1", line: 3 },
    ]);
  });

  it('rejects dice with fewer than one die or two sides', async () => {
    const result = await compile({ source: 'roll 0d6\nroll 1d1' });
    expect(result.errors).toEqual([
      { code: 'INVALID_DICE', path: '/statements/0', message: "invalid dice '0d6': dice count must be an integer >= 1, got 0", line: 1 },
      { code: 'INVALID_DICE', path: '/statements/1', message: "invalid dice '1d1': dice sides must be an integer >= 2, got 1", line: 2 },
    ]);
  });

  it('rejects reversed ranges', async () => {
    const result = await compile({ source: 'roll 1d6\n    5-2 => reminder "x"\nend\n' });
    expect(result.errors).toEqual([
      {
        code: 'INVALID_RANGE',
        path: '/statements/0/arms/0',
        message: 'range 5-2 has min greater than max',
        hint: 'write it as 2-5',
        line: 2,
      },
    ]);
  });

  it('rejects placeholder and clause counts that differ', async () => {
    const result = await compile({ source: 'set-fact "a {} b {}" % roll 1d6' });
    expect(result.errors).toEqual([
      {
        code: 'FORMAT_ARITY_MISMATCH',
        path: '/statements/0/consequent/fact',
        message: 'format string has 2 placeholder(s) but 1 clause(s)',
        line: 1,
      },
    ]);
  });

  it('warns about unloaded tables and undeclared procedures', async () => {
    const result = await compile({ source: 'roll on table "t"\nghost\n' });
    expect(result.ok).toBe(true);
    expect(result.warnings).toEqual([
      {
        code: 'TABLE_NEVER_LOADED',
        path: '/statements/0/consequent',
        message: "table 't' is never loaded",
        hint: 'add: load table "t"',
        line: 1,
      },
      { code: 'UNDECLARED_PROCEDURE', path: '/statements/1', message: "procedure 'ghost' is never declared", line: 2 },
    ]);
  });

  it('turns warnings into errors in strict mode', async () => {
    const result = await compile({ source: 'roll on table "t"\nghost\n', options: { strict: true } });
    expect(result.ok).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual(['TABLE_NEVER_LOADED', 'UNDECLARED_PROCEDURE']);
    expect(result.warnings).toEqual([]);
  });

  it('warns about mutually recursive procedures', async () => {
    const result = await compile({
      source: 'procedure a\n    b\nend\nprocedure b\n    if fact? "x" => a\nend\n',
    });
    expect(result.ok).toBe(true);
    expect(result.warnings.map((w) => [w.code, w.path])).toEqual([
      ['RECURSIVE_PROCEDURE', '/procedures/a'],
      ['RECURSIVE_PROCEDURE', '/procedures/b'],
    ]);
  });
});
