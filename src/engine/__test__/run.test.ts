import { describe, it, expect } from 'vitest';
import { compile } from '../../compiler';
import { run_program, run_script } from '../index';
import { collecting_sink, memory_fact_storage, memory_table_source } from '../../adapters/memory';
import { create_specifier } from '../dice';
import { range_target, value_target } from '../rolls';
import { sequence_die_source } from '../../utils/rng.util';
import type { CompiledProgram } from '../ast/nodes';
import type { RunInput } from '../../types';

async function compiled(source: string): Promise<CompiledProgram> {
  const out = await compile({ source });
  if (!out.program) throw new Error(out.errors.map((e) => e.message).join('\n'));
  return out.program;
}

async function run(source: string, faces: number[], extra: Partial<Omit<RunInput, 'program'>> = {}) {
  return run_program({ program: await compiled(source), dice: sequence_die_source(faces), ...extra });
}

const DAY = [
  'procedure day',
  '    if roll 1-3 on 1d6 => set-fact "party is lost"',
  '    if roll 1-3 on 1d6 => set-fact "day has random encounter"',
  '    if fact? "day has random encounter" => encounter',
  'end',
  'procedure encounter',
  '    reminder "an encounter happens"',
  'end',
  'day',
].join('\n');

const ONE_ROW_TABLE = {
  t: { rows: [{ target: value_target(1), text: 'one' }], specifier: create_specifier(1, 6) },
};

describe('run_program', () => {
  it('runs the day procedure without an encounter', async () => {
    const result = await run(DAY, [2, 5]);
    expect(result.ok).toBe(true);
    expect(result.status).toBe('done');
    expect(result.facts).toEqual({ ephemeral: ['party is lost'], persistent: [] });
    expect(result.events).toEqual([]);
    expect(result.steps).toBe(6);
    expect(result.records).toEqual([
      { kind: 'procedure_decl', name: 'day' },
      { kind: 'procedure_decl', name: 'encounter' },
      {
        kind: 'procedure_call',
        name: 'day',
        records: [
          { kind: 'if_then', holds: true, roll: 2, consequent: { kind: 'set_fact', fact: 'party is lost', persistence: 'ephemeral' } },
          { kind: 'if_then', holds: false, roll: 5, consequent: null },
          { kind: 'if_then', holds: false, roll: null, consequent: null },
        ],
      },
    ]);
  });

  it('calls the encounter procedure when its fact is set', async () => {
    const sink = collecting_sink();
    const result = await run(DAY, [1, 3], { sink });
    expect(result.facts.ephemeral).toEqual(['day has random encounter', 'party is lost']);
    expect(result.events).toEqual([{ kind: 'reminder', text: 'an encounter happens', line: 7 }]);
    expect(sink.events).toEqual(result.events);
  });

  it('interpolates dice totals into facts', async () => {
    const result = await run('set-fact "encounter distance {}" % roll 1d6', [4]);
    expect(result.facts.ephemeral).toEqual(['encounter distance 4']);
  });

  it('takes the first matching arm of a roll block', async () => {
    const source = 'roll 1d6\n    1-4 => set-fact "low"\n    3-6 => set-fact "high"\nend\n';
    const result = await run(source, [3]);
    expect(result.facts.ephemeral).toEqual(['low']);
    expect(result.records).toEqual([
      { kind: 'matching_roll', roll: 3, arm: 0, consequent: { kind: 'set_fact', fact: 'low', persistence: 'ephemeral' } },
    ]);
  });

  it('does nothing when no arm matches', async () => {
    const result = await run('roll 1d6\n    1-2 => set-fact "low"\nend\n', [6]);
    expect(result.ok).toBe(true);
    expect(result.facts.ephemeral).toEqual([]);
    expect(result.records).toEqual([{ kind: 'matching_roll', roll: 6, arm: null, consequent: null }]);
  });

  it('emits table rolls and skips wasted ones', async () => {
    const source = 'load table "t"\nroll on table "t"\nroll on table "t"\n';
    const result = await run(source, [1, 4], { table_source: memory_table_source(ONE_ROW_TABLE) });
    expect(result.events).toEqual([{ kind: 'table_roll', table: 't', roll: 1, text: 'one', line: 2 }]);
    expect(result.records.slice(1)).toEqual([
      { kind: 'table_roll', table: 't', roll: 1, text: 'one' },
      { kind: 'table_roll', table: 't', roll: 4, text: null },
    ]);
  });

  it('skips set-fact when a table clause is wasted', async () => {
    const source = 'load table "t"\nset-fact "got {}" % roll on table "t"\nset-fact "got {}" % roll on table "t"\n';
    const result = await run(source, [4, 1], { table_source: memory_table_source(ONE_ROW_TABLE) });
    expect(result.facts.ephemeral).toEqual(['got one']);
    expect(result.records[1]).toEqual({ kind: 'set_fact', fact: null, persistence: 'ephemeral' });
  });

  it('reports a bare roll as an event', async () => {
    const result = await run('roll 2d6+1', [2, 3]);
    expect(result.events).toEqual([{ kind: 'roll', expression: '2d6+1', total: 6, line: 1 }]);
  });

  it('mutates persistent facts through storage', async () => {
    const storage = memory_fact_storage(['seen map']);
    const source = [
      'if persistent-fact? "seen map" => set-persistent-fact "knows shortcut"',
      'clear-persistent-fact "seen map"',
      'swap-fact "torch lit"',
      'swap-fact "torch lit"',
      'swap-persistent-fact "cursed"',
    ].join('\n');
    const result = await run(source, [], { fact_storage: storage });
    expect(result.facts).toEqual({ ephemeral: [], persistent: ['cursed', 'knows shortcut'] });
    expect(storage.writes).toEqual([
      { name: 'knows shortcut', present: true },
      { name: 'seen map', present: false },
      { name: 'cursed', present: true },
    ]);
    expect(storage.snapshot()).toEqual(['cursed', 'knows shortcut']);
  });

  it('stops at a missing table and keeps earlier facts', async () => {
    const source = 'set-fact "before"\nroll on table "weather"\nset-fact "after"\n';
    const result = await run(source, [], { table_source: memory_table_source({}) });
    expect(result.ok).toBe(false);
    expect(result.status).toBe('failed');
    expect(result.facts.ephemeral).toEqual(['before']);
    expect(result.steps).toBe(2);
    expect(result.error).toEqual({
      code: 'TABLE_NOT_FOUND',
      category: 'resolution',
      message: "table 'weather' has not been loaded",
      details: { resource: 'weather', line: 2, procedure_trace: [] },
    });
  });

  it('wraps table source failures', async () => {
    const result = await run('load table "nope"\nreminder "x"\n', [], { table_source: memory_table_source({}) });
    expect(result.events).toEqual([]);
    expect(result.error).toEqual({
      code: 'TABLE_SOURCE_FAILED',
      category: 'collaborator',
      message: "failed to load table 'nope': no such table: nope",
      details: { resource: 'nope', cause: 'no such table: nope', line: 1, procedure_trace: [] },
    });
  });

  it('fails load table when no source is configured', async () => {
    const result = await run('load table "x"', []);
    expect(result.error?.code).toBe('TABLE_SOURCE_FAILED');
    expect(result.error?.message).toBe("cannot load table 'x': no table source is configured");
  });

  it('fails on undeclared procedures inside a procedure with its trace', async () => {
    const result = await run('procedure a\n    ghost\nend\na\n', []);
    expect(result.error).toEqual({
      code: 'PROCEDURE_NOT_FOUND',
      category: 'resolution',
      message: "procedure 'ghost' is not declared",
      details: { line: 2, resource: 'ghost', procedure_trace: ['a'] },
    });
  });

  it('enforces the call depth limit', async () => {
    const result = await run('procedure loop\n    loop\nend\nloop\n', [], { limits: { max_call_depth: 5 } });
    expect(result.error?.code).toBe('CALL_DEPTH_EXCEEDED');
    expect(result.error?.message).toBe("call depth limit of 5 exceeded calling 'loop'");
    expect(result.error?.details?.procedure_trace).toEqual(['loop', 'loop', 'loop', 'loop', 'loop']);
  });

  it('enforces the step limit', async () => {
    const result = await run('procedure loop\n    loop\nend\nloop\n', [], { limits: { max_call_depth: 1000, max_steps: 10 } });
    expect(result.error?.code).toBe('STEP_LIMIT_EXCEEDED');
    expect(result.error?.message).toBe('step limit of 10 statements exceeded');
  });

  it('has no step budget unless one is given', async () => {
    const body = Array.from({ length: 100 }, (_, i) => `    reminder "r${i}"`);
    const calls = Array.from({ length: 101 }, () => 'chatter');
    const source = ['procedure chatter', ...body, 'end', ...calls, ''].join('\n');
    const result = await run(source, []);
    expect(result.ok).toBe(true);
    expect(result.status).toBe('done');
    expect(result.events).toHaveLength(10100);
    // declaration + 101 calls of 1 call step and 100 body steps
    expect(result.steps).toBe(1 + 101 * 101);
  });

  it('stops when fact storage fails', async () => {
    const storage = {
      load_all: () => [],
      persist: () => {
        throw new Error('read-only');
      },
    };
    const result = await run('set-fact "a"\nset-persistent-fact "b"\nset-fact "c"\n', [], { fact_storage: storage });
    expect(result.error?.code).toBe('FACT_STORAGE_FAILED');
    expect(result.error?.details?.line).toBe(2);
    expect(result.facts).toEqual({ ephemeral: ['a'], persistent: [] });
  });

  it('stops when the output sink fails', async () => {
    const sink = {
      emit: () => {
        throw new Error('closed');
      },
    };
    const result = await run('reminder "x"\nset-fact "after"\n', [], { sink });
    expect(result.error?.code).toBe('OUTPUT_SINK_FAILED');
    expect(result.error?.details?.line).toBe(1);
    expect(result.events).toEqual([]);
    expect(result.facts.ephemeral).toEqual([]);
  });

  it('runs only load statements and the entry procedure', async () => {
    const source = 'load table "t"\nreminder "top"\nprocedure main\n    reminder "main"\nend\n';
    const result = await run(source, [], { table_source: memory_table_source(ONE_ROW_TABLE), entry: 'main' });
    expect(result.events).toEqual([{ kind: 'reminder', text: 'main', line: 4 }]);
    expect(result.records).toEqual([
      { kind: 'load_table', table: 't', entries: 1 },
      { kind: 'procedure_call', name: 'main', records: [{ kind: 'reminder', text: 'main' }] },
    ]);
  });

  it('fails when the entry procedure is missing', async () => {
    const result = await run('reminder "top"', [], { entry: 'main' });
    expect(result.error?.code).toBe('PROCEDURE_NOT_FOUND');
    expect(result.events).toEqual([]);
  });

  it('lets a broken die source throw', async () => {
    await expect(run('roll 1d6', [])).rejects.toThrow('die sequence exhausted after 0 roll(s)');
  });

  it('accepts tables given as bare rows', async () => {
    const tables = memory_table_source({ w: [{ target: range_target(1, 6), text: 'sun' }] });
    const result = await run('load table "w"\nroll on table "w"', [6], { table_source: tables });
    expect(result.events).toEqual([{ kind: 'table_roll', table: 'w', roll: 6, text: 'sun', line: 2 }]);
  });
});

describe('run_script', () => {
  it('compiles and runs', async () => {
    const result = await run_script('set-fact "hello"', { dice: sequence_die_source([]) });
    expect(result.ok).toBe(true);
    expect(result.facts.ephemeral).toEqual(['hello']);
  });

  it('turns a compile failure into a failed run', async () => {
    const result = await run_script('reminder "x');
    expect(result.ok).toBe(false);
    expect(result.steps).toBe(0);
    expect(result.error).toMatchObject({
      code: 'SYNTAX_ERROR',
      category: 'syntax',
      message: 'unterminated string literal (line 1, column 10)',
      details: { line: 1 },
    });
  });

  it('honours strict mode', async () => {
    const result = await run_script('ghost', { strict: true });
    expect(result.error).toMatchObject({ code: 'UNDECLARED_PROCEDURE', category: 'definition' });
  });
});
