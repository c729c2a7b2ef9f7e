import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { check_command, run_command, type CliIo } from './commands';
import { reset_logger } from '../utils/logger.util';

function capture(): CliIo & { lines: { out: string[]; err: string[] } } {
  const lines = { out: [] as string[], err: [] as string[] };
  return { out: (l) => lines.out.push(l), err: (l) => lines.err.push(l), lines };
}

function workspace(files: Record<string, string>): string {
  const dir = mkdtempSync(join(tmpdir(), 'crawl-cli-'));
  for (const [name, text] of Object.entries(files)) writeFileSync(join(dir, name), text);
  return dir;
}

afterEach(() => reset_logger());

const SCRIPT = 'load table "w.csv"\nroll on table "w.csv"\nset-persistent-fact "visited"\nreminder "done"\n';

describe('run_command', () => {
  it('prints events and facts and stores persistent facts beside the script', async () => {
    const dir = workspace({ 'day.crawl': SCRIPT, 'w.csv': '1-6,Sunny\n' });
    const io = capture();
    const code = await run_command(join(dir, 'day.crawl'), { seed: '1' }, io, {});
    expect(code).toBe(0);
    expect(io.lines.err).toEqual([]);
    expect(io.lines.out).toHaveLength(3);
    expect(io.lines.out[0]).toMatch(/^🎲 w\.csv \([1-6]\): Sunny$/);
    expect(io.lines.out.slice(1)).toEqual(['📌 done', '★ visited']);
    expect(JSON.parse(readFileSync(join(dir, '.crawl-facts.json'), 'utf8'))).toEqual({ version: 1, facts: ['visited'] });
  });

  it('prints the run result as JSON', async () => {
    const dir = workspace({ 'day.crawl': SCRIPT, 'w.csv': '1-6,Sunny\n' });
    const io = capture();
    const code = await run_command(join(dir, 'day.crawl'), { json: true, facts: join(dir, 'f.json') }, io, {});
    expect(code).toBe(0);
    const result = JSON.parse(io.lines.out[0]);
    expect(result.ok).toBe(true);
    expect(result.facts).toEqual({ ephemeral: [], persistent: ['visited'] });
  });

  it('reports compile errors', async () => {
    const dir = workspace({ 'bad.crawl': 'reminder "x' });
    const io = capture();
    expect(await run_command(join(dir, 'bad.crawl'), {}, io, {})).toBe(1);
    expect(io.lines.err).toEqual([
      '❌ Compile failed with 1 error(s):',
      '  - [SYNTAX_ERROR] line 1 : unterminated string literal (line 1, column 10)',
    ]);
  });

  it('reports run failures with their line', async () => {
    const dir = workspace({ 'ghost.crawl': 'ghost\n' });
    const io = capture();
    expect(await run_command(join(dir, 'ghost.crawl'), {}, io, {})).toBe(1);
    expect(io.lines.err).toEqual(["❌ PROCEDURE_NOT_FOUND (line 1): procedure 'ghost' is not declared"]);
  });

  it('reports a missing script', async () => {
    const dir = workspace({});
    const io = capture();
    const path = join(dir, 'missing.crawl');
    expect(await run_command(path, {}, io, {})).toBe(1);
    expect(io.lines.err).toEqual([`❌ Not found: ${path}`]);
  });

  it('reports invalid configuration', async () => {
    const dir = workspace({ 'day.crawl': 'reminder "x"\n' });
    const io = capture();
    expect(await run_command(join(dir, 'day.crawl'), {}, io, { CRAWL_MAX_STEPS: '0' })).toBe(1);
    expect(io.lines.err[0]).toMatch(/^💥 Unexpected error: invalid configuration: limits\.max_steps: /);
  });
});

describe('check_command', () => {
  it('accepts a valid script', async () => {
    const dir = workspace({ 'ok.crawl': 'reminder "x"\n' });
    const io = capture();
    expect(await check_command(join(dir, 'ok.crawl'), {}, io)).toBe(0);
    expect(io.lines.out[0]).toMatch(/OK \(sha256:[0-9a-f]{64}\)$/);
  });

  it('prints warnings and fails on them in strict mode', async () => {
    const dir = workspace({ 'warn.crawl': 'ghost\n' });
    const io = capture();
    expect(await check_command(join(dir, 'warn.crawl'), { strict: true }, io)).toBe(1);
    expect(io.lines.err).toEqual([
      '❌ Compile failed with 1 error(s):',
      "  - [UNDECLARED_PROCEDURE] line 1 : procedure 'ghost' is never declared",
    ]);

    const lenient = capture();
    expect(await check_command(join(dir, 'warn.crawl'), {}, lenient)).toBe(0);
    expect(lenient.lines.err).toEqual(["⚠️ - [UNDECLARED_PROCEDURE] line 1 : procedure 'ghost' is never declared"]);
  });

  it('writes the compile output when asked', async () => {
    const dir = workspace({ 'ok.crawl': 'reminder "x"\n' });
    const out = join(dir, 'out', 'compile.json');
    expect(await check_command(join(dir, 'ok.crawl'), { out }, capture())).toBe(0);
    const written = JSON.parse(readFileSync(out, 'utf8'));
    expect(written.ok).toBe(true);
    expect(written.program.statements).toHaveLength(1);
  });
});
