import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { compile } from '../compiler';
import { run_program } from '../engine';
import { console_sink, csv_table_source, json_fact_storage } from '../adapters';
import type { ValidationIssue } from '../types';
import { configure_logger } from '../utils/logger.util';
import { random_die_source, seeded_die_source } from '../utils/rng.util';
import { config_from_cli, config_from_env, read_config_file, resolve_run_config, type CliRunOptions } from './config';

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export const console_io: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export type CliCheckOptions = {
  strict?: boolean;
  /** Write the compile output as JSON to this file. */
  out?: string;
};

/** Default persistent fact file, next to the script. */
export const DEFAULT_FACTS_FILE = '.crawl-facts.json';

/** Writes pretty JSON, creating parent directories; ends with a newline. */
export async function write_json_file(target: string, value: unknown, spaces = 2): Promise<string> {
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, `${JSON.stringify(value, null, spaces)}\n`, 'utf8');
  return target;
}

function format_issue(i: ValidationIssue): string {
  return `  - [${i.code}] ${i.line === undefined ? i.path : `line ${i.line}`} : ${i.message}`;
}

function report_failure(err: unknown, io: CliIo): void {
  if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
    const path = 'path' in err && typeof err.path === 'string' ? err.path : 'file';
    io.err(`❌ Not found: ${path}`);
  } else {
    io.err(`💥 Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** `crawl check`: exit code 0 when the script compiles. */
export async function check_command(script_path: string, opts: CliCheckOptions, io: CliIo = console_io): Promise<number> {
  try {
    const source = await readFile(resolve(script_path), 'utf8');
    const compiled = await compile({ source, options: { strict: opts.strict } });
    if (opts.out) await write_json_file(resolve(opts.out), compiled);
    for (const w of compiled.warnings) io.err(`⚠️ ${format_issue(w).trimStart()}`);
    if (!compiled.ok) {
      io.err(`❌ Compile failed with ${compiled.errors.length} error(s):`);
      for (const e of compiled.errors) io.err(format_issue(e));
      return 1;
    }
    io.out(`✅ ${script_path} OK (${compiled.program_id})`);
    return 0;
  } catch (err) {
    report_failure(err, io);
    return 1;
  }
}

/** `crawl run`: exit code 0 when the run finishes. */
export async function run_command(
  script_path: string,
  opts: CliRunOptions,
  io: CliIo = console_io,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    // config: defaults < --config file < CRAWL_* env < flags
    const script = resolve(script_path);
    const file = opts.config ? await read_config_file(resolve(opts.config)) : undefined;
    const config = resolve_run_config({ file, env: config_from_env(env), cli: config_from_cli(opts) });
    configure_logger({ level: config.log_level });

    // compile first; nothing runs when the script has errors
    const source = await readFile(script, 'utf8');
    const compiled = await compile({ source });
    if (!compiled.ok || !compiled.program) {
      io.err(`❌ Compile failed with ${compiled.errors.length} error(s):`);
      for (const e of compiled.errors) io.err(format_issue(e));
      return 1;
    }

    // tables and the facts file live beside the script unless configured otherwise
    const result = run_program({
      program: compiled.program,
      table_source: csv_table_source({ base_dir: config.tables_dir ? resolve(config.tables_dir) : dirname(script) }),
      fact_storage: json_fact_storage(
        config.facts_file ? resolve(config.facts_file) : join(dirname(script), DEFAULT_FACTS_FILE)
      ),
      sink: opts.json ? undefined : console_sink(io.out),
      dice: config.seed === undefined ? random_die_source() : seeded_die_source(config.seed),
      entry: config.entry,
      limits: config.limits,
    });

    // events were printed by the sink as they happened; facts come last
    if (opts.json) {
      io.out(JSON.stringify(result, null, 2));
    } else {
      for (const fact of result.facts.ephemeral) io.out(`• ${fact}`);
      for (const fact of result.facts.persistent) io.out(`★ ${fact}`);
    }
    if (!result.ok && result.error) {
      const line = result.error.details?.line;
      const where = line === undefined ? '' : ` (line ${line})`;
      io.err(`❌ ${result.error.code}${where}: ${result.error.message}`);
      return 1;
    }
    return 0;
  } catch (err) {
    report_failure(err, io);
    return 1;
  }
}
