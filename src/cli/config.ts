import { readFile } from 'node:fs/promises';
import { parse_run_config, type RunConfigType } from '../schema';

/** Flags of `crawl run` as commander hands them over. */
export type CliRunOptions = {
  procedure?: string;
  seed?: string;
  tables?: string;
  facts?: string;
  maxDepth?: string;
  maxSteps?: string;
  config?: string;
  logLevel?: string;
  json?: boolean;
};

type Layer = Record<string, unknown>;

function is_record(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function to_number(v: string | undefined): number | undefined {
  return v === undefined || v.trim() === '' ? undefined : Number(v);
}

/** Later layers win; nested objects merge; undefined never overrides. */
export function merge_layers(layers: readonly Layer[]): Layer {
  const out: Layer = {};
  for (const layer of layers) {
    for (const [k, v] of Object.entries(layer)) {
      if (v === undefined) continue;
      const prev = out[k];
      out[k] = is_record(prev) && is_record(v) ? merge_layers([prev, v]) : v;
    }
  }
  return out;
}

export function config_from_env(env: NodeJS.ProcessEnv): Layer {
  return {
    log_level: env.CRAWL_LOG_LEVEL || undefined,
    seed: to_number(env.CRAWL_SEED),
    facts_file: env.CRAWL_FACTS_FILE || undefined,
    tables_dir: env.CRAWL_TABLES_DIR || undefined,
    limits: {
      max_call_depth: to_number(env.CRAWL_MAX_CALL_DEPTH),
      max_steps: to_number(env.CRAWL_MAX_STEPS),
    },
  };
}

export function config_from_cli(opts: CliRunOptions): Layer {
  return {
    entry: opts.procedure,
    seed: to_number(opts.seed),
    tables_dir: opts.tables,
    facts_file: opts.facts,
    log_level: opts.logLevel,
    limits: {
      max_call_depth: to_number(opts.maxDepth),
      max_steps: to_number(opts.maxSteps),
    },
  };
}

/** defaults < config file < environment < flags */
export function resolve_run_config(layers: { file?: unknown; env?: Layer; cli?: Layer }): RunConfigType {
  if (layers.file !== undefined && !is_record(layers.file)) {
    throw new Error('invalid configuration: the config file must contain a JSON object');
  }
  const merged = merge_layers([layers.file ?? {}, layers.env ?? {}, layers.cli ?? {}]);
  const parsed = parse_run_config(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`invalid configuration: ${detail}`);
  }
  return parsed.data;
}

export async function read_config_file(path: string): Promise<unknown> {
  const text = await readFile(path, 'utf8');
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new Error(`invalid JSON in ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
}
