import { compile } from '../compiler';
import { DEFAULT_RUN_LIMITS } from '../schema';
import type { OutputEvent, ResolvedRunLimits, RunInput, RunLimits, RunOutput, RunStatus, StatementRecord, TableSource, FactStorage, OutputSink } from '../types';
import { random_die_source, type DieSource } from '../utils/rng.util';
import { logger as root_logger, type Logger } from '../utils/logger.util';
import { NodeKind, type ProcedureDeclNode } from './ast/nodes';
import { CollaboratorError, CrawlError, describe_error, type EngineError } from './errors';
import type { InterpreterCtx } from './effects';
import { FactStore } from './facts';
import { call_procedure, execute_statement } from './interpreter';
import { CallStack } from './runtime/call_stack';
import { TableRegistry } from './tables';

/** Call depth falls back to the default; the step budget only exists when the caller sets one. */
export function resolve_limits(limits?: RunLimits): ResolvedRunLimits {
  const resolved: ResolvedRunLimits = { max_call_depth: limits?.max_call_depth ?? DEFAULT_RUN_LIMITS.max_call_depth };
  if (limits?.max_steps !== undefined) resolved.max_steps = limits.max_steps;
  return resolved;
}

/**
 * run_program()
 * -------------
 * start → executing → done | failed.
 *
 * Procedures are registered up front, then top-level statements run in order
 * (or, with `entry`, the top-level `load table` statements followed by a call
 * to the entry procedure). The first CrawlError stops the run; facts set
 * before it are kept and reported. Anything else (a broken die source) throws.
 */
export function run_program(input: RunInput): RunOutput {
  const t0 = Date.now();
  const log = (input.logger ?? root_logger).child({ program: input.program.program_id.slice(0, 15) });
  const events: OutputEvent[] = [];
  const records: StatementRecord[] = [];
  const counters = { steps: 0 };
  let status: RunStatus = 'start';
  let facts = new FactStore();

  const transition = (next: RunStatus) => {
    log.debug(`run ${status} -> ${next}`);
    status = next;
  };

  const finish = (error?: EngineError): RunOutput => {
    const out: RunOutput = {
      ok: error === undefined,
      status: error === undefined ? 'done' : 'failed',
      facts: facts.snapshot(),
      events,
      records,
      steps: counters.steps,
      time_ms: Date.now() - t0,
    };
    if (error) out.error = error;
    return out;
  };

  try {
    // persistent facts come from storage before anything runs
    facts = FactStore.open(input.fact_storage);
    const limits = resolve_limits(input.limits);
    const ctx: InterpreterCtx = {
      procedures: register_procedures(input.program.procedures_index),
      facts,
      tables: new TableRegistry(),
      table_source: input.table_source,
      dice: input.dice ?? random_die_source(),
      call_stack: new CallStack(limits.max_call_depth),
      limits,
      counters,
      emit: create_emitter(events, input.sink),
      logger: log,
    };

    transition('executing');
    // whole program in textual order, or loads then the entry procedure
    if (input.entry === undefined) {
      for (const statement of input.program.statements) records.push(execute_statement(statement, ctx));
    } else {
      for (const statement of input.program.statements) {
        if (statement.kind === NodeKind.LoadTable) records.push(execute_statement(statement, ctx));
      }
      records.push(call_procedure(input.entry, null, ctx));
    }
    transition('done');
    log.info('run finished', { steps: counters.steps, events: events.length });
    return finish();
  } catch (e) {
    // script-level failures become a failed run; anything else propagates
    if (!(e instanceof CrawlError)) throw e;
    transition('failed');
    log.warn('run failed', { code: e.code, line: e.details.line });
    return finish(e.to_engine_error());
  }
}

function register_procedures(index: Record<string, ProcedureDeclNode>): ReadonlyMap<string, ProcedureDeclNode> {
  return new Map(Object.entries(index));
}

function create_emitter(events: OutputEvent[], sink?: OutputSink): (event: OutputEvent) => void {
  return (event) => {
    try {
      sink?.emit(event);
    } catch (e) {
      throw new CollaboratorError('OUTPUT_SINK_FAILED', `output sink failed: ${describe_error(e)}`, { line: event.line }, e);
    }
    // only delivered events are reported
    events.push(event);
  };
}

export interface RunScriptOptions {
  table_source?: TableSource;
  fact_storage?: FactStorage;
  sink?: OutputSink;
  dice?: DieSource;
  entry?: string;
  limits?: RunLimits;
  logger?: Logger;
  strict?: boolean;
}

/** compile() then run_program(); a failed compile becomes a failed run with no steps. */
export async function run_script(source: string, options: RunScriptOptions = {}): Promise<RunOutput> {
  const t0 = Date.now();
  const { strict, ...run } = options;
  const compiled = await compile({ source, options: { strict } });
  if (!compiled.ok || !compiled.program) {
    const first = compiled.errors[0];
    return {
      ok: false,
      status: 'failed',
      facts: { ephemeral: [], persistent: [] },
      events: [],
      records: [],
      steps: 0,
      error: {
        code: first?.code ?? 'SYNTAX_ERROR',
        category: first?.code === 'SYNTAX_ERROR' ? 'syntax' : 'definition',
        message: first?.message ?? 'compile failed',
        details: { line: first?.line, issues: compiled.errors },
      },
      time_ms: Date.now() - t0,
    };
  }
  return run_program({ ...run, program: compiled.program });
}

export { FactStore } from './facts';
export type { Persistence, FactsSnapshot } from './facts';
export { TableRegistry } from './tables';
export type { Table, TableRow, TableSample } from './tables';
export { roll_dice, parse_specifier, format_specifier, create_specifier, specifier_bounds } from './dice';
export type { RollSpecifier, DiceRoll } from './dice';
export { first_match, target_contains, parse_roll_target, format_target } from './rolls';
export type { RollTarget } from './rolls';
export * from './errors';
