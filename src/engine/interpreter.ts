import { ConsequentKind, NodeKind, type ConsequentNode, type LoadTableNode, type StatementNode } from './ast/nodes';
import { roll_dice } from './dice';
import { CollaboratorError, CrawlError, ResolutionError, describe_error } from './errors';
import { execute_effect, type InterpreterCtx } from './effects';
import { first_match } from './rolls';
import { evaluate_antecedent } from './runtime/evaluate';
import type { ConsequentRecord, StatementRecord, TableLoad } from '../types';

/**
 * Executes one statement. Any CrawlError escaping it is annotated with the
 * statement's line and the procedure trace at the point of failure.
 */
export function execute_statement(node: StatementNode, ctx: InterpreterCtx): StatementRecord {
  tick(node, ctx);
  try {
    return dispatch_statement(node, ctx);
  } catch (e) {
    if (e instanceof CrawlError) e.annotate({ line: node.line, procedure_trace: ctx.call_stack.trace() });
    throw e;
  }
}

function tick(node: StatementNode, ctx: InterpreterCtx): void {
  ctx.counters.steps += 1;
  const { max_steps } = ctx.limits;
  if (max_steps !== undefined && ctx.counters.steps > max_steps) {
    throw new ResolutionError('STEP_LIMIT_EXCEEDED', `step limit of ${max_steps} statements exceeded`, {
      line: node.line,
      procedure_trace: ctx.call_stack.trace(),
    });
  }
}

function dispatch_statement(node: StatementNode, ctx: InterpreterCtx): StatementRecord {
  switch (node.kind) {
    case NodeKind.ProcedureDecl:
      // registered before the run starts; nothing to do in program order
      return { kind: 'procedure_decl', name: node.name };
    case NodeKind.ProcedureCall:
      return call_procedure(node.name, node.line, ctx);
    case NodeKind.IfThen: {
      const outcome = evaluate_antecedent(node.antecedent, ctx);
      const consequent = outcome.holds ? execute_consequent(node.consequent, ctx) : null;
      return { kind: 'if_then', holds: outcome.holds, roll: outcome.roll?.total ?? null, consequent };
    }
    case NodeKind.MatchingRoll: {
      const roll = roll_dice(node.specifier, ctx.dice);
      const hit = first_match(node.arms, roll.total);
      const consequent = hit ? execute_consequent(hit.item.consequent, ctx) : null;
      return { kind: 'matching_roll', roll: roll.total, arm: hit?.index ?? null, consequent };
    }
    case NodeKind.Consequent:
      return execute_consequent(node.consequent, ctx);
    case NodeKind.LoadTable:
      return load_table(node, ctx);
    case NodeKind.Roll: {
      const roll = roll_dice(node.specifier, ctx.dice);
      ctx.emit({ kind: 'roll', expression: roll.expression, total: roll.total, line: node.line });
      return { kind: 'roll', expression: roll.expression, total: roll.total };
    }
    default: {
      const _exhaustive: never = node;
      throw new Error(`unknown statement ${JSON.stringify(_exhaustive)}`);
    }
  }
}

export function execute_consequent(node: ConsequentNode, ctx: InterpreterCtx): ConsequentRecord {
  if (node.kind === ConsequentKind.CallProcedure) return call_procedure(node.name, node.line, ctx);
  return execute_effect(node, ctx);
}

/** Runs a procedure body in order; the body sees and mutates the caller's facts. */
export function call_procedure(name: string, line: number | null, ctx: InterpreterCtx): ConsequentRecord {
  const proc = ctx.procedures.get(name);
  if (!proc) {
    throw new ResolutionError('PROCEDURE_NOT_FOUND', `procedure '${name}' is not declared`, {
      line: line ?? undefined,
      resource: name,
      procedure_trace: ctx.call_stack.trace(),
    });
  }
  ctx.call_stack.push({ procedure: name, line });
  ctx.logger.debug('enter procedure', { procedure: name, depth: ctx.call_stack.depth });
  const records: StatementRecord[] = [];
  try {
    for (const statement of proc.body) records.push(execute_statement(statement, ctx));
  } finally {
    ctx.call_stack.pop();
  }
  return { kind: 'procedure_call', name, records };
}

function load_table(node: LoadTableNode, ctx: InterpreterCtx): StatementRecord {
  const source = ctx.table_source;
  if (!source) {
    throw new CollaboratorError(
      'TABLE_SOURCE_FAILED',
      `cannot load table '${node.table}': no table source is configured`,
      { resource: node.table },
      new Error('no table source')
    );
  }
  let loaded: TableLoad;
  try {
    loaded = source.load(node.table);
  } catch (e) {
    if (e instanceof CrawlError) throw e;
    throw new CollaboratorError(
      'TABLE_SOURCE_FAILED',
      `failed to load table '${node.table}': ${describe_error(e)}`,
      { resource: node.table },
      e
    );
  }
  const table = ctx.tables.load(node.table, loaded.rows, { specifier: loaded.specifier });
  ctx.logger.debug('table loaded', { table: node.table, entries: table.entries.length });
  return { kind: 'load_table', table: node.table, entries: table.entries.length };
}
