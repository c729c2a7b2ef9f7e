import { issue } from '../schema';
import type { ValidationIssue } from '../types';
import {
  AntecedentKind,
  ClauseKind,
  ConsequentKind,
  NodeKind,
  PLACEHOLDER,
  type ConsequentNode,
  type FormatString,
  type ProcedureDeclNode,
  type Program,
  type StatementNode,
} from './ast/nodes';
import { format_specifier, specifier_issue, type RollSpecifier } from './dice';
import type { RollTarget } from './rolls';

export function count_placeholders(literal: string): number {
  return literal.split(PLACEHOLDER).length - 1;
}

/**
 * Static checks run after parsing and before anything executes.
 *
 * errors: DUPLICATE_PROCEDURE, INVALID_DICE, INVALID_RANGE, FORMAT_ARITY_MISMATCH
 * warnings: UNDECLARED_PROCEDURE, TABLE_NEVER_LOADED, RECURSIVE_PROCEDURE
 */
export function validate_program(program: Program): { errors: ValidationIssue[]; warnings: ValidationIssue[] } {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  // first pass: top-level declarations and loaded tables, so later checks see forward references
  const declared = new Map<string, ProcedureDeclNode>();
  const loaded = new Set<string>();
  program.statements.forEach((s, i) => {
    if (s.kind === NodeKind.LoadTable) loaded.add(s.table);
    if (s.kind !== NodeKind.ProcedureDecl) return;
    const first = declared.get(s.name);
    // the first declaration stays registered; later ones are errors
    if (first) {
      errors.push(issue(
        'DUPLICATE_PROCEDURE',
        `/statements/${i}`,
        `procedure '${s.name}' is already declared on line ${first.line}`,
        undefined,
        s.line
      ));
      return;
    }
    declared.set(s.name, s);
  });

  // per-node checks; errors block the compile, warnings do not
  const check_specifier = (spec: RollSpecifier, path: string, line: number) => {
    const problem = specifier_issue(spec);
    if (problem) errors.push(issue('INVALID_DICE', path, `invalid dice '${format_specifier(spec)}': ${problem}`, undefined, line));
  };

  const check_target = (target: RollTarget, path: string, line: number) => {
    if (target.kind === 'range' && target.min > target.max) {
      errors.push(issue(
        'INVALID_RANGE',
        path,
        `range ${target.min}-${target.max} has min greater than max`,
        `write it as ${target.max}-${target.min}`,
        line
      ));
    }
  };

  const check_call = (name: string, path: string, line: number) => {
    if (!declared.has(name)) {
      warnings.push(issue('UNDECLARED_PROCEDURE', path, `procedure '${name}' is never declared`, undefined, line));
    }
  };

  const check_table = (table: string, path: string, line: number) => {
    if (!loaded.has(table)) {
      warnings.push(issue(
        'TABLE_NEVER_LOADED',
        path,
        `table '${table}' is never loaded`,
        `add: load table "${table}"`,
        line
      ));
    }
  };

  const check_format = (fs: FormatString, path: string, line: number) => {
    const holes = count_placeholders(fs.literal);
    if (holes !== fs.clauses.length) {
      errors.push(issue(
        'FORMAT_ARITY_MISMATCH',
        path,
        `format string has ${holes} placeholder(s) but ${fs.clauses.length} clause(s)`,
        undefined,
        line
      ));
    }
    fs.clauses.forEach((clause, i) => {
      const clause_path = `${path}/clauses/${i}`;
      if (clause.specifier) check_specifier(clause.specifier, clause_path, line);
      if (clause.kind === ClauseKind.TableRoll) check_table(clause.table, clause_path, line);
    });
  };

  const visit_consequent = (node: ConsequentNode, path: string) => {
    switch (node.kind) {
      case ConsequentKind.SetFact:
      case ConsequentKind.SetPersistentFact:
        check_format(node.fact, `${path}/fact`, node.line);
        break;
      case ConsequentKind.TableRoll:
        if (node.specifier) check_specifier(node.specifier, path, node.line);
        check_table(node.table, path, node.line);
        break;
      case ConsequentKind.CallProcedure:
        check_call(node.name, path, node.line);
        break;
      default:
        break;
    }
  };

  // second pass: walk every statement, procedure bodies included
  const visit = (node: StatementNode, path: string): void => {
    switch (node.kind) {
      case NodeKind.ProcedureDecl:
        node.body.forEach((s, j) => visit(s, `${path}/body/${j}`));
        break;
      case NodeKind.ProcedureCall:
        check_call(node.name, path, node.line);
        break;
      case NodeKind.IfThen:
        if (node.antecedent.kind === AntecedentKind.DiceRollCheck) {
          check_specifier(node.antecedent.specifier, `${path}/antecedent`, node.line);
          check_target(node.antecedent.target, `${path}/antecedent`, node.line);
        }
        visit_consequent(node.consequent, `${path}/consequent`);
        break;
      case NodeKind.MatchingRoll:
        check_specifier(node.specifier, path, node.line);
        node.arms.forEach((arm, j) => {
          check_target(arm.target, `${path}/arms/${j}`, arm.line);
          visit_consequent(arm.consequent, `${path}/arms/${j}/consequent`);
        });
        break;
      case NodeKind.Consequent:
        visit_consequent(node.consequent, `${path}/consequent`);
        break;
      case NodeKind.Roll:
        check_specifier(node.specifier, path, node.line);
        break;
      case NodeKind.LoadTable:
        break;
    }
  };
  program.statements.forEach((s, i) => visit(s, `/statements/${i}`));

  // call cycles only warn; the call depth limit bounds them at run time
  for (const name of find_recursive_procedures(declared)) {
    const proc = declared.get(name);
    warnings.push(issue(
      'RECURSIVE_PROCEDURE',
      `/procedures/${name}`,
      `procedure '${name}' can call itself; runs stop at the call depth limit`,
      undefined,
      proc?.line
    ));
  }

  return { errors, warnings };
}

function callees_of(body: readonly StatementNode[], out: Set<string>): Set<string> {
  const from_consequent = (node: ConsequentNode) => {
    if (node.kind === ConsequentKind.CallProcedure) out.add(node.name);
  };
  for (const s of body) {
    switch (s.kind) {
      case NodeKind.ProcedureCall:
        out.add(s.name);
        break;
      case NodeKind.IfThen:
      case NodeKind.Consequent:
        from_consequent(s.consequent);
        break;
      case NodeKind.MatchingRoll:
        s.arms.forEach((arm) => from_consequent(arm.consequent));
        break;
      default:
        break;
    }
  }
  return out;
}

/** Procedures that can reach themselves through declared calls, in declaration order. */
export function find_recursive_procedures(declared: ReadonlyMap<string, ProcedureDeclNode>): string[] {
  const graph = new Map<string, Set<string>>();
  for (const [name, proc] of declared) graph.set(name, callees_of(proc.body, new Set()));

  const reaches_self = (start: string): boolean => {
    const seen = new Set<string>();
    const stack = [...(graph.get(start) ?? [])];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || seen.has(next)) continue;
      if (next === start) return true;
      seen.add(next);
      stack.push(...(graph.get(next) ?? []));
    }
    return false;
  };

  return [...declared.keys()].filter(reaches_self);
}
