import type { RollSpecifier } from '../dice';
import type { Persistence } from '../facts';
import type { RollTarget } from '../rolls';

/**
 * Statement node kinds.
 */
export enum NodeKind {
  ProcedureDecl = "procedure_decl",
  ProcedureCall = "procedure_call",
  IfThen = "if_then",
  MatchingRoll = "matching_roll",
  Consequent = "consequent",
  LoadTable = "load_table",
  Roll = "roll",
}

export enum AntecedentKind {
  DiceRollCheck = "dice_roll_check",
  FactCheck = "fact_check",
}

export enum ConsequentKind {
  SetFact = "set_fact",
  SetPersistentFact = "set_persistent_fact",
  ClearFact = "clear_fact",
  ClearPersistentFact = "clear_persistent_fact",
  SwapFact = "swap_fact",
  SwapPersistentFact = "swap_persistent_fact",
  TableRoll = "table_roll",
  Reminder = "reminder",
  CallProcedure = "call_procedure",
}

export enum ClauseKind {
  DiceRoll = "dice_roll",
  TableRoll = "table_roll",
}

/** Marks where each interpolation clause lands in a format string literal. */
export const PLACEHOLDER = "{}";

/**
 * Every node remembers the 1-based source line it starts on.
 */
export interface BaseNode { line: number }

/* ---------- format strings ---------- */

export type FormatClause =
  | { kind: ClauseKind.DiceRoll; specifier: RollSpecifier }
  | { kind: ClauseKind.TableRoll; table: string; specifier?: RollSpecifier };

/**
 * `"text {} more {}" % roll 1d6 % roll on table "x"`:
 * one clause per placeholder, resolved left to right.
 */
export interface FormatString {
  literal: string;
  clauses: FormatClause[];
}

/* ---------- antecedents ---------- */

/** `roll <target> on <specifier>` */
export interface DiceRollCheckNode extends BaseNode {
  kind: AntecedentKind.DiceRollCheck;
  target: RollTarget;
  specifier: RollSpecifier;
}

/** `fact? "x"` / `persistent-fact? "x"` */
export interface FactCheckNode extends BaseNode {
  kind: AntecedentKind.FactCheck;
  name: string;
  persistence: Persistence;
}

export type AntecedentNode = DiceRollCheckNode | FactCheckNode;

/* ---------- consequents ---------- */

export interface SetFactNode extends BaseNode {
  kind: ConsequentKind.SetFact | ConsequentKind.SetPersistentFact;
  fact: FormatString;
}

export interface ClearFactNode extends BaseNode {
  kind: ConsequentKind.ClearFact | ConsequentKind.ClearPersistentFact;
  fact: string;
}

/** Toggles presence of one fact. */
export interface SwapFactNode extends BaseNode {
  kind: ConsequentKind.SwapFact | ConsequentKind.SwapPersistentFact;
  fact: string;
}

export interface TableRollNode extends BaseNode {
  kind: ConsequentKind.TableRoll;
  table: string;
  /** Overrides the table's own die. */
  specifier?: RollSpecifier;
}

export interface ReminderNode extends BaseNode {
  kind: ConsequentKind.Reminder;
  text: string;
}

export interface CallProcedureNode extends BaseNode {
  kind: ConsequentKind.CallProcedure;
  name: string;
}

export type ConsequentNode =
  | SetFactNode
  | ClearFactNode
  | SwapFactNode
  | TableRollNode
  | ReminderNode
  | CallProcedureNode;

/** Consequents that run through an effect executor (everything but procedure calls). */
export type EffectNode = Exclude<ConsequentNode, CallProcedureNode>;

/* ---------- statements ---------- */

export interface ProcedureDeclNode extends BaseNode {
  kind: NodeKind.ProcedureDecl;
  name: string;
  body: StatementNode[];
}

/** A bare identifier line. */
export interface ProcedureCallNode extends BaseNode {
  kind: NodeKind.ProcedureCall;
  name: string;
}

export interface IfThenNode extends BaseNode {
  kind: NodeKind.IfThen;
  antecedent: AntecedentNode;
  consequent: ConsequentNode;
}

export interface MatchingArm extends BaseNode {
  target: RollTarget;
  consequent: ConsequentNode;
}

/** `roll 2d6` followed by an indented list of `target => consequent` arms. */
export interface MatchingRollNode extends BaseNode {
  kind: NodeKind.MatchingRoll;
  specifier: RollSpecifier;
  arms: MatchingArm[];
}

export interface ConsequentStatementNode extends BaseNode {
  kind: NodeKind.Consequent;
  consequent: ConsequentNode;
}

export interface LoadTableNode extends BaseNode {
  kind: NodeKind.LoadTable;
  table: string;
}

/** A roll with no arms and no table: the total is only reported. */
export interface RollNode extends BaseNode {
  kind: NodeKind.Roll;
  specifier: RollSpecifier;
}

export type StatementNode =
  | ProcedureDeclNode
  | ProcedureCallNode
  | IfThenNode
  | MatchingRollNode
  | ConsequentStatementNode
  | LoadTableNode
  | RollNode;

export interface Program {
  statements: StatementNode[];
}

/** Output of a successful compile. */
export interface CompiledProgram {
  /** sha256:... of the canonical statement tree. */
  program_id: string;
  statements: StatementNode[];
  /** Top-level procedures by name. */
  procedures_index: Record<string, ProcedureDeclNode>;
  /** Tables named by top-level `load table` statements, in order. */
  tables: string[];
}

export function persistence_of(kind: ConsequentKind): Persistence {
  switch (kind) {
    case ConsequentKind.SetPersistentFact:
    case ConsequentKind.ClearPersistentFact:
    case ConsequentKind.SwapPersistentFact:
      return "persistent";
    default:
      return "ephemeral";
  }
}

export function create_procedure_decl(name: string, body: StatementNode[], line: number): ProcedureDeclNode {
  return { kind: NodeKind.ProcedureDecl, name, body, line };
}

export function create_procedure_call(name: string, line: number): ProcedureCallNode {
  return { kind: NodeKind.ProcedureCall, name, line };
}

export function create_if_then(antecedent: AntecedentNode, consequent: ConsequentNode, line: number): IfThenNode {
  return { kind: NodeKind.IfThen, antecedent, consequent, line };
}

export function create_matching_roll(specifier: RollSpecifier, arms: MatchingArm[], line: number): MatchingRollNode {
  return { kind: NodeKind.MatchingRoll, specifier, arms, line };
}

/**
 * Wraps a consequent used as a statement of its own; the wrapper shares its line.
 */
export function create_consequent_statement(consequent: ConsequentNode): ConsequentStatementNode {
  return { kind: NodeKind.Consequent, consequent, line: consequent.line };
}

export function create_load_table(table: string, line: number): LoadTableNode {
  return { kind: NodeKind.LoadTable, table, line };
}

export function create_roll(specifier: RollSpecifier, line: number): RollNode {
  return { kind: NodeKind.Roll, specifier, line };
}
