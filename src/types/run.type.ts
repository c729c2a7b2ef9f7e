import type { CompiledProgram } from '../engine/ast/nodes';
import type { EngineError } from '../engine/errors';
import type { FactsSnapshot, Persistence } from '../engine/facts';
import type { DieSource } from '../utils/rng.util';
import type { Logger } from '../utils/logger.util';
import type { FactStorage, OutputSink, TableSource } from './collaborator.type';

export type RunStatus = 'start' | 'executing' | 'done' | 'failed';

export interface RunLimits {
  /** Nested procedure calls allowed before CALL_DEPTH_EXCEEDED. */
  max_call_depth?: number;
  /** Statements executed before STEP_LIMIT_EXCEEDED; unbounded when unset. */
  max_steps?: number;
}

export type ResolvedRunLimits = { max_call_depth: number; max_steps?: number };

export interface RunInput {
  program: CompiledProgram;
  table_source?: TableSource;
  fact_storage?: FactStorage;
  sink?: OutputSink;
  /** Defaults to Math.random based rolls. */
  dice?: DieSource;
  /**
   * Procedure to run instead of the top-level statements.
   * Top-level `load table` statements still run first.
   */
  entry?: string;
  limits?: RunLimits;
  logger?: Logger;
}

export type OutputEvent =
  | { kind: 'reminder'; text: string; line: number }
  | { kind: 'table_roll'; table: string; roll: number; text: string; line: number }
  | { kind: 'roll'; expression: string; total: number; line: number };

export type ConsequentRecord =
  /** fact is null when a table clause in the format string matched nothing. */
  | { kind: 'set_fact'; fact: string | null; persistence: Persistence }
  | { kind: 'clear_fact'; fact: string; persistence: Persistence }
  | { kind: 'swap_fact'; fact: string; persistence: Persistence; present: boolean }
  | { kind: 'table_roll'; table: string; roll: number; text: string | null }
  | { kind: 'reminder'; text: string }
  | { kind: 'procedure_call'; name: string; records: StatementRecord[] };

export type StatementRecord =
  | ConsequentRecord
  | { kind: 'procedure_decl'; name: string }
  | { kind: 'load_table'; table: string; entries: number }
  | { kind: 'if_then'; holds: boolean; roll: number | null; consequent: ConsequentRecord | null }
  | { kind: 'matching_roll'; roll: number; arm: number | null; consequent: ConsequentRecord | null }
  | { kind: 'roll'; expression: string; total: number };

export interface RunOutput {
  ok: boolean;
  status: 'done' | 'failed';
  facts: FactsSnapshot;
  events: OutputEvent[];
  /** Trace of the top-level statements (and the entry call), nested through procedure calls. */
  records: StatementRecord[];
  steps: number;
  error?: EngineError;
  time_ms: number;
}
