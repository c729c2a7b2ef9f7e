import type { EffectNode, ProcedureDeclNode } from '../ast/nodes';
import type { FactStore } from '../facts';
import type { TableRegistry } from '../tables';
import type { CallStack } from '../runtime/call_stack';
import type { ConsequentRecord, OutputEvent, ResolvedRunLimits, TableSource } from '../../types';
import type { DieSource } from '../../utils/rng.util';
import type { Logger } from '../../utils/logger.util';

/** Everything a statement can touch while a program runs. */
export type InterpreterCtx = {
  procedures: ReadonlyMap<string, ProcedureDeclNode>;
  facts: FactStore;
  tables: TableRegistry;
  table_source: TableSource | undefined;
  dice: DieSource;
  call_stack: CallStack;
  limits: ResolvedRunLimits;
  counters: { steps: number };
  emit: (event: OutputEvent) => void;
  logger: Logger;
};

export type EffectExecutor<T extends EffectNode> = (node: T, ctx: InterpreterCtx) => ConsequentRecord;
