import { ConsequentKind, type EffectNode } from '../ast/nodes';
import type { ConsequentRecord } from '../../types';
import { exec_set_fact } from './set_fact';
import { exec_clear_fact } from './clear_fact';
import { exec_swap_fact } from './swap_fact';
import { exec_table_roll } from './table_roll';
import { exec_reminder } from './reminder';
import type { InterpreterCtx } from './types';

export type { InterpreterCtx, EffectExecutor } from './types';

export function execute_effect(node: EffectNode, ctx: InterpreterCtx): ConsequentRecord {
  switch (node.kind) {
    case ConsequentKind.SetFact:
    case ConsequentKind.SetPersistentFact:
      return exec_set_fact(node, ctx);
    case ConsequentKind.ClearFact:
    case ConsequentKind.ClearPersistentFact:
      return exec_clear_fact(node, ctx);
    case ConsequentKind.SwapFact:
    case ConsequentKind.SwapPersistentFact:
      return exec_swap_fact(node, ctx);
    case ConsequentKind.TableRoll:
      return exec_table_roll(node, ctx);
    case ConsequentKind.Reminder:
      return exec_reminder(node, ctx);
    default: {
      const _exhaustive: never = node;
      throw new Error(`unknown consequent ${JSON.stringify(_exhaustive)}`);
    }
  }
}
