import type { TableRollNode } from '../ast/nodes';
import type { EffectExecutor } from './types';

export const exec_table_roll: EffectExecutor<TableRollNode> = (node, ctx) => {
  const sample = ctx.tables.sample(node.table, ctx.dice, node.specifier);
  const text = sample.entry?.text ?? null;
  if (text === null) {
    // wasted roll: nothing is emitted
    ctx.logger.debug('table roll matched no entry', { table: node.table, roll: sample.roll.total, line: node.line });
  } else {
    ctx.emit({ kind: 'table_roll', table: node.table, roll: sample.roll.total, text, line: node.line });
  }
  return { kind: 'table_roll', table: node.table, roll: sample.roll.total, text };
};
