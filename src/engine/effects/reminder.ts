import type { ReminderNode } from '../ast/nodes';
import type { EffectExecutor } from './types';

export const exec_reminder: EffectExecutor<ReminderNode> = (node, ctx) => {
  ctx.emit({ kind: 'reminder', text: node.text, line: node.line });
  return { kind: 'reminder', text: node.text };
};
