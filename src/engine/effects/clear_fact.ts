import { persistence_of, type ClearFactNode } from '../ast/nodes';
import type { EffectExecutor } from './types';

export const exec_clear_fact: EffectExecutor<ClearFactNode> = (node, ctx) => {
  const persistence = persistence_of(node.kind);
  ctx.facts.remove(node.fact, persistence);
  return { kind: 'clear_fact', fact: node.fact, persistence };
};
