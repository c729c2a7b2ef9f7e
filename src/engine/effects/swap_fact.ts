import { persistence_of, type SwapFactNode } from '../ast/nodes';
import type { EffectExecutor } from './types';

/** Present → absent, absent → present. */
export const exec_swap_fact: EffectExecutor<SwapFactNode> = (node, ctx) => {
  const persistence = persistence_of(node.kind);
  const present = ctx.facts.toggle(node.fact, persistence);
  return { kind: 'swap_fact', fact: node.fact, persistence, present };
};
