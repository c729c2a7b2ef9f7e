import { persistence_of, type SetFactNode } from '../ast/nodes';
import { resolve_format_string } from '../runtime/evaluate';
import type { EffectExecutor } from './types';

export const exec_set_fact: EffectExecutor<SetFactNode> = (node, ctx) => {
  const persistence = persistence_of(node.kind);
  const fact = resolve_format_string(node.fact, ctx);
  if (fact === null) {
    ctx.logger.debug('set-fact skipped: a table clause matched no entry', { line: node.line });
    return { kind: 'set_fact', fact: null, persistence };
  }
  ctx.facts.insert(fact, persistence);
  return { kind: 'set_fact', fact, persistence };
};
