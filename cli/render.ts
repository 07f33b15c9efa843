import { printResult, serializeResult } from '../src/index.ts';
import type { RunOutcome } from './script-runner.ts';

/**
 * Text shown for one submission: the indented tree, or its JSON transport form
 */
export function renderOutcome(outcome: RunOutcome, json: boolean = false): string {
  if (json) {
    return serializeResult(outcome.node);
  }

  const tree = printResult(outcome.node).trimEnd();
  if (outcome.kind === 'exception') {
    const where = outcome.node.sourceLine > 0 ? ` (line ${outcome.node.sourceLine})` : '';
    return `Uncaught${where}\n${tree}`;
  }

  return tree;
}
