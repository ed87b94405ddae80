/**
 * Context Assembler
 * Renders ranked fused items into a prompt block that fits a token budget
 */

import { CONTEXT_SOURCE_LABELS, type FusedContextItem, type PromptFragment } from '@fusionchat/shared-types';
import { estimateTokens } from '../config/history-config.js';

function renderItem(item: FusedContextItem, position: number): string {
  const sources = item.contributingSources.map((source) => CONTEXT_SOURCE_LABELS[source]).join(' + ');
  return `[${position}] ${item.identifier} (sources: ${sources}, score: ${item.fusedScore.toFixed(3)})\n${item.content}`;
}

/**
 * Concatenate items in ranked order while their estimated content tokens
 * stay within `tokenBudget`.
 *
 * Stops at the first item that would overflow, so a lower-ranked item never
 * gets in ahead of a higher-ranked one. Everything from that item on is
 * reported in `omitted`.
 */
export function assemble(items: readonly FusedContextItem[], tokenBudget: number): PromptFragment {
  // NaN means no budget; Infinity stays unbounded
  const budget = Number.isNaN(tokenBudget) ? 0 : Math.max(0, tokenBudget);
  const included: FusedContextItem[] = [];
  const omitted: string[] = [];
  let used = 0;

  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (!item) continue;

    const cost = estimateTokens(item.content);
    if (used + cost > budget) {
      omitted.push(...items.slice(i).map((rest) => rest.identifier));
      break;
    }
    used += cost;
    included.push(item);
  }

  return {
    text: included.map((item, index) => renderItem(item, index + 1)).join('\n\n'),
    items: included,
    omitted,
    tokenEstimate: used,
    tokenBudget: budget,
  };
}
