/**
 * Prompt Template Builder
 * System prompt with the assembled context block, plus the canned answers
 * used when the model is not configured or the call fails
 */

import type Anthropic from '@anthropic-ai/sdk';
import { CONTEXT_SOURCE_LABELS, type FusedContextItem, type PromptFragment } from '@fusionchat/shared-types';
import { formatSourceSummary, summarizeSources } from '../fusion/engine.js';
import { truncateText } from '../text/keywords.js';

export const NO_CONTEXT_NOTICE =
  'No relevant context was found in the knowledge base for this question. Answer from general knowledge and say so when the question depends on internal documentation.';

/** Fused score an item needs before the fallback answer quotes it */
export const FALLBACK_MIN_SCORE = 0.5;
const FALLBACK_MAX_ITEMS = 2;
const FALLBACK_EXCERPT_LENGTH = 300;

/**
 * Build the system prompt for a contextual answer.
 * The context block carries a cache hint so repeated questions over the
 * same context reuse the prompt cache.
 */
export function buildSystemPrompt(fragment: PromptFragment): Anthropic.Messages.TextBlockParam[] {
  const contextBlock: Anthropic.Messages.TextBlockParam =
    fragment.items.length > 0
      ? {
          type: 'text',
          text: `RETRIEVED CONTEXT:
Each item lists the retrieval sources that agreed on it and its fused relevance score (0 to 1).

${fragment.text}

Prefer items with higher scores and items confirmed by more than one source.`,
          cache_control: { type: 'ephemeral' },
        }
      : { type: 'text', text: NO_CONTEXT_NOTICE };

  return [
    {
      type: 'text',
      text: `You are an expert assistant for lending and financial services systems. You answer questions using context retrieved from semantic memory, document vector search, a knowledge graph of concepts and the current conversation.`,
    },
    contextBlock,
    {
      type: 'text',
      text: `RESPONSE GUIDELINES:
- Give a clear, direct answer first
- Cite context items by their number, e.g. [2], when you rely on them
- Explain how related processes and capabilities connect when it helps the answer
- Use precise technical terminology
- If the context does not cover the question, say what is missing instead of guessing`,
    },
  ];
}

/**
 * Answer returned when no API key is configured.
 * Shows what retrieval found so the rest of the pipeline can be checked end to end.
 */
export function buildDemoResponse(message: string, items: readonly FusedContextItem[]): string {
  const lines = [
    '**Demo mode: context retrieval is working, answer generation is disabled.**',
    '',
    `Your question: "${message}"`,
    '',
  ];

  if (items.length === 0) {
    lines.push('No relevant context was found for this question.');
  } else {
    lines.push(`**Context retrieved:** ${items.length} items (${formatSourceSummary(summarizeSources(items))})`);
    items.slice(0, 3).forEach((item, index) => {
      const labels = item.contributingSources.map((source) => CONTEXT_SOURCE_LABELS[source]).join(' + ');
      lines.push(`${index + 1}. [${labels}, ${item.fusedScore.toFixed(3)}] ${truncateText(item.content, 200)}`);
    });
  }

  lines.push('', 'Set ANTHROPIC_API_KEY to enable generated answers.');
  return lines.join('\n');
}

/**
 * Answer returned when the model call fails.
 * Quotes the strongest context when there is any, otherwise apologises.
 */
export function buildFallbackResponse(message: string, items: readonly FusedContextItem[]): string {
  const excerpts = items
    .slice(0, FALLBACK_MAX_ITEMS)
    .filter((item) => item.fusedScore > FALLBACK_MIN_SCORE)
    .map((item) => item.content.slice(0, FALLBACK_EXCERPT_LENGTH));

  if (excerpts.length > 0) {
    return `I'm having trouble generating a full answer right now. Based on the available context, here is what I found:

${excerpts.join('\n\n')}

This comes from the indexed documentation about: ${message}`;
  }

  return `I apologize, but I'm having technical difficulties answering "${message}" right now. Please try again in a moment, or rephrase the question with the specific capability or process you are asking about.`;
}
