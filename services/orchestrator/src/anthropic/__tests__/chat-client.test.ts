/**
 * Chat Client & Prompt Template Tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { FusedContextItem, PromptFragment } from '@fusionchat/shared-types';
import { ChatClient, type MessagesApi } from '../chat-client.js';
import {
  NO_CONTEXT_NOTICE,
  buildDemoResponse,
  buildFallbackResponse,
  buildSystemPrompt,
} from '../prompt-templates.js';

function item(identifier: string, fusedScore: number, content: string): FusedContextItem {
  return {
    identifier,
    content,
    metadata: {},
    source: 'vector',
    fusedScore,
    contributingSources: ['vector', 'graph'],
    sourceScores: { vector: fusedScore },
    mergedIdentifiers: [identifier],
  };
}

function fragment(items: FusedContextItem[], text: string): PromptFragment {
  return { text, items, omitted: [], tokenEstimate: Math.ceil(text.length / 4), tokenBudget: 2000 };
}

describe('buildSystemPrompt', () => {
  it('should embed the context block with a cache hint', () => {
    const blocks = buildSystemPrompt(fragment([item('doc-1:0', 0.7, 'eKYC flow')], '[1] doc-1:0 (sources: Vector + Graph, score: 0.700)\neKYC flow'));

    expect(blocks).toHaveLength(3);
    expect(blocks[1]?.text).toContain('[1] doc-1:0 (sources: Vector + Graph, score: 0.700)\neKYC flow');
    expect(blocks[1]?.cache_control).toEqual({ type: 'ephemeral' });
  });

  it('should say that no context was found when the fragment is empty', () => {
    const blocks = buildSystemPrompt(fragment([], ''));

    expect(blocks[1]).toEqual({ type: 'text', text: NO_CONTEXT_NOTICE });
  });
});

describe('buildFallbackResponse', () => {
  it('should quote top items scoring above 0.5', () => {
    const response = buildFallbackResponse('What is eKYC?', [
      item('a', 0.8, 'eKYC verifies identity online.'),
      item('b', 0.4, 'Unrelated low score text.'),
    ]);

    expect(response).toContain('eKYC verifies identity online.');
    expect(response).not.toContain('Unrelated low score text.');
  });

  it('should only consider the first two items', () => {
    const response = buildFallbackResponse('q', [item('a', 0.2, 'first'), item('b', 0.3, 'second'), item('c', 0.9, 'third')]);

    expect(response).toBe(
      `I apologize, but I'm having technical difficulties answering "q" right now. Please try again in a moment, or rephrase the question with the specific capability or process you are asking about.`
    );
  });
});

describe('buildDemoResponse', () => {
  it('should summarise the retrieved context', () => {
    const response = buildDemoResponse('What is eKYC?', [item('a', 0.8, 'eKYC verifies identity online.')]);

    expect(response.split('\n')).toEqual([
      '**Demo mode: context retrieval is working, answer generation is disabled.**',
      '',
      'Your question: "What is eKYC?"',
      '',
      '**Context retrieved:** 1 items (Vector: 1, Graph: 1)',
      '1. [Vector + Graph, 0.800] eKYC verifies identity online.',
      '',
      'Set ANTHROPIC_API_KEY to enable generated answers.',
    ]);
  });
});

describe('ChatClient', () => {
  function createMessages() {
    return {
      create: vi.fn<MessagesApi['create']>().mockResolvedValue({
        content: [
          { type: 'text', text: 'eKYC is ' },
          { type: 'text', text: 'online identity verification.' },
        ],
        usage: { input_tokens: 300, output_tokens: 20, cache_read_input_tokens: 250, cache_creation_input_tokens: null },
      }),
    };
  }

  it('should report not configured without a key or injected API', () => {
    expect(new ChatClient({ apiKey: '' }).isConfigured()).toBe(false);
  });

  it('should send history before the question and collect usage', async () => {
    const messages = createMessages();
    const client = new ChatClient({ apiKey: 'test-secret', model: 'test-model', maxTokens: 500, temperature: 0.2, messages });

    const result = await client.generate('What is eKYC?', fragment([], ''), [
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello!' },
    ]);

    expect(result).toEqual({
      response: 'eKYC is online identity verification.',
      tokensUsed: 320,
      cacheReadTokens: 250,
      cacheWriteTokens: 0,
    });
    expect(messages.create).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'test-model',
        max_tokens: 500,
        temperature: 0.2,
        messages: [
          { role: 'user', content: 'Hi' },
          { role: 'assistant', content: 'Hello!' },
          { role: 'user', content: 'What is eKYC?' },
        ],
      })
    );
  });

  it('should propagate API errors to the caller', async () => {
    const messages = createMessages();
    messages.create.mockRejectedValue(new Error('rate limited'));
    const client = new ChatClient({ apiKey: 'test-secret', messages });

    await expect(client.generate('q', fragment([], ''))).rejects.toThrow('rate limited');
  });

  it('should refuse to generate when not configured', async () => {
    await expect(new ChatClient({ apiKey: '' }).generate('q', fragment([], ''))).rejects.toThrow(
      'Anthropic client is not configured'
    );
  });
});
