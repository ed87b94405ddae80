/**
 * Anthropic Chat Client
 * Answer generation over the fused context, with prompt caching on the context block
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ConversationMessage, PromptFragment } from '@fusionchat/shared-types';
import { parseFloatEnv, parseIntEnv } from '@fusionchat/shared-types';
import { createLogger } from '../utils/logger.js';
import { buildSystemPrompt } from './prompt-templates.js';

const log = createLogger('ChatClient');

export interface ContextualResponse {
  response: string;
  tokensUsed: number;
  cacheReadTokens: number;
  cacheWriteTokens: number;
}

/**
 * Fields of a Messages API response the client reads
 */
export interface MessageResult {
  content: Array<{ type: string; text?: string }>;
  usage: {
    input_tokens: number;
    output_tokens: number;
    cache_read_input_tokens?: number | null;
    cache_creation_input_tokens?: number | null;
  };
}

/**
 * The part of the Messages API the client calls
 */
export interface MessagesApi {
  create(params: Anthropic.Messages.MessageCreateParamsNonStreaming): Promise<MessageResult>;
}

export interface ChatClientOptions {
  apiKey?: string | undefined;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Injected for tests; built from the SDK when omitted */
  messages?: MessagesApi;
}

/**
 * What the chat flow needs from the model
 */
export interface AnswerGenerator {
  isConfigured(): boolean;
  generate(
    message: string,
    fragment: PromptFragment,
    history?: readonly ConversationMessage[]
  ): Promise<ContextualResponse>;
}

export class ChatClient implements AnswerGenerator {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly messages: MessagesApi | null;

  constructor(options: ChatClientOptions = {}) {
    this.apiKey = options.apiKey ?? process.env['ANTHROPIC_API_KEY'] ?? '';
    this.model = options.model ?? process.env['ANTHROPIC_MODEL'] ?? 'claude-sonnet-4-5';
    this.maxTokens = options.maxTokens ?? parseIntEnv('ANTHROPIC_MAX_TOKENS', 1500);
    this.temperature = options.temperature ?? parseFloatEnv('ANTHROPIC_TEMPERATURE', 0.7);

    if (options.messages) {
      this.messages = options.messages;
    } else if (this.apiKey) {
      const sdk = new Anthropic({ apiKey: this.apiKey });
      this.messages = { create: (params) => sdk.messages.create(params) };
    } else {
      this.messages = null;
      log.warn('ANTHROPIC_API_KEY not set, answers will run in demo mode');
    }
  }

  isConfigured(): boolean {
    return this.messages !== null;
  }

  /**
   * Generate an answer. History messages come first (chronological),
   * then the current question.
   */
  async generate(
    message: string,
    fragment: PromptFragment,
    history: readonly ConversationMessage[] = []
  ): Promise<ContextualResponse> {
    if (!this.messages) {
      throw new Error('Anthropic client is not configured');
    }

    const startTime = Date.now();
    const messages: Anthropic.Messages.MessageParam[] = [
      ...history.map((turn) => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: message },
    ];

    const response = await this.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      system: buildSystemPrompt(fragment),
      messages,
    });

    const responseText = response.content
      .map((block) => (block.type === 'text' ? (block.text ?? '') : ''))
      .join('')
      .trim();

    const tokensUsed = response.usage.input_tokens + response.usage.output_tokens;
    const cacheReadTokens = response.usage.cache_read_input_tokens ?? 0;
    const cacheWriteTokens = response.usage.cache_creation_input_tokens ?? 0;

    log.info('Answer generated', {
      latencyMs: Date.now() - startTime,
      tokensUsed,
      cacheReadTokens,
      cacheWriteTokens,
      historyMessages: history.length,
      contextItems: fragment.items.length,
    });

    return { response: responseText, tokensUsed, cacheReadTokens, cacheWriteTokens };
  }
}
