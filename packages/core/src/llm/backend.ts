/**
 * Reasoning backends.
 * OpenAIBackend talks to any OpenAI-compatible chat endpoint; FallbackBackend chains two of them.
 */

import OpenAI from 'openai';
import { ConfigError, describeError } from '../errors.js';
import type { BackendSettings, ReasoningConfig } from '../config.js';
import { silentLogger, type Logger } from '../logging.js';
import type { ChatMessage, Completion, CompletionOptions, ReasoningBackend } from './types.js';

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIBackend implements ReasoningBackend {
  readonly name: string;
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(settings: BackendSettings, name = 'openai') {
    if (!settings.apiKey) {
      throw new ConfigError('OpenAI API key is not configured. Set OPENAI_API_KEY in your shell.');
    }
    this.client = new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseURL });
    this.model = settings.model;
    this.name = `${name}:${settings.model}`;
  }

  async complete(messages: ChatMessage[], opts: CompletionOptions): Promise<Completion> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: messages.map(toOpenAIMessage),
        temperature: 0.1,
        max_tokens: opts.maxTokens,
      },
      { signal: opts.signal },
    );

    // An empty completion is reported as-is; the batch client classifies it.
    return { text: response.choices[0]?.message?.content ?? '', provider: this.name };
  }
}

/**
 * Tries the primary backend, then the secondary when the primary throws.
 * A call aborted by its timeout is not retried.
 */
export class FallbackBackend implements ReasoningBackend {
  readonly name: string;

  constructor(
    private readonly primary: ReasoningBackend,
    private readonly secondary: ReasoningBackend,
    private readonly logger: Logger = silentLogger(),
  ) {
    this.name = `${primary.name}>${secondary.name}`;
  }

  async complete(messages: ChatMessage[], opts: CompletionOptions): Promise<Completion> {
    try {
      return await this.primary.complete(messages, opts);
    } catch (err: unknown) {
      if (opts.signal.aborted) throw err;
      this.logger.warn(
        { primary: this.primary.name, secondary: this.secondary.name, err: describeError(err) },
        'primary reasoning backend failed, using fallback',
      );
      return this.secondary.complete(messages, opts);
    }
  }
}

export function createBackend(config: ReasoningConfig, logger?: Logger): ReasoningBackend {
  const primary = new OpenAIBackend(config.primary, 'primary');
  if (!config.fallback) return primary;
  return new FallbackBackend(primary, new OpenAIBackend(config.fallback, 'fallback'), logger);
}
