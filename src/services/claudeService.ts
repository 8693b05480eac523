/**
 * Claude integration for intent classification
 */

import Anthropic from '@anthropic-ai/sdk';
import type { IntentClassifier } from '../types/integrations';
import { ClassifierError } from '../core/errors';
import { parseClassifierJson } from './intentClassifier';

export interface ClaudeOptions {
  model?: string;
  maxTokens?: number;
  timeoutMs?: number;
}

export class ClaudeService implements IntentClassifier {
  private client: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(apiKey: string, options: ClaudeOptions = {}) {
    this.client = new Anthropic({ apiKey, timeout: options.timeoutMs ?? 30000, maxRetries: 1 });
    this.model = options.model ?? 'claude-3-5-sonnet-20241022';
    this.maxTokens = options.maxTokens ?? 1500;
  }

  async classify(systemPrompt: string, userPrompt: string): Promise<Record<string, unknown>> {
    let text: string;
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        system: `${systemPrompt}\n\nRespond with a single JSON object only.`,
        messages: [{ role: 'user', content: userPrompt }]
      });

      const content = response.content[0];
      if (!content || content.type !== 'text') {
        throw new Error('Expected text response from Claude');
      }
      text = content.text;
    } catch (error) {
      throw new ClassifierError('Claude request failed', { cause: error });
    }

    return parseClassifierJson(text);
  }
}
