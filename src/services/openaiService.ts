/**
 * OpenAI integration - JSON-mode chat completions
 */

import OpenAI from 'openai';
import type { IntentClassifier } from '../types/integrations';
import { ClassifierError } from '../core/errors';
import { parseClassifierJson } from './intentClassifier';

export class OpenAIService implements IntentClassifier {
  private client: OpenAI;
  private model: string;

  constructor(apiKey: string, model: string = 'gpt-4o', timeoutMs: number = 30000) {
    this.client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 1 });
    this.model = model;
  }

  async classify(systemPrompt: string, userPrompt: string): Promise<Record<string, unknown>> {
    let text: string;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        response_format: { type: 'json_object' },
        temperature: 0.2,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt }
        ]
      });
      text = response.choices[0]?.message.content ?? '';
    } catch (error) {
      throw new ClassifierError('OpenAI request failed', { cause: error });
    }

    return parseClassifierJson(text);
  }
}
