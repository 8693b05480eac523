/**
 * Builds the services the bot and the CLI share from validated config
 */

import { ConfigError, Env, requireKeys } from '../config';
import type { IntentClassifier } from '../types/integrations';
import { ClaudeService } from './claudeService';
import { NotionService } from './notionService';
import { OpenAIService } from './openaiService';

export function createClassifier(env: Env): IntentClassifier {
  if (env.CLASSIFIER_PROVIDER === 'openai') {
    if (!env.OPENAI_API_KEY) {
      throw new ConfigError(['OPENAI_API_KEY: required when CLASSIFIER_PROVIDER=openai']);
    }
    return new OpenAIService(env.OPENAI_API_KEY, env.OPENAI_MODEL, env.EXTERNAL_CALL_TIMEOUT_MS);
  }

  if (!env.ANTHROPIC_API_KEY) {
    throw new ConfigError(['ANTHROPIC_API_KEY: required when CLASSIFIER_PROVIDER=anthropic']);
  }
  return new ClaudeService(env.ANTHROPIC_API_KEY, {
    model: env.ANTHROPIC_MODEL,
    timeoutMs: env.EXTERNAL_CALL_TIMEOUT_MS
  });
}

export function createNotionService(env: Env): NotionService {
  requireKeys(env, ['NOTION_TOKEN', 'NOTION_DATABASE_ID']);
  return new NotionService(env.NOTION_TOKEN ?? '', {
    databaseId: env.NOTION_DATABASE_ID ?? '',
    titleProperty: env.NOTION_TITLE_PROPERTY,
    projectProperty: env.NOTION_PROJECT_PROPERTY,
    deadlineProperty: env.NOTION_DEADLINE_PROPERTY,
    threadProperty: env.NOTION_THREAD_PROPERTY,
    timeoutMs: env.EXTERNAL_CALL_TIMEOUT_MS
  });
}
