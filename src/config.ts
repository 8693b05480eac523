/**
 * Environment configuration, validated once at startup
 */

import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

const csvList = z
  .string()
  .optional()
  .transform(value => (value ?? '').split(',').map(item => item.trim()).filter(Boolean));

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  SLACK_BOT_TOKEN: optionalString,
  SLACK_APP_TOKEN: optionalString,
  SLACK_SIGNING_SECRET: optionalString,
  INTAKE_CHANNEL_ID: optionalString,
  NOTIFY_CHANNEL_ID: optionalString,
  NOTIFY_MENTION: optionalString,

  NOTION_TOKEN: optionalString,
  NOTION_DATABASE_ID: optionalString,
  NOTION_WORKSPACE: optionalString,
  NOTION_TITLE_PROPERTY: z.string().default('Name'),
  NOTION_PROJECT_PROPERTY: z.string().default('Proyecto'),
  NOTION_DEADLINE_PROPERTY: z.string().default('Deadline'),
  NOTION_THREAD_PROPERTY: z.string().default('Thread'),
  PROJECT_FALLBACK_OPTIONS: csvList,

  CLASSIFIER_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default('claude-3-5-sonnet-20241022'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o'),

  INTAKE_STATE_PATH: z.string().default('./intake_state.json'),
  THREAD_MAPPING_PATH: z.string().default('./thread_mapping.csv'),
  PROMPT_PATH: z.string().default('prompts/design_intake.md'),
  MANUAL_FORM_URL: optionalString,
  RECOVERY_ALLOWLIST: csvList,

  TASK_ERROR_THRESHOLD: z.coerce.number().int().min(1).default(2),
  HISTORY_WINDOW: z.coerce.number().int().min(0).default(10),
  RECOVERY_SCAN_LIMIT: z.coerce.number().int().min(1).default(5),
  CLEANUP_HISTORY_LIMIT: z.coerce.number().int().min(1).default(100),
  EXTERNAL_CALL_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30000)
});

export type Env = z.infer<typeof EnvSchema>;

export interface IntakeSettings {
  notifyChannelId?: string;
  notifyMention?: string;
  manualFormUrl?: string;
  recoveryAllowlist: string[];
  projectFallbackOptions: string[];
  notionDatabaseId: string;
  notionWorkspace?: string;
  taskErrorThreshold: number;
  historyWindow: number;
  recoveryScanLimit: number;
  cleanupHistoryLimit: number;
  externalCallTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  return result.data;
}

export function loadConfig(): Env {
  dotenv.config();
  return loadEnv(process.env);
}

/**
 * Keys the running bot cannot do without
 */
export function requireKeys(env: Env, keys: Array<keyof Env>): void {
  const missing = keys.filter(key => {
    const value = env[key];
    return value === undefined || value === '';
  });
  if (missing.length > 0) {
    throw new ConfigError(missing.map(key => `${String(key)}: required`));
  }
}

export function toIntakeSettings(env: Env): IntakeSettings {
  return {
    notifyChannelId: env.NOTIFY_CHANNEL_ID,
    notifyMention: env.NOTIFY_MENTION,
    manualFormUrl: env.MANUAL_FORM_URL,
    recoveryAllowlist: env.RECOVERY_ALLOWLIST,
    projectFallbackOptions: env.PROJECT_FALLBACK_OPTIONS,
    notionDatabaseId: env.NOTION_DATABASE_ID ?? '',
    notionWorkspace: env.NOTION_WORKSPACE,
    taskErrorThreshold: env.TASK_ERROR_THRESHOLD,
    historyWindow: env.HISTORY_WINDOW,
    recoveryScanLimit: env.RECOVERY_SCAN_LIMIT,
    cleanupHistoryLimit: env.CLEANUP_HISTORY_LIMIT,
    externalCallTimeoutMs: env.EXTERNAL_CALL_TIMEOUT_MS
  };
}

export function resolvePromptPath(env: Env): string {
  return path.resolve(process.cwd(), env.PROMPT_PATH);
}
