/**
 * Slack bot for the design intake channel
 * Connects using Socket Mode and hands every thread message to the intake agent
 */

import { App } from '@slack/bolt';
import { z } from 'zod';
import { Env, loadConfig, requireKeys, resolvePromptPath, toIntakeSettings } from '../config';
import { IntakeAgent } from '../core/intakeAgent';
import { loadPromptTemplate } from '../core/prompts';
import { createClassifier, createNotionService } from '../services/factory';
import { ThreadMappingService } from '../services/threadMappingService';
import { ThreadStateService } from '../services/threadStateService';
import type { IncomingMessage, ThreadRef } from '../types/core';
import { SlackTransport } from './slackTransport';

// Plain user posts; file shares and broadcasts still carry text
const HANDLED_SUBTYPES = new Set(['file_share', 'thread_broadcast']);

const UserMessageSchema = z.object({
  channel: z.string(),
  ts: z.string(),
  thread_ts: z.string().optional(),
  user: z.string().optional(),
  text: z.string().optional(),
  bot_id: z.string().optional(),
  subtype: z.string().optional()
});

const EditedMessageSchema = z.object({
  subtype: z.literal('message_changed'),
  channel: z.string(),
  message: z.object({
    ts: z.string(),
    thread_ts: z.string().optional(),
    text: z.string().optional(),
    bot_id: z.string().optional()
  }),
  previous_message: z.object({ text: z.string().optional() }).optional()
});

/**
 * Thread messages and new top-level posts, minus bot chatter
 */
export function toIncomingMessage(raw: unknown, intakeChannelId: string): IncomingMessage | null {
  const parsed = UserMessageSchema.safeParse(raw);
  if (!parsed.success) return null;

  const message = parsed.data;
  if (message.channel !== intakeChannelId) return null;
  if (message.bot_id) return null;
  if (message.subtype && !HANDLED_SUBTYPES.has(message.subtype)) return null;

  return {
    thread: { channelId: message.channel, threadTs: message.thread_ts ?? message.ts },
    ts: message.ts,
    userId: message.user,
    content: message.text ?? ''
  };
}

/**
 * A text edit of a thread's opening message, as the thread it belongs to
 */
export function toOpeningEdit(raw: unknown, intakeChannelId: string): ThreadRef | null {
  const parsed = EditedMessageSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { channel, message, previous_message: previous } = parsed.data;
  if (channel !== intakeChannelId || message.bot_id) return null;
  if (message.thread_ts && message.thread_ts !== message.ts) return null;
  // reply counts and unfurls also arrive as message_changed
  if (previous && previous.text === message.text) return null;

  return { channelId: channel, threadTs: message.ts };
}

export async function startBot(env: Env = loadConfig()): Promise<App> {
  requireKeys(env, ['SLACK_BOT_TOKEN', 'SLACK_APP_TOKEN', 'INTAKE_CHANNEL_ID']);
  const intakeChannelId = env.INTAKE_CHANNEL_ID ?? '';

  const app = new App({
    token: env.SLACK_BOT_TOKEN,
    signingSecret: env.SLACK_SIGNING_SECRET,
    socketMode: true,
    appToken: env.SLACK_APP_TOKEN
  });

  const store = new ThreadStateService(env.INTAKE_STATE_PATH);
  await store.whenReady();

  const identity = await app.client.auth.test();
  const transport = new SlackTransport(app.client, identity.user_id);

  const agent = new IntakeAgent({
    store,
    classifier: createClassifier(env),
    taskStore: createNotionService(env),
    transport,
    mapping: new ThreadMappingService(env.THREAD_MAPPING_PATH),
    settings: toIntakeSettings(env),
    promptTemplate: loadPromptTemplate(resolvePromptPath(env)),
    bootTime: new Date()
  });

  app.message(async ({ message }) => {
    const edited = toOpeningEdit(message, intakeChannelId);
    if (edited) {
      const outcome = await agent.handleOpeningEdit(edited);
      console.log(`[slack] Opening edit in ${edited.threadTs}: ${outcome.type}`);
      return;
    }

    const incoming = toIncomingMessage(message, intakeChannelId);
    if (!incoming) return;

    console.log(`[slack] Message ${incoming.ts} in thread ${incoming.thread.threadTs} from ${incoming.userId ?? 'unknown'}`);
    const outcome = await agent.handleMessage(incoming);
    if (outcome.type === 'error') {
      console.error(`[slack] Turn ended with error: ${outcome.message}`);
    }
  });

  app.error(async (error) => {
    console.error('[slack] Unhandled Bolt error:', error);
  });

  const shutdown = async () => {
    console.log('[slack] Shutting down...');
    try {
      await app.stop();
      await store.close();
    } catch (error) {
      console.error('[slack] Error during shutdown:', error);
    }
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  await app.start();
  console.log(`⚡️ Intake bot is running on channel ${intakeChannelId}`);
  return app;
}
