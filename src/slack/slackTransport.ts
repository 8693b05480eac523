/**
 * Slack Web API implementation of the conversation transport
 */

import { WebClient } from '@slack/web-api';
import { z } from 'zod';
import type { Embed, ThreadRef, TranscriptMessage } from '../types/core';
import { threadKey } from '../types/core';
import type { ConversationTransport } from '../types/integrations';
import { NotFoundError, describeError } from '../core/errors';

// Upper bound on how far back a thread is read
const MAX_THREAD_MESSAGES = 1000;
const PAGE_SIZE = 200;

const AttachmentSchema = z.object({
  title: z.string().optional(),
  text: z.string().optional(),
  footer: z.string().optional()
}).passthrough();

const SlackMessageSchema = z.object({
  ts: z.string(),
  text: z.string().optional(),
  user: z.string().optional(),
  bot_id: z.string().optional(),
  subtype: z.string().optional(),
  attachments: z.array(AttachmentSchema).optional()
}).passthrough();

type SlackMessage = z.infer<typeof SlackMessageSchema>;

/**
 * Text plus any attachment title, body and footer, one per line
 */
export function messageContent(message: Pick<SlackMessage, 'text' | 'attachments'>): string {
  const parts: string[] = [];
  if (message.text) parts.push(message.text);
  for (const attachment of message.attachments ?? []) {
    for (const part of [attachment.title, attachment.text, attachment.footer]) {
      if (part) parts.push(part);
    }
  }
  return parts.join('\n');
}

export function embedContent(embed: Embed): string {
  return [embed.title, embed.description, embed.footer].filter(Boolean).join('\n');
}

export class SlackTransport implements ConversationTransport {
  constructor(
    private readonly client: WebClient,
    private readonly botUserId?: string
  ) {}

  async send(thread: ThreadRef, content: string | Embed): Promise<TranscriptMessage> {
    if (typeof content === 'string') {
      const response = await this.client.chat.postMessage({
        channel: thread.channelId,
        thread_ts: thread.threadTs,
        text: content
      });
      return { ts: response.ts ?? '', authorIsBot: true, content };
    }

    const response = await this.client.chat.postMessage({
      channel: thread.channelId,
      thread_ts: thread.threadTs,
      text: content.title,
      attachments: [
        {
          color: content.color,
          title: content.title,
          text: content.description,
          footer: content.footer
        }
      ]
    });
    return { ts: response.ts ?? '', authorIsBot: true, content: embedContent(content) };
  }

  async post(channelId: string, content: string): Promise<void> {
    await this.client.chat.postMessage({ channel: channelId, text: content, unfurl_links: false });
  }

  async fetchMessage(thread: ThreadRef, ts: string): Promise<TranscriptMessage> {
    let messages: SlackMessage[];
    try {
      const response = await this.client.conversations.replies({
        channel: thread.channelId,
        ts: thread.threadTs,
        oldest: ts,
        latest: ts,
        inclusive: true,
        limit: 2
      });
      messages = this.parseMessages(response.messages);
    } catch (error) {
      throw new NotFoundError(`Message ${ts} unreadable in ${threadKey(thread)}: ${describeError(error)}`, {
        cause: error
      });
    }

    const found = messages.find(message => message.ts === ts);
    if (!found) {
      throw new NotFoundError(`Message ${ts} not found in ${threadKey(thread)}`);
    }
    return this.toTranscript(found);
  }

  /**
   * The most recent `limit` messages of the thread, opening message included
   */
  async history(thread: ThreadRef, limit: number, oldestFirst: boolean = false): Promise<TranscriptMessage[]> {
    const all = await this.readThread(thread);
    const recent = all.slice(-limit).map(message => this.toTranscript(message));
    return oldestFirst ? recent : recent.reverse();
  }

  /**
   * Bot messages go first. A bot token may not delete other people's messages
   * (cant_delete_message), so user replies usually stop the loop and stay in
   * the thread.
   */
  async deleteMessages(thread: ThreadRef, messages: TranscriptMessage[]): Promise<void> {
    const ordered = [...messages.filter(m => m.authorIsBot), ...messages.filter(m => !m.authorIsBot)];
    for (const message of ordered) {
      await this.client.chat.delete({ channel: thread.channelId, ts: message.ts });
    }
  }

  /**
   * One delete at a time; failures are logged and skipped
   */
  async purge(thread: ThreadRef, keep: (message: TranscriptMessage) => boolean): Promise<number> {
    const messages = await this.history(thread, MAX_THREAD_MESSAGES, true);
    let removed = 0;
    for (const message of messages) {
      if (keep(message)) continue;
      try {
        await this.client.chat.delete({ channel: thread.channelId, ts: message.ts });
        removed++;
      } catch (error) {
        console.warn(`[slack] Could not delete ${message.ts} in ${threadKey(thread)}: ${describeError(error)}`);
      }
    }
    return removed;
  }

  async permalink(thread: ThreadRef, ts: string): Promise<string | null> {
    const response = await this.client.chat.getPermalink({ channel: thread.channelId, message_ts: ts });
    return response.permalink ?? null;
  }

  private async readThread(thread: ThreadRef): Promise<SlackMessage[]> {
    const collected: SlackMessage[] = [];
    let cursor: string | undefined;

    do {
      const response = await this.client.conversations.replies({
        channel: thread.channelId,
        ts: thread.threadTs,
        limit: PAGE_SIZE,
        cursor
      });
      collected.push(...this.parseMessages(response.messages));
      cursor = response.response_metadata?.next_cursor || undefined;
    } while (cursor && collected.length < MAX_THREAD_MESSAGES);

    return collected;
  }

  private parseMessages(raw: unknown): SlackMessage[] {
    const parsed = z.array(SlackMessageSchema).safeParse(raw ?? []);
    if (!parsed.success) {
      console.warn(`[slack] Unexpected message payload: ${parsed.error.message}`);
      return [];
    }
    return parsed.data;
  }

  private toTranscript(message: SlackMessage): TranscriptMessage {
    const authorIsBot =
      Boolean(message.bot_id) ||
      message.subtype === 'bot_message' ||
      (this.botUserId !== undefined && message.user === this.botUserId);
    return { ts: message.ts, authorIsBot, content: messageContent(message) };
  }
}
