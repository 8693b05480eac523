/**
 * Boundaries the intake flow talks to. Slack, Notion and the LLM providers
 * implement these; tests swap in fakes.
 */

import type { Embed, TaskDraft, ThreadRef, TranscriptMessage } from './core';

export interface ConversationTransport {
  send(thread: ThreadRef, content: string | Embed): Promise<TranscriptMessage>;
  post(channelId: string, content: string): Promise<void>;
  /** Rejects with NotFoundError when the message is gone or unreadable */
  fetchMessage(thread: ThreadRef, ts: string): Promise<TranscriptMessage>;
  history(thread: ThreadRef, limit: number, oldestFirst?: boolean): Promise<TranscriptMessage[]>;
  deleteMessages(thread: ThreadRef, messages: TranscriptMessage[]): Promise<void>;
  purge(thread: ThreadRef, keep: (message: TranscriptMessage) => boolean): Promise<number>;
  permalink(thread: ThreadRef, ts: string): Promise<string | null>;
}

/**
 * Every method resolves to null/empty on failure instead of throwing.
 */
export interface TaskStore {
  createRecord(draft: TaskDraft): Promise<string | null>;
  findRecordByBackLink(backLink: string): Promise<string | null>;
  /** Whether the linked page is a record of the intake database */
  isIntakeRecord(pageUrl: string): Promise<boolean>;
  getValidProjectOptions(): Promise<string[]>;
}

export interface IntentClassifier {
  /** Resolves to the parsed JSON object, rejects with ClassifierError */
  classify(systemPrompt: string, userPrompt: string): Promise<Record<string, unknown>>;
}

export interface ThreadMappingEntry {
  threadId: string;
  title?: string;
  taskReference?: string;
  status: string;
  notes?: string;
}

export interface ThreadMapping {
  lookup(threadId: string, alternateIds?: string[]): Promise<ThreadMappingEntry | null>;
}
