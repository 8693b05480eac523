/**
 * Core data types for the intake bot
 */

import type { IntakeState } from './threadState';

export const INTAKE_ACTIONS = [
  'approve',
  'offer_creation',
  'create_task',
  'validate_edit',
  'delete_history',
  'request_edit',
  'synthesize',
  'handoff',
  'wait'
] as const;

export type IntakeAction = typeof INTAKE_ACTIONS[number];

export interface IntentData {
  project?: string;
  title?: string;
  deadline?: string;
}

export interface ExtractedIntent {
  action: IntakeAction | 'unrecognized';
  rawAction: string;
  feedback: string;
  data: IntentData;
  valid?: boolean;
}

export interface ThreadRef {
  channelId: string;
  threadTs: string;
}

export interface TranscriptMessage {
  ts: string;
  authorIsBot: boolean;
  content: string;
}

export interface IncomingMessage {
  thread: ThreadRef;
  ts: string;
  userId?: string;
  content: string;
}

export interface Embed {
  title: string;
  description: string;
  footer?: string;
  color: string;
}

export interface TaskDraft {
  title: string;
  project: string;
  deadline?: string | null;
  content?: string;
  backLink?: string;
}

export type IntakeOutcome =
  | { type: 'skipped'; state: IntakeState; reason: string }
  | { type: 'recovered'; state: IntakeState }
  | { type: 'handled'; action: ExtractedIntent['action']; state: IntakeState | null }
  | { type: 'error'; message: string };

export function threadKey(thread: ThreadRef): string {
  return `${thread.channelId}:${thread.threadTs}`;
}

export function isOpeningMessage(message: { ts: string; thread: ThreadRef }): boolean {
  return message.ts === message.thread.threadTs;
}

/**
 * Slack timestamps are "<epoch seconds>.<sequence>"
 */
export function threadCreatedAt(thread: ThreadRef): Date {
  return new Date(Math.floor(parseFloat(thread.threadTs) * 1000));
}
