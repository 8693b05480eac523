/**
 * Prompt bundle for the intake classifier
 */

import { readFileSync } from 'fs';
import type { IntakeState } from '../types/threadState';
import type { TranscriptMessage } from '../types/core';

export const FALLBACK_TEMPLATE = `You review design requests posted in a Slack intake channel.
A complete request has: a project, a title, context (problem and audience), deliverables and a deadline.
Reply with JSON: {"action": string, "feedback": string, "data": {"project": string, "title": string, "deadline": "YYYY-MM-DD"}}.
Valid actions: approve, offer_creation, create_task, validate_edit, delete_history, request_edit, synthesize, handoff, wait.`;

export function loadPromptTemplate(promptPath: string): string {
  try {
    const template = readFileSync(promptPath, 'utf-8').trim();
    if (template) return template;
    console.warn(`[prompts] ${promptPath} is empty, using built-in template`);
  } catch (error) {
    console.error(`[prompts] Could not read ${promptPath}, using built-in template:`, error);
  }
  return FALLBACK_TEMPLATE;
}

export interface IntakePromptInput {
  template: string;
  state: IntakeState;
  isOpeningMessage: boolean;
  referenceDate: Date;
  openingContent: string;
  history: TranscriptMessage[];
  latestMessage: string;
}

export interface PromptBundle {
  system: string;
  user: string;
}

export function formatTranscript(history: TranscriptMessage[]): string {
  return history
    .filter(message => message.content.trim() !== '')
    .map(message => `${message.authorIsBot ? 'BOT' : 'USER'}: ${message.content.trim()}`)
    .join('\n');
}

export function buildIntakePrompt(input: IntakePromptInput): PromptBundle {
  const system = [
    input.template,
    '',
    `Current State: ${input.state}`,
    `Is Starter Message: ${input.isOpeningMessage}`,
    `Thread Date (UTC): ${input.referenceDate.toISOString().slice(0, 10)}`
  ].join('\n');

  const transcript = formatTranscript(input.history);

  const user = [
    'STARTER MESSAGE CONTENT:',
    input.openingContent,
    '',
    'RECENT THREAD HISTORY (oldest first):',
    transcript || '(none)',
    '',
    `Message: ${input.latestMessage}`
  ].join('\n');

  return { system, user };
}

/**
 * Re-validation looks at the freshly edited opening message and nothing else
 */
export function buildRevalidationPrompt(template: string, referenceDate: Date, openingContent: string): PromptBundle {
  return {
    system: [
      template,
      '',
      'Current State: waiting_edit',
      'Is Starter Message: true',
      `Thread Date (UTC): ${referenceDate.toISOString().slice(0, 10)}`
    ].join('\n'),
    user: `STARTER MESSAGE CONTENT: ${openingContent}`
  };
}
