/**
 * Everything the bot says in a thread. Recovery scans past bot messages for
 * the marker phrases below, so a marker must stay a substring of its reply.
 */

import type { Embed } from '../types/core';
import type { IntakeState } from '../types/threadState';

export const APPROVAL_TITLE = 'Design Intake Quality Gate';
export const APPROVAL_FOOTER = '✅ APPROVED';
const APPROVAL_COLOR = '#2eb67d';

const TASK_DETAILS_MARKER = 'project name';
const DELETE_MARKER = 'clean up our messages';
const TASK_LINK_MARKER = 'Notion task:';

/**
 * Phrases that pin a thread to a state when seen in an earlier bot reply
 */
export const RECOVERY_MARKERS: ReadonlyArray<{ state: IntakeState; phrase: string }> = [
  { state: 'approved', phrase: APPROVAL_FOOTER },
  { state: 'waiting_delete', phrase: DELETE_MARKER },
  { state: 'waiting_task_details', phrase: TASK_DETAILS_MARKER }
];

export const replies = {
  technicalDifficulty:
    "Sorry, I'm having technical trouble reading this thread right now. Please try again in a few minutes.",

  alreadyCompleted: (reference: string) =>
    `This request is already registered, no need to create it again. ${TASK_LINK_MARKER} ${reference}`,

  askTaskDetails:
    `Want me to create the Notion task for you? Reply with the **${TASK_DETAILS_MARKER}** and the **task title**.`,

  projectClarification: (raw: string | undefined, options: string[]) => {
    const intro = raw
      ? `I couldn't match the project "${raw}" to a known one.`
      : "I couldn't tell which project this is for.";
    const list = options.length > 0
      ? options.map(option => `• ${option}`).join('\n')
      : '• (the project list is unavailable right now)';
    return `${intro} Please reply with the ${TASK_DETAILS_MARKER}, using one of these:\n${list}`;
  },

  missingTitle:
    "I couldn't understand the project or task title. Could you repeat it? (Format: Project - Title)",

  taskCreated: (reference: string) =>
    `✅ Task created. ${TASK_LINK_MARKER} ${reference}\nPlease edit your original post to include this link and let me know when it's ready.`,

  approvalBody: (feedback: string, reference: string) =>
    [feedback.trim(), `✅ I created the task in Notion for you. ${TASK_LINK_MARKER} ${reference}`]
      .filter(Boolean)
      .join('\n\n'),

  creationFailed:
    '❌ I couldn\'t create the task in Notion. Please try again in a moment or double-check the details.',

  manualFallback: (formUrl: string | undefined) =>
    [
      "❌ I couldn't create the task automatically after several attempts.",
      formUrl
        ? `Please use this form to register it by hand:\n${formUrl}`
        : 'Please create it by hand in Notion.',
      'Once it exists, paste the link here.'
    ].join('\n'),

  openingUnreadable: "I couldn't read the original message of this thread.",

  offerCleanup: `Great! Do you want me to ${DELETE_MARKER} so the thread stays tidy? (Reply 'yes')`,

  cleaningUp: 'Cleaning up the conversation...',

  teamNotification: (args: {
    mention?: string;
    project: string;
    title: string;
    reference: string;
    threadLink: string;
    edited: boolean;
  }) =>
    [
      `${args.mention ? `${args.mention} ` : ''}*New design request approved${args.edited ? ' (edited post)' : ''}*`,
      `📂 *Project:* ${args.project}`,
      `📝 *Task:* ${args.title}`,
      `🔗 *Notion:* ${args.reference}`,
      `💬 *Thread:* ${args.threadLink}`
    ].join('\n')
};

export function approvalEmbed(description: string): Embed {
  return {
    title: APPROVAL_TITLE,
    description,
    footer: APPROVAL_FOOTER,
    color: APPROVAL_COLOR
  };
}
