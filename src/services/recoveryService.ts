/**
 * State recovery - works out whether a thread with no stored state was
 * already handled by an earlier run of the bot.
 *
 * Structured sources (manifest, Notion back-link, link in the starter) beat the
 * wording-based history scan; the scan only decides when nothing structured matches.
 */

import type { ThreadRef, TranscriptMessage } from '../types/core';
import { threadCreatedAt, threadKey } from '../types/core';
import type { IntakeState } from '../types/threadState';
import type { ConversationTransport, TaskStore, ThreadMapping } from '../types/integrations';
import { RECOVERY_MARKERS } from '../core/replies';
import { describeError } from '../core/errors';
import { extractNotionUrls, isIntakeDatabaseUrl, isWorkspacePageUrl, NotionTarget } from '../parsers/notionUrlParser';
import { pTimeout } from '../utils/timeout';

export type RecoverySource = 'history' | 'mapping' | 'task_store' | 'inline_link' | 'boot_suppression';

export interface RecoveryResult {
  state: IntakeState;
  taskReference?: string;
  source: RecoverySource;
}

export interface RecoveryOptions {
  notion: NotionTarget;
  allowlist: string[];
  scanLimit: number;
  bootTime: Date;
  timeoutMs: number;
}

const IGNORED_STATUSES = new Set(['ignored', 'ignore', 'skip', 'skipped']);

export function isAllowlisted(thread: ThreadRef, allowlist: readonly string[]): boolean {
  return allowlist.includes(threadKey(thread)) || allowlist.includes(thread.threadTs);
}

export class StateRecovery {
  constructor(
    private readonly transport: ConversationTransport,
    private readonly taskStore: TaskStore,
    private readonly mapping: ThreadMapping,
    private readonly options: RecoveryOptions
  ) {}

  async recover(thread: ThreadRef): Promise<RecoveryResult | null> {
    const key = threadKey(thread);

    const candidate = await this.scanHistory(thread);

    const structured =
      (await this.fromMapping(thread)) ??
      (await this.fromTaskStore(thread)) ??
      (await this.fromInlineLink(thread));

    if (structured?.state === 'ignored_existing' && isAllowlisted(thread, this.options.allowlist)) {
      console.log(`[recovery] ${key} is marked ignored but allow-listed, processing normally`);
    } else if (structured) {
      console.log(`[recovery] ${key} -> ${structured.state} (${structured.source})`);
      return structured;
    }

    if (candidate) {
      console.log(`[recovery] ${key} -> ${candidate.state} (history)`);
      return candidate;
    }

    if (threadCreatedAt(thread) < this.options.bootTime) {
      if (isAllowlisted(thread, this.options.allowlist)) {
        console.log(`[recovery] ${key} predates boot but is allow-listed, processing normally`);
        return null;
      }
      console.log(`[recovery] ${key} predates boot, ignoring`);
      return { state: 'ignored_existing', source: 'boot_suppression' };
    }

    return null;
  }

  /**
   * Newest bot message carrying a marker decides. An approval marker only
   * counts when the same message still shows the task link.
   */
  private async scanHistory(thread: ThreadRef): Promise<RecoveryResult | null> {
    let recent: TranscriptMessage[];
    try {
      recent = await pTimeout(
        this.transport.history(thread, this.options.scanLimit, false),
        this.options.timeoutMs,
        'history scan'
      );
    } catch (error) {
      console.warn(`[recovery] History scan failed for ${threadKey(thread)}: ${describeError(error)}`);
      return null;
    }

    for (const message of recent) {
      if (!message.authorIsBot) continue;
      const lowered = message.content.toLowerCase();
      const marker = RECOVERY_MARKERS.find(m => lowered.includes(m.phrase.toLowerCase()));
      if (!marker) continue;

      if (marker.state === 'approved') {
        const reference = extractNotionUrls(message.content)[0];
        if (!reference) continue;
        return { state: 'approved', taskReference: reference, source: 'history' };
      }
      return { state: marker.state, source: 'history' };
    }
    return null;
  }

  private async fromMapping(thread: ThreadRef): Promise<RecoveryResult | null> {
    try {
      const entry = await pTimeout(
        this.mapping.lookup(threadKey(thread), [thread.threadTs]),
        this.options.timeoutMs,
        'mapping lookup'
      );
      if (!entry) return null;

      if (entry.status === 'approved' && entry.taskReference) {
        return { state: 'approved', taskReference: entry.taskReference, source: 'mapping' };
      }
      if (IGNORED_STATUSES.has(entry.status)) {
        return { state: 'ignored_existing', source: 'mapping' };
      }
    } catch (error) {
      console.warn(`[recovery] Mapping lookup failed: ${describeError(error)}`);
    }
    return null;
  }

  private async fromTaskStore(thread: ThreadRef): Promise<RecoveryResult | null> {
    try {
      const backLink = await pTimeout(
        this.transport.permalink(thread, thread.threadTs),
        this.options.timeoutMs,
        'permalink'
      );
      if (!backLink) return null;

      const reference = await pTimeout(
        this.taskStore.findRecordByBackLink(backLink),
        this.options.timeoutMs,
        'task store lookup'
      );
      if (reference) {
        return { state: 'approved', taskReference: reference, source: 'task_store' };
      }
    } catch (error) {
      console.warn(`[recovery] Task store lookup failed: ${describeError(error)}`);
    }
    return null;
  }

  private async fromInlineLink(thread: ThreadRef): Promise<RecoveryResult | null> {
    try {
      const opening = await pTimeout(
        this.transport.fetchMessage(thread, thread.threadTs),
        this.options.timeoutMs,
        'opening message'
      );
      const links = extractNotionUrls(opening.content);

      const direct = links.find(url => isIntakeDatabaseUrl(url, this.options.notion));
      if (direct) {
        return { state: 'approved', taskReference: direct, source: 'inline_link' };
      }

      // A workspace page may be a brief rather than the task; Notion decides
      for (const url of links.filter(link => isWorkspacePageUrl(link, this.options.notion.workspace))) {
        const isTask = await pTimeout(this.taskStore.isIntakeRecord(url), this.options.timeoutMs, 'linked page lookup');
        if (isTask) {
          return { state: 'approved', taskReference: url, source: 'inline_link' };
        }
      }
    } catch (error) {
      console.warn(`[recovery] Could not read opening message: ${describeError(error)}`);
    }
    return null;
  }
}
