/**
 * Thread state service - durable intake state per Slack thread
 *
 * One JSON file maps thread ids to records; an in-memory cache answers reads.
 * Every write replaces the file (temp file, then rename) before the caller
 * hears back, so a restart never loses a transition that was acknowledged.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { INTAKE_STATES, ThreadState, ThreadStateStore, ThreadStateUpdate } from '../types/threadState';

// On-disk layout. Unknown keys ride along untouched.
const PersistedRecordSchema = z
  .object({
    state: z.enum(INTAKE_STATES),
    task_reference: z.string().min(1).optional(),
    error_count: z.number().int().nonnegative().optional(),
    notion_errors: z.number().int().nonnegative().optional(),
    updated_at: z.string().optional()
  })
  .passthrough();

const StateFileSchema = z.record(z.unknown());

export function emptyThreadState(threadId: string): ThreadState {
  return { threadId, state: 'init', errorCount: 0, extra: {} };
}

export function decodeThreadState(threadId: string, raw: unknown): ThreadState | null {
  const parsed = PersistedRecordSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[state] Dropping invalid record for ${threadId}: ${parsed.error.message}`);
    return null;
  }

  const { state, task_reference, error_count, notion_errors, updated_at, ...extra } = parsed.data;
  return {
    threadId,
    state,
    taskReference: task_reference,
    errorCount: error_count ?? notion_errors ?? 0,
    updatedAt: updated_at,
    extra
  };
}

export function encodeThreadState(record: ThreadState): Record<string, unknown> {
  return {
    ...record.extra,
    state: record.state,
    ...(record.taskReference ? { task_reference: record.taskReference } : {}),
    error_count: record.errorCount,
    updated_at: record.updatedAt
  };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class ThreadStateService implements ThreadStateStore {
  private stateCache: Map<string, ThreadState> = new Map();
  private ready: Promise<void>;
  private writes: Promise<void> = Promise.resolve();
  private now: () => Date;

  constructor(private readonly filePath: string = './intake_state.json', now: () => Date = () => new Date()) {
    this.now = now;
    this.ready = this.load();
  }

  /**
   * Never rejects: a missing or unreadable file leaves the store empty.
   */
  private async load(): Promise<void> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        console.error(`[state] Could not read ${this.filePath}, starting empty:`, error);
      }
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      console.error(`[state] ${this.filePath} is not valid JSON, starting empty:`, error);
      return;
    }

    const parsed = StateFileSchema.safeParse(raw);
    if (!parsed.success) {
      console.error(`[state] ${this.filePath} is not a thread map, starting empty`);
      return;
    }

    for (const [threadId, value] of Object.entries(parsed.data)) {
      const record = decodeThreadState(threadId, value);
      if (record) {
        this.stateCache.set(threadId, record);
      }
    }
    console.log(`[state] Loaded ${this.stateCache.size} thread records`);
  }

  async whenReady(): Promise<void> {
    await this.ready;
  }

  async getThreadState(threadId: string): Promise<ThreadState> {
    await this.ready;
    const cached = this.stateCache.get(threadId);
    return cached ? { ...cached, extra: { ...cached.extra } } : emptyThreadState(threadId);
  }

  /**
   * Merge fields into the record and persist before returning.
   * A state change resets errorCount unless the update sets it.
   */
  async updateThreadState(threadId: string, update: ThreadStateUpdate): Promise<ThreadState> {
    const existing = await this.getThreadState(threadId);

    let taskReference = existing.taskReference;
    if (update.taskReference !== undefined) {
      if (existing.taskReference && existing.taskReference !== update.taskReference) {
        console.warn(`[state] ${threadId} already linked to ${existing.taskReference}, ignoring ${update.taskReference}`);
      } else {
        taskReference = update.taskReference;
      }
    }

    const state = update.state ?? existing.state;
    const stateChanged = state !== existing.state;
    const errorCount = update.errorCount !== undefined
      ? update.errorCount
      : stateChanged ? 0 : existing.errorCount;

    const next: ThreadState = {
      threadId,
      state,
      taskReference,
      errorCount,
      updatedAt: this.now().toISOString(),
      extra: existing.extra
    };

    await this.commit(threadId, next);
    return { ...next, extra: { ...next.extra } };
  }

  async clearThreadState(threadId: string): Promise<void> {
    await this.ready;
    await this.commit(threadId, null);
  }

  async listThreadStates(): Promise<ThreadState[]> {
    await this.ready;
    return [...this.stateCache.values()].map(record => ({ ...record, extra: { ...record.extra } }));
  }

  /**
   * Waits for queued writes
   */
  async close(): Promise<void> {
    await this.ready;
    await this.writes;
  }

  /**
   * Apply one change to the cache and write the file; undo the change if the
   * write fails.
   */
  private async commit(threadId: string, record: ThreadState | null): Promise<void> {
    const previous = this.stateCache.get(threadId);
    if (record) {
      this.stateCache.set(threadId, record);
    } else {
      this.stateCache.delete(threadId);
    }

    try {
      await this.persist();
    } catch (error) {
      if (previous) {
        this.stateCache.set(threadId, previous);
      } else {
        this.stateCache.delete(threadId);
      }
      throw error;
    }
  }

  /**
   * Writes run one at a time; each one snapshots the cache when its turn comes.
   */
  private persist(): Promise<void> {
    const write = this.writes.then(() => this.writeFile());
    // the caller of this write gets its error; later writes still run
    this.writes = write.catch(() => undefined);
    return write;
  }

  private async writeFile(): Promise<void> {
    const snapshot: Record<string, unknown> = {};
    for (const [threadId, record] of this.stateCache) {
      snapshot[threadId] = encodeThreadState(record);
    }

    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(snapshot, null, 2), 'utf-8');
    await fs.rename(tmpPath, this.filePath);
  }
}
