/**
 * Thread ↔ Notion manifest - an operator-maintained CSV that records which
 * threads already have a task (or were deliberately skipped)
 *
 * Columns: thread_id,thread_title,notion_url,status,notes
 */

import { promises as fs } from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { ThreadMapping, ThreadMappingEntry } from '../types/integrations';

const RowsSchema = z.array(z.record(z.string()));

export function parseThreadMapping(text: string): ThreadMappingEntry[] {
  let header: string[] = [];
  const rows = RowsSchema.parse(parse(text, {
    columns: (names: string[]) => {
      header = names.map(name => name.trim().toLowerCase());
      return header;
    },
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true
  }));

  if (header.length > 0 && !header.includes('thread_id')) {
    console.warn('[mapping] Manifest has no thread_id column');
    return [];
  }

  const cell = (row: Record<string, string>, name: string): string | undefined => row[name] || undefined;

  const entries: ThreadMappingEntry[] = [];
  for (const row of rows) {
    const threadId = cell(row, 'thread_id');
    if (!threadId) continue;
    entries.push({
      threadId,
      title: cell(row, 'thread_title'),
      taskReference: cell(row, 'notion_url'),
      status: (cell(row, 'status') ?? 'pending').toLowerCase(),
      notes: cell(row, 'notes')
    });
  }
  return entries;
}

export class ThreadMappingService implements ThreadMapping {
  constructor(private readonly filePath: string) {}

  /**
   * Re-reads the file every time; operators edit it while the bot runs.
   */
  async lookup(threadId: string, alternateIds: string[] = []): Promise<ThreadMappingEntry | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      console.error(`[mapping] Could not read ${this.filePath}:`, error);
      return null;
    }

    let entries: ThreadMappingEntry[];
    try {
      entries = parseThreadMapping(text);
    } catch (error) {
      console.error(`[mapping] Could not parse ${this.filePath}:`, error);
      return null;
    }

    const ids = new Set([threadId, ...alternateIds]);
    return entries.find(entry => ids.has(entry.threadId)) ?? null;
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
