/**
 * Notion integration - the task database behind the intake flow
 * Every call degrades to null/[] so the state machine decides what a failure means
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { TaskDraft } from '../types/core';
import type { TaskStore } from '../types/integrations';
import { formatIsoDate, parseIsoDate } from '../parsers/deadlineParser';
import { extractPageId, sameNotionId } from '../parsers/notionUrlParser';

export interface NotionConfig {
  databaseId: string;
  titleProperty: string;
  projectProperty: string;
  deadlineProperty: string;
  threadProperty: string;
  timeoutMs?: number;
  optionsTtlMs?: number;
  baseURL?: string;
}

const NOTION_VERSION = '2022-06-28';
const MAX_TEXT_CHUNK = 2000;

const PageSchema = z.object({ id: z.string(), url: z.string() });

const QuerySchema = z.object({ results: z.array(PageSchema) });

const PageParentSchema = z.object({
  parent: z.object({ type: z.string(), database_id: z.string().optional() })
});

const OptionsSchema = z.object({ options: z.array(z.object({ name: z.string() })) });

const DatabaseSchema = z.object({
  properties: z.record(
    z.object({
      type: z.string(),
      select: OptionsSchema.optional(),
      multi_select: OptionsSchema.optional(),
      status: OptionsSchema.optional()
    }).passthrough()
  )
});

export function chunkText(text: string, size: number = MAX_TEXT_CHUNK): string[] {
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}

export class NotionService implements TaskStore {
  private client: AxiosInstance;
  private config: NotionConfig;
  private optionsCache: { fetchedAt: number; options: string[] } | null = null;

  constructor(apiToken: string, config: NotionConfig, client?: AxiosInstance) {
    this.config = {
      timeoutMs: 30000,
      optionsTtlMs: 60000,
      ...config
    };

    this.client = client ?? axios.create({
      baseURL: this.config.baseURL ?? 'https://api.notion.com/v1',
      timeout: this.config.timeoutMs,
      headers: {
        'Authorization': `Bearer ${apiToken}`,
        'Notion-Version': NOTION_VERSION,
        'Content-Type': 'application/json'
      }
    });
  }

  /**
   * Create a task page. Returns its URL.
   */
  async createRecord(draft: TaskDraft): Promise<string | null> {
    const { titleProperty, projectProperty, deadlineProperty, threadProperty } = this.config;

    const properties: Record<string, unknown> = {
      [titleProperty]: { title: [{ text: { content: draft.title } }] },
      [projectProperty]: { select: { name: draft.project } }
    };

    const deadline = draft.deadline ? parseIsoDate(draft.deadline) : null;
    if (deadline) {
      properties[deadlineProperty] = { date: { start: formatIsoDate(deadline) } };
    } else if (draft.deadline) {
      console.warn(`[notion] Deadline "${draft.deadline}" is not a date, leaving the property empty`);
    }

    if (draft.backLink) {
      properties[threadProperty] = { url: draft.backLink };
    }

    const children = chunkText(draft.content ?? '').map(chunk => ({
      object: 'block',
      type: 'paragraph',
      paragraph: { rich_text: [{ type: 'text', text: { content: chunk } }] }
    }));

    try {
      const response = await this.client.post('/pages', {
        parent: { database_id: this.config.databaseId },
        properties,
        children
      });
      const page = PageSchema.parse(response.data);
      console.log(`[notion] Created task "${draft.title}" (${draft.project}) -> ${page.url}`);
      return page.url;
    } catch (error) {
      logAxiosError('Failed to create task', error);
      return null;
    }
  }

  /**
   * Find the task whose thread property points back at this thread
   */
  async findRecordByBackLink(backLink: string): Promise<string | null> {
    try {
      const response = await this.client.post(`/databases/${this.config.databaseId}/query`, {
        filter: { property: this.config.threadProperty, url: { equals: backLink } },
        page_size: 1
      });
      const result = QuerySchema.parse(response.data);
      return result.results[0]?.url ?? null;
    } catch (error) {
      logAxiosError('Failed to look up task by thread link', error);
      return null;
    }
  }

  /**
   * Ask Notion which database the linked page lives in
   */
  async isIntakeRecord(pageUrl: string): Promise<boolean> {
    const pageId = extractPageId(pageUrl);
    if (!pageId) return false;

    try {
      const response = await this.client.get(`/pages/${pageId}`);
      const { parent } = PageParentSchema.parse(response.data);
      return parent.database_id !== undefined && sameNotionId(parent.database_id, this.config.databaseId);
    } catch (error) {
      logAxiosError('Failed to look up linked page', error);
      return false;
    }
  }

  /**
   * Option names of the project property, cached briefly
   */
  async getValidProjectOptions(): Promise<string[]> {
    const ttl = this.config.optionsTtlMs ?? 0;
    if (this.optionsCache && Date.now() - this.optionsCache.fetchedAt < ttl) {
      return [...this.optionsCache.options];
    }

    try {
      const response = await this.client.get(`/databases/${this.config.databaseId}`);
      const database = DatabaseSchema.parse(response.data);
      const property = database.properties[this.config.projectProperty];
      if (!property) {
        console.warn(`[notion] Database has no "${this.config.projectProperty}" property`);
        return [];
      }

      const source = property.select ?? property.multi_select ?? property.status;
      const options = (source?.options ?? []).map(option => option.name);
      this.optionsCache = { fetchedAt: Date.now(), options };
      return [...options];
    } catch (error) {
      logAxiosError('Failed to fetch project options', error);
      return [];
    }
  }

  /**
   * Point an existing task at its thread (used when linking by hand)
   */
  async linkRecordToThread(pageUrl: string, backLink: string): Promise<boolean> {
    const pageId = extractPageId(pageUrl);
    if (!pageId) {
      console.error(`[notion] Could not find a page id in ${pageUrl}`);
      return false;
    }

    try {
      await this.client.patch(`/pages/${pageId}`, {
        properties: { [this.config.threadProperty]: { url: backLink } }
      });
      return true;
    } catch (error) {
      logAxiosError('Failed to link task to thread', error);
      return false;
    }
  }
}

function logAxiosError(context: string, error: unknown): void {
  if (axios.isAxiosError(error) && error.response) {
    console.error(`[notion] ${context}: HTTP ${error.response.status}`, error.response.data);
  } else {
    console.error(`[notion] ${context}:`, error);
  }
}
