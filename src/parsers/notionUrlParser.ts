/**
 * Notion link helpers - finding task links in chat text and checking they
 * point into the intake database
 */

// Slack wraps links as <url|label>, so stop at < > and |
const NOTION_URL = /https?:\/\/(?:[\w-]+\.)?notion\.(?:so|site)\/[^\s<>|]+/gi;

const PAGE_ID = /([a-f0-9]{32}|[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12})/i;

export function extractNotionUrls(text: string): string[] {
  return text.match(NOTION_URL) ?? [];
}

export function extractPageId(url: string): string | null {
  const match = url.match(PAGE_ID);
  return match ? match[1].replace(/-/g, '').toLowerCase() : null;
}

export interface NotionTarget {
  databaseId: string;
  workspace?: string;
}

function compactId(id: string): string {
  return id.replace(/-/g, '').toLowerCase();
}

/**
 * True only when the link itself carries the intake database id
 */
export function isIntakeDatabaseUrl(url: string, target: NotionTarget): boolean {
  const dbId = compactId(target.databaseId);
  return dbId !== '' && compactId(url).includes(dbId);
}

/**
 * A page link under the configured workspace. It may be any page there, so
 * callers still have to ask Notion which database it belongs to.
 */
export function isWorkspacePageUrl(url: string, workspace: string | undefined): boolean {
  if (!workspace || !extractPageId(url)) return false;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  const name = workspace.toLowerCase();
  const firstSegment = parsed.pathname.split('/').filter(Boolean)[0]?.toLowerCase();
  return firstSegment === name || parsed.hostname.toLowerCase() === `${name}.notion.site`;
}

export function sameNotionId(a: string, b: string): boolean {
  return compactId(a) === compactId(b);
}
