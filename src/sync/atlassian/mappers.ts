import type { SyncItem } from "@/sync/types";
import { parseTimestamp, toDate } from "@/sync/ledger/timestamps";
import type { ConfluencePageResponse, JiraIssueResponse } from "./types";

export const MAX_PAGE_TEXT_LENGTH = 5000;

export function mapIssue(raw: JiraIssueResponse): SyncItem {
  const { summary, description, status, updated } = raw.fields;
  return {
    id: raw.key,
    type: "JIRA",
    updatedAt: updated,
    content: `Title: ${summary ?? ""}\n\nDescription: ${description || "None"}\n\nStatus: ${status?.name ?? "Unknown"}`,
  };
}

export function mapPage(raw: ConfluencePageResponse): SyncItem {
  const text = htmlToText(raw.body?.storage?.value ?? "");
  return {
    id: raw.id,
    type: "CONFLUENCE",
    updatedAt: raw.version.when,
    content: `Title: ${raw.title}\n\nContent: ${truncate(text, MAX_PAGE_TEXT_LENGTH)}`,
  };
}

/** Cut to `max` code points so a surrogate pair is never split. */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return Array.from(text).slice(0, max).join("");
}

const ENTITIES: Record<string, string> = {
  "&nbsp;": " ",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": "\"",
  "&#39;": "'",
  "&amp;": "&",
};

/** Storage-format HTML to plain text: tags become spaces, whitespace collapses. */
export function htmlToText(html: string): string {
  return html
    .replace(/<[^>]+>/g, " ")
    .replace(/&(nbsp|lt|gt|quot|#39|amp);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/\s+/g, " ")
    .trim();
}

/** Pages with an unreadable timestamp are kept; change detection fails open on them. */
export function updatedSince(page: ConfluencePageResponse, since: Date): boolean {
  const parsed = parseTimestamp(page.version.when);
  if (!parsed) return true;
  return toDate(parsed).getTime() >= since.getTime();
}
