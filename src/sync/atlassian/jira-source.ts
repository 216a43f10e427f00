import type { SourceAdapter, SourceType, SyncItem } from "@/sync/types";
import { errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import type { AtlassianClient } from "./client";
import { mapIssue } from "./mappers";
import { jiraSearchResponseSchema } from "./types";

const log = createChildLogger("jira-source");

export interface JiraSourceOptions {
  projectKey: string;
  /** JQL relative date such as `-30d`, or an absolute `yyyy-MM-dd`. */
  since: string;
  pageSize: number;
}

export function buildJql(projectKey: string, since: string): string {
  const quote = (v: string) => `'${v.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
  return `project = ${quote(projectKey)} AND updated >= ${quote(since)} ORDER BY updated DESC`;
}

/** Recently updated issues of one Jira project, newest first, one page only. */
export class JiraSource implements SourceAdapter {
  readonly type: SourceType = "JIRA";

  constructor(
    private client: AtlassianClient,
    private options: JiraSourceOptions,
  ) {}

  async fetch(): Promise<SyncItem[]> {
    const { projectKey, since, pageSize } = this.options;
    log.info("Fetching Jira issues", { projectKey, since, pageSize });

    try {
      const response = await this.client.get("Jira", "/rest/api/2/search/jql", jiraSearchResponseSchema, {
        jql: buildJql(projectKey, since),
        maxResults: String(pageSize),
        fields: "summary,description,status,updated",
      });

      const items = response.issues.map(mapIssue);
      if (response.isLast === false || response.nextPageToken) {
        log.warn("Jira returned more issues than one page holds; only the first page is synced", {
          projectKey,
          pageSize,
        });
      }
      log.info("Jira issues fetched", { projectKey, count: items.length });
      return items;
    } catch (error) {
      log.error("Jira fetch failed, continuing without Jira items", {
        projectKey,
        error: errorMessage(error),
      });
      return [];
    }
  }
}
