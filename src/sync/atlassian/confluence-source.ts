import type { SourceAdapter, SourceType, SyncItem } from "@/sync/types";
import { errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import type { AtlassianClient } from "./client";
import { mapPage, updatedSince } from "./mappers";
import { confluenceContentResponseSchema } from "./types";

const log = createChildLogger("confluence-source");

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ConfluenceSourceOptions {
  spaceKey: string;
  sinceDays: number;
  pageSize: number;
}

/** Pages of one Confluence space updated within the last `sinceDays` days. */
export class ConfluenceSource implements SourceAdapter {
  readonly type: SourceType = "CONFLUENCE";

  constructor(
    private client: AtlassianClient,
    private options: ConfluenceSourceOptions,
    private now: () => Date = () => new Date(),
  ) {}

  /** Confluence Cloud serves its REST API under /wiki. */
  contentPath(): string {
    return this.client.siteUrl.endsWith("/wiki") ? "/rest/api/content" : "/wiki/rest/api/content";
  }

  async fetch(): Promise<SyncItem[]> {
    const { spaceKey, sinceDays, pageSize } = this.options;
    const since = new Date(this.now().getTime() - sinceDays * DAY_MS);
    log.info("Fetching Confluence pages", { spaceKey, since: since.toISOString(), pageSize });

    try {
      const response = await this.client.get("Confluence", this.contentPath(), confluenceContentResponseSchema, {
        spaceKey,
        type: "page",
        start: "0",
        limit: String(pageSize),
        expand: "version,body.storage",
      });

      const items = response.results
        .filter((page) => updatedSince(page, since))
        .map(mapPage);

      log.info("Confluence pages fetched", {
        spaceKey,
        count: items.length,
        outsideWindow: response.results.length - items.length,
      });
      return items;
    } catch (error) {
      log.error("Confluence fetch failed, continuing without Confluence items", {
        spaceKey,
        error: errorMessage(error),
      });
      return [];
    }
  }
}
