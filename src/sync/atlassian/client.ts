import type { z } from "zod";
import { SourceFetchError, errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("atlassian-client");

export interface AtlassianCredentials {
  url: string;
  email: string;
  apiToken: string;
}

/**
 * Minimal authenticated client for Atlassian Cloud. Jira and Confluence share
 * the site URL and the email + API token basic auth.
 */
export class AtlassianClient {
  private baseUrl: string;
  private authHeader: string;
  private timeoutMs: number;

  constructor(credentials: AtlassianCredentials, options: { timeoutMs: number }) {
    this.baseUrl = credentials.url.replace(/\/+$/, "");
    this.authHeader = `Basic ${Buffer.from(`${credentials.email}:${credentials.apiToken}`).toString("base64")}`;
    this.timeoutMs = options.timeoutMs;
  }

  get siteUrl(): string {
    return this.baseUrl;
  }

  /** GET a JSON endpoint and validate the body. Every failure is a SourceFetchError. */
  async get<S extends z.ZodTypeAny>(
    source: string,
    path: string,
    schema: S,
    params?: Record<string, string>,
  ): Promise<z.output<S>> {
    const url = new URL(`${this.baseUrl}${path}`);
    if (params) {
      Object.entries(params).forEach(([k, v]) => {
        if (v !== "") url.searchParams.set(k, v);
      });
    }

    log.debug("Atlassian API request", { source, path, params });

    let response: Response;
    try {
      response = await fetch(url.toString(), {
        headers: {
          Authorization: this.authHeader,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new SourceFetchError(source, `request to ${path} failed: ${errorMessage(error)}`, error);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new SourceFetchError(source, `${response.status} ${response.statusText} ${body.slice(0, 200)}`.trim());
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new SourceFetchError(source, "response was not valid JSON", error);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new SourceFetchError(source, `unexpected response shape: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    return parsed.data;
  }
}
