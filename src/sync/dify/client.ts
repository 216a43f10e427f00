import { z } from "zod";
import type { DocumentPublisher } from "@/sync/types";
import { PublishError, errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("dify-client");

/** Returned when Dify accepted the document but the response carried no id. */
export const UPLOADED_WITHOUT_ID = "uploaded_without_id";

export interface DifyCredentials {
  apiUrl: string;
  apiKey: string;
  datasetId: string;
}

const PROCESS_RULE = { mode: "automatic" } as const;

// The document id has moved between Dify releases.
const createDocumentResponseSchema = z
  .object({
    document: z.object({ id: z.string().optional() }).passthrough().nullish(),
    id: z.string().optional(),
    document_id: z.string().optional(),
  })
  .passthrough();

/** Publishes documents into one Dify knowledge base (dataset). */
export class DifyPublisher implements DocumentPublisher {
  private baseUrl: string;
  private credentials: DifyCredentials;
  private timeoutMs: number;

  constructor(credentials: DifyCredentials, options: { timeoutMs: number }) {
    this.credentials = credentials;
    this.baseUrl = `${credentials.apiUrl.replace(/\/+$/, "")}/datasets/${encodeURIComponent(credentials.datasetId)}`;
    this.timeoutMs = options.timeoutMs;
  }

  async publish(name: string, content: string): Promise<string | null> {
    log.info("Uploading document to Dify", { name, contentLength: content.length });
    try {
      const docId = await this.createDocument(name, content);
      log.info("Document uploaded", { name, docId });
      return docId;
    } catch (error) {
      log.error("Dify upload failed", {
        name,
        status: error instanceof PublishError ? error.statusCode : undefined,
        error: errorMessage(error),
      });
      return null;
    }
  }

  /**
   * Create a document from text; deployments that lack `create_by_text`
   * (404/405) get the same content as a `.txt` file upload instead.
   */
  async createDocument(name: string, content: string): Promise<string> {
    let response = await this.post(name, "/document/create_by_text", {
      body: JSON.stringify({
        name,
        text: content,
        indexing_technique: "high_quality",
        process_rule: PROCESS_RULE,
      }),
      headers: { "Content-Type": "application/json" },
    });

    if (response.status === 404 || response.status === 405) {
      log.info("create_by_text unavailable, falling back to file upload", { name, status: response.status });
      const form = new FormData();
      form.append("file", new Blob([content], { type: "text/plain" }), `${name}.txt`);
      form.append("data", JSON.stringify({ indexing_technique: "high_quality", process_rule: PROCESS_RULE }));
      response = await this.post(name, "/document/create_by_file", { body: form });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new PublishError(name, `${response.status} ${body.slice(0, 300)}`.trim(), response.status);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new PublishError(name, "response was not valid JSON", response.status, error);
    }

    const parsed = createDocumentResponseSchema.safeParse(json);
    const docId = parsed.success
      ? parsed.data.document?.id || parsed.data.id || parsed.data.document_id
      : undefined;

    if (!docId) {
      log.warn("Dify accepted the document but returned no id", { name });
      return UPLOADED_WITHOUT_ID;
    }
    return docId;
  }

  private async post(name: string, path: string, init: { body: string | FormData; headers?: Record<string, string> }): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.credentials.apiKey}`,
          ...init.headers,
        },
        body: init.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new PublishError(name, errorMessage(error), undefined, error);
    }
  }
}
