// Raw response shapes from the Atlassian Cloud REST APIs.
// Jira: /rest/api/2/search/jql   Confluence: /wiki/rest/api/content
import { z } from "zod";

export const jiraIssueSchema = z.object({
  id: z.string(),
  key: z.string(),
  fields: z.object({
    summary: z.string().nullish(),
    description: z.string().nullish(),
    status: z.object({ name: z.string() }).nullish(),
    updated: z.string(),
  }),
});

export const jiraSearchResponseSchema = z.object({
  issues: z.array(jiraIssueSchema),
  isLast: z.boolean().optional(),
  nextPageToken: z.string().optional(),
});

export const confluencePageSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string(),
  version: z.object({
    when: z.string(),
    number: z.number().optional(),
  }),
  body: z
    .object({
      storage: z.object({ value: z.string() }).partial().optional(),
    })
    .optional(),
});

export const confluenceContentResponseSchema = z.object({
  results: z.array(confluencePageSchema),
  start: z.number().optional(),
  limit: z.number().optional(),
  size: z.number().optional(),
});

export type JiraIssueResponse = z.infer<typeof jiraIssueSchema>;
export type JiraSearchResponse = z.infer<typeof jiraSearchResponseSchema>;
export type ConfluencePageResponse = z.infer<typeof confluencePageSchema>;
export type ConfluenceContentResponse = z.infer<typeof confluenceContentResponseSchema>;
