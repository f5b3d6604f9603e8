import { z } from "zod";
import { CrawlResponse } from "../types/response";
import { Result } from "../types/result";

const HeaderValueSchema = z.union([z.string(), z.array(z.string())]);

export const CrawlLogResponseSchema = z.object({
  url: z.string().min(1),
  method: z.string().optional(),
  status: z.number().int().min(100).max(999),
  status_text: z.string().optional(),
  http_version: z.string().optional(),
  headers: z.record(HeaderValueSchema).default({}),
  body: z.string().default("")
});

export const CrawlLogRecordSchema = z.object({
  timestamp: z.string().datetime({ offset: true }).optional(),
  method: z.string().optional(),
  body: z.string().optional(),
  endpoint: z.string().optional(),
  source: z.string().optional(),
  tag: z.string().optional(),
  attribute: z.string().optional(),
  response: CrawlLogResponseSchema.optional()
});

export type CrawlLogRecord = z.infer<typeof CrawlLogRecordSchema>;
export type CrawlLogResponse = z.infer<typeof CrawlLogResponseSchema>;

export interface CrawlLogEntry {
  result: Result | null;
  response: CrawlResponse | null;
}

export function toResult(record: CrawlLogRecord): Result | null {
  const result: Result = {
    timestamp: record.timestamp ? new Date(record.timestamp) : undefined,
    method: record.method,
    body: record.body,
    url: record.endpoint,
    source: record.source,
    tag: record.tag,
    attribute: record.attribute
  };
  const hasValue = Object.values(result).some((value) => value !== undefined);
  return hasValue ? result : null;
}

export function toCrawlResponse(response: CrawlLogResponse): CrawlResponse {
  return {
    request: { method: response.method, url: response.url },
    httpVersion: response.http_version,
    statusCode: response.status,
    statusMessage: response.status_text,
    headers: response.headers,
    body: response.body
  };
}

/** Parses one line of a crawl log. Throws when the line is not valid JSON or does not match the schema. */
export function parseCrawlLogLine(line: string): CrawlLogEntry {
  const record = CrawlLogRecordSchema.parse(JSON.parse(line));
  return {
    result: toResult(record),
    response: record.response ? toCrawlResponse(record.response) : null
  };
}
