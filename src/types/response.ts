export type ResponseHeaders = Record<string, string | string[] | undefined>;

export interface CrawlRequest {
  method?: string;
  url: string;
}

/** A raw HTTP response as fetched by a crawl worker, tied to the request that produced it. */
export interface CrawlResponse {
  request: CrawlRequest;
  httpVersion?: string;
  statusCode: number;
  statusMessage?: string;
  headers: ResponseHeaders;
  body: string | Buffer;
}
