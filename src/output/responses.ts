import { createHash } from "crypto";
import { promises as fs } from "fs";
import { STATUS_CODES } from "http";
import path from "path";
import pLimit from "p-limit";
import { CrawlResponse } from "../types/response";
import { resetDir } from "../utils/fs";
import { ArchiveError } from "./errors";
import { FileWriter } from "./fileWriter";

export const DEFAULT_RESPONSE_DIR = "crawlsink_responses";
export const INDEX_FILE = "index.txt";

export interface ArchivedResponse {
  url: string;
  fileName: string;
  filePath: string;
}

export function normalizeResponseUrl(rawUrl: string): string {
  try {
    return new URL(rawUrl).toString();
  } catch (error) {
    throw new ArchiveError(`could not parse response URL: ${rawUrl}`, { cause: error });
  }
}

export function responseFileName(url: string): string {
  const digest = createHash("sha256").update(normalizeResponseUrl(url)).digest("hex");
  return `${digest}.txt`;
}

const CONTROL_CHARS = /[\x00-\x1f\x7f]+/g;

type Limiter = ReturnType<typeof pLimit>;

// reason phrases come from the remote server; keep them on one line
function statusText(response: CrawlResponse): string {
  const text = response.statusMessage ?? STATUS_CODES[response.statusCode] ?? "";
  return text.replace(CONTROL_CHARS, " ").trim();
}

/** Dumps a response the way it came over the wire: status line, headers, blank line, body. */
export function formatResponse(response: CrawlResponse): Buffer {
  const lines = [
    `HTTP/${response.httpVersion ?? "1.1"} ${response.statusCode} ${statusText(response)}`.trimEnd()
  ];
  for (const [name, value] of Object.entries(response.headers)) {
    if (value === undefined) continue;
    for (const item of Array.isArray(value) ? value : [value]) {
      lines.push(`${name}: ${item}`);
    }
  }
  const head = Buffer.from(lines.join("\r\n") + "\r\n\r\n", "utf8");
  const body = typeof response.body === "string" ? Buffer.from(response.body, "utf8") : response.body;
  return Buffer.concat([head, body]);
}

export function formatIndexLine(archived: ArchivedResponse, response: CrawlResponse): string {
  const status = `${response.statusCode} ${statusText(response)}`.trim();
  return `${archived.fileName} ${archived.url} (${status})\n`;
}

/**
 * Writes raw responses into a per-run directory, one file per request URL, and
 * records every write in an append-only index.
 */
export class ResponseArchiver {
  private readonly indexLock = pLimit(1);
  private readonly fileLocks = new Map<string, Limiter>();

  private constructor(readonly dir: string) {}

  get indexPath(): string {
    return path.join(this.dir, INDEX_FILE);
  }

  /** Wipes `dir`, recreates it and starts an empty index. */
  static async create(dir: string = DEFAULT_RESPONSE_DIR): Promise<ResponseArchiver> {
    const archiver = new ResponseArchiver(dir);
    try {
      await resetDir(dir);
      await fs.writeFile(archiver.indexPath, "", "utf8");
    } catch (error) {
      throw new ArchiveError(`could not create response directory ${dir}`, { cause: error });
    }
    return archiver;
  }

  async write(response: CrawlResponse): Promise<ArchivedResponse> {
    const url = normalizeResponseUrl(response.request.url);
    const fileName = responseFileName(url);
    const archived: ArchivedResponse = { url, fileName, filePath: path.join(this.dir, fileName) };

    // same URL, same file: the file write and its index line go one response at a time
    await this.withFileLock(fileName, async () => {
      try {
        const file = await FileWriter.open(archived.filePath);
        try {
          await file.write(formatResponse(response));
        } finally {
          await file.close();
        }
      } catch (error) {
        throw new ArchiveError(`could not store response for ${url}`, { cause: error });
      }

      try {
        const line = formatIndexLine(archived, response);
        await this.indexLock(() => fs.appendFile(this.indexPath, line, "utf8"));
      } catch (error) {
        throw new ArchiveError(`could not update response index for ${url}`, { cause: error });
      }
    });
    return archived;
  }

  private async withFileLock(fileName: string, task: () => Promise<void>): Promise<void> {
    let limiter = this.fileLocks.get(fileName);
    if (!limiter) {
      limiter = pLimit(1);
      this.fileLocks.set(fileName, limiter);
    }
    try {
      await limiter(task);
    } finally {
      if (limiter.activeCount === 0 && limiter.pendingCount === 0) {
        this.fileLocks.delete(fileName);
      }
    }
  }
}
