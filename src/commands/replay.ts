import { createReadStream } from "fs";
import path from "path";
import { createInterface } from "readline";
import { Readable } from "stream";
import pLimit from "p-limit";
import { WriterOptionsInput } from "../config/writerOptions";
import { CrawlLogEntry, parseCrawlLogLine } from "../io/crawlLog";
import { describeError } from "../output/errors";
import { LineSink, consoleSink } from "../output/lineSink";
import { createWriter } from "../output/writer";

export interface ReplayOptions {
  inputPath?: string;
  concurrency: number;
  writer: WriterOptionsInput;
  sink?: LineSink;
  input?: Readable;
}

export interface ReplaySummary {
  records: number;
  written: number;
  failed: number;
  invalid: number;
}

function openInput(options: ReplayOptions): Readable {
  if (options.input) return options.input;
  if (options.inputPath) return createReadStream(path.resolve(options.inputPath), "utf8");
  process.stdin.setEncoding("utf8");
  return process.stdin;
}

export async function runReplay(options: ReplayOptions): Promise<ReplaySummary> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new Error(`Concurrency must be a positive integer, got ${options.concurrency}`);
  }

  const writer = await createWriter(options.writer, options.sink ?? consoleSink);
  const limit = pLimit(options.concurrency);
  const summary: ReplaySummary = { records: 0, written: 0, failed: 0, invalid: 0 };
  const pending: Promise<void>[] = [];

  const lines = createInterface({ input: openInput(options), crlfDelay: Infinity });
  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber += 1;
      if (!line.trim()) continue;

      let entry: CrawlLogEntry;
      try {
        entry = parseCrawlLogLine(line);
      } catch (error) {
        summary.invalid += 1;
        console.error(`Skipping line ${lineNumber}: ${describeError(error)}`);
        continue;
      }

      summary.records += 1;
      const { result, response } = entry;
      const recordLine = lineNumber;
      pending.push(
        limit(() => writer.write(result, response)).then(
          () => {
            summary.written += 1;
          },
          (error: unknown) => {
            summary.failed += 1;
            console.error(`Line ${recordLine}: ${describeError(error)}`);
          }
        )
      );
    }
    await Promise.all(pending);
  } finally {
    await writer.close();
  }

  return summary;
}
