import pLimit from "p-limit";
import { ZodError } from "zod";
import {
  WriterOptions,
  WriterOptionsInput,
  WriterOptionsSchema
} from "../config/writerOptions";
import { CrawlResponse } from "../types/response";
import { Result } from "../types/result";
import { decolorize } from "./decolorize";
import {
  ClosedSinkError,
  ConfigValidationError,
  EncodingError,
  OutputError,
  SinkError
} from "./errors";
import { FieldStore } from "./fieldStore";
import { ResultField, validateFieldNames } from "./fields";
import { FileWriter } from "./fileWriter";
import { Formatter, createFormatter } from "./format";
import { LineSink, consoleSink } from "./lineSink";
import { DEFAULT_RESPONSE_DIR, ResponseArchiver } from "./responses";

/** Writes crawl results to the screen and/or a file, and archives responses. */
export interface Writer {
  write(result?: Result | null, response?: CrawlResponse | null): Promise<void>;
  close(): Promise<void>;
}

interface StandardWriterParts {
  json: boolean;
  format: Formatter;
  sink: LineSink;
  outputFile: FileWriter | null;
  fieldStore: FieldStore | null;
  archiver: ResponseArchiver | null;
}

export class StandardWriter implements Writer {
  private readonly outputLock = pLimit(1);

  constructor(private readonly parts: StandardWriterParts) {}

  async write(result?: Result | null, response?: CrawlResponse | null): Promise<void> {
    if (result) {
      await this.outputLock(() => this.emit(result));
    }
    // archival keeps its own index lock and never waits on screen/file output
    if (response && this.parts.archiver) {
      await this.parts.archiver.write(response);
    }
  }

  async close(): Promise<void> {
    const outputFile = this.parts.outputFile;
    if (outputFile) {
      await this.outputLock(() => outputFile.close());
    }
  }

  private async emit(result: Result): Promise<void> {
    const { fieldStore, format, json, outputFile, sink } = this.parts;
    if (outputFile?.closed) {
      throw new SinkError("could not write to output", {
        cause: new ClosedSinkError(outputFile.filePath)
      });
    }
    if (fieldStore) {
      try {
        await fieldStore.store(result);
      } catch (error) {
        throw new SinkError("could not store fields", { cause: error });
      }
    }

    let data: string;
    try {
      data = format(result);
    } catch (error) {
      throw new EncodingError("could not format output", { cause: error });
    }
    if (data.length === 0) return;

    sink.writeLine(data);
    if (outputFile) {
      const line = json ? data : decolorize(data);
      try {
        await outputFile.write(`${line}\n`);
      } catch (error) {
        throw new SinkError("could not write to output", { cause: error });
      }
    }
  }
}

function parseOptions(input: WriterOptionsInput): WriterOptions {
  try {
    return WriterOptionsSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
        .join("; ");
      throw new ConfigValidationError("options", `invalid writer options: ${issues}`, {
        cause: error
      });
    }
    throw error;
  }
}

function validateOption(option: "fields" | "storeFields", list: string): ResultField[] {
  try {
    return validateFieldNames(list);
  } catch (error) {
    const label = option === "fields" ? "fields" : "store fields";
    throw new ConfigValidationError(option, `could not validate ${label}`, { cause: error });
  }
}

/**
 * Builds a writer from raw options. Field lists are validated before any file
 * is touched; a failure at any step rejects without returning a writer.
 */
export async function createWriter(
  input: WriterOptionsInput = {},
  sink: LineSink = consoleSink
): Promise<Writer> {
  const options = parseOptions(input);

  const fields = options.fields ? validateOption("fields", options.fields) : [];
  const storeFields = options.storeFields
    ? validateOption("storeFields", options.storeFields)
    : [];

  let outputFile: FileWriter | null = null;
  if (options.outputFile) {
    try {
      outputFile = await FileWriter.open(options.outputFile, { append: options.appendOutput });
    } catch (error) {
      throw new SinkError("could not create output file", { cause: error });
    }
  }

  let archiver: ResponseArchiver | null = null;
  if (options.storeResponse) {
    try {
      archiver = await ResponseArchiver.create(options.storeResponseDir || DEFAULT_RESPONSE_DIR);
    } catch (error) {
      if (outputFile) {
        await outputFile.close().catch((closeError: unknown) => {
          if (error instanceof OutputError) error.suppressed.push(closeError);
        });
      }
      throw error;
    }
  }

  return new StandardWriter({
    json: options.json,
    format: createFormatter({
      json: options.json,
      colors: options.colors,
      verbose: options.verbose,
      fields: fields.length > 0 ? fields : undefined
    }),
    sink,
    outputFile,
    fieldStore: storeFields.length > 0 ? new FieldStore(options.storeFieldDir, storeFields) : null,
    archiver
  });
}
