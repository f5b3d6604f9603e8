import { promises as fs } from "fs";
import path from "path";
import { ensureDir } from "../utils/fs";
import { ClosedSinkError, SinkError } from "./errors";

export interface FileWriterOptions {
  append?: boolean;
}

/** Append-only writer bound to a single file path. */
export class FileWriter {
  private handle: fs.FileHandle | null;

  private constructor(
    readonly filePath: string,
    handle: fs.FileHandle
  ) {
    this.handle = handle;
  }

  static async open(filePath: string, options: FileWriterOptions = {}): Promise<FileWriter> {
    try {
      await ensureDir(path.dirname(filePath));
      const handle = await fs.open(filePath, options.append ? "a" : "w");
      return new FileWriter(filePath, handle);
    } catch (error) {
      throw new SinkError(`could not open ${filePath}`, { cause: error });
    }
  }

  get closed(): boolean {
    return this.handle === null;
  }

  async write(data: string | Buffer): Promise<void> {
    if (!this.handle) {
      throw new ClosedSinkError(this.filePath);
    }
    try {
      await this.handle.appendFile(data);
    } catch (error) {
      throw new SinkError(`could not write to ${this.filePath}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      throw new ClosedSinkError(this.filePath);
    }
    this.handle = null;
    try {
      await handle.close();
    } catch (error) {
      throw new SinkError(`could not close ${this.filePath}`, { cause: error });
    }
  }
}
