import { promises as fs } from "fs";
import path from "path";
import pLimit from "p-limit";
import { Result } from "../types/result";
import { ensureDir } from "../utils/fs";
import { SinkError } from "./errors";
import { ResultField, fieldValue } from "./fields";

type Limiter = ReturnType<typeof pLimit>;

export function fieldStorePath(dir: string, field: ResultField): string {
  return path.join(dir, `${field}.txt`);
}

/**
 * Appends selected Result fields to one newline delimited file per field name.
 * Appends to the same field file are serialized.
 */
export class FieldStore {
  private readonly limiters = new Map<ResultField, Limiter>();
  private dirReady: Promise<void> | null = null;

  constructor(
    readonly dir: string,
    readonly fields: readonly ResultField[]
  ) {}

  async store(result: Result): Promise<void> {
    for (const field of this.fields) {
      await this.append(field, result);
    }
  }

  private async append(field: ResultField, result: Result): Promise<void> {
    const filePath = fieldStorePath(this.dir, field);
    try {
      const value = fieldValue(result, field);
      await this.prepareDir();
      await this.limiterFor(field)(() => fs.appendFile(filePath, `${value}\n`, "utf8"));
    } catch (error) {
      throw new SinkError(`could not store ${field} to ${filePath}`, { cause: error });
    }
  }

  private prepareDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = ensureDir(this.dir).catch((error: unknown) => {
        this.dirReady = null;
        throw error;
      });
    }
    return this.dirReady;
  }

  private limiterFor(field: ResultField): Limiter {
    let limiter = this.limiters.get(field);
    if (!limiter) {
      limiter = pLimit(1);
      this.limiters.set(field, limiter);
    }
    return limiter;
  }
}
