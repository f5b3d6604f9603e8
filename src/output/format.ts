import chalk from "chalk";
import { Result, ResultRecord } from "../types/result";
import { FormatError } from "./errors";
import { RESULT_FIELDS, ResultField, fieldValue } from "./fields";

export type Palette = InstanceType<typeof chalk.Instance>;

export const DEFAULT_SCREEN_FIELDS: readonly ResultField[] = [
  "Method",
  "URL",
  "Source",
  "Tag",
  "Attribute"
];

export const VERBOSE_SCREEN_FIELDS: readonly ResultField[] = [
  "Timestamp",
  "Method",
  "URL",
  "Source",
  "Tag",
  "Attribute",
  "Body"
];

const RECORD_KEYS: Record<ResultField, keyof ResultRecord> = {
  Timestamp: "timestamp",
  Method: "method",
  Body: "body",
  URL: "endpoint",
  Source: "source",
  Tag: "tag",
  Attribute: "attribute"
};

export function createPalette(colors: boolean): Palette {
  return new chalk.Instance({ level: colors ? 1 : 0 });
}

function decorate(field: ResultField, value: string, palette: Palette): string {
  switch (field) {
    case "URL":
      return value;
    case "Timestamp":
      return `[${palette.gray(value)}]`;
    case "Method":
      return `[${palette.blue(value)}]`;
    case "Body":
      return `[${palette.magenta(value)}]`;
    case "Source":
      return `[${palette.yellow(value)}]`;
    case "Tag":
      return `[${palette.green(value)}]`;
    case "Attribute":
      return `[${palette.cyan(value)}]`;
  }
}

export function toRecord(result: Result, fields: readonly ResultField[] = RESULT_FIELDS): ResultRecord {
  const record: ResultRecord = {};
  // iterate the schema so key order stays stable whatever order the subset was given in
  for (const field of RESULT_FIELDS) {
    if (!fields.includes(field)) continue;
    const value = fieldValue(result, field);
    if (value !== "") {
      record[RECORD_KEYS[field]] = value;
    }
  }
  return record;
}

/**
 * Encodes a Result as a single JSON object. Returns an empty string when every
 * selected field is at its default, which callers treat as "nothing to emit".
 */
export function formatJson(result: Result, fields?: readonly ResultField[]): string {
  try {
    const record = toRecord(result, fields);
    if (Object.keys(record).length === 0) return "";
    return JSON.stringify(record);
  } catch (error) {
    throw new FormatError("could not encode result as JSON", { cause: error });
  }
}

export interface ScreenFormatOptions {
  palette: Palette;
  verbose?: boolean;
  fields?: readonly ResultField[];
}

export function formatScreen(result: Result, options: ScreenFormatOptions): string {
  const fields =
    options.fields && options.fields.length > 0
      ? options.fields
      : options.verbose
        ? VERBOSE_SCREEN_FIELDS
        : DEFAULT_SCREEN_FIELDS;
  try {
    const parts: string[] = [];
    for (const field of fields) {
      const value = fieldValue(result, field);
      if (value === "") continue;
      parts.push(decorate(field, value, options.palette));
    }
    return parts.join(" ");
  } catch (error) {
    throw new FormatError("could not format result for screen", { cause: error });
  }
}

export interface FormatterOptions {
  json: boolean;
  colors: boolean;
  verbose: boolean;
  fields?: readonly ResultField[];
}

export type Formatter = (result: Result) => string;

export function createFormatter(options: FormatterOptions): Formatter {
  if (options.json) {
    return (result) => formatJson(result, options.fields);
  }
  const palette = createPalette(options.colors);
  return (result) =>
    formatScreen(result, { palette, verbose: options.verbose, fields: options.fields });
}
