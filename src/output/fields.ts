import { Result } from "../types/result";
import { InvalidFieldError } from "./errors";

export const RESULT_FIELDS = [
  "Timestamp",
  "Method",
  "Body",
  "URL",
  "Source",
  "Tag",
  "Attribute"
] as const;

export type ResultField = (typeof RESULT_FIELDS)[number];

export function isResultField(name: string): name is ResultField {
  return RESULT_FIELDS.some((field) => field === name);
}

export function parseFieldList(list: string): string[] {
  return list
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Parses a comma separated list of field names and checks each one against the
 * Result schema. Names are matched case-sensitively.
 *
 * @throws InvalidFieldError naming the first unknown field
 */
export function validateFieldNames(list: string): ResultField[] {
  const validated: ResultField[] = [];
  for (const name of parseFieldList(list)) {
    if (!isResultField(name)) {
      throw new InvalidFieldError(name);
    }
    validated.push(name);
  }
  return validated;
}

export function hasTimestamp(result: Result): result is Result & { timestamp: Date } {
  return result.timestamp !== undefined && result.timestamp.getTime() !== 0;
}

export function fieldValue(result: Result, field: ResultField): string {
  switch (field) {
    case "Timestamp":
      return hasTimestamp(result) ? result.timestamp.toISOString() : "";
    case "Method":
      return result.method ?? "";
    case "Body":
      return result.body ?? "";
    case "URL":
      return result.url ?? "";
    case "Source":
      return result.source ?? "";
    case "Tag":
      return result.tag ?? "";
    case "Attribute":
      return result.attribute ?? "";
  }
}
