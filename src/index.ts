export { createWriter, StandardWriter } from "./output/writer";
export type { Writer } from "./output/writer";
export { WriterOptionsSchema, DEFAULT_STORE_FIELD_DIR } from "./config/writerOptions";
export type { WriterOptions, WriterOptionsInput } from "./config/writerOptions";
export { RESULT_FIELDS, validateFieldNames, parseFieldList, fieldValue } from "./output/fields";
export type { ResultField } from "./output/fields";
export { formatJson, formatScreen, createFormatter, toRecord } from "./output/format";
export { decolorize } from "./output/decolorize";
export { FileWriter } from "./output/fileWriter";
export { FieldStore, fieldStorePath } from "./output/fieldStore";
export {
  ResponseArchiver,
  responseFileName,
  formatResponse,
  DEFAULT_RESPONSE_DIR,
  INDEX_FILE
} from "./output/responses";
export type { ArchivedResponse } from "./output/responses";
export { consoleSink, MemorySink } from "./output/lineSink";
export type { LineSink } from "./output/lineSink";
export * from "./output/errors";
export type { Result, ResultRecord } from "./types/result";
export type { CrawlResponse, CrawlRequest, ResponseHeaders } from "./types/response";
