import { z } from "zod";

export const DEFAULT_STORE_FIELD_DIR = "crawlsink_output";

export const WriterOptionsSchema = z.object({
  colors: z.boolean().default(false),
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
  outputFile: z.string().min(1).optional(),
  appendOutput: z.boolean().default(false),
  fields: z.string().optional(),
  storeFields: z.string().optional(),
  storeFieldDir: z.string().min(1).default(DEFAULT_STORE_FIELD_DIR),
  storeResponse: z.boolean().default(false),
  storeResponseDir: z.string().optional()
});

export type WriterOptionsInput = z.input<typeof WriterOptionsSchema>;
export type WriterOptions = z.output<typeof WriterOptionsSchema>;
