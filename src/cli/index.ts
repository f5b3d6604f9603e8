#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runReplay } from "../commands/replay";
import { DEFAULT_STORE_FIELD_DIR } from "../config/writerOptions";
import { describeError } from "../output/errors";
import { DEFAULT_RESPONSE_DIR } from "../output/responses";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.CRAWLSINK_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

interface ReplayCliOptions {
  json: boolean;
  color: boolean;
  verbose: boolean;
  output?: string;
  append: boolean;
  fields?: string;
  storeFields?: string;
  storeFieldDir: string;
  storeResponse: boolean;
  storeResponseDir: string;
  concurrency: number;
}

const program = new Command();

program
  .name("crawlsink")
  .description("Write crawl results to screen and file, and archive raw responses")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides CRAWLSINK_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("replay")
  .description("Replay a JSON lines crawl log through the output writer")
  .argument("[input]", "Crawl log path (reads stdin when omitted)")
  .option("--json", "Write results as JSON lines", false)
  .option("--color", "Colorize screen output", false)
  .option("--verbose", "Include timestamp and body in screen output", false)
  .option("-o, --output <path>", "Also write results to this file")
  .option("--append", "Append to the output file instead of truncating it", false)
  .option("--fields <list>", "Comma separated fields to display (e.g. Method,URL)")
  .option("--store-fields <list>", "Comma separated fields to store in per-field files")
  .option(
    "--store-field-dir <dir>",
    "Directory for per-field files",
    process.env.CRAWLSINK_STORE_FIELD_DIR ?? DEFAULT_STORE_FIELD_DIR
  )
  .option("--store-response", "Archive raw responses", false)
  .option(
    "--store-response-dir <dir>",
    "Directory for archived responses",
    process.env.CRAWLSINK_RESPONSE_DIR ?? DEFAULT_RESPONSE_DIR
  )
  .option("--concurrency <n>", "Writes in flight at once", (v) => parseInt(v, 10), 10)
  .action(async (input: string | undefined, opts: ReplayCliOptions) => {
    const summary = await runReplay({
      inputPath: input,
      concurrency: opts.concurrency,
      writer: {
        json: opts.json,
        colors: opts.color,
        verbose: opts.verbose,
        outputFile: opts.output,
        appendOutput: opts.append,
        fields: opts.fields,
        storeFields: opts.storeFields,
        storeFieldDir: opts.storeFieldDir,
        storeResponse: opts.storeResponse,
        storeResponseDir: opts.storeResponseDir
      }
    });
    console.error(
      `Replayed ${summary.records} records: ${summary.written} written, ${summary.failed} failed, ${summary.invalid} invalid lines skipped.`
    );
    if (summary.failed > 0) {
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
