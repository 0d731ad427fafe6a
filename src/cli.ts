import { Command, CommanderError, InvalidArgumentError } from "commander";
import { loadConfigFile, parseConfigInput, resolveConfig, type ConfigFile } from "./config";
import { ExitCode, isAnalysisError } from "./errors";
import { analyze_file_report, write_result } from "./io";
import { createLogger, type Logger } from "./logger";

export const VERSION = "0.1.0";

interface CliOptions {
  groupBy?: string[];
  sampleSize?: number;
  topK?: number;
  numericThreshold?: number;
  listThreshold?: number;
  naValues?: string[];
  columnType?: Record<string, string>;
  format?: string;
  sep?: string;
  sheet?: string | number;
  indent?: number;
  config?: string;
  debug?: boolean;
  quiet?: boolean;
}

export interface RunOptions {
  handleSignals?: boolean;
}

function parseColumnList(value: string): string[] {
  return value
    .split(",")
    .map((column) => column.trim())
    .filter((column) => column.length > 0);
}

function parseRawList(value: string): string[] {
  return value.split(",");
}

function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim().length === 0 || Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseSheet(value: string): string | number {
  return /^\d+$/.test(value) ? Number(value) : value;
}

function collectColumnType(value: string, previous: Record<string, string> = {}): Record<string, string> {
  const separator = value.lastIndexOf("=");
  if (separator <= 0 || separator === value.length - 1) {
    throw new InvalidArgumentError("Expected <column>=<numeric|categorical|list>.");
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}

export function createProgram(onRun: (input: string, output: string, options: CliOptions) => Promise<void>): Command {
  return new Command()
    .name("colstat")
    .description("Per-column descriptive statistics over a tabular file, overall or per group")
    .version(VERSION, "-v, --version", "Show version number")
    .argument("<input>", "source file (csv, tsv, jsonl, xlsx or parquet)")
    .argument("<output>", "destination JSON file")
    .option("-g, --group-by <columns>", "comma-separated grouping columns", parseColumnList)
    .option("--sample-size <rows>", "rows sampled for column type detection", parseNumberOption)
    .option("--top-k <count>", "entries reported in most_common", parseNumberOption)
    .option("--numeric-threshold <share>", "share of numeric values for a numeric column", parseNumberOption)
    .option("--list-threshold <share>", "share of list literals for a list column", parseNumberOption)
    .option("--na-values <values>", "comma-separated raw values treated as missing", parseRawList)
    .option("-t, --column-type <column=type>", "force a column type (repeatable)", collectColumnType)
    .option("-f, --format <format>", "input format, inferred from the extension by default")
    .option("--sep <char>", "field delimiter for csv/tsv input")
    .option("--sheet <name>", "worksheet name or index for xlsx input", parseSheet)
    .option("--indent <spaces>", "JSON indentation", parseNumberOption)
    .option("-c, --config <path>", "JSON config file")
    .option("--debug", "enable debug output")
    .option("-q, --quiet", "suppress all output")
    .exitOverride()
    .action(onRun);
}

export async function run(argv: string[] = process.argv.slice(2), options: RunOptions = {}): Promise<number> {
  let logger: Logger = createLogger("colstat");
  const controller = new AbortController();
  const onSignal = (): void => controller.abort();

  const program = createProgram(async (input, output, cliOptions) => {
    logger = createLogger("colstat", {
      level: cliOptions.debug ? "debug" : undefined,
      silent: cliOptions.quiet ?? false,
    });

    const fileConfig: ConfigFile = cliOptions.config ? await loadConfigFile(cliOptions.config) : {};
    const config = resolveConfig(fileConfig, toConfigOverrides(cliOptions));

    logger.info(`Reading ${input}`);
    const report = await analyze_file_report(input, {
      ...config.analysis,
      ...config.source,
      logger: logger.child("analysis"),
      signal: controller.signal,
    });

    await write_result(output, report.result, config.output);
    logger.success(`Analysis complete! Results saved to '${output}'`, {
      rows_processed: report.result.analysis_metadata.total_rows_processed,
      ...report.diagnostics,
    });
  });

  if (options.handleSignals) {
    process.once("SIGINT", onSignal);
  }

  try {
    await program.parseAsync(argv, { from: "user" });
    return ExitCode.SUCCESS;
  } catch (error) {
    return reportFailure(error, logger);
  } finally {
    process.off("SIGINT", onSignal);
  }
}

function toConfigOverrides(options: CliOptions): ConfigFile {
  return parseConfigInput(
    {
      group_by: options.groupBy,
      sample_size: options.sampleSize,
      top_k: options.topK,
      numeric_threshold: options.numericThreshold,
      list_threshold: options.listThreshold,
      na_values: options.naValues,
      column_types: options.columnType,
      format: options.format,
      sep: options.sep,
      sheet_name: options.sheet,
      indent: options.indent,
    },
    "Invalid command-line options"
  );
}

function reportFailure(error: unknown, logger: Logger): number {
  if (error instanceof CommanderError) {
    return error.exitCode;
  }
  if (isAnalysisError(error)) {
    logger.error(error.format(process.stderr.isTTY ?? false));
    return error.exitCode;
  }
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`An unexpected error occurred during processing: ${message}`);
  return ExitCode.ERROR;
}
