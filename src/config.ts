import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "./errors";

const positiveInt = z.number().int().positive();
const share = z.number().gt(0).lte(1);

export const columnTypeSchema = z.enum(["numeric", "categorical", "list"]);

export const sourceFormatSchema = z.enum(["csv", "tsv", "jsonl", "xlsx", "parquet"]);

export const analyzeOptionsSchema = z
  .object({
    group_by: z.array(z.string().min(1)).default([]),
    sample_size: positiveInt.default(100),
    top_k: positiveInt.default(5),
    numeric_threshold: share.default(0.8),
    list_threshold: share.default(0.8),
    na_values: z.array(z.string()).default([""]),
    column_types: z.record(z.string(), columnTypeSchema).default({}),
  })
  .strict();

export const sourceOptionsSchema = z
  .object({
    format: sourceFormatSchema.optional(),
    sep: z.string().length(1).optional(),
    sheet_name: z.union([z.string().min(1), z.number().int().nonnegative()]).optional(),
  })
  .strict();

export const outputOptionsSchema = z
  .object({
    indent: z.number().int().min(0).max(10).default(4),
  })
  .strict();

export const configFileSchema = analyzeOptionsSchema
  .partial()
  .merge(sourceOptionsSchema)
  .merge(outputOptionsSchema.partial())
  .strict();

export type AnalyzeOptionsInput = z.input<typeof analyzeOptionsSchema>;
export type AnalyzeOptions = z.output<typeof analyzeOptionsSchema>;
export type SourceOptions = z.output<typeof sourceOptionsSchema>;
export type OutputOptionsInput = z.input<typeof outputOptionsSchema>;
export type OutputOptions = z.output<typeof outputOptionsSchema>;
export type ConfigFile = z.output<typeof configFileSchema>;

export interface ResolvedConfig {
  analysis: AnalyzeOptions;
  source: SourceOptions;
  output: OutputOptions;
}

export function resolveAnalyzeOptions(input: AnalyzeOptionsInput = {}): AnalyzeOptions {
  return parseWith(analyzeOptionsSchema, input, "Invalid analysis options");
}

export function resolveOutputOptions(input: OutputOptionsInput = {}): OutputOptions {
  return parseWith(outputOptionsSchema, input, "Invalid output options");
}

export async function loadConfigFile(path: string): Promise<ConfigFile> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file '${path}'.`, [], error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file '${path}' is not valid JSON.`, [], error);
  }

  return parseConfigInput(parsed, `Invalid config file '${path}'`);
}

export function parseConfigInput(input: unknown, label: string): ConfigFile {
  return parseWith(configFileSchema, input, label);
}

export function resolveConfig(fileConfig: ConfigFile, overrides: ConfigFile = {}): ResolvedConfig {
  return {
    analysis: resolveAnalyzeOptions({
      group_by: overrides.group_by ?? fileConfig.group_by,
      sample_size: overrides.sample_size ?? fileConfig.sample_size,
      top_k: overrides.top_k ?? fileConfig.top_k,
      numeric_threshold: overrides.numeric_threshold ?? fileConfig.numeric_threshold,
      list_threshold: overrides.list_threshold ?? fileConfig.list_threshold,
      na_values: overrides.na_values ?? fileConfig.na_values,
      column_types: { ...fileConfig.column_types, ...overrides.column_types },
    }),
    source: parseWith(
      sourceOptionsSchema,
      {
        format: overrides.format ?? fileConfig.format,
        sep: overrides.sep ?? fileConfig.sep,
        sheet_name: overrides.sheet_name ?? fileConfig.sheet_name,
      },
      "Invalid source options"
    ),
    output: resolveOutputOptions({ indent: overrides.indent ?? fileConfig.indent }),
  };
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(`${message}.`, issues);
  }
  return result.data;
}
