import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { NAME_SIMILARITY_ALGORITHMS } from '@tallycheck/similarity';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }

  toActionableMessage(): string {
    return `Error [CONFIG]: ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: 'CONFIG', message: this.message };
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;

  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${NAME}` and `${NAME:-default}` in every string of a parsed
 * JSON document
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

/** A column as a 0-based index, a letter or a header label */
const columnRefSchema = z.union([z.string().trim().min(1), z.number().int().min(0)]);

const sideColumnsSchema = z
  .object({
    name: columnRefSchema,
    budget: columnRefSchema,
    actual: columnRefSchema,
  })
  .strict();

const encodingSchema = z.enum(['utf8', 'utf-8', 'utf16le', 'latin1', 'ascii']);

export const sourceSchema = z
  .object({
    filePath: z.string().min(1).optional(),
    sheet: z.union([z.string().min(1), z.number().int().min(1)]).optional(),
    delimiter: z.string().min(1).optional(),
    encoding: encodingSchema.optional(),
  })
  .strict()
  .optional();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    source: sourceSchema,
    columns: z
      .object({
        left: sideColumnsSchema.optional(),
        right: sideColumnsSchema.optional(),
      })
      .strict()
      .optional(),
    tolerance: z.number().finite().min(0).optional(),
    fuzzyThreshold: z.number().min(0).max(1).optional(),
    similarityAlgorithm: z.enum(NAME_SIMILARITY_ALGORITHMS).optional(),
    header: z.union([z.enum(['auto', 'none']), z.number().int().min(0)]).optional(),
    rows: z
      .object({
        start: z.number().int().min(0).optional(),
        end: z.number().int().min(0).optional(),
      })
      .strict()
      .optional(),
    emptyCells: z.enum(['unparseable', 'zero']).optional(),
    flagIndeterminate: z.boolean().optional(),
    output: z
      .object({
        exportPath: z.string().min(1).optional(),
        format: z.enum(['text', 'json']).optional(),
        showAll: z.boolean().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const start = value.rows?.start;
    const end = value.rows?.end;
    if (start !== undefined && end !== undefined && start > end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'start row cannot be greater than end row',
        path: ['rows', 'start'],
      });
    }
  });

export type ConfigFile = z.infer<typeof configFileSchema>;
export type SideColumnRefs = z.infer<typeof sideColumnsSchema>;

export function formatZodError(err: z.ZodError, label = 'Invalid config file'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Validate a parsed config document
 * @throws ConfigError listing every issue
 */
export function parseConfig(raw: unknown, label?: string): ConfigFile {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error, label));
  }
  return result.data;
}

export async function loadConfig(
  configPath: string,
  options?: EnvExpansionOptions
): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(
      `Config file ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseConfig(expandEnvVars(parsed, options), 'Invalid config file');
}

/**
 * Layer command-line settings over a config file, field by field
 */
export function mergeConfig(base: ConfigFile, override: ConfigFile): ConfigFile {
  return {
    source: {
      filePath: override.source?.filePath ?? base.source?.filePath,
      sheet: override.source?.sheet ?? base.source?.sheet,
      delimiter: override.source?.delimiter ?? base.source?.delimiter,
      encoding: override.source?.encoding ?? base.source?.encoding,
    },
    columns: {
      left: override.columns?.left ?? base.columns?.left,
      right: override.columns?.right ?? base.columns?.right,
    },
    tolerance: override.tolerance ?? base.tolerance,
    fuzzyThreshold: override.fuzzyThreshold ?? base.fuzzyThreshold,
    similarityAlgorithm: override.similarityAlgorithm ?? base.similarityAlgorithm,
    header: override.header ?? base.header,
    rows: {
      start: override.rows?.start ?? base.rows?.start,
      end: override.rows?.end ?? base.rows?.end,
    },
    emptyCells: override.emptyCells ?? base.emptyCells,
    flagIndeterminate: override.flagIndeterminate ?? base.flagIndeterminate,
    output: {
      exportPath: override.output?.exportPath ?? base.output?.exportPath,
      format: override.output?.format ?? base.output?.format,
      showAll: override.output?.showAll ?? base.output?.showAll,
    },
    logging: {
      level: override.logging?.level ?? base.logging?.level,
      format: override.logging?.format ?? base.logging?.format,
    },
  };
}
